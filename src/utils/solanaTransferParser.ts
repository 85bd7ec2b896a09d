import type { ParsedInstruction, PartiallyDecodedInstruction } from '@solana/web3.js';
import { z } from 'zod';
import { SolanaTransfer } from '../domain/network.js';

type Instruction = ParsedInstruction | PartiallyDecodedInstruction;

/** The subset of `ParsedTransactionWithMeta` the parser reads. */
export interface ParsedTransactionLike {
    meta: { err: unknown; innerInstructions?: { instructions: Instruction[] }[] | null } | null;
    transaction: { message: { instructions: Instruction[] } };
}

const SystemTransferSchema = z.object({
    type: z.enum(['transfer', 'transferWithSeed']),
    info: z.object({
        source: z.string(),
        destination: z.string(),
        lamports: z.union([z.number().int().nonnegative(), z.string().regex(/^\d+$/)]),
    }),
});

function isParsed(instruction: Instruction): instruction is ParsedInstruction {
    return 'parsed' in instruction;
}

/**
 * Collects native SOL transfers from a jsonParsed transaction.
 *
 * Both top-level and inner (CPI) instructions are inspected, since wallets and
 * programs often move lamports through a nested System Program call. Instructions
 * of other programs, and System Program instructions that are not transfers, are
 * ignored.
 */
export function parseSystemTransfers(tx: ParsedTransactionLike): SolanaTransfer[] {
    const inner = (tx.meta?.innerInstructions ?? []).flatMap(group => group.instructions);
    const instructions = [...tx.transaction.message.instructions, ...inner];

    const transfers: SolanaTransfer[] = [];
    for (const instruction of instructions) {
        if (!isParsed(instruction) || instruction.program !== 'system') continue;

        const parsed = SystemTransferSchema.safeParse(instruction.parsed);
        if (!parsed.success) continue;

        const { source, destination, lamports } = parsed.data.info;
        transfers.push({ from: source, to: destination, lamports: BigInt(lamports) });
    }
    return transfers;
}

/** A transaction succeeded when it has metadata and no execution error. */
export function isSuccessful(tx: ParsedTransactionLike): boolean {
    return tx.meta !== null && tx.meta.err === null;
}
