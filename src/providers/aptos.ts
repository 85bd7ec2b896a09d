import { z } from 'zod';
import { AptosLedgerClient, AptosTransaction, Page, PageRequest } from '../domain/network.js';
import { LedgerNetwork } from '../domain/types.js';
import { HttpError, getJson } from '../utils/http.js';

const FULLNODES: Record<Exclude<LedgerNetwork, { custom: string }>, string> = {
    mainnet: 'https://api.mainnet.aptoslabs.com/v1',
    testnet: 'https://api.testnet.aptoslabs.com/v1',
    devnet: 'https://api.devnet.aptoslabs.com/v1',
};

const AccountSchema = z.object({
    sequence_number: z.string().regex(/^\d+$/),
});

const TransactionSchema = z.object({
    type: z.string(),
    hash: z.string(),
    version: z.string().default('0'),
    sender: z.string().optional(),
    success: z.boolean().optional(),
    payload: z.object({
        function: z.string().optional(),
        type_arguments: z.array(z.string()).default([]),
        arguments: z.array(z.unknown()).default([]),
    }).optional(),
});

const TransactionListSchema = z.array(TransactionSchema);

export function aptosEndpoint(network: LedgerNetwork, rpcUrl?: string): string {
    if (rpcUrl) return rpcUrl.replace(/\/+$/, '');
    if (typeof network === 'string') return FULLNODES[network];
    return network.custom.replace(/\/+$/, '');
}

/** {@link AptosLedgerClient} over the Aptos fullnode REST API. */
export class RestAptosClient implements AptosLedgerClient {
    constructor(private readonly baseUrl: string) { }

    isValidAddress(address: string): boolean {
        return /^0x[0-9a-fA-F]{1,64}$/.test(address);
    }

    /**
     * User transactions sent by `address`, newest first. The REST API pages by
     * sequence number in ascending order, so each page is the window just below the
     * cursor, which is the lowest sequence number already returned. The first page
     * ends at the account's current sequence number.
     */
    async getAccountTransactions(address: string, { limit, cursor }: PageRequest): Promise<Page<AptosTransaction>> {
        const end = cursor === undefined ? await this.sequenceNumber(address) : BigInt(cursor);
        if (end === 0n) return { items: [], nextCursor: null };

        const window = BigInt(limit);
        const start = end > window ? end - window : 0n;
        const transactions = await getJson(
            `${this.baseUrl}/accounts/${address}/transactions?start=${start}&limit=${end - start}`,
            TransactionListSchema
        );

        const items = transactions
            .filter(tx => tx.type === 'user_transaction')
            .map(tx => ({
                hash: tx.hash,
                version: tx.version,
                sender: tx.sender ?? address,
                success: tx.success ?? false,
                function: tx.payload?.function,
                typeArguments: tx.payload?.type_arguments ?? [],
                arguments: tx.payload?.arguments ?? [],
            }))
            .reverse();
        return { items, nextCursor: start > 0n ? start.toString() : null };
    }

    private async sequenceNumber(address: string): Promise<bigint> {
        try {
            const account = await getJson(`${this.baseUrl}/accounts/${address}`, AccountSchema);
            return BigInt(account.sequence_number);
        } catch (error: unknown) {
            // Accounts that never transacted do not exist on chain yet
            if (error instanceof HttpError && error.status === 404) return 0n;
            throw error;
        }
    }
}
