import { isAddress, size, slice, hexToBigInt, isHex } from 'viem';
import { EvmLedgerClient, EvmLog, EvmLogFilter, EvmTransaction } from '../../domain/network.js';
import { ChainType, PaymentRequest, PaymentVerification, TransactionLog } from '../../domain/types.js';
import { VerificationError, errorMessage } from '../../domain/errors.js';
import { chainId, chainKey } from '../../domain/chain.js';
import { parseIntegerAmount, toBaseUnits } from '../../utils/amount.js';
import { logger } from '../../logger.js';
import { DEFAULT_LOOKBACK_BLOCKS, PaymentVerifier, ScanOptions, nowSeconds } from './verifier.js';

interface ScanResult {
    paidBy?: string; // Hash of the first qualifying transaction
    transactionLogs: TransactionLog[];
}

/**
 * Account-based verifier for EVM chains. Payments are found by scanning a bounded
 * window of recent blocks; every candidate seen in the window is kept in the audit
 * trail, not only the qualifying one.
 */
export class EvmVerifier implements PaymentVerifier {
    private readonly lookbackBlocks: bigint;

    private constructor(
        private readonly client: EvmLedgerClient,
        private readonly chainType: ChainType,
        options: ScanOptions = {}
    ) {
        this.lookbackBlocks = BigInt(options.lookbackBlocks ?? DEFAULT_LOOKBACK_BLOCKS);
    }

    /**
     * Connects to the endpoint behind `client` and checks that it serves the chain
     * `chainType` names. Rejects on any mismatch rather than verifying against the
     * wrong ledger.
     */
    static async connect(client: EvmLedgerClient, chainType: ChainType, options?: ScanOptions): Promise<EvmVerifier> {
        if (chainType.family !== 'evm') {
            throw new VerificationError('CHAIN_NOT_SUPPORTED', `EVM verifier cannot serve ${chainType.family} chains`);
        }

        const expected = chainId(chainType);
        if (!/^\d+$/.test(expected)) {
            throw new VerificationError('PARSE_ERROR', `Invalid custom chain ID: ${expected}`);
        }

        let actual: number;
        try {
            actual = await client.getChainId();
        } catch (error: unknown) {
            throw new VerificationError('NETWORK_ERROR', `Failed to get chain ID: ${errorMessage(error)}`, { cause: error });
        }

        if (BigInt(actual) !== BigInt(expected)) {
            throw new VerificationError('NETWORK_ERROR', `Chain ID mismatch: expected ${expected}, got ${actual}`);
        }

        logger.info({ chainId: expected }, 'EVM verifier connected');
        return new EvmVerifier(client, chainType, options);
    }

    async verifyPayment(request: PaymentRequest, payerAddress: string): Promise<PaymentVerification> {
        const payer = EvmVerifier.parseAddress(payerAddress);
        const recipient = EvmVerifier.parseAddress(request.recipient);

        let result: ScanResult;
        if (request.currency.kind === 'native') {
            const required = parseIntegerAmount(request.amount);
            result = await this.scanNativeTransfers(payer, recipient, required);
        } else {
            const token = EvmVerifier.parseAddress(request.currency.address);
            const required = toBaseUnits(request.amount, request.currency.decimals);
            result = await this.scanTokenTransfers(payer, recipient, token, required);
        }

        const isPaid = result.paidBy !== undefined;
        logger.debug({ chain: chainKey(this.chainType), payer, recipient, isPaid, candidates: result.transactionLogs.length }, 'EVM scan finished');

        return {
            isPaid,
            paidAmount: isPaid ? request.amount : '0',
            ...(result.paidBy ? { transactionHash: result.paidBy } : {}),
            verifiedAt: nowSeconds(),
            chain: request.chain,
            transactionLogs: result.transactionLogs,
        };
    }

    supportsChain(chainType: ChainType): boolean {
        return chainType.family === 'evm';
    }

    private async scanNativeTransfers(payer: string, recipient: string, required: bigint): Promise<ScanResult> {
        const { fromBlock, toBlock } = await this.window();
        const logs = await this.fetchLogs({ address: recipient, fromBlock, toBlock });

        const transactions = new Map<string, EvmTransaction | null>();
        const transactionLogs: TransactionLog[] = [];
        let paidBy: string | undefined;

        for (const log of logs) {
            if (!log.transactionHash) continue;

            if (!transactions.has(log.transactionHash)) {
                transactions.set(log.transactionHash, await this.fetchTransaction(log.transactionHash));
            }
            const tx = transactions.get(log.transactionHash);
            if (!tx) continue;

            transactionLogs.push({
                transactionHash: log.transactionHash,
                from: tx.from,
                to: tx.to ?? '0x0000000000000000000000000000000000000000',
                value: tx.value.toString(),
                blockNumber: Number(log.blockNumber ?? 0n),
                logIndex: log.logIndex ?? 0,
            });

            if (!paidBy && tx.from.toLowerCase() === payer && tx.value >= required) {
                paidBy = log.transactionHash;
            }
        }

        return { paidBy, transactionLogs };
    }

    private async scanTokenTransfers(payer: string, recipient: string, token: string, required: bigint): Promise<ScanResult> {
        const { fromBlock, toBlock } = await this.window();
        const logs = await this.fetchLogs({
            address: token,
            fromBlock,
            toBlock,
            transfer: { from: payer, to: recipient },
        });

        const transactionLogs: TransactionLog[] = [];
        let paidBy: string | undefined;

        for (const log of logs) {
            if (!log.transactionHash || !isHex(log.data) || size(log.data) < 32) continue;

            const word = slice(log.data, 0, 32);
            const amount = hexToBigInt(word);
            transactionLogs.push({
                transactionHash: log.transactionHash,
                from: payer,
                to: recipient,
                value: amount.toString(),
                blockNumber: Number(log.blockNumber ?? 0n),
                logIndex: log.logIndex ?? 0,
                data: word.slice(2),
            });

            if (!paidBy && amount >= required) {
                paidBy = log.transactionHash;
            }
        }

        return { paidBy, transactionLogs };
    }

    private async window(): Promise<{ fromBlock: bigint; toBlock: bigint }> {
        let latest: bigint;
        try {
            latest = await this.client.getBlockNumber();
        } catch (error: unknown) {
            throw new VerificationError('RPC_ERROR', `Failed to get block number: ${errorMessage(error)}`, { cause: error });
        }
        const fromBlock = latest > this.lookbackBlocks ? latest - this.lookbackBlocks : 0n;
        return { fromBlock, toBlock: latest };
    }

    private async fetchLogs(filter: EvmLogFilter): Promise<EvmLog[]> {
        try {
            return await this.client.getLogs(filter);
        } catch (error: unknown) {
            throw new VerificationError('RPC_ERROR', `Failed to get logs: ${errorMessage(error)}`, { cause: error });
        }
    }

    private async fetchTransaction(hash: string): Promise<EvmTransaction | null> {
        try {
            return await this.client.getTransaction(hash);
        } catch (error: unknown) {
            logger.warn({ hash, error: errorMessage(error) }, 'Skipping log whose transaction could not be fetched');
            return null;
        }
    }

    private static parseAddress(address: string): string {
        if (!isAddress(address, { strict: false })) {
            throw new VerificationError('INVALID_ADDRESS', `Invalid address: ${address}`);
        }
        return address.toLowerCase();
    }
}
