import {
    createPublicClient,
    http,
    isAddress,
    isHash,
    parseAbiItem,
    TransactionNotFoundError,
} from 'viem';
import { EvmLedgerClient, EvmLog, EvmLogFilter, EvmTransaction } from '../domain/network.js';

/** ERC-20 Transfer event signature */
const TRANSFER_EVENT = parseAbiItem(
    'event Transfer(address indexed from, address indexed to, uint256 value)'
);

function createHttpClient(rpcUrl: string) {
    return createPublicClient({ transport: http(rpcUrl) });
}

type HttpPublicClient = ReturnType<typeof createHttpClient>;

interface ViemLog {
    address: string;
    transactionHash: string | null;
    blockNumber: bigint | null;
    logIndex: number | null;
    topics: readonly string[];
    data: string;
}

function toEvmLog(log: ViemLog): EvmLog {
    return {
        address: log.address,
        transactionHash: log.transactionHash,
        blockNumber: log.blockNumber,
        logIndex: log.logIndex,
        topics: [...log.topics],
        data: log.data,
    };
}

function requireAddress(value: string) {
    if (!isAddress(value, { strict: false })) {
        throw new Error(`Invalid address: ${value}`);
    }
    return value;
}

/** {@link EvmLedgerClient} over JSON-RPC, backed by a viem public client. */
export class ViemEvmClient implements EvmLedgerClient {
    private client: HttpPublicClient;

    constructor(rpcUrl: string) {
        this.client = createHttpClient(rpcUrl);
    }

    async getChainId(): Promise<number> {
        return this.client.getChainId();
    }

    async getBlockNumber(): Promise<bigint> {
        return this.client.getBlockNumber({ cacheTime: 0 });
    }

    async getLogs(filter: EvmLogFilter): Promise<EvmLog[]> {
        const address = requireAddress(filter.address);

        if (filter.transfer) {
            const logs = await this.client.getLogs({
                address,
                event: TRANSFER_EVENT,
                args: {
                    from: requireAddress(filter.transfer.from),
                    to: requireAddress(filter.transfer.to),
                },
                fromBlock: filter.fromBlock,
                toBlock: filter.toBlock,
            });
            return logs.map(toEvmLog);
        }

        const logs = await this.client.getLogs({
            address,
            fromBlock: filter.fromBlock,
            toBlock: filter.toBlock,
        });
        return logs.map(toEvmLog);
    }

    async getTransaction(hash: string): Promise<EvmTransaction | null> {
        if (!isHash(hash)) {
            throw new Error(`Invalid transaction hash: ${hash}`);
        }
        try {
            const tx = await this.client.getTransaction({ hash });
            return { hash: tx.hash, from: tx.from, to: tx.to, value: tx.value };
        } catch (error: unknown) {
            if (error instanceof TransactionNotFoundError) return null;
            throw error;
        }
    }
}
