import { Connection, PublicKey, clusterApiUrl, type Cluster } from '@solana/web3.js';
import { Page, PageRequest, SolanaLedgerClient, SolanaSignature, SolanaTransactionDetail } from '../domain/network.js';
import { LedgerNetwork } from '../domain/types.js';
import { isSuccessful, parseSystemTransfers } from '../utils/solanaTransferParser.js';

export type SolanaConnection = Pick<Connection, 'getSignaturesForAddress' | 'getParsedTransaction'>;

const CLUSTERS: Record<Exclude<LedgerNetwork, { custom: string }>, Cluster> = {
    mainnet: 'mainnet-beta',
    testnet: 'testnet',
    devnet: 'devnet',
};

/** Picks the endpoint for a network: an explicit RPC URL wins, then the public cluster URL. */
export function solanaEndpoint(network: LedgerNetwork, rpcUrl?: string): string {
    if (rpcUrl) return rpcUrl;
    if (typeof network === 'string') return clusterApiUrl(CLUSTERS[network]);
    return network.custom;
}

/** {@link SolanaLedgerClient} backed by a `@solana/web3.js` connection bound to one cluster. */
export class Web3SolanaClient implements SolanaLedgerClient {
    constructor(private readonly connection: SolanaConnection) { }

    static forNetwork(network: LedgerNetwork, rpcUrl?: string): Web3SolanaClient {
        return new Web3SolanaClient(new Connection(solanaEndpoint(network, rpcUrl), 'confirmed'));
    }

    isValidAddress(address: string): boolean {
        try {
            new PublicKey(address);
            return true;
        } catch {
            return false;
        }
    }

    /** Newest first; the cursor is the last signature of the previous page (`before`). */
    async getRecentSignatures(address: string, { limit, cursor }: PageRequest): Promise<Page<SolanaSignature>> {
        const infos = await this.connection.getSignaturesForAddress(
            new PublicKey(address),
            cursor === undefined ? { limit } : { limit, before: cursor }
        );
        const last = infos.at(-1);
        return {
            items: infos.map(info => ({
                signature: info.signature,
                slot: info.slot,
                failed: info.err !== null,
            })),
            nextCursor: last && infos.length >= limit ? last.signature : null,
        };
    }

    async getTransactionDetail(signature: string): Promise<SolanaTransactionDetail | null> {
        const tx = await this.connection.getParsedTransaction(signature, {
            commitment: 'confirmed',
            maxSupportedTransactionVersion: 0,
        });
        if (!tx) return null;

        return {
            signature,
            slot: tx.slot,
            success: isSuccessful(tx),
            accounts: tx.transaction.message.accountKeys.map(key => key.pubkey.toBase58()),
            transfers: parseSystemTransfers(tx),
        };
    }
}
