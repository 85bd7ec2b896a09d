import { z } from 'zod';
import { Page, PageRequest, SuiBalanceChange, SuiLedgerClient, SuiTransaction } from '../domain/network.js';
import { LedgerNetwork } from '../domain/types.js';
import { rpcCall } from '../utils/http.js';

const FULLNODES: Record<Exclude<LedgerNetwork, { custom: string }>, string> = {
    mainnet: 'https://fullnode.mainnet.sui.io:443',
    testnet: 'https://fullnode.testnet.sui.io:443',
    devnet: 'https://fullnode.devnet.sui.io:443',
};

const AddressOwnerSchema = z.object({ AddressOwner: z.string() });

const TransactionBlockSchema = z.object({
    digest: z.string(),
    checkpoint: z.string().nullish(),
    transaction: z.object({
        data: z.object({ sender: z.string() }),
    }).nullish(),
    effects: z.object({
        status: z.object({ status: z.string(), error: z.string().optional() }),
    }).nullish(),
    balanceChanges: z.array(z.object({
        owner: z.unknown(),
        coinType: z.string(),
        amount: z.string().regex(/^-?\d+$/),
    })).nullish(),
});

const QueryResultSchema = z.object({
    data: z.array(TransactionBlockSchema),
    hasNextPage: z.boolean().optional(),
    nextCursor: z.string().nullish(),
});

export function suiEndpoint(network: LedgerNetwork, rpcUrl?: string): string {
    if (rpcUrl) return rpcUrl;
    if (typeof network === 'string') return FULLNODES[network];
    return network.custom;
}

/** {@link SuiLedgerClient} over the Sui fullnode JSON-RPC API. */
export class JsonRpcSuiClient implements SuiLedgerClient {
    constructor(private readonly url: string) { }

    isValidAddress(address: string): boolean {
        return /^0x[0-9a-fA-F]{1,64}$/.test(address);
    }

    /** Transaction blocks sent by `address`, newest first (descending order). */
    async queryTransactionsFrom(address: string, { limit, cursor }: PageRequest): Promise<Page<SuiTransaction>> {
        const result = await rpcCall(
            this.url,
            'suix_queryTransactionBlocks',
            [
                {
                    filter: { FromAddress: address },
                    options: { showInput: true, showEffects: true, showBalanceChanges: true },
                },
                cursor ?? null,
                limit,
                true,
            ],
            QueryResultSchema
        );

        const items = result.data.map((block): SuiTransaction => ({
            digest: block.digest,
            checkpoint: block.checkpoint ?? null,
            sender: block.transaction?.data.sender ?? null,
            success: block.effects?.status.status === 'success',
            balanceChanges: (block.balanceChanges ?? []).map((change): SuiBalanceChange => {
                const owner = AddressOwnerSchema.safeParse(change.owner);
                return {
                    owner: owner.success ? owner.data.AddressOwner : null,
                    coinType: change.coinType,
                    amount: BigInt(change.amount),
                };
            }),
        }));
        return { items, nextCursor: result.hasNextPage && result.nextCursor ? result.nextCursor : null };
    }
}
