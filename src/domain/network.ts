/**
 * Ledger client ports. Verifiers only depend on these operations, never on a
 * concrete transport; adapters live under `src/providers`.
 */

/** One page of a newest-first listing; `cursor` continues from the previous page's `nextCursor`. */
export interface PageRequest {
    limit: number;
    cursor?: string;
}

export interface Page<T> {
    items: T[];
    /** Null once the listing is exhausted. */
    nextCursor: string | null;
}

export interface EvmLogFilter {
    address: string;
    fromBlock: bigint;
    toBlock: bigint;
    /** Restrict to ERC-20 `Transfer(from, to, value)` events of `address`. */
    transfer?: { from: string; to: string };
}

export interface EvmLog {
    address: string;
    transactionHash: string | null;
    blockNumber: bigint | null;
    logIndex: number | null;
    topics: string[];
    data: string;
}

export interface EvmTransaction {
    hash: string;
    from: string;
    to: string | null;
    value: bigint;
}

export interface EvmLedgerClient {
    getChainId(): Promise<number>;
    getBlockNumber(): Promise<bigint>;
    getLogs(filter: EvmLogFilter): Promise<EvmLog[]>;
    getTransaction(hash: string): Promise<EvmTransaction | null>;
}

export interface SolanaSignature {
    signature: string;
    slot: number;
    failed: boolean;
}

export interface SolanaTransfer {
    from: string;
    to: string;
    lamports: bigint;
}

export interface SolanaTransactionDetail {
    signature: string;
    slot: number;
    success: boolean;
    /** Every account key the transaction references, base58. */
    accounts: string[];
    transfers: SolanaTransfer[];
}

export interface SolanaLedgerClient {
    isValidAddress(address: string): boolean;
    getRecentSignatures(address: string, page: PageRequest): Promise<Page<SolanaSignature>>;
    getTransactionDetail(signature: string): Promise<SolanaTransactionDetail | null>;
}

export interface AptosTransaction {
    hash: string;
    version: string;
    sender: string;
    success: boolean;
    function?: string;
    typeArguments: string[];
    arguments: unknown[];
}

export interface AptosLedgerClient {
    isValidAddress(address: string): boolean;
    getAccountTransactions(address: string, page: PageRequest): Promise<Page<AptosTransaction>>;
}

export interface SuiBalanceChange {
    owner: string | null; // Address owner, null for object/shared owners
    coinType: string;
    amount: bigint;
}

export interface SuiTransaction {
    digest: string;
    checkpoint: string | null;
    sender: string | null;
    success: boolean;
    balanceChanges: SuiBalanceChange[];
}

export interface SuiLedgerClient {
    isValidAddress(address: string): boolean;
    queryTransactionsFrom(address: string, page: PageRequest): Promise<Page<SuiTransaction>>;
}
