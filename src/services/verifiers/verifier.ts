import { ChainType, PaymentRequest, PaymentVerification, TransactionLog } from '../../domain/types.js';
import { Page, PageRequest } from '../../domain/network.js';

export interface PaymentVerifier {
    /**
     * Inspects the ledger for a payment from `payerAddress` that satisfies `request`.
     * An unpaid request resolves with `isPaid: false`; only transport, parsing and
     * address problems reject, with a `VerificationError`.
     */
    verifyPayment(request: PaymentRequest, payerAddress: string): Promise<PaymentVerification>;

    /** Advisory self-check. Dispatch always goes through the registry key. */
    supportsChain(chainType: ChainType): boolean;
}

export interface ScanOptions {
    /** EVM lookback window in blocks. */
    lookbackBlocks?: number;
    /**
     * Transaction-list ledgers: how many of the most recent payer -> recipient
     * transactions are inspected. Also the page size of the listing.
     */
    transactionLimit?: number;
}

export const DEFAULT_LOOKBACK_BLOCKS = 100;
export const DEFAULT_TRANSACTION_LIMIT = 50;

/** Upper bound on listing pages fetched while looking for payer -> recipient transactions. */
export const MAX_SCAN_PAGES = 20;

/**
 * Yields the items of a newest-first paged listing, following `nextCursor` until
 * the listing is exhausted or {@link MAX_SCAN_PAGES} pages have been read.
 */
export async function* walkPages<T>(
    fetchPage: (page: PageRequest) => Promise<Page<T>>,
    pageSize: number
): AsyncGenerator<T, void, undefined> {
    let cursor: string | undefined;
    for (let pages = 0; pages < MAX_SCAN_PAGES; pages++) {
        const page = await fetchPage(cursor === undefined ? { limit: pageSize } : { limit: pageSize, cursor });
        yield* page.items;
        if (page.nextCursor === null) return;
        cursor = page.nextCursor;
    }
}

export function nowSeconds(): number {
    return Math.floor(Date.now() / 1000);
}

export function unpaid(request: PaymentRequest, transactionLogs: TransactionLog[] = []): PaymentVerification {
    return {
        isPaid: false,
        paidAmount: '0',
        verifiedAt: nowSeconds(),
        chain: request.chain,
        transactionLogs,
    };
}
