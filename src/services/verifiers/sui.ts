import { Page, PageRequest, SuiLedgerClient, SuiTransaction } from '../../domain/network.js';
import { ChainType, PaymentRequest, PaymentVerification } from '../../domain/types.js';
import { VerificationError, errorMessage } from '../../domain/errors.js';
import { NATIVE_DECIMALS, parseNativeAmount, toBaseUnits } from '../../utils/amount.js';
import { logger } from '../../logger.js';
import { DEFAULT_TRANSACTION_LIMIT, PaymentVerifier, ScanOptions, nowSeconds, unpaid, walkPages } from './verifier.js';

export const SUI_COIN = '0x2::sui::SUI';

// Sui renders 0x2::sui::SUI in both short and long (64 hex digit) form
function normalizeCoinType(coinType: string): string {
    const [address, ...rest] = coinType.split('::');
    if (!address.startsWith('0x') || rest.length === 0) return coinType;
    const hex = address.slice(2).toLowerCase().replace(/^0+(?=.)/, '');
    return [`0x${hex}`, ...rest].join('::');
}

/**
 * Sui verifier, built like the Solana one: page back through the payer's
 * transaction blocks, inspect up to `transactionLimit` of those that change the
 * recipient's balance, and stop at the first successful one crediting the
 * recipient with enough of the requested coin.
 */
export class SuiVerifier implements PaymentVerifier {
    private readonly transactionLimit: number;

    constructor(private readonly client: SuiLedgerClient, options: ScanOptions = {}) {
        this.transactionLimit = options.transactionLimit ?? DEFAULT_TRANSACTION_LIMIT;
    }

    async verifyPayment(request: PaymentRequest, payerAddress: string): Promise<PaymentVerification> {
        if (!this.client.isValidAddress(payerAddress)) {
            throw new VerificationError('INVALID_ADDRESS', `Invalid payer address: ${payerAddress}`);
        }
        if (!this.client.isValidAddress(request.recipient)) {
            throw new VerificationError('INVALID_ADDRESS', `Invalid recipient address: ${request.recipient}`);
        }

        const coinType = normalizeCoinType(request.currency.kind === 'native' ? SUI_COIN : request.currency.address);
        const required = request.currency.kind === 'native'
            ? parseNativeAmount(request.amount, NATIVE_DECIMALS.sui)
            : toBaseUnits(request.amount, request.currency.decimals);

        const payer = payerAddress.toLowerCase();
        const recipient = request.recipient.toLowerCase();

        let inspected = 0;
        const transactions = walkPages(page => this.queryTransactions(payerAddress, page), this.transactionLimit);
        for await (const tx of transactions) {
            if (tx.sender !== null && tx.sender.toLowerCase() !== payer) continue;

            const toRecipient = tx.balanceChanges.filter(change => change.owner?.toLowerCase() === recipient);
            if (toRecipient.length === 0) continue;

            const credited = toRecipient
                .filter(change => normalizeCoinType(change.coinType) === coinType)
                .filter(change => change.amount > 0n)
                .reduce((sum, change) => sum + change.amount, 0n);

            if (tx.success && credited > 0n && credited >= required) {
                logger.debug({ digest: tx.digest, credited: credited.toString() }, 'Sui payment found');
                return {
                    isPaid: true,
                    paidAmount: credited.toString(),
                    transactionHash: tx.digest,
                    verifiedAt: nowSeconds(),
                    chain: request.chain,
                    transactionLogs: [
                        {
                            transactionHash: tx.digest,
                            from: payerAddress,
                            to: request.recipient,
                            value: credited.toString(),
                            blockNumber: Number(tx.checkpoint ?? 0),
                            logIndex: 0,
                        },
                    ],
                };
            }

            if (++inspected >= this.transactionLimit) break;
        }

        return unpaid(request);
    }

    supportsChain(chainType: ChainType): boolean {
        return chainType.family === 'sui';
    }

    private async queryTransactions(payerAddress: string, page: PageRequest): Promise<Page<SuiTransaction>> {
        try {
            return await this.client.queryTransactionsFrom(payerAddress, page);
        } catch (error: unknown) {
            throw new VerificationError('RPC_ERROR', `Failed to query Sui transactions: ${errorMessage(error)}`, { cause: error });
        }
    }
}
