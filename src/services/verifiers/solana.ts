import { Page, PageRequest, SolanaLedgerClient, SolanaSignature, SolanaTransactionDetail } from '../../domain/network.js';
import { ChainType, PaymentRequest, PaymentVerification } from '../../domain/types.js';
import { VerificationError, errorMessage } from '../../domain/errors.js';
import { NATIVE_DECIMALS, parseNativeAmount } from '../../utils/amount.js';
import { logger } from '../../logger.js';
import { DEFAULT_TRANSACTION_LIMIT, PaymentVerifier, ScanOptions, nowSeconds, unpaid, walkPages } from './verifier.js';

/**
 * Instruction-based verifier for Solana. Pages back through the payer's signatures,
 * inspects up to `transactionLimit` of the most recent transactions that reference
 * both payer and recipient, and accepts the first successful one whose system
 * transfers to the recipient cover the requested lamports; scanning stops there.
 */
export class SolanaVerifier implements PaymentVerifier {
    private readonly transactionLimit: number;

    constructor(private readonly client: SolanaLedgerClient, options: ScanOptions = {}) {
        this.transactionLimit = options.transactionLimit ?? DEFAULT_TRANSACTION_LIMIT;
    }

    async verifyPayment(request: PaymentRequest, payerAddress: string): Promise<PaymentVerification> {
        if (!this.client.isValidAddress(payerAddress)) {
            throw new VerificationError('INVALID_ADDRESS', 'payer address error');
        }
        if (!this.client.isValidAddress(request.recipient)) {
            throw new VerificationError('INVALID_ADDRESS', 'recipient address error');
        }
        if (request.currency.kind !== 'native') {
            throw new VerificationError('INVALID_CURRENCY', 'Solana verifier only checks native SOL transfers');
        }

        const requiredLamports = parseNativeAmount(request.amount, NATIVE_DECIMALS.solana);

        let inspected = 0;
        const signatures = walkPages(page => this.listSignatures(payerAddress, page), this.transactionLimit);
        for await (const { signature, failed } of signatures) {
            if (failed) continue;

            const detail = await this.fetchDetail(signature);
            if (!detail || !SolanaVerifier.isBetween(detail, payerAddress, request.recipient)) continue;

            const paidLamports = SolanaVerifier.paidToRecipient(detail, payerAddress, request.recipient);
            if (paidLamports !== null && paidLamports >= requiredLamports) {
                logger.debug({ signature, paidLamports: paidLamports.toString() }, 'Solana payment found');
                return {
                    isPaid: true,
                    paidAmount: paidLamports.toString(),
                    transactionHash: signature,
                    verifiedAt: nowSeconds(),
                    chain: request.chain,
                    transactionLogs: [
                        {
                            transactionHash: signature,
                            from: payerAddress,
                            to: request.recipient,
                            value: paidLamports.toString(),
                            blockNumber: detail.slot,
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
        return chainType.family === 'solana';
    }

    private static isBetween(detail: SolanaTransactionDetail, payer: string, recipient: string): boolean {
        return detail.accounts.includes(payer) && detail.accounts.includes(recipient);
    }

    /** Lamports moved payer -> recipient, or null when the transaction does not qualify. */
    private static paidToRecipient(detail: SolanaTransactionDetail, payer: string, recipient: string): bigint | null {
        if (!detail.success) return null;

        const matching = detail.transfers.filter(t => t.from === payer && t.to === recipient);
        if (matching.length === 0) return null;

        return matching.reduce((sum, t) => sum + t.lamports, 0n);
    }

    private async listSignatures(payerAddress: string, page: PageRequest): Promise<Page<SolanaSignature>> {
        try {
            return await this.client.getRecentSignatures(payerAddress, page);
        } catch (error: unknown) {
            throw new VerificationError('RPC_ERROR', `Failed to list transactions: ${errorMessage(error)}`, { cause: error });
        }
    }

    private async fetchDetail(signature: string): Promise<SolanaTransactionDetail | null> {
        try {
            return await this.client.getTransactionDetail(signature);
        } catch (error: unknown) {
            throw new VerificationError('RPC_ERROR', `Failed to get transaction ${signature}: ${errorMessage(error)}`, { cause: error });
        }
    }
}
