import { AptosLedgerClient, AptosTransaction, Page, PageRequest } from '../../domain/network.js';
import { ChainType, PaymentRequest, PaymentVerification } from '../../domain/types.js';
import { VerificationError, errorMessage } from '../../domain/errors.js';
import { NATIVE_DECIMALS, parseNativeAmount, toBaseUnits } from '../../utils/amount.js';
import { logger } from '../../logger.js';
import { DEFAULT_TRANSACTION_LIMIT, PaymentVerifier, ScanOptions, nowSeconds, unpaid, walkPages } from './verifier.js';

export const APTOS_COIN = '0x1::aptos_coin::AptosCoin';

const NATIVE_TRANSFER_FUNCTIONS = new Set(['0x1::aptos_account::transfer']);
const COIN_TRANSFER_FUNCTIONS = new Set(['0x1::aptos_account::transfer_coins', '0x1::coin::transfer']);

/** Strips leading zeros so `0x01` and `0x1` compare equal. */
export function normalizeAptosAddress(address: string): string {
    const hex = address.toLowerCase().replace(/^0x/, '').replace(/^0+(?=.)/, '');
    return `0x${hex}`;
}

/**
 * Aptos verifier. Same shape as the Solana one: page back through the payer's
 * transactions, inspect up to `transactionLimit` of those addressed to the
 * recipient, and stop at the first successful transfer entry function that pays
 * the recipient enough of the requested coin.
 */
export class AptosVerifier implements PaymentVerifier {
    private readonly transactionLimit: number;

    constructor(private readonly client: AptosLedgerClient, options: ScanOptions = {}) {
        this.transactionLimit = options.transactionLimit ?? DEFAULT_TRANSACTION_LIMIT;
    }

    async verifyPayment(request: PaymentRequest, payerAddress: string): Promise<PaymentVerification> {
        if (!this.client.isValidAddress(payerAddress)) {
            throw new VerificationError('INVALID_ADDRESS', `Invalid payer address: ${payerAddress}`);
        }
        if (!this.client.isValidAddress(request.recipient)) {
            throw new VerificationError('INVALID_ADDRESS', `Invalid recipient address: ${request.recipient}`);
        }

        const coinType = request.currency.kind === 'native' ? APTOS_COIN : request.currency.address;
        const required = request.currency.kind === 'native'
            ? parseNativeAmount(request.amount, NATIVE_DECIMALS.aptos)
            : toBaseUnits(request.amount, request.currency.decimals);

        const payer = normalizeAptosAddress(payerAddress);
        const recipient = normalizeAptosAddress(request.recipient);

        let inspected = 0;
        const transactions = walkPages(page => this.listTransactions(payerAddress, page), this.transactionLimit);
        for await (const tx of transactions) {
            if (normalizeAptosAddress(tx.sender) !== payer || AptosVerifier.recipientOf(tx) !== recipient) continue;

            const amount = tx.success ? AptosVerifier.transferredAmount(tx, coinType) : null;
            if (amount !== null && amount >= required) {
                logger.debug({ hash: tx.hash, amount: amount.toString() }, 'Aptos payment found');
                return {
                    isPaid: true,
                    paidAmount: amount.toString(),
                    transactionHash: tx.hash,
                    verifiedAt: nowSeconds(),
                    chain: request.chain,
                    transactionLogs: [
                        {
                            transactionHash: tx.hash,
                            from: payerAddress,
                            to: request.recipient,
                            value: amount.toString(),
                            blockNumber: Number(tx.version),
                            logIndex: 0,
                            ...(tx.function ? { data: tx.function } : {}),
                        },
                    ],
                };
            }

            if (++inspected >= this.transactionLimit) break;
        }

        return unpaid(request);
    }

    supportsChain(chainType: ChainType): boolean {
        return chainType.family === 'aptos';
    }

    private async listTransactions(payerAddress: string, page: PageRequest): Promise<Page<AptosTransaction>> {
        try {
            return await this.client.getAccountTransactions(payerAddress, page);
        } catch (error: unknown) {
            throw new VerificationError('RPC_ERROR', `Failed to list Aptos transactions: ${errorMessage(error)}`, { cause: error });
        }
    }

    /** Normalized first argument of a transfer entry function, or null for any other payload. */
    private static recipientOf(tx: AptosTransaction): string | null {
        if (!tx.function || !(NATIVE_TRANSFER_FUNCTIONS.has(tx.function) || COIN_TRANSFER_FUNCTIONS.has(tx.function))) {
            return null;
        }
        const [to] = tx.arguments;
        return typeof to === 'string' ? normalizeAptosAddress(to) : null;
    }

    private static transferredAmount(tx: AptosTransaction, coinType: string): bigint | null {
        if (!tx.function) return null;

        let transferredCoin: string | undefined;
        if (NATIVE_TRANSFER_FUNCTIONS.has(tx.function)) {
            transferredCoin = APTOS_COIN;
        } else if (COIN_TRANSFER_FUNCTIONS.has(tx.function)) {
            transferredCoin = tx.typeArguments[0];
        } else {
            return null;
        }
        if (transferredCoin !== coinType) return null;

        const amount = tx.arguments[1];
        if (typeof amount !== 'string' || !/^\d+$/.test(amount)) return null;

        return BigInt(amount);
    }
}
