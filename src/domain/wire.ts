import {
    AccessResult,
    ChainDescriptor,
    ChainType,
    Currency,
    PaymentChallenge,
    PaymentRequest,
    PaymentVerification,
    TransactionLog,
} from './types.js';

// Response bodies use the protocol's snake_case field names.

export interface ChainTypeBody {
    family: ChainType['family'];
    network?: string | { custom: string };
    name?: string;
}

export interface ChainBody {
    chain_type: ChainTypeBody;
    chain_id: string;
    rpc_url?: string;
}

export type CurrencyBody =
    | { kind: 'native' }
    | { kind: 'token'; address: string; decimals: number };

export interface PaymentRequestBody {
    amount: string;
    currency: CurrencyBody;
    recipient: string;
    chain: ChainBody;
    description?: string;
    expires_at?: number;
    nonce: string;
}

export interface TransactionLogBody {
    transaction_hash: string;
    from: string;
    to: string;
    value: string;
    block_number: number;
    log_index: number;
    data?: string;
}

export interface VerificationBody {
    is_paid: boolean;
    paid_amount: string;
    transaction_hash?: string;
    verified_at: number;
    chain: ChainBody;
    transaction_logs: TransactionLogBody[];
}

export interface ChallengeBody {
    status: 402;
    payment_required: PaymentRequestBody;
    verification_url: string;
}

export interface GrantBody {
    should_serve_content: true;
    verification?: VerificationBody;
}

export function chainTypeBody(chainType: ChainType): ChainTypeBody {
    if (chainType.family === 'custom') {
        return { family: 'custom', name: chainType.name };
    }
    return { family: chainType.family, network: chainType.network };
}

export function chainBody(chain: ChainDescriptor): ChainBody {
    return {
        chain_type: chainTypeBody(chain.chainType),
        chain_id: chain.chainId,
        ...(chain.rpcUrl !== undefined ? { rpc_url: chain.rpcUrl } : {}),
    };
}

function currencyBody(currency: Currency): CurrencyBody {
    return currency.kind === 'native'
        ? { kind: 'native' }
        : { kind: 'token', address: currency.address, decimals: currency.decimals };
}

export function paymentRequestBody(request: PaymentRequest): PaymentRequestBody {
    return {
        amount: request.amount,
        currency: currencyBody(request.currency),
        recipient: request.recipient,
        chain: chainBody(request.chain),
        ...(request.description !== undefined ? { description: request.description } : {}),
        ...(request.expiresAt !== undefined ? { expires_at: request.expiresAt } : {}),
        nonce: request.nonce,
    };
}

function transactionLogBody(log: TransactionLog): TransactionLogBody {
    return {
        transaction_hash: log.transactionHash,
        from: log.from,
        to: log.to,
        value: log.value,
        block_number: log.blockNumber,
        log_index: log.logIndex,
        ...(log.data !== undefined ? { data: log.data } : {}),
    };
}

export function verificationBody(verification: PaymentVerification): VerificationBody {
    return {
        is_paid: verification.isPaid,
        paid_amount: verification.paidAmount,
        ...(verification.transactionHash !== undefined ? { transaction_hash: verification.transactionHash } : {}),
        verified_at: verification.verifiedAt,
        chain: chainBody(verification.chain),
        transaction_logs: verification.transactionLogs.map(transactionLogBody),
    };
}

export function challengeBody(challenge: PaymentChallenge): ChallengeBody {
    return {
        status: 402,
        payment_required: paymentRequestBody(challenge.paymentRequired),
        verification_url: challenge.verificationUrl,
    };
}

/** 402 challenge or 200 grant, whichever the access result calls for. */
export function accessBody(result: AccessResult): ChallengeBody | GrantBody {
    if (result.challenge) {
        return challengeBody(result.challenge);
    }
    return {
        should_serve_content: true,
        ...(result.verification ? { verification: verificationBody(result.verification) } : {}),
    };
}
