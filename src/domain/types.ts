export type EvmNetwork =
    | 'ethereum'
    | 'polygon'
    | 'bsc'
    | 'arbitrum'
    | 'optimism'
    | 'avalanche'
    | 'base'
    | { custom: string }; // decimal chain id

export type LedgerNetwork = 'mainnet' | 'testnet' | 'devnet' | { custom: string };

export type ChainType =
    | { family: 'evm'; network: EvmNetwork }
    | { family: 'aptos'; network: LedgerNetwork }
    | { family: 'sui'; network: LedgerNetwork }
    | { family: 'solana'; network: LedgerNetwork }
    | { family: 'custom'; name: string };

export type ChainFamily = ChainType['family'];

export interface ChainDescriptor {
    chainType: ChainType;
    chainId: string; // Derived from chainType, never configured
    rpcUrl?: string;
}

export type Currency =
    | { kind: 'native' }
    | { kind: 'token'; address: string; decimals: number };

export interface PaymentRequest {
    amount: string; // Decimal string, never a float
    currency: Currency;
    recipient: string;
    chain: ChainDescriptor;
    description?: string;
    expiresAt?: number; // Epoch seconds
    nonce: string;
}

export interface TransactionLog {
    transactionHash: string;
    from: string;
    to: string;
    value: string; // Base units as decimal string
    blockNumber: number;
    logIndex: number;
    data?: string;
}

export interface PaymentVerification {
    isPaid: boolean;
    paidAmount: string;
    transactionHash?: string;
    verifiedAt: number; // Time of the check, not of the ledger event
    chain: ChainDescriptor;
    transactionLogs: TransactionLog[];
}

export interface PaymentChallenge {
    status: 402;
    paymentRequired: PaymentRequest;
    verificationUrl: string;
}

export interface AccessResult {
    shouldServeContent: boolean;
    httpStatus: 200 | 402;
    challenge?: PaymentChallenge;
    verification?: PaymentVerification;
}
