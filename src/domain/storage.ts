import { PaymentRequest } from './types.js';

export interface PaymentSession {
    userAddress: string;
    paymentRequest: PaymentRequest;
    createdAt: number; // Epoch seconds
    verified: boolean; // Monotonic: false -> true at most once
}

export interface ISessionStorage {
    save(nonce: string, session: PaymentSession): Promise<void>;
    get(nonce: string): Promise<PaymentSession | null>;
    /** Returns false when the nonce is unknown. Never resets an already verified session. */
    markVerified(nonce: string): Promise<boolean>;
    /** Removes sessions whose `expiresAt + graceSecs` lies before `now`. Returns the count removed. */
    deleteExpired(now: number, graceSecs: number): Promise<number>;
    /**
     * Drops the oldest verified or expired sessions until at most `maxEntries`
     * remain. Pending sessions that have not expired are kept even over capacity.
     * Returns the count removed.
     */
    evictSettled(maxEntries: number, now: number): Promise<number>;
    size(): Promise<number>;
}
