import { ISessionStorage, PaymentSession } from '../domain/storage.js';

/**
 * Process-local session store. Each operation runs to completion inside a single
 * tick, so concurrent requests interleave only between operations: lookups never
 * observe a half-written session and the verified flag has a single writer.
 */
export class InMemorySessionStorage implements ISessionStorage {
    private sessions: Map<string, PaymentSession> = new Map();

    async save(nonce: string, session: PaymentSession): Promise<void> {
        this.sessions.set(nonce, structuredClone(session));
    }

    async get(nonce: string): Promise<PaymentSession | null> {
        const session = this.sessions.get(nonce);
        return session ? structuredClone(session) : null;
    }

    async markVerified(nonce: string): Promise<boolean> {
        const session = this.sessions.get(nonce);
        if (!session) return false;
        session.verified = true;
        return true;
    }

    async deleteExpired(now: number, graceSecs: number): Promise<number> {
        let removed = 0;
        for (const [nonce, session] of this.sessions.entries()) {
            const expiresAt = session.paymentRequest.expiresAt;
            if (expiresAt !== undefined && expiresAt + graceSecs < now) {
                this.sessions.delete(nonce);
                removed++;
            }
        }
        return removed;
    }

    async evictSettled(maxEntries: number, now: number): Promise<number> {
        let excess = this.sessions.size - maxEntries;
        if (excess <= 0) return 0;

        let removed = 0;
        // Map preserves insertion order, which is creation order here
        for (const [nonce, session] of this.sessions.entries()) {
            if (excess === 0) break;
            const expiresAt = session.paymentRequest.expiresAt;
            const expired = expiresAt !== undefined && expiresAt < now;
            if (!session.verified && !expired) continue;

            this.sessions.delete(nonce);
            excess--;
            removed++;
        }
        return removed;
    }

    async size(): Promise<number> {
        return this.sessions.size;
    }
}
