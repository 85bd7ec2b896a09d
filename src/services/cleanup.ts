import { ISessionStorage } from '../domain/storage.js';
import { X402Config } from '../config.js';
import { errorMessage } from '../domain/errors.js';
import { logger } from '../logger.js';

/**
 * Periodically purges payment sessions whose challenge has expired (plus the
 * cache TTL as grace) and trims the store toward `cache.maxEntries` by dropping
 * the oldest verified or expired sessions. Pending sessions are left to expire.
 */
export class SessionSweeper {
    private timer?: NodeJS.Timeout;

    constructor(
        private storage: ISessionStorage,
        private cache: X402Config['cache'],
        private intervalMs: number = 60 * 1000,
        private clock: () => number = () => Math.floor(Date.now() / 1000)
    ) { }

    start() {
        if (this.timer || !this.cache.enabled) return;
        this.timer = setInterval(() => {
            this.sweep().catch((error: unknown) => {
                logger.error({ error: errorMessage(error) }, 'Error during session sweep');
            });
        }, this.intervalMs);
        this.timer.unref();
    }

    stop() {
        if (this.timer) {
            clearInterval(this.timer);
            this.timer = undefined;
        }
    }

    isRunning(): boolean {
        return this.timer !== undefined;
    }

    /** One pass; returns how many sessions were removed. */
    async sweep(): Promise<number> {
        const now = this.clock();
        const expired = await this.storage.deleteExpired(now, this.cache.ttlSecs);
        const evicted = await this.storage.evictSettled(this.cache.maxEntries, now);
        if (expired + evicted > 0) {
            logger.info({ expired, evicted }, 'Purged payment sessions');
        }
        return expired + evicted;
    }
}
