import { NextFunction, Request, RequestHandler, Response } from 'express';
import { X402Engine } from '../services/engine.js';
import { accessBody } from '../domain/wire.js';
import { errorMessage } from '../domain/errors.js';
import { logger } from '../logger.js';

export const PAYER_HEADER = 'X-Payer-Address';
export const NONCE_HEADER = 'X-Payment-Nonce';

export interface PaywallOptions {
    /** Overrides the configured default amount for the gated routes. */
    amount?: string;
}

/**
 * Gates the routes behind it: a request without a confirmed payment gets a 402
 * challenge, one whose nonce verifies falls through to the next handler.
 */
export function requirePayment(engine: X402Engine, options: PaywallOptions = {}): RequestHandler {
    return async (req: Request, res: Response, next: NextFunction) => {
        const payer = req.get(PAYER_HEADER);
        if (!payer) {
            res.status(400).json({ error: `Missing ${PAYER_HEADER} header` });
            return;
        }

        try {
            const result = await engine.handleAccessRequest(payer, req.originalUrl, req.get(NONCE_HEADER), options.amount);
            if (result.shouldServeContent) {
                next();
                return;
            }
            res.status(result.httpStatus).json(accessBody(result));
        } catch (error: unknown) {
            logger.error({ error: errorMessage(error), path: req.originalUrl }, 'Paywall check failed');
            res.status(500).json({ error: errorMessage(error) });
        }
    };
}
