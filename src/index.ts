import express, { Request, Response } from 'express';
import { ZodError } from 'zod';
import { X402Engine } from './services/engine.js';
import { SessionSweeper } from './services/cleanup.js';
import { AccessRequestSchema, VerifyQuerySchema } from './domain/schemas.js';
import { X402Error, errorMessage } from './domain/errors.js';
import { chainDisplayName, chainId, chainKey } from './domain/chain.js';
import { accessBody, verificationBody } from './domain/wire.js';
import { requirePayment } from './middleware/paywall.js';
import { logger } from './logger.js';

export { X402Engine } from './services/engine.js';
export { SessionSweeper } from './services/cleanup.js';
export { VerifierRegistry } from './services/verifier_registry.js';
export { createVerifier } from './services/verifier_factory.js';
export type { VerifierFactory } from './services/verifier_factory.js';
export { ConfigBuilder, ConfigManager } from './config.js';
export type { X402Config } from './config.js';
export { requirePayment } from './middleware/paywall.js';
export * from './domain/types.js';
export * from './domain/errors.js';
export * from './domain/chain.js';
export type { PaymentVerifier } from './services/verifiers/verifier.js';

export function statusForError(error: unknown): number {
    if (error instanceof ZodError) return 400;
    if (!(error instanceof X402Error)) return 500;
    switch (error.code) {
        case 'UNKNOWN_SESSION':
            return 404;
        case 'ADDRESS_MISMATCH':
            return 403;
        case 'CHAIN_NOT_SUPPORTED':
            return 422;
        case 'INVALID_ADDRESS':
        case 'PARSE_ERROR':
            return 400;
        case 'FILE_NOT_FOUND':
        case 'INVALID_CONFIG':
        case 'CHAIN_MISSING':
        case 'INVALID_CURRENCY':
            return 500;
        default:
            return 502;
    }
}

function errorBody(error: unknown): { error: string; code?: string } {
    if (error instanceof ZodError) {
        return { error: error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ') };
    }
    if (error instanceof X402Error) {
        return { error: error.message, code: error.code };
    }
    return { error: errorMessage(error) };
}

export function createServer(dependencies: {
    engine: X402Engine,
    sweeper?: SessionSweeper
}) {
    const { engine, sweeper } = dependencies;
    const app = express();
    app.use(express.json());

    sweeper?.start();

    app.post('/access', async (req: Request, res: Response) => {
        try {
            const validated = AccessRequestSchema.parse(req.body);
            const result = await engine.handleAccessRequest(
                validated.userAddress,
                validated.resourcePath,
                validated.nonce,
                validated.amount
            );
            res.status(result.httpStatus).json(accessBody(result));
        } catch (error: unknown) {
            logger.warn({ error: errorMessage(error), body: req.body }, 'Access request failed');
            res.status(statusForError(error)).json(errorBody(error));
        }
    });

    app.get('/verify/:nonce', async (req: Request, res: Response) => {
        try {
            const { address } = VerifyQuerySchema.parse(req.query);
            const verification = await engine.verifyPayment(address, req.params.nonce);
            res.json(verificationBody(verification));
        } catch (error: unknown) {
            logger.warn({ error: errorMessage(error), nonce: req.params.nonce }, 'Verify request failed');
            res.status(statusForError(error)).json(errorBody(error));
        }
    });

    app.get('/chains', (_req: Request, res: Response) => {
        const chains = engine.getRegistry().supportedChains().map(chainType => ({
            key: chainKey(chainType),
            chainId: chainId(chainType),
            name: chainDisplayName(chainType),
        }));
        res.json({ chains });
    });

    app.get('/content/*', requirePayment(engine), (req: Request, res: Response) => {
        res.json({ resource: req.path, paid: true });
    });

    return app;
}
