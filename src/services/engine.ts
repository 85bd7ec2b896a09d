import crypto from 'crypto';
import { ConfigManager } from '../config.js';
import { ISessionStorage } from '../domain/storage.js';
import { AccessResult, ChainType, PaymentChallenge, PaymentRequest, PaymentVerification } from '../domain/types.js';
import { CapabilityError, SessionError, VerificationError, X402Error, errorMessage } from '../domain/errors.js';
import { chainKey } from '../domain/chain.js';
import { InMemorySessionStorage } from '../storage/memory.js';
import { logger } from '../logger.js';
import { VerifierRegistry } from './verifier_registry.js';
import { VerifierFactory, createVerifier } from './verifier_factory.js';

export interface EngineDependencies {
    storage?: ISessionStorage;
    registry?: VerifierRegistry;
    verifierFactory?: VerifierFactory;
    /** Epoch seconds; injectable for tests. */
    clock?: () => number;
    nonceGenerator?: () => string;
}

/**
 * x402 protocol engine: issues 402 challenges, keeps the payment sessions they
 * open, and confirms payment through the verifier registered for the session's
 * chain.
 *
 * Flow:
 * - first request (no nonce) returns 402 with a payment request;
 * - a request carrying the nonce is verified on chain and granted (200) when paid;
 * - a request whose nonce does not verify, for whatever reason, gets a fresh 402.
 */
export class X402Engine {
    private readonly storage: ISessionStorage;
    private readonly registry: VerifierRegistry;
    private readonly verifierFactory: VerifierFactory;
    private readonly clock: () => number;
    private readonly nonceGenerator: () => string;

    constructor(private readonly configManager: ConfigManager, deps: EngineDependencies = {}) {
        this.storage = deps.storage ?? new InMemorySessionStorage();
        this.registry = deps.registry ?? new VerifierRegistry();
        this.verifierFactory = deps.verifierFactory ?? createVerifier;
        this.clock = deps.clock ?? (() => Math.floor(Date.now() / 1000));
        this.nonceGenerator = deps.nonceGenerator ?? (() => crypto.randomUUID());
    }

    static fromConfigFile(filePath: string, deps?: EngineDependencies): X402Engine {
        return new X402Engine(ConfigManager.fromFile(filePath), deps);
    }

    static fromDefaultConfig(deps?: EngineDependencies): X402Engine {
        return new X402Engine(new ConfigManager(), deps);
    }

    /**
     * Builds and registers the verifier for `chainType`, against `rpcUrl` or else the
     * chain's configured endpoint. For EVM chains this runs a live chain-id handshake,
     * so it is the one slow setup call. A failure rejects this registration only and
     * leaves the registry untouched.
     */
    async registerChainVerifier(chainType: ChainType, rpcUrl?: string): Promise<void> {
        const key = chainKey(chainType);
        const chainConfig = chainType.family === 'custom' ? undefined : this.configManager.getChainConfig(chainType);
        if (!chainConfig) {
            throw new CapabilityError('CHAIN_NOT_SUPPORTED', `Chain not supported: ${key}`);
        }

        const { scan } = this.configManager.getConfig();
        const verifier = await this.verifierFactory(chainType, rpcUrl ?? chainConfig.rpcUrl, {
            lookbackBlocks: scan.evmLookbackBlocks,
            transactionLimit: scan.transactionLimit,
        });

        this.registry.register(chainType, verifier);
        logger.info({ chain: key }, 'Registered chain verifier');
    }

    /**
     * Registers a verifier for every configured chain. A chain that fails to register
     * is logged and left out; the chains that made it are returned.
     */
    async registerConfiguredChains(): Promise<ChainType[]> {
        const registered: ChainType[] = [];
        for (const chainType of this.configManager.getConfiguredChains()) {
            try {
                await this.registerChainVerifier(chainType);
                registered.push(chainType);
            } catch (error: unknown) {
                logger.error({ chain: chainKey(chainType), error: errorMessage(error) }, 'Failed to register chain verifier');
            }
        }
        return registered;
    }

    /**
     * Confirms the payment for session `nonce`. Unlike {@link handleAccessRequest},
     * every failure is surfaced to the caller as a typed error.
     */
    async verifyPayment(userAddress: string, nonce: string): Promise<PaymentVerification> {
        const session = await this.storage.get(nonce);
        if (!session) {
            throw new SessionError('UNKNOWN_SESSION', 'Payment session not found');
        }
        if (session.userAddress !== userAddress) {
            throw new SessionError('ADDRESS_MISMATCH', 'User address mismatch');
        }

        const chainType = session.paymentRequest.chain.chainType;
        const verifier = this.registry.get(chainType);
        if (!verifier) {
            throw new CapabilityError('CHAIN_NOT_SUPPORTED', `Chain not supported: ${chainKey(chainType)}`);
        }

        let verification: PaymentVerification;
        try {
            verification = await verifier.verifyPayment(session.paymentRequest, userAddress);
        } catch (error: unknown) {
            if (error instanceof X402Error) throw error;
            throw new VerificationError('VERIFICATION_FAILED', `Verification failed: ${errorMessage(error)}`, { cause: error });
        }

        // Only after the remote confirmation has completed; never reset once set
        if (verification.isPaid) {
            await this.storage.markVerified(nonce);
            logger.info({ nonce, txHash: verification.transactionHash }, 'Payment verified');
        }
        return verification;
    }

    async handleAccessRequest(
        userAddress: string,
        resourcePath: string,
        nonce?: string,
        customAmount?: string
    ): Promise<AccessResult> {
        if (nonce) {
            try {
                const verification = await this.verifyPayment(userAddress, nonce);
                if (verification.isPaid) {
                    return { shouldServeContent: true, httpStatus: 200, verification };
                }
            } catch (error: unknown) {
                // Not yet paid as far as the caller is concerned: fall through to a new challenge
                logger.warn({ nonce, error: errorMessage(error) }, 'Payment confirmation failed, issuing new challenge');
            }
        }

        const paymentRequest = this.createPaymentRequest(resourcePath, customAmount);
        const challenge: PaymentChallenge = {
            status: 402,
            paymentRequired: paymentRequest,
            verificationUrl: `${this.configManager.getConfig().service.baseVerificationUrl}/${paymentRequest.nonce}`,
        };

        await this.storage.save(paymentRequest.nonce, {
            userAddress,
            paymentRequest,
            createdAt: this.clock(),
            verified: false,
        });
        logger.debug({ nonce: paymentRequest.nonce, resourcePath }, 'Issued payment challenge');

        return { shouldServeContent: false, httpStatus: 402, challenge };
    }

    /** Whether the session behind `nonce` has been confirmed paid. */
    async isVerified(nonce: string): Promise<boolean> {
        return (await this.storage.get(nonce))?.verified ?? false;
    }

    getConfigManager(): ConfigManager {
        return this.configManager;
    }

    getRegistry(): VerifierRegistry {
        return this.registry;
    }

    getStorage(): ISessionStorage {
        return this.storage;
    }

    private createPaymentRequest(resourcePath: string, customAmount?: string): PaymentRequest {
        const config = this.configManager.getConfig();
        return {
            amount: customAmount ?? config.payments.defaultAmount,
            currency: this.configManager.getDefaultCurrency(),
            recipient: this.configManager.getServiceAddress(),
            chain: this.configManager.getDefaultChainConfig(),
            description: `Access to: ${resourcePath}`,
            expiresAt: this.clock() + config.payments.expirationTimeSecs,
            nonce: this.nonceGenerator(),
        };
    }
}
