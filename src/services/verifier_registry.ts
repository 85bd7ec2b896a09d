import { ChainType } from '../domain/types.js';
import { chainKey } from '../domain/chain.js';
import { PaymentVerifier } from './verifiers/verifier.js';

interface RegistryEntry {
    chainType: ChainType;
    verifier: PaymentVerifier;
}

/**
 * One verifier per chain, keyed by the chain's canonical key. Lookups are
 * synchronous map reads, so a registration that finishes mid-request is seen
 * either completely or not at all.
 */
export class VerifierRegistry {
    private verifiers: Map<string, RegistryEntry> = new Map();

    register(chainType: ChainType, verifier: PaymentVerifier): void {
        this.verifiers.set(chainKey(chainType), { chainType, verifier });
    }

    get(chainType: ChainType): PaymentVerifier | undefined {
        return this.verifiers.get(chainKey(chainType))?.verifier;
    }

    has(chainType: ChainType): boolean {
        return this.verifiers.has(chainKey(chainType));
    }

    remove(chainType: ChainType): PaymentVerifier | undefined {
        const key = chainKey(chainType);
        const entry = this.verifiers.get(key);
        this.verifiers.delete(key);
        return entry?.verifier;
    }

    supportedChains(): ChainType[] {
        return Array.from(this.verifiers.values(), entry => entry.chainType);
    }
}
