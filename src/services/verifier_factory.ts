import { ChainType } from '../domain/types.js';
import { CapabilityError, ConfigurationError } from '../domain/errors.js';
import { chainKey } from '../domain/chain.js';
import { ViemEvmClient } from '../providers/evm.js';
import { Web3SolanaClient } from '../providers/solana.js';
import { RestAptosClient, aptosEndpoint } from '../providers/aptos.js';
import { JsonRpcSuiClient, suiEndpoint } from '../providers/sui.js';
import { EvmVerifier } from './verifiers/evm.js';
import { SolanaVerifier } from './verifiers/solana.js';
import { AptosVerifier } from './verifiers/aptos.js';
import { SuiVerifier } from './verifiers/sui.js';
import { PaymentVerifier, ScanOptions } from './verifiers/verifier.js';

/**
 * Builds the concrete verifier for a chain family. Without `rpcUrl`, Solana, Aptos
 * and Sui fall back to the public endpoint of their network; EVM chains need one.
 */
export type VerifierFactory = (
    chainType: ChainType,
    rpcUrl: string | undefined,
    options: ScanOptions
) => Promise<PaymentVerifier>;

export const createVerifier: VerifierFactory = async (chainType, rpcUrl, options) => {
    switch (chainType.family) {
        case 'evm':
            if (!rpcUrl) {
                throw new ConfigurationError('INVALID_CONFIG', `No RPC URL configured for ${chainKey(chainType)}`);
            }
            return EvmVerifier.connect(new ViemEvmClient(rpcUrl), chainType, options);
        case 'solana':
            return new SolanaVerifier(Web3SolanaClient.forNetwork(chainType.network, rpcUrl), options);
        case 'aptos':
            return new AptosVerifier(new RestAptosClient(aptosEndpoint(chainType.network, rpcUrl)), options);
        case 'sui':
            return new SuiVerifier(new JsonRpcSuiClient(suiEndpoint(chainType.network, rpcUrl)), options);
        case 'custom':
            throw new CapabilityError('CHAIN_NOT_SUPPORTED', `Chain not supported: ${chainKey(chainType)}`);
    }
};
