import { ChainDescriptor, ChainType, EvmNetwork, LedgerNetwork } from './types.js';

const EVM_CHAIN_IDS: Record<Exclude<EvmNetwork, { custom: string }>, string> = {
    ethereum: '1',
    polygon: '137',
    bsc: '56',
    arbitrum: '42161',
    optimism: '10',
    avalanche: '43114',
    base: '8453',
};

const EVM_DISPLAY_NAMES: Record<Exclude<EvmNetwork, { custom: string }>, string> = {
    ethereum: 'Ethereum',
    polygon: 'Polygon',
    bsc: 'BNB Smart Chain',
    arbitrum: 'Arbitrum One',
    optimism: 'OP Mainnet',
    avalanche: 'Avalanche C-Chain',
    base: 'Base',
};

type NamedLedgerNetwork = Exclude<LedgerNetwork, { custom: string }>;

const LEDGER_NETWORKS: readonly NamedLedgerNetwork[] = ['mainnet', 'testnet', 'devnet'];

const APTOS_CHAIN_IDS: Record<NamedLedgerNetwork, string> = {
    mainnet: '1',
    testnet: '2',
    devnet: 'devnet',
};

const SUI_CHAIN_IDS: Record<NamedLedgerNetwork, string> = {
    mainnet: 'sui:mainnet',
    testnet: 'sui:testnet',
    devnet: 'sui:devnet',
};

const SOLANA_CHAIN_IDS: Record<NamedLedgerNetwork, string> = {
    mainnet: 'mainnet-beta',
    testnet: 'testnet',
    devnet: 'devnet',
};

function isEvmNetworkName(value: string): value is Exclude<EvmNetwork, { custom: string }> {
    return Object.prototype.hasOwnProperty.call(EVM_CHAIN_IDS, value);
}

function isLedgerNetworkName(value: string): value is NamedLedgerNetwork {
    return (LEDGER_NETWORKS as readonly string[]).includes(value);
}

function ledgerChainId(network: LedgerNetwork, ids: Record<NamedLedgerNetwork, string>): string {
    return typeof network === 'string' ? ids[network] : network.custom;
}

function capitalize(value: string): string {
    return value.charAt(0).toUpperCase() + value.slice(1);
}

function networkName(network: EvmNetwork | LedgerNetwork): string {
    return typeof network === 'string' ? network : `custom:${network.custom}`;
}

/**
 * Canonical chain id for a chain type. Registry keys, session records and the EVM
 * handshake all depend on this mapping, so it must stay stable.
 */
export function chainId(chainType: ChainType): string {
    switch (chainType.family) {
        case 'evm':
            return typeof chainType.network === 'string'
                ? EVM_CHAIN_IDS[chainType.network]
                : chainType.network.custom;
        case 'aptos':
            return ledgerChainId(chainType.network, APTOS_CHAIN_IDS);
        case 'sui':
            return ledgerChainId(chainType.network, SUI_CHAIN_IDS);
        case 'solana':
            return ledgerChainId(chainType.network, SOLANA_CHAIN_IDS);
        case 'custom':
            return chainType.name;
    }
}

export function chainDisplayName(chainType: ChainType): string {
    switch (chainType.family) {
        case 'evm':
            return typeof chainType.network === 'string'
                ? EVM_DISPLAY_NAMES[chainType.network]
                : `EVM Chain ${chainType.network.custom}`;
        case 'aptos':
        case 'sui':
        case 'solana': {
            const family = capitalize(chainType.family);
            return typeof chainType.network === 'string'
                ? `${family} ${capitalize(chainType.network)}`
                : `${family} (${chainType.network.custom})`;
        }
        case 'custom':
            return chainType.name;
    }
}

/** Stable string key, e.g. `evm:ethereum`, `solana:devnet`, `evm:custom:31337`, `custom:foo`. */
export function chainKey(chainType: ChainType): string {
    if (chainType.family === 'custom') {
        return `custom:${chainType.name}`;
    }
    return `${chainType.family}:${networkName(chainType.network)}`;
}

/**
 * Inverse of {@link chainKey}. Unrecognised networks and families are kept as
 * `custom` values instead of being rejected.
 */
export function parseChainKey(key: string): ChainType {
    const trimmed = key.trim();
    const separator = trimmed.indexOf(':');
    const family = (separator === -1 ? trimmed : trimmed.slice(0, separator)).toLowerCase();
    const rest = separator === -1 ? '' : trimmed.slice(separator + 1);
    const custom = rest.startsWith('custom:') ? rest.slice('custom:'.length) : undefined;

    switch (family) {
        case 'evm': {
            const name = rest.toLowerCase();
            if (custom !== undefined) return { family: 'evm', network: { custom } };
            if (isEvmNetworkName(name)) return { family: 'evm', network: name };
            return { family: 'evm', network: { custom: rest } };
        }
        case 'aptos':
        case 'sui':
        case 'solana': {
            const name = rest.toLowerCase();
            let network: LedgerNetwork;
            if (custom !== undefined) network = { custom };
            else if (isLedgerNetworkName(name)) network = name;
            else network = { custom: rest };
            return ledgerChain(family, network);
        }
        case 'custom':
            return { family: 'custom', name: rest };
        default:
            return { family: 'custom', name: trimmed };
    }
}

function ledgerChain(family: 'aptos' | 'sui' | 'solana', network: LedgerNetwork): ChainType {
    switch (family) {
        case 'aptos':
            return { family: 'aptos', network };
        case 'sui':
            return { family: 'sui', network };
        case 'solana':
            return { family: 'solana', network };
    }
}

export function sameChain(a: ChainType, b: ChainType): boolean {
    return chainKey(a) === chainKey(b);
}

export function describeChain(chainType: ChainType, rpcUrl?: string): ChainDescriptor {
    return {
        chainType,
        chainId: chainId(chainType),
        ...(rpcUrl ? { rpcUrl } : {}),
    };
}
