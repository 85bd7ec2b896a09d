import dotenv from 'dotenv';
import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { ChainDescriptor, ChainType, Currency } from './domain/types.js';
import { ConfigurationError } from './domain/errors.js';
import { chainKey, describeChain, parseChainKey } from './domain/chain.js';

dotenv.config();

const envSchema = z.object({
    PORT: z.coerce.number().int().positive().default(3000),
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
    X402_CONFIG_PATH: z.string().optional(),
    CLEANUP_INTERVAL_MS: z.coerce.number().int().positive().default(60_000),
});

const env = envSchema.parse(process.env);

/** Process-level settings; the payment configuration itself lives in {@link ConfigManager}. */
export const config = {
    port: env.PORT,
    logLevel: env.LOG_LEVEL,
    configPath: env.X402_CONFIG_PATH ? path.resolve(env.X402_CONFIG_PATH) : undefined,
    cleanupIntervalMs: env.CLEANUP_INTERVAL_MS,
};

const DECIMAL_AMOUNT = /^\d+(\.\d+)?$/;

const CurrencyConfigSchema = z.object({
    type: z.enum(['native', 'erc20', 'coin']),
    address: z.string().optional(),
    decimals: z.number().int().min(0).max(255),
});

const ChainEntrySchema = z.object({
    chain: z.string().min(1),
    rpcUrl: z.string().url().optional(),
});

export const X402ConfigSchema = z.object({
    service: z.object({
        name: z.string(),
        description: z.string(),
        baseVerificationUrl: z.string().url(),
        defaultCurrency: CurrencyConfigSchema,
    }),
    chains: z.array(ChainEntrySchema),
    payments: z.object({
        defaultAmount: z.string().regex(DECIMAL_AMOUNT, 'must be a decimal string'),
        expirationTimeSecs: z.number().int().positive(),
        allowedCurrencies: z.array(CurrencyConfigSchema).default([]),
        feeRecoveryPercent: z.number().min(0).default(0),
    }),
    cache: z.object({
        enabled: z.boolean(),
        ttlSecs: z.number().int().nonnegative(),
        maxEntries: z.number().int().positive(),
    }),
    scan: z.object({
        evmLookbackBlocks: z.number().int().positive(),
        transactionLimit: z.number().int().positive(),
    }).default({ evmLookbackBlocks: 100, transactionLimit: 50 }),
    defaultChain: z.string().min(1),
    serviceAddress: z.string().optional(),
});

export type X402Config = z.infer<typeof X402ConfigSchema>;
export type CurrencyConfig = z.infer<typeof CurrencyConfigSchema>;

export const ZERO_ADDRESS = '0x0000000000000000000000000000000000000000';

export function defaultConfig(): X402Config {
    return {
        service: {
            name: 'X402 Payment Service',
            description: 'A service protected by x402 payment protocol',
            baseVerificationUrl: 'https://api.example.com/verify',
            defaultCurrency: { type: 'native', decimals: 18 },
        },
        chains: [
            { chain: 'evm:ethereum', rpcUrl: 'https://eth.llamarpc.com' },
            { chain: 'evm:polygon', rpcUrl: 'https://polygon-rpc.com' },
        ],
        payments: {
            defaultAmount: '1000000000000000',
            expirationTimeSecs: 3600,
            allowedCurrencies: [{ type: 'native', decimals: 18 }],
            feeRecoveryPercent: 0.1,
        },
        cache: {
            enabled: false,
            ttlSecs: 300,
            maxEntries: 1000,
        },
        scan: {
            evmLookbackBlocks: 100,
            transactionLimit: 50,
        },
        defaultChain: 'evm:ethereum',
    };
}

function validate(raw: unknown, source: string): X402Config {
    const parsed = X402ConfigSchema.safeParse(raw);
    if (!parsed.success) {
        const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
        throw new ConfigurationError('INVALID_CONFIG', `Invalid configuration in ${source}: ${issues}`);
    }
    return parsed.data;
}

/** `RPC_EVM_ETHEREUM` for `evm:ethereum`, `RPC_SOLANA_DEVNET` for `solana:devnet`. */
export function rpcEnvName(chainType: ChainType): string {
    return `RPC_${chainKey(chainType).toUpperCase().replace(/[^A-Z0-9]/g, '_')}`;
}

export class ConfigManager {
    private config: X402Config;
    private environment: Map<string, string>;

    constructor(config: X402Config = defaultConfig(), env: NodeJS.ProcessEnv = process.env) {
        this.config = validate(config, 'provided config');
        this.environment = ConfigManager.loadEnvironmentVariables(env);
    }

    static fromFile(filePath: string, env: NodeJS.ProcessEnv = process.env): ConfigManager {
        if (!fs.existsSync(filePath)) {
            throw new ConfigurationError('FILE_NOT_FOUND', `Configuration file not found: ${filePath}`);
        }

        let raw: unknown;
        try {
            raw = JSON.parse(fs.readFileSync(filePath, 'utf8'));
        } catch (error: unknown) {
            const message = error instanceof Error ? error.message : String(error);
            throw new ConfigurationError('INVALID_CONFIG', `Invalid JSON in ${filePath}: ${message}`, { cause: error });
        }
        return new ConfigManager(validate(raw, filePath), env);
    }

    /** Loads `X402_CONFIG_PATH` when set, otherwise the built-in defaults. */
    static fromEnv(env: NodeJS.ProcessEnv = process.env): ConfigManager {
        return config.configPath ? ConfigManager.fromFile(config.configPath, env) : new ConfigManager(defaultConfig(), env);
    }

    getConfig(): X402Config {
        return this.config;
    }

    /** Configured descriptor for `chainType`, or undefined when the chain is not configured. */
    getChainConfig(chainType: ChainType): ChainDescriptor | undefined {
        const key = chainKey(chainType);
        const entry = this.config.chains.find(c => chainKey(parseChainKey(c.chain)) === key);
        if (!entry) return undefined;
        return describeChain(chainType, this.getRpcUrl(chainType) ?? entry.rpcUrl);
    }

    getDefaultChainType(): ChainType {
        return parseChainKey(this.config.defaultChain);
    }

    getDefaultChainConfig(): ChainDescriptor {
        const chainType = this.getDefaultChainType();
        const descriptor = this.getChainConfig(chainType);
        if (!descriptor) {
            throw new ConfigurationError('CHAIN_MISSING', `Chain configuration missing: ${chainKey(chainType)}`);
        }
        return descriptor;
    }

    getConfiguredChains(): ChainType[] {
        return this.config.chains.map(c => parseChainKey(c.chain));
    }

    getDefaultCurrency(): Currency {
        const { type, address, decimals } = this.config.service.defaultCurrency;
        if (type === 'native') return { kind: 'native' };
        if (!address) {
            throw new ConfigurationError('INVALID_CURRENCY', `Invalid currency configuration: ${type} requires an address`);
        }
        return { kind: 'token', address, decimals };
    }

    getServiceAddress(): string {
        return this.environment.get('X402_SERVICE_ADDRESS') ?? this.config.serviceAddress ?? ZERO_ADDRESS;
    }

    /** Endpoint override from the environment, e.g. `RPC_EVM_ETHEREUM`. */
    getRpcUrl(chainType: ChainType): string | undefined {
        return this.environment.get(rpcEnvName(chainType));
    }

    updateConfig(updater: (config: X402Config) => void): void {
        const draft = structuredClone(this.config);
        updater(draft);
        this.config = validate(draft, 'updated config');
    }

    private static loadEnvironmentVariables(env: NodeJS.ProcessEnv): Map<string, string> {
        const vars = new Map<string, string>();
        for (const [key, value] of Object.entries(env)) {
            if (value !== undefined && (key.startsWith('X402_') || key.startsWith('RPC_'))) {
                vars.set(key, value);
            }
        }
        return vars;
    }
}

export class ConfigBuilder {
    private config: X402Config = defaultConfig();

    withServiceName(name: string): this {
        this.config.service.name = name;
        return this;
    }

    withBaseVerificationUrl(url: string): this {
        this.config.service.baseVerificationUrl = url;
        return this;
    }

    withDefaultChain(chainType: ChainType): this {
        this.config.defaultChain = chainKey(chainType);
        return this;
    }

    /** Adds or replaces the entry for `chainType`. */
    withChain(chainType: ChainType, rpcUrl?: string): this {
        const key = chainKey(chainType);
        this.config.chains = this.config.chains.filter(c => chainKey(parseChainKey(c.chain)) !== key);
        this.config.chains.push({ chain: key, ...(rpcUrl ? { rpcUrl } : {}) });
        return this;
    }

    withPaymentAmount(amount: string): this {
        this.config.payments.defaultAmount = amount;
        return this;
    }

    withExpirationTime(seconds: number): this {
        this.config.payments.expirationTimeSecs = seconds;
        return this;
    }

    withServiceAddress(address: string): this {
        this.config.serviceAddress = address;
        return this;
    }

    withCurrency(currency: CurrencyConfig): this {
        this.config.service.defaultCurrency = currency;
        return this;
    }

    withCache(cache: X402Config['cache']): this {
        this.config.cache = cache;
        return this;
    }

    build(): X402Config {
        return validate(this.config, 'builder');
    }
}
