import { parseUnits } from 'viem';
import { VerificationError } from '../domain/errors.js';

const INTEGER = /^\d+$/;
const DECIMAL = /^(\d+\.\d*|\.\d+)$/;

/** Lamports per SOL, octas per APT and MIST per SUI, as powers of ten. */
export const NATIVE_DECIMALS = {
    solana: 9,
    aptos: 8,
    sui: 9,
} as const;

/** Parses an amount that is already expressed in base units (e.g. wei). */
export function parseIntegerAmount(amount: string): bigint {
    const value = amount.trim();
    if (!INTEGER.test(value)) {
        throw new VerificationError('PARSE_ERROR', `Parse Error: invalid integer amount "${amount}"`);
    }
    return BigInt(value);
}

function normalizeDecimal(value: string): string {
    return value.startsWith('.') ? `0${value}` : value.endsWith('.') ? `${value}0` : value;
}

function assertDecimals(decimals: number): void {
    if (!Number.isInteger(decimals) || decimals < 0) {
        throw new VerificationError('PARSE_ERROR', `Parse Error: invalid decimals ${decimals}`);
    }
}

/**
 * Scales a decimal amount by `decimals` into base units: `"1"` with 6 decimals is
 * `1000000n`. An amount with more fraction digits than `decimals` is rejected.
 */
export function toBaseUnits(amount: string, decimals: number): bigint {
    const value = amount.trim();
    if (!INTEGER.test(value) && !DECIMAL.test(value)) {
        throw new VerificationError('PARSE_ERROR', `Parse Error: invalid decimal amount "${amount}"`);
    }
    assertDecimals(decimals);

    const fraction = value.split('.')[1] ?? '';
    if (fraction.length > decimals) {
        throw new VerificationError(
            'PARSE_ERROR',
            `Parse Error: amount "${amount}" has more than ${decimals} fraction digits`
        );
    }
    return parseUnits(normalizeDecimal(value), decimals);
}

/**
 * Native-denomination rule shared by the transaction-list ledgers: a string with a
 * decimal point is in whole coins (SOL, APT, SUI) and is scaled by `decimals`,
 * rounding fraction digits beyond `decimals`; a string without one is already in
 * base units. Commas and surrounding whitespace are ignored.
 */
export function parseNativeAmount(amount: string, decimals: number): bigint {
    const value = amount.trim().replace(/,/g, '');
    if (value.length === 0) {
        throw new VerificationError('PARSE_ERROR', 'Amount cannot be empty');
    }
    if (value.startsWith('-')) {
        throw new VerificationError('PARSE_ERROR', 'The amount cannot be negative');
    }
    if (value.includes('.')) {
        if (!DECIMAL.test(value)) {
            throw new VerificationError('PARSE_ERROR', `Invalid decimal amount format: ${amount}`);
        }
        assertDecimals(decimals);
        return parseUnits(normalizeDecimal(value), decimals);
    }
    if (!INTEGER.test(value)) {
        throw new VerificationError('PARSE_ERROR', `Invalid base unit amount format: ${amount}`);
    }
    return BigInt(value);
}
