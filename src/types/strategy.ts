import { createUnsupportedVariantError } from './errors.js';

export const STRATEGY_TAGS = ['TABULAR', 'STRUCTURED'] as const;

/**
 * TABULAR reasons over rows and columns with the table in context.
 * STRUCTURED walks the transposed table as a nested JSON document.
 */
export type StrategyTag = typeof STRATEGY_TAGS[number];

export function isStrategyTag(value: string): value is StrategyTag {
    return (STRATEGY_TAGS as readonly string[]).includes(value);
}

/**
 * Parse a strategy tag, case-insensitively. Unknown tags never fall back to a default.
 */
export function parseStrategyTag(value: string): StrategyTag {
    const normalized = value.trim().toUpperCase();
    if (isStrategyTag(normalized)) {
        return normalized;
    }
    throw createUnsupportedVariantError(value, STRATEGY_TAGS);
}

export function assertNever(value: never): never {
    throw createUnsupportedVariantError(String(value), STRATEGY_TAGS);
}
