import type { ModelProfile } from '../types/index.js';

/** Chat-completion models with long context windows */
export const CHAT_MODELS = [
    'gpt-4',
    'gpt-3.5-turbo',
    'gpt-3.5-turbo-16k',
    'gpt-3.5-turbo-0613',
    'gpt-3.5-turbo-16k-0613',
    'gpt-4-32k',
] as const;

const CHAT_MODEL_FAMILIES = ['gpt-4o', 'gpt-4.1', 'gpt-4-turbo'];

export const STANDARD_BUDGET = { tableBudgetChars: 4000, maxValueLength: 4000 } as const;
export const EXTENDED_BUDGET = { tableBudgetChars: 16000, maxValueLength: 13000 } as const;

export function isChatModel(modelId: string): boolean {
    return (CHAT_MODELS as readonly string[]).includes(modelId)
        || CHAT_MODEL_FAMILIES.some(family => modelId.startsWith(family));
}

/**
 * Prompt budgets for a model. Chat models take the extended budget.
 */
export function modelProfile(modelId: string): ModelProfile {
    const extendedContext = isChatModel(modelId);
    const budget = extendedContext ? EXTENDED_BUDGET : STANDARD_BUDGET;
    return {
        modelId,
        extendedContext,
        tableBudgetChars: budget.tableBudgetChars,
        maxValueLength: budget.maxValueLength,
    };
}
