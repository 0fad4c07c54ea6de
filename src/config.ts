/**
 * Environment configuration.
 *
 * Entry points load `.env` through dotenv; everything else receives a parsed
 * AppConfig and never reads process.env itself.
 */

import { z } from 'zod';
import { createGenericError } from './types/index.js';

const booleanish = z
    .union([z.boolean(), z.string()])
    .transform(value => typeof value === 'boolean'
        ? value
        : ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase()));

const positiveInt = z.coerce.number().int().positive();

const EnvSchema = z.object({
    ORKG_HOST: z.string().url().default('https://orkg.org/'),
    OPENAI_API_KEY: z.string().default(''),
    OPENAI_BASE_URL: z.string().url().optional(),
    OPENAI_MODEL: z.string().min(1).default('gpt-3.5-turbo-16k'),
    VERBOSE: booleanish.default(false),
    STRUCTURED_TIMEOUT_MS: positiveInt.default(20000),
    MAX_AGENT_STEPS: positiveInt.default(15),
    PUSH_SEND_TIMEOUT_MS: positiveInt.default(5000),
    DATASET_CACHE_TTL_SECONDS: z.coerce.number().int().nonnegative().default(300),
    DATASET_CACHE_MAX: positiveInt.default(100),
});

export interface AppConfig {
    orkgHost: string;
    apiKey: string;
    baseUrl?: string;
    model: string;
    verbose: boolean;
    structuredTimeoutMs: number;
    maxAgentSteps: number;
    pushSendTimeoutMs: number;
    /** 0 disables the table cache */
    cacheTtlMs: number;
    cacheMax: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    // Blank values count as unset
    const present = Object.fromEntries(
        Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== '')
    );
    const parsed = EnvSchema.safeParse(present);
    if (!parsed.success) {
        const problems = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
        throw createGenericError('CONFIG_ERROR', `Invalid configuration: ${problems.join('; ')}`, {
            issues: problems,
        });
    }
    const values = parsed.data;
    return {
        orkgHost: values.ORKG_HOST,
        apiKey: values.OPENAI_API_KEY,
        baseUrl: values.OPENAI_BASE_URL,
        model: values.OPENAI_MODEL,
        verbose: values.VERBOSE,
        structuredTimeoutMs: values.STRUCTURED_TIMEOUT_MS,
        maxAgentSteps: values.MAX_AGENT_STEPS,
        pushSendTimeoutMs: values.PUSH_SEND_TIMEOUT_MS,
        cacheTtlMs: values.DATASET_CACHE_TTL_SECONDS * 1000,
        cacheMax: values.DATASET_CACHE_MAX,
    };
}
