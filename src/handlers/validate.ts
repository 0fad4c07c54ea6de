import { z } from 'zod';
import { createGenericError } from '../types/index.js';

/**
 * Validate raw tool arguments; failures become INVALID_ARGUMENT.
 */
export function parseArgs<T extends z.ZodTypeAny>(schema: T, args: unknown): z.infer<T> {
    const parsed = schema.safeParse(args ?? {});
    if (!parsed.success) {
        const problems = parsed.error.issues.map(issue =>
            issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message);
        throw createGenericError('INVALID_ARGUMENT', `Invalid arguments: ${problems.join('; ')}`, {
            issues: problems,
        });
    }
    return parsed.data;
}
