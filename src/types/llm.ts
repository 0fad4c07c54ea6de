/**
 * Reasoning backend interfaces.
 */

import type { ToolSet } from 'ai';

export interface ReasoningRequest {
    system: string;
    prompt: string;
    tools: ToolSet;
    maxSteps: number;
    abortSignal?: AbortSignal;
    /** Called once per intermediate step, in order; awaited before the next step */
    onStep?: (thought: string) => Promise<void>;
}

export interface ReasoningBackend {
    readonly modelId: string;
    readonly streaming: boolean;
    /** Resolves with the final answer text */
    run(request: ReasoningRequest): Promise<string>;
}

export interface BackendOptions {
    modelId: string;
    streaming: boolean;
    apiKey: string;
    baseUrl?: string;
}

export type BackendFactory = (options: BackendOptions) => ReasoningBackend;

export interface ModelProfile {
    modelId: string;
    extendedContext: boolean;
    /** Characters of rendered table embedded in TABULAR prompts */
    tableBudgetChars: number;
    /** Longest value STRUCTURED tools return before truncating */
    maxValueLength: number;
}
