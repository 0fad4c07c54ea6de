/**
 * Reasoning Session
 *
 * One backend instance, one table, one sink, one run. A session is built per
 * query by the variant selector and runs either blocking or streaming, never both.
 */

import type { ToolSet } from 'ai';
import type { RenderedPrompt } from '../prompts/index.js';
import type { EventSink } from '../sinks/index.js';
import type {
    ComparisonTable,
    ReasoningBackend,
    ReasoningRequest,
    StrategyTag,
} from '../types/index.js';
import {
    ChatException,
    createExecutionTimeoutError,
    createGenericError,
    createReasoningFailure,
    toChatException,
} from '../types/index.js';
import { withTimeout } from '../utils/timeout.js';

export interface SessionConfig {
    strategy: StrategyTag;
    system: string;
    tools: ToolSet;
    maxSteps: number;
    /** Hard wall-clock budget for the whole run; unbounded when unset */
    timeoutMs?: number;
}

export type RunOutcome =
    | { ok: true; answer: string }
    | { ok: false; error: ChatException };

/**
 * Handle on a streaming run. `settled` never rejects, so the run's failure is
 * always observed even when nobody calls result().
 */
export class RunHandle {
    readonly settled: Promise<RunOutcome>;
    private outcome: RunOutcome | null = null;

    constructor(task: Promise<string>) {
        this.settled = task.then(
            answer => this.record({ ok: true, answer }),
            error => this.record({ ok: false, error: toChatException(error) })
        );
    }

    private record(outcome: RunOutcome): RunOutcome {
        this.outcome = outcome;
        return outcome;
    }

    get done(): boolean {
        return this.outcome !== null;
    }

    /**
     * The answer, or the run's failure thrown.
     */
    async result(): Promise<string> {
        const outcome = await this.settled;
        if (outcome.ok) {
            return outcome.answer;
        }
        throw outcome.error;
    }
}

/**
 * Trim, and drop one pair of wrapping double quotes.
 */
export function normalizeAnswer(raw: string): string {
    const text = String(raw).trim();
    if (text.length >= 2 && text.startsWith('"') && text.endsWith('"')) {
        return text.slice(1, -1).trim();
    }
    return text;
}

export class ReasoningSession {
    private used = false;

    constructor(
        readonly backend: ReasoningBackend,
        readonly table: ComparisonTable,
        readonly config: SessionConfig,
        readonly sink: EventSink
    ) { }

    get strategy(): StrategyTag {
        return this.config.strategy;
    }

    /**
     * Run to completion and return the answer. Thoughts are discarded.
     */
    async runBlocking(prompt: RenderedPrompt): Promise<string> {
        this.claim();
        return this.execute(prompt);
    }

    /**
     * Start the run and return at once. Thoughts go to the sink in order,
     * followed by the answer; a failure fails the sink instead.
     */
    runStreaming(prompt: RenderedPrompt): RunHandle {
        this.claim();
        return new RunHandle(this.stream(prompt));
    }

    private claim(): void {
        if (this.used) {
            throw createGenericError('INVALID_STATE', 'Reasoning session has already been run');
        }
        this.used = true;
    }

    private async stream(prompt: RenderedPrompt): Promise<string> {
        try {
            const answer = await this.execute(prompt, thought => this.sink.emit({ kind: 'thought', text: thought }));
            await this.sink.emit({ kind: 'answer', text: answer });
            return answer;
        } catch (error) {
            const failure = toChatException(error, this.backend.modelId);
            this.sink.fail(failure);
            throw failure;
        }
    }

    private async execute(
        prompt: RenderedPrompt,
        onStep?: (thought: string) => Promise<void>
    ): Promise<string> {
        const controller = new AbortController();
        // A backend abandoned at its deadline must not reach the sink any more
        let live = true;

        const request: ReasoningRequest = {
            system: this.config.system,
            prompt: prompt.text,
            tools: this.config.tools,
            maxSteps: this.config.maxSteps,
            abortSignal: controller.signal,
            onStep: onStep && (async thought => {
                if (live) await onStep(thought);
            }),
        };

        const { timeoutMs, strategy } = this.config;
        try {
            const run = this.backend.run(request);
            const raw = timeoutMs === undefined
                ? await run
                : await withTimeout(run, timeoutMs, () => createExecutionTimeoutError(timeoutMs, strategy));
            const answer = normalizeAnswer(raw);
            if (!answer) {
                throw createReasoningFailure(new Error('backend returned an empty answer'), this.backend.modelId);
            }
            return answer;
        } catch (error) {
            throw toChatException(error, this.backend.modelId);
        } finally {
            live = false;
            controller.abort();
        }
    }
}
