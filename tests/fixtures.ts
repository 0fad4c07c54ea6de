/**
 * Shared test fixtures: sample tables, a scripted reasoning backend and an
 * in-memory dataset source.
 */
import { createTable } from '../src/dataset/table.js';
import type { DatasetSource } from '../src/dataset/source.js';
import { AgentVariantSelector, SelectorOptions } from '../src/agent/selector.js';
import { QueryCoordinator, CoordinatorOptions } from '../src/service/coordinator.js';
import { ChannelRegistry } from '../src/transport/registry.js';
import {
    BackendFactory,
    BackendOptions,
    ComparisonTable,
    ReasoningBackend,
    ReasoningRequest,
    createDatasetUnavailableError,
} from '../src/types/index.js';

// === Tables ===

export const SAMPLE_ITEMS = ['Paper A/Contribution 1', 'Paper B/Contribution 2'];

export function sampleTable(id = 'R100'): ComparisonTable {
    return createTable(
        id,
        ['Publication date', 'Dataset', 'Accuracy'],
        SAMPLE_ITEMS,
        [
            [[new Date('2019-05-01T00:00:00Z')], [new Date('2021-03-15T00:00:00Z')]],
            [['MNIST', 'CIFAR-10'], ['ImageNet']],
            [[0.91], []],
        ]
    );
}

export function emptyTable(id = 'R0'): ComparisonTable {
    return createTable(id, [], [], []);
}

// === Timing ===

export function wait(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
        if (signal?.aborted) {
            reject(new Error('aborted'));
            return;
        }
        const onAbort = (): void => {
            clearTimeout(timer);
            reject(new Error('aborted'));
        };
        const timer = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort);
            resolve();
        }, ms);
        signal?.addEventListener('abort', onAbort, { once: true });
    });
}

/**
 * Resolve with whatever the promise rejects with; fail if it resolves.
 */
export async function captureError(promise: Promise<unknown>): Promise<unknown> {
    try {
        await promise;
    } catch (error) {
        return error;
    }
    throw new Error('expected a rejection');
}

// === Reasoning backend ===

export interface BackendScript {
    thoughts?: string[];
    answer?: string;
    error?: Error;
    /** Pause before each thought */
    stepDelayMs?: number;
    /** Never answer; only an abort ends the run */
    hang?: boolean;
}

/**
 * Emits the scripted thoughts through onStep, then answers or fails.
 * Every wait honours the request's abort signal.
 */
export class ScriptedBackend implements ReasoningBackend {
    readonly requests: ReasoningRequest[] = [];

    constructor(
        private readonly script: BackendScript,
        readonly modelId = 'test-model',
        readonly streaming = false
    ) { }

    async run(request: ReasoningRequest): Promise<string> {
        this.requests.push(request);
        const signal = request.abortSignal;

        for (const thought of this.script.thoughts ?? []) {
            if (this.script.stepDelayMs) {
                await wait(this.script.stepDelayMs, signal);
            }
            await request.onStep?.(thought);
        }

        if (this.script.hang) {
            await new Promise<never>((_, reject) => {
                if (signal?.aborted) {
                    reject(new Error('aborted'));
                    return;
                }
                signal?.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
            });
        }
        if (this.script.error) {
            throw this.script.error;
        }
        return this.script.answer ?? '';
    }
}

export interface ScriptedFactory {
    factory: BackendFactory;
    created: BackendOptions[];
    backends: ScriptedBackend[];
}

export function scriptedFactory(script: BackendScript): ScriptedFactory {
    const created: BackendOptions[] = [];
    const backends: ScriptedBackend[] = [];
    const factory: BackendFactory = options => {
        created.push(options);
        const backend = new ScriptedBackend(script, options.modelId, options.streaming);
        backends.push(backend);
        return backend;
    };
    return { factory, created, backends };
}

// === Dataset source ===

export class InMemoryDatasetSource implements DatasetSource {
    private tables = new Map<string, ComparisonTable>();
    private failures = new Map<string, Error>();
    fetchCount = 0;

    constructor(tables: ComparisonTable[] = []) {
        tables.forEach(table => this.tables.set(table.id, table));
    }

    failWith(comparisonId: string, error: Error): this {
        this.failures.set(comparisonId, error);
        return this;
    }

    async fetch(comparisonId: string): Promise<ComparisonTable> {
        this.fetchCount++;
        const failure = this.failures.get(comparisonId);
        if (failure) {
            throw failure;
        }
        const table = this.tables.get(comparisonId);
        if (!table) {
            throw createDatasetUnavailableError(comparisonId, 'not found');
        }
        return table;
    }
}

// === Wiring ===

export const SELECTOR_OPTIONS: SelectorOptions = {
    modelId: 'test-model',
    apiKey: 'test-secret',
    maxSteps: 5,
    structuredTimeoutMs: 1000,
};

export interface Harness {
    source: InMemoryDatasetSource;
    registry: ChannelRegistry;
    selector: AgentVariantSelector;
    coordinator: QueryCoordinator;
    backends: ScriptedFactory;
}

export function createHarness(
    script: BackendScript,
    options: { selector?: Partial<SelectorOptions>; coordinator?: CoordinatorOptions; tables?: ComparisonTable[] } = {}
): Harness {
    const source = new InMemoryDatasetSource(options.tables ?? [sampleTable(), emptyTable()]);
    const registry = new ChannelRegistry();
    const backends = scriptedFactory(script);
    const selector = new AgentVariantSelector(backends.factory, { ...SELECTOR_OPTIONS, ...options.selector });
    const coordinator = new QueryCoordinator(source, selector, registry, options.coordinator);
    return { source, registry, selector, coordinator, backends };
}
