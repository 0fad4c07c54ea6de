/**
 * Query Coordinator
 *
 * Owns the lifecycle of one comparison query: fetch the table, wrap the
 * question, pick the sink for the delivery mode, have the selector build a
 * session, run it, and hand the answer (or the event sequence) back.
 * Failed queries are never retried.
 */

import { randomUUID } from 'crypto';
import { AgentVariantSelector } from '../agent/selector.js';
import { ReasoningSession, RunHandle, RunOutcome } from '../agent/session.js';
import type { DatasetSource } from '../dataset/source.js';
import { isEmptyTable } from '../dataset/table.js';
import { renderPrompt } from '../prompts/index.js';
import { EventSink, NullSink, PullSink, PushSink } from '../sinks/index.js';
import type { ChannelRegistry } from '../transport/registry.js';
import type {
    ComparisonTable,
    Delivery,
    QueryEvent,
    QueryTransition,
    StrategyTag,
} from '../types/index.js';
import {
    createDatasetUnavailableError,
    isChatException,
    parseStrategyTag,
} from '../types/index.js';
import { QueryRun } from './lifecycle.js';

export interface QueryRequest {
    comparisonId: string;
    question: string;
    /** Strategy tag; matched case-insensitively */
    strategy: string;
    /** Overrides the configured model for this query */
    model?: string;
}

export interface CoordinatorOptions {
    pushSendTimeoutMs?: number;
    /** Log every lifecycle transition to stderr */
    verbose?: boolean;
    onTransition?: (transition: QueryTransition) => void;
}

/** What a pull query knows about the caller reading its events */
interface PullReader {
    /** The caller is inside the sequence */
    active: boolean;
    /** The run's failure reached the caller or the log */
    reported: boolean;
    outcome?: RunOutcome;
}

export class QueryCoordinator {
    constructor(
        private readonly source: DatasetSource,
        private readonly selector: AgentVariantSelector,
        private readonly registry: ChannelRegistry,
        private readonly options: CoordinatorOptions = {}
    ) { }

    execute(request: QueryRequest, delivery: { mode: 'NONE' }): Promise<string>;
    execute(request: QueryRequest, delivery: { mode: 'PULL' }): Promise<AsyncIterable<QueryEvent>>;
    execute(request: QueryRequest, delivery: { mode: 'PUSH'; channelId: string }): Promise<string>;
    execute(request: QueryRequest, delivery: Delivery): Promise<string | AsyncIterable<QueryEvent>>;
    async execute(request: QueryRequest, delivery: Delivery): Promise<string | AsyncIterable<QueryEvent>> {
        // Unknown tags fail before anything is fetched
        const strategy = parseStrategyTag(request.strategy);
        const run = new QueryRun(randomUUID(), transition => this.onTransition(transition));

        try {
            run.transition('FETCHING');
            const table = await this.fetchTable(request.comparisonId);

            run.transition('PROMPTING');
            const prompt = renderPrompt(request.question);

            switch (delivery.mode) {
                case 'NONE': {
                    const session = this.dispatch(run, table, strategy, new NullSink(), request.model);
                    run.transition('BLOCKED');
                    const answer = await session.runBlocking(prompt);
                    run.transition('COMPLETED');
                    return answer;
                }
                case 'PULL': {
                    const sink = new PullSink();
                    const session = this.dispatch(run, table, strategy, sink, request.model);
                    run.transition('STREAMING');
                    return this.watchPull(run, sink, session.runStreaming(prompt));
                }
                case 'PUSH': {
                    if (!this.registry.has(delivery.channelId)) {
                        console.error(`Query ${run.id}: channel ${delivery.channelId} is not registered; thoughts will not be delivered`);
                    }
                    const sink = new PushSink(this.registry, delivery.channelId, {
                        sendTimeoutMs: this.options.pushSendTimeoutMs,
                    });
                    const session = this.dispatch(run, table, strategy, sink, request.model);
                    run.transition('STREAMING');
                    const answer = await session.runStreaming(prompt).result();
                    run.transition('COMPLETED');
                    return answer;
                }
            }
        } catch (error) {
            run.fail();
            throw error;
        }
    }

    /**
     * Blocking query: only the answer comes back.
     */
    query(comparisonId: string, question: string, strategy: string, model?: string): Promise<string> {
        return this.execute({ comparisonId, question, strategy, model }, { mode: 'NONE' });
    }

    /**
     * Pull query: drain the returned sequence for every thought and the answer.
     * A failed run throws from the sequence once its events are exhausted.
     */
    queryStreamPull(
        comparisonId: string,
        question: string,
        strategy: string,
        model?: string
    ): Promise<AsyncIterable<QueryEvent>> {
        return this.execute({ comparisonId, question, strategy, model }, { mode: 'PULL' });
    }

    /**
     * Push query: thoughts go to the channel as they happen, the answer comes back here.
     */
    queryStreamPush(
        comparisonId: string,
        question: string,
        strategy: string,
        channelId: string,
        model?: string
    ): Promise<string> {
        return this.execute({ comparisonId, question, strategy, model }, { mode: 'PUSH', channelId });
    }

    private async fetchTable(comparisonId: string): Promise<ComparisonTable> {
        let table: ComparisonTable;
        try {
            table = await this.source.fetch(comparisonId);
        } catch (error) {
            if (isChatException(error, 'DATASET_UNAVAILABLE')) {
                throw error;
            }
            const reason = error instanceof Error ? error.message : String(error);
            throw createDatasetUnavailableError(comparisonId, reason, error);
        }
        if (isEmptyTable(table)) {
            throw createDatasetUnavailableError(comparisonId, 'comparison has no data');
        }
        return table;
    }

    private dispatch(
        run: QueryRun,
        table: ComparisonTable,
        strategy: StrategyTag,
        sink: EventSink,
        model: string | undefined
    ): ReasoningSession {
        const session = this.selector.build(table, strategy, sink, { modelId: model });
        run.transition('DISPATCHED');
        return session;
    }

    /**
     * The run is watched from launch, so it reaches COMPLETED or FAILED even
     * when the sequence is never read. A failure nobody is reading is logged.
     */
    private watchPull(run: QueryRun, sink: PullSink, handle: RunHandle): AsyncIterableIterator<QueryEvent> {
        const reader: PullReader = { active: false, reported: false };

        void handle.settled.then(outcome => {
            reader.outcome = outcome;
            if (outcome.ok) {
                if (!run.terminal) run.transition('COMPLETED');
                return;
            }
            run.fail();
            if (!reader.active) {
                this.reportUnread(run, reader, outcome.error);
            }
        });

        const events = this.relay(run, sink, handle, reader);
        return {
            next: () => events.next(),
            // Also reached when the caller gives up before the first read
            return: () => {
                sink.detach();
                return events.return(undefined);
            },
            throw: (error?: unknown) => events.throw(error),
            [Symbol.asyncIterator]() {
                return this;
            },
        };
    }

    /**
     * Yields the sink's events, then throws the run's failure if it had one.
     */
    private async *relay(
        run: QueryRun,
        sink: PullSink,
        handle: RunHandle,
        reader: PullReader
    ): AsyncGenerator<QueryEvent, void, undefined> {
        reader.active = true;
        let exhausted = false;
        try {
            for await (const event of sink) {
                yield event;
            }
            exhausted = true;
            await handle.result();
            if (!run.terminal) run.transition('COMPLETED');
        } catch (error) {
            run.fail();
            reader.reported = true;
            throw error;
        } finally {
            reader.active = false;
            if (!exhausted) {
                sink.detach();
                if (reader.outcome && !reader.outcome.ok) {
                    this.reportUnread(run, reader, reader.outcome.error);
                }
            }
        }
    }

    private reportUnread(run: QueryRun, reader: PullReader, error: Error): void {
        if (reader.reported) {
            return;
        }
        reader.reported = true;
        console.error(`Query ${run.id} failed with no consumer reading its events: ${error.message}`);
    }

    private onTransition(transition: QueryTransition): void {
        if (this.options.verbose) {
            console.error(`Query ${transition.queryId}: ${transition.from ?? 'start'} -> ${transition.to}`);
        }
        this.options.onTransition?.(transition);
    }
}
