/**
 * Agent Variant Selector
 *
 * Builds a configured reasoning session for a table, a strategy tag and a sink.
 * Construction only: the backend is created here but not contacted.
 */

import type { EventSink } from '../sinks/index.js';
import type { BackendFactory, ComparisonTable, ModelProfile, TableShape } from '../types/index.js';
import { parseStrategyTag } from '../types/index.js';
import { assertNever } from '../types/strategy.js';
import { renderMarkdown, tableShape, toDocument } from '../dataset/table.js';
import { modelProfile } from '../llm/models.js';
import { STRUCTURED_SYSTEM_PROMPT, tabularSystemPrompt } from '../prompts/index.js';
import { ReasoningSession, SessionConfig } from './session.js';
import { createStructuredTools, createTabularTools } from './tools.js';

export interface SelectorOptions {
    modelId: string;
    apiKey: string;
    baseUrl?: string;
    /** Step cap for every variant */
    maxSteps: number;
    /** Deadline for STRUCTURED sessions */
    structuredTimeoutMs: number;
}

export interface BuildOverrides {
    modelId?: string;
}

export class AgentVariantSelector {
    constructor(
        private readonly backendFactory: BackendFactory,
        private readonly options: SelectorOptions
    ) { }

    get defaultModel(): string {
        return this.options.modelId;
    }

    build(
        table: ComparisonTable,
        strategy: string,
        sink: EventSink,
        overrides: BuildOverrides = {}
    ): ReasoningSession {
        const tag = parseStrategyTag(strategy);
        const profile = modelProfile(overrides.modelId ?? this.options.modelId);
        const shape = tableShape(table);

        let config: SessionConfig;
        switch (tag) {
            case 'TABULAR':
                config = this.tabular(table, shape, profile);
                break;
            case 'STRUCTURED':
                config = this.structured(table, profile);
                break;
            default:
                return assertNever(tag);
        }

        const backend = this.backendFactory({
            modelId: profile.modelId,
            streaming: sink.kind !== 'null',
            apiKey: this.options.apiKey,
            baseUrl: this.options.baseUrl,
        });
        return new ReasoningSession(backend, table, config, sink);
    }

    private tabular(table: ComparisonTable, shape: TableShape, profile: ModelProfile): SessionConfig {
        // Small tables go in whole; larger ones get the longest row prefix that fits
        const rendered = renderMarkdown(table, profile.tableBudgetChars);
        if (rendered.rowsShown < shape.rows) {
            console.error(`Table ${table.id}: embedding ${rendered.rowsShown}/${shape.rows} rows for ${profile.modelId}`);
        }
        return {
            strategy: 'TABULAR',
            system: tabularSystemPrompt(rendered),
            tools: createTabularTools(table, profile.tableBudgetChars),
            maxSteps: this.options.maxSteps,
        };
    }

    private structured(table: ComparisonTable, profile: ModelProfile): SessionConfig {
        return {
            strategy: 'STRUCTURED',
            system: STRUCTURED_SYSTEM_PROMPT,
            tools: createStructuredTools(toDocument(table), profile.maxValueLength),
            maxSteps: this.options.maxSteps,
            timeoutMs: this.options.structuredTimeoutMs,
        };
    }
}
