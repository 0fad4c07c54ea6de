/**
 * ORKG comparison source.
 *
 * Reads published comparisons from the SimComp service that sits next to an
 * ORKG instance (`<host>simcomp`) and turns them into comparison tables:
 * active predicates become rows, active contributions become columns.
 */

import { z } from 'zod';
import type { Cell, CellValue, ComparisonTable } from '../types/index.js';
import { ChatException, createDatasetUnavailableError } from '../types/index.js';
import type { DatasetSource } from './source.js';
import { createTable } from './table.js';

export interface HttpResponse {
    ok: boolean;
    status: number;
    statusText?: string;
    json(): Promise<unknown>;
}

export type FetchLike = (
    url: string,
    init?: { headers?: Record<string, string>; signal?: AbortSignal }
) => Promise<HttpResponse>;

const ValueSchema = z.object({
    label: z.string().nullish(),
    _class: z.string().nullish(),
}).passthrough();

const ContributionSchema = z.object({
    id: z.string(),
    label: z.string().nullish(),
    paper_label: z.string().nullish(),
    active: z.boolean().default(true),
}).passthrough();

const PredicateSchema = z.object({
    id: z.string(),
    label: z.string(),
    active: z.boolean().default(true),
}).passthrough();

const ComparisonDataSchema = z.object({
    contributions: z.array(ContributionSchema),
    predicates: z.array(PredicateSchema),
    data: z.record(z.string(), z.array(z.array(ValueSchema))),
});

const ThingResponseSchema = z.object({
    payload: z.object({
        thing: z.object({
            data: ComparisonDataSchema,
        }),
    }),
});

export type ComparisonData = z.infer<typeof ComparisonDataSchema>;

const ISO_DATE = /^\d{4}-\d{2}-\d{2}(T\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:\d{2})?)?$/;
const NUMERIC = /^-?\d+(\.\d+)?$/;

/**
 * Literal labels that look like ISO dates or plain numbers keep that type;
 * everything else stays a string.
 */
export function parseLiteral(label: string): CellValue {
    const text = label.trim();
    if (ISO_DATE.test(text)) {
        const date = new Date(text);
        if (!Number.isNaN(date.getTime())) {
            return date;
        }
    }
    if (NUMERIC.test(text)) {
        return Number(text);
    }
    return text;
}

function parseCell(values: z.infer<typeof ValueSchema>[]): Cell {
    const cell: CellValue[] = [];
    for (const value of values) {
        const label = value.label?.trim();
        if (!label) continue;
        cell.push(value._class === 'literal' ? parseLiteral(label) : label);
    }
    return cell;
}

/**
 * Build a table from a SimComp comparison payload.
 */
export function comparisonToTable(comparisonId: string, data: ComparisonData): ComparisonTable {
    const columns = data.contributions
        .map((contribution, index) => ({ contribution, index }))
        .filter(({ contribution }) => contribution.active);
    const rows = data.predicates.filter(predicate => predicate.active);

    const items = columns.map(({ contribution }) => {
        const label = contribution.label || contribution.id;
        return contribution.paper_label ? `${contribution.paper_label}/${label}` : label;
    });

    const cells = rows.map(predicate => {
        const byContribution = data.data[predicate.id] ?? [];
        return columns.map(({ index }) => parseCell(byContribution[index] ?? []));
    });

    return createTable(comparisonId, rows.map(predicate => predicate.label), items, cells);
}

export class OrkgComparisonSource implements DatasetSource {
    private readonly simcompUrl: string;

    constructor(
        host: string,
        private readonly fetchImpl: FetchLike = (url, init) => fetch(url, init),
        private readonly timeoutMs: number = 30_000
    ) {
        this.simcompUrl = host.replace(/\/?$/, '/') + 'simcomp';
    }

    comparisonUrl(comparisonId: string): string {
        const query = new URLSearchParams({ thing_type: 'COMPARISON', thing_key: comparisonId });
        return `${this.simcompUrl}/thing/?${query.toString()}`;
    }

    async fetch(comparisonId: string): Promise<ComparisonTable> {
        let body: unknown;
        try {
            const response = await this.fetchImpl(this.comparisonUrl(comparisonId), {
                headers: { Accept: 'application/json' },
                signal: AbortSignal.timeout(this.timeoutMs),
            });
            if (!response.ok) {
                throw createDatasetUnavailableError(comparisonId,
                    `SimComp responded ${response.status}${response.statusText ? ` ${response.statusText}` : ''}`);
            }
            body = await response.json();
        } catch (error) {
            if (error instanceof ChatException) {
                throw error;
            }
            const reason = error instanceof Error ? error.message : String(error);
            throw createDatasetUnavailableError(comparisonId, `request failed: ${reason}`, error);
        }

        const parsed = ThingResponseSchema.safeParse(body);
        if (!parsed.success) {
            throw createDatasetUnavailableError(comparisonId,
                `unexpected payload: ${parsed.error.issues[0]?.message ?? 'invalid shape'}`, parsed.error);
        }
        return comparisonToTable(comparisonId, parsed.data.payload.thing.data);
    }
}
