import { z } from 'zod';
import { tableShape } from '../dataset/table.js';
import type { DatasetSource } from '../dataset/source.js';
import type { QueryCoordinator, QueryRequest } from '../service/coordinator.js';
import type { TableShape } from '../types/index.js';
import { parseArgs } from './validate.js';

const QueryArgsSchema = z.object({
    comparison_id: z.string().trim().min(1, 'comparison_id is required'),
    question: z.string().trim().min(1, 'question is required'),
    strategy: z.string().trim().min(1).default('TABULAR'),
    model: z.string().trim().min(1).optional(),
});

const PushArgsSchema = QueryArgsSchema.extend({
    channel_id: z.string().trim().min(1, 'channel_id is required'),
});

const DescribeArgsSchema = z.object({
    comparison_id: z.string().trim().min(1, 'comparison_id is required'),
});

export interface QueryResponse {
    comparison_id: string;
    strategy: string;
    answer: string;
}

export interface StreamResponse extends QueryResponse {
    thoughts: string[];
}

export interface PushResponse extends QueryResponse {
    channel_id: string;
}

export interface DescribeResponse {
    comparison_id: string;
    shape: TableShape;
    properties: string[];
    contributions: string[];
}

function toRequest(args: z.infer<typeof QueryArgsSchema>): QueryRequest {
    return {
        comparisonId: args.comparison_id,
        question: args.question,
        strategy: args.strategy,
        model: args.model,
    };
}

export async function queryComparisonHandler(
    rawArgs: unknown,
    coordinator: QueryCoordinator
): Promise<QueryResponse> {
    const args = parseArgs(QueryArgsSchema, rawArgs);
    const answer = await coordinator.execute(toRequest(args), { mode: 'NONE' });
    return { comparison_id: args.comparison_id, strategy: args.strategy, answer };
}

/**
 * Drain a pull query. Each thought is also handed to onThought as it arrives.
 */
export async function streamComparisonHandler(
    rawArgs: unknown,
    coordinator: QueryCoordinator,
    onThought?: (thought: string, index: number) => void
): Promise<StreamResponse> {
    const args = parseArgs(QueryArgsSchema, rawArgs);
    const events = await coordinator.execute(toRequest(args), { mode: 'PULL' });

    const thoughts: string[] = [];
    let answer = '';
    for await (const event of events) {
        if (event.kind === 'thought') {
            thoughts.push(event.text);
            onThought?.(event.text, thoughts.length);
        } else {
            answer = event.text;
        }
    }
    return { comparison_id: args.comparison_id, strategy: args.strategy, answer, thoughts };
}

export async function pushComparisonHandler(
    rawArgs: unknown,
    coordinator: QueryCoordinator
): Promise<PushResponse> {
    const args = parseArgs(PushArgsSchema, rawArgs);
    const answer = await coordinator.execute(toRequest(args), { mode: 'PUSH', channelId: args.channel_id });
    return {
        comparison_id: args.comparison_id,
        strategy: args.strategy,
        channel_id: args.channel_id,
        answer,
    };
}

export async function describeComparisonHandler(
    rawArgs: unknown,
    source: DatasetSource
): Promise<DescribeResponse> {
    const args = parseArgs(DescribeArgsSchema, rawArgs);
    const table = await source.fetch(args.comparison_id);
    return {
        comparison_id: table.id,
        shape: tableShape(table),
        properties: [...table.properties],
        contributions: [...table.items],
    };
}
