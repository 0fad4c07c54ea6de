/**
 * Tools the reasoning agent can call while it works on a comparison.
 *
 * Tools never throw: problems are returned as text so the agent can correct
 * itself on the next step.
 */

import { tool } from 'ai';
import type { ToolSet } from 'ai';
import { z } from 'zod';
import type { ComparisonDocument, ComparisonTable, FieldValue } from '../types/index.js';
import { renderMarkdown, selectCells, tableShape } from '../dataset/table.js';
import type { CellSelection } from '../dataset/table.js';

// ==================== TABULAR ====================

export function describeTableText(table: ComparisonTable): string {
    return JSON.stringify({
        ...tableShape(table),
        properties: table.properties,
        items: table.items,
    }, null, 2);
}

export function getCellsText(table: ComparisonTable, selection: CellSelection, maxChars: number): string {
    const { table: selected, missing } = selectCells(table, selection);
    const notes: string[] = [];
    if (missing.length > 0) {
        notes.push(`No match for: ${missing.join(', ')}. Call describe_table for the exact labels.`);
    }
    if (selected.properties.length === 0 || selected.items.length === 0) {
        return notes.join('\n') || 'Selection is empty.';
    }
    const rendered = renderMarkdown(selected, maxChars);
    if (rendered.rowsShown < rendered.totalRows) {
        notes.push(`Showing ${rendered.rowsShown} of ${rendered.totalRows} rows; select fewer properties to see the rest.`);
    }
    return [rendered.text, ...notes].join('\n');
}

export function createTabularTools(table: ComparisonTable, maxChars: number): ToolSet {
    return {
        describe_table: tool({
            description: 'Shape of the comparison table and the exact property (row) and item (column) labels.',
            parameters: z.object({}),
            execute: async () => describeTableText(table),
        }),
        get_cells: tool({
            description: 'Cells of the comparison table as markdown, restricted to the given property and/or item labels. Omit a list to take every row or column.',
            parameters: z.object({
                properties: z.array(z.string()).optional().describe('Row labels (properties) to include'),
                items: z.array(z.string()).optional().describe('Column labels (compared items) to include'),
            }),
            execute: async (args) => getCellsText(table, args, maxChars),
        }),
    };
}

// ==================== STRUCTURED ====================

type JsonNode = FieldValue | JsonObject;

interface JsonObject {
    [key: string]: JsonNode;
}

function isJsonObject(node: JsonNode): node is JsonObject {
    return typeof node === 'object' && node !== null && !Array.isArray(node);
}

export function formatPath(path: readonly string[]): string {
    return 'data' + path.map(key => `[${JSON.stringify(key)}]`).join('');
}

type Resolved = { ok: true; node: JsonNode } | { ok: false; message: string };

function resolvePath(root: JsonObject, path: readonly string[]): Resolved {
    let node: JsonNode = root;
    for (let depth = 0; depth < path.length; depth++) {
        const key = path[depth];
        if (isJsonObject(node) && Object.prototype.hasOwnProperty.call(node, key)) {
            node = node[key];
        } else if (Array.isArray(node) && /^\d+$/.test(key) && Number(key) < node.length) {
            node = node[Number(key)];
        } else {
            return { ok: false, message: `Error: ${formatPath(path.slice(0, depth + 1))} does not exist.` };
        }
    }
    return { ok: true, node };
}

export function listKeys(document: ComparisonDocument, path: readonly string[]): string {
    const resolved = resolvePath(document, path);
    if (!resolved.ok) {
        return resolved.message;
    }
    if (!isJsonObject(resolved.node)) {
        return `Value at ${formatPath(path)} is not an object, get the value directly.`;
    }
    return JSON.stringify(Object.keys(resolved.node));
}

export const LARGE_OBJECT_MESSAGE = 'Value is a large dictionary, should explore its keys directly';

export function getValue(document: ComparisonDocument, path: readonly string[], maxLength: number): string {
    const resolved = resolvePath(document, path);
    if (!resolved.ok) {
        return resolved.message;
    }
    const { node } = resolved;
    const text = typeof node === 'string' ? node : JSON.stringify(node);
    if (isJsonObject(node) && text.length > maxLength) {
        return LARGE_OBJECT_MESSAGE;
    }
    return text.slice(0, maxLength);
}

export function createStructuredTools(document: ComparisonDocument, maxValueLength: number): ToolSet {
    const path = z.array(z.string()).describe('Keys from the top of the document, e.g. ["Paper A/Contribution 1", "Year"]. Use [] for the top level.');
    return {
        json_list_keys: tool({
            description: 'List the keys of the object at a path in the comparison document.',
            parameters: z.object({ path }),
            execute: async ({ path: keys }) => listKeys(document, keys),
        }),
        json_get_value: tool({
            description: `Get the value at a path in the comparison document. Values longer than ${maxValueLength} characters are cut.`,
            parameters: z.object({ path }),
            execute: async ({ path: keys }) => getValue(document, keys, maxValueLength),
        }),
    };
}
