/**
 * Comparison table helpers.
 *
 * Tables are frozen on construction and never mutated afterwards; every
 * helper here returns new values.
 */

import type {
    Cell,
    CellValue,
    ComparisonDocument,
    ComparisonTable,
    FieldValue,
    TableShape,
} from '../types/index.js';
import { createGenericError } from '../types/index.js';

export function createTable(
    id: string,
    properties: readonly string[],
    items: readonly string[],
    cells: readonly (readonly Cell[])[]
): ComparisonTable {
    if (cells.length !== properties.length) {
        throw createGenericError('INVALID_ARGUMENT',
            `Table '${id}' has ${properties.length} properties but ${cells.length} rows of cells`);
    }
    cells.forEach((row, index) => {
        if (row.length !== items.length) {
            throw createGenericError('INVALID_ARGUMENT',
                `Row ${index} of table '${id}' has ${row.length} cells, expected ${items.length}`);
        }
    });

    return Object.freeze({
        id,
        properties: Object.freeze([...properties]),
        items: Object.freeze([...items]),
        cells: Object.freeze(cells.map(row => Object.freeze(row.map(cell => Object.freeze([...cell]))))),
    });
}

export function tableShape(table: ComparisonTable): TableShape {
    let filledCells = 0;
    let multiValuedCells = 0;
    for (const row of table.cells) {
        for (const cell of row) {
            if (cell.length > 0) filledCells++;
            if (cell.length > 1) multiValuedCells++;
        }
    }
    return {
        rows: table.properties.length,
        columns: table.items.length,
        filledCells,
        multiValuedCells,
    };
}

/**
 * A table with no rows, no columns, or no values at all carries nothing to reason over.
 */
export function isEmptyTable(table: ComparisonTable): boolean {
    const shape = tableShape(table);
    return shape.rows === 0 || shape.columns === 0 || shape.filledCells === 0;
}

export function formatValue(value: CellValue): string {
    if (value instanceof Date) {
        return value.toISOString().slice(0, 10);
    }
    return String(value);
}

export function formatCell(cell: Cell): string {
    return cell.map(formatValue).join('; ');
}

function escapeMarkdown(text: string): string {
    return text.replace(/\|/g, '\\|').replace(/\s*\n\s*/g, ' ');
}

export interface RenderedTable {
    text: string;
    rowsShown: number;
    totalRows: number;
}

/**
 * Render the table as a markdown grid. Rows are added in order until the next
 * one would push the text past maxChars; header and divider are always kept.
 */
export function renderMarkdown(table: ComparisonTable, maxChars: number = Infinity): RenderedTable {
    const header = `| Property | ${table.items.map(escapeMarkdown).join(' | ')} |`;
    const divider = `| --- | ${table.items.map(() => '---').join(' | ')} |`;
    const lines = [header, divider];
    let length = header.length + 1 + divider.length;
    let rowsShown = 0;

    for (let row = 0; row < table.properties.length; row++) {
        const cells = table.cells[row].map(cell => escapeMarkdown(formatCell(cell)));
        const line = `| ${escapeMarkdown(table.properties[row])} | ${cells.join(' | ')} |`;
        if (length + 1 + line.length > maxChars) {
            break;
        }
        lines.push(line);
        length += 1 + line.length;
        rowsShown++;
    }

    return { text: lines.join('\n'), rowsShown, totalRows: table.properties.length };
}

/**
 * Suffix repeated labels with " (n)" so they can serve as object keys.
 */
export function uniqueKeys(labels: readonly string[]): string[] {
    const seen = new Map<string, number>();
    return labels.map(label => {
        const count = (seen.get(label) ?? 0) + 1;
        seen.set(label, count);
        return count === 1 ? label : `${label} (${count})`;
    });
}

function toFieldValue(cell: Cell): FieldValue {
    if (cell.length === 0) {
        return null;
    }
    const values = cell.map(value => value instanceof Date ? formatValue(value) : value);
    return values.length === 1 ? values[0] : values;
}

/**
 * Transpose the table into a nested document keyed by item, then property.
 */
export function toDocument(table: ComparisonTable): ComparisonDocument {
    const itemKeys = uniqueKeys(table.items);
    const propertyKeys = uniqueKeys(table.properties);
    const document: ComparisonDocument = {};

    itemKeys.forEach((item, column) => {
        const fields: Record<string, FieldValue> = {};
        propertyKeys.forEach((property, row) => {
            fields[property] = toFieldValue(table.cells[row][column]);
        });
        document[item] = fields;
    });
    return document;
}

export interface CellSelection {
    properties?: string[];
    items?: string[];
}

export interface SelectedCells {
    table: ComparisonTable;
    /** Requested labels that matched nothing */
    missing: string[];
}

function matchLabels(labels: readonly string[], wanted: string[] | undefined, missing: string[]): number[] {
    if (!wanted || wanted.length === 0) {
        return labels.map((_, index) => index);
    }
    const indices: number[] = [];
    for (const name of wanted) {
        const needle = name.trim().toLowerCase();
        const found = labels.flatMap((label, index) => label.toLowerCase() === needle ? [index] : []);
        if (found.length === 0) {
            missing.push(name);
        }
        for (const index of found) {
            if (!indices.includes(index)) indices.push(index);
        }
    }
    return indices;
}

/**
 * Sub-table restricted to the given property and item labels (case-insensitive).
 * An omitted or empty list selects everything on that axis.
 */
export function selectCells(table: ComparisonTable, selection: CellSelection): SelectedCells {
    const missing: string[] = [];
    const rows = matchLabels(table.properties, selection.properties, missing);
    const columns = matchLabels(table.items, selection.items, missing);

    return {
        table: createTable(
            table.id,
            rows.map(row => table.properties[row]),
            columns.map(column => table.items[column]),
            rows.map(row => columns.map(column => table.cells[row][column]))
        ),
        missing,
    };
}
