/**
 * Comparison table types.
 *
 * Rows are properties (predicates), columns are the compared items
 * (contributions). A cell holds zero, one or many values.
 */

export type CellValue = string | number | boolean | Date;

export type Cell = readonly CellValue[];

export interface ComparisonTable {
    readonly id: string;
    /** Row labels */
    readonly properties: readonly string[];
    /** Column labels */
    readonly items: readonly string[];
    /** cells[row][column] */
    readonly cells: readonly (readonly Cell[])[];
}

export interface TableShape {
    rows: number;
    columns: number;
    filledCells: number;
    multiValuedCells: number;
}

/** Transposed view: item -> property -> value(s) */
export type FieldValue = string | number | boolean | null | FieldValue[];

export type ComparisonDocument = Record<string, Record<string, FieldValue>>;
