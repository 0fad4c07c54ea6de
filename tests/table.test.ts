/**
 * Tests for comparison table helpers
 */

import {
    createTable,
    formatCell,
    isEmptyTable,
    renderMarkdown,
    selectCells,
    tableShape,
    toDocument,
    uniqueKeys,
} from '../src/dataset/table.js';
import { emptyTable, sampleTable } from './fixtures.js';

const HEADER = '| Property | Paper A/Contribution 1 | Paper B/Contribution 2 |';
const DIVIDER = '| --- | --- | --- |';
const ROWS = [
    '| Publication date | 2019-05-01 | 2021-03-15 |',
    '| Dataset | MNIST; CIFAR-10 | ImageNet |',
    '| Accuracy | 0.91 |  |',
];

describe('createTable', () => {
    test('rejects a cell grid that does not match the labels', () => {
        expect(() => createTable('T', ['a', 'b'], ['x'], [[['1']]]))
            .toThrow("Table 'T' has 2 properties but 1 rows of cells");
        expect(() => createTable('T', ['a'], ['x', 'y'], [[['1']]]))
            .toThrow("Row 0 of table 'T' has 1 cells, expected 2");
    });

    test('freezes the table', () => {
        const table = sampleTable();
        expect(Object.isFrozen(table)).toBe(true);
        expect(Object.isFrozen(table.cells[0])).toBe(true);
        expect(Object.isFrozen(table.cells[0][0])).toBe(true);
    });
});

describe('tableShape', () => {
    test('counts filled and multi-valued cells', () => {
        expect(tableShape(sampleTable())).toEqual({ rows: 3, columns: 2, filledCells: 5, multiValuedCells: 1 });
    });

    test('detects empty tables', () => {
        expect(isEmptyTable(emptyTable())).toBe(true);
        expect(isEmptyTable(createTable('T', ['a'], ['x'], [[[]]]))).toBe(true);
        expect(isEmptyTable(sampleTable())).toBe(false);
    });
});

describe('formatCell', () => {
    test('joins values and prints dates as days', () => {
        expect(formatCell([new Date('2020-01-02T10:00:00Z'), 3, 'x', true])).toBe('2020-01-02; 3; x; true');
        expect(formatCell([])).toBe('');
    });
});

describe('renderMarkdown', () => {
    test('renders every row when unbounded', () => {
        const rendered = renderMarkdown(sampleTable());
        expect(rendered.text).toBe([HEADER, DIVIDER, ...ROWS].join('\n'));
        expect(rendered.rowsShown).toBe(3);
        expect(rendered.totalRows).toBe(3);
    });

    test('keeps the longest prefix of rows that fits', () => {
        const budget = [HEADER, DIVIDER, ROWS[0]].join('\n').length;
        const rendered = renderMarkdown(sampleTable(), budget);
        expect(rendered.text).toBe([HEADER, DIVIDER, ROWS[0]].join('\n'));
        expect(rendered.rowsShown).toBe(1);
    });

    test('always keeps the header', () => {
        const rendered = renderMarkdown(sampleTable(), 10);
        expect(rendered.text).toBe([HEADER, DIVIDER].join('\n'));
        expect(rendered.rowsShown).toBe(0);
    });

    test('escapes pipes and flattens newlines', () => {
        const table = createTable('T', ['a|b'], ['x'], [[['line one\nline two']]]);
        expect(renderMarkdown(table).text.split('\n')[2]).toBe('| a\\|b | line one line two |');
    });
});

describe('uniqueKeys', () => {
    test('numbers repeated labels', () => {
        expect(uniqueKeys(['a', 'a', 'b', 'a'])).toEqual(['a', 'a (2)', 'b', 'a (3)']);
    });
});

describe('toDocument', () => {
    test('nests values by item, then property', () => {
        expect(toDocument(sampleTable())).toEqual({
            'Paper A/Contribution 1': {
                'Publication date': '2019-05-01',
                Dataset: ['MNIST', 'CIFAR-10'],
                Accuracy: 0.91,
            },
            'Paper B/Contribution 2': {
                'Publication date': '2021-03-15',
                Dataset: 'ImageNet',
                Accuracy: null,
            },
        });
    });

    test('keeps duplicate item labels apart', () => {
        const table = createTable('T', ['p'], ['same', 'same'], [[['1'], ['2']]]);
        expect(Object.keys(toDocument(table))).toEqual(['same', 'same (2)']);
    });
});

describe('selectCells', () => {
    test('matches labels case-insensitively and reports misses', () => {
        const { table, missing } = selectCells(sampleTable(), { properties: [' dataset ', 'Venue'] });
        expect(table.properties).toEqual(['Dataset']);
        expect(table.items).toEqual(['Paper A/Contribution 1', 'Paper B/Contribution 2']);
        expect(table.cells).toEqual([[['MNIST', 'CIFAR-10'], ['ImageNet']]]);
        expect(missing).toEqual(['Venue']);
    });

    test('selects a single column', () => {
        const { table } = selectCells(sampleTable(), { items: ['paper b/contribution 2'] });
        expect(table.items).toEqual(['Paper B/Contribution 2']);
        expect(table.properties).toHaveLength(3);
    });
});
