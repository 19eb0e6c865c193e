import type { Cell, CellValue, WorksheetGrid, XlsxGridConfig } from './types';
import type { SharedStringTable } from './parsers/SharedStringsParser';
import { getGridError, GridErrorType } from './utils/errorUtils';

/**
 * Called for each row by {@link GridDocument.forEachRow}. Return `false` to stop.
 */
export type RowCallback = (row: readonly Cell[], index: number) => boolean | void;

/**
 * Called for each cell of a column by {@link GridDocument.forEachInColumn}. Return `false` to stop.
 */
export type ColumnCallback = (cell: Cell, row: number) => boolean | void;

/**
 * Called for every cell by {@link GridDocument.forEachCell}. Return `false` to stop.
 */
export type CellCallback = (cell: Cell, row: number, col: number) => boolean | void;

/**
 * A decoded worksheet: a dense `rowCount() x colCount()` grid of typed cells plus the shared
 * string table its `stringRef` cells point into.
 *
 * The document is immutable. It holds the parsed shared strings part until {@link release}
 * is called; after that every read throws a DOCUMENT_RELEASED error.
 *
 * @example
 * ```typescript
 * const doc = await XlsxGrid.readGrid('people.xlsx');
 * doc.forEachRow((row, n) => {
 *     console.log(n, row.map(cell => doc.resolveValue(cell)));
 * });
 * doc.release();
 * ```
 */
export class GridDocument {
    private readonly rows: number;
    private readonly cols: number;
    private grid: Cell[];
    private strings: SharedStringTable | null;
    private readonly config: XlsxGridConfig;

    constructor(grid: WorksheetGrid, strings: SharedStringTable, config: XlsxGridConfig = {}) {
        this.rows = grid.rows;
        this.cols = grid.cols;
        this.grid = grid.cells;
        this.strings = strings;
        this.config = config;
    }

    get isReleased(): boolean {
        return this.strings === null;
    }

    private table(operation: string): SharedStringTable {
        if (this.strings === null) {
            throw getGridError(GridErrorType.DOCUMENT_RELEASED, this.config, operation);
        }
        return this.strings;
    }

    rowCount(): number {
        this.table('rowCount');
        return this.rows;
    }

    colCount(): number {
        this.table('colCount');
        return this.cols;
    }

    /**
     * The cells of row `i`, exactly `colCount()` of them.
     * @returns A copy of the row, or undefined when `i` is out of range
     */
    row(i: number): Cell[] | undefined {
        this.table('row');
        if (!Number.isInteger(i) || i < 0 || i >= this.rows) return undefined;
        return this.grid.slice(i * this.cols, (i + 1) * this.cols);
    }

    /** The cell at (`row`, `col`), or undefined when out of range. */
    cell(row: number, col: number): Cell | undefined {
        this.table('cell');
        if (!Number.isInteger(row) || !Number.isInteger(col)) return undefined;
        if (row < 0 || row >= this.rows || col < 0 || col >= this.cols) return undefined;
        return this.grid[row * this.cols + col];
    }

    /**
     * Calls `callback` with each row in order until it returns `false`.
     * @returns false if the callback stopped the iteration, true otherwise
     */
    forEachRow(callback: RowCallback): boolean {
        this.table('forEachRow');
        for (let i = 0; i < this.rows; i++) {
            const row = this.grid.slice(i * this.cols, (i + 1) * this.cols);
            if (callback(row, i) === false) return false;
        }
        return true;
    }

    /**
     * Calls `callback` with the cell of column `col` in each row, top to bottom, until it returns `false`.
     * A column outside the grid has no cells.
     * @returns false if the callback stopped the iteration, true otherwise
     */
    forEachInColumn(col: number, callback: ColumnCallback): boolean {
        this.table('forEachInColumn');
        if (!Number.isInteger(col) || col < 0 || col >= this.cols) return true;
        for (let i = 0; i < this.rows; i++) {
            if (callback(this.grid[i * this.cols + col], i) === false) return false;
        }
        return true;
    }

    /**
     * Calls `callback` with every cell, row by row, until it returns `false`.
     * @returns false if the callback stopped the iteration, true otherwise
     */
    forEachCell(callback: CellCallback): boolean {
        this.table('forEachCell');
        for (let i = 0; i < this.rows; i++) {
            for (let j = 0; j < this.cols; j++) {
                if (callback(this.grid[i * this.cols + j], i, j) === false) return false;
            }
        }
        return true;
    }

    /**
     * Text of shared string `index`.
     * @returns The text, or undefined when the index is out of range or the entry was malformed
     */
    resolveStringRef(index: number): string | undefined {
        return this.table('resolveStringRef').get(index);
    }

    /**
     * Plain value of a cell: its text for string cells (shared or literal), its number otherwise.
     * A reference to a malformed shared string resolves to null.
     */
    resolveValue(cell: Cell): CellValue {
        const strings = this.table('resolveValue');
        switch (cell.type) {
            case 'null':
                return null;
            case 'stringRef':
                return strings.get(cell.index) ?? null;
            case 'literal':
                return cell.text;
            case 'integer':
            case 'float':
                return cell.value;
        }
    }

    /**
     * Renders the grid as text: cells separated by tabs, rows by `config.newlineDelimiter`.
     * Empty cells render as empty strings.
     *
     * @param delimiter - Overrides the configured row delimiter
     */
    toText(delimiter?: string): string {
        this.table('toText');
        const rowDelimiter = delimiter ?? this.config.newlineDelimiter ?? '\n';
        const lines: string[] = [];
        this.forEachRow((row) => {
            lines.push(row.map(cell => {
                const value = this.resolveValue(cell);
                return value === null ? '' : String(value);
            }).join('\t'));
        });
        return lines.join(rowDelimiter);
    }

    /**
     * Releases the document: drops every cell, literal text included, and the shared string
     * table's hold on its parsed tree. Calling it again does nothing.
     */
    release(): void {
        if (this.strings === null) return;
        this.grid = [];
        this.strings.release();
        this.strings = null;
    }
}
