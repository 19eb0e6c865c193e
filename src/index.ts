/**
 * xlsx-grid - Spreadsheet Grid Decoder
 *
 * Decodes the first worksheet of an `.xlsx` package into a dense, randomly addressable grid of
 * typed cells, for loading into databases and other row-oriented consumers.
 *
 * **Quick Start:**
 * ```typescript
 * import { readGrid } from 'xlsx-grid';
 *
 * const doc = await readGrid('people.xlsx');
 * const header = doc.row(0);
 * doc.forEachInColumn(1, (cell, row) => {
 *     if (cell.type === 'integer') console.log(row, cell.value);
 * });
 * doc.release();
 * ```
 *
 * @packageDocumentation
 * @module xlsx-grid
 */

import { XlsxGrid } from './XlsxGrid';

export { XlsxGrid };
export { GridDocument } from './GridDocument';
export type { CellCallback, ColumnCallback, RowCallback } from './GridDocument';
export { SharedStringTable } from './parsers/SharedStringsParser';
export { GridError, GridErrorType, isGridError } from './utils/errorUtils';
export type {
    Cell,
    CellType,
    CellValue,
    FloatCell,
    IntegerCell,
    LiteralCell,
    NullCell,
    StringRefCell,
    XlsxGridConfig
} from './types';

export const readGrid = XlsxGrid.readGrid;

export default XlsxGrid;
