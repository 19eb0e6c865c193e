/**
 * Worksheet Grid Decoder (xl/worksheets/sheetN.xml)
 *
 * **Layout:**
 * ```xml
 * <worksheet>
 *   <sheetData>
 *     <row r="1"><c r="A1" t="s"><v>0</v></c><c r="B1" t="s"><v>1</v></c></row>
 *     <row r="2"><c r="B2"><v>30</v></c></row>
 *   </sheetData>
 * </worksheet>
 * ```
 *
 * Rows may leave out cells that have no value, so a cell's position in its row says nothing
 * about its column. Row 0 (the header) fixes the column order; on every later row a cell is
 * placed by matching the letters of its address against the header's.
 *
 * Decoding takes two passes over `sheetData`: the first validates addresses and sizes the grid,
 * the second allocates it once and fills it.
 *
 * **Cell types (`t` attribute):**
 * - `s` - shared string index
 * - `str` - formula result string, kept as a literal
 * - `inlineStr` - text in `<is><t>`, kept as a literal
 * - `b`, `e`, `d` - boolean, error and date cells, kept as literal text
 * - absent or `n` - number; a decimal point makes it a float, otherwise a 64-bit integer
 *
 * @module WorksheetParser
 */

import type { Cell, NullCell, WorksheetGrid, XlsxGridConfig } from '../types';
import { getGridError, GridErrorType, logDebug, logWarning } from '../utils/errorUtils';
import { findNode, forEachChildElement, getAttributeValue, textOf } from '../utils/xmlUtils';
import type { SharedStringTable } from './SharedStringsParser';

/** The one empty cell every unset position of a grid points at. */
export const NULL_CELL: NullCell = Object.freeze({ type: 'null' as const });

const ROW_ADDRESS = /^[1-9]\d*$/;
const COLUMN_SPAN = /^[A-Za-z]+$/;
const STRING_INDEX = /^\d+$/;
const INTEGER_TEXT = /^[+-]?\d+$/;
const FLOAT_TEXT = /^[+-]?(?:\d+\.\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

const INT64_MIN = -9223372036854775808n;
const INT64_MAX = 9223372036854775807n;

const LITERAL_TYPES = new Set(['str', 'b', 'e', 'd']);

/** Address attribute of a row, e.g. `"7"`. */
const readRowAddress = (row: Node, ordinal: number, config: XlsxGridConfig): string => {
    const address = getAttributeValue(row, 'r');
    if (address === undefined || !ROW_ADDRESS.test(address)) {
        throw getGridError(GridErrorType.FORMAT_ERROR, config, `row ${ordinal + 1} of the sheet has a missing or invalid address`);
    }
    return address;
};

/**
 * Column span of a cell: its address with the row's own address removed from the end
 * (`"B"` for `"B7"` in row `"7"`).
 */
const readColumnSpan = (cell: Node, rowAddress: string, config: XlsxGridConfig): string => {
    const address = getAttributeValue(cell, 'r');
    if (address === undefined) {
        throw getGridError(GridErrorType.FORMAT_ERROR, config, `a cell in row ${rowAddress} has no address`);
    }

    const span = address.slice(0, address.length - rowAddress.length);
    if (!address.endsWith(rowAddress) || !COLUMN_SPAN.test(span)) {
        throw getGridError(GridErrorType.FORMAT_ERROR, config, `cell '${address}' in row ${rowAddress} has an invalid address`);
    }
    return span;
};

/**
 * Pass 1. Validates every row and cell address and works out the grid size.
 * Nothing is allocated here, so a failure leaves nothing behind.
 */
const measureSheet = (sheetData: Node, config: XlsxGridConfig): { rows: number; cols: number } => {
    let rows = 0;
    let cols = 0;

    forEachChildElement(sheetData, (row, i) => {
        rows = Math.max(rows, i + 1);
        const rowAddress = readRowAddress(row, i, config);

        forEachChildElement(row, (cell, j) => {
            cols = Math.max(cols, j + 1);
            readColumnSpan(cell, rowAddress, config);
        });
    });

    return { rows, cols };
};

const allocateGrid = (rows: number, cols: number, config: XlsxGridConfig): Cell[] => {
    try {
        return new Array<Cell>(rows * cols).fill(NULL_CELL);
    } catch (e) {
        if (e instanceof RangeError) {
            throw getGridError(GridErrorType.ALLOCATION_ERROR, config, `cannot allocate a grid of ${rows} rows by ${cols} columns`);
        }
        throw e;
    }
};

const parseStringIndex = (text: string, address: string, strings: SharedStringTable, config: XlsxGridConfig): number => {
    const index = Number(text);
    if (!STRING_INDEX.test(text) || !Number.isSafeInteger(index)) {
        throw getGridError(GridErrorType.PARSE_ERROR, config, `cell '${address}' has malformed string table index '${text}'`);
    }
    if (index >= strings.count) {
        throw getGridError(GridErrorType.FORMAT_ERROR, config, `cell '${address}' refers to string ${index} but the table has ${strings.count}`);
    }
    return index;
};

const parseNumber = (text: string, address: string, config: XlsxGridConfig): Cell => {
    if (text.includes('.')) {
        if (!FLOAT_TEXT.test(text)) {
            throw getGridError(GridErrorType.PARSE_ERROR, config, `cell '${address}' has malformed float value '${text}'`);
        }
        return { type: 'float', value: Number(text) };
    }

    if (!INTEGER_TEXT.test(text)) {
        throw getGridError(GridErrorType.PARSE_ERROR, config, `cell '${address}' has malformed integer value '${text}'`);
    }
    const value = BigInt(text);
    if (value < INT64_MIN || value > INT64_MAX) {
        throw getGridError(GridErrorType.PARSE_ERROR, config, `cell '${address}' has integer value '${text}' outside the 64-bit range`);
    }
    return { type: 'integer', value };
};

/**
 * Decodes one `<c>` element into a cell.
 */
const decodeCell = (cell: Node, address: string, strings: SharedStringTable, config: XlsxGridConfig): Cell => {
    const type = getAttributeValue(cell, 't');

    if (type === 'inlineStr') {
        const text = textOf(findNode(cell, 'c.is.t.text', config));
        return text ? { type: 'literal', text } : NULL_CELL;
    }

    const value = textOf(findNode(cell, 'c.v.text', config));
    if (!value) {
        return NULL_CELL;
    }

    if (type === 's') {
        return { type: 'stringRef', index: parseStringIndex(value, address, strings, config) };
    }
    if (type === undefined || type === 'n') {
        return parseNumber(value, address, config);
    }
    if (!LITERAL_TYPES.has(type)) {
        logWarning(`Cell '${address}' has unknown type '${type}'; keeping its value as text.`, config);
    }
    return { type: 'literal', text: value };
};

/**
 * Decodes the worksheet part into a dense grid.
 *
 * @param doc - The parsed worksheet part
 * @param strings - The package's shared string table; `s` cells are checked against its size
 * @param config - Configuration
 * @returns The grid, `rows * cols` cells in row-major order
 * @throws {GridError} FORMAT_ERROR for missing sheet data, bad addresses or columns not in the header row,
 *                     PARSE_ERROR for malformed values, ALLOCATION_ERROR for a grid too large to allocate
 */
export const decodeWorksheet = (doc: Document, strings: SharedStringTable, config: XlsxGridConfig): WorksheetGrid => {
    const sheetData = findNode(doc.documentElement, 'worksheet.sheetData', config);

    if (!sheetData) {
        throw getGridError(GridErrorType.FORMAT_ERROR, config, 'worksheet has no sheet data');
    }

    const { rows, cols } = measureSheet(sheetData, config);
    logDebug(`Worksheet has ${rows} rows, ${cols} cols.`, config);

    const cells = allocateGrid(rows, cols, config);

    // Column spans of the header row, by column
    const columnSpans: string[] = [];

    try {
        forEachChildElement(sheetData, (row, i) => {
            const rowAddress = readRowAddress(row, i, config);

            forEachChildElement(row, (cell, position) => {
                const span = readColumnSpan(cell, rowAddress, config);
                let col = position;

                if (i === 0) {
                    columnSpans[position] = span;
                } else {
                    col = columnSpans.indexOf(span);
                    if (col < 0) {
                        throw getGridError(GridErrorType.FORMAT_ERROR, config, `value in row ${rowAddress} has unknown column '${span}'`);
                    }
                }

                cells[i * cols + col] = decodeCell(cell, span + rowAddress, strings, config);
            });
        });
    } catch (e) {
        // Drop every cell decoded so far, literals included, along with the grid
        cells.length = 0;
        throw e;
    }

    logDebug(`Finished reading ${rows * cols} values.`, config);
    return { rows, cols, cells };
};
