/**
 * Configuration options for XlsxGrid.
 */
export interface XlsxGridConfig {
    /**
     * Flag to show all the logs to console in case of an error irrespective of your own handling.
     * Also enables warnings for tolerated problems, such as a malformed shared string entry.
     * Default is false.
     */
    outputErrorToConsole?: boolean;
    /**
     * Flag to print progress information (relationship targets, string count, grid size).
     * Default is false.
     */
    debug?: boolean;
    /**
     * The delimiter placed between rows by `GridDocument.toText()`.
     * Default is \n.
     */
    newlineDelimiter?: string;
}

/**
 * Kinds of cell in a decoded grid.
 */
export type CellType = 'null' | 'stringRef' | 'literal' | 'integer' | 'float';

/** A position with no value, either omitted from its row or with an empty value node. */
export interface NullCell {
    readonly type: 'null';
}

/**
 * A reference into the shared string table.
 * Resolve it with `GridDocument.resolveStringRef(cell.index)`.
 */
export interface StringRefCell {
    readonly type: 'stringRef';
    readonly index: number;
}

/**
 * A string stored in the cell itself (`t="str"`, `t="inlineStr"` and other textual types).
 */
export interface LiteralCell {
    readonly type: 'literal';
    readonly text: string;
}

/** A whole number. Cells hold signed 64-bit values, so this is a bigint. */
export interface IntegerCell {
    readonly type: 'integer';
    readonly value: bigint;
}

/** A number written with a decimal point. */
export interface FloatCell {
    readonly type: 'float';
    readonly value: number;
}

/**
 * A single decoded cell. Narrow on `type`.
 *
 * @example
 * ```typescript
 * if (cell.type === 'stringRef') {
 *     console.log(doc.resolveStringRef(cell.index));
 * }
 * ```
 */
export type Cell = NullCell | StringRefCell | LiteralCell | IntegerCell | FloatCell;

/** The plain value of a cell once string references are resolved. */
export type CellValue = string | bigint | number | null;

/**
 * Result of decoding a worksheet part: the dense, row-major grid and its dimensions.
 * `cells.length === rows * cols`.
 */
export interface WorksheetGrid {
    rows: number;
    cols: number;
    cells: Cell[];
}

/**
 * Relationship targets the package assembler needs, as found in `xl/_rels/workbook.xml.rels`.
 */
export interface PackageParts {
    /** Archive path of the first worksheet part. */
    worksheet: string;
    /** Archive path of the shared strings part. */
    sharedStrings: string;
}
