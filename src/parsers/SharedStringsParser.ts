/**
 * Shared String Table (xl/sharedStrings.xml)
 *
 * Cells of type `s` do not hold their text; they hold an index into this table:
 *
 * ```xml
 * <sst count="3" uniqueCount="2">
 *   <si><t>name</t></si>
 *   <si><t>age</t></si>
 * </sst>
 * ```
 *
 * The table does not copy the strings. Each entry is the text node of the parsed part, so the
 * table keeps the parsed document alive for as long as it is in use and lets go of it on
 * {@link SharedStringTable.release}.
 *
 * @module SharedStringsParser
 */

import type { XlsxGridConfig } from '../types';
import { getGridError, GridErrorType, logDebug, logWarning } from '../utils/errorUtils';
import { findNode, forEachChildElement, getAttributeValue, isTextNode } from '../utils/xmlUtils';

const DECIMAL_COUNT = /^\d+$/;

/**
 * Indexed, deduplicated strings of a package.
 * A `null` entry is a malformed source entry that was tolerated.
 */
export class SharedStringTable {
    private entries: (CharacterData | null)[];
    private tree: Document | null;
    private readonly size: number;

    /**
     * @param entries - One slot per entry present in the part; text nodes belonging to `tree`
     * @param tree - The parsed strings part the entries live in
     * @param size - The declared number of indices; indices past the present entries read as empty
     */
    constructor(entries: (CharacterData | null)[], tree: Document, size: number = entries.length) {
        this.entries = entries;
        this.tree = tree;
        this.size = Math.max(size, entries.length);
    }

    /** Number of addressable indices, whether or not each holds a value. */
    get count(): number {
        return this.size;
    }

    get isReleased(): boolean {
        return this.tree === null;
    }

    /**
     * Text at `index`, read from the backing tree.
     * Undefined when the index is out of range, the entry was malformed or absent, or the table is released.
     */
    get(index: number): string | undefined {
        if (!Number.isInteger(index) || index < 0 || index >= this.size) return undefined;
        const entry = this.entries[index];
        return entry ? entry.data : undefined;
    }

    /** Drops every entry and the reference to the backing tree. */
    release(): void {
        this.entries = [];
        this.tree = null;
    }
}

/**
 * Size declared by the `count` attribute of the `<sst>` root, if it is a plain decimal.
 */
const declaredCount = (table: Node): number | undefined => {
    const value = getAttributeValue(table, 'count');
    if (value === undefined || !DECIMAL_COUNT.test(value)) return undefined;

    const count = Number(value);
    return Number.isSafeInteger(count) ? count : undefined;
};

const countEntries = (table: Node): number => {
    let count = 0;
    forEachChildElement(table, () => {
        count++;
    });
    return count;
};

/**
 * Builds the shared string table from a parsed `xl/sharedStrings.xml`.
 *
 * The entries are counted before any is kept, so a part holding more of them than its `count`
 * declares is rejected up front. Only the entries actually present take up space; indices past
 * them, up to the declared count, read as empty. An entry without text is logged and left empty.
 *
 * @param doc - The parsed strings part. The returned table holds on to it.
 * @param config - Configuration
 * @returns The table
 * @throws {GridError} FORMAT_ERROR if the root is not `<sst>` or there are more entries than declared
 */
export const buildStringTable = (doc: Document, config: XlsxGridConfig): SharedStringTable => {
    const table = findNode(doc.documentElement, 'sst', config);

    if (!table) {
        throw getGridError(GridErrorType.FORMAT_ERROR, config, 'shared strings part has no <sst> root');
    }

    const present = countEntries(table);
    let declared = declaredCount(table);
    if (declared === undefined) {
        logWarning('Shared strings part does not declare its size; counting entries.', config);
        declared = present;
    }

    if (present > declared) {
        throw getGridError(GridErrorType.FORMAT_ERROR, config, `shared strings part has more strings than the ${declared} it declares`);
    }

    const entries: (CharacterData | null)[] = [];
    forEachChildElement(table, (node, index) => {
        const text = findNode(node, 'si.t.text', config);
        if (!text || !isTextNode(text)) {
            logWarning(`Shared string entry ${index} is invalid; leaving it empty.`, config);
            entries.push(null);
            return;
        }
        entries.push(text);
    });

    logDebug(`Read ${declared} strings from shared strings part.`, config);
    return new SharedStringTable(entries, doc, declared);
};
