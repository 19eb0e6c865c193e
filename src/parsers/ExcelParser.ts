/**
 * Excel Spreadsheet (XLSX) Package Assembler
 *
 * **Package layout (the parts read here):**
 * - `xl/_rels/workbook.xml.rels` - relationships: which part is the worksheet, which the strings
 * - `xl/sharedStrings.xml` - shared string table
 * - `xl/worksheets/sheet1.xml` - worksheet data
 *
 * Relationship targets are relative to `xl/`:
 * ```xml
 * <Relationships xmlns="http://schemas.openxmlformats.org/package/2006/relationships">
 *   <Relationship Id="rId1" Type=".../relationships/worksheet" Target="worksheets/sheet1.xml"/>
 *   <Relationship Id="rId2" Type=".../relationships/sharedStrings" Target="sharedStrings.xml"/>
 * </Relationships>
 * ```
 *
 * Only the first worksheet is decoded.
 *
 * @module ExcelParser
 * @see https://www.ecma-international.org/publications-and-standards/standards/ecma-376/
 */

import { GridDocument } from '../GridDocument';
import type { PackageParts, XlsxGridConfig } from '../types';
import { getGridError, GridErrorType, logDebug } from '../utils/errorUtils';
import { findNode, forEachAttribute, parseXmlString, VisitAction, visitTree, xmlNodeName } from '../utils/xmlUtils';
import { ZipArchive } from '../utils/zipUtils';
import { buildStringTable } from './SharedStringsParser';
import { decodeWorksheet } from './WorksheetParser';

/** Path of the workbook relationships part. */
export const RELS_PATH = 'xl/_rels/workbook.xml.rels';

/** Directory relationship targets are relative to. */
export const PACKAGE_ROOT = 'xl/';

const PARENT_DIRECTORY = '../';

/**
 * Resolves a relationship target to an archive path.
 *
 * `worksheets/sheet1.xml` → `xl/worksheets/sheet1.xml`; one leading `../` climbs out of `xl/`
 * to the archive root; a leading `/` is already archive-absolute.
 */
export const resolvePartPath = (target: string): string => {
    if (target.startsWith('/')) return target.slice(1);
    if (target.startsWith(PARENT_DIRECTORY)) return target.slice(PARENT_DIRECTORY.length);
    return PACKAGE_ROOT + target;
};

/**
 * Finds the worksheet and shared strings parts in a parsed relationships part.
 * The first relationship of each type wins, and the scan stops once both are known.
 *
 * @param rels - The parsed `xl/_rels/workbook.xml.rels`
 * @param config - Configuration
 * @returns Archive paths of both parts
 * @throws {GridError} FORMAT_ERROR if the part is malformed or either relationship is missing
 */
export const findPackageParts = (rels: Document, config: XlsxGridConfig): PackageParts => {
    const root = findNode(rels.documentElement, 'Relationships', config);

    if (!root) {
        throw getGridError(GridErrorType.FORMAT_ERROR, config, 'package is missing relationship info');
    }

    const found: Partial<PackageParts> = {};

    visitTree(root, 0, (node) => {
        if (xmlNodeName(node) !== 'Relationship') return VisitAction.Skip;

        // Type is a URL; only its final component names the kind of part
        const relationship: { type?: string; target?: string } = {};
        forEachAttribute(node, (attr) => {
            if (attr.name === 'Type') {
                relationship.type = attr.value.slice(attr.value.lastIndexOf('/') + 1);
            } else if (attr.name === 'Target') {
                relationship.target = attr.value;
            }
            return relationship.type !== undefined && relationship.target !== undefined ? VisitAction.Abort : undefined;
        });

        const { type, target } = relationship;
        if (!type || !target) {
            throw getGridError(GridErrorType.FORMAT_ERROR, config, 'a relationship is missing its Type or Target');
        }

        logDebug(`Package has part of type '${type}' at '${target}'.`, config);

        if (type === 'worksheet' && found.worksheet === undefined) {
            found.worksheet = resolvePartPath(target);
        } else if (type === 'sharedStrings' && found.sharedStrings === undefined) {
            found.sharedStrings = resolvePartPath(target);
        }

        return found.worksheet !== undefined && found.sharedStrings !== undefined ? VisitAction.Abort : VisitAction.Skip;
    }, config);

    const { worksheet, sharedStrings } = found;
    if (!worksheet || !sharedStrings) {
        throw getGridError(GridErrorType.FORMAT_ERROR, config, 'package is missing its worksheet and/or shared strings');
    }
    return { worksheet, sharedStrings };
};

/**
 * Reads one part from the archive and parses it.
 * @throws {GridError} IO_ERROR if the entry cannot be read, FORMAT_ERROR if it is not XML
 */
const readPart = async (archive: ZipArchive, path: string, config: XlsxGridConfig): Promise<Document> => {
    let content: Buffer;
    try {
        content = await archive.readEntry(path);
    } catch (e) {
        throw getGridError(GridErrorType.IO_ERROR, config, e instanceof Error ? e.message : String(e));
    }
    return parseXmlString(content.toString('utf8').replace(/^\uFEFF/, ''), config, path);
};

/**
 * Decodes an Excel spreadsheet (.xlsx) into a grid document.
 *
 * @param buffer - The XLSX file as a Buffer
 * @param config - Configuration
 * @returns A promise resolving to the decoded document
 */
export const parseExcel = async (buffer: Buffer, config: Required<XlsxGridConfig>): Promise<GridDocument> => {
    const archive = await ZipArchive.open(buffer);

    try {
        const rels = await readPart(archive, RELS_PATH, config);
        const parts = findPackageParts(rels, config);

        const strings = buildStringTable(await readPart(archive, parts.sharedStrings, config), config);

        try {
            const grid = decodeWorksheet(await readPart(archive, parts.worksheet, config), strings, config);
            return new GridDocument(grid, strings, config);
        } catch (e) {
            strings.release();
            throw e;
        }
    } finally {
        archive.close();
    }
};
