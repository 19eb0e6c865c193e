/**
 * In-memory `.xlsx` packages for tests: XML builders for the parts the decoder reads, zipped
 * with JSZip.
 */

import JSZip from 'jszip';
import { GridError } from '../utils/errorUtils';

export interface ZipFixtureEntry {
    name: string;
    content: string;
}

/**
 * Zips the entries, in order, with deflate compression and no directory entries.
 */
export const zipPackage = async (entries: ZipFixtureEntry[]): Promise<Buffer> => {
    const zip = new JSZip();
    for (const entry of entries) {
        zip.file(entry.name, entry.content, { createFolders: false });
    }
    return zip.generateAsync({ type: 'nodebuffer', compression: 'DEFLATE' });
};

const escapeXml = (text: string): string =>
    text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');

const RELATIONSHIP_TYPE = 'http://schemas.openxmlformats.org/officeDocument/2006/relationships/';

export interface RelationshipFixture {
    type: string;
    target: string;
}

export const relsXml = (relationships: RelationshipFixture[]): string =>
    '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>\n' +
    '<Relationships xmlns="http://schemas.openxmlformats.org/package/2006/relationships">' +
    relationships.map((rel, i) =>
        `<Relationship Id="rId${i + 1}" Type="${RELATIONSHIP_TYPE}${rel.type}" Target="${rel.target}"/>`
    ).join('') +
    '</Relationships>';

export const sharedStringsXml = (strings: string[]): string =>
    '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>\n' +
    `<sst xmlns="http://schemas.openxmlformats.org/spreadsheetml/2006/main" count="${strings.length}" uniqueCount="${strings.length}">` +
    strings.map(s => `<si><t>${escapeXml(s)}</t></si>`).join('') +
    '</sst>';

/** A worksheet part around the given `<row>` elements. */
export const worksheetXml = (rows: string): string =>
    '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>\n' +
    '<worksheet xmlns="http://schemas.openxmlformats.org/spreadsheetml/2006/main">' +
    `<sheetData>${rows}</sheetData>` +
    '</worksheet>';

/** Header row of `name` and `age`, then Alice, 30. */
export const PEOPLE_STRINGS = ['name', 'age', 'Alice'];
export const PEOPLE_ROWS =
    '<row r="1"><c r="A1" t="s"><v>0</v></c><c r="B1" t="s"><v>1</v></c></row>' +
    '<row r="2"><c r="A2" t="s"><v>2</v></c><c r="B2"><v>30</v></c></row>';

const CONTENT_TYPES =
    '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>\n' +
    '<Types xmlns="http://schemas.openxmlformats.org/package/2006/content-types">' +
    '<Default Extension="xml" ContentType="application/xml"/>' +
    '</Types>';

export const DEFAULT_RELATIONSHIPS: RelationshipFixture[] = [
    { type: 'worksheet', target: 'worksheets/sheet1.xml' },
    { type: 'sharedStrings', target: 'sharedStrings.xml' }
];

export interface PackageFixture {
    relationships?: RelationshipFixture[];
    strings?: string[];
    rows?: string;
    /** Entries written as given, after the standard parts. */
    extra?: ZipFixtureEntry[];
    /** Standard parts to leave out, by archive path. */
    omit?: string[];
}

/**
 * An `.xlsx` package. Defaults to the people sheet with its parts at the usual paths.
 */
export const workbookPackage = async (fixture: PackageFixture = {}): Promise<Buffer> => {
    const omit = fixture.omit ?? [];
    const entries: ZipFixtureEntry[] = [
        { name: '[Content_Types].xml', content: CONTENT_TYPES },
        { name: 'xl/_rels/workbook.xml.rels', content: relsXml(fixture.relationships ?? DEFAULT_RELATIONSHIPS) },
        { name: 'xl/sharedStrings.xml', content: sharedStringsXml(fixture.strings ?? PEOPLE_STRINGS) },
        { name: 'xl/worksheets/sheet1.xml', content: worksheetXml(fixture.rows ?? PEOPLE_ROWS) }
    ].filter(entry => !omit.includes(entry.name));

    return zipPackage([...entries, ...(fixture.extra ?? [])]);
};

/** Runs `fn` and returns the GridError it throws. */
export const gridErrorOf = (fn: () => unknown): GridError => {
    try {
        fn();
    } catch (e) {
        if (e instanceof GridError) return e;
        throw e;
    }
    throw new Error('expected a GridError to be thrown');
};

/** Awaits `promise` and returns the GridError it rejects with. */
export const rejectionOf = async (promise: Promise<unknown>): Promise<GridError> => {
    try {
        await promise;
    } catch (e) {
        if (e instanceof GridError) return e;
        throw e;
    }
    throw new Error('expected a GridError rejection');
};
