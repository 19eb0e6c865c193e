import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterAll, afterEach, beforeAll, describe, expect, it, vi } from 'vitest';
import { rejectionOf, relsXml, zipPackage, worksheetXml, workbookPackage, PEOPLE_ROWS } from './__fixtures__/workbook';
import { GridErrorType } from './utils/errorUtils';
import { XlsxGrid } from './XlsxGrid';
import DefaultExport, { readGrid } from './index';

const PEOPLE_TEXT = 'name\tage\nAlice\t30';

describe('XlsxGrid.readGrid', () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    describe('from memory', () => {
        it('decodes a Buffer', async () => {
            const doc = await XlsxGrid.readGrid(await workbookPackage());
            expect(doc.rowCount()).toBe(2);
            expect(doc.colCount()).toBe(2);
            expect(doc.toText()).toBe(PEOPLE_TEXT);
            doc.release();
        });

        it('decodes an ArrayBuffer', async () => {
            const bytes = await workbookPackage();
            const arrayBuffer = new ArrayBuffer(bytes.length);
            new Uint8Array(arrayBuffer).set(bytes);
            expect((await XlsxGrid.readGrid(arrayBuffer)).toText()).toBe(PEOPLE_TEXT);
        });

        it('is exported as readGrid and as the default export', async () => {
            expect((await readGrid(await workbookPackage())).toText()).toBe(PEOPLE_TEXT);
            expect(DefaultExport).toBe(XlsxGrid);
        });

        it('rejects a missing file argument', async () => {
            const error = await rejectionOf(XlsxGrid.readGrid(''));
            expect(error.type).toBe(GridErrorType.IMPROPER_ARGUMENTS);
            expect(error.message).toBe('[XlsxGrid]: Improper arguments: no file given');
        });

        it('rejects a buffer of another file type', async () => {
            const gif = Buffer.concat([Buffer.from('GIF89a', 'latin1'), Buffer.alloc(16)]);
            const error = await rejectionOf(XlsxGrid.readGrid(gif));
            expect(error.type).toBe(GridErrorType.FORMAT_ERROR);
            expect(error.message).toBe("[XlsxGrid]: Malformed spreadsheet package: unsupported file type 'gif'");
        });

        it('rejects a buffer whose type cannot be told', async () => {
            const error = await rejectionOf(XlsxGrid.readGrid(Buffer.from('this is plain text, not a package')));
            expect(error.type).toBe(GridErrorType.IO_ERROR);
        });

        it('rejects a corrupt archive', async () => {
            const corrupt = Buffer.concat([Buffer.from([0x50, 0x4b, 0x03, 0x04]), Buffer.alloc(60)]);
            expect((await rejectionOf(XlsxGrid.readGrid(corrupt))).type).toBe(GridErrorType.IO_ERROR);
        });

        it('logs errors when asked to', async () => {
            const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
            await rejectionOf(XlsxGrid.readGrid('', { outputErrorToConsole: true }));
            expect(error).toHaveBeenCalledWith('[XlsxGrid]: Improper arguments: no file given');
        });

        it('logs progress in debug mode', async () => {
            const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
            await XlsxGrid.readGrid(await workbookPackage(), { debug: true });
            expect(log).toHaveBeenCalledWith("[XlsxGrid]: Package has part of type 'worksheet' at 'worksheets/sheet1.xml'.");
            expect(log).toHaveBeenCalledWith('[XlsxGrid]: Read 3 strings from shared strings part.');
            expect(log).toHaveBeenCalledWith('[XlsxGrid]: Worksheet has 2 rows, 2 cols.');
        });
    });

    describe('package relationships', () => {
        it('resolves a target that climbs out of xl/', async () => {
            const buffer = await workbookPackage({
                relationships: [
                    { type: 'worksheet', target: '../sheets/data.xml' },
                    { type: 'sharedStrings', target: 'sharedStrings.xml' }
                ],
                omit: ['xl/worksheets/sheet1.xml'],
                extra: [{ name: 'sheets/data.xml', content: worksheetXml(PEOPLE_ROWS) }]
            });
            expect((await XlsxGrid.readGrid(buffer)).toText()).toBe(PEOPLE_TEXT);
        });

        it('resolves a package-absolute target', async () => {
            const buffer = await workbookPackage({
                relationships: [
                    { type: 'sharedStrings', target: '/xl/sharedStrings.xml' },
                    { type: 'worksheet', target: '/xl/worksheets/sheet1.xml' }
                ]
            });
            expect((await XlsxGrid.readGrid(buffer)).toText()).toBe(PEOPLE_TEXT);
        });

        it('ignores other parts and takes the first worksheet', async () => {
            const buffer = await workbookPackage({
                relationships: [
                    { type: 'styles', target: 'styles.xml' },
                    { type: 'worksheet', target: 'worksheets/sheet1.xml' },
                    { type: 'worksheet', target: 'worksheets/sheet2.xml' },
                    { type: 'sharedStrings', target: 'sharedStrings.xml' }
                ],
                extra: [{ name: 'xl/worksheets/sheet2.xml', content: worksheetXml('<row r="1"><c r="A1"><v>1</v></c></row>') }]
            });
            expect((await XlsxGrid.readGrid(buffer)).toText()).toBe(PEOPLE_TEXT);
        });

        it('rejects a package without a shared strings relationship', async () => {
            const buffer = await workbookPackage({ relationships: [{ type: 'worksheet', target: 'worksheets/sheet1.xml' }] });
            const error = await rejectionOf(XlsxGrid.readGrid(buffer));
            expect(error.type).toBe(GridErrorType.FORMAT_ERROR);
            expect(error.message).toBe('[XlsxGrid]: Malformed spreadsheet package: package is missing its worksheet and/or shared strings');
        });

        it('rejects a relationship without a target', async () => {
            const buffer = await workbookPackage({
                omit: ['xl/_rels/workbook.xml.rels'],
                extra: [{
                    name: 'xl/_rels/workbook.xml.rels',
                    content: '<Relationships><Relationship Id="rId1" Type="http://example.test/relationships/worksheet"/></Relationships>'
                }]
            });
            const error = await rejectionOf(XlsxGrid.readGrid(buffer));
            expect(error.type).toBe(GridErrorType.FORMAT_ERROR);
            expect(error.message).toBe('[XlsxGrid]: Malformed spreadsheet package: a relationship is missing its Type or Target');
        });

        it('rejects relationships without a <Relationships> root', async () => {
            const buffer = await workbookPackage({
                omit: ['xl/_rels/workbook.xml.rels'],
                extra: [{ name: 'xl/_rels/workbook.xml.rels', content: '<Types/>' }]
            });
            const error = await rejectionOf(XlsxGrid.readGrid(buffer));
            expect(error.message).toBe('[XlsxGrid]: Malformed spreadsheet package: package is missing relationship info');
        });

        it('rejects a package without relationships', async () => {
            const error = await rejectionOf(XlsxGrid.readGrid(await workbookPackage({ omit: ['xl/_rels/workbook.xml.rels'] })));
            expect(error.type).toBe(GridErrorType.IO_ERROR);
            expect(error.message).toBe("[XlsxGrid]: Could not read the spreadsheet package: Zip archive is missing entry 'xl/_rels/workbook.xml.rels'");
        });

        it('rejects a relationship to a part the archive does not have', async () => {
            const buffer = await workbookPackage({
                relationships: [
                    { type: 'worksheet', target: 'worksheets/sheet9.xml' },
                    { type: 'sharedStrings', target: 'sharedStrings.xml' }
                ]
            });
            const error = await rejectionOf(XlsxGrid.readGrid(buffer));
            expect(error.type).toBe(GridErrorType.IO_ERROR);
            expect(error.message).toBe("[XlsxGrid]: Could not read the spreadsheet package: Zip archive is missing entry 'xl/worksheets/sheet9.xml'");
        });

        it('decodes an indented package without strings or rows to an empty grid', async () => {
            const buffer = await workbookPackage({
                rows: '\n    ',
                omit: ['xl/sharedStrings.xml'],
                extra: [{ name: 'xl/sharedStrings.xml', content: '<sst count="0" uniqueCount="0">\n</sst>' }]
            });
            const doc = await XlsxGrid.readGrid(buffer);
            expect(doc.rowCount()).toBe(0);
            expect(doc.colCount()).toBe(0);
        });

        it('passes decode errors through', async () => {
            const buffer = await workbookPackage({ rows: '<row r="1"><c r="A1"><v>12x</v></c></row>' });
            expect((await rejectionOf(XlsxGrid.readGrid(buffer))).type).toBe(GridErrorType.PARSE_ERROR);
        });

        it('rejects a shared strings part with more strings than it declares', async () => {
            const buffer = await workbookPackage({
                omit: ['xl/sharedStrings.xml'],
                extra: [{
                    name: 'xl/sharedStrings.xml',
                    content: '<sst count="3"><si><t>name</t></si><si><t>age</t></si><si><t>Alice</t></si><si><t>Bob</t></si></sst>'
                }]
            });
            const error = await rejectionOf(XlsxGrid.readGrid(buffer));
            expect(error.type).toBe(GridErrorType.FORMAT_ERROR);
            expect(error.message).toBe('[XlsxGrid]: Malformed spreadsheet package: shared strings part has more strings than the 3 it declares');
        });

        it('rejects a shared strings part that is not XML', async () => {
            const buffer = await zipPackage([
                { name: 'xl/_rels/workbook.xml.rels', content: relsXml([
                    { type: 'worksheet', target: 'worksheets/sheet1.xml' },
                    { type: 'sharedStrings', target: 'sharedStrings.xml' }
                ]) },
                { name: 'xl/sharedStrings.xml', content: 'not xml' },
                { name: 'xl/worksheets/sheet1.xml', content: worksheetXml(PEOPLE_ROWS) }
            ]);
            expect((await rejectionOf(XlsxGrid.readGrid(buffer))).type).toBe(GridErrorType.FORMAT_ERROR);
        });
    });

    describe('from a file path', () => {
        let dir: string;

        beforeAll(async () => {
            dir = fs.mkdtempSync(path.join(os.tmpdir(), 'xlsx-grid-'));
            fs.writeFileSync(path.join(dir, 'people.xlsx'), await workbookPackage());
            fs.writeFileSync(path.join(dir, 'people.XLSM'), await workbookPackage());
            fs.writeFileSync(path.join(dir, 'people'), await workbookPackage());
            fs.writeFileSync(path.join(dir, 'notes.csv'), 'name,age\n');
            fs.writeFileSync(path.join(dir, 'broken.xlsx'), 'not a zip archive');
        });

        afterAll(() => {
            fs.rmSync(dir, { recursive: true, force: true });
        });

        it('decodes an .xlsx file', async () => {
            expect((await XlsxGrid.readGrid(path.join(dir, 'people.xlsx'))).toText()).toBe(PEOPLE_TEXT);
        });

        it('accepts the extension in any case', async () => {
            expect((await XlsxGrid.readGrid(path.join(dir, 'people.XLSM'))).toText()).toBe(PEOPLE_TEXT);
        });

        it('sniffs a file without an extension', async () => {
            expect((await XlsxGrid.readGrid(path.join(dir, 'people'))).toText()).toBe(PEOPLE_TEXT);
        });

        it('rejects another extension', async () => {
            const error = await rejectionOf(XlsxGrid.readGrid(path.join(dir, 'notes.csv')));
            expect(error.type).toBe(GridErrorType.FORMAT_ERROR);
            expect(error.message).toBe("[XlsxGrid]: Malformed spreadsheet package: unsupported file extension 'csv'");
        });

        it('rejects a path that does not exist', async () => {
            const missing = path.join(dir, 'missing.xlsx');
            const error = await rejectionOf(XlsxGrid.readGrid(missing));
            expect(error.type).toBe(GridErrorType.IO_ERROR);
            expect(error.message).toBe(`[XlsxGrid]: Could not read the spreadsheet package: file ${missing} could not be found`);
        });

        it('rejects a directory', async () => {
            const error = await rejectionOf(XlsxGrid.readGrid(dir));
            expect(error.type).toBe(GridErrorType.IO_ERROR);
            expect(error.message).toBe(`[XlsxGrid]: Could not read the spreadsheet package: ${dir} is a directory`);
        });

        it('names a corrupt file in the error', async () => {
            const broken = path.join(dir, 'broken.xlsx');
            const error = await rejectionOf(XlsxGrid.readGrid(broken));
            expect(error.type).toBe(GridErrorType.IO_ERROR);
            expect(error.message).toContain(`${broken} seems to be corrupted`);
        });
    });
});
