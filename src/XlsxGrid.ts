/**
 * XlsxGrid - Main Entry Point
 *
 * This module provides the main `XlsxGrid` class with a single static method that reads an
 * `.xlsx` package from a path or from memory and decodes its first worksheet into a
 * {@link GridDocument}.
 *
 * **Usage:**
 * ```typescript
 * import { XlsxGrid } from 'xlsx-grid';
 *
 * // From a file path
 * const doc = await XlsxGrid.readGrid('people.xlsx');
 *
 * // From a Buffer
 * const doc = await XlsxGrid.readGrid(fs.readFileSync('people.xlsx'), { outputErrorToConsole: true });
 *
 * console.log(doc.rowCount(), doc.colCount());
 * console.log(doc.toText());
 * doc.release();
 * ```
 *
 * @module XlsxGrid
 */

import * as fileType from 'file-type';
import * as fs from 'fs';
import * as path from 'path';
import type { GridDocument } from './GridDocument';
import { parseExcel } from './parsers/ExcelParser';
import type { XlsxGridConfig } from './types';
import { getGridError, getWrappedError, GridErrorType } from './utils/errorUtils';

/** Extensions accepted for a file path. */
const SUPPORTED_EXTENSIONS = ['xlsx', 'xlsm'];

/** Sniffed types accepted for a buffer. A plain zip is let through and checked by its parts. */
const SUPPORTED_BUFFER_TYPES = ['xlsx', 'zip'];

/**
 * Main reader class.
 */
export class XlsxGrid {
    /**
     * Reads an `.xlsx` package and decodes its first worksheet.
     *
     * **Input detection:**
     * - A file path must name an existing `.xlsx` / `.xlsm` file
     * - A Buffer or ArrayBuffer is sniffed by its magic bytes (file-type library)
     *
     * @param file - File path (string), Buffer, or ArrayBuffer containing the package
     * @param config - Optional configuration object (defaults applied for all omitted options)
     * @returns A promise resolving to the decoded document
     * @throws {GridError} On any failure; `error.type` tells which kind
     */
    public static async readGrid(file: string | Buffer | ArrayBuffer, config: XlsxGridConfig = {}): Promise<GridDocument> {
        const internalConfig: Required<XlsxGridConfig> = {
            outputErrorToConsole: false,
            debug: false,
            newlineDelimiter: '\n',
            ...config
        };

        let buffer: Buffer;
        let ext = '';
        let filePath: string | undefined;

        try {
            if (!file) {
                throw getGridError(GridErrorType.IMPROPER_ARGUMENTS, internalConfig, 'no file given');
            }

            if (file instanceof ArrayBuffer) {
                buffer = Buffer.from(file);
            } else if (Buffer.isBuffer(file)) {
                buffer = file;
            } else if (typeof file === 'string') {
                filePath = file;
                if (!fs.existsSync(file)) {
                    throw getGridError(GridErrorType.IO_ERROR, internalConfig, `file ${file} could not be found`);
                }
                if (fs.lstatSync(file).isDirectory()) {
                    throw getGridError(GridErrorType.IO_ERROR, internalConfig, `${file} is a directory`);
                }
                ext = path.extname(file).slice(1).toLowerCase();
                if (ext && !SUPPORTED_EXTENSIONS.includes(ext)) {
                    throw getGridError(GridErrorType.FORMAT_ERROR, internalConfig, `unsupported file extension '${ext}'`);
                }
                buffer = fs.readFileSync(file);
            } else {
                throw getGridError(GridErrorType.IMPROPER_ARGUMENTS, internalConfig, 'expected a file path, Buffer or ArrayBuffer');
            }

            if (!ext) {
                const type = await fileType.fromBuffer(buffer);
                if (!type) {
                    throw getGridError(GridErrorType.IO_ERROR, internalConfig, 'could not determine the file type of the given buffer');
                }
                if (!SUPPORTED_BUFFER_TYPES.includes(type.ext)) {
                    throw getGridError(GridErrorType.FORMAT_ERROR, internalConfig, `unsupported file type '${type.ext}'`);
                }
            }

            return await parseExcel(buffer, internalConfig);
        } catch (error) {
            throw getWrappedError(error, internalConfig, filePath);
        }
    }
}
