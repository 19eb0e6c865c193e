/**
 * Error Handling Utilities
 *
 * This module provides centralized error management for XlsxGrid.
 * It defines the error taxonomy, messages, and logging so that every stage of a decode
 * (archive access, relationships, string table, worksheet grid) reports failures the same way.
 *
 * Every error is fatal to the current decode and is thrown as a {@link GridError};
 * callers tell failures apart by `error.type`.
 */

import type { XlsxGridConfig } from '../types';

/** Error header prefix for all error and log messages */
const ERRORHEADER = "[XlsxGrid]: ";

/**
 * Standard error types for XlsxGrid.
 */
export enum GridErrorType {
    /** The archive could not be opened, or one of its entries could not be read */
    IO_ERROR = 'IO_ERROR',
    /** The package is structurally wrong: missing parts, bad addresses, inconsistent counts */
    FORMAT_ERROR = 'FORMAT_ERROR',
    /** A number or string index did not parse fully as the expected type */
    PARSE_ERROR = 'PARSE_ERROR',
    /** The grid is larger than the runtime can allocate */
    ALLOCATION_ERROR = 'ALLOCATION_ERROR',
    /** Arguments passed to the function are missing or invalid */
    IMPROPER_ARGUMENTS = 'IMPROPER_ARGUMENTS',
    /** A released document was read */
    DOCUMENT_RELEASED = 'DOCUMENT_RELEASED'
}

/** Lookup table for error messages. Each entry builds the message from a detail string. */
const ERROR_MESSAGES: Record<GridErrorType, (detail: string) => string> = {
    [GridErrorType.IO_ERROR]: (detail) => `Could not read the spreadsheet package: ${detail}`,
    [GridErrorType.FORMAT_ERROR]: (detail) => `Malformed spreadsheet package: ${detail}`,
    [GridErrorType.PARSE_ERROR]: (detail) => `Malformed cell value: ${detail}`,
    [GridErrorType.ALLOCATION_ERROR]: (detail) => `Out of memory while decoding: ${detail}`,
    [GridErrorType.IMPROPER_ARGUMENTS]: (detail) => `Improper arguments${detail ? `: ${detail}` : ''}`,
    [GridErrorType.DOCUMENT_RELEASED]: (detail) => `The document has been released and can no longer be read${detail ? ` (${detail})` : ''}`
};

/**
 * Error thrown by every XlsxGrid operation.
 */
export class GridError extends Error {
    /** The kind of failure. */
    public readonly type: GridErrorType;

    constructor(type: GridErrorType, message: string) {
        super(message);
        this.name = 'GridError';
        this.type = type;
    }
}

/**
 * Type guard for errors raised by this library.
 */
export const isGridError = (error: unknown): error is GridError => error instanceof GridError;

/**
 * Creates, optionally logs to console, and returns a formatted XlsxGrid error.
 *
 * @param type - The type of error
 * @param config - Configuration (checks outputErrorToConsole)
 * @param detail - What went wrong, e.g. the offending part or cell address
 * @returns The GridError to be thrown
 */
export const getGridError = (type: GridErrorType, config: XlsxGridConfig, detail = ''): GridError => {
    const message = ERRORHEADER + ERROR_MESSAGES[type](detail);
    if (config.outputErrorToConsole) {
        console.error(message);
    }
    return new GridError(type, message);
};

/**
 * Wraps an error raised underneath XlsxGrid (by the zip reader, the file system, ...)
 * as an IO_ERROR, keeping GridErrors as they are.
 * Zip corruption messages are replaced with a message naming the file when one is known.
 *
 * @param error - The original error object
 * @param config - Configuration
 * @param filePath - Optional file path for context
 * @returns The GridError to be thrown
 */
export const getWrappedError = (error: unknown, config: XlsxGridConfig, filePath?: string): GridError => {
    if (isGridError(error)) {
        return error;
    }

    let message = error instanceof Error ? error.message : String(error);

    // Detect file corruption from common zip reader error messages
    if (filePath && (
        message.includes('end of central directory record') ||
        message.includes('invalid central directory') ||
        message.includes('invalid local file header') ||
        message.includes('invalid distance too far back')
    )) {
        message = `${filePath} seems to be corrupted (${message})`;
    }

    return getGridError(GridErrorType.IO_ERROR, config, message);
};

/**
 * Conditionally logs a warning message to the console.
 * Used for non-fatal problems that shouldn't stop the decode.
 *
 * @param message - The warning message
 * @param config - Configuration
 * @param error - Optional original error object for more context
 */
export const logWarning = (message: string, config: XlsxGridConfig, error?: unknown): void => {
    if (config.outputErrorToConsole) {
        if (error) {
            console.warn(ERRORHEADER + message, error);
        } else {
            console.warn(ERRORHEADER + message);
        }
    }
};

/**
 * Conditionally logs progress information to the console.
 *
 * @param message - The message
 * @param config - Configuration (checks debug)
 */
export const logDebug = (message: string, config: XlsxGridConfig): void => {
    if (config.debug) {
        console.log(ERRORHEADER + message);
    }
};
