/**
 * ZIP Archive Access
 *
 * An `.xlsx` file is a ZIP archive of XML parts (`xl/workbook.xml`, `xl/worksheets/sheet1.xml`,
 * `xl/sharedStrings.xml`, `xl/_rels/workbook.xml.rels`, ...). The package assembler only ever
 * needs a handful of them, by name, so the archive is opened once, its central directory is
 * indexed, and entries are inflated on request.
 *
 * @module zipUtils
 */

import yauzl from 'yauzl';
import concat from 'concat-stream';

/**
 * An open ZIP archive whose entries can be read by name.
 *
 * @example
 * ```typescript
 * const archive = await ZipArchive.open(buffer);
 * try {
 *     const rels = await archive.readEntry('xl/_rels/workbook.xml.rels');
 * } finally {
 *     archive.close();
 * }
 * ```
 */
export class ZipArchive {
    private constructor(
        private readonly zipfile: yauzl.ZipFile,
        private readonly entries: Map<string, yauzl.Entry>
    ) {}

    /**
     * Opens a ZIP archive held in memory and indexes its file entries.
     * Directory entries are left out; if a name appears twice, the first entry wins.
     *
     * @param zipInput - The ZIP file as a Node.js Buffer
     * @throws {Error} If the buffer is not a readable ZIP archive
     */
    static open(zipInput: Buffer): Promise<ZipArchive> {
        return new Promise((resolve, reject) => {
            // lazyEntries: we drive iteration with readEntry(); autoClose off so entries stay readable afterwards
            yauzl.fromBuffer(zipInput, { lazyEntries: true, autoClose: false }, (err, zipfile) => {
                if (err) return reject(err);
                if (!zipfile) return reject(new Error("Failed to open zip file"));

                const entries = new Map<string, yauzl.Entry>();

                zipfile.on('entry', (entry: yauzl.Entry) => {
                    if (!entry.fileName.endsWith('/') && !entries.has(entry.fileName)) {
                        entries.set(entry.fileName, entry);
                    }
                    zipfile.readEntry();
                });
                zipfile.on('end', () => resolve(new ZipArchive(zipfile, entries)));
                zipfile.on('error', reject);

                zipfile.readEntry();
            });
        });
    }

    /**
     * Reads and inflates one entry.
     *
     * @param name - Path of the entry inside the archive, e.g. `"xl/sharedStrings.xml"`
     * @returns The uncompressed entry content
     * @throws {Error} If the entry does not exist, the archive is closed, or the data is corrupt
     */
    readEntry(name: string): Promise<Buffer> {
        return new Promise((resolve, reject) => {
            const entry = this.entries.get(name);
            if (!entry) return reject(new Error(`Zip archive is missing entry '${name}'`));
            if (!this.zipfile.isOpen) return reject(new Error(`Zip archive is closed; cannot read '${name}'`));

            this.zipfile.openReadStream(entry, (err, readStream) => {
                if (err) return reject(err);
                if (!readStream) return reject(new Error("Failed to open read stream"));

                readStream.on('error', reject);
                // encoding 'buffer' so an empty entry still yields a Buffer
                readStream.pipe(concat({ encoding: 'buffer' }, (data: Buffer) => resolve(data)));
            });
        });
    }

    /** Closes the archive. Safe to call more than once. */
    close(): void {
        if (this.zipfile.isOpen) {
            this.zipfile.close();
        }
    }
}
