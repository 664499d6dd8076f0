/**
 * @module
 * Zip archives as file trees.
 */
import {
    normalizeRelativePath,
} from './files';
import type {
    FileEntry,
} from './files';
import AdmZip = require('adm-zip');
import fs = require('fs-extra');

/**
 * Lists the files of the zip archive `file`.
 */
export function listArchive(file: string): FileEntry[] {
    const zip = new AdmZip(file);
    return zip.getEntries()
        .filter(entry => !entry.isDirectory)
        .map(entry => ({
            copyTo: (dest: string) => fs.outputFile(dest, entry.getData()),
            relativePath: normalizeRelativePath(entry.entryName),
        }));
}
