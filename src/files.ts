/**
 * @module
 * File trees that can be copied.
 */
import fs = require('fs-extra');
import path = require('path');

/**
 * A file that can be copied into a destination tree.
 */
export interface FileEntry {
    /** Path relative to the root of its tree, `/`-separated. */
    readonly relativePath: string;
    /** Write the file to `dest`, creating parent directories as needed. */
    copyTo(dest: string): Promise<void>;
}

/**
 * Lists every file below `dir`. Rejects if `dir` does not exist.
 */
export async function listDirectory(dir: string): Promise<FileEntry[]> {
    const entries: FileEntry[] = [];
    await walk(dir, '', entries);
    return entries.sort((a, b) => a.relativePath < b.relativePath ? -1 : a.relativePath > b.relativePath ? 1 : 0);
}

async function walk(root: string, prefix: string, entries: FileEntry[]): Promise<void> {
    const dirents = await fs.readdir(path.join(root, prefix), { withFileTypes: true });
    for (const dirent of dirents) {
        const relativePath = prefix ? `${prefix}/${dirent.name}` : dirent.name;
        if (dirent.isDirectory()) {
            await walk(root, relativePath, entries);
        } else if (dirent.isFile()) {
            const src = path.join(root, relativePath);
            entries.push({
                copyTo: dest => fs.copy(src, dest),
                relativePath,
            });
        }
    }
}

/**
 * Normalizes a `/`-separated relative path, rejecting paths that escape their root.
 */
export function normalizeRelativePath(p: string): string {
    const normalized = path.posix.normalize(p.replace(/\\/g, '/'));
    if (normalized === '..' || normalized.startsWith('../') || path.posix.isAbsolute(normalized))
        throw new Error(`path escapes its root: ${p}`);
    return normalized === '.' ? '' : normalized;
}
