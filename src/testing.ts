/**
 * @module
 * Helpers for tests: temporary projects and local repositories.
 */
import {
    createProgress,
} from './progress';
import type {
    Progress,
} from './progress';
import {
    artifactPath,
    parseCoordinate,
} from './repository';
import AdmZip = require('adm-zip');
import fs = require('fs-extra');
import os = require('os');
import path = require('path');
import stream = require('stream');
import url = require('url');

/**
 * Creates an empty temporary directory.
 */
export function createTempDir(): Promise<string> {
    return fs.mkdtemp(path.join(os.tmpdir(), 'asciidoctor-conventions-'));
}

/**
 * Writes `files` (relative path to contents) below `root`.
 */
export async function writeFiles(root: string, files: Record<string, string>): Promise<void> {
    for (const [name, contents] of Object.entries(files))
        await fs.outputFile(path.join(root, name), contents);
}

/**
 * Writes a zip archive holding `files`.
 */
export function writeZip(file: string, files: Record<string, string>): void {
    const zip = new AdmZip();
    for (const [name, contents] of Object.entries(files))
        zip.addFile(name, Buffer.from(contents));
    fs.ensureDirSync(path.dirname(file));
    zip.writeZip(file);
}

/**
 * Publishes a zip archive of `files` as `notation` in the maven-layout repository at `root`.
 * Returns the repository URL.
 */
export function publishArchive(root: string, notation: string, files: Record<string, string>): string {
    writeZip(path.join(root, ...artifactPath(parseCoordinate(notation)).split('/')), files);
    return url.pathToFileURL(root).href;
}

/**
 * Progress that discards everything.
 */
export function silentProgress(): Progress {
    return createProgress(new stream.Writable({
        write(_chunk, _encoding, callback) {
            callback();
        },
    }));
}
