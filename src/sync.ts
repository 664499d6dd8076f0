/**
 * @module
 * Copying and synchronizing file trees.
 */
import {
    listArchive,
} from './archive';
import {
    listDirectory,
    normalizeRelativePath,
} from './files';
import type {
    FileEntry,
} from './files';
import {
    DefaultTask,
} from './task';
import type {
    TaskContext,
} from './task';
import {
    minimatch,
} from 'minimatch';
import fs = require('fs-extra');
import path = require('path');

/**
 * What to do when two sources of one copy write the same destination path.
 *
 * - `include`: the later source overwrites the earlier one.
 * - `exclude`: the first source to write a path keeps it.
 * - `fail`: the copy fails.
 */
export type DuplicatesStrategy = 'include' | 'exclude' | 'fail';

/**
 * Path, or a function returning it when the copy runs.
 */
export type DirectoryProvider = string | (() => string);

/**
 * Options for a single copy source.
 */
export interface SourceOptions {
    /** Subpath of the destination that receives the files. Default: the destination root. */
    into?: DirectoryProvider;
    /** Glob patterns, relative to the source root, of the files to copy. Default: every file. */
    include?: string[];
    /** Default: `include`. */
    duplicatesStrategy?: DuplicatesStrategy;
}

/**
 * One source of a copy: a lazily listed file tree plus where and how it lands.
 */
export interface CopySource {
    readonly entries: () => Promise<FileEntry[]>;
    /** Normalized subpath of the destination. */
    readonly into: () => string;
    readonly include: readonly string[];
    readonly duplicatesStrategy: DuplicatesStrategy;
}

/**
 * Constructs a {@link CopySource}.
 */
export function createCopySource(entries: () => Promise<FileEntry[]>, options?: SourceOptions): CopySource {
    if (!options)
        options = {};
    const into = options.into || '';
    let resolveInto: () => string;
    if (typeof into === 'string') {
        const normalized = normalizeRelativePath(into);
        resolveInto = () => normalized;
    } else {
        resolveInto = () => normalizeRelativePath(into());
    }
    return {
        duplicatesStrategy: options.duplicatesStrategy || 'include',
        entries,
        include: options.include || [],
        into: resolveInto,
    };
}

/**
 * Copy every source, in order, into `destinationDir`.
 * Duplicates are tracked within this one pass only.
 * Returns the number of files written.
 */
export async function copyFiles(destinationDir: string, sources: readonly CopySource[]): Promise<number> {
    const seen = new Set<string>();
    let copied = 0;
    for (const source of sources) {
        const entries = await source.entries();
        const into = source.into();
        for (const entry of entries) {
            if (source.include.length && !source.include.some(pattern => minimatch(entry.relativePath, pattern, { dot: true })))
                continue;
            const target = path.posix.join(into, entry.relativePath);
            if (seen.has(target)) {
                if (source.duplicatesStrategy === 'exclude')
                    continue;
                if (source.duplicatesStrategy === 'fail')
                    throw new Error(`Encountered duplicate path "${target}" while copying into ${destinationDir}`);
            }
            seen.add(target);
            await entry.copyTo(path.join(destinationDir, target));
            copied++;
        }
    }
    return copied;
}

/**
 * Task that makes a destination directory contain exactly the files of its sources.
 * The destination is cleared before each run.
 */
export class SyncTask extends DefaultTask {
    private destinationDir?: string;
    private readonly sources: CopySource[] = [];

    /**
     * Set the destination directory, relative to the project directory unless absolute.
     */
    into(dir: string): this {
        this.destinationDir = dir;
        return this;
    }

    getDestinationDir(): string {
        if (!this.destinationDir)
            throw new Error(`No destination directory has been set for task '${this.name}'`);
        return this.project.file(this.destinationDir);
    }

    /**
     * Add a directory, or the destination of another sync task, as a source.
     * Copying from a task also makes this task depend on it.
     */
    from(source: DirectoryProvider | SyncTask, options?: SourceOptions): this {
        if (source instanceof SyncTask) {
            const task = source;
            this.dependsOn(task);
            this.sources.push(createCopySource(() => listDirectory(task.getDestinationDir()), options));
        } else {
            const dir = source;
            this.sources.push(createCopySource(() => listDirectory(this.project.file(typeof dir === 'string' ? dir : dir())), options));
        }
        return this;
    }

    /**
     * Add the contents of zip archives as a source. `archives` is called when the task runs.
     */
    fromArchives(archives: () => Promise<string[]>, options?: SourceOptions): this {
        this.sources.push(createCopySource(async () => {
            const entries: FileEntry[] = [];
            for (const archive of await archives())
                entries.push(...listArchive(archive));
            return entries;
        }, options));
        return this;
    }

    getSources(): readonly CopySource[] {
        return this.sources;
    }

    protected async execute(_ctx: TaskContext): Promise<void> {
        const destinationDir = this.getDestinationDir();
        await fs.emptyDir(destinationDir);
        await copyFiles(destinationDir, this.sources);
    }
}
