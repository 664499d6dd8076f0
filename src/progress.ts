/**
 * @module
 * Console status.
 */
import type {
    TaskOutcome,
} from './errors';
import readline = require('readline');
import tty = require('tty');

/**
 * Build progress reporting.
 */
export interface Progress {
    /** Write task output. */
    write(chunk: Buffer | string): void;
    /** Report that a task finished, `done` of `total` so far. */
    taskFinished(description: string, done: number, total: number): void;
    /** Clear the status and print the build summary. */
    finish(outcomes: ReadonlyMap<string, TaskOutcome>): void;
}

class ConsoleProgress implements Progress {
    private readonly stream: NodeJS.WritableStream;
    private status: string;
    private rendered: boolean;

    constructor(stream: NodeJS.WritableStream) {
        this.stream = stream;
        this.status = '';
        this.rendered = false;
    }

    write(chunk: Buffer | string): void {
        this.unrender();
        this.stream.write(chunk);
    }

    taskFinished(description: string, done: number, total: number): void {
        this.status = `[${done}/${total}] ${description}`;
        this.render();
    }

    finish(outcomes: ReadonlyMap<string, TaskOutcome>): void {
        this.unrender();
        this.stream.write(`${summarize(outcomes)}\n`);
    }

    private render(): void {
        // Only a terminal can redraw the status line in place.
        if (!(this.stream instanceof tty.WriteStream))
            return;
        if (this.rendered)
            readline.cursorTo(this.stream, 0);
        this.stream.write(truncateString(this.status, this.stream.columns));
        if (this.rendered)
            readline.clearLine(this.stream, 1);
        this.rendered = true;
    }

    private unrender(): void {
        if (this.rendered) {
            this.stream.write('\n');
            this.rendered = false;
        }
    }
}

/**
 * Create progress reporting on `stream` (default: stdout).
 */
export function createProgress(stream?: NodeJS.WritableStream): Progress {
    return new ConsoleProgress(stream || process.stdout);
}

/**
 * One-line summary of a build.
 */
export function summarize(outcomes: ReadonlyMap<string, TaskOutcome>): string {
    const counts: Record<TaskOutcome, number> = {
        failed: 0,
        skipped: 0,
        success: 0,
    };
    for (const outcome of outcomes.values())
        counts[outcome]++;
    if (!counts.failed)
        return `BUILD SUCCESSFUL: ${counts.success} ${counts.success === 1 ? 'task' : 'tasks'} executed`;
    return `BUILD FAILED: ${counts.failed} failed, ${counts.skipped} skipped, ${counts.success} succeeded`;
}

function truncateString(x: string, len: number): string {
    if (x.length <= len)
        return x;
    else if (len <= 3)
        return x.substring(0, len);
    else
        return `${x.substring(0, len - 3)}...`;
}
