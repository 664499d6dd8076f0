/**
 * @module
 * Error types raised while configuring and running a build.
 */

/**
 * A dependency coordinate could not be parsed or resolved to an artifact.
 */
export class ResolutionError extends Error {
    readonly coordinate: string;

    constructor(coordinate: string, message: string, options?: ErrorOptions) {
        super(`Could not resolve ${coordinate}: ${message}`, options);
        this.name = 'ResolutionError';
        this.coordinate = coordinate;
    }
}

/**
 * The rendering engine logged messages that the fatal warnings policy rejects.
 */
export class FatalWarningError extends Error {
    readonly messages: string[];

    constructor(sourceFile: string, messages: string[]) {
        super(`Asciidoctor reported fatal warnings for ${sourceFile}:\n` + messages.map(m => `  ${m}`).join('\n'));
        this.name = 'FatalWarningError';
        this.messages = messages;
    }
}

/**
 * The task graph is invalid: an unknown or duplicate task, or a dependency cycle.
 */
export class TaskGraphError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'TaskGraphError';
    }
}

/**
 * Outcome of a single task in a build.
 */
export type TaskOutcome = 'success' | 'failed' | 'skipped';

/**
 * A build failed. Names the first task that failed and keeps its error as `cause`.
 */
export class BuildError extends Error {
    readonly taskName: string;
    readonly outcomes: ReadonlyMap<string, TaskOutcome>;

    constructor(taskName: string, cause: unknown, outcomes: ReadonlyMap<string, TaskOutcome>) {
        super(`Execution failed for task '${taskName}': ${describe(cause)}`, { cause });
        this.name = 'BuildError';
        this.taskName = taskName;
        this.outcomes = outcomes;
    }
}

function describe(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
