import type {
    Project,
} from './project';

/**
 * Context that will be passed to the task actions during execution.
 */
export interface TaskContext {
    /** Task output */
    readonly output: Buffer[];
}

/**
 * Function that runs a task action.
 */
export type TaskFunction = (ctx: TaskContext) => (Promise<void> | void);

/**
 * A task, or the name of a task registered in the same project.
 */
export type TaskDependency = Task | string;

/**
 * Represents a task.
 */
export interface Task {
    /** Task name, unique within its project. */
    readonly name: string;
    /** Project owning the task. */
    readonly project: Project;
    /** Task description. Default: the task name. */
    description?: string;
    /** Tasks that must complete successfully before this one runs. */
    readonly dependencies: ReadonlySet<TaskDependency>;
    /** Declare that this task runs after `deps`. */
    dependsOn(...deps: TaskDependency[]): void;
    /** Add an action that runs before all other actions of this task. */
    doFirst(fn: TaskFunction): void;
    /** Returns the actions of this task, in execution order. */
    getActions(): TaskFunction[];
}

/**
 * Constructor of a concrete task type, as accepted by `TaskContainer#create`.
 */
export type TaskType<T extends Task> = new (name: string, project: Project) => T;

/**
 * Any task class, abstract ones included, as accepted by `TaskContainer#withType`.
 */
export type TaskClass<T extends Task> = abstract new (...args: never[]) => T;

/**
 * Base task. Subclasses override {@link DefaultTask#execute}.
 */
export class DefaultTask implements Task {
    readonly name: string;
    readonly project: Project;
    description?: string;
    private readonly deps: Set<TaskDependency>;
    private readonly firstActions: TaskFunction[];

    constructor(name: string, project: Project) {
        this.name = name;
        this.project = project;
        this.deps = new Set();
        this.firstActions = [];
    }

    get dependencies(): ReadonlySet<TaskDependency> {
        return this.deps;
    }

    dependsOn(...deps: TaskDependency[]): void {
        for (const dep of deps)
            this.deps.add(dep);
    }

    doFirst(fn: TaskFunction): void {
        this.firstActions.unshift(fn);
    }

    getActions(): TaskFunction[] {
        return [...this.firstActions, ctx => this.execute(ctx)];
    }

    protected execute(_ctx: TaskContext): Promise<void> | void {
        // no-op
    }
}
