/**
 * @module
 * Project model: tasks, plugins, extensions, configurations and repositories.
 */
import {
    ConfigurationContainer,
} from './configuration';
import type {
    Configuration,
} from './configuration';
import {
    TaskGraphError,
} from './errors';
import type {
    TaskOutcome,
} from './errors';
import {
    execute,
} from './execute';
import {
    listDirectory,
} from './files';
import {
    createProgress,
} from './progress';
import type {
    Progress,
} from './progress';
import {
    ArtifactResolver,
    RepositoryHandler,
} from './repository';
import {
    copyFiles,
    createCopySource,
} from './sync';
import type {
    SourceOptions,
} from './sync';
import type {
    Task,
    TaskClass,
    TaskType,
} from './task';
import os = require('os');
import path = require('path');

/**
 * Options for {@link Project}.
 */
export interface ProjectOptions {
    /** Root directory of the project. Relative paths are resolved against it. */
    projectDir: string;
    /** Build output directory. Default: `build` below the project directory. */
    buildDir?: string;
}

/**
 * Options for {@link Project#run}.
 */
export interface RunOptions {
    /**
     * Maximum number of tasks that can be run concurrently at any time.
     * Default: number of CPU cores in the system.
     */
    maxWorkers?: number;

    /** Where progress and task output go. Default: console progress on stdout. */
    progress?: Progress;
}

/**
 * Options for {@link Project#copy}.
 */
export interface CopyOptions extends Omit<SourceOptions, 'into'> {
    from: string;
    into: string;
}

/**
 * A plugin adds behavior to a project.
 */
export interface Plugin {
    /** Plugin id. A project applies a plugin with a given id at most once. */
    readonly id: string;
    apply(project: Project): void;
}

/**
 * Plugins applied to a project.
 */
export class PluginContainer {
    private readonly project: Project;
    private readonly plugins: Map<string, Plugin>;
    private readonly actions: Map<string, Array<(plugin: Plugin) => void>>;

    constructor(project: Project) {
        this.project = project;
        this.plugins = new Map();
        this.actions = new Map();
    }

    apply(plugin: Plugin): void {
        if (this.plugins.has(plugin.id))
            return;
        this.plugins.set(plugin.id, plugin);
        plugin.apply(this.project);
        for (const action of this.actions.get(plugin.id) || [])
            action(plugin);
    }

    /**
     * Run `action` when the plugin `id` is applied, or now if it already is.
     */
    withId(id: string, action: (plugin: Plugin) => void): void {
        let actions = this.actions.get(id);
        if (!actions) {
            actions = [];
            this.actions.set(id, actions);
        }
        actions.push(action);
        const plugin = this.plugins.get(id);
        if (plugin)
            action(plugin);
    }
}

/**
 * Extension objects that plugins register on a project.
 */
export class ExtensionContainer {
    private readonly extensions: object[];

    constructor() {
        this.extensions = [];
    }

    add(extension: object): void {
        this.extensions.push(extension);
    }

    findByType<T extends object>(type: abstract new (...args: never[]) => T): T | undefined {
        for (const extension of this.extensions)
            if (extension instanceof type)
                return extension;
        return undefined;
    }

    getByType<T extends object>(type: abstract new (...args: never[]) => T): T {
        const extension = this.findByType(type);
        if (!extension)
            throw new Error(`Extension of type '${type.name}' does not exist`);
        return extension;
    }
}

/**
 * The tasks of a project.
 */
export class TaskContainer {
    private readonly project: Project;
    private readonly tasks: Map<string, Task>;
    private readonly listeners: Array<(task: Task) => void>;

    constructor(project: Project) {
        this.project = project;
        this.tasks = new Map();
        this.listeners = [];
    }

    /**
     * Create a task. `configure` runs before the task is announced to `withType` actions.
     */
    create<T extends Task>(name: string, type: TaskType<T>, configure?: (task: T) => void): T {
        if (this.tasks.has(name))
            throw new TaskGraphError(`Cannot add task '${name}' as a task with that name already exists`);
        const task = new type(name, this.project);
        if (configure)
            configure(task);
        this.tasks.set(name, task);
        for (const listener of [...this.listeners])
            listener(task);
        return task;
    }

    /**
     * Returns the task named `name`, creating it if needed.
     */
    maybeCreate<T extends Task>(name: string, type: TaskType<T>): T {
        const existing = this.tasks.get(name);
        if (!existing)
            return this.create(name, type);
        if (!(existing instanceof type))
            throw new TaskGraphError(`Task '${name}' already exists with a different type`);
        return existing;
    }

    findByName(name: string): Task | undefined {
        return this.tasks.get(name);
    }

    getByName(name: string): Task {
        const task = this.tasks.get(name);
        if (!task)
            throw new TaskGraphError(`Task '${name}' not found in project`);
        return task;
    }

    /**
     * Run `action` for every existing and future task of type `type`.
     */
    withType<T extends Task>(type: TaskClass<T>, action: (task: T) => void): void {
        this.listeners.push(task => {
            if (task instanceof type)
                action(task);
        });
        for (const task of [...this.tasks.values()])
            if (task instanceof type)
                action(task);
    }

    names(): string[] {
        return [...this.tasks.keys()];
    }
}

/**
 * A project to be built.
 */
export class Project {
    readonly projectDir: string;
    readonly buildDir: string;
    readonly repositories: RepositoryHandler;
    readonly configurations: ConfigurationContainer;
    readonly tasks: TaskContainer;
    readonly plugins: PluginContainer;
    readonly extensions: ExtensionContainer;

    constructor(options: ProjectOptions) {
        this.projectDir = path.resolve(options.projectDir);
        this.buildDir = path.resolve(this.projectDir, options.buildDir || 'build');
        this.repositories = new RepositoryHandler();
        this.configurations = new ConfigurationContainer();
        this.tasks = new TaskContainer(this);
        this.plugins = new PluginContainer(this);
        this.extensions = new ExtensionContainer();
    }

    /**
     * Resolves `p` against the project directory.
     */
    file(p: string): string {
        return path.resolve(this.projectDir, p);
    }

    /**
     * Returns `p` relative to the project directory.
     */
    relativePath(p: string): string {
        return path.relative(this.projectDir, this.file(p));
    }

    /**
     * Resolves every dependency of `configuration` to an artifact file.
     */
    async resolveArtifacts(configuration: Configuration): Promise<string[]> {
        const resolver = new ArtifactResolver(this.repositories, this.projectDir, path.join(this.buildDir, 'tmp', 'artifacts'));
        const files: string[] = [];
        for (const notation of configuration.getDependencies())
            files.push(await resolver.resolve(notation));
        return files;
    }

    /**
     * Copy files from one directory into another. Returns the number of files copied.
     */
    copy(options: CopyOptions): Promise<number> {
        const from = this.file(options.from);
        return copyFiles(this.file(options.into), [createCopySource(() => listDirectory(from), {
            duplicatesStrategy: options.duplicatesStrategy,
            include: options.include,
        })]);
    }

    /**
     * Run the named tasks and everything they depend on.
     */
    async run(taskNames: string[], options?: RunOptions): Promise<ReadonlyMap<string, TaskOutcome>> {
        if (!options)
            options = {};
        const tasks = taskNames.map(name => this.tasks.getByName(name));
        return execute(this.tasks, tasks, options.maxWorkers || os.cpus().length, options.progress || createProgress());
    }
}
