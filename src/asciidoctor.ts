/**
 * @module
 * Asciidoctor render plugin: the `AsciidoctorSettings` extension and the render tasks.
 */
import type {
    Configuration,
} from './configuration';
import {
    FatalWarningError,
} from './errors';
import {
    listDirectory,
} from './files';
import type {
    Plugin,
    Project,
} from './project';
import type {
    AttributeSet,
    AttributeValue,
    BackendType,
    RenderJob,
} from './render-job';
import {
    DefaultTask,
} from './task';
import type {
    TaskContext,
} from './task';
import asciidoctor from '@asciidoctor/core';
import {
    minimatch,
} from 'minimatch';
import path = require('path');

/**
 * Id of the {@link AsciidoctorPlugin}.
 */
export const ASCIIDOCTOR_PLUGIN_ID = 'asciidoctor';

/**
 * Project-wide Asciidoctor settings, registered by {@link AsciidoctorPlugin}.
 */
export class AsciidoctorSettings {
    private readonly fatalPatterns: RegExp[] = [];

    /**
     * Make log messages matching any of `patterns` fail the render.
     * String patterns must match the whole message text.
     */
    fatalWarnings(...patterns: Array<string | RegExp>): void {
        for (const pattern of patterns)
            this.fatalPatterns.push(typeof pattern === 'string' ? new RegExp(`^(?:${pattern})$`) : pattern);
    }

    getFatalWarnings(): readonly RegExp[] {
        return this.fatalPatterns;
    }

    isFatal(message: string): boolean {
        return this.fatalPatterns.some(pattern => pattern.test(message));
    }
}

/**
 * Adds Asciidoctor rendering to a project.
 */
export class AsciidoctorPlugin implements Plugin {
    readonly id = ASCIIDOCTOR_PLUGIN_ID;

    apply(project: Project): void {
        project.extensions.add(new AsciidoctorSettings());
    }
}

type Processor = ReturnType<typeof asciidoctor>;
type ConvertOptions = NonNullable<Parameters<Processor['convertFile']>[1]>;
type Registry = ReturnType<Processor['Extensions']['create']>;
type RegisterExtension = (registry: Registry) => void;

let processor: Processor | undefined;

function getProcessor(): Processor {
    if (!processor) {
        processor = asciidoctor();
        registerDocBookConverter();
    }
    return processor;
}

/**
 * Makes the `docbook5` backend available. The converter registers itself when
 * loaded; releases that export `register()` need the call as well.
 */
function registerDocBookConverter(): void {
    const converter: unknown = require('@asciidoctor/docbook-converter');
    if (typeof converter === 'object' && converter !== null && 'register' in converter && typeof converter.register === 'function')
        converter.register();
}

/**
 * Numbers become strings and `true` the empty string, the forms attributes take
 * when set from a document.
 */
function engineValue(value: AttributeValue): AttributeValue {
    if (typeof value === 'number')
        return String(value);
    return value === true ? '' : value;
}

/** Log severities that never fail a render. */
const QUIET_SEVERITIES = new Set(['DEBUG', 'INFO']);

/**
 * Renders every `.adoc` file below its source directory, skipping files and
 * directories whose name starts with `_`.
 */
export abstract class AbstractAsciidoctorTask extends DefaultTask implements RenderJob {
    outputDir: string;
    /** Asciidoctor backends to render with, e.g. `html5`. */
    backends: string[];
    /**
     * With more than one backend, render each into `outputDir/<backend>`.
     * With a single backend, output goes straight into `outputDir`.
     */
    separateOutputDirs: boolean;
    abstract readonly backendType: BackendType;
    private attrs: AttributeSet;
    private opts: AttributeSet;
    private readonly extensionConfigurations: Configuration[];
    private baseDirFollowsSource: boolean;
    private assignedSourceDir: string;
    private sourceDirRedirect?: () => string;

    constructor(name: string, project: Project, backends: string[]) {
        super(name, project);
        this.assignedSourceDir = 'src/docs/asciidoc';
        this.outputDir = project.relativePath(path.join(project.buildDir, 'docs', name));
        this.backends = backends;
        this.separateOutputDirs = true;
        this.attrs = {};
        this.opts = {};
        this.extensionConfigurations = [];
        this.baseDirFollowsSource = false;
    }

    get sourceDir(): string {
        return this.sourceDirRedirect ? this.sourceDirRedirect() : this.assignedSourceDir;
    }

    set sourceDir(dir: string) {
        this.assignedSourceDir = dir;
    }

    getAssignedSourceDir(): string {
        return this.assignedSourceDir;
    }

    redirectSourceDir(redirect: () => string): void {
        this.sourceDirRedirect = redirect;
    }

    attributes(attributes: AttributeSet): void {
        this.attrs = { ...this.attrs, ...attributes };
    }

    getAttributes(): AttributeSet {
        return this.attrs;
    }

    options(options: AttributeSet): void {
        this.opts = { ...this.opts, ...options };
    }

    getOptions(): AttributeSet {
        return this.opts;
    }

    configurations(...configurations: Configuration[]): void {
        for (const configuration of configurations)
            if (!this.extensionConfigurations.includes(configuration))
                this.extensionConfigurations.push(configuration);
    }

    getConfigurations(): readonly Configuration[] {
        return this.extensionConfigurations;
    }

    baseDirFollowsSourceFile(): void {
        this.baseDirFollowsSource = true;
    }

    getBackendOutputDirectories(): string[] {
        return this.backends.map(backend => this.getBackendOutputDirectory(backend));
    }

    private getBackendOutputDirectory(backend: string): string {
        const outputDir = this.project.file(this.outputDir);
        return this.separateOutputDirs && this.backends.length > 1 ? path.join(outputDir, backend) : outputDir;
    }

    protected async execute(ctx: TaskContext): Promise<void> {
        const sourceDir = this.project.file(this.sourceDir);
        const sources = (await listDirectory(sourceDir))
            .map(entry => entry.relativePath)
            .filter(p => minimatch(p, '**/*.adoc') && !p.split('/').some(segment => segment.startsWith('_')));
        const extensions = this.loadExtensions();
        const fatal = this.project.extensions.findByType(AsciidoctorSettings);
        for (const backend of this.backends) {
            const outputDir = this.getBackendOutputDirectory(backend);
            for (const source of sources) {
                const file = path.join(sourceDir, source);
                const messages = this.render(file, backend, path.join(outputDir, path.dirname(source)), extensions);
                const fatalMessages: string[] = [];
                for (const message of messages) {
                    if (fatal && fatal.isFatal(message.text))
                        fatalMessages.push(message.text);
                    else
                        ctx.output.push(Buffer.from(`asciidoctor: ${message.severity}: ${source}: ${message.text}\n`));
                }
                if (fatalMessages.length)
                    throw new FatalWarningError(file, fatalMessages);
            }
        }
    }

    /**
     * Render `file` and return what Asciidoctor logged at warning level or above.
     */
    private render(file: string, backend: string, toDir: string, extensions: RegisterExtension[]): Array<{ severity: string; text: string }> {
        const processor = getProcessor();
        const registry = processor.Extensions.create();
        for (const register of extensions)
            register(registry);
        const attributes: Record<string, AttributeValue> = {};
        for (const [key, value] of Object.entries(this.attrs))
            attributes[key] = engineValue(value);
        const convertOptions: ConvertOptions = {
            attributes,
            backend,
            base_dir: this.baseDirFollowsSource ? path.dirname(file) : this.project.projectDir,
            extension_registry: registry,
            mkdirs: true,
            safe: 'unsafe',
            to_dir: toDir,
        };
        for (const [key, value] of Object.entries(this.opts))
            if (!(key in convertOptions))
                Object.assign(convertOptions, { [key]: value });
        // The logger is global to the processor; conversion is synchronous so nothing else
        // logs between setting it and reading it back.
        const memoryLogger = processor.MemoryLogger.create();
        processor.LoggerManager.setLogger(memoryLogger);
        processor.convertFile(file, convertOptions);
        return memoryLogger.getMessages()
            .map(message => ({ severity: String(message.getSeverity()), text: String(message.getText()) }))
            .filter(message => !QUIET_SEVERITIES.has(message.severity));
    }

    /**
     * Load the `register` function of every extension module named by the extension configurations.
     * Each dependency is a module path or package name, resolved from the project directory.
     */
    private loadExtensions(): RegisterExtension[] {
        const registers: RegisterExtension[] = [];
        for (const configuration of this.extensionConfigurations) {
            for (const dependency of configuration.getDependencies()) {
                const resolved = require.resolve(dependency, { paths: [this.project.projectDir] });
                const mod: unknown = require(resolved);
                if (typeof mod !== 'object' || mod === null || !('register' in mod) || typeof mod.register !== 'function')
                    throw new Error(`Asciidoctor extension ${dependency} does not export a register function`);
                const register = mod.register;
                registers.push(registry => register(registry));
            }
        }
        return registers;
    }
}

/**
 * Renders HTML (`html5` by default).
 */
export class AsciidoctorTask extends AbstractAsciidoctorTask {
    readonly backendType = 'html';

    constructor(name: string, project: Project) {
        super(name, project, ['html5']);
    }
}

/**
 * Renders DocBook (`docbook5`).
 */
export class AsciidoctorDocBookTask extends AbstractAsciidoctorTask {
    readonly backendType = 'other';

    constructor(name: string, project: Project) {
        super(name, project, ['docbook5']);
    }
}
