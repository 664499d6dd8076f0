/**
 * @module
 * Conventions applied in the presence of the {@link AsciidoctorPlugin}. When the
 * plugin is applied:
 *
 * - A default repository is added if the project has none.
 * - All warnings are made fatal.
 * - A task is created to resolve and unzip the documentation resources (CSS and
 *   JavaScript).
 * - For each render job (HTML and other backends):
 *   - it depends on the resources task;
 *   - attributes are configured for warnings on missing attributes, icons, section
 *     ids and numbering, docinfo and the current year, plus syntax highlighting and
 *     CSS styling for HTML jobs;
 *   - the `doctype` option is set to `book`;
 *   - the block switch extension is made available through the
 *     `asciidoctorExtensions` configuration;
 *   - its base directory follows the source file;
 *   - a task stages its sources together with the resources, and the job renders
 *     from the staged copy;
 *   - the CSS and JavaScript of the staged sources are copied into each backend
 *     output directory before it renders.
 */
import {
    ASCIIDOCTOR_PLUGIN_ID,
    AbstractAsciidoctorTask,
    AsciidoctorSettings,
} from './asciidoctor';
import {
    composeAttributes,
    documentOptions,
} from './attributes';
import type {
    Configuration,
} from './configuration';
import type {
    Plugin,
    Project,
} from './project';
import type {
    RenderJob,
} from './render-job';
import {
    createUnzipDocumentationResourcesTask,
} from './resources';
import {
    createSyncDocumentationSourceTask,
} from './staging';
import type {
    SyncTask,
} from './sync';
import type {
    TaskContext,
} from './task';

/** Repository added when a project declares none. */
export const DEFAULT_REPOSITORY_URL = 'https://repo.spring.io/libs-release';

/** Configuration whose dependencies are loaded as Asciidoctor extensions. */
export const EXTENSIONS_CONFIGURATION = 'asciidoctorExtensions';

/** Module of the bundled block switch extension. */
export const BLOCK_SWITCH_EXTENSION = require.resolve('./extensions/block-switch');

/** Asset paths, relative to the source directory, copied into each backend output directory. */
export const ASSET_PATTERNS: readonly string[] = ['css/**', 'js/**'];

/**
 * Options for {@link AsciidoctorConventionPlugin}.
 */
export interface ConventionOptions {
    /** Returns the date used for the `today-year` attribute. Default: the current date. */
    today?: () => Date;
}

/**
 * Applies the documentation conventions to the render jobs of a project.
 */
export class AsciidoctorConventionPlugin implements Plugin {
    readonly id = 'asciidoctor-conventions';
    private readonly today: () => Date;

    constructor(options?: ConventionOptions) {
        this.today = options && options.today || (() => new Date());
    }

    apply(project: Project): void {
        project.plugins.withId(ASCIIDOCTOR_PLUGIN_ID, () => {
            createDefaultAsciidoctorRepository(project);
            makeAllWarningsFatal(project);
            const unzipResources = createUnzipDocumentationResourcesTask(project);
            const extensions = createExtensionsConfiguration(project);
            project.tasks.withType(AbstractAsciidoctorTask, job => this.configureRenderJob(project, job, unzipResources, extensions));
        });
    }

    private configureRenderJob(project: Project, job: RenderJob, unzipResources: SyncTask, extensions: Configuration): void {
        job.dependsOn(unzipResources);
        job.configurations(extensions);
        job.attributes(composeAttributes(job.backendType, this.today()));
        job.options(documentOptions());
        job.baseDirFollowsSourceFile();
        createSyncDocumentationSourceTask(project, job, unzipResources);
        job.doFirst(ctx => copyAssets(project, job, ctx));
    }
}

function createDefaultAsciidoctorRepository(project: Project): void {
    if (project.repositories.isEmpty())
        project.repositories.maven(DEFAULT_REPOSITORY_URL);
}

function makeAllWarningsFatal(project: Project): void {
    project.extensions.getByType(AsciidoctorSettings).fatalWarnings('.*');
}

function createExtensionsConfiguration(project: Project): Configuration {
    const extensionsConfiguration = project.configurations.maybeCreate(EXTENSIONS_CONFIGURATION);
    extensionsConfiguration.defaultDependencies(dependencies => dependencies.add(BLOCK_SWITCH_EXTENSION));
    return extensionsConfiguration;
}

async function copyAssets(project: Project, job: RenderJob, ctx: TaskContext): Promise<void> {
    for (const backendOutputDir of job.getBackendOutputDirectories()) {
        ctx.output.push(Buffer.from(`${job.sourceDir} to outputDir ${backendOutputDir}\n`));
        await project.copy({
            from: job.sourceDir,
            include: [...ASSET_PATTERNS],
            into: backendOutputDir,
        });
    }
}
