/**
 * @module
 * asciidoctor-conventions Public API
 */
import {
    AsciidoctorPlugin,
} from './asciidoctor';
import {
    AsciidoctorConventionPlugin,
} from './conventions';
import type {
    ConventionOptions,
} from './conventions';
import {
    Project,
} from './project';
import type {
    ProjectOptions,
} from './project';

/**
 * Options for {@link newDocumentationProject}.
 */
export interface DocumentationProjectOptions extends ProjectOptions, ConventionOptions {
    /** Repositories to add before the conventions see the project. */
    repositories?: string[];
}

/**
 * Construct a project with the Asciidoctor render plugin and the documentation
 * conventions applied.
 */
export function newDocumentationProject(options: DocumentationProjectOptions): Project {
    const project = new Project(options);
    for (const repository of options.repositories || [])
        project.repositories.maven(repository);
    project.plugins.apply(new AsciidoctorConventionPlugin(options));
    project.plugins.apply(new AsciidoctorPlugin());
    return project;
}

export {
    ASCIIDOCTOR_PLUGIN_ID,
    AbstractAsciidoctorTask,
    AsciidoctorDocBookTask,
    AsciidoctorPlugin,
    AsciidoctorSettings,
    AsciidoctorTask,
} from './asciidoctor';
export {
    commonAttributes,
    composeAttributes,
    documentOptions,
    htmlOnlyAttributes,
    mergeAttributes,
} from './attributes';
export {
    Configuration,
} from './configuration';
export {
    ASSET_PATTERNS,
    AsciidoctorConventionPlugin,
    BLOCK_SWITCH_EXTENSION,
    DEFAULT_REPOSITORY_URL,
    EXTENSIONS_CONFIGURATION,
} from './conventions';
export type {
    ConventionOptions,
} from './conventions';
export {
    BuildError,
    FatalWarningError,
    ResolutionError,
    TaskGraphError,
} from './errors';
export type {
    TaskOutcome,
} from './errors';
export {
    createProgress,
    summarize,
} from './progress';
export type {
    Progress,
} from './progress';
export {
    Project,
} from './project';
export type {
    CopyOptions,
    Plugin,
    ProjectOptions,
    RunOptions,
} from './project';
export type {
    AttributeSet,
    AttributeValue,
    BackendType,
    RenderJob,
} from './render-job';
export {
    parseCoordinate,
} from './repository';
export type {
    Coordinate,
    Repository,
} from './repository';
export {
    DOCUMENTATION_RESOURCES,
    DOCUMENTATION_RESOURCES_CONFIGURATION,
    UNZIP_DOCUMENTATION_RESOURCES_TASK,
    createUnzipDocumentationResourcesTask,
} from './resources';
export {
    capitalize,
    createSyncDocumentationSourceTask,
    planStaging,
} from './staging';
export type {
    MergeDirective,
    StagingPlan,
} from './staging';
export {
    SyncTask,
} from './sync';
export type {
    DuplicatesStrategy,
    SourceOptions,
} from './sync';
export {
    DefaultTask,
} from './task';
export type {
    Task,
    TaskContext,
    TaskFunction,
} from './task';
