/**
 * @module
 * Documentation resources (CSS and JavaScript) shared by every render job.
 */
import type {
    Project,
} from './project';
import {
    SyncTask,
} from './sync';
import path = require('path');

/** Configuration holding the documentation resources archive. */
export const DOCUMENTATION_RESOURCES_CONFIGURATION = 'documentationResources';

/** Default documentation resources archive. */
export const DOCUMENTATION_RESOURCES = 'io.spring.docresources:spring-doc-resources:0.1.3.RELEASE@zip';

/** Name of the task that extracts the documentation resources. */
export const UNZIP_DOCUMENTATION_RESOURCES_TASK = 'unzipDocumentationResources';

/**
 * Directory the documentation resources are extracted into.
 */
export function documentationResourcesDir(project: Project): string {
    return path.join(project.buildDir, 'docs', 'resources');
}

/**
 * Returns the task that resolves the documentation resources archive and extracts
 * it into `build/docs/resources`, creating it on first use.
 *
 * Resolution happens when the task runs; a resource that cannot be resolved fails it.
 */
export function createUnzipDocumentationResourcesTask(project: Project): SyncTask {
    const existing = project.tasks.findByName(UNZIP_DOCUMENTATION_RESOURCES_TASK);
    if (existing instanceof SyncTask)
        return existing;
    const documentationResources = project.configurations.maybeCreate(DOCUMENTATION_RESOURCES_CONFIGURATION);
    documentationResources.defaultDependencies(dependencies => dependencies.add(DOCUMENTATION_RESOURCES));
    return project.tasks.create(UNZIP_DOCUMENTATION_RESOURCES_TASK, SyncTask, task => {
        task.description = 'Extracts the documentation resources';
        task.into(documentationResourcesDir(project));
        task.fromArchives(() => project.resolveArtifacts(documentationResources));
    });
}
