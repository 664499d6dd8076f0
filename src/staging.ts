/**
 * @module
 * Staging of documentation sources together with the documentation resources.
 */
import type {
    Project,
} from './project';
import type {
    RenderJob,
} from './render-job';
import {
    SyncTask,
} from './sync';
import type {
    DuplicatesStrategy,
} from './sync';
import path = require('path');

/**
 * Where a merged file tree lands in the staging directory.
 */
export interface MergeDirective {
    /** Subpath of the staging directory. */
    into: string;
    duplicatesStrategy: DuplicatesStrategy;
}

/**
 * How the sources of one render job are staged.
 */
export interface StagingPlan {
    /** Name of the staging task. */
    taskName: string;
    /** Directory copied as a whole: the parent of the job's source directory. */
    sourceRoot: string;
    /** Staging directory. */
    destinationRoot: string;
    /** Where the documentation resources are merged. */
    resources: MergeDirective;
    /** The job's source directory once staged, relative to the project directory. */
    stagedSourceDir: string;
}

/**
 * Upper-cases the first character of `value`.
 */
export function capitalize(value: string): string {
    return value.charAt(0).toUpperCase() + value.substring(1);
}

/**
 * Plans the staging of `job`'s sources into `build/docs/src/<job name>`, from
 * the source directory last assigned to the job.
 */
export function planStaging(project: Project, job: RenderJob): StagingPlan {
    const assignedSourceDir = project.file(job.getAssignedSourceDir());
    const sourceDirName = path.basename(assignedSourceDir);
    const destinationRoot = path.join(project.buildDir, 'docs', 'src', job.name);
    return {
        destinationRoot,
        resources: {
            // Files of the documentation sources win over resources with the same path.
            duplicatesStrategy: 'exclude',
            into: sourceDirName,
        },
        sourceRoot: path.dirname(assignedSourceDir),
        stagedSourceDir: project.relativePath(path.join(destinationRoot, sourceDirName)),
        taskName: `syncDocumentationSourceFor${capitalize(job.name)}`,
    };
}

/**
 * Creates the task staging `job`'s sources and the documentation `resources`,
 * makes `job` depend on it, and redirects `job`'s source directory to the staged copy.
 * The plan is re-read on use, so a source directory assigned later is staged too.
 */
export function createSyncDocumentationSourceTask(project: Project, job: RenderJob, resources: SyncTask): SyncTask {
    const plan = planStaging(project, job);
    const syncDocumentationSource = project.tasks.create(plan.taskName, SyncTask, task => {
        task.description = `Stages the documentation sources of ${job.name}`;
        task.into(plan.destinationRoot);
        task.from(() => planStaging(project, job).sourceRoot);
        task.from(resources, {
            duplicatesStrategy: plan.resources.duplicatesStrategy,
            into: () => planStaging(project, job).resources.into,
        });
    });
    job.dependsOn(syncDocumentationSource);
    job.redirectSourceDir(() => planStaging(project, job).stagedSourceDir);
    return syncDocumentationSource;
}
