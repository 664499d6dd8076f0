import {
    suite,
    test,
} from '@testdeck/mocha';
import {
    AsciidoctorTask,
} from './asciidoctor';
import {
    listDirectory,
} from './files';
import {
    Project,
} from './project';
import {
    capitalize,
    createSyncDocumentationSourceTask,
    planStaging,
} from './staging';
import {
    SyncTask,
} from './sync';
import {
    createTempDir,
    silentProgress,
    writeFiles,
} from './testing';
import assert = require('assert');
import fs = require('fs-extra');
import path = require('path');

const PROJECT_DIR = path.resolve('/work/project');

/**
 * Tests for planning and wiring source staging
 */
@suite('Staging')
export class StagingTest {
    @test
    'capitalize()'(): void {
        assert.strictEqual(capitalize('asciidoctor'), 'Asciidoctor');
        assert.strictEqual(capitalize('asciidoctorPdf'), 'AsciidoctorPdf');
        assert.strictEqual(capitalize(''), '');
    }

    @test
    'planStaging()'(): void {
        const project = new Project({ projectDir: PROJECT_DIR });
        const job = project.tasks.create('asciidoctor', AsciidoctorTask, task => {
            task.sourceDir = 'docs/guide';
        });
        assert.deepStrictEqual(planStaging(project, job), {
            destinationRoot: path.join(PROJECT_DIR, 'build', 'docs', 'src', 'asciidoctor'),
            resources: {
                duplicatesStrategy: 'exclude',
                into: 'guide',
            },
            sourceRoot: path.join(PROJECT_DIR, 'docs'),
            stagedSourceDir: path.join('build', 'docs', 'src', 'asciidoctor', 'guide'),
            taskName: 'syncDocumentationSourceForAsciidoctor',
        });
    }

    @test
    'createSyncDocumentationSourceTask() wires the job to the staged sources'(): void {
        const project = new Project({ projectDir: PROJECT_DIR });
        const resources = project.tasks.create('resources', SyncTask, task => task.into('build/resources'));
        const job = project.tasks.create('asciidoctor', AsciidoctorTask);

        const sync = createSyncDocumentationSourceTask(project, job, resources);
        assert.strictEqual(sync.name, 'syncDocumentationSourceForAsciidoctor');
        assert.strictEqual(project.tasks.getByName(sync.name), sync);
        assert.strictEqual(sync.getDestinationDir(), path.join(PROJECT_DIR, 'build', 'docs', 'src', 'asciidoctor'));
        assert(job.dependencies.has(sync));
        assert(sync.dependencies.has(resources));
        assert.strictEqual(job.sourceDir, path.join('build', 'docs', 'src', 'asciidoctor', 'asciidoc'));
        assert.deepStrictEqual(sync.getSources().map(source => [source.into(), source.duplicatesStrategy]), [
            ['', 'include'],
            ['asciidoc', 'exclude'],
        ]);
        assert.strictEqual(job.getAssignedSourceDir(), 'src/docs/asciidoc');
    }

    @test
    async 'stages a source directory assigned after the job was created'(): Promise<void> {
        const dir = await createTempDir();
        try {
            await writeFiles(dir, {
                'docs/guide/index.adoc': '= Guide',
                'resources/css/site.css': 'css',
            });
            const project = new Project({ projectDir: dir });
            const resources = project.tasks.create('resources', SyncTask, task => {
                task.into('build/resources');
                task.from('resources');
            });
            const job = project.tasks.create('asciidoctor', AsciidoctorTask);
            const sync = createSyncDocumentationSourceTask(project, job, resources);

            job.sourceDir = 'docs/guide';
            assert.strictEqual(job.getAssignedSourceDir(), 'docs/guide');
            assert.strictEqual(job.sourceDir, path.join('build', 'docs', 'src', 'asciidoctor', 'guide'));

            await project.run([sync.name], { progress: silentProgress() });
            const staged = await listDirectory(path.join(dir, 'build', 'docs', 'src', 'asciidoctor'));
            assert.deepStrictEqual(staged.map(entry => entry.relativePath), ['guide/css/site.css', 'guide/index.adoc']);
        } finally {
            await fs.remove(dir);
        }
    }
}
