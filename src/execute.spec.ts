import {
    suite,
    test,
} from '@testdeck/mocha';
import {
    BuildError,
    TaskGraphError,
} from './errors';
import {
    Project,
} from './project';
import {
    DefaultTask,
} from './task';
import type {
    TaskContext,
} from './task';
import {
    silentProgress,
} from './testing';
import assert = require('assert');

const log: string[] = [];

class RecordingTask extends DefaultTask {
    fail = false;

    protected execute(ctx: TaskContext): void {
        ctx.output.push(Buffer.from(`${this.name}\n`));
        if (this.fail)
            throw new Error(`${this.name} failed`);
        log.push(this.name);
    }
}

class ConcurrentTask extends DefaultTask {
    static active = 0;
    static peak = 0;

    protected async execute(): Promise<void> {
        ConcurrentTask.active++;
        ConcurrentTask.peak = Math.max(ConcurrentTask.peak, ConcurrentTask.active);
        await new Promise<void>(resolve => setTimeout(resolve, 10));
        ConcurrentTask.active--;
    }
}

function run(project: Project, ...names: string[]) {
    return project.run(names, { maxWorkers: 2, progress: silentProgress() });
}

/**
 * Tests for running the task graph
 */
@suite('Executor')
export class ExecutorTest {
    private project = new Project({ projectDir: '/tmp/execute' });

    before(): void {
        log.length = 0;
    }

    @test
    async 'runs dependencies first'(): Promise<void> {
        const tasks = this.project.tasks;
        const c = tasks.create('c', RecordingTask);
        const b = tasks.create('b', RecordingTask, t => t.dependsOn(c));
        tasks.create('a', RecordingTask, t => t.dependsOn(b, 'c'));

        const outcomes = await run(this.project, 'a');
        assert.deepStrictEqual(log, ['c', 'b', 'a']);
        assert.deepStrictEqual([...outcomes.entries()], [['c', 'success'], ['b', 'success'], ['a', 'success']]);
    }

    @test
    async 'runs a shared dependency once'(): Promise<void> {
        const tasks = this.project.tasks;
        tasks.create('shared', RecordingTask);
        tasks.create('left', RecordingTask, t => t.dependsOn('shared'));
        tasks.create('right', RecordingTask, t => t.dependsOn('shared'));

        await run(this.project, 'left', 'right');
        assert.strictEqual(log.filter(name => name === 'shared').length, 1);
        assert.strictEqual(log.length, 3);
        assert.strictEqual(log[0], 'shared');
    }

    @test
    async 'runs doFirst actions before the task action'(): Promise<void> {
        const task = this.project.tasks.create('a', RecordingTask);
        task.doFirst(() => {
            log.push('second');
        });
        task.doFirst(() => {
            log.push('first');
        });

        await run(this.project, 'a');
        assert.deepStrictEqual(log, ['first', 'second', 'a']);
    }

    @test
    async 'skips dependents of a failed task and runs independent ones'(): Promise<void> {
        const tasks = this.project.tasks;
        tasks.create('broken', RecordingTask, t => {
            t.fail = true;
        });
        tasks.create('dependent', RecordingTask, t => t.dependsOn('broken'));
        tasks.create('independent', RecordingTask);

        const error = await run(this.project, 'dependent', 'independent').then(() => undefined, (e: unknown) => e);
        assert(error instanceof BuildError);
        assert.strictEqual(error.taskName, 'broken');
        assert(error.cause instanceof Error);
        assert.strictEqual(error.cause.message, 'broken failed');
        assert.strictEqual(error.message, `Execution failed for task 'broken': broken failed`);
        assert.strictEqual(error.outcomes.get('broken'), 'failed');
        assert.strictEqual(error.outcomes.get('dependent'), 'skipped');
        assert.strictEqual(error.outcomes.get('independent'), 'success');
        assert.deepStrictEqual(log, ['independent']);
    }

    @test
    async 'runs at most maxWorkers tasks at once'(): Promise<void> {
        for (const maxWorkers of [1, 2]) {
            const project = new Project({ projectDir: '/tmp/execute' });
            for (const name of ['a', 'b', 'c', 'd'])
                project.tasks.create(name, ConcurrentTask);
            ConcurrentTask.peak = 0;

            await project.run(['a', 'b', 'c', 'd'], { maxWorkers, progress: silentProgress() });
            assert.strictEqual(ConcurrentTask.peak, maxWorkers);
            assert.strictEqual(ConcurrentTask.active, 0);
        }
    }

    @test
    async 'rejects circular dependencies'(): Promise<void> {
        const tasks = this.project.tasks;
        tasks.create('a', RecordingTask, t => t.dependsOn('b'));
        tasks.create('b', RecordingTask, t => t.dependsOn('a'));

        await assert.rejects(run(this.project, 'a'), TaskGraphError);
        assert.deepStrictEqual(log, []);
    }

    @test
    async 'rejects unknown tasks'(): Promise<void> {
        await assert.rejects(run(this.project, 'missing'), {
            message: `Task 'missing' not found in project`,
            name: 'TaskGraphError',
        });
    }

    @test
    'rejects duplicate task names'(): void {
        this.project.tasks.create('a', RecordingTask);
        assert.throws(() => this.project.tasks.create('a', RecordingTask), TaskGraphError);
    }
}
