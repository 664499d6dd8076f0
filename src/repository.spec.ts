import {
    suite,
    test,
} from '@testdeck/mocha';
import {
    Configuration,
} from './configuration';
import {
    ResolutionError,
} from './errors';
import {
    Project,
} from './project';
import {
    ArtifactResolver,
    RepositoryHandler,
    artifactPath,
    parseCoordinate,
} from './repository';
import {
    createTempDir,
    publishArchive,
} from './testing';
import assert = require('assert');
import fs = require('fs-extra');
import http = require('http');
import path = require('path');

const ARTIFACT = 'com/example/docs/1.0.0/docs-1.0.0.zip';

/**
 * Serves `/repo/` with the artifact, `/broken/` with errors and everything else as missing.
 * Returns the base URL, the requested paths and a function that stops the server.
 */
async function startRepositoryServer(): Promise<{ baseUrl: string; requests: string[]; close: () => Promise<void> }> {
    const requests: string[] = [];
    const server = http.createServer((req, res) => {
        const url = req.url || '';
        requests.push(url);
        if (url === `/repo/${ARTIFACT}`) {
            res.end('archive');
        } else if (url.startsWith('/broken/')) {
            res.statusCode = 500;
            res.end();
        } else {
            res.statusCode = 404;
            res.end();
        }
    });
    await new Promise<void>(resolve => server.listen(0, '127.0.0.1', resolve));
    const address = server.address();
    assert(address !== null && typeof address === 'object');
    return {
        baseUrl: `http://127.0.0.1:${address.port}`,
        close: () => new Promise<void>((resolve, reject) => {
            server.closeAllConnections();
            server.close(error => error ? reject(error) : resolve());
        }),
        requests,
    };
}

/**
 * Tests for coordinates and artifact resolution
 */
@suite('Repository')
export class RepositoryTest {
    private dir = '';

    async before(): Promise<void> {
        this.dir = await createTempDir();
    }

    async after(): Promise<void> {
        await fs.remove(this.dir);
    }

    @test
    'parseCoordinate()'(): void {
        assert.deepStrictEqual(parseCoordinate('com.example:docs:1.0.0@zip'), {
            classifier: undefined,
            extension: 'zip',
            group: 'com.example',
            name: 'docs',
            version: '1.0.0',
        });
        assert.strictEqual(parseCoordinate('com.example:docs:1.0.0:sources').classifier, 'sources');
        assert.strictEqual(parseCoordinate('com.example:docs:1.0.0').extension, 'jar');
    }

    @test
    'parseCoordinate() rejects malformed notations'(): void {
        for (const notation of ['docs', 'com.example:docs', 'com.example::1.0', 'a:b:c:d:e', 'a:b:c@'])
            assert.throws(() => parseCoordinate(notation), ResolutionError, notation);
    }

    @test
    'artifactPath()'(): void {
        assert.strictEqual(artifactPath(parseCoordinate('com.example:docs:1.0.0@zip')), 'com/example/docs/1.0.0/docs-1.0.0.zip');
        assert.strictEqual(artifactPath(parseCoordinate('com.example:docs:1.0.0:sources')), 'com/example/docs/1.0.0/docs-1.0.0-sources.jar');
    }

    @test
    'RepositoryHandler keeps repositories in order'(): void {
        const repositories = new RepositoryHandler();
        assert(repositories.isEmpty());
        repositories.maven('https://repo.example.com/releases/');
        repositories.maven('file:///tmp/repo');
        assert(!repositories.isEmpty());
        assert.deepStrictEqual(repositories.toArray().map(r => r.url), ['https://repo.example.com/releases', 'file:///tmp/repo']);
    }

    @test
    async 'resolves from the first repository holding the artifact'(): Promise<void> {
        const first = path.join(this.dir, 'first');
        await fs.ensureDir(first);
        const second = publishArchive(path.join(this.dir, 'second'), 'com.example:docs:1.0.0@zip', { 'a.txt': 'a' });
        const repositories = new RepositoryHandler();
        repositories.maven(first);
        repositories.maven(second);
        const resolver = new ArtifactResolver(repositories, this.dir, path.join(this.dir, 'cache'));

        assert.strictEqual(await resolver.resolve('com.example:docs:1.0.0@zip'),
            path.join(this.dir, 'second', 'com', 'example', 'docs', '1.0.0', 'docs-1.0.0.zip'));
    }

    @test
    async 'fails when no repository holds the artifact'(): Promise<void> {
        const repositories = new RepositoryHandler();
        repositories.maven('repo');
        const resolver = new ArtifactResolver(repositories, this.dir, path.join(this.dir, 'cache'));

        await assert.rejects(resolver.resolve('com.example:docs:1.0.0@zip'), {
            coordinate: 'com.example:docs:1.0.0@zip',
            message: 'Could not resolve com.example:docs:1.0.0@zip: not found in repo',
            name: 'ResolutionError',
        });
    }

    @test
    async 'downloads from the first remote repository holding the artifact and caches it'(): Promise<void> {
        const server = await startRepositoryServer();
        try {
            const repositories = new RepositoryHandler();
            repositories.maven(`${server.baseUrl}/missing/`);
            repositories.maven(`${server.baseUrl}/repo`);
            const cacheDir = path.join(this.dir, 'cache');
            const resolver = new ArtifactResolver(repositories, this.dir, cacheDir);

            const file = await resolver.resolve('com.example:docs:1.0.0@zip');
            assert.strictEqual(file, path.join(cacheDir, 'com', 'example', 'docs', '1.0.0', 'docs-1.0.0.zip'));
            assert.strictEqual(await fs.readFile(file, 'utf-8'), 'archive');
            assert.deepStrictEqual(server.requests, [`/missing/${ARTIFACT}`, `/repo/${ARTIFACT}`]);

            assert.strictEqual(await resolver.resolve('com.example:docs:1.0.0@zip'), file);
            assert.strictEqual(server.requests.length, 2);
        } finally {
            await server.close();
        }
    }

    @test
    async 'fails when a remote repository answers with an error'(): Promise<void> {
        const server = await startRepositoryServer();
        try {
            const repositories = new RepositoryHandler();
            repositories.maven(`${server.baseUrl}/broken`);
            repositories.maven(`${server.baseUrl}/repo`);
            const resolver = new ArtifactResolver(repositories, this.dir, path.join(this.dir, 'cache'));

            await assert.rejects(resolver.resolve('com.example:docs:1.0.0@zip'), {
                message: `Could not resolve com.example:docs:1.0.0@zip: ${server.baseUrl}/broken/${ARTIFACT} returned 500 Internal Server Error`,
                name: 'ResolutionError',
            });
            assert.deepStrictEqual(server.requests, [`/broken/${ARTIFACT}`]);
            assert(!await fs.pathExists(path.join(this.dir, 'cache')));
        } finally {
            await server.close();
        }
    }

    @test
    async 'fails when there are no repositories'(): Promise<void> {
        const resolver = new ArtifactResolver(new RepositoryHandler(), this.dir, path.join(this.dir, 'cache'));
        await assert.rejects(resolver.resolve('com.example:docs:1.0.0'), /no repositories are defined/);
    }

    @test
    async 'Project#resolveArtifacts() uses default dependencies only when none are declared'(): Promise<void> {
        const repository = publishArchive(path.join(this.dir, 'repo'), 'com.example:defaults:1.0.0@zip', { 'a.txt': 'a' });
        publishArchive(path.join(this.dir, 'repo'), 'com.example:declared:1.0.0@zip', { 'b.txt': 'b' });
        const project = new Project({ projectDir: this.dir });
        project.repositories.maven(repository);
        const configuration: Configuration = project.configurations.maybeCreate('docs');
        configuration.defaultDependencies(dependencies => dependencies.add('com.example:defaults:1.0.0@zip'));

        assert.deepStrictEqual((await project.resolveArtifacts(configuration)).map(file => path.basename(file)), ['defaults-1.0.0.zip']);

        configuration.dependencies.add('com.example:declared:1.0.0@zip');
        assert.deepStrictEqual((await project.resolveArtifacts(configuration)).map(file => path.basename(file)), ['declared-1.0.0.zip']);
    }
}
