/**
 * @module
 * Maven-layout artifact repositories.
 */
import {
    ResolutionError,
} from './errors';
import fs = require('fs-extra');
import path = require('path');
import url = require('url');

/**
 * Parsed `group:name:version[:classifier][@extension]` notation.
 */
export interface Coordinate {
    group: string;
    name: string;
    version: string;
    classifier?: string;
    /** Default: `jar`. */
    extension: string;
}

/**
 * Parses a dependency notation.
 */
export function parseCoordinate(notation: string): Coordinate {
    const at = notation.lastIndexOf('@');
    const extension = at >= 0 ? notation.substring(at + 1) : 'jar';
    const parts = (at >= 0 ? notation.substring(0, at) : notation).split(':');
    if (parts.length < 3 || parts.length > 4 || parts.some(part => !part) || !extension)
        throw new ResolutionError(notation, 'expected group:name:version[:classifier][@extension]');
    const [group, name, version, classifier] = parts;
    return {
        classifier,
        extension,
        group,
        name,
        version,
    };
}

/**
 * Returns the path of an artifact relative to a repository root.
 */
export function artifactPath(coordinate: Coordinate): string {
    const classifier = coordinate.classifier ? `-${coordinate.classifier}` : '';
    return [
        ...coordinate.group.split('.'),
        coordinate.name,
        coordinate.version,
        `${coordinate.name}-${coordinate.version}${classifier}.${coordinate.extension}`,
    ].join('/');
}

/**
 * A repository: an `http(s):` or `file:` URL, or a directory path.
 */
export interface Repository {
    readonly url: string;
}

/**
 * The repositories of a project, in lookup order.
 */
export class RepositoryHandler {
    private readonly repositories: Repository[];

    constructor() {
        this.repositories = [];
    }

    isEmpty(): boolean {
        return !this.repositories.length;
    }

    /**
     * Add a maven-layout repository.
     */
    maven(repositoryUrl: string): Repository {
        const repository = { url: repositoryUrl.replace(/\/+$/, '') };
        this.repositories.push(repository);
        return repository;
    }

    toArray(): Repository[] {
        return [...this.repositories];
    }
}

/**
 * Resolves dependency notations to local artifact files.
 * Remote artifacts are downloaded into `cacheDir`.
 */
export class ArtifactResolver {
    private readonly repositories: RepositoryHandler;
    private readonly baseDir: string;
    private readonly cacheDir: string;

    constructor(repositories: RepositoryHandler, baseDir: string, cacheDir: string) {
        this.repositories = repositories;
        this.baseDir = baseDir;
        this.cacheDir = cacheDir;
    }

    async resolve(notation: string): Promise<string> {
        const relativePath = artifactPath(parseCoordinate(notation));
        const repositories = this.repositories.toArray();
        if (!repositories.length)
            throw new ResolutionError(notation, 'no repositories are defined');
        for (const repository of repositories) {
            const file = isRemote(repository.url)
                ? await this.download(notation, `${repository.url}/${relativePath}`, relativePath)
                : await this.findLocal(repository.url, relativePath);
            if (file)
                return file;
        }
        throw new ResolutionError(notation, `not found in ${repositories.map(r => r.url).join(', ')}`);
    }

    private async findLocal(repositoryUrl: string, relativePath: string): Promise<string | undefined> {
        const root = repositoryUrl.startsWith('file:') ? url.fileURLToPath(repositoryUrl) : path.resolve(this.baseDir, repositoryUrl);
        const file = path.join(root, ...relativePath.split('/'));
        return (await fs.pathExists(file)) ? file : undefined;
    }

    private async download(notation: string, artifactUrl: string, relativePath: string): Promise<string | undefined> {
        const file = path.join(this.cacheDir, ...relativePath.split('/'));
        if (await fs.pathExists(file))
            return file;
        let response: Response;
        try {
            response = await fetch(artifactUrl);
        } catch (error) {
            throw new ResolutionError(notation, `could not reach ${artifactUrl}`, { cause: error });
        }
        if (response.status === 404)
            return undefined;
        if (!response.ok)
            throw new ResolutionError(notation, `${artifactUrl} returned ${response.status} ${response.statusText}`);
        await fs.outputFile(file, Buffer.from(await response.arrayBuffer()));
        return file;
    }
}

function isRemote(repositoryUrl: string): boolean {
    return /^https?:/.test(repositoryUrl);
}
