import type {
    Configuration,
} from './configuration';
import type {
    Task,
} from './task';

/**
 * Scalar value of an attribute or option.
 */
export type AttributeValue = string | boolean | number;

/**
 * Attributes or options, keyed by name.
 */
export type AttributeSet = Readonly<Record<string, AttributeValue>>;

/**
 * Kind of output a render job produces.
 */
export type BackendType = 'html' | 'other';

/**
 * A documentation rendering task, as the conventions see it.
 */
export interface RenderJob extends Task {
    /**
     * Directory the job renders from, relative to the project directory unless absolute.
     * Reads through the redirect once one is set; assigning it still records the authored directory.
     */
    sourceDir: string;
    /** The directory last assigned to `sourceDir`. */
    getAssignedSourceDir(): string;
    /** Make `sourceDir` read from `redirect`, evaluated on each read. */
    redirectSourceDir(redirect: () => string): void;
    /** Output directory, relative to the project directory unless absolute. */
    outputDir: string;
    readonly backendType: BackendType;
    /** Absolute output directory of each backend. */
    getBackendOutputDirectories(): string[];
    /** Merge `attributes` into the job's attributes; later writes of a key win. */
    attributes(attributes: AttributeSet): void;
    getAttributes(): AttributeSet;
    /** Merge `options` into the job's options; later writes of a key win. */
    options(options: AttributeSet): void;
    getOptions(): AttributeSet;
    /** Add configurations whose dependencies are loaded as rendering extensions. */
    configurations(...configurations: Configuration[]): void;
    /** Resolve the base directory of each document from the directory of its source file. */
    baseDirFollowsSourceFile(): void;
}
