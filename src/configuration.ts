/**
 * @module
 * Named sets of dependencies.
 */

/**
 * A named set of dependency notations.
 */
export class Configuration {
    readonly name: string;
    /** Dependencies declared explicitly. */
    readonly dependencies: Set<string>;
    private readonly defaults: Array<(dependencies: Set<string>) => void>;

    constructor(name: string) {
        this.name = name;
        this.dependencies = new Set();
        this.defaults = [];
    }

    /**
     * Register an action that supplies dependencies when none were declared explicitly.
     */
    defaultDependencies(action: (dependencies: Set<string>) => void): void {
        this.defaults.push(action);
    }

    /**
     * Returns the declared dependencies, or the default ones if none were declared.
     */
    getDependencies(): string[] {
        if (this.dependencies.size)
            return [...this.dependencies];
        const dependencies = new Set<string>();
        for (const action of this.defaults)
            action(dependencies);
        return [...dependencies];
    }
}

/**
 * The configurations of a project.
 */
export class ConfigurationContainer {
    private readonly configurations: Map<string, Configuration>;

    constructor() {
        this.configurations = new Map();
    }

    /**
     * Returns the configuration named `name`, creating it if needed.
     */
    maybeCreate(name: string): Configuration {
        let configuration = this.configurations.get(name);
        if (!configuration) {
            configuration = new Configuration(name);
            this.configurations.set(name, configuration);
        }
        return configuration;
    }

    findByName(name: string): Configuration | undefined {
        return this.configurations.get(name);
    }

    getByName(name: string): Configuration {
        const configuration = this.configurations.get(name);
        if (!configuration)
            throw new Error(`Configuration with name '${name}' not found`);
        return configuration;
    }
}
