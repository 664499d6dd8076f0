/**
 * @module
 * Task graph execution.
 */
import {
    BuildError,
    TaskGraphError,
} from './errors';
import type {
    TaskOutcome,
} from './errors';
import type {
    Progress,
} from './progress';
import type {
    Task,
    TaskContext,
    TaskDependency,
} from './task';
import util = require('util');

/**
 * Looks up tasks by name.
 */
export interface TaskLookup {
    getByName(name: string): Task;
}

class GraphNode {
    task: Task;
    children: Set<GraphNode>; // dependents
    parents: Set<GraphNode>; // dependencies that have not completed yet

    constructor(task: Task) {
        this.task = task;
        this.children = new Set();
        this.parents = new Set();
    }
}

class Graph {
    /** Mapping from tasks to graph nodes */
    private nodes: Map<Task, GraphNode>;
    /** Graph nodes with no incoming edges, ready to run. */
    private rootNodes: Set<GraphNode>;

    constructor() {
        this.nodes = new Map();
        this.rootNodes = new Set();
    }

    /**
     * Returns true if the graph has root nodes (nodes with no incoming edges).
     */
    hasRootNodes(): boolean {
        return this.rootNodes.size > 0;
    }

    get size(): number {
        return this.nodes.size;
    }

    /**
     * Returns an iterator over the graph's root nodes.
     */
    getRootNodes(): IterableIterator<GraphNode> {
        return this.rootNodes.values();
    }

    addNode(task: Task): GraphNode {
        let node = this.nodes.get(task);
        if (node)
            return node;
        node = new GraphNode(task);
        this.nodes.set(task, node);
        this.rootNodes.add(node);
        return node;
    }

    addEdge(src: GraphNode, dst: GraphNode): void {
        src.children.add(dst);
        dst.parents.add(src);
        this.rootNodes.delete(dst);
    }

    /**
     * Remove a completed node, releasing its dependents.
     */
    deleteNode(node: GraphNode): void {
        if (node.parents.size)
            throw new Error('Node has parents');
        for (const dst of node.children) {
            dst.parents.delete(node);
            if (!dst.parents.size)
                this.rootNodes.add(dst);
        }
        this.nodes.delete(node.task);
        this.rootNodes.delete(node);
    }

    /**
     * Remove a node and everything that depends on it.
     * Returns the removed dependents.
     */
    pruneNode(node: GraphNode): Task[] {
        const removed: Task[] = [];
        const visit = (n: GraphNode) => {
            if (!this.nodes.has(n.task))
                return;
            for (const parent of n.parents)
                parent.children.delete(n);
            this.nodes.delete(n.task);
            this.rootNodes.delete(n);
            if (n !== node)
                removed.push(n.task);
            for (const child of n.children)
                visit(child);
        };
        visit(node);
        return removed;
    }

    /**
     * Add a task and, recursively, the tasks it depends on.
     */
    addSubgraph(lookup: TaskLookup, task: Task, stack?: Set<Task>): GraphNode {
        let node = this.nodes.get(task);
        if (node)
            return node; // subgraph rooted at node already added
        if (!stack)
            stack = new Set();
        if (stack.has(task))
            throw new TaskGraphError(`Circular dependency detected at task '${task.name}'`);
        stack.add(task);
        const deps = [...task.dependencies].map(dep => resolveDependency(lookup, dep));
        const depNodes = deps.map(dep => this.addSubgraph(lookup, dep, stack));
        node = this.addNode(task);
        for (const depNode of depNodes)
            this.addEdge(depNode, node);
        stack.delete(task);
        return node;
    }
}

function resolveDependency(lookup: TaskLookup, dep: TaskDependency): Task {
    return typeof dep === 'string' ? lookup.getByName(dep) : dep;
}

interface SuccessWorkerResult {
    status: 'success';
    output: Buffer[];
    graphNode: GraphNode;
}

interface FailureWorkerResult {
    status: 'failure';
    output: Buffer[];
    graphNode: GraphNode;
    error: unknown;
}

type WorkerResult = SuccessWorkerResult | FailureWorkerResult;

class Executor {
    private maxWorkers: number;
    private graph: Graph;
    private workers: Map<GraphNode, Promise<WorkerResult>>;
    private progress: Progress;
    private outcomes: Map<string, TaskOutcome>;

    constructor(maxWorkers: number, progress: Progress) {
        this.maxWorkers = Math.max(1, maxWorkers);
        this.graph = new Graph();
        this.workers = new Map();
        this.progress = progress;
        this.outcomes = new Map();
    }

    async execute(lookup: TaskLookup, tasks: Task[]): Promise<ReadonlyMap<string, TaskOutcome>> {
        for (const task of tasks)
            this.graph.addSubgraph(lookup, task);

        const total = this.graph.size;
        let numRun = 0;
        let failure: FailureWorkerResult | undefined;

        while (this.graph.hasRootNodes() || this.workers.size) {
            this.fillUpWorkers();
            const result = await Promise.race(this.workers.values());
            this.workers.delete(result.graphNode);
            this.printResult(result);
            const task = result.graphNode.task;
            numRun++;
            this.progress.taskFinished(task.description || task.name, numRun, total);
            if (result.status === 'success') {
                this.outcomes.set(task.name, 'success');
                this.graph.deleteNode(result.graphNode);
            } else {
                this.outcomes.set(task.name, 'failed');
                if (!failure)
                    failure = result;
                // Dependents of a failed task never run; independent tasks carry on.
                for (const skipped of this.graph.pruneNode(result.graphNode))
                    this.outcomes.set(skipped.name, 'skipped');
            }
        }
        this.progress.finish(this.outcomes);

        if (failure)
            throw new BuildError(failure.graphNode.task.name, failure.error, this.outcomes);
        return this.outcomes;
    }

    /**
     * Add as many workers as we can.
     */
    private fillUpWorkers(): void {
        while (this.graph.hasRootNodes() && this.workers.size < this.maxWorkers) {
            const graphNode = this.findAvailableGraphNode();
            if (!graphNode)
                break;

            this.workers.set(graphNode, this.runNode(graphNode));
        }
    }

    /**
     * Find a graphNode that is a root node but is not being processed.
     * Returns undefined if such graph node could not be found.
     */
    private findAvailableGraphNode(): GraphNode | undefined {
        for (const graphNode of this.graph.getRootNodes())
            if (!this.workers.has(graphNode))
                return graphNode;
        return undefined;
    }

    private async runNode(graphNode: GraphNode): Promise<WorkerResult> {
        const ctx: TaskContext = {
            output: [],
        };
        try {
            for (const fn of graphNode.task.getActions())
                await fn(ctx);
        } catch (error) {
            return {
                error,
                graphNode,
                output: ctx.output,
                status: 'failure',
            };
        }
        return {
            graphNode,
            output: ctx.output,
            status: 'success',
        };
    }

    private printResult(result: WorkerResult): void {
        for (const output of result.output)
            this.progress.write(output);
        if (result.status === 'failure')
            this.progress.write(`> Task :${result.graphNode.task.name} FAILED\n${util.inspect(result.error)}\n`);
    }
}

/**
 * Run `tasks` and everything they depend on.
 * Resolves to the outcome of every task that was part of the build;
 * rejects with a {@link BuildError} naming the first failed task.
 */
export function execute(lookup: TaskLookup, tasks: Task[], maxWorkers: number, progress: Progress): Promise<ReadonlyMap<string, TaskOutcome>> {
    const executor = new Executor(maxWorkers, progress);
    return executor.execute(lookup, tasks);
}
