/**
 * @module
 * Task dependency graph.
 */
import {
    ConfigurationError,
    CycleError,
    DuplicateTaskError,
    NotFoundError,
    UnresolvedDependencyError,
} from './errors';
import type {
    Task,
} from './task';

/**
 * Directed acyclic graph of tasks. Edges point from a task to the tasks it depends on. Tasks are kept in
 * insertion order, which is the order the scheduler considers them in.
 *
 * The topology is fixed once {@link TaskGraph#validate} succeeds.
 */
export class TaskGraph {
    private readonly nodes: Map<string, Task>;
    /** Reverse edges: task key -> keys of tasks that depend on it. */
    private readonly reverse: Map<string, string[]>;
    private readonly artifacts: Set<string>;
    private validated: boolean;

    constructor() {
        this.nodes = new Map();
        this.reverse = new Map();
        this.artifacts = new Set();
        this.validated = false;
    }

    get isValidated(): boolean {
        return this.validated;
    }

    get size(): number {
        return this.nodes.size;
    }

    addTask(task: Task): void {
        this.checkMutable();
        if (this.nodes.has(task.key))
            throw new DuplicateTaskError(task.key);
        this.nodes.set(task.key, task);
    }

    /**
     * Declares an artifact produced outside of the graph (e.g. a checked-in file) that tasks may depend on.
     */
    addArtifact(id: string): void {
        this.checkMutable();
        this.artifacts.add(id);
    }

    has(key: string): boolean {
        return this.nodes.has(key);
    }

    get(key: string): Task {
        const task = this.nodes.get(key);
        if (!task)
            throw new NotFoundError('task', key);
        return task;
    }

    /** All tasks in insertion order. */
    tasks(): Task[] {
        return [...this.nodes.values()];
    }

    /**
     * Keys of the tasks `key` depends on directly. Declared artifacts are not included.
     */
    dependencies(key: string): string[] {
        return (this.get(key).deps ?? []).filter(x => this.nodes.has(x));
    }

    /**
     * Keys of the tasks that depend on `key` directly, in insertion order.
     */
    dependents(key: string): string[] {
        if (this.validated)
            return this.reverse.get(key) ?? [];
        return this.tasks().filter(x => (x.deps ?? []).includes(key)).map(x => x.key);
    }

    /**
     * Checks that every dependency resolves and that the graph has no cycle.
     */
    validate(): void {
        if (this.validated)
            return;

        for (const task of this.nodes.values()) {
            for (const dep of task.deps ?? []) {
                if (!this.nodes.has(dep) && !this.artifacts.has(dep))
                    throw new UnresolvedDependencyError(task.key, dep);
            }
        }

        const cycle = this.findCycle();
        if (cycle)
            throw new CycleError(cycle);

        for (const task of this.nodes.values()) {
            for (const dep of new Set(this.dependencies(task.key))) {
                let list = this.reverse.get(dep);
                if (!list) {
                    list = [];
                    this.reverse.set(dep, list);
                }
                list.push(task.key);
            }
        }
        this.validated = true;
    }

    /**
     * Returns the given targets and everything they depend on transitively, in insertion order.
     * All tasks are returned if no targets are given.
     */
    select(targets?: string[]): Task[] {
        if (!targets)
            return this.tasks();
        const selected = new Set<string>();
        const stack = targets.map(x => this.get(x).key);
        while (stack.length) {
            const key = stack.pop();
            if (key === undefined || selected.has(key))
                continue;
            selected.add(key);
            stack.push(...this.dependencies(key));
        }
        return this.tasks().filter(x => selected.has(x.key));
    }

    /**
     * Returns the tasks ordered so that every task comes after its dependencies. Ties are broken by insertion
     * order.
     */
    topologicalOrder(): Task[] {
        this.validate();
        const remaining = new Map<string, number>();
        for (const task of this.nodes.values())
            remaining.set(task.key, new Set(this.dependencies(task.key)).size);
        const order: Task[] = [];
        const done = new Set<string>();
        while (order.length < this.nodes.size) {
            for (const task of this.nodes.values()) {
                if (done.has(task.key) || remaining.get(task.key) !== 0)
                    continue;
                done.add(task.key);
                order.push(task);
                for (const dependent of this.dependents(task.key))
                    remaining.set(dependent, (remaining.get(dependent) ?? 0) - 1);
                break;
            }
        }
        return order;
    }

    /**
     * Depth-first search for a back edge. Returns the cycle as a list of keys with the first key repeated at the
     * end, or undefined.
     */
    private findCycle(): string[] | undefined {
        const finished = new Set<string>();
        const path: string[] = [];
        const onPath = new Set<string>();

        const visit = (key: string): string[] | undefined => {
            if (finished.has(key))
                return undefined;
            if (onPath.has(key))
                return [...path.slice(path.indexOf(key)), key];
            path.push(key);
            onPath.add(key);
            for (const dep of this.dependencies(key)) {
                const cycle = visit(dep);
                if (cycle)
                    return cycle;
            }
            path.pop();
            onPath.delete(key);
            finished.add(key);
            return undefined;
        };

        for (const key of this.nodes.keys()) {
            const cycle = visit(key);
            if (cycle)
                return cycle;
        }
        return undefined;
    }

    private checkMutable(): void {
        if (this.validated)
            throw new ConfigurationError('tasks cannot be added after the graph was validated');
    }
}
