import { CyclicDependencyError, DefinitionError, IdentifierCollisionWarning } from "./errors";
import { createLogger } from "./log";

const log = createLogger("aggregate");

export type DependencyScope = "runtime" | "dev";

export interface DependencyDeclaration {
    kind: "dependency";
    name: string;
    version: string;
    scope: DependencyScope;
}

/**
 * Generated source shipped alongside the manifest, `id` is its file name.
 */
export interface SourceFragment {
    kind: "fragment";
    id: string;
    content: string;
}

export type DependencyFact = DependencyDeclaration | SourceFragment;

export interface FragmentEntry {
    content: string;
    /** Module (or "local") that declared this content. */
    origin: string;
}

/**
 * Dependencies are kept in declaration order, duplicates included. Fragments are keyed by id,
 * the last merged declaration wins.
 */
export interface AggregateResult {
    readonly dependencies: readonly DependencyDeclaration[];
    readonly fragments: ReadonlyMap<string, FragmentEntry>;
}

export type CollisionCallback = (warning: IdentifierCollisionWarning) => void;

export function dependency(name: string, version: string, scope: DependencyScope = "runtime"): DependencyDeclaration {
    return { kind: "dependency", name, version, scope };
}

export function fragment(id: string, content: string): SourceFragment {
    return { kind: "fragment", id, content };
}

export function emptyAggregate(): AggregateResult {
    return { dependencies: [], fragments: new Map() };
}

/**
 * Combines two results, `b` after `a`: dependencies are appended and `b`'s fragments replace `a`'s
 * on equal ids.
 */
export function mergeAggregates(a: AggregateResult, b: AggregateResult, onCollision?: CollisionCallback): AggregateResult {
    const fragments = new Map(a.fragments);
    for (const [id, entry] of b.fragments) {
        const previous = fragments.get(id);
        if (previous !== undefined && previous.content !== entry.content && onCollision !== undefined) {
            onCollision(new IdentifierCollisionWarning(id, previous.origin, entry.origin));
        }
        fragments.set(id, entry);
    }
    return {
        dependencies: [...a.dependencies, ...b.dependencies],
        fragments
    };
}

export function aggregateFromFacts(
    facts: readonly DependencyFact[],
    origin: string,
    onCollision?: CollisionCallback
): AggregateResult {
    const dependencies: DependencyDeclaration[] = [];
    const fragments = new Map<string, FragmentEntry>();
    for (const fact of facts) {
        if (fact.kind === "dependency") {
            dependencies.push(fact);
            continue;
        }
        const previous = fragments.get(fact.id);
        if (previous !== undefined && previous.content !== fact.content && onCollision !== undefined) {
            onCollision(new IdentifierCollisionWarning(fact.id, origin, origin));
        }
        fragments.set(fact.id, { content: fact.content, origin });
    }
    return { dependencies, fragments };
}

export type FactSource = readonly DependencyFact[] | (() => readonly DependencyFact[] | Promise<readonly DependencyFact[]>);

export interface ModuleDefinition {
    id: string;
    /** Direct dependencies, in the order their facts are merged. */
    dependsOn: string[];
    facts: FactSource;
}

//
// Module graph
//
export class ModuleGraph {
    private readonly modules = new Map<string, ModuleDefinition>();

    constructor(modules: Iterable<ModuleDefinition> = []) {
        for (const module of modules) {
            this.add(module);
        }
    }

    add(module: ModuleDefinition): this {
        if (this.modules.has(module.id)) {
            throw new DefinitionError(`${module.id}: module defined twice`);
        }
        this.modules.set(module.id, module);
        return this;
    }

    has(id: string): boolean {
        return this.modules.has(id);
    }

    get(id: string): ModuleDefinition {
        const module = this.modules.get(id);
        if (module === undefined) {
            throw new DefinitionError(`unknown module: ${id}`);
        }
        return module;
    }

    ids(): string[] {
        return Array.from(this.modules.keys());
    }

    /**
     * Every module reachable from `roots`, dependencies before dependents.
     *
     * Throws `CyclicDependencyError` naming the first cycle found and `DefinitionError` for
     * dependencies on undefined modules.
     */
    dependencyOrder(roots: string[]): string[] {
        const order: string[] = [];
        const state = new Map<string, "visiting" | "done">();

        for (const root of roots) {
            if (state.get(root) === "done") {
                continue;
            }
            this.get(root);
            const stack: Array<{ id: string; next: number }> = [{ id: root, next: 0 }];
            state.set(root, "visiting");

            while (stack.length > 0) {
                const frame = stack[stack.length - 1];
                const module = this.get(frame.id);
                if (frame.next === module.dependsOn.length) {
                    stack.pop();
                    state.set(frame.id, "done");
                    order.push(frame.id);
                    continue;
                }
                const depId = module.dependsOn[frame.next++];
                if (!this.modules.has(depId)) {
                    throw new DefinitionError(`${frame.id}: unknown dependency: ${depId}`);
                }
                const depState = state.get(depId);
                if (depState === "done") {
                    continue;
                }
                if (depState === "visiting") {
                    const path = stack.map(f => f.id);
                    throw new CyclicDependencyError([...path.slice(path.indexOf(depId)), depId]);
                }
                state.set(depId, "visiting");
                stack.push({ id: depId, next: 0 });
            }
        }
        return order;
    }
}

export interface DependencyAggregatorOptions {
    /** Defaults to logging the warning. */
    onWarning?: CollisionCallback;
}

/**
 * Collects facts over a module graph.
 *
 * A module's aggregate is its dependencies' aggregates, in `dependsOn` order, followed by its own
 * facts. Each module is computed at most once per aggregator, so use one aggregator per build.
 */
export class DependencyAggregator {
    private readonly memo = new Map<string, Promise<AggregateResult>>();
    private readonly onWarning: CollisionCallback;

    constructor(readonly graph: ModuleGraph, options: DependencyAggregatorOptions = {}) {
        this.onWarning =
            options.onWarning ??
            (warning => {
                log.warn(`warning: ${warning.message}`);
            });
    }

    /**
     * Merges the aggregates of `transitiveModules`, in the given order, then `localFacts` last so
     * local fragments win collisions.
     */
    async aggregate(
        localFacts: readonly DependencyFact[],
        transitiveModules: string[],
        origin: string = "local"
    ): Promise<AggregateResult> {
        this.graph.dependencyOrder(transitiveModules);
        const upstream = await Promise.all(transitiveModules.map(id => this.memoized(id)));

        let result = emptyAggregate();
        for (const moduleResult of upstream) {
            result = mergeAggregates(result, moduleResult, this.onWarning);
        }
        return mergeAggregates(result, aggregateFromFacts(localFacts, origin, this.onWarning), this.onWarning);
    }

    async aggregateModule(id: string): Promise<AggregateResult> {
        this.graph.dependencyOrder([id]);
        return this.memoized(id);
    }

    // Callers validate the graph first, a cycle here would never settle.
    private memoized(id: string): Promise<AggregateResult> {
        let result = this.memo.get(id);
        if (result === undefined) {
            result = this.compute(id);
            this.memo.set(id, result);
        }
        return result;
    }

    private async compute(id: string): Promise<AggregateResult> {
        const module = this.graph.get(id);
        const upstream = await Promise.all(module.dependsOn.map(depId => this.memoized(depId)));
        const facts = typeof module.facts === "function" ? await module.facts() : module.facts;
        log.debug("#compute %s: %d upstream, %d facts", id, upstream.length, facts.length);

        let result = emptyAggregate();
        for (const moduleResult of upstream) {
            result = mergeAggregates(result, moduleResult, this.onWarning);
        }
        return mergeAggregates(result, aggregateFromFacts(facts, id, this.onWarning), this.onWarning);
    }
}
