import { promises as fs } from "fs";
import * as path from "path";
import { z } from "zod";

import { dependency, DependencyFact, fragment, ModuleGraph } from "../engine/aggregate";
import { DefinitionError, describeError } from "../engine/errors";
import { GenerationOptions } from "../engine/generate";

//
// Kilnfile.json: modules with their dependency facts, generation steps and manifests to write.
// Relative paths are relative to the Kilnfile's directory.
//

const packageVersions = z.record(z.string(), z.string());

export const ModuleSchema = z
    .object({
        dependsOn: z.array(z.string()).default([]),
        dependencies: packageVersions.default({}),
        devDependencies: packageVersions.default({}),
        /** Fragment id => content. */
        fragments: z.record(z.string(), z.string()).default({}),
        /** Fragment id => file the content is read from. */
        fragmentFiles: z.record(z.string(), z.string()).default({})
    })
    .strict();

export const StepSchema = z
    .object({
        tool: z.string(),
        toolPaths: z.array(z.string()).default([]),
        sources: z.array(z.string()).min(1),
        patterns: z.array(z.string()).min(1).default(["**/*"]),
        dest: z.string(),
        jobs: z.number().int().positive().optional(),
        policy: z.enum(["best-effort", "fail-fast"]).optional(),
        strictFormats: z.boolean().default(false),
        settings: z.record(z.string(), z.unknown()).default({}),
        toolOptions: z.record(z.string(), z.unknown()).default({})
    })
    .strict();

export const ManifestSchema = z
    .object({
        module: z.string(),
        dest: z.string(),
        bundlerDevDependencies: z.boolean().default(false),
        devDependencies: packageVersions.default({})
    })
    .strict();

export const KilnfileSchema = z
    .object({
        modules: z.record(z.string(), ModuleSchema).default({}),
        steps: z.record(z.string(), StepSchema).default({}),
        manifests: z.record(z.string(), ManifestSchema).default({})
    })
    .strict();

export type ModuleConfig = z.infer<typeof ModuleSchema>;
export type StepConfig = z.infer<typeof StepSchema>;
export type ManifestConfig = z.infer<typeof ManifestSchema>;
export type Kilnfile = z.infer<typeof KilnfileSchema>;

export interface ResolvedStep {
    name: string;
    tool: string;
    /** Empty when the tool's defaults apply. */
    toolPaths: string[];
    sources: string[];
    patterns: string[];
    dest: string;
    settings: Record<string, unknown>;
    options: GenerationOptions;
}

export interface KilnProject {
    root: string;
    kilnfile: Kilnfile;
    graph: ModuleGraph;
    steps: Map<string, ResolvedStep>;
    manifests: Map<string, ManifestConfig>;
}

export function formatIssues(error: z.ZodError): string {
    return error.issues.map(issue => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`).join("; ");
}

export function parseKilnfile(json: unknown, source: string): Kilnfile {
    const parsed = KilnfileSchema.safeParse(json);
    if (!parsed.success) {
        throw new DefinitionError(`${source}: ${formatIssues(parsed.error)}`);
    }
    return parsed.data;
}

/**
 * Facts of one module, fragment files are read when the facts are first asked for.
 */
export function moduleFacts(config: ModuleConfig, root: string): () => Promise<DependencyFact[]> {
    return async () => {
        const facts: DependencyFact[] = [
            ...Object.entries(config.dependencies).map(([name, version]) => dependency(name, version, "runtime")),
            ...Object.entries(config.devDependencies).map(([name, version]) => dependency(name, version, "dev")),
            ...Object.entries(config.fragments).map(([id, content]) => fragment(id, content))
        ];
        for (const [id, file] of Object.entries(config.fragmentFiles)) {
            facts.push(fragment(id, await fs.readFile(path.resolve(root, file), "utf-8")));
        }
        return facts;
    };
}

export function buildModuleGraph(kilnfile: Kilnfile, root: string): ModuleGraph {
    const graph = new ModuleGraph();
    for (const [id, config] of Object.entries(kilnfile.modules)) {
        graph.add({ id, dependsOn: config.dependsOn, facts: moduleFacts(config, root) });
    }
    return graph;
}

export function resolveStep(name: string, config: StepConfig, root: string): ResolvedStep {
    return {
        name,
        tool: config.tool,
        toolPaths: config.toolPaths.map(p => path.resolve(root, p)),
        sources: config.sources.map(p => path.resolve(root, p)),
        patterns: config.patterns,
        dest: path.resolve(root, config.dest),
        settings: config.settings,
        options: {
            jobs: config.jobs,
            policy: config.policy,
            strictFormats: config.strictFormats,
            toolOptions: config.toolOptions
        }
    };
}

export function createProject(kilnfile: Kilnfile, root: string): KilnProject {
    const graph = buildModuleGraph(kilnfile, root);
    const manifests = new Map(Object.entries(kilnfile.manifests));
    for (const [name, manifest] of manifests) {
        if (!graph.has(manifest.module)) {
            throw new DefinitionError(`manifest ${name}: unknown module: ${manifest.module}`);
        }
    }
    // surfaces cycles and unknown dependencies before anything runs
    graph.dependencyOrder(graph.ids());

    const steps = new Map<string, ResolvedStep>();
    for (const [name, config] of Object.entries(kilnfile.steps)) {
        steps.set(name, resolveStep(name, config, root));
    }
    return { root, kilnfile, graph, steps, manifests };
}

export async function loadProject(kilnfilePath: string): Promise<KilnProject> {
    const absPath = path.resolve(kilnfilePath);
    let json: unknown;
    try {
        json = JSON.parse(await fs.readFile(absPath, "utf-8"));
    } catch (error) {
        throw new DefinitionError(`${absPath}: cannot read Kilnfile: ${describeError(error)}`, { cause: error });
    }
    return createProject(parseKilnfile(json, absPath), path.dirname(absPath));
}
