//
// Public API.
//
// Sessions own expensive tool handles and rebuild them when the fingerprint of the tool's files
// changes; generation steps run a session's tool per input file; the aggregator collects
// dependency facts over a module graph for manifest writers.
//

export {
    aggregateFromFacts,
    dependency,
    DependencyAggregator,
    emptyAggregate,
    fragment,
    mergeAggregates,
    ModuleGraph
} from "./engine/aggregate";
export type {
    AggregateResult,
    CollisionCallback,
    DependencyAggregatorOptions,
    DependencyDeclaration,
    DependencyFact,
    DependencyScope,
    FactSource,
    FragmentEntry,
    ModuleDefinition,
    SourceFragment
} from "./engine/aggregate";
export { concurrentMap, concurrentSettle, createConcurrentRunContext } from "./engine/concurrency";
export {
    CyclicDependencyError,
    DefinitionError,
    IdentifierCollisionWarning,
    InputNotFoundError,
    InvocationError,
    KilnError,
    SessionInitError
} from "./engine/errors";
export { fingerprint, getFileStatus, listInputFiles, statInputs } from "./engine/fingerprint";
export type { FileStatus, Fingerprint, InputFile } from "./engine/fingerprint";
export { classifyFormat, DEFAULT_FORMAT, DEFAULT_FORMAT_RULES, matchFormat } from "./engine/formats";
export type { FormatRule, FormatTag } from "./engine/formats";
export { GenerationStep } from "./engine/generate";
export type {
    FailurePolicy,
    GenerationOptions,
    GenerationRequest,
    GenerationResult,
    ToolHandle,
    ToolOptions
} from "./engine/generate";
export { createLogger } from "./engine/log";
export type { Logger } from "./engine/log";
export {
    DEFAULT_BUNDLER_DEV_DEPENDENCIES,
    PackageManifestWriter,
    packageManifest,
    renderPackageManifest
} from "./engine/manifest";
export type { ManifestWriter, PackageManifest } from "./engine/manifest";
export { CachedSession } from "./engine/session";
export type { CachedSessionOptions, HandleFactory, HandleRelease, SessionStats } from "./engine/session";
export { createToolSession, plugins, selectToolPlugin, ShellPlugin, TemplatePlugin, TypeScriptPlugin } from "./plugins";
export type { ToolPlugin } from "./plugins";
export { createProject, loadProject, parseKilnfile } from "./config/kilnfile";
export type { Kilnfile, KilnProject, ResolvedStep } from "./config/kilnfile";
export { KILN_DEFAULTS, KilnRunner } from "./runner";
export type { KilnParams, StepRun } from "./runner";
export { watchSteps, watchUntilSignal, WatchManager } from "./watch";
