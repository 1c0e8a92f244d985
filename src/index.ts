export { ExecError, ExecErrorCode } from './shared/errors.js';
export { logger } from './shared/logger.js';
export { toQuotedString, splitQuoted } from './shared/quoting.js';
export { NAMESPACE_SEPARATOR } from './targets/types.js';
export type { TargetId, TargetRegistry, TargetScope } from './targets/types.js';
export { resolveIdentifier, isKnownTarget, parseTargetId, formatTargetId, registryKey } from './targets/resolver.js';
export { loadTargetRegistry } from './targets/registry-loader.js';
export type { LoadedRegistry } from './targets/registry-loader.js';
export { ExecutableLocator, BUILD_CONFIG_PLACEHOLDER, BUILD_CONFIGURATIONS } from './locator/locator.js';
export type { LocatorOptions } from './locator/locator.js';
export { WhichPathSearch } from './locator/path-search.js';
export type { PathSearch } from './locator/path-search.js';
export { ProcessRunner, normalizeInvocation } from './runner/runner.js';
export type { Invocation, InvocationArg, ExecuteOptions, CapturedExecution, RunnerOptions } from './runner/runner.js';
export { ExecaSpawner } from './runner/process.js';
export type { ProcessSpawner, SpawnedProcess, ProcessCompletion } from './runner/process.js';
export { CaptureSink, EchoSink, readLines } from './runner/lines.js';
export type { LineSink } from './runner/lines.js';
export { printContact, printVersion, DEFAULT_BANNER } from './banner.js';
export type { BannerDefaults, VersionInfo } from './banner.js';
export { loadConfig, defaultConfig, ConfigSchema } from './config/loader.js';
export type { ToolkitConfig, ConfigResult } from './config/loader.js';
export { createToolkit } from './toolkit.js';
export type { Toolkit, ToolkitOverrides } from './toolkit.js';
