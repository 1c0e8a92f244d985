import path from 'path';
import type { Writable } from 'stream';
import { printContact, printVersion } from './banner.js';
import type { VersionInfo } from './banner.js';
import type { ConfigResult } from './config/loader.js';
import { ExecutableLocator } from './locator/locator.js';
import type { PathSearch } from './locator/path-search.js';
import { ProcessRunner } from './runner/runner.js';
import type { ProcessSpawner } from './runner/process.js';
import { loadTargetRegistry } from './targets/registry-loader.js';
import type { TargetRegistry } from './targets/types.js';

export interface ToolkitOverrides {
  pathSearch?: PathSearch;
  spawner?: ProcessSpawner;
  stdout?: Writable;
  stderr?: Writable;
  selfPath?: string;
}

export interface Toolkit {
  locator: ExecutableLocator;
  runner: ProcessRunner;
  printContact(): void;
  printVersion(info: VersionInfo): void;
}

/**
 * Wire a locator, a runner and banner printers from a loaded configuration.
 * Without a registry file, every command is looked up on the PATH.
 */
export async function createToolkit(
  loaded: Pick<ConfigResult, 'config' | 'configPath'>,
  overrides: ToolkitOverrides = {}
): Promise<Toolkit> {
  const { config } = loaded;
  const configDir = path.dirname(path.resolve(loaded.configPath));

  let registry: TargetRegistry | null = null;
  let baseDir = configDir;
  if (config.targets.registry_file) {
    const result = await loadTargetRegistry(path.resolve(configDir, config.targets.registry_file));
    registry = result.registry;
    baseDir = result.baseDir;
  }

  const locator = new ExecutableLocator({
    baseDir,
    prefix: config.targets.prefix,
    registry,
    pathSearch: overrides.pathSearch,
    selfPath: overrides.selfPath,
  });
  const out = overrides.stdout ?? process.stdout;
  const runner = new ProcessRunner({
    locator,
    spawner: overrides.spawner,
    stdout: out,
    stderr: overrides.stderr,
    defaults: config.execution,
  });

  return {
    locator,
    runner,
    printContact: () => printContact(config.banner.contact, out),
    printVersion: (info) => printVersion(info, out, config.banner),
  };
}
