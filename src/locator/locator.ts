import fs from 'fs/promises';
import path from 'path';
import { logger } from '../shared/logger.js';
import { isKnownTarget, parseTargetId, registryKey, resolveIdentifier } from '../targets/resolver.js';
import type { TargetRegistry, TargetScope } from '../targets/types.js';
import { WhichPathSearch } from './path-search.js';
import type { PathSearch } from './path-search.js';

/**
 * Placeholder written by multi-configuration generators in place of the
 * configuration directory, which is only known when the build runs.
 */
export const BUILD_CONFIG_PLACEHOLDER = '$(IntDir)';

/** Configuration directories tried for the placeholder, most preferred first. */
export const BUILD_CONFIGURATIONS = ['Release', 'Debug', 'RelWithDebInfo', 'MinSizeRel'] as const;

const WINDOWS_EXECUTABLE_SUFFIXES = ['.exe', '.com'];

export interface LocatorOptions {
  /** Directory that relative registry paths are resolved against. */
  baseDir: string;
  prefix?: string | null;
  registry?: TargetRegistry | null;
  pathSearch?: PathSearch;
  /** Path reported for the running program; defaults to the script Node was started with. */
  selfPath?: string;
  platform?: NodeJS.Platform;
}

export class ExecutableLocator {
  private readonly baseDir: string;
  private readonly prefix: string | null;
  private readonly registry: TargetRegistry | null;
  private readonly pathSearch: PathSearch;
  private readonly selfPath: string;
  private readonly platform: NodeJS.Platform;

  constructor(options: LocatorOptions) {
    this.baseDir = path.resolve(options.baseDir);
    this.prefix = options.prefix ?? null;
    this.registry = options.registry ?? null;
    this.pathSearch = options.pathSearch ?? new WhichPathSearch();
    this.selfPath = options.selfPath ?? process.argv[1] ?? process.execPath;
    this.platform = options.platform ?? process.platform;
  }

  /**
   * Absolute path of an executable.
   *
   * Without a name, the path of the running program. A known build target
   * maps to its built executable; any other name is searched on the PATH.
   * Returns `undefined` when nothing is found.
   */
  async locate(name?: string, scope?: TargetScope): Promise<string | undefined> {
    if (name === undefined) {
      try {
        return await fs.realpath(this.selfPath);
      } catch {
        return path.resolve(this.selfPath);
      }
    }

    const prefix = scope?.prefix !== undefined ? scope.prefix : this.prefix;
    const registry = scope?.registry !== undefined ? scope.registry : this.registry;

    if (registry && isKnownTarget(name, prefix, registry)) {
      const uid = resolveIdentifier(name, prefix, registry) ?? name;
      const key = registryKey(parseTargetId(uid));
      const stored = registry.get(key);
      if (stored !== undefined) {
        logger.debug({ name, uid, stored }, 'Resolved build target');
        return this.resolveTargetPath(path.resolve(this.baseDir, stored));
      }
    }

    const found = await this.pathSearch.find(name);
    logger.debug({ name, found: found ?? null }, 'Searched PATH');
    return found === undefined ? undefined : path.resolve(found);
  }

  async locateName(name?: string, scope?: TargetScope): Promise<string | undefined> {
    const exePath = await this.locate(name, scope);
    if (exePath === undefined) return undefined;
    const base = path.basename(exePath);
    if (this.platform === 'win32') {
      const suffix = WINDOWS_EXECUTABLE_SUFFIXES.find((s) => base.toLowerCase().endsWith(s));
      if (suffix) return base.slice(0, -suffix.length);
    }
    return base;
  }

  async locateDirectory(name?: string, scope?: TargetScope): Promise<string | undefined> {
    const exePath = await this.locate(name, scope);
    return exePath === undefined ? undefined : path.dirname(exePath);
  }

  private async resolveTargetPath(targetPath: string): Promise<string> {
    if (!targetPath.includes(BUILD_CONFIG_PLACEHOLDER)) return targetPath;

    for (const config of BUILD_CONFIGURATIONS) {
      const candidate = targetPath.split(BUILD_CONFIG_PLACEHOLDER).join(config);
      if (await isFile(candidate)) return candidate;
    }

    const fallback = path.normalize(targetPath.split(BUILD_CONFIG_PLACEHOLDER).join(''));
    logger.warn({ targetPath, fallback }, 'No build configuration directory contains the target');
    return fallback;
  }
}

async function isFile(p: string): Promise<boolean> {
  try { return (await fs.stat(p)).isFile(); } catch { return false; }
}
