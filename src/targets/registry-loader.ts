import fs from 'fs/promises';
import path from 'path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ExecError, ExecErrorCode, describeCause } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import type { TargetRegistry } from './types.js';

const RegistryFileSchema = z.record(z.string().min(1), z.string().min(1));

export interface LoadedRegistry {
  registry: TargetRegistry;
  /** Directory the registry's relative paths are resolved against. */
  baseDir: string;
}

// Registry files are written by the build system. JSON is valid YAML, so one parser reads both.
export async function loadTargetRegistry(file: string): Promise<LoadedRegistry> {
  const registryPath = path.resolve(file);

  let raw: string;
  try {
    raw = await fs.readFile(registryPath, 'utf-8');
  } catch (err) {
    throw new ExecError(ExecErrorCode.REGISTRY_INVALID, `Cannot read target registry: ${registryPath}`, {
      cause: describeCause(err),
    });
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(raw);
  } catch (err) {
    throw new ExecError(ExecErrorCode.REGISTRY_INVALID, `Failed to parse target registry at ${registryPath}`, {
      cause: describeCause(err),
    });
  }

  const result = RegistryFileSchema.safeParse(parsed ?? {});
  if (!result.success) {
    throw new ExecError(ExecErrorCode.REGISTRY_INVALID, `Target registry at ${registryPath} must map target names to paths`, {
      issues: result.error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`),
    });
  }

  const registry = new Map(Object.entries(result.data));
  logger.debug({ registryPath, targets: registry.size }, 'Loaded target registry');
  return { registry, baseDir: path.dirname(registryPath) };
}
