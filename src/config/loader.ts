// Config loader — reads ~/.config/target-exec/config.yaml (or an explicit path) and
// fills every key the file leaves out from the schema defaults.
// Unlike the registry, the config file is optional: without one, defaults apply.
import { readFileSync, existsSync } from 'fs';
import { join } from 'path';
import { homedir } from 'os';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ExecError, ExecErrorCode, describeCause } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

const DEFAULT_CONFIG_PATH = join(homedir(), '.config', 'target-exec', 'config.yaml');

export const ConfigSchema = z.object({
  banner: z
    .object({
      contact: z.string().default(''),
      copyright: z.string().default(''),
      license: z.string().default(''),
    })
    .default({}),
  targets: z
    .object({
      /** Namespace of the calling project, used to qualify bare target names. */
      prefix: z.string().min(1).nullable().default(null),
      /** Registry file; relative paths are resolved against the config file's directory. */
      registry_file: z.string().min(1).nullable().default(null),
    })
    .default({}),
  execution: z
    .object({
      verbosity: z.number().int().min(0).default(0),
      simulate: z.boolean().default(false),
      quiet: z.boolean().default(false),
    })
    .default({}),
});

export type ToolkitConfig = z.infer<typeof ConfigSchema>;

export interface ConfigResult {
  config: ToolkitConfig;
  configPath: string;
  fromFile: boolean;
}

export function defaultConfig(): ToolkitConfig {
  return ConfigSchema.parse({});
}

export function loadConfig(explicitPath?: string): ConfigResult {
  const configPath = explicitPath ?? process.env['TARGET_EXEC_CONFIG'] ?? DEFAULT_CONFIG_PATH;

  if (!existsSync(configPath)) {
    logger.debug({ configPath }, 'No config file found, using defaults');
    return { config: defaultConfig(), configPath, fromFile: false };
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(readFileSync(configPath, 'utf-8'));
  } catch (err) {
    throw new ExecError(ExecErrorCode.CONFIG_INVALID, `Failed to parse config at ${configPath}`, {
      cause: describeCause(err),
    });
  }

  const result = ConfigSchema.safeParse(parsed ?? {});
  if (!result.success) {
    throw new ExecError(ExecErrorCode.CONFIG_INVALID, `Invalid config at ${configPath}`, {
      issues: result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
  }
  return { config: result.data, configPath, fromFile: true };
}
