// Config loader: reads ~/.config/garmin-coach/config.yaml (or an explicit path),
// validates it against configSchema and fills every unset key from the defaults.
// Nothing is ever written; a missing default file simply means "use defaults".
import { readFileSync, existsSync } from 'node:fs';
import { join } from 'node:path';
import { homedir } from 'node:os';
import { parse as parseYaml } from 'yaml';
import type { ZodError } from 'zod';
import { configSchema, envSchema } from './schema.js';
import type { CoachConfig, CoachEnv } from './schema.js';
import type { GlobalFlags } from '../command/types.js';
import { CoachError, CoachErrorCode } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

export const DEFAULT_CONFIG_PATH = join(homedir(), '.config', 'garmin-coach', 'config.yaml');

export interface ConfigResult {
  config: CoachConfig;
  configPath: string;
  fromFile: boolean;
}

function formatIssues(error: ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

export function readEnv(env: NodeJS.ProcessEnv = process.env): CoachEnv {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new CoachError(CoachErrorCode.CONFIG_INVALID, `Invalid environment: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

/**
 * Load configuration. An explicit path (from --config or GARMIN_COACH_CONFIG)
 * must exist; the default path is optional.
 */
export function loadConfig(explicitPath?: string): ConfigResult {
  const configPath = explicitPath ?? DEFAULT_CONFIG_PATH;

  if (!existsSync(configPath)) {
    if (explicitPath !== undefined) {
      throw new CoachError(CoachErrorCode.CONFIG_INVALID, `Config file not found: ${configPath}`, { configPath });
    }
    logger.debug({ configPath }, 'No config file found, using defaults');
    return { config: configSchema.parse({}), configPath, fromFile: false };
  }

  let raw: string;
  try {
    raw = readFileSync(configPath, 'utf-8');
  } catch (err) {
    throw new CoachError(CoachErrorCode.CONFIG_INVALID, `Could not read config file: ${configPath}`, {
      configPath,
      cause: err instanceof Error ? err.message : String(err),
    });
  }

  let document: unknown;
  try {
    document = parseYaml(raw);
  } catch (err) {
    throw new CoachError(CoachErrorCode.CONFIG_INVALID, `Config file is not valid YAML: ${configPath}`, {
      configPath,
      cause: err instanceof Error ? err.message : String(err),
    });
  }

  // An empty file parses to null.
  const parsed = configSchema.safeParse(document ?? {});
  if (!parsed.success) {
    throw new CoachError(
      CoachErrorCode.CONFIG_INVALID,
      `Invalid config file ${configPath}: ${formatIssues(parsed.error)}`,
      { configPath }
    );
  }
  logger.debug({ configPath }, 'Loaded config file');
  return { config: parsed.data, configPath, fromFile: true };
}

/** Settings the dispatcher runs with, after every layer has been applied. */
export interface DispatchSettings {
  operations: CoachConfig['operations'];
  workingDirectory?: string;
  passKind: boolean;
  timeoutMs?: number;
}

/** defaults < config file < environment < command-line flags */
export function resolveSettings(config: CoachConfig, env: CoachEnv, flags: GlobalFlags): DispatchSettings {
  return {
    operations: config.operations,
    workingDirectory: config.working_directory ?? undefined,
    passKind: flags.passKind ?? env.GARMIN_COACH_PASS_KIND ?? config.pass_kind,
    timeoutMs: flags.timeoutMs ?? env.GARMIN_COACH_TIMEOUT_MS ?? config.timeout_ms ?? undefined,
  };
}
