/**
 * Configuration for upgrade runs.
 *
 * Values come from four layers, later layers winning:
 *
 * 1. Built-in defaults
 * 2. `.sbt-upgrade.jsonc` in the project root (JSON with comments)
 * 3. Environment (`SBT_UPGRADE_REGISTRY_URL`, `SBT_UPGRADE_CONCURRENCY`)
 * 4. Command-line flags
 *
 * @example `.sbt-upgrade.jsonc`
 * ```jsonc
 * {
 *   // internal mirror
 *   "registryUrl": "https://repo.example.com/maven2",
 *   "concurrency": 4,
 *   "exclude": ["org.scala-lang:*"]
 * }
 * ```
 *
 * @module
 */

import { type ParseError as JsoncParseError, parse as parseJsonc, printParseErrorCode } from 'jsonc-parser';
import { z } from 'zod';
import { DEFAULT_REGISTRY_URL } from '../deps/MavenCentralClient.ts';
import type { BuildFileStore } from '../services/BuildFileStore.ts';

export const CONFIG_FILE = '.sbt-upgrade.jsonc';

export const UpgradeConfigSchema = z.object({
  registryUrl: z.url().describe('Maven repository root'),
  concurrency: z.number().int().min(1).max(64).describe('Registry worker count'),
  retries: z.number().int().min(0).max(10).describe('Retries for network failures'),
  retryBackoffMs: z.number().int().min(0).describe('First retry delay, doubled per attempt'),
  timeoutMs: z.number().int().min(1).describe('Per-request timeout'),
  includePreRelease: z.boolean().describe('Offer pre-release versions'),
  backup: z.boolean().describe('Keep <file>.bak next to rewritten files'),
  files: z.array(z.string().min(1)).min(1).describe('Build files, first one required; `*` matches within a directory'),
  exclude: z.array(z.string().min(1)).describe('Coordinate patterns never offered'),
});

export type UpgradeConfig = z.infer<typeof UpgradeConfigSchema>;

/** One configuration layer; every key optional, unknown keys rejected. */
export const UpgradeConfigFileSchema = UpgradeConfigSchema.partial().strict();

export type UpgradeConfigLayer = z.infer<typeof UpgradeConfigFileSchema>;

export const DEFAULT_UPGRADE_CONFIG: UpgradeConfig = {
  registryUrl: DEFAULT_REGISTRY_URL,
  concurrency: 8,
  retries: 2,
  retryBackoffMs: 250,
  timeoutMs: 10000,
  includePreRelease: false,
  backup: true,
  files: ['build.sbt', 'project/plugins.sbt', 'project/*.scala'],
  exclude: [],
};

/**
 * Invalid configuration from any layer.
 */
export class ConfigError extends Error {
  override readonly name = 'ConfigError';
  readonly source: string;

  constructor(source: string, detail: string) {
    super(`Invalid configuration in ${source}: ${detail}`);
    this.source = source;
  }
}

/**
 * Parse the contents of a config file.
 *
 * @throws ConfigError on syntax errors, unknown keys or invalid values
 */
export function parseConfigFile(text: string, source = CONFIG_FILE): UpgradeConfigLayer {
  const errors: JsoncParseError[] = [];
  const raw: unknown = parseJsonc(text, errors, { allowTrailingComma: true, allowEmptyContent: true });

  if (errors.length > 0) {
    const [first] = errors;
    throw new ConfigError(
      source,
      `${printParseErrorCode(first.error)} at offset ${first.offset}`,
    );
  }

  return validateLayer(raw ?? {}, source);
}

/**
 * Read the recognised environment variables.
 *
 * @throws ConfigError when a variable has an invalid value
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): UpgradeConfigLayer {
  const layer: Record<string, unknown> = {};

  if (env.SBT_UPGRADE_REGISTRY_URL) {
    layer.registryUrl = env.SBT_UPGRADE_REGISTRY_URL;
  }

  if (env.SBT_UPGRADE_CONCURRENCY) {
    layer.concurrency = Number(env.SBT_UPGRADE_CONCURRENCY);
  }

  return validateLayer(layer, 'environment');
}

/**
 * Merge layers over the defaults, later layers winning.
 *
 * @throws ConfigError when the merged result is invalid
 */
export function resolveConfig(...layers: UpgradeConfigLayer[]): UpgradeConfig {
  const merged: Record<string, unknown> = { ...DEFAULT_UPGRADE_CONFIG };

  for (const layer of layers) {
    for (const [key, value] of Object.entries(layer)) {
      if (value !== undefined) merged[key] = value;
    }
  }

  const result = UpgradeConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new ConfigError('options', z.prettifyError(result.error));
  }

  return result.data;
}

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;

  /** Values from command-line flags */
  overrides?: UpgradeConfigLayer;
}

/**
 * Load the effective configuration for a project.
 *
 * @throws ConfigError
 */
export async function loadUpgradeConfig(
  store: BuildFileStore,
  options: LoadConfigOptions = {},
): Promise<UpgradeConfig> {
  const file = (await store.Exists(CONFIG_FILE))
    ? parseConfigFile(await store.Read(CONFIG_FILE))
    : {};

  const overrides = validateLayer(options.overrides ?? {}, 'command-line flags');

  return resolveConfig(file, configFromEnv(options.env), overrides);
}

function validateLayer(raw: unknown, source: string): UpgradeConfigLayer {
  const result = UpgradeConfigFileSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(source, z.prettifyError(result.error));
  }

  return result.data;
}
