/**
 * Configuration file loader
 */

import fs from 'node:fs';
import path from 'node:path';
import { z, type ZodError } from 'zod';
import { cliOverridesSchema, configSchema, type Config } from './schema.js';

export const CONFIG_FILE_NAMES = [
  'wordchain.config.json',
  '.wordchainrc.json',
  '.wordchainrc',
] as const;

const PACKAGE_CONFIG_KEY = 'wordchain';

const packageManifestSchema = z.object({ [PACKAGE_CONFIG_KEY]: z.unknown() });

function formatIssues(error: ZodError): string {
  return error.errors.map(e => `  - ${e.path.join('.') || '(root)'}: ${e.message}`).join('\n');
}

function parseJson(content: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(content) };
  } catch {
    return { ok: false };
  }
}

export async function loadConfig(configPath: string): Promise<Config> {
  const absolutePath = path.resolve(configPath);

  if (!fs.existsSync(absolutePath)) {
    throw new Error(`Config file not found: ${absolutePath}`);
  }

  const content = await fs.promises.readFile(absolutePath, 'utf-8');
  const parsed = parseJson(content);
  if (!parsed.ok) {
    throw new Error(`Invalid JSON in config file: ${absolutePath}`);
  }

  const result = configSchema.safeParse(parsed.value);

  if (!result.success) {
    throw new Error(`Invalid configuration in ${absolutePath}:\n${formatIssues(result.error)}`);
  }

  return result.data;
}

export function getDefaultConfig(): Config {
  return configSchema.parse({});
}

/**
 * Search `startDir` and its parents for a config file, or a `wordchain`
 * key in package.json. Unreadable package.json files are skipped.
 */
export async function findConfig(startDir: string): Promise<Config | null> {
  let currentDir = path.resolve(startDir);
  const root = path.parse(currentDir).root;

  while (currentDir !== root) {
    for (const configName of CONFIG_FILE_NAMES) {
      const configPath = path.join(currentDir, configName);
      if (fs.existsSync(configPath)) {
        return loadConfig(configPath);
      }
    }

    const packagePath = path.join(currentDir, 'package.json');
    if (fs.existsSync(packagePath)) {
      const parsed = parseJson(await fs.promises.readFile(packagePath, 'utf-8'));
      const manifest = parsed.ok ? packageManifestSchema.safeParse(parsed.value) : null;
      if (manifest?.success && manifest.data[PACKAGE_CONFIG_KEY] !== undefined) {
        const result = configSchema.safeParse(manifest.data[PACKAGE_CONFIG_KEY]);
        if (!result.success) {
          throw new Error(`Invalid configuration in ${packagePath}:\n${formatIssues(result.error)}`);
        }
        return result.data;
      }
    }

    currentDir = path.dirname(currentDir);
  }

  return null;
}

export async function loadConfigOrDefault(startDir: string): Promise<Config> {
  const config = await findConfig(startDir);
  return config ?? getDefaultConfig();
}

/**
 * Layer raw command-line values over a loaded config
 */
export function applyOverrides(config: Config, overrides: Record<string, unknown>): Config {
  const result = cliOverridesSchema.safeParse(overrides);

  if (!result.success) {
    const errors = result.error.errors
      .map(e => `  - --${e.path.join('.')}: ${e.message}`)
      .join('\n');
    throw new Error(`Invalid options:\n${errors}`);
  }

  return {
    words: result.data.words ?? config.words,
    prefix: result.data.prefix ?? config.prefix,
    seed: result.data.seed ?? config.seed,
  };
}

export interface ResolveConfigOptions {
  /** Explicit config file; skips the directory search */
  configPath?: string;
  /** Where the directory search starts */
  cwd?: string;
  overrides?: Record<string, unknown>;
}

export async function resolveConfig(options: ResolveConfigOptions = {}): Promise<Config> {
  const base = options.configPath
    ? await loadConfig(options.configPath)
    : await loadConfigOrDefault(options.cwd ?? process.cwd());

  return applyOverrides(base, options.overrides ?? {});
}

export { configSchema, type Config } from './schema.js';
