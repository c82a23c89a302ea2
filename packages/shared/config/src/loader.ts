/**
 * memsift.toml loader
 *
 * Locates the configuration file and parses it into an unvalidated document.
 * Every lookup reads the environment it is handed, so callers that inject an
 * `env` also control where the file is found.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import * as TOML from '@iarna/toml';
import { MemsiftError, MemsiftErrorCodes, errorMessage } from '@memsift/types';

/**
 * Parsed but not yet validated configuration document
 */
export type RawConfig = Record<string, unknown>;

export const CONFIG_FILE_NAME = 'memsift.toml';

/** Environment variable naming an explicit configuration file */
export const CONFIG_PATH_ENV = 'MEMSIFT_CONFIG';

/**
 * The file is missing, unreadable or not valid TOML
 */
export class ConfigLoadError extends MemsiftError {
  readonly path?: string;

  constructor(message: string, options: { path?: string; cause?: Error } = {}) {
    super({
      code: MemsiftErrorCodes.CONFIG,
      message,
      component: 'config',
      details: options.path ? { path: options.path } : undefined,
      timestamp: new Date().toISOString(),
      cause: options.cause,
    });
    this.name = 'ConfigLoadError';
    this.path = options.path;
  }
}

/**
 * Candidate locations, most specific first: `./memsift.toml`, then
 * `~/.memsift/memsift.toml` when the environment names a home directory.
 */
export function getConfigSearchPaths(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): string[] {
  const paths = [path.join(cwd, CONFIG_FILE_NAME)];

  const homeDir = env.HOME || env.USERPROFILE;
  if (homeDir) {
    paths.push(path.join(homeDir, '.memsift', CONFIG_FILE_NAME));
  }

  return paths;
}

export function findConfigFile(searchPaths: readonly string[]): string | null {
  return searchPaths.find((candidate) => fs.existsSync(candidate)) ?? null;
}

/**
 * Parse TOML text into a configuration document
 */
export function parseToml(content: string, source = 'TOML'): RawConfig {
  try {
    return TOML.parse(content);
  } catch (error) {
    throw new ConfigLoadError(`Failed to parse ${source}: ${errorMessage(error)}`, {
      path: source === 'TOML' ? undefined : source,
      cause: error instanceof Error ? error : undefined,
    });
  }
}

export function loadTomlFile(filePath: string): RawConfig {
  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new ConfigLoadError(`Failed to read ${filePath}: ${errorMessage(error)}`, {
      path: filePath,
      cause: error instanceof Error ? error : undefined,
    });
  }
  return parseToml(content, filePath);
}

export interface LoadConfigFileOptions {
  /** Explicit file; overrides MEMSIFT_CONFIG and the search paths */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}

/**
 * Resolve and parse the configuration file.
 *
 * An explicit path (option or MEMSIFT_CONFIG) must exist; otherwise the
 * first file found in the search paths is used.
 *
 * @throws ConfigLoadError if no file is found or it cannot be parsed
 */
export function loadConfig(options: LoadConfigFileOptions = {}): RawConfig {
  const env = options.env ?? process.env;
  const explicit = options.configPath || env[CONFIG_PATH_ENV];

  if (explicit) {
    if (!fs.existsSync(explicit)) {
      throw new ConfigLoadError(`Configuration file not found: ${explicit}`, { path: explicit });
    }
    return loadTomlFile(explicit);
  }

  const searchPaths = getConfigSearchPaths(env, options.cwd);
  const found = findConfigFile(searchPaths);
  if (!found) {
    throw new ConfigLoadError(`No ${CONFIG_FILE_NAME} found in: ${searchPaths.join(', ')}`);
  }

  return loadTomlFile(found);
}
