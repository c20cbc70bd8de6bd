/**
 * Configuration loader for ox.
 *
 * Loads ox.config.json (or .oxrc.json) from a script's directory or the
 * working directory. Supplies the call-depth limit, tracing and extra
 * module search paths.
 */

import * as fs from 'fs';
import * as path from 'path';

export interface OxConfig {
  maxCallDepth?: number;
  trace?: boolean;
  /** Extra directories searched for imported modules, relative to the config file. */
  modulePaths?: string[];
}

export const CONFIG_FILENAMES = ['ox.config.json', '.oxrc.json'];

/**
 * Load ox configuration from the filesystem.
 *
 * Search order:
 * 1. Explicit path (if provided)
 * 2. ox.config.json in cwd
 * 3. .oxrc.json in cwd
 *
 * Returns empty config if no file is found.
 */
export function loadConfig(explicitPath?: string): OxConfig {
  if (explicitPath) {
    return readConfigFile(explicitPath);
  }
  return findConfigIn(process.cwd()) ?? {};
}

/**
 * Load config relative to a script file's directory, falling back to cwd.
 */
export function loadConfigForScript(scriptPath: string): OxConfig {
  const scriptDir = path.dirname(path.resolve(scriptPath));
  return findConfigIn(scriptDir) ?? loadConfig();
}

function findConfigIn(dir: string): OxConfig | undefined {
  for (const filename of CONFIG_FILENAMES) {
    const filePath = path.join(dir, filename);
    if (fs.existsSync(filePath)) {
      return readConfigFile(filePath);
    }
  }
  return undefined;
}

function readConfigFile(filePath: string): OxConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new Error(`Invalid JSON in config file ${filePath}: ${error.message}`);
    }
    throw error;
  }
  const config = validateConfig(raw, filePath);
  if (config.modulePaths) {
    const base = path.dirname(path.resolve(filePath));
    config.modulePaths = config.modulePaths.map((dir) => path.resolve(base, dir));
  }
  return config;
}

/**
 * Validate config structure. Throws on invalid config.
 */
export function validateConfig(raw: unknown, filePath: string): OxConfig {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new Error(`Invalid config in ${filePath}: must be a JSON object`);
  }

  const config: OxConfig = {};
  const entries = new Map<string, unknown>(Object.entries(raw));

  const maxCallDepth = entries.get('maxCallDepth');
  if (maxCallDepth !== undefined) {
    if (typeof maxCallDepth !== 'number' || !Number.isInteger(maxCallDepth) || maxCallDepth < 1) {
      throw new Error(`Invalid "maxCallDepth" in ${filePath}: must be a positive integer`);
    }
    config.maxCallDepth = maxCallDepth;
  }

  const trace = entries.get('trace');
  if (trace !== undefined) {
    if (typeof trace !== 'boolean') {
      throw new Error(`Invalid "trace" in ${filePath}: must be a boolean`);
    }
    config.trace = trace;
  }

  const modulePaths = entries.get('modulePaths');
  if (modulePaths !== undefined) {
    if (!Array.isArray(modulePaths)) {
      throw new Error(`Invalid "modulePaths" in ${filePath}: must be an array of strings`);
    }
    const dirs: string[] = [];
    for (const dir of modulePaths) {
      if (typeof dir !== 'string') {
        throw new Error(`Invalid "modulePaths" in ${filePath}: must be an array of strings`);
      }
      dirs.push(dir);
    }
    config.modulePaths = dirs;
  }

  return config;
}
