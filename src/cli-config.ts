/**
 * Configuration Loader for fxlit
 * Loads and validates .fxlit.yaml configuration files.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import * as yaml from 'yaml';

// ============================================================
// CONSTANTS
// ============================================================

/** Configuration file name */
export const CONFIG_FILE_NAME = '.fxlit.yaml';

export interface FxConfig {
  readonly functionName?: string | undefined;
  readonly lineMarkers?: boolean | undefined;
}

// ============================================================
// VALIDATION
// ============================================================

const KNOWN_KEYS = new Set(['functionName', 'lineMarkers']);

/**
 * Validate configuration structure and values.
 * Throws Error if configuration is invalid.
 */
export function validateConfig(data: unknown): FxConfig {
  // An empty file parses to null
  if (data === null || data === undefined) {
    return {};
  }
  if (typeof data !== 'object' || Array.isArray(data)) {
    throw new Error('Invalid configuration: must be a mapping');
  }

  const entries = new Map<string, unknown>(Object.entries(data));
  for (const key of entries.keys()) {
    if (!KNOWN_KEYS.has(key)) {
      throw new Error(`Invalid configuration: unknown key ${key}`);
    }
  }

  let functionName: string | undefined;
  const rawName = entries.get('functionName');
  if (rawName !== undefined) {
    if (typeof rawName !== 'string' || rawName.trim() === '') {
      throw new Error(
        'Invalid configuration: functionName must be a non-empty string'
      );
    }
    functionName = rawName;
  }

  let lineMarkers: boolean | undefined;
  const rawMarkers = entries.get('lineMarkers');
  if (rawMarkers !== undefined) {
    if (typeof rawMarkers !== 'boolean') {
      throw new Error('Invalid configuration: lineMarkers must be a boolean');
    }
    lineMarkers = rawMarkers;
  }

  return { functionName, lineMarkers };
}

// ============================================================
// CONFIGURATION LOADING
// ============================================================

/**
 * Parse configuration text.
 *
 * @throws Error with "Invalid configuration: {reason}" for malformed YAML or values
 */
export function parseConfig(text: string): FxConfig {
  let data: unknown;
  try {
    data = yaml.parse(text);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new Error(`Invalid configuration: ${reason}`);
  }
  return validateConfig(data);
}

/**
 * Load configuration from .fxlit.yaml in the specified directory.
 *
 * @param cwd - Directory to search for configuration file
 * @returns FxConfig object, or null if file not found
 */
export function loadConfig(cwd: string): FxConfig | null {
  const configPath = join(cwd, CONFIG_FILE_NAME);

  // Return null if file not found (not an error)
  if (!existsSync(configPath)) {
    return null;
  }

  return parseConfig(readFileSync(configPath, 'utf-8'));
}

/**
 * Load configuration from an explicit path. A missing file is an error.
 */
export function loadConfigFile(configPath: string): FxConfig {
  return parseConfig(readFileSync(configPath, 'utf-8'));
}
