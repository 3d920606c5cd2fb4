/**
 * Options Loader
 *
 * Loads and merges engine options from multiple sources with a clear precedence:
 *   defaults → user config → project config → env vars
 *
 * Only options live in files. The layout itself carries functions (providers,
 * click handlers) and is handed to Lazyline.setup() by the host binding.
 *
 * Option files use JSONC (JSON with Comments):
 *
 *   // ~/.config/lazyline/config.jsonc
 *   {
 *     // No hover tracking on slow terminals
 *     "features": { "hover": false }
 *   }
 */

import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import { homedir } from 'os';
import * as jsonc from 'jsonc-parser';
import type {
  DeepPartial,
  LazylineOptions,
  OptionOverrides,
} from '../shared/types.js';

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

export const DEFAULT_OPTIONS: LazylineOptions = {
  stylePrefix: 'LazyLine_',
  resetStyle: 'Normal',
  clickHandler: 'lazyline.click',
  mouseMoveKey: '<MouseMove>',
  commandLineHeight: 0,
  features: {
    hover: true,
    clicks: true,
  },
  debug: false,
};

// ---------------------------------------------------------------------------
// Config file paths
// ---------------------------------------------------------------------------

/**
 * Get paths for user-level and project-level option files.
 *
 *   User:    ~/.config/lazyline/config.jsonc
 *   Project: .lazyline.jsonc in the working directory
 *
 * XDG_CONFIG_HOME is respected if set.
 */
export function getConfigPaths(workingDirectory?: string): {
  user: string;
  project: string;
} {
  const userConfigDir =
    process.env.XDG_CONFIG_HOME ?? join(homedir(), '.config');

  return {
    user: join(userConfigDir, 'lazyline', 'config.jsonc'),
    project: join(workingDirectory ?? process.cwd(), '.lazyline.jsonc'),
  };
}

// ---------------------------------------------------------------------------
// Option narrowing
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Keep only known keys with the right types. Anything else in a file is
 * dropped rather than trusted.
 */
export function parseOptions(value: unknown): OptionOverrides {
  if (!isRecord(value)) return {};

  const options: OptionOverrides = {};

  for (const key of ['stylePrefix', 'resetStyle', 'clickHandler', 'mouseMoveKey'] as const) {
    const raw = value[key];
    if (typeof raw === 'string' && raw.length > 0) {
      options[key] = raw;
    }
  }

  const height = value.commandLineHeight;
  if (typeof height === 'number' && Number.isInteger(height) && height >= 0) {
    options.commandLineHeight = height;
  }

  if (typeof value.debug === 'boolean') {
    options.debug = value.debug;
  }

  const features = value.features;
  if (isRecord(features)) {
    const parsed: DeepPartial<LazylineOptions['features']> = {};
    if (typeof features.hover === 'boolean') parsed.hover = features.hover;
    if (typeof features.clicks === 'boolean') parsed.clicks = features.clicks;
    if (Object.keys(parsed).length > 0) options.features = parsed;
  }

  return options;
}

// ---------------------------------------------------------------------------
// JSONC file loader
// ---------------------------------------------------------------------------

/**
 * Load and parse a JSONC option file. Returns null if the file doesn't exist
 * or can't be read.
 */
export function loadJsoncFile(path: string): OptionOverrides | null {
  if (!existsSync(path)) {
    return null;
  }

  try {
    const content = readFileSync(path, 'utf-8');
    const errors: jsonc.ParseError[] = [];
    const result: unknown = jsonc.parse(content, errors, {
      allowTrailingComma: true,
      allowEmptyContent: true,
    });

    if (errors.length > 0) {
      // A partially valid file still applies
      console.warn(`[lazyline] Parse errors in ${path}:`, errors);
    }

    return parseOptions(result);
  } catch {
    return null;
  }
}

// ---------------------------------------------------------------------------
// Deep merge
// ---------------------------------------------------------------------------

/**
 * Recursively merge source into target. Objects are merged key-by-key,
 * primitives and arrays are replaced wholesale, undefined is skipped.
 *
 *   deepMerge(DEFAULT_OPTIONS, { features: { hover: false } })
 *   // features.clicks stays true
 */
export function deepMerge<T extends object>(
  target: T,
  source: DeepPartial<T>
): T {
  const result = { ...target };

  for (const key of Object.keys(source) as (keyof T)[]) {
    const sourceValue = source[key];
    const targetValue = result[key];

    if (
      sourceValue !== undefined &&
      typeof sourceValue === 'object' &&
      sourceValue !== null &&
      !Array.isArray(sourceValue) &&
      typeof targetValue === 'object' &&
      targetValue !== null &&
      !Array.isArray(targetValue)
    ) {
      result[key] = deepMerge(
        targetValue as Record<string, unknown>,
        sourceValue as Record<string, unknown>
      ) as T[keyof T];
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue as T[keyof T];
    }
  }

  return result;
}

// ---------------------------------------------------------------------------
// Environment variable overrides
// ---------------------------------------------------------------------------

function envFlag(name: string): boolean | undefined {
  const raw = process.env[name];
  if (raw === undefined) return undefined;
  return raw === 'true';
}

/**
 * Load option overrides from LAZYLINE_* environment variables.
 * Highest precedence.
 */
export function loadEnvConfig(): OptionOverrides {
  const config: OptionOverrides = {};

  const stylePrefix = process.env.LAZYLINE_STYLE_PREFIX;
  if (stylePrefix) config.stylePrefix = stylePrefix;

  const clickHandler = process.env.LAZYLINE_CLICK_HANDLER;
  if (clickHandler) config.clickHandler = clickHandler;

  const height = process.env.LAZYLINE_COMMAND_LINE_HEIGHT;
  if (height !== undefined) {
    const parsed = parseInt(height, 10);
    if (!isNaN(parsed) && parsed >= 0) {
      config.commandLineHeight = parsed;
    }
  }

  const hover = envFlag('LAZYLINE_HOVER');
  if (hover !== undefined) {
    config.features = { ...config.features, hover };
  }

  const clicks = envFlag('LAZYLINE_CLICKS');
  if (clicks !== undefined) {
    config.features = { ...config.features, clicks };
  }

  const debug = envFlag('LAZYLINE_DEBUG');
  if (debug !== undefined) config.debug = debug;

  return config;
}

// ---------------------------------------------------------------------------
// Main loader
// ---------------------------------------------------------------------------

/**
 * Load the fully merged engine options.
 *
 * Merge order (lowest to highest precedence):
 *   1. DEFAULT_OPTIONS
 *   2. User config     (~/.config/lazyline/config.jsonc)
 *   3. Project config  (.lazyline.jsonc)
 *   4. Environment     (LAZYLINE_* variables)
 */
export function loadOptions(workingDirectory?: string): LazylineOptions {
  let options: LazylineOptions = { ...DEFAULT_OPTIONS };

  const paths = getConfigPaths(workingDirectory);

  const userConfig = loadJsoncFile(paths.user);
  if (userConfig) {
    options = deepMerge(options, userConfig);
  }

  const projectConfig = loadJsoncFile(paths.project);
  if (projectConfig) {
    options = deepMerge(options, projectConfig);
  }

  const envConfig = loadEnvConfig();
  if (Object.keys(envConfig).length > 0) {
    options = deepMerge(options, envConfig);
  }

  return options;
}

/** Merge caller-supplied overrides over the defaults. */
export function resolveOptions(overrides: OptionOverrides = {}): LazylineOptions {
  return deepMerge(DEFAULT_OPTIONS, overrides);
}
