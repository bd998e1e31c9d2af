import fs from 'node:fs';
import path from 'node:path';
import type { CliOverrides } from './cli';
import {
  DEFAULT_COLORS,
  DEFAULT_EXCLUDES,
  DEFAULT_ICONS,
  DEFAULT_MAX_BYTES,
  DEFAULT_OUTPUT_FILE,
  IGNORE_FILE,
} from './constants';
import { ConfigurationError } from './errors';

export interface SelectionIcons {
  selected: string;
  partial: string;
  unselected: string;
}

export interface SelectionColors {
  selected: string;
  unselected: string;
}

export interface ExplorerConfig {
  rootPath: string;
  outputFile: string;
  excludes: string[];
  includeHidden: boolean;
  maxBytesPerFile: number;
  embedBinary: boolean;
  icons: SelectionIcons;
  colors: SelectionColors;
}

export function defaultConfig(rootPath: string): ExplorerConfig {
  return {
    rootPath,
    outputFile: DEFAULT_OUTPUT_FILE,
    excludes: [...DEFAULT_EXCLUDES],
    includeHidden: true,
    maxBytesPerFile: DEFAULT_MAX_BYTES,
    embedBinary: false,
    icons: {
      selected: DEFAULT_ICONS.SELECTED,
      partial: DEFAULT_ICONS.PARTIAL,
      unselected: DEFAULT_ICONS.UNSELECTED,
    },
    colors: {
      selected: DEFAULT_COLORS.SELECTED,
      unselected: DEFAULT_COLORS.UNSELECTED,
    },
  };
}

/** One pattern per line; blank lines and `#` comments are skipped. */
export function readIgnoreFile(filePath: string): string[] {
  if (!fs.existsSync(filePath)) return [];

  return fs
    .readFileSync(filePath, 'utf8')
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith('#'));
}

function splitList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function parseMaxBytes(raw: string): number {
  const trimmed = raw.trim();
  if (!/^\d+$/.test(trimmed) || Number(trimmed) < 1) {
    throw new ConfigurationError(`Invalid byte limit: ${raw}`);
  }
  return Number(trimmed);
}

function resolveRoot(rawRoot: string, cwd: string): string {
  const rootPath = path.resolve(cwd, rawRoot);
  const stats = fs.statSync(rootPath, { throwIfNoEntry: false });

  if (!stats) {
    throw new ConfigurationError(`Root directory does not exist: ${rootPath}`);
  }
  if (!stats.isDirectory()) {
    throw new ConfigurationError(`Root is not a directory: ${rootPath}`);
  }
  return fs.realpathSync(rootPath);
}

/**
 * Builds the configuration from defaults, then environment variables, then
 * command line overrides. Throws ConfigurationError for a missing root or an
 * unusable byte limit.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: CliOverrides = {},
  cwd: string = process.cwd()
): ExplorerConfig {
  const rootPath = resolveRoot(overrides.rootDir ?? env.ROOT_DIR ?? '.', cwd);
  const config = defaultConfig(rootPath);

  if (env.OUTPUT) config.outputFile = env.OUTPUT;
  if (overrides.outputFile) config.outputFile = overrides.outputFile;

  if (env.EXCLUDES !== undefined) config.excludes = splitList(env.EXCLUDES);
  config.excludes.push(...readIgnoreFile(path.join(rootPath, IGNORE_FILE)));
  config.excludes.push(...(overrides.excludes ?? []));

  if (env.INCLUDE_HIDDEN !== undefined) {
    config.includeHidden = !['0', 'false', 'False'].includes(env.INCLUDE_HIDDEN);
  }
  if (overrides.includeHidden !== undefined) config.includeHidden = overrides.includeHidden;

  const maxBytes = overrides.maxBytes ?? env.MAX_BYTES;
  if (maxBytes !== undefined) config.maxBytesPerFile = parseMaxBytes(maxBytes);

  if (env.READ_BINARY !== undefined) {
    config.embedBinary = ['1', 'true', 'True'].includes(env.READ_BINARY);
  }
  if (overrides.embedBinary !== undefined) config.embedBinary = overrides.embedBinary;

  config.icons.selected = env.ICON_SELECTED || config.icons.selected;
  config.icons.partial = env.ICON_PARTIAL || config.icons.partial;
  config.icons.unselected = env.ICON_UNSELECTED || config.icons.unselected;
  config.colors.selected = env.SELECT_COLOR?.trim().toLowerCase() || config.colors.selected;
  config.colors.unselected = env.UNSELECT_COLOR?.trim().toLowerCase() || config.colors.unselected;

  return config;
}
