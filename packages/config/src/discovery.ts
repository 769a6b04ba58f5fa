import { stat } from 'node:fs/promises';
import path from 'node:path';

import { cosmiconfig, defaultLoaders, type Loader } from 'cosmiconfig';

import { parseIniSettings } from './parsing/ini.js';
import { parseSettingsText } from './parsing/settings-text.js';

export const DEFAULT_EVTLOG_CONFIG_FILES = Object.freeze([
  'evtlog.config.yaml',
  'evtlog.config.yml',
  'evtlog.config.json',
  'evtlog.config.ini',
  '.evtlogrc',
] as const);

export interface ResolveConfigPathOptions {
  readonly cwd?: string;
  readonly configPath?: string;
  readonly candidates?: readonly string[];
}

const MODULE_NAME = 'evtlog';

const iniLoader: Loader = (_filepath: string, content: string) => parseIniSettings(content);

const fallbackLoader: Loader = (filepath: string, content: string) =>
  parseSettingsText(content, filepath).document;

function createExplorer(searchPlaces: readonly string[]) {
  return cosmiconfig(MODULE_NAME, {
    cache: false,
    searchPlaces: [...searchPlaces],
    searchStrategy: 'none',
    loaders: {
      '.yaml': defaultLoaders['.yaml'],
      '.yml': defaultLoaders['.yml'],
      '.json': defaultLoaders['.json'],
      '.ini': iniLoader,
      noExt: fallbackLoader,
    },
  });
}

/**
 * Determines the absolute path of the logging configuration file.
 *
 * @param options - Overrides for the working directory, explicit path, or search candidates.
 * @returns The resolved configuration path.
 * @throws {Error} When the configuration cannot be found in the provided locations.
 */
export async function resolveConfigPath(options: ResolveConfigPathOptions = {}): Promise<string> {
  const cwd = path.resolve(options.cwd ?? process.cwd());

  if (options.configPath) {
    const resolvedPath = path.resolve(cwd, options.configPath);
    if (!(await isFile(resolvedPath))) {
      throw new Error(`Configuration file not found: ${options.configPath}`);
    }
    return resolvedPath;
  }

  const searchPlaces = options.candidates
    ? [...options.candidates]
    : [...DEFAULT_EVTLOG_CONFIG_FILES];
  const result = await createExplorer(searchPlaces).search(cwd);
  if (!result || result.isEmpty) {
    throw new Error('Unable to locate evtlog configuration file in the current directory.');
  }

  return result.filepath;
}

async function isFile(filePath: string): Promise<boolean> {
  try {
    return (await stat(filePath)).isFile();
  } catch (error) {
    if (isMissingFileError(error)) {
      return false;
    }
    throw error;
  }
}

function isMissingFileError(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}
