import * as path from 'path';
import { FsRepository } from './adapters/gateways/FsRepository';
import { DEFAULT_THEME_NAME } from './domain/theme';
import { MatchMode } from './utils/sorter';

export const CONFIG_FILE = '.c-complete.json';

export interface CompleterConfig {
  /** File extensions harvested by a scan */
  extensions: string[];
  /** Directory names never descended into */
  excludeDirs: string[];
  /** Apply the project's .gitignore files while scanning */
  respectGitignore: boolean;
  /** Files larger than this are skipped (null: no limit) */
  maxFileSizeKb: number | null;
  /** Stop a scan after this many files (null: no limit) */
  maxFiles: number | null;
  matchMode: MatchMode;
  /** Truncate ranked completions (null: no limit) */
  maxResults: number | null;
  theme: string;
}

export type ScanOptions = Pick<
  CompleterConfig,
  'extensions' | 'excludeDirs' | 'respectGitignore' | 'maxFileSizeKb' | 'maxFiles'
>;

export const DEFAULT_CONFIG: CompleterConfig = {
  extensions: ['.c', '.h'],
  excludeDirs: ['.git', 'node_modules'],
  respectGitignore: false,
  maxFileSizeKb: null,
  maxFiles: null,
  matchMode: 'contains',
  maxResults: null,
  theme: DEFAULT_THEME_NAME,
};

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === 'string');
}

function isLimit(value: unknown): value is number | null {
  return value === null || (typeof value === 'number' && Number.isInteger(value) && value > 0);
}

/** Keeps the recognised keys of a parsed config file whose values have the right shape. */
export function parseConfig(raw: unknown): Partial<CompleterConfig> {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new Error('configuration must be a JSON object');
  }

  const source = new Map<string, unknown>(Object.entries(raw));
  const config: Partial<CompleterConfig> = {};

  const extensions = source.get('extensions');
  if (isStringArray(extensions)) config.extensions = extensions;

  const excludeDirs = source.get('excludeDirs');
  if (isStringArray(excludeDirs)) config.excludeDirs = excludeDirs;

  const respectGitignore = source.get('respectGitignore');
  if (typeof respectGitignore === 'boolean') config.respectGitignore = respectGitignore;

  const maxFileSizeKb = source.get('maxFileSizeKb');
  if (isLimit(maxFileSizeKb)) config.maxFileSizeKb = maxFileSizeKb;

  const maxFiles = source.get('maxFiles');
  if (isLimit(maxFiles)) config.maxFiles = maxFiles;

  const matchMode = source.get('matchMode');
  if (matchMode === 'contains' || matchMode === 'prefix') config.matchMode = matchMode;

  const maxResults = source.get('maxResults');
  if (isLimit(maxResults)) config.maxResults = maxResults;

  const theme = source.get('theme');
  if (typeof theme === 'string') config.theme = theme;

  return config;
}

export async function loadConfig(
  projectRoot: string,
  fsRepo: FsRepository = new FsRepository(),
): Promise<CompleterConfig> {
  const configPath = path.join(projectRoot, CONFIG_FILE);
  try {
    const content = await fsRepo.readFileIfExists(configPath);
    if (content === null) {
      return { ...DEFAULT_CONFIG };
    }
    return { ...DEFAULT_CONFIG, ...parseConfig(JSON.parse(content)) };
  } catch (error) {
    console.warn(`Failed to read ${configPath}, using defaults:`, error);
    return { ...DEFAULT_CONFIG };
  }
}
