/**
 * Default configuration and config loading for distship
 */

import { readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { resolve, join } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { ConfigError } from './errors.js';
import type { ReleaseConfig } from './types.js';

export const DEFAULT_CONFIG: ReleaseConfig = {
  versionFile: 'VERSION',

  workspace: {
    dirs: ['build', 'dist', '.eggs', '.tox'],
    distDir: 'dist',
  },

  toolchain: {
    // twine is installed alongside build since the publish step needs it
    tools: ['build', 'twine'],
  },

  registry: {
    url: 'https://pypi.org',
    timeout: 2000,
  },

  git: {
    remote: 'origin',
    branch: 'main',
    tagPrefix: '',
  },

  verify: {
    requireNewer: true,
    requireCleanWorktree: true,
  },
};

export const CONFIG_FILE_NAMES = [
  'distship.config.yaml',
  'distship.config.yml',
  'distship.config.json',
  '.distshiprc',
  '.distshiprc.yaml',
  '.distshiprc.yml',
  '.distshiprc.json',
];

type ConfigOverride = {
  package?: string;
  versionFile?: string;
  workspace?: Partial<ReleaseConfig['workspace']>;
  toolchain?: Partial<ReleaseConfig['toolchain']>;
  registry?: Partial<ReleaseConfig['registry']>;
  git?: Partial<ReleaseConfig['git']>;
  verify?: Partial<ReleaseConfig['verify']>;
};

export interface LoadedConfig {
  config: ReleaseConfig;
  /** Config file that was read, if any */
  source?: string;
}

export async function loadConfig(
  targetPath: string,
  env: NodeJS.ProcessEnv = process.env
): Promise<LoadedConfig> {
  for (const fileName of CONFIG_FILE_NAMES) {
    const configPath = join(targetPath, fileName);
    if (existsSync(configPath)) {
      const content = await readFile(configPath, 'utf-8');
      const parsed = parseConfigContent(content, fileName);
      const config = applyEnv(mergeConfig(DEFAULT_CONFIG, validateOverride(parsed, fileName)), env);
      return { config, source: configPath };
    }
  }

  return { config: applyEnv(DEFAULT_CONFIG, env) };
}

function parseConfigContent(content: string, fileName: string): unknown {
  try {
    return fileName.endsWith('.json') ? JSON.parse(content) : parseYaml(content);
  } catch (error) {
    throw new ConfigError('parse-failed', `Could not parse ${fileName}`, { cause: error });
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

type FieldType = 'string' | 'number' | 'boolean' | 'string[]';

const SECTION_FIELDS: Record<string, Record<string, FieldType>> = {
  workspace: { dirs: 'string[]', distDir: 'string' },
  toolchain: { python: 'string', tools: 'string[]' },
  registry: { url: 'string', repository: 'string', timeout: 'number' },
  git: { remote: 'string', branch: 'string', tagPrefix: 'string' },
  verify: { requireNewer: 'boolean', requireCleanWorktree: 'boolean', changelog: 'string' },
};

function matchesType(value: unknown, type: FieldType): boolean {
  if (type === 'string[]') return isStringArray(value);
  return typeof value === type;
}

/**
 * Check the parsed file against the known shape. Nulls mean "use the default".
 */
function validateOverride(parsed: unknown, fileName: string): ConfigOverride {
  // An empty YAML document parses to null
  if (parsed === null || parsed === undefined) return {};
  if (!isRecord(parsed)) {
    throw new ConfigError('invalid', `${fileName} must contain a mapping`);
  }

  const override: ConfigOverride = {};
  for (const [key, value] of Object.entries(parsed)) {
    if (value === null) continue;

    if (key === 'package' || key === 'versionFile') {
      if (typeof value !== 'string' || value.trim() === '') {
        throw new ConfigError('invalid', `${fileName}: '${key}' must be a non-empty string`);
      }
      override[key] = value;
      continue;
    }

    const fields = SECTION_FIELDS[key];
    if (!fields) {
      throw new ConfigError('invalid', `${fileName}: unknown option '${key}'`);
    }
    if (!isRecord(value)) {
      throw new ConfigError('invalid', `${fileName}: '${key}' must be a mapping`);
    }

    const section: Record<string, unknown> = {};
    for (const [field, fieldValue] of Object.entries(value)) {
      const type = fields[field];
      if (!type) {
        throw new ConfigError('invalid', `${fileName}: unknown option '${key}.${field}'`);
      }
      if (fieldValue === null) continue;
      if (!matchesType(fieldValue, type)) {
        throw new ConfigError('invalid', `${fileName}: '${key}.${field}' must be a ${type}`);
      }
      section[field] = fieldValue;
    }
    Object.assign(override, { [key]: section });
  }

  return override;
}

function mergeConfig(base: ReleaseConfig, override: ConfigOverride): ReleaseConfig {
  return {
    ...base,
    package: override.package ?? base.package,
    versionFile: override.versionFile ?? base.versionFile,
    // Arrays replace, sections merge
    workspace: { ...base.workspace, ...override.workspace },
    toolchain: { ...base.toolchain, ...override.toolchain },
    registry: { ...base.registry, ...override.registry },
    git: { ...base.git, ...override.git },
    verify: { ...base.verify, ...override.verify },
  };
}

function applyEnv(config: ReleaseConfig, env: NodeJS.ProcessEnv): ReleaseConfig {
  const registryUrl = env['DISTSHIP_REGISTRY_URL'];
  if (!registryUrl) return config;
  return { ...config, registry: { ...config.registry, url: registryUrl } };
}

export function resolveTargetPath(input?: string): string {
  if (!input) {
    return process.cwd();
  }
  return resolve(input);
}
