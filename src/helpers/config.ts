import { join, resolve, dirname, isAbsolute } from 'path';
import { homedir } from 'os';
import { existsSync } from 'fs';
import { readFile } from 'fs/promises';
import * as YAML from 'yaml';
import type { ConfigLayer, LayerName, LoadedLayer, ResolvedConfig, ResolveOptions } from '../types';
import { ConfigLoadError, errorMessage } from './errors';
import type { Logger } from './log';

export const GLOBAL_CONFIG_FILE = 'resticrun.yaml';
export const REPOSITORY_DIR = 'repositories';
export const SET_DIR = 'sets';

const STRING_KEYS = ['repository', 'passwordFile', 'tag', 'resticBinary', 'defaultRepository', 'defaultSet'] as const;
const LIST_KEYS = ['paths', 'exclude', 'excludeIfPresent', 'keep'] as const;

export function defaultConfigDir(env: NodeJS.ProcessEnv = process.env): string {
  return env.RESTICRUN_CONFIG_DIR || join(homedir(), '.config', 'resticrun');
}

export function layerPath(configDir: string, layer: LayerName, name?: string): string {
  switch (layer) {
    case 'global':
      return join(configDir, GLOBAL_CONFIG_FILE);
    case 'repository':
      return join(configDir, REPOSITORY_DIR, `${name}.yaml`);
    case 'set':
      return join(configDir, SET_DIR, `${name}.yaml`);
  }
}

/**
 * Checks the shape of one parsed file. Unknown keys are reported through
 * `onUnknown` and dropped.
 */
export function validateLayer(data: unknown, source: string, onUnknown?: (key: string) => void): ConfigLayer {
  if (data === null || data === undefined) return {};
  if (typeof data !== 'object' || Array.isArray(data)) {
    throw new ConfigLoadError(`${source} must contain a mapping of settings`, source);
  }

  const layer: ConfigLayer = {};
  for (const [key, value] of Object.entries(data)) {
    if (isStringKey(key)) {
      if (typeof value !== 'string') throw new ConfigLoadError(`${source}: "${key}" must be a string`, source);
      layer[key] = value;
    } else if (isListKey(key)) {
      if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
        throw new ConfigLoadError(`${source}: "${key}" must be a list of strings`, source);
      }
      layer[key] = value;
    } else if (key === 'diskUsage') {
      if (typeof value !== 'boolean') throw new ConfigLoadError(`${source}: "diskUsage" must be true or false`, source);
      layer.diskUsage = value;
    } else if (key === 'env') {
      layer.env = validateEnv(value, source);
    } else {
      onUnknown?.(key);
    }
  }
  return layer;
}

function isStringKey(key: string): key is typeof STRING_KEYS[number] {
  return (STRING_KEYS as readonly string[]).includes(key);
}

function isListKey(key: string): key is typeof LIST_KEYS[number] {
  return (LIST_KEYS as readonly string[]).includes(key);
}

function validateEnv(value: unknown, source: string): Record<string, string> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new ConfigLoadError(`${source}: "env" must be a mapping`, source);
  }
  const env: Record<string, string> = {};
  for (const [name, entry] of Object.entries(value)) {
    if (typeof entry !== 'string' && typeof entry !== 'number') {
      throw new ConfigLoadError(`${source}: env.${name} must be a string`, source);
    }
    env[name] = String(entry);
  }
  return env;
}

/**
 * Relative file references are taken relative to the file that declares them.
 * Repositories with a backend prefix (`sftp:`, `s3:`, ...) are left alone.
 */
function anchorPaths(layer: ConfigLayer, source: string): ConfigLayer {
  const base = dirname(source);
  const anchored = { ...layer };
  if (anchored.passwordFile && !isAbsolute(anchored.passwordFile)) {
    anchored.passwordFile = resolve(base, anchored.passwordFile);
  }
  if (anchored.repository && !/^[a-z][a-z0-9]*:/i.test(anchored.repository) && !isAbsolute(anchored.repository)) {
    anchored.repository = resolve(base, anchored.repository);
  }
  return anchored;
}

export async function loadLayer(
  layer: LayerName,
  path: string,
  options: { required: boolean; logger?: Logger }
): Promise<LoadedLayer | undefined> {
  if (!existsSync(path)) {
    if (!options.required) {
      options.logger?.debug(`No ${layer} configuration at ${path}`);
      return undefined;
    }
    throw new ConfigLoadError(`Missing ${layer} configuration: ${path}`, path);
  }

  let data: unknown;
  try {
    const content = await readFile(path, 'utf-8');
    data = YAML.parse(content);
  } catch (error) {
    throw new ConfigLoadError(`Could not read ${layer} configuration ${path}: ${errorMessage(error)}`, path, error);
  }

  const values = validateLayer(data, path, key => options.logger?.debug(`Ignoring unknown key "${key}" in ${path}`));
  options.logger?.verbose(`Loaded ${layer} configuration from ${path}`);
  return { name: layer, path, values: anchorPaths(values, path) };
}

function appendUnique(current: readonly string[], extra: readonly string[] | undefined): string[] {
  const merged = [...current];
  for (const item of extra ?? []) {
    if (!merged.includes(item)) merged.push(item);
  }
  return merged;
}

/**
 * Folds layers in the order given. Scalars, `paths` and `keep` are replaced by
 * later layers; `exclude` and `excludeIfPresent` accumulate; `env` merges by
 * variable name.
 */
export function mergeLayers(layers: readonly ConfigLayer[]): ConfigLayer {
  return layers.reduce<ConfigLayer>((merged, layer) => ({
    ...merged,
    ...definedOnly(layer),
    exclude: appendUnique(merged.exclude ?? [], layer.exclude),
    excludeIfPresent: appendUnique(merged.excludeIfPresent ?? [], layer.excludeIfPresent),
    env: { ...merged.env, ...layer.env }
  }), {});
}

function definedOnly(layer: ConfigLayer): ConfigLayer {
  const copy: ConfigLayer = {};
  for (const [key, value] of Object.entries(layer)) {
    if (value !== undefined) Object.assign(copy, { [key]: value });
  }
  return copy;
}

export async function resolveConfig(options: ResolveOptions, logger?: Logger): Promise<ResolvedConfig> {
  const layers: LoadedLayer[] = [];

  const global = await loadLayer('global', layerPath(options.configDir, 'global'), { required: false, logger });
  if (global) layers.push(global);

  const repositoryName = options.repository ?? global?.values.defaultRepository;
  if (repositoryName) {
    const loaded = await loadLayer('repository', layerPath(options.configDir, 'repository', repositoryName), { required: true, logger });
    if (loaded) layers.push(loaded);
  }

  const setName = options.set ?? global?.values.defaultSet;
  if (setName) {
    const loaded = await loadLayer('set', layerPath(options.configDir, 'set', setName), { required: true, logger });
    if (loaded) layers.push(loaded);
  }

  const merged = mergeLayers(layers.map(layer => layer.values));
  if (options.tag) merged.tag = options.tag;

  const sources = layers.map(layer => layer.path);
  if (!merged.repository) {
    throw new ConfigLoadError(`No repository location configured (searched ${describeSources(sources, options.configDir)})`);
  }
  if (!merged.passwordFile) {
    throw new ConfigLoadError(`No passwordFile configured for repository ${merged.repository}`);
  }

  return Object.freeze({
    repository: merged.repository,
    passwordFile: merged.passwordFile,
    diskUsage: merged.diskUsage ?? false,
    tag: merged.tag,
    paths: Object.freeze([...(merged.paths ?? [])]),
    exclude: Object.freeze([...(merged.exclude ?? [])]),
    excludeIfPresent: Object.freeze([...(merged.excludeIfPresent ?? [])]),
    keep: Object.freeze([...(merged.keep ?? [])]),
    env: Object.freeze({ ...merged.env }),
    resticBinary: merged.resticBinary ?? 'restic',
    repositoryName,
    setName,
    sources: Object.freeze(sources)
  });
}

function describeSources(sources: readonly string[], configDir: string): string {
  return sources.length > 0 ? sources.join(', ') : `no configuration files under ${configDir}`;
}
