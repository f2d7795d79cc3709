import fs from 'fs';
import os from 'os';
import path from 'path';
import ini from 'ini';
import { configSchema, type LogLevelName, type ServerConfig } from './schema.js';

export * from './schema.js';

/** Section name -> key -> raw string value, as read from the INI files */
export type RawConfig = Record<string, Record<string, string>>;

export interface ConfigPaths {
  defaultsPath: string;
  overridePath: string;
}

// Only these keys are picked up again at run time, everything else needs a restart
export interface RuntimeSettings {
  tokenvalidity: number;
  loglevel: LogLevelName;
}

export const CONFIG_REFRESH_INTERVAL_MS = 300 * 1000;

const DEFAULT_CONFIG_DIR = '/etc/wopi';
const DEFAULTS_FILE = 'wopiserver.defaults.conf';
const OVERRIDE_FILE = 'wopiserver.conf';

export class ConfigError extends Error {
  constructor(
    message: string,
    public issues: string[] = []
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigError';
  }
}

const SECTION_LINE = /^\[[^\]]+\]$/;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * Parse INI text into a section map.
 * Keys are lowercased; values always come back as strings.
 */
export function parseConfigText(text: string, source: string = '<config>'): RawConfig {
  const problems: string[] = [];
  let inSection = false;

  text.split(/\r?\n/).forEach((line, index) => {
    const trimmed = line.trim();
    if (trimmed === '' || trimmed.startsWith('#') || trimmed.startsWith(';')) {
      return;
    }
    if (SECTION_LINE.test(trimmed)) {
      inSection = true;
      return;
    }
    if (!trimmed.includes('=')) {
      problems.push(`line ${index + 1}: expected "key = value"`);
    } else if (!inSection) {
      problems.push(`line ${index + 1}: key outside of any section`);
    }
  });

  if (problems.length > 0) {
    throw new ConfigError(`Invalid configuration in ${source}`, problems);
  }

  const parsed: Record<string, unknown> = ini.parse(text);
  const raw: RawConfig = {};

  for (const [section, entries] of Object.entries(parsed)) {
    if (!isRecord(entries)) {
      problems.push(`${section}: not a section`);
      continue;
    }
    const values: Record<string, string> = {};
    for (const [key, value] of Object.entries(entries)) {
      // ini turns true/false/null into literals, put them back
      if (typeof value === 'string' || typeof value === 'boolean' || typeof value === 'number') {
        values[key.toLowerCase()] = String(value);
      } else if (value === null) {
        values[key.toLowerCase()] = 'null';
      } else {
        problems.push(`${section}.${key}: unsupported value`);
      }
    }
    raw[section] = values;
  }

  if (problems.length > 0) {
    throw new ConfigError(`Invalid configuration in ${source}`, problems);
  }
  return raw;
}

export function serializeConfig(raw: RawConfig): string {
  return ini.stringify(raw, { whitespace: true });
}

export function mergeConfig(defaults: RawConfig, overrides: RawConfig): RawConfig {
  const merged: RawConfig = {};
  for (const section of new Set([...Object.keys(defaults), ...Object.keys(overrides)])) {
    merged[section] = { ...defaults[section], ...overrides[section] };
  }
  return merged;
}

export function validateConfig(raw: RawConfig): ServerConfig {
  const result = configSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError('Invalid configuration', issues);
  }
  return result.data;
}

export function resolveConfigPaths(env: NodeJS.ProcessEnv = process.env): ConfigPaths {
  const dir = env.WOPI_CONFIG_DIR || DEFAULT_CONFIG_DIR;
  return {
    defaultsPath: path.resolve(dir, DEFAULTS_FILE),
    overridePath: path.resolve(dir, OVERRIDE_FILE),
  };
}

function readConfigFile(filePath: string): RawConfig {
  let text: string;
  try {
    text = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Cannot read configuration file ${filePath}`, [
      error instanceof Error ? error.message : String(error),
    ]);
  }
  return parseConfigText(text, filePath);
}

/**
 * The defaults file must exist, the site-specific override file is optional.
 */
export function readRawConfig(paths: ConfigPaths): RawConfig {
  const defaults = readConfigFile(paths.defaultsPath);
  if (!fs.existsSync(paths.overridePath)) {
    return defaults;
  }
  return mergeConfig(defaults, readConfigFile(paths.overridePath));
}

export function loadConfig(paths: ConfigPaths): ServerConfig {
  return validateConfig(readRawConfig(paths));
}

/**
 * Public base URL of this server, as used in WOPISrc values.
 */
export function getWopiUrl(config: ServerConfig): string {
  if (config.general.wopiurl) {
    return config.general.wopiurl;
  }
  const scheme = config.security.usehttps ? 'https' : 'http';
  return `${scheme}://${os.hostname()}:${config.general.port}`;
}

/**
 * Holds the running configuration and re-reads the files every
 * CONFIG_REFRESH_INTERVAL_MS to catch runtime parameter changes.
 */
export class ConfigStore {
  private current: ServerConfig;
  private lastReadAt: number;

  constructor(
    private readonly paths: ConfigPaths,
    initial: ServerConfig,
    now: number = Date.now()
  ) {
    this.current = initial;
    this.lastReadAt = now;
  }

  get config(): ServerConfig {
    return this.current;
  }

  /**
   * Returns the refreshed runtime settings, or null when the interval has not elapsed.
   * @throws ConfigError if the files no longer validate; the current values are kept
   */
  refreshIfStale(now: number = Date.now()): RuntimeSettings | null {
    if (now <= this.lastReadAt + CONFIG_REFRESH_INTERVAL_MS) {
      return null;
    }
    this.lastReadAt = now;

    const fresh = loadConfig(this.paths);
    const settings: RuntimeSettings = {
      tokenvalidity: fresh.general.tokenvalidity,
      loglevel: fresh.general.loglevel,
    };
    this.current = {
      ...this.current,
      general: { ...this.current.general, ...settings },
    };
    return settings;
  }
}
