import Conf, { type Schema } from 'conf';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type SyncOutputMode = 'auto' | 'always' | 'never';

export interface Settings {
  logLevel: LogLevel;
  logDir: string; // '' = ~/.gridpaint/logs
  pollTimeoutMs: number; // Default Window.update() poll timeout
  queryTimeoutMs: number; // How long to wait for the terminal to answer a query
  synchronizedOutput: SyncOutputMode;
  mouseCapture: boolean;
  focusReporting: boolean;
}

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

export const DEFAULT_SETTINGS: Settings = {
  logLevel: 'warn',
  logDir: '',
  pollTimeoutMs: 16,
  queryTimeoutMs: 200,
  synchronizedOutput: 'auto',
  mouseCapture: true,
  focusReporting: true,
};

const schema: Schema<Settings> = {
  logLevel: { type: 'string', enum: [...LOG_LEVELS] },
  logDir: { type: 'string' },
  pollTimeoutMs: { type: 'integer', minimum: 0 },
  queryTimeoutMs: { type: 'integer', minimum: 1 },
  synchronizedOutput: { type: 'string', enum: ['auto', 'always', 'never'] },
  mouseCapture: { type: 'boolean' },
  focusReporting: { type: 'boolean' },
};

let store: Conf<Settings> | null = null;

/**
 * Persistent settings store. Created on first use so that importing the
 * library never touches the filesystem.
 */
export function getConfig(): Conf<Settings> {
  if (!store) {
    store = new Conf<Settings>({
      projectName: 'gridpaint',
      cwd: process.env.GRIDPAINT_CONFIG_DIR || undefined,
      defaults: DEFAULT_SETTINGS,
      schema,
    });
  }
  return store;
}

/**
 * Drop the cached store; the next getConfig() re-reads GRIDPAINT_CONFIG_DIR
 */
export function resetConfigStore(): void {
  store = null;
}

export function getSetting<K extends keyof Settings>(key: K): Settings[K] {
  return getConfig().get(key);
}

export function setSetting<K extends keyof Settings>(key: K, value: Settings[K]): void {
  getConfig().set(key, value);
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

/**
 * Settings taken from GRIDPAINT_* environment variables
 */
export function envOverrides(env: NodeJS.ProcessEnv = process.env): Partial<Settings> {
  const overrides: Partial<Settings> = {};

  const level = env.GRIDPAINT_LOG_LEVEL?.toLowerCase();
  if (level && isLogLevel(level)) {
    overrides.logLevel = level;
  }
  if (env.GRIDPAINT_LOG_DIR) {
    overrides.logDir = env.GRIDPAINT_LOG_DIR;
  }

  return overrides;
}

/**
 * Effective settings: stored values, then environment, then explicit
 * overrides (usually window options)
 */
export function resolveSettings(overrides: Partial<Settings> = {}, env: NodeJS.ProcessEnv = process.env): Settings {
  const base = { ...getConfig().store, ...envOverrides(env) };
  return {
    logLevel: overrides.logLevel ?? base.logLevel,
    logDir: overrides.logDir ?? base.logDir,
    pollTimeoutMs: overrides.pollTimeoutMs ?? base.pollTimeoutMs,
    queryTimeoutMs: overrides.queryTimeoutMs ?? base.queryTimeoutMs,
    synchronizedOutput: overrides.synchronizedOutput ?? base.synchronizedOutput,
    mouseCapture: overrides.mouseCapture ?? base.mouseCapture,
    focusReporting: overrides.focusReporting ?? base.focusReporting,
  };
}
