import path from 'node:path';
import dotenv from 'dotenv';

const DEFAULT_ENV_PATH = path.resolve('.env');
let loadedEnvPath = DEFAULT_ENV_PATH;

function isMissingFile(err: Error): boolean {
  return 'code' in err && err.code === 'ENOENT';
}

function load(envPath: string) {
  const resolved = path.resolve(envPath);
  const result = dotenv.config({ path: resolved, override: true });
  loadedEnvPath = resolved;
  if (result.error && !isMissingFile(result.error)) {
    throw result.error;
  }
}

export function loadEnvironment(envPath?: string) {
  load(envPath ?? DEFAULT_ENV_PATH);
}

export function reloadEnvironment() {
  load(loadedEnvPath);
}

export function getEnvironmentPath() {
  return loadedEnvPath;
}

export interface EnvOverrides {
  transport?: { url: string };
  session?: { responseTimeoutMs: number };
}

/** Maps DIALOG_* variables onto config sections; values are validated by the config schema. */
export function readEnvOverrides(env: NodeJS.ProcessEnv = process.env): EnvOverrides {
  const overrides: EnvOverrides = {};
  const url = env.DIALOG_WS_URL?.trim();
  if (url) {
    overrides.transport = { url };
  }
  const timeout = env.DIALOG_RESPONSE_TIMEOUT_MS?.trim();
  if (timeout) {
    overrides.session = { responseTimeoutMs: Number(timeout) };
  }
  return overrides;
}
