import { homedir } from 'node:os';
import { join } from 'node:path';

/**
 * Resolve `${VAR}` and `${VAR:-fallback}` placeholders from the environment
 *
 * @throws Error if a variable without fallback is not set
 */
export function resolveEnv(value: string, env: NodeJS.ProcessEnv = process.env): string {
  return value.replace(/\$\{([A-Za-z_][A-Za-z0-9_]*)(?::-([^}]*))?\}/g, (_match, name: string, fallback?: string) => {
    const envValue = env[name];
    if (envValue !== undefined && envValue !== '') {
      return envValue;
    }
    if (fallback !== undefined) {
      return fallback;
    }
    throw new Error(`Environment variable "${name}" is not set`);
  });
}

/**
 * Expand a leading `~` to the user's home directory
 */
export function expandHome(path: string): string {
  if (path === '~') {
    return homedir();
  }
  if (path.startsWith('~/') || path.startsWith('~\\')) {
    return join(homedir(), path.slice(2));
  }
  return path;
}

/**
 * Recursively resolve environment placeholders in every string of a parsed document
 */
export function resolveEnvRecursive(value: unknown, env: NodeJS.ProcessEnv = process.env): unknown {
  if (typeof value === 'string') {
    return resolveEnv(value, env);
  }

  if (Array.isArray(value)) {
    return value.map((item) => resolveEnvRecursive(item, env));
  }

  if (value !== null && typeof value === 'object') {
    return Object.fromEntries(Object.entries(value).map(([key, item]) => [key, resolveEnvRecursive(item, env)]));
  }

  return value;
}
