import path from 'node:path';
import { fileURLToPath } from 'node:url';

// Package root: src/paths.ts (or dist/paths.js) → ../
const PACKAGE_ROOT = fileURLToPath(new URL('../', import.meta.url));

/**
 * Join path segments under the package root.
 * e.g. getPackagePath('package.json')
 */
export function getPackagePath(...segments: string[]): string {
  return path.join(PACKAGE_ROOT, ...segments);
}

/**
 * The .env file to load before reading configuration.
 *
 * Priority: RELAYBOT_ENV_FILE → .env in the working directory.
 */
export function resolveEnvFile(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): string {
  const fromEnv = env.RELAYBOT_ENV_FILE;
  return fromEnv ? path.resolve(cwd, fromEnv) : path.join(cwd, '.env');
}
