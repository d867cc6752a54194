#!/usr/bin/env node

import dotenv from 'dotenv';
import { readFileSync } from 'node:fs';
import { getPackagePath, resolveEnvFile } from './paths.js';

// Environment first: the logger reads its tier at import time.
dotenv.config({ path: resolveEnvFile() });

const { logger, logTier } = await import('./logger.js');
const { ConfigError, describeConfig, loadConfig } = await import('./config.js');
const { isCommand, runCommand, UsageError } = await import('./commands.js');

const args = process.argv.slice(2).filter((a) => a !== '--verbose');
const command = args[0];

if (command === '--version' || command === '-v') {
  console.log(readVersion());
  process.exit(0);
}

if (command === '--help' || command === '-h' || command === undefined) {
  printHelp();
  process.exit(0);
}

if (!isCommand(command)) {
  console.error(`Unknown command: ${command}\n`);
  printHelp();
  process.exit(1);
}

// Fail fast: no partial startup on a bad environment
let config;
try {
  config = loadConfig();
} catch (err) {
  if (!(err instanceof ConfigError)) throw err;
  console.error('\n  relaybot — config load failed\n');
  console.error(err.message);
  logger.error({ issues: err.issues }, 'config load failed');
  process.exit(1);
}

logger.info({ ...describeConfig(config), logTier }, 'config loaded');

try {
  for (const line of runCommand(command, args.slice(1), config)) {
    console.log(line);
  }
} catch (err) {
  if (!(err instanceof UsageError)) throw err;
  console.error(err.message);
  process.exit(1);
}

function readVersion(): string {
  const pkg = JSON.parse(readFileSync(getPackagePath('package.json'), 'utf8')) as { version: string };
  return pkg.version;
}

function printHelp(): void {
  console.log(`
  relaybot v${readVersion()} — routes repository events to chat rooms

  Usage:
    relaybot check                Validate the environment and print a summary
    relaybot rooms                List every room the bot joins
    relaybot resolve <project>    Show where a project's events go
    relaybot alias <username>     Show a chat user's display name
    relaybot --version            Print version

  Options:
    --verbose                     Debug logging (or RELAYBOT_LOG_LEVEL=verbose)

  Environment is read from .env in the working directory, or RELAYBOT_ENV_FILE.
`);
}
