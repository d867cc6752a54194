import type { BotConfig } from './config.js';
import { describeConfig } from './config.js';
import { planDeliveries, displayAuthor } from './router.js';

export const COMMANDS = ['check', 'rooms', 'resolve', 'alias'] as const;

export type CommandName = typeof COMMANDS[number];

export function isCommand(name: string): name is CommandName {
  return COMMANDS.some((c) => c === name);
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

function list(items: readonly string[]): string {
  return items.length > 0 ? items.join(', ') : '(none)';
}

function requireArg(args: string[], command: CommandName, placeholder: string): string {
  const value = args[0];
  if (value === undefined || value === '') {
    throw new UsageError(`Usage: relaybot ${command} <${placeholder}>`);
  }
  return value;
}

/**
 * Run an inspection command against a loaded config. Returns the lines to print.
 * Throws UsageError when a required argument is missing.
 */
export function runCommand(command: CommandName, args: string[], config: BotConfig): string[] {
  switch (command) {
    case 'check': {
      const summary = describeConfig(config);
      return [
        'config: OK',
        `server: ${summary.server}`,
        `user: ${summary.user}`,
        `port: ${summary.port}`,
        `default room: ${summary.defaultRoom ?? '(none)'}`,
        `projects: ${summary.projects.length} (${list(summary.projects)})`,
        `aliases: ${summary.aliases}`,
        `github api: ${summary.githubApi ? 'enabled' : 'disabled'}`,
        `rooms to join: ${list(summary.rooms)}`,
      ];
    }

    case 'rooms':
      return [...config.rooms.allRooms()].sort();

    case 'resolve': {
      const project = requireArg(args, command, 'project');
      const { source, secretOverride } = config.rooms.explain(project);
      const deliveries = planDeliveries(config.rooms, project);
      const full = deliveries.filter((d) => d.tier === 'full').map((d) => d.room);
      const simple = deliveries.filter((d) => d.tier === 'simple').map((d) => d.room);
      return [
        `project: ${project}`,
        `matched: ${source}`,
        `rooms: ${list(full)}`,
        `simple rooms: ${list(simple)}`,
        `secret: ${secretOverride ? 'project override' : 'global'}`,
      ];
    }

    case 'alias': {
      const username = requireArg(args, command, 'username');
      return [displayAuthor(config.usernameAliases, username)];
    }
  }
}
