import { z } from 'zod';
import { RoomResolver } from './rooms.js';
import type { RoomConfiguration } from './rooms.js';
import { UsernameAliasTable } from './aliases.js';

// ── Schema ──────────────────────────────────────────────────────

export const RoomConfigurationSchema = z.object({
  rooms: z.array(z.string().min(1)).default([]),
  simple_rooms: z.array(z.string().min(1)).default([]),
  secret: z.string().min(1).optional(),
}).strict();

export const ProjectConfigurationSchema = z.record(z.string(), RoomConfigurationSchema);

export const UsernameAliasesSchema = z.record(z.string(), z.string());

/**
 * A JSON document carried in a single environment variable, validated against `schema`.
 * A top-level `__proto__` name is rejected: record schemas would drop it without a word.
 */
function jsonBlob<T extends z.ZodTypeAny>(schema: T) {
  return z.string()
    .transform((raw, ctx) => {
      let parsed: unknown;
      try {
        parsed = JSON.parse(raw);
      } catch (err) {
        const msg = err instanceof Error ? err.message : String(err);
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `should be valid JSON (${msg})` });
        return z.NEVER;
      }
      if (typeof parsed === 'object' && parsed !== null && Object.hasOwn(parsed, '__proto__')) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['__proto__'],
          message: '"__proto__" is a reserved name',
        });
        return z.NEVER;
      }
      return parsed;
    })
    .pipe(schema);
}

export const LogTierSchema = z.enum(['minimal', 'debug', 'verbose']);

export const EnvSchema = z.object({
  RELAYBOT_SERVER: z.string().url().transform((raw) => new URL(raw)),
  RELAYBOT_USER: z.string().min(1),
  RELAYBOT_PASSWORD: z.string(),
  RELAYBOT_SECRET: z.string().min(1),
  RELAYBOT_PORT: z.string()
    .regex(/^\d+$/, 'should be a decimal port number')
    .default('3030')
    .transform(Number)
    .pipe(z.number().int().min(1).max(65535)),
  RELAYBOT_ROOM: z.string().min(1).optional(),
  RELAYBOT_PROJECT_CONFIGURATION: jsonBlob(ProjectConfigurationSchema).optional(),
  RELAYBOT_USERNAME_ALIASES: jsonBlob(UsernameAliasesSchema).optional(),
  RELAYBOT_GITHUB_API_USER: z.string().optional(),
  RELAYBOT_GITHUB_API_PASSWORD: z.string().optional(),
  RELAYBOT_LOG_LEVEL: z.string().toLowerCase().pipe(LogTierSchema).optional(),
}).refine(
  (env) => env.RELAYBOT_ROOM !== undefined || env.RELAYBOT_PROJECT_CONFIGURATION !== undefined,
  {
    message: 'At least one of RELAYBOT_ROOM or RELAYBOT_PROJECT_CONFIGURATION needs to be provided',
    path: ['RELAYBOT_ROOM'],
  },
);

// ── Types ───────────────────────────────────────────────────────

export interface GitHubCredentials {
  user: string;
  password: string;
}

export interface BotConfig {
  /** Chat server websocket endpoint. */
  server: URL;
  user: string;
  password: string;
  /** Webhook listener port. */
  port: number;
  rooms: RoomResolver;
  usernameAliases: UsernameAliasTable;
  /** Present only when both API user and password are set. */
  github?: GitHubCredentials;
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`environment is invalid:\n${issues.join('\n')}`);
    this.name = 'ConfigError';
  }
}

// ── Loader ──────────────────────────────────────────────────────

function toRoomConfiguration(raw: z.infer<typeof RoomConfigurationSchema>): RoomConfiguration {
  return { rooms: raw.rooms, simpleRooms: raw.simple_rooms, secret: raw.secret };
}

/**
 * Validate the environment and build the routing tables.
 * Throws ConfigError listing every problem; callers treat that as fatal.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): BotConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `  - ${i.path.join('.')}: ${i.message}`);
    throw new ConfigError(issues);
  }
  const parsed = result.data;

  const projects = Object.fromEntries(
    Object.entries(parsed.RELAYBOT_PROJECT_CONFIGURATION ?? {})
      .map(([name, raw]) => [name, toRoomConfiguration(raw)] as const),
  );

  const githubUser = parsed.RELAYBOT_GITHUB_API_USER;
  const githubPassword = parsed.RELAYBOT_GITHUB_API_PASSWORD;

  return {
    server: parsed.RELAYBOT_SERVER,
    user: parsed.RELAYBOT_USER,
    password: parsed.RELAYBOT_PASSWORD,
    port: parsed.RELAYBOT_PORT,
    rooms: new RoomResolver({
      projects,
      defaultRoom: parsed.RELAYBOT_ROOM,
      globalSecret: parsed.RELAYBOT_SECRET,
    }),
    usernameAliases: UsernameAliasTable.fromRecord(parsed.RELAYBOT_USERNAME_ALIASES ?? {}),
    github: githubUser !== undefined && githubPassword !== undefined
      ? { user: githubUser, password: githubPassword }
      : undefined,
  };
}

/** Startup summary safe to log: no passwords, no secrets. */
export interface ConfigSummary {
  server: string;
  user: string;
  port: number;
  defaultRoom: string | null;
  projects: string[];
  rooms: string[];
  aliases: number;
  githubApi: boolean;
}

export function describeConfig(config: BotConfig): ConfigSummary {
  const { protocol, host, pathname } = config.server;
  return {
    server: `${protocol}//${host}${pathname}`,
    user: config.user,
    port: config.port,
    defaultRoom: config.rooms.defaultRoom ?? null,
    projects: config.rooms.projectNames().sort(),
    rooms: [...config.rooms.allRooms()].sort(),
    aliases: config.usernameAliases.size,
    githubApi: config.github !== undefined,
  };
}
