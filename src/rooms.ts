/** Per-project routing as configured. */
export interface RoomConfiguration {
  /** Rooms that get the full notification. */
  rooms: string[];
  /** Rooms that get the reduced-detail notification. */
  simpleRooms: string[];
  /** Overrides the global secret for this project's webhooks. */
  secret?: string;
}

/** Resolved routing for one project. Frozen; shared by every caller. */
export interface RoomConfigurationRef {
  readonly rooms: readonly string[];
  readonly simpleRooms: readonly string[];
  readonly secret: string;
}

export type ResolutionSource = 'project' | 'default';

/** A resolution plus the precedence tier that produced it. */
export interface Resolution {
  readonly source: ResolutionSource;
  /** Whether `config.secret` is a project override rather than the global secret. */
  readonly secretOverride: boolean;
  readonly config: RoomConfigurationRef;
}

export interface RoomResolverOptions {
  projects: Readonly<Record<string, RoomConfiguration>>;
  defaultRoom?: string;
  globalSecret: string;
}

/** One tier of the precedence list. Returns undefined to defer to the next tier. */
type ResolutionRule = (projectName: string) => Resolution | undefined;

function freezeResolution(
  source: ResolutionSource,
  rooms: readonly string[],
  simpleRooms: readonly string[],
  secret: string,
  secretOverride: boolean,
): Resolution {
  const config: RoomConfigurationRef = Object.freeze({
    rooms: Object.freeze([...rooms]),
    simpleRooms: Object.freeze([...simpleRooms]),
    secret,
  });
  return Object.freeze({ source, secretOverride, config });
}

/**
 * Maps a project name to the rooms that hear about it and the secret its webhooks are
 * signed with.
 *
 * Precedence, first match wins:
 *   1. project  exact, case-sensitive project name; its secret if set, else the global one
 *   2. default  the default room (if any) with the global secret
 *
 * All resolutions are computed at construction; `resolve` never throws and never allocates
 * a new view.
 */
export class RoomResolver {
  private readonly projects = new Map<string, Resolution>();
  private readonly fallback: Resolution;
  private readonly rules: readonly ResolutionRule[];
  readonly defaultRoom: string | undefined;

  constructor(options: RoomResolverOptions) {
    if (options.globalSecret.length === 0) {
      throw new Error('RoomResolver requires a non-empty global secret');
    }

    for (const [name, project] of Object.entries(options.projects)) {
      if (project.secret !== undefined && project.secret.length === 0) {
        throw new Error(`Project "${name}" has an empty secret override`);
      }
      this.projects.set(
        name,
        freezeResolution(
          'project',
          project.rooms,
          project.simpleRooms,
          project.secret ?? options.globalSecret,
          project.secret !== undefined,
        ),
      );
    }

    this.defaultRoom = options.defaultRoom;
    this.fallback = freezeResolution(
      'default',
      options.defaultRoom !== undefined ? [options.defaultRoom] : [],
      [],
      options.globalSecret,
      false,
    );

    this.rules = [
      (projectName) => this.projects.get(projectName),
    ];
  }

  /** Rooms and secret for `projectName`. Defined for every input. */
  resolve(projectName: string): RoomConfigurationRef {
    return this.explain(projectName).config;
  }

  /** Like `resolve`, also reporting which precedence tier answered. */
  explain(projectName: string): Resolution {
    for (const rule of this.rules) {
      const resolution = rule(projectName);
      if (resolution !== undefined) return resolution;
    }
    return this.fallback;
  }

  /** Every room any project or the default could post to. Unordered. */
  allRooms(): Set<string> {
    const rooms = new Set<string>();
    for (const { config } of this.projects.values()) {
      for (const room of config.rooms) rooms.add(room);
      for (const room of config.simpleRooms) rooms.add(room);
    }
    if (this.defaultRoom !== undefined) rooms.add(this.defaultRoom);
    return rooms;
  }

  projectNames(): string[] {
    return [...this.projects.keys()];
  }

  /** Number of configured projects. */
  get size(): number {
    return this.projects.size;
  }
}
