import type { RoomResolver } from './rooms.js';
import type { UsernameAliasLookup } from './aliases.js';

export type DeliveryTier = 'full' | 'simple';

/** One notification to post: which room, and which rendering of the event. */
export interface Delivery {
  room: string;
  tier: DeliveryTier;
}

/**
 * Expands a project's routing into the posts an event produces.
 * Full rooms come first, then simple rooms, each in configured order. A room listed
 * under both gets both renderings.
 */
export function planDeliveries(resolver: Pick<RoomResolver, 'resolve'>, projectName: string): Delivery[] {
  const { rooms, simpleRooms } = resolver.resolve(projectName);
  const deliveries: Delivery[] = [];
  for (const room of rooms) {
    deliveries.push({ room, tier: 'full' });
  }
  for (const room of simpleRooms) {
    deliveries.push({ room, tier: 'simple' });
  }
  return deliveries;
}

// The set String.prototype.trim strips.
function isTrimmable(code: number): boolean {
  return (
    (code >= 0x09 && code <= 0x0d) ||
    code === 0x20 ||
    code === 0xa0 ||
    code === 0x1680 ||
    (code >= 0x2000 && code <= 0x200a) ||
    code === 0x2028 ||
    code === 0x2029 ||
    code === 0x202f ||
    code === 0x205f ||
    code === 0x3000 ||
    code === 0xfeff
  );
}

/**
 * Display name for a chat author, after alias resolution. Surrounding whitespace is
 * ignored when matching; a name with no alias comes back exactly as received.
 */
export function displayAuthor(aliases: UsernameAliasLookup, rawName: string): string {
  let start = 0;
  let end = rawName.length;
  while (start < end && isTrimmable(rawName.charCodeAt(start))) start++;
  while (end > start && isTrimmable(rawName.charCodeAt(end - 1))) end--;
  return aliases.lookup(rawName, start, end) ?? rawName;
}
