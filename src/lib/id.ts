import { randomUUID } from 'node:crypto';

/** Ids sort by creation time: a base-36 timestamp followed by random hex. */
export function createId(prefix: string): string {
  const time = Date.now().toString(36).padStart(9, '0');
  return `${prefix}_${time}${randomUUID().replace(/-/g, '').slice(0, 12)}`;
}
