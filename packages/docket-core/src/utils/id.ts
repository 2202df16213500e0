import { ulid } from 'ulid';

const ULID_PATTERN = /^[0-9A-HJKMNP-TV-Z]{26}$/;

/**
 * A ULID whose time component is the event's own timestamp (epoch seconds),
 * so ids of backdated events sort with their time rather than insertion.
 */
export function newEventId(timestamp?: number): string {
  return timestamp === undefined ? ulid() : ulid(timestamp * 1000);
}

export function isEventId(id: string): boolean {
  return ULID_PATTERN.test(id);
}
