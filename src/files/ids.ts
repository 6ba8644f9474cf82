import ulidPkg from "ulid";

const { monotonicFactory, decodeTime } = ulidPkg;

export const FILE_ID_PREFIX = "df-";

const fileIDRegex = /^df-[0-9a-hjkmnp-tv-z]{26}$/;
const idBodyRegex = /^[0-9a-hjkmnp-tv-z]{26}$/;

const nextULID = monotonicFactory();

/** Generates `df-<ulid>`; ids from one process increase strictly. */
export function newFileID(now: number = Date.now()): string {
  return FILE_ID_PREFIX + nextULID(now).toLowerCase();
}

export function isFileID(value: unknown): value is string {
  return typeof value === "string" && fileIDRegex.test(value);
}

/** The sortable part of an id, used as the first path segment of uploads. */
export function idBody(id: string): string {
  return id.slice(FILE_ID_PREFIX.length);
}

export function isIDBody(value: string): boolean {
  return idBodyRegex.test(value);
}

/** Creation time embedded in an id (or a bare id body), in ms since the epoch. */
export function idTime(id: string): number {
  const body = id.startsWith(FILE_ID_PREFIX) ? idBody(id) : id;
  return decodeTime(body.toUpperCase());
}

/**
 * Host columns hold file references either as a single id or, for a slot with
 * several files, as a JSON array of ids.
 */
export function parseFileRefs(value: unknown): string[] {
  if (value === null || value === undefined || value === "") return [];
  if (Array.isArray(value)) return value.filter(isFileID);
  if (typeof value !== "string") return [];

  const trimmed = value.trim();
  if (trimmed.startsWith("[")) {
    try {
      const parsed: unknown = JSON.parse(trimmed);
      return Array.isArray(parsed) ? parsed.filter(isFileID) : [];
    } catch {
      return [];
    }
  }
  return isFileID(trimmed) ? [trimmed] : [];
}

export function formatFileRefs(ids: string[]): string {
  return JSON.stringify(ids.filter(isFileID));
}
