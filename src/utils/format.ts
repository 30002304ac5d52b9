/**
 * Normalization helpers for upstream text fields
 */

import { NOT_AVAILABLE } from '../types';

export const MAX_MESSAGE_LENGTH = 200;
export const SHORT_SHA_LENGTH = 8;

const ELLIPSIS = '...';

/** Local date-time with no zone designator, e.g. "2024-03-05T14:07:09". */
const NAIVE_DATE_TIME = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(:\d{2}(\.\d+)?)?$/;

/**
 * Collapse whitespace runs to single spaces and cap the length at 200
 * characters (code points), ending a truncated message with "...".
 */
export function cleanMessage(message: string | null | undefined): string {
  if (!message) {
    return NOT_AVAILABLE;
  }

  const cleaned = message.trim().replace(/\s+/g, ' ');
  const chars = Array.from(cleaned);
  if (chars.length > MAX_MESSAGE_LENGTH) {
    return chars.slice(0, MAX_MESSAGE_LENGTH - ELLIPSIS.length).join('') + ELLIPSIS;
  }
  return cleaned;
}

/**
 * Format an ISO-8601 timestamp as "YYYY-MM-DD HH:MM:SS" (UTC). A timestamp
 * without an offset is taken as UTC. Unparseable input is returned unchanged.
 */
export function formatDate(dateString: string | null | undefined): string {
  if (!dateString) {
    return NOT_AVAILABLE;
  }

  const ts = new Date(NAIVE_DATE_TIME.test(dateString) ? `${dateString}Z` : dateString);
  if (Number.isNaN(ts.getTime())) {
    return dateString;
  }

  const year = ts.getUTCFullYear();
  const month = String(ts.getUTCMonth() + 1).padStart(2, '0');
  const day = String(ts.getUTCDate()).padStart(2, '0');
  const hour = String(ts.getUTCHours()).padStart(2, '0');
  const minute = String(ts.getUTCMinutes()).padStart(2, '0');
  const second = String(ts.getUTCSeconds()).padStart(2, '0');
  return `${year}-${month}-${day} ${hour}:${minute}:${second}`;
}

export function shortSha(sha: string): string {
  return sha.slice(0, SHORT_SHA_LENGTH);
}

export function safeLower(text: string | null | undefined): string {
  return text == null ? '' : String(text).toLowerCase();
}

/**
 * Timestamp suffix used in default output file names: YYYYMMDD_HHMMSS (local time).
 */
export function fileTimestamp(ts: Date = new Date()): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return (
    `${ts.getFullYear()}${pad(ts.getMonth() + 1)}${pad(ts.getDate())}_` +
    `${pad(ts.getHours())}${pad(ts.getMinutes())}${pad(ts.getSeconds())}`
  );
}

export function formatDuration(ms: number): string {
  const seconds = Math.floor(ms / 1000);
  const minutes = Math.floor(seconds / 60);
  const hours = Math.floor(minutes / 60);

  if (hours > 0) {
    return `${hours}h ${minutes % 60}m ${seconds % 60}s`;
  } else if (minutes > 0) {
    return `${minutes}m ${seconds % 60}s`;
  } else {
    return `${(ms / 1000).toFixed(2)}s`;
  }
}
