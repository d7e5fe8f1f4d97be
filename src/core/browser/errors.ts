/**
 * Classification of browser navigation failures
 */

import { errors } from "playwright";

export type TransportErrorKind =
  | "timeout"
  | "connection-reset"
  | "connection-refused"
  | "connection-timed-out"
  | "network-changed"
  | "internet-disconnected"
  | "name-not-resolved"
  | "unknown";

// Chromium network error codes as they appear in navigation errors
const NET_ERROR_KINDS: Record<string, TransportErrorKind> = {
  ERR_CONNECTION_RESET: "connection-reset",
  ERR_CONNECTION_CLOSED: "connection-reset",
  ERR_CONNECTION_REFUSED: "connection-refused",
  ERR_CONNECTION_TIMED_OUT: "connection-timed-out",
  ERR_TIMED_OUT: "connection-timed-out",
  ERR_NETWORK_CHANGED: "network-changed",
  ERR_INTERNET_DISCONNECTED: "internet-disconnected",
  ERR_NAME_NOT_RESOLVED: "name-not-resolved",
};

const TRANSIENT_KINDS: ReadonlySet<TransportErrorKind> = new Set([
  "timeout",
  "connection-reset",
  "connection-refused",
  "connection-timed-out",
  "network-changed",
  "internet-disconnected",
]);

/**
 * Chromium `net::ERR_*` code carried by a navigation error, if any
 */
export function netErrorCode(error: Error): string | null {
  const m = error.message.match(/net::(ERR_[A-Z_]+)/);
  return m ? m[1] : null;
}

/**
 * Maps a navigation error to a transport error kind. Playwright timeouts are
 * recognised by class; network failures by their Chromium error code.
 */
export function classifyNavigationError(error: Error): TransportErrorKind {
  if (error instanceof errors.TimeoutError) return "timeout";
  const code = netErrorCode(error);
  if (code) return NET_ERROR_KINDS[code] ?? "unknown";
  return "unknown";
}

export function isTransientKind(kind: TransportErrorKind): boolean {
  return TRANSIENT_KINDS.has(kind);
}

export function isTransientNavigationError(error: Error): boolean {
  return isTransientKind(classifyNavigationError(error));
}
