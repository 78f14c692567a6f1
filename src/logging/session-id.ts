/**
 * Session ID generation and management.
 * Each interactive session gets a short ID that tags its log lines.
 */

import { randomBytes } from "node:crypto";

/**
 * Generate a short, unique session ID.
 * Format: date prefix + random suffix (e.g., "20240115-a1b2c3")
 */
export function generateSessionId(now: Date = new Date()): string {
  const datePart = now.toISOString().slice(0, 10).replace(/-/g, "");
  const randomPart = randomBytes(3).toString("hex");
  return `${datePart}-${randomPart}`;
}

let currentSessionId: string | null = null;

/**
 * Start a new session ID for this process.
 */
export function initSessionId(): string {
  currentSessionId = generateSessionId();
  return currentSessionId;
}

/**
 * Get the current session ID, or null before initSessionId().
 */
export function getSessionId(): string | null {
  return currentSessionId;
}
