/**
 * Identifier helpers shared by the server and API consumers.
 *
 * Session ids are UUID v4 strings; session *keys* combine the id with
 * the user's email so one user can hold several flowcharts while every
 * key stays stable and filesystem/database safe.
 */

import { randomUUID } from 'node:crypto';

/** UUID v4 regex for validation. */
const UUID_RE = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/i;

/** Generate a new UUID v4 string. */
export function generateId(): string {
  return randomUUID();
}

/**
 * Validate that a string is a well-formed UUID v4.
 *
 * Useful for route params, API inputs, and test assertions.
 */
export function isValidId(id: string): boolean {
  return UUID_RE.test(id);
}

/**
 * Replace every character outside `[A-Za-z0-9_-]` with `_`.
 *
 * @example
 * sanitizeEmail('ada.lovelace@example.com'); // 'ada_lovelace_example_com'
 */
export function sanitizeEmail(email: string): string {
  return email.trim().replace(/[^a-zA-Z0-9_-]/g, '_');
}

/**
 * Derive the store key for one of a user's sessions.
 *
 * @example
 * sessionKeyFor('ada@example.com', 'b3c1…'); // 'ada_example_com:b3c1…'
 */
export function sessionKeyFor(email: string, sessionId: string): string {
  return `${sanitizeEmail(email)}:${sessionId}`;
}
