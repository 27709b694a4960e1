import type { Action } from '../types.js';

const SIGNATURE_FIELDS = ['selector', 'text', 'key'] as const;

type SignatureSource = { type: string } & Partial<Record<(typeof SIGNATURE_FIELDS)[number], unknown>>;

const MAX_VALUE_LENGTH = 80;

export const INVALID_SIGNATURE = 'invalid';

/**
 * Stable key for an action: its type followed by `field=value` for each of
 * selector, text and key that is present, joined with `|`. Values are trimmed
 * and truncated to 80 characters. Identical actions collide across steps, which
 * is what lets a failed action stay banned for the rest of the mission.
 */
export function signature(action: Action | null | undefined): string {
  if (!action) return INVALID_SIGNATURE;

  const parts: string[] = [action.type];
  const fields: SignatureSource = action;
  for (const field of SIGNATURE_FIELDS) {
    const value = fields[field];
    if (typeof value !== 'string') continue;
    const trimmed = value.trim();
    if (!trimmed) continue;
    const truncated =
      trimmed.length > MAX_VALUE_LENGTH ? `${trimmed.slice(0, MAX_VALUE_LENGTH - 3)}...` : trimmed;
    parts.push(`${field}=${truncated}`);
  }
  return parts.join('|');
}
