import { z } from 'zod';
import type { AgentPage } from '../engine/page.js';
import { findElementsScript } from '../engine/scripts.js';
import type { ElementMatch } from '../types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Live DOM search: find elements that mention a piece of text, ranked so the
// ones an agent can actually interact with come first.
// ─────────────────────────────────────────────────────────────────────────────

const elementMatchSchema = z.object({
  tagName: z.string(),
  text: z.string().default(''),
  isVisible: z.boolean(),
  isInteractive: z.boolean(),
  isClickable: z.boolean(),
  matchScore: z.number(),
  suggestedSelectors: z.array(z.string()),
});

const searchResultSchema = z.array(elementMatchSchema);

export const MAX_CANDIDATE_ELEMENTS = 10;

export function priorityScore(el: ElementMatch): number {
  return (el.isVisible ? 10 : 0) + (el.isInteractive ? 5 : 0) + (el.isClickable ? 3 : 0) + el.matchScore / 10;
}

export function rankElements(elements: ElementMatch[], limit = MAX_CANDIDATE_ELEMENTS): ElementMatch[] {
  return [...elements].sort((a, b) => priorityScore(b) - priorityScore(a)).slice(0, limit);
}

export async function findElementsWithText(
  page: AgentPage,
  text: string,
  limit = MAX_CANDIDATE_ELEMENTS,
): Promise<ElementMatch[]> {
  if (!text.trim()) return [];
  const raw = await page.evaluate(findElementsScript(text));
  const parsed = searchResultSchema.safeParse(raw);
  if (!parsed.success) return [];
  return rankElements(parsed.data, limit);
}
