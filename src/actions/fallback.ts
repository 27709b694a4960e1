import type { Action } from '../types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Fallback policy: declarative tables for the three places the loop has to
// choose an action on the reasoner's behalf:
//
//   alternativesFor   advice attached to a blocked duplicate
//   correctiveAction  replacement for a proposal that is already banned
//   emergencyAction   replacement when reasoning itself failed
// ─────────────────────────────────────────────────────────────────────────────

export type FailureCategory = 'fill' | 'extract_selector' | 'search' | 'generic';

const SEARCH_MARKERS = ['search', 'input[placeholder'];

export function isSearchRelated(signature: string): boolean {
  const lower = signature.toLowerCase();
  return SEARCH_MARKERS.some((m) => lower.includes(m));
}

export function categorize(signature: string): FailureCategory {
  if (signature.startsWith('extract_selector|') || signature === 'extract_selector') {
    return 'extract_selector';
  }
  if (signature.startsWith('fill|')) return 'fill';
  if (isSearchRelated(signature)) return 'search';
  return 'generic';
}

// ─── Blocked-duplicate advice ─────────────────────────────────────────────

const ALTERNATIVES: Record<FailureCategory, readonly string[]> = {
  fill: [
    'Try: click on the element first, then fill',
    'Try: extract_selector to find a different selector',
    'Try: scroll to find alternative input fields',
    'Try: press Tab to move focus to the next input field',
  ],
  extract_selector: [
    'Try: scroll to see different page content',
    "Try: use different search text (single words like 'button', 'input', 'menu')",
    'Try: navigate through visible links or categories instead',
  ],
  search: [
    'Try: scroll down to find different elements',
    "Try: extract_selector with text 'search icon' or 'search button'",
    'Try: press Tab to move focus to the search field',
    'Try: browse menu categories instead of searching',
  ],
  generic: [
    'Try: scroll action to explore the page',
    'Try: extract_selector with different text',
    'Try: different interaction approach (press keys, navigate menus)',
  ],
};

/** Top alternatives to suggest when a banned action is proposed again */
export function alternativesFor(signature: string, limit = 2): string[] {
  return ALTERNATIVES[categorize(signature)].slice(0, limit);
}

// ─── Corrective substitution ──────────────────────────────────────────────

const DEFAULT_EXTRACT_TEXT = 'button';

/** First word of the objective longer than three characters */
export function objectiveKeyword(objective: string): string {
  return objective.split(/\s+/).find((word) => word.length > 3) ?? DEFAULT_EXTRACT_TEXT;
}

export interface Correction {
  action: Action;
  note: string;
}

/** Search intent wins over action type here: a banned search extraction is retried with the objective's wording */
export function correctiveAction(bannedSignature: string, objective: string): Correction {
  if (isSearchRelated(bannedSignature)) {
    const text = objectiveKeyword(objective);
    return {
      action: { type: 'extract_selector', text },
      note: `AUTO-CORRECTED banned search action to selector extraction using '${text}' from the objective`,
    };
  }
  if (categorize(bannedSignature) === 'extract_selector') {
    return {
      action: { type: 'scroll', direction: 'down' },
      note: 'AUTO-CORRECTED repeated extraction to scroll',
    };
  }
  return {
    action: { type: 'scroll', direction: 'down' },
    note: 'AUTO-CORRECTED banned action to exploration',
  };
}

// ─── Emergency action ─────────────────────────────────────────────────────

const EXPLORATION_TERMS = ['menu', 'category', 'link', 'button', 'navigation', 'home'] as const;

export interface EmergencyContext {
  step: number;
  maxSteps: number;
  bannedSignatures: string[];
  recentExtracts: string[];
}

export interface EmergencyChoice {
  action: Action;
  rule: 'search_failures' | 'first_extract' | 'periodic_scroll' | 'exploration' | 'last_resort';
}

/**
 * Deterministic action used when the reasoner failed to produce one. Ordered
 * rules; the first that applies wins. Finishing is only chosen near the step
 * ceiling.
 */
export function emergencyAction(ctx: EmergencyContext): EmergencyChoice {
  const searchFailures = ctx.bannedSignatures.filter(isSearchRelated).length;

  if (searchFailures > 5) {
    return { action: { type: 'extract_selector', text: 'menu' }, rule: 'search_failures' };
  }
  if (ctx.bannedSignatures.length < 3 && ctx.recentExtracts.length === 0) {
    return { action: { type: 'extract_selector', text: 'button' }, rule: 'first_extract' };
  }
  if (ctx.step % 3 === 0) {
    return { action: { type: 'scroll', direction: 'down' }, rule: 'periodic_scroll' };
  }
  if (ctx.step < ctx.maxSteps - 5) {
    const term = EXPLORATION_TERMS[(ctx.step - 1) % EXPLORATION_TERMS.length] ?? 'menu';
    return { action: { type: 'extract_selector', text: term }, rule: 'exploration' };
  }
  return {
    action: {
      type: 'finish',
      reason: `Emergency finish after exhausting all options at step ${ctx.step} with ${ctx.bannedSignatures.length} different failures`,
    },
    rule: 'last_resort',
  };
}
