import type { AgentPage } from '../engine/page.js';
import type { MissionMemory } from '../memory/mission-memory.js';
import type { ElementMatch, SelectorValidation } from '../types.js';
import type { Logger } from '../logger.js';
import { escalateInfrastructure, firstLine } from './errors.js';

// ─────────────────────────────────────────────────────────────────────────────
// SelectorValidator: probe candidate selectors against the live page
//
// A selector "works" when it resolves to at least one element and the first
// match is visible and enabled. Probes are capped per call; selectors already
// tried for the same text are skipped.
// ─────────────────────────────────────────────────────────────────────────────

export const MAX_PROBES_PER_CALL = 10;

function elementRank(el: ElementMatch): number {
  return (el.isVisible && el.isInteractive ? 4 : 0) + (el.isVisible ? 2 : 0) + (el.isInteractive ? 1 : 0);
}

export class SelectorValidator {
  private maxProbes: number;
  private logger?: Logger;

  constructor(options: { maxProbes?: number; logger?: Logger } = {}) {
    this.maxProbes = options.maxProbes ?? MAX_PROBES_PER_CALL;
    this.logger = options.logger;
  }

  async validate(
    page: AgentPage,
    elements: ElementMatch[],
    searchText: string,
    memory: MissionMemory,
  ): Promise<SelectorValidation> {
    const ordered = [...elements].sort((a, b) => elementRank(b) - elementRank(a));
    const workingSelectors: string[] = [];
    const failedSelectors: string[] = [];
    let bestSelector: string | null = null;
    let bestElement: ElementMatch | null = null;
    let tested = 0;

    probing: for (const element of ordered) {
      for (const selector of element.suggestedSelectors) {
        if (tested >= this.maxProbes) break probing;
        if (memory.hasTriedSelector(searchText, selector)) continue;

        tested += 1;
        const works = await this.probe(page, selector);
        memory.recordSelectorAttempt(searchText, selector);

        if (works) {
          workingSelectors.push(selector);
          if (bestSelector === null) {
            bestSelector = selector;
            bestElement = element;
          }
        } else {
          failedSelectors.push(selector);
        }
      }
    }

    memory.recordInteraction({
      step: memory.step,
      searchText,
      totalElements: elements.length,
      tested,
      working: workingSelectors.length,
      failed: failedSelectors.length,
      bestSelector,
    });

    this.logger?.debug(
      { searchText, tested, working: workingSelectors.length, bestSelector },
      'selector validation finished',
    );

    return { workingSelectors, failedSelectors, bestSelector, bestElement };
  }

  private async probe(page: AgentPage, selector: string): Promise<boolean> {
    try {
      const locator = page.locator(selector);
      if ((await locator.count()) === 0) return false;
      const first = locator.first();
      return (await first.isVisible()) && (await first.isEnabled());
    } catch (err) {
      escalateInfrastructure(err);
      this.logger?.debug({ selector, error: firstLine(err) }, 'selector probe failed');
      return false;
    }
  }
}
