import type { MissionMemory } from './mission-memory.js';
import type { SearchFlowPhase } from '../types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Context summary: what the reasoner is told about the mission so far.
// A pure function of MissionMemory; no page or LLM access.
// ─────────────────────────────────────────────────────────────────────────────

const SEARCH_FLOW_ORDER: SearchFlowPhase[] = ['detected', 'clicked', 'filled', 'submitted'];

const SEARCH_FLOW_NEXT: Record<SearchFlowPhase, string> = {
  detected: 'Detect the search input using extract_selector',
  clicked: 'Click on the search input field to focus it',
  filled: "Fill the search input with the objective's query",
  submitted: 'Press Enter to submit the search',
};

function capitalize(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1);
}

export function buildContextSummary(memory: MissionMemory): string {
  const sections: string[] = [];

  // ── Exhaustive testing protocol ───────────────────────────────────────────
  const ctx = memory.elementContext;
  if (ctx && memory.testingInProgress) {
    const expected = ctx.untestedSelectors[ctx.currentTestIndex];
    const remaining = ctx.untestedSelectors.length - ctx.currentTestIndex;
    sections.push(
      [
        `SELECTOR TESTING IN PROGRESS for '${ctx.text}' (${remaining} of ${ctx.untestedSelectors.length} left)`,
        `  NEXT REQUIRED ACTION: {"type": "click", "selector": ${JSON.stringify(expected)}}`,
        '  Only click/fill/press on this exact selector is accepted until testing completes.',
      ].join('\n'),
    );
  } else if (ctx) {
    const lines = [`ELEMENTS FOUND for '${ctx.text}':`];
    ctx.untestedSelectors.forEach((sel, i) => {
      const mark = ctx.workingSelectors.includes(sel) ? 'working' : 'untested';
      lines.push(`  ${i + 1}. ${sel} (${mark})`);
    });
    sections.push(lines.join('\n'));
  }

  // ── Recent verifications ──────────────────────────────────────────────────
  const verifications = memory.verifications.slice(-5);
  if (verifications.length > 0) {
    const lines = ['RECENT ACTION VERIFICATION RESULTS:'];
    for (const v of verifications) {
      const mark = v.success || v.changesDetected ? 'OK' : 'NO EFFECT';
      const notes = v.notes.join('; ');
      lines.push(`  [${mark}] Step ${v.step} (${v.actionType})${notes ? `: ${notes}` : ''}`);
    }
    sections.push(lines.join('\n'));
  }

  // ── Working selectors ─────────────────────────────────────────────────────
  const successful = [...memory.successfulSelectors.entries()].slice(-5);
  if (successful.length > 0) {
    const lines = ['VERIFIED WORKING SELECTORS (reusable):'];
    for (const [text, selector] of successful) lines.push(`  - Text '${text}' -> ${selector}`);
    sections.push(lines.join('\n'));
  }

  // ── Element interactions ──────────────────────────────────────────────────
  const interactions = memory.interactions.slice(-3);
  if (interactions.length > 0) {
    const lines = ['RECENT ELEMENT INTERACTIONS:'];
    for (const i of interactions) {
      lines.push(`  - Step ${i.step}: '${i.searchText}' -> ${i.working}/${i.tested} selectors working`);
    }
    sections.push(lines.join('\n'));
  }

  // ── Search flow ───────────────────────────────────────────────────────────
  const flow = memory.searchFlow;
  if (SEARCH_FLOW_ORDER.some((phase) => flow[phase])) {
    const lines = ['SEARCH FLOW PROGRESS:'];
    for (const phase of SEARCH_FLOW_ORDER) {
      lines.push(`  ${capitalize(phase)}: ${flow[phase] ? 'Complete' : 'Pending'}`);
    }
    const next = SEARCH_FLOW_ORDER.find((phase) => !flow[phase]);
    if (next) lines.push(`  NEXT: ${SEARCH_FLOW_NEXT[next]}`);
    sections.push(lines.join('\n'));
  }

  // ── Failure analysis ──────────────────────────────────────────────────────
  const failed = memory.failedActions;
  if (failed.size > 0) {
    const total = [...failed.values()].reduce((a, b) => a + b, 0);
    const signatures = [...failed.keys()];
    const lines = [`FAILURE ANALYSIS (${total} total failures):`];
    const byType: [string, string][] = [
      ['Click', 'click|'],
      ['Fill', 'fill|'],
      ['Extract', 'extract_selector'],
    ];
    for (const [label, prefix] of byType) {
      const n = signatures.filter((s) => s.startsWith(prefix)).length;
      if (n > 0) lines.push(`  ${label} failures: ${n}`);
    }
    if (total > 5) {
      lines.push('  HIGH FAILURE RATE: consider a completely different approach');
      lines.push('  Try scrolling, different search terms, or navigation menus');
    }
    sections.push(lines.join('\n'));
  }

  // ── Selector attempts ─────────────────────────────────────────────────────
  const attempts = [...memory.selectorAttempts.entries()].slice(-3);
  if (attempts.length > 0) {
    const lines = ['SELECTOR ATTEMPT TRACKING:'];
    for (const [text, selectors] of attempts) lines.push(`  - '${text}': ${selectors.size} selectors tested`);
    sections.push(lines.join('\n'));
  }

  // ── CAPTCHA ───────────────────────────────────────────────────────────────
  const captcha = memory.captchaDetected;
  if (captcha?.type) {
    const solvedBy = memory.captchaSolvedBy;
    const lines = [
      'CAPTCHA STATUS:',
      `  Type: ${captcha.type.toUpperCase()}`,
      `  Confidence: ${captcha.confidence}%`,
      `  Status: ${solvedBy ? `SOLVED (${solvedBy})` : 'PENDING'}`,
    ];
    if (!solvedBy) lines.push("  REQUIRED ACTION: use 'solve_captcha' to handle this challenge");
    sections.push(lines.join('\n'));
  }
  const captchaAttempts = memory.captchaAttempts;
  if (captchaAttempts.length > 0) {
    const lines = [`CAPTCHA ATTEMPT HISTORY (${captchaAttempts.length} attempts):`];
    captchaAttempts.slice(-3).forEach((a, i) => {
      lines.push(`  [${a.solved ? 'solved' : 'failed'}] Attempt ${i + 1}: ${a.service ?? 'none'} - ${a.type ?? 'unknown'}`);
    });
    sections.push(lines.join('\n'));
  }

  // ── User input ────────────────────────────────────────────────────────────
  const input = memory.userInput;
  if (input.flowActive && input.request) {
    sections.push(
      input.response !== null
        ? `USER INPUT AVAILABLE (${input.request.inputType}): fill it using the text {{USER_INPUT}}`
        : `USER INPUT PENDING (${input.request.inputType}): ${input.request.prompt}`,
    );
  }

  return sections.join('\n\n');
}

/** The history window plus summary, as one block of text for the prompt */
export function buildHistoryText(memory: MissionMemory, window: number): string {
  const recent = memory.history.slice(-window).join('\n');
  const summary = buildContextSummary(memory);
  return summary ? `${recent}\n\n${summary}` : recent;
}
