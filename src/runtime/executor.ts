import { z } from 'zod';
import type { AgentConfig } from '../config.js';
import type { AgentPage } from '../engine/page.js';
import type { CaptchaSolver } from '../engine/captcha.js';
import {
  PAGE_TEXT,
  SCROLL_METRICS,
  dismissByTextScript,
  forceScrollTopScript,
  scrollByScript,
  scrollContainerScript,
} from '../engine/scripts.js';
import type { MissionMemory } from '../memory/mission-memory.js';
import { findElementsWithText } from '../semantic/dom-search.js';
import { signature } from '../actions/signature.js';
import { alternativesFor } from '../actions/fallback.js';
import { silentLogger, type Logger } from '../logger.js';
import type {
  Action,
  CaptchaOutcome,
  DismissPopupAction,
  ElementMatch,
  ExecutionOutcome,
  ExtractAction,
  ExtractSelectorAction,
  ExtractedItem,
  FillAction,
  InteractionAction,
  RequestUserInputAction,
  ScrollAction,
  SelectorValidation,
  VerificationResult,
} from '../types.js';
import { ActionVerifier, detectLoginFailure, isLoginAttempt } from './verifier.js';
import { SelectorValidator } from './selector-validator.js';
import type { UserInputGate } from './user-input-gate.js';
import { nullSink, type StatusSink } from './status.js';
import {
  ActionRejectedError,
  ProtocolViolationError,
  UserInputTimeoutError,
  escalateInfrastructure,
  firstLine,
} from './errors.js';

// ─────────────────────────────────────────────────────────────────────────────
// ActionExecutor: one proposed action, one step
//
//   signature → banned?            → blocked (page untouched)
//             → protocol pending?  → violation unless it is the expected selector
//             → perform            → failed (signature banned) | executed
//             → verify → history → step + 1
//
// Every pass advances the step exactly once. Per-action problems become typed
// outcomes and history entries; only InfrastructureError leaves this class.
// ─────────────────────────────────────────────────────────────────────────────

export type ExecutorSettings = Pick<
  AgentConfig,
  'actionTimeoutMs' | 'fillTimeoutMs' | 'userInputTimeoutMs' | 'captchaTimeoutMs' | 'settleMs' | 'scrollSettleMs'
>;

export interface ActionExecutorDeps {
  settings: ExecutorSettings;
  gate: UserInputGate;
  captcha: CaptchaSolver;
  validator?: SelectorValidator;
  verifier?: ActionVerifier;
  status?: StatusSink;
  logger?: Logger;
  /** Where verification screenshots for this mission go */
  screenshotDir?: string;
}

/** Placeholders the reasoner uses instead of ever seeing submitted values */
export const INPUT_PLACEHOLDERS = ['{{USER_INPUT}}', '{{PASSWORD}}', '{{EMAIL}}', '{{PHONE}}', '{{OTP}}'] as const;

export const MAX_PROTOCOL_SELECTORS = 15;
const MIN_SCROLL_DELTA = 50;
const MAX_EXTRACT_TEXT_LENGTH = 100;
const EXTRACT_REPEAT_WINDOW = 3;
// Markup, attribute assignments, xpath and selector syntax; plain words like "CSS" pass
const CODE_LIKE_PATTERNS = [
  /[<>{}]/,
  /\b(?:class|id|name|type)\s*=/,
  /\bxpath\b|^\/\//,
  /\b(?:css|selector)\s*[:=(]/,
  /^#[a-z_][\w-]*$/,
  /[#.][a-z_][\w-]*[.#[]/,
];
const SEARCH_SELECTOR = /search|input|query/i;
const SEARCH_TEXT = /search|input|query|find/i;

const CLOSE_SELECTORS = [
  '[aria-label="Close"]',
  '[aria-label="close"]',
  'button.close',
  '.modal-close',
  '.close-button',
  '[data-dismiss="modal"]',
  '[data-bs-dismiss="modal"]',
  'button:has-text("×")',
];

const scrollMetricsSchema = z.object({ scrollY: z.number(), innerHeight: z.number() });
type ScrollMetrics = z.infer<typeof scrollMetricsSchema>;

interface Performed {
  detail: string;
  /** The action as it actually ran (placeholders resolved), for verification */
  ran?: Action;
  maskValues?: boolean;
}

export class ActionExecutor {
  private settings: ExecutorSettings;
  private gate: UserInputGate;
  private captcha: CaptchaSolver;
  private validator: SelectorValidator;
  private verifier: ActionVerifier;
  private status: StatusSink;
  private logger: Logger;
  private screenshotDir?: string;

  constructor(deps: ActionExecutorDeps) {
    this.settings = deps.settings;
    this.gate = deps.gate;
    this.captcha = deps.captcha;
    this.logger = deps.logger ?? silentLogger();
    this.validator = deps.validator ?? new SelectorValidator({ logger: this.logger });
    this.verifier = deps.verifier ?? new ActionVerifier(this.logger);
    this.status = deps.status ?? nullSink;
    this.screenshotDir = deps.screenshotDir;
  }

  async execute(action: Action, memory: MissionMemory, page: AgentPage): Promise<ExecutionOutcome> {
    const sig = signature(action);
    memory.recordAttempt(sig);
    memory.setLastAction(action);

    try {
      const outcome = await this.process(action, sig, memory, page);
      if (outcome.kind === 'executed' || outcome.kind === 'failed') {
        await this.checkLogin(action, sig, memory, page);
      }
      memory.setUrl(page.url());
      return outcome;
    } finally {
      memory.advanceStep();
    }
  }

  // ─── State machine ────────────────────────────────────────────────────────

  private async process(
    action: Action,
    sig: string,
    memory: MissionMemory,
    page: AgentPage,
  ): Promise<ExecutionOutcome> {
    const { jobId, step } = memory;

    if (memory.isBanned(sig)) {
      const failureCount = memory.failureCount(sig);
      const advice = alternativesFor(sig).join(' | ');
      memory.recordHistory(`BLOCKED DUPLICATE ACTION \`${sig}\` (failed ${failureCount}x before). ${advice}`);
      this.status.push(jobId, 'action_blocked', { step, signature: sig, failureCount });
      this.logger.info({ jobId, step, signature: sig }, 'blocked banned action');
      return { kind: 'blocked', signature: sig, failureCount };
    }

    const violation = this.enforceProtocol(action, sig, memory);
    if (violation) {
      memory.recordHistory(`PROTOCOL VIOLATION: ${violation.message}`);
      this.status.push(jobId, 'protocol_violation', {
        step,
        signature: sig,
        expectedSelector: violation.expectedSelector,
        remaining: violation.remaining,
      });
      this.logger.info({ jobId, step, expected: violation.expectedSelector }, 'protocol violation');
      return {
        kind: 'protocol_violation',
        signature: sig,
        expectedSelector: violation.expectedSelector,
        remaining: violation.remaining,
        message: violation.message,
      };
    }

    const priorUrl = page.url();
    let performed: Performed;
    try {
      performed = await this.perform(action, memory, page);
    } catch (err) {
      escalateInfrastructure(err);
      return this.recordFailure(action, sig, err, memory);
    }

    const verification = await this.runVerification(performed, action, priorUrl, memory, page);
    this.recordSuccess(action, memory);

    const parts = [`Executed \`${sig}\` successfully`];
    if (performed.detail) parts.push(performed.detail);
    if (verification) parts.push(`Verification: ${describeVerification(verification)}`);
    memory.recordHistory(parts.join(' | '));

    this.status.push(jobId, 'action_executed', { step, signature: sig, verification });
    this.logger.info({ jobId, step, signature: sig }, 'action executed');
    return { kind: 'executed', signature: sig, verification };
  }

  /**
   * While a selector-testing protocol is pending, only click/fill/press on the
   * expected selector is accepted. An accepted action moves the index forward.
   */
  private enforceProtocol(action: Action, sig: string, memory: MissionMemory): ProtocolViolationError | null {
    const ctx = memory.elementContext;
    if (!ctx || !memory.testingInProgress) return null;

    const index = ctx.currentTestIndex;
    const expected = ctx.untestedSelectors[index] ?? '';
    const remaining = ctx.untestedSelectors.length - index;

    if (isInteraction(action) && action.selector === expected) {
      memory.advanceElementContext();
      return null;
    }

    return new ProtocolViolationError(
      `Selector testing for '${ctx.text}' is not finished: the next action must be a click, fill or press ` +
        `on ${JSON.stringify(expected)} (index ${index}, ${remaining} selector(s) still untested). ` +
        `Rejected \`${sig}\`.`,
      expected,
      remaining,
    );
  }

  private recordFailure(action: Action, sig: string, err: unknown, memory: MissionMemory): ExecutionOutcome {
    const error = firstLine(err);
    const count = memory.banAction(sig);
    memory.recordHistory(`FAILED \`${sig}\` error='${error}'`);

    // The gate dropped its waiter when it timed out; the mission side is cleared here
    if (err instanceof UserInputTimeoutError) memory.clearUserInput();

    this.status.push(memory.jobId, 'action_failed', { step: memory.step, signature: sig, error, failureCount: count });
    this.logger.warn({ jobId: memory.jobId, step: memory.step, type: action.type, error }, 'action failed');
    return { kind: 'failed', signature: sig, error };
  }

  private recordSuccess(action: Action, memory: MissionMemory): void {
    if (isInteraction(action)) {
      const ctx = memory.elementContext;
      if (ctx?.untestedSelectors.includes(action.selector)) {
        memory.recordSuccessfulSelector(ctx.text, action.selector);
      }
    }

    switch (action.type) {
      case 'click':
        if (SEARCH_SELECTOR.test(action.selector)) memory.setSearchFlowFlag('clicked');
        break;
      case 'fill':
        if (SEARCH_SELECTOR.test(action.selector)) memory.setSearchFlowFlag('filled');
        break;
      case 'press':
        if (action.key === 'Enter' && SEARCH_SELECTOR.test(action.selector)) memory.setSearchFlowFlag('submitted');
        break;
      default:
        break;
    }
  }

  private async runVerification(
    performed: Performed,
    action: Action,
    priorUrl: string,
    memory: MissionMemory,
    page: AgentPage,
  ): Promise<VerificationResult | null> {
    const ran = performed.ran ?? action;
    const { result, screenshotPath } = await this.verifier.verify(page, ran, priorUrl, {
      step: memory.step,
      screenshotDir: this.screenshotDir,
      maskValues: performed.maskValues,
      timeoutMs: this.settings.actionTimeoutMs,
    });

    if (screenshotPath) memory.addScreenshot(screenshotPath);
    if (result) {
      memory.recordVerification({ ...result, step: memory.step, actionType: action.type, screenshotPath });
    }
    return result;
  }

  // ─── Per-type execution ───────────────────────────────────────────────────

  private async perform(action: Action, memory: MissionMemory, page: AgentPage): Promise<Performed> {
    switch (action.type) {
      case 'click':
        await page.locator(action.selector).first().click({ timeout: this.settings.actionTimeoutMs });
        await page.waitForTimeout(this.settings.settleMs);
        return { detail: '' };

      case 'press':
        await page.locator(action.selector).first().press(action.key, { timeout: this.settings.actionTimeoutMs });
        await page.waitForTimeout(this.settings.settleMs);
        return { detail: '' };

      case 'fill':
        return this.fill(action, memory, page);

      case 'scroll':
        return { detail: await this.scroll(action, page) };

      case 'extract':
        return { detail: this.extract(action, memory, page) };

      case 'extract_selector':
        return { detail: await this.extractSelector(action, memory, page) };

      case 'dismiss_popup':
        return { detail: await this.dismissPopup(action, page) };

      case 'request_user_input':
        return { detail: await this.requestUserInput(action, memory) };

      case 'solve_captcha':
        return { detail: await this.solveCaptcha(memory, page) };

      case 'finish':
        return { detail: `Finish requested: ${action.reason || '(no reason given)'}` };
    }
  }

  private async fill(action: FillAction, memory: MissionMemory, page: AgentPage): Promise<Performed> {
    const { text, usedInput } = resolveFillText(action, memory);
    await page.locator(action.selector).first().fill(text, { timeout: this.settings.fillTimeoutMs });
    if (usedInput) memory.consumeUserInput();
    await page.waitForTimeout(this.settings.settleMs);
    return {
      detail: usedInput ? 'Filled with user-provided input' : '',
      ran: { ...action, text },
      maskValues: usedInput,
    };
  }

  private async scroll(action: ScrollAction, page: AgentPage): Promise<string> {
    const sign = action.direction === 'up' ? -1 : 1;
    const before = await readScrollMetrics(page);
    const distance = action.distance ?? Math.max(before.innerHeight * 0.8, 400);

    await page.evaluate(scrollByScript(sign * distance));
    await page.waitForTimeout(this.settings.scrollSettleMs);
    let after = await readScrollMetrics(page);
    let strategy = 'smooth';

    const fallbacks: Array<[string, () => Promise<unknown>]> = [
      ['keyboard', () => page.pressKey(action.direction === 'up' ? 'PageUp' : 'PageDown')],
      ['scrollTop', () => page.evaluate(forceScrollTopScript(sign * Math.max(before.innerHeight, 600)))],
      ['container', () => page.evaluate(scrollContainerScript(sign * 400))],
    ];

    for (const [name, attempt] of fallbacks) {
      if (Math.abs(after.scrollY - before.scrollY) >= MIN_SCROLL_DELTA) break;
      this.logger.debug({ strategy: name }, 'scroll had no effect, trying fallback');
      await attempt();
      await page.waitForTimeout(this.settings.scrollSettleMs);
      after = await readScrollMetrics(page);
      strategy = name;
    }

    const delta = Math.round(after.scrollY - before.scrollY);
    return `Scrolled ${action.direction} (${strategy}), position moved ${delta}px`;
  }

  private extract(action: ExtractAction, memory: MissionMemory, page: AgentPage): string {
    const base = page.url();
    const items = action.items.map((item) => absolutizeUrl(item, base));
    memory.addResults(items);
    this.status.push(memory.jobId, 'results_extracted', { step: memory.step, added: items.length, total: memory.results.length });
    return `Extracted ${items.length} item(s), ${memory.results.length} total`;
  }

  private async extractSelector(action: ExtractSelectorAction, memory: MissionMemory, page: AgentPage): Promise<string> {
    const text = action.text.trim();
    const rejection = implausibleExtractText(text, memory);
    if (rejection) throw new ActionRejectedError(rejection);

    memory.recordExtract(text);
    if (SEARCH_TEXT.test(text)) memory.setSearchFlowFlag('detected');

    const elements = await findElementsWithText(page, text);
    if (elements.length === 0) throw new ActionRejectedError(`No elements found containing '${text}'`);

    const validation = await this.validator.validate(page, elements, text, memory);
    const selectors = buildProtocolList(elements, validation, memory);
    if (selectors.length === 0) {
      throw new ActionRejectedError(`Every candidate selector for '${text}' has already failed`);
    }

    memory.setElementContext({
      text,
      untestedSelectors: selectors,
      currentTestIndex: 0,
      testingRequired: true,
      workingSelectors: validation.workingSelectors,
    });
    if (validation.bestSelector) memory.recordSuccessfulSelector(text, validation.bestSelector);

    this.status.push(memory.jobId, 'selectors_extracted', {
      step: memory.step,
      text,
      elements: elements.length,
      working: validation.workingSelectors.length,
      selectors: selectors.length,
    });

    return (
      `Found ${elements.length} element(s) for '${text}' with ${validation.workingSelectors.length} working selector(s); ` +
      `${selectors.length} selector(s) must now be tested in order, starting with ${JSON.stringify(selectors[0])}`
    );
  }

  private async dismissPopup(action: DismissPopupAction, page: AgentPage): Promise<string> {
    const text = action.text.trim();
    if (text && (await page.evaluate(dismissByTextScript(text))) === true) {
      await page.waitForTimeout(this.settings.settleMs);
      return `Dismissed popup using '${text}'`;
    }

    for (const selector of CLOSE_SELECTORS) {
      try {
        const el = page.locator(selector).first();
        if ((await el.count()) > 0 && (await el.isVisible())) {
          await el.click({ timeout: this.settings.actionTimeoutMs });
          await page.waitForTimeout(this.settings.settleMs);
          return `Dismissed popup using close control ${selector}`;
        }
      } catch (err) {
        escalateInfrastructure(err);
        this.logger.debug({ selector, error: firstLine(err) }, 'close control not usable');
      }
    }

    throw new ActionRejectedError(`No popup control found for '${text}'`);
  }

  private async requestUserInput(action: RequestUserInputAction, memory: MissionMemory): Promise<string> {
    const request = { inputType: action.inputType, prompt: action.prompt, sensitive: action.sensitive };
    memory.openUserInput(request);
    this.status.push(memory.jobId, 'user_input_required', { step: memory.step, ...request });

    const value = await this.gate.waitFor(memory.jobId, request, this.settings.userInputTimeoutMs);
    memory.receiveUserInput(value);
    this.status.push(memory.jobId, 'user_input_received', { step: memory.step, inputType: action.inputType });

    return action.sensitive
      ? `Received ${action.inputType} input (hidden); fill with {{USER_INPUT}}`
      : `Received ${action.inputType} input for '${action.prompt}'; fill with {{USER_INPUT}}`;
  }

  /** Never throws for CAPTCHA trouble; a page that went away still escalates */
  private async solveCaptcha(memory: MissionMemory, page: AgentPage): Promise<string> {
    const outcome = await this.boundedSolve(page);
    memory.recordCaptchaAttempt(outcome);
    this.status.push(memory.jobId, 'captcha_attempt', { step: memory.step, ...outcome });

    if (!outcome.found) return 'No CAPTCHA detected';
    if (outcome.solved) return `Solved ${outcome.type ?? 'unknown'} CAPTCHA via ${outcome.service ?? 'unknown'}`;
    this.logger.warn({ jobId: memory.jobId, type: outcome.type, error: outcome.error }, 'captcha not solved');
    return `CAPTCHA ${outcome.type ?? 'unknown'} not solved: ${outcome.error ?? 'unknown error'}`;
  }

  private async boundedSolve(page: AgentPage): Promise<CaptchaOutcome> {
    const timeoutMs = this.settings.captchaTimeoutMs;
    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<CaptchaOutcome>((resolve) => {
      timer = setTimeout(
        () => resolve(failedCaptcha(`solver timed out after ${Math.round(timeoutMs / 1000)}s`)),
        timeoutMs,
      );
    });

    try {
      return await Promise.race([this.captcha.solveIfPresent(page, page.url()), timedOut]);
    } catch (err) {
      escalateInfrastructure(err);
      return failedCaptcha(firstLine(err));
    } finally {
      clearTimeout(timer);
    }
  }

  // ─── Login failure detection ──────────────────────────────────────────────

  private async checkLogin(action: Action, sig: string, memory: MissionMemory, page: AgentPage): Promise<void> {
    if (!isLoginAttempt(action, sig)) return;

    let text: string;
    try {
      const raw = await page.evaluate(PAGE_TEXT);
      text = typeof raw === 'string' ? raw : '';
    } catch (err) {
      escalateInfrastructure(err);
      this.logger.debug({ error: firstLine(err) }, 'could not read page text for login check');
      return;
    }

    if (!detectLoginFailure(text, page.url())) return;
    memory.recordHistory(
      `LOGIN FAILURE DETECTED after \`${sig}\`: the page reports a sign-in error. Request fresh credentials or try another approach.`,
    );
    this.status.push(memory.jobId, 'login_failure_detected', { step: memory.step, signature: sig, url: page.url() });
  }
}

// ─── Helpers ──────────────────────────────────────────────────────────────────

function isInteraction(action: Action): action is InteractionAction {
  return action.type === 'click' || action.type === 'fill' || action.type === 'press';
}

function describeVerification(v: VerificationResult): string {
  const verdict = v.success ? 'success' : 'not confirmed';
  const changes = v.changesDetected ? 'changes detected' : 'no changes';
  return v.notes.length > 0 ? `${verdict}, ${changes} (${v.notes.join('; ')})` : `${verdict}, ${changes}`;
}

function failedCaptcha(error: string): CaptchaOutcome {
  return { found: true, solved: false, type: null, confidence: 0, service: null, error };
}

async function readScrollMetrics(page: AgentPage): Promise<ScrollMetrics> {
  const parsed = scrollMetricsSchema.safeParse(await page.evaluate(SCROLL_METRICS));
  return parsed.success ? parsed.data : { scrollY: 0, innerHeight: 0 };
}

/**
 * Placeholders are replaced with the submitted value. Without a placeholder,
 * the value still overrides the proposed text when the reasoner echoed it or
 * when a pending password request meets a password field.
 */
export function resolveFillText(action: FillAction, memory: MissionMemory): { text: string; usedInput: boolean } {
  const { response, request, flowActive } = memory.userInput;
  const placeholder = INPUT_PLACEHOLDERS.find((p) => action.text.includes(p));

  if (placeholder) {
    if (response === null) {
      throw new ActionRejectedError(`${placeholder} used but no user input is available; request it first`);
    }
    let text = action.text;
    for (const p of INPUT_PLACEHOLDERS) text = text.split(p).join(response);
    return { text, usedInput: true };
  }

  if (response !== null && flowActive) {
    if (action.text === response) return { text: response, usedInput: true };
    if (request?.inputType === 'password' && action.selector.toLowerCase().includes('password')) {
      return { text: response, usedInput: true };
    }
  }

  return { text: action.text, usedInput: false };
}

export function implausibleExtractText(text: string, memory: MissionMemory): string | null {
  if (!text) return 'extract_selector needs non-empty text';
  if (text.length > MAX_EXTRACT_TEXT_LENGTH) {
    return `extract_selector text is too long (${text.length} characters); use a short visible label`;
  }
  const lower = text.toLowerCase();
  const token = CODE_LIKE_PATTERNS.map((pattern) => lower.match(pattern)?.[0]).find((hit) => hit !== undefined);
  if (token !== undefined) return `extract_selector text looks like code ('${token}'); use the element's visible text`;

  const recent = memory.recentExtracts.slice(-EXTRACT_REPEAT_WINDOW).map((t) => t.toLowerCase());
  if (recent.includes(lower)) {
    return `'${text}' was already searched recently; test the found selectors or try different text`;
  }
  return null;
}

/**
 * Working selectors first, then every other suggestion in rank order.
 * Selectors whose click already failed are left out.
 */
export function buildProtocolList(
  elements: ElementMatch[],
  validation: SelectorValidation,
  memory: MissionMemory,
): string[] {
  const ordered = [...validation.workingSelectors, ...elements.flatMap((el) => el.suggestedSelectors)];
  const unique = [...new Set(ordered)];
  return unique
    .filter((selector) => !memory.isBanned(signature({ type: 'click', selector })))
    .slice(0, MAX_PROTOCOL_SELECTORS);
}

function absolutizeUrl(item: ExtractedItem, base: string): ExtractedItem {
  const url = item['url'];
  if (typeof url !== 'string' || !url) return { ...item };
  try {
    return { ...item, url: new URL(url, base).href };
  } catch {
    // not resolvable against the page, keep what was reported
    return { ...item };
  }
}
