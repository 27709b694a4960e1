import { join } from 'path';
import type { AgentPage } from '../engine/page.js';
import type { Action, VerificationResult } from '../types.js';
import type { Logger } from '../logger.js';
import { escalateInfrastructure, firstLine } from './errors.js';

// ─────────────────────────────────────────────────────────────────────────────
// ActionVerifier: did the action we just ran have the effect we expected?
//
//   click   URL changed → changesDetected (a click may legitimately stay put)
//   fill    field value contains the filled text → success
//   press   URL changed → success + changesDetected
//   scroll  always passes
//   other   not verified
//
// An audit screenshot is taken first, whatever the outcome; its failure is
// logged and never affects the verdict.
// ─────────────────────────────────────────────────────────────────────────────

export interface VerifyOptions {
  step: number;
  /** Directory for the audit screenshot; omitted means no screenshot */
  screenshotDir?: string;
  /** Keep filled values out of notes (passwords, OTPs) */
  maskValues?: boolean;
  timeoutMs?: number;
}

export interface VerifyOutcome {
  result: VerificationResult | null;
  screenshotPath?: string;
}

export function padStep(step: number): string {
  return String(step).padStart(2, '0');
}

export class ActionVerifier {
  constructor(private readonly logger?: Logger) {}

  async verify(page: AgentPage, action: Action, priorUrl: string, options: VerifyOptions): Promise<VerifyOutcome> {
    const screenshotPath = await this.captureAudit(page, action, options);
    const result = await this.check(page, action, priorUrl, options);
    return screenshotPath ? { result, screenshotPath } : { result };
  }

  private async check(
    page: AgentPage,
    action: Action,
    priorUrl: string,
    options: VerifyOptions,
  ): Promise<VerificationResult | null> {
    switch (action.type) {
      case 'click': {
        const changed = page.url() !== priorUrl;
        return {
          success: false,
          changesDetected: changed,
          notes: changed ? [`URL changed to ${page.url()}`] : ['No navigation after click'],
        };
      }

      case 'press': {
        const changed = page.url() !== priorUrl;
        return {
          success: changed,
          changesDetected: changed,
          notes: changed ? [`URL changed to ${page.url()}`] : [],
        };
      }

      case 'fill': {
        let actual: string;
        try {
          actual = await page.locator(action.selector).first().inputValue({ timeout: options.timeoutMs });
        } catch (err) {
          escalateInfrastructure(err);
          return { success: false, changesDetected: false, notes: [`Could not read field value: ${firstLine(err)}`] };
        }
        if (actual.includes(action.text)) {
          return { success: true, changesDetected: true, notes: ['Field value verified'] };
        }
        const note = options.maskValues
          ? 'Field value does not contain the provided input'
          : `Expected '${action.text}' but field contains '${actual}'`;
        return { success: false, changesDetected: false, notes: [note] };
      }

      case 'scroll':
        return { success: true, changesDetected: true, notes: [] };

      default:
        return null;
    }
  }

  private async captureAudit(page: AgentPage, action: Action, options: VerifyOptions): Promise<string | undefined> {
    if (!options.screenshotDir) return undefined;
    const path = join(options.screenshotDir, `${padStep(options.step)}_verify_${action.type}.png`);
    try {
      await page.screenshot({ path });
      return path;
    } catch (err) {
      escalateInfrastructure(err);
      this.logger?.warn({ path, error: firstLine(err) }, 'verification screenshot failed');
      return undefined;
    }
  }
}

// ─── Login failure heuristics ────────────────────────────────────────────────

const LOGIN_FAILURE_TEXT = [
  'invalid credentials',
  'login failed',
  'incorrect password',
  'incorrect username',
  'authentication failed',
  'login error',
  'wrong password',
  'invalid login',
  'access denied',
  'login unsuccessful',
  'incorrect email',
  'invalid email',
  'user not found',
  'account not found',
  'too many attempts',
  'account locked',
  'temporarily locked',
];

const LOGIN_FAILURE_PATHS = ['/login', '/signin', '/auth', '/error', '/failure'];

const LOGIN_KEYWORDS = ['login', 'submit', 'sign', 'enter'];

/** Error text on the page, or still sitting on an auth URL */
export function detectLoginFailure(pageText: string, url: string): boolean {
  const text = pageText.toLowerCase();
  const lowerUrl = url.toLowerCase();
  return (
    LOGIN_FAILURE_TEXT.some((indicator) => text.includes(indicator)) ||
    LOGIN_FAILURE_PATHS.some((path) => lowerUrl.includes(path))
  );
}

export function isLoginAttempt(action: Action, signature: string): boolean {
  if (action.type !== 'click' && action.type !== 'press') return false;
  const lower = signature.toLowerCase();
  return LOGIN_KEYWORDS.some((keyword) => lower.includes(keyword));
}
