import { z } from 'zod';
import type { AgentPage } from './page.js';
import { CAPTCHA_WIDGETS } from './scripts.js';
import type { CaptchaDetection, CaptchaOutcome } from '../types.js';

// ─────────────────────────────────────────────────────────────────────────────
// CAPTCHA collaborator
//
// The mission core only ever calls `solveIfPresent` and records what comes
// back. Solver services plug in behind the interface; the bundled
// implementation detects and reports.
// ─────────────────────────────────────────────────────────────────────────────

export interface CaptchaSolver {
  detect(page: AgentPage): Promise<CaptchaDetection>;
  solveIfPresent(page: AgentPage, url: string): Promise<CaptchaOutcome>;
}

const NONE: CaptchaDetection = { found: false, type: null, confidence: 0 };

const widgetsSchema = z.object({
  recaptcha: z.boolean(),
  hcaptcha: z.boolean(),
  turnstile: z.boolean(),
  siteKey: z.string().nullable().optional(),
});

const FRAME_SIGNATURES: [string, string][] = [
  ['google.com/recaptcha', 'recaptcha'],
  ['recaptcha.net', 'recaptcha'],
  ['hcaptcha.com', 'hcaptcha'],
  ['challenges.cloudflare.com', 'turnstile'],
];

export class DetectOnlyCaptchaSolver implements CaptchaSolver {
  async detect(page: AgentPage): Promise<CaptchaDetection> {
    const url = page.url().toLowerCase();
    const title = (await page.title()).toLowerCase();

    // Interstitials block the whole page; widgets are embedded in it
    if (title === 'just a moment...' || title.includes('attention required')) {
      return { found: true, type: 'cloudflare', confidence: 90 };
    }

    for (const frameUrl of page.frameUrls()) {
      const lower = frameUrl.toLowerCase();
      const hit = FRAME_SIGNATURES.find(([marker]) => lower.includes(marker));
      if (hit) return { found: true, type: hit[1], confidence: 95 };
    }

    const widgets = widgetsSchema.safeParse(await page.evaluate(CAPTCHA_WIDGETS));
    if (widgets.success) {
      const { siteKey } = widgets.data;
      const type = widgets.data.recaptcha
        ? 'recaptcha'
        : widgets.data.hcaptcha
          ? 'hcaptcha'
          : widgets.data.turnstile
            ? 'turnstile'
            : null;
      if (type) return siteKey ? { found: true, type, confidence: 85, siteKey } : { found: true, type, confidence: 85 };
    }

    if (url.includes('/captcha') || url.includes('/challenge')) {
      return { found: true, type: 'challenge_page', confidence: 70 };
    }

    return NONE;
  }

  async solveIfPresent(page: AgentPage, _url: string): Promise<CaptchaOutcome> {
    const detection = await this.detect(page);
    if (!detection.found) {
      return { ...detection, solved: false, service: null, error: null };
    }
    return { ...detection, solved: false, service: null, error: 'no solver service configured' };
  }
}
