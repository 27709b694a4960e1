import type { AgentPage } from './page.js';
import type { Logger } from '../logger.js';
import { escalateInfrastructure, firstLine } from '../runtime/errors.js';

// Consent managers first, then generic wording. The first visible match is
// clicked and the scan stops.
const CONSENT_SELECTORS = [
  '#onetrust-accept-btn-handler',
  '.onetrust-accept-btn-handler',
  '#CybotCookiebotDialogBodyLevelButtonLevelOptinAllowAll',
  '#CybotCookiebotDialogBodyButtonAccept',
  '.fc-button.fc-cta-consent',
  'button[data-testid="GDPR-accept-button"]',
  '#accept-choices',
  '.accept-cookies',
  '[aria-label="Accept all"]',
  '[aria-label="Accept cookies"]',
  'button:has-text("Accept all")',
  'button:has-text("Accept All")',
  'button:has-text("I Accept")',
  'button:has-text("Got it")',
  'button:has-text("Agree and continue")',
];

/** Accept a cookie/consent banner if one is showing. Returns the selector clicked. */
export async function dismissConsentBanner(page: AgentPage, logger?: Logger): Promise<string | null> {
  for (const selector of CONSENT_SELECTORS) {
    try {
      const el = page.locator(selector).first();
      if ((await el.count()) === 0 || !(await el.isVisible())) continue;
      await el.click({ timeout: 2_000 });
      await page.waitForTimeout(400);
      logger?.debug({ selector }, 'consent banner dismissed');
      return selector;
    } catch (err) {
      escalateInfrastructure(err);
      logger?.debug({ selector, error: firstLine(err) }, 'consent control not clickable');
    }
  }
  return null;
}
