// ─────────────────────────────────────────────────────────────────────────────
// Browser-side scripts
//
// Each export is (or builds) an expression string for AgentPage.evaluate.
// Function-based scripts are written as typed functions and serialized with
// their argument, so they are type-checked here and run unchanged in the page.
// Results come back as `unknown` and are validated by the caller.
// ─────────────────────────────────────────────────────────────────────────────

function invoke<A>(fn: (arg: A) => unknown, arg: A): string {
  return `(${fn.toString()})(${JSON.stringify(arg)})`;
}

// ─── Scrolling ───────────────────────────────────────────────────────────────

export const SCROLL_METRICS =
  '({ scrollY: window.scrollY || document.documentElement.scrollTop || 0, innerHeight: window.innerHeight })';

export function scrollByScript(top: number): string {
  return `window.scrollBy({ top: ${Math.round(top)}, behavior: 'smooth' })`;
}

export function forceScrollTopScript(delta: number): string {
  return invoke((d: number) => {
    document.documentElement.scrollTop += d;
    document.body.scrollTop += d;
    return true;
  }, Math.round(delta));
}

/** Scroll the first element that actually has overflowing content */
export function scrollContainerScript(delta: number): string {
  return invoke((d: number) => {
    for (const el of Array.from(document.querySelectorAll<HTMLElement>('*'))) {
      const overflowY = window.getComputedStyle(el).overflowY;
      if (el.scrollHeight > el.clientHeight && overflowY !== 'hidden' && overflowY !== 'visible') {
        el.scrollTop += d;
        return true;
      }
    }
    return false;
  }, Math.round(delta));
}

// ─── Page text ───────────────────────────────────────────────────────────────

export const PAGE_TEXT = 'document.body ? document.body.innerText : ""';

// ─── Popup dismissal ─────────────────────────────────────────────────────────

/** Click the first button-like element whose text or aria-label contains the text */
export function dismissByTextScript(text: string): string {
  return invoke((needle: string) => {
    const search = needle.toLowerCase().trim();
    const candidates = document.querySelectorAll<HTMLElement>(
      'button, a, [role="button"], [onclick], .close, .dismiss, [aria-label]',
    );
    for (const el of Array.from(candidates)) {
      const label = (el.textContent ?? '').toLowerCase().trim();
      const aria = (el.getAttribute('aria-label') ?? '').toLowerCase();
      const rect = el.getBoundingClientRect();
      if (rect.width === 0 || rect.height === 0) continue;
      if (label.includes(search) || aria.includes(search)) {
        el.click();
        return true;
      }
    }
    return false;
  }, text);
}

// ─── Element search ──────────────────────────────────────────────────────────

/**
 * Fuzzy search over every element's attributes, text and common text
 * properties. Text is normalized to lowercase alphanumerics before matching.
 */
export function findElementsScript(text: string): string {
  return invoke((searchText: string) => {
    const search = searchText.toLowerCase();
    const normalize = (value: string): string => value.toLowerCase().replace(/[\s_-]+/g, '').replace(/[^a-z0-9]/g, '');
    const searchNorm = normalize(search);

    const score = (target: string): number => {
      const norm = normalize(target);
      if (!searchNorm || !norm) return 0;
      let s: number;
      if (norm === searchNorm) s = 100;
      else if (norm.startsWith(searchNorm)) s = 80;
      else if (norm.includes(searchNorm)) s = 60;
      else if (norm.endsWith(searchNorm)) s = 40;
      else return 0;
      if (norm.length === searchNorm.length) s += 20;
      if (target.includes(' ') && search.includes(' ')) s += 10;
      return Math.min(s, 100);
    };

    const selectorsFor = (el: Element): string[] => {
      const selectors: string[] = [];
      if (el.id) selectors.push(`#${el.id}`);
      const className = el.getAttribute('class');
      if (className) {
        const classes = className.trim().split(/\s+/).filter((c) => c.length > 0);
        if (classes.length > 0) selectors.push(`.${classes.join('.')}`);
      }
      for (const attr of Array.from(el.attributes)) {
        if (attr.name.startsWith('data-') && attr.value) selectors.push(`[${attr.name}="${attr.value}"]`);
      }
      for (const name of ['name', 'type', 'role', 'aria-label']) {
        const value = el.getAttribute(name);
        if (value) selectors.push(`[${name}="${value}"]`);
      }
      const content = el.textContent?.trim() ?? '';
      if (content.length > 0 && content.length < 50) {
        selectors.push(`text="${content}"`);
        selectors.push(`:has-text("${content}")`);
      }
      selectors.push(el.tagName.toLowerCase());
      return selectors;
    };

    const interactiveTags = ['button', 'a', 'input', 'select', 'textarea'];
    const results: Array<Record<string, unknown>> = [];

    for (const el of Array.from(document.querySelectorAll<HTMLElement>('*'))) {
      let best = 0;
      for (const attr of Array.from(el.attributes)) {
        best = Math.max(best, score(attr.name), score(attr.value));
      }
      const content = el.textContent?.trim() ?? '';
      const inner = el.innerText?.trim() ?? '';
      best = Math.max(best, score(content));
      if (inner !== content) best = Math.max(best, score(inner));
      for (const prop of ['placeholder', 'value', 'title', 'alt', 'aria-label']) {
        const value = el.getAttribute(prop) ?? (prop === 'value' && el instanceof HTMLInputElement ? el.value : null);
        if (value) best = Math.max(best, score(value));
      }
      if (best === 0) continue;

      const rect = el.getBoundingClientRect();
      const style = window.getComputedStyle(el);
      const isVisible =
        rect.width > 0 &&
        rect.height > 0 &&
        style.visibility !== 'hidden' &&
        style.display !== 'none' &&
        el.offsetParent !== null;
      const tag = el.tagName.toLowerCase();
      const isInteractive =
        interactiveTags.includes(tag) ||
        el.onclick !== null ||
        el.hasAttribute('onclick') ||
        el.hasAttribute('href') ||
        style.cursor === 'pointer' ||
        el.hasAttribute('tabindex');
      const isClickable = isInteractive || style.pointerEvents !== 'none';

      results.push({
        tagName: tag,
        text: (inner || content).slice(0, 100),
        isVisible,
        isInteractive,
        isClickable,
        matchScore: best,
        suggestedSelectors: selectorsFor(el).slice(0, 5),
      });
    }
    return results;
  }, text);
}

// ─── CAPTCHA widgets ─────────────────────────────────────────────────────────

export const CAPTCHA_WIDGETS = `({
  recaptcha: !!document.querySelector('.g-recaptcha, iframe[src*="recaptcha"]'),
  hcaptcha: !!document.querySelector('.h-captcha, iframe[src*="hcaptcha"]'),
  turnstile: !!document.querySelector('.cf-turnstile, iframe[src*="challenges.cloudflare.com"]'),
  siteKey: document.querySelector('[data-sitekey]')?.getAttribute('data-sitekey') || null,
})`;
