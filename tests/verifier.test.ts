import { describe, it, expect, beforeEach } from 'vitest';
import { join } from 'path';
import { ActionVerifier, detectLoginFailure, isLoginAttempt, padStep } from '../src/runtime/verifier.js';
import { SelectorValidator } from '../src/runtime/selector-validator.js';
import { MissionMemory } from '../src/memory/mission-memory.js';
import { FakePage, match } from './helpers/fake-page.js';

describe('ActionVerifier', () => {
  const verifier = new ActionVerifier();
  let page: FakePage;

  beforeEach(() => {
    page = new FakePage();
  });

  it('reports a click that stayed on the page as unconfirmed', async () => {
    const { result } = await verifier.verify(page, { type: 'click', selector: '#a' }, 'https://shop.test/', { step: 1 });
    expect(result).toEqual({ success: false, changesDetected: false, notes: ['No navigation after click'] });
  });

  it('notes the new URL after a navigating click', async () => {
    const { result } = await verifier.verify(page, { type: 'click', selector: '#a' }, 'https://shop.test/old', { step: 1 });
    expect(result).toEqual({ success: false, changesDetected: true, notes: ['URL changed to https://shop.test/'] });
  });

  it('only confirms a key press that navigated', async () => {
    const action = { type: 'press', selector: '#q', key: 'Enter' } as const;

    expect((await verifier.verify(page, action, 'https://shop.test/', { step: 1 })).result).toEqual({
      success: false,
      changesDetected: false,
      notes: [],
    });
    expect((await verifier.verify(page, action, 'https://shop.test/old', { step: 1 })).result?.success).toBe(true);
  });

  it('compares the field value with the filled text', async () => {
    page.element('#q', { value: 'lap' });
    const fill = { type: 'fill', selector: '#q', text: 'laptop' } as const;

    expect((await verifier.verify(page, fill, page.url(), { step: 1 })).result?.notes).toEqual([
      "Expected 'laptop' but field contains 'lap'",
    ]);
    expect((await verifier.verify(page, fill, page.url(), { step: 1, maskValues: true })).result?.notes).toEqual([
      'Field value does not contain the provided input',
    ]);

    page.element('#q', { value: 'laptop deals' });
    expect((await verifier.verify(page, fill, page.url(), { step: 1 })).result).toEqual({
      success: true,
      changesDetected: true,
      notes: ['Field value verified'],
    });
  });

  it('records an unreadable field as a failed verification', async () => {
    const { result } = await verifier.verify(
      page,
      { type: 'fill', selector: '#gone', text: 'x' },
      page.url(),
      { step: 1, timeoutMs: 25 },
    );
    expect(result).toEqual({
      success: false,
      changesDetected: false,
      notes: ['Could not read field value: Timeout 25ms exceeded.'],
    });
  });

  it('takes an audit screenshot named after the step and action', async () => {
    const outcome = await verifier.verify(page, { type: 'scroll', direction: 'down' }, page.url(), {
      step: 3,
      screenshotDir: '/tmp/shots',
    });

    expect(outcome).toEqual({
      result: { success: true, changesDetected: true, notes: [] },
      screenshotPath: join('/tmp/shots', '03_verify_scroll.png'),
    });
    expect(page.screenshots).toEqual([join('/tmp/shots', '03_verify_scroll.png')]);
  });

  it('still verifies when the screenshot fails', async () => {
    page.screenshotError = new Error('disk full');

    const outcome = await verifier.verify(page, { type: 'scroll', direction: 'down' }, page.url(), {
      step: 3,
      screenshotDir: '/tmp/shots',
    });

    expect(outcome).toEqual({ result: { success: true, changesDetected: true, notes: [] } });
  });

  it('does not verify other action types', async () => {
    const { result } = await verifier.verify(page, { type: 'finish', reason: 'done' }, page.url(), { step: 1 });
    expect(result).toBeNull();
  });

  it('pads step numbers to two digits', () => {
    expect(padStep(7)).toBe('07');
    expect(padStep(112)).toBe('112');
  });
});

describe('login heuristics', () => {
  it('detects error text or an auth URL', () => {
    expect(detectLoginFailure('Welcome back', 'https://shop.test/account')).toBe(false);
    expect(detectLoginFailure('Wrong password. Try again.', 'https://shop.test/account')).toBe(true);
    expect(detectLoginFailure('', 'https://shop.test/login?e=1')).toBe(true);
  });

  it('only treats clicks and presses on login-looking targets as attempts', () => {
    expect(isLoginAttempt({ type: 'click', selector: '#sign-in' }, 'click|selector=#sign-in')).toBe(true);
    expect(isLoginAttempt({ type: 'click', selector: '#cart' }, 'click|selector=#cart')).toBe(false);
    expect(isLoginAttempt({ type: 'fill', selector: '#login', text: 'x' }, 'fill|selector=#login|text=x')).toBe(false);
  });
});

describe('SelectorValidator', () => {
  let page: FakePage;
  let memory: MissionMemory;

  beforeEach(() => {
    page = new FakePage();
    memory = new MissionMemory({ jobId: 'job-val', objective: 'buy', maxSteps: 10, targetResultCount: 1 });
  });

  it('keeps visible, enabled selectors and records every probe', async () => {
    page.element('#hidden', { visible: false }).element('#ok').element('#disabled', { enabled: false });
    const elements = [match(['#hidden', '#ok', '#missing', '#disabled'])];

    const validation = await new SelectorValidator().validate(page, elements, 'Buy', memory);

    expect(validation.workingSelectors).toEqual(['#ok']);
    expect(validation.failedSelectors).toEqual(['#hidden', '#missing', '#disabled']);
    expect(validation.bestSelector).toBe('#ok');
    expect(memory.selectorAttempts.get('Buy')?.size).toBe(4);
    expect(memory.interactions).toEqual([
      { step: 1, searchText: 'Buy', totalElements: 1, tested: 4, working: 1, failed: 3, bestSelector: '#ok' },
    ]);
  });

  it('skips selectors already tried for the same text', async () => {
    page.element('#ok');
    const validator = new SelectorValidator();
    await validator.validate(page, [match(['#ok'])], 'Buy', memory);

    const again = await validator.validate(page, [match(['#ok'])], 'Buy', memory);

    expect(again).toEqual({ workingSelectors: [], failedSelectors: [], bestSelector: null, bestElement: null });
  });

  it('probes visible interactive elements first', async () => {
    page.element('#plain').element('#button');
    const plain = match(['#plain'], { isVisible: false, isInteractive: false });
    const button = match(['#button']);

    const validation = await new SelectorValidator().validate(page, [plain, button], 'Buy', memory);

    expect(validation.workingSelectors).toEqual(['#button', '#plain']);
    expect(validation.bestElement).toBe(button);
  });

  it('stops after the probe budget', async () => {
    const validation = await new SelectorValidator({ maxProbes: 2 }).validate(
      page,
      [match(['#a', '#b', '#c'])],
      'Buy',
      memory,
    );
    expect(validation.failedSelectors).toEqual(['#a', '#b']);
  });
});
