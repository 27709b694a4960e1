import { describe, it, expect, beforeEach } from 'vitest';
import { ActionExecutor, buildProtocolList, implausibleExtractText, resolveFillText, type ExecutorSettings } from '../src/runtime/executor.js';
import { MissionMemory } from '../src/memory/mission-memory.js';
import { UserInputGate } from '../src/runtime/user-input-gate.js';
import { DetectOnlyCaptchaSolver, type CaptchaSolver } from '../src/engine/captcha.js';
import { InfrastructureError } from '../src/runtime/errors.js';
import { silentLogger } from '../src/logger.js';
import type { StatusSink } from '../src/runtime/status.js';
import type { Action, CaptchaOutcome } from '../src/types.js';
import { FakePage, match } from './helpers/fake-page.js';

const settings: ExecutorSettings = {
  actionTimeoutMs: 50,
  fillTimeoutMs: 50,
  userInputTimeoutMs: 20,
  captchaTimeoutMs: 30,
  settleMs: 0,
  scrollSettleMs: 0,
};

function newMemory(): MissionMemory {
  return new MissionMemory({
    jobId: 'job-1',
    objective: 'find laptop deals',
    maxSteps: 20,
    targetResultCount: 3,
    url: 'https://shop.test/',
  });
}

function recordingSink(): StatusSink & { events: string[] } {
  const events: string[] = [];
  return { events, push: (_jobId, event) => void events.push(event) };
}

function lastHistory(memory: MissionMemory): string | undefined {
  return memory.history[memory.history.length - 1];
}

describe('ActionExecutor', () => {
  let page: FakePage;
  let memory: MissionMemory;
  let gate: UserInputGate;
  let sink: ReturnType<typeof recordingSink>;
  let executor: ActionExecutor;

  beforeEach(() => {
    page = new FakePage();
    memory = newMemory();
    gate = new UserInputGate(null, silentLogger());
    sink = recordingSink();
    executor = new ActionExecutor({ settings, gate, captcha: new DetectOnlyCaptchaSolver(), status: sink });
  });

  describe('banned actions', () => {
    const submit: Action = { type: 'click', selector: '#submit' };

    it('bans a failing click and blocks the next identical proposal without touching the page', async () => {
      const first = await executor.execute(submit, memory, page);
      expect(first).toEqual({ kind: 'failed', signature: 'click|selector=#submit', error: 'Timeout 50ms exceeded.' });
      expect(memory.failureCount('click|selector=#submit')).toBe(1);
      expect(memory.history[0]).toBe("Step 1: FAILED `click|selector=#submit` error='Timeout 50ms exceeded.'");

      page.calls.length = 0;
      const second = await executor.execute(submit, memory, page);

      expect(second).toEqual({ kind: 'blocked', signature: 'click|selector=#submit', failureCount: 1 });
      expect(page.calls).toEqual([]);
      expect(memory.step).toBe(3);
      expect(lastHistory(memory)).toBe(
        'Step 2: BLOCKED DUPLICATE ACTION `click|selector=#submit` (failed 1x before). ' +
          'Try: scroll action to explore the page | Try: extract_selector with different text',
      );
      expect(sink.events).toEqual(['action_failed', 'action_blocked']);
    });

    it('reports the accumulated failure count when blocking', async () => {
      memory.banAction('click|selector=#submit');
      memory.banAction('click|selector=#submit');

      const outcome = await executor.execute(submit, memory, page);

      expect(outcome).toEqual({ kind: 'blocked', signature: 'click|selector=#submit', failureCount: 2 });
      expect(lastHistory(memory)).toContain('(failed 2x before)');
      expect(page.calls).toEqual([]);
    });

    it('suggests fill-specific alternatives for a banned fill', async () => {
      memory.banAction('fill|selector=#q|text=laptop');

      await executor.execute({ type: 'fill', selector: '#q', text: 'laptop' }, memory, page);

      expect(lastHistory(memory)).toBe(
        'Step 1: BLOCKED DUPLICATE ACTION `fill|selector=#q|text=laptop` (failed 1x before). ' +
          'Try: click on the element first, then fill | Try: extract_selector to find a different selector',
      );
    });
  });

  describe('selector testing protocol', () => {
    const selectors = ['#s0', '#s1', '#s2', '#s3'];

    beforeEach(async () => {
      for (const selector of selectors) page.element(selector);
      page.searchResults.set('Search', [match(selectors)]);
      await executor.execute({ type: 'extract_selector', text: 'Search' }, memory, page);
    });

    it('installs every candidate as an ordered test list', () => {
      expect(memory.elementContext).toEqual({
        text: 'Search',
        untestedSelectors: selectors,
        currentTestIndex: 0,
        testingRequired: true,
        workingSelectors: selectors,
      });
      expect(memory.searchFlow.detected).toBe(true);
      expect(lastHistory(memory)).toBe(
        'Step 1: Executed `extract_selector|text=Search` successfully | ' +
          "Found 1 element(s) for 'Search' with 4 working selector(s); " +
          '4 selector(s) must now be tested in order, starting with "#s0"',
      );
    });

    it('rejects an out-of-order selector and names the one expected', async () => {
      await executor.execute({ type: 'click', selector: '#s0' }, memory, page);
      page.calls.length = 0;

      const outcome = await executor.execute({ type: 'click', selector: '#s3' }, memory, page);

      expect(outcome.kind).toBe('protocol_violation');
      if (outcome.kind !== 'protocol_violation') return;
      expect(outcome.expectedSelector).toBe('#s1');
      expect(outcome.remaining).toBe(3);
      expect(outcome.message).toBe(
        "Selector testing for 'Search' is not finished: the next action must be a click, fill or press " +
          'on "#s1" (index 1, 3 selector(s) still untested). Rejected `click|selector=#s3`.',
      );
      expect(page.calls).toEqual([]);
      expect(memory.isBanned('click|selector=#s3')).toBe(false);
      expect(memory.step).toBe(4);
      expect(lastHistory(memory)).toBe(`Step 3: PROTOCOL VIOLATION: ${outcome.message}`);
    });

    it('rejects non-interaction actions while testing is pending', async () => {
      const outcome = await executor.execute({ type: 'scroll', direction: 'down' }, memory, page);
      expect(outcome.kind).toBe('protocol_violation');
      expect(memory.elementContext?.currentTestIndex).toBe(0);
    });

    it('releases the protocol once every selector has been tried in order', async () => {
      for (const selector of selectors) {
        const outcome = await executor.execute({ type: 'click', selector }, memory, page);
        expect(outcome.kind).toBe('executed');
      }

      expect(memory.testingInProgress).toBe(false);
      expect(memory.elementContext?.testingRequired).toBe(false);

      const scroll = await executor.execute({ type: 'scroll', direction: 'down' }, memory, page);
      expect(scroll.kind).toBe('executed');
      expect(memory.step).toBe(7);
    });

    it('counts a failing expected selector as tested', async () => {
      page.element('#s0', { error: new Error('Element is not attached to the DOM') });

      const outcome = await executor.execute({ type: 'click', selector: '#s0' }, memory, page);

      expect(outcome).toEqual({
        kind: 'failed',
        signature: 'click|selector=#s0',
        error: 'Element is not attached to the DOM',
      });
      expect(memory.elementContext?.currentTestIndex).toBe(1);
    });
  });

  describe('user input', () => {
    const askPassword: Action = { type: 'request_user_input', inputType: 'password', prompt: 'Account password', sensitive: true };

    it('records a timeout as a failure and clears the gate', async () => {
      const outcome = await executor.execute(askPassword, memory, page);

      expect(outcome).toEqual({
        kind: 'failed',
        signature: 'request_user_input',
        error: 'No user input received for job job-1 within 0s',
      });
      expect(memory.userInput).toEqual({ pending: false, request: null, response: null, flowActive: false });
      expect(gate.isWaiting('job-1')).toBe(false);
      expect(gate.getRequest('job-1')).toBeNull();
      expect(memory.step).toBe(2);
      expect(sink.events).toEqual(['user_input_required', 'action_failed']);
    });

    it('fills a placeholder with the submitted value exactly once', async () => {
      page.element('#password');

      const pending = executor.execute(askPassword, memory, page);
      expect(gate.submit('job-1', 'test-secret')).toBe('accepted');
      const asked = await pending;

      expect(asked.kind).toBe('executed');
      expect(memory.userInput.response).toBe('test-secret');
      expect(lastHistory(memory)).toBe(
        'Step 1: Executed `request_user_input` successfully | Received password input (hidden); fill with {{USER_INPUT}}',
      );

      const filled = await executor.execute({ type: 'fill', selector: '#password', text: '{{PASSWORD}}' }, memory, page);

      expect(filled).toEqual({
        kind: 'executed',
        signature: 'fill|selector=#password|text={{PASSWORD}}',
        verification: { success: true, changesDetected: true, notes: ['Field value verified'] },
      });
      expect(page.elements.get('#password')?.value).toBe('test-secret');
      expect(memory.userInput.response).toBeNull();
      expect(memory.history.some((entry) => entry.includes('test-secret'))).toBe(false);
    });

    it('fails a placeholder fill when no input has been provided', async () => {
      page.element('#email');

      const outcome = await executor.execute({ type: 'fill', selector: '#email', text: '{{EMAIL}}' }, memory, page);

      expect(outcome).toEqual({
        kind: 'failed',
        signature: 'fill|selector=#email|text={{EMAIL}}',
        error: '{{EMAIL}} used but no user input is available; request it first',
      });
      expect(page.calls).not.toContain('fill:#email');
    });
  });

  describe('scrolling', () => {
    it('uses a smooth scroll when it moves the page', async () => {
      await executor.execute({ type: 'scroll', direction: 'down' }, memory, page);

      expect(page.scrollY).toBe(640);
      expect(lastHistory(memory)).toBe(
        'Step 1: Executed `scroll` successfully | Scrolled down (smooth), position moved 640px | Verification: success, changes detected',
      );
    });

    it('falls back to the keyboard when the smooth scroll does nothing', async () => {
      page.scrollBehavior = 'keyboard';

      await executor.execute({ type: 'scroll', direction: 'down' }, memory, page);

      expect(page.keys).toEqual(['PageDown']);
      expect(lastHistory(memory)).toContain('Scrolled down (keyboard), position moved 800px');
    });

    it('forces scrollTop when neither smooth scrolling nor keys work', async () => {
      page.scrollBehavior = 'scrollTop';

      await executor.execute({ type: 'scroll', direction: 'down' }, memory, page);

      expect(page.scrollY).toBe(800);
      expect(lastHistory(memory)).toContain('Scrolled down (scrollTop), position moved 800px');
    });

    it('scrolls up by a negative distance', async () => {
      page.scrollY = 1000;

      await executor.execute({ type: 'scroll', direction: 'up' }, memory, page);

      expect(page.scrollY).toBe(360);
      expect(lastHistory(memory)).toContain('Scrolled up (smooth), position moved -640px');
    });
  });

  describe('extraction', () => {
    it('resolves relative result URLs against the current page', async () => {
      page.currentUrl = 'https://shop.test/laptops/';

      await executor.execute(
        {
          type: 'extract',
          items: [
            { title: 'Laptop A', url: '/item/1' },
            { title: 'Laptop B', url: 'https://other.test/x' },
            { title: 'Laptop C' },
          ],
        },
        memory,
        page,
      );

      expect(memory.results).toEqual([
        { title: 'Laptop A', url: 'https://shop.test/item/1' },
        { title: 'Laptop B', url: 'https://other.test/x' },
        { title: 'Laptop C' },
      ]);
      expect(lastHistory(memory)).toBe('Step 1: Executed `extract` successfully | Extracted 3 item(s), 3 total');
      expect(sink.events).toEqual(['results_extracted', 'action_executed']);
    });

    it('fails selector extraction when nothing on the page mentions the text', async () => {
      const outcome = await executor.execute({ type: 'extract_selector', text: 'Checkout' }, memory, page);

      expect(outcome).toEqual({
        kind: 'failed',
        signature: 'extract_selector|text=Checkout',
        error: "No elements found containing 'Checkout'",
      });
      expect(memory.recentExtracts).toEqual(['Checkout']);
    });

    it('rejects code-like extraction text before searching', async () => {
      const outcome = await executor.execute({ type: 'extract_selector', text: '<button>' }, memory, page);

      expect(outcome.kind).toBe('failed');
      if (outcome.kind !== 'failed') return;
      expect(outcome.error).toBe("extract_selector text looks like code ('<'); use the element's visible text");
      expect(memory.recentExtracts).toEqual([]);
    });
  });

  describe('popups and captchas', () => {
    it('dismisses a popup by its visible text', async () => {
      page.dismissible.add('Accept');

      const outcome = await executor.execute({ type: 'dismiss_popup', text: 'Accept' }, memory, page);

      expect(outcome.kind).toBe('executed');
      expect(lastHistory(memory)).toBe("Step 1: Executed `dismiss_popup|text=Accept` successfully | Dismissed popup using 'Accept'");
    });

    it('falls back to a generic close control', async () => {
      page.element('button.close');

      await executor.execute({ type: 'dismiss_popup', text: 'Later' }, memory, page);

      expect(page.calls).toContain('click:button.close');
      expect(lastHistory(memory)).toContain('Dismissed popup using close control button.close');
    });

    it('fails when no popup control exists', async () => {
      const outcome = await executor.execute({ type: 'dismiss_popup', text: 'Later' }, memory, page);
      expect(outcome).toEqual({
        kind: 'failed',
        signature: 'dismiss_popup|text=Later',
        error: "No popup control found for 'Later'",
      });
    });

    it('records a clean page as a captcha attempt that found nothing', async () => {
      const outcome = await executor.execute({ type: 'solve_captcha' }, memory, page);

      expect(outcome.kind).toBe('executed');
      expect(memory.captchaAttempts).toEqual([
        { found: false, type: null, confidence: 0, solved: false, service: null, error: null },
      ]);
      expect(lastHistory(memory)).toBe('Step 1: Executed `solve_captcha` successfully | No CAPTCHA detected');
    });

    it('bounds a solver that never answers', async () => {
      const hanging: CaptchaSolver = {
        detect: async () => ({ found: true, type: 'recaptcha', confidence: 95 }),
        solveIfPresent: () => new Promise<CaptchaOutcome>(() => undefined),
      };
      const bounded = new ActionExecutor({ settings, gate, captcha: hanging });

      const outcome = await bounded.execute({ type: 'solve_captcha' }, memory, page);

      expect(outcome.kind).toBe('executed');
      expect(memory.captchaAttempts[0]?.error).toBe('solver timed out after 0s');
      expect(lastHistory(memory)).toContain('CAPTCHA unknown not solved: solver timed out after 0s');
    });
  });

  describe('login checks and infrastructure', () => {
    it('flags a login click that lands on an error message', async () => {
      page.element('#login-btn');
      page.pageText = 'Invalid credentials, please try again';

      await executor.execute({ type: 'click', selector: '#login-btn' }, memory, page);

      expect(lastHistory(memory)).toBe(
        'Step 1: LOGIN FAILURE DETECTED after `click|selector=#login-btn`: the page reports a sign-in error. ' +
          'Request fresh credentials or try another approach.',
      );
      expect(sink.events).toEqual(['action_executed', 'login_failure_detected']);
    });

    it('escalates a closed browser and still advances the step', async () => {
      page.element('#buy', { error: new Error('Target page, context or browser has been closed') });

      await expect(executor.execute({ type: 'click', selector: '#buy' }, memory, page)).rejects.toBeInstanceOf(
        InfrastructureError,
      );
      expect(memory.step).toBe(2);
      expect(memory.isBanned('click|selector=#buy')).toBe(false);
    });

    it('records the finish reason without touching the page', async () => {
      const outcome = await executor.execute({ type: 'finish', reason: 'done browsing' }, memory, page);

      expect(outcome).toEqual({ kind: 'executed', signature: 'finish', verification: null });
      expect(page.calls).toEqual([]);
      expect(lastHistory(memory)).toBe('Step 1: Executed `finish` successfully | Finish requested: done browsing');
    });
  });
});

describe('resolveFillText', () => {
  it('substitutes the submitted value for an echoed plain value during a password flow', () => {
    const memory = newMemory();
    memory.openUserInput({ inputType: 'password', prompt: 'Password', sensitive: true });
    memory.receiveUserInput('test-secret');

    expect(resolveFillText({ type: 'fill', selector: 'input[type=password]', text: 'hunter' }, memory)).toEqual({
      text: 'test-secret',
      usedInput: true,
    });
    expect(resolveFillText({ type: 'fill', selector: '#search', text: 'laptop' }, memory)).toEqual({
      text: 'laptop',
      usedInput: false,
    });
  });
});

describe('implausibleExtractText', () => {
  it('rejects text searched in the last three extractions', () => {
    const memory = newMemory();
    for (const text of ['Search', 'Menu', 'Deals', 'Cart']) memory.recordExtract(text);

    expect(implausibleExtractText('deals', memory)).toBe(
      "'deals' was already searched recently; test the found selectors or try different text",
    );
    expect(implausibleExtractText('Search', memory)).toBeNull();
    expect(implausibleExtractText('', memory)).toBe('extract_selector needs non-empty text');
    expect(implausibleExtractText('x'.repeat(101), memory)).toBe(
      'extract_selector text is too long (101 characters); use a short visible label',
    );
  });

  it('accepts visible labels that mention css or selectors', () => {
    const memory = newMemory();
    expect(implausibleExtractText('Selector switch', memory)).toBeNull();
    expect(implausibleExtractText('CSS Developer', memory)).toBeNull();
    expect(implausibleExtractText('Node.js jobs', memory)).toBeNull();
  });

  it('rejects selector and markup syntax', () => {
    const memory = newMemory();
    const codeLike = (token: string) => `extract_selector text looks like code ('${token}'); use the element's visible text`;

    expect(implausibleExtractText('#submit', memory)).toBe(codeLike('#submit'));
    expect(implausibleExtractText('button.primary.large', memory)).toBe(codeLike('.primary.'));
    expect(implausibleExtractText('class="btn"', memory)).toBe(codeLike('class='));
    expect(implausibleExtractText('css: .btn', memory)).toBe(codeLike('css:'));
    expect(implausibleExtractText('//div[@id]', memory)).toBe(codeLike('//'));
  });
});

describe('buildProtocolList', () => {
  it('puts working selectors first, removes duplicates and skips banned clicks', () => {
    const memory = newMemory();
    memory.banAction('click|selector=#old');

    const list = buildProtocolList(
      [match(['#a', '#b', '#old']), match(['#b', '#c'])],
      { workingSelectors: ['#c'], failedSelectors: ['#a'], bestSelector: '#c', bestElement: null },
      memory,
    );

    expect(list).toEqual(['#c', '#a', '#b']);
  });
});
