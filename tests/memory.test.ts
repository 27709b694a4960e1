import { describe, it, expect, beforeEach } from 'vitest';
import { MissionMemory } from '../src/memory/mission-memory.js';
import { buildContextSummary, buildHistoryText } from '../src/memory/context.js';
import type { CaptchaOutcome } from '../src/types.js';

function newMemory(): MissionMemory {
  return new MissionMemory({ jobId: 'job-mem', objective: 'find laptop deals', maxSteps: 20, targetResultCount: 3 });
}

describe('MissionMemory', () => {
  let memory: MissionMemory;

  beforeEach(() => {
    memory = newMemory();
  });

  it('tags history with the current step', () => {
    memory.recordHistory('first');
    memory.advanceStep();
    memory.recordHistory('second');

    expect(memory.step).toBe(2);
    expect(memory.history).toEqual(['Step 1: first', 'Step 2: second']);
  });

  it('counts failures and bans on the first one', () => {
    expect(memory.isBanned('click|selector=#a')).toBe(false);
    expect(memory.banAction('click|selector=#a')).toBe(1);
    expect(memory.banAction('click|selector=#a')).toBe(2);

    expect(memory.isBanned('click|selector=#a')).toBe(true);
    expect(memory.failureCount('click|selector=#a')).toBe(2);
    expect(memory.bannedSignatures).toEqual(['click|selector=#a']);
  });

  it('keeps only the five most recent extraction texts', () => {
    for (const text of ['a', 'b', 'c', 'd', 'e', 'f', 'g']) memory.recordExtract(text);
    expect(memory.recentExtracts).toEqual(['c', 'd', 'e', 'f', 'g']);
  });

  it('keeps an unfinished selector test across a reasoning pass', () => {
    const selectors = ['#a', '#b'];
    memory.setElementContext({
      text: 'Search',
      untestedSelectors: selectors,
      currentTestIndex: 0,
      testingRequired: true,
      workingSelectors: [],
    });
    selectors.push('#c');

    expect(memory.elementContext?.untestedSelectors).toEqual(['#a', '#b']);
    expect(memory.testingInProgress).toBe(true);

    memory.consumeElementContext();
    expect(memory.elementContext).not.toBeNull();

    memory.advanceElementContext();
    memory.advanceElementContext();
    expect(memory.elementContext?.testingRequired).toBe(false);
    expect(memory.testingInProgress).toBe(false);

    memory.consumeElementContext();
    expect(memory.elementContext).toBeNull();
  });

  it('hands out copies of the element context', () => {
    memory.setElementContext({
      text: 'Search',
      untestedSelectors: ['#a', '#b'],
      currentTestIndex: 0,
      testingRequired: true,
      workingSelectors: ['#a'],
    });

    const copy = memory.elementContext;
    copy?.untestedSelectors.splice(0);
    copy?.workingSelectors.push('#z');
    if (copy) copy.currentTestIndex = 5;

    expect(memory.elementContext).toEqual({
      text: 'Search',
      untestedSelectors: ['#a', '#b'],
      currentTestIndex: 0,
      testingRequired: true,
      workingSelectors: ['#a'],
    });
    expect(memory.testingInProgress).toBe(true);
  });

  it('hands out user input exactly once', () => {
    memory.openUserInput({ inputType: 'otp', prompt: 'Code from SMS', sensitive: true });
    expect(memory.userInput).toEqual({
      pending: true,
      request: { inputType: 'otp', prompt: 'Code from SMS', sensitive: true },
      response: null,
      flowActive: true,
    });

    memory.receiveUserInput('123456');
    expect(memory.userInput.pending).toBe(false);
    expect(memory.userInput.flowActive).toBe(true);

    expect(memory.consumeUserInput()).toBe('123456');
    expect(memory.consumeUserInput()).toBeNull();
    expect(memory.userInput.flowActive).toBe(false);
  });

  it('caps captcha attempts and remembers the solving service', () => {
    const failed: CaptchaOutcome = { found: true, solved: false, type: 'recaptcha', confidence: 90, service: null, error: 'x' };
    for (let i = 0; i < 25; i++) memory.recordCaptchaAttempt(failed);
    memory.recordCaptchaAttempt({ ...failed, solved: true, service: 'solver-a', error: null });

    expect(memory.captchaAttempts).toHaveLength(20);
    expect(memory.captchaSolvedBy).toBe('solver-a');
    expect(memory.captchaDetected).toEqual({ found: true, type: 'recaptcha', confidence: 90 });
  });

  it('sums token usage across steps', () => {
    memory.recordTokenUsage({ step: 1, kind: 'reasoning', inputTokens: 100, outputTokens: 20 });
    memory.recordTokenUsage({ step: 2, kind: 'emergency', inputTokens: 0, outputTokens: 0 });
    memory.recordTokenUsage({ step: 3, kind: 'corrective', inputTokens: 50, outputTokens: 10 });

    expect(memory.totalTokenUsage()).toEqual({ inputTokens: 150, outputTokens: 30 });
  });
});

describe('buildContextSummary', () => {
  let memory: MissionMemory;

  beforeEach(() => {
    memory = newMemory();
  });

  it('is empty for a fresh mission', () => {
    expect(buildContextSummary(memory)).toBe('');
  });

  it('spells out the next required selector while testing', () => {
    memory.setElementContext({
      text: 'Search',
      untestedSelectors: ['#a', '#b'],
      currentTestIndex: 0,
      testingRequired: true,
      workingSelectors: ['#a'],
    });

    expect(buildContextSummary(memory)).toBe(
      [
        "SELECTOR TESTING IN PROGRESS for 'Search' (2 of 2 left)",
        '  NEXT REQUIRED ACTION: {"type": "click", "selector": "#a"}',
        '  Only click/fill/press on this exact selector is accepted until testing completes.',
      ].join('\n'),
    );
  });

  it('summarizes failures by action type', () => {
    memory.banAction('click|selector=#a');
    memory.banAction('click|selector=#a');
    memory.banAction('fill|selector=#b|text=x');

    expect(buildContextSummary(memory)).toBe(
      ['FAILURE ANALYSIS (3 total failures):', '  Click failures: 1', '  Fill failures: 1'].join('\n'),
    );
  });

  it('tracks search flow progress and the next phase', () => {
    memory.setSearchFlowFlag('detected');
    memory.setSearchFlowFlag('clicked');

    expect(buildContextSummary(memory)).toBe(
      [
        'SEARCH FLOW PROGRESS:',
        '  Detected: Complete',
        '  Clicked: Complete',
        '  Filled: Pending',
        '  Submitted: Pending',
        "  NEXT: Fill the search input with the objective's query",
      ].join('\n'),
    );
  });

  it('points at the placeholder once input has arrived', () => {
    memory.openUserInput({ inputType: 'password', prompt: 'Password', sensitive: true });
    memory.receiveUserInput('test-secret');

    expect(buildContextSummary(memory)).toBe('USER INPUT AVAILABLE (password): fill it using the text {{USER_INPUT}}');
  });

  it('joins the history window with the summary', () => {
    memory.recordHistory('one');
    memory.recordHistory('two');
    memory.recordHistory('three');
    expect(buildHistoryText(memory, 2)).toBe('Step 1: two\nStep 1: three');

    memory.setSearchFlowFlag('detected');
    expect(buildHistoryText(memory, 1)).toBe(
      [
        'Step 1: three',
        '',
        'SEARCH FLOW PROGRESS:',
        '  Detected: Complete',
        '  Clicked: Pending',
        '  Filled: Pending',
        '  Submitted: Pending',
        '  NEXT: Click on the search input field to focus it',
      ].join('\n'),
    );
  });
});
