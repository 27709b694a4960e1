import { describe, it, expect, beforeEach, afterAll, vi } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { AnthropicReasoner, buildUserPrompt, stripHTML } from '../src/semantic/reasoner.js';
import type { ReasoningInput } from '../src/semantic/reasoner.js';
import { ReasoningError } from '../src/runtime/errors.js';

// Mock the Anthropic SDK so tests run without a real API key
const { create } = vi.hoisted(() => ({ create: vi.fn() }));

vi.mock('@anthropic-ai/sdk', () => ({
  default: class MockAnthropic {
    messages = { create };
  },
}));

function reply(text: string) {
  return {
    content: [{ type: 'text', text }],
    usage: { input_tokens: 120, output_tokens: 30 },
  };
}

const input: ReasoningInput = {
  objective: 'find laptop deals',
  url: 'https://shop.test/',
  html: '<p>Deals</p>',
  screenshotPath: null,
  historyText: '',
  bannedSignatures: [],
  step: 1,
  maxSteps: 10,
};

describe('AnthropicReasoner', () => {
  const reasoner = new AnthropicReasoner({ anthropicApiKey: 'test-secret', model: 'test-model', maxTokens: 512 });
  const dirs: string[] = [];

  beforeEach(() => {
    create.mockReset();
  });

  afterAll(async () => {
    await Promise.all(dirs.map((dir) => rm(dir, { recursive: true, force: true })));
  });

  it('parses the proposal and maps token usage', async () => {
    create.mockResolvedValueOnce(
      reply('{"thought": "find the search box", "action": {"type": "extract_correct_selector_using_text", "text": "Search"}}'),
    );

    expect(await reasoner.proposeAction(input)).toEqual({
      thought: 'find the search box',
      action: { type: 'extract_selector', text: 'Search' },
      usage: { inputTokens: 120, outputTokens: 30 },
    });
    expect(create).toHaveBeenCalledWith(expect.objectContaining({ model: 'test-model', max_tokens: 512 }));
  });

  it('accepts a fenced reply', async () => {
    create.mockResolvedValueOnce(reply('Here you go:\n```json\n{"thought": "", "action": {"type": "scroll"}}\n```'));

    const output = await reasoner.proposeAction(input);
    expect(output.action).toEqual({ type: 'scroll', direction: 'down' });
  });

  it('reports unparseable replies as reasoning errors', async () => {
    create.mockResolvedValueOnce(reply('I would click the search button'));

    const failure = reasoner.proposeAction(input);
    await expect(failure).rejects.toBeInstanceOf(ReasoningError);
    await expect(failure).rejects.toThrow(/^JSON parsing failed: /);
  });

  it('rejects proposals with an unknown action', async () => {
    create.mockResolvedValueOnce(reply('{"thought": "x", "action": {"type": "teleport"}}'));
    await expect(reasoner.proposeAction(input)).rejects.toThrow('model returned an invalid action');
  });

  it('wraps request failures', async () => {
    create.mockRejectedValueOnce(new Error('overloaded\nretry later'));
    await expect(reasoner.proposeAction(input)).rejects.toThrow('model request failed: overloaded');
  });

  it('sends the step screenshot when the file exists', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'reasoner-'));
    dirs.push(dir);
    const path = join(dir, '01_step.png');
    await writeFile(path, 'png-bytes');
    create.mockResolvedValue(reply('{"thought": "", "action": {"type": "finish", "reason": "done"}}'));

    await reasoner.proposeAction({ ...input, screenshotPath: path });
    await reasoner.proposeAction({ ...input, screenshotPath: join(dir, 'missing.png') });

    const withImage = create.mock.calls[0]?.[0].messages[0].content;
    expect(withImage[0]).toEqual({
      type: 'image',
      source: { type: 'base64', media_type: 'image/png', data: Buffer.from('png-bytes').toString('base64') },
    });
    expect(withImage).toHaveLength(2);

    const withoutImage = create.mock.calls[1]?.[0].messages[0].content;
    expect(withoutImage).toHaveLength(1);
    expect(withoutImage[0].type).toBe('text');
  });
});

describe('buildUserPrompt', () => {
  it('lays out the sections in order', () => {
    const prompt = buildUserPrompt({ ...input, step: 2, bannedSignatures: ['click|selector=#a'] });

    expect(prompt).toBe(
      [
        'OBJECTIVE: find laptop deals',
        'STEP: 2 of 10',
        'CURRENT URL: https://shop.test/',
        'BANNED ACTIONS (failed before, never propose again):\n  - click|selector=#a',
        'MISSION HISTORY:\n(no actions yet)',
        'PAGE CONTENT (stripped):\nDeals',
      ].join('\n\n'),
    );
  });

  it('says when nothing is banned', () => {
    expect(buildUserPrompt({ ...input, historyText: 'Step 1: Navigated' })).toContain(
      'BANNED ACTIONS: none\n\nMISSION HISTORY:\nStep 1: Navigated',
    );
  });
});

describe('stripHTML', () => {
  it('drops scripts, comments and tags', () => {
    expect(stripHTML('<div><script>x()</script><p>Hello <b>world</b></p><!-- c --></div>')).toBe('Hello world');
  });
});
