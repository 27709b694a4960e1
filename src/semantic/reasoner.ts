import Anthropic from '@anthropic-ai/sdk';
import { readFile } from 'fs/promises';
import type { AgentConfig } from '../config.js';
import type { Logger } from '../logger.js';
import type { ProposedAction, TokenUsage } from '../types.js';
import { extractJsonObject, parseProposal } from '../actions/schema.js';
import { ReasoningError, firstLine } from '../runtime/errors.js';

// ─────────────────────────────────────────────────────────────────────────────
// Reasoner: proposes the next action for the mission
//
// The core only depends on the interface. AnthropicReasoner sends the
// objective, a stripped HTML excerpt, the step screenshot and the mission
// history, and parses one JSON action back.
// ─────────────────────────────────────────────────────────────────────────────

export interface ReasoningInput {
  objective: string;
  url: string;
  html: string;
  screenshotPath: string | null;
  historyText: string;
  bannedSignatures: string[];
  step: number;
  maxSteps: number;
}

export interface ReasoningOutput extends ProposedAction {
  usage: TokenUsage;
}

export interface Reasoner {
  proposeAction(input: ReasoningInput): Promise<ReasoningOutput>;
}

const SYSTEM_PROMPT = `You control a web browser to accomplish an objective. Each turn you see the page and the mission history and choose ONE action.

Reply with ONLY a JSON object: {"thought": "<short reasoning>", "action": {...}}

Actions:
  {"type": "extract_selector", "text": "<visible text of the element>"}   find selectors for an element
  {"type": "click", "selector": "<selector>"}
  {"type": "fill", "selector": "<selector>", "text": "<value>"}
  {"type": "press", "selector": "<selector>", "key": "Enter"}
  {"type": "scroll", "direction": "down" | "up"}
  {"type": "extract", "items": [{"title": "...", "url": "...", ...}]}    report results found on the page
  {"type": "dismiss_popup", "text": "<button text>"}
  {"type": "request_user_input", "input_type": "text|password|email|phone|otp", "prompt": "<question>", "is_sensitive": true|false}
  {"type": "solve_captcha"}
  {"type": "finish", "reason": "<why the objective is met>"}

Rules:
- Only use selectors returned by extract_selector. Never invent selectors.
- After extract_selector you must test every returned selector in order before doing anything else.
- Never repeat an action listed as BANNED.
- For credentials or codes, request_user_input first, then fill with the text {{USER_INPUT}}.
- Use short, single-word text for extract_selector (e.g. "Search", "Login").`;

export class AnthropicReasoner implements Reasoner {
  private client: Anthropic;
  private model: string;
  private maxTokens: number;
  private logger?: Logger;

  constructor(config: Pick<AgentConfig, 'anthropicApiKey' | 'model' | 'maxTokens'>, logger?: Logger) {
    this.client = new Anthropic({ apiKey: config.anthropicApiKey });
    this.model = config.model;
    this.maxTokens = config.maxTokens;
    this.logger = logger;
  }

  async proposeAction(input: ReasoningInput): Promise<ReasoningOutput> {
    const content: Array<Anthropic.TextBlockParam | Anthropic.ImageBlockParam> = [];

    const screenshot = await this.loadScreenshot(input.screenshotPath);
    if (screenshot) {
      content.push({
        type: 'image',
        source: { type: 'base64', media_type: 'image/png', data: screenshot },
      });
    }
    content.push({ type: 'text', text: buildUserPrompt(input) });

    let response: Anthropic.Message;
    try {
      response = await this.client.messages.create({
        model: this.model,
        max_tokens: this.maxTokens,
        system: SYSTEM_PROMPT,
        messages: [{ role: 'user', content }],
      });
    } catch (err) {
      throw new ReasoningError(`model request failed: ${firstLine(err)}`, { cause: err });
    }

    const usage: TokenUsage = {
      inputTokens: response.usage.input_tokens,
      outputTokens: response.usage.output_tokens,
    };

    const text = response.content.find((block): block is Anthropic.TextBlock => block.type === 'text')?.text;
    if (!text?.trim()) throw new ReasoningError('model returned no text');

    let raw: unknown;
    try {
      raw = JSON.parse(extractJsonObject(text));
    } catch (err) {
      throw new ReasoningError(`JSON parsing failed: ${firstLine(err)}`, { cause: err });
    }

    const proposal = parseProposal(raw);
    if (!proposal) throw new ReasoningError('model returned an invalid action');

    this.logger?.debug({ step: input.step, action: proposal.action.type, usage }, 'action proposed');
    return { ...proposal, usage };
  }

  private async loadScreenshot(path: string | null): Promise<string | null> {
    if (!path) return null;
    try {
      return (await readFile(path)).toString('base64');
    } catch (err) {
      this.logger?.warn({ path, error: firstLine(err) }, 'could not read step screenshot');
      return null;
    }
  }
}

// ─── Prompt assembly ─────────────────────────────────────────────────────────

export function buildUserPrompt(input: ReasoningInput): string {
  const banned =
    input.bannedSignatures.length > 0
      ? `BANNED ACTIONS (failed before, never propose again):\n${input.bannedSignatures.map((s) => `  - ${s}`).join('\n')}`
      : 'BANNED ACTIONS: none';

  return [
    `OBJECTIVE: ${input.objective}`,
    `STEP: ${input.step} of ${input.maxSteps}`,
    `CURRENT URL: ${input.url}`,
    banned,
    `MISSION HISTORY:\n${input.historyText || '(no actions yet)'}`,
    `PAGE CONTENT (stripped):\n${stripHTML(input.html).slice(0, 8000)}`,
  ].join('\n\n');
}

export function stripHTML(html: string): string {
  return html
    .replace(/<script\b[^<]*(?:(?!<\/script>)<[^<]*)*<\/script>/gi, '')
    .replace(/<style\b[^<]*(?:(?!<\/style>)<[^<]*)*<\/style>/gi, '')
    .replace(/<!--[\s\S]*?-->/g, '')
    .replace(/<[^>]+>/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}
