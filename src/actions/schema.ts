import { z } from 'zod';
import type { Action, ProposedAction } from '../types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Action wire format: the JSON the reasoner emits, validated into Action
// ─────────────────────────────────────────────────────────────────────────────

/** Older tool names the reasoner may still use */
const TYPE_ALIASES: Record<string, Action['type']> = {
  extract_correct_selector_using_text: 'extract_selector',
  dismiss_popup_using_text: 'dismiss_popup',
  user_input: 'request_user_input',
};

const selector = z.string().trim().min(1);

const wireActionSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('click'), selector }),
  z.object({ type: z.literal('fill'), selector, text: z.string() }),
  z.object({ type: z.literal('press'), selector, key: z.string().min(1) }),
  z.object({
    type: z.literal('scroll'),
    direction: z.enum(['up', 'down']).default('down'),
    distance: z.coerce.number().positive().optional(),
  }),
  z.object({ type: z.literal('extract'), items: z.array(z.record(z.unknown())).default([]) }),
  z.object({ type: z.literal('finish'), reason: z.string().default('') }),
  z.object({ type: z.literal('dismiss_popup'), text: z.string().default('') }),
  z.object({
    type: z.literal('request_user_input'),
    input_type: z.enum(['text', 'password', 'email', 'phone', 'otp']).default('text'),
    prompt: z.string().default('Please provide the requested information'),
    is_sensitive: z.boolean().default(false),
  }),
  z.object({ type: z.literal('solve_captcha') }),
  z.object({ type: z.literal('extract_selector'), text: z.string().default('') }),
]);

type WireAction = z.infer<typeof wireActionSchema>;

function fromWire(wire: WireAction): Action {
  switch (wire.type) {
    case 'request_user_input':
      return {
        type: 'request_user_input',
        inputType: wire.input_type,
        prompt: wire.prompt,
        sensitive: wire.is_sensitive,
      };
    case 'scroll':
      return wire.distance === undefined
        ? { type: 'scroll', direction: wire.direction }
        : { type: 'scroll', direction: wire.direction, distance: wire.distance };
    default:
      return wire;
  }
}

function normalizeType(raw: unknown): unknown {
  if (typeof raw !== 'object' || raw === null || !('type' in raw)) return raw;
  const type = raw.type;
  if (typeof type !== 'string') return raw;
  const normalized = type.trim().toLowerCase();
  return { ...raw, type: TYPE_ALIASES[normalized] ?? normalized };
}

/** Validate one action object; anything malformed yields null */
export function parseAction(raw: unknown): Action | null {
  const parsed = wireActionSchema.safeParse(normalizeType(raw));
  return parsed.success ? fromWire(parsed.data) : null;
}

const proposalSchema = z.object({
  thought: z.string().default(''),
  action: z.unknown(),
});

export function parseProposal(raw: unknown): ProposedAction | null {
  const parsed = proposalSchema.safeParse(raw);
  if (!parsed.success) return null;
  const action = parseAction(parsed.data.action);
  return action ? { thought: parsed.data.thought, action } : null;
}

/** Pull the JSON object out of a model reply that may wrap it in prose or a code fence */
export function extractJsonObject(text: string): string {
  const fenced = text.match(/```(?:json)?\s*([\s\S]*?)\s*```/);
  if (fenced?.[1]) return fenced[1];
  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  if (start >= 0 && end > start) return text.slice(start, end + 1);
  return text;
}

/** Serialize an action back into the reasoner's wire vocabulary */
export function toWire(action: Action): Record<string, unknown> {
  if (action.type === 'request_user_input') {
    return {
      type: action.type,
      input_type: action.inputType,
      prompt: action.prompt,
      is_sensitive: action.sensitive,
    };
  }
  return { ...action };
}
