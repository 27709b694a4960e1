import type { MissionMemory } from '../memory/mission-memory.js';
import type { Logger } from '../logger.js';
import type { SupervisorDecision } from '../types.js';

// ─────────────────────────────────────────────────────────────────────────────
// MissionSupervisor: the only place a mission ends normally
//
// Rules, first match wins:
//   1. finish + technical-failure reason   → continue (override)
//   2. finish + results                    → stop
//   3. finish + success language           → stop
//   4. finish before the step ceiling      → continue (override)
//   5. enough results                      → stop
//   6. past the step ceiling               → stop (exhausted)
//   7. otherwise                           → continue
// ─────────────────────────────────────────────────────────────────────────────

const TECHNICAL_FAILURE_TERMS = ['parsing failed', 'json', 'error:', 'failed to parse'];

const SUCCESS_LANGUAGE = /\b(success\w*|completed?|accomplished|achieved|done)\b/i;

// A completion word inside a negated or giving-up sentence is not a completion
const NEGATED_LANGUAGE = /\b(not|never|unable|cannot|failed|fails?|giving up|give up|gave up)\b|n't\b/i;

export function reportsCompletion(reason: string): boolean {
  return SUCCESS_LANGUAGE.test(reason) && !NEGATED_LANGUAGE.test(reason);
}

export class MissionSupervisor {
  constructor(private readonly logger?: Logger) {}

  decide(memory: MissionMemory): SupervisorDecision {
    const last = memory.lastAction;

    if (last?.type === 'finish') {
      const reason = last.reason.toLowerCase();

      if (TECHNICAL_FAILURE_TERMS.some((term) => reason.includes(term))) {
        return this.override(memory, `finish refused: '${last.reason}' reports a technical problem, not the objective`);
      }
      if (memory.results.length > 0) return { kind: 'stop', reason: 'finished_with_results' };
      if (reportsCompletion(last.reason)) return { kind: 'stop', reason: 'objective_met' };
      if (memory.step < memory.maxSteps) {
        return this.override(memory, 'finish refused: no results yet and steps remain, keep exploring');
      }
    }

    if (memory.results.length >= memory.targetResultCount) return { kind: 'stop', reason: 'target_reached' };
    if (memory.step > memory.maxSteps) return { kind: 'stop', reason: 'max_steps_exhausted' };
    return { kind: 'continue' };
  }

  private override(memory: MissionMemory, message: string): SupervisorDecision {
    memory.recordHistory(`SUPERVISOR OVERRIDE: ${message}`);
    this.logger?.info({ jobId: memory.jobId, step: memory.step }, message);
    return { kind: 'continue', override: message };
  }
}
