// ─────────────────────────────────────────────────────────────────────────────
// Error taxonomy
//
// Only InfrastructureError is allowed to end a mission. Everything else is
// caught at the executor boundary and turned into history + a typed outcome.
// ─────────────────────────────────────────────────────────────────────────────

export type MissionErrorKind =
  | 'protocol_violation'
  | 'action_rejected'
  | 'user_input_timeout'
  | 'reasoning'
  | 'infrastructure';

export abstract class MissionError extends Error {
  abstract readonly kind: MissionErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ProtocolViolationError extends MissionError {
  readonly kind = 'protocol_violation';

  constructor(
    message: string,
    readonly expectedSelector: string,
    readonly remaining: number,
  ) {
    super(message);
  }
}

/** The action was refused before touching the page (bad extract text, missing input) */
export class ActionRejectedError extends MissionError {
  readonly kind = 'action_rejected';
}

export class UserInputTimeoutError extends MissionError {
  readonly kind = 'user_input_timeout';

  constructor(readonly jobId: string, readonly timeoutMs: number) {
    super(`No user input received for job ${jobId} within ${Math.round(timeoutMs / 1000)}s`);
  }
}

export class ReasoningError extends MissionError {
  readonly kind = 'reasoning';
}

export class InfrastructureError extends MissionError {
  readonly kind = 'infrastructure';
}

const INFRASTRUCTURE_MARKERS = [
  'target page, context or browser has been closed',
  'browser has been closed',
  'target closed',
  'page crashed',
  'execution context was destroyed',
  'browser has disconnected',
];

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

/** First line of an error message; driver errors carry multi-line call logs */
export function firstLine(err: unknown): string {
  return errorMessage(err).split('\n')[0]?.trim() ?? '';
}

export function isInfrastructureFailure(err: unknown): boolean {
  if (err instanceof InfrastructureError) return true;
  const message = errorMessage(err).toLowerCase();
  return INFRASTRUCTURE_MARKERS.some((marker) => message.includes(marker));
}

/** Re-throw infrastructure failures as InfrastructureError, pass everything else back */
export function escalateInfrastructure(err: unknown): void {
  if (err instanceof InfrastructureError) throw err;
  if (isInfrastructureFailure(err)) {
    throw new InfrastructureError(firstLine(err), { cause: err });
  }
}
