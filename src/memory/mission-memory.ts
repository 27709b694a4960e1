import type {
  Action,
  CaptchaDetection,
  CaptchaOutcome,
  ElementContext,
  ExtractedItem,
  InteractionRecord,
  SearchFlowPhase,
  SearchFlowState,
  StepTokenUsage,
  TokenUsage,
  UserInputRequest,
  UserInputState,
  VerificationRecord,
} from '../types.js';

// ─────────────────────────────────────────────────────────────────────────────
// MissionMemory: everything one mission knows about itself
//
// A state container with explicit mutation methods and no policy. The executor
// decides what to record; the context summary reads it back for the reasoner.
// Owned by exactly one mission task, so nothing here is synchronized.
// ─────────────────────────────────────────────────────────────────────────────

const RECENT_EXTRACTS_LIMIT = 5;
const SUB_LOG_LIMIT = 20;
const HISTORY_LIMIT = 500;

export interface MissionMemoryInit {
  jobId: string;
  objective: string;
  maxSteps: number;
  targetResultCount: number;
  url?: string;
}

function copyElementContext(ctx: ElementContext): ElementContext {
  return { ...ctx, untestedSelectors: [...ctx.untestedSelectors], workingSelectors: [...ctx.workingSelectors] };
}

function pushCapped<T>(list: T[], item: T, limit: number): void {
  list.push(item);
  if (list.length > limit) list.splice(0, list.length - limit);
}

export class MissionMemory {
  readonly jobId: string;
  readonly objective: string;
  readonly maxSteps: number;
  readonly targetResultCount: number;

  private _step = 1;
  private _url: string;
  private _lastAction: Action | null = null;

  private readonly _results: ExtractedItem[] = [];
  private readonly _history: string[] = [];
  private readonly _failedActions = new Map<string, number>();
  private readonly _attemptedSignatures: string[] = [];
  private readonly _recentExtracts: string[] = [];
  private readonly _selectorAttempts = new Map<string, Set<string>>();
  private readonly _successfulSelectors = new Map<string, string>();
  private readonly _verifications: VerificationRecord[] = [];
  private readonly _interactions: InteractionRecord[] = [];
  private readonly _captchaAttempts: CaptchaOutcome[] = [];
  private readonly _tokenUsage: StepTokenUsage[] = [];
  private readonly _screenshots: string[] = [];

  private _elementContext: ElementContext | null = null;
  private _captchaDetected: CaptchaDetection | null = null;
  private _captchaSolvedBy: string | null = null;

  private readonly _searchFlow: SearchFlowState = {
    detected: false,
    clicked: false,
    filled: false,
    submitted: false,
  };

  private _userInput: UserInputState = {
    pending: false,
    request: null,
    response: null,
    flowActive: false,
  };

  constructor(init: MissionMemoryInit) {
    this.jobId = init.jobId;
    this.objective = init.objective;
    this.maxSteps = init.maxSteps;
    this.targetResultCount = init.targetResultCount;
    this._url = init.url ?? '';
  }

  // ─── Step & url ────────────────────────────────────────────────────────────

  get step(): number {
    return this._step;
  }

  advanceStep(): number {
    this._step += 1;
    return this._step;
  }

  get url(): string {
    return this._url;
  }

  setUrl(url: string): void {
    this._url = url;
  }

  get lastAction(): Action | null {
    return this._lastAction;
  }

  setLastAction(action: Action): void {
    this._lastAction = action;
  }

  // ─── History ───────────────────────────────────────────────────────────────

  get history(): readonly string[] {
    return this._history;
  }

  /** Append an entry tagged with the current step */
  recordHistory(message: string): void {
    pushCapped(this._history, `Step ${this._step}: ${message}`, HISTORY_LIMIT);
  }

  // ─── Failures & attempts ───────────────────────────────────────────────────

  get failedActions(): ReadonlyMap<string, number> {
    return this._failedActions;
  }

  isBanned(signature: string): boolean {
    return this._failedActions.has(signature);
  }

  failureCount(signature: string): number {
    return this._failedActions.get(signature) ?? 0;
  }

  /** Increment the failure count; any count bans the signature for the rest of the mission */
  banAction(signature: string): number {
    const count = this.failureCount(signature) + 1;
    this._failedActions.set(signature, count);
    return count;
  }

  get bannedSignatures(): string[] {
    return [...this._failedActions.keys()];
  }

  get attemptedSignatures(): readonly string[] {
    return this._attemptedSignatures;
  }

  recordAttempt(signature: string): void {
    this._attemptedSignatures.push(signature);
  }

  // ─── Selector discovery ────────────────────────────────────────────────────

  get recentExtracts(): readonly string[] {
    return this._recentExtracts;
  }

  recordExtract(text: string): void {
    pushCapped(this._recentExtracts, text, RECENT_EXTRACTS_LIMIT);
  }

  get selectorAttempts(): ReadonlyMap<string, ReadonlySet<string>> {
    return this._selectorAttempts;
  }

  hasTriedSelector(text: string, selector: string): boolean {
    return this._selectorAttempts.get(text)?.has(selector) ?? false;
  }

  recordSelectorAttempt(text: string, selector: string): void {
    let tried = this._selectorAttempts.get(text);
    if (!tried) {
      tried = new Set();
      this._selectorAttempts.set(text, tried);
    }
    tried.add(selector);
  }

  get successfulSelectors(): ReadonlyMap<string, string> {
    return this._successfulSelectors;
  }

  recordSuccessfulSelector(text: string, selector: string): void {
    // re-insert so the most recent success iterates last
    this._successfulSelectors.delete(text);
    this._successfulSelectors.set(text, selector);
  }

  get interactions(): readonly InteractionRecord[] {
    return this._interactions;
  }

  recordInteraction(record: InteractionRecord): void {
    pushCapped(this._interactions, record, SUB_LOG_LIMIT);
  }

  // ─── Exhaustive selector testing ───────────────────────────────────────────

  /** A copy; the protocol only moves through `advanceElementContext` */
  get elementContext(): ElementContext | null {
    const ctx = this._elementContext;
    return ctx ? copyElementContext(ctx) : null;
  }

  get testingInProgress(): boolean {
    const ctx = this._elementContext;
    return ctx !== null && ctx.testingRequired && ctx.currentTestIndex < ctx.untestedSelectors.length;
  }

  setElementContext(ctx: ElementContext): void {
    this._elementContext = copyElementContext(ctx);
  }

  /**
   * Move past the selector just tested. The testing requirement clears as soon
   * as the index reaches the end of the list.
   */
  advanceElementContext(): void {
    const ctx = this._elementContext;
    if (!ctx) return;
    ctx.currentTestIndex += 1;
    if (ctx.currentTestIndex >= ctx.untestedSelectors.length) ctx.testingRequired = false;
  }

  /** Called after each reasoning pass; an unfinished testing protocol survives it */
  consumeElementContext(): void {
    if (this.testingInProgress) return;
    this._elementContext = null;
  }

  // ─── Verification ──────────────────────────────────────────────────────────

  get verifications(): readonly VerificationRecord[] {
    return this._verifications;
  }

  recordVerification(record: VerificationRecord): void {
    pushCapped(this._verifications, record, SUB_LOG_LIMIT);
  }

  // ─── Search flow ───────────────────────────────────────────────────────────

  get searchFlow(): Readonly<SearchFlowState> {
    return this._searchFlow;
  }

  /** Flags only ever go from false to true */
  setSearchFlowFlag(phase: SearchFlowPhase): void {
    this._searchFlow[phase] = true;
  }

  // ─── User input gate ───────────────────────────────────────────────────────

  get userInput(): Readonly<UserInputState> {
    return this._userInput;
  }

  openUserInput(request: UserInputRequest): void {
    this._userInput = { pending: true, request: { ...request }, response: null, flowActive: true };
  }

  /** Store the submitted value; the flow stays active until a fill consumes it */
  receiveUserInput(value: string): void {
    this._userInput = { ...this._userInput, pending: false, response: value };
  }

  /** Hand out the response once and close the gate */
  consumeUserInput(): string | null {
    const value = this._userInput.response;
    this.clearUserInput();
    return value;
  }

  clearUserInput(): void {
    this._userInput = { pending: false, request: null, response: null, flowActive: false };
  }

  // ─── Results ───────────────────────────────────────────────────────────────

  get results(): readonly ExtractedItem[] {
    return this._results;
  }

  addResults(items: readonly ExtractedItem[]): void {
    this._results.push(...items);
  }

  // ─── CAPTCHA ───────────────────────────────────────────────────────────────

  get captchaDetected(): CaptchaDetection | null {
    return this._captchaDetected;
  }

  get captchaSolvedBy(): string | null {
    return this._captchaSolvedBy;
  }

  get captchaAttempts(): readonly CaptchaOutcome[] {
    return this._captchaAttempts;
  }

  recordCaptchaDetection(detection: CaptchaDetection): void {
    this._captchaDetected = detection.found ? { ...detection } : null;
  }

  recordCaptchaAttempt(outcome: CaptchaOutcome): void {
    pushCapped(this._captchaAttempts, { ...outcome }, SUB_LOG_LIMIT);
    if (outcome.found) {
      const { type, confidence, siteKey } = outcome;
      this._captchaDetected = siteKey ? { found: true, type, confidence, siteKey } : { found: true, type, confidence };
    }
    if (outcome.solved) this._captchaSolvedBy = outcome.service ?? 'unknown';
  }

  // ─── Artifacts & usage ─────────────────────────────────────────────────────

  get screenshots(): readonly string[] {
    return this._screenshots;
  }

  addScreenshot(path: string): void {
    this._screenshots.push(path);
  }

  get tokenUsage(): readonly StepTokenUsage[] {
    return this._tokenUsage;
  }

  recordTokenUsage(usage: StepTokenUsage): void {
    this._tokenUsage.push({ ...usage });
  }

  totalTokenUsage(): TokenUsage {
    return this._tokenUsage.reduce<TokenUsage>(
      (sum, u) => ({
        inputTokens: sum.inputTokens + u.inputTokens,
        outputTokens: sum.outputTokens + u.outputTokens,
      }),
      { inputTokens: 0, outputTokens: 0 },
    );
  }
}
