// ─────────────────────────────────────────────────────────────────────────────
// Mission Agent: Core Types
// One mission = one objective, one page, one linear sequence of verified steps.
// ─────────────────────────────────────────────────────────────────────────────

// ─────────────────────────────────────────────────────────────────────────────
// Actions: what the reasoner proposes, one per step
// ─────────────────────────────────────────────────────────────────────────────

export interface ClickAction {
  type: 'click';
  selector: string;
}

export interface FillAction {
  type: 'fill';
  selector: string;
  text: string;
}

export interface PressAction {
  type: 'press';
  selector: string;
  key: string;
}

export interface ScrollAction {
  type: 'scroll';
  direction: ScrollDirection;
  /** Pixels; defaults to 80% of the viewport height, at least 400 */
  distance?: number;
}

export interface ExtractAction {
  type: 'extract';
  items: ExtractedItem[];
}

export interface FinishAction {
  type: 'finish';
  reason: string;
}

export interface DismissPopupAction {
  type: 'dismiss_popup';
  text: string;
}

export interface RequestUserInputAction {
  type: 'request_user_input';
  inputType: UserInputType;
  prompt: string;
  sensitive: boolean;
}

export interface SolveCaptchaAction {
  type: 'solve_captcha';
}

/** Live-DOM selector discovery for a piece of visible text */
export interface ExtractSelectorAction {
  type: 'extract_selector';
  text: string;
}

export type Action =
  | ClickAction
  | FillAction
  | PressAction
  | ScrollAction
  | ExtractAction
  | FinishAction
  | DismissPopupAction
  | RequestUserInputAction
  | SolveCaptchaAction
  | ExtractSelectorAction;

export type ActionType = Action['type'];

/** Actions that operate on a single selector and count toward selector testing */
export type InteractionAction = ClickAction | FillAction | PressAction;

export type ScrollDirection = 'up' | 'down';

export type UserInputType = 'text' | 'password' | 'email' | 'phone' | 'otp';

/** A result item as reported by the reasoner; free-form apart from `url` */
export type ExtractedItem = Record<string, unknown>;

export interface ProposedAction {
  thought: string;
  action: Action;
}

// ─────────────────────────────────────────────────────────────────────────────
// Element search: what the live DOM scan returns
// ─────────────────────────────────────────────────────────────────────────────

export interface ElementMatch {
  tagName: string;
  text: string;
  isVisible: boolean;
  isInteractive: boolean;
  isClickable: boolean;
  /** Best fuzzy-match score across attributes, text and properties (0-100) */
  matchScore: number;
  suggestedSelectors: string[];
}

export interface SelectorValidation {
  workingSelectors: string[];
  failedSelectors: string[];
  bestSelector: string | null;
  bestElement: ElementMatch | null;
}

// ─────────────────────────────────────────────────────────────────────────────
// Verification
// ─────────────────────────────────────────────────────────────────────────────

export interface VerificationResult {
  success: boolean;
  changesDetected: boolean;
  notes: string[];
}

export interface VerificationRecord extends VerificationResult {
  step: number;
  actionType: ActionType;
  screenshotPath?: string;
}

export interface InteractionRecord {
  step: number;
  searchText: string;
  totalElements: number;
  tested: number;
  working: number;
  failed: number;
  bestSelector: string | null;
}

// ─────────────────────────────────────────────────────────────────────────────
// Mission state pieces
// ─────────────────────────────────────────────────────────────────────────────

export interface ElementContext {
  text: string;
  untestedSelectors: string[];
  currentTestIndex: number;
  testingRequired: boolean;
  workingSelectors: string[];
}

export type SearchFlowPhase = 'detected' | 'clicked' | 'filled' | 'submitted';

export type SearchFlowState = Record<SearchFlowPhase, boolean>;

export interface UserInputRequest {
  inputType: UserInputType;
  prompt: string;
  sensitive: boolean;
}

export interface UserInputState {
  pending: boolean;
  request: UserInputRequest | null;
  response: string | null;
  flowActive: boolean;
}

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
}

export interface StepTokenUsage extends TokenUsage {
  step: number;
  kind: 'reasoning' | 'emergency' | 'corrective';
}

// ─────────────────────────────────────────────────────────────────────────────
// CAPTCHA collaborator
// ─────────────────────────────────────────────────────────────────────────────

export interface CaptchaDetection {
  found: boolean;
  type: string | null;
  confidence: number;
  /** `data-sitekey` of an embedded widget, what a solver service needs */
  siteKey?: string;
}

export interface CaptchaOutcome extends CaptchaDetection {
  solved: boolean;
  service: string | null;
  error: string | null;
}

// ─────────────────────────────────────────────────────────────────────────────
// Execution outcome: what one executor pass reports
// ─────────────────────────────────────────────────────────────────────────────

export type ExecutionOutcome =
  | { kind: 'executed'; signature: string; verification: VerificationResult | null }
  | { kind: 'blocked'; signature: string; failureCount: number }
  | { kind: 'protocol_violation'; signature: string; expectedSelector: string; remaining: number; message: string }
  | { kind: 'failed'; signature: string; error: string };

export type SupervisorDecision =
  | { kind: 'continue'; override?: string }
  | { kind: 'stop'; reason: StopReason };

export type StopReason =
  | 'finished_with_results'
  | 'objective_met'
  | 'target_reached'
  | 'max_steps_exhausted'
  | 'infrastructure_failure';

// ─────────────────────────────────────────────────────────────────────────────
// Jobs
// ─────────────────────────────────────────────────────────────────────────────

export interface MissionRequest {
  url: string;
  objective: string;
  /** Result count at which the mission stops successfully */
  topK: number;
  maxSteps?: number;
}

export type MissionOutcome = 'success' | 'exhausted' | 'failed';

export interface MissionReport {
  jobId: string;
  outcome: MissionOutcome;
  stopReason: StopReason;
  results: ExtractedItem[];
  screenshots: string[];
  steps: number;
  tokenUsage: TokenUsage & { perStep: StepTokenUsage[] };
  history: string[];
  error?: string;
}

export type JobStatus = 'queued' | 'running' | 'waiting_for_input' | 'completed' | 'failed';

export interface JobRecord {
  id: string;
  url: string;
  objective: string;
  topK: number;
  status: JobStatus;
  createdAt: number;
  updatedAt: number;
  result: MissionReport | null;
}

export interface JobEvent {
  jobId: string;
  ts: string;
  event: string;
  details?: Record<string, unknown>;
}

export interface PendingInputRecord extends UserInputRequest {
  jobId: string;
  requestedAt: number;
}
