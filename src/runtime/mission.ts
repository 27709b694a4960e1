import { mkdir } from 'fs/promises';
import { join } from 'path';
import type { AgentConfig } from '../config.js';
import type { AgentPage } from '../engine/page.js';
import type { CaptchaSolver } from '../engine/captcha.js';
import { dismissConsentBanner } from '../engine/consent.js';
import { MissionMemory } from '../memory/mission-memory.js';
import { buildHistoryText } from '../memory/context.js';
import type { Reasoner } from '../semantic/reasoner.js';
import { signature } from '../actions/signature.js';
import { correctiveAction, emergencyAction } from '../actions/fallback.js';
import { silentLogger, type Logger } from '../logger.js';
import type { MissionOutcome, MissionReport, MissionRequest, ProposedAction, StopReason } from '../types.js';
import { ActionExecutor } from './executor.js';
import { MissionSupervisor } from './supervisor.js';
import { padStep } from './verifier.js';
import type { UserInputGate } from './user-input-gate.js';
import { nullSink, type StatusSink } from './status.js';
import { InfrastructureError, escalateInfrastructure, firstLine } from './errors.js';

// ─────────────────────────────────────────────────────────────────────────────
// MissionRunner: one mission, start to stop
//
//   navigate → CAPTCHA scan → loop {
//     screenshot → reason (corrected / emergency) → execute → supervise
//   }
//
// Strictly sequential: each step's page state is the next step's input.
// ─────────────────────────────────────────────────────────────────────────────

export interface MissionRunnerDeps {
  config: AgentConfig;
  reasoner: Reasoner;
  gate: UserInputGate;
  captcha: CaptchaSolver;
  status?: StatusSink;
  logger?: Logger;
}

const SUCCESSFUL_STOPS: ReadonlySet<StopReason> = new Set(['finished_with_results', 'objective_met', 'target_reached']);

export class MissionRunner {
  private config: AgentConfig;
  private reasoner: Reasoner;
  private gate: UserInputGate;
  private captcha: CaptchaSolver;
  private status: StatusSink;
  private logger: Logger;
  private supervisor: MissionSupervisor;

  constructor(deps: MissionRunnerDeps) {
    this.config = deps.config;
    this.reasoner = deps.reasoner;
    this.gate = deps.gate;
    this.captcha = deps.captcha;
    this.status = deps.status ?? nullSink;
    this.logger = deps.logger ?? silentLogger();
    this.supervisor = new MissionSupervisor(this.logger);
  }

  static screenshotDir(dataDir: string, jobId: string): string {
    return join(dataDir, 'screenshots', jobId);
  }

  async run(jobId: string, request: MissionRequest, page: AgentPage): Promise<MissionReport> {
    const log = this.logger.child({ jobId });
    const memory = new MissionMemory({
      jobId,
      objective: request.objective,
      maxSteps: request.maxSteps ?? this.config.maxSteps,
      targetResultCount: request.topK,
      url: request.url,
    });

    const screenshotDir = MissionRunner.screenshotDir(this.config.dataDir, jobId);
    await mkdir(screenshotDir, { recursive: true });

    const executor = new ActionExecutor({
      settings: this.config,
      gate: this.gate,
      captcha: this.captcha,
      status: this.status,
      logger: log,
      screenshotDir,
    });

    this.status.push(jobId, 'mission_started', { url: request.url, objective: request.objective, topK: request.topK });
    log.info({ url: request.url, maxSteps: memory.maxSteps }, 'mission started');

    let stopReason: StopReason;
    let error: string | undefined;
    try {
      await this.open(page, memory, log);
      stopReason = await this.loop(executor, memory, page, screenshotDir, log);
    } catch (err) {
      if (!(err instanceof InfrastructureError)) throw err;
      stopReason = 'infrastructure_failure';
      error = err.message;
      memory.recordHistory(`MISSION ABORTED: ${err.message}`);
      log.error({ error: err.message }, 'mission aborted by infrastructure failure');
    }

    const report = buildReport(memory, stopReason, error);
    this.status.push(jobId, 'mission_finished', {
      outcome: report.outcome,
      stopReason,
      results: report.results.length,
      steps: report.steps,
    });
    log.info({ outcome: report.outcome, stopReason, results: report.results.length }, 'mission finished');
    return report;
  }

  // ─── Start-up ─────────────────────────────────────────────────────────────

  private async open(page: AgentPage, memory: MissionMemory, log: Logger): Promise<void> {
    const url = memory.url;
    try {
      await page.goto(url, { timeout: this.config.navigationTimeoutMs });
      await page.waitForTimeout(this.config.settleMs);
      await dismissConsentBanner(page, log);
      memory.setUrl(page.url());
      memory.recordHistory(`Navigated to ${page.url()}`);
      this.status.push(memory.jobId, 'navigated', { url: page.url() });
    } catch (err) {
      escalateInfrastructure(err);
      memory.recordHistory(`Navigation to ${url} failed: ${firstLine(err)}`);
      this.status.push(memory.jobId, 'navigation_failed', { url, error: firstLine(err) });
      log.warn({ url, error: firstLine(err) }, 'navigation failed, continuing on current page');
    }

    try {
      const detection = await this.captcha.detect(page);
      memory.recordCaptchaDetection(detection);
      if (detection.found) {
        memory.recordHistory(`CAPTCHA detected on load: ${detection.type ?? 'unknown'} (${detection.confidence}% confidence)`);
        this.status.push(memory.jobId, 'captcha_detected', { ...detection });
      }
    } catch (err) {
      escalateInfrastructure(err);
      log.warn({ error: firstLine(err) }, 'captcha scan failed');
    }
  }

  // ─── Main loop ────────────────────────────────────────────────────────────

  private async loop(
    executor: ActionExecutor,
    memory: MissionMemory,
    page: AgentPage,
    screenshotDir: string,
    log: Logger,
  ): Promise<StopReason> {
    for (;;) {
      const screenshotPath = await this.captureStep(page, memory, screenshotDir, log);
      const proposal = await this.propose(memory, page, screenshotPath, log);
      memory.consumeElementContext();

      const outcome = await executor.execute(proposal.action, memory, page);
      log.debug({ step: memory.step - 1, outcome: outcome.kind }, 'step finished');

      const decision = this.supervisor.decide(memory);
      if (decision.kind === 'stop') return decision.reason;
    }
  }

  private async captureStep(
    page: AgentPage,
    memory: MissionMemory,
    screenshotDir: string,
    log: Logger,
  ): Promise<string | null> {
    const path = join(screenshotDir, `${padStep(memory.step)}_step.png`);
    try {
      await page.screenshot({ path });
      memory.addScreenshot(path);
      return path;
    } catch (err) {
      escalateInfrastructure(err);
      log.warn({ path, error: firstLine(err) }, 'step screenshot failed');
      return null;
    }
  }

  /**
   * Ask the reasoner for the next action. A banned proposal is swapped for a
   * corrective one; a reasoning failure is replaced by a deterministic
   * emergency action. Both substitutions are written to history.
   */
  private async propose(
    memory: MissionMemory,
    page: AgentPage,
    screenshotPath: string | null,
    log: Logger,
  ): Promise<ProposedAction> {
    const step = memory.step;
    let html = '';
    try {
      html = await page.content();
    } catch (err) {
      escalateInfrastructure(err);
      log.warn({ error: firstLine(err) }, 'could not read page content');
    }

    let proposal: ProposedAction;
    try {
      const output = await this.reasoner.proposeAction({
        objective: memory.objective,
        url: page.url(),
        html,
        screenshotPath,
        historyText: buildHistoryText(memory, this.config.historyWindow),
        bannedSignatures: memory.bannedSignatures,
        step,
        maxSteps: memory.maxSteps,
      });
      proposal = { thought: output.thought, action: output.action };

      const sig = signature(proposal.action);
      const corrected = memory.isBanned(sig) && !memory.testingInProgress;
      memory.recordTokenUsage({ step, kind: corrected ? 'corrective' : 'reasoning', ...output.usage });

      if (corrected) {
        const correction = correctiveAction(sig, memory.objective);
        memory.recordHistory(`${correction.note} (proposed \`${sig}\`)`);
        this.status.push(memory.jobId, 'action_corrected', { step, banned: sig, replacement: signature(correction.action) });
        proposal = { thought: proposal.thought, action: correction.action };
      }
    } catch (err) {
      escalateInfrastructure(err);
      proposal = this.emergency(memory, firstLine(err), log);
    }

    if (proposal.thought) memory.recordHistory(`Thought: ${proposal.thought}`);
    return proposal;
  }

  private emergency(memory: MissionMemory, reason: string, log: Logger): ProposedAction {
    const step = memory.step;
    memory.recordTokenUsage({ step, kind: 'emergency', inputTokens: 0, outputTokens: 0 });

    // A pending selector test is still the only acceptable move
    const ctx = memory.elementContext;
    const expected = memory.testingInProgress ? ctx?.untestedSelectors[ctx.currentTestIndex] : undefined;
    if (expected !== undefined) {
      memory.recordHistory(`EMERGENCY ACTION (pending selector test) after reasoning failure: ${reason}`);
      this.status.push(memory.jobId, 'reasoning_fallback', { step, rule: 'pending_selector_test', reason });
      log.warn({ step, reason }, 'reasoning failed, continuing selector test');
      return { thought: '', action: { type: 'click', selector: expected } };
    }

    const choice = emergencyAction({
      step,
      maxSteps: memory.maxSteps,
      bannedSignatures: memory.bannedSignatures,
      recentExtracts: [...memory.recentExtracts],
    });
    memory.recordHistory(`EMERGENCY ACTION (${choice.rule}) after reasoning failure: ${reason}`);
    this.status.push(memory.jobId, 'reasoning_fallback', { step, rule: choice.rule, reason });
    log.warn({ step, rule: choice.rule, reason }, 'reasoning failed, using emergency action');
    return { thought: '', action: choice.action };
  }
}

// ─── Report ───────────────────────────────────────────────────────────────────

function outcomeFor(stopReason: StopReason): MissionOutcome {
  if (SUCCESSFUL_STOPS.has(stopReason)) return 'success';
  if (stopReason === 'max_steps_exhausted') return 'exhausted';
  return 'failed';
}

export function buildReport(memory: MissionMemory, stopReason: StopReason, error?: string): MissionReport {
  const report: MissionReport = {
    jobId: memory.jobId,
    outcome: outcomeFor(stopReason),
    stopReason,
    results: [...memory.results],
    screenshots: [...memory.screenshots],
    steps: memory.step - 1,
    tokenUsage: { ...memory.totalTokenUsage(), perStep: [...memory.tokenUsage] },
    history: [...memory.history],
  };
  if (error !== undefined) report.error = error;
  return report;
}

/** Report for a job that never produced one of its own */
export function buildReportForError(jobId: string, error: string): MissionReport {
  return {
    jobId,
    outcome: 'failed',
    stopReason: 'infrastructure_failure',
    results: [],
    screenshots: [],
    steps: 0,
    tokenUsage: { inputTokens: 0, outputTokens: 0, perStep: [] },
    history: [],
    error,
  };
}
