// ─────────────────────────────────────────────────────────────────────────────
// Mission Agent: Public API
// An LLM-driven browser agent that works a page one verified step at a time.
// ─────────────────────────────────────────────────────────────────────────────

export { BrowserEngine } from './engine/browser.js';
export { PlaywrightPage, normalizeSelector } from './engine/page.js';
export type { AgentPage, AgentLocator } from './engine/page.js';
export { DetectOnlyCaptchaSolver } from './engine/captcha.js';
export type { CaptchaSolver } from './engine/captcha.js';
export { AnthropicReasoner } from './semantic/reasoner.js';
export type { Reasoner, ReasoningInput, ReasoningOutput } from './semantic/reasoner.js';
export { findElementsWithText } from './semantic/dom-search.js';
export { MissionMemory } from './memory/mission-memory.js';
export { buildContextSummary, buildHistoryText } from './memory/context.js';
export { JobStore } from './memory/job-store.js';
export { signature } from './actions/signature.js';
export { parseAction, parseProposal } from './actions/schema.js';
export { ActionExecutor } from './runtime/executor.js';
export { ActionVerifier } from './runtime/verifier.js';
export { SelectorValidator } from './runtime/selector-validator.js';
export { MissionSupervisor } from './runtime/supervisor.js';
export { MissionRunner } from './runtime/mission.js';
export { JobManager } from './runtime/jobs.js';
export type { SessionProvider } from './runtime/jobs.js';
export { JobEventBus } from './runtime/status.js';
export type { StatusSink } from './runtime/status.js';
export { UserInputGate } from './runtime/user-input-gate.js';
export * from './runtime/errors.js';
export { MissionMCPServer } from './server/mcp.js';
export { loadConfig, resolveConfig } from './config.js';
export type { AgentConfig } from './config.js';
export { createLogger } from './logger.js';

export type * from './types.js';

// ─── High-level convenience API ────────────────────────────────────────────

import { BrowserEngine } from './engine/browser.js';
import type { CaptchaSolver } from './engine/captcha.js';
import { AnthropicReasoner, type Reasoner } from './semantic/reasoner.js';
import { JobStore } from './memory/job-store.js';
import { JobManager, type SessionProvider } from './runtime/jobs.js';
import type { AgentConfig } from './config.js';
import { getLogger, type Logger } from './logger.js';
import type { MissionReport, MissionRequest } from './types.js';

export interface MissionAgentOptions {
  logger?: Logger;
  /** Defaults to AnthropicReasoner */
  reasoner?: Reasoner;
  captcha?: CaptchaSolver;
  /** Defaults to a BrowserEngine built from the config */
  sessions?: SessionProvider;
  /** Defaults to jobs.db under the data directory */
  dbPath?: string;
}

/**
 * MissionAgent: the main class.
 *
 * Usage:
 * ```typescript
 * const agent = new MissionAgent(resolveConfig());
 * await agent.launch();
 *
 * const report = await agent.run({
 *   url: 'https://example.com/shop',
 *   objective: 'find three laptops under $1000',
 *   topK: 3,
 * });
 * console.log(report.outcome, report.results);
 *
 * await agent.close();
 * ```
 */
export class MissionAgent {
  readonly jobs: JobManager;
  private engine: BrowserEngine | null;
  private store: JobStore;

  constructor(config: AgentConfig, options: MissionAgentOptions = {}) {
    const logger = options.logger ?? getLogger();
    this.store = new JobStore(options.dbPath ?? JobStore.defaultPath(config.dataDir));

    let sessions = options.sessions;
    if (sessions) {
      this.engine = null;
    } else {
      this.engine = new BrowserEngine(config, logger.child({ component: 'browser' }));
      sessions = this.engine;
    }

    if (!options.reasoner && !config.anthropicApiKey) {
      logger.warn('ANTHROPIC_API_KEY is not set; reasoning calls will fail and missions will run on fallback actions');
    }

    this.jobs = new JobManager({
      config,
      store: this.store,
      sessions,
      reasoner: options.reasoner ?? new AnthropicReasoner(config, logger.child({ component: 'reasoner' })),
      captcha: options.captcha,
      logger,
    });
  }

  async launch(): Promise<void> {
    await this.engine?.launch();
  }

  /** Start a mission in the background and return its job id */
  start(request: MissionRequest): string {
    return this.jobs.start(request);
  }

  /** Run a mission to completion */
  async run(request: MissionRequest): Promise<MissionReport> {
    const jobId = this.jobs.start(request);
    const report = await this.jobs.waitForCompletion(jobId);
    if (!report) throw new Error(`Mission ${jobId} finished without a report`);
    return report;
  }

  async close(): Promise<void> {
    await this.engine?.close();
    await this.jobs.shutdown();
    this.store.close();
  }
}
