import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import type { JobManager } from '../runtime/jobs.js';
import type { Logger } from '../logger.js';
import { errorMessage } from '../runtime/errors.js';

// ─────────────────────────────────────────────────────────────────────────────
// Mission MCP Server
//
// The outer surface of the agent: start missions, follow them, answer their
// questions. Missions run in the background; every tool returns immediately.
// ─────────────────────────────────────────────────────────────────────────────

export interface ToolResult {
  [key: string]: unknown;
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
}

function json(value: unknown): ToolResult {
  return { content: [{ type: 'text', text: JSON.stringify(value, null, 2) }] };
}

function failure(message: string): ToolResult {
  return { content: [{ type: 'text', text: `Error: ${message}` }], isError: true };
}

const jobIdArgs = z.object({ job_id: z.string().min(1) });

const startMissionArgs = z.object({
  url: z.string().url(),
  objective: z.string().min(1),
  top_k: z.number().int().positive().default(5),
  max_steps: z.number().int().positive().optional(),
});

const listEventsArgs = jobIdArgs.extend({
  limit: z.number().int().positive().optional(),
});

const submitInputArgs = jobIdArgs.extend({
  value: z.string(),
});

export class MissionMCPServer {
  private server: Server;
  private jobs: JobManager;
  private logger?: Logger;

  constructor(jobs: JobManager, options: { version?: string; logger?: Logger } = {}) {
    this.jobs = jobs;
    this.logger = options.logger;

    this.server = new Server(
      { name: 'mission-agent', version: options.version ?? '0.1.0' },
      { capabilities: { tools: {} } },
    );

    this.registerHandlers();
  }

  private registerHandlers(): void {
    this.server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools: this.getTools() }));

    this.server.setRequestHandler(CallToolRequestSchema, async (request) => {
      const { name, arguments: args } = request.params;
      return this.callTool(name, args ?? {});
    });
  }

  /** Dispatch one tool call. Errors come back as `isError` results, never as rejections. */
  async callTool(name: string, args: Record<string, unknown>): Promise<ToolResult> {
    try {
      switch (name) {
        case 'start_mission':
          return this.handleStartMission(args);
        case 'get_mission_status':
          return this.handleGetStatus(args);
        case 'get_mission_result':
          return this.handleGetResult(args);
        case 'list_mission_events':
          return this.handleListEvents(args);
        case 'get_user_input_request':
          return this.handleGetInputRequest(args);
        case 'submit_user_input':
          return this.handleSubmitInput(args);
        case 'cleanup_stuck_missions':
          return json(this.jobs.cleanupStuckJobs());
        case 'get_system_status':
          return json(this.jobs.systemStatus());
        default:
          return failure(`Unknown tool: ${name}`);
      }
    } catch (err) {
      this.logger?.warn({ tool: name, error: errorMessage(err) }, 'tool call failed');
      if (err instanceof z.ZodError) {
        return failure(`Invalid arguments: ${err.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')}`);
      }
      return failure(errorMessage(err));
    }
  }

  // ─── Tool Handlers ─────────────────────────────────────────────────────────

  private handleStartMission(args: Record<string, unknown>): ToolResult {
    const { url, objective, top_k, max_steps } = startMissionArgs.parse(args);
    const jobId = this.jobs.start({ url, objective, topK: top_k, maxSteps: max_steps });
    return json({ job_id: jobId, status: this.jobs.status(jobId)?.status ?? 'queued' });
  }

  private handleGetStatus(args: Record<string, unknown>): ToolResult {
    const { job_id } = jobIdArgs.parse(args);
    const job = this.jobs.status(job_id);
    if (!job) return failure(`Job ${job_id} not found`);

    return json({
      job_id: job.id,
      status: job.status,
      url: job.url,
      objective: job.objective,
      top_k: job.topK,
      created_at: new Date(job.createdAt).toISOString(),
      updated_at: new Date(job.updatedAt).toISOString(),
      has_result: job.result !== null,
      waiting_for_input: this.jobs.getUserInputRequest(job_id) !== null,
    });
  }

  private handleGetResult(args: Record<string, unknown>): ToolResult {
    const { job_id } = jobIdArgs.parse(args);
    const job = this.jobs.status(job_id);
    if (!job) return failure(`Job ${job_id} not found`);
    if (!job.result) return json({ job_id, status: job.status, ready: false });
    return json({ job_id, status: job.status, ready: true, result: job.result });
  }

  private handleListEvents(args: Record<string, unknown>): ToolResult {
    const { job_id, limit } = listEventsArgs.parse(args);
    return json({ job_id, events: this.jobs.listEvents(job_id, limit) });
  }

  private handleGetInputRequest(args: Record<string, unknown>): ToolResult {
    const { job_id } = jobIdArgs.parse(args);
    const request = this.jobs.getUserInputRequest(job_id);
    if (!request) return json({ job_id, pending: false });
    return json({
      job_id,
      pending: true,
      input_type: request.inputType,
      prompt: request.prompt,
      sensitive: request.sensitive,
      requested_at: new Date(request.requestedAt).toISOString(),
    });
  }

  private handleSubmitInput(args: Record<string, unknown>): ToolResult {
    const { job_id, value } = submitInputArgs.parse(args);
    const result = this.jobs.submitUserInput(job_id, value);
    switch (result) {
      case 'accepted':
        return json({ job_id, result, message: 'Input delivered; the mission is resuming' });
      case 'not_waiting':
        return failure(`Job ${job_id} had a stale input request that is no longer being waited on; it was cleared`);
      case 'no_request':
        return failure(`Job ${job_id} is not waiting for input`);
    }
  }

  // ─── Tool Definitions ──────────────────────────────────────────────────────

  getTools() {
    const jobIdProperty = { job_id: { type: 'string', description: 'Job id returned by start_mission' } };

    return [
      {
        name: 'start_mission',
        description:
          'Start a browser mission in the background: open the URL and work toward the objective until enough results are collected or the step budget runs out. Returns a job_id.',
        inputSchema: {
          type: 'object' as const,
          properties: {
            url: { type: 'string', description: 'Full URL to start from' },
            objective: { type: 'string', description: 'What the mission should accomplish' },
            top_k: { type: 'number', description: 'Number of results at which the mission stops (default 5)' },
            max_steps: { type: 'number', description: 'Optional step budget override' },
          },
          required: ['url', 'objective'],
        },
      },
      {
        name: 'get_mission_status',
        description: 'Current status of a mission: queued, running, waiting_for_input, completed or failed.',
        inputSchema: { type: 'object' as const, properties: jobIdProperty, required: ['job_id'] },
      },
      {
        name: 'get_mission_result',
        description: 'Final report of a finished mission: outcome, stop reason, results, screenshots, token usage and history.',
        inputSchema: { type: 'object' as const, properties: jobIdProperty, required: ['job_id'] },
      },
      {
        name: 'list_mission_events',
        description: 'Status events a mission has emitted, oldest first.',
        inputSchema: {
          type: 'object' as const,
          properties: {
            ...jobIdProperty,
            limit: { type: 'number', description: 'Only the most recent N events' },
          },
          required: ['job_id'],
        },
      },
      {
        name: 'get_user_input_request',
        description: 'The question a mission is waiting on (credentials, codes, choices), if any.',
        inputSchema: { type: 'object' as const, properties: jobIdProperty, required: ['job_id'] },
      },
      {
        name: 'submit_user_input',
        description: 'Answer a pending user-input request. The value is handed to the mission once and never shown to the model.',
        inputSchema: {
          type: 'object' as const,
          properties: {
            ...jobIdProperty,
            value: { type: 'string', description: 'The requested value' },
          },
          required: ['job_id', 'value'],
        },
      },
      {
        name: 'cleanup_stuck_missions',
        description: 'Expire stale input requests and fail missions left unfinished by a previous process.',
        inputSchema: { type: 'object' as const, properties: {} },
      },
      {
        name: 'get_system_status',
        description: 'Active missions, missions waiting for input and job store totals.',
        inputSchema: { type: 'object' as const, properties: {} },
      },
    ];
  }

  // ─── Lifecycle ─────────────────────────────────────────────────────────────

  async start(): Promise<void> {
    const transport = new StdioServerTransport();
    await this.server.connect(transport);
    this.logger?.info('mission MCP server started');
  }

  async stop(): Promise<void> {
    await this.server.close();
  }
}
