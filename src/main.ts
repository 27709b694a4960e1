#!/usr/bin/env node
import { resolveConfig } from './config.js';
import { createLogger, getLogger } from './logger.js';
import { MissionAgent } from './index.js';
import { MissionMCPServer } from './server/mcp.js';
import { errorMessage } from './runtime/errors.js';

// ─── Entry point: MCP server over stdio ────────────────────────────────────

const config = resolveConfig({}, getLogger());
const logger = createLogger(config.logLevel);

const agent = new MissionAgent(config, { logger });
const mcpServer = new MissionMCPServer(agent.jobs, { logger: logger.child({ component: 'mcp' }) });

async function shutdown(): Promise<void> {
  await mcpServer.stop();
  await agent.close();
}

process.on('SIGINT', () => {
  shutdown().then(
    () => process.exit(0),
    (err: unknown) => {
      logger.error({ error: errorMessage(err) }, 'shutdown failed');
      process.exit(1);
    },
  );
});

await agent.launch();
await mcpServer.start();
