import { pino, destination, type Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Logger: stderr only. stdout belongs to the MCP stdio transport.
// ─────────────────────────────────────────────────────────────────────────────

export type { Logger };

export function createLogger(level = process.env.LOG_LEVEL ?? 'info'): Logger {
  if (process.stderr.isTTY && process.env.NODE_ENV !== 'production') {
    return pino({
      name: 'mission-agent',
      level,
      transport: {
        target: 'pino-pretty',
        options: { destination: 2, colorize: true, translateTime: 'SYS:HH:MM:ss.l' },
      },
    });
  }
  return pino({ name: 'mission-agent', level }, destination(2));
}

let root: Logger | null = null;

/** Process-wide root logger, created on first use */
export function getLogger(): Logger {
  root ??= createLogger();
  return root;
}

/** Silent logger for tests and embedded use */
export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}
