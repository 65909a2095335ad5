/**
 * Dashboard Web Server
 * 15m/5m Overlap Arbitrage Bot
 */

import express from 'express';
import type { Server } from 'http';
import type { OrchestratorStatus } from '../execution/orchestrator';
import type { SessionStats } from '../crypto/persistence';
import type { LogLevel, LogSink } from '../logger/logger';
import { Logger, logger as rootLogger } from '../logger/logger';
import { DASHBOARD_LOG_BUFFER } from '../config/constants';

export type BotStatus = 'initializing' | 'running' | 'stopped';

export interface LogEntry {
  level: LogLevel;
  line: string;
}

/**
 * Bounded buffer of recent log lines
 */
export class LogBuffer {
  private readonly entries: LogEntry[] = [];

  constructor(private readonly capacity: number = DASHBOARD_LOG_BUFFER) {}

  push(line: string, level: LogLevel): void {
    this.entries.push({ level, line });
    if (this.entries.length > this.capacity) {
      this.entries.splice(0, this.entries.length - this.capacity);
    }
  }

  /** Newest last */
  recent(limit: number = this.capacity): LogEntry[] {
    return this.entries.slice(-limit);
  }

  get sink(): LogSink {
    return (line, level) => this.push(line, level);
  }
}

export interface DashboardSources {
  botStatus: () => BotStatus;
  orchestrator: () => OrchestratorStatus;
  stats: () => SessionStats;
  logs: LogBuffer;
  startTime: number;
}

export interface DashboardStats {
  status: BotStatus;
  startTime: number;
  uptimeSecs: number;
  symbols: OrchestratorStatus['symbols'];
  ledger: SessionStats;
}

export function buildDashboardStats(sources: DashboardSources, now: number = Date.now()): DashboardStats {
  return {
    status: sources.botStatus(),
    startTime: sources.startTime,
    uptimeSecs: Math.floor((now - sources.startTime) / 1000),
    symbols: sources.orchestrator().symbols,
    ledger: sources.stats(),
  };
}

export function createDashboardApp(sources: DashboardSources): express.Application {
  const app = express();

  app.get('/api/stats', (_req, res) => {
    res.json(buildDashboardStats(sources));
  });

  app.get('/api/logs', (req, res) => {
    const raw = typeof req.query.limit === 'string' ? parseInt(req.query.limit, 10) : NaN;
    const limit = Number.isFinite(raw) && raw > 0 ? raw : undefined;
    res.json({ logs: sources.logs.recent(limit) });
  });

  return app;
}

/**
 * Start dashboard server
 */
export function startDashboardServer(
  sources: DashboardSources,
  port: number,
  log: Logger = rootLogger.child('dashboard'),
): Server {
  const app = createDashboardApp(sources);
  const server = app.listen(port, () => {
    log.info(`📊 Dashboard listening on http://localhost:${port}`);
  });
  server.on('error', (error: Error) => {
    log.error(`Dashboard server error: ${error.message}`);
  });
  return server;
}
