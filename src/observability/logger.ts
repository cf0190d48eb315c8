import crypto from 'crypto';

export interface LogContext {
  runId: string;
  owner?: string;
  repo?: string;
}

type LogLevel = 'info' | 'warn' | 'error';

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  runId: string;
  phase: string;
  message: string;
  data?: Record<string, unknown>;
  owner?: string;
  repo?: string;
}

// stdout carries the table.
class Logger {
  private context: LogContext | null = null;

  setContext(context: LogContext): void {
    this.context = context;
  }

  clearContext(): void {
    this.context = null;
  }

  private log(level: LogLevel, phase: string, message: string, data?: Record<string, unknown>): void {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      runId: this.context?.runId || 'unknown',
      phase,
      message,
      data,
    };

    if (this.context?.owner) entry.owner = this.context.owner;
    if (this.context?.repo) entry.repo = this.context.repo;

    console.error(JSON.stringify(entry));
  }

  info(phase: string, message: string, data?: Record<string, unknown>): void {
    this.log('info', phase, message, data);
  }

  warn(phase: string, message: string, data?: Record<string, unknown>): void {
    this.log('warn', phase, message, data);
  }

  error(phase: string, message: string, data?: Record<string, unknown>): void {
    this.log('error', phase, message, data);
  }
}

export const logger = new Logger();

export function generateRunId(): string {
  return crypto.randomBytes(8).toString('hex');
}
