/**
 * Structured logging for room and hand events.
 * JSON lines in production, readable lines everywhere else.
 */

const LEVELS = ["debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LEVELS)[number];

export interface LogContext {
  roomId?: string;
  handId?: string;
  userId?: string;
  action?: string;
  amount?: number;
  event?: string;
  [key: string]: unknown;
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return LEVELS.some((level) => level === value);
}

function defaultLevel(): LogLevel {
  const fromEnv = process.env.LOG_LEVEL;
  if (isLogLevel(fromEnv)) return fromEnv;
  return process.env.NODE_ENV === "test" ? "warn" : "info";
}

export class Logger {
  private level: LogLevel;
  private isProduction: boolean;

  constructor(level: LogLevel = defaultLevel()) {
    this.level = level;
    this.isProduction = process.env.NODE_ENV === "production";
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.level);
  }

  private format(level: LogLevel, message: string, context?: LogContext): string {
    const entry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...context,
    };

    if (this.isProduction) {
      return JSON.stringify(entry);
    }
    const ctx = context ? ` ${JSON.stringify(context)}` : "";
    return `[${entry.timestamp}] ${level.toUpperCase()}: ${message}${ctx}`;
  }

  debug(message: string, context?: LogContext) {
    if (this.shouldLog("debug")) {
      console.log(this.format("debug", message, context));
    }
  }

  info(message: string, context?: LogContext) {
    if (this.shouldLog("info")) {
      console.log(this.format("info", message, context));
    }
  }

  warn(message: string, context?: LogContext) {
    if (this.shouldLog("warn")) {
      console.warn(this.format("warn", message, context));
    }
  }

  error(message: string, context?: LogContext) {
    if (this.shouldLog("error")) {
      console.error(this.format("error", message, context));
    }
  }

  // Specialized loggers for common events
  handStarted(roomId: string, handId: string, players: Array<{ userId: string }>) {
    this.info("Hand started", {
      event: "hand_started",
      roomId,
      handId,
      playerCount: players.length,
      players: players.map((p) => p.userId),
    });
  }

  handEnded(roomId: string, handId: string, pot: number, winners: Array<{ userId: string; amount: number }>) {
    this.info("Hand ended", {
      event: "hand_ended",
      roomId,
      handId,
      pot,
      winners,
    });
  }

  handAborted(roomId: string, handId: string, reason: string) {
    this.error("Hand aborted", {
      event: "hand_aborted",
      roomId,
      handId,
      reason,
    });
  }

  playerAction(roomId: string, handId: string, userId: string, action: string, amount?: number, timeout?: boolean) {
    this.info("Player action", {
      event: "player_action",
      roomId,
      handId,
      userId,
      action,
      amount,
      timeout: timeout ?? false,
    });
  }

  playerSeated(roomId: string, userId: string, seated: number) {
    this.info("Player seated", {
      event: "player_seated",
      roomId,
      userId,
      seated,
    });
  }

  authFailure(address: string) {
    this.warn("Authentication failed", {
      event: "auth_failure",
      address,
    });
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export const logger = new Logger();
