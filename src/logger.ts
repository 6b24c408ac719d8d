import chalk from "chalk";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogEntry = {
  id: string;
  timestamp: number;
  level: LogLevel;
  message: string;
  data?: Record<string, unknown>;
  context?: string;
};

/** Where records end up. The core never decides between file, stream or memory. */
export interface LogSink {
  write(entry: LogEntry): void;
}

const LEVEL_RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

const LEVEL_STYLE: Record<LogLevel, { prefix: string; color: (text: string) => string }> = {
  debug: { prefix: "DEBUG", color: chalk.gray },
  info: { prefix: "INFO ", color: chalk.blueBright },
  warn: { prefix: "WARN ", color: chalk.yellowBright },
  error: { prefix: "ERROR", color: chalk.redBright },
};

export class ConsoleSink implements LogSink {
  write(entry: LogEntry) {
    const { prefix, color } = LEVEL_STYLE[entry.level];
    const scope = entry.context ? chalk.dim(`[${entry.context}] `) : "";
    const line = `${color(prefix)} ${scope}${entry.message}`;
    const out = entry.level === "error" ? console.error : entry.level === "warn" ? console.warn : console.log;
    if (entry.data && Object.keys(entry.data).length) out(line, entry.data);
    else out(line);
  }
}

export class MemorySink implements LogSink {
  readonly entries: LogEntry[] = [];

  write(entry: LogEntry) {
    this.entries.push(entry);
  }

  find(level: LogLevel, pattern: RegExp): LogEntry | undefined {
    return this.entries.find((e) => e.level === level && pattern.test(e.message));
  }
}

let entrySeq = 0;

export class Logger {
  private readonly sinks: LogSink[];
  private readonly level: LogLevel;
  private readonly context?: string;

  constructor(options: { level?: LogLevel; sinks?: LogSink[]; context?: string } = {}) {
    this.level = options.level ?? "info";
    this.sinks = options.sinks ?? [new ConsoleSink()];
    this.context = options.context;
  }

  /** Same sinks and threshold, records tagged with another context. */
  child(context: string): Logger {
    return new Logger({ level: this.level, sinks: this.sinks, context });
  }

  debug(message: string, data?: Record<string, unknown>) {
    this.log("debug", message, data);
  }

  info(message: string, data?: Record<string, unknown>) {
    this.log("info", message, data);
  }

  warn(message: string, data?: Record<string, unknown>) {
    this.log("warn", message, data);
  }

  error(message: string, data?: Record<string, unknown>) {
    this.log("error", message, data);
  }

  private log(level: LogLevel, message: string, data?: Record<string, unknown>) {
    if (LEVEL_RANK[level] < LEVEL_RANK[this.level]) return;
    const entry: LogEntry = {
      id: `log_${Date.now().toString(16)}_${(++entrySeq).toString(16)}`,
      timestamp: Date.now(),
      level,
      message,
      data,
      context: this.context,
    };
    for (const sink of this.sinks) {
      try {
        sink.write(entry);
      } catch (err) {
        console.error("log sink failed", err);
      }
    }
  }
}

/** Logger for tests and embedders that want the records but not the console. */
export function createSilentLogger(level: LogLevel = "debug"): { logger: Logger; sink: MemorySink } {
  const sink = new MemorySink();
  return { logger: new Logger({ level, sinks: [sink] }), sink };
}
