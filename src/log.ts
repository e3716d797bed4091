import chalk from "chalk";
import fs from "node:fs";
import path from "node:path";
import { ConfigError } from "./errors.js";

export type LogMode = "color" | "plain";

export const LOG_LEVELS = {
  ALL: 0,
  DEBUG: 10,
  INFO: 20,
  WARNING: 30,
  ERROR: 40,
  CRITICAL: 50,
  NONE: -1
} as const;

export type LogLevelName = keyof typeof LOG_LEVELS;

type RecordLevel = Exclude<LogLevelName, "ALL" | "NONE">;

export type LogRecord = {
  level: RecordLevel;
  message: string;
  time: Date;
};

export type LogSink = (record: LogRecord) => void;

export function isLogLevel(value: string): value is LogLevelName {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

function twoDigits(n: number): string {
  return String(n).padStart(2, "0");
}

export function formatLogLine(record: LogRecord): string {
  const t = record.time;
  const stamp =
    `${t.getFullYear()}-${twoDigits(t.getMonth() + 1)}-${twoDigits(t.getDate())} ` +
    `${twoDigits(t.getHours())}:${twoDigits(t.getMinutes())}:${twoDigits(t.getSeconds())}`;
  return `${stamp} ${record.level.padEnd(7)} ${record.message}`;
}

export class Logger {
  private readonly threshold: number;

  constructor(
    level: LogLevelName,
    private readonly sinks: LogSink[]
  ) {
    this.threshold = LOG_LEVELS[level];
  }

  debug(message: string): void {
    this.write("DEBUG", message);
  }

  info(message: string): void {
    this.write("INFO", message);
  }

  warning(message: string): void {
    this.write("WARNING", message);
  }

  error(message: string): void {
    this.write("ERROR", message);
  }

  private write(level: RecordLevel, message: string): void {
    if (this.threshold < 0 || LOG_LEVELS[level] < this.threshold) {
      return;
    }
    const record: LogRecord = { level, message, time: new Date() };
    for (const sink of this.sinks) {
      sink(record);
    }
  }
}

export const silentLogger = new Logger("NONE", []);

export function fileSink(logDir: string, logName: string): LogSink {
  if (fs.existsSync(logDir) && !fs.statSync(logDir).isDirectory()) {
    throw new ConfigError(`not a directory: '${logDir}'`);
  }
  fs.mkdirSync(logDir, { recursive: true });
  const logFile = path.join(logDir, `${logName}.log`);
  return (record) => {
    fs.appendFileSync(logFile, `${formatLogLine(record)}\n`);
  };
}

export function consoleSink(mode: LogMode): LogSink {
  return (record) => {
    if (LOG_LEVELS[record.level] < LOG_LEVELS.WARNING) {
      return;
    }
    const tag = record.level === "WARNING" ? "[warn]" : "[error]";
    console.error(styleLine(`${tag} ${record.message}`, mode));
  };
}

export function styleLine(input: string, mode: LogMode): string {
  if (mode === "plain") {
    return input;
  }

  const line = input.trimEnd();

  if (!line) {
    return input;
  }

  if (/^\[error\]/i.test(line)) {
    return chalk.bold.red(line);
  }

  if (/^\[warn\]/i.test(line)) {
    return chalk.yellowBright(line);
  }

  if (/^==>\s+/.test(line)) {
    return chalk.bold.cyanBright(line);
  }

  if (/^(created|updated):/i.test(line)) {
    return chalk.greenBright(line);
  }

  if (/^Summary:/i.test(line)) {
    return chalk.bold.magenta(line);
  }

  return line;
}
