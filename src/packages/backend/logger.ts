/*
Debug logger for the zbackup command line tools.

This is basically how winston works, but using the vastly simpler
super-popular debug module.  Nothing is logged unless DEBUG is set,
e.g., DEBUG='zbackup:*' or DEBUG='zbackup:*,-zbackup:silly:*'.
*/

// setting env var must come *BEFORE* debug is loaded the first time
process.env.DEBUG_HIDE_DATE = "yes"; // since we supply it ourselves

import debug, { type Debugger } from "debug";
import { createWriteStream, mkdirSync, type WriteStream } from "fs";
import { format, inspect } from "util";
import { dirname } from "path";

const ZBACKUP = debug("zbackup");

function myFormat(...args: unknown[]): string {
  if (args.length > 1 && typeof args[0] == "string" && !args[0].includes("%")) {
    const v: string[] = [];
    for (const x of args) {
      try {
        v.push(
          typeof x == "object"
            ? inspect(x, { depth: 4, breakLength: 120 })
            : `${x}`,
        );
      } catch (_) {
        v.push(`${x}`);
      }
    }
    return v.join(" ");
  }
  return format(args[0], ...args.slice(1));
}

function initTransports() {
  if (!process.env.DEBUG) {
    return;
  }
  // Logs go to the console unless DEBUG_FILE is set; DEBUG_CONSOLE=yes
  // keeps the console when also logging to a file.
  const file = process.env.DEBUG_FILE;
  const console_ = file
    ? process.env.DEBUG_CONSOLE == "yes" || process.env.DEBUG_CONSOLE == "true"
    : process.env.DEBUG_CONSOLE != "no" && process.env.DEBUG_CONSOLE != "false";
  let fileStream: WriteStream | undefined = undefined;
  if (file) {
    mkdirSync(dirname(file), { recursive: true });
    // append, so that cron runs accumulate in one file
    fileStream = createWriteStream(file, { flags: "a" });
  }
  ZBACKUP.log = (...args: unknown[]) => {
    const time = new Date().toISOString();
    const line = `${time} (${process.pid}):${myFormat(...args)}\n`;
    if (console_) {
      // stderr, since stdout is the output of the command
      process.stderr.write(line);
    }
    fileStream?.write(line);
  };
}

initTransports();

const DEBUGGERS = {
  error: ZBACKUP.extend("error"),
  warn: ZBACKUP.extend("warn"),
  info: ZBACKUP.extend("info"),
  http: ZBACKUP.extend("http"),
  verbose: ZBACKUP.extend("verbose"),
  debug: ZBACKUP.extend("debug"),
  silly: ZBACKUP.extend("silly"),
};

export type Level = keyof typeof DEBUGGERS;

function extendAll(name: string): Record<Level, Debugger> {
  return {
    error: DEBUGGERS.error.extend(name),
    warn: DEBUGGERS.warn.extend(name),
    info: DEBUGGERS.info.extend(name),
    http: DEBUGGERS.http.extend(name),
    verbose: DEBUGGERS.verbose.extend(name),
    debug: DEBUGGERS.debug.extend(name),
    silly: DEBUGGERS.silly.extend(name),
  };
}

type LogFunction = (...args: unknown[]) => void;

export interface WinstonLogger {
  error: LogFunction;
  warn: LogFunction;
  info: LogFunction;
  http: LogFunction;
  verbose: LogFunction;
  debug: LogFunction;
  silly: LogFunction;
  extend: (name: string) => WinstonLogger;
  isEnabled: (level: Level) => boolean;
}

class Logger implements WinstonLogger {
  private name: string;
  private debuggers: Record<Level, Debugger>;

  public readonly error: LogFunction;
  public readonly warn: LogFunction;
  public readonly info: LogFunction;
  public readonly http: LogFunction;
  public readonly verbose: LogFunction;
  public readonly debug: LogFunction;
  public readonly silly: LogFunction;

  constructor(name: string) {
    this.name = name;
    this.debuggers = extendAll(name);
    this.error = this.logger("error");
    this.warn = this.logger("warn");
    this.info = this.logger("info");
    this.http = this.logger("http");
    this.verbose = this.logger("verbose");
    this.debug = this.logger("debug");
    this.silly = this.logger("silly");
  }

  private logger(level: Level): LogFunction {
    const d = this.debuggers[level];
    return (...args: unknown[]) => {
      d(args[0], ...args.slice(1));
    };
  }

  public isEnabled(level: Level): boolean {
    return this.debuggers[level].enabled === true;
  }

  public extend(name: string): WinstonLogger {
    return getLogger(`${this.name}:${name}`);
  }
}

const cache: { [name: string]: WinstonLogger } = {};
export default function getLogger(name: string): WinstonLogger {
  const logger = cache[name];
  if (logger != null) {
    return logger;
  }
  return (cache[name] = new Logger(name));
}

export { getLogger };
