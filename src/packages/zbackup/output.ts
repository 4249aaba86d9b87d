/*
Where user-facing output goes.

This is created once by the command line program (see bin/zbackup.ts) and
handed to everything that prints, instead of a global verbose flag.  Debug
logging via @zfs-tiers/backend/logger is separate and controlled by DEBUG.
*/

export interface Output {
  // normal output, e.g., the listing or the commands run by --set
  info: (line: string) => void;
  // problems that don't stop the run
  warn: (line: string) => void;
  // only shown with --verbose
  verbose: (line: string) => void;
}

export function highlight(line: string): string {
  return `========== ${line} ==========`;
}

export function consoleOutput({
  verbose = false,
  stdout = process.stdout,
  stderr = process.stderr,
}: {
  verbose?: boolean;
  stdout?: NodeJS.WritableStream;
  stderr?: NodeJS.WritableStream;
} = {}): Output {
  return {
    info: (line) => {
      stdout.write(`${line}\n`);
    },
    warn: (line) => {
      stderr.write(`${line}\n`);
    },
    verbose: (line) => {
      if (verbose) {
        stderr.write(`${line}\n`);
      }
    },
  };
}

// Collects everything, for unit tests.
export class MemoryOutput implements Output {
  public readonly lines: { level: keyof Output; line: string }[] = [];

  info = (line: string) => {
    this.lines.push({ level: "info", line });
  };

  warn = (line: string) => {
    this.lines.push({ level: "warn", line });
  };

  verbose = (line: string) => {
    this.lines.push({ level: "verbose", line });
  };

  get(level: keyof Output): string[] {
    return this.lines.filter((x) => x.level == level).map((x) => x.line);
  }
}
