import {
  commandLine,
  executeCode,
  type ExecuteCodeOptions,
  type ExecuteCodeOutput,
} from "@zfs-tiers/backend/execute-code";
import getLogger from "@zfs-tiers/backend/logger";
import { highlight, type Output } from "./output";

const logger = getLogger("zbackup:util");

export type Exec = (opts: ExecuteCodeOptions) => Promise<ExecuteCodeOutput>;

export interface CommandRunnerOptions {
  output: Output;
  dryRun?: boolean;
  // seconds, 0 = no timeout
  timeout?: number;
  exec?: Exec;
}

// Runs the external zfs tools.  Anything that changes a filesystem goes
// through run(), which only prints the command when doing a dry run;
// query() always runs, since it doesn't change anything.
export class CommandRunner {
  readonly output: Output;
  readonly dryRun: boolean;
  private timeout: number;
  private exec: Exec;

  constructor({
    output,
    dryRun = false,
    timeout = 0,
    exec,
  }: CommandRunnerOptions) {
    this.output = output;
    this.dryRun = dryRun;
    this.timeout = timeout;
    this.exec = exec ?? executeCode;
  }

  query = async (command: string, args: string[]): Promise<string> => {
    logger.debug("query:", commandLine(command, args));
    const { stdout } = await this.exec({
      command,
      args,
      timeout: this.timeout,
      verbose: true,
    });
    return stdout;
  };

  // echo: always show the command on the normal output (as --set does),
  // rather than only with --verbose
  run = async (
    command: string,
    args: string[],
    { echo = false }: { echo?: boolean } = {},
  ): Promise<void> => {
    const line = commandLine(command, args);
    if (echo) {
      this.output.info(this.dryRun ? `dry-run: ${line}` : line);
    } else {
      this.output.verbose(highlight(line));
      if (this.dryRun) {
        this.output.info(`dry-run: ${line}`);
      }
    }
    if (this.dryRun) {
      return;
    }
    logger.debug("run:", line);
    await this.exec({ command, args, timeout: this.timeout, verbose: true });
  };
}
