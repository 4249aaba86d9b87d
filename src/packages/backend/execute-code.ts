/*
 *  This file is part of CoCalc: Copyright © 2020–2024 Sagemath, Inc.
 *  License: MS-RSL – see LICENSE.md for details
 */

// Execute a command in a subprocess and wait for it to finish.

import { spawn, type ChildProcessWithoutNullStreams } from "node:child_process";
import shellEscape from "shell-escape";
import getLogger from "./logger";
import { trunc } from "@zfs-tiers/util/misc";

const log = getLogger("execute-code");

export interface ExecuteCodeOptions {
  command: string;
  args?: string[];
  // timeout in seconds; 0 or undefined means wait forever
  timeout?: number;
  verbose?: boolean;
}

export interface ExecuteCodeOutput {
  stdout: string;
  stderr: string;
  exit_code: number;
}

// The command line as a user would type it into a shell.
export function commandLine(command: string, args: string[] = []): string {
  return shellEscape([command, ...args]);
}

export async function executeCode(
  opts: ExecuteCodeOptions,
): Promise<ExecuteCodeOutput> {
  const { command, args = [], timeout, verbose = false } = opts;
  const cmd = commandLine(command, args);
  if (verbose) {
    log.debug(`input: ${cmd}`);
  }
  const start = Date.now();

  return await new Promise<ExecuteCodeOutput>((resolve, reject) => {
    let child: ChildProcessWithoutNullStreams;
    try {
      child = spawn(command, args);
    } catch (err) {
      // spawn can throw synchronously, e.g., "Error: spawn ENOMEM"
      reject(new Error(`command '${cmd}' was not able to run -- ${err}`));
      return;
    }

    let stdout = "";
    let stderr = "";
    let done = false;
    let timer: NodeJS.Timeout | undefined = undefined;

    const finish = (err: Error | undefined, exit_code: number) => {
      if (done) return;
      done = true;
      if (timer != null) {
        clearTimeout(timer);
        timer = undefined;
      }
      if (verbose && log.isEnabled("debug")) {
        log.debug("exec", command, "took", Date.now() - start, "milliseconds");
        log.debug({
          stdout: trunc(stdout, 512),
          stderr: trunc(stderr, 512),
          exit_code,
        });
      }
      if (err) {
        reject(err);
      } else if (exit_code != 0) {
        reject(
          new Error(
            `command '${cmd}' exited with nonzero code ${exit_code} -- stderr='${trunc(stderr, 1024)}'`,
          ),
        );
      } else {
        resolve({ stdout, stderr, exit_code });
      }
    };

    child.stdout.on("data", (data: Buffer) => {
      stdout += data.toString();
    });
    child.stderr.on("data", (data: Buffer) => {
      stderr += data.toString();
    });

    // "close" fires after the stdio streams are done, so output is complete
    child.on("close", (code, signal) => {
      if (signal != null) {
        finish(
          new Error(`command '${cmd}' was killed by signal ${signal}`),
          1,
        );
      } else {
        finish(undefined, code ?? 1);
      }
    });

    // e.g., ENOENT when the executable does not exist
    child.on("error", (err) => {
      finish(
        new Error(
          `command '${cmd}' was not able to run -- ${err.message} stderr='${trunc(stderr, 1024)}'`,
        ),
        1,
      );
    });

    if (timeout) {
      timer = setTimeout(() => {
        if (verbose) {
          log.debug(
            "subprocess did not exit after",
            timeout,
            "seconds, so killing with SIGKILL",
          );
        }
        child.kill("SIGKILL");
        finish(
          new Error(`killed command '${cmd}' after ${timeout} seconds`),
          1,
        );
      }, timeout * 1000);
    }
  });
}
