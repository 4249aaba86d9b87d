#!/usr/bin/env node
/*
zbackup - property driven ZFS backup, using zsnap and zreplicate.

  zbackup [options] <tier>                            back up according to properties
  zbackup --list                                      show the backup properties
  zbackup --set <filesystem> <property=value> ...     set backup properties
  zbackup --unset <filesystem> <property> ...         unset backup properties

Typically run from cron, e.g., "zbackup daily" once a day and "zbackup weekly"
once a week, with the tiers configured by properties such as

  zbackup --set tank/home daily-snapshots=7 replica=backup:tank/home replicate=daily
*/

import { Command, CommanderError, Option } from "commander";
import getLogger from "@zfs-tiers/backend/logger";
import {
  backupByProperties,
  listBackupProperties,
  setBackupProperties,
  unsetBackupProperties,
  type BackupContext,
} from "../backup";
import { DEFAULT_SNAPSHOT_PREFIX, getConfig } from "../config";
import { sendFailureEmail } from "../notify";
import { consoleOutput, type Output } from "../output";
import { ZreplicateTool } from "../replication";
import { ZsnapTool } from "../snapshots";
import { ZfsPropertyStore } from "../store";
import {
  REPLICATE_MATCHES,
  type DecideOptions,
  type ReplicateMatch,
} from "../types";
import { CommandRunner, type Exec } from "../util";

const logger = getLogger("zbackup:cli");

export type Options = {
  deleteTiers?: string;
  prefix: string;
  verbose?: boolean;
  emailOnFailure?: string;
  timeformat?: string;
  dryRun?: boolean;
  list?: boolean;
  set?: boolean;
  unset?: boolean;
  zreplicateOptions?: string;
  zsnapOptions?: string;
  replicateMatch: ReplicateMatch;
};

export type Mode =
  | { mode: "list" }
  | { mode: "set"; filesystem: string; assignments: string[] }
  | { mode: "unset"; filesystem: string; properties: string[] }
  | { mode: "backup"; tier: string };

export class UsageError extends Error {}

export function makeProgram(): Command {
  return new Command()
    .name("zbackup")
    .usage("[options] [<tier>] [<property=value>] [<property>]")
    .argument("[args...]")
    .option(
      "-d, --delete-tiers <tiers>",
      "comma-separated snapshot tiers to delete before replicating",
    )
    .option(
      "-p, --prefix <prefix>",
      "prefix to prepend to tier in snapshot names",
      DEFAULT_SNAPSHOT_PREFIX,
    )
    .option("-v, --verbose", "be verbose")
    .option(
      "-e, --email-on-failure <address>",
      "email recipient on failure",
    )
    .option(
      "-t, --timeformat <format>",
      "postfix time format to append to snapshot names (default: as per zsnap)",
    )
    .option("-n, --dry-run", "don't actually manipulate any file systems")
    .option("-l, --list", "list backup properties, do nothing else")
    .option("-s, --set", "set backup properties, do nothing else")
    .option("-u, --unset", "unset backup properties, do nothing else")
    .option("--zreplicate-options <options>", "options passed to zreplicate")
    .option("--zsnap-options <options>", "options passed to zsnap")
    .addOption(
      new Option(
        "--replicate-match <how>",
        "replicate when the replicate property names the tier, or has any value",
      )
        .choices(REPLICATE_MATCHES)
        .default("tier"),
    )
    .exitOverride();
}

export function parseMode(opts: Options, args: string[]): Mode {
  if (opts.list) {
    return { mode: "list" };
  }
  if (opts.set) {
    const [filesystem, ...assignments] = args;
    if (filesystem == null || assignments.length == 0) {
      throw new UsageError(
        "usage: zbackup --set <filesystem> <property=value> ...",
      );
    }
    return { mode: "set", filesystem, assignments };
  }
  if (opts.unset) {
    const [filesystem, ...properties] = args;
    if (filesystem == null || properties.length == 0) {
      throw new UsageError(
        "usage: zbackup --unset <filesystem> <property> ...",
      );
    }
    return { mode: "unset", filesystem, properties };
  }
  if (args.length != 1) {
    throw new UsageError("usage: zbackup <tier>");
  }
  return { mode: "backup", tier: args[0] };
}

export function decideOptions(opts: Options): DecideOptions {
  return {
    replicateMatch: opts.replicateMatch,
    deleteTiers: (opts.deleteTiers ?? "")
      .split(",")
      .map((tier) => tier.trim())
      .filter((tier) => tier.length > 0),
  };
}

export async function run(
  context: BackupContext,
  mode: Mode,
  options: DecideOptions,
): Promise<void> {
  switch (mode.mode) {
    case "list":
      await listBackupProperties(context);
      return;
    case "set":
      await setBackupProperties(context, mode.filesystem, mode.assignments);
      return;
    case "unset":
      await unsetBackupProperties(context, mode.filesystem, mode.properties);
      return;
    case "backup":
      await backupByProperties(context, mode.tier, options);
      return;
  }
}

// Returns the exit code.
export async function main(
  argv: string[] = process.argv,
  {
    output: givenOutput,
    env = process.env,
    exec,
  }: { output?: Output; env?: NodeJS.ProcessEnv; exec?: Exec } = {},
): Promise<number> {
  const program = makeProgram();
  if (givenOutput != null) {
    program.configureOutput({
      writeOut: (s) => givenOutput.info(s.trimEnd()),
      writeErr: (s) => givenOutput.warn(s.trimEnd()),
    });
  }
  try {
    program.parse(argv);
  } catch (err) {
    if (err instanceof CommanderError) {
      // commander already printed the problem (or the help)
      return err.exitCode;
    }
    throw err;
  }
  const opts = program.opts<Options>();
  const output = givenOutput ?? consoleOutput({ verbose: opts.verbose });

  let mode: Mode;
  try {
    mode = parseMode(opts, program.args);
  } catch (err) {
    if (err instanceof UsageError) {
      output.warn(err.message);
      return 1;
    }
    throw err;
  }
  logger.debug("main", { mode, opts });

  const config = getConfig(env);
  const runner = new CommandRunner({
    output,
    dryRun: opts.dryRun,
    timeout: config.execTimeout,
    exec,
  });
  const context: BackupContext = {
    store: new ZfsPropertyStore({ module: config.module, runner }),
    snapshots: new ZsnapTool(runner, {
      prefix: opts.prefix,
      verbose: opts.verbose,
      timeformat: opts.timeformat,
      zsnapOptions: opts.zsnapOptions,
    }),
    replication: new ZreplicateTool(runner, {
      verbose: opts.verbose,
      zreplicateOptions: opts.zreplicateOptions,
    }),
    output,
  };

  try {
    await run(context, mode, decideOptions(opts));
    return 0;
  } catch (err) {
    const reason = err instanceof Error ? err.message : `${err}`;
    const message = `zbackup failed with exception: ${reason}`;
    output.warn(message);
    if (opts.emailOnFailure) {
      await sendFailureEmail({
        recipient: opts.emailOnFailure,
        message,
        output,
      });
    }
    return 1;
  }
}

if (require.main === module) {
  main().then(
    (code) => process.exit(code),
    (err) => {
      console.error(err);
      process.exit(1);
    },
  );
}
