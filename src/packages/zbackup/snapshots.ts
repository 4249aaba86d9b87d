/*
Create and reap snapshots of a tier, using zsnap.

zsnap names snapshots "<prefix><timestamp>" and, after optionally making a
new one, destroys all but the newest <keep> snapshots with that prefix.
*/

import { split } from "@zfs-tiers/util/misc";
import { DEFAULT_SNAPSHOT_PREFIX } from "./config";
import type { CommandRunner } from "./util";

export interface SnapshotTool {
  createOrReap(
    tier: string,
    filesystem: string,
    takeSnapshot: boolean,
    keep: number,
  ): Promise<void>;
}

export interface ZsnapOptions {
  // prepended to the tier to get the snapshot name prefix
  prefix?: string;
  verbose?: boolean;
  timeformat?: string;
  // extra options passed to zsnap, as one whitespace separated string
  zsnapOptions?: string;
}

export function zsnapArgs(
  tier: string,
  filesystem: string,
  takeSnapshot: boolean,
  keep: number,
  {
    prefix = DEFAULT_SNAPSHOT_PREFIX,
    verbose,
    timeformat,
    zsnapOptions,
  }: ZsnapOptions = {},
): string[] {
  const args = ["-k", `${keep}`, "-p", `${prefix}${tier}-`];
  if (!takeSnapshot) {
    args.push("--nosnapshot");
  }
  if (verbose) {
    args.push("-v");
  }
  if (timeformat) {
    args.push("-t", timeformat);
  }
  if (zsnapOptions) {
    args.push(...split(zsnapOptions));
  }
  args.push(filesystem);
  return args;
}

export class ZsnapTool implements SnapshotTool {
  private runner: CommandRunner;
  private options: ZsnapOptions;

  constructor(runner: CommandRunner, options: ZsnapOptions = {}) {
    this.runner = runner;
    this.options = options;
  }

  createOrReap = async (
    tier: string,
    filesystem: string,
    takeSnapshot: boolean,
    keep: number,
  ) => {
    await this.runner.run(
      "zsnap",
      zsnapArgs(tier, filesystem, takeSnapshot, keep, this.options),
    );
  };
}
