/*
Replicate a filesystem's snapshots to another pool or host, using zreplicate.
*/

import { split } from "@zfs-tiers/util/misc";
import type { CommandRunner } from "./util";

export interface ReplicationTool {
  replicate(filesystem: string, destination: string): Promise<void>;
}

export interface ZreplicateOptions {
  verbose?: boolean;
  // extra options passed to zreplicate, as one whitespace separated string
  zreplicateOptions?: string;
}

export function zreplicateArgs(
  filesystem: string,
  destination: string,
  { verbose, zreplicateOptions }: ZreplicateOptions = {},
): string[] {
  // The destination is created if it doesn't exist.  We never send a
  // replication stream (-R): each filesystem is replicated on its own,
  // according to its own properties.
  const args = ["--create-destination", "--no-replication-stream"];
  if (verbose) {
    args.push("-v");
  }
  if (zreplicateOptions) {
    args.push(...split(zreplicateOptions));
  }
  args.push(filesystem, destination);
  return args;
}

export class ZreplicateTool implements ReplicationTool {
  private runner: CommandRunner;
  private options: ZreplicateOptions;

  constructor(runner: CommandRunner, options: ZreplicateOptions = {}) {
    this.runner = runner;
    this.options = options;
  }

  replicate = async (filesystem: string, destination: string) => {
    await this.runner.run(
      "zreplicate",
      zreplicateArgs(filesystem, destination, this.options),
    );
  };
}
