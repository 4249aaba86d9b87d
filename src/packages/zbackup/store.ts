/*
The property store: ZFS user properties, via zpool and zfs.
*/

import { splitlines } from "@zfs-tiers/util/misc";
import { zprefixed } from "./names";
import type { PropertyRow } from "./types";
import type { CommandRunner } from "./util";

export interface PropertyStore {
  // the module prefix of all our properties
  readonly module: string;
  pools(): Promise<string[]>;
  // rows for all filesystems in the pool (recursively), for the given bare
  // property names or for every property; the rows have prefixed names
  query(pool: string, properties: string[] | "all"): Promise<PropertyRow[]>;
  set(filesystem: string, property: string, value: string): Promise<void>;
  unset(filesystem: string, property: string): Promise<void>;
}

export function parsePropertyRow(line: string): PropertyRow {
  const v = line.split("\t");
  if (v.length != 4) {
    throw Error(`unexpected output from zfs get: '${line}'`);
  }
  const [filesystem, property, value, source] = v;
  return { filesystem, property, value, source };
}

export class ZfsPropertyStore implements PropertyStore {
  readonly module: string;
  private runner: CommandRunner;

  constructor({ module, runner }: { module: string; runner: CommandRunner }) {
    this.module = module;
    this.runner = runner;
  }

  pools = async (): Promise<string[]> => {
    const stdout = await this.runner.query("zpool", [
      "list",
      "-H",
      "-o",
      "name",
    ]);
    return splitlines(stdout).map((line) => line.trim());
  };

  query = async (
    pool: string,
    properties: string[] | "all",
  ): Promise<PropertyRow[]> => {
    const stdout = await this.runner.query("zfs", [
      "get",
      "-H",
      "-r",
      "-t",
      "filesystem",
      "-o",
      "name,property,value,source",
      properties == "all"
        ? "all"
        : properties.map((name) => zprefixed(this.module, name)).join(","),
      pool,
    ]);
    return splitlines(stdout).map(parsePropertyRow);
  };

  set = async (filesystem: string, property: string, value: string) => {
    await this.runner.run(
      "zfs",
      ["set", `${zprefixed(this.module, property)}=${value}`, filesystem],
      { echo: true },
    );
  };

  // "zfs inherit" is how you remove a locally set property
  unset = async (filesystem: string, property: string) => {
    await this.runner.run(
      "zfs",
      ["inherit", zprefixed(this.module, property), filesystem],
      { echo: true },
    );
  };
}
