import { envToInt } from "@zfs-tiers/backend/misc/env-to-number";

// ZFS user property module prefix.  All of our properties are named
// "<module>:<name>", so they never collide with anything else.  This is
// what is stored on existing filesystems, so don't change it lightly.
export const DEFAULT_MODULE = "com.github.tesujimath.zbackup";

// Bare property names
export const REPLICA_PROPERTY = "replica";
export const REPLICATE_PROPERTY = "replicate";
export const SNAPSHOTS_PROPERTY_SUFFIX = "-snapshots";
export const SNAPSHOT_LIMIT_PROPERTY_SUFFIX = "-snapshot-limit";

// What zfs get reports for a property that has no value at all.
export const UNSET_SENTINEL = "-";
// A property explicitly set to this is treated as not set.
export const NONE_VALUE = "none";

// prefix prepended to the tier in snapshot names, e.g., "auto-daily-..."
export const DEFAULT_SNAPSHOT_PREFIX = "auto-";

export interface Config {
  module: string;
  // seconds; 0 means external commands may run forever
  execTimeout: number;
}

export function getConfig(env: NodeJS.ProcessEnv = process.env): Config {
  return {
    module: env.ZBACKUP_MODULE || DEFAULT_MODULE,
    execTimeout: envToInt("ZBACKUP_EXEC_TIMEOUT_S", 0, env),
  };
}
