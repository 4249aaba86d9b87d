/*
Carry out backups according to the properties of every filesystem in every
pool, and the simple property listing and editing commands.

Everything is done one filesystem at a time and the first error aborts the
whole run.
*/

import getLogger from "@zfs-tiers/backend/logger";
import { decide, describeMalformed } from "./decide";
import { formatBackupLine } from "./format";
import type { Output } from "./output";
import { readBackupProperties } from "./properties";
import type { ReplicationTool } from "./replication";
import type { SnapshotTool } from "./snapshots";
import type { PropertyStore } from "./store";
import type { DecideOptions, Decision } from "./types";

const logger = getLogger("zbackup:backup");

export interface BackupContext {
  store: PropertyStore;
  snapshots: SnapshotTool;
  replication: ReplicationTool;
  output: Output;
}

export async function applyDecision(
  { snapshots, replication, output }: BackupContext,
  filesystem: string,
  decision: Decision,
): Promise<void> {
  for (const warning of decision.warnings) {
    output.warn(describeMalformed(warning));
  }
  if (decision.retainCount != null) {
    await snapshots.createOrReap(
      decision.tier,
      filesystem,
      decision.takeSnapshot,
      decision.retainCount,
    );
  }
  if (!decision.replicate) {
    return;
  }
  // delete snapshots of other tiers first, so we don't ship them
  for (const tier of decision.pruneTiers) {
    await snapshots.createOrReap(tier, filesystem, false, 0);
  }
  for (const destination of decision.replicaTargets) {
    await replication.replicate(filesystem, destination);
  }
}

export async function backupByProperties(
  context: BackupContext,
  tier: string,
  options: DecideOptions = {},
): Promise<void> {
  const { store, output } = context;
  for (const pool of await store.pools()) {
    const properties = await readBackupProperties(store, pool, {
      tier,
      output,
    });
    for (const filesystem of Object.keys(properties).sort()) {
      const decision = decide(
        tier,
        filesystem,
        properties[filesystem],
        options,
      );
      logger.debug("backupByProperties", filesystem, decision);
      await applyDecision(context, filesystem, decision);
    }
  }
}

export async function listBackupProperties({
  store,
  output,
}: Pick<BackupContext, "store" | "output">): Promise<void> {
  for (const pool of await store.pools()) {
    const properties = await readBackupProperties(store, pool, {
      includeInherited: true,
    });
    for (const filesystem of Object.keys(properties).sort()) {
      output.info(formatBackupLine(filesystem, properties[filesystem]));
    }
  }
}

// "daily-snapshots=7" -> { property: "daily-snapshots", value: "7" }
export function parseAssignment(
  arg: string,
): { property: string; value: string } | undefined {
  const v = arg.split("=");
  if (v.length != 2 || !v[0]) {
    return undefined;
  }
  return { property: v[0], value: v[1] };
}

export async function setBackupProperties(
  { store, output }: Pick<BackupContext, "store" | "output">,
  filesystem: string,
  assignments: string[],
): Promise<void> {
  for (const arg of assignments) {
    const assignment = parseAssignment(arg);
    if (assignment == null) {
      output.warn(`ignoring badly formatted property=value: ${arg}`);
      continue;
    }
    await store.set(filesystem, assignment.property, assignment.value);
  }
}

export async function unsetBackupProperties(
  { store }: Pick<BackupContext, "store">,
  filesystem: string,
  properties: string[],
): Promise<void> {
  for (const property of properties) {
    await store.unset(filesystem, property);
  }
}
