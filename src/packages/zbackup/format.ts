/*
Format backup properties to show what zbackup will actually do.

A replica typically has no local <tier>-snapshot-limit, but it still gets
reaped to whatever limit or count it received or inherited (see decide.ts),
so we show that as its effective snapshot-limit.
*/

import { partition, sortBy } from "lodash";
import {
  isReplicationProperty,
  isSnapshotLimitProperty,
  snapshotLimitProperty,
  tierOfProperty,
} from "./names";
import type { ResolvedPropertySet } from "./types";

export function formatBackupProperties(
  properties: ResolvedPropertySet,
): string[] {
  const present = Object.keys(properties).filter(
    (name) => properties[name].source != "unset",
  );
  const [local, nonLocal] = partition(
    present,
    (name) => properties[name].source == "local",
  );
  const localAndDefaults: ResolvedPropertySet = {};
  for (const name of local) {
    localAndDefaults[name] = properties[name];
  }
  // a non-local limit is what would be applied, so it takes precedence over
  // a non-local count for the same tier
  for (const name of sortBy(nonLocal, (name) =>
    isSnapshotLimitProperty(name) ? 0 : 1,
  )) {
    const tier = tierOfProperty(name);
    if (tier == null) {
      continue;
    }
    const limit = snapshotLimitProperty(tier);
    if (localAndDefaults[limit] == null) {
      localAndDefaults[limit] = properties[name];
    }
  }

  const names = Object.keys(localAndDefaults).sort();
  return [
    ...names.filter((name) => !isReplicationProperty(name)),
    ...names.filter(isReplicationProperty),
  ].map((name) => `${name}=${localAndDefaults[name].value}`);
}

export function formatBackupLine(
  filesystem: string,
  properties: ResolvedPropertySet,
): string {
  return [filesystem, ...formatBackupProperties(properties)].join(" ");
}
