import {
  REPLICA_PROPERTY,
  REPLICATE_PROPERTY,
  SNAPSHOT_LIMIT_PROPERTY_SUFFIX,
  SNAPSHOTS_PROPERTY_SUFFIX,
} from "./config";
import type { Provenance } from "./types";

// "<module>:<property>", which is what zfs actually stores
export function zprefixed(module: string, property: string): string {
  return `${module}:${property}`;
}

export function isZprefixed(module: string, property: string): boolean {
  return property.startsWith(`${module}:`);
}

export function zunprefixed(module: string, property: string): string {
  return property.slice(module.length + 1);
}

export function snapshotsProperty(tier: string): string {
  return `${tier}${SNAPSHOTS_PROPERTY_SUFFIX}`;
}

export function snapshotLimitProperty(tier: string): string {
  return `${tier}${SNAPSHOT_LIMIT_PROPERTY_SUFFIX}`;
}

// The bare names of everything that matters for a backup in the given tier.
export function backupProperties(tier: string): string[] {
  return [
    REPLICA_PROPERTY,
    REPLICATE_PROPERTY,
    snapshotsProperty(tier),
    snapshotLimitProperty(tier),
  ];
}

export function isReplicationProperty(name: string): boolean {
  return name == REPLICA_PROPERTY || name == REPLICATE_PROPERTY;
}

// If name is "<tier>-snapshots" or "<tier>-snapshot-limit", return the tier.
export function tierOfProperty(name: string): string | undefined {
  for (const suffix of [
    SNAPSHOT_LIMIT_PROPERTY_SUFFIX,
    SNAPSHOTS_PROPERTY_SUFFIX,
  ]) {
    if (name.endsWith(suffix) && name.length > suffix.length) {
      return name.slice(0, -suffix.length);
    }
  }
  return undefined;
}

export function isSnapshotLimitProperty(name: string): boolean {
  return (
    name.endsWith(SNAPSHOT_LIMIT_PROPERTY_SUFFIX) &&
    name.length > SNAPSHOT_LIMIT_PROPERTY_SUFFIX.length
  );
}

// zfs reports "inherited from tank/home" etc.
export function normalizeSource(source: string): Provenance {
  if (source == "local" || source == "received") {
    return source;
  }
  if (source.startsWith("inherited")) {
    return "inherited";
  }
  return "unset";
}
