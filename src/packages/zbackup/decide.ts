/*
The decision engine: what to do with one filesystem in one tier.

The rules, which are all about *where* a property value came from:

- <tier>-snapshots set locally means "take a snapshot in this tier and keep
  this many".  If it was received (from replicating an upstream filesystem)
  it only says how many to keep; we never snapshot a replica.
- <tier>-snapshot-limit caps how many are kept, whatever its source, and
  always wins over <tier>-snapshots.  It never causes a snapshot.
- We replicate only if both replicate and replica are set locally, so that
  replicas don't try to replicate themselves onwards.

This is pure; see backup.ts for actually doing it.
*/

import { REPLICA_PROPERTY, REPLICATE_PROPERTY } from "./config";
import { snapshotLimitProperty, snapshotsProperty } from "./names";
import type {
  DecideOptions,
  Decision,
  MalformedProperty,
  Provenance,
  ReplicateMatch,
  ResolvedPropertySet,
} from "./types";
import { hasValue, parseCount, parseFlag, parseTargets } from "./values";

interface Count {
  count: number;
  source: Provenance;
}

export function decide(
  tier: string,
  filesystem: string,
  properties: ResolvedPropertySet,
  { replicateMatch = "tier", deleteTiers = [] }: DecideOptions = {},
): Decision {
  const warnings: MalformedProperty[] = [];

  const getCount = (
    name: string,
    sources?: Provenance[],
  ): Count | undefined => {
    const property = properties[name];
    if (!hasValue(property)) {
      return;
    }
    if (sources != null && !sources.includes(property.source)) {
      return;
    }
    const parsed = parseCount(property.value);
    if (parsed.kind == "malformed") {
      warnings.push({ filesystem, property: name, tier, value: parsed.raw });
      return;
    }
    return { count: parsed.count, source: property.source };
  };

  const snapshots = getCount(snapshotsProperty(tier), ["local", "received"]);
  const limit = getCount(snapshotLimitProperty(tier));

  const replicaTargets = replicationTargets(tier, properties, replicateMatch);
  const replicate = replicaTargets.length > 0;

  return {
    tier,
    takeSnapshot: snapshots?.source == "local",
    retainCount: limit?.count ?? snapshots?.count ?? null,
    replicate,
    replicaTargets,
    pruneTiers: replicate ? [...deleteTiers] : [],
    warnings,
  };
}

// The destinations to replicate to, in order, or [] if we shouldn't.
export function replicationTargets(
  tier: string,
  properties: ResolvedPropertySet,
  replicateMatch: ReplicateMatch = "tier",
): string[] {
  const replicate = properties[REPLICATE_PROPERTY];
  const replica = properties[REPLICA_PROPERTY];
  if (!hasValue(replicate) || !hasValue(replica)) {
    return [];
  }
  if (replicate.source != "local" || replica.source != "local") {
    return [];
  }
  if (replicateMatch == "tier" && parseFlag(replicate.value).value != tier) {
    return [];
  }
  return parseTargets(replica.value).targets;
}

export function describeMalformed({
  filesystem,
  property,
  tier,
  value,
}: MalformedProperty): string {
  return `badly formed ${property}=${value} property for ${filesystem} in tier ${tier} (should be a non-negative integer)`;
}
