// Where the value of a property on a filesystem comes from.  zfs reports
// "inherited from <dataset>", which we collapse to just "inherited", and
// "default", "-", "temporary", etc., which are all "unset" for us.
export type Provenance = "local" | "received" | "inherited" | "unset";

export interface ResolvedProperty {
  value: string;
  source: Provenance;
}

// bare property name (no module prefix) -> value and where it came from
export interface ResolvedPropertySet {
  [name: string]: ResolvedProperty;
}

// filesystem -> its properties
export interface BackupProperties {
  [filesystem: string]: ResolvedPropertySet;
}

// One line of "zfs get -H -o name,property,value,source"
export interface PropertyRow {
  filesystem: string;
  property: string;
  value: string;
  source: string;
}

// Typed property values, one kind per class of property.
export interface CountValue {
  kind: "count";
  count: number;
}

export interface TargetsValue {
  kind: "targets";
  targets: string[];
}

export interface FlagValue {
  kind: "flag";
  value: string;
}

export interface MalformedValue {
  kind: "malformed";
  raw: string;
  expected: "count";
}

export type PropertyValue =
  | CountValue
  | TargetsValue
  | FlagValue
  | MalformedValue;

export interface MalformedProperty {
  filesystem: string;
  property: string;
  tier: string;
  value: string;
}

// How to interpret the replicate property, which is the one thing that is
// genuinely ambiguous in the policy:
//   - "tier": replicate only in the tier named by its value (replicate=daily)
//   - "any": any value of replicate enables replication in every tier
export type ReplicateMatch = "tier" | "any";

export const REPLICATE_MATCHES: readonly ReplicateMatch[] = ["tier", "any"];

export interface DecideOptions {
  replicateMatch?: ReplicateMatch;
  // tiers whose snapshots are all deleted before replicating
  deleteTiers?: string[];
}

export interface Decision {
  tier: string;
  takeSnapshot: boolean;
  // null means: neither take nor reap snapshots in this tier
  retainCount: number | null;
  replicate: boolean;
  // in the order they should be replicated to
  replicaTargets: string[];
  // reaped down to zero, in this order, before any replication
  pruneTiers: string[];
  warnings: MalformedProperty[];
}
