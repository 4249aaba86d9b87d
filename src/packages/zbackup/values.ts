/*
Typed interpretation of stored property values.

Everything zfs gives us is a string; these turn the strings into values
of the right kind, so that a malformed count is something the caller
has to deal with rather than an exception.
*/

import { NONE_VALUE } from "./config";
import type {
  CountValue,
  FlagValue,
  MalformedValue,
  ResolvedProperty,
  TargetsValue,
} from "./types";

// A property "has a value" if it is present and not explicitly "none".
export function hasValue(
  property: ResolvedProperty | undefined,
): property is ResolvedProperty {
  return property != null && property.value != NONE_VALUE;
}

export function parseCount(raw: string): CountValue | MalformedValue {
  const s = raw.trim();
  const count = /^\+?\d+$/.test(s) ? parseInt(s, 10) : NaN;
  // beyond this the count would not survive being passed on to zsnap
  if (!Number.isSafeInteger(count)) {
    return { kind: "malformed", raw, expected: "count" };
  }
  return { kind: "count", count };
}

// "host1:tank/backup,host2:tank/backup" -> two targets, in order
export function parseTargets(raw: string): TargetsValue {
  const targets = raw
    .split(",")
    .map((x) => x.trim())
    .filter((x) => x.length > 0);
  return { kind: "targets", targets };
}

export function parseFlag(raw: string): FlagValue {
  return { kind: "flag", value: raw.trim() };
}
