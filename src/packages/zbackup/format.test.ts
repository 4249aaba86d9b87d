import { formatBackupLine, formatBackupProperties } from "./format";
import type { ResolvedPropertySet } from "./types";

describe("formatting the effective policy", () => {
  it("sorts names and puts replication last", () => {
    const properties: ResolvedPropertySet = {
      replicate: { value: "daily", source: "local" },
      "weekly-snapshots": { value: "4", source: "local" },
      replica: { value: "backup/pool", source: "local" },
      "daily-snapshots": { value: "7", source: "local" },
    };
    expect(formatBackupProperties(properties)).toEqual([
      "daily-snapshots=7",
      "weekly-snapshots=4",
      "replica=backup/pool",
      "replicate=daily",
    ]);
  });

  it("shows a received count as the effective limit", () => {
    expect(
      formatBackupProperties({
        "daily-snapshots": { value: "7", source: "received" },
      }),
    ).toEqual(["daily-snapshot-limit=7"]);
  });

  it("keeps a local limit over a non-local default", () => {
    expect(
      formatBackupProperties({
        "daily-snapshots": { value: "7", source: "received" },
        "daily-snapshot-limit": { value: "3", source: "local" },
      }),
    ).toEqual(["daily-snapshot-limit=3"]);
  });

  it("prefers a non-local limit over a non-local count", () => {
    expect(
      formatBackupProperties({
        "daily-snapshots": { value: "7", source: "received" },
        "daily-snapshot-limit": { value: "3", source: "inherited" },
      }),
    ).toEqual(["daily-snapshot-limit=3"]);
  });

  it("shows local counts next to the default limit", () => {
    expect(
      formatBackupProperties({
        "daily-snapshots": { value: "7", source: "local" },
        "daily-snapshot-limit": { value: "30", source: "inherited" },
      }),
    ).toEqual(["daily-snapshot-limit=30", "daily-snapshots=7"]);
  });

  it("does not show non-local replication properties", () => {
    expect(
      formatBackupProperties({
        replica: { value: "backup/pool", source: "received" },
        replicate: { value: "daily", source: "inherited" },
        "hourly-snapshots": { value: "24", source: "local" },
      }),
    ).toEqual(["hourly-snapshots=24"]);
  });

  it("is unchanged by merging in nothing", () => {
    const properties: ResolvedPropertySet = {
      "weekly-snapshot-limit": { value: "8", source: "local" },
      replica: { value: "b", source: "local" },
      "daily-snapshots": { value: "7", source: "local" },
    };
    expect(formatBackupProperties({ ...properties })).toEqual(
      formatBackupProperties(properties),
    );
    expect(formatBackupProperties(properties)).toEqual([
      "daily-snapshots=7",
      "weekly-snapshot-limit=8",
      "replica=b",
    ]);
  });

  it("formats a whole line", () => {
    expect(
      formatBackupLine("tank/home", {
        replicate: { value: "daily", source: "local" },
        "daily-snapshots": { value: "7", source: "local" },
      }),
    ).toBe("tank/home daily-snapshots=7 replicate=daily");
  });
});
