import { MemoryOutput } from "./output";
import { readBackupProperties, resolveBackupProperties } from "./properties";
import { FakePropertyStore, MODULE, row } from "./test/fakes";

describe("resolving properties", () => {
  it("keeps local and received, drops inherited and unset", () => {
    const rows = [
      row("tank/a", "daily-snapshots", "7", "local"),
      row("tank/a", "replica", "backup/a", "received"),
      row("tank/a/b", "daily-snapshots", "7", "inherited from tank/a"),
      row("tank/c", "replicate", "-", "-"),
      row("tank/c", "weekly-snapshots", "4", "default"),
    ];
    expect(resolveBackupProperties(rows, { module: MODULE })).toEqual({
      "tank/a": {
        "daily-snapshots": { value: "7", source: "local" },
        replica: { value: "backup/a", source: "received" },
      },
    });
  });

  it("never keeps the unset sentinel, even when locally set", () => {
    const rows = [row("tank/a", "daily-snapshots", "-", "local")];
    expect(
      resolveBackupProperties(rows, { module: MODULE, includeInherited: true }),
    ).toEqual({});
  });

  it("ignores properties of other modules", () => {
    const rows = [
      {
        filesystem: "tank/a",
        property: "compression",
        value: "lz4",
        source: "local",
      },
      {
        filesystem: "tank/a",
        property: "org.example.other:daily-snapshots",
        value: "7",
        source: "local",
      },
    ];
    expect(resolveBackupProperties(rows, { module: MODULE })).toEqual({});
  });

  it("keeps inherited values for display", () => {
    const rows = [
      row("tank/a/b", "daily-snapshots", "7", "inherited from tank/a"),
    ];
    expect(
      resolveBackupProperties(rows, { module: MODULE, includeInherited: true }),
    ).toEqual({
      "tank/a/b": { "daily-snapshots": { value: "7", source: "inherited" } },
    });
  });

  it("drops an inherited snapshot-limit when reading a tier", () => {
    const rows = [
      row("backup/a", "daily-snapshots", "7", "received"),
      row("backup/a", "daily-snapshot-limit", "3", "inherited from backup"),
      row("backup/b", "daily-snapshot-limit", "3", "inherited from backup"),
    ];
    expect(
      resolveBackupProperties(rows, { module: MODULE, tier: "daily" }),
    ).toEqual({
      "backup/a": {
        "daily-snapshots": { value: "7", source: "received" },
      },
    });
  });

  it("reports what it keeps on the verbose output", () => {
    const output = new MemoryOutput();
    resolveBackupProperties(
      [row("tank/a", "daily-snapshots", "7", "local")],
      { module: MODULE, output },
    );
    expect(output.get("verbose")).toEqual(["tank/a daily-snapshots=7 local"]);
  });
});

describe("reading properties from the store", () => {
  const store = new FakePropertyStore({
    tank: [
      row("tank/a", "daily-snapshots", "7", "local"),
      row("tank/a", "weekly-snapshots", "4", "local"),
    ],
  });

  it("queries only the tier's properties", async () => {
    const properties = await readBackupProperties(store, "tank", {
      tier: "daily",
    });
    expect(store.calls).toContain(
      "query tank replica,replicate,daily-snapshots,daily-snapshot-limit",
    );
    expect(properties).toEqual({
      "tank/a": { "daily-snapshots": { value: "7", source: "local" } },
    });
  });

  it("queries everything without a tier", async () => {
    const properties = await readBackupProperties(store, "tank");
    expect(store.calls).toContain("query tank all");
    expect(Object.keys(properties["tank/a"])).toEqual([
      "daily-snapshots",
      "weekly-snapshots",
    ]);
  });

  it("propagates a failing store", async () => {
    const failing = new FakePropertyStore({});
    failing.query = async () => {
      throw Error("zfs get failed");
    };
    await expect(readBackupProperties(failing, "tank")).rejects.toThrow(
      "zfs get failed",
    );
  });
});
