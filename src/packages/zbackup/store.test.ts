import { MemoryOutput } from "./output";
import { parsePropertyRow, ZfsPropertyStore } from "./store";
import { fakeExec, MODULE } from "./test/fakes";
import { CommandRunner } from "./util";

function makeStore(responses: { [key: string]: string }, dryRun = false) {
  const { exec, calls } = fakeExec(responses);
  const output = new MemoryOutput();
  const runner = new CommandRunner({ output, dryRun, exec });
  const store = new ZfsPropertyStore({ module: MODULE, runner });
  return { store, calls, output };
}

describe("parsing zfs get output", () => {
  it("splits on tabs", () => {
    expect(
      parsePropertyRow(
        "tank/a\torg.example.zbackup:replica\thost:tank/a\tinherited from tank",
      ),
    ).toEqual({
      filesystem: "tank/a",
      property: "org.example.zbackup:replica",
      value: "host:tank/a",
      source: "inherited from tank",
    });
  });

  it("rejects lines that aren't four columns", () => {
    expect(() => parsePropertyRow("tank/a replica x local")).toThrow(
      "unexpected output from zfs get",
    );
  });
});

describe("the zfs property store", () => {
  it("lists pools", async () => {
    const { store, calls } = makeStore({ "zpool list": "tank\nbackup\n" });
    expect(await store.pools()).toEqual(["tank", "backup"]);
    expect(calls).toEqual([["zpool", "list", "-H", "-o", "name"]]);
  });

  it("queries prefixed properties recursively", async () => {
    const { store, calls } = makeStore({
      "zfs get":
        "tank\torg.example.zbackup:replica\t-\t-\n" +
        "tank/a\torg.example.zbackup:replica\tbackup/a\tlocal\n",
    });
    const rows = await store.query("tank", ["replica", "daily-snapshots"]);
    expect(calls[0]).toEqual([
      "zfs",
      "get",
      "-H",
      "-r",
      "-t",
      "filesystem",
      "-o",
      "name,property,value,source",
      "org.example.zbackup:replica,org.example.zbackup:daily-snapshots",
      "tank",
    ]);
    expect(rows).toHaveLength(2);
    expect(rows[1].value).toBe("backup/a");
  });

  it("queries all properties", async () => {
    const { store, calls } = makeStore({});
    expect(await store.query("tank", "all")).toEqual([]);
    expect(calls[0][8]).toBe("all");
  });

  it("sets and unsets prefixed properties, echoing the commands", async () => {
    const { store, calls, output } = makeStore({});
    await store.set("tank/a", "daily-snapshots", "7");
    await store.unset("tank/a", "replica");
    expect(calls).toEqual([
      ["zfs", "set", "org.example.zbackup:daily-snapshots=7", "tank/a"],
      ["zfs", "inherit", "org.example.zbackup:replica", "tank/a"],
    ]);
    expect(output.get("info")).toEqual([
      "zfs set 'org.example.zbackup:daily-snapshots=7' tank/a",
      "zfs inherit 'org.example.zbackup:replica' tank/a",
    ]);
  });

  it("only prints changes in a dry run", async () => {
    const { store, calls, output } = makeStore({}, true);
    await store.set("tank/a", "daily-snapshots", "7");
    expect(calls).toEqual([]);
    expect(output.get("info")).toEqual([
      "dry-run: zfs set 'org.example.zbackup:daily-snapshots=7' tank/a",
    ]);
  });
});
