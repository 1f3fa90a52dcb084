import { describe, expect, it } from "vitest";
import { ProcessWatcher } from "../src/process/watcher.js";
import type { ProcessInfo, ProcessTable } from "../src/process/types.js";
import { findOtherInstance } from "../src/utils/system.js";

class FakeProcessTable implements ProcessTable {
  processes: ProcessInfo[] = [];
  created = new Map<number, number>();
  killed: number[] = [];
  listCalls = 0;
  failKill = new Set<number>();

  async list(): Promise<ProcessInfo[]> {
    this.listCalls++;
    return [...this.processes];
  }

  async creationTimes(pids: number[]): Promise<Map<number, number>> {
    const result = new Map<number, number>();
    for (const pid of pids) {
      const created = this.created.get(pid);
      if (created !== undefined) result.set(pid, created);
    }
    return result;
  }

  async kill(pid: number): Promise<void> {
    if (this.failKill.has(pid)) throw new Error("EPERM");
    this.killed.push(pid);
    this.processes = this.processes.filter(p => p.pid !== pid);
  }
}

function fakeClock(monotonic: number, wall: number) {
  const clock = {
    mono: monotonic,
    wallMs: wall,
    monotonic: () => clock.mono,
    wall: () => clock.wallMs,
  };
  return clock;
}

describe("ProcessWatcher", () => {
  it("matches process names case-insensitively by substring", async () => {
    const table = new FakeProcessTable();
    table.processes = [{ pid: 10, name: "RobloxPlayerBeta" }];
    const watcher = new ProcessWatcher(table, { processNames: ["roblox"], cacheMs: 0 });

    expect(watcher.matches("org.vinegarhq.Sober")).toBe(false);
    expect(await watcher.isRunning()).toBe(true);

    table.processes = [{ pid: 11, name: "bash" }];
    expect(await watcher.isRunning()).toBe(false);
  });

  it("reuses a recent answer within the cache window", async () => {
    const table = new FakeProcessTable();
    table.processes = [{ pid: 10, name: "sober" }];
    const clock = fakeClock(1000, 1_700_000_000_000);
    const watcher = new ProcessWatcher(table, { processNames: ["sober"], cacheMs: 1000, clock });

    expect(await watcher.isRunning()).toBe(true);
    table.processes = [];
    clock.mono += 500;
    expect(await watcher.isRunning()).toBe(true);
    expect(table.listCalls).toBe(1);

    clock.mono += 600;
    expect(await watcher.isRunning()).toBe(false);
    expect(table.listCalls).toBe(2);
  });

  it("estimates the session start from the earliest matching process", async () => {
    const table = new FakeProcessTable();
    table.processes = [
      { pid: 1, name: "sober" },
      { pid: 2, name: "sober" },
      { pid: 3, name: "other" },
    ];
    table.created.set(1, 1_000_000 - 30_000);
    table.created.set(2, 1_000_000 - 10_000);
    table.created.set(3, 1_000_000 - 90_000);
    const clock = fakeClock(50_000, 1_000_000);
    const watcher = new ProcessWatcher(table, { processNames: ["sober"], clock });

    expect(await watcher.sessionStartEstimate()).toBe(20_000);
  });

  it("caps an estimate that lies in the future", async () => {
    const table = new FakeProcessTable();
    table.processes = [{ pid: 1, name: "sober" }];
    table.created.set(1, 1_005_000);
    const watcher = new ProcessWatcher(table, { processNames: ["sober"], clock: fakeClock(50_000, 1_000_000) });

    expect(await watcher.sessionStartEstimate()).toBe(50_000);
  });

  it("returns no estimate when start times are unavailable", async () => {
    const table = new FakeProcessTable();
    table.processes = [{ pid: 1, name: "sober" }];
    const watcher = new ProcessWatcher(table, { processNames: ["sober"] });

    expect(await watcher.sessionStartEstimate()).toBeNull();
  });

  it("kills every matching process and counts the successes", async () => {
    const table = new FakeProcessTable();
    table.processes = [
      { pid: 1, name: "sober" },
      { pid: 2, name: "Sober-helper" },
      { pid: 3, name: "bash" },
    ];
    table.failKill.add(2);
    const watcher = new ProcessWatcher(table, { processNames: ["sober"] });

    expect(await watcher.killAll()).toBe(1);
    expect(table.killed).toEqual([1]);
  });

  it("re-reads the table after a kill", async () => {
    const table = new FakeProcessTable();
    table.processes = [{ pid: 1, name: "sober" }];
    const watcher = new ProcessWatcher(table, { processNames: ["sober"], cacheMs: 60_000 });

    expect(await watcher.isRunning()).toBe(true);
    await watcher.killAll();
    expect(await watcher.isRunning()).toBe(false);
  });
});

describe("findOtherInstance", () => {
  it("finds another process running the same script", async () => {
    const table = new FakeProcessTable();
    table.processes = [
      { pid: 100, name: "node", cmd: "node /opt/monitor/dist/index.js" },
      { pid: 200, name: "node", cmd: "node /opt/monitor/dist/index.js" },
      { pid: 300, name: "node", cmd: "node /opt/monitor/dist/index.js" },
    ];

    const other = await findOtherInstance(table, "/opt/monitor/dist/index.js", { pid: 100, ppid: 200 });
    expect(other?.pid).toBe(300);
  });

  it("ignores processes without a command line or running something else", async () => {
    const table = new FakeProcessTable();
    table.processes = [
      { pid: 2, name: "node" },
      { pid: 3, name: "node", cmd: "node /opt/other/index.js" },
    ];

    expect(await findOtherInstance(table, "/opt/monitor/dist/index.js", { pid: 1, ppid: 0 })).toBeNull();
  });
});
