import { describe, it, expect } from "vitest";
import { CapabilityUnavailableError } from "../src/core/errors.js";
import { parseRequirement } from "../src/resources/requirement.js";
import { NETWORK_FAILED, ResourceManager, SUFFICIENT, type ResourceManagerOptions } from "../src/resources/resourceManager.js";
import { FakeProbe, FakeRuntime } from "./fakes.js";

async function makeManager(overrides: Partial<ResourceManagerOptions> = {}) {
  const probe = new FakeProbe();
  const runtime = new FakeRuntime();
  const clock = { t: 1000 };
  const manager = await ResourceManager.create({
    probe,
    runtime,
    maxMemoryMb: 16384,
    maxCpu: 8,
    workDir: "/work",
    networkProbe: { host: "192.0.2.1", timeoutMs: 500 },
    now: () => clock.t,
    ...overrides
  });
  return { manager, probe, runtime, clock };
}

describe("ResourceManager.checkResources", () => {
  it("admits a small plugin and skips the network probe when not required", async () => {
    const { manager, probe } = await makeManager();
    const verdict = await manager.checkResources(parseRequirement({ memory: "10MB", cpu: 0.1, disk: "1MB", network: false }));
    expect(verdict).toEqual({ admitted: true, reason: SUFFICIENT });
    expect(probe.calls).toEqual(["memory", "cpu", "disk"]);
  });

  it("denies on memory and stops at the first failing dimension", async () => {
    const { manager, probe } = await makeManager();
    probe.reachable = false;
    const verdict = await manager.checkResources(parseRequirement({ memory: "100GB", network: true }));
    expect(verdict).toEqual({
      admitted: false,
      reason: "Not enough memory. Required: 102400MB, Available: 4096.0MB"
    });
    expect(probe.calls).toEqual(["memory"]);
  });

  it("compares memory against the live reading, not the configured ceiling", async () => {
    const { manager, probe } = await makeManager({ maxMemoryMb: 4096 });
    probe.memoryReading = { ...probe.memoryReading, totalMb: 65536, availableMb: 32768 };
    const verdict = await manager.checkResources(parseRequirement({ memory: "5G", cpu: 0.1 }));
    expect(verdict).toEqual({ admitted: true, reason: SUFFICIENT });
    expect(manager.maxMemoryMb).toBe(4096);
  });

  it("derives available CPU from the busy percentage", async () => {
    const { manager, probe } = await makeManager();
    probe.cpuReading = { cores: 4, percent: 75 };
    const verdict = await manager.checkResources(parseRequirement({ memory: "10MB", cpu: 2 }));
    expect(verdict).toEqual({ admitted: false, reason: "Not enough CPU. Required: 2 cores, Available: 1.0 cores" });
  });

  it("compares CPU against the live reading, not maxCpu", async () => {
    const { manager, probe } = await makeManager({ maxCpu: 1 });
    probe.cpuReading = { cores: 16, percent: 0 };
    const verdict = await manager.checkResources(parseRequirement({ memory: "10MB", cpu: 1.5 }));
    expect(verdict).toEqual({ admitted: true, reason: SUFFICIENT });
  });

  it("checks disk only when the requirement asks for some", async () => {
    const { manager, probe } = await makeManager();
    probe.diskReading = { ...probe.diskReading, freeMb: 5 };

    const denied = await manager.checkResources(parseRequirement({ memory: "10MB", cpu: 0.1, disk: "10MB" }));
    expect(denied).toEqual({ admitted: false, reason: "Not enough disk space. Required: 10MB, Available: 5.0MB" });

    probe.calls.length = 0;
    const admitted = await manager.checkResources(parseRequirement({ memory: "10MB", cpu: 0.1, disk: 0 }));
    expect(admitted.admitted).toBe(true);
    expect(probe.calls).toEqual(["memory", "cpu"]);
  });

  it("denies when the network probe fails", async () => {
    const { manager, probe } = await makeManager();
    probe.reachable = false;
    const verdict = await manager.checkResources(parseRequirement({ memory: "10MB", cpu: 0.1, network: true }));
    expect(verdict).toEqual({ admitted: false, reason: NETWORK_FAILED });

    probe.reachable = true;
    probe.failing.add("network");
    const thrown = await manager.checkResources(parseRequirement({ memory: "10MB", cpu: 0.1, network: true }));
    expect(thrown).toEqual({ admitted: false, reason: NETWORK_FAILED });
  });

  it("turns a failing probe into a denial for that dimension", async () => {
    const { manager, probe } = await makeManager();
    probe.failing.add("memory");
    const verdict = await manager.checkResources(parseRequirement({}));
    expect(verdict).toEqual({
      admitted: false,
      reason: "Not enough memory. Unable to measure availability: memory probe unavailable"
    });

    probe.failing.clear();
    probe.failing.add("disk");
    const disk = await manager.checkResources(parseRequirement({}));
    expect(disk.reason).toBe("Not enough disk space. Unable to measure availability: disk probe unavailable");
  });
});

describe("ResourceManager containers", () => {
  it("probes the runtime once at construction", async () => {
    const { manager, runtime } = await makeManager();
    expect(manager.containerAvailable).toBe(true);
    expect(runtime.availabilityChecks).toBe(1);
  });

  it("does not probe when containers are disabled", async () => {
    const { manager, runtime } = await makeManager({ containersEnabled: false });
    expect(manager.containerAvailable).toBe(false);
    expect(runtime.availabilityChecks).toBe(0);
    await expect(manager.stopContainer("c0ffee")).rejects.toBeInstanceOf(CapabilityUnavailableError);
  });

  it("refuses container operations when the runtime is missing", async () => {
    const runtime = new FakeRuntime();
    runtime.available = false;
    const { manager } = await makeManager({ runtime });
    expect(manager.containerAvailable).toBe(false);
    await expect(manager.runInContainer({ image: "img", command: [], volumes: {} })).rejects.toThrow(
      "Docker is not available"
    );
    await expect(manager.getContainerStatus("c0ffee")).rejects.toBeInstanceOf(CapabilityUnavailableError);
  });

  it("converts resource limits to docker flags", async () => {
    const { manager, runtime } = await makeManager();
    const id = await manager.runInContainer({
      image: "img:1",
      command: ["run"],
      volumes: { "/data": "/app/data" },
      environment: { MODE: "x" },
      resourceLimits: { memoryMb: 512, cpu: 1.5 },
      network: "none"
    });
    expect(id).toBe("c0ffee");
    expect(runtime.launched[0]).toEqual({
      image: "img:1",
      command: ["run"],
      volumes: { "/data": "/app/data" },
      environment: { MODE: "x" },
      network: "none",
      resourceLimits: { memory: "512m", cpus: "1.5" }
    });

    await manager.runInContainer({ image: "img:1", command: [], volumes: {}, resourceLimits: { memoryMb: 0, cpu: 0 } });
    expect(runtime.launched[1]?.resourceLimits).toEqual({ memory: undefined, cpus: undefined });
  });

  it("reports status with log tail and exit code only for finished containers", async () => {
    const { manager, runtime } = await makeManager({ logTailLines: 25 });
    runtime.states = [
      { state: "running", exitCode: null },
      { state: "exited", exitCode: 3 }
    ];
    expect(await manager.getContainerStatus("c0ffee")).toEqual({ status: "running", logs: "fake log\n", exitCode: null });
    expect(await manager.getContainerStatus("c0ffee")).toEqual({ status: "exited", logs: "fake log\n", exitCode: 3 });
    expect(runtime.tailRequests).toEqual([25, 25]);
  });

  it("reports an unknown handle as not_found without reading logs", async () => {
    const { manager, runtime } = await makeManager();
    runtime.states = [{ state: "not_found", exitCode: null }];
    expect(await manager.getContainerStatus("nope")).toEqual({ status: "not_found", logs: "", exitCode: null });
    expect(runtime.tailRequests).toEqual([]);
  });
});

describe("ResourceManager.getResourceUsage", () => {
  it("reports live tracked processes and drops the ones that are gone", async () => {
    const { manager, probe, clock } = await makeManager();
    const req = parseRequirement({ memory: "10MB" });
    manager.trackProcess(111, "alive_plugin", req);
    manager.trackProcess(222, "gone_plugin", req);
    probe.alive.add(111);
    clock.t = 3500;

    const snapshot = await manager.getResourceUsage();
    expect(snapshot.takenAt).toBe(new Date(3500).toISOString());
    expect(snapshot.memory.availableMb).toBe(4096);
    expect(snapshot.disk.path).toBe("/work");
    expect(snapshot.processes).toEqual({
      "111": {
        name: "alive_plugin",
        requirement: req,
        startedAt: "1970-01-01T00:00:01.000Z",
        runtimeSeconds: 2.5,
        memoryMb: 12.5
      }
    });
    expect(manager.trackedProcesses().map((p) => p.pid)).toEqual([111]);
  });
});
