import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm } from "fs/promises";
import os from "os";
import path from "path";
import type * as pg from "pg";
import { setTimeout as sleep } from "timers/promises";

import { UnknownTargetError } from "../src/core/errors.js";
import type { JsonObject } from "../src/core/json.js";
import { errorResult, successResult, type RunResult } from "../src/core/run.js";
import { buildContainerCommand } from "../src/execution/orchestrator.js";
import { createPluginHost, type PluginHost } from "../src/host/pluginHost.js";
import { PolicyEngine, type PolicyConfig } from "../src/policy/policy.js";
import type { PluginContext, PluginDefinition } from "../src/plugins/types.js";
import { FakeProbe, FakeRunner, FakeRuntime, memPool } from "./fakes.js";

interface Calls {
  setup: number;
  execute: number;
  cleanup: number;
}

function testPlugin(
  name: string,
  category: string,
  resources: PluginDefinition["resources"],
  behave: (ctx: PluginContext, target: string | null, options: JsonObject) => Promise<RunResult>,
  calls: Calls,
  setupError: Error | null = null
): PluginDefinition {
  return {
    name,
    category,
    description: `${name} test plugin`,
    version: "0.0.1",
    dependencies: [],
    resources,
    create: (ctx) => ({
      setup: async () => {
        calls.setup += 1;
        if (setupError) throw setupError;
      },
      execute: async (target, options) => {
        calls.execute += 1;
        return behave(ctx, target, options);
      },
      cleanup: async () => {
        calls.cleanup += 1;
      }
    })
  };
}

const SMALL = { memory: "10MB", cpu: 0.1, disk: "1MB", network: false };

describe.sequential("ExecutionOrchestrator", () => {
  let tmpDir: string;
  let pool: pg.Pool;
  let probe: FakeProbe;
  let runtime: FakeRuntime;
  let runner: FakeRunner;
  let calls: Calls;
  let plugins: PluginDefinition[];
  let schemaApplied: boolean;
  let runnerHook: (spec: { onSpawn?: (pid: number) => void; onExit?: (pid: number) => void }) => void;

  async function makeHost(container: PolicyConfig["container"] = {}): Promise<PluginHost> {
    const policy = PolicyEngine.parse(
      {
        version: 1,
        data_dir: tmpDir,
        resources: { max_memory: "16G", max_cpu: 8 },
        container: { poll_interval_seconds: 0.001, poll_timeout_seconds: 5, ...container }
      },
      "test",
      {}
    );
    const applySchema = !schemaApplied;
    schemaApplied = true;
    return createPluginHost({
      policy,
      pool,
      applySchema,
      sources: [{ id: "test", load: () => plugins }],
      probe,
      runtime,
      runner,
      schemaPath: path.resolve("db/schema.sql"),
      warn: () => {}
    });
  }

  beforeEach(async () => {
    tmpDir = await mkdtemp(path.join(os.tmpdir(), "plugin-host-orch-"));
    pool = memPool();
    schemaApplied = false;
    probe = new FakeProbe();
    runtime = new FakeRuntime();
    runtime.available = false;
    runnerHook = () => {};
    runner = new FakeRunner((spec) => {
      runnerHook(spec);
      return { stdout: "done\n" };
    });
    calls = { setup: 0, execute: 0, cleanup: 0 };
    plugins = [
      testPlugin("echo_ok", "utility", SMALL, async (_ctx, target, options) => successResult("echo", { target, options }), calls),
      testPlugin("echo_target", "recon", SMALL, async (_ctx, target) => successResult("echo", { target }), calls),
      testPlugin("hungry", "utility", { memory: "100GB" }, async () => successResult("never"), calls),
      testPlugin("hungry_recon", "recon", { memory: "100GB", cpu: 2 }, async () => successResult("never"), calls)
    ];
  });

  afterEach(async () => {
    await pool.end();
    await rm(tmpDir, { recursive: true, force: true });
  });

  it("runs an admitted plugin locally and journals every state", async () => {
    const host = await makeHost();
    const outcome = await host.run("echo_ok", "ignored.example", { x: 1 });

    expect(outcome.status).toBe("success");
    expect(outcome.message).toBe("echo");
    expect(outcome.data).toEqual({ target: null, options: { x: 1 } });
    expect(outcome.errorKind).toBeNull();
    expect(outcome.dispatch).toBe("local");
    expect(typeof outcome.elapsedSeconds).toBe("number");
    expect(outcome.containerId).toBeUndefined();
    expect(calls).toEqual({ setup: 1, execute: 1, cleanup: 1 });
    expect(host.resources.trackedProcesses()).toEqual([]);

    const found = await host.getRun(outcome.runId);
    expect(found?.run.status).toBe("succeeded");
    expect(found?.run.category).toBe("utility");
    expect(found?.run.target).toBeNull();
    expect(found?.run.dispatch).toBe("local");
    expect(found?.run.resultJson).toEqual({ target: null, options: { x: 1 } });
    expect(found?.events.map((e) => e.kind)).toEqual([
      "run.started",
      "state.resolving",
      "state.admitting",
      "admission.requirement",
      "admission.verdict",
      "state.dispatching_local",
      "state.completed",
      "run.succeeded"
    ]);
  });

  it("lists plugins as category -> name -> summary", async () => {
    const host = await makeHost();
    const listing = await host.listPlugins();
    expect(Object.keys(listing)).toEqual(["recon", "utility"]);
    expect(Object.keys(listing["recon"] ?? {})).toEqual(["echo_target", "hungry_recon"]);
    expect(Object.keys(listing["utility"] ?? {})).toEqual(["echo_ok", "hungry"]);
    expect(listing["utility"]?.["hungry"]).toEqual({
      name: "hungry",
      category: "utility",
      description: "hungry test plugin",
      version: "0.0.1",
      dependencies: [],
      resources: { memory: "100GB" },
      source: "test",
      cliOptions: [],
      interactiveOptions: []
    });

    expect(Object.keys(await host.listPlugins("recon"))).toEqual(["recon"]);
    expect(await host.listPlugins("missing")).toEqual({});
  });

  it("fails with not_found for an unknown plugin", async () => {
    const host = await makeHost();
    const outcome = await host.run("nonexistent", null, {});
    expect(outcome.status).toBe("error");
    expect(outcome.errorKind).toBe("not_found");
    expect(outcome.message).toBe("Plugin 'nonexistent' not found");
    expect(outcome.dispatch).toBeNull();

    const found = await host.getRun(outcome.runId);
    expect(found?.run.status).toBe("failed");
    expect(found?.run.errorKind).toBe("not_found");
    expect(found?.events.map((e) => e.kind)).toEqual(["run.started", "state.resolving", "state.failed", "run.failed"]);
  });

  it("denies a hungry plugin without calling execute when no container runtime exists", async () => {
    const host = await makeHost();
    const outcome = await host.run("hungry", null, {});
    expect(outcome.errorKind).toBe("admission_denied");
    expect(outcome.message).toBe("Not enough memory. Required: 102400MB, Available: 4096.0MB");
    expect(outcome.data).toEqual({ requirement: { memory_mb: 102400, cpu_cores: 0.5, disk_mb: 10, network: false } });
    expect(calls).toEqual({ setup: 0, execute: 0, cleanup: 0 });
  });

  it("runs a plugin the host would deny when dispatched directly, as the in-container runner does", async () => {
    const host = await makeHost();
    const outcome = await host.run("hungry", null, {}, { dispatch: "direct" });
    expect(outcome.status).toBe("success");
    expect(outcome.message).toBe("never");
    expect(outcome.dispatch).toBe("local");
    expect(calls).toEqual({ setup: 1, execute: 1, cleanup: 1 });
    expect(probe.calls).toEqual([]);

    const found = await host.getRun(outcome.runId);
    expect(found?.events.map((e) => e.kind)).toEqual([
      "run.started",
      "state.resolving",
      "state.admitting",
      "admission.requirement",
      "admission.skipped",
      "state.dispatching_local",
      "state.completed",
      "run.succeeded"
    ]);
  });

  it("requires a target for non-utility plugins and falls back to the selected one", async () => {
    const host = await makeHost();
    const missing = await host.run("echo_target", null, {});
    expect(missing.errorKind).toBe("target_required");
    expect(missing.message).toBe("No target selected");

    await host.addTarget("example.com");
    const selected = await host.run("echo_target", null, {});
    expect(selected.status).toBe("success");
    expect(selected.data).toEqual({ target: "example.com" });

    const explicit = await host.run("echo_target", "other.example", {});
    expect(explicit.data).toEqual({ target: "other.example" });
  });

  it("calls cleanup exactly once whatever execute does", async () => {
    plugins = [
      testPlugin("throws", "utility", SMALL, async () => {
        throw new Error("boom");
      }, calls),
      testPlugin("returns_error", "utility", SMALL, async () => errorResult("bad input", { code: 7 }), calls),
      testPlugin("bad_setup", "utility", SMALL, async () => successResult("never"), calls, new Error("setup exploded"))
    ];
    const host = await makeHost();

    const thrown = await host.run("throws", null, {});
    expect(thrown.errorKind).toBe("execution_error");
    expect(thrown.message).toBe("boom");
    expect(calls.cleanup).toBe(1);

    const errored = await host.run("returns_error", null, {});
    expect(errored.errorKind).toBe("execution_error");
    expect(errored.message).toBe("bad input");
    expect(errored.data).toEqual({ code: 7 });
    expect(calls.cleanup).toBe(2);

    const setupFailed = await host.run("bad_setup", null, {});
    expect(setupFailed.errorKind).toBe("execution_error");
    expect(setupFailed.message).toBe("setup exploded");
    expect(setupFailed.elapsedSeconds).toBeNull();
    expect(calls).toEqual({ setup: 3, execute: 2, cleanup: 3 });
    expect(host.resources.trackedProcesses()).toEqual([]);
  });

  it("rejects a result whose data is not JSON-safe", async () => {
    plugins = [testPlugin("bad_data", "utility", SMALL, async () => successResult("x", { n: Number.NaN }), calls)];
    const host = await makeHost();
    const outcome = await host.run("bad_data", null, {});
    expect(outcome.errorKind).toBe("execution_error");
    expect(outcome.message).toBe("Plugin 'bad_data' returned a malformed result");
    expect(calls.cleanup).toBe(1);
  });

  it("tracks the host pid during execute and child pids while they run", async () => {
    let duringExecute: number[] = [];
    let duringExec: number[] = [];
    let host: PluginHost | null = null;
    runnerHook = (spec) => {
      spec.onSpawn?.(4242);
      duringExec = host?.resources.trackedProcesses().map((p) => p.pid) ?? [];
      spec.onExit?.(4242);
    };
    plugins = [
      testPlugin(
        "spawner",
        "utility",
        SMALL,
        async (ctx) => {
          duringExecute = host?.resources.trackedProcesses().map((p) => p.pid) ?? [];
          const res = await ctx.exec(["some-tool", "--flag"]);
          await ctx.log("info", "tool finished", { exit_code: res.exitCode });
          return successResult(res.stdout.trim());
        },
        calls
      )
    ];
    host = await makeHost();

    const outcome = await host.run("spawner", null, {});
    expect(outcome.status).toBe("success");
    expect(outcome.message).toBe("done");
    expect(duringExecute).toEqual([process.pid]);
    expect(duringExec).toEqual([process.pid, 4242]);
    expect(host.resources.trackedProcesses()).toEqual([]);
    expect(runner.specs.map((s) => s.argv)).toContainEqual(["some-tool", "--flag"]);

    const found = await host.getRun(outcome.runId);
    const logged = found?.events.find((e) => e.kind === "plugin.info");
    expect(logged?.message).toBe("tool finished");
    expect(logged?.data).toEqual({ exit_code: 0 });
  });

  it("serializes runs through one orchestrator", async () => {
    const order: string[] = [];
    plugins = [
      testPlugin(
        "slow",
        "utility",
        SMALL,
        async (_ctx, _target, options) => {
          order.push(`enter:${String(options["n"])}`);
          await sleep(20);
          order.push(`exit:${String(options["n"])}`);
          return successResult("ok");
        },
        calls
      )
    ];
    const host = await makeHost();
    const [a, b] = await Promise.all([host.run("slow", null, { n: 1 }), host.run("slow", null, { n: 2 })]);
    expect(a.status).toBe("success");
    expect(b.status).toBe("success");
    expect(order).toEqual(["enter:1", "exit:1", "enter:2", "exit:2"]);
  });

  it("answers admission dry runs", async () => {
    const host = await makeHost();
    expect(await host.check("echo_ok")).toEqual({ admitted: true, reason: "Sufficient resources available" });
    expect(await host.check("nope")).toEqual({ admitted: false, reason: "Plugin 'nope' not found" });
  });

  it("only selects targets that exist", async () => {
    const host = await makeHost();
    await expect(host.selectTarget("missing.example")).rejects.toBeInstanceOf(UnknownTargetError);
    await host.addTarget("a.example", { notes: "first" });
    await host.addTarget("b.example");
    expect(await host.currentTarget()).toBe("b.example");
    await host.selectTarget("a.example");
    expect(await host.currentTarget()).toBe("a.example");
    expect((await host.listTargets()).map((t) => t.domain)).toEqual(["a.example", "b.example"]);
  });

  describe("container fallback", () => {
    beforeEach(() => {
      runtime.available = true;
    });

    it("dispatches a denied plugin to a container and succeeds on exit code 0", async () => {
      runtime.states = [
        { state: "running", exitCode: null },
        { state: "exited", exitCode: 0 }
      ];
      const host = await makeHost();
      const outcome = await host.run("hungry", null, {});

      expect(outcome.status).toBe("success");
      expect(outcome.dispatch).toBe("container");
      expect(outcome.containerId).toBe("c0ffee");
      expect(outcome.elapsedSeconds).toBeNull();
      expect(outcome.data).toEqual({ container_id: "c0ffee", exit_code: 0, logs: "fake log\n" });
      expect(calls.execute).toBe(0);
      expect(runtime.launched).toEqual([
        {
          image: "plugin-host:latest",
          command: ["node", "dist/scripts/run_plugin.js", "--plugin", "hungry"],
          volumes: { [path.resolve(tmpDir)]: "/app/data" },
          environment: { PLUGINHOST_MODE: "standalone" },
          network: "bridge",
          resourceLimits: { memory: "102400m", cpus: "0.5" }
        }
      ]);

      const found = await host.getRun(outcome.runId);
      expect(found?.run.dispatch).toBe("container");
      const polls = found?.events.filter((e) => e.kind === "container.poll").map((e) => e.message);
      expect(polls).toEqual(["status=running", "status=exited"]);
    });

    it("passes target and options to the in-container runner", async () => {
      const host = await makeHost();
      await host.run("hungry_recon", "example.com", { b: 2, a: 1 });
      expect(runtime.launched[0]?.command).toEqual([
        "node",
        "dist/scripts/run_plugin.js",
        "--plugin",
        "hungry_recon",
        "--target",
        "example.com",
        "--options",
        '{"a":1,"b":2}'
      ]);
    });

    it("fails with execution_error on a non-zero exit code", async () => {
      runtime.states = [{ state: "exited", exitCode: 3 }];
      const host = await makeHost();
      const outcome = await host.run("hungry", null, {});
      expect(outcome.errorKind).toBe("execution_error");
      expect(outcome.message).toBe("Container exited with code 3");
      expect(outcome.containerId).toBe("c0ffee");
    });

    it("fails with dispatch_error when the container disappears", async () => {
      runtime.states = [{ state: "not_found", exitCode: null }];
      const host = await makeHost();
      const outcome = await host.run("hungry", null, {});
      expect(outcome.errorKind).toBe("dispatch_error");
      expect(outcome.message).toBe("Container c0ffee disappeared before completing");
    });

    it("stops the container when polling times out", async () => {
      runtime.states = [{ state: "running", exitCode: null }];
      const host = await makeHost({ poll_timeout_seconds: 0.03 });
      const outcome = await host.run("hungry", null, {});
      expect(outcome.errorKind).toBe("dispatch_error");
      expect(outcome.message).toBe("Container c0ffee did not finish within 0.03s");
      expect(outcome.data).toEqual({ container_id: "c0ffee", stopped: true });
      expect(runtime.stopped).toEqual(["c0ffee"]);
    });

    it("stops the container when the caller aborts", async () => {
      runtime.states = [{ state: "running", exitCode: null }];
      const host = await makeHost({ poll_interval_seconds: 1 });
      const controller = new AbortController();
      const pending = host.run("hungry", null, {}, { signal: controller.signal });
      setTimeout(() => controller.abort(), 20);
      const outcome = await pending;
      expect(outcome.errorKind).toBe("dispatch_error");
      expect(outcome.message).toBe("Container run c0ffee was aborted");
      expect(runtime.stopped).toEqual(["c0ffee"]);
    });

    it("reports a launch failure as dispatch_error", async () => {
      runtime.launchError = new Error("failed to start container: no space left on device");
      const host = await makeHost();
      const outcome = await host.run("hungry", null, {});
      expect(outcome.errorKind).toBe("dispatch_error");
      expect(outcome.message).toBe("failed to start container: no space left on device");
      expect(outcome.containerId).toBeUndefined();
    });

    it("never falls back when local dispatch is forced or fallback is off", async () => {
      const host = await makeHost();
      const local = await host.run("hungry", null, {}, { dispatch: "local" });
      expect(local.errorKind).toBe("admission_denied");

      const noFallback = await host.run("hungry", null, {}, { allowContainerFallback: false });
      expect(noFallback.errorKind).toBe("admission_denied");

      const policyOff = await makeHost({ fallback: false });
      const denied = await policyOff.run("hungry", null, {});
      expect(denied.errorKind).toBe("admission_denied");
      expect(runtime.launched).toEqual([]);
    });

    it("runs in a container on request even when resources would admit", async () => {
      const host = await makeHost();
      const outcome = await host.run("echo_ok", null, {}, { dispatch: "container" });
      expect(outcome.dispatch).toBe("container");
      expect(outcome.status).toBe("success");
      expect(calls.execute).toBe(0);
      expect(probe.calls).toEqual([]);
    });

    it("reports capability_unavailable when a container is requested without docker", async () => {
      runtime.available = false;
      const host = await makeHost();
      const outcome = await host.run("echo_ok", null, {}, { dispatch: "container" });
      expect(outcome.errorKind).toBe("capability_unavailable");
      expect(outcome.message).toBe("Docker is not available");
    });
  });
});

describe("buildContainerCommand", () => {
  it("omits target and options when absent", () => {
    expect(buildContainerCommand(["run"], "tool_check", null, {})).toEqual(["run", "--plugin", "tool_check"]);
  });
});
