import { performance } from "perf_hooks";
import { stableJsonStringify } from "../core/canonicalJson.js";
import { CapabilityUnavailableError, errorMessage } from "../core/errors.js";
import { newRunId, type RunId } from "../core/ids.js";
import type { JsonObject } from "../core/json.js";
import { isRunResult, type DispatchKind, type RunErrorKind, type RunOutcome, type RunResult } from "../core/run.js";
import type { PolicyEngine } from "../policy/policy.js";
import type { PluginRegistry } from "../plugins/registry.js";
import { UTILITY_CATEGORY, type Plugin, type PluginContext, type RegisteredPlugin } from "../plugins/types.js";
import { parseRequirement, type ResourceRequirement } from "../resources/requirement.js";
import type { ResourceManager } from "../resources/resourceManager.js";
import { PluginRun } from "../runs/pluginRun.js";
import { readCurrentTarget, type ConfigStore } from "../store/configStore.js";
import type { PostgresStore } from "../store/postgresStore.js";
import { commandOnPath } from "./backends/localProcess.js";
import type { RunnerBackend } from "./backends/types.js";
import { waitForContainer, type ContainerWaitOutcome } from "./containerMonitor.js";

export type RunState =
  | "resolving"
  | "admitting"
  | "dispatching_local"
  | "dispatching_container"
  | "completed"
  | "failed";

const TRANSITIONS: Record<RunState, readonly RunState[]> = {
  resolving: ["admitting", "failed"],
  admitting: ["dispatching_local", "dispatching_container", "failed"],
  dispatching_local: ["completed", "failed"],
  dispatching_container: ["completed", "failed"],
  completed: [],
  failed: []
};

export class IllegalTransitionError extends Error {
  constructor(from: RunState, to: RunState) {
    super(`illegal run transition ${from} -> ${to}`);
    this.name = "IllegalTransitionError";
  }
}

class RunStateMachine {
  private current: RunState = "resolving";

  constructor(private readonly run: PluginRun) {}

  get state(): RunState {
    return this.current;
  }

  async enter(): Promise<void> {
    await this.run.event(`state.${this.current}`, null, null);
  }

  async to(next: RunState, data: JsonObject | null = null): Promise<void> {
    if (!TRANSITIONS[this.current].includes(next)) throw new IllegalTransitionError(this.current, next);
    this.current = next;
    await this.run.event(`state.${next}`, null, data);
  }
}

/**
 * `direct` runs in this process without an admission check. It is what the standalone runner uses
 * inside a fallback container, where the host has already decided the run should happen.
 */
export type DispatchMode = "auto" | "local" | "container" | "direct";

export interface RunOptions {
  dispatch?: DispatchMode;
  /** Overrides the policy's container.fallback for this run. */
  allowContainerFallback?: boolean;
  signal?: AbortSignal;
  requestedBy?: string | null;
}

export interface OrchestratorDeps {
  registry: PluginRegistry;
  resources: ResourceManager;
  store: PostgresStore;
  config: ConfigStore;
  policy: PolicyEngine;
  runner: RunnerBackend<"local_process">;
}

export function requirementJson(req: ResourceRequirement): JsonObject {
  return { memory_mb: req.memoryMb, cpu_cores: req.cpuCores, disk_mb: req.diskMb, network: req.network };
}

/** argv for the in-container standalone runner. */
export function buildContainerCommand(
  base: string[],
  pluginName: string,
  target: string | null,
  options: JsonObject
): string[] {
  const argv = [...base, "--plugin", pluginName];
  if (target !== null) argv.push("--target", target);
  if (Object.keys(options).length > 0) argv.push("--options", stableJsonStringify(options));
  return argv;
}

interface RunScope {
  runId: RunId;
  pluginName: string;
  journal: PluginRun;
  machine: RunStateMachine;
  dispatch: DispatchKind | null;
  elapsedSeconds: number | null;
  containerId?: string;
}

export class ExecutionOrchestrator {
  private queue: Promise<void> = Promise.resolve();

  constructor(private readonly deps: OrchestratorDeps) {}

  /** Runs are serialized: each waits for the previous one to settle before resolving its plugin. */
  run(name: string, target: string | null, options: JsonObject, opts: RunOptions = {}): Promise<RunOutcome> {
    const next = this.queue.then(() => this.runNow(name, target, options, opts));
    this.queue = next.then(
      () => undefined,
      () => undefined
    );
    return next;
  }

  private async runNow(name: string, explicitTarget: string | null, options: JsonObject, opts: RunOptions): Promise<RunOutcome> {
    const runId = newRunId();
    const journal = new PluginRun(this.deps.store, {
      runId,
      pluginName: name,
      target: explicitTarget,
      options,
      policyHash: this.deps.policy.policyHash,
      requestedBy: opts.requestedBy ?? null
    });
    await journal.start();

    const machine = new RunStateMachine(journal);
    await machine.enter();
    const scope: RunScope = { runId, pluginName: name, journal, machine, dispatch: null, elapsedSeconds: null };

    const entry = await this.deps.registry.resolve(name);
    if (!entry) return this.fail(scope, "not_found", `Plugin '${name}' not found`);

    const category = entry.descriptor.category;
    let target: string | null = null;
    if (category !== UTILITY_CATEGORY) {
      target = explicitTarget ?? (await readCurrentTarget(this.deps.config));
      if (target === null) return this.fail(scope, "target_required", "No target selected");
    }
    await journal.resolved(category, target);

    await machine.to("admitting");
    const requirement = parseRequirement(entry.descriptor.resources);
    await journal.event("admission.requirement", null, requirementJson(requirement));

    const mode = opts.dispatch ?? "auto";
    if (mode === "direct") {
      await journal.event("admission.skipped", "direct dispatch", null);
      return this.dispatchLocal(scope, entry, target, options, requirement);
    }
    if (mode === "container") {
      if (!this.deps.resources.containerAvailable) {
        return this.fail(scope, "capability_unavailable", "Docker is not available");
      }
      return this.dispatchContainer(scope, entry, target, options, requirement, opts.signal);
    }

    const verdict = await this.deps.resources.checkResources(requirement);
    await journal.event("admission.verdict", verdict.reason, { admitted: verdict.admitted });
    if (verdict.admitted) return this.dispatchLocal(scope, entry, target, options, requirement);

    const fallback = mode === "auto" && (opts.allowContainerFallback ?? this.deps.policy.container().fallback);
    if (fallback && this.deps.resources.containerAvailable) {
      await journal.event("admission.fallback", "dispatching to container", null);
      return this.dispatchContainer(scope, entry, target, options, requirement, opts.signal);
    }
    return this.fail(scope, "admission_denied", verdict.reason, { requirement: requirementJson(requirement) });
  }

  private contextFor(scope: RunScope, requirement: ResourceRequirement): PluginContext {
    const { resources, runner } = this.deps;
    const journal = scope.journal;
    return {
      pluginName: scope.pluginName,
      dataDir: this.deps.policy.dataDir(),
      log: (level, message, data) => journal.event(`plugin.${level}`, message, data ?? null),
      exec: async (argv, execOpts = {}) => {
        const result = await runner.execute({
          kind: "local_process",
          argv,
          cwd: execOpts.cwd,
          env: execOpts.env,
          timeoutSeconds: execOpts.timeoutSeconds,
          onSpawn: (pid) => resources.trackProcess(pid, `${scope.pluginName}:${argv[0] ?? "exec"}`, requirement),
          onExit: (pid) => resources.untrackProcess(pid)
        });
        await journal.event("plugin.exec", argv.join(" "), { exit_code: result.exitCode, timed_out: result.timedOut });
        return result;
      },
      commandAvailable: (command) => commandOnPath(command)
    };
  }

  private async dispatchLocal(
    scope: RunScope,
    entry: RegisteredPlugin,
    target: string | null,
    options: JsonObject,
    requirement: ResourceRequirement
  ): Promise<RunOutcome> {
    await scope.machine.to("dispatching_local");
    scope.dispatch = "local";
    await scope.journal.dispatched("local");

    const hostPid = process.pid;
    this.deps.resources.trackProcess(hostPid, scope.pluginName, requirement);

    let raw: unknown;
    let failure: string | null = null;
    try {
      let plugin: Plugin;
      try {
        plugin = entry.definition.create(this.contextFor(scope, requirement));
      } catch (e) {
        return await this.fail(scope, "execution_error", errorMessage(e));
      }

      try {
        await plugin.setup();
        const started = performance.now();
        try {
          raw = await plugin.execute(target, options);
        } finally {
          scope.elapsedSeconds = Math.round(performance.now() - started) / 1000;
        }
      } catch (e) {
        failure = errorMessage(e);
      } finally {
        try {
          await plugin.cleanup();
        } catch (e) {
          await scope.journal.event("plugin.cleanup_failed", errorMessage(e), null);
        }
      }
    } finally {
      this.deps.resources.untrackProcess(hostPid);
    }

    if (failure !== null) return this.fail(scope, "execution_error", failure);
    if (!isRunResult(raw)) {
      return this.fail(scope, "execution_error", `Plugin '${scope.pluginName}' returned a malformed result`);
    }
    if (raw.status === "error") return this.fail(scope, "execution_error", raw.message, raw.data);
    return this.complete(scope, raw);
  }

  private async dispatchContainer(
    scope: RunScope,
    entry: RegisteredPlugin,
    target: string | null,
    options: JsonObject,
    requirement: ResourceRequirement,
    signal: AbortSignal | undefined
  ): Promise<RunOutcome> {
    await scope.machine.to("dispatching_container");
    scope.dispatch = "container";
    await scope.journal.dispatched("container");

    const settings = this.deps.policy.container();
    const command = buildContainerCommand(settings.command, entry.descriptor.name, target, options);

    let containerId: string;
    try {
      containerId = await this.deps.resources.runInContainer({
        image: settings.image,
        command,
        volumes: { [this.deps.policy.dataDir()]: settings.dataMount },
        environment: { PLUGINHOST_MODE: "standalone" },
        resourceLimits: { memoryMb: requirement.memoryMb, cpu: requirement.cpuCores },
        network: settings.networkMode
      });
    } catch (e) {
      const kind: RunErrorKind = e instanceof CapabilityUnavailableError ? "capability_unavailable" : "dispatch_error";
      return this.fail(scope, kind, errorMessage(e));
    }
    scope.containerId = containerId;
    await scope.journal.event("container.started", containerId, { image: settings.image, command });

    let waited: ContainerWaitOutcome;
    try {
      waited = await waitForContainer(this.deps.resources, containerId, {
        intervalMs: settings.pollIntervalMs,
        timeoutMs: settings.pollTimeoutMs,
        signal,
        onPoll: (status, attempt) =>
          scope.journal.event("container.poll", `status=${status.status}`, {
            attempt,
            status: status.status,
            exit_code: status.exitCode,
            logs: status.logs
          })
      });
    } catch (e) {
      let stopped = false;
      try {
        stopped = await this.deps.resources.stopContainer(containerId);
      } catch (stopErr) {
        await scope.journal.event("container.stop_failed", errorMessage(stopErr), { container_id: containerId });
      }
      return this.fail(scope, "dispatch_error", errorMessage(e), { container_id: containerId, stopped });
    }

    switch (waited.kind) {
      case "finished": {
        const exitCode = waited.status.exitCode ?? -1;
        const data: JsonObject = { container_id: containerId, exit_code: exitCode, logs: waited.status.logs };
        if (exitCode === 0) {
          return this.complete(scope, { status: "success", message: `Container ${containerId} completed`, data });
        }
        return this.fail(scope, "execution_error", `Container exited with code ${exitCode}`, data);
      }
      case "vanished":
        return this.fail(scope, "dispatch_error", `Container ${containerId} disappeared before completing`, {
          container_id: containerId
        });
      case "timed_out":
        return this.fail(
          scope,
          "dispatch_error",
          `Container ${containerId} did not finish within ${settings.pollTimeoutMs / 1000}s`,
          { container_id: containerId, stopped: waited.stopped }
        );
      case "aborted":
        return this.fail(scope, "dispatch_error", `Container run ${containerId} was aborted`, {
          container_id: containerId,
          stopped: waited.stopped
        });
    }
  }

  private async complete(scope: RunScope, result: RunResult): Promise<RunOutcome> {
    await scope.machine.to("completed");
    await scope.journal.finishSuccess(result.message, result.data);
    return this.outcome(scope, result, null);
  }

  private async fail(scope: RunScope, kind: RunErrorKind, message: string, data: JsonObject = {}): Promise<RunOutcome> {
    await scope.machine.to("failed", { error_kind: kind });
    await scope.journal.finishFailure(kind, message, data);
    return this.outcome(scope, { status: "error", message, data }, kind);
  }

  private outcome(scope: RunScope, result: RunResult, errorKind: RunErrorKind | null): RunOutcome {
    const out: RunOutcome = {
      ...result,
      runId: scope.runId,
      plugin: scope.pluginName,
      dispatch: scope.dispatch,
      errorKind,
      elapsedSeconds: scope.elapsedSeconds
    };
    if (scope.containerId !== undefined) out.containerId = scope.containerId;
    return out;
  }
}
