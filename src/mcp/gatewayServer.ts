import { ErrorCode, McpError } from "@modelcontextprotocol/sdk/types.js";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { CapabilityUnavailableError, UnknownTargetError, errorMessage } from "../core/errors.js";
import { isRunId } from "../core/ids.js";
import { isJsonObject, type JsonObject } from "../core/json.js";
import type { RunOutcome } from "../core/run.js";
import type { PluginHost, PluginSummary } from "../host/pluginHost.js";
import type { PluginOptionSpec } from "../plugins/types.js";
import type { ResourceSnapshot } from "../resources/resourceManager.js";
import { requirementJson } from "../execution/orchestrator.js";
import {
  zContainerStopInput,
  zContainerStopOutput,
  zPluginCheckInput,
  zPluginCheckOutput,
  zPluginListInput,
  zPluginListOutput,
  zPluginRunInput,
  zPluginRunOutput,
  zResourceUsageInput,
  zResourceUsageOutput,
  zRunGetInput,
  zRunGetOutput,
  zTargetAddInput,
  zTargetAddOutput,
  zTargetCurrentInput,
  zTargetCurrentOutput,
  zTargetListInput,
  zTargetListOutput,
  zTargetSelectInput
} from "./toolSchemas.js";

export interface GatewayDeps {
  host: PluginHost;
}

export function requestedByFromExtra(extra: {
  authInfo?: { clientId: string; extra?: Record<string, unknown> } | undefined;
  sessionId?: string | undefined;
}): string | null {
  const subject = extra.authInfo?.extra?.["subject"];
  return (typeof subject === "string" ? subject : null) ?? extra.authInfo?.clientId ?? extra.sessionId ?? null;
}

function optionSpecJson(spec: PluginOptionSpec): JsonObject {
  const out: JsonObject = { name: spec.name, kind: spec.kind, description: spec.description };
  if (spec.default !== undefined) out.default = spec.default;
  if (spec.choices) out.choices = spec.choices;
  return out;
}

function pluginJson(p: PluginSummary): JsonObject {
  const resources: JsonObject = {};
  for (const [k, v] of Object.entries(p.resources)) {
    if (v !== undefined) resources[k] = v;
  }
  return {
    name: p.name,
    category: p.category,
    description: p.description,
    version: p.version,
    dependencies: p.dependencies,
    resources,
    source: p.source,
    cli_options: p.cliOptions.map(optionSpecJson),
    interactive_options: p.interactiveOptions.map(optionSpecJson)
  };
}

function outcomeJson(o: RunOutcome): JsonObject {
  return {
    run_id: o.runId,
    plugin: o.plugin,
    status: o.status,
    message: o.message,
    data: o.data,
    dispatch: o.dispatch,
    error_kind: o.errorKind,
    elapsed_seconds: o.elapsedSeconds,
    container_id: o.containerId ?? null
  };
}

function snapshotJson(s: ResourceSnapshot): JsonObject {
  const processes: JsonObject = {};
  for (const [pid, p] of Object.entries(s.processes)) {
    processes[pid] = {
      name: p.name,
      requirement: requirementJson(p.requirement),
      started_at: p.startedAt,
      runtime_seconds: p.runtimeSeconds,
      memory_mb: p.memoryMb
    };
  }
  return {
    taken_at: s.takenAt,
    memory: {
      total_mb: s.memory.totalMb,
      available_mb: s.memory.availableMb,
      used_mb: s.memory.usedMb,
      percent: s.memory.percent
    },
    cpu: { cores: s.cpu.cores, percent: s.cpu.percent },
    disk: {
      path: s.disk.path,
      total_mb: s.disk.totalMb,
      free_mb: s.disk.freeMb,
      used_mb: s.disk.usedMb,
      percent: s.disk.percent
    },
    processes
  };
}

function toMcpError(e: unknown): McpError {
  if (e instanceof McpError) return e;
  if (e instanceof UnknownTargetError) return new McpError(ErrorCode.InvalidParams, e.message);
  if (e instanceof CapabilityUnavailableError) return new McpError(ErrorCode.InvalidRequest, e.message);
  if (e instanceof Error && e.message.startsWith("invalid target domain")) {
    return new McpError(ErrorCode.InvalidParams, e.message);
  }
  return new McpError(ErrorCode.InternalError, errorMessage(e));
}

export function createGatewayServer(deps: GatewayDeps): McpServer {
  const { host } = deps;
  const mcp = new McpServer({
    name: "plugin-host-gateway",
    version: "0.1.0"
  });

  mcp.registerTool(
    "plugin_list",
    {
      description: "List registered plugins, optionally limited to one category.",
      inputSchema: zPluginListInput,
      outputSchema: zPluginListOutput
    },
    async (args) => {
      const listing = await host.listPlugins(args.category);
      const plugins = Object.values(listing).flatMap((bucket) => Object.values(bucket));
      return {
        content: [{ type: "text", text: plugins.map((p) => `${p.category}/${p.name}`).join("\n") || "no plugins" }],
        structuredContent: { plugins: plugins.map(pluginJson) }
      };
    }
  );

  mcp.registerTool(
    "plugin_check",
    {
      description: "Dry-run the admission check for a plugin against current system resources.",
      inputSchema: zPluginCheckInput,
      outputSchema: zPluginCheckOutput
    },
    async (args) => {
      const verdict = await host.check(args.plugin);
      return {
        content: [{ type: "text", text: verdict.reason }],
        structuredContent: { plugin: args.plugin, admitted: verdict.admitted, reason: verdict.reason }
      };
    }
  );

  mcp.registerTool(
    "plugin_run",
    {
      description:
        "Run a plugin against a target (or the selected target). Falls back to a container when local resources are short.",
      inputSchema: zPluginRunInput,
      outputSchema: zPluginRunOutput
    },
    async (args, extra) => {
      const options = args.options ?? {};
      if (!isJsonObject(options)) {
        throw new McpError(ErrorCode.InvalidParams, "options must be a JSON object");
      }

      const outcome = await host.run(args.plugin, args.target ?? null, options, {
        dispatch: args.dispatch,
        allowContainerFallback: args.allow_container_fallback,
        signal: extra.signal,
        requestedBy: requestedByFromExtra(extra)
      });

      return {
        content: [{ type: "text", text: `${outcome.status}: ${outcome.message} (run ${outcome.runId})` }],
        structuredContent: outcomeJson(outcome)
      };
    }
  );

  mcp.registerTool(
    "resource_usage",
    {
      description: "Measure memory, CPU and disk now, plus the processes the host is tracking.",
      inputSchema: zResourceUsageInput,
      outputSchema: zResourceUsageOutput
    },
    async () => {
      const snapshot = await host.resourceUsage();
      return {
        content: [
          {
            type: "text",
            text: `memory ${snapshot.memory.percent}% used, cpu ${snapshot.cpu.percent}% busy, disk ${snapshot.disk.percent}% used`
          }
        ],
        structuredContent: snapshotJson(snapshot)
      };
    }
  );

  mcp.registerTool(
    "target_list",
    {
      description: "List target workspaces and the selected target.",
      inputSchema: zTargetListInput,
      outputSchema: zTargetListOutput
    },
    async () => {
      const [targets, current] = await Promise.all([host.listTargets(), host.currentTarget()]);
      return {
        content: [{ type: "text", text: targets.map((t) => t.domain).join("\n") || "no targets" }],
        structuredContent: { targets, current }
      };
    }
  );

  mcp.registerTool(
    "target_add",
    {
      description: "Create a target workspace (recon, scan, exploit, report) and select it.",
      inputSchema: zTargetAddInput,
      outputSchema: zTargetAddOutput
    },
    async (args) => {
      try {
        const target = await host.addTarget(args.domain, { notes: args.notes, scope: args.scope });
        return {
          content: [{ type: "text", text: `Added target ${target.domain}` }],
          structuredContent: { target, current: target.domain }
        };
      } catch (e) {
        throw toMcpError(e);
      }
    }
  );

  mcp.registerTool(
    "target_select",
    {
      description: "Select an existing target as the default for plugin runs.",
      inputSchema: zTargetSelectInput,
      outputSchema: zTargetCurrentOutput
    },
    async (args) => {
      try {
        await host.selectTarget(args.domain);
      } catch (e) {
        throw toMcpError(e);
      }
      return {
        content: [{ type: "text", text: `Selected ${args.domain}` }],
        structuredContent: { current: args.domain }
      };
    }
  );

  mcp.registerTool(
    "target_current",
    {
      description: "Show the selected target.",
      inputSchema: zTargetCurrentInput,
      outputSchema: zTargetCurrentOutput
    },
    async () => {
      const current = await host.currentTarget();
      return {
        content: [{ type: "text", text: current ?? "no target selected" }],
        structuredContent: { current }
      };
    }
  );

  mcp.registerTool(
    "run_get",
    {
      description: "Fetch a run record and its journaled events.",
      inputSchema: zRunGetInput,
      outputSchema: zRunGetOutput
    },
    async (args) => {
      if (!isRunId(args.run_id)) throw new McpError(ErrorCode.InvalidParams, `invalid run_id: ${args.run_id}`);
      const found = await host.getRun(args.run_id);
      if (!found) throw new McpError(ErrorCode.InvalidParams, `unknown run_id: ${args.run_id}`);

      const { run, events } = found;
      return {
        content: [{ type: "text", text: `${run.pluginName} ${run.status} (${run.runId})` }],
        structuredContent: {
          run: {
            run_id: run.runId,
            plugin: run.pluginName,
            category: run.category,
            target: run.target,
            options: run.options,
            policy_hash: run.policyHash,
            status: run.status,
            dispatch: run.dispatch,
            error_kind: run.errorKind,
            message: run.message,
            result: run.resultJson,
            requested_by: run.requestedBy,
            created_at: run.createdAt,
            finished_at: run.finishedAt
          },
          events: events.map((ev) => ({ ts: ev.ts, kind: ev.kind, message: ev.message, data: ev.data }))
        }
      };
    }
  );

  mcp.registerTool(
    "container_stop",
    {
      description: "Stop a container started by a fallback run.",
      inputSchema: zContainerStopInput,
      outputSchema: zContainerStopOutput
    },
    async (args) => {
      let stopped: boolean;
      try {
        stopped = await host.stopContainer(args.container_id);
      } catch (e) {
        throw toMcpError(e);
      }
      return {
        content: [{ type: "text", text: stopped ? `Stopped ${args.container_id}` : `Could not stop ${args.container_id}` }],
        structuredContent: { container_id: args.container_id, stopped }
      };
    }
  );

  return mcp;
}
