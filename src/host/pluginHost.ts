import { promises as fs } from "fs";
import path from "path";
import type * as pg from "pg";
import { applySchema, createDb } from "../db/connection.js";
import { UnknownTargetError } from "../core/errors.js";
import type { RunId } from "../core/ids.js";
import type { JsonObject } from "../core/json.js";
import type { RunEventRecord, RunOutcome, RunRecord } from "../core/run.js";
import { DockerCli } from "../execution/backends/dockerCli.js";
import { LocalProcessRunner } from "../execution/backends/localProcess.js";
import type { ContainerRuntime, RunnerBackend } from "../execution/backends/types.js";
import { ExecutionOrchestrator, type RunOptions } from "../execution/orchestrator.js";
import { createTargetWorkspace, listTargets, targetExists, type TargetMetadata } from "../execution/workspace.js";
import type { PolicyEngine } from "../policy/policy.js";
import { builtinPluginSource } from "../plugins/builtin/index.js";
import { PluginRegistry, type WarningSink } from "../plugins/registry.js";
import type { PluginDescriptor, PluginOptionSpec, PluginSource } from "../plugins/types.js";
import { parseRequirement } from "../resources/requirement.js";
import { ResourceManager, type AdmissionVerdict, type ResourceSnapshot } from "../resources/resourceManager.js";
import { NodeSystemProbe, type SystemProbe } from "../resources/systemProbe.js";
import {
  CONFIG_FILE_NAME,
  CURRENT_TARGET_KEY,
  readCurrentTarget,
  SettingsConfigStore,
  YamlFileConfigStore,
  type ConfigStore
} from "../store/configStore.js";
import { PostgresStore } from "../store/postgresStore.js";

export interface PluginSummary extends PluginDescriptor {
  source: string;
  cliOptions: PluginOptionSpec[];
  interactiveOptions: PluginOptionSpec[];
}

/** category -> plugin name -> summary, both levels in sorted key order */
export type PluginListing = Record<string, Record<string, PluginSummary>>;

export interface PluginHostParts {
  policy: PolicyEngine;
  registry: PluginRegistry;
  resources: ResourceManager;
  store: PostgresStore;
  config: ConfigStore;
  orchestrator: ExecutionOrchestrator;
}

/** The process-wide context: one per process, passed explicitly to every caller surface. */
export class PluginHost {
  readonly policy: PolicyEngine;
  readonly registry: PluginRegistry;
  readonly resources: ResourceManager;
  private readonly store: PostgresStore;
  private readonly config: ConfigStore;
  private readonly orchestrator: ExecutionOrchestrator;

  constructor(parts: PluginHostParts) {
    this.policy = parts.policy;
    this.registry = parts.registry;
    this.resources = parts.resources;
    this.store = parts.store;
    this.config = parts.config;
    this.orchestrator = parts.orchestrator;
  }

  async listPlugins(category?: string): Promise<PluginListing> {
    const catalog = await this.registry.list(category);
    const out: PluginListing = {};
    for (const cat of Object.keys(catalog).sort()) {
      const bucket = catalog[cat] ?? {};
      const summaries: Record<string, PluginSummary> = {};
      for (const name of Object.keys(bucket).sort()) {
        const entry = bucket[name];
        if (!entry) continue;
        summaries[name] = {
          ...entry.descriptor,
          source: entry.source,
          cliOptions: entry.definition.cliOptions?.() ?? [],
          interactiveOptions: entry.definition.interactiveOptions?.() ?? []
        };
      }
      out[cat] = summaries;
    }
    return out;
  }

  run(name: string, target: string | null, options: JsonObject, opts: RunOptions = {}): Promise<RunOutcome> {
    return this.orchestrator.run(name, target, options, opts);
  }

  resourceUsage(): Promise<ResourceSnapshot> {
    return this.resources.getResourceUsage();
  }

  /** Admission dry run; nothing is journaled. */
  async check(name: string): Promise<AdmissionVerdict> {
    const entry = await this.registry.resolve(name);
    if (!entry) return { admitted: false, reason: `Plugin '${name}' not found` };
    return this.resources.checkResources(parseRequirement(entry.descriptor.resources));
  }

  currentTarget(): Promise<string | null> {
    return readCurrentTarget(this.config);
  }

  async selectTarget(domain: string): Promise<void> {
    if (!(await targetExists(this.policy.dataDir(), domain))) throw new UnknownTargetError(domain);
    await this.config.set(CURRENT_TARGET_KEY, domain);
  }

  async addTarget(domain: string, input: { notes?: string; scope?: string[] } = {}): Promise<TargetMetadata> {
    const ws = await createTargetWorkspace(this.policy.dataDir(), domain, input);
    await this.config.set(CURRENT_TARGET_KEY, domain);
    return ws.metadata;
  }

  listTargets(): Promise<TargetMetadata[]> {
    return listTargets(this.policy.dataDir());
  }

  async getRun(runId: RunId): Promise<{ run: RunRecord; events: RunEventRecord[] } | null> {
    const run = await this.store.getRun(runId);
    if (!run) return null;
    return { run, events: await this.store.listRunEvents(runId) };
  }

  stopContainer(containerId: string): Promise<boolean> {
    return this.resources.stopContainer(containerId);
  }
}

export interface CreatePluginHostOptions {
  policy: PolicyEngine;
  pool: pg.Pool;
  /** Defaults to the builtin plugins. */
  sources?: PluginSource[];
  probe?: SystemProbe;
  runtime?: ContainerRuntime;
  runner?: RunnerBackend<"local_process">;
  warn?: WarningSink;
  /** Overrides the policy's container.enabled; false skips the runtime probe. */
  containersEnabled?: boolean;
  /** Apply db/schema.sql before use. */
  applySchema?: boolean;
  schemaPath?: string;
  /**
   * Where the selected target lives: the run store's settings table, or `config.yaml` under the
   * data directory. Defaults to "database".
   */
  configBackend?: "database" | "file";
}

export async function createPluginHost(opts: CreatePluginHostOptions): Promise<PluginHost> {
  if (opts.applySchema ?? true) {
    await applySchema(opts.pool, opts.schemaPath ?? "db/schema.sql");
  }

  const policy = opts.policy;
  await fs.mkdir(policy.dataDir(), { recursive: true });
  const runner = opts.runner ?? new LocalProcessRunner();
  const store = new PostgresStore(createDb(opts.pool));
  const config: ConfigStore =
    opts.configBackend === "file"
      ? new YamlFileConfigStore(path.join(policy.dataDir(), CONFIG_FILE_NAME))
      : new SettingsConfigStore(store);

  const registry = new PluginRegistry(opts.warn);
  for (const source of opts.sources ?? [builtinPluginSource]) registry.register(source);

  const container = policy.container();
  const resources = await ResourceManager.create({
    probe: opts.probe ?? new NodeSystemProbe(runner),
    runtime: opts.runtime ?? new DockerCli(runner),
    maxMemoryMb: policy.maxMemoryMb(),
    maxCpu: policy.maxCpu(),
    workDir: policy.dataDir(),
    networkProbe: policy.networkProbe(),
    containersEnabled: opts.containersEnabled ?? container.enabled,
    logTailLines: container.logTailLines
  });

  const orchestrator = new ExecutionOrchestrator({ registry, resources, store, config, policy, runner });
  return new PluginHost({ policy, registry, resources, store, config, orchestrator });
}
