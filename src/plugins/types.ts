import type { JsonObject, JsonValue } from "../core/json.js";
import type { RunResult } from "../core/run.js";
import type { ExecutionResult } from "../execution/backends/types.js";
import type { ResourceDeclaration } from "../resources/requirement.js";

/** Plugins in this category take no target. */
export const UTILITY_CATEGORY = "utility";

export interface PluginDescriptor {
  name: string;
  category: string;
  description: string;
  version: string;
  /** Plugins expected to have run first. Advisory only. */
  dependencies: string[];
  resources: ResourceDeclaration;
}

export interface PluginOptionSpec {
  name: string;
  kind: "string" | "number" | "boolean" | "choice";
  description: string;
  default?: JsonValue;
  choices?: string[];
}

export type PluginLogLevel = "info" | "warn" | "error";

export interface PluginContext {
  pluginName: string;
  dataDir: string;
  log(level: PluginLogLevel, message: string, data?: JsonObject): Promise<void>;
  /** Runs an external command; the child is tracked as a running process until it exits. */
  exec(argv: string[], opts?: { cwd?: string; env?: Record<string, string>; timeoutSeconds?: number }): Promise<ExecutionResult>;
  commandAvailable(command: string): Promise<boolean>;
}

export interface Plugin {
  /** Idempotent. Report missing preconditions through ctx.log rather than throwing. */
  setup(): Promise<void>;
  execute(target: string | null, options: JsonObject): Promise<RunResult>;
  /** Called exactly once after execute, whatever execute did. */
  cleanup(): Promise<void>;
}

export interface PluginDefinition extends PluginDescriptor {
  create(ctx: PluginContext): Plugin;
  cliOptions?(): PluginOptionSpec[];
  interactiveOptions?(): PluginOptionSpec[];
}

export interface PluginSource {
  id: string;
  load(): PluginDefinition[] | Promise<PluginDefinition[]>;
}

export interface RegisteredPlugin {
  descriptor: PluginDescriptor;
  definition: PluginDefinition;
  source: string;
}

/** category -> plugin name -> entry */
export type PluginCatalog = Record<string, Record<string, RegisteredPlugin>>;
