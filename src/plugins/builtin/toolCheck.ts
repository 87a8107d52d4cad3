import type { JsonObject } from "../../core/json.js";
import { errorResult, successResult, type RunResult } from "../../core/run.js";
import { UTILITY_CATEGORY, type Plugin, type PluginContext, type PluginDefinition } from "../types.js";

export const KNOWN_TOOLS = ["subfinder", "amass", "assetfinder", "findomain", "httpx", "nuclei", "ffuf", "nmap"];

class ToolCheckPlugin implements Plugin {
  constructor(private readonly ctx: PluginContext) {}

  async setup(): Promise<void> {}

  async execute(_target: string | null, options: JsonObject): Promise<RunResult> {
    const requested = options["tools"];
    let tools = KNOWN_TOOLS;
    if (typeof requested === "string") {
      tools = requested
        .split(",")
        .map((t) => t.trim())
        .filter(Boolean);
    } else if (requested !== undefined) {
      if (!Array.isArray(requested) || !requested.every((t): t is string => typeof t === "string")) {
        return errorResult("option tools must be a command list or a comma-separated string");
      }
      tools = requested;
    }

    const available: string[] = [];
    const missing: string[] = [];
    for (const tool of tools) {
      if (await this.ctx.commandAvailable(tool)) available.push(tool);
      else missing.push(tool);
    }

    return successResult(`${available.length} of ${tools.length} tools available`, { available, missing });
  }

  async cleanup(): Promise<void> {}
}

export const toolCheckPlugin: PluginDefinition = {
  name: "tool_check",
  category: UTILITY_CATEGORY,
  description: "Report which external security tools are installed on PATH",
  version: "1.0.0",
  dependencies: [],
  resources: { memory: "10MB", cpu: 0.1, disk: 0, network: false },
  create: (ctx) => new ToolCheckPlugin(ctx),
  cliOptions: () => [{ name: "tools", kind: "string", description: "Comma-separated command names to check" }]
};
