import { promises as fs } from "fs";
import * as z from "zod/v4";
import type { JsonObject } from "../../core/json.js";
import { errorResult, successResult, type RunResult } from "../../core/run.js";
import { createTargetWorkspace, openTargetWorkspace } from "../../execution/workspace.js";
import type { Plugin, PluginContext, PluginDefinition } from "../types.js";

const TOOLS = ["subfinder", "amass", "assetfinder", "findomain"] as const;
type EnumTool = (typeof TOOLS)[number];

const zOptions = z.object({
  passive_only: z.boolean().optional(),
  tools: z.array(z.enum(TOOLS)).optional(),
  timeout_seconds: z.number().positive().optional()
});

function toolArgv(tool: EnumTool, domain: string, passiveOnly: boolean): string[] {
  switch (tool) {
    case "subfinder":
      return ["subfinder", "-d", domain, "-silent"];
    case "amass":
      return passiveOnly ? ["amass", "enum", "-passive", "-d", domain] : ["amass", "enum", "-d", domain];
    case "assetfinder":
      return ["assetfinder", "--subs-only", domain];
    case "findomain":
      return ["findomain", "-t", domain, "-q"];
  }
}

/** Hostnames in tool output that belong to `domain`, lower-cased. */
export function extractSubdomains(output: string, domain: string): string[] {
  const root = domain.toLowerCase();
  const found: string[] = [];
  for (const line of output.split(/\r?\n/)) {
    const host = line.trim().toLowerCase();
    if (!host || /\s/.test(host)) continue;
    if (host === root || host.endsWith(`.${root}`)) found.push(host);
  }
  return found;
}

class SubdomainEnumPlugin implements Plugin {
  private available: EnumTool[] = [];

  constructor(private readonly ctx: PluginContext) {}

  async setup(): Promise<void> {
    const available: EnumTool[] = [];
    for (const tool of TOOLS) {
      if (await this.ctx.commandAvailable(tool)) available.push(tool);
    }
    this.available = available;
    if (available.length === 0) {
      await this.ctx.log("warn", "No subdomain enumeration tools available", { checked: [...TOOLS] });
    }
  }

  async execute(target: string | null, options: JsonObject): Promise<RunResult> {
    if (!target) return errorResult("subdomain_enum requires a target domain");
    const parsed = zOptions.safeParse(options);
    if (!parsed.success) return errorResult(`invalid options: ${parsed.error.issues[0]?.message ?? "unknown issue"}`);

    const passiveOnly = parsed.data.passive_only ?? false;
    const wanted = parsed.data.tools ?? [...TOOLS];
    const tools = this.available.filter((t) => wanted.includes(t));
    if (tools.length === 0) {
      return errorResult("No subdomain enumeration tools available", { requested: wanted });
    }

    const ws = (await openTargetWorkspace(this.ctx.dataDir, target)) ?? (await createTargetWorkspace(this.ctx.dataDir, target));
    await this.ctx.log("info", `Running subdomain enumeration on ${target}`, { tools, passive_only: passiveOnly });

    const all = new Set<string>();
    const sources: Record<string, number> = {};
    for (const tool of tools) {
      const res = await this.ctx.exec(toolArgv(tool, target, passiveOnly), {
        timeoutSeconds: parsed.data.timeout_seconds ?? 600
      });
      if (res.exitCode !== 0) {
        await this.ctx.log("warn", `${tool} exited with code ${res.exitCode}`, { stderr: res.stderr.slice(-2000) });
      }
      const subs = [...new Set(extractSubdomains(res.stdout, target))].sort();
      sources[tool] = subs.length;
      await fs.writeFile(ws.filePath("recon", `${tool}_subdomains.txt`), subs.map((s) => `${s}\n`).join(""), "utf8");
      for (const s of subs) all.add(s);
    }

    const subdomains = [...all].sort();
    const outputFile = ws.filePath("recon", "subdomains.txt");
    await fs.writeFile(outputFile, subdomains.map((s) => `${s}\n`).join(""), "utf8");

    return successResult(`Found ${subdomains.length} subdomains`, {
      subdomains,
      sources,
      total: subdomains.length,
      output_file: outputFile
    });
  }

  async cleanup(): Promise<void> {
    this.available = [];
  }
}

export const subdomainEnumPlugin: PluginDefinition = {
  name: "subdomain_enum",
  category: "recon",
  description: "Enumerate subdomains of the target with whichever of subfinder, amass, assetfinder, findomain are installed",
  version: "1.0.0",
  dependencies: [],
  resources: { memory: "500MB", cpu: 1, disk: "50MB", network: true },
  create: (ctx) => new SubdomainEnumPlugin(ctx),
  cliOptions: () => [
    { name: "passive_only", kind: "boolean", description: "Skip active techniques", default: false },
    { name: "timeout_seconds", kind: "number", description: "Per-tool time limit", default: 600 }
  ],
  interactiveOptions: () => [
    { name: "passive_only", kind: "boolean", description: "Only use passive sources?", default: false }
  ]
};
