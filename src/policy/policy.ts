import { promises as fs } from "fs";
import os from "os";
import path from "path";
import YAML from "yaml";
import * as z from "zod/v4";
import { sha256Prefixed, stableJsonStringify } from "../core/canonicalJson.js";
import { PolicyError } from "../core/errors.js";
import { parseMagnitudeMb } from "../resources/requirement.js";

export const zPolicyConfig = z.object({
  version: z.number().int(),
  data_dir: z.string().min(1).optional(),
  resources: z
    .object({
      max_memory: z.union([z.string().min(1), z.number().nonnegative()]).optional(),
      max_cpu: z.number().positive().optional()
    })
    .optional(),
  network_probe: z
    .object({
      host: z.string().min(1).optional(),
      timeout_seconds: z.number().positive().optional()
    })
    .optional(),
  container: z
    .object({
      enabled: z.boolean().optional(),
      fallback: z.boolean().optional(),
      image: z.string().min(1).optional(),
      command: z.array(z.string().min(1)).min(1).optional(),
      data_mount: z.string().startsWith("/").optional(),
      network_mode: z.enum(["none", "bridge", "host"]).optional(),
      poll_interval_seconds: z.number().positive().optional(),
      poll_timeout_seconds: z.number().nonnegative().optional(),
      log_tail_lines: z.number().int().min(1).max(1000).optional()
    })
    .optional()
});

export type PolicyConfig = z.infer<typeof zPolicyConfig>;

export interface ContainerSettings {
  enabled: boolean;
  fallback: boolean;
  image: string;
  command: string[];
  dataMount: string;
  networkMode: "none" | "bridge" | "host";
  pollIntervalMs: number;
  pollTimeoutMs: number;
  logTailLines: number;
}

function expandEnvToken(value: string, env: NodeJS.ProcessEnv): string | null {
  const trimmed = value.trim();

  const m = /^\$\{([A-Z0-9_]+)\}$/.exec(trimmed) ?? /^\$([A-Z0-9_]+)$/.exec(trimmed);
  if (m) {
    const varName = m[1];
    if (!varName) return null;
    const v = env[varName]?.trim();
    return v ? v : null;
  }

  return value;
}

export class PolicyEngine {
  readonly policyHash: `sha256:${string}`;

  constructor(
    private readonly policy: PolicyConfig,
    private readonly env: NodeJS.ProcessEnv = process.env
  ) {
    this.policyHash = sha256Prefixed(stableJsonStringify(policy));
  }

  static parse(value: unknown, source = "policy", env: NodeJS.ProcessEnv = process.env): PolicyEngine {
    const parsed = zPolicyConfig.safeParse(value);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue ? `${issue.path.map(String).join(".") || "(root)"}: ${issue.message}` : "unknown issue";
      throw new PolicyError(`invalid policy at ${source}: ${where}`);
    }
    return new PolicyEngine(parsed.data, env);
  }

  static async loadFromFile(filePath: string, env: NodeJS.ProcessEnv = process.env): Promise<PolicyEngine> {
    const raw = await fs.readFile(filePath, "utf8");
    return PolicyEngine.parse(YAML.parse(raw) as unknown, filePath, env);
  }

  snapshot(): PolicyConfig {
    return structuredClone(this.policy);
  }

  dataDir(): string {
    const override = this.env.PLUGINHOST_DATA_DIR?.trim();
    if (override) return path.resolve(override);
    const configured = this.policy.data_dir ? expandEnvToken(this.policy.data_dir, this.env) : null;
    return path.resolve(configured ?? "data");
  }

  /** Memory ceiling in MB; `MAX_MEMORY` wins over the policy, which defaults to 4G. */
  maxMemoryMb(): number {
    const fromEnv = this.env.MAX_MEMORY?.trim();
    if (fromEnv) return parseMagnitudeMb(fromEnv);
    return parseMagnitudeMb(this.policy.resources?.max_memory ?? "4G");
  }

  /** CPU ceiling in cores; `MAX_CPU` wins over the policy, which defaults to the host core count. */
  maxCpu(): number {
    const fromEnv = Number(this.env.MAX_CPU?.trim());
    if (this.env.MAX_CPU?.trim() && Number.isFinite(fromEnv) && fromEnv > 0) return fromEnv;
    return this.policy.resources?.max_cpu ?? os.cpus().length;
  }

  networkProbe(): { host: string; timeoutMs: number } {
    return {
      host: this.policy.network_probe?.host ?? "8.8.8.8",
      timeoutMs: Math.round((this.policy.network_probe?.timeout_seconds ?? 2) * 1000)
    };
  }

  container(): ContainerSettings {
    const c = this.policy.container ?? {};
    const image = c.image ? expandEnvToken(c.image, this.env) : null;
    return {
      enabled: c.enabled ?? true,
      fallback: c.fallback ?? true,
      image: image ?? "plugin-host:latest",
      command: c.command ?? ["node", "dist/scripts/run_plugin.js"],
      dataMount: c.data_mount ?? "/app/data",
      networkMode: c.network_mode ?? "bridge",
      pollIntervalMs: Math.round((c.poll_interval_seconds ?? 5) * 1000),
      pollTimeoutMs: Math.round((c.poll_timeout_seconds ?? 3600) * 1000),
      logTailLines: c.log_tail_lines ?? 10
    };
  }
}
