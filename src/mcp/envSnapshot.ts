import os from "os";
import type { JsonObject } from "../core/json.js";
import type { PolicyEngine } from "../policy/policy.js";

/** Startup banner fields for the stderr log. */
export function envSnapshot(policy: PolicyEngine, containerAvailable: boolean): JsonObject {
  return {
    node: process.version,
    platform: `${os.platform()}-${os.arch()}`,
    mode: process.env.DATABASE_URL ? "postgres" : "pg-mem",
    data_dir: policy.dataDir(),
    policy_hash: policy.policyHash,
    max_memory_mb: policy.maxMemoryMb(),
    max_cpu: policy.maxCpu(),
    containers: containerAvailable
  };
}
