import * as z from "zod/v4";

const ulid26 = "[0-9A-HJKMNP-TV-Z]{26}";

export const zRunId = z.string().regex(new RegExp(`^run_${ulid26}$`), "invalid run_id");
export const zPluginName = z.string().min(1).max(128);
export const zDomain = z.string().min(1).max(253);

const zJsonRecord = z.record(z.string(), z.unknown());

const zOptionSpec = z.object({
  name: z.string(),
  kind: z.enum(["string", "number", "boolean", "choice"]),
  description: z.string(),
  default: z.unknown().optional(),
  choices: z.array(z.string()).optional()
});

export const zPluginListInput = z.object({
  category: z.string().min(1).optional()
});

export const zPluginListOutput = z.object({
  plugins: z.array(
    z.object({
      name: z.string(),
      category: z.string(),
      description: z.string(),
      version: z.string(),
      dependencies: z.array(z.string()),
      resources: zJsonRecord,
      source: z.string(),
      cli_options: z.array(zOptionSpec),
      interactive_options: z.array(zOptionSpec)
    })
  )
});

export const zPluginCheckInput = z.object({
  plugin: zPluginName
});

export const zPluginCheckOutput = z.object({
  plugin: z.string(),
  admitted: z.boolean(),
  reason: z.string()
});

export const zPluginRunInput = z.object({
  plugin: zPluginName,
  target: zDomain.optional(),
  options: zJsonRecord.optional(),
  dispatch: z.enum(["auto", "local", "container"]).optional(),
  allow_container_fallback: z.boolean().optional()
});

export const zRunErrorKind = z.enum([
  "not_found",
  "target_required",
  "admission_denied",
  "capability_unavailable",
  "execution_error",
  "dispatch_error"
]);

export const zPluginRunOutput = z.object({
  run_id: zRunId,
  plugin: z.string(),
  status: z.enum(["success", "error"]),
  message: z.string(),
  data: zJsonRecord,
  dispatch: z.enum(["local", "container"]).nullable(),
  error_kind: zRunErrorKind.nullable(),
  elapsed_seconds: z.number().nullable(),
  container_id: z.string().nullable()
});

const zRequirement = z.object({
  memory_mb: z.number(),
  cpu_cores: z.number(),
  disk_mb: z.number(),
  network: z.boolean()
});

export const zResourceUsageInput = z.object({});

export const zResourceUsageOutput = z.object({
  taken_at: z.string(),
  memory: z.object({ total_mb: z.number(), available_mb: z.number(), used_mb: z.number(), percent: z.number() }),
  cpu: z.object({ cores: z.number(), percent: z.number() }),
  disk: z.object({
    path: z.string(),
    total_mb: z.number(),
    free_mb: z.number(),
    used_mb: z.number(),
    percent: z.number()
  }),
  processes: z.record(
    z.string(),
    z.object({
      name: z.string(),
      requirement: zRequirement,
      started_at: z.string(),
      runtime_seconds: z.number(),
      memory_mb: z.number().nullable()
    })
  )
});

const zTargetMetadata = z.object({
  domain: z.string(),
  added: z.string(),
  notes: z.string(),
  scope: z.array(z.string())
});

export const zTargetListInput = z.object({});

export const zTargetListOutput = z.object({
  targets: z.array(zTargetMetadata),
  current: z.string().nullable()
});

export const zTargetAddInput = z.object({
  domain: zDomain,
  notes: z.string().max(4096).optional(),
  scope: z.array(z.string().min(1)).optional()
});

export const zTargetAddOutput = z.object({
  target: zTargetMetadata,
  current: z.string()
});

export const zTargetSelectInput = z.object({
  domain: zDomain
});

export const zTargetCurrentInput = z.object({});

export const zTargetCurrentOutput = z.object({
  current: z.string().nullable()
});

export const zRunGetInput = z.object({
  run_id: zRunId
});

export const zRunGetOutput = z.object({
  run: z.object({
    run_id: zRunId,
    plugin: z.string(),
    category: z.string().nullable(),
    target: z.string().nullable(),
    options: zJsonRecord,
    policy_hash: z.string(),
    status: z.enum(["running", "succeeded", "failed"]),
    dispatch: z.enum(["local", "container"]).nullable(),
    error_kind: zRunErrorKind.nullable(),
    message: z.string().nullable(),
    result: zJsonRecord.nullable(),
    requested_by: z.string().nullable(),
    created_at: z.string(),
    finished_at: z.string().nullable()
  }),
  events: z.array(
    z.object({
      ts: z.string(),
      kind: z.string(),
      message: z.string().nullable(),
      data: zJsonRecord.nullable()
    })
  )
});

export const zContainerStopInput = z.object({
  container_id: z.string().min(1).max(128)
});

export const zContainerStopOutput = z.object({
  container_id: z.string(),
  stopped: z.boolean()
});
