import path from "path";
import { createPool } from "../src/db/connection.js";
import { createPluginHost } from "../src/host/pluginHost.js";
import { parseStandaloneArgs } from "../src/host/standaloneArgs.js";
import { PolicyEngine } from "../src/policy/policy.js";

function usage(): string {
  return [
    "usage:",
    "  tsx scripts/run_plugin.ts --plugin <name> [--target <domain>] [--options <json>]",
    "",
    "notes:",
    "  - Runs in this process without an admission check or container fallback and prints the outcome as JSON.",
    "  - Exit status is 0 on success, 1 otherwise.",
    ""
  ].join("\n");
}

async function main(): Promise<void> {
  const args = parseStandaloneArgs(process.argv.slice(2));
  if (args.help) {
    process.stdout.write(usage());
    return;
  }
  if (!args.plugin) throw new Error(`--plugin is required\n\n${usage()}`);

  const policy = await PolicyEngine.loadFromFile(
    path.resolve(process.env.PLUGINHOST_POLICY_PATH ?? "policies/default.policy.yaml")
  );
  const pool = createPool(process.env.DATABASE_URL);
  try {
    const host = await createPluginHost({
      policy,
      pool,
      containersEnabled: false,
      applySchema: !process.env.DATABASE_URL || (process.env.AUTO_SCHEMA ?? "true").toLowerCase() !== "false",
      configBackend: process.env.DATABASE_URL ? "database" : "file"
    });
    const outcome = await host.run(args.plugin, args.target, args.options, { dispatch: "direct" });
    process.stdout.write(JSON.stringify(outcome, null, 2) + "\n");
    process.exitCode = outcome.status === "success" ? 0 : 1;
  } finally {
    await pool.end();
  }
}

main().catch((err) => {
  console.error(err instanceof Error ? err.message : err);
  process.exitCode = 1;
});
