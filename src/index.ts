import path from "path";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { createPool } from "./db/connection.js";
import { createPluginHost } from "./host/pluginHost.js";
import { createGatewayServer } from "./mcp/gatewayServer.js";
import { envSnapshot } from "./mcp/envSnapshot.js";
import { PolicyEngine } from "./policy/policy.js";

async function main(): Promise<void> {
  const policyPath = process.env.PLUGINHOST_POLICY_PATH ?? "policies/default.policy.yaml";
  const autoSchema = (process.env.AUTO_SCHEMA ?? "true").toLowerCase() !== "false";

  const policy = await PolicyEngine.loadFromFile(path.resolve(policyPath));
  const pool = createPool(process.env.DATABASE_URL);
  const host = await createPluginHost({
    policy,
    pool,
    applySchema: !process.env.DATABASE_URL || autoSchema,
    configBackend: process.env.DATABASE_URL ? "database" : "file"
  });

  const server = createGatewayServer({ host });
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error(`plugin-host gateway ready ${JSON.stringify(envSnapshot(policy, host.resources.containerAvailable))}`);
}

main().catch((err) => {
  console.error(err);
  process.exitCode = 1;
});
