import type { PluginDefinition, PluginSource } from "../types.js";
import { subdomainEnumPlugin } from "./subdomainEnum.js";
import { toolCheckPlugin } from "./toolCheck.js";

export const builtinPluginDefinitions: PluginDefinition[] = [subdomainEnumPlugin, toolCheckPlugin];

export const builtinPluginSource: PluginSource = {
  id: "builtin",
  load: () => builtinPluginDefinitions
};
