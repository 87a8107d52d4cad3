import type { PluginCatalog, PluginDefinition, PluginDescriptor, PluginSource, RegisteredPlugin } from "./types.js";

const PLUGIN_NAME_RE = /^[a-z][a-z0-9_]*$/;
const CATEGORY_RE = /^[a-z][a-z0-9_-]*$/;
const RESERVED_NAMES = new Set(["base_plugin"]);
const RESOURCE_KEYS = new Set(["memory", "cpu", "disk", "network"]);

export type WarningSink = (message: string) => void;

// Sources may be plain JavaScript, so the declared shape is checked again at run time.
function validatePluginDefinition(d: PluginDefinition): PluginDefinition {
  if (!d || typeof d !== "object") {
    throw new Error(`plugin: definition must be an object`);
  }

  if (typeof d.name !== "string" || !d.name) {
    throw new Error(`plugin: missing name`);
  }
  const name = d.name;
  if (name.length > 128 || !PLUGIN_NAME_RE.test(name)) {
    throw new Error(`plugin: invalid name: ${name}`);
  }
  if (RESERVED_NAMES.has(name)) {
    throw new Error(`plugin:${name}: name is reserved`);
  }
  if (typeof d.category !== "string" || !CATEGORY_RE.test(d.category)) {
    throw new Error(`plugin:${name}: invalid category: ${String(d.category)}`);
  }
  if (typeof d.description !== "string" || d.description.trim().length === 0) {
    throw new Error(`plugin:${name}: description must be a non-empty string`);
  }
  if (typeof d.version !== "string" || d.version.trim().length === 0) {
    throw new Error(`plugin:${name}: version must be a non-empty string`);
  }
  if (!Array.isArray(d.dependencies) || !d.dependencies.every((dep) => typeof dep === "string")) {
    throw new Error(`plugin:${name}: dependencies must be an array of plugin names`);
  }
  if (!d.resources || typeof d.resources !== "object" || Array.isArray(d.resources)) {
    throw new Error(`plugin:${name}: resources must be an object`);
  }
  for (const key of Object.keys(d.resources)) {
    if (!RESOURCE_KEYS.has(key)) throw new Error(`plugin:${name}: unknown resource key: ${key}`);
  }
  if (typeof d.create !== "function") {
    throw new Error(`plugin:${name}: create must be a function`);
  }
  for (const hook of ["cliOptions", "interactiveOptions"] as const) {
    if (d[hook] !== undefined && typeof d[hook] !== "function") {
      throw new Error(`plugin:${name}: ${hook} must be a function`);
    }
  }

  return d;
}

export function describePlugin(def: PluginDefinition): PluginDescriptor {
  return {
    name: def.name,
    category: def.category,
    description: def.description,
    version: def.version,
    dependencies: [...def.dependencies],
    resources: { ...def.resources }
  };
}

/**
 * Plugins are registered through explicit sources. Every lookup calls the sources again, so a
 * plugin a source starts returning is visible on the next call without restarting.
 */
export class PluginRegistry {
  private readonly sources: PluginSource[] = [];

  constructor(private readonly warn: WarningSink = (m) => console.error(m)) {}

  register(source: PluginSource): this {
    if (this.sources.some((s) => s.id === source.id)) {
      throw new Error(`plugin source already registered: ${source.id}`);
    }
    this.sources.push(source);
    return this;
  }

  async discover(): Promise<PluginCatalog> {
    const catalog: PluginCatalog = {};
    const seen = new Map<string, string>();

    for (const source of this.sources) {
      let defs: PluginDefinition[];
      try {
        defs = await source.load();
      } catch (e) {
        this.warn(`plugin source ${source.id} failed to load: ${e instanceof Error ? e.message : String(e)}`);
        continue;
      }
      if (!Array.isArray(defs)) {
        this.warn(`plugin source ${source.id} did not return a list of plugins`);
        continue;
      }

      for (const raw of defs) {
        let def: PluginDefinition;
        try {
          def = validatePluginDefinition(raw);
        } catch (e) {
          this.warn(`plugin source ${source.id}: skipped: ${e instanceof Error ? e.message : String(e)}`);
          continue;
        }

        const owner = seen.get(def.name);
        if (owner !== undefined) {
          this.warn(`plugin source ${source.id}: duplicate plugin name ${def.name} (already provided by ${owner})`);
          continue;
        }
        seen.set(def.name, source.id);

        const entry: RegisteredPlugin = { descriptor: describePlugin(def), definition: def, source: source.id };
        const bucket = catalog[def.category] ?? {};
        bucket[def.name] = entry;
        catalog[def.category] = bucket;
      }
    }

    return catalog;
  }

  async list(category?: string): Promise<PluginCatalog> {
    const catalog = await this.discover();
    if (category === undefined) return catalog;
    const bucket = Object.hasOwn(catalog, category) ? catalog[category] : undefined;
    return bucket ? { [category]: bucket } : {};
  }

  async resolve(name: string): Promise<RegisteredPlugin | null> {
    const catalog = await this.discover();
    for (const bucket of Object.values(catalog)) {
      const entry = Object.hasOwn(bucket, name) ? bucket[name] : undefined;
      if (entry) return entry;
    }
    return null;
  }
}
