import { promises as fs } from "fs";
import path from "path";
import YAML from "yaml";
import { isJsonObject, type JsonObject, type JsonValue } from "../core/json.js";
import type { PostgresStore } from "./postgresStore.js";

export const CURRENT_TARGET_KEY = "current_target";
export const CONFIG_FILE_NAME = "config.yaml";

export interface ConfigStore {
  get(key: string, fallback: JsonValue): Promise<JsonValue>;
  set(key: string, value: JsonValue): Promise<void>;
}

export class SettingsConfigStore implements ConfigStore {
  constructor(private readonly store: PostgresStore) {}

  async get(key: string, fallback: JsonValue): Promise<JsonValue> {
    const value = await this.store.getSetting(key);
    return value === undefined ? fallback : value;
  }

  async set(key: string, value: JsonValue): Promise<void> {
    await this.store.putSetting(key, value);
  }
}

/**
 * Settings in a YAML file under the data directory. Used when the run store is the in-process
 * database, so the selected target survives a restart.
 */
export class YamlFileConfigStore implements ConfigStore {
  constructor(readonly filePath: string) {}

  private async load(): Promise<JsonObject> {
    let text: string;
    try {
      text = await fs.readFile(this.filePath, "utf8");
    } catch (e) {
      if (e instanceof Error && "code" in e && e.code === "ENOENT") return {};
      throw e;
    }
    const parsed: unknown = YAML.parse(text);
    if (parsed === null || parsed === undefined) return {};
    if (!isJsonObject(parsed)) throw new Error(`corrupt config file: ${this.filePath}`);
    return parsed;
  }

  async get(key: string, fallback: JsonValue): Promise<JsonValue> {
    const data = await this.load();
    const value = Object.hasOwn(data, key) ? data[key] : undefined;
    return value === undefined ? fallback : value;
  }

  async set(key: string, value: JsonValue): Promise<void> {
    const data = await this.load();
    data[key] = value;
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    const tmp = `${this.filePath}.tmp`;
    await fs.writeFile(tmp, YAML.stringify(data), "utf8");
    await fs.rename(tmp, this.filePath);
  }
}

/** The selected target, or null when none is set or the stored value is not a string. */
export async function readCurrentTarget(config: ConfigStore): Promise<string | null> {
  const value = await config.get(CURRENT_TARGET_KEY, null);
  return typeof value === "string" && value.length > 0 ? value : null;
}
