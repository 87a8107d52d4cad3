import { isJsonObject, type JsonObject } from "../core/json.js";

export interface StandaloneArgs {
  help: boolean;
  plugin: string | null;
  target: string | null;
  options: JsonObject;
}

/** Parses `--plugin <name> [--target <t>] [--options <json>]`, the argv the container fallback builds. */
export function parseStandaloneArgs(argv: string[]): StandaloneArgs {
  const out: StandaloneArgs = { help: false, plugin: null, target: null, options: {} };
  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (!a) continue;
    if (!a.startsWith("--")) throw new Error(`unexpected arg: ${a}`);
    const key = a.slice(2);
    if (key === "help") {
      out.help = true;
      continue;
    }
    const next = argv[i + 1];
    if (next === undefined || next.startsWith("--")) throw new Error(`missing value for --${key}`);
    i++;

    switch (key) {
      case "plugin":
        out.plugin = next;
        break;
      case "target":
        out.target = next;
        break;
      case "options": {
        let parsed: unknown;
        try {
          parsed = JSON.parse(next);
        } catch {
          throw new Error(`--options is not valid JSON: ${next}`);
        }
        if (!isJsonObject(parsed)) throw new Error("--options must be a JSON object");
        out.options = parsed;
        break;
      }
      default:
        throw new Error(`unknown option: --${key}`);
    }
  }
  return out;
}
