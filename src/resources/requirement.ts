/** Raw resource declaration as a plugin states it; values may be strings, numbers or booleans. */
export interface ResourceDeclaration {
  memory?: string | number;
  cpu?: string | number;
  disk?: string | number;
  network?: boolean | string;
}

export interface ResourceRequirement {
  readonly memoryMb: number;
  readonly cpuCores: number;
  readonly diskMb: number;
  readonly network: boolean;
}

export const DEFAULT_MAGNITUDE_MB = 100;
export const DEFAULT_CPU_CORES = 0.5;

// Two-letter suffixes must be tried before their one-letter prefixes ("2GB" is not "2G" + "B").
const UNIT_SUFFIXES: Array<{ suffix: string; toMb: (n: number) => number }> = [
  { suffix: "GB", toMb: (n) => n * 1024 },
  { suffix: "G", toMb: (n) => n * 1024 },
  { suffix: "MB", toMb: (n) => n },
  { suffix: "M", toMb: (n) => n },
  { suffix: "KB", toMb: (n) => n / 1024 },
  { suffix: "K", toMb: (n) => n / 1024 }
];

const NUMBER_RE = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

function parseNumber(text: string): number | null {
  const trimmed = text.trim();
  if (!NUMBER_RE.test(trimmed)) return null;
  const n = Number(trimmed);
  return Number.isFinite(n) ? n : null;
}

/**
 * Converts "2G", "500MB", "10KB" or a bare number (already megabytes) to whole megabytes.
 * Never throws: anything unparseable becomes {@link DEFAULT_MAGNITUDE_MB}.
 */
export function parseMagnitudeMb(value: unknown): number {
  if (typeof value === "number") {
    return Number.isFinite(value) ? Math.max(0, Math.trunc(value)) : DEFAULT_MAGNITUDE_MB;
  }
  if (typeof value !== "string") return DEFAULT_MAGNITUDE_MB;

  const text = value.trim().toUpperCase();
  for (const unit of UNIT_SUFFIXES) {
    if (!text.endsWith(unit.suffix)) continue;
    const n = parseNumber(text.slice(0, -unit.suffix.length));
    if (n === null) return DEFAULT_MAGNITUDE_MB;
    return Math.max(0, Math.trunc(unit.toMb(n)));
  }

  const n = parseNumber(text);
  if (n === null) return DEFAULT_MAGNITUDE_MB;
  return Math.max(0, Math.trunc(n));
}

function parseCpu(value: unknown): number {
  if (value === undefined || value === null) return DEFAULT_CPU_CORES;
  const n = typeof value === "number" ? value : typeof value === "string" ? parseNumber(value) : null;
  if (n === null || !Number.isFinite(n) || n < 0) return DEFAULT_CPU_CORES;
  return n;
}

function parseFlag(value: unknown): boolean {
  if (typeof value === "boolean") return value;
  if (typeof value === "number") return value !== 0;
  if (typeof value === "string") return ["true", "yes", "1", "on"].includes(value.trim().toLowerCase());
  return false;
}

export function parseRequirement(declaration: ResourceDeclaration | null | undefined): ResourceRequirement {
  const d = declaration ?? {};
  return Object.freeze({
    memoryMb: parseMagnitudeMb(d.memory ?? "100MB"),
    cpuCores: parseCpu(d.cpu),
    diskMb: parseMagnitudeMb(d.disk ?? "10MB"),
    network: parseFlag(d.network)
  });
}
