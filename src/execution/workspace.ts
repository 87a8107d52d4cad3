import { promises as fs } from "fs";
import path from "path";
import YAML from "yaml";
import * as z from "zod/v4";

export const TARGET_SUBDIRS = ["recon", "scan", "exploit", "report"] as const;
export type TargetSubdir = (typeof TARGET_SUBDIRS)[number];

const DOMAIN_RE = /^[A-Za-z0-9](?:[A-Za-z0-9.-]{0,251}[A-Za-z0-9])?$/;

export const zTargetMetadata = z.object({
  domain: z.string(),
  added: z.string(),
  notes: z.string(),
  scope: z.array(z.string())
});

export type TargetMetadata = z.infer<typeof zTargetMetadata>;

export interface TargetWorkspace {
  rootDir: string;
  metadata: TargetMetadata;
  dir(sub: TargetSubdir): string;
  filePath(sub: TargetSubdir, name: string): string;
}

function safeJoin(baseDir: string, name: string): string {
  const joined = path.join(baseDir, name);
  const rel = path.relative(baseDir, joined);
  if (rel.startsWith("..") || path.isAbsolute(rel)) {
    throw new Error(`unsafe workspace path: ${name}`);
  }
  return joined;
}

export { safeJoin };

export function assertValidDomain(domain: string): void {
  if (!DOMAIN_RE.test(domain) || domain.includes("..")) {
    throw new Error(`invalid target domain: ${domain}`);
  }
}

function targetsRoot(dataDir: string): string {
  return path.join(dataDir, "targets");
}

function targetDir(dataDir: string, domain: string): string {
  assertValidDomain(domain);
  return safeJoin(targetsRoot(dataDir), domain);
}

function workspaceFor(root: string, metadata: TargetMetadata): TargetWorkspace {
  return {
    rootDir: root,
    metadata,
    dir: (sub: TargetSubdir) => path.join(root, sub),
    filePath: (sub: TargetSubdir, name: string) => safeJoin(path.join(root, sub), name)
  };
}

/** Creates (or refreshes) the directory tree for a target and writes its metadata.yaml. */
export async function createTargetWorkspace(
  dataDir: string,
  domain: string,
  input: { notes?: string; scope?: string[]; now?: Date } = {}
): Promise<TargetWorkspace> {
  const root = targetDir(dataDir, domain);
  for (const sub of TARGET_SUBDIRS) {
    await fs.mkdir(path.join(root, sub), { recursive: true });
  }

  const metadata: TargetMetadata = {
    domain,
    added: (input.now ?? new Date()).toISOString(),
    notes: input.notes ?? "",
    scope: input.scope ?? [domain]
  };
  await fs.writeFile(path.join(root, "metadata.yaml"), YAML.stringify(metadata), "utf8");

  return workspaceFor(root, metadata);
}

export async function openTargetWorkspace(dataDir: string, domain: string): Promise<TargetWorkspace | null> {
  const root = targetDir(dataDir, domain);
  let raw: string;
  try {
    raw = await fs.readFile(path.join(root, "metadata.yaml"), "utf8");
  } catch (e) {
    if (e instanceof Error && "code" in e && e.code === "ENOENT") return null;
    throw e;
  }
  const parsed = zTargetMetadata.safeParse(YAML.parse(raw));
  if (!parsed.success) throw new Error(`corrupt metadata.yaml for target ${domain}`);
  return workspaceFor(root, parsed.data);
}

export async function targetExists(dataDir: string, domain: string): Promise<boolean> {
  return (await openTargetWorkspace(dataDir, domain)) !== null;
}

/** Targets with a readable metadata.yaml, sorted by domain. */
export async function listTargets(dataDir: string): Promise<TargetMetadata[]> {
  let entries: string[];
  try {
    entries = await fs.readdir(targetsRoot(dataDir));
  } catch (e) {
    if (e instanceof Error && "code" in e && e.code === "ENOENT") return [];
    throw e;
  }

  const out: TargetMetadata[] = [];
  for (const name of entries.sort()) {
    if (!DOMAIN_RE.test(name)) continue;
    const ws = await openTargetWorkspace(dataDir, name).catch((e: unknown) => {
      console.error(`[workspace] skipping target ${name}: ${e instanceof Error ? e.message : String(e)}`);
      return null;
    });
    if (ws) out.push(ws.metadata);
  }
  return out;
}
