/** Container dispatch was requested but no container runtime answered the probe. */
export class CapabilityUnavailableError extends Error {
  constructor(message = "container runtime is not available") {
    super(message);
    this.name = "CapabilityUnavailableError";
  }
}

/** The container runtime refused to launch or inspect; `diagnostic` is its raw stderr. */
export class DispatchError extends Error {
  readonly diagnostic: string;

  constructor(message: string, diagnostic = "") {
    super(diagnostic ? `${message}: ${diagnostic.trim()}` : message);
    this.name = "DispatchError";
    this.diagnostic = diagnostic;
  }
}

export class PolicyError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PolicyError";
  }
}

export class UnknownTargetError extends Error {
  constructor(readonly domain: string) {
    super(`Target '${domain}' does not exist`);
    this.name = "UnknownTargetError";
  }
}

export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message;
  return typeof e === "string" ? e : "unknown error";
}
