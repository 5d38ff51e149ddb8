export class ConfigurationError extends Error {
  constructor(message: string, public cause?: unknown) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export class ScanError extends Error {
  constructor(message: string, public readonly root: string, public cause?: unknown) {
    super(message);
    this.name = "ScanError";
  }
}

export function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
