export type ErrorCode =
  | "CONFIG"
  | "INVALID_INPUT"
  | "CATALOG"
  | "IO"
  | "FETCH"
  | "INTERRUPTED"
  | "UNEXPECTED";

export class PipelineError extends Error {
  constructor(public readonly code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigError extends PipelineError {
  constructor(public readonly missing: string[], message?: string) {
    super("CONFIG", message ?? `Missing required environment variables: ${missing.join(", ")}`);
  }
}

export class InvalidInputError extends PipelineError {
  constructor(public readonly input: string) {
    super(
      "INVALID_INPUT",
      "Invalid URL format. Please provide a Spotify playlist or album URL."
    );
  }
}

export class CatalogError extends PipelineError {
  constructor(message: string, public readonly statusCode?: number, cause?: unknown) {
    super("CATALOG", message, { cause });
  }
}

export class IOError extends PipelineError {
  constructor(message: string, public readonly path: string, cause?: unknown) {
    super("IO", message, { cause });
  }
}

export class FetchError extends PipelineError {
  constructor(message: string, public readonly exitCode: number | null, cause?: unknown) {
    super("FETCH", message, { cause });
  }
}

export class InterruptedError extends PipelineError {
  constructor(message = "Interrupted by user") {
    super("INTERRUPTED", message);
  }
}

export const errorMessage = (e: unknown): string =>
  e instanceof Error ? e.message : String(e);

// spotify-web-api-node rejects with a WebapiError carrying statusCode
export const statusCodeOf = (e: unknown): number | undefined => {
  if (typeof e === "object" && e !== null && "statusCode" in e) {
    const code = e.statusCode;
    return typeof code === "number" ? code : undefined;
  }
  return undefined;
};

export function toPipelineError(e: unknown, fallback: (msg: string) => PipelineError): PipelineError {
  return e instanceof PipelineError ? e : fallback(errorMessage(e));
}
