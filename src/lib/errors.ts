import { ParseStage } from "./types";

interface ParseErrorDetails {
  stage: ParseStage;
  url: string;
  diagnostic?: string;
  cause?: unknown;
}

/**
 * Base class for errors that abort a parse request. Carries enough context
 * (URL, stage, raw diagnostic) for the interface to attribute the failure.
 */
export class VehicleParseError extends Error {
  readonly stage: ParseStage;
  readonly url: string;
  readonly diagnostic: string | null;

  constructor(message: string, details: ParseErrorDetails) {
    super(message, { cause: details.cause });
    this.name = new.target.name;
    this.stage = details.stage;
    this.url = details.url;
    this.diagnostic = details.diagnostic ?? null;
  }
}

/** Malformed URL, DNS/network failure or a non-2xx response. */
export class NavigationError extends VehicleParseError {}

/** Navigation or the ready signal did not complete in time. Retryable by the caller. */
export class FetchTimeout extends VehicleParseError {}

/** A page region the extractor relies on is absent from the DOM. */
export class StructureMismatch extends VehicleParseError {
  readonly region: string;

  constructor(region: string, details: Omit<ParseErrorDetails, "stage">) {
    super(`Region "${region}" not found on ${details.url}`, {
      ...details,
      stage: "extracting",
    });
    this.region = region;
  }
}

/** The caller aborted the request. */
export class ParseCancelled extends VehicleParseError {}

/** Abort reason used by request deadlines, so timeouts can be told apart from cancellation. */
export class DeadlineExceeded extends Error {
  constructor(timeoutMs: number) {
    super(`Deadline of ${timeoutMs}ms exceeded`);
    this.name = "DeadlineExceeded";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
