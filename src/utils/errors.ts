export type SentinelErrorCode =
  | "CONFIG"
  | "RECORD_PARSE"
  | "REASONING_TIMEOUT"
  | "REASONING_UNAVAILABLE"
  | "MALFORMED_RESPONSE"
  | "INDEX_CORRUPTION"
  | "MITIGATION_DISPATCH";

export abstract class SentinelError extends Error {
  abstract readonly code: SentinelErrorCode;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Startup-only. The only error that halts the process. */
export class ConfigError extends SentinelError {
  readonly code = "CONFIG";

  constructor(
    message: string,
    readonly issues: string[] = [],
    options?: ErrorOptions,
  ) {
    super(message, options);
  }
}

export class RecordParseError extends SentinelError {
  readonly code = "RECORD_PARSE";

  constructor(
    message: string,
    readonly index: number | null,
    readonly issues: string[] = [],
  ) {
    super(message);
  }
}

export class ReasoningTimeout extends SentinelError {
  readonly code = "REASONING_TIMEOUT";

  constructor(readonly timeoutMs: number, options?: ErrorOptions) {
    super(`Reasoning call timed out after ${timeoutMs}ms`, options);
  }
}

export class ReasoningUnavailable extends SentinelError {
  readonly code = "REASONING_UNAVAILABLE";
}

export class MalformedResponse extends SentinelError {
  readonly code = "MALFORMED_RESPONSE";

  constructor(
    message: string,
    readonly raw: string = "",
    options?: ErrorOptions,
  ) {
    super(message, options);
  }
}

export class IndexCorruption extends SentinelError {
  readonly code = "INDEX_CORRUPTION";
}

export class MitigationDispatchError extends SentinelError {
  readonly code = "MITIGATION_DISPATCH";

  constructor(
    message: string,
    readonly transient = true,
    options?: ErrorOptions,
  ) {
    super(message, options);
  }
}

export type ReasoningFailure = ReasoningTimeout | ReasoningUnavailable | MalformedResponse;

export function isReasoningFailure(err: unknown): err is ReasoningFailure {
  return (
    err instanceof ReasoningTimeout ||
    err instanceof ReasoningUnavailable ||
    err instanceof MalformedResponse
  );
}

/** Wrap anything a reasoning call threw into the recoverable taxonomy. */
export function toReasoningFailure(err: unknown): ReasoningFailure {
  if (isReasoningFailure(err)) return err;
  const message = err instanceof Error ? err.message : String(err);
  return new ReasoningUnavailable(message, { cause: err });
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
