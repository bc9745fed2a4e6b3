export type PipelineErrorCode =
  | "run_active"
  | "invalid_input"
  | "invariant_violation"
  | "unknown_conversation"
  | "closed";

export class PipelineError extends Error {
  readonly code: PipelineErrorCode;

  constructor(code: PipelineErrorCode, message: string) {
    super(message);
    this.name = "PipelineError";
    this.code = code;
  }
}

export class GatewayTransportError extends Error {
  readonly status?: number;

  constructor(message: string, options?: { status?: number; cause?: unknown }) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = "GatewayTransportError";
    this.status = options?.status;
  }
}

export function isPipelineError(error: unknown, code?: PipelineErrorCode): error is PipelineError {
  if (!(error instanceof PipelineError)) {
    return false;
  }
  return code === undefined || error.code === code;
}
