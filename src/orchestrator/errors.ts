export type OrchestratorErrorKind =
  | "timeout"
  | "aborted"
  | "network"
  | "status"
  | "invalid-json"
  | "missing-reply";

export class OrchestratorRequestError extends Error {
  readonly code = "ORCHESTRATOR_REQUEST_FAILED";
  readonly kind: OrchestratorErrorKind;
  readonly status?: number;

  constructor(
    kind: OrchestratorErrorKind,
    message: string,
    options: { status?: number; cause?: unknown } = {},
  ) {
    super(message, { cause: options.cause });
    this.name = "OrchestratorRequestError";
    this.kind = kind;
    this.status = options.status;
  }
}

export function isOrchestratorRequestError(error: unknown): error is OrchestratorRequestError {
  return error instanceof OrchestratorRequestError;
}
