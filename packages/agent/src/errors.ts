export type AgentErrorCode = "INVALID_INPUT" | "NOT_FOUND" | "FORBIDDEN" | "UPSTREAM_ERROR";

const STATUS_BY_CODE: Record<AgentErrorCode, number> = {
  INVALID_INPUT: 400,
  FORBIDDEN: 403,
  NOT_FOUND: 404,
  UPSTREAM_ERROR: 502,
};

export class AgentError extends Error {
  constructor(
    public readonly code: AgentErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "AgentError";
  }

  public get httpStatus(): number {
    return STATUS_BY_CODE[this.code];
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
