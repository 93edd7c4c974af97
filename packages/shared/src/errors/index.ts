export interface StandardErrorBody {
  message: string;
  code: string;
  details?: unknown;
  traceId?: string;
}

export interface BuildErrorBodyInput {
  message: string;
  code: string;
  details?: unknown;
  traceId?: string | undefined;
}

export function buildStandardErrorBody(
  input: BuildErrorBodyInput,
): StandardErrorBody {
  return {
    message: input.message,
    code: input.code,
    ...(input.details !== undefined ? { details: input.details } : {}),
    ...(input.traceId ? { traceId: input.traceId } : {}),
  };
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === "string") return error;
  return "Unknown error";
}
