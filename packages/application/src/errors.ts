export type AppErrorCode =
  | "BAD_REQUEST"
  | "NO_SOURCE_FOR_CATEGORY"
  | "INVALID_DESCRIPTOR"
  | "INVALID_MESSAGE_CATALOG"
  | "INTERNAL_ERROR";

export interface AppErrorInput {
  message: string;
  code: AppErrorCode;
  httpStatus: number;
  details?: unknown;
  cause?: unknown;
}

export class AppError extends Error {
  readonly code: AppErrorCode;
  readonly httpStatus: number;
  readonly details?: unknown;

  constructor(input: AppErrorInput) {
    super(input.message);
    this.name = new.target.name;
    this.code = input.code;
    this.httpStatus = input.httpStatus;
    if (input.details !== undefined) this.details = input.details;
    if (input.cause !== undefined) {
      (this as Error & { cause?: unknown }).cause = input.cause;
    }
  }
}

export class BadRequestError extends AppError {
  constructor(message = "Invalid request input", details?: unknown) {
    super({
      message,
      code: "BAD_REQUEST",
      httpStatus: 400,
      ...(details !== undefined ? { details } : {}),
    });
  }
}

/**
 * No exact, prefix or catch-all binding covers the category. This is the
 * one misconfiguration the pipeline cannot degrade around.
 */
export class NoSourceForCategoryError extends AppError {
  readonly category: string;

  constructor(category: string) {
    super({
      message: `Unable to locate message source for category '${category}'.`,
      code: "NO_SOURCE_FOR_CATEGORY",
      httpStatus: 404,
      details: { category },
    });
    this.category = category;
  }
}

export class InvalidDescriptorError extends AppError {
  constructor(message: string, details?: unknown) {
    super({
      message,
      code: "INVALID_DESCRIPTOR",
      httpStatus: 500,
      ...(details !== undefined ? { details } : {}),
    });
  }
}

export class InvalidMessageCatalogError extends AppError {
  constructor(message: string, details?: unknown, cause?: unknown) {
    super({
      message,
      code: "INVALID_MESSAGE_CATALOG",
      httpStatus: 500,
      ...(details !== undefined ? { details } : {}),
      ...(cause !== undefined ? { cause } : {}),
    });
  }
}

export class InternalError extends AppError {
  constructor(message = "Unexpected error", details?: unknown) {
    super({
      message,
      code: "INTERNAL_ERROR",
      httpStatus: 500,
      ...(details !== undefined ? { details } : {}),
    });
  }
}
