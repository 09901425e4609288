export abstract class AppError extends Error {
  constructor(
    message: string,
    public readonly is_operational: boolean,
    public readonly context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

export enum COLLECTION_ERROR {
  KEY_NOT_FOUND = "KEY_NOT_FOUND",
  LIST_REQUIRED = "LIST_REQUIRED",
  KEY_OVERFLOW = "KEY_OVERFLOW",
}

export class CollectionError extends AppError {
  constructor(
    public readonly category: COLLECTION_ERROR,
    message?: string,
    context?: Record<string, unknown>,
  ) {
    super(message ?? category, true, context);
  }
}

export function is_collection_error(error: unknown): error is CollectionError {
  return error instanceof CollectionError;
}
