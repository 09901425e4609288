/***
 * Type errors — Validation failure errors.
 *
 * Separate from CollectionError: these signal a caller handing the
 * library a value outside its type contract, and are only raised by
 * dev-build checks.
 *
 ***/

import { AppError } from "utils/error";

export enum TYPE_ERROR {
  VALIDATION_FAIL_CONDITION = "VALIDATION_FAIL_CONDITION",
}

export class TypeError extends AppError {
  constructor(
    public readonly category: TYPE_ERROR,
    message: string,
    context?: Record<string, unknown>,
  ) {
    super(message, false, context);
  }
}
