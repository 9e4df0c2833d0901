import { log } from "../utils.js"
import {
  type ErrorCategory,
  type ErrorCodes,
  type ErrorNames,
  categoryOf,
} from "./errors-codes.js"

export interface CmdsigErrorOptions {
  cause?: Error
}

/**
 * Every error raised by cmdsig itself.
 *
 * The category tells who has to act: the user typing the command line
 * (`usage`) or the developer declaring the commands (`introspection`,
 * `registry`).
 */
export abstract class CmdsigError extends Error {
  abstract readonly name: ErrorNames

  /**
   * Stable identifier of the error, `C1xx` for usage errors, `C2xx` for
   * introspection errors and `C3xx` for registry errors.
   */
  abstract readonly code: ErrorCodes

  cause?: Error

  protected constructor(message: string, options?: CmdsigErrorOptions) {
    super(message)
    this.cause = options?.cause
  }

  get category(): ErrorCategory {
    return categoryOf(this.code)
  }

  /**
   * Prints the code and the stack, followed by the stack of the cause.
   */
  printStackTrace() {
    log(`[${this.code}] ${this.stack}`)
    if (this.cause) {
      log(`caused by: ${this.cause.stack}`)
    }
  }
}
