import { CmdsigError, type CmdsigErrorOptions } from "./CmdsigError.js"
import { ERROR_CODES, ERROR_NAMES } from "./errors-codes.js"

/**
 * The signature reader was given something that cannot be called.
 */
export class NotCallableError extends CmdsigError {
  name = ERROR_NAMES.NotCallableError
  code = ERROR_CODES.NotCallableError

  constructor(message: string, options?: CmdsigErrorOptions) {
    super(message, options)
  }
}
