import { CmdsigError, type CmdsigErrorOptions } from "./CmdsigError.js"
import { ERROR_CODES, ERROR_NAMES } from "./errors-codes.js"

/**
 * No command name was found in front of the flags.
 */
export class NoCommandSpecifiedError extends CmdsigError {
  name = ERROR_NAMES.NoCommandSpecifiedError
  code = ERROR_CODES.NoCommandSpecifiedError

  constructor(message: string, options?: CmdsigErrorOptions) {
    super(message, options)
  }
}
