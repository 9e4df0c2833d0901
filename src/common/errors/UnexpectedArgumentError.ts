import { CmdsigError, type CmdsigErrorOptions } from "./CmdsigError.js"
import { ERROR_CODES, ERROR_NAMES } from "./errors-codes.js"

export class UnexpectedArgumentError extends CmdsigError {
  name = ERROR_NAMES.UnexpectedArgumentError
  code = ERROR_CODES.UnexpectedArgumentError

  constructor(message: string, options?: CmdsigErrorOptions) {
    super(message, options)
  }
}
