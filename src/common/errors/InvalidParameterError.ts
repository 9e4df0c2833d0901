import { CmdsigError, type CmdsigErrorOptions } from "./CmdsigError.js"
import { ERROR_CODES, ERROR_NAMES } from "./errors-codes.js"

export class InvalidParameterError extends CmdsigError {
  name = ERROR_NAMES.InvalidParameterError
  code = ERROR_CODES.InvalidParameterError

  constructor(message: string, options?: CmdsigErrorOptions) {
    super(message, options)
  }
}
