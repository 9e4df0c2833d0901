import { CmdsigError, type CmdsigErrorOptions } from "./CmdsigError.js"
import { ERROR_CODES, ERROR_NAMES } from "./errors-codes.js"

export class InvalidSignatureError extends CmdsigError {
  name = ERROR_NAMES.InvalidSignatureError
  code = ERROR_CODES.InvalidSignatureError

  constructor(message: string, options?: CmdsigErrorOptions) {
    super(message, options)
  }
}
