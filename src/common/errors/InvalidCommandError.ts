import { CmdsigError, type CmdsigErrorOptions } from "./CmdsigError.js"
import { ERROR_CODES, ERROR_NAMES } from "./errors-codes.js"

export class InvalidCommandError extends CmdsigError {
  name = ERROR_NAMES.InvalidCommandError
  code = ERROR_CODES.InvalidCommandError

  constructor(message: string, options?: CmdsigErrorOptions) {
    super(message, options)
  }
}
