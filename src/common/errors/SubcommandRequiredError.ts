import { CmdsigError, type CmdsigErrorOptions } from "./CmdsigError.js"
import { ERROR_CODES, ERROR_NAMES } from "./errors-codes.js"

export class SubcommandRequiredError extends CmdsigError {
  name = ERROR_NAMES.SubcommandRequiredError
  code = ERROR_CODES.SubcommandRequiredError

  constructor(message: string, options?: CmdsigErrorOptions) {
    super(message, options)
  }
}
