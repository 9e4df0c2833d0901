import { CmdsigError, type CmdsigErrorOptions } from "./CmdsigError.js"
import { ERROR_CODES, ERROR_NAMES } from "./errors-codes.js"

interface MissingArgumentErrorOptions extends CmdsigErrorOptions {
  parameter: string
}

export class MissingArgumentError extends CmdsigError {
  name = ERROR_NAMES.MissingArgumentError
  code = ERROR_CODES.MissingArgumentError

  /**
   * The required parameter that received no value.
   */
  parameter: string

  constructor(message: string, options: MissingArgumentErrorOptions) {
    super(message, options)
    this.parameter = options.parameter
  }
}
