import { CmdsigError, type CmdsigErrorOptions } from "./CmdsigError.js"
import { ERROR_CODES, ERROR_NAMES } from "./errors-codes.js"

interface InvalidArgumentValueErrorOptions extends CmdsigErrorOptions {
  parameter: string
  value: unknown
}

/**
 * A flag value could not be converted to the declared type of its parameter.
 */
export class InvalidArgumentValueError extends CmdsigError {
  name = ERROR_NAMES.InvalidArgumentValueError
  code = ERROR_CODES.InvalidArgumentValueError

  parameter: string

  value: unknown

  constructor(message: string, options: InvalidArgumentValueErrorOptions) {
    super(message, options)
    this.parameter = options.parameter
    this.value = options.value
  }
}
