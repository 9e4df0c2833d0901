import { CmdsigError, type CmdsigErrorOptions } from "./CmdsigError.js"
import { ERROR_CODES, ERROR_NAMES } from "./errors-codes.js"

export class IntrospectionError extends CmdsigError {
  name = ERROR_NAMES.IntrospectionError
  code = ERROR_CODES.IntrospectionError

  constructor(message: string, options?: CmdsigErrorOptions) {
    super(message, options)
  }
}
