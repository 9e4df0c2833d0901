import { CmdsigError, type CmdsigErrorOptions } from "./CmdsigError.js"
import { ERROR_CODES, ERROR_NAMES } from "./errors-codes.js"

interface UnknownDocumentedParameterErrorOptions extends CmdsigErrorOptions {
  parameter: string
}

/**
 * A `@param` tag names a parameter the signature does not declare.
 */
export class UnknownDocumentedParameterError extends CmdsigError {
  name = ERROR_NAMES.UnknownDocumentedParameterError
  code = ERROR_CODES.UnknownDocumentedParameterError

  /**
   * The name used in the documentation.
   */
  parameter: string

  constructor(
    message: string,
    options: UnknownDocumentedParameterErrorOptions,
  ) {
    super(message, options)
    this.parameter = options.parameter
  }
}
