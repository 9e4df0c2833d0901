import { CmdsigError, type CmdsigErrorOptions } from "./CmdsigError.js"
import { ERROR_CODES, ERROR_NAMES } from "./errors-codes.js"

/**
 * A command was registered after dispatch started.
 */
export class RegistryFrozenError extends CmdsigError {
  name = ERROR_NAMES.RegistryFrozenError
  code = ERROR_CODES.RegistryFrozenError

  constructor(message: string, options?: CmdsigErrorOptions) {
    super(message, options)
  }
}
