import { CmdsigError, type CmdsigErrorOptions } from "./CmdsigError.js"
import { ERROR_CODES, ERROR_NAMES } from "./errors-codes.js"

/**
 * More leading names were given than a command and a subcommand.
 */
export class TooManyCommandsError extends CmdsigError {
  name = ERROR_NAMES.TooManyCommandsError
  code = ERROR_CODES.TooManyCommandsError

  constructor(message: string, options?: CmdsigErrorOptions) {
    super(message, options)
  }
}
