import { CmdsigError, type CmdsigErrorOptions } from "./CmdsigError.js"
import { ERROR_CODES, ERROR_NAMES } from "./errors-codes.js"

interface UnknownArgumentErrorOptions extends CmdsigErrorOptions {
  flags: string[]
}

export class UnknownArgumentError extends CmdsigError {
  name = ERROR_NAMES.UnknownArgumentError
  code = ERROR_CODES.UnknownArgumentError

  /**
   * The flags that match no parameter of the command.
   */
  flags: string[]

  constructor(message: string, options: UnknownArgumentErrorOptions) {
    super(message, options)
    this.flags = options.flags
  }
}
