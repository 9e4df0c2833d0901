import { CmdsigError, type CmdsigErrorOptions } from "./CmdsigError.js"
import { ERROR_CODES, ERROR_NAMES } from "./errors-codes.js"

interface CommandNotFoundErrorOptions extends CmdsigErrorOptions {
  command: string
  subcommand?: string
}

/**
 * The command (or subcommand) typed on the command line is not registered.
 */
export class CommandNotFoundError extends CmdsigError {
  name = ERROR_NAMES.CommandNotFoundError
  code = ERROR_CODES.CommandNotFoundError

  /**
   * The command name that was looked up.
   */
  command: string

  /**
   * The subcommand name that was looked up, if any.
   */
  subcommand?: string

  /**
   * @hidden
   */
  constructor(message: string, options: CommandNotFoundErrorOptions) {
    super(message, options)
    this.command = options.command
    this.subcommand = options.subcommand
  }
}
