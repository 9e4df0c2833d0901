import {
  NoCommandSpecifiedError,
  TooManyCommandsError,
} from "../common/errors/index.js"

export type CommandName = {
  command: string
  subcommand?: string

  /**
   * The arguments following the command names, left for the flag parser.
   */
  rest: string[]
}

const isFlag = (token: string) => token.startsWith("-")

/**
 * Extracts the command and subcommand names from the arguments typed after
 * the program name.
 *
 * The names are the positional tokens in front of the first flag.
 */
export class CommandNameParser {
  parse(argv: readonly string[]): CommandName {
    let count = 0
    while (count < argv.length && !isFlag(argv[count])) {
      count++
    }

    const names = argv.slice(0, count)
    const rest = argv.slice(count)

    switch (names.length) {
      case 0:
        throw new NoCommandSpecifiedError("No command specified")
      case 1:
        return { command: names[0], rest }
      case 2:
        return { command: names[0], subcommand: names[1], rest }
      default:
        throw new TooManyCommandsError(
          `Too many commands specified: ${names.join(" ")}, expected a command and at most one subcommand`,
        )
    }
  }
}
