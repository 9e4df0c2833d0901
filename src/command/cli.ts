import * as path from "path"

import { CmdsigError } from "../common/errors/index.js"
import { type Config, loadConfig } from "../common/config.js"
import { type LogLevel, logger, setLogLevel } from "../common/utils.js"
import {
  AST,
  type Signature,
  SignatureReader,
} from "../introspector/index.js"
import { getTracer } from "../telemetry/index.js"
import { expandFiles } from "../utils/files.js"
import { ArgumentParser } from "./argument_parser.js"
import { Executor } from "./executor.js"
import {
  type CommandSummary,
  formatCommandHelp,
  formatGroupHelp,
  formatOverview,
} from "./help.js"
import { load } from "./load.js"
import { CommandNameParser } from "./name_parser.js"
import {
  type CommandDecorator,
  type CommandEntry,
  type CommandFunction,
  type CommandLeaf,
  type CommandRegistry,
  registry,
} from "./registry.js"

export type CliState = "idle" | "resolving" | "invoking" | "done"

/**
 * Where results and help are written.
 */
export type Output = {
  write(chunk: string): unknown
}

export type CliOptions = {
  /**
   * The registry commands are registered in.
   * @defaultValue the registry of the exported decorators
   */
  registry?: CommandRegistry

  /**
   * Source files, or directories of source files, declaring the commands.
   */
  files?: string[]

  /**
   * Name of the program shown in help.
   * @defaultValue the name of the running script
   */
  program?: string

  /**
   * @defaultValue process.stdout
   */
  output?: Output

  nameParser?: CommandNameParser
  argumentParser?: ArgumentParser
  executor?: Executor

  /**
   * Replace the reader built over `files`.
   */
  signatureReader?: SignatureReader

  strictDocs?: boolean
  logLevel?: LogLevel

  /**
   * Environment the configuration falls back to.
   * @defaultValue process.env
   */
  env?: NodeJS.ProcessEnv
}

export const EXIT_CODES = {
  /**
   * The command itself failed.
   */
  failure: 1,

  /**
   * The command line does not match the registered commands.
   */
  usage: 2,

  /**
   * The commands could not be introspected or registered.
   */
  introspection: 3,
} as const

const HELP_FLAGS = ["--help", "-h"]

const isHelpFlag = (token: string) => HELP_FLAGS.includes(token)

function programName(): string {
  const script = process.argv[1]
  if (!script) {
    return "cli"
  }

  return path.basename(script, path.extname(script))
}

/**
 * Exit code of an error raised before the command was invoked.
 */
export function exitCodeOf(error: unknown): number {
  if (!(error instanceof CmdsigError)) {
    return EXIT_CODES.failure
  }

  return error.category === "usage"
    ? EXIT_CODES.usage
    : EXIT_CODES.introspection
}

/**
 * Cli dispatches a command line to the registered command and invokes it with
 * the flags converted to the types of its parameters.
 *
 * @example
 * ```ts
 * const cli = new Cli({ files: [fileURLToPath(import.meta.url)] })
 *
 * function add(a: number, b: number = 5): number {
 *   return a + b
 * }
 * cli.register(add)
 *
 * // `add --a 3` prints 8
 * await cli.run()
 * ```
 */
export class Cli {
  readonly registry: CommandRegistry

  readonly config: Config

  readonly program: string

  private readonly files: string[]

  private readonly output: Output

  private readonly nameParser: CommandNameParser

  private readonly argumentParser: ArgumentParser

  private readonly executor: Executor

  private signatureReader?: SignatureReader

  private sourceFiles?: string[]

  private _state: CliState = "idle"

  private failedIn?: CliState

  private readonly tracer = getTracer()

  constructor(options: CliOptions = {}) {
    this.config = loadConfig(options.env, {
      logLevel: options.logLevel,
      strictDocs: options.strictDocs,
    })
    setLogLevel(this.config.logLevel)

    this.registry = options.registry ?? registry
    this.files = options.files ?? []
    this.program = options.program ?? programName()
    this.output = options.output ?? process.stdout
    this.nameParser = options.nameParser ?? new CommandNameParser()
    this.argumentParser = options.argumentParser ?? new ArgumentParser()
    this.executor = options.executor ?? new Executor()
    this.signatureReader = options.signatureReader
  }

  get state(): CliState {
    return this._state
  }

  /**
   * The `@command()` decorator of the registry.
   */
  command(): CommandDecorator {
    return this.registry.command()
  }

  register<T extends CommandFunction>(reference: T): T {
    return this.registry.register(reference)
  }

  /**
   * Import the command files so their decorators register the commands.
   */
  async load(): Promise<void> {
    await this.tracer.startActiveSpan("load", async () => {
      await load(await this.getSourceFiles())
    })
  }

  /**
   * Dispatch `argv`, the arguments following the program name, and return
   * the value returned by the command.
   *
   * Help requested with `--help` or `-h` is written to the output and
   * nothing is invoked.
   */
  async execute(argv: readonly string[]): Promise<unknown> {
    this.registry.freeze()
    this._state = "resolving"
    this.failedIn = undefined

    try {
      const result = await this.tracer.startActiveSpan(
        "execute",
        async () => await this.dispatch(argv),
        { "cmdsig.argv": argv.join(" ") },
      )
      this._state = "done"

      return result
    } catch (e) {
      this.failedIn = this._state
      this._state = "done"

      throw e
    }
  }

  /**
   * Execute the command line of the process, write the result and set the
   * exit code of the process on failure.
   */
  async run(argv: readonly string[] = process.argv.slice(2)): Promise<void> {
    try {
      const result = await this.execute(argv)
      if (result !== undefined) {
        this.write(
          typeof result === "string" ? result : JSON.stringify(result, null, 2),
        )
      }
    } catch (e) {
      process.exitCode =
        this.failedIn === "invoking" ? EXIT_CODES.failure : exitCodeOf(e)
      this.report(e)
    }
  }

  private async dispatch(argv: readonly string[]): Promise<unknown> {
    if (argv.length > 0 && isHelpFlag(argv[0])) {
      this.write(
        formatOverview(
          this.program,
          await this.summarize(this.registry.list()),
        ),
      )
      return undefined
    }

    const { command, subcommand, rest } = this.nameParser.parse(argv)
    const wantsHelp = rest.some(isHelpFlag)

    const entry = this.registry.get(command)
    if (entry?.kind === "group" && subcommand === undefined && wantsHelp) {
      const reader = await this.getSignatureReader()
      this.write(
        formatGroupHelp(
          this.program,
          entry.name,
          reader.readClassDescription(entry.declaredName),
          await this.summarize([...entry.subcommands.values()]),
        ),
      )
      return undefined
    }

    const leaf = await this.tracer.startActiveSpan(
      "resolve",
      () => this.registry.resolve(command, subcommand),
      { "cmdsig.command": command, "cmdsig.subcommand": subcommand ?? "" },
    )

    const signature = await this.tracer.startActiveSpan(
      "read signature",
      async () => await this.readSignature(leaf),
    )

    // A command declaring its own `help` flag handles it.
    if (
      wantsHelp &&
      !signature.hasParameter("help") &&
      !signature.hasParameter("h")
    ) {
      const names = subcommand === undefined ? [command] : [command, subcommand]
      this.write(formatCommandHelp(this.program, names, signature))
      return undefined
    }

    const args = await this.tracer.startActiveSpan("parse arguments", () =>
      this.argumentParser.parse(signature, rest),
    )

    logger.debug(`invoking ${leaf.declaredName} with ${JSON.stringify(args)}`)
    this._state = "invoking"

    return await this.tracer.startActiveSpan(
      "invoke",
      async () => await this.executor.getResult(leaf, signature, args),
      { "cmdsig.function": leaf.declaredName },
    )
  }

  private async readSignature(leaf: CommandLeaf): Promise<Signature> {
    const reader = await this.getSignatureReader()
    const signature = reader.read(leaf.reference, leaf.owner?.name)
    logger.debug(
      `signature of ${leaf.declaredName}: ${JSON.stringify(signature)}`,
    )

    return signature
  }

  private async summarize(
    entries: readonly CommandEntry[],
  ): Promise<CommandSummary[]> {
    const reader = await this.getSignatureReader()

    return entries.map((entry) => {
      const description =
        entry.kind === "group"
          ? reader.readClassDescription(entry.declaredName)
          : reader.read(entry.reference, entry.owner?.name).description

      return { name: entry.name, summary: description?.shortDescription }
    })
  }

  private async getSourceFiles(): Promise<string[]> {
    if (!this.sourceFiles) {
      this.sourceFiles = await expandFiles(this.files)
    }

    return this.sourceFiles
  }

  /**
   * Built on first use and reused by every dispatch.
   */
  private async getSignatureReader(): Promise<SignatureReader> {
    if (!this.signatureReader) {
      const ast = new AST(await this.getSourceFiles())
      this.signatureReader = new SignatureReader(ast, {
        strictDocs: this.config.strictDocs,
      })
    }

    return this.signatureReader
  }

  private write(text: string): void {
    this.output.write(`${text}\n`)
  }

  private report(error: unknown): void {
    if (!(error instanceof Error)) {
      logger.error(`${this.program}: ${String(error)}`)
      return
    }

    logger.error(`${this.program}: ${error.message}`)
    if (this.config.logLevel === "debug") {
      if (error instanceof CmdsigError) {
        error.printStackTrace()
      } else {
        logger.debug(error.stack)
      }
    }
  }
}
