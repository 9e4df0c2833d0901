import "reflect-metadata"

import {
  CommandNotFoundError,
  InvalidCommandError,
  RegistryFrozenError,
  SubcommandRequiredError,
} from "../common/errors/index.js"
import { logger } from "../common/utils.js"

export type Class = new (...args: never[]) => object

export type CommandFunction = (...args: never[]) => unknown

export type Args = Record<string, unknown>

/**
 * A callable command.
 */
export type CommandLeaf = {
  kind: "leaf"

  /**
   * The key the command is typed as on the command line.
   */
  name: string

  /**
   * The name the function or method is declared with.
   */
  declaredName: string
  reference: CommandFunction

  /**
   * The class declaring the method, unset for plain functions.
   */
  owner?: Class
  isStatic: boolean
}

/**
 * A class whose decorated methods are its subcommands.
 */
export type CommandGroup = {
  kind: "group"
  name: string
  declaredName: string
  reference: Class
  subcommands: Map<string, CommandLeaf>
}

export type CommandEntry = CommandLeaf | CommandGroup

export type CommandDecorator = (
  target: object,
  propertyKey?: string | symbol,
  descriptor?: PropertyDescriptor,
) => void

/**
 * Method decorated with `@command()`, stored on its class until the class
 * decorator (or the registry freeze) claims it.
 */
type MethodRecord = {
  declaredName: string
  reference: CommandFunction
  isStatic: boolean
}

const METHODS_METADATA_KEY = "cmdsig:methods"

function isClass(value: unknown): value is Class {
  return typeof value === "function"
}

function isCommandFunction(value: unknown): value is CommandFunction {
  return typeof value === "function"
}

/**
 * Commands are typed in lower case whatever the case of their declaration.
 */
export function commandNameFrom(declaredName: string): string {
  return declaredName.toLowerCase()
}

/**
 * CommandRegistry maps the names typed on the command line to the functions,
 * methods and classes registered as commands.
 *
 * Registration happens while the modules declaring commands are loaded,
 * the registry is then frozen and only read by the dispatcher.
 */
export class CommandRegistry {
  private readonly entries = new Map<string, CommandEntry>()

  /**
   * Classes holding decorated methods not yet claimed by a class decorator.
   */
  private readonly unclaimed = new Set<Class>()

  private frozen = false

  /**
   * The definition of the `@command()` decorator.
   *
   * On a class, the class becomes a command whose subcommands are its
   * methods decorated with `@command()`.
   * On a method of a class that is not decorated, the method becomes a top
   * level command.
   */
  command = (): CommandDecorator => {
    return (
      target: object,
      propertyKey?: string | symbol,
      descriptor?: PropertyDescriptor,
    ) => {
      this.assertNotFrozen()

      if (propertyKey === undefined) {
        if (!isClass(target)) {
          throw new InvalidCommandError(
            "@command() can only decorate a class or a method",
          )
        }

        this.addGroup(target)
        return
      }

      this.recordMethod(target, propertyKey, descriptor)
    }
  }

  /**
   * Register a plain function as a top level command.
   *
   * The command name is the lower-cased name of the function.
   */
  register = <T extends CommandFunction>(reference: T): T => {
    this.assertNotFrozen()

    if (!reference.name) {
      throw new InvalidCommandError(
        "cannot register an anonymous function as a command, give it a name",
      )
    }

    this.set({
      kind: "leaf",
      name: commandNameFrom(reference.name),
      declaredName: reference.name,
      reference,
      isStatic: false,
    })

    return reference
  }

  /**
   * End the registration phase.
   *
   * Decorated methods of classes without `@command()` become top level
   * commands. Calling it again has no effect.
   */
  freeze(): void {
    if (this.frozen) {
      return
    }

    for (const owner of this.unclaimed) {
      for (const record of this.methodsOf(owner)) {
        this.set(this.leafFromRecord(record, owner))
      }
    }

    this.unclaimed.clear()
    this.frozen = true
  }

  get isFrozen(): boolean {
    return this.frozen
  }

  get(name: string): CommandEntry | undefined {
    return this.entries.get(name)
  }

  list(): CommandEntry[] {
    return [...this.entries.values()]
  }

  /**
   * Return the callable registered under the given command and subcommand.
   */
  resolve(command: string, subcommand?: string): CommandLeaf {
    const entry = this.entries.get(command)
    if (!entry) {
      throw new CommandNotFoundError(`command \`${command}\` not found`, {
        command,
        subcommand,
      })
    }

    if (entry.kind === "leaf") {
      if (subcommand !== undefined) {
        throw new CommandNotFoundError(
          `command \`${command}\` has no subcommand \`${subcommand}\``,
          { command, subcommand },
        )
      }

      return entry
    }

    if (subcommand === undefined) {
      throw new SubcommandRequiredError(
        `command \`${command}\` requires a subcommand: ${[...entry.subcommands.keys()].join(", ")}`,
      )
    }

    const leaf = entry.subcommands.get(subcommand)
    if (!leaf) {
      throw new CommandNotFoundError(
        `subcommand \`${subcommand}\` of \`${command}\` not found`,
        { command, subcommand },
      )
    }

    return leaf
  }

  private assertNotFrozen(): void {
    if (this.frozen) {
      throw new RegistryFrozenError(
        "commands must be registered before the command line is dispatched",
      )
    }
  }

  private set(entry: CommandEntry): void {
    if (this.entries.has(entry.name)) {
      logger.debug(`command ${entry.name} registered again, replacing it`)
    } else {
      logger.debug(`registering command ${entry.name}`)
    }

    this.entries.set(entry.name, entry)
  }

  private addGroup(owner: Class): void {
    const subcommands = new Map<string, CommandLeaf>()
    for (const record of this.methodsOf(owner)) {
      const leaf = this.leafFromRecord(record, owner)
      subcommands.set(leaf.name, leaf)
    }

    if (subcommands.size === 0) {
      logger.warn(`command ${owner.name} has no method decorated with @command()`)
    }

    this.unclaimed.delete(owner)
    this.set({
      kind: "group",
      name: commandNameFrom(owner.name),
      declaredName: owner.name,
      reference: owner,
      subcommands,
    })
  }

  private recordMethod(
    target: object,
    propertyKey: string | symbol,
    descriptor?: PropertyDescriptor,
  ): void {
    if (typeof propertyKey !== "string") {
      throw new InvalidCommandError(
        `@command() cannot decorate the symbol method ${propertyKey.toString()}`,
      )
    }

    const reference: unknown = descriptor?.value
    if (!isCommandFunction(reference)) {
      throw new InvalidCommandError(
        `@command() on ${propertyKey} must decorate a method`,
      )
    }

    // Static members are decorated with the class itself as target,
    // instance members with its prototype.
    const isStatic = isClass(target)
    const owner = isStatic ? target : target.constructor
    if (!isClass(owner)) {
      throw new InvalidCommandError(
        `could not find the class declaring ${propertyKey}`,
      )
    }

    Reflect.defineMetadata(
      METHODS_METADATA_KEY,
      [
        ...this.methodsOf(owner),
        { declaredName: propertyKey, reference, isStatic },
      ],
      owner,
    )
    this.unclaimed.add(owner)
  }

  private methodsOf(owner: Class): MethodRecord[] {
    const records: MethodRecord[] | undefined = Reflect.getOwnMetadata(
      METHODS_METADATA_KEY,
      owner,
    )

    return records ?? []
  }

  private leafFromRecord(record: MethodRecord, owner: Class): CommandLeaf {
    return {
      kind: "leaf",
      name: commandNameFrom(record.declaredName),
      declaredName: record.declaredName,
      reference: record.reference,
      owner,
      isStatic: record.isStatic,
    }
  }
}

/**
 * The registry used by the exported decorators and by a `Cli`
 * created without one.
 */
export const registry = new CommandRegistry()
