import minimist from "minimist"

import {
  InvalidArgumentValueError,
  MissingArgumentError,
  UnexpectedArgumentError,
  UnknownArgumentError,
} from "../common/errors/index.js"
import {
  ParameterTypeKind,
  convertToKebabCase,
  type Parameter,
  type ParameterType,
  type Signature,
} from "../introspector/index.js"
import type { Args } from "./registry.js"

const flagOf = (name: string) => `--${convertToKebabCase(name)}`

// Spelling of a flag minimist did not expect, as it was typed.
const typedFlagOf = (key: string) =>
  key.length === 1 ? `-${key}` : `--${key}`

// Decimal notation only: no hexadecimal, binary, octal or Infinity.
const DECIMAL = /^[+-]?(\d+(\.\d*)?|\.\d+)(e[+-]?\d+)?$/i

/**
 * Turns the flags typed after the command names into the arguments of the
 * command, keyed by parameter name.
 *
 * Every parameter is a flag named after it. Optional parameters that were
 * not given are left out so the default of the declaration applies.
 */
export class ArgumentParser {
  parse(signature: Signature, args: readonly string[]): Args {
    const parameters = signature.parameters

    const known = new Set<string>()
    const alias: Record<string, string[]> = {}
    for (const parameter of parameters) {
      known.add(parameter.name)

      const kebab = convertToKebabCase(parameter.name)
      if (kebab !== parameter.name) {
        alias[parameter.name] = [kebab]
        known.add(kebab)
      }
    }

    // Booleans are not declared so an absent flag stays absent instead of
    // being set to false.
    const parsed = minimist([...args], {
      string: parameters
        .filter((parameter) => parameter.type.kind !== ParameterTypeKind.Boolean)
        .map((parameter) => parameter.name),
      alias,
    })

    const positionals = parsed._.map(String)
    if (positionals.length > 0) {
      throw new UnexpectedArgumentError(
        `unexpected argument${positionals.length > 1 ? "s" : ""} ${positionals.join(" ")}, every parameter is given as a flag`,
      )
    }

    const unknown = Object.keys(parsed).filter(
      (key) => key !== "_" && key !== "--" && !known.has(key),
    )
    if (unknown.length > 0) {
      const flags = unknown.map(typedFlagOf)
      throw new UnknownArgumentError(`unknown flag ${flags.join(", ")}`, {
        flags,
      })
    }

    const result: Args = {}
    for (const parameter of parameters) {
      const raw = this.given(parameter, parsed[parameter.name])
      if (raw === undefined) {
        if (parameter.isRequired) {
          throw new MissingArgumentError(
            `missing required flag ${flagOf(parameter.name)}`,
            { parameter: parameter.name },
          )
        }

        continue
      }

      result[parameter.name] = this.coerce(parameter, parameter.type, raw)
    }

    return result
  }

  /**
   * minimist reads a non-boolean flag typed without a value as `""`. Such a
   * flag counts as not given.
   */
  private given(parameter: Parameter, raw: unknown): unknown {
    if (parameter.type.kind === ParameterTypeKind.Boolean) {
      return raw
    }

    if (Array.isArray(raw)) {
      const values = raw.filter((value) => value !== "")

      return values.length > 0 ? values : undefined
    }

    return raw === "" ? undefined : raw
  }

  private coerce(
    parameter: Parameter,
    type: ParameterType,
    raw: unknown,
  ): unknown {
    if (type.kind === ParameterTypeKind.List) {
      const values: unknown[] = Array.isArray(raw) ? raw : [raw]

      return values.map((value) => this.coerce(parameter, type.element, value))
    }

    // A flag given several times keeps its last value.
    const value: unknown = Array.isArray(raw) ? raw[raw.length - 1] : raw

    switch (type.kind) {
      case ParameterTypeKind.Number: {
        const text = typeof value === "string" ? value.trim() : ""
        const number = Number(text)
        if (!DECIMAL.test(text) || !Number.isFinite(number)) {
          throw this.invalid(parameter, value, "a number")
        }

        return number
      }
      case ParameterTypeKind.Boolean:
        if (typeof value === "boolean") return value
        if (value === "true") return true
        if (value === "false") return false

        throw this.invalid(parameter, value, "true or false")
      case ParameterTypeKind.String: {
        const expected = type.choices
          ? `one of ${type.choices.join(", ")}`
          : "a string"

        // --no-<flag> sets any flag to false.
        if (typeof value === "boolean") {
          throw this.invalid(parameter, value, expected)
        }

        const text = String(value)
        if (type.choices && !type.choices.includes(text)) {
          throw this.invalid(parameter, value, expected)
        }

        return text
      }
      case ParameterTypeKind.Unknown:
        if (typeof value === "boolean") {
          throw this.invalid(parameter, value, "a value")
        }

        return typeof value === "string" ? value : String(value)
    }
  }

  private invalid(
    parameter: Parameter,
    value: unknown,
    expected: string,
  ): InvalidArgumentValueError {
    return new InvalidArgumentValueError(
      `invalid value ${JSON.stringify(value)} for ${flagOf(parameter.name)}, expected ${expected}`,
      { parameter: parameter.name, value },
    )
  }
}
