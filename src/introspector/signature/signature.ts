import ts from "typescript"

import {
  InvalidSignatureError,
  UnknownDocumentedParameterError,
} from "../../common/errors/index.js"
import { logger } from "../../common/utils.js"
import { AST, describeNodeType, isNode } from "../typescript_module/index.js"
import type { Description } from "./description.js"
import { Parameter } from "./parameter.js"

export type AddDescriptionOptions = {
  /**
   * Fail when the description documents a parameter the signature does not
   * have. When false, the entry is skipped with a warning.
   * @defaultValue true
   */
  strict?: boolean
}

/**
 * The parameters of a callable, in declaration order, and its documentation.
 */
export class Signature {
  private readonly _parameters = new Map<string, Parameter>()

  private _description?: Description

  /**
   * Adds a parameter to the signature.
   *
   * Returns the signature itself so calls can be chained.
   */
  addParameter(parameter: unknown): this {
    if (!(parameter instanceof Parameter)) {
      throw new TypeError("Only accept values of type `Parameter`")
    }

    if (this._parameters.has(parameter.name)) {
      throw new InvalidSignatureError(
        `parameter \`${parameter.name}\` is declared twice`,
      )
    }

    this._parameters.set(parameter.name, parameter)

    return this
  }

  get parameters(): Parameter[] {
    return [...this._parameters.values()]
  }

  get description(): Description | undefined {
    return this._description
  }

  hasParameter(name: string): boolean {
    return this._parameters.has(name)
  }

  getParameter(name: string): Parameter | undefined {
    return this._parameters.get(name)
  }

  getParameterOrThrow(name: string): Parameter {
    const parameter = this._parameters.get(name)
    if (!parameter) {
      throw new InvalidSignatureError(`no parameter named \`${name}\``)
    }

    return parameter
  }

  /**
   * Build a signature from a function-like declaration.
   *
   * A `this` parameter only types the receiver so it is not part of the
   * signature.
   *
   * @throws InvalidSignatureError if `value` is not a function-like declaration.
   */
  static fromSignatureDeclaration(value: unknown, ast: AST): Signature {
    if (!isNode(value) || !ts.isFunctionLike(value)) {
      throw new InvalidSignatureError(
        `Expected type for \`signature\` is \`ts.SignatureDeclaration\` but got \`${describeNodeType(value)}\``,
      )
    }

    const signature = new Signature()
    for (const parameter of value.parameters) {
      if (ts.isIdentifier(parameter.name) && parameter.name.text === "this") {
        continue
      }

      signature.addParameter(Parameter.fromParameterDeclaration(parameter, ast))
    }

    return signature
  }

  /**
   * Attach the documentation and copy each `@param` text onto its parameter.
   */
  addDescription(
    description: Description,
    options: AddDescriptionOptions = {},
  ): this {
    const strict = options.strict ?? true

    this._description = description
    for (const parameterDescription of description.parameterDescriptions) {
      const parameter = this._parameters.get(parameterDescription.name)
      if (!parameter) {
        if (strict) {
          throw new UnknownDocumentedParameterError(
            `documented parameter \`${parameterDescription.name}\` does not exist in the signature`,
            { parameter: parameterDescription.name },
          )
        }

        logger.warn(
          `skipping documentation of unknown parameter \`${parameterDescription.name}\``,
        )
        continue
      }

      parameter.description = parameterDescription.description ?? ""
    }

    return this
  }

  toJSON() {
    return {
      parameters: this.parameters,
      description: this._description,
    }
  }
}
