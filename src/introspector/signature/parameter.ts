import ts from "typescript"

import {
  IntrospectionError,
  InvalidParameterError,
} from "../../common/errors/index.js"
import type { DefaultValue, ParameterType } from "../parameter_type.js"
import { AST, describeNodeType, isNode } from "../typescript_module/index.js"

export type ParameterOptions = {
  name: string
  type: ParameterType
  isRequired: boolean
  default?: DefaultValue
  description?: string
  isVariadic?: boolean
}

/**
 * A formal parameter of a command, with the description taken from the
 * command's documentation.
 */
export class Parameter {
  /**
   * Name of the parameter, also the name of its flag.
   */
  public readonly name: string

  /**
   * The declared type, or the type inferred from the default value when the
   * parameter has no annotation.
   */
  public readonly type: ParameterType

  /**
   * A parameter is required unless it has a default value, is marked
   * optional with `?` or is a rest parameter.
   */
  public readonly isRequired: boolean

  /**
   * The default value, when it can be resolved without running the code.
   */
  public readonly default?: DefaultValue

  /**
   * Back-filled from the `@param` tag of the parameter.
   */
  public description: string

  public readonly isVariadic: boolean

  constructor(options: ParameterOptions) {
    this.name = options.name
    this.type = options.type
    this.isRequired = options.isRequired
    this.default = options.default
    this.description = options.description ?? ""
    this.isVariadic = options.isVariadic ?? false
  }

  /**
   * Build a parameter from its declaration in the source.
   *
   * @throws InvalidParameterError if `value` is not a parameter declaration.
   */
  static fromParameterDeclaration(value: unknown, ast: AST): Parameter {
    if (!isNode(value) || !ts.isParameter(value)) {
      throw new InvalidParameterError(
        `Expected type for \`parameter\` is \`ts.ParameterDeclaration\` but got \`${describeNodeType(value)}\``,
      )
    }

    if (!ts.isIdentifier(value.name)) {
      throw new IntrospectionError(
        `destructured parameter at ${AST.getNodePosition(value)} is not supported, declare one parameter per flag instead.`,
      )
    }

    const isVariadic = value.dotDotDotToken !== undefined
    const hasDefault = value.initializer !== undefined

    return new Parameter({
      name: value.name.text,
      type: ast.tsTypeToParameterType(ast.checker.getTypeAtLocation(value)),
      isRequired:
        !hasDefault && value.questionToken === undefined && !isVariadic,
      default: value.initializer
        ? ast.resolveParameterDefaultValue(value.initializer)
        : undefined,
      isVariadic,
    })
  }

  toJSON() {
    return {
      name: this.name,
      type: this.type,
      isRequired: this.isRequired,
      default: this.default,
      description: this.description,
      isVariadic: this.isVariadic,
    }
  }
}
