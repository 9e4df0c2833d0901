export enum ParameterTypeKind {
  String = "STRING",
  Number = "NUMBER",
  Boolean = "BOOLEAN",
  List = "LIST",
  Unknown = "UNKNOWN",
}

type BaseParameterType<T extends ParameterTypeKind> = {
  kind: T

  /**
   * The declared type as the type checker prints it.
   */
  name: string
}

export type ScalarParameterType = BaseParameterType<
  | ParameterTypeKind.Number
  | ParameterTypeKind.Boolean
  | ParameterTypeKind.Unknown
>

export type StringParameterType = BaseParameterType<ParameterTypeKind.String> & {
  /**
   * Allowed values, set when the declared type is a union of string
   * literals or a string enum.
   */
  choices?: string[]
}

export type ListParameterType = BaseParameterType<ParameterTypeKind.List> & {
  element: ParameterType
}

export type ParameterType =
  | ScalarParameterType
  | StringParameterType
  | ListParameterType

/**
 * Statically resolved default value of a parameter.
 */
export type DefaultValue =
  | string
  | number
  | boolean
  | null
  | undefined
  | DefaultValue[]
