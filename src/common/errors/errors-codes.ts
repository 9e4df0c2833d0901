export const ERROR_CODES = {
  /**
   * {@link NoCommandSpecifiedError}
   */
  NoCommandSpecifiedError: "C100",

  /**
   * {@link TooManyCommandsError}
   */
  TooManyCommandsError: "C101",

  /**
   * {@link CommandNotFoundError}
   */
  CommandNotFoundError: "C102",

  /**
   * {@link SubcommandRequiredError}
   */
  SubcommandRequiredError: "C103",

  /**
   * {@link MissingArgumentError}
   */
  MissingArgumentError: "C104",

  /**
   * {@link UnknownArgumentError}
   */
  UnknownArgumentError: "C105",

  /**
   * {@link UnexpectedArgumentError}
   */
  UnexpectedArgumentError: "C106",

  /**
   * {@link InvalidArgumentValueError}
   */
  InvalidArgumentValueError: "C107",

  /**
   * {@link InvalidParameterError}
   */
  InvalidParameterError: "C200",

  /**
   * {@link InvalidSignatureError}
   */
  InvalidSignatureError: "C201",

  /**
   * {@link NotCallableError}
   */
  NotCallableError: "C202",

  /**
   * {@link IntrospectionError}
   */
  IntrospectionError: "C203",

  /**
   * {@link UnknownDocumentedParameterError}
   */
  UnknownDocumentedParameterError: "C204",

  /**
   * {@link InvalidCommandError}
   */
  InvalidCommandError: "C300",

  /**
   * {@link RegistryFrozenError}
   */
  RegistryFrozenError: "C301",
} as const

type ErrorCodesType = typeof ERROR_CODES
export type ErrorNames = keyof ErrorCodesType
export type ErrorCodes = ErrorCodesType[ErrorNames]

type ErrorNamesMap = { readonly [Key in ErrorNames]: Key }
export const ERROR_NAMES: ErrorNamesMap = {
  NoCommandSpecifiedError: "NoCommandSpecifiedError",
  TooManyCommandsError: "TooManyCommandsError",
  CommandNotFoundError: "CommandNotFoundError",
  SubcommandRequiredError: "SubcommandRequiredError",
  MissingArgumentError: "MissingArgumentError",
  UnknownArgumentError: "UnknownArgumentError",
  UnexpectedArgumentError: "UnexpectedArgumentError",
  InvalidArgumentValueError: "InvalidArgumentValueError",
  InvalidParameterError: "InvalidParameterError",
  InvalidSignatureError: "InvalidSignatureError",
  NotCallableError: "NotCallableError",
  IntrospectionError: "IntrospectionError",
  UnknownDocumentedParameterError: "UnknownDocumentedParameterError",
  InvalidCommandError: "InvalidCommandError",
  RegistryFrozenError: "RegistryFrozenError",
}

export type ErrorCategory = "usage" | "introspection" | "registry"

/**
 * The hundreds digit of a code gives its category.
 */
export function categoryOf(code: ErrorCodes): ErrorCategory {
  switch (code[1]) {
    case "1":
      return "usage"
    case "2":
      return "introspection"
    default:
      return "registry"
  }
}
