export { CmdsigError } from "./CmdsigError.js"
export type { CmdsigErrorOptions } from "./CmdsigError.js"
export { CommandNotFoundError } from "./CommandNotFoundError.js"
export { IntrospectionError } from "./IntrospectionError.js"
export { InvalidArgumentValueError } from "./InvalidArgumentValueError.js"
export { InvalidCommandError } from "./InvalidCommandError.js"
export { InvalidParameterError } from "./InvalidParameterError.js"
export { InvalidSignatureError } from "./InvalidSignatureError.js"
export { MissingArgumentError } from "./MissingArgumentError.js"
export { NoCommandSpecifiedError } from "./NoCommandSpecifiedError.js"
export { NotCallableError } from "./NotCallableError.js"
export { RegistryFrozenError } from "./RegistryFrozenError.js"
export { SubcommandRequiredError } from "./SubcommandRequiredError.js"
export { TooManyCommandsError } from "./TooManyCommandsError.js"
export { UnexpectedArgumentError } from "./UnexpectedArgumentError.js"
export { UnknownArgumentError } from "./UnknownArgumentError.js"
export { UnknownDocumentedParameterError } from "./UnknownDocumentedParameterError.js"
export {
  ERROR_CODES,
  ERROR_NAMES,
  categoryOf,
  type ErrorCategory,
  type ErrorCodes,
  type ErrorNames,
} from "./errors-codes.js"
