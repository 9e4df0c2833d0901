export * from "./argument_parser.js"
export * from "./cli.js"
export * from "./decorators.js"
export * from "./executor.js"
export * from "./help.js"
export * from "./load.js"
export * from "./name_parser.js"
export {
  CommandRegistry,
  commandNameFrom,
  type Args,
  type Class,
  type CommandDecorator,
  type CommandEntry,
  type CommandFunction,
  type CommandGroup,
  type CommandLeaf,
} from "./registry.js"
