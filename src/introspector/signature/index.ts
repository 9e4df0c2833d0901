export * from "./description.js"
export * from "./docstring_parser.js"
export * from "./parameter.js"
export * from "./signature.js"
export * from "./signature_reader.js"
