export * from "./ast.js"
export * from "./declarations.js"
