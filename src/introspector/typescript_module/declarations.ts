import ts from "typescript"

export type DeclarationsMap = {
  [ts.SyntaxKind.ClassDeclaration]: ts.ClassDeclaration
  [ts.SyntaxKind.FunctionDeclaration]: ts.FunctionDeclaration
  [ts.SyntaxKind.VariableStatement]: ts.VariableStatement
}

export const isDeclarationOf: {
  [K in keyof DeclarationsMap]: (node: ts.Node) => node is DeclarationsMap[K]
} = {
  [ts.SyntaxKind.ClassDeclaration]: ts.isClassDeclaration,
  [ts.SyntaxKind.FunctionDeclaration]: ts.isFunctionDeclaration,
  [ts.SyntaxKind.VariableStatement]: ts.isVariableStatement,
}

/**
 * Every declaration shape a command can be read from.
 */
export type CallableDeclaration =
  | ts.FunctionDeclaration
  | ts.MethodDeclaration
  | ts.FunctionExpression
  | ts.ArrowFunction

export function isNode(value: unknown): value is ts.Node {
  return (
    typeof value === "object" &&
    value !== null &&
    "kind" in value &&
    typeof value.kind === "number" &&
    "getSourceFile" in value
  )
}

/**
 * Name of the runtime type of a value, or of its syntax kind when it is a
 * TypeScript node.
 */
export function describeNodeType(value: unknown): string {
  if (isNode(value)) {
    return `ts.${ts.SyntaxKind[value.kind]}`
  }

  if (value === null) {
    return "null"
  }

  if (typeof value === "object") {
    return value.constructor?.name ?? "object"
  }

  return typeof value
}
