import * as path from "path"
import ts from "typescript"

import { IntrospectionError } from "../../common/errors/index.js"
import { logger } from "../../common/utils.js"
import {
  type DefaultValue,
  type ParameterType,
  ParameterTypeKind,
} from "../parameter_type.js"
import {
  type CallableDeclaration,
  type DeclarationsMap,
  isDeclarationOf,
} from "./declarations.js"

export type ResolvedNode<T extends keyof DeclarationsMap> = {
  type: T
  node: DeclarationsMap[T]
  file: ts.SourceFile
}

function isTypeReference(type: ts.Type): type is ts.TypeReference {
  return (type.flags & ts.TypeFlags.Object) !== 0 && "target" in type
}

/**
 * Wraps a TypeScript program built over the source files that declare
 * commands, and answers the questions the signature reader asks about them.
 */
export class AST {
  public checker: ts.TypeChecker

  public readonly files: string[]

  private readonly sourceFiles: ts.SourceFile[]

  constructor(files: string[]) {
    if (files.length === 0) {
      throw new IntrospectionError("no files to introspect found")
    }

    this.files = files.map((f) => path.resolve(f))
    const program = ts.createProgram(this.files, {
      experimentalDecorators: true,
      moduleResolution: ts.ModuleResolutionKind.Node10,
      target: ts.ScriptTarget.ES2022,
      allowJs: true,
      noEmit: true,
      types: [],
    })
    this.checker = program.getTypeChecker()
    this.sourceFiles = program
      .getSourceFiles()
      .filter(
        (file) =>
          !file.isDeclarationFile &&
          this.files.includes(path.resolve(file.fileName)),
      )
  }

  public findAllDeclarations<T extends keyof DeclarationsMap>(
    kind: T,
  ): ResolvedNode<T>[] {
    const results: ResolvedNode<T>[] = []

    for (const sourceFile of this.sourceFiles) {
      ts.forEachChild(sourceFile, (node) => {
        if (node.kind !== kind) return

        const isDeclaration: (node: ts.Node) => node is DeclarationsMap[T] =
          isDeclarationOf[kind]
        if (!isDeclaration(node)) return

        results.push({ type: kind, node, file: sourceFile })
      })
    }

    return results
  }

  /**
   * Find the declaration of a top level function, of a function assigned to
   * a top level variable or, when `owner` is set, of a method of the class
   * `owner`.
   *
   * Overload signatures are skipped, only the implementation is returned.
   */
  public findCallableDeclaration(
    name: string,
    owner?: string,
  ): CallableDeclaration {
    const declaration =
      owner === undefined
        ? this.findFunction(name)
        : this.findMethod(owner, name)

    if (!declaration) {
      const target =
        owner === undefined ? `function ${name}` : `method ${owner}.${name}`

      throw new IntrospectionError(
        `could not find the declaration of ${target} in ${this.files.join(", ")}`,
      )
    }

    return declaration
  }

  public findClassDeclaration(name: string): ts.ClassDeclaration | undefined {
    return this.findAllDeclarations(ts.SyntaxKind.ClassDeclaration).find(
      ({ node }) => node.name?.text === name,
    )?.node
  }

  private findFunction(name: string): CallableDeclaration | undefined {
    for (const { node } of this.findAllDeclarations(
      ts.SyntaxKind.FunctionDeclaration,
    )) {
      if (node.name?.text === name && node.body !== undefined) {
        return node
      }
    }

    for (const { node } of this.findAllDeclarations(
      ts.SyntaxKind.VariableStatement,
    )) {
      for (const declaration of node.declarationList.declarations) {
        if (
          !ts.isIdentifier(declaration.name) ||
          declaration.name.text !== name ||
          !declaration.initializer
        ) {
          continue
        }

        const initializer = declaration.initializer
        if (
          ts.isArrowFunction(initializer) ||
          ts.isFunctionExpression(initializer)
        ) {
          return initializer
        }
      }
    }

    return undefined
  }

  private findMethod(
    owner: string,
    name: string,
  ): ts.MethodDeclaration | undefined {
    const classDeclaration = this.findClassDeclaration(owner)
    if (!classDeclaration) {
      return undefined
    }

    for (const member of classDeclaration.members) {
      if (
        ts.isMethodDeclaration(member) &&
        member.body !== undefined &&
        ts.isIdentifier(member.name) &&
        member.name.text === name
      ) {
        return member
      }
    }

    return undefined
  }

  public static getNodePosition(node: ts.Node): string {
    const sourceFile = node.getSourceFile()

    const position = ts.getLineAndCharacterOfPosition(
      sourceFile,
      node.getStart(),
    )

    return `${sourceFile.fileName}:${position.line}:${position.character}`
  }

  /**
   * Returns the JSDoc block written right above the declaration.
   *
   * Functions assigned to a variable carry their documentation on the
   * variable statement, so we look it up from the variable declaration.
   */
  public static getJSDoc(declaration: ts.Node): ts.JSDoc | undefined {
    const host =
      (ts.isArrowFunction(declaration) ||
        ts.isFunctionExpression(declaration)) &&
      ts.isVariableDeclaration(declaration.parent)
        ? declaration.parent
        : declaration

    const docs = ts.getJSDocCommentsAndTags(host).filter(ts.isJSDoc)

    return docs[docs.length - 1]
  }

  public tsTypeToParameterType(type: ts.Type): ParameterType {
    const name = this.checker.typeToString(type)

    if (type.flags & ts.TypeFlags.Boolean) {
      return { kind: ParameterTypeKind.Boolean, name }
    }

    if (type.isUnion()) {
      const members = type.types.filter(
        (member) =>
          (member.flags & (ts.TypeFlags.Undefined | ts.TypeFlags.Null)) === 0,
      )

      if (members.length === 1) {
        return { ...this.tsTypeToParameterType(members[0]), name }
      }

      if (
        members.length > 0 &&
        members.every((member) => member.flags & ts.TypeFlags.BooleanLiteral)
      ) {
        return { kind: ParameterTypeKind.Boolean, name }
      }

      if (
        members.length > 0 &&
        members.every((member): member is ts.StringLiteralType =>
          member.isStringLiteral(),
        )
      ) {
        return {
          kind: ParameterTypeKind.String,
          name,
          choices: members.map((member) => member.value),
        }
      }

      if (
        members.length > 0 &&
        members.every((member) => member.isNumberLiteral())
      ) {
        return { kind: ParameterTypeKind.Number, name }
      }

      return { kind: ParameterTypeKind.Unknown, name }
    }

    if (type.isStringLiteral()) {
      return { kind: ParameterTypeKind.String, name, choices: [type.value] }
    }

    if (type.flags & ts.TypeFlags.StringLike) {
      return { kind: ParameterTypeKind.String, name }
    }

    if (type.flags & ts.TypeFlags.NumberLike) {
      return { kind: ParameterTypeKind.Number, name }
    }

    if (type.flags & ts.TypeFlags.BooleanLike) {
      return { kind: ParameterTypeKind.Boolean, name }
    }

    // `string[]`, `Array<string>` and `ReadonlyArray<string>` are all
    // references to a generic array type with a single type argument.
    if (isTypeReference(type)) {
      const symbolName = type.getSymbol()?.getName()
      const typeArguments = this.checker.getTypeArguments(type)

      if (
        (symbolName === "Array" || symbolName === "ReadonlyArray") &&
        typeArguments.length === 1
      ) {
        return {
          kind: ParameterTypeKind.List,
          name,
          element: this.tsTypeToParameterType(typeArguments[0]),
        }
      }
    }

    return { kind: ParameterTypeKind.Unknown, name }
  }

  private warnUnresolvedDefaultValue(expression: ts.Expression): void {
    logger.warn(
      `default value '${expression.getText()}' at ${AST.getNodePosition(expression)} cannot be resolved statically, it will be left to the runtime.`,
    )
  }

  public resolveParameterDefaultValue(expression: ts.Expression): DefaultValue {
    if (
      ts.isStringLiteral(expression) ||
      ts.isNoSubstitutionTemplateLiteral(expression)
    ) {
      return expression.text
    }

    if (ts.isNumericLiteral(expression)) {
      return Number(expression.text)
    }

    if (ts.isParenthesizedExpression(expression)) {
      return this.resolveParameterDefaultValue(expression.expression)
    }

    switch (expression.kind) {
      case ts.SyntaxKind.TrueKeyword:
        return true
      case ts.SyntaxKind.FalseKeyword:
        return false
      case ts.SyntaxKind.NullKeyword:
        return null
    }

    if (
      ts.isPrefixUnaryExpression(expression) &&
      (expression.operator === ts.SyntaxKind.MinusToken ||
        expression.operator === ts.SyntaxKind.PlusToken) &&
      ts.isNumericLiteral(expression.operand)
    ) {
      const value = Number(expression.operand.text)

      return expression.operator === ts.SyntaxKind.MinusToken ? -value : value
    }

    if (ts.isArrayLiteralExpression(expression)) {
      const values: DefaultValue[] = []
      for (const element of expression.elements) {
        const value = this.resolveParameterDefaultValue(element)
        if (value === undefined) {
          return undefined
        }

        values.push(value)
      }

      return values
    }

    if (ts.isIdentifier(expression)) {
      if (expression.text === "undefined") {
        return undefined
      }

      const symbol = this.checker.getSymbolAtLocation(expression)
      if (!symbol) {
        throw new IntrospectionError(
          `could not resolve default value reference to the variable: '${expression.getText()}' from ${AST.getNodePosition(expression)}.`,
        )
      }

      // Parse the default value from the variable declaration
      // ```
      // const foo = "A"
      //
      // function bar(baz: string = foo) {}
      // ```
      const resolved = this.resolveSymbolValue(symbol)
      if (resolved !== undefined) {
        return resolved
      }

      // Follow the import to the exported variable
      // ```
      // import { foo } from "./constants.js"
      //
      // function bar(baz: string = foo) {}
      // ```
      if (symbol.flags & ts.SymbolFlags.Alias) {
        const aliased = this.resolveSymbolValue(
          this.checker.getAliasedSymbol(symbol),
        )
        if (aliased !== undefined) {
          return aliased
        }
      }

      this.warnUnresolvedDefaultValue(expression)

      return undefined
    }

    // Parse the default value from the enum member
    // ```
    // enum Foo {
    //   A = "a"
    // }
    //
    // function bar(baz: Foo = Foo.A) {}
    // ```
    if (ts.isPropertyAccessExpression(expression)) {
      const symbol = this.checker.getSymbolAtLocation(expression)
      const resolved = symbol ? this.resolveSymbolValue(symbol) : undefined
      if (resolved !== undefined) {
        return resolved
      }
    }

    this.warnUnresolvedDefaultValue(expression)

    return undefined
  }

  private resolveSymbolValue(symbol: ts.Symbol): DefaultValue {
    const decl = symbol.valueDeclaration ?? symbol.declarations?.[0]
    if (!decl) {
      return undefined
    }

    if (ts.isEnumMember(decl)) {
      const value = this.checker.getConstantValue(decl)
      if (value !== undefined) {
        return value
      }

      if (decl.initializer) {
        return this.resolveParameterDefaultValue(decl.initializer)
      }
    }

    if (
      ts.isVariableDeclaration(decl) &&
      decl.initializer &&
      ts.getCombinedNodeFlags(decl) & ts.NodeFlags.Const
    ) {
      return this.resolveParameterDefaultValue(decl.initializer)
    }

    return undefined
  }
}
