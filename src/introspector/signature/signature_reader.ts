import { NotCallableError } from "../../common/errors/index.js"
import { describeValue } from "../../common/utils.js"
import { AST } from "../typescript_module/index.js"
import type { Description } from "./description.js"
import { DocStringParser } from "./docstring_parser.js"
import { Signature } from "./signature.js"

export type SignatureReaderOptions = {
  /**
   * Replace the JSDoc parser.
   */
  docStringParser?: DocStringParser

  /**
   * Fail on `@param` tags naming no parameter of the callable.
   * @defaultValue true
   */
  strictDocs?: boolean
}

/**
 * Reads the signature of a callable from its declaration in the source files
 * the {@link AST} was built from.
 *
 * Reading never invokes the callable.
 */
export class SignatureReader {
  private readonly docStringParser: DocStringParser

  private readonly strictDocs: boolean

  constructor(
    private readonly ast: AST,
    options: SignatureReaderOptions = {},
  ) {
    this.docStringParser = options.docStringParser ?? new DocStringParser()
    this.strictDocs = options.strictDocs ?? true
  }

  /**
   * Returns the signature of `reference`.
   *
   * @param reference The function or method to read.
   * @param owner Name of the class declaring `reference` when it is a method.
   */
  read(reference: unknown, owner?: string): Signature {
    if (typeof reference !== "function") {
      throw new NotCallableError(
        `The object \`${describeValue(reference)}\` of type \`${typeof reference}\` is not callable, the SignatureReader only supports reading signature of callables.`,
      )
    }

    const declaration = this.ast.findCallableDeclaration(reference.name, owner)
    const signature = Signature.fromSignatureDeclaration(declaration, this.ast)
    const description = this.docStringParser.parse(declaration)

    return signature.addDescription(description, { strict: this.strictDocs })
  }

  /**
   * Returns the documentation of a class, empty when the class cannot be
   * found in the source files.
   */
  readClassDescription(name: string): Description {
    return this.docStringParser.parse(this.ast.findClassDeclaration(name))
  }
}
