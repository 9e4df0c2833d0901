import ts from "typescript"

import { AST } from "../typescript_module/index.js"
import { Description } from "./description.js"

/**
 * Parses the JSDoc block of a declaration into a {@link Description}.
 *
 * A declaration without a JSDoc block gives an empty description, this is
 * not an error.
 */
export class DocStringParser {
  parse(declaration?: ts.Node): Description {
    return Description.fromJSDoc(
      declaration ? AST.getJSDoc(declaration) : undefined,
    )
  }
}
