import ts from "typescript"

/**
 * Documentation generators sometimes emit the literal text `none` or `null`
 * where no description was written: those values mean "no value".
 */
export function normalizeLiteralNone<T>(value: T): T | undefined {
  if (typeof value === "string") {
    const lowered = value.trim().toLowerCase()
    if (lowered === "none" || lowered === "null") {
      return undefined
    }
  }

  return value
}

function tagText(tag: ts.JSDocTag): string | undefined {
  const text = ts.getTextOfJSDocComment(tag.comment)?.trim()
  if (!text) {
    return undefined
  }

  return normalizeLiteralNone(text.replace(/^-\s+/, ""))
}

/**
 * Description of a single `@param` tag.
 */
export class ParameterDescription {
  constructor(
    public readonly name: string,
    public readonly description?: string,
  ) {}

  /**
   * Qualified names (`@param options.force`) document a property of a
   * parameter, not a parameter, so they give no description.
   */
  static fromJSDocParameterTag(
    tag: ts.JSDocParameterTag,
  ): ParameterDescription | undefined {
    if (!ts.isIdentifier(tag.name)) {
      return undefined
    }

    return new ParameterDescription(tag.name.text, tagText(tag))
  }
}

/**
 * The documentation of a callable, as written in its JSDoc block.
 */
export class Description {
  constructor(
    /**
     * The first line of the comment.
     */
    public readonly shortDescription?: string,

    /**
     * Everything after the first line, trimmed.
     */
    public readonly longDescription?: string,

    /**
     * One entry per `@param` tag, in the order they are written.
     */
    public readonly parameterDescriptions: readonly ParameterDescription[] = [],

    /**
     * Text of the `@throws` tags.
     */
    public readonly raisesDescription?: string,

    /**
     * Text of the `@returns` tag.
     */
    public readonly resultDescription?: string,
  ) {}

  static fromJSDoc(jsDoc?: ts.JSDoc): Description {
    if (!jsDoc) {
      return new Description()
    }

    const text = ts.getTextOfJSDocComment(jsDoc.comment)?.trim() ?? ""
    const [first = "", ...rest] = text.split(/\r?\n/)

    const parameterDescriptions: ParameterDescription[] = []
    const raises: string[] = []
    let result: string | undefined

    for (const tag of jsDoc.tags ?? []) {
      if (ts.isJSDocParameterTag(tag)) {
        const parameter = ParameterDescription.fromJSDocParameterTag(tag)
        if (parameter) parameterDescriptions.push(parameter)
        continue
      }

      if (ts.isJSDocReturnTag(tag)) {
        result = tagText(tag)
        continue
      }

      const tagName = tag.tagName.text
      if (tagName === "throws" || tagName === "exception") {
        const raised = tagText(tag)
        if (raised) raises.push(raised)
      }
    }

    return new Description(
      normalizeLiteralNone(first.trim() || undefined),
      normalizeLiteralNone(rest.join("\n").trim() || undefined),
      parameterDescriptions,
      raises.length > 0 ? raises.join("\n") : undefined,
      result,
    )
  }
}
