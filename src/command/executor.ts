import type { Signature } from "../introspector/index.js"
import type { Args, CommandLeaf } from "./registry.js"

/**
 * Invokes the callable behind a command with the parsed arguments.
 */
export class Executor {
  /**
   * Lay the arguments out in declaration order.
   *
   * Optional parameters that were not given are passed as `undefined` so the
   * default of the declaration applies, the rest parameter is spread.
   */
  buildArguments(signature: Signature, args: Args): unknown[] {
    const values: unknown[] = []

    for (const parameter of signature.parameters) {
      const value = args[parameter.name]

      if (parameter.isVariadic) {
        if (Array.isArray(value)) {
          values.push(...value)
        } else if (value !== undefined) {
          values.push(value)
        }

        continue
      }

      values.push(value)
    }

    return values
  }

  /**
   * The `this` of the call: nothing for a function, the class for a static
   * method and a fresh instance for an instance method.
   */
  buildReceiver(leaf: CommandLeaf): unknown {
    if (!leaf.owner) {
      return undefined
    }

    if (leaf.isStatic) {
      return leaf.owner
    }

    return Reflect.construct(leaf.owner, [])
  }

  async getResult(
    leaf: CommandLeaf,
    signature: Signature,
    args: Args,
  ): Promise<unknown> {
    return await Reflect.apply(
      leaf.reference,
      this.buildReceiver(leaf),
      this.buildArguments(signature, args),
    )
  }
}
