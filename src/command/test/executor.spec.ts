import assert from "assert"

import {
  Parameter,
  ParameterTypeKind,
  Signature,
} from "../../introspector/index.js"
import { Executor } from "../executor.js"
import type { CommandLeaf } from "../registry.js"

class Counter {
  private start = 10

  add(step: number): number {
    return this.start + step
  }

  static label(name: string): string {
    return `${this.name}:${name}`
  }
}

function join(separator = "-", ...words: string[]): string {
  return words.join(separator)
}

describe("Executor", function () {
  const executor = new Executor()

  const joinSignature = new Signature()
    .addParameter(
      new Parameter({
        name: "separator",
        type: { kind: ParameterTypeKind.String, name: "string" },
        isRequired: false,
        default: "-",
      }),
    )
    .addParameter(
      new Parameter({
        name: "words",
        type: {
          kind: ParameterTypeKind.List,
          name: "string[]",
          element: { kind: ParameterTypeKind.String, name: "string" },
        },
        isRequired: false,
        isVariadic: true,
      }),
    )

  const stepSignature = new Signature().addParameter(
    new Parameter({
      name: "step",
      type: { kind: ParameterTypeKind.Number, name: "number" },
      isRequired: true,
    }),
  )

  it("should lay the arguments out in declaration order", function () {
    assert.deepEqual(
      executor.buildArguments(joinSignature, { words: ["a", "b"], separator: "+" }),
      ["+", "a", "b"],
    )
  })

  it("should pass undefined for optional arguments that were not given", function () {
    assert.deepEqual(executor.buildArguments(joinSignature, {}), [undefined])
  })

  it("should invoke a function with its defaults", async function () {
    const leaf: CommandLeaf = {
      kind: "leaf",
      name: "join",
      declaredName: "join",
      reference: join,
      isStatic: false,
    }

    assert.equal(
      await executor.getResult(leaf, joinSignature, { words: ["a", "b"] }),
      "a-b",
    )
  })

  it("should invoke an instance method on a new instance", async function () {
    const leaf: CommandLeaf = {
      kind: "leaf",
      name: "add",
      declaredName: "add",
      reference: Counter.prototype.add,
      owner: Counter,
      isStatic: false,
    }

    assert.equal(await executor.getResult(leaf, stepSignature, { step: 5 }), 15)
  })

  it("should invoke a static method with the class as receiver", async function () {
    const leaf: CommandLeaf = {
      kind: "leaf",
      name: "label",
      declaredName: "label",
      reference: Counter.label,
      owner: Counter,
      isStatic: true,
    }
    const signature = new Signature().addParameter(
      new Parameter({
        name: "name",
        type: { kind: ParameterTypeKind.String, name: "string" },
        isRequired: true,
      }),
    )

    assert.equal(
      await executor.getResult(leaf, signature, { name: "x" }),
      "Counter:x",
    )
  })
})
