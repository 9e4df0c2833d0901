import assert from "assert"

import {
  InvalidArgumentValueError,
  MissingArgumentError,
  UnexpectedArgumentError,
  UnknownArgumentError,
} from "../../common/errors/index.js"
import {
  Parameter,
  type ParameterType,
  ParameterTypeKind,
  Signature,
} from "../../introspector/index.js"
import { ArgumentParser } from "../argument_parser.js"

const NUMBER: ParameterType = { kind: ParameterTypeKind.Number, name: "number" }
const STRING: ParameterType = { kind: ParameterTypeKind.String, name: "string" }
const BOOLEAN: ParameterType = {
  kind: ParameterTypeKind.Boolean,
  name: "boolean",
}

function signatureOf(...parameters: Parameter[]): Signature {
  const signature = new Signature()
  for (const parameter of parameters) {
    signature.addParameter(parameter)
  }

  return signature
}

describe("ArgumentParser", function () {
  const parser = new ArgumentParser()

  const foo = signatureOf(
    new Parameter({ name: "a", type: NUMBER, isRequired: true }),
    new Parameter({ name: "b", type: NUMBER, isRequired: false, default: 5 }),
  )

  it("should convert numbers", function () {
    assert.deepEqual(parser.parse(foo, ["--a", "3", "--b", "4.5"]), {
      a: 3,
      b: 4.5,
    })
  })

  it("should accept the short spelling of single letter flags", function () {
    assert.deepEqual(parser.parse(foo, ["-a", "3"]), { a: 3 })
  })

  it("should accept the inline value", function () {
    assert.deepEqual(parser.parse(foo, ["--a=-2"]), { a: -2 })
  })

  it("should leave out optional flags that were not given", function () {
    const args = parser.parse(foo, ["--a", "3"])

    assert.deepEqual(args, { a: 3 })
    assert.equal("b" in args, false)
  })

  it("should keep the last value of a repeated flag", function () {
    assert.deepEqual(parser.parse(foo, ["--a", "1", "--a", "2"]), { a: 2 })
  })

  it("should fail on a missing required flag", function () {
    assert.throws(
      () => parser.parse(foo, ["--b", "1"]),
      (e: unknown) => {
        assert.ok(e instanceof MissingArgumentError)
        assert.equal(e.parameter, "a")
        assert.equal(e.message, "missing required flag --a")

        return true
      },
    )
  })

  it("should fail on a value that is not a number", function () {
    assert.throws(
      () => parser.parse(foo, ["--a", "three"]),
      (e: unknown) => {
        assert.ok(e instanceof InvalidArgumentValueError)
        assert.equal(e.parameter, "a")
        assert.equal(e.value, "three")
        assert.equal(
          e.message,
          'invalid value "three" for --a, expected a number',
        )

        return true
      },
    )
  })

  it("should treat a flag without a value as missing", function () {
    assert.throws(
      () => parser.parse(foo, ["--a"]),
      (e: unknown) => {
        assert.ok(e instanceof MissingArgumentError)
        assert.equal(e.parameter, "a")

        return true
      },
    )
    assert.throws(() => parser.parse(foo, ["--a", ""]), MissingArgumentError)
    assert.deepEqual(parser.parse(foo, ["--a", "1", "--b"]), { a: 1 })
  })

  it("should accept exponents", function () {
    assert.deepEqual(parser.parse(foo, ["--a", "1e3", "--b", ".5"]), {
      a: 1000,
      b: 0.5,
    })
  })

  it("should reject numbers outside decimal notation", function () {
    for (const value of ["Infinity", "-Infinity", "0x10", "0b11", "1e999"]) {
      assert.throws(
        () => parser.parse(foo, [`--a=${value}`]),
        (e: unknown) => {
          assert.ok(e instanceof InvalidArgumentValueError)
          assert.equal(e.value, value)

          return true
        },
      )
    }
  })

  it("should fail on an unknown flag", function () {
    assert.throws(
      () => parser.parse(foo, ["--a", "1", "--verbose", "-x"]),
      (e: unknown) => {
        assert.ok(e instanceof UnknownArgumentError)
        assert.deepEqual(e.flags, ["--verbose", "-x"])

        return true
      },
    )
  })

  it("should fail on a stray positional argument", function () {
    assert.throws(
      () => parser.parse(foo, ["--a", "1", "extra"]),
      UnexpectedArgumentError,
    )
  })

  describe("booleans", function () {
    const shout = signatureOf(
      new Parameter({ name: "word", type: STRING, isRequired: true }),
      new Parameter({ name: "excited", type: BOOLEAN, isRequired: false }),
    )

    it("should set a bare flag to true", function () {
      assert.deepEqual(parser.parse(shout, ["--word", "hey", "--excited"]), {
        word: "hey",
        excited: true,
      })
    })

    it("should set a negated flag to false", function () {
      assert.deepEqual(
        parser.parse(shout, ["--word", "hey", "--no-excited"]),
        { word: "hey", excited: false },
      )
    })

    it("should accept true and false values", function () {
      assert.deepEqual(
        parser.parse(shout, ["--excited", "false", "--word", "hey"]),
        { word: "hey", excited: false },
      )
    })

    it("should leave an absent boolean out", function () {
      assert.deepEqual(parser.parse(shout, ["--word", "hey"]), { word: "hey" })
    })

    it("should reject a negated string flag", function () {
      assert.throws(
        () => parser.parse(shout, ["--no-word"]),
        (e: unknown) => {
          assert.ok(e instanceof InvalidArgumentValueError)
          assert.equal(e.parameter, "word")
          assert.equal(e.value, false)
          assert.equal(
            e.message,
            "invalid value false for --word, expected a string",
          )

          return true
        },
      )
    })

    it("should reject a negated number flag", function () {
      assert.throws(
        () => parser.parse(foo, ["--no-a"]),
        InvalidArgumentValueError,
      )
    })

    it("should keep numeric looking strings as strings", function () {
      assert.deepEqual(parser.parse(shout, ["--word", "42"]), { word: "42" })
    })
  })

  describe("kebab case", function () {
    const deploy = signatureOf(
      new Parameter({ name: "target", type: STRING, isRequired: true }),
      new Parameter({
        name: "dryRun",
        type: BOOLEAN,
        isRequired: false,
        default: false,
      }),
    )

    it("should accept the kebab case spelling", function () {
      assert.deepEqual(
        parser.parse(deploy, ["--target", "prod", "--dry-run"]),
        { target: "prod", dryRun: true },
      )
    })

    it("should accept the declared spelling", function () {
      assert.deepEqual(
        parser.parse(deploy, ["--target", "prod", "--dryRun"]),
        { target: "prod", dryRun: true },
      )
    })
  })

  describe("choices", function () {
    const greet = signatureOf(
      new Parameter({
        name: "greeting",
        type: {
          kind: ParameterTypeKind.String,
          name: '"hello" | "hi"',
          choices: ["hello", "hi"],
        },
        isRequired: false,
        default: "hello",
      }),
    )

    it("should accept one of the choices", function () {
      assert.deepEqual(parser.parse(greet, ["--greeting", "hi"]), {
        greeting: "hi",
      })
    })

    it("should reject a value outside the choices", function () {
      assert.throws(
        () => parser.parse(greet, ["--greeting", "hey"]),
        (e: unknown) => {
          assert.ok(e instanceof InvalidArgumentValueError)
          assert.equal(
            e.message,
            'invalid value "hey" for --greeting, expected one of hello, hi',
          )

          return true
        },
      )
    })
  })

  describe("lists", function () {
    const total = signatureOf(
      new Parameter({
        name: "values",
        type: { kind: ParameterTypeKind.List, name: "number[]", element: NUMBER },
        isRequired: false,
        isVariadic: true,
      }),
    )

    it("should gather repeated flags", function () {
      assert.deepEqual(
        parser.parse(total, ["--values", "1", "--values", "2"]),
        { values: [1, 2] },
      )
    })

    it("should wrap a single value", function () {
      assert.deepEqual(parser.parse(total, ["--values", "7"]), { values: [7] })
    })

    it("should leave out a list flag without a value", function () {
      assert.deepEqual(parser.parse(total, ["--values"]), {})
    })

    it("should convert every element", function () {
      assert.throws(
        () => parser.parse(total, ["--values", "1", "--values", "x"]),
        InvalidArgumentValueError,
      )
    })
  })
})
