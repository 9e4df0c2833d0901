import assert from "assert"

import {
  Description,
  Parameter,
  ParameterTypeKind,
  Signature,
} from "../../introspector/index.js"
import {
  formatCommandHelp,
  formatGroupHelp,
  formatOverview,
} from "../help.js"

describe("help", function () {
  describe("formatCommandHelp", function () {
    it("should show the usage, the documentation and the flags", function () {
      const signature = new Signature()
        .addParameter(
          new Parameter({
            name: "a",
            type: { kind: ParameterTypeKind.Number, name: "number" },
            isRequired: true,
            description: "The first integer",
          }),
        )
        .addParameter(
          new Parameter({
            name: "b",
            type: { kind: ParameterTypeKind.Number, name: "number" },
            isRequired: false,
            default: 5,
            description: "The second integer",
          }),
        )
        .addDescription(new Description("Add two integers.", "Long text."))

      assert.equal(
        formatCommandHelp("calc", ["foo"], signature),
        [
          "Usage: calc foo [options]",
          "",
          "Add two integers.",
          "",
          "Long text.",
          "",
          "Options:",
          "  --a <number>  The first integer (required)",
          "  --b <number>  The second integer (default: 5)",
        ].join("\n"),
      )
    })

    it("should only show the usage of an undocumented command without parameters", function () {
      assert.equal(
        formatCommandHelp("calc", ["fail"], new Signature()),
        "Usage: calc fail",
      )
    })

    it("should describe every kind of flag", function () {
      const signature = new Signature()
        .addParameter(
          new Parameter({
            name: "dryRun",
            type: { kind: ParameterTypeKind.Boolean, name: "boolean" },
            isRequired: false,
            default: false,
          }),
        )
        .addParameter(
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
        .addParameter(
          new Parameter({
            name: "values",
            type: {
              kind: ParameterTypeKind.List,
              name: "number[]",
              element: { kind: ParameterTypeKind.Number, name: "number" },
            },
            isRequired: false,
            isVariadic: true,
          }),
        )

      const width = "--greeting <hello|hi>".length
      assert.equal(
        formatCommandHelp("calc", ["text", "say"], signature),
        [
          "Usage: calc text say [options]",
          "",
          "Options:",
          `  ${"--dry-run".padEnd(width)}  (default: false)`,
          `  ${"--greeting <hello|hi>".padEnd(width)}  (default: "hello")`,
          `  ${"--values <number>...".padEnd(width)}  (repeatable)`,
        ].join("\n"),
      )
    })
  })

  describe("formatGroupHelp", function () {
    it("should list the subcommands", function () {
      assert.equal(
        formatGroupHelp("calc", "text", new Description("Work with words."), [
          { name: "shout", summary: "Shout a word." },
          { name: "repeat", summary: "Repeat a word." },
        ]),
        [
          "Usage: calc text <subcommand> [options]",
          "",
          "Work with words.",
          "",
          "Subcommands:",
          "  shout   Shout a word.",
          "  repeat  Repeat a word.",
        ].join("\n"),
      )
    })
  })

  describe("formatOverview", function () {
    it("should list the commands", function () {
      assert.equal(
        formatOverview("calc", [
          { name: "foo", summary: "Add two integers." },
          { name: "fail" },
        ]),
        [
          "Usage: calc <command> [subcommand] [options]",
          "",
          "Commands:",
          "  foo   Add two integers.",
          "  fail",
        ].join("\n"),
      )
    })

    it("should only show the usage without commands", function () {
      assert.equal(
        formatOverview("calc", []),
        "Usage: calc <command> [subcommand] [options]",
      )
    })
  })
})
