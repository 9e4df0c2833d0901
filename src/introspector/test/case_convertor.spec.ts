import assert from "assert"

import { convertToKebabCase } from "../case_convertor.js"

describe("case convertor", function () {
  describe("convertToKebabCase", function () {
    it("should convert camel case to kebab case", function () {
      const result = convertToKebabCase("dryRun")
      assert.equal(result, "dry-run")
    })

    it("should convert snake case to kebab case", function () {
      const result = convertToKebabCase("dry_run")
      assert.equal(result, "dry-run")
    })

    it("should keep a single word", function () {
      const result = convertToKebabCase("name")
      assert.equal(result, "name")
    })

    it("should keep a single letter", function () {
      const result = convertToKebabCase("a")
      assert.equal(result, "a")
    })

    it("should convert empty string to empty string", function () {
      const result = convertToKebabCase("")
      assert.equal(result, "")
    })

    it("should split acronyms from the next word", function () {
      const result = convertToKebabCase("HTTPServer")
      assert.equal(result, "http-server")
    })

    it("should correctly handle numbers followed by a capital", function () {
      const result = convertToKebabCase("version2Name")
      assert.equal(result, "version2-name")
    })
  })
})
