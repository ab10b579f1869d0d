import { describe, it, expect } from "vitest"
import { Schema } from "effect"
import { OperationName, WrapperName } from "../src/Types.js"

describe("Branded names", () => {
  describe("OperationName", () => {
    it("decodes a trimmed name", () => {
      expect(Schema.decodeUnknownSync(OperationName)("hypot")).toBe("hypot")
    })

    it("fails to decode blank or padded names", () => {
      expect(() => Schema.decodeUnknownSync(OperationName)("")).toThrow()
      expect(() => Schema.decodeUnknownSync(OperationName)(" add ")).toThrow()
    })
  })

  describe("WrapperName", () => {
    it("decodes a trimmed name", () => {
      expect(Schema.decodeUnknownSync(WrapperName)("MaskedArray")).toBe("MaskedArray")
    })

    it("fails to decode non-strings", () => {
      expect(() => Schema.decodeUnknownSync(WrapperName)(42)).toThrow()
    })
  })
})
