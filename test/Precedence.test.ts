import { describe, it, expect } from "@effect/vitest"
import { Effect } from "effect"
import { ArrayBackend } from "../src/Backend.js"
import {
  arbitrate,
  declareWrapper,
  emptyRanking,
  normalizeOperand,
  QUANTITY_WRAPPER,
} from "../src/Precedence.js"
import { makeQuantity } from "../src/Quantity.js"
import { defaultRegistry, makeRegistryAdapter } from "../src/Units.js"
import { LabeledArray, MaskedArray, SparseArray, testRanking } from "./fixtures.js"

const context = { adapter: makeRegistryAdapter(defaultRegistry, ArrayBackend), backend: ArrayBackend }
const length = Effect.runSync(makeQuantity(context, 1, "m"))

describe("Precedence", () => {
  describe("ranking", () => {
    it("lists every wrapper above Quantity as upcast", () => {
      expect([...testRanking.upcastTypes].sort()).toEqual(["MaskedArray", "SparseArray"])
      expect(testRanking.isUpcast("LabeledArray")).toBe(false)
      expect(testRanking.outranks("SparseArray", QUANTITY_WRAPPER)).toBe(true)
      expect(testRanking.outranks(QUANTITY_WRAPPER, "LabeledArray")).toBe(true)
    })

    it("classifies values by their declared guard", () => {
      expect(testRanking.classify(new MaskedArray([], []))?.name).toBe("MaskedArray")
      expect(testRanking.classify(length)?.name).toBe("Quantity")
      expect(testRanking.classify(3)).toBeUndefined()
    })

    it.effect("rejects a declaration that closes a cycle", () =>
      Effect.gen(function* () {
        const error = yield* declareWrapper(testRanking, {
          name: "Cyclic",
          is: () => false,
          outranks: ["SparseArray"],
          outrankedBy: ["LabeledArray"],
        }).pipe(Effect.flip)

        expect(error._tag).toBe("PrecedenceCycleError")
      }),
    )

    it.effect("rejects references to undeclared wrappers", () =>
      Effect.gen(function* () {
        const error = yield* declareWrapper(emptyRanking, {
          name: "Lazy",
          is: () => false,
          outranks: ["Dask"],
        }).pipe(Effect.flip)

        expect(error.message).toBe('Wrapper "Lazy" references undeclared wrapper "Dask"')
      }),
    )

    it.effect("rejects a second declaration under the same name", () =>
      Effect.gen(function* () {
        const error = yield* declareWrapper(testRanking, { name: "MaskedArray", is: () => false }).pipe(Effect.flip)

        expect(error.message).toBe('A wrapper named "MaskedArray" is already registered')
      }),
    )

    it.effect("rejects a blank wrapper name", () =>
      Effect.gen(function* () {
        const error = yield* declareWrapper(emptyRanking, { name: "  ", is: () => false }).pipe(Effect.flip)

        expect(error._tag).toBe("ParseError")
      }),
    )

    it.effect("leaves the original ranking untouched", () =>
      Effect.gen(function* () {
        const extended = yield* declareWrapper(emptyRanking, {
          name: "Lazy",
          is: () => false,
          outranks: [QUANTITY_WRAPPER],
        })

        expect(extended.isUpcast("Lazy")).toBe(true)
        expect(emptyRanking.upcastTypes).toEqual([])
      }),
    )

    it.effect("breaks ties between incomparable wrappers by rank", () =>
      Effect.gen(function* () {
        const first = yield* declareWrapper(emptyRanking, {
          name: "Low",
          rank: 1,
          is: () => false,
          outranks: [QUANTITY_WRAPPER],
        })
        const ranking = yield* declareWrapper(first, {
          name: "High",
          rank: 5,
          is: () => false,
          outranks: [QUANTITY_WRAPPER],
        })
        const low = ranking.wrappers.get("Low")
        const high = ranking.wrappers.get("High")
        if (low === undefined || high === undefined) {
          throw new Error("wrappers were not declared")
        }

        expect(ranking.owner([low, high])?.name).toBe("High")
      }),
    )
  })

  describe("arbitration", () => {
    it("normalises operands three ways", () => {
      expect(normalizeOperand(testRanking, length)._tag).toBe("Wrapped")
      expect(normalizeOperand(testRanking, new SparseArray(new Map()))._tag).toBe("Upcast")
      expect(normalizeOperand(testRanking, new LabeledArray([], []))._tag).toBe("Bare")
      expect(normalizeOperand(testRanking, 4)._tag).toBe("Bare")
    })

    it("handles operations with a quantity and no upcast operand", () => {
      const verdict = arbitrate(testRanking, [length, 2])

      expect(verdict._tag).toBe("Handle")
    })

    it("defers without an owner when no operand is a quantity", () => {
      const verdict = arbitrate(testRanking, [1, [2, 3]])

      expect(verdict).toEqual(expect.objectContaining({ _tag: "Defer", owner: undefined }))
    })

    it("defers to the upcast owner even when it appears last", () => {
      const verdict = arbitrate(testRanking, [length, 2, new MaskedArray([1], [true])])

      expect(verdict._tag === "Defer" ? verdict.owner?.name : undefined).toBe("MaskedArray")
    })
  })
})
