import { describe, it, expect } from "@effect/vitest"
import { Effect, Option } from "effect"
import {
  ArgumentRole,
  OutputRule,
  emptyTable,
  lookupOperation,
  registerOperation,
  registerOperations,
} from "../src/Operations.js"
import { defaultOperationTable } from "../src/internal/operations/index.js"

const Primary = ArgumentRole.Primary()
const Matched = ArgumentRole.Matched()
const Carried = ArgumentRole.Carried()
const Dimensionless = ArgumentRole.Dimensionless()

describe("Operation specification table", () => {
  it.effect("registers an entry with defaults", () =>
    Effect.gen(function* () {
      const table = yield* registerOperation(emptyTable, {
        name: "add",
        kind: "elementwise",
        arguments: [Primary, Matched],
        outputs: [OutputRule.SameAsPrimary()],
      })
      const spec = yield* lookupOperation(table, "add")

      expect(spec.kernel).toBe("add")
      expect(spec.required).toBe(2)
      expect(table.names).toEqual(["add"])
    }),
  )

  it.effect("appends without mutating the source table", () =>
    Effect.gen(function* () {
      yield* registerOperation(emptyTable, {
        name: "negative",
        kind: "elementwise",
        arguments: [Primary],
        outputs: [OutputRule.SameAsPrimary()],
      })

      expect(emptyTable.names).toEqual([])
    }),
  )

  it.effect("rejects a duplicate name", () =>
    Effect.gen(function* () {
      const error = yield* registerOperations(emptyTable, [
        { name: "sqrt", kind: "elementwise", arguments: [Carried], outputs: [OutputRule.Power({ exponent: 0.5 })] },
        { name: "sqrt", kind: "elementwise", arguments: [Carried], outputs: [OutputRule.Power({ exponent: 0.5 })] },
      ]).pipe(Effect.flip)

      expect(error.message).toBe('An operation named "sqrt" is already registered')
    }),
  )

  it.effect("rejects Matched arguments without a Primary", () =>
    Effect.gen(function* () {
      const error = yield* registerOperation(emptyTable, {
        name: "broken",
        kind: "elementwise",
        arguments: [Matched],
        outputs: [OutputRule.Bare()],
      }).pipe(Effect.flip)

      expect(error.message).toBe('Invalid specification for "broken": Matched arguments need a Primary argument')
    }),
  )

  it.effect("rejects PowerOf pointing at a unit-bearing argument", () =>
    Effect.gen(function* () {
      const error = yield* registerOperation(emptyTable, {
        name: "pow",
        kind: "elementwise",
        arguments: [Carried, Carried],
        outputs: [OutputRule.PowerOf({ argument: 1 })],
      }).pipe(Effect.flip)

      expect(error.message).toBe(
        'Invalid specification for "pow": PowerOf must point at a Dimensionless argument after the base',
      )
    }),
  )

  it.effect("rejects an out-of-range required count", () =>
    Effect.gen(function* () {
      const error = yield* registerOperation(emptyTable, {
        name: "sum",
        kind: "function",
        arguments: [Primary],
        required: 2,
        outputs: [OutputRule.SameAsPrimary()],
      }).pipe(Effect.flip)

      expect(error.message).toBe('Invalid specification for "sum": required must be an integer between 0 and 1')
    }),
  )

  it.effect("rejects an empty name", () =>
    Effect.gen(function* () {
      const error = yield* registerOperation(emptyTable, {
        name: "",
        kind: "function",
        arguments: [Dimensionless],
        outputs: [OutputRule.Dimensionless()],
      }).pipe(Effect.flip)

      expect(error._tag).toBe("InvalidSpecificationError")
    }),
  )

  it.effect("fails lookup of an unregistered operation", () =>
    Effect.gen(function* () {
      const error = yield* lookupOperation(defaultOperationTable, "fft").pipe(Effect.flip)

      expect(error._tag).toBe("UnsupportedOperation")
    }),
  )

  describe("default table", () => {
    it("maps aliases onto shared kernels", () => {
      expect(Option.map(defaultOperationTable.lookup("true_divide"), (spec) => spec.kernel)).toEqual(Option.some("divide"))
      expect(Option.map(defaultOperationTable.lookup("max"), (spec) => spec.kernel)).toEqual(Option.some("amax"))
      expect(Option.map(defaultOperationTable.lookup("radians"), (spec) => spec.kernel)).toEqual(Option.some("deg2rad"))
    })

    it("declares one output rule per divmod output", () => {
      const outputs = Option.map(defaultOperationTable.lookup("divmod"), (spec) => spec.outputs.map((rule) => rule._tag))

      expect(outputs).toEqual(Option.some(["Dimensionless", "SameAsPrimary"]))
    })

    it("lets reductions omit the axis", () => {
      const sum = defaultOperationTable.lookup("sum")

      expect(Option.map(sum, (spec) => [spec.required, spec.arguments.length])).toEqual(Option.some([1, 2]))
    })
  })
})
