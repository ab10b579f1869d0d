import { describe, it, expect } from "vitest"
import { Either, Option } from "effect"
import {
  ArrayBackend,
  NdArray,
  describePayload,
  isMagnitude,
  makeArrayBackend,
  nestedArrayProbe,
  scalarProbe,
  toPayload,
  type Magnitude,
} from "../src/Backend.js"
import { LabeledArray, plain } from "./fixtures.js"

const call = (kernel: string, ...args: ReadonlyArray<unknown>): unknown => {
  const result = ArrayBackend.call(kernel, args)
  return isMagnitude(result) ? plain(result) : result.map((item: Magnitude) => plain(item))
}

describe("NdArray", () => {
  it("builds arrays from nested lists", () => {
    const array = Option.getOrThrow(NdArray.fromNested([[1, 2], [3, 4], [5, 6]]))

    expect(array.shape).toEqual([3, 2])
    expect(array.dtype).toBe("float64")
    expect(array.toFlat()).toEqual([1, 2, 3, 4, 5, 6])
  })

  it("rejects ragged and mixed input", () => {
    expect(Option.isNone(NdArray.fromNested([[1, 2], [3]]))).toBe(true)
    expect(Option.isNone(NdArray.fromNested([1, true]))).toBe(true)
    expect(Option.isNone(NdArray.fromNested([1, "2"]))).toBe(true)
  })

  it("stores booleans as a bool array", () => {
    const array = Option.getOrThrow(NdArray.fromNested([true, false]))

    expect(array.dtype).toBe("bool")
    expect(array.toNested()).toEqual([true, false])
  })

  it("validates storage against the shape", () => {
    expect(() => new NdArray(new Float64Array(3), [2, 2], "float64")).toThrow(
      "storage of length 3 does not match shape [2, 2]",
    )
  })
})

describe("payload probes", () => {
  it("tries probes in order", () => {
    expect(Option.getOrThrow(toPayload(ArrayBackend, 2))).toBe(2)
    expect(plain(Option.getOrThrow(toPayload(ArrayBackend, [1, 2])))).toEqual([1, 2])
    expect(plain(Option.getOrThrow(toPayload(ArrayBackend, new LabeledArray(["x"], [7]))))).toEqual([7])
    expect(Option.isNone(toPayload(ArrayBackend, "7"))).toBe(true)
  })

  it("accepts only what the configured probes accept", () => {
    const scalarsOnly = makeArrayBackend({ probes: [scalarProbe] })

    expect(Option.isNone(toPayload(scalarsOnly, [1, 2]))).toBe(true)
    expect(Option.isSome(nestedArrayProbe.coerce([1, 2]))).toBe(true)
  })

  it("describes payloads for diagnostics", () => {
    expect(describePayload(NdArray.zeros([2, 3], "int32"))).toBe("NdArray<int32>[2, 3]")
    expect(describePayload(null)).toBe("null")
    expect(describePayload(new LabeledArray([], []))).toBe("LabeledArray")
    expect(describePayload(undefined)).toBe("undefined")
  })
})

describe("array backend", () => {
  it("scales into float storage", () => {
    const scaled = ArrayBackend.scale(NdArray.fromValues([1, 2], [2], "int32"), 0.5)

    expect(ArrayBackend.dtype(scaled)).toBe("float64")
    expect(plain(scaled)).toEqual([0.5, 1])
  })

  it("rescales integer storage in place by integer factors only", () => {
    const storage = NdArray.fromValues([1, 2], [2], "int32")

    expect(Either.isRight(ArrayBackend.scaleInPlace(storage, 3))).toBe(true)
    expect(storage.toFlat()).toEqual([3, 6])
    expect(ArrayBackend.scaleInPlace(storage, 0.5)).toEqual(
      Either.left("int32 storage cannot hold values rescaled by 0.5"),
    )
  })

  it("refuses int32 products outside the int32 range without writing", () => {
    const storage = NdArray.fromValues([1, 3_000_000], [2], "int32")

    expect(ArrayBackend.scaleInPlace(storage, 1000)).toEqual(
      Either.left("values rescaled by 1000 fall outside the int32 range"),
    )
    expect(storage.toFlat()).toEqual([1, 3_000_000])
  })

  it("copies arrays into fresh storage", () => {
    const storage = NdArray.fromValues([1, 2], [2], "int32")
    const copy = ArrayBackend.copy(storage)

    expect(copy).not.toBe(storage)
    expect(copy instanceof NdArray ? [copy.dtype, copy.toFlat()] : copy).toEqual(["int32", [1, 2]])
    expect(ArrayBackend.copy(4)).toBe(4)
  })

  it("detects all-zero-or-NaN magnitudes", () => {
    expect(ArrayBackend.allZeroOrNan(0)).toBe(true)
    expect(ArrayBackend.allZeroOrNan(Number.NaN)).toBe(true)
    expect(ArrayBackend.allZeroOrNan(NdArray.fromValues([0, Number.NaN]))).toBe(true)
    expect(ArrayBackend.allZeroOrNan(NdArray.fromValues([0, 1]))).toBe(false)
    expect(ArrayBackend.allZeroOrNan(false)).toBe(false)
  })

  it("throws for an unknown kernel", () => {
    expect(() => ArrayBackend.call("fft", [])).toThrow('kernel "fft" is not implemented')
  })
})

describe("kernels", () => {
  it("broadcasts binary elementwise kernels", () => {
    expect(call("add", [[1], [2]], [10, 20])).toEqual([
      [11, 21],
      [12, 22],
    ])
    expect(() => call("add", [1, 2, 3], [1, 2])).toThrow(
      "operands could not be broadcast together with shapes [3] [2]",
    )
  })

  it("keeps scalar results scalar", () => {
    expect(call("multiply", 3, 4)).toBe(12)
    expect(call("less", 1, 2)).toBe(true)
  })

  it("follows floor semantics for remainder and fmod semantics for fmod", () => {
    expect(call("remainder", -7, 3)).toBe(2)
    expect(call("fmod", -7, 3)).toBe(-1)
    expect(call("floor_divide", -7, 2)).toBe(-4)
  })

  it("propagates NaN through maximum but not fmax", () => {
    expect(call("maximum", [1, Number.NaN], [2, 0])).toEqual([2, Number.NaN])
    expect(call("fmax", [1, Number.NaN], [2, 0])).toEqual([2, 0])
  })

  it("rounds half to even", () => {
    expect(call("rint", [0.5, 1.5, 2.5, 3.5])).toEqual([0, 2, 2, 4])
    expect(call("round", 1.25, 1)).toBe(1.2)
    expect(call("round", 2.5)).toBe(2)
  })

  it("splits modf and divmod into two outputs", () => {
    expect(call("modf", 2.5)).toEqual([0.5, 2])
    expect(call("divmod", 7, -2)).toEqual([-4, -1])
  })

  it("reduces over every element or along an axis", () => {
    const grid = [
      [1, 2, 3],
      [4, 5, 6],
    ]

    expect(call("sum", grid)).toBe(21)
    expect(call("sum", grid, 1)).toEqual([6, 15])
    expect(call("mean", grid, 0)).toEqual([2.5, 3.5, 4.5])
    expect(call("amax", grid, -1)).toEqual([3, 6])
    expect(call("ptp", grid)).toBe(5)
    expect(call("median", [3, 1, 2, 10])).toBe(2.5)
    expect(call("argmin", grid, 0)).toEqual([0, 0, 0])
  })

  it("normalises axes and rejects out-of-range ones", () => {
    expect(() => call("sum", [1, 2], 1)).toThrow("axis 1 is out of bounds for array of dimension 1")
  })

  it("computes running sums and differences", () => {
    expect(call("cumsum", [[1, 2], [3, 4]])).toEqual([1, 3, 6, 10])
    expect(call("cumsum", [[1, 2], [3, 4]], 0)).toEqual([
      [1, 2],
      [4, 6],
    ])
    expect(call("diff", [1, 4, 9, 16])).toEqual([3, 5, 7])
    expect(call("sort", [3, Number.NaN, 1])).toEqual([1, 3, Number.NaN])
  })

  it("returns shape changes in fresh storage", () => {
    const vector = NdArray.fromValues([1, 2])
    const scalar = NdArray.fromValues([5], [])
    const results = [
      ArrayBackend.call("reshape", [vector, [2, 1]]),
      ArrayBackend.call("ravel", [vector]),
      ArrayBackend.call("squeeze", [vector]),
      ArrayBackend.call("expand_dims", [vector, 0]),
    ]
    const sorted = ArrayBackend.call("sort", [scalar])

    expect(results.map((result) => result instanceof NdArray && result.data !== vector.data)).toEqual([
      true,
      true,
      true,
      true,
    ])
    expect(sorted instanceof NdArray && sorted.data !== scalar.data).toBe(true)
  })

  it("reshapes, transposes and squeezes", () => {
    expect(call("reshape", [1, 2, 3, 4, 5, 6], [3, -1])).toEqual([
      [1, 2],
      [3, 4],
      [5, 6],
    ])
    expect(call("transpose", [[1, 2, 3], [4, 5, 6]])).toEqual([
      [1, 4],
      [2, 5],
      [3, 6],
    ])
    expect(call("squeeze", [[[1], [2]]])).toEqual([1, 2])
    expect(call("expand_dims", [1, 2], 1)).toEqual([[1], [2]])
    expect(call("ravel", [[1, 2], [3, 4]])).toEqual([1, 2, 3, 4])
  })

  it("joins sequences", () => {
    expect(call("concatenate", [[[1, 2]], [[3, 4]]], 1)).toEqual([[1, 2, 3, 4]])
    expect(call("stack", [[1, 2], [3, 4]], 1)).toEqual([
      [1, 3],
      [2, 4],
    ])
    expect(() => call("stack", [[1, 2], [3]])).toThrow("all input arrays must have the same shape")
  })

  it("multiplies matrices and vectors", () => {
    expect(call("dot", [1, 2, 3], [4, 5, 6])).toBe(32)
    expect(call("matmul", [[1, 2], [3, 4]], [[5, 6], [7, 8]])).toEqual([
      [19, 22],
      [43, 50],
    ])
    expect(call("matmul", [[1, 2], [3, 4]], [1, 1])).toEqual([3, 7])
    expect(() => call("matmul", 2, [1, 2])).toThrow("matmul: input operand does not have enough dimensions")
  })

  it("selects, clips and compares with tolerances", () => {
    expect(call("where", [true, false, true], [1, 2, 3], [10, 20, 30])).toEqual([1, 20, 3])
    expect(call("clip", [-1, 5, 11], 0, 10)).toEqual([0, 5, 10])
    expect(call("isclose", [1, 1.1], [1 + 1e-9, 1])).toEqual([true, false])
    expect(call("allclose", [1, 2], [1, 2], 0, 0)).toBe(true)
  })

  it("decomposes into mantissa and exponent", () => {
    expect(call("frexp", [8, 0.75])).toEqual([
      [0.5, 0.75],
      [4, 0],
    ])
  })
})
