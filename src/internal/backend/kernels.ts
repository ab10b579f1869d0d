import { Option } from "effect"
import {
  isMagnitude,
  lanes,
  mapElementwise,
  normalizeAxis,
  toNdArray,
  type Magnitude,
} from "./broadcast.js"
import { NdArray, shapeSize, type DType } from "./NdArray.js"

export type KernelResult = Magnitude | ReadonlyArray<Magnitude>

/**
 * A bare-magnitude computation. Kernels receive magnitudes that were already
 * converted by the dispatcher and never see units.
 */
export type Kernel = (args: ReadonlyArray<unknown>) => KernelResult

const magnitudeAt = (args: ReadonlyArray<unknown>, index: number): Magnitude => {
  const value = args[index]
  if (isMagnitude(value)) {
    return value
  }
  return Option.getOrThrowWith(
    NdArray.fromNested(value),
    () => new Error(`argument ${index} is not a numeric payload`),
  )
}

const optionalInteger = (args: ReadonlyArray<unknown>, index: number, name: string): number | undefined => {
  const value = args[index]
  if (value === undefined) {
    return undefined
  }
  if (typeof value !== "number" || !Number.isInteger(value)) {
    throw new Error(`${name} must be an integer`)
  }
  return value
}

const optionalNumber = (args: ReadonlyArray<unknown>, index: number, name: string, fallback: number): number => {
  const value = args[index]
  if (value === undefined) {
    return fallback
  }
  if (typeof value !== "number") {
    throw new Error(`${name} must be a number`)
  }
  return value
}

const integerList = (value: unknown, name: string): Array<number> => {
  const items: ReadonlyArray<unknown> = Array.isArray(value) ? value : [value]
  return items.map((item) => {
    if (typeof item !== "number" || !Number.isInteger(item)) {
      throw new Error(`${name} must contain integers`)
    }
    return item
  })
}

const sequenceAt = (args: ReadonlyArray<unknown>, index: number): Array<NdArray> => {
  const value = args[index]
  if (!Array.isArray(value) || value.length === 0) {
    throw new Error("expected a non-empty sequence of arrays")
  }
  return value.map((_: unknown, position: number) => toNdArray(magnitudeAt(value, position)))
}

export const roundHalfEven = (value: number): number => {
  if (!Number.isFinite(value)) {
    return value
  }
  const floor = Math.floor(value)
  const diff = value - floor
  if (diff > 0.5) {
    return floor + 1
  }
  if (diff < 0.5) {
    return floor
  }
  return floor % 2 === 0 ? floor : floor + 1
}

const pythonRemainder = (a: number, b: number): number => {
  const r = a % b
  return r !== 0 && r < 0 !== b < 0 ? r + b : r
}

const isNegative = (value: number): boolean => value < 0 || Object.is(value, -0)

const frexpParts = (value: number): readonly [mantissa: number, exponent: number] => {
  if (value === 0 || !Number.isFinite(value)) {
    return [value, 0]
  }
  let exponent = Math.floor(Math.log2(Math.abs(value))) + 1
  let mantissa = value / 2 ** exponent
  if (Math.abs(mantissa) >= 1) {
    mantissa /= 2
    exponent += 1
  } else if (Math.abs(mantissa) < 0.5) {
    mantissa *= 2
    exponent -= 1
  }
  return [mantissa, exponent]
}

const unary =
  (fn: (x: number) => number, dtype: DType = "float64"): Kernel =>
  (args) =>
    mapElementwise([magnitudeAt(args, 0)], fn, dtype)

const binary =
  (fn: (x: number, y: number) => number, dtype: DType = "float64"): Kernel =>
  (args) =>
    mapElementwise([magnitudeAt(args, 0), magnitudeAt(args, 1)], fn, dtype)

const predicate = (fn: (x: number) => boolean): Kernel => unary((x) => (fn(x) ? 1 : 0), "bool")

const comparison = (fn: (x: number, y: number) => boolean): Kernel => binary((x, y) => (fn(x, y) ? 1 : 0), "bool")

const reduction =
  (fn: (values: ReadonlyArray<number>, args: ReadonlyArray<unknown>) => number, dtype: DType = "float64"): Kernel =>
  (args) => {
    const input = toNdArray(magnitudeAt(args, 0))
    const axis = optionalInteger(args, 1, "axis")
    if (axis === undefined) {
      return fn(input.toFlat(), args)
    }
    const normalized = normalizeAxis(axis, input.ndim)
    const out = NdArray.zeros(
      input.shape.filter((_, index) => index !== normalized),
      dtype,
    )
    lanes(input.shape, normalized).forEach((lane, index) => {
      out.data[index] = fn(
        lane.map((offset) => input.get(offset)),
        args,
      )
    })
    return out
  }

const sumOf = (values: ReadonlyArray<number>): number => values.reduce((total, value) => total + value, 0)

const meanOf = (values: ReadonlyArray<number>): number => sumOf(values) / values.length

const varianceOf = (values: ReadonlyArray<number>, ddof: number): number => {
  const mean = meanOf(values)
  return sumOf(values.map((value) => (value - mean) ** 2)) / (values.length - ddof)
}

const extremum = (values: ReadonlyArray<number>, pick: (a: number, b: number) => number): number => {
  if (values.length === 0) {
    throw new Error("zero-size array has no extremum")
  }
  return values.reduce(pick)
}

const argExtremum = (values: ReadonlyArray<number>, better: (a: number, b: number) => boolean): number => {
  if (values.length === 0) {
    throw new Error("attempt to get argmax/argmin of an empty sequence")
  }
  let best = 0
  for (let index = 0; index < values.length; index += 1) {
    const value = values[index] ?? Number.NaN
    if (Number.isNaN(value)) {
      return index
    }
    if (better(value, values[best] ?? Number.NaN)) {
      best = index
    }
  }
  return best
}

const compareAscending = (a: number, b: number): number => {
  if (Number.isNaN(a)) {
    return Number.isNaN(b) ? 0 : 1
  }
  return Number.isNaN(b) ? -1 : a - b
}

const medianOf = (values: ReadonlyArray<number>): number => {
  const sorted = [...values].sort(compareAscending)
  const middle = Math.floor(sorted.length / 2)
  return sorted.length % 2 === 1
    ? (sorted[middle] ?? Number.NaN)
    : ((sorted[middle - 1] ?? Number.NaN) + (sorted[middle] ?? Number.NaN)) / 2
}

/**
 * Rewrite every lane along `axis` through `fn`, which may change the lane length.
 */
const mapLanes = (
  input: NdArray,
  axis: number,
  fn: (lane: Array<number>) => Array<number>,
  dtype: DType = input.dtype === "bool" ? "float64" : input.dtype,
): NdArray => {
  const normalized = normalizeAxis(axis, input.ndim)
  const extent = input.shape[normalized] ?? 1
  const outExtent = fn(new Array<number>(extent).fill(0)).length
  const outShape = input.shape.map((dim, index) => (index === normalized ? outExtent : dim))
  const out = NdArray.zeros(outShape, dtype)
  const outLanes = lanes(outShape, normalized)
  lanes(input.shape, normalized).forEach((lane, index) => {
    const mapped = fn(lane.map((offset) => input.get(offset)))
    const target = outLanes[index] ?? []
    target.forEach((offset, position) => {
      out.data[offset] = mapped[position] ?? Number.NaN
    })
  })
  return out
}

const cumulativeSum = (lane: Array<number>): Array<number> => {
  let total = 0
  return lane.map((value) => (total += value))
}

const reshape = (input: NdArray, requested: ReadonlyArray<number>): NdArray => {
  const unknown = requested.filter((dim) => dim === -1).length
  if (unknown > 1) {
    throw new Error("can only specify one unknown dimension")
  }
  const known = shapeSize(requested.filter((dim) => dim !== -1))
  const shape = requested.map((dim) => (dim === -1 ? input.size / known : dim))
  if (shapeSize(shape) !== input.size || shape.some((dim) => !Number.isInteger(dim) || dim < 0)) {
    throw new Error(`cannot reshape array of size ${input.size} into shape [${requested.join(", ")}]`)
  }
  return input.reshape(shape)
}

const transpose = (input: NdArray, axes: ReadonlyArray<number>): NdArray => {
  const ndim = input.ndim
  const perm = axes.map((axis) => normalizeAxis(axis, ndim))
  if (perm.length !== ndim || new Set(perm).size !== ndim) {
    throw new Error("axes don't match array")
  }
  const outShape = perm.map((axis) => input.shape[axis] ?? 1)
  const inStrides = input.shape.map((_, axis) => shapeSize(input.shape.slice(axis + 1)))
  const out = NdArray.zeros(outShape, input.dtype)
  for (let flat = 0; flat < out.size; flat += 1) {
    let remainder = flat
    let offset = 0
    for (let axis = ndim - 1; axis >= 0; axis -= 1) {
      const extent = outShape[axis] ?? 1
      offset += (remainder % extent) * (inStrides[perm[axis] ?? 0] ?? 0)
      remainder = Math.floor(remainder / extent)
    }
    out.data[flat] = input.get(offset)
  }
  return out
}

const expandDims = (input: NdArray, axis: number): NdArray => {
  const normalized = normalizeAxis(axis, input.ndim + 1)
  const shape = [...input.shape]
  shape.splice(normalized, 0, 1)
  return input.reshape(shape)
}

const concatenate = (arrays: ReadonlyArray<NdArray>, axis: number): NdArray => {
  const first = arrays[0]
  if (!first || first.ndim === 0) {
    throw new Error("zero-dimensional arrays cannot be concatenated")
  }
  const normalized = normalizeAxis(axis, first.ndim)
  for (const array of arrays) {
    const compatible =
      array.ndim === first.ndim && array.shape.every((dim, index) => index === normalized || dim === first.shape[index])
    if (!compatible) {
      throw new Error(
        `all the input array dimensions except for the concatenation axis must match exactly`,
      )
    }
  }
  const dtype: DType = arrays.every((array) => array.dtype === first.dtype) ? first.dtype : "float64"
  const outShape = first.shape.map((dim, index) =>
    index === normalized ? arrays.reduce((total, array) => total + (array.shape[index] ?? 0), 0) : dim,
  )
  const out = NdArray.zeros(outShape, dtype)
  const outer = shapeSize(first.shape.slice(0, normalized))
  const inner = shapeSize(first.shape.slice(normalized + 1))
  let cursor = 0
  for (let o = 0; o < outer; o += 1) {
    for (const array of arrays) {
      const block = (array.shape[normalized] ?? 0) * inner
      for (let k = 0; k < block; k += 1) {
        out.data[cursor] = array.get(o * block + k)
        cursor += 1
      }
    }
  }
  return out
}

const dot = (left: NdArray, right: NdArray, allowScalars: boolean): Magnitude => {
  if (left.ndim === 0 || right.ndim === 0) {
    if (!allowScalars) {
      throw new Error("matmul: input operand does not have enough dimensions")
    }
    return mapElementwise([left, right], (a, b) => a * b)
  }
  const rows = left.ndim === 1 ? 1 : (left.shape[0] ?? 0)
  const inner = left.shape[left.ndim - 1] ?? 0
  const rightInner = right.shape[0] ?? 0
  const cols = right.ndim === 1 ? 1 : (right.shape[1] ?? 0)
  if (left.ndim > 2 || right.ndim > 2 || inner !== rightInner) {
    throw new Error(
      `shapes [${left.shape.join(", ")}] and [${right.shape.join(", ")}] not aligned`,
    )
  }
  const values: Array<number> = []
  for (let i = 0; i < rows; i += 1) {
    for (let j = 0; j < cols; j += 1) {
      let total = 0
      for (let k = 0; k < inner; k += 1) {
        total += left.get(i * inner + k) * right.get(k * cols + j)
      }
      values.push(total)
    }
  }
  if (left.ndim === 1 && right.ndim === 1) {
    return values[0] ?? 0
  }
  const shape = [...(left.ndim === 2 ? [rows] : []), ...(right.ndim === 2 ? [cols] : [])]
  return NdArray.fromValues(values, shape)
}

const closeness = (args: ReadonlyArray<unknown>): Magnitude => {
  const rtol = optionalNumber(args, 2, "rtol", 1e-5)
  const atol = optionalNumber(args, 3, "atol", 1e-8)
  return mapElementwise(
    [magnitudeAt(args, 0), magnitudeAt(args, 1)],
    (a, b) => (a === b || Math.abs(a - b) <= atol + rtol * Math.abs(b) ? 1 : 0),
    "bool",
  )
}

const splitOutputs =
  (fn: (x: number, y: number) => readonly [number, number], dtypes: readonly [DType, DType] = ["float64", "float64"]): Kernel =>
  (args) => {
    const inputs = [magnitudeAt(args, 0), ...(args.length > 1 ? [magnitudeAt(args, 1)] : [])]
    const pick = (slot: 0 | 1) => (...values: Array<number>) => fn(values[0] ?? Number.NaN, values[1] ?? Number.NaN)[slot]
    return [mapElementwise(inputs, pick(0), dtypes[0]), mapElementwise(inputs, pick(1), dtypes[1])]
  }

const elementwise: Record<string, Kernel> = {
  negative: unary((x) => -x),
  positive: unary((x) => x),
  absolute: unary(Math.abs),
  fabs: unary(Math.abs),
  rint: unary(roundHalfEven),
  floor: unary(Math.floor),
  ceil: unary(Math.ceil),
  trunc: unary(Math.trunc),
  sign: unary(Math.sign),
  sqrt: unary(Math.sqrt),
  cbrt: unary(Math.cbrt),
  square: unary((x) => x * x),
  reciprocal: unary((x) => 1 / x),
  exp: unary(Math.exp),
  exp2: unary((x) => 2 ** x),
  expm1: unary(Math.expm1),
  log: unary(Math.log),
  log2: unary(Math.log2),
  log10: unary(Math.log10),
  log1p: unary(Math.log1p),
  sin: unary(Math.sin),
  cos: unary(Math.cos),
  tan: unary(Math.tan),
  sinh: unary(Math.sinh),
  cosh: unary(Math.cosh),
  tanh: unary(Math.tanh),
  arcsin: unary(Math.asin),
  arccos: unary(Math.acos),
  arctan: unary(Math.atan),
  arcsinh: unary(Math.asinh),
  arccosh: unary(Math.acosh),
  arctanh: unary(Math.atanh),
  rad2deg: unary((x) => (x * 180) / Math.PI),
  deg2rad: unary((x) => (x * Math.PI) / 180),
  isnan: predicate(Number.isNaN),
  isinf: predicate((x) => x === Infinity || x === -Infinity),
  isfinite: predicate(Number.isFinite),
  signbit: predicate(isNegative),
  add: binary((x, y) => x + y),
  subtract: binary((x, y) => x - y),
  multiply: binary((x, y) => x * y),
  divide: binary((x, y) => x / y),
  floor_divide: binary((x, y) => Math.floor(x / y)),
  remainder: binary(pythonRemainder),
  fmod: binary((x, y) => x % y),
  power: binary((x, y) => x ** y),
  hypot: binary(Math.hypot),
  maximum: binary((x, y) => (Number.isNaN(x) || Number.isNaN(y) ? Number.NaN : Math.max(x, y))),
  minimum: binary((x, y) => (Number.isNaN(x) || Number.isNaN(y) ? Number.NaN : Math.min(x, y))),
  fmax: binary((x, y) => (Number.isNaN(x) ? y : Number.isNaN(y) ? x : Math.max(x, y))),
  fmin: binary((x, y) => (Number.isNaN(x) ? y : Number.isNaN(y) ? x : Math.min(x, y))),
  arctan2: binary(Math.atan2),
  copysign: binary((x, y) => (isNegative(y) ? -Math.abs(x) : Math.abs(x))),
  equal: comparison((x, y) => x === y),
  not_equal: comparison((x, y) => x !== y),
  less: comparison((x, y) => x < y),
  less_equal: comparison((x, y) => x <= y),
  greater: comparison((x, y) => x > y),
  greater_equal: comparison((x, y) => x >= y),
  divmod: splitOutputs((x, y) => [Math.floor(x / y), pythonRemainder(x, y)]),
  modf: splitOutputs((x) => [x - Math.trunc(x), Math.trunc(x)]),
  frexp: splitOutputs((x) => frexpParts(x), ["float64", "int32"]),
}

const functions: Record<string, Kernel> = {
  sum: reduction(sumOf),
  mean: reduction(meanOf),
  median: reduction(medianOf),
  amax: reduction((values) => extremum(values, (a, b) => (Number.isNaN(a) || a > b ? a : b))),
  amin: reduction((values) => extremum(values, (a, b) => (Number.isNaN(a) || a < b ? a : b))),
  ptp: reduction(
    (values) => extremum(values, (a, b) => Math.max(a, b)) - extremum(values, (a, b) => Math.min(a, b)),
  ),
  std: reduction((values, args) => Math.sqrt(varianceOf(values, optionalNumber(args, 2, "ddof", 0)))),
  var: reduction((values, args) => varianceOf(values, optionalNumber(args, 2, "ddof", 0))),
  argmax: reduction((values) => argExtremum(values, (a, b) => a > b), "int32"),
  argmin: reduction((values) => argExtremum(values, (a, b) => a < b), "int32"),
  norm: (args) => Math.sqrt(sumOf(toNdArray(magnitudeAt(args, 0)).toFlat().map((value) => value * value))),
  cumsum: (args) => {
    const input = toNdArray(magnitudeAt(args, 0))
    const axis = optionalInteger(args, 1, "axis")
    return axis === undefined
      ? mapLanes(input.reshape([input.size]), 0, cumulativeSum)
      : mapLanes(input, axis, cumulativeSum)
  },
  sort: (args) => {
    const input = toNdArray(magnitudeAt(args, 0))
    if (input.ndim === 0) {
      return input.copy()
    }
    return mapLanes(input, optionalInteger(args, 1, "axis") ?? -1, (lane) => lane.sort(compareAscending), input.dtype)
  },
  diff: (args) => {
    const input = toNdArray(magnitudeAt(args, 0))
    return mapLanes(input, optionalInteger(args, 1, "axis") ?? -1, (lane) =>
      lane.slice(1).map((value, index) => value - (lane[index] ?? Number.NaN)),
    )
  },
  round: (args) => {
    const scale = 10 ** (optionalInteger(args, 1, "decimals") ?? 0)
    return mapElementwise([magnitudeAt(args, 0)], (x) => roundHalfEven(x * scale) / scale)
  },
  reshape: (args) => reshape(toNdArray(magnitudeAt(args, 0)), integerList(args[1], "shape")),
  transpose: (args) => {
    const input = toNdArray(magnitudeAt(args, 0))
    const axes = args[1] === undefined ? input.shape.map((_, axis) => input.ndim - 1 - axis) : integerList(args[1], "axes")
    return transpose(input, axes)
  },
  ravel: (args) => {
    const input = toNdArray(magnitudeAt(args, 0))
    return input.reshape([input.size])
  },
  squeeze: (args) => {
    const input = toNdArray(magnitudeAt(args, 0))
    return input.reshape(input.shape.filter((dim) => dim !== 1))
  },
  expand_dims: (args) => expandDims(toNdArray(magnitudeAt(args, 0)), optionalInteger(args, 1, "axis") ?? 0),
  concatenate: (args) => concatenate(sequenceAt(args, 0), optionalInteger(args, 1, "axis") ?? 0),
  stack: (args) => {
    const arrays = sequenceAt(args, 0)
    const first = arrays[0]
    if (first && arrays.some((array) => array.shape.join(",") !== first.shape.join(","))) {
      throw new Error("all input arrays must have the same shape")
    }
    const axis = optionalInteger(args, 1, "axis") ?? 0
    return concatenate(
      arrays.map((array) => expandDims(array, axis)),
      axis,
    )
  },
  where: (args) =>
    mapElementwise([magnitudeAt(args, 0), magnitudeAt(args, 1), magnitudeAt(args, 2)], (c, x, y) => (c !== 0 ? x : y)),
  clip: (args) =>
    mapElementwise(
      [
        magnitudeAt(args, 0),
        args[1] === undefined ? -Infinity : magnitudeAt(args, 1),
        args[2] === undefined ? Infinity : magnitudeAt(args, 2),
      ],
      (x, low, high) => Math.min(Math.max(x, low), high),
    ),
  dot: (args) => dot(toNdArray(magnitudeAt(args, 0)), toNdArray(magnitudeAt(args, 1)), true),
  matmul: (args) => dot(toNdArray(magnitudeAt(args, 0)), toNdArray(magnitudeAt(args, 1)), false),
  isclose: closeness,
  allclose: (args) => {
    const close = closeness(args)
    return close instanceof NdArray ? close.toFlat().every((flag) => flag !== 0) : close === true
  },
}

export const defaultKernels: ReadonlyMap<string, Kernel> = new Map(
  Object.entries({ ...elementwise, ...functions }),
)
