import { NdArray, shapeSize, type DType } from "./NdArray.js"

export type Scalar = number | boolean

export type Magnitude = Scalar | NdArray

export const isMagnitude = (value: unknown): value is Magnitude =>
  typeof value === "number" || typeof value === "boolean" || value instanceof NdArray

export const toNdArray = (value: Magnitude): NdArray => {
  if (value instanceof NdArray) {
    return value
  }
  return typeof value === "boolean"
    ? NdArray.fromValues([value ? 1 : 0], [], "bool")
    : NdArray.fromValues([value], [])
}

export const scalarValue = (value: Scalar): number => (typeof value === "boolean" ? (value ? 1 : 0) : value)

export const broadcastShapes = (shapes: ReadonlyArray<ReadonlyArray<number>>): Array<number> => {
  const ndim = Math.max(0, ...shapes.map((shape) => shape.length))
  const out: Array<number> = []
  for (let axis = 0; axis < ndim; axis += 1) {
    let extent = 1
    for (const shape of shapes) {
      const dim = shape[shape.length - ndim + axis] ?? 1
      if (dim === 1) {
        continue
      }
      if (extent !== 1 && extent !== dim) {
        throw new Error(
          `operands could not be broadcast together with shapes ${shapes.map((s) => `[${s.join(", ")}]`).join(" ")}`,
        )
      }
      extent = dim
    }
    out.push(extent)
  }
  return out
}

/**
 * Row-major strides of `shape` aligned to `outShape`, with zero strides on
 * broadcast axes.
 */
const broadcastStrides = (shape: ReadonlyArray<number>, outShape: ReadonlyArray<number>): Array<number> => {
  const strides = new Array<number>(outShape.length).fill(0)
  let stride = 1
  for (let axis = shape.length - 1; axis >= 0; axis -= 1) {
    const outAxis = outShape.length - shape.length + axis
    const extent = shape[axis] ?? 1
    strides[outAxis] = extent === 1 ? 0 : stride
    stride *= extent
  }
  return strides
}

/**
 * Apply `fn` elementwise across broadcast inputs. All-scalar input yields a
 * scalar, so scalar callers get plain numbers and booleans back.
 */
export const mapElementwise = (
  inputs: ReadonlyArray<Magnitude>,
  fn: (...values: Array<number>) => number,
  dtype: DType = "float64",
): Magnitude => {
  const scalars = inputs.flatMap((input) => (input instanceof NdArray ? [] : [scalarValue(input)]))
  if (scalars.length === inputs.length) {
    const value = fn(...scalars)
    return dtype === "bool" ? value !== 0 : value
  }
  const arrays = inputs.map(toNdArray)
  const outShape = broadcastShapes(arrays.map((array) => array.shape))
  const strides = arrays.map((array) => broadcastStrides(array.shape, outShape))
  const out = NdArray.zeros(outShape, dtype)
  const size = shapeSize(outShape)
  const values = new Array<number>(arrays.length).fill(0)
  for (let flat = 0; flat < size; flat += 1) {
    for (let k = 0; k < arrays.length; k += 1) {
      let remainder = flat
      let offset = 0
      const inputStrides = strides[k] ?? []
      for (let axis = outShape.length - 1; axis >= 0; axis -= 1) {
        const extent = outShape[axis] ?? 1
        offset += (remainder % extent) * (inputStrides[axis] ?? 0)
        remainder = Math.floor(remainder / extent)
      }
      values[k] = arrays[k]?.get(offset) ?? Number.NaN
    }
    out.data[flat] = fn(...values)
  }
  return out
}

export const normalizeAxis = (axis: number, ndim: number): number => {
  if (!Number.isInteger(axis) || axis < -ndim || axis >= Math.max(ndim, 1)) {
    throw new Error(`axis ${axis} is out of bounds for array of dimension ${ndim}`)
  }
  return axis < 0 ? axis + ndim : axis
}

/**
 * Flat indices of every 1-D lane running along `axis`.
 */
export const lanes = (shape: ReadonlyArray<number>, axis: number): Array<Array<number>> => {
  const extent = shape[axis] ?? 1
  const inner = shapeSize(shape.slice(axis + 1))
  const outer = shapeSize(shape.slice(0, axis))
  const result: Array<Array<number>> = []
  for (let o = 0; o < outer; o += 1) {
    for (let i = 0; i < inner; i += 1) {
      const lane: Array<number> = []
      for (let k = 0; k < extent; k += 1) {
        lane.push(o * extent * inner + k * inner + i)
      }
      result.push(lane)
    }
  }
  return result
}
