/**
 * Backend magnitude interface.
 *
 * The dispatcher never computes anything itself: it converts units, then hands
 * bare magnitudes to a backend kernel by name. A backend also decides which
 * foreign values count as payloads through an ordered list of capability
 * probes, so new array types can be accepted without touching the dispatcher.
 *
 * @since 0.1.0
 */

import { Either, Option, Predicate } from "effect"
import { isMagnitude, type Magnitude, type Scalar } from "./internal/backend/broadcast.js"
import { defaultKernels, type Kernel, type KernelResult } from "./internal/backend/kernels.js"
import { NdArray, type DType } from "./internal/backend/NdArray.js"

export { NdArray, type DType, type Kernel, type KernelResult, type Magnitude, type Scalar, isMagnitude }

/**
 * Protocol hook a foreign array type implements to expose its data as an
 * `NdArray`.
 *
 * @category Payloads
 * @since 0.1.0
 */
export const ArrayInterop: unique symbol = Symbol.for("quantity-dispatch/ArrayInterop")

/**
 * @category Payloads
 * @since 0.1.0
 */
export interface ArrayInteropLike {
  readonly [ArrayInterop]: () => NdArray
}

/**
 * Turns a foreign value into a backend payload when it has the capabilities the
 * probe checks for.
 *
 * @category Payloads
 * @since 0.1.0
 */
export interface PayloadProbe {
  readonly name: string
  readonly coerce: (value: unknown) => Option.Option<Magnitude>
}

/**
 * @category Models
 * @since 0.1.0
 */
export interface Backend {
  readonly name: string
  readonly probes: ReadonlyArray<PayloadProbe>
  readonly shape: (magnitude: Magnitude) => ReadonlyArray<number>
  readonly dtype: (magnitude: Magnitude) => DType
  readonly scale: (magnitude: Magnitude, factor: number) => Magnitude
  /**
   * The same values in storage of their own; scalars are returned as they are.
   */
  readonly copy: (magnitude: Magnitude) => Magnitude
  /**
   * Rescale the existing storage. `Left` carries the reason the storage cannot
   * represent the result.
   */
  readonly scaleInPlace: (magnitude: Magnitude, factor: number) => Either.Either<Magnitude, string>
  /**
   * True when every element is zero or NaN; such values carry no unit.
   */
  readonly allZeroOrNan: (magnitude: Magnitude) => boolean
  readonly supports: (kernel: string) => boolean
  readonly call: (kernel: string, args: ReadonlyArray<unknown>) => KernelResult
}

/**
 * @category Payloads
 * @since 0.1.0
 */
export const scalarProbe: PayloadProbe = {
  name: "scalar",
  coerce: (value) =>
    typeof value === "number" || typeof value === "boolean" ? Option.some(value) : Option.none(),
}

/**
 * @category Payloads
 * @since 0.1.0
 */
export const ndarrayProbe: PayloadProbe = {
  name: "ndarray",
  coerce: (value) => (value instanceof NdArray ? Option.some(value) : Option.none()),
}

/**
 * @category Payloads
 * @since 0.1.0
 */
export const nestedArrayProbe: PayloadProbe = {
  name: "nested-array",
  coerce: (value) => NdArray.fromNested(value),
}

/**
 * @category Payloads
 * @since 0.1.0
 */
export const arrayInteropProbe: PayloadProbe = {
  name: "array-interop",
  coerce: (value) => {
    if (!Predicate.hasProperty(value, ArrayInterop)) {
      return Option.none()
    }
    const hook = value[ArrayInterop]
    if (typeof hook !== "function") {
      return Option.none()
    }
    const exported: unknown = hook.call(value)
    return exported instanceof NdArray ? Option.some(exported) : Option.none()
  },
}

/**
 * @category Payloads
 * @since 0.1.0
 */
export const defaultProbes: ReadonlyArray<PayloadProbe> = [
  scalarProbe,
  ndarrayProbe,
  nestedArrayProbe,
  arrayInteropProbe,
]

/**
 * Run the backend's probes in order and return the first payload produced.
 *
 * @category Payloads
 * @since 0.1.0
 */
export const toPayload = (backend: Backend, value: unknown): Option.Option<Magnitude> => {
  for (const probe of backend.probes) {
    const payload = probe.coerce(value)
    if (Option.isSome(payload)) {
      return payload
    }
  }
  return Option.none()
}

/**
 * Short description of a value for diagnostics.
 *
 * @category Payloads
 * @since 0.1.0
 */
export const describePayload = (value: unknown): string => {
  if (value instanceof NdArray) {
    return `NdArray<${value.dtype}>[${value.shape.join(", ")}]`
  }
  if (value === null) {
    return "null"
  }
  if (typeof value === "object") {
    return value.constructor?.name ?? "object"
  }
  return typeof value
}

/**
 * @category Constructors
 * @since 0.1.0
 */
export interface ArrayBackendOptions {
  readonly probes?: ReadonlyArray<PayloadProbe>
  readonly kernels?: ReadonlyMap<string, Kernel>
}

const INT32_MIN = -(2 ** 31)
const INT32_MAX = 2 ** 31 - 1

/**
 * Dense in-memory backend over `number`, `boolean` and `NdArray`.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const makeArrayBackend = (options: ArrayBackendOptions = {}): Backend => {
  const kernels = options.kernels ?? defaultKernels
  return {
    name: "array",
    probes: options.probes ?? defaultProbes,
    shape: (magnitude) => (magnitude instanceof NdArray ? magnitude.shape : []),
    dtype: (magnitude) => {
      if (magnitude instanceof NdArray) {
        return magnitude.dtype
      }
      return typeof magnitude === "boolean" ? "bool" : "float64"
    },
    scale: (magnitude, factor) => {
      if (magnitude instanceof NdArray) {
        return NdArray.fromValues(
          magnitude.toFlat().map((value) => value * factor),
          magnitude.shape,
        )
      }
      return (typeof magnitude === "boolean" ? Number(magnitude) : magnitude) * factor
    },
    copy: (magnitude) => (magnitude instanceof NdArray ? magnitude.copy() : magnitude),
    scaleInPlace: (magnitude, factor) => {
      if (!(magnitude instanceof NdArray)) {
        return Either.left("scalar magnitudes have no storage to rescale")
      }
      if (magnitude.dtype === "bool") {
        return Either.left("bool storage cannot hold rescaled values")
      }
      if (magnitude.dtype === "int32" && !Number.isInteger(factor)) {
        return Either.left(`int32 storage cannot hold values rescaled by ${factor}`)
      }
      const scaled = magnitude.toFlat().map((value) => value * factor)
      if (magnitude.dtype === "int32" && scaled.some((value) => value < INT32_MIN || value > INT32_MAX)) {
        return Either.left(`values rescaled by ${factor} fall outside the int32 range`)
      }
      magnitude.data.set(scaled)
      return Either.right(magnitude)
    },
    allZeroOrNan: (magnitude) => {
      if (magnitude instanceof NdArray) {
        return magnitude.dtype !== "bool" && magnitude.toFlat().every((value) => value === 0 || Number.isNaN(value))
      }
      return typeof magnitude === "number" && (magnitude === 0 || Number.isNaN(magnitude))
    },
    supports: (kernel) => kernels.has(kernel),
    call: (kernel, args) => {
      const implementation = kernels.get(kernel)
      if (!implementation) {
        throw new Error(`kernel "${kernel}" is not implemented`)
      }
      return implementation(args)
    },
  }
}

/**
 * @category Constructors
 * @since 0.1.0
 */
export const ArrayBackend: Backend = makeArrayBackend()
