import { Effect } from "effect"
import {
  ArrayBackend,
  ArrayInterop,
  NdArray,
  type ArrayInteropLike,
  type Backend,
  type Magnitude,
} from "../src/Backend.js"
import { isDeferSignal, type DeferSignal } from "../src/Dispatcher.js"
import { declareWrapper, emptyRanking, QUANTITY_WRAPPER } from "../src/Precedence.js"
import { Quantity } from "../src/Quantity.js"

/**
 * Stand-in for a masked array library that must wrap quantities, never the
 * other way round.
 */
export class MaskedArray {
  constructor(
    readonly values: ReadonlyArray<number>,
    readonly mask: ReadonlyArray<boolean>,
  ) {}
}

/**
 * Stand-in for a sparse array type ranked above `MaskedArray`.
 */
export class SparseArray {
  constructor(readonly entries: ReadonlyMap<number, number>) {}
}

/**
 * Downcast wrapper: quantities wrap it, and it exposes its values through the
 * array interop hook.
 */
export class LabeledArray implements ArrayInteropLike {
  constructor(
    readonly labels: ReadonlyArray<string>,
    readonly values: ReadonlyArray<number>,
  ) {}

  [ArrayInterop](): NdArray {
    return NdArray.fromValues(this.values)
  }
}

export const testRanking = Effect.runSync(
  Effect.gen(function* () {
    const masked = yield* declareWrapper(emptyRanking, {
      name: "MaskedArray",
      is: (value) => value instanceof MaskedArray,
      outranks: [QUANTITY_WRAPPER],
    })
    const sparse = yield* declareWrapper(masked, {
      name: "SparseArray",
      is: (value) => value instanceof SparseArray,
      outranks: ["MaskedArray"],
    })
    return yield* declareWrapper(sparse, {
      name: "LabeledArray",
      is: (value) => value instanceof LabeledArray,
      outrankedBy: [QUANTITY_WRAPPER],
    })
  }),
)

export interface BackendSpy {
  readonly backend: Backend
  readonly calls: Array<string>
  readonly scales: Array<number>
}

/**
 * Wrap a backend and record every kernel call and rescale it performs.
 */
export const spyBackend = (inner: Backend = ArrayBackend): BackendSpy => {
  const calls: Array<string> = []
  const scales: Array<number> = []
  return {
    calls,
    scales,
    backend: {
      ...inner,
      scale: (magnitude, factor) => {
        scales.push(factor)
        return inner.scale(magnitude, factor)
      },
      call: (kernel, args) => {
        calls.push(kernel)
        return inner.call(kernel, args)
      },
    },
  }
}

export const expectQuantity = (value: unknown): Quantity => {
  if (!(value instanceof Quantity)) {
    throw new Error(`expected a quantity, received ${String(value)}`)
  }
  return value
}

export const expectDefer = (value: unknown): DeferSignal => {
  if (!isDeferSignal(value)) {
    throw new Error(`expected a defer signal, received ${String(value)}`)
  }
  return value
}

export const expectList = (value: unknown): ReadonlyArray<unknown> => {
  if (!Array.isArray(value)) {
    throw new Error(`expected several outputs, received ${String(value)}`)
  }
  return value
}

/**
 * Plain JS view of a magnitude for assertions.
 */
export const plain = (magnitude: Magnitude): unknown =>
  magnitude instanceof NdArray ? magnitude.toNested() : magnitude
