/**
 * Quantity: a backend magnitude paired with a unit.
 *
 * A quantity is bound to the registry adapter and backend it was created with,
 * so conversions and metadata never need them passed in again. The unit is
 * always defined; the dimensionless unit is the empty unit map.
 *
 * @since 0.1.0
 */

import { Effect, Either, Option } from "effect"
import { describePayload, toPayload, type Backend, type DType, type Magnitude } from "./Backend.js"
import { IncompatibleDimensions, UnsupportedPayload } from "./Errors.js"
import {
  conversionFactor,
  type DimensionMap,
  type RegistryAdapter,
  type ResolvedUnit,
  type UnitInput,
  type UnitMap,
  UnitNotFoundError,
} from "./Units.js"
import { equalExponents, formatUnits, isEmpty } from "./internal/UnitMap.js"

/**
 * @since 0.1.0
 */
export const QuantityTypeId: unique symbol = Symbol.for("quantity-dispatch/Quantity")

/**
 * Registry adapter and backend a quantity is bound to.
 *
 * @category Models
 * @since 0.1.0
 */
export interface QuantityContext {
  readonly adapter: RegistryAdapter
  readonly backend: Backend
}

/**
 * @category Models
 * @since 0.1.0
 */
export class Quantity {
  readonly [QuantityTypeId] = QuantityTypeId

  private constructor(
    readonly magnitude: Magnitude,
    private unit: ResolvedUnit,
    readonly context: QuantityContext,
  ) {}

  /**
   * Wrap an already-coerced payload in an already-resolved unit.
   */
  static fromResolved(context: QuantityContext, magnitude: Magnitude, unit: ResolvedUnit): Quantity {
    return new Quantity(magnitude, unit, context)
  }

  get units(): UnitMap {
    return this.unit.units
  }

  get resolvedUnit(): ResolvedUnit {
    return this.unit
  }

  get shape(): ReadonlyArray<number> {
    return this.context.backend.shape(this.magnitude)
  }

  get size(): number {
    return this.shape.reduce((total, extent) => total * extent, 1)
  }

  get ndim(): number {
    return this.shape.length
  }

  get dtype(): DType {
    return this.context.backend.dtype(this.magnitude)
  }

  get isDimensionless(): boolean {
    return isEmpty(this.unit.dimension)
  }

  dimensionality(): DimensionMap {
    return this.unit.dimension
  }

  isCompatibleWith(unit: UnitInput): Effect.Effect<boolean, UnitNotFoundError> {
    return Effect.map(this.context.adapter.resolve(unit), (resolved) =>
      equalExponents(resolved.dimension, this.unit.dimension),
    )
  }

  convertTo(unit: UnitInput): Effect.Effect<Quantity, UnitNotFoundError | IncompatibleDimensions> {
    return Effect.gen(this, function* () {
      const target = yield* this.context.adapter.resolve(unit)
      const factor = yield* this.factorTo(target)
      const backend = this.context.backend
      const magnitude = factor === 1 ? backend.copy(this.magnitude) : backend.scale(this.magnitude, factor)
      return Quantity.fromResolved(this.context, magnitude, target)
    })
  }

  /**
   * Rescale the magnitude's own storage and switch this quantity to `unit`.
   * Fails, leaving both untouched, when the storage cannot represent the
   * converted values.
   */
  convertToInPlace(
    unit: UnitInput,
  ): Effect.Effect<Quantity, UnitNotFoundError | IncompatibleDimensions | UnsupportedPayload> {
    return Effect.gen(this, function* () {
      const target = yield* this.context.adapter.resolve(unit)
      const factor = yield* this.factorTo(target)
      const rescaled = this.context.backend.scaleInPlace(this.magnitude, factor)
      if (Either.isLeft(rescaled)) {
        return yield* Effect.fail(
          new UnsupportedPayload({
            payload: describePayload(this.magnitude),
            capability: `in-place conversion (${rescaled.left})`,
          }),
        )
      }
      this.unit = target
      return this
    })
  }

  magnitudeIn(unit: UnitInput): Effect.Effect<Magnitude, UnitNotFoundError | IncompatibleDimensions> {
    return Effect.map(this.convertTo(unit), (converted) => converted.magnitude)
  }

  toString(): string {
    return `${String(this.magnitude)} ${formatUnits(this.units)}`
  }

  private factorTo(target: ResolvedUnit): Effect.Effect<number, IncompatibleDimensions> {
    return conversionFactor(this.unit, target)
  }
}

/**
 * @category Guards
 * @since 0.1.0
 */
export const isQuantity = (value: unknown): value is Quantity => value instanceof Quantity

/**
 * Construct a quantity from any value the backend's probes accept.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const makeQuantity = (
  context: QuantityContext,
  magnitude: unknown,
  unit: UnitInput,
): Effect.Effect<Quantity, UnitNotFoundError | UnsupportedPayload> =>
  Effect.gen(function* () {
    const payload = toPayload(context.backend, magnitude)
    if (Option.isNone(payload)) {
      return yield* Effect.fail(
        new UnsupportedPayload({ payload: describePayload(magnitude), capability: "wrapping in a quantity" }),
      )
    }
    const resolved = yield* context.adapter.resolve(unit)
    return Quantity.fromResolved(context, payload.value, resolved)
  })
