/**
 * Units module providing schema-backed definitions and the registry adapter
 * consumed by the dispatcher.
 *
 * The registry keeps track of unit symbols, their canonical dimensions, and
 * scaling factors relative to the canonical unit of that dimension. A unit is
 * addressed either by a registered symbol or by a unit map of symbols to
 * exponents; no textual unit expressions are parsed here.
 *
 * @since 0.1.0
 */

import { Data, Effect, Option, Schema } from "effect"
import { toPayload, type Backend, type Magnitude, describePayload } from "./Backend.js"
import { DuplicateRegistrationError, IncompatibleDimensions, UnsupportedPayload } from "./Errors.js"
import {
  combine,
  equalExponents,
  isEmpty,
  normalizeExponents,
  type DimensionMap,
  type UnitMap,
} from "./internal/UnitMap.js"

export type { DimensionMap, UnitMap }

const DimensionMapSchema = Schema.Record({
  key: Schema.String,
  value: Schema.Number.pipe(Schema.finite()),
})

/**
 * Declarative unit definition describing how a symbol relates to a canonical
 * dimension and base scaling factor.
 *
 * @since 0.1.0
 */
export class UnitDefinition extends Schema.Class<UnitDefinition>("UnitDefinition")({
  symbol: Schema.NonEmptyTrimmedString,
  dimension: DimensionMapSchema,
  factor: Schema.Number.pipe(Schema.greaterThan(0)),
  description: Schema.optional(Schema.String),
}) {}

/**
 * Aggregate registry holding all known unit definitions.
 *
 * @since 0.1.0
 */
export class UnitRegistry extends Schema.Class<UnitRegistry>("UnitRegistry")({
  units: Schema.Array(UnitDefinition),
}) {
  /**
   * Convert the registry into a lookup map keyed by unit symbol.
   */
  toMap(): ReadonlyMap<string, UnitDefinition> {
    return new Map(this.units.map((definition) => [definition.symbol, definition] as const))
  }
}

/**
 * Raised when a requested unit symbol does not exist within the registry.
 *
 * @since 0.1.0
 */
export class UnitNotFoundError extends Data.TaggedError("UnitNotFoundError")<{
  readonly symbol: string
}> {
  override get message(): string {
    return `Unknown unit symbol "${this.symbol}"`
  }
}

/**
 * A unit as accepted by the public API: a registered symbol or a map of
 * symbols to exponents.
 *
 * @since 0.1.0
 */
export type UnitInput = string | UnitMap

/**
 * A unit map together with its dimensional signature and its factor relative
 * to the canonical units of that signature.
 *
 * @since 0.1.0
 */
export interface ResolvedUnit {
  readonly units: UnitMap
  readonly dimension: DimensionMap
  readonly factor: number
}

/**
 * The dimensionless unit, resolvable against any registry.
 *
 * @since 0.1.0
 */
export const dimensionlessUnit: ResolvedUnit = { units: {}, dimension: {}, factor: 1 }

const registryIndex = new WeakMap<UnitRegistry, ReadonlyMap<string, UnitDefinition>>()

const indexOf = (registry: UnitRegistry): ReadonlyMap<string, UnitDefinition> => {
  const cached = registryIndex.get(registry)
  if (cached) {
    return cached
  }
  const index = registry.toMap()
  registryIndex.set(registry, index)
  return index
}

const lookupUnit = (
  registry: UnitRegistry,
  symbol: string,
): Effect.Effect<UnitDefinition, UnitNotFoundError> => {
  const definition = indexOf(registry).get(symbol.trim())
  return definition ? Effect.succeed(definition) : Effect.fail(new UnitNotFoundError({ symbol }))
}

const toUnitMap = (unit: UnitInput): UnitMap =>
  typeof unit === "string" ? (unit.trim().length === 0 ? {} : { [unit.trim()]: 1 }) : normalizeExponents(unit)

const ensureUnique = (
  definitions: ReadonlyArray<UnitDefinition>,
): Effect.Effect<ReadonlyArray<UnitDefinition>, DuplicateRegistrationError> => {
  const seen = new Set<string>()
  for (const definition of definitions) {
    if (seen.has(definition.symbol)) {
      return Effect.fail(new DuplicateRegistrationError({ kind: "unit", name: definition.symbol }))
    }
    seen.add(definition.symbol)
  }
  return Effect.succeed(definitions)
}

/**
 * Register a set of unit definitions into a registry.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const makeRegistry = (
  definitions: ReadonlyArray<UnitDefinition>,
): Effect.Effect<UnitRegistry, DuplicateRegistrationError> =>
  Effect.map(ensureUnique(definitions), (units) => new UnitRegistry({ units: [...units] }))

/**
 * Append additional unit definitions to an existing registry. The original
 * registry is left untouched.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const extendRegistry = (
  registry: UnitRegistry,
  definitions: ReadonlyArray<UnitDefinition>,
): Effect.Effect<UnitRegistry, DuplicateRegistrationError> => makeRegistry([...registry.units, ...definitions])

/**
 * Resolve a unit to its signature and factor.
 *
 * @category Lookups
 * @since 0.1.0
 */
export const resolveUnit = (
  registry: UnitRegistry,
  unit: UnitInput,
): Effect.Effect<ResolvedUnit, UnitNotFoundError> =>
  Effect.gen(function* () {
    const units = toUnitMap(unit)
    const dimensions: Array<readonly [DimensionMap, number]> = []
    let factor = 1
    for (const [symbol, exponent] of Object.entries(units)) {
      const definition = yield* lookupUnit(registry, symbol)
      dimensions.push([definition.dimension, exponent])
      factor *= definition.factor ** exponent
    }
    return { units, dimension: combine(dimensions), factor }
  })

/**
 * Build the dimension-mismatch error for two resolved units.
 *
 * @category Conversions
 * @since 0.1.0
 */
export const mismatch = (from: ResolvedUnit, to: ResolvedUnit): IncompatibleDimensions =>
  new IncompatibleDimensions({
    from: from.units,
    to: to.units,
    fromDimension: from.dimension,
    toDimension: to.dimension,
  })

/**
 * Factor that turns a magnitude in `from` into one in `to`.
 *
 * @category Conversions
 * @since 0.1.0
 */
export const conversionFactor = (
  from: ResolvedUnit,
  to: ResolvedUnit,
): Effect.Effect<number, IncompatibleDimensions> =>
  equalExponents(from.dimension, to.dimension)
    ? Effect.succeed(from.factor / to.factor)
    : Effect.fail(mismatch(from, to))

/**
 * Explicitly convert a scalar value from one unit to another within the same
 * dimension.
 *
 * @category Conversions
 * @since 0.1.0
 */
export const convertValue = (
  registry: UnitRegistry,
  value: number,
  from: UnitInput,
  to: UnitInput,
): Effect.Effect<number, UnitNotFoundError | IncompatibleDimensions> =>
  Effect.gen(function* () {
    const source = yield* resolveUnit(registry, from)
    const target = yield* resolveUnit(registry, to)
    const factor = yield* conversionFactor(source, target)
    return value * factor
  })

/**
 * The registry as seen by the dispatcher: dimensional signatures and magnitude
 * conversion, with the backend doing the arithmetic.
 *
 * @category Models
 * @since 0.1.0
 */
export interface RegistryAdapter {
  readonly registry: UnitRegistry
  readonly resolve: (unit: UnitInput) => Effect.Effect<ResolvedUnit, UnitNotFoundError>
  readonly dimensionalSignature: (unit: UnitInput) => Effect.Effect<DimensionMap, UnitNotFoundError>
  readonly isDimensionless: (unit: UnitInput) => Effect.Effect<boolean, UnitNotFoundError>
  readonly convert: (
    magnitude: unknown,
    from: UnitInput,
    to: UnitInput,
  ) => Effect.Effect<Magnitude, UnitNotFoundError | IncompatibleDimensions | UnsupportedPayload>
}

/**
 * @category Constructors
 * @since 0.1.0
 */
export const makeRegistryAdapter = (registry: UnitRegistry, backend: Backend): RegistryAdapter => {
  const resolve = (unit: UnitInput) => resolveUnit(registry, unit)
  return {
    registry,
    resolve,
    dimensionalSignature: (unit) => Effect.map(resolve(unit), (resolved) => resolved.dimension),
    isDimensionless: (unit) => Effect.map(resolve(unit), (resolved) => isEmpty(resolved.dimension)),
    convert: (magnitude, from, to) =>
      Effect.gen(function* () {
        const payload = toPayload(backend, magnitude)
        if (Option.isNone(payload)) {
          return yield* Effect.fail(
            new UnsupportedPayload({ payload: describePayload(magnitude), capability: "unit conversion" }),
          )
        }
        const factor = yield* conversionFactor(yield* resolve(from), yield* resolve(to))
        return factor === 1 ? payload.value : backend.scale(payload.value, factor)
      }),
  }
}

const DEFAULT_UNIT_DEFINITIONS: ReadonlyArray<UnitDefinition> = [
  new UnitDefinition({ symbol: "m", dimension: { length: 1 }, factor: 1, description: "Metre" }),
  new UnitDefinition({ symbol: "km", dimension: { length: 1 }, factor: 1000 }),
  new UnitDefinition({ symbol: "cm", dimension: { length: 1 }, factor: 0.01 }),
  new UnitDefinition({ symbol: "mm", dimension: { length: 1 }, factor: 0.001 }),
  new UnitDefinition({ symbol: "inch", dimension: { length: 1 }, factor: 0.0254 }),
  new UnitDefinition({ symbol: "ft", dimension: { length: 1 }, factor: 0.3048 }),
  new UnitDefinition({ symbol: "s", dimension: { time: 1 }, factor: 1, description: "Second" }),
  new UnitDefinition({ symbol: "ms", dimension: { time: 1 }, factor: 0.001 }),
  new UnitDefinition({ symbol: "min", dimension: { time: 1 }, factor: 60 }),
  new UnitDefinition({ symbol: "h", dimension: { time: 1 }, factor: 3600 }),
  new UnitDefinition({ symbol: "kg", dimension: { mass: 1 }, factor: 1, description: "Kilogram" }),
  new UnitDefinition({ symbol: "g", dimension: { mass: 1 }, factor: 0.001 }),
  new UnitDefinition({ symbol: "radian", dimension: { angle: 1 }, factor: 1 }),
  new UnitDefinition({ symbol: "degree", dimension: { angle: 1 }, factor: Math.PI / 180 }),
  new UnitDefinition({ symbol: "turn", dimension: { angle: 1 }, factor: 2 * Math.PI }),
  new UnitDefinition({ symbol: "percent", dimension: {}, factor: 0.01 }),
  new UnitDefinition({ symbol: "ppm", dimension: {}, factor: 1e-6 }),
  new UnitDefinition({ symbol: "Hz", dimension: { time: -1 }, factor: 1 }),
  new UnitDefinition({ symbol: "N", dimension: { mass: 1, length: 1, time: -2 }, factor: 1 }),
  new UnitDefinition({ symbol: "J", dimension: { mass: 1, length: 2, time: -2 }, factor: 1 }),
]

/**
 * Registry with SI-style length, mass, time and angle units plus a few
 * dimensionless ratios.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const defaultRegistry: UnitRegistry = new UnitRegistry({ units: [...DEFAULT_UNIT_DEFINITIONS] })
