/**
 * Unit-aware operation dispatcher.
 *
 * One call runs through fixed stages: arbitrate wrapper precedence, look up
 * the operation's specification, convert every argument according to its
 * role, derive the output units, call the backend kernel, and wrap the
 * results. Every unit check happens before the kernel runs, so a failing call
 * never reaches the backend.
 *
 * @since 0.1.0
 */

import { Context, Data, Effect, Layer, Option, type ConfigError } from "effect"
import {
  ArrayBackend,
  describePayload,
  toPayload,
  type Backend,
  type KernelResult,
  type Magnitude,
} from "./Backend.js"
import {
  ArityMismatch,
  BackendError,
  IncompatibleDimensions,
  type UnsupportedOperation,
  UnsupportedPayload,
} from "./Errors.js"
import {
  lookupOperation,
  type ArgumentRole,
  type OperationSpec,
  type OperationTable,
  type OutputRule,
} from "./Operations.js"
import {
  arbitrate,
  emptyRanking,
  normalizeOperand,
  type Operand,
  type PrecedenceRanking,
} from "./Precedence.js"
import { makeQuantity, Quantity, type QuantityContext } from "./Quantity.js"
import { defaultSettings, DispatcherSettingsConfig, type DispatcherSettings } from "./Settings.js"
import {
  defaultRegistry,
  dimensionlessUnit,
  makeRegistryAdapter,
  type ResolvedUnit,
  type UnitInput,
  type UnitMap,
  type UnitNotFoundError,
  type UnitRegistry,
} from "./Units.js"
import { defaultOperationTable } from "./internal/operations/index.js"
import { combine, equalExponents, isEmpty, powUnits } from "./internal/UnitMap.js"

/**
 * Returned instead of a result when the dispatcher declines an operation,
 * either because an upcast wrapper owns it or because no operand is a
 * quantity. The caller hands the operation to `owner` (or handles it itself
 * when there is none).
 *
 * @category Models
 * @since 0.1.0
 */
export class DeferSignal extends Data.TaggedClass("DeferSignal")<{
  readonly operation: string
  readonly owner: string | undefined
}> {}

/**
 * @category Guards
 * @since 0.1.0
 */
export const isDeferSignal = (value: unknown): value is DeferSignal => value instanceof DeferSignal

/**
 * A dispatch result: one quantity or bare magnitude per output rule.
 *
 * @category Models
 * @since 0.1.0
 */
export type DispatchValue = Quantity | Magnitude | ReadonlyArray<Quantity | Magnitude>

/**
 * @category Errors
 * @since 0.1.0
 */
export type DispatchError =
  | UnsupportedOperation
  | IncompatibleDimensions
  | UnsupportedPayload
  | UnitNotFoundError
  | ArityMismatch
  | BackendError

/**
 * Everything a dispatch call reads. Quantities produced by the dispatcher are
 * bound to it.
 *
 * @category Models
 * @since 0.1.0
 */
export interface DispatcherContext extends QuantityContext {
  readonly table: OperationTable
  readonly ranking: PrecedenceRanking
  readonly settings: DispatcherSettings
  readonly angleUnit: ResolvedUnit
}

interface Converted {
  readonly value: unknown
  readonly unit: UnitMap
}

const absent: Converted = { value: undefined, unit: {} }

const incompatible = (
  operation: string,
  argument: number,
  from: ResolvedUnit,
  to: ResolvedUnit,
  reason?: string,
): IncompatibleDimensions =>
  new IncompatibleDimensions({
    operation,
    argument,
    from: from.units,
    to: to.units,
    fromDimension: from.dimension,
    toDimension: to.dimension,
    reason,
  })

const rescale = (backend: Backend, payload: Magnitude, factor: number): Magnitude =>
  factor === 1 ? payload : backend.scale(payload, factor)

const payloadOf = (
  context: DispatcherContext,
  operation: string,
  operand: Operand,
  argument: number,
): Effect.Effect<{ readonly payload: Magnitude; readonly unit: ResolvedUnit }, UnsupportedPayload> => {
  switch (operand._tag) {
    case "Wrapped":
      return Effect.succeed({ payload: operand.quantity.magnitude, unit: operand.quantity.resolvedUnit })
    case "Upcast":
      return Effect.fail(
        new UnsupportedPayload({
          operation,
          argument,
          payload: operand.wrapper.name,
          capability: "handling by the unit dispatcher",
        }),
      )
    case "Bare":
      return Option.match(toPayload(context.backend, operand.value), {
        onNone: () =>
          Effect.fail(
            new UnsupportedPayload({
              operation,
              argument,
              payload: describePayload(operand.value),
              capability: "use as a numeric magnitude",
            }),
          ),
        onSome: (payload) => Effect.succeed({ payload, unit: dimensionlessUnit }),
      })
  }
}

/**
 * Convert one operand to the reference unit. Bare all-zero or all-NaN values
 * adopt the reference unit when the settings allow it.
 */
const matchTo = (
  context: DispatcherContext,
  operation: string,
  reference: ResolvedUnit,
  operand: Operand,
  argument: number,
): Effect.Effect<Converted, UnsupportedPayload | IncompatibleDimensions> =>
  Effect.gen(function* () {
    const { payload, unit } = yield* payloadOf(context, operation, operand, argument)
    if (
      operand._tag === "Bare" &&
      context.settings.zeroOrNanCompatible &&
      context.backend.allZeroOrNan(payload)
    ) {
      return { value: payload, unit: reference.units }
    }
    if (!equalExponents(unit.dimension, reference.dimension)) {
      return yield* Effect.fail(incompatible(operation, argument, unit, reference))
    }
    return { value: rescale(context.backend, payload, unit.factor / reference.factor), unit: reference.units }
  })

const isAbsent = (operand: Operand | undefined): boolean =>
  operand === undefined || (operand._tag === "Bare" && operand.value === undefined)

const convertArgument = (
  context: DispatcherContext,
  spec: OperationSpec,
  reference: ResolvedUnit,
  role: ArgumentRole,
  operand: Operand | undefined,
  argument: number,
): Effect.Effect<Converted, UnsupportedPayload | IncompatibleDimensions | UnitNotFoundError> =>
  Effect.gen(function* () {
    if (operand === undefined || isAbsent(operand)) {
      return absent
    }
    const operation = spec.name
    switch (role._tag) {
      case "UnitFree":
        return {
          value: operand._tag === "Wrapped" ? operand.quantity.magnitude : operand.value,
          unit: {},
        }
      case "Carried": {
        const { payload, unit } = yield* payloadOf(context, operation, operand, argument)
        return { value: payload, unit: unit.units }
      }
      case "Primary":
      case "Matched":
        return yield* matchTo(context, operation, reference, operand, argument)
      case "Dimensionless": {
        const { payload, unit } = yield* payloadOf(context, operation, operand, argument)
        if (!isEmpty(unit.dimension)) {
          return yield* Effect.fail(
            incompatible(operation, argument, unit, dimensionlessUnit, "expected a dimensionless value"),
          )
        }
        return { value: rescale(context.backend, payload, unit.factor), unit: {} }
      }
      case "Angle": {
        const { payload, unit } = yield* payloadOf(context, operation, operand, argument)
        const angle = context.angleUnit
        // dimensionless values are read as radians
        if (!isEmpty(unit.dimension) && !equalExponents(unit.dimension, angle.dimension)) {
          return yield* Effect.fail(incompatible(operation, argument, unit, angle, "expected an angle"))
        }
        return { value: rescale(context.backend, payload, unit.factor / angle.factor), unit: {} }
      }
      case "Convert": {
        const target = yield* context.adapter.resolve(role.unit)
        const { payload, unit } = yield* payloadOf(context, operation, operand, argument)
        if (!equalExponents(unit.dimension, target.dimension)) {
          return yield* Effect.fail(incompatible(operation, argument, unit, target))
        }
        return { value: rescale(context.backend, payload, unit.factor / target.factor), unit: target.units }
      }
      case "Sequence": {
        if (operand._tag !== "Bare" || !Array.isArray(operand.value)) {
          return yield* Effect.fail(
            new UnsupportedPayload({
              operation,
              argument,
              payload: operand._tag === "Wrapped" ? "Quantity" : describePayload(operand.value),
              capability: "use as a sequence of operands",
            }),
          )
        }
        const elements: ReadonlyArray<unknown> = operand.value
        // elements are reported by their position in the sequence
        const converted = yield* Effect.forEach(elements, (element, index) =>
          matchTo(context, operation, reference, normalizeOperand(context.ranking, element), index),
        )
        return { value: converted.map((item) => item.value), unit: reference.units }
      }
    }
  })

/**
 * The unit every `Primary`, `Matched` and `Sequence` argument is converted to:
 * the first quantity among them, or dimensionless when all are bare.
 */
const referenceUnit = (spec: OperationSpec, operands: ReadonlyArray<Operand>): ResolvedUnit => {
  for (const [index, role] of spec.arguments.entries()) {
    const operand = operands[index]
    if (operand === undefined) {
      continue
    }
    if ((role._tag === "Primary" || role._tag === "Matched") && operand._tag === "Wrapped") {
      return operand.quantity.resolvedUnit
    }
    if (role._tag === "Sequence" && operand._tag === "Bare" && Array.isArray(operand.value)) {
      const first: unknown = operand.value[0]
      return first instanceof Quantity ? first.resolvedUnit : dimensionlessUnit
    }
  }
  return dimensionlessUnit
}

const outputUnit = (
  context: DispatcherContext,
  spec: OperationSpec,
  reference: ResolvedUnit,
  converted: ReadonlyArray<Converted>,
  rule: OutputRule,
): Effect.Effect<ResolvedUnit | undefined, UnitNotFoundError | UnsupportedPayload> => {
  const unitOf = (index: number): UnitMap => converted[index]?.unit ?? {}
  switch (rule._tag) {
    case "SameAsPrimary":
      return Effect.succeed(reference)
    case "Dimensionless":
      return Effect.succeed(dimensionlessUnit)
    case "Bare":
      return Effect.succeed(undefined)
    case "Angle":
      return Effect.succeed(context.angleUnit)
    case "Fixed":
      return context.adapter.resolve(rule.unit)
    case "Product":
      return context.adapter.resolve(combine(rule.exponents.map((exponent, index) => [unitOf(index), exponent] as const)))
    case "Power":
      return context.adapter.resolve(powUnits(unitOf(0), rule.exponent))
    case "PowerOf": {
      const base = unitOf(0)
      if (isEmpty(base)) {
        return Effect.succeed(dimensionlessUnit)
      }
      const exponent = converted[rule.argument]?.value
      if (typeof exponent !== "number") {
        return Effect.fail(
          new UnsupportedPayload({
            operation: spec.name,
            argument: rule.argument,
            payload: describePayload(exponent),
            capability: "use as a unit exponent (a scalar is required)",
          }),
        )
      }
      return context.adapter.resolve(powUnits(base, exponent))
    }
  }
}

const checkArity = (spec: OperationSpec, operands: ReadonlyArray<unknown>): Effect.Effect<void, ArityMismatch> => {
  const missing = operands.length < spec.required || operands.slice(0, spec.required).some((operand) => operand === undefined)
  return operands.length > spec.arguments.length || missing
    ? Effect.fail(
        new ArityMismatch({
          operation: spec.name,
          minimum: spec.required,
          maximum: spec.arguments.length,
          received: operands.length,
        }),
      )
    : Effect.void
}

const isOutputList = (result: KernelResult): result is ReadonlyArray<Magnitude> => Array.isArray(result)

const wrapOutputs = (
  context: DispatcherContext,
  spec: OperationSpec,
  result: KernelResult,
  units: ReadonlyArray<ResolvedUnit | undefined>,
): Effect.Effect<DispatchValue, BackendError> => {
  const wrap = (value: Magnitude, unit: ResolvedUnit | undefined): Quantity | Magnitude =>
    unit === undefined ? value : Quantity.fromResolved(context, value, unit)
  const received = isOutputList(result) ? result.length : 1
  if (received !== units.length) {
    return Effect.fail(
      new BackendError({
        operation: spec.name,
        backend: context.backend.name,
        reason: `kernel "${spec.kernel}" returned ${received} outputs, expected ${units.length}`,
      }),
    )
  }
  return Effect.succeed(
    isOutputList(result) ? result.map((value, index) => wrap(value, units[index])) : wrap(result, units[0]),
  )
}

/**
 * Run one operation through the dispatcher.
 *
 * @category Dispatch
 * @since 0.1.0
 * @example
 * ```ts
 * const length = yield* makeQuantity(context, [3, 4], "m")
 * const result = yield* dispatch(context, "hypot", [length, [400, 300]])
 * ```
 */
export const dispatch = (
  context: DispatcherContext,
  operation: string,
  operands: ReadonlyArray<unknown>,
): Effect.Effect<DispatchValue | DeferSignal, DispatchError> =>
  Effect.gen(function* () {
    const verdict = arbitrate(context.ranking, operands)
    if (verdict._tag === "Defer") {
      const owner = verdict.owner?.name
      yield* Effect.logDebug("deferred").pipe(Effect.annotateLogs("owner", owner ?? "none"))
      return new DeferSignal({ operation, owner })
    }

    const spec = yield* lookupOperation(context.table, operation)
    yield* checkArity(spec, operands)
    if (!context.backend.supports(spec.kernel)) {
      return yield* Effect.fail(
        new UnsupportedPayload({
          operation,
          payload: `backend "${context.backend.name}"`,
          capability: `kernel "${spec.kernel}"`,
        }),
      )
    }

    const reference = referenceUnit(spec, verdict.operands)
    const converted = yield* Effect.forEach(spec.arguments, (role, index) =>
      convertArgument(context, spec, reference, role, verdict.operands[index], index),
    )
    const units = yield* Effect.forEach(spec.outputs, (rule) =>
      outputUnit(context, spec, reference, converted, rule),
    )

    yield* Effect.logDebug("calling kernel").pipe(Effect.annotateLogs("kernel", spec.kernel))
    const result = yield* Effect.try({
      try: () => context.backend.call(spec.kernel, converted.map((argument) => argument.value)),
      catch: (error) =>
        new BackendError({
          operation,
          backend: context.backend.name,
          reason: error instanceof Error ? error.message : String(error),
        }),
    })
    return yield* wrapOutputs(context, spec, result, units)
  }).pipe(Effect.annotateLogs("operation", operation), Effect.withLogSpan("dispatch"))

/**
 * @category Services
 * @since 0.1.0
 */
export interface UnitDispatcherService {
  readonly registry: UnitRegistry
  readonly settings: DispatcherSettings
  readonly context: DispatcherContext
  readonly operations: ReadonlyArray<string>
  readonly supports: (operation: string) => boolean
  readonly dispatch: (
    operation: string,
    ...operands: ReadonlyArray<unknown>
  ) => Effect.Effect<DispatchValue | DeferSignal, DispatchError>
  /**
   * Wrap a payload in a unit. Quantities are converted; values of an upcast
   * wrapper type are refused since they must wrap the quantity instead.
   */
  readonly quantity: (
    magnitude: unknown,
    unit: UnitInput,
  ) => Effect.Effect<Quantity, UnitNotFoundError | IncompatibleDimensions | UnsupportedPayload>
}

/**
 * @category Constructors
 * @since 0.1.0
 */
export interface DispatcherOptions {
  readonly registry?: UnitRegistry
  readonly backend?: Backend
  readonly operations?: OperationTable
  readonly ranking?: PrecedenceRanking
  readonly settings?: DispatcherSettings
}

/**
 * Build a dispatcher. Fails when the angle unit, or a unit the operation
 * table names, is missing from the registry.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const makeDispatcher = (
  options: DispatcherOptions = {},
): Effect.Effect<UnitDispatcherService, UnitNotFoundError> =>
  Effect.gen(function* () {
    const registry = options.registry ?? defaultRegistry
    const backend = options.backend ?? ArrayBackend
    const table = options.operations ?? defaultOperationTable
    const ranking = options.ranking ?? emptyRanking
    const settings = options.settings ?? defaultSettings
    const adapter = makeRegistryAdapter(registry, backend)

    const angleUnit = yield* adapter.resolve(settings.angleUnit)
    for (const spec of table.entries.values()) {
      for (const role of spec.arguments) {
        if (role._tag === "Convert") {
          yield* adapter.resolve(role.unit)
        }
      }
      for (const rule of spec.outputs) {
        if (rule._tag === "Fixed") {
          yield* adapter.resolve(rule.unit)
        }
      }
    }

    const context: DispatcherContext = { adapter, backend, table, ranking, settings, angleUnit }
    yield* Effect.logDebug("dispatcher ready").pipe(
      Effect.annotateLogs({ backend: backend.name, operations: table.names.length }),
    )

    const service: UnitDispatcherService = {
      registry,
      settings,
      context,
      operations: table.names,
      supports: (operation) => Option.isSome(table.lookup(operation)),
      dispatch: (operation, ...operands) => dispatch(context, operation, operands),
      quantity: (magnitude, unit) => {
        if (magnitude instanceof Quantity) {
          return magnitude.convertTo(unit)
        }
        const wrapper = ranking.classify(magnitude)
        if (wrapper !== undefined && ranking.isUpcast(wrapper.name)) {
          return Effect.fail(
            new UnsupportedPayload({ payload: wrapper.name, capability: "wrapping inside a quantity" }),
          )
        }
        return makeQuantity(context, magnitude, unit)
      },
    }
    return service
  })

/**
 * Context tag for the dispatcher service.
 *
 * @category Services
 * @since 0.1.0
 */
export class UnitDispatcher extends Context.Tag("quantity-dispatch/UnitDispatcher")<
  UnitDispatcher,
  UnitDispatcherService
>() {
  /**
   * Default registry, array backend, full operation table.
   *
   * @category Layers
   * @since 0.1.0
   */
  static readonly Default = Layer.effect(this, makeDispatcher())

  /**
   * @category Layers
   * @since 0.1.0
   */
  static layer(options: DispatcherOptions = {}): Layer.Layer<UnitDispatcher, UnitNotFoundError> {
    return Layer.effect(this, makeDispatcher(options))
  }

  /**
   * Like `layer`, with settings read from `UNIT_DISPATCH_*` configuration.
   *
   * @example
   * ```ts
   * const program = Effect.gen(function* () {
   *   const dispatcher = yield* UnitDispatcher
   *   return dispatcher.settings.angleUnit
   * }).pipe(Effect.provide(UnitDispatcher.layerConfig()))
   * ```
   *
   * @category Layers
   * @since 0.1.0
   */
  static layerConfig(
    options: Omit<DispatcherOptions, "settings"> = {},
  ): Layer.Layer<UnitDispatcher, UnitNotFoundError | ConfigError.ConfigError> {
    return Layer.effect(
      this,
      Effect.gen(function* () {
        const settings = yield* DispatcherSettingsConfig
        return yield* makeDispatcher({ ...options, settings })
      }),
    )
  }
}
