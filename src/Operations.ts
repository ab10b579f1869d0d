/**
 * Operation Specification Table.
 *
 * Each supported operation has exactly one entry describing how every
 * argument is unit-checked and how the output unit is derived. Lookup is by
 * exact name; an operation without an entry is unsupported, and adding support
 * means registering an entry.
 *
 * @since 0.1.0
 */

import { Data, Effect, Either, Option, Schema } from "effect"
import { DuplicateRegistrationError, InvalidSpecificationError, UnsupportedOperation } from "./Errors.js"
import { OperationName } from "./Types.js"
import type { UnitMap } from "./internal/UnitMap.js"

/**
 * How one argument is treated before the backend sees it.
 *
 * - `Primary` defines the reference unit of the call.
 * - `Matched` is converted to the reference unit.
 * - `UnitFree` passes its bare value through; units are dropped on purpose.
 * - `Carried` keeps its own unit and feeds multiplicative output rules.
 * - `Dimensionless` must have a zero signature and is rescaled to a pure number.
 * - `Angle` must be an angle (or dimensionless) and is converted to the angle unit.
 * - `Convert` is converted to one fixed unit.
 * - `Sequence` is a list whose elements all share the first element's unit.
 *
 * @category Models
 * @since 0.1.0
 */
export type ArgumentRole = Data.TaggedEnum<{
  Primary: {}
  Matched: {}
  UnitFree: {}
  Carried: {}
  Dimensionless: {}
  Angle: {}
  Convert: { readonly unit: UnitMap }
  Sequence: {}
}>

/**
 * @category Models
 * @since 0.1.0
 */
export const ArgumentRole = Data.taggedEnum<ArgumentRole>()

/**
 * How the unit of one output is derived.
 *
 * @category Models
 * @since 0.1.0
 */
export type OutputRule = Data.TaggedEnum<{
  SameAsPrimary: {}
  Dimensionless: {}
  /** No unit attached: predicates, comparisons, indices. */
  Bare: {}
  /** `Σ exponents[i] · unit(argument i)` */
  Product: { readonly exponents: ReadonlyArray<number> }
  /** `unit(argument 0) ^ exponent` */
  Power: { readonly exponent: number }
  /** `unit(argument 0) ^ value(argument)`; the value must be a scalar. */
  PowerOf: { readonly argument: number }
  /** The dispatcher's configured angle unit. */
  Angle: {}
  Fixed: { readonly unit: UnitMap }
}>

/**
 * @category Models
 * @since 0.1.0
 */
export const OutputRule = Data.taggedEnum<OutputRule>()

/**
 * @category Models
 * @since 0.1.0
 */
export type OperationKind = "elementwise" | "function"

/**
 * @category Models
 * @since 0.1.0
 */
export interface OperationSpec {
  readonly name: OperationName
  readonly kind: OperationKind
  readonly kernel: string
  readonly arguments: ReadonlyArray<ArgumentRole>
  /**
   * Leading arguments that must be present; the rest may be omitted.
   */
  readonly required: number
  readonly outputs: ReadonlyArray<OutputRule>
}

/**
 * Registration input. `kernel` defaults to the name and `required` to every
 * argument.
 *
 * @category Models
 * @since 0.1.0
 */
export interface OperationDefinition {
  readonly name: string
  readonly kind: OperationKind
  readonly kernel?: string
  readonly arguments: ReadonlyArray<ArgumentRole>
  readonly required?: number
  readonly outputs: ReadonlyArray<OutputRule>
}

/**
 * @category Models
 * @since 0.1.0
 */
export class OperationTable {
  constructor(readonly entries: ReadonlyMap<string, OperationSpec>) {}

  lookup(name: string): Option.Option<OperationSpec> {
    return Option.fromNullable(this.entries.get(name))
  }

  get names(): ReadonlyArray<string> {
    return [...this.entries.keys()]
  }
}

/**
 * @category Constructors
 * @since 0.1.0
 */
export const emptyTable: OperationTable = new OperationTable(new Map())

const countRoles = (roles: ReadonlyArray<ArgumentRole>, tag: ArgumentRole["_tag"]): number =>
  roles.filter((role) => role._tag === tag).length

const specProblem = (definition: OperationDefinition, required: number): string | undefined => {
  const roles = definition.arguments
  const primaries = countRoles(roles, "Primary")
  const sequences = countRoles(roles, "Sequence")
  if (required < 0 || required > roles.length || !Number.isInteger(required)) {
    return `required must be an integer between 0 and ${roles.length}`
  }
  if (definition.outputs.length === 0) {
    return "at least one output rule is needed"
  }
  if (primaries > 1 || sequences > 1 || primaries + sequences > 1) {
    return "only one Primary or Sequence argument is allowed"
  }
  if (countRoles(roles, "Matched") > 0 && primaries === 0) {
    return "Matched arguments need a Primary argument"
  }
  for (const output of definition.outputs) {
    switch (output._tag) {
      case "SameAsPrimary":
        if (primaries + sequences === 0) {
          return "SameAsPrimary needs a Primary or Sequence argument"
        }
        break
      case "Product":
        if (output.exponents.length === 0 || output.exponents.length > roles.length) {
          return `Product exponents must cover 1 to ${roles.length} arguments`
        }
        break
      case "Power":
        if (roles.length === 0) {
          return "Power needs an argument to raise"
        }
        break
      case "PowerOf":
        if (roles[output.argument]?._tag !== "Dimensionless" || output.argument === 0) {
          return "PowerOf must point at a Dimensionless argument after the base"
        }
        break
      default:
        break
    }
  }
  return undefined
}

/**
 * Append one operation. Duplicate names and inconsistent roles are
 * configuration errors.
 *
 * @category Configuration
 * @since 0.1.0
 */
export const registerOperation = (
  table: OperationTable,
  definition: OperationDefinition,
): Effect.Effect<OperationTable, DuplicateRegistrationError | InvalidSpecificationError> =>
  Effect.gen(function* () {
    const decoded = Schema.decodeUnknownEither(OperationName)(definition.name)
    if (Either.isLeft(decoded)) {
      return yield* Effect.fail(
        new InvalidSpecificationError({ operation: definition.name, problem: "name must be a non-empty string" }),
      )
    }
    const name = decoded.right
    if (table.entries.has(name)) {
      return yield* Effect.fail(new DuplicateRegistrationError({ kind: "operation", name }))
    }
    const required = definition.required ?? definition.arguments.length
    const problem = specProblem(definition, required)
    if (problem !== undefined) {
      return yield* Effect.fail(new InvalidSpecificationError({ operation: name, problem }))
    }
    const entries = new Map(table.entries)
    entries.set(name, {
      name,
      kind: definition.kind,
      kernel: definition.kernel ?? name,
      arguments: definition.arguments,
      required,
      outputs: definition.outputs,
    })
    return new OperationTable(entries)
  })

/**
 * @category Configuration
 * @since 0.1.0
 */
export const registerOperations = (
  table: OperationTable,
  definitions: ReadonlyArray<OperationDefinition>,
): Effect.Effect<OperationTable, DuplicateRegistrationError | InvalidSpecificationError> =>
  Effect.reduce(definitions, table, registerOperation)

/**
 * Exact-name lookup.
 *
 * @category Lookups
 * @since 0.1.0
 */
export const lookupOperation = (
  table: OperationTable,
  operation: string,
): Effect.Effect<OperationSpec, UnsupportedOperation> =>
  Option.match(table.lookup(operation), {
    onNone: () => Effect.fail(new UnsupportedOperation({ operation })),
    onSome: Effect.succeed,
  })
