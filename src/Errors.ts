/**
 * Dispatch error hierarchy.
 *
 * Every failure the dispatcher can surface is a tagged error so callers can
 * pattern match with `Effect.catchTag`. Each carries the structured data needed
 * to diagnose it (operation, argument position, units and signatures) and a
 * readable message built from that data.
 *
 * @since 0.1.0
 */

import { Data } from "effect"
import {
  formatDimension,
  formatUnits,
  type DimensionMap,
  type UnitMap,
} from "./internal/UnitMap.js"

const describeSite = (operation: string | undefined, argument: number | undefined): string => {
  if (operation === undefined) {
    return argument === undefined ? "" : `argument ${argument}: `
  }
  return argument === undefined ? `${operation}: ` : `${operation} (argument ${argument}): `
}

/**
 * Raised whenever a required conversion or signature check fails.
 *
 * @category Errors
 * @since 0.1.0
 * @example
 * ```ts
 * const error = new IncompatibleDimensions({
 *   operation: "add",
 *   argument: 1,
 *   from: { s: 1 },
 *   to: { m: 1 },
 *   fromDimension: { time: 1 },
 *   toDimension: { length: 1 },
 * })
 * ```
 */
export class IncompatibleDimensions extends Data.TaggedError("IncompatibleDimensions")<{
  readonly operation?: string
  readonly argument?: number
  readonly from: UnitMap
  readonly to: UnitMap
  readonly fromDimension: DimensionMap
  readonly toDimension: DimensionMap
  readonly reason?: string
}> {
  override get message(): string {
    const detail = this.reason === undefined ? "" : `: ${this.reason}`
    return (
      `${describeSite(this.operation, this.argument)}cannot convert from ` +
      `'${formatUnits(this.from)}' (${formatDimension(this.fromDimension)}) to ` +
      `'${formatUnits(this.to)}' (${formatDimension(this.toDimension)})${detail}`
    )
  }
}

/**
 * Raised when an operation name has no entry in the specification table.
 *
 * @category Errors
 * @since 0.1.0
 */
export class UnsupportedOperation extends Data.TaggedError("UnsupportedOperation")<{
  readonly operation: string
}> {
  override get message(): string {
    return `Operation "${this.operation}" is not supported for quantities`
  }
}

/**
 * Raised when a magnitude payload lacks a capability the operation needs.
 *
 * @category Errors
 * @since 0.1.0
 */
export class UnsupportedPayload extends Data.TaggedError("UnsupportedPayload")<{
  readonly operation?: string
  readonly argument?: number
  readonly payload: string
  readonly capability: string
}> {
  override get message(): string {
    return `${describeSite(this.operation, this.argument)}payload ${this.payload} does not support ${this.capability}`
  }
}

/**
 * Raised when an operation receives fewer or more arguments than its
 * specification declares.
 *
 * @category Errors
 * @since 0.1.0
 */
export class ArityMismatch extends Data.TaggedError("ArityMismatch")<{
  readonly operation: string
  readonly minimum: number
  readonly maximum: number
  readonly received: number
}> {
  override get message(): string {
    const expected =
      this.minimum === this.maximum ? `${this.minimum}` : `${this.minimum} to ${this.maximum}`
    return `${this.operation} expects ${expected} arguments but received ${this.received}`
  }
}

/**
 * Raised when the backend kernel itself rejects its (already converted) input.
 *
 * @category Errors
 * @since 0.1.0
 */
export class BackendError extends Data.TaggedError("BackendError")<{
  readonly operation: string
  readonly backend: string
  readonly reason: string
}> {
  override get message(): string {
    return `${this.operation} failed in backend "${this.backend}": ${this.reason}`
  }
}

/**
 * Raised at configuration time when a wrapper declaration would make the
 * precedence ranking cyclic.
 *
 * @category Configuration
 * @since 0.1.0
 */
export class PrecedenceCycleError extends Data.TaggedError("PrecedenceCycleError")<{
  readonly cycle: ReadonlyArray<string>
}> {
  override get message(): string {
    return `Wrapper precedence forms a cycle: ${this.cycle.join(" -> ")}`
  }
}

/**
 * Raised when a wrapper declaration references a wrapper that was never declared.
 *
 * @category Configuration
 * @since 0.1.0
 */
export class UnknownWrapperError extends Data.TaggedError("UnknownWrapperError")<{
  readonly name: string
  readonly referencedBy: string
}> {
  override get message(): string {
    return `Wrapper "${this.referencedBy}" references undeclared wrapper "${this.name}"`
  }
}

/**
 * Raised when configuration tries to register a name twice. Configuration is
 * append-only.
 *
 * @category Configuration
 * @since 0.1.0
 */
export class DuplicateRegistrationError extends Data.TaggedError("DuplicateRegistrationError")<{
  readonly kind: "operation" | "wrapper" | "unit"
  readonly name: string
}> {
  override get message(): string {
    const article = this.kind === "operation" ? "An" : "A"
    return `${article} ${this.kind} named "${this.name}" is already registered`
  }
}

/**
 * Raised when an operation specification is internally inconsistent.
 *
 * @category Configuration
 * @since 0.1.0
 */
export class InvalidSpecificationError extends Data.TaggedError("InvalidSpecificationError")<{
  readonly operation: string
  readonly problem: string
}> {
  override get message(): string {
    return `Invalid specification for "${this.operation}": ${this.problem}`
  }
}
