/**
 * Type Precedence Arbiter.
 *
 * Wrapper types (masked, sparse, lazy, labeled arrays, …) declare where they
 * sit relative to each other instead of extending a fixed class hierarchy. The
 * declarations form a directed acyclic graph whose edges read "outranks"; any
 * type that outranks `Quantity` is an upcast type, and an operation touching
 * one is deferred as a whole.
 *
 * @since 0.1.0
 */

import { Data, Effect, Schema, type ParseResult } from "effect"
import { DuplicateRegistrationError, PrecedenceCycleError, UnknownWrapperError } from "./Errors.js"
import { Quantity } from "./Quantity.js"
import { WrapperName } from "./Types.js"

/**
 * Name of the node the dispatcher itself occupies in the ranking.
 *
 * @since 0.1.0
 */
export const QUANTITY_WRAPPER = Schema.decodeSync(WrapperName)("Quantity")

/**
 * @category Models
 * @since 0.1.0
 */
export interface WrapperDeclaration {
  readonly name: string
  /**
   * Tie-breaker between wrappers the edges leave incomparable; higher wins.
   */
  readonly rank?: number
  readonly is: (value: unknown) => boolean
  /**
   * Wrappers this one outranks.
   */
  readonly outranks?: ReadonlyArray<string>
  /**
   * Wrappers that outrank this one.
   */
  readonly outrankedBy?: ReadonlyArray<string>
}

/**
 * @category Models
 * @since 0.1.0
 */
export interface WrapperType {
  readonly name: WrapperName
  readonly rank: number
  readonly is: (value: unknown) => boolean
}

/**
 * Immutable ranking. `above` maps each wrapper to the wrappers directly
 * outranking it.
 *
 * @category Models
 * @since 0.1.0
 */
export class PrecedenceRanking {
  private readonly upcast: ReadonlySet<string>

  constructor(
    readonly wrappers: ReadonlyMap<string, WrapperType>,
    readonly above: ReadonlyMap<string, ReadonlySet<string>>,
  ) {
    this.upcast = new Set(this.ancestors(QUANTITY_WRAPPER))
  }

  /**
   * Every wrapper reachable through "outranked by" edges from `name`.
   */
  ancestors(name: string): ReadonlyArray<string> {
    const seen = new Set<string>()
    const pending = [...(this.above.get(name) ?? [])]
    while (pending.length > 0) {
      const next = pending.pop()
      if (next === undefined || seen.has(next)) {
        continue
      }
      seen.add(next)
      pending.push(...(this.above.get(next) ?? []))
    }
    return [...seen]
  }

  outranks(higher: string, lower: string): boolean {
    return this.ancestors(lower).includes(higher)
  }

  get upcastTypes(): ReadonlyArray<string> {
    return [...this.upcast]
  }

  isUpcast(name: string): boolean {
    return this.upcast.has(name)
  }

  /**
   * The declared wrapper a value belongs to; highest rank wins when several
   * guards match.
   */
  classify(value: unknown): WrapperType | undefined {
    let match: WrapperType | undefined
    for (const wrapper of this.wrappers.values()) {
      if (wrapper.is(value) && (match === undefined || wrapper.rank > match.rank)) {
        match = wrapper
      }
    }
    return match
  }

  /**
   * Pick the wrapper that owns an operation among the given ones: a maximal
   * element of the partial order, ties broken by rank then first appearance.
   */
  owner(candidates: ReadonlyArray<WrapperType>): WrapperType | undefined {
    const maximal = candidates.filter(
      (candidate) => !candidates.some((other) => other.name !== candidate.name && this.outranks(other.name, candidate.name)),
    )
    return maximal.reduce<WrapperType | undefined>(
      (best, candidate) => (best === undefined || candidate.rank > best.rank ? candidate : best),
      undefined,
    )
  }
}

/**
 * Ranking containing only `Quantity`.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const emptyRanking: PrecedenceRanking = new PrecedenceRanking(
  new Map<string, WrapperType>([
    [QUANTITY_WRAPPER, { name: QUANTITY_WRAPPER, rank: 0, is: (value) => value instanceof Quantity }],
  ]),
  new Map(),
)

const findCycle = (above: ReadonlyMap<string, ReadonlySet<string>>, start: string): ReadonlyArray<string> | undefined => {
  const path: Array<string> = []
  const onPath = new Set<string>()
  const done = new Set<string>()
  const visit = (node: string): ReadonlyArray<string> | undefined => {
    if (onPath.has(node)) {
      return [...path.slice(path.indexOf(node)), node]
    }
    if (done.has(node)) {
      return undefined
    }
    path.push(node)
    onPath.add(node)
    for (const next of above.get(node) ?? []) {
      const cycle = visit(next)
      if (cycle) {
        return cycle
      }
    }
    path.pop()
    onPath.delete(node)
    done.add(node)
    return undefined
  }
  return visit(start)
}

/**
 * Append a wrapper declaration. Edges may only reference wrappers that are
 * already declared, and the result must stay acyclic.
 *
 * @category Configuration
 * @since 0.1.0
 */
export const declareWrapper = (
  ranking: PrecedenceRanking,
  declaration: WrapperDeclaration,
): Effect.Effect<
  PrecedenceRanking,
  DuplicateRegistrationError | UnknownWrapperError | PrecedenceCycleError | ParseResult.ParseError
> =>
  Effect.gen(function* () {
    const name = yield* Schema.decodeUnknown(WrapperName)(declaration.name)
    if (ranking.wrappers.has(name)) {
      return yield* Effect.fail(new DuplicateRegistrationError({ kind: "wrapper", name }))
    }
    const outranks = declaration.outranks ?? []
    const outrankedBy = declaration.outrankedBy ?? []
    for (const other of [...outranks, ...outrankedBy]) {
      if (!ranking.wrappers.has(other) && other !== name) {
        return yield* Effect.fail(new UnknownWrapperError({ name: other, referencedBy: name }))
      }
    }

    const above = new Map<string, Set<string>>()
    for (const [key, value] of ranking.above) {
      above.set(key, new Set(value))
    }
    const edgesOf = (key: string): Set<string> => {
      const existing = above.get(key)
      if (existing) {
        return existing
      }
      const created = new Set<string>()
      above.set(key, created)
      return created
    }
    for (const lower of outranks) {
      edgesOf(lower).add(name)
    }
    for (const higher of outrankedBy) {
      edgesOf(name).add(higher)
    }

    const cycle = findCycle(above, name)
    if (cycle) {
      return yield* Effect.fail(new PrecedenceCycleError({ cycle }))
    }

    const wrappers = new Map(ranking.wrappers)
    wrappers.set(name, { name, rank: declaration.rank ?? 0, is: declaration.is })
    return new PrecedenceRanking(wrappers, above)
  })

/**
 * Three-way normalisation of one operand.
 *
 * @category Models
 * @since 0.1.0
 */
export type Operand = Data.TaggedEnum<{
  Wrapped: { readonly quantity: Quantity }
  Upcast: { readonly value: unknown; readonly wrapper: WrapperType }
  Bare: { readonly value: unknown }
}>

/**
 * @category Models
 * @since 0.1.0
 */
export const Operand = Data.taggedEnum<Operand>()

/**
 * @category Models
 * @since 0.1.0
 */
export type Verdict = Data.TaggedEnum<{
  Handle: { readonly operands: ReadonlyArray<Operand> }
  Defer: { readonly owner: WrapperType | undefined }
}>

/**
 * @category Models
 * @since 0.1.0
 */
export const Verdict = Data.taggedEnum<Verdict>()

/**
 * @category Arbitration
 * @since 0.1.0
 */
export const normalizeOperand = (ranking: PrecedenceRanking, value: unknown): Operand => {
  if (value instanceof Quantity) {
    return Operand.Wrapped({ quantity: value })
  }
  const wrapper = ranking.classify(value)
  if (wrapper && ranking.isUpcast(wrapper.name)) {
    return Operand.Upcast({ value, wrapper })
  }
  return Operand.Bare({ value })
}

/**
 * Decide whether the dispatcher handles an operation. Sequence operands (JS
 * arrays) are inspected one level deep so a stacked upcast value still defers.
 *
 * @category Arbitration
 * @since 0.1.0
 */
export const arbitrate = (ranking: PrecedenceRanking, values: ReadonlyArray<unknown>): Verdict => {
  const operands = values.map((value) => normalizeOperand(ranking, value))
  const participants = operands.flatMap((operand) =>
    operand._tag === "Bare" && Array.isArray(operand.value)
      ? operand.value.map((item: unknown) => normalizeOperand(ranking, item))
      : [operand],
  )
  const upcasts = participants.flatMap((operand) => (operand._tag === "Upcast" ? [operand.wrapper] : []))
  if (upcasts.length > 0) {
    return Verdict.Defer({ owner: ranking.owner(upcasts) })
  }
  if (!participants.some((operand) => operand._tag === "Wrapped")) {
    return Verdict.Defer({ owner: undefined })
  }
  return Verdict.Handle({ operands })
}
