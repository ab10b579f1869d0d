import { ArgumentRole, OutputRule, type OperationDefinition } from "../../Operations.js"

const Primary = ArgumentRole.Primary()
const Matched = ArgumentRole.Matched()
const UnitFree = ArgumentRole.UnitFree()
const Carried = ArgumentRole.Carried()
const Sequence = ArgumentRole.Sequence()

const same = OutputRule.SameAsPrimary()
const bare = OutputRule.Bare()

const fn = (
  name: string,
  args: ReadonlyArray<ArgumentRole>,
  required: number,
  outputs: ReadonlyArray<OutputRule>,
  kernel: string = name,
): OperationDefinition => ({ name, kind: "function", kernel, arguments: args, required, outputs })

export const functionOperations: ReadonlyArray<OperationDefinition> = [
  // reductions: (a, axis?)
  ...["sum", "mean", "median", "amax", "amin", "ptp", "cumsum", "sort", "diff"].map((name) =>
    fn(name, [Primary, UnitFree], 1, [same]),
  ),
  fn("max", [Primary, UnitFree], 1, [same], "amax"),
  fn("min", [Primary, UnitFree], 1, [same], "amin"),
  fn("std", [Primary, UnitFree, UnitFree], 1, [same]),
  fn("var", [Primary, UnitFree, UnitFree], 1, [OutputRule.Power({ exponent: 2 })]),
  fn("norm", [Primary], 1, [same]),
  fn("round", [Primary, UnitFree], 1, [same]),
  fn("around", [Primary, UnitFree], 1, [same], "round"),
  fn("argmax", [UnitFree, UnitFree], 1, [bare]),
  fn("argmin", [UnitFree, UnitFree], 1, [bare]),

  // shape manipulation
  fn("reshape", [Primary, UnitFree], 2, [same]),
  fn("transpose", [Primary, UnitFree], 1, [same]),
  fn("ravel", [Primary], 1, [same]),
  fn("squeeze", [Primary], 1, [same]),
  fn("expand_dims", [Primary, UnitFree], 2, [same]),
  fn("concatenate", [Sequence, UnitFree], 1, [same]),
  fn("stack", [Sequence, UnitFree], 1, [same]),

  // selection
  fn("where", [UnitFree, Primary, Matched], 3, [same]),
  fn("clip", [Primary, Matched, Matched], 1, [same]),

  // linear algebra
  fn("dot", [Carried, Carried], 2, [OutputRule.Product({ exponents: [1, 1] })]),
  fn("matmul", [Carried, Carried], 2, [OutputRule.Product({ exponents: [1, 1] })]),

  // tolerance predicates: (a, b, rtol?, atol?)
  fn("isclose", [Primary, Matched, UnitFree, UnitFree], 2, [bare]),
  fn("allclose", [Primary, Matched, UnitFree, UnitFree], 2, [bare]),
]
