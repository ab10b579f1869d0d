import { ArgumentRole, OutputRule, type OperationDefinition } from "../../Operations.js"

const Primary = ArgumentRole.Primary()
const Matched = ArgumentRole.Matched()
const UnitFree = ArgumentRole.UnitFree()
const Carried = ArgumentRole.Carried()
const Dimensionless = ArgumentRole.Dimensionless()
const Angle = ArgumentRole.Angle()

const same = OutputRule.SameAsPrimary()
const ratio = OutputRule.Dimensionless()
const bare = OutputRule.Bare()

const ufunc = (
  name: string,
  args: ReadonlyArray<ArgumentRole>,
  outputs: ReadonlyArray<OutputRule>,
  kernel?: string,
): OperationDefinition => ({ name, kind: "elementwise", kernel: kernel ?? name, arguments: args, outputs })

const each = (
  names: ReadonlyArray<string>,
  args: ReadonlyArray<ArgumentRole>,
  outputs: ReadonlyArray<OutputRule>,
): Array<OperationDefinition> => names.map((name) => ufunc(name, args, outputs))

export const elementwiseOperations: ReadonlyArray<OperationDefinition> = [
  // unit passes through unchanged
  ...each(["negative", "positive", "absolute", "fabs", "rint", "floor", "ceil", "trunc"], [Primary], [same]),
  ...each(
    ["add", "subtract", "maximum", "minimum", "fmax", "fmin", "hypot", "remainder", "fmod", "copysign"],
    [Primary, Matched],
    [same],
  ),
  ufunc("floor_divide", [Primary, Matched], [ratio]),

  ...each(["equal", "not_equal", "less", "less_equal", "greater", "greater_equal"], [Primary, Matched], [bare]),
  ...each(["isnan", "isinf", "isfinite", "signbit", "sign"], [UnitFree], [bare]),

  // derived units
  ufunc("multiply", [Carried, Carried], [OutputRule.Product({ exponents: [1, 1] })]),
  ufunc("divide", [Carried, Carried], [OutputRule.Product({ exponents: [1, -1] })]),
  ufunc("true_divide", [Carried, Carried], [OutputRule.Product({ exponents: [1, -1] })], "divide"),
  ufunc("reciprocal", [Carried], [OutputRule.Power({ exponent: -1 })]),
  ufunc("sqrt", [Carried], [OutputRule.Power({ exponent: 0.5 })]),
  ufunc("cbrt", [Carried], [OutputRule.Power({ exponent: 1 / 3 })]),
  ufunc("square", [Carried], [OutputRule.Power({ exponent: 2 })]),
  ufunc("power", [Carried, Dimensionless], [OutputRule.PowerOf({ argument: 1 })]),

  ...each(["exp", "exp2", "expm1", "log", "log2", "log10", "log1p"], [Dimensionless], [ratio]),

  ...each(["sin", "cos", "tan", "sinh", "cosh", "tanh"], [Angle], [ratio]),
  ...each(["arcsin", "arccos", "arctan", "arcsinh", "arccosh", "arctanh"], [Dimensionless], [OutputRule.Angle()]),
  ufunc("arctan2", [Primary, Matched], [OutputRule.Angle()]),
  ufunc("deg2rad", [ArgumentRole.Convert({ unit: { degree: 1 } })], [OutputRule.Angle()]),
  ufunc("radians", [ArgumentRole.Convert({ unit: { degree: 1 } })], [OutputRule.Angle()], "deg2rad"),
  ufunc("rad2deg", [Angle], [OutputRule.Fixed({ unit: { degree: 1 } })]),
  ufunc("degrees", [Angle], [OutputRule.Fixed({ unit: { degree: 1 } })], "rad2deg"),

  // several outputs, each wrapped by its own rule
  ufunc("divmod", [Primary, Matched], [ratio, same]),
  ufunc("modf", [Primary], [same, same]),
  ufunc("frexp", [Primary], [same, bare]),
]
