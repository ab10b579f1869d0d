export type UnitMap = Readonly<Record<string, number>>

/**
 * Canonical representation of the dimension of a unit: keys are base dimension
 * names, values are exponents (e.g. `{ mass: 1 }`, `{ length: 1, time: -2 }`).
 */
export type DimensionMap = Readonly<Record<string, number>>

const EPSILON = 1e-12

export const normalizeExponents = (source: Readonly<Record<string, number>>): Record<string, number> => {
  const result: Record<string, number> = {}
  for (const key of Object.keys(source)) {
    const exponent = source[key] ?? 0
    if (Math.abs(exponent) > EPSILON) {
      result[key] = exponent
    }
  }
  return result
}

export const isEmpty = (map: Readonly<Record<string, number>>): boolean =>
  Object.keys(map).length === 0

/**
 * Weighted sum of exponent maps: `Σ weight_i · map_i`.
 */
export const combine = (
  terms: ReadonlyArray<readonly [map: Readonly<Record<string, number>>, weight: number]>,
): Record<string, number> => {
  const result: Record<string, number> = {}
  for (const [map, weight] of terms) {
    for (const key of Object.keys(map)) {
      result[key] = (result[key] ?? 0) + (map[key] ?? 0) * weight
    }
  }
  return normalizeExponents(result)
}

export const powUnits = (units: UnitMap, exponent: number): UnitMap => combine([[units, exponent]])

export const equalExponents = (
  left: Readonly<Record<string, number>>,
  right: Readonly<Record<string, number>>,
): boolean =>
  Object.keys(left).length === Object.keys(right).length &&
  Object.keys(left).every((key) => Math.abs((left[key] ?? 0) - (right[key] ?? 0)) <= EPSILON)

const formatExponent = (exponent: number): string =>
  Math.abs(exponent - 1) <= EPSILON ? "" : `^${Number(exponent.toPrecision(12))}`

export const formatUnits = (units: UnitMap): string =>
  isEmpty(units)
    ? "dimensionless"
    : Object.entries(units)
        .map(([symbol, exponent]) => `${symbol}${formatExponent(exponent)}`)
        .join(" * ")

export const formatDimension = (dimension: DimensionMap): string =>
  isEmpty(dimension)
    ? "dimensionless"
    : Object.entries(dimension)
        .sort(([a], [b]) => a.localeCompare(b))
        .map(([name, exponent]) => `[${name}]${formatExponent(exponent)}`)
        .join(" * ")
