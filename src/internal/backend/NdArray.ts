import { Option } from "effect"

export type DType = "float64" | "int32" | "bool"

export type Storage = Float64Array | Int32Array | Uint8Array

const sizeOf = (shape: ReadonlyArray<number>): number => shape.reduce((total, extent) => total * extent, 1)

const allocate = (dtype: DType, size: number): Storage => {
  switch (dtype) {
    case "float64":
      return new Float64Array(size)
    case "int32":
      return new Int32Array(size)
    case "bool":
      return new Uint8Array(size)
  }
}

/**
 * Dense, row-major n-dimensional array. Booleans are stored as 0/1 bytes.
 */
export class NdArray {
  readonly size: number

  constructor(
    readonly data: Storage,
    readonly shape: ReadonlyArray<number>,
    readonly dtype: DType,
  ) {
    this.size = sizeOf(shape)
    if (shape.some((extent) => !Number.isInteger(extent) || extent < 0)) {
      throw new Error(`invalid shape [${shape.join(", ")}]`)
    }
    if (data.length !== this.size) {
      throw new Error(`storage of length ${data.length} does not match shape [${shape.join(", ")}]`)
    }
  }

  get ndim(): number {
    return this.shape.length
  }

  static zeros(shape: ReadonlyArray<number>, dtype: DType = "float64"): NdArray {
    return new NdArray(allocate(dtype, sizeOf(shape)), [...shape], dtype)
  }

  static fromValues(
    values: ReadonlyArray<number>,
    shape: ReadonlyArray<number> = [values.length],
    dtype: DType = "float64",
  ): NdArray {
    const out = NdArray.zeros(shape, dtype)
    values.forEach((value, index) => {
      out.data[index] = value
    })
    return out
  }

  static fromBooleans(values: ReadonlyArray<boolean>, shape: ReadonlyArray<number> = [values.length]): NdArray {
    return NdArray.fromValues(values.map((value) => (value ? 1 : 0)), shape, "bool")
  }

  /**
   * Build an array from nested JS arrays of numbers or booleans. Ragged input
   * and non-numeric leaves yield `None`.
   */
  static fromNested(value: unknown): Option.Option<NdArray> {
    if (!Array.isArray(value)) {
      return Option.none()
    }
    const shape: Array<number> = []
    let probe: unknown = value
    while (Array.isArray(probe)) {
      shape.push(probe.length)
      probe = probe[0]
    }
    const leaves: Array<number> = []
    let sawNumber = false
    let sawBoolean = false
    const walk = (node: unknown, depth: number): boolean => {
      if (depth === shape.length) {
        if (typeof node === "number") {
          sawNumber = true
          leaves.push(node)
          return true
        }
        if (typeof node === "boolean") {
          sawBoolean = true
          leaves.push(node ? 1 : 0)
          return true
        }
        return false
      }
      if (!Array.isArray(node) || node.length !== shape[depth]) {
        return false
      }
      return node.every((child: unknown) => walk(child, depth + 1))
    }
    if (!walk(value, 0) || (sawNumber && sawBoolean)) {
      return Option.none()
    }
    return Option.some(NdArray.fromValues(leaves, shape, sawBoolean ? "bool" : "float64"))
  }

  get(index: number): number {
    return this.data[index] ?? Number.NaN
  }

  toFlat(): Array<number> {
    return Array.from(this.data)
  }

  /**
   * Nested JS arrays mirroring the shape; `bool` arrays yield booleans.
   */
  toNested(): unknown {
    const leaf = (index: number): number | boolean =>
      this.dtype === "bool" ? this.get(index) !== 0 : this.get(index)
    if (this.ndim === 0) {
      return leaf(0)
    }
    const build = (depth: number, offset: number): unknown => {
      const extent = this.shape[depth] ?? 0
      const stride = sizeOf(this.shape.slice(depth + 1))
      const items: Array<unknown> = []
      for (let i = 0; i < extent; i += 1) {
        items.push(depth === this.ndim - 1 ? leaf(offset + i) : build(depth + 1, offset + i * stride))
      }
      return items
    }
    return build(0, 0)
  }

  /**
   * Same values in fresh storage under a new shape of equal size.
   */
  reshape(shape: ReadonlyArray<number>): NdArray {
    const data = allocate(this.dtype, this.size)
    data.set(this.data)
    return new NdArray(data, [...shape], this.dtype)
  }

  copy(): NdArray {
    return this.reshape(this.shape)
  }

  toString(): string {
    return JSON.stringify(this.toNested())
  }
}

export const shapeSize = sizeOf
