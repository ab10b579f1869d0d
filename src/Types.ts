/**
 * Branded Names
 *
 * Operation and wrapper names are plain strings at the call site but branded
 * once they enter configuration, so a wrapper name cannot be used where an
 * operation name is expected.
 *
 * @since 0.1.0
 */

import { Schema } from "effect"

/**
 * Branded identifier for an entry of the operation specification table
 *
 * @since 0.1.0
 * @category Names
 */
export const OperationName = Schema.NonEmptyTrimmedString.pipe(Schema.brand("OperationName"))

/**
 * Type extracted from OperationName schema
 *
 * @since 0.1.0
 * @category Names
 */
export type OperationName = typeof OperationName.Type

/**
 * Branded identifier for a wrapper type in the precedence ranking
 *
 * @since 0.1.0
 * @category Names
 */
export const WrapperName = Schema.NonEmptyTrimmedString.pipe(Schema.brand("WrapperName"))

/**
 * Type extracted from WrapperName schema
 *
 * @since 0.1.0
 * @category Names
 */
export type WrapperName = typeof WrapperName.Type
