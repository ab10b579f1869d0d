/**
 * Dispatcher settings and their `Config` source.
 *
 * @since 0.1.0
 */

import { Config, Schema } from "effect"

/**
 * @category Configuration
 * @since 0.1.0
 */
export class DispatcherSettings extends Schema.Class<DispatcherSettings>("DispatcherSettings")({
  /**
   * Registry symbol of the radian-equivalent unit that trigonometric kernels
   * compute in.
   */
  angleUnit: Schema.NonEmptyTrimmedString,
  /**
   * Accept a bare operand made only of zeros and NaNs wherever a unit-matched
   * operand is expected.
   */
  zeroOrNanCompatible: Schema.Boolean,
}) {}

/**
 * @category Configuration
 * @since 0.1.0
 */
export const defaultSettings: DispatcherSettings = new DispatcherSettings({
  angleUnit: "radian",
  zeroOrNanCompatible: true,
})

/**
 * Reads `UNIT_DISPATCH_ANGLE_UNIT` and `UNIT_DISPATCH_ZERO_OR_NAN_COMPATIBLE`
 * (with the environment provider's delimiter).
 *
 * @category Configuration
 * @since 0.1.0
 */
export const DispatcherSettingsConfig: Config.Config<DispatcherSettings> = Config.all({
  angleUnit: Config.string("ANGLE_UNIT").pipe(
    Config.map((symbol) => symbol.trim()),
    Config.validate({ message: "Expected a non-empty unit symbol", validation: (symbol) => symbol.length > 0 }),
    Config.withDefault(defaultSettings.angleUnit),
  ),
  zeroOrNanCompatible: Config.boolean("ZERO_OR_NAN_COMPATIBLE").pipe(
    Config.withDefault(defaultSettings.zeroOrNanCompatible),
  ),
}).pipe(
  Config.nested("UNIT_DISPATCH"),
  Config.map((fields) => new DispatcherSettings(fields)),
)
