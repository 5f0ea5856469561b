import { ConverterRegistry, type ConverterRegistryOptions } from "../registry/converter-registry"
import { Types } from "../types"
import { BoolConverter } from "./bool-converter"
import { EnumConverter } from "./enum-converter"
import { FloatConverter } from "./float-converter"
import { IntConverter } from "./int-converter"
import { StringConverter } from "./string-converter"

/**
 * Registers the built-in converters. Registration order matters for subclass
 * fallback: the first matching subclass-capable entry wins.
 */
export function registerDefaultConverters(registry: ConverterRegistry): ConverterRegistry {
  registry.register(Types.Float, FloatConverter, { supportsSubclass: true })
  registry.register(Types.Int, IntConverter, { supportsSubclass: true })
  registry.register(Types.String, StringConverter, { supportsSubclass: true })
  registry.register(Types.Literal, StringConverter)
  registry.register(Types.Enum, EnumConverter, { supportsSubclass: true })
  registry.register(Types.Bool, BoolConverter)

  return registry
}

export function createDefaultRegistry(options?: ConverterRegistryOptions): ConverterRegistry {
  return registerDefaultConverters(new ConverterRegistry(options))
}
