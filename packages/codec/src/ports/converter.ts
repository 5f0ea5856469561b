import type { TypeDescriptor, TypeHint } from "./type-hint"

/**
 * Encoded form of one value. Characters are limited to code points 0–255.
 * A converter may return a promise when encoding needs async work.
 */
export type Fragment = string | PromiseLike<string>

/**
 * Result of consuming one value from the front of an encoded string: the
 * unconsumed remainder and the decoded value.
 */
export type Decoded<T> = readonly [remainder: string, value: T | PromiseLike<T>]

/**
 * Converts values of one type to and from a self-delimiting string.
 *
 * Converters are created per resolution and bound to the resolved type, which
 * may be a subtype of the type they were registered for.
 *
 * @example
 * ```ts
 * const YesNo = defineType("YesNo")
 *
 * class YesNoConverter extends BaseConverter<boolean> {
 *   toStr(value: boolean): Fragment {
 *     return value ? "y" : "n"
 *   }
 *
 *   fromStr(encoded: string): Decoded<boolean> {
 *     return [encoded.slice(1), encoded.startsWith("y")]
 *   }
 * }
 *
 * registry.register(YesNo, YesNoConverter)
 * ```
 */
export interface Converter<T> {
  readonly type: TypeDescriptor

  toStr(value: T): Fragment

  fromStr(encoded: string): Decoded<T>
}

export interface ConverterResolver {
  resolve(hint: TypeHint): Converter<unknown>
}

export type ConverterClass<T = unknown> = new (
  type: TypeDescriptor,
  resolver: ConverterResolver,
) => Converter<T>
