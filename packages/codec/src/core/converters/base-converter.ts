import type { Converter, ConverterResolver, Decoded, Fragment } from "../../ports/converter"
import type { TypeDescriptor } from "../../ports/type-hint"

/**
 * Base for converter classes registered with a `ConverterRegistry`.
 *
 * `type` is the resolved type, which differs from the registered one when a
 * subclass-capable converter handles a derived type. `resolver` gives access
 * to other converters for delegation.
 */
export abstract class BaseConverter<T> implements Converter<T> {
  constructor(
    readonly type: TypeDescriptor,
    protected readonly resolver: ConverterResolver,
  ) {}

  abstract toStr(value: T): Fragment

  abstract fromStr(encoded: string): Decoded<T>
}
