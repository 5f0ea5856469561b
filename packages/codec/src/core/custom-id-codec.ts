import { createNullLogger, type Logger } from "@idpack/logger"
import type {
  ComponentLookup,
  DeserializedComponent,
  FieldValues,
  Schema,
} from "../ports/component"
import type { ConverterResolver } from "../ports/converter"
import type { TypeHint } from "../ports/type-hint"
import { ConversionError, SerializerError } from "./errors"
import { isPromiseLike } from "./is-promise-like"
import { Types } from "./types"

export const DEFAULT_MAX_LENGTH = 100

export type CustomIdCodecDeps = {
  registry: ConverterResolver
  logger?: Logger
}

export type CustomIdCodecOptions = {
  /** Longest identifier `serialize` may return. */
  maxLength?: number
}

/**
 * Packs component state into a custom id and back.
 *
 * A custom id is the encoded cookie followed by each schema field's encoding,
 * in schema order and without delimiters. Decoding relies on every converter
 * consuming exactly its own span.
 */
export class CustomIdCodec {
  readonly maxLength: number
  private readonly logger: Logger

  constructor(
    private readonly deps: CustomIdCodecDeps,
    opts: CustomIdCodecOptions = {},
  ) {
    this.maxLength = opts.maxLength ?? DEFAULT_MAX_LENGTH

    if (!Number.isSafeInteger(this.maxLength) || this.maxLength < 1) {
      throw new RangeError(`maxLength must be a positive integer, got ${this.maxLength}`)
    }

    this.logger = (deps.logger ?? createNullLogger()).child({ module: "custom-id-codec" })
  }

  /**
   * Encodes `cookie` and then every schema field of `values`.
   *
   * Fields whose converters return promises are awaited concurrently; the
   * output still follows schema order.
   *
   * @throws SerializerError `missing_field_value` when a schema field has no value
   * @throws SerializerError `custom_id_too_long` when the result exceeds `maxLength`
   */
  async serialize(cookie: string, schema: Schema, values: FieldValues): Promise<string> {
    const fragments = await Promise.all([
      this.encodeCookie(cookie),
      ...schema.map(([field, hint]) => this.encodeField(cookie, field, hint, values)),
    ])

    const customId = fragments.join("")

    if (customId.length > this.maxLength) {
      this.logger.warn("custom id too long", {
        cookie,
        length: customId.length,
        maxLength: this.maxLength,
      })

      throw SerializerError.tooLong(cookie, customId.length, this.maxLength)
    }

    this.logger.debug("custom id serialized", { cookie, length: customId.length })

    return customId
  }

  /**
   * Decodes the cookie, looks up its component and decodes the component's
   * fields left to right. Characters left after the last field are ignored.
   *
   * @throws SerializerError `unknown_cookie` when the cookie has no component
   * @throws SerializerError `async_value_unsupported` when a field decodes to a promise
   */
  async deserialize<K>(
    customId: string,
    components: ComponentLookup<K>,
  ): Promise<DeserializedComponent<K>> {
    const [afterCookie, decodedCookie] = this.deps.registry.resolve(Types.String).fromStr(customId)
    const cookie = await decodedCookie

    if (typeof cookie !== "string") {
      throw ConversionError.decode(Types.String.name, "cookie did not decode to a string")
    }

    const component = components.get(cookie)

    if (!component) {
      this.logger.warn("unknown cookie", { cookie })

      throw SerializerError.unknownCookie(cookie)
    }

    const values: Record<string, unknown> = {}
    let remainder = afterCookie

    for (const [field, hint] of component.schema) {
      const [next, value] = this.deps.registry.resolve(hint).fromStr(remainder)

      if (isPromiseLike(value)) {
        throw SerializerError.asyncValue(cookie, field)
      }

      Object.defineProperty(values, field, {
        value,
        enumerable: true,
        writable: true,
        configurable: true,
      })
      remainder = next
    }

    if (remainder.length > 0) {
      this.logger.debug("ignoring trailing characters", { cookie, length: remainder.length })
    }

    this.logger.debug("custom id deserialized", { cookie, length: customId.length })

    return { kind: component.kind, values }
  }

  private async encodeCookie(cookie: string): Promise<string> {
    return this.deps.registry.resolve(Types.String).toStr(cookie)
  }

  private async encodeField(
    cookie: string,
    field: string,
    hint: TypeHint,
    values: FieldValues,
  ): Promise<string> {
    const value = Object.hasOwn(values, field) ? values[field] : undefined

    if (value === undefined) {
      throw SerializerError.missingValue(cookie, field)
    }

    return this.deps.registry.resolve(hint).toStr(value)
  }
}
