import type { Decoded, Fragment } from "../../ports/converter"
import { ConversionError } from "../errors"
import { BaseConverter } from "./base-converter"
import { isLatin1, MAX_CODE_POINT } from "./latin1"

/** Longest string a one-character length prefix can describe. */
export const MAX_STRING_LENGTH = MAX_CODE_POINT

/**
 * One length character (0–255) followed by the string itself.
 */
export class StringConverter extends BaseConverter<string> {
  toStr(value: string): Fragment {
    if (typeof value !== "string") {
      throw ConversionError.encode(this.type.name, `expected a string, got ${typeof value}`)
    }

    if (value.length > MAX_STRING_LENGTH) {
      throw ConversionError.encode(
        this.type.name,
        `length ${value.length} exceeds ${MAX_STRING_LENGTH}`,
        { length: value.length, maxLength: MAX_STRING_LENGTH },
      )
    }

    if (!isLatin1(value)) {
      throw ConversionError.encode(this.type.name, "contains characters above U+00FF")
    }

    return String.fromCharCode(value.length) + value
  }

  fromStr(encoded: string): Decoded<string> {
    if (encoded.length === 0) {
      throw ConversionError.decode(this.type.name, "missing length prefix")
    }

    const length = encoded.charCodeAt(0)

    if (length > MAX_STRING_LENGTH) {
      throw ConversionError.decode(this.type.name, `invalid length prefix U+${length.toString(16)}`)
    }

    const end = 1 + length

    if (encoded.length < end) {
      throw ConversionError.decode(
        this.type.name,
        `expected ${length} characters, ${encoded.length - 1} remain`,
        { expected: length, available: encoded.length - 1 },
      )
    }

    return [encoded.slice(end), encoded.slice(1, end)]
  }
}
