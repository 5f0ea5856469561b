import type { Decoded, Fragment } from "../../ports/converter"
import { ConversionError } from "../errors"
import { BaseConverter } from "./base-converter"
import { bytesToChars, charsToBytes, isLatin1 } from "./latin1"

export const FLOAT_WIDTH = 8

/**
 * IEEE-754 double, little-endian, one character per byte. Fixed width, so no
 * length prefix.
 */
export class FloatConverter extends BaseConverter<number> {
  toStr(value: number): Fragment {
    if (typeof value !== "number") {
      throw ConversionError.encode(this.type.name, `expected a number, got ${typeof value}`)
    }

    const bytes = new Uint8Array(FLOAT_WIDTH)
    new DataView(bytes.buffer).setFloat64(0, value, true)

    return bytesToChars(bytes)
  }

  fromStr(encoded: string): Decoded<number> {
    const chars = encoded.slice(0, FLOAT_WIDTH)

    if (chars.length < FLOAT_WIDTH) {
      throw ConversionError.decode(
        this.type.name,
        `expected ${FLOAT_WIDTH} characters, ${chars.length} remain`,
        { expected: FLOAT_WIDTH, available: chars.length },
      )
    }

    if (!isLatin1(chars)) {
      throw ConversionError.decode(this.type.name, "contains characters above U+00FF")
    }

    const bytes = charsToBytes(chars)

    return [encoded.slice(FLOAT_WIDTH), new DataView(bytes.buffer).getFloat64(0, true)]
  }
}
