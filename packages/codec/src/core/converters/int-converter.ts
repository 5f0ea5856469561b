import type { Converter, Decoded, Fragment } from "../../ports/converter"
import { ConversionError } from "../errors"
import { Types } from "../types"
import { BaseConverter } from "./base-converter"
import { bytesToChars, charsToBytes, isLatin1 } from "./latin1"

function bitLength(value: number): number {
  let bits = 0

  for (let n = value; n > 0; n = Math.floor(n / 2)) bits++

  return bits
}

/**
 * Little-endian bytes, `bitLength // 8 + 1` of them (so 255 takes two).
 */
export function toLittleEndian(value: number): Uint8Array {
  const bytes = new Uint8Array(Math.floor(bitLength(value) / 8) + 1)

  let n = value
  for (let i = 0; i < bytes.length; i++) {
    bytes[i] = n % 256
    n = Math.floor(n / 256)
  }

  return bytes
}

export function fromLittleEndian(bytes: Uint8Array): number {
  let value = 0

  for (let i = bytes.length - 1; i >= 0; i--) {
    value = value * 256 + (bytes[i] ?? 0)
  }

  return value
}

/**
 * Non-negative safe integers, as their little-endian bytes run through the
 * string converter.
 */
export class IntConverter extends BaseConverter<number> {
  toStr(value: number): Fragment {
    if (typeof value !== "number" || !Number.isSafeInteger(value) || value < 0) {
      throw ConversionError.encode(
        this.type.name,
        `expected a non-negative safe integer, got ${String(value)}`,
      )
    }

    return this.strings().toStr(bytesToChars(toLittleEndian(value)))
  }

  fromStr(encoded: string): Decoded<number> {
    const [remainder, chars] = this.strings().fromStr(encoded)

    if (typeof chars !== "string") {
      throw ConversionError.decode(this.type.name, "payload did not decode to a string")
    }

    if (!isLatin1(chars)) {
      throw ConversionError.decode(this.type.name, "payload contains characters above U+00FF")
    }

    const value = fromLittleEndian(charsToBytes(chars))

    if (!Number.isSafeInteger(value)) {
      throw ConversionError.decode(this.type.name, "value exceeds Number.MAX_SAFE_INTEGER")
    }

    return [remainder, value]
  }

  private strings(): Converter<unknown> {
    return this.resolver.resolve(Types.String)
  }
}
