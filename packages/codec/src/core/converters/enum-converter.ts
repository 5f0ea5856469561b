import type { Converter, Decoded, Fragment } from "../../ports/converter"
import type { EnumDescriptor } from "../../ports/type-hint"
import { ConversionError, InvalidTypeError } from "../errors"
import { enumMemberName, isEnumType, Types } from "../types"
import { BaseConverter } from "./base-converter"

/**
 * Numeric enum members, encoded by value through the int converter.
 */
export class EnumConverter extends BaseConverter<number> {
  toStr(value: number): Fragment {
    const type = this.enumType()

    if (enumMemberName(type, value) === undefined) {
      throw ConversionError.encode(type.name, `${String(value)} is not a member`, { value })
    }

    return this.ints().toStr(value)
  }

  fromStr(encoded: string): Decoded<number> {
    const type = this.enumType()
    const [remainder, value] = this.ints().fromStr(encoded)

    if (typeof value !== "number") {
      throw ConversionError.decode(type.name, "payload did not decode to a number")
    }

    if (enumMemberName(type, value) === undefined) {
      throw ConversionError.decode(type.name, `${value} is not a valid ${type.name}`, { value })
    }

    return [remainder, value]
  }

  private enumType(): EnumDescriptor {
    if (!isEnumType(this.type)) {
      throw new InvalidTypeError(this.type.name, "enum converters need a type created by enumType()")
    }

    return this.type
  }

  private ints(): Converter<unknown> {
    return this.resolver.resolve(Types.Int)
  }
}
