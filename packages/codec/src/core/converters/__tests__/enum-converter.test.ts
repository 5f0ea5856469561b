import { thrownBy } from "../../../tests/utils/thrown-by"
import { InvalidTypeError } from "../../errors"
import { enumType, Types } from "../../types"
import { createDefaultRegistry } from "../defaults"
import { EnumConverter } from "../enum-converter"

enum Color {
  Red = 0,
  Green = 300,
}

const ColorType = enumType("Color", Color)

describe("EnumConverter", () => {
  const registry = createDefaultRegistry()

  it("is picked for enum types through subclass fallback", () => {
    const converter = registry.resolve(ColorType)

    expect(converter).toBeInstanceOf(EnumConverter)
    expect(converter.type).toBe(ColorType)
  })

  it("encodes members by value", () => {
    const colors = new EnumConverter(ColorType, registry)

    expect(colors.toStr(Color.Green)).toBe("\x02,\x01")
    expect(colors.toStr(Color.Red)).toBe("\x01\x00")
  })

  it("decodes members by value", () => {
    const colors = new EnumConverter(ColorType, registry)

    expect(colors.fromStr("\x02,\x01rest")).toEqual(["rest", Color.Green])
  })

  it("rejects values that are not members when encoding", () => {
    const colors = new EnumConverter(ColorType, registry)

    expect(thrownBy(() => colors.toStr(7))).toMatchObject({
      code: "encode_error",
      context: { type: "Color", value: 7 },
    })
  })

  it("rejects out-of-range values when decoding", () => {
    const colors = new EnumConverter(ColorType, registry)

    expect(thrownBy(() => colors.fromStr("\x01\x07"))).toMatchObject({
      code: "decode_error",
      message: "Cannot decode Color: 7 is not a valid Color",
    })
  })

  it("needs a type built by enumType", () => {
    const bare = new EnumConverter(Types.Enum, registry)

    expect(thrownBy(() => bare.toStr(0))).toBeInstanceOf(InvalidTypeError)
  })
})
