import { thrownBy } from "../../../tests/utils/thrown-by"
import { Types } from "../../types"
import { createDefaultRegistry } from "../defaults"
import { FLOAT_WIDTH, FloatConverter } from "../float-converter"

function encode(value: number): string {
  const encoded = new FloatConverter(Types.Float, createDefaultRegistry()).toStr(value)

  if (typeof encoded !== "string") throw new Error("expected a synchronous fragment")

  return encoded
}

describe("FloatConverter", () => {
  const floats = new FloatConverter(Types.Float, createDefaultRegistry())

  it("encodes to exactly eight characters", () => {
    expect(encode(3.14)).toHaveLength(FLOAT_WIDTH)
  })

  it("writes IEEE-754 bytes little-endian", () => {
    expect(encode(1)).toBe("\x00\x00\x00\x00\x00\x00\xf0\x3f")
  })

  it.each([3.14, 0, -0, -2.5e-308, Number.MAX_VALUE, Number.POSITIVE_INFINITY, Number.NaN])(
    "round trips %s bit-exactly",
    (value) => {
      const [remainder, decoded] = floats.fromStr(`${encode(value)}tail`)

      expect(remainder).toBe("tail")
      expect(Object.is(decoded, value)).toBe(true)
    },
  )

  it("fails when fewer than eight characters remain", () => {
    expect(thrownBy(() => floats.fromStr("\x00\x00"))).toMatchObject({
      code: "decode_error",
      context: { type: "float", expected: 8, available: 2 },
    })
  })
})
