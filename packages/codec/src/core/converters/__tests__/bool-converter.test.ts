import { thrownBy } from "../../../tests/utils/thrown-by"
import { Types } from "../../types"
import { BoolConverter } from "../bool-converter"
import { createDefaultRegistry } from "../defaults"

describe("BoolConverter", () => {
  const bools = new BoolConverter(Types.Bool, createDefaultRegistry())

  it("encodes true as t and false as f", () => {
    expect(bools.toStr(true)).toBe("t")
    expect(bools.toStr(false)).toBe("f")
  })

  it("consumes one character", () => {
    expect(bools.fromStr("tf")).toEqual(["f", true])
    expect(bools.fromStr("f")).toEqual(["", false])
  })

  it("reads any character other than t as false", () => {
    expect(bools.fromStr("x")).toEqual(["", false])
  })

  it("fails on empty input", () => {
    expect(thrownBy(() => bools.fromStr(""))).toMatchObject({
      code: "decode_error",
      message: "Cannot decode bool: no characters remain",
    })
  })
})
