import { thrownBy } from "../../tests/utils/thrown-by"
import { InvalidTypeError } from "../errors"
import {
  defineType,
  enumMemberName,
  enumType,
  generic,
  isEnumType,
  isStrictSubtype,
  isTypeHint,
  literal,
  lookupType,
  optional,
  Types,
  typeName,
  union,
} from "../types"

enum Size {
  Small = 1,
  Large = 2,
}

enum Mood {
  Happy = "happy",
}

describe("types", () => {
  describe("defineType", () => {
    it("creates frozen descriptors", () => {
      const UserId = defineType("UserId", { base: Types.Int })

      expect(UserId).toEqual({ kind: "type", name: "UserId", base: Types.Int })
      expect(Object.isFrozen(UserId)).toBe(true)
    })

    it("derives Bool from Int", () => {
      expect(Types.Bool.base).toBe(Types.Int)
    })
  })

  describe("enumType", () => {
    it("keeps numeric members and drops reverse mappings", () => {
      const SizeType = enumType("Size", Size)

      expect(SizeType.members).toEqual({ Small: 1, Large: 2 })
      expect(SizeType.base).toBe(Types.Enum)
      expect(isEnumType(SizeType)).toBe(true)
      expect(isEnumType(Types.Int)).toBe(false)
    })

    it("names members by value", () => {
      const SizeType = enumType("Size", Size)

      expect(enumMemberName(SizeType, 2)).toBe("Large")
      expect(enumMemberName(SizeType, 3)).toBeUndefined()
    })

    it("rejects enums without numeric members", () => {
      const err = thrownBy(() => enumType("Mood", Mood))

      expect(err).toBeInstanceOf(InvalidTypeError)
      expect(err).toMatchObject({ code: "invalid_type", context: { type: "Mood" } })
    })

    it("rejects negative members", () => {
      expect(thrownBy(() => enumType("Signed", { Minus: -1 }))).toMatchObject({
        code: "invalid_type",
        message: "Invalid type Signed: member Minus has non-encodable value -1",
      })
    })
  })

  describe("typeName", () => {
    it("renders unions with pipes", () => {
      expect(typeName(optional(Types.Int))).toBe("int | None")
    })

    it("renders generic arguments", () => {
      expect(typeName(literal("a", "b"))).toBe('Literal["a", "b"]')
      expect(typeName(generic(Types.Literal, Types.Int))).toBe("Literal[int]")
    })
  })

  describe("lookupType", () => {
    it("takes the leftmost option of nested unions", () => {
      const hint = union(union(Types.Float, Types.Int), Types.String)

      expect(lookupType(hint)).toBe(Types.Float)
    })

    it("takes the origin of a generic form", () => {
      expect(lookupType(literal("x"))).toBe(Types.Literal)
      expect(lookupType(union(literal("x"), Types.None))).toBe(Types.Literal)
    })
  })

  describe("isStrictSubtype", () => {
    it("follows the base chain", () => {
      const Flag = defineType("Flag", { base: Types.Bool })

      expect(isStrictSubtype(Flag, Types.Int)).toBe(true)
      expect(isStrictSubtype(Types.Bool, Types.Int)).toBe(true)
    })

    it("is false for the type itself and for ancestors", () => {
      expect(isStrictSubtype(Types.Int, Types.Int)).toBe(false)
      expect(isStrictSubtype(Types.Int, Types.Bool)).toBe(false)
    })
  })

  it("isTypeHint recognises every hint kind", () => {
    expect(isTypeHint(Types.Int)).toBe(true)
    expect(isTypeHint(optional(Types.Int))).toBe(true)
    expect(isTypeHint(literal("a"))).toBe(true)
    expect(isTypeHint("int")).toBe(false)
    expect(isTypeHint({ kind: "other" })).toBe(false)
  })
})
