import type {
  EnumDescriptor,
  GenericHint,
  TypeDescriptor,
  TypeHint,
  UnionHint,
} from "../ports/type-hint"
import { InvalidTypeError } from "./errors"

export type DefineTypeOptions = {
  /** The descriptor this one derives from. */
  base?: TypeDescriptor
}

export function defineType(name: string, options: DefineTypeOptions = {}): TypeDescriptor {
  const type: TypeDescriptor = options.base
    ? { kind: "type", name, base: options.base }
    : { kind: "type", name }

  return Object.freeze(type)
}

const Int = defineType("int")
const Enum = defineType("Enum")

/**
 * Built-in descriptors. `Bool` derives from `Int`.
 */
export const Types = Object.freeze({
  Int,
  Float: defineType("float"),
  String: defineType("str"),
  Bool: defineType("bool", { base: Int }),
  Enum,
  Literal: defineType("Literal"),
  None: defineType("None"),
})

/**
 * Describes a TypeScript numeric enum. Reverse-mapping keys are skipped and
 * every member value must be a non-negative safe integer.
 *
 * @example
 * ```ts
 * enum Color { Red, Green = 300 }
 *
 * const ColorType = enumType("Color", Color)
 * ```
 */
export function enumType(
  name: string,
  values: Readonly<Record<string, string | number>>,
  options: DefineTypeOptions = {},
): EnumDescriptor {
  const members: Record<string, number> = {}

  for (const [key, value] of Object.entries(values)) {
    if (typeof value !== "number") continue

    if (!Number.isSafeInteger(value) || value < 0) {
      throw new InvalidTypeError(name, `member ${key} has non-encodable value ${value}`)
    }

    members[key] = value
  }

  if (Object.keys(members).length === 0) {
    throw new InvalidTypeError(name, "an enum needs at least one numeric member")
  }

  const type: EnumDescriptor = {
    kind: "type",
    name,
    base: options.base ?? Types.Enum,
    members: Object.freeze(members),
  }

  return Object.freeze(type)
}

export function isEnumType(type: TypeDescriptor): type is EnumDescriptor {
  return "members" in type
}

export function enumMemberName(type: EnumDescriptor, value: number): string | undefined {
  return Object.keys(type.members).find((key) => type.members[key] === value)
}

export function union(...options: [TypeHint, ...TypeHint[]]): UnionHint {
  const hint: UnionHint = { kind: "union", options }

  return Object.freeze(hint)
}

export function optional(hint: TypeHint): UnionHint {
  return union(hint, Types.None)
}

export function generic(origin: TypeDescriptor, ...args: unknown[]): GenericHint {
  const hint: GenericHint = { kind: "generic", origin, args }

  return Object.freeze(hint)
}

export function literal(...values: [string, ...string[]]): GenericHint {
  return generic(Types.Literal, ...values)
}

export function isTypeHint(value: unknown): value is TypeHint {
  if (typeof value !== "object" || value === null || !("kind" in value)) return false

  return value.kind === "type" || value.kind === "union" || value.kind === "generic"
}

/**
 * Display name used in errors and logs, e.g. `int | None` or `Literal["a"]`.
 */
export function typeName(hint: TypeHint): string {
  switch (hint.kind) {
    case "type":
      return hint.name
    case "union":
      return hint.options.map(typeName).join(" | ")
    case "generic": {
      const args = hint.args.map((arg) => (isTypeHint(arg) ? typeName(arg) : JSON.stringify(arg)))

      return `${hint.origin.name}[${args.join(", ")}]`
    }
  }
}

/**
 * The descriptor used for converter lookup: the leftmost option of a union,
 * then the origin of a generic form.
 */
export function lookupType(hint: TypeHint): TypeDescriptor {
  let current = hint

  while (current.kind === "union") {
    current = current.options[0]
  }

  return current.kind === "generic" ? current.origin : current
}

/**
 * `true` when `ancestor` appears in the `base` chain of `type`. A type is not
 * a strict subtype of itself.
 */
export function isStrictSubtype(type: TypeDescriptor, ancestor: TypeDescriptor): boolean {
  for (let current = type.base; current; current = current.base) {
    if (current === ancestor) return true
  }

  return false
}
