/**
 * A named runtime token standing in for a type. Registry keys are compared by
 * identity, so each descriptor must be created once and shared.
 *
 * `base` links a descriptor to the one it derives from, which is what
 * subclass-capable registrations match against.
 */
export type TypeDescriptor = {
  readonly kind: "type"
  readonly name: string
  readonly base?: TypeDescriptor
}

export type EnumMembers = Readonly<Record<string, number>>

/**
 * A TypeScript numeric enum, derived from `Types.Enum`.
 */
export type EnumDescriptor = TypeDescriptor & {
  readonly members: EnumMembers
}

/**
 * `A | B | …`. Only the leftmost option is used for converter lookup.
 */
export type UnionHint = {
  readonly kind: "union"
  readonly options: readonly [TypeHint, ...TypeHint[]]
}

/**
 * A parameterized form such as `Literal["a", "b"]`. Lookup uses `origin` and
 * ignores `args`.
 */
export type GenericHint = {
  readonly kind: "generic"
  readonly origin: TypeDescriptor
  readonly args: readonly unknown[]
}

export type TypeHint = TypeDescriptor | UnionHint | GenericHint
