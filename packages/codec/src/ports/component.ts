import type { TypeHint } from "./type-hint"

/**
 * Ordered field definitions. Encoding and decoding walk fields in this order.
 */
export type Schema = readonly (readonly [field: string, hint: TypeHint])[]

export type FieldValues = Readonly<Record<string, unknown>>

export type ComponentDefinition<K> = {
  readonly kind: K
  readonly schema: Schema
}

/**
 * Cookie → component lookup owned by the caller. A `Map` satisfies it.
 */
export interface ComponentLookup<K> {
  get(cookie: string): ComponentDefinition<K> | undefined
}

export type DeserializedComponent<K> = {
  readonly kind: K
  readonly values: FieldValues
}
