import { createNullLogger, type Logger } from "@idpack/logger"
import type { Converter, ConverterClass, ConverterResolver } from "../../ports/converter"
import type { TypeDescriptor, TypeHint } from "../../ports/type-hint"
import { ConverterNotFoundError } from "../errors"
import { BoundedCache } from "../eviction/bounded-cache"
import { isStrictSubtype, isTypeHint, lookupType, typeName } from "../types"

export const DEFAULT_RESOLUTION_CACHE_SIZE = 128

export type ConverterRegistryOptions = {
  /** Number of resolved hints kept in the LRU cache. */
  cacheSize?: number
  logger?: Logger
}

export type RegisterOptions = {
  /** Also use this converter for types deriving from the registered one. */
  supportsSubclass?: boolean
}

type Registration = {
  converter: ConverterClass
  supportsSubclass: boolean
}

type Resolution = {
  converter: ConverterClass
  type: TypeDescriptor
}

/**
 * Maps type descriptors to converter classes and resolves type hints to fresh
 * converter instances.
 *
 * Resolution reduces a union to its leftmost option and a generic form to its
 * origin, tries an exact registration, then the first subclass-capable
 * registration (in registration order) that the type derives from.
 *
 * Results are cached per hint; the cache holds the converter class and the
 * resolved type, never an instance. Descriptors are keyed by identity, unions
 * and generic forms by their structure, so equal hints built separately share
 * an entry. Any registration clears it.
 */
export class ConverterRegistry implements ConverterResolver {
  private readonly registrations = new Map<TypeDescriptor, Registration>()
  private readonly cache: BoundedCache<TypeDescriptor | string, Resolution>
  private readonly descriptorIds = new WeakMap<TypeDescriptor, number>()
  private nextDescriptorId = 0
  private readonly logger: Logger

  constructor(options: ConverterRegistryOptions = {}) {
    this.cache = new BoundedCache({
      maxEntries: options.cacheSize ?? DEFAULT_RESOLUTION_CACHE_SIZE,
    })
    this.logger = (options.logger ?? createNullLogger()).child({ module: "converter-registry" })
  }

  register(type: TypeDescriptor, converter: ConverterClass, options: RegisterOptions = {}): void {
    this.registrations.set(type, {
      converter,
      supportsSubclass: options.supportsSubclass ?? false,
    })
    this.cache.clear()

    this.logger.debug("converter registered", { type: type.name })
  }

  has(type: TypeDescriptor): boolean {
    return this.registrations.has(type)
  }

  cacheSize(): number {
    return this.cache.size()
  }

  clearCache(): void {
    this.cache.clear()
  }

  resolve(hint: TypeHint): Converter<unknown> {
    const { converter, type } = this.cache.get(this.cacheKey(hint)) ?? this.lookup(hint)

    return new converter(type, this)
  }

  private lookup(hint: TypeHint): Resolution {
    const type = lookupType(hint)
    const resolution = this.findExact(type) ?? this.findForSubclass(type)

    if (!resolution) {
      throw new ConverterNotFoundError(typeName(hint))
    }

    this.cache.set(this.cacheKey(hint), resolution)
    this.logger.trace("converter resolved", { type: typeName(hint) })

    return resolution
  }

  private cacheKey(hint: TypeHint): TypeDescriptor | string {
    return hint.kind === "type" ? hint : this.structuralKey(hint)
  }

  /** e.g. `union(#0,#3)` or `#5["a","b"]`, where `#n` names one descriptor. */
  private structuralKey(hint: TypeHint): string {
    switch (hint.kind) {
      case "type":
        return `#${this.descriptorId(hint)}`
      case "union":
        return `union(${hint.options.map((option) => this.structuralKey(option)).join(",")})`
      case "generic": {
        const args = hint.args.map((arg) =>
          isTypeHint(arg) ? this.structuralKey(arg) : String(JSON.stringify(arg)),
        )

        return `${this.structuralKey(hint.origin)}[${args.join(",")}]`
      }
    }
  }

  private descriptorId(type: TypeDescriptor): number {
    let id = this.descriptorIds.get(type)

    if (id === undefined) {
      id = this.nextDescriptorId++
      this.descriptorIds.set(type, id)
    }

    return id
  }

  private findExact(type: TypeDescriptor): Resolution | undefined {
    const registration = this.registrations.get(type)

    return registration && { converter: registration.converter, type }
  }

  private findForSubclass(type: TypeDescriptor): Resolution | undefined {
    for (const [key, { converter, supportsSubclass }] of this.registrations) {
      if (supportsSubclass && isStrictSubtype(type, key)) {
        return { converter, type }
      }
    }

    return undefined
  }
}
