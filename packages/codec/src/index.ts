export {
  CODEC_ENV_PREFIX,
  type CodecConfig,
  codecConfigSchema,
  type LoadCodecConfigOptions,
  loadCodecConfig,
} from "./config/codec-config"
export { BaseConverter } from "./core/converters/base-converter"
export { BoolConverter } from "./core/converters/bool-converter"
export { createDefaultRegistry, registerDefaultConverters } from "./core/converters/defaults"
export { EnumConverter } from "./core/converters/enum-converter"
export { FLOAT_WIDTH, FloatConverter } from "./core/converters/float-converter"
export { IntConverter } from "./core/converters/int-converter"
export { MAX_STRING_LENGTH, StringConverter } from "./core/converters/string-converter"
export {
  type CustomIdCodecDeps,
  type CustomIdCodecOptions,
  CustomIdCodec,
  DEFAULT_MAX_LENGTH,
} from "./core/custom-id-codec"
export {
  ConversionError,
  type ConversionErrorCode,
  ConverterNotFoundError,
  InvalidTypeError,
  SerializerError,
  type SerializerErrorCode,
} from "./core/errors"
export {
  ConverterRegistry,
  type ConverterRegistryOptions,
  DEFAULT_RESOLUTION_CACHE_SIZE,
  type RegisterOptions,
} from "./core/registry/converter-registry"
export {
  type DefineTypeOptions,
  defineType,
  enumMemberName,
  enumType,
  generic,
  isEnumType,
  literal,
  optional,
  Types,
  typeName,
  union,
} from "./core/types"
export { type CodecContext, type CodecContextDeps, createCodecContext } from "./create-codec-context"
export type {
  ComponentDefinition,
  ComponentLookup,
  DeserializedComponent,
  FieldValues,
  Schema,
} from "./ports/component"
export type {
  Converter,
  ConverterClass,
  ConverterResolver,
  Decoded,
  Fragment,
} from "./ports/converter"
export type {
  EnumDescriptor,
  EnumMembers,
  GenericHint,
  TypeDescriptor,
  TypeHint,
  UnionHint,
} from "./ports/type-hint"
