import { BaseError, type ErrorContext } from "@idpack/errors"

export class ConverterNotFoundError extends BaseError<"converter_not_found"> {
  constructor(readonly typeName: string) {
    super(`Could not find converter for type \`${typeName}\`.`, {
      code: "converter_not_found",
      context: { type: typeName },
    })
  }
}

export type SerializerErrorCode =
  | "custom_id_too_long"
  | "unknown_cookie"
  | "missing_field_value"
  | "async_value_unsupported"

export class SerializerError extends BaseError<SerializerErrorCode> {
  static tooLong(cookie: string, length: number, maxLength: number): SerializerError {
    return new SerializerError(
      `The serialized custom id for component ${cookie} is too long.` +
        " Try reducing the number of parameters the component takes." +
        ` Got length: ${length} Expected length: ${maxLength} or less`,
      { code: "custom_id_too_long", context: { cookie, length, maxLength } },
    )
  }

  static unknownCookie(cookie: string): SerializerError {
    return new SerializerError(`Component with cookie ${cookie} does not exist.`, {
      code: "unknown_cookie",
      context: { cookie },
    })
  }

  static missingValue(cookie: string, field: string): SerializerError {
    return new SerializerError(`No value for field ${field} of component ${cookie}.`, {
      code: "missing_field_value",
      context: { cookie, field },
    })
  }

  static asyncValue(cookie: string, field: string): SerializerError {
    return new SerializerError(
      `Field ${field} of component ${cookie} decoded to a promise; async field values are not supported.`,
      { code: "async_value_unsupported", context: { cookie, field }, isOperational: false },
    )
  }
}

export type ConversionErrorCode = "encode_error" | "decode_error"

/**
 * A single value could not be encoded or decoded by its converter.
 */
export class ConversionError extends BaseError<ConversionErrorCode> {
  static encode(type: string, message: string, context: ErrorContext = {}): ConversionError {
    return new ConversionError(`Cannot encode ${type}: ${message}`, {
      code: "encode_error",
      context: { ...context, type },
    })
  }

  static decode(type: string, message: string, context: ErrorContext = {}): ConversionError {
    return new ConversionError(`Cannot decode ${type}: ${message}`, {
      code: "decode_error",
      context: { ...context, type },
    })
  }
}

/**
 * A type descriptor was defined with arguments the codec cannot work with.
 */
export class InvalidTypeError extends BaseError<"invalid_type"> {
  constructor(name: string, message: string) {
    super(`Invalid type ${name}: ${message}`, {
      code: "invalid_type",
      context: { type: name },
      isOperational: false,
    })
  }
}
