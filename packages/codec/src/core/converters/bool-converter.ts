import type { Decoded, Fragment } from "../../ports/converter"
import { ConversionError } from "../errors"
import { BaseConverter } from "./base-converter"

export class BoolConverter extends BaseConverter<boolean> {
  toStr(value: boolean): Fragment {
    return value ? "t" : "f"
  }

  fromStr(encoded: string): Decoded<boolean> {
    if (encoded.length === 0) {
      throw ConversionError.decode(this.type.name, "no characters remain")
    }

    return [encoded.slice(1), encoded.charAt(0) === "t"]
  }
}
