export const MAX_CODE_POINT = 0xff

export function isLatin1(value: string): boolean {
  for (let i = 0; i < value.length; i++) {
    if (value.charCodeAt(i) > MAX_CODE_POINT) return false
  }

  return true
}

export function bytesToChars(bytes: Uint8Array): string {
  let out = ""

  for (const byte of bytes) {
    out += String.fromCharCode(byte)
  }

  return out
}

/**
 * Inverse of `bytesToChars`. The input must already be Latin-1.
 */
export function charsToBytes(chars: string): Uint8Array {
  const bytes = new Uint8Array(chars.length)

  for (let i = 0; i < chars.length; i++) {
    bytes[i] = chars.charCodeAt(i)
  }

  return bytes
}
