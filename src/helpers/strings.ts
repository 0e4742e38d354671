/**
 * PDF string encoding utilities.
 */

import {
  CHAR_BACKSLASH,
  CHAR_PARENTHESIS_CLOSE,
  CHAR_PARENTHESIS_OPEN,
  CHAR_QUESTION_MARK,
  CR,
  LF,
  SINGLE_BYTE_MASK,
} from "./chars";

/**
 * Escape a PDF literal string for serialization.
 *
 * Backslash-escapes `\`, `(` and `)`. CR and LF become `\r` and `\n` so a
 * single text-show operator never spans lines in the content stream.
 *
 * @example
 * ```ts
 * escapeLiteralString(encodeWinAnsi("a(b)")) // bytes of "a\(b\)"
 * ```
 */
export function escapeLiteralString(bytes: Uint8Array): Uint8Array {
  let escapeCount = 0;

  for (const byte of bytes) {
    if (
      byte === CHAR_BACKSLASH ||
      byte === CHAR_PARENTHESIS_OPEN ||
      byte === CHAR_PARENTHESIS_CLOSE ||
      byte === CR ||
      byte === LF
    ) {
      escapeCount++;
    }
  }

  if (escapeCount === 0) {
    return bytes;
  }

  const result = new Uint8Array(bytes.length + escapeCount);
  let j = 0;

  for (const byte of bytes) {
    if (byte === CR) {
      result[j++] = CHAR_BACKSLASH;
      result[j++] = 0x72; // r
    } else if (byte === LF) {
      result[j++] = CHAR_BACKSLASH;
      result[j++] = 0x6e; // n
    } else if (
      byte === CHAR_BACKSLASH ||
      byte === CHAR_PARENTHESIS_OPEN ||
      byte === CHAR_PARENTHESIS_CLOSE
    ) {
      result[j++] = CHAR_BACKSLASH;
      result[j++] = byte;
    } else {
      result[j++] = byte;
    }
  }

  return result;
}

/**
 * Encode text for a WinAnsiEncoding font.
 *
 * Code points up to U+00FF map to the same byte; everything else becomes "?".
 */
export function encodeWinAnsi(text: string): Uint8Array {
  const chars = Array.from(text);
  const bytes = new Uint8Array(chars.length);

  for (let i = 0; i < chars.length; i++) {
    const code = chars[i].codePointAt(0) ?? CHAR_QUESTION_MARK;

    bytes[i] = code <= 0xff ? code : CHAR_QUESTION_MARK;
  }

  return bytes;
}

/**
 * Decode single-byte content (ASCII / Latin-1) back to a string.
 *
 * Content streams and hex payloads are always single-byte, so this never
 * needs a TextDecoder.
 */
export function decodeLatin1(bytes: Uint8Array): string {
  let result = "";

  for (const byte of bytes) {
    result += String.fromCharCode(byte);
  }

  return result;
}

/**
 * Encode a single-byte string (ASCII / Latin-1) to bytes.
 */
export function encodeLatin1(str: string): Uint8Array {
  const bytes = new Uint8Array(str.length);

  for (let i = 0; i < str.length; i++) {
    bytes[i] = str.charCodeAt(i) & SINGLE_BYTE_MASK;
  }

  return bytes;
}

/**
 * Convert bytes to uppercase hex string.
 *
 * @example
 * ```ts
 * bytesToHex(new Uint8Array([72, 101, 108, 108, 111])) // "48656C6C6F"
 * ```
 */
export function bytesToHex(bytes: Uint8Array): string {
  let hex = "";

  for (const byte of bytes) {
    hex += byte.toString(16).toUpperCase().padStart(2, "0");
  }

  return hex;
}
