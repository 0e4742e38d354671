/**
 * PDF character constants (ISO 32000-1, 7.2.2)
 *
 * Byte values and sets used when writing PDF syntax.
 */

// Line endings
export const LF = 0x0a; // Line Feed
export const CR = 0x0d; // Carriage Return

// Whitespace
export const SPACE = 0x20;
export const TAB = 0x09;
export const NUL = 0x00;
export const FF = 0x0c;

/**
 * PDF whitespace characters: NUL, TAB, LF, FF, CR, SPACE
 */
export const WHITESPACE = new Set([NUL, TAB, LF, FF, CR, SPACE]);

// Delimiters
export const CHAR_PARENTHESIS_OPEN = 0x28; // (
export const CHAR_PARENTHESIS_CLOSE = 0x29; // )
export const CHAR_ANGLE_BRACKET_OPEN = 0x3c; // <
export const CHAR_ANGLE_BRACKET_CLOSE = 0x3e; // >
export const CHAR_SQUARE_BRACKET_OPEN = 0x5b; // [
export const CHAR_SQUARE_BRACKET_CLOSE = 0x5d; // ]
export const CHAR_CURLY_BRACE_OPEN = 0x7b; // {
export const CHAR_CURLY_BRACE_CLOSE = 0x7d; // }
export const CHAR_SLASH = 0x2f; // /
export const CHAR_PERCENT = 0x25; // %
export const CHAR_BACKSLASH = 0x5c; // \
export const CHAR_HASH = 0x23; // #

/**
 * PDF delimiter characters: ( ) < > [ ] { } / %
 */
export const DELIMITERS = new Set([
  CHAR_PARENTHESIS_OPEN,
  CHAR_PARENTHESIS_CLOSE,
  CHAR_ANGLE_BRACKET_OPEN,
  CHAR_ANGLE_BRACKET_CLOSE,
  CHAR_SQUARE_BRACKET_OPEN,
  CHAR_SQUARE_BRACKET_CLOSE,
  CHAR_CURLY_BRACE_OPEN,
  CHAR_CURLY_BRACE_CLOSE,
  CHAR_SLASH,
  CHAR_PERCENT,
]);

/**
 * Replacement byte for characters WinAnsiEncoding cannot represent ("?").
 */
export const CHAR_QUESTION_MARK = 0x3f;

/**
 * Byte mask for limiting values to a single byte (0-255).
 */
export const SINGLE_BYTE_MASK = 0xff;
