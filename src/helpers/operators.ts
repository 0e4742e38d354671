/**
 * Content stream operator builders.
 *
 * Each function returns one operator line. Callers collect them into an
 * array and join with "\n" when the page content is serialized.
 */

import { type RGB, colorOperands } from "./colors";
import { formatPdfNumber } from "./format";
import { decodeLatin1, encodeWinAnsi, escapeLiteralString } from "./strings";

export type Operator = string;

const n = formatPdfNumber;

// ─────────────────────────────────────────────────────────────────────────────
// Graphics state
// ─────────────────────────────────────────────────────────────────────────────

export function pushGraphicsState(): Operator {
  return "q";
}

export function popGraphicsState(): Operator {
  return "Q";
}

/** Apply a named ExtGState resource */
export function setGraphicsState(name: string): Operator {
  return `/${name} gs`;
}

export function concatMatrix(
  a: number,
  b: number,
  c: number,
  d: number,
  e: number,
  f: number,
): Operator {
  return `${n(a)} ${n(b)} ${n(c)} ${n(d)} ${n(e)} ${n(f)} cm`;
}

export function setLineWidth(width: number): Operator {
  return `${n(width)} w`;
}

export function setFillColor(color: RGB): Operator {
  return `${colorOperands(color)} rg`;
}

export function setStrokeColor(color: RGB): Operator {
  return `${colorOperands(color)} RG`;
}

// ─────────────────────────────────────────────────────────────────────────────
// Paths
// ─────────────────────────────────────────────────────────────────────────────

export function rectangle(x: number, y: number, width: number, height: number): Operator {
  return `${n(x)} ${n(y)} ${n(width)} ${n(height)} re`;
}

export function moveTo(x: number, y: number): Operator {
  return `${n(x)} ${n(y)} m`;
}

export function lineTo(x: number, y: number): Operator {
  return `${n(x)} ${n(y)} l`;
}

export function stroke(): Operator {
  return "S";
}

export function fill(): Operator {
  return "f";
}

export function fillAndStroke(): Operator {
  return "B";
}

// ─────────────────────────────────────────────────────────────────────────────
// Text
// ─────────────────────────────────────────────────────────────────────────────

export function beginText(): Operator {
  return "BT";
}

export function endText(): Operator {
  return "ET";
}

/** Select a font resource, e.g. setFont("F1", 12) → "/F1 12 Tf" */
export function setFont(name: string, size: number): Operator {
  return `/${name} ${n(size)} Tf`;
}

export function setTextMatrix(
  a: number,
  b: number,
  c: number,
  d: number,
  e: number,
  f: number,
): Operator {
  return `${n(a)} ${n(b)} ${n(c)} ${n(d)} ${n(e)} ${n(f)} Tm`;
}

/** Show a string as a WinAnsi literal: "(Hello) Tj" */
export function showText(text: string): Operator {
  const escaped = escapeLiteralString(encodeWinAnsi(text));

  return `(${decodeLatin1(escaped)}) Tj`;
}

// ─────────────────────────────────────────────────────────────────────────────
// XObjects
// ─────────────────────────────────────────────────────────────────────────────

/** Paint a named XObject: "/Im1 Do" */
export function drawXObject(name: string): Operator {
  return `/${name} Do`;
}
