import names from "./unicode-names.json";
import { isSpace } from "../whitespace";

const UNICODE_NAMES: Record<string, string> = names;

const ESCAPES: Record<string, string> = { "\t": "\\t", "\n": "\\n", "\r": "\\r" };

export function codePointLabel(ch: string): string {
  const cp = ch.codePointAt(0) ?? 0;
  return `U+${cp.toString(16).toUpperCase().padStart(4, "0")}`;
}

export function unicodeName(ch: string): string {
  const cp = ch.codePointAt(0) ?? 0;
  return UNICODE_NAMES[cp.toString(16).toUpperCase().padStart(4, "0")] ?? "UNKNOWN";
}

/** Whitespace is quoted and escaped so it stays visible in the report. */
export function visibleForm(ch: string): string {
  if (!isSpace(ch)) return ch;
  if (ch === " ") return "' '";
  const known = ESCAPES[ch];
  if (known) return `'${known}'`;
  const cp = ch.codePointAt(0) ?? 0;
  const hex = cp.toString(16);
  return cp <= 0xff ? `'\\x${hex.padStart(2, "0")}'` : `'\\u${hex.padStart(4, "0")}'`;
}

export function describeChar(ch: string): string {
  return `${visibleForm(ch)} (${codePointLabel(ch)} ${unicodeName(ch)})`;
}
