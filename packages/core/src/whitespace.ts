// Unicode whitespace in the narrow sense: separators plus the C0/C1 controls that
// behave as line or field breaks. U+FEFF is not whitespace here.
export const SPACE_CLASS =
  "\\t\\n\\v\\f\\r\\x1c-\\x1f \\x85\\xa0\\u1680\\u2000-\\u200a\\u2028\\u2029\\u202f\\u205f\\u3000";

const SPACE_RE = new RegExp(`^[${SPACE_CLASS}]$`, "u");
const TRIM_RE = new RegExp(`^[${SPACE_CLASS}]+|[${SPACE_CLASS}]+$`, "gu");

export function isSpace(ch: string): boolean {
  return SPACE_RE.test(ch);
}

export function trimSpace(text: string): string {
  return text.replace(TRIM_RE, "");
}
