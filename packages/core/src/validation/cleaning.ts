import { Run } from "../ingest/types";
import { RemovalRecord } from "../types";
import { SPACE_CLASS } from "../whitespace";

// Anything outside Latin letters (plus Spanish accents), digits, whitespace and . , : ? ¿
export const DISALLOWED_RE = new RegExp(`[^A-Za-zÁÉÍÓÚáéíóúÑñ0-9${SPACE_CLASS}.,:?¿]`, "gu");

export function createRemovalRecord(): RemovalRecord {
  return { total: 0, byChar: new Map() };
}

export function findDisallowed(text: string): string[] {
  return text.match(DISALLOWED_RE) ?? [];
}

/** Strips disallowed characters from the run in place. Runs without any are left untouched. */
export function cleanRun(run: Run, record: RemovalRecord): number {
  if (!run.text) return 0;
  const found = findDisallowed(run.text);
  if (found.length === 0) return 0;
  record.total += found.length;
  for (const ch of found) {
    record.byChar.set(ch, (record.byChar.get(ch) ?? 0) + 1);
  }
  run.text = run.text.replace(DISALLOWED_RE, "");
  return found.length;
}
