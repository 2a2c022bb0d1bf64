import { Finding, ValidationResult } from "../types";
import { describeChar } from "./charinfo";

export { describeChar, unicodeName, visibleForm, codePointLabel } from "./charinfo";

export function summarizeFindings(findings: Finding[]): Map<string, number> {
  const out = new Map<string, number>();
  for (const f of findings) out.set(f.category, (out.get(f.category) ?? 0) + 1);
  return out;
}

// Most frequent first; ties keep first-seen order (Array.prototype.sort is stable).
export function rankRemovedChars(byChar: Map<string, number>): Array<[string, number]> {
  return Array.from(byChar.entries()).sort((a, b) => b[1] - a[1]);
}

export function formatFinding(f: Finding): string {
  return `Line ${f.line}: ${f.category} → ${f.message}`;
}

type ReportInput = Pick<ValidationResult, "findings" | "removedTotal" | "removedByChar">;

export function renderReport(filename: string, result: ReportInput, generatedAt: Date = new Date()): string {
  const lines: string[] = [
    "📋 ERROR REPORT",
    `File: ${filename}`,
    `Generated: ${generatedAt.toISOString()}`,
    "",
  ];
  lines.push(...result.findings.map(formatFinding));

  const summary = summarizeFindings(result.findings);
  if (summary.size) {
    lines.push("", "--- ERROR SUMMARY ---");
    for (const [category, count] of summary) lines.push(`${category}: ${count} occurrences`);
  }

  lines.push(
    "",
    "--- TEXT CLEANING ---",
    `Total special characters removed: ${result.removedTotal}`,
    `Unique types removed: ${result.removedByChar.size}`,
  );
  if (result.removedByChar.size) {
    lines.push("", "Detail by character:");
    for (const [ch, count] of rankRemovedChars(result.removedByChar)) {
      lines.push(`  ${describeChar(ch)} → ${count}`);
    }
  }
  return lines.join("\n") + "\n";
}
