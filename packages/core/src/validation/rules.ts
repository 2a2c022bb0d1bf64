import { Paragraph, Run } from "../ingest/types";
import { Finding, FindingCategory, INTERVIEWER_LABELS, SpeakerLabel, VALID_LABELS } from "../types";
import { trimSpace } from "../whitespace";

// Any decimal digits, not only ASCII
export const TIMESTAMP_RE = /^\p{Nd}{1,2}:\p{Nd}{2}$/u;
export const LABEL_PREFIX_RE = /^([A-ZÁÉÍÓÚÑ]+:)/;

export const EXPECTED_FONT = "Arial";
export const EXPECTED_SIZE_PT = 12;

const FORBIDDEN_WORDS: Array<{ word: string; message: (text: string) => string }> = [
  { word: "speaker", message: (text) => `Found '${text}'. Use 'ENTREVISTADOR:' or 'ENTREVISTADO:'.` },
  { word: "usuario", message: () => "Found 'Usuario'. Use 'ENTREVISTADO:' or 'ENTREVISTADOR:'." },
  { word: "xxx", message: (text) => `Found '${text}'. Replace it with the correct label.` },
];

function finding(line: number, category: FindingCategory, message: string): Finding {
  return Object.freeze({ line, category, message });
}

export function isTimestamp(text: string): boolean {
  return TIMESTAMP_RE.test(text);
}

function isValidLabel(label: string): label is SpeakerLabel {
  return (VALID_LABELS as readonly string[]).includes(label);
}

function isInterviewer(label: SpeakerLabel): boolean {
  return (INTERVIEWER_LABELS as readonly string[]).includes(label);
}

/** Placeholder speaker names left over from automatic transcription. */
export function checkForbiddenWords(text: string, line: number): Finding[] {
  const norm = text.toLowerCase();
  return FORBIDDEN_WORDS
    .filter(({ word }) => norm.includes(word))
    .map(({ message }) => finding(line, "Invalid label", message(text)));
}

export function checkLabel(para: Paragraph, text: string, line: number): Finding[] {
  const match = LABEL_PREFIX_RE.exec(text);
  if (!match) return [];
  const label = match[1];
  if (!isValidLabel(label)) {
    return [finding(line, "Invalid label", `Found '${label}'. Use only ${VALID_LABELS.join(", ")}`)];
  }

  const out: Finding[] = [];
  if (text === label) {
    out.push(finding(line, "Incorrect format", `The label '${label}' stands alone. It must be followed by the text.`));
  }
  if (isInterviewer(label)) {
    const headerBold = para.runs.some((r) => trimSpace(r.text).startsWith(label) && r.bold === true);
    if (!headerBold) {
      out.push(finding(line, "Header not bold", `The label '${label}' should be bold.`));
    }
    const allBold = para.runs.every((r) => r.bold === true || !trimSpace(r.text));
    if (!allBold) {
      out.push(finding(line, "Bold formatting", `The text of '${label}' should be entirely bold.`));
    }
  }
  return out;
}

/**
 * Stops at the first run carrying a wrong font or size; later runs are not inspected,
 * so a paragraph reports at most one font and one size finding.
 */
export function checkFontAndSize(runs: Run[], line: number): Finding[] {
  for (const run of runs) {
    const out: Finding[] = [];
    if (run.fontName && run.fontName.toLowerCase() !== EXPECTED_FONT.toLowerCase()) {
      out.push(finding(line, "Incorrect font", `Found font '${run.fontName}' instead of ${EXPECTED_FONT}.`));
    }
    if (run.fontSize && run.fontSize !== EXPECTED_SIZE_PT) {
      out.push(finding(line, "Incorrect size", `Found ${run.fontSize}pt instead of ${EXPECTED_SIZE_PT}pt.`));
    }
    if (out.length) return out;
  }
  return [];
}
