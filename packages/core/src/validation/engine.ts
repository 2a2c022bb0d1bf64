import { Paragraph, TranscriptDocument } from "../ingest/types";
import { getLogger } from "../logger";
import { Finding, RemovalRecord, ValidationResult } from "../types";
import { trimSpace } from "../whitespace";
import { cleanRun, createRemovalRecord } from "./cleaning";
import { checkFontAndSize, checkForbiddenWords, checkLabel, isTimestamp } from "./rules";

export interface ParagraphAccumulator {
  findings: Finding[];
  removed: RemovalRecord;
}

/**
 * Runs every check on one paragraph, then cleans its runs.
 * Timestamp lines (e.g. "12:34") are exempt from both.
 */
export function validateParagraph(para: Paragraph, line: number, acc: ParagraphAccumulator): void {
  const text = trimSpace(para.text);
  if (!text) return;
  if (isTimestamp(text)) return;

  acc.findings.push(
    ...checkForbiddenWords(text, line),
    ...checkLabel(para, text, line),
    ...checkFontAndSize(para.runs, line),
  );

  for (const run of para.runs) {
    cleanRun(run, acc.removed);
  }
}

export function validateAndClean<D extends TranscriptDocument>(doc: D): ValidationResult<D> {
  const log = getLogger("core").child({ filename: doc.meta.filename });
  const acc: ParagraphAccumulator = { findings: [], removed: createRemovalRecord() };

  doc.paragraphs.forEach((para, i) => validateParagraph(para, i + 1, acc));

  log.debug("validateAndClean.complete", {
    paragraphs: doc.paragraphs.length,
    findings: acc.findings.length,
    removed: acc.removed.total,
  });
  return {
    document: doc,
    findings: acc.findings,
    removedTotal: acc.removed.total,
    removedByChar: acc.removed.byChar,
  };
}
