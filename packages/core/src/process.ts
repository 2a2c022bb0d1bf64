import { outputNames } from "./archive";
import { loadDocument, saveDocx } from "./ingest/index";
import { getLogger } from "./logger";
import { renderReport } from "./report/index";
import { ProcessedTranscript } from "./types";
import { validateAndClean } from "./validation/engine";

export type ProcessOptions = {
  filename: string;
  mime?: string;
  now?: Date;
};

/**
 * Load → validate and clean → write the cleaned .docx → render the report.
 * Rejects with DocumentLoadError when the bytes cannot be opened; nothing is produced then.
 */
export async function processTranscript(buf: Buffer, opts: ProcessOptions): Promise<ProcessedTranscript> {
  const log = getLogger("core").child({ filename: opts.filename });
  const doc = await loadDocument(buf, { filename: opts.filename, mime: opts.mime });
  const result = validateAndClean(doc);
  const cleaned = await saveDocx(doc);
  const report = renderReport(opts.filename, result, opts.now);
  log.info("transcript.processed", {
    bytes: buf.byteLength,
    paragraphs: doc.paragraphs.length,
    findings: result.findings.length,
    removed: result.removedTotal,
  });
  return { cleaned, report, result, names: outputNames(opts.filename) };
}
