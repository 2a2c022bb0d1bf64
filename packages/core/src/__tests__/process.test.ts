import { describe, it, expect } from "vitest";
import { buildDocx } from "../../../../test/fixtures/docx";
import { DocumentLoadError } from "../errors";
import { loadDocx } from "../ingest/docx";
import { processTranscript } from "../process";

describe("processTranscript", () => {
  it("returns the cleaned document, the report and the output names", async () => {
    const buf = await buildDocx([
      [
        { text: "ENTREVISTADOR:", bold: true, font: "Arial", size: 12 },
        { text: " ¿Cómo te llamas?", bold: true, font: "Arial", size: 12 },
      ],
      [
        { text: "ENTREVISTADO:", font: "Arial", size: 12 },
        { text: " Me llamo Ana :)", font: "Arial", size: 12 },
      ],
      "00:15",
      [{ text: "Speaker 1: ok", font: "Calibri", size: 12 }],
    ]);

    const out = await processTranscript(buf, { filename: "entrevista.docx", now: new Date("2026-03-01T10:00:00.000Z") });

    expect(out.names).toEqual({
      document: "entrevista_limpio.docx",
      report: "entrevista_errores.txt",
      archive: "resultado_entrevista.docx.zip",
    });
    expect(out.result.findings.map((f) => [f.line, f.category])).toEqual([
      [4, "Invalid label"],
      [4, "Incorrect font"],
    ]);
    expect(out.report).toBe(
      [
        "📋 ERROR REPORT",
        "File: entrevista.docx",
        "Generated: 2026-03-01T10:00:00.000Z",
        "",
        "Line 4: Invalid label → Found 'Speaker 1: ok'. Use 'ENTREVISTADOR:' or 'ENTREVISTADO:'.",
        "Line 4: Incorrect font → Found font 'Calibri' instead of Arial.",
        "",
        "--- ERROR SUMMARY ---",
        "Invalid label: 1 occurrences",
        "Incorrect font: 1 occurrences",
        "",
        "--- TEXT CLEANING ---",
        "Total special characters removed: 1",
        "Unique types removed: 1",
        "",
        "Detail by character:",
        "  ) (U+0029 RIGHT PARENTHESIS) → 1",
        "",
      ].join("\n"),
    );

    const cleaned = await loadDocx(out.cleaned);
    expect(cleaned.paragraphs.map((p) => p.text)).toEqual([
      "ENTREVISTADOR: ¿Cómo te llamas?",
      "ENTREVISTADO: Me llamo Ana :",
      "00:15",
      "Speaker 1: ok",
    ]);
  });

  it("produces nothing for a file that cannot be opened", async () => {
    await expect(processTranscript(Buffer.from("hola"), { filename: "roto.docx" })).rejects.toBeInstanceOf(DocumentLoadError);
  });
});
