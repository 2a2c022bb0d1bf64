import JSZip from "jszip";

const DOCX_EXT_RE = /\.docx$/i;

export function outputNames(filename: string): { document: string; report: string; archive: string } {
  const base = filename.replace(DOCX_EXT_RE, "");
  return {
    document: `${base}_limpio.docx`,
    report: `${base}_errores.txt`,
    archive: archiveName(filename),
  };
}

export function archiveName(filename: string): string {
  return `resultado_${filename}.zip`;
}

/** Zip holding the cleaned document and its error report. */
export async function buildResultArchive(filename: string, cleaned: Buffer, report: string): Promise<Buffer> {
  const names = outputNames(filename);
  const zip = new JSZip();
  zip.file(names.document, cleaned);
  zip.file(names.report, report);
  return zip.generateAsync({ type: "nodebuffer", compression: "DEFLATE" });
}
