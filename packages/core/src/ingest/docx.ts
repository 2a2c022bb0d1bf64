import JSZip from "jszip";
import { DocumentLoadError } from "../errors";
import { LoadOptions, Paragraph, Run, TranscriptDocument } from "./types";

const DOCUMENT_PART = "word/document.xml";

// Element tags only; declarations, comments and CDATA never start with a name char.
const TAG_RE = /<(\/?)([A-Za-z_][\w:.-]*)([^>]*?)(\/?)>/g;

const XML_ENTITY_MAP: Record<string, string> = {
  amp: "&",
  lt: "<",
  gt: ">",
  quot: '"',
  apos: "'",
};

type Span = { start: number; end: number };

type TextSegment = {
  kind: "text";
  value: string;
  open: Span;
  inner: Span | null; // null for <w:t/>
};

type FixedSegment = { kind: "tab" | "break"; value: "\t" | "\n" };

type Segment = TextSegment | FixedSegment;

type Replacement = Span & { text: string };

export function decodeXml(value: string): string {
  return value.replace(/&(?:(amp|lt|gt|quot|apos)|#(\d+)|#x([0-9a-fA-F]+));/g, (whole, named: string | undefined, dec: string | undefined, hex: string | undefined) => {
    if (named) return XML_ENTITY_MAP[named] ?? whole;
    const code = dec !== undefined ? parseInt(dec, 10) : parseInt(hex ?? "", 16);
    return Number.isFinite(code) ? String.fromCodePoint(code) : whole;
  });
}

export function escapeXml(value: string): string {
  return value.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

function attr(attrs: string, name: string): string | undefined {
  const m = new RegExp(`(?:^|\\s)${name}\\s*=\\s*(?:"([^"]*)"|'([^']*)')`).exec(attrs);
  if (!m) return undefined;
  return decodeXml(m[1] ?? m[2] ?? "");
}

function parseOnOff(attrs: string): boolean {
  const val = attr(attrs, "w:val");
  if (val === undefined) return true;
  return !["0", "false", "off", "none"].includes(val.toLowerCase());
}

export class DocxRun implements Run {
  text: string;
  readonly original: string;

  constructor(
    readonly bold: boolean | null,
    readonly fontName: string | null,
    readonly fontSize: number | null,
    readonly segments: Segment[],
    readonly element: Span,
    /** Range between the run properties and </w:r>; null for a self-closing <w:r/>. */
    readonly content: Span | null,
  ) {
    this.original = segments.map((s) => s.value).join("");
    this.text = this.original;
  }

  get changed(): boolean {
    return this.text !== this.original;
  }
}

export class DocxParagraph implements Paragraph {
  constructor(readonly runs: DocxRun[]) {}

  get text(): string {
    return this.runs.map((r) => r.text).join("");
  }
}

export class DocxDocument implements TranscriptDocument {
  constructor(
    readonly paragraphs: DocxParagraph[],
    readonly meta: TranscriptDocument["meta"],
    readonly zip: JSZip,
    readonly xml: string,
  ) {}
}

type RunBuilder = {
  frame: Frame;
  start: number;
  contentStart: number;
  bold: boolean | null;
  fontName: string | null;
  fontSize: number | null;
  segments: Segment[];
};

type Frame = { name: string; openStart: number; openEnd: number };

/**
 * Reads body-level paragraphs and their direct runs out of word/document.xml.
 * Runs inside a w:hyperlink are left out of the paragraph text, so hyperlink text is
 * never checked for labels or forbidden words and never cleaned. Paragraphs nested in
 * tables or text boxes are not part of the model either.
 */
export function parseDocumentXml(xml: string): DocxParagraph[] {
  const paragraphs: DocxParagraph[] = [];
  const stack: Frame[] = [];
  let sawBody = false;
  let paraFrame: Frame | null = null;
  let paraRuns: DocxRun[] = [];
  let run: RunBuilder | null = null;
  let rPrFrame: Frame | null = null;
  let textFrame: Frame | null = null;

  const finishRun = (b: RunBuilder, end: number, contentEnd: number | null) => {
    const content = contentEnd === null ? null : { start: b.contentStart, end: contentEnd };
    paraRuns.push(new DocxRun(b.bold, b.fontName, b.fontSize, b.segments, { start: b.start, end }, content));
  };

  TAG_RE.lastIndex = 0;
  let m: RegExpExecArray | null;
  while ((m = TAG_RE.exec(xml)) !== null) {
    const [raw, closing, name, attrs, selfClosing] = m;
    const start = m.index;
    const end = start + raw.length;

    if (closing) {
      const frame = stack.pop();
      if (!frame || frame.name !== name) {
        throw new DocumentLoadError(`${DOCUMENT_PART} is not well-formed near offset ${start}`);
      }
      if (frame === textFrame && run) {
        const inner = { start: frame.openEnd, end: start };
        run.segments.push({
          kind: "text",
          value: decodeXml(xml.slice(inner.start, inner.end)),
          open: { start: frame.openStart, end: frame.openEnd },
          inner,
        });
        textFrame = null;
      } else if (frame === rPrFrame && run) {
        run.contentStart = end;
        rPrFrame = null;
      } else if (run && frame === run.frame) {
        finishRun(run, end, start);
        run = null;
      } else if (frame === paraFrame) {
        paragraphs.push(new DocxParagraph(paraRuns));
        paraFrame = null;
        paraRuns = [];
      }
      continue;
    }

    const parent = stack[stack.length - 1];
    const frame: Frame = { name, openStart: start, openEnd: end };

    if (name === "w:body") {
      sawBody = true;
    } else if (name === "w:p" && parent?.name === "w:body") {
      if (selfClosing) paragraphs.push(new DocxParagraph([]));
      else { paraFrame = frame; paraRuns = []; }
    } else if (name === "w:r" && paraFrame && parent === paraFrame) {
      const b: RunBuilder = { frame, start, contentStart: end, bold: null, fontName: null, fontSize: null, segments: [] };
      if (selfClosing) finishRun(b, end, null);
      else run = b;
    } else if (run && parent === run.frame) {
      if (name === "w:rPr") {
        if (selfClosing) run.contentStart = end;
        else rPrFrame = frame;
      } else if (name === "w:t") {
        if (selfClosing) run.segments.push({ kind: "text", value: "", open: { start, end }, inner: null });
        else textFrame = frame;
      } else if (name === "w:tab") {
        run.segments.push({ kind: "tab", value: "\t" });
      } else if (name === "w:br" || name === "w:cr") {
        run.segments.push({ kind: "break", value: "\n" });
      }
    } else if (run && rPrFrame && parent === rPrFrame) {
      if (name === "w:b") {
        run.bold = parseOnOff(attrs);
      } else if (name === "w:rFonts") {
        run.fontName = attr(attrs, "w:ascii") ?? null;
      } else if (name === "w:sz") {
        const halfPoints = Number(attr(attrs, "w:val"));
        run.fontSize = Number.isFinite(halfPoints) ? halfPoints / 2 : null;
      }
    }

    if (!selfClosing) stack.push(frame);
  }

  if (!sawBody) throw new DocumentLoadError(`${DOCUMENT_PART} has no w:body`);
  if (stack.length > 0) throw new DocumentLoadError(`${DOCUMENT_PART} is not well-formed: <${stack[stack.length - 1].name}> is never closed`);
  return paragraphs;
}

export async function loadDocx(buf: Buffer, opts: LoadOptions = {}): Promise<DocxDocument> {
  let zip: JSZip;
  try {
    zip = await JSZip.loadAsync(buf);
  } catch (e) {
    throw new DocumentLoadError("File is not a valid .docx container", { filename: opts.filename, cause: e });
  }
  const entry = zip.file(DOCUMENT_PART);
  if (!entry) {
    throw new DocumentLoadError(`Missing ${DOCUMENT_PART}`, { filename: opts.filename });
  }
  const xml = await entry.async("string");
  let paragraphs: DocxParagraph[];
  try {
    paragraphs = parseDocumentXml(xml);
  } catch (e) {
    if (e instanceof DocumentLoadError) {
      throw new DocumentLoadError(e.message, { filename: opts.filename, cause: e });
    }
    throw e;
  }
  return new DocxDocument(paragraphs, { adapter: "docx", filename: opts.filename, bytes: buf.byteLength }, zip, xml);
}

/**
 * Maps `next` onto the run's segments when it is `original` with characters deleted.
 * Returns the kept text per segment, or null when `next` is not such a deletion.
 */
function alignDeletion(segments: Segment[], next: string): (string | null)[] | null {
  const chars = Array.from(next);
  const out: (string | null)[] = [];
  let j = 0;
  for (const seg of segments) {
    if (seg.kind !== "text") {
      if (chars[j] !== seg.value) return null;
      j++;
      out.push(null);
      continue;
    }
    let kept = "";
    for (const ch of Array.from(seg.value)) {
      if (j < chars.length && chars[j] === ch) {
        kept += ch;
        j++;
      }
    }
    out.push(kept);
  }
  return j === chars.length ? out : null;
}

function buildRunContent(text: string): string {
  let out = "";
  for (const piece of text.split(/([\t\n])/)) {
    if (piece === "\t") out += "<w:tab/>";
    else if (piece === "\n") out += "<w:br/>";
    else if (piece) out += `<w:t xml:space="preserve">${escapeXml(piece)}</w:t>`;
  }
  return out;
}

function runReplacements(xml: string, run: DocxRun): Replacement[] {
  const plan = alignDeletion(run.segments, run.text);
  if (plan) {
    const out: Replacement[] = [];
    run.segments.forEach((seg, i) => {
      const kept = plan[i];
      if (seg.kind !== "text" || kept === null || kept === seg.value || !seg.inner) return;
      if (/^\s|\s$/.test(kept) && !/\sxml:space\s*=\s*["']preserve["']/.test(xml.slice(seg.open.start, seg.open.end))) {
        out.push({ ...seg.open, text: '<w:t xml:space="preserve">' });
      }
      out.push({ ...seg.inner, text: escapeXml(kept) });
    });
    return out;
  }
  const content = buildRunContent(run.text);
  if (!run.content) return [{ ...run.element, text: `<w:r>${content}</w:r>` }];
  return [{ ...run.content, text: content }];
}

export function serializeDocumentXml(doc: DocxDocument): string {
  const replacements: Replacement[] = [];
  for (const p of doc.paragraphs) {
    for (const r of p.runs) {
      if (r.changed) replacements.push(...runReplacements(doc.xml, r));
    }
  }
  replacements.sort((a, b) => a.start - b.start);
  let out = "";
  let cursor = 0;
  for (const rep of replacements) {
    out += doc.xml.slice(cursor, rep.start) + rep.text;
    cursor = rep.end;
  }
  return out + doc.xml.slice(cursor);
}

export async function saveDocx(doc: DocxDocument): Promise<Buffer> {
  doc.zip.file(DOCUMENT_PART, serializeDocumentXml(doc));
  return doc.zip.generateAsync({ type: "nodebuffer", compression: "DEFLATE" });
}
