import { Paragraph, Run, RunInit, TranscriptDocument } from './types';

class MemoryRun implements Run {
  text: string;
  readonly bold: boolean | null;
  readonly fontName: string | null;
  readonly fontSize: number | null;

  constructor(init: RunInit) {
    this.text = init.text;
    this.bold = init.bold ?? null;
    this.fontName = init.fontName ?? null;
    this.fontSize = init.fontSize ?? null;
  }
}

class MemoryParagraph implements Paragraph {
  readonly runs: Run[];

  constructor(runs: RunInit[]) {
    this.runs = runs.map((r) => new MemoryRun(r));
  }

  get text(): string {
    return this.runs.map((r) => r.text).join('');
  }
}

// Plain strings become a single unstyled run.
export function createDocument(paragraphs: Array<string | RunInit[]>, filename?: string): TranscriptDocument {
  return {
    paragraphs: paragraphs.map((p) => new MemoryParagraph(typeof p === 'string' ? [{ text: p }] : p)),
    meta: { adapter: 'memory', filename },
  };
}
