export interface Run {
  text: string;
  readonly bold: boolean | null; // null = not set on the run (inherited)
  readonly fontName: string | null;
  readonly fontSize: number | null; // points
}

export interface Paragraph {
  readonly runs: Run[];
  /** Concatenation of the run texts. */
  readonly text: string;
}

export interface TranscriptDocument {
  readonly paragraphs: Paragraph[];
  readonly meta: {
    adapter: string;
    filename?: string;
    bytes?: number;
  };
}

export type RunInit = {
  text: string;
  bold?: boolean | null;
  fontName?: string | null;
  fontSize?: number | null;
};

export type LoadOptions = {
  filename?: string;
  mime?: string;
};
