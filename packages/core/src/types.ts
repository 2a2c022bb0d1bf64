import type { TranscriptDocument } from "./ingest/types";

export const VALID_LABELS = ["ENTREVISTADOR:", "ENTREVISTADORA:", "ENTREVISTADO:", "ENTREVISTADA:"] as const;
export const INTERVIEWER_LABELS = ["ENTREVISTADOR:", "ENTREVISTADORA:"] as const;

export type SpeakerLabel = (typeof VALID_LABELS)[number];

export type FindingCategory =
  | "Invalid label"
  | "Incorrect format"
  | "Header not bold"
  | "Bold formatting"
  | "Incorrect font"
  | "Incorrect size";

export interface Finding {
  readonly line: number; // 1-based paragraph index
  readonly category: FindingCategory;
  readonly message: string;
}

export interface RemovalRecord {
  total: number;
  byChar: Map<string, number>; // insertion order = first seen
}

export interface ValidationResult<D extends TranscriptDocument = TranscriptDocument> {
  document: D;
  findings: Finding[];
  removedTotal: number;
  removedByChar: Map<string, number>;
}

export interface ProcessedTranscript {
  cleaned: Buffer;
  report: string;
  result: ValidationResult;
  names: { document: string; report: string; archive: string };
}
