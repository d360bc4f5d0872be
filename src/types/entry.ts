export type AnnotationKind = 'highlight' | 'note' | 'bookmark' | 'unknown';

export interface LocationRange {
  start: number | null;
  end: number | null;
}

export interface Entry {
  readonly sequenceIndex: number;
  readonly documentTitle: string;
  readonly metadata: string;
  readonly kind: AnnotationKind;
  readonly location: Readonly<LocationRange>;
  readonly timestampRaw: string | null;
  readonly timestampEpoch: number | null;
  readonly body: string;
  readonly normalizedBody: string;
  readonly contentHash: string;
  readonly clauses: readonly string[];
}

export interface DeduplicatedDocument {
  title: string;
  entries: Entry[];
}
