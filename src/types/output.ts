import type { AnnotationKind, Entry } from './entry.js';

export interface DigestStats {
  blocks: number;
  parsedEntries: number;
  skippedBlocks: number;
  filteredEmpty: number;
  droppedDuplicates: Record<AnnotationKind, number>;
  keptEntries: number;
  documents: number;
}

export interface DigestOutput {
  documents: Map<string, Entry[]>;
  stats: DigestStats;
}

export interface MarkdownOptions {
  // Prefix the output with a byte-order mark (Windows editors expect one)
  includeBom?: boolean;
}
