import type { AnnotationKind, DeduplicatedDocument, Entry } from '../types/entry.js';
import { DecisionTrace } from '../utils/logger.js';
import { DuplicateClassifier } from './duplicate-classifier.js';

export interface GroupingOptions {
  classifier?: DuplicateClassifier;
  trace?: DecisionTrace;
}

export interface GroupingResult {
  documents: Map<string, Entry[]>;
  filteredEmpty: number;
  droppedDuplicates: Record<AnnotationKind, number>;
}

type RetentionBucket = 'passage' | 'note' | 'bookmark';

const BUCKET_ORDER: readonly RetentionBucket[] = ['passage', 'note', 'bookmark'];

function bucketFor(kind: AnnotationKind): RetentionBucket {
  if (kind === 'note') return 'note';
  if (kind === 'bookmark') return 'bookmark';
  // highlight and unknown share the fuzzy running set
  return 'passage';
}

function emptyKindCounts(): Record<AnnotationKind, number> {
  return { highlight: 0, note: 0, bookmark: 0, unknown: 0 };
}

export function groupByDocument(entries: readonly Entry[]): Map<string, Entry[]> {
  const byDocument = new Map<string, Entry[]>();
  for (const entry of entries) {
    const list = byDocument.get(entry.documentTitle);
    if (list) {
      list.push(entry);
    } else {
      byDocument.set(entry.documentTitle, [entry]);
    }
  }
  return byDocument;
}

/**
 * Located entries first by (start, sequence); unlocated ones after them,
 * newest timestamp first, then by sequence.
 */
export function compareForDigest(x: Entry, y: Entry): number {
  const xs = x.location.start;
  const ys = y.location.start;
  if (xs !== null && ys !== null) {
    return xs - ys || x.sequenceIndex - y.sequenceIndex;
  }
  if (xs !== null) return -1;
  if (ys !== null) return 1;
  const xt = x.timestampEpoch ?? 0;
  const yt = y.timestampEpoch ?? 0;
  return yt - xt || x.sequenceIndex - y.sequenceIndex;
}

export function deduplicateByDocument(entries: readonly Entry[], options: GroupingOptions = {}): GroupingResult {
  const trace = options.trace ?? new DecisionTrace(false);
  const classifier = options.classifier ?? new DuplicateClassifier({ trace });

  const documents = new Map<string, Entry[]>();
  const droppedDuplicates = emptyKindCounts();
  let filteredEmpty = 0;

  for (const [title, docEntries] of groupByDocument(entries)) {
    const kept: Record<RetentionBucket, Entry[]> = { passage: [], note: [], bookmark: [] };

    // Newest-first fold: a later capture is kept and earlier duplicates of it drop.
    for (let i = docEntries.length - 1; i >= 0; i -= 1) {
      const current = docEntries[i];
      if (!current) continue;

      if (!current.body.trim()) {
        filteredEmpty += 1;
        trace.log('filtered empty:', current.documentTitle, current.metadata);
        continue;
      }

      const bucket = bucketFor(current.kind);
      const running = kept[bucket];
      let duplicate: boolean;
      if (bucket === 'note') {
        duplicate = running.some((k) => k.normalizedBody === current.normalizedBody);
      } else if (bucket === 'bookmark') {
        duplicate = running.some((k) => k.metadata === current.metadata);
      } else {
        duplicate = running.some((k) => classifier.isDuplicate(current, k));
      }

      if (duplicate) {
        droppedDuplicates[current.kind] += 1;
      } else {
        running.push(current);
      }
    }

    const ordered = BUCKET_ORDER.flatMap((bucket) => [...kept[bucket]].sort(compareForDigest));
    if (ordered.length > 0) {
      documents.set(title, ordered);
    }
  }

  trace.log('filtered empty markers:', filteredEmpty);
  return { documents, filteredEmpty, droppedDuplicates };
}

export function toDocuments(documents: ReadonlyMap<string, Entry[]>): DeduplicatedDocument[] {
  return Array.from(documents, ([title, list]) => ({ title, entries: list }));
}
