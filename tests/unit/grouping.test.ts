import { describe, it, expect } from 'vitest';
import { compareForDigest, deduplicateByDocument, groupByDocument, toDocuments } from '../../src/core/grouping.js';
import { DecisionTrace } from '../../src/utils/logger.js';
import type { Entry } from '../../src/types/entry.js';
import { captureLogger, makeEntry } from '../test-utils.js';

function seqs(list: readonly Entry[] | undefined): number[] {
  return (list ?? []).map((e) => e.sequenceIndex);
}

describe('deduplicateByDocument', () => {
  it('should keep the later of two overlapping highlights', () => {
    const a = makeEntry({ seq: 0, body: 'The quick brown fox', start: 100, end: 110 });
    const b = makeEntry({ seq: 1, body: 'The quick brown fox jumps', start: 102, end: 115 });
    const { documents, droppedDuplicates } = deduplicateByDocument([a, b]);
    expect(seqs(documents.get('Book'))).toEqual([1]);
    expect(droppedDuplicates.highlight).toBe(1);
  });

  it('should keep the later of two identical notes', () => {
    const notes = [
      makeEntry({ seq: 0, kind: 'note', body: 'My own thought', start: 50 }),
      makeEntry({ seq: 1, kind: 'note', body: 'My own thought', start: 80 })
    ];
    expect(seqs(deduplicateByDocument(notes).documents.get('Book'))).toEqual([1]);
  });

  it('should not fuzzy-match notes', () => {
    const notes = [
      makeEntry({ seq: 0, kind: 'note', body: 'The quick brown fox', start: 100 }),
      makeEntry({ seq: 1, kind: 'note', body: 'The quick brown fox jumps', start: 100 })
    ];
    expect(seqs(deduplicateByDocument(notes).documents.get('Book'))).toEqual([0, 1]);
  });

  it('should collapse bookmarks sharing metadata', () => {
    const bookmarks = [0, 1, 2].map((seq) =>
      makeEntry({ seq, kind: 'bookmark', body: `mark ${seq}`, start: 10, metadata: '- Your Bookmark on Location 10' })
    );
    const { documents, droppedDuplicates } = deduplicateByDocument(bookmarks);
    expect(seqs(documents.get('Book'))).toEqual([2]);
    expect(droppedDuplicates.bookmark).toBe(2);
  });

  it('should not deduplicate across kinds', () => {
    const entries = [
      makeEntry({ seq: 0, kind: 'note', body: 'Shared words exactly', start: 5 }),
      makeEntry({ seq: 1, kind: 'highlight', body: 'Shared words exactly', start: 5 })
    ];
    const kept = deduplicateByDocument(entries).documents.get('Book');
    expect(kept?.map((e) => e.kind)).toEqual(['highlight', 'note']);
  });

  it('should treat unknown kinds like highlights', () => {
    const entries = [
      makeEntry({ seq: 0, kind: 'highlight', body: 'Same passage text' }),
      makeEntry({ seq: 1, kind: 'unknown', body: 'Same passage text' })
    ];
    const { documents, droppedDuplicates } = deduplicateByDocument(entries);
    expect(seqs(documents.get('Book'))).toEqual([1]);
    expect(droppedDuplicates.highlight).toBe(1);
  });

  it('should not deduplicate across documents', () => {
    const entries = [
      makeEntry({ seq: 0, title: 'One', body: 'Same passage text' }),
      makeEntry({ seq: 1, title: 'Two', body: 'Same passage text' })
    ];
    const { documents } = deduplicateByDocument(entries);
    expect([...documents.keys()]).toEqual(['One', 'Two']);
    expect(seqs(documents.get('One'))).toEqual([0]);
    expect(seqs(documents.get('Two'))).toEqual([1]);
  });

  it('should drop empty bodies and omit documents left empty', () => {
    const entries = [
      makeEntry({ seq: 0, title: 'Empty', kind: 'bookmark', body: '' }),
      makeEntry({ seq: 1, title: 'Full', body: 'Something' }),
      makeEntry({ seq: 2, title: 'Full', kind: 'highlight', body: '   ' })
    ];
    const { documents, filteredEmpty } = deduplicateByDocument(entries);
    expect(documents.has('Empty')).toBe(false);
    expect(seqs(documents.get('Full'))).toEqual([1]);
    expect(filteredEmpty).toBe(2);
  });

  it('should order located entries by start then sequence', () => {
    const entries = [
      makeEntry({ seq: 0, body: 'Third passage about mountains', start: 300 }),
      makeEntry({ seq: 1, body: 'First passage about rivers', start: 100 }),
      makeEntry({ seq: 2, body: 'Second passage about forests', start: 200 }),
      makeEntry({ seq: 3, body: 'Another one about deserts', start: 100 })
    ];
    const kept = deduplicateByDocument(entries).documents.get('Book');
    expect(kept?.map((e) => e.location.start)).toEqual([100, 100, 200, 300]);
    expect(seqs(kept)).toEqual([1, 3, 2, 0]);
  });

  it('should place unlocated entries last, newest first', () => {
    const entries = [
      makeEntry({ seq: 0, body: 'Undated and unlocated words' }),
      makeEntry({ seq: 1, body: 'Older unlocated capture here', ts: 1000 }),
      makeEntry({ seq: 2, body: 'Located passage on a page', start: 900 }),
      makeEntry({ seq: 3, body: 'Newer unlocated capture text', ts: 2000 })
    ];
    expect(seqs(deduplicateByDocument(entries).documents.get('Book'))).toEqual([2, 3, 1, 0]);
  });

  it('should concatenate highlights, notes, then bookmarks', () => {
    const entries = [
      makeEntry({ seq: 0, kind: 'bookmark', body: 'bookmark body', start: 1 }),
      makeEntry({ seq: 1, kind: 'note', body: 'note body', start: 2 }),
      makeEntry({ seq: 2, kind: 'highlight', body: 'highlight body', start: 3 })
    ];
    const kept = deduplicateByDocument(entries).documents.get('Book');
    expect(kept?.map((e) => e.kind)).toEqual(['highlight', 'note', 'bookmark']);
  });

  it('should be idempotent', () => {
    const entries = [
      makeEntry({ seq: 0, body: 'The quick brown fox', start: 100, end: 110 }),
      makeEntry({ seq: 1, body: 'The quick brown fox jumps', start: 102, end: 115 }),
      makeEntry({ seq: 2, body: 'A wholly separate idea', start: 40 }),
      makeEntry({ seq: 3, kind: 'note', body: 'note', start: 40 }),
      makeEntry({ seq: 4, kind: 'note', body: 'note', start: 41 })
    ];
    const first = deduplicateByDocument(entries).documents;
    const flattened = [...first.values()].flat().sort((x, y) => x.sequenceIndex - y.sequenceIndex);
    const second = deduplicateByDocument(flattened).documents;
    expect(seqs(second.get('Book'))).toEqual(seqs(first.get('Book')));
    expect(seqs(first.get('Book'))).toEqual([2, 1, 4]);
  });

  it('should trace filtered markers without changing results', () => {
    const logger = captureLogger();
    const entries = [makeEntry({ seq: 0, body: '', metadata: 'meta' }), makeEntry({ seq: 1, body: 'kept' })];
    const traced = deduplicateByDocument(entries, { trace: new DecisionTrace(true, logger) });
    const plain = deduplicateByDocument(entries);
    expect(seqs(traced.documents.get('Book'))).toEqual(seqs(plain.documents.get('Book')));
    expect(logger.lines).toEqual([
      ['[dedup]', 'filtered empty:', 'Book', 'meta'],
      ['[dedup]', 'filtered empty markers:', 1]
    ]);
  });
});

describe('groupByDocument', () => {
  it('should keep first-appearance order', () => {
    const grouped = groupByDocument([
      makeEntry({ seq: 0, title: 'B' }),
      makeEntry({ seq: 1, title: 'A' }),
      makeEntry({ seq: 2, title: 'B' })
    ]);
    expect([...grouped.keys()]).toEqual(['B', 'A']);
    expect(seqs(grouped.get('B'))).toEqual([0, 2]);
  });
});

describe('compareForDigest', () => {
  it('should sort located before unlocated', () => {
    const located = makeEntry({ seq: 5, start: 1 });
    const unlocated = makeEntry({ seq: 0, ts: 99 });
    expect(compareForDigest(located, unlocated)).toBeLessThan(0);
    expect(compareForDigest(unlocated, located)).toBeGreaterThan(0);
  });
});

describe('toDocuments', () => {
  it('should convert the map to titled documents', () => {
    const entry = makeEntry({ seq: 0, body: 'x' });
    expect(toDocuments(new Map([['Book', [entry]]]))).toEqual([{ title: 'Book', entries: [entry] }]);
  });
});
