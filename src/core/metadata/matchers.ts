import type { AnnotationKind, LocationRange } from '../../types/entry.js';

export interface FieldMatcher<T> {
  locale: string;
  match(metadata: string): T | null;
}

export interface MetadataMatchers {
  kind: readonly FieldMatcher<AnnotationKind>[];
  location: readonly FieldMatcher<LocationRange>[];
  timestamp: readonly FieldMatcher<string>[];
}

const KIND_WORDS: Record<string, AnnotationKind> = {
  highlight: 'highlight',
  note: 'note',
  bookmark: 'bookmark',
  '标注': 'highlight',
  '笔记': 'note',
  '书签': 'bookmark'
};

function kindMatcher(locale: string, pattern: RegExp): FieldMatcher<AnnotationKind> {
  return {
    locale,
    match(metadata) {
      const m = metadata.match(pattern);
      if (!m || !m[1]) return null;
      return KIND_WORDS[m[1].toLowerCase()] ?? null;
    }
  };
}

function locationMatcher(locale: string, pattern: RegExp): FieldMatcher<LocationRange> {
  return {
    locale,
    match(metadata) {
      const m = metadata.match(pattern);
      if (!m || !m[1]) return null;
      const first = Number(m[1]);
      const second = m[2] ? Number(m[2]) : first;
      return first <= second ? { start: first, end: second } : { start: second, end: first };
    }
  };
}

function timestampMatcher(locale: string, pattern: RegExp): FieldMatcher<string> {
  return {
    locale,
    match(metadata) {
      const m = metadata.match(pattern);
      const raw = m?.[1]?.trim();
      return raw ? raw : null;
    }
  };
}

/**
 * Locale phrasings, tried in order per field. Add a locale by appending
 * matchers; the first one that matches wins.
 */
export const DEFAULT_METADATA_MATCHERS: MetadataMatchers = {
  kind: [
    kindMatcher('en', /Your\s+(Highlight|Note|Bookmark)/i),
    kindMatcher('zh', /您在.*?的(标注|笔记|书签)/)
  ],
  location: [
    locationMatcher('zh', /位置\s*#?(\d+)(?:-(\d+))?/),
    locationMatcher('en', /Locations?\s*#?(\d+)(?:-(\d+))?/i),
    locationMatcher('en', /loc\.\s*(\d+)(?:-(\d+))?/i)
  ],
  timestamp: [
    timestampMatcher('en', /Added on\s+(.+)/i),
    timestampMatcher('zh', /添加于\s+(.+)/)
  ]
};

export function firstMatch<T>(matchers: readonly FieldMatcher<T>[], metadata: string): T | null {
  for (const matcher of matchers) {
    const value = matcher.match(metadata);
    if (value !== null) return value;
  }
  return null;
}
