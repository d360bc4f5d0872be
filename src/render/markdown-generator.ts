import type { Entry } from '../types/entry.js';
import type { MarkdownOptions } from '../types/output.js';

const BOM = '\uFEFF';

export function renderEntry(entry: Entry): string {
  if (entry.body) return entry.body;
  return `（${entry.kind}） ${entry.metadata}`;
}

/**
 * One `## title` heading per document, then each entry separated by a blank
 * line.
 */
export class MarkdownGenerator {
  constructor(private readonly options: MarkdownOptions = {}) {}

  generate(documents: ReadonlyMap<string, readonly Entry[]>): string {
    const parts: string[] = [];
    for (const [title, entries] of documents) {
      parts.push(`## ${title}\n\n`);
      for (const entry of entries) {
        parts.push(`${renderEntry(entry)}\n\n`);
      }
    }
    const markdown = parts.join('');
    return this.options.includeBom ? BOM + markdown : markdown;
  }
}
