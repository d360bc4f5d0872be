export const DEFAULT_RECORD_SEPARATOR = '----------';

export function splitRecords(content: string, separator: string = DEFAULT_RECORD_SEPARATOR): string[] {
  if (!content) return [];
  const marker = separator.trim();
  const lines = content.replace(/\r\n?/g, '\n').split('\n');

  const blocks: string[] = [];
  let current: string[] = [];
  for (const line of lines) {
    if (line.trim() === marker) {
      blocks.push(current.join('\n'));
      current = [];
      continue;
    }
    current.push(line);
  }
  blocks.push(current.join('\n'));

  return blocks.map((b) => b.trim()).filter((b) => b.length > 0);
}
