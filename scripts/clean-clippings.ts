#!/usr/bin/env node
/**
 * Clippings cleaner
 *
 * Reads an annotation export, deduplicates it per document and writes a
 * Markdown digest.
 *
 * Usage:
 *   npm run clean -- [in_file] [out_md] [time_tol] [clause_min_len] [debug]
 */

import 'dotenv/config';
import { existsSync, readFileSync, writeFileSync } from 'fs';
import { ClippingsDigest, MarkdownGenerator, resolveCliOptions } from '../src/index.js';

function main(): void {
  const options = resolveCliOptions(process.argv.slice(2), process.env);

  if (!existsSync(options.inputPath)) {
    console.error(`✗ Input file not found: ${options.inputPath}`);
    process.exitCode = 1;
    return;
  }

  // Undecodable bytes become U+FFFD rather than aborting the run.
  const content = new TextDecoder('utf-8', { fatal: false }).decode(readFileSync(options.inputPath));

  const digest = new ClippingsDigest(options.config);
  const { documents, stats } = digest.process(content);

  const markdown = new MarkdownGenerator({ includeBom: true }).generate(documents);
  writeFileSync(options.outputPath, markdown, 'utf-8');

  console.log(`✓ Deduplicated ${stats.parsedEntries} entries into ${stats.keptEntries} across ${stats.documents} documents -> ${options.outputPath}`);
  if (options.config.debug) {
    console.log(`   skipped blocks: ${stats.skippedBlocks}, empty markers: ${stats.filteredEmpty}`);
  }
}

main();
