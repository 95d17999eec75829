/**
 * Help Listing Flag Extractor
 * @module parsers/help/flag-extractor
 *
 * Pulls flag long names out of a `--help` listing, in listing order.
 */

import type { FlagRecord } from '../../types/chart-options.js';

/**
 * Matches a flag declaration line: indentation, an optional short flag
 * (`-c,`), then `--<name>` followed by whitespace.
 */
export const FLAG_LINE_PATTERN = /^\s+(?:-[^-]+)?--(\S+)\s/;

/**
 * Extract the long name from a single listing line
 *
 * @returns the flag name, or undefined when the line declares no flag
 */
export function matchFlagLine(line: string): string | undefined {
  const match = FLAG_LINE_PATTERN.exec(line);
  const name = match?.[1];
  return name ? name : undefined;
}

/**
 * Lazily yield every flag declared in a help listing.
 *
 * Lines that do not look like a flag declaration (blank lines, headers,
 * wrapped help text) are skipped.
 *
 * Each line is matched with a space appended in place of the newline that
 * splitting removed, so a flag ending its line (`      --version`) matches
 * as it would in newline-terminated text. That includes the last line of
 * input without a final newline, which {@link FLAG_LINE_PATTERN} on its own
 * would miss because it requires whitespace after the name.
 */
export function* extractFlagNames(text: string): Generator<FlagRecord, void, undefined> {
  const lines = text.split(/\r?\n/);

  for (let i = 0; i < lines.length; i++) {
    const name = matchFlagLine(`${lines[i]} `);
    if (name !== undefined) {
      yield { name, line: i + 1 };
    }
  }
}

/**
 * Count the lines of a listing the way {@link extractFlagNames} numbers them
 */
export function countLines(text: string): number {
  return text.split(/\r?\n/).length;
}
