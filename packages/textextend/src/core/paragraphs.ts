/**
 * Paragraph formatting for prompts and completions.
 *
 * Text moves between two forms:
 * - display form: hard-wrapped lines, paragraphs separated by blank lines
 * - model form: one line per paragraph, paragraphs separated by a single newline
 *
 * @module core/paragraphs
 *
 * @example
 * ```typescript
 * normalizeParagraphs("Once upon\na time.\n\n\nThe end.");
 * // "Once upon a time.\nThe end."
 *
 * prettifyParagraphs("Once upon a time.\nThe end.");
 * // "Once upon a time.\n\nThe end."
 * ```
 */

import { UsageError } from "./errors.js";

/** Column width used by {@link prettifyParagraphs} when none is given. */
export const DEFAULT_WRAP_WIDTH = 70;

/** Two or more consecutive newlines. */
const PARAGRAPH_BREAK = /\n{2,}/;

/**
 * Removes hard wrapping and separates paragraphs by single newlines.
 *
 * Empty paragraphs are kept, so a trailing paragraph break survives as a
 * trailing newline. `normalizeParagraphs(prettifyParagraphs(x)) === x` holds
 * for normalized `x` without empty paragraphs whose words are separated by
 * single spaces.
 */
export function normalizeParagraphs(text: string): string {
  return text
    .split(PARAGRAPH_BREAK)
    .map((paragraph) => paragraph.trim().replaceAll("\n", " "))
    .join("\n");
}

export interface PrettifyOptions {
  /**
   * Maximum line width in columns.
   * @default 70
   */
  width?: number;
}

/**
 * Adds hard wrapping and separates paragraphs by blank lines.
 * Each input line is treated as one paragraph.
 */
export function prettifyParagraphs(text: string, options: PrettifyOptions = {}): string {
  const width = options.width ?? DEFAULT_WRAP_WIDTH;
  return text
    .trim()
    .split("\n")
    .map((paragraph) => wrapParagraph(paragraph, width).join("\n"))
    .join("\n\n");
}

/**
 * Greedily fills lines of at most `width` columns with the paragraph's words.
 *
 * Words are never broken; one longer than `width` gets a line of its own.
 * Runs of whitespace between words collapse to a single space.
 *
 * @example
 * ```typescript
 * wrapParagraph("the quick brown fox", 10); // ["the quick", "brown fox"]
 * wrapParagraph("", 10);                    // []
 * ```
 */
export function wrapParagraph(paragraph: string, width: number): string[] {
  if (!Number.isInteger(width) || width < 1) {
    throw new UsageError(`wrap width must be a positive integer, got ${width}`);
  }

  const lines: string[] = [];
  let current = "";

  for (const word of paragraph.split(/\s+/)) {
    if (word === "") continue;

    if (current === "") {
      current = word;
    } else if (current.length + 1 + word.length <= width) {
      current = `${current} ${word}`;
    } else {
      lines.push(current);
      current = word;
    }
  }

  if (current !== "") {
    lines.push(current);
  }
  return lines;
}
