// ============================================================================
// @fimsmith/core — FIM Assembler
// ============================================================================
//
// Pure (text, span) -> FimExample. Tag order is fixed by the training format:
//
//   <|fim_prefix|>{prefix}<|fim_suffix|>{suffix}<|fim_middle|>{middle}
// ============================================================================

import { AssemblerPreconditionError } from './errors.js';
import { charCount } from './lexer.js';
import { FIM_MIDDLE, FIM_PREFIX, FIM_SUFFIX, type FimExample, type Span } from './types.js';

/**
 * Split `text` around `span` and render the tagged string.
 *
 * @throws AssemblerPreconditionError when the span is not a non-empty integral
 *   range inside the text (a span-selection bug, never bad input)
 */
export function assembleFim(text: string, span: Span): FimExample {
  const { start, end } = span;
  if (
    !Number.isInteger(start) ||
    !Number.isInteger(end) ||
    start < 0 ||
    start >= end ||
    end > text.length
  ) {
    throw new AssemblerPreconditionError(start, end, text.length);
  }

  const prefix = text.slice(0, start);
  const middle = text.slice(start, end);
  const suffix = text.slice(end);

  if (prefix + middle + suffix !== text) {
    throw new AssemblerPreconditionError(start, end, text.length);
  }

  return {
    prefix,
    middle,
    suffix,
    text: `${FIM_PREFIX}${prefix}${FIM_SUFFIX}${suffix}${FIM_MIDDLE}${middle}`,
    span: { ...span },
    meta: {
      middleChars: [start, end],
      prefixLen: charCount(prefix),
      middleLen: charCount(middle),
      suffixLen: charCount(suffix),
      strategy: span.strategy,
    },
  };
}

export interface ParsedFim {
  prefix: string;
  suffix: string;
  middle: string;
}

/**
 * Inverse of the tagged rendering. Returns undefined when the string does not
 * start with the prefix tag or the suffix/middle tags are missing.
 *
 * Tag literals inside the code itself would make the split ambiguous; the
 * first suffix tag and the last middle tag are taken.
 */
export function parseFimText(tagged: string): ParsedFim | undefined {
  if (!tagged.startsWith(FIM_PREFIX)) return undefined;
  const suffixAt = tagged.indexOf(FIM_SUFFIX, FIM_PREFIX.length);
  if (suffixAt === -1) return undefined;
  const middleAt = tagged.lastIndexOf(FIM_MIDDLE);
  if (middleAt < suffixAt + FIM_SUFFIX.length) return undefined;

  return {
    prefix: tagged.slice(FIM_PREFIX.length, suffixAt),
    suffix: tagged.slice(suffixAt + FIM_SUFFIX.length, middleAt),
    middle: tagged.slice(middleAt + FIM_MIDDLE.length),
  };
}

/** True when `text` is rendered in the tagged FIM format. */
export function isFimText(text: string): boolean {
  return parseFimText(text) !== undefined;
}
