import { extname } from 'node:path';

import {
  DEFAULT_COMMENT_MARKER,
  splitsSurrogatePair,
  type Span,
} from '@region-complete/completion-core';

import { CliUsageError } from './errors.js';

const LINE_COMMENT_MARKERS: Readonly<Record<string, string>> = {
  '.c': '//',
  '.cc': '//',
  '.cpp': '//',
  '.cs': '//',
  '.go': '//',
  '.java': '//',
  '.js': '//',
  '.jsx': '//',
  '.kt': '//',
  '.rs': '//',
  '.scala': '//',
  '.swift': '//',
  '.ts': '//',
  '.tsx': '//',
  '.py': '#',
  '.rb': '#',
  '.sh': '#',
  '.bash': '#',
  '.pl': '#',
  '.r': '#',
  '.yaml': '#',
  '.yml': '#',
  '.toml': '#',
  '.el': ';;',
  '.clj': ';;',
  '.lisp': ';;',
  '.scm': ';;',
  '.hs': '--',
  '.lua': '--',
  '.sql': '--',
  '.erl': '%',
  '.tex': '%',
  '.m': '%',
  '.vim': '"',
};

/** Picks the line-comment marker for a file, the way an editor mode would. */
export function inferCommentMarker(filePath?: string, override?: string): string {
  if (override) {
    return override;
  }

  if (!filePath) {
    return DEFAULT_COMMENT_MARKER;
  }

  return LINE_COMMENT_MARKERS[extname(filePath).toLowerCase()] ?? DEFAULT_COMMENT_MARKER;
}

function parseOffset(label: string, raw: string | undefined, fallback: number): number {
  if (raw === undefined) {
    return fallback;
  }

  if (!/^\d+$/.test(raw)) {
    throw new CliUsageError(`${label} must be a non-negative integer (received '${raw}')`);
  }

  return Number.parseInt(raw, 10);
}

/**
 * Resolves `--start`/`--end` against the text; both default to the whole text.
 * Offsets count UTF-16 code units, so a character outside the Basic
 * Multilingual Plane (most emoji) occupies two.
 */
export function resolveSpan(text: string, start?: string, end?: string): Span {
  const span = {
    start: parseOffset('--start', start, 0),
    end: parseOffset('--end', end, text.length),
  };

  if (span.end < span.start || span.end > text.length) {
    throw new CliUsageError(
      `Region ${span.start}-${span.end} is outside the text (length ${text.length})`,
    );
  }

  for (const [label, offset] of [['--start', span.start], ['--end', span.end]] as const) {
    if (splitsSurrogatePair(text, offset)) {
      throw new CliUsageError(
        `${label} ${offset} falls inside a character that takes two UTF-16 code units`,
      );
    }
  }

  if (span.start === span.end) {
    throw new CliUsageError('The selected region is empty');
  }

  return span;
}
