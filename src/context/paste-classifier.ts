import { countLines, formatSize } from '../utils/format.js';

export const PASTE_MIN_LINES = 3;
export const PASTE_MIN_CHARS = 200;
export const DEFAULT_PREVIEW_LINES = 3;

export interface PasteStats {
  lines: number;
  chars: number;
  size: string;
}

export type PasteClassification =
  | { isPaste: false; stats: PasteStats | null }
  | { isPaste: true; stats: PasteStats };

/**
 * Decides whether a block of terminal input is a paste rather than a typed
 * command. Long single-line commands are accepted as false positives.
 */
export function classifyPaste(text: string): PasteClassification {
  if (!text) {
    return { isPaste: false, stats: null };
  }

  const stats: PasteStats = {
    lines: countLines(text),
    chars: text.length,
    size: formatSize(text.length),
  };

  if (stats.lines >= PASTE_MIN_LINES || stats.chars >= PASTE_MIN_CHARS) {
    return { isPaste: true, stats };
  }
  return { isPaste: false, stats };
}

/**
 * First `maxLines` lines verbatim, followed by a `... (N more lines)` marker
 * when anything was cut.
 */
export function createPreview(text: string, maxLines = DEFAULT_PREVIEW_LINES): string {
  const lines = text.split('\n');
  if (lines.length <= maxLines) {
    return text;
  }
  const remaining = lines.length - maxLines;
  return `${lines.slice(0, maxLines).join('\n')}\n... (${remaining} more lines)`;
}
