import { readFile } from 'fs/promises';
import type { FileReference, PasteEntry } from '../types.js';
import { readFailure, type CtxtermError } from '../errors.js';

export const QUESTION_SEPARATOR = '--- User Question ---';

export interface ContextSource {
  getFiles(): FileReference[];
  getPastes(): PasteEntry[];
}

export interface ComposedQuery {
  text: string;
  fileCount: number;
  pasteCount: number;
  warnings: CtxtermError[];
}

export type FileReader = (absolutePath: string) => Promise<string>;

const utf8 = new TextDecoder('utf-8', { fatal: true });

/**
 * Fresh UTF-8 read of a context file; invalid encodings are read failures.
 */
export const readUtf8File: FileReader = async (absolutePath) => {
  const bytes = await readFile(absolutePath);
  return utf8.decode(bytes);
};

function longestBacktickRun(content: string): number {
  let longest = 0;
  for (const match of content.matchAll(/`+/g)) {
    longest = Math.max(longest, match[0].length);
  }
  return longest;
}

/**
 * Labelled fenced block. The fence is always longer than any backtick run in
 * the content so a block can never be closed early by what it carries.
 */
export function fenceBlock(label: string, content: string): string {
  const fence = '`'.repeat(Math.max(3, longestBacktickRun(content) + 1));
  const body = content.endsWith('\n') ? content : `${content}\n`;
  return `${label}\n${fence}\n${body}${fence}`;
}

export function fileLabel(reference: FileReference): string {
  return `[File: ${reference.displayPath}]`;
}

export function pasteLabel(paste: PasteEntry): string {
  return `[Paste: ${paste.id} (${paste.lineCount} lines)]`;
}

/**
 * Builds the outbound query: file blocks, then paste blocks (insertion order
 * within each), then the separator and the question. Files are read now, not
 * when they were added. An empty context yields the question unchanged.
 */
export async function composeQuery(
  source: ContextSource,
  question: string,
  reader: FileReader = readUtf8File,
): Promise<ComposedQuery> {
  const files = source.getFiles();
  const pastes = source.getPastes();

  if (files.length === 0 && pastes.length === 0) {
    return { text: question, fileCount: 0, pasteCount: 0, warnings: [] };
  }

  const blocks: string[] = [];
  const warnings: CtxtermError[] = [];
  let fileCount = 0;

  for (const reference of files) {
    try {
      const content = await reader(reference.absolutePath);
      blocks.push(fenceBlock(fileLabel(reference), content));
      fileCount += 1;
    } catch (error) {
      warnings.push(readFailure(reference.displayPath, error));
    }
  }

  for (const paste of pastes) {
    blocks.push(fenceBlock(pasteLabel(paste), paste.content));
  }

  // every file failed and there are no pastes
  if (blocks.length === 0) {
    return { text: question, fileCount, pasteCount: 0, warnings };
  }

  const text = `${blocks.join('\n\n')}\n\n${QUESTION_SEPARATOR}\n${question}`;

  return { text, fileCount, pasteCount: pastes.length, warnings };
}
