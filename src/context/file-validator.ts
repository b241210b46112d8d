import { open, type FileHandle } from 'fs/promises';

export const DEFAULT_MAX_FILE_SIZE = 500_000;
export const BINARY_SNIFF_BYTES = 1024;

/**
 * True when the first bytes of the file contain a NUL byte. Unreadable files
 * count as binary.
 */
export async function isBinaryFile(path: string, sniffBytes = BINARY_SNIFF_BYTES): Promise<boolean> {
  let handle: FileHandle | undefined;
  try {
    handle = await open(path, 'r');
    const buffer = Buffer.alloc(sniffBytes);
    const { bytesRead } = await handle.read(buffer, 0, sniffBytes, 0);
    return buffer.subarray(0, bytesRead).includes(0);
  } catch {
    return true;
  } finally {
    await handle?.close();
  }
}

export function isTooLarge(byteSize: number, maxSize = DEFAULT_MAX_FILE_SIZE): boolean {
  return byteSize > maxSize;
}
