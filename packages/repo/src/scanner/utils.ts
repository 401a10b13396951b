import nodeFs from 'node:fs/promises';
import isBinaryPath from 'is-binary-path';

export async function isBinaryFile(filePath: string, fs: typeof nodeFs = nodeFs): Promise<boolean> {
  // 1. Check extension
  if (isBinaryPath(filePath)) {
    return true;
  }

  // 2. Sample content for NUL bytes
  const handle = await fs.open(filePath, 'r');
  try {
    const buffer = Buffer.alloc(1024);
    const { bytesRead } = await handle.read(buffer, 0, 1024, 0);
    return buffer.subarray(0, bytesRead).includes(0);
  } finally {
    await handle.close();
  }
}

/**
 * True when the text holds a character above U+007F. Any UTF-16 unit above
 * 0x7F, surrogates included, belongs to such a character.
 */
export function hasNonAscii(text: string): boolean {
  for (let i = 0; i < text.length; i++) {
    if (text.charCodeAt(i) > 0x7f) {
      return true;
    }
  }
  return false;
}

export const DEFAULT_IGNORES = ['.git', 'node_modules', 'dist', 'coverage'];
