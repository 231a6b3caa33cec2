import nodeFs from 'node:fs/promises';
import isBinaryPath from 'is-binary-path';

const SAMPLE_BYTES = 1024;

/**
 * Extension check first, then a NUL byte in the first kilobyte.
 */
export async function isBinaryFile(filePath: string, fs: typeof nodeFs = nodeFs): Promise<boolean> {
  if (isBinaryPath(filePath)) {
    return true;
  }

  const handle = await fs.open(filePath, 'r');
  try {
    const buffer = Buffer.alloc(SAMPLE_BYTES);
    const { bytesRead } = await handle.read(buffer, 0, SAMPLE_BYTES, 0);
    return buffer.subarray(0, bytesRead).includes(0);
  } finally {
    await handle.close();
  }
}
