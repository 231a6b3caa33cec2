import { EncodingError } from '@tagscan/shared';
import { TextDecoder } from 'node:util';

export function createDecoder(): TextDecoder {
  return new TextDecoder('utf-8', { fatal: true });
}

function describe(path?: string): string {
  return path ? ` in ${path}` : '';
}

export function assertText(text: string, path?: string): string {
  if (text.includes('\u0000')) {
    throw new EncodingError(`Binary content (NUL byte)${describe(path)}`, { path });
  }
  return text;
}

/**
 * Decodes one chunk with a shared streaming decoder. Pass `stream: false` on the
 * last call so a truncated multi-byte sequence is reported.
 */
export function decodeChunk(
  decoder: TextDecoder,
  chunk: Uint8Array | undefined,
  stream: boolean,
  path?: string,
): string {
  let text: string;
  try {
    text = decoder.decode(chunk, { stream });
  } catch (error) {
    throw new EncodingError(`Invalid UTF-8${describe(path)}`, { cause: error, path });
  }
  return assertText(text, path);
}

export function decodeText(content: Uint8Array, path?: string): string {
  return decodeChunk(createDecoder(), content, false, path);
}
