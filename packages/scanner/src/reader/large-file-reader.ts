import { createReadStream } from 'node:fs';
import fs from 'node:fs/promises';
import { AppError, IoError } from '@tagscan/shared';
import { createDecoder, decodeChunk, decodeText, assertText } from '../extractor/decode';
import { LineSplitter, splitLines } from '../extractor/line-splitter';

export const DEFAULT_LARGE_FILE_THRESHOLD = 256 * 1024;
export const DEFAULT_CHUNK_SIZE = 64 * 1024;

export type ReadMode = 'buffered' | 'streamed' | 'memory';

/**
 * Decoded file content. `lines()` may be consumed once per call; every call re-reads.
 */
export interface SourceContent {
  readonly path: string;
  readonly sizeBytes: number;
  readonly mode: ReadMode;
  lines(): AsyncIterable<string>;
  text(): Promise<string>;
}

export interface OpenHint {
  /** Known size from a prior stat; the file is stat'ed otherwise. */
  sizeBytes?: number;
  /** Path reported on findings; defaults to the path opened. */
  label?: string;
}

export interface LargeFileReaderOptions {
  /** Files strictly larger than this are streamed. */
  thresholdBytes?: number;
  chunkSize?: number;
}

function toIoError(filePath: string, error: unknown): AppError {
  if (error instanceof AppError) return error;
  const reason = error instanceof Error ? error.message : String(error);
  return new IoError(filePath, `Cannot read ${filePath}: ${reason}`, { cause: error });
}

/**
 * Wraps text that is already in memory, e.g. editor buffers or tests.
 */
export function inMemorySource(filePath: string, text: string): SourceContent {
  assertText(text, filePath);
  return {
    path: filePath,
    sizeBytes: Buffer.byteLength(text),
    mode: 'memory',
    async *lines() {
      yield* splitLines(text);
    },
    text: async () => text,
  };
}

/**
 * Picks a read path by size. Small files are read and decoded whole; large files are
 * streamed chunk by chunk through the same decoder and line splitter so both paths
 * yield identical lines while the streamed one never holds the whole file.
 */
export class LargeFileReader {
  readonly thresholdBytes: number;
  readonly chunkSize: number;

  constructor(options: LargeFileReaderOptions = {}) {
    this.thresholdBytes = options.thresholdBytes ?? DEFAULT_LARGE_FILE_THRESHOLD;
    this.chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE;
  }

  async open(filePath: string, hint: OpenHint = {}): Promise<SourceContent> {
    let size = hint.sizeBytes;
    if (size === undefined) {
      try {
        size = (await fs.stat(filePath)).size;
      } catch (error) {
        throw toIoError(filePath, error);
      }
    }
    const label = hint.label ?? filePath;
    return size > this.thresholdBytes
      ? this.streamed(filePath, label, size)
      : this.buffered(filePath, label, size);
  }

  private buffered(filePath: string, label: string, sizeBytes: number): SourceContent {
    const read = async (): Promise<string> => {
      let buffer: Buffer;
      try {
        buffer = await fs.readFile(filePath);
      } catch (error) {
        throw toIoError(filePath, error);
      }
      return decodeText(buffer, filePath);
    };

    return {
      path: label,
      sizeBytes,
      mode: 'buffered',
      async *lines() {
        yield* splitLines(await read());
      },
      text: read,
    };
  }

  private streamed(filePath: string, label: string, sizeBytes: number): SourceContent {
    const chunks = (): AsyncGenerator<string> => this.decodedChunks(filePath);

    return {
      path: label,
      sizeBytes,
      mode: 'streamed',
      async *lines() {
        const splitter = new LineSplitter();
        for await (const text of chunks()) {
          yield* splitter.push(text);
        }
        yield* splitter.end();
      },
      async text() {
        const parts: string[] = [];
        for await (const text of chunks()) {
          parts.push(text);
        }
        return parts.join('');
      },
    };
  }

  private async *decodedChunks(filePath: string): AsyncGenerator<string> {
    const decoder = createDecoder();
    const stream = createReadStream(filePath, { highWaterMark: this.chunkSize });
    try {
      for await (const chunk of stream) {
        if (!Buffer.isBuffer(chunk)) {
          throw new IoError(filePath, `Unexpected string chunk while reading ${filePath}`);
        }
        yield decodeChunk(decoder, chunk, true, filePath);
      }
      yield decodeChunk(decoder, undefined, false, filePath);
    } catch (error) {
      throw toIoError(filePath, error);
    } finally {
      stream.destroy();
    }
  }
}
