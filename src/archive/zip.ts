import { open } from 'node:fs/promises';
import type { FileHandle } from 'node:fs/promises';
import { configure, TextReader, ZipWriter } from '@zip.js/zip.js';

// Node has no web workers for zip.js to hand compression to.
configure({ useWebWorkers: false });

const READ_CHUNK_SIZE = 64 * 1024;

function readableFile(file: FileHandle): ReadableStream<Uint8Array> {
  return new ReadableStream<Uint8Array>({
    pull: async (controller) => {
      const chunk = new Uint8Array(READ_CHUNK_SIZE);
      const { bytesRead } = await file.read(chunk, 0, READ_CHUNK_SIZE, null);
      if (bytesRead === 0) {
        controller.close();
        return;
      }
      controller.enqueue(chunk.subarray(0, bytesRead));
    },
  });
}

/**
 * Writes a zip archive entry by entry, streaming the compressed output straight into the target
 * file. Entries keep the order in which they are added.
 */
export class ZipArchiveWriter {
  private readonly file: FileHandle;
  private readonly writer: ZipWriter<unknown>;
  private entryCount = 0;

  private constructor(file: FileHandle) {
    this.file = file;
    const target = new WritableStream<Uint8Array>({
      write: async (chunk) => {
        await file.write(chunk);
      },
    });
    this.writer = new ZipWriter(target);
  }

  /** Creates (or truncates) `outputPath`. */
  static async create(outputPath: string): Promise<ZipArchiveWriter> {
    return new ZipArchiveWriter(await open(outputPath, 'w'));
  }

  get entries(): number {
    return this.entryCount;
  }

  /** Streams a file from disk into `entryName`, stamped with the source's modification time. */
  async addFile(entryName: string, sourcePath: string): Promise<void> {
    const source = await open(sourcePath, 'r');
    try {
      const info = await source.stat();
      await this.writer.add(entryName, readableFile(source), { lastModDate: info.mtime });
    } finally {
      await source.close();
    }
    this.entryCount++;
  }

  async addText(entryName: string, text: string): Promise<void> {
    await this.writer.add(entryName, new TextReader(text));
    this.entryCount++;
  }

  async close(): Promise<void> {
    try {
      await this.writer.close();
    } finally {
      await this.file.close();
    }
  }

  /** Closes the file without finishing the archive, leaving whatever was written so far. */
  async abort(): Promise<void> {
    await this.file.close();
  }
}
