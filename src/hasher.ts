import { createReadStream } from 'node:fs';
import { createHash } from 'node:crypto';
import { pipeline } from 'node:stream/promises';

export const DEFAULT_CHUNK_SIZE = 4096;

// Fixed-size chunks; the file is never buffered whole.
export async function hashFile(path: string, chunkSize: number = DEFAULT_CHUNK_SIZE): Promise<string> {
  const hash = createHash('sha256');

  await pipeline(
    createReadStream(path, { highWaterMark: chunkSize }),
    async (source: AsyncIterable<Buffer>) => {
      for await (const chunk of source) {
        hash.update(chunk);
      }
    }
  );

  return hash.digest('hex');
}
