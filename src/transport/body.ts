/**
 * Body Readers
 *
 * Pull-style readers over memory, generators and connections.
 */

import type { BodyReader, BufferGenerator } from './types.js';

export function readerFromMemory(data: Buffer): BodyReader {
  let done = false;
  return {
    length: data.length,
    read: async (): Promise<Buffer> => {
      if (done) {
        return Buffer.from('');
      } else {
        done = true;
        return data;
      }
    },
  };
}

export function readerFromGenerator(gen: BufferGenerator): BodyReader {
  return {
    length: -1,
    read: async (): Promise<Buffer> => {
      const r = await gen.next();
      if (r.done) {
        return Buffer.from(''); // EOF
      } else {
        return r.value;
      }
    },
  };
}

/**
 * Drain a reader into one buffer
 */
export async function readAll(reader: BodyReader): Promise<Buffer> {
  const chunks: Buffer[] = [];
  for (;;) {
    const data = await reader.read();
    if (data.length === 0) break;
    chunks.push(data);
  }
  await reader.close?.();
  return Buffer.concat(chunks);
}
