import { open, rm } from "node:fs/promises";
import type { ReadableStream } from "node:stream/web";
import { PayloadTooLargeError } from "./errors.js";
import { createLogger } from "./logger.js";

const logger = createLogger("stream-to-file");

/**
 * Streams `source` into a new file at `filePath` (which must not exist yet).
 * Returns the number of bytes written. On any failure, including exceeding
 * `maxBytes`, the partial file is removed before the error propagates.
 */
export async function writeStreamToFile(
  source: ReadableStream<Uint8Array>,
  filePath: string,
  maxBytes: number,
): Promise<number> {
  const fileHandle = await open(filePath, "wx");
  const reader = source.getReader();
  let bytesWritten = 0;

  try {
    for (;;) {
      const { done, value } = await reader.read();
      if (done) break;

      bytesWritten += value.byteLength;
      if (bytesWritten > maxBytes) {
        throw new PayloadTooLargeError(maxBytes);
      }
      await fileHandle.write(value);
    }
  } catch (err) {
    await reader.cancel(err).catch((cancelErr: unknown) => {
      logger.debug(`stream cancel after failure raised: ${String(cancelErr)}`);
    });
    await fileHandle.close();
    await rm(filePath, { force: true });
    throw err;
  }

  reader.releaseLock();
  await fileHandle.close();
  return bytesWritten;
}
