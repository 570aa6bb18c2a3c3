import type { IncomingMessage } from "node:http";
import { Buffer } from "node:buffer";

/** Default request body limit (1 MiB). */
export const MAX_BODY_BYTES = 1 << 20;

export class PayloadTooLargeError extends Error {
  readonly status = 413;

  constructor(readonly maxBytes: number) {
    super(`Payload exceeds ${maxBytes} bytes`);
    this.name = "PayloadTooLargeError";
  }
}

/**
 * Reads the request body as UTF-8 while enforcing an upper bound on the
 * number of bytes accepted. Once the limit is breached the remaining bytes
 * are drained and discarded so the response can still be written.
 *
 * @throws {PayloadTooLargeError} once the limit is breached.
 */
export function readTextBody(req: IncomingMessage, maxBytes = MAX_BODY_BYTES): Promise<string> {
  return new Promise<string>((resolve, reject) => {
    const buffers: Buffer[] = [];
    let totalBytes = 0;
    let overflowed = false;

    req.on("data", (chunk: Buffer | string) => {
      if (overflowed) {
        return;
      }
      const buffer = typeof chunk === "string" ? Buffer.from(chunk, "utf8") : chunk;
      totalBytes += buffer.length;
      if (totalBytes > maxBytes) {
        overflowed = true;
        buffers.length = 0;
        reject(new PayloadTooLargeError(maxBytes));
        return;
      }
      buffers.push(buffer);
    });
    req.once("end", () => {
      if (!overflowed) {
        resolve(Buffer.concat(buffers).toString("utf8"));
      }
    });
    req.once("error", reject);
  });
}
