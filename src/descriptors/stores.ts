import { readFile } from "node:fs/promises";
import path from "node:path";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

import { hasErrnoCode } from "../nodePrimitives.js";

/**
 * Raw key/value access to descriptor documents. `read` resolves to `null`
 * when the key is absent and rejects on any other failure.
 */
export interface DescriptorStore {
  read(key: string): Promise<string | null>;
  /** Human-readable location used in logs. */
  describe(): string;
}

/** Directory of `<name>.json` files. */
export class FileDescriptorStore implements DescriptorStore {
  private readonly directory: string;

  constructor(directory: string) {
    this.directory = path.resolve(directory);
  }

  async read(key: string): Promise<string | null> {
    try {
      return await readFile(path.join(this.directory, key), "utf8");
    } catch (error) {
      if (hasErrnoCode(error, "ENOENT")) {
        return null;
      }
      throw error;
    }
  }

  describe(): string {
    return this.directory;
  }
}

export class DescriptorStoreHttpError extends Error {
  readonly status: number;

  constructor(status: number, url: string) {
    super(`Descriptor store answered ${status} for ${url}`);
    this.name = "DescriptorStoreHttpError";
    this.status = status;
  }
}

export interface HttpDescriptorStoreOptions {
  readonly baseUrl: string;
  readonly fetchImpl?: typeof fetch;
  readonly timeoutMs?: number;
}

/** Object store reachable over HTTP (`GET <baseUrl>/<key>`). */
export class HttpDescriptorStore implements DescriptorStore {
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;
  private readonly timeoutMs: number;

  constructor(options: HttpDescriptorStoreOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.timeoutMs = options.timeoutMs ?? 10_000;
  }

  async read(key: string): Promise<string | null> {
    const url = `${this.baseUrl}/${encodeURIComponent(key)}`;
    const response = await this.fetchImpl(url, {
      headers: { accept: "application/json" },
      signal: AbortSignal.timeout(this.timeoutMs),
    });
    if (response.status === 404) {
      return null;
    }
    if (!response.ok) {
      throw new DescriptorStoreHttpError(response.status, url);
    }
    return response.text();
  }

  describe(): string {
    return this.baseUrl;
  }
}
