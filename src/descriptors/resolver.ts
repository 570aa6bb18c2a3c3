import { fail, type Outcome } from "../bridge/errors.js";
import type { StructuredLogger } from "../logger.js";
import { describeError } from "../nodePrimitives.js";
import { parseStoredDescriptor, type Descriptor } from "./descriptor.js";
import type { DescriptorStore } from "./stores.js";

/** Server names accepted as store keys. */
const SERVER_NAME_PATTERN = /^[A-Za-z0-9._-]+$/;

export interface DescriptorResolver {
  resolve(name: string): Promise<Outcome<Descriptor>>;
}

export function isValidServerName(name: string): boolean {
  return SERVER_NAME_PATTERN.test(name) && name !== "." && name !== "..";
}

/**
 * Resolves descriptors from a {@link DescriptorStore} holding `<name>.json`
 * documents. Resolution is attempted once; failures are terminal.
 */
export class StoreDescriptorResolver implements DescriptorResolver {
  constructor(
    private readonly store: DescriptorStore,
    private readonly logger: StructuredLogger,
  ) {}

  async resolve(name: string): Promise<Outcome<Descriptor>> {
    if (!isValidServerName(name)) {
      return fail("NotFound", `No server named ${JSON.stringify(name)}`);
    }

    let raw: string | null;
    try {
      raw = await this.store.read(`${name}.json`);
    } catch (error) {
      this.logger.warn("descriptor_store_failed", { name, store: this.store.describe(), message: describeError(error) });
      return fail("StoreError", `Unable to read descriptor for ${name}: ${describeError(error)}`);
    }

    if (raw === null) {
      return fail("NotFound", `No server named ${name}`);
    }
    return parseStoredDescriptor(name, raw);
  }
}
