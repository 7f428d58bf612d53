/**
 * Port Discovery Module
 * Re-exports all discovery components
 */

export * from "./interface";
export * from "./host";
export * from "./mock";
export * from "./select";

import type { PortEnumerator } from "./interface";
import { HostEnumerator, type HostEnumeratorOptions } from "./host";

/**
 * Create default enumerator for current platform
 */
export function createEnumerator(options?: HostEnumeratorOptions): PortEnumerator {
  return new HostEnumerator(options);
}
