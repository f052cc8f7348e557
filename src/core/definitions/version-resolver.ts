/**
 * Version Resolver
 *
 * Finds the definition version in effect at a timestamp.
 *
 * @module
 */

import type { Definition } from "./types.js";
import type { Timestamp } from "./timestamp.js";

/**
 * Index of the first version whose `since` is later than `at`
 */
function partitionPoint(versions: readonly Definition[], at: Timestamp): number {
  let low = 0;
  let high = versions.length;

  while (low < high) {
    const mid = (low + high) >>> 1;
    const version = versions[mid];
    if (version !== undefined && version.since <= at) {
      low = mid + 1;
    } else {
      high = mid;
    }
  }

  return low;
}

/**
 * Returns the last version with `since <= at`. When `at` predates every
 * version, the earliest one is returned.
 *
 * @param versions - non-empty, sorted ascending by `since`
 */
export function activeVersion(versions: readonly Definition[], at: Timestamp): Definition {
  const index = Math.max(partitionPoint(versions, at) - 1, 0);
  const version = versions[index];
  if (version === undefined) {
    throw new RangeError("activeVersion needs at least one definition version");
  }
  return version;
}
