/**
 * UUID Utility
 * Time-ordered identifiers for utterances and connections
 */

import { v7 as uuidv7 } from 'uuid';

/**
 * Generate a UUID v7 (time-ordered, sortable)
 */
export function generateId(): string {
  return uuidv7();
}
