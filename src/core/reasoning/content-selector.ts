/**
 * Content Selector
 *
 * Builds the text digest handed to a reasoning engine from the
 * highest-priority files of a snapshot.
 */

import type { RepositorySnapshot } from '../../types/index.js';

export const DEFAULT_CONTENT_LENGTH = 10000;

/**
 * Concatenate file contents in priority order, blank-line separated.
 * File content (separators excluded) never exceeds `maxLength` characters;
 * the file that would cross the budget is truncated and ends the digest.
 */
export function selectContent(snapshot: RepositorySnapshot, maxLength = DEFAULT_CONTENT_LENGTH): string {
  const parts: string[] = [];
  let total = 0;

  for (const file of snapshot.files) {
    if (total + file.content.length > maxLength) {
      const remaining = maxLength - total;
      if (remaining > 0) {
        parts.push(file.content.slice(0, remaining));
      }
      break;
    }
    parts.push(file.content);
    total += file.content.length;
  }

  return parts.join('\n\n');
}
