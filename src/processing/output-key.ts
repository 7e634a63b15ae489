import { posix } from 'node:path';

export const OUTPUT_EXTENSION = '.csv';

/**
 * Output key for an input key: the base name with its extension
 * replaced, at the root of the output bucket.
 *
 * @example
 * deriveOutputKey('incoming/2024/bundle-01.json'); // 'bundle-01.csv'
 */
export function deriveOutputKey(inputKey: string): string {
  const baseName = posix.basename(inputKey);
  const extension = posix.extname(baseName);
  const stem = extension ? baseName.slice(0, -extension.length) : baseName;
  return `${stem}${OUTPUT_EXTENSION}`;
}
