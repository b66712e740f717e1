import { SHORT_HASH_LENGTH } from '@/utils/constants';

/**
 * Removes trailing characters from a string without using regex.
 *
 * This function iteratively checks each character from the end of the string
 * and removes any consecutive characters that match the specified characters to remove.
 *
 * @param {string} input - The string to process
 * @param {string[]} charactersToRemove - Array of characters to remove from the end
 * @returns {string} The input string with all trailing specified characters removed
 *
 * @example
 * // Returns "owner/repo"
 * removeTrailingCharacters("owner/repo//", ["/"])
 */
export function removeTrailingCharacters(input: string, charactersToRemove: string[]): string {
  let endIndex = input.length;
  while (endIndex > 0 && charactersToRemove.includes(input[endIndex - 1])) {
    endIndex--;
  }

  return input.slice(0, endIndex);
}

/**
 * Abbreviates a full commit id to its first seven characters.
 *
 * @example
 * // Returns "3f2a9c1"
 * shortHash("3f2a9c1d8e7b6a5f4e3d2c1b0a9f8e7d6c5b4a3f")
 */
export function shortHash(commitId: string): string {
  return commitId.slice(0, SHORT_HASH_LENGTH);
}

/**
 * Joins words into an English enumeration with a serial comma.
 *
 * @example
 * formatList(['Ada'])                 // "Ada"
 * formatList(['Ada', 'Linus'])        // "Ada and Linus"
 * formatList(['Ada', 'Linus', 'Grace']) // "Ada, Linus, and Grace"
 */
export function formatList(items: readonly string[]): string {
  if (items.length <= 1) {
    return items.join('');
  }
  if (items.length === 2) {
    return `${items[0]} and ${items[1]}`;
  }

  return `${items.slice(0, -1).join(', ')}, and ${items[items.length - 1]}`;
}
