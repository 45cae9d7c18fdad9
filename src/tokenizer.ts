const NON_ALPHANUMERIC = /[^a-z0-9\s]/g;

/** Tokens shorter than this are dropped */
export const MIN_TOKEN_LENGTH = 2;

/**
 * Split text into lowercase word-vector lookup keys.
 *
 * Anything outside `[a-z0-9]` becomes a separator. Order and duplicates are
 * kept, so a repeated word weighs more in an average.
 *
 * @example
 * ```typescript
 * tokenize('Git-Log v2!!'); // ['git', 'log', 'v2']
 * ```
 */
export function tokenize(text: string): string[] {
  if (!text) {
    return [];
  }

  return text
    .toLowerCase()
    .replace(NON_ALPHANUMERIC, ' ')
    .split(/\s+/)
    .filter((token) => token.length >= MIN_TOKEN_LENGTH);
}
