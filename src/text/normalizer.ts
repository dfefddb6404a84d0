/**
 * Text normalization shared by training and inference.
 *
 * The feature space is built from normalized text, so any change here
 * invalidates every persisted model.
 */

/** Anything that is not a letter (with its combining marks), number, underscore or whitespace */
const NON_WORD = /[^\p{L}\p{M}\p{N}_\s]/gu;

const WHITESPACE_RUN = /\s+/g;

/**
 * Lowercase, replace punctuation and symbols with spaces, collapse
 * whitespace and trim.
 *
 * @example
 * ```ts
 * normalizeText('Pickup karna hai, Andheri se Powai!!');
 * // => 'pickup karna hai andheri se powai'
 * ```
 */
export function normalizeText(text: string): string {
  return text
    .toLowerCase()
    .replace(NON_WORD, ' ')
    .replace(WHITESPACE_RUN, ' ')
    .trim();
}
