/**
 * Text normalization for alias comparison and bet parsing
 */

/**
 * Normalize an alias for lookup
 * - trim, lowercase
 * - drop apostrophes (straight and right single quote)
 * - hyphens are kept
 *
 * "  O'Neill's " -> "oneills"
 */
export function normalize(text: string): string {
  return text.trim().toLowerCase().replace(/[’']/g, '');
}

/**
 * Normalize raw bet text before recognition
 * - lowercase
 * - standalone "&" becomes "and"
 * - drop everything except letters, digits, whitespace, "." and "-"
 * - collapse whitespace
 *
 * "  Ajax & Lazio!!! " -> "ajax and lazio"
 */
export function fullyNormalize(input: string): string {
  let text = input.toLowerCase();
  text = text.replace(/(^|\s)&(?=\s|$)/g, '$1and');
  text = text.replace(/[^\p{L}\p{N}\s.-]/gu, '');
  return text.split(/\s+/).filter((w) => w.length > 0).join(' ');
}

/**
 * Strip leading/trailing non-word characters from a token
 */
export function cleanToken(token: string): string {
  return token.replace(/^[^\p{L}\p{N}_]+|[^\p{L}\p{N}_]+$/gu, '');
}

/**
 * Collapse runs of whitespace and trim
 */
export function collapseWhitespace(text: string): string {
  return text.split(/\s+/).filter((w) => w.length > 0).join(' ');
}

/**
 * Split into whitespace-separated tokens
 */
export function splitTokens(text: string): string[] {
  return text.split(/\s+/).filter((w) => w.length > 0);
}

/**
 * Prepare console input for parsing
 * - lowercase
 * - commas and ampersands become spaces
 * - collapse whitespace
 *
 * "Ajax, Lazio & Rangers" -> "ajax lazio rangers"
 */
export function preprocessInput(input: string): string {
  return collapseWhitespace(input.toLowerCase().replace(/,/g, ' ').replace(/&/g, ' '));
}

/**
 * Escape a string for use inside a RegExp
 */
export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Remove every whole-word occurrence of a phrase (case-insensitive)
 * Word boundaries are Unicode-aware so accented names are handled.
 */
export function removeWholeWord(text: string, phrase: string): string {
  if (!phrase) return text;
  const pattern = new RegExp(`(?<![\\p{L}\\p{N}_])${escapeRegExp(phrase)}(?![\\p{L}\\p{N}_])`, 'giu');
  return text.replace(pattern, '');
}
