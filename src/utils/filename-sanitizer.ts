/**
 * Reduce a text value to a portable filename component.
 *
 * - diacritics are transliterated (`é` -> `e`), any other non-ASCII is dropped
 * - path separators and characters Windows rejects become `_`
 * - control characters are removed, runs of whitespace collapse to one space
 * - leading dots and trailing spaces/dots are trimmed
 *
 * Returns `fallback` when nothing printable is left.
 */
export function sanitizeFilename(name: string, fallback = 'untitled'): string {
  const result = name
    .normalize('NFKD')
    .replace(/\p{M}/gu, '')
    // biome-ignore lint/suspicious/noControlCharactersInRegex: Needed to strip control characters
    .replace(/[\x00-\x1F\x7F]/g, '')
    .replace(/[^\x20-\x7E]/g, '')
    // Replace Windows illegal characters: < > : " / \ | ? *
    .replace(/[<>:"/\\|?*]/g, '_')
    .replace(/\s+/g, ' ')
    .replace(/^[\s.]+/, '')
    .replace(/[\s.]+$/, '');

  return result.length > 0 ? result : fallback;
}
