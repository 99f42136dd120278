/**
 * Text Sanitization Utilities
 * Ensures vendor text is safe for XML inclusion
 */

/**
 * Sanitize text for XML
 * - Remove control characters (except tab, newline, carriage return)
 * - Normalize Unicode
 * - XML entities are handled by fast-xml-parser automatically
 */
export function sanitizeText(text: string | null | undefined): string {
  if (!text) {
    return '';
  }

  // Persian text arrives in mixed normalization forms
  let sanitized = text.normalize('NFC');

  // eslint-disable-next-line no-control-regex
  sanitized = sanitized.replace(/[\x00-\x08\x0B\x0C\x0E-\x1F\x7F-\x9F]/g, '');

  return sanitized.trim();
}

/**
 * Turn an HTML fragment into plain text
 * <br> becomes a line break, every other tag is dropped.
 */
export function stripMarkup(html: string): string {
  if (!html) {
    return '';
  }

  const text = html
    .trim()
    .replace(/<br\s*\/?>/gi, '\n')
    .replace(/<[^>]+>/g, '');

  return sanitizeText(text);
}
