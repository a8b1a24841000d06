const NAMED_ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  nbsp: ' ',
  aelig: 'æ',
  oslash: 'ø',
  aring: 'å',
  AElig: 'Æ',
  Oslash: 'Ø',
  Aring: 'Å',
};

export function decodeHtmlEntities(value: string): string {
  return value
    .replace(/&#(\d+);/g, (match, code: string) => fromCodePoint(Number.parseInt(code, 10)) ?? match)
    .replace(/&#x([0-9a-fA-F]+);/g, (match, hex: string) => fromCodePoint(Number.parseInt(hex, 16)) ?? match)
    .replace(/&([a-zA-Z]+);/g, (match, name: string) => NAMED_ENTITIES[name] ?? NAMED_ENTITIES[name.toLowerCase()] ?? match);
}

function fromCodePoint(code: number): string | null {
  if (Number.isNaN(code)) {
    return null;
  }
  try {
    return String.fromCodePoint(code);
  } catch {
    return null;
  }
}

/**
 * Strips markup and entities from free text and collapses every whitespace
 * run (including newlines) into a single space.
 */
export function cleanText(value: string | null | undefined): string {
  if (!value) {
    return '';
  }

  const withoutTags = value.replace(/<[^>]+>/g, ' ');
  return decodeHtmlEntities(withoutTags).replace(/\s+/g, ' ').trim();
}

/**
 * Canonical tag spelling: upper case, runs of spaces, slashes and hyphens
 * become a single underscore ("Art / Design" -> "ART_DESIGN").
 */
export function toTagName(value: string): string {
  return value
    .trim()
    .replace(/[\s/-]+/g, '_')
    .replace(/_{2,}/g, '_')
    .replace(/^_+|_+$/g, '')
    .toUpperCase();
}
