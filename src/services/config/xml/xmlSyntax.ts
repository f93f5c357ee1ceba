export const DEFAULT_ROOT_ELEMENT = 'prefs';

const NAME_PATTERN = /^[^\s<>/=&"'!?]+$/;

const ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&apos;'
};

const NAMED_ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'"
};

export function isValidElementName(name: string): boolean {
  return NAME_PATTERN.test(name);
}

export function escapeXml(text: string): string {
  return text.replace(/[&<>"']/g, character => ESCAPES[character]);
}

/**
 * Resolves one entity body (the part between `&` and `;`).
 * Returns undefined for unknown entities.
 */
export function resolveEntity(entity: string): string | undefined {
  if (entity.startsWith('#x') || entity.startsWith('#X')) {
    return fromCodePoint(entity.slice(2), 16);
  }
  if (entity.startsWith('#')) {
    return fromCodePoint(entity.slice(1), 10);
  }
  return Object.prototype.hasOwnProperty.call(NAMED_ENTITIES, entity) ? NAMED_ENTITIES[entity] : undefined;
}

function fromCodePoint(digits: string, radix: 10 | 16): string | undefined {
  const valid = radix === 16 ? /^[0-9a-fA-F]+$/ : /^[0-9]+$/;
  if (!valid.test(digits)) {
    return undefined;
  }
  const codePoint = parseInt(digits, radix);
  if (codePoint > 0x10ffff) {
    return undefined;
  }
  return String.fromCodePoint(codePoint);
}
