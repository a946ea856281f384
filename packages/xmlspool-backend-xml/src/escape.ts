/**
 * Escaping for XML text output
 */

const TEXT_ENTITIES: Record<string, string> = {
  '<': '&lt;',
  '>': '&gt;',
  '&': '&amp;',
};

/**
 * Attribute values also escape quotes and the whitespace characters that
 * attribute value normalization would otherwise turn into spaces.
 */
const ATTR_ENTITIES: Record<string, string> = {
  '<': '&lt;',
  '>': '&gt;',
  '&': '&amp;',
  '"': '&quot;',
  '\t': '&#9;',
  '\n': '&#10;',
  '\r': '&#13;',
};

const TEXT_RE = /[<>&]/g;
const ATTR_RE = /[<>&"\t\n\r]/g;

export function escapeText(text: string): string {
  return text.replace(TEXT_RE, (ch) => TEXT_ENTITIES[ch] ?? ch);
}

export function escapeAttribute(value: string): string {
  return value.replace(ATTR_RE, (ch) => ATTR_ENTITIES[ch] ?? ch);
}

/**
 * Body of a CDATA section. `]]>` can not occur inside one section, so the
 * text is split across two sections at each occurrence.
 *
 * @example
 * cdataBody('a ]]> b'); // 'a ]]]]><![CDATA[> b'
 */
export function cdataBody(text: string): string {
  return text.split(']]>').join(']]]]><![CDATA[>');
}

/**
 * Qualified name from a prefix (empty for none) and a local name
 */
export function qualifiedName(prefix: string, localName: string): string {
  return prefix ? `${prefix}:${localName}` : localName;
}
