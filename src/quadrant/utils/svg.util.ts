const XML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

// control characters XML 1.0 does not allow, even as references
const XML_INVALID_RE = /[\u0000-\u0008\u000B\u000C\u000E-\u001F]/g;

export function escapeXml(value: string): string {
  return value
    .replace(XML_INVALID_RE, '')
    .replace(/[&<>"']/g, (char) => XML_ESCAPES[char] ?? char);
}

/** Fixed two-decimal coordinates without trailing zeros. */
export function fmt(value: number): string {
  const rounded = Number(value.toFixed(2));
  return String(rounded === 0 ? 0 : rounded);
}

export function attrs(values: Record<string, string | number>): string {
  return Object.entries(values)
    .map(([key, value]) =>
      typeof value === 'number'
        ? `${key}="${fmt(value)}"`
        : `${key}="${escapeXml(value)}"`,
    )
    .join(' ');
}

/** Serializes one element; `text` is escaped, a missing `text` self-closes. */
export function element(
  name: string,
  values: Record<string, string | number>,
  text?: string,
): string {
  const open = `<${name} ${attrs(values)}`;
  return text == null ? `${open}/>` : `${open}>${escapeXml(text)}</${name}>`;
}
