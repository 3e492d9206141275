// ─── Minimal XML helpers for OOXML parts ─────────────────
// Parts are handled as strings: regexes locate elements, and edits splice
// the original text so everything the code does not touch is kept as is.

export function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

export function unescapeXml(text: string): string {
  return text
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&quot;/g, '"')
    .replace(/&apos;/g, "'")
    .replace(/&#x([0-9a-fA-F]+);/g, (_, hex: string) => String.fromCodePoint(parseInt(hex, 16)))
    .replace(/&#(\d+);/g, (_, dec: string) => String.fromCodePoint(Number(dec)))
    .replace(/&amp;/g, '&');
}

/** Attribute value from a start tag, unescaped. */
export function attr(tag: string, name: string): string | undefined {
  const m = new RegExp(`\\s${name.replace(':', '\\:')}="([^"]*)"`).exec(tag);
  return m ? unescapeXml(m[1]) : undefined;
}

/** Set (or add) an attribute on a start tag. */
export function setAttr(tag: string, name: string, value: string): string {
  const re = new RegExp(`(\\s${name}=)"[^"]*"`);
  if (re.test(tag)) return tag.replace(re, `$1"${escapeXml(value)}"`);
  return tag.replace(/^(<[\w:]+)/, `$1 ${name}="${escapeXml(value)}"`);
}

/**
 * First `<name …/>` or `<name …>…</name>` element. Elements of the same name
 * must not nest (true for every element this is used on).
 */
export function firstElement(xml: string, name: string): string | undefined {
  const re = new RegExp(`<${name}(?=[\\s/>])[^>]*?(?:/>|>[\\s\\S]*?</${name}>)`);
  return re.exec(xml)?.[0];
}

export function allElements(xml: string, name: string): string[] {
  const re = new RegExp(`<${name}(?=[\\s/>])[^>]*?(?:/>|>[\\s\\S]*?</${name}>)`, 'g');
  return xml.match(re) ?? [];
}

/** Start tag of an element string. */
export function startTag(element: string): string {
  const end = element.indexOf('>');
  return end === -1 ? element : element.slice(0, end + 1);
}

/** Concatenated `<a:t>` text of a fragment; `<a:br/>` becomes "\n". */
export function runText(fragment: string): string {
  let out = '';
  const re = /<a:t(?:\s[^>]*)?>([\s\S]*?)<\/a:t>|<a:t\/>|<a:br\b[^>]*?(?:\/>|>[\s\S]*?<\/a:br>)/g;
  let m: RegExpExecArray | null;
  while ((m = re.exec(fragment)) !== null) {
    if (m[0].startsWith('<a:br')) out += '\n';
    else out += unescapeXml(m[1] ?? '');
  }
  return out;
}
