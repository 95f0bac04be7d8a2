import { ResolutionError } from '../core/errors.js';

const SERVICE_NAME = 'PubMed eFetch';

const NAMED_ENTITIES = new Map<string, string>([
  ['amp', '&'],
  ['lt', '<'],
  ['gt', '>'],
  ['quot', '"'],
  ['apos', "'"]
]);

function decodeXmlEntities(s: string): string {
  return s.replace(/&(#x[0-9a-fA-F]+|#\d+|[a-zA-Z]+);/g, (match, entity: string) => {
    if (entity.startsWith('#x') || entity.startsWith('#X')) {
      return safeFromCodePoint(parseInt(entity.slice(2), 16)) ?? match;
    }
    if (entity.startsWith('#')) {
      return safeFromCodePoint(parseInt(entity.slice(1), 10)) ?? match;
    }
    return NAMED_ENTITIES.get(entity) ?? match;
  });
}

function safeFromCodePoint(codePoint: number): string | undefined {
  if (!Number.isInteger(codePoint) || codePoint < 0 || codePoint > 0x10ffff) return undefined;
  return String.fromCodePoint(codePoint);
}

function escapeXmlText(s: string): string {
  return s.replaceAll('&', '&amp;').replaceAll('<', '&lt;').replaceAll('>', '&gt;');
}

function elementBodies(xml: string, tag: string): string[] {
  const re = new RegExp(`<${tag}(?:\\s[^>]*)?>([\\s\\S]*?)<\\/${tag}>`, 'g');
  const out: string[] = [];
  let m: RegExpExecArray | null;
  while ((m = re.exec(xml))) out.push(m[1] ?? '');
  return out;
}

/**
 * Text nodes that are direct children of an element body, in document order.
 * Text inside nested markup (<i>, <sup>, MathML, ...) is not included.
 */
function directText(body: string): string {
  let s = body
    .replace(/<!--[\s\S]*?-->/g, '')
    .replace(/<\?[\s\S]*?\?>/g, '')
    .replace(/<!\[CDATA\[([\s\S]*?)\]\]>/g, (_match, cdata: string) => escapeXmlText(cdata));

  // innermost elements first so nesting unwinds one level per pass
  const innermost = /<([A-Za-z_][\w:.-]*)(?:\s[^>]*)?>[^<]*<\/\1>/g;
  const selfClosing = /<[A-Za-z_][^>]*\/>/g;
  let previous: string;
  do {
    previous = s;
    s = s.replace(selfClosing, '').replace(innermost, '');
  } while (s !== previous);

  return decodeXmlEntities(s.replace(/<[^>]*>/g, ''));
}

export function hasArticle(xml: string): boolean {
  return /<(?:PubmedArticle|PubmedBookArticle)[\s>]/.test(xml);
}

/**
 * Concatenated text of every AbstractText element in a PubMed XML record.
 */
export function extractAbstractText(xml: string): string {
  return elementBodies(xml, 'AbstractText').map(directText).join('');
}

/**
 * Extract the abstract of the article in an eFetch response.
 * Fails when the record is missing or has no abstract.
 */
export function extractAbstract(xml: string, pmid: string): string {
  if (!hasArticle(xml)) {
    throw new ResolutionError('not_found', `PMID ${pmid} was not found in PubMed`, { service: SERVICE_NAME });
  }

  const abstract = extractAbstractText(xml);
  if (abstract.trim().length === 0) {
    throw new ResolutionError('no_abstract', `PMID ${pmid} has no abstract`, { service: SERVICE_NAME });
  }

  return abstract;
}
