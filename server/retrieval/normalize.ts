import * as cheerio from 'cheerio';

/**
 * Markup/markdown to clean prose. `normalizeText` returns a fixpoint of its
 * cleaning pass, so `normalizeText(normalizeText(x))` equals `normalizeText(x)`.
 */

const MAX_DECODE_ROUNDS = 3;

const NAMED_ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  nbsp: '\u00a0',
  ndash: '–',
  mdash: '—',
  hellip: '…',
  lsquo: '‘',
  rsquo: '’',
  ldquo: '“',
  rdquo: '”',
  laquo: '«',
  raquo: '»',
  bull: '•',
  middot: '·',
  copy: '©',
  reg: '®',
  trade: '™',
  euro: '€',
  pound: '£',
  shy: '\u00ad',
  zwj: '\u200d',
  zwnj: '\u200c',
};

const ENTITY_PATTERN = /&(#\d{1,7}|#x[0-9a-f]{1,6}|[a-z]{2,8});/gi;

const fromCodePoint = (code: number): string | null =>
  Number.isInteger(code) && code > 0 && code <= 0x10ffff ? String.fromCodePoint(code) : null;

/** One decoding pass: each entity present in the input is decoded exactly once. */
export const decodeEntitiesOnce = (text: string): string =>
  text.replace(ENTITY_PATTERN, (match, body: string) => {
    if (body.startsWith('#x') || body.startsWith('#X')) {
      return fromCodePoint(Number.parseInt(body.slice(2), 16)) ?? match;
    }
    if (body.startsWith('#')) {
      return fromCodePoint(Number(body.slice(1))) ?? match;
    }
    return NAMED_ENTITIES[body.toLowerCase()] ?? match;
  });

/** Repeats decoding for double-encoded input; stops once a pass changes nothing. */
export const decodeEntities = (text: string, maxRounds = MAX_DECODE_ROUNDS): string => {
  let current = text;
  for (let round = 0; round < maxRounds; round += 1) {
    const next = decodeEntitiesOnce(current);
    if (next === current) break;
    current = next;
  }
  return current;
};

const BLOCK_TAGS = [
  'address', 'article', 'aside', 'blockquote', 'dd', 'div', 'dl', 'dt', 'figcaption', 'figure', 'footer',
  'form', 'h1', 'h2', 'h3', 'h4', 'h5', 'h6', 'header', 'li', 'main', 'nav', 'ol', 'p', 'pre', 'section',
  'table', 'td', 'th', 'title', 'tr', 'ul',
];

const DISCARDED_TAGS = 'script, style, noscript, template';

/** Regex fallback used when the parser cannot handle the input. */
export const stripMarkupByPattern = (html: string): string =>
  html
    .replace(/<(script|style|noscript|template)\b[\s\S]*?<\/\1\s*>/gi, ' ')
    .replace(/<!--[\s\S]*?-->/g, ' ')
    .replace(/<\/?[a-z][^>]*>/gi, ' ');

const stripMarkupWithParser = (html: string): string => {
  const $ = cheerio.load(html, null, false);
  $(DISCARDED_TAGS).remove();
  $('br, hr').replaceWith(' ');
  $(BLOCK_TAGS.join(',')).each((_, el) => {
    $(el).prepend(' ').append(' ');
  });
  return $.root().text();
};

export const stripMarkup = (html: string): string => {
  try {
    return stripMarkupWithParser(html);
  } catch {
    return stripMarkupByPattern(html);
  }
};

/** Sequences left behind when UTF-8 punctuation was read as Windows-1252. */
const MOJIBAKE_REPAIRS: ReadonlyArray<readonly [string, string]> = [
  ['â€™', '’'],
  ['â€˜', '‘'],
  ['â€œ', '“'],
  ['â€\u009d', '”'],
  ['â€“', '–'],
  ['â€”', '—'],
  ['â€¦', '…'],
  ['â€¢', '•'],
  ['Ã©', 'é'],
  ['Ã¨', 'è'],
  ['Ã¼', 'ü'],
  ['Ã¶', 'ö'],
  ['Ã¤', 'ä'],
  ['Â\u00a0', ' '],
  ['Â©', '©'],
  ['Â®', '®'],
];

export const repairMojibake = (text: string): string =>
  MOJIBAKE_REPAIRS.reduce((acc, [broken, fixed]) => acc.split(broken).join(fixed), text);

// zero-width, bidi embedding/override/isolate marks, BOM, soft hyphen, C0/C1 controls except whitespace
const INVISIBLE_CHARS = /[\u200b-\u200f\u202a-\u202e\u2060-\u2064\u2066-\u2069\ufeff\u00ad\u0000-\u0008\u000b\u000c\u000e-\u001f\u007f-\u009f]/g;

export const stripInvisible = (text: string): string => text.replace(INVISIBLE_CHARS, '');

// escaped "\n", "\t", "\r" that arrive as two literal characters
const LITERAL_ESCAPES = /\\[nrt]/g;

export const collapseWhitespace = (text: string): string =>
  text.replace(LITERAL_ESCAPES, ' ').replace(/\s+/g, ' ').trim();

const cleanOnce = (text: string): string => {
  const stripped = stripMarkup(decodeEntities(text));
  // second repair: dropping invisible characters can join a broken sequence
  return collapseWhitespace(repairMojibake(stripInvisible(repairMojibake(stripped))));
};

/**
 * Runs the cleaning pass until it stops changing the text. Parsing can surface
 * new entities or tags (`&<b></b>amp;` reads as `&amp;`), so one pass is not
 * always a fixpoint. A pass that changes clean text always shortens it, so the
 * loop ends within `text.length` passes.
 */
export const normalizeText = (raw: string | null | undefined): string => {
  if (!raw) return '';
  let current = cleanOnce(String(raw));
  for (let budget = current.length; budget > 0; budget -= 1) {
    const next = cleanOnce(current);
    if (next === current) break;
    current = next;
  }
  return current;
};
