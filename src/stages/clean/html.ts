/**
 * HTML Stripping
 *
 * Removes comments and tags from text, then decodes character references
 * (`&amp;`, `&#233;`, `&#x2019;`) in what remains.
 *
 * @module stages/clean/html
 */

/** `<!-- ... -->`, non-greedy so adjacent comments are removed separately */
const COMMENT_REGEX = /<!--[\s\S]*?-->/g;

/**
 * A tag: `<` followed by a letter, `/`, `!` or `?`, then anything up to the
 * first `>` that does not cross another `<`. Covers `<p class="x">`,
 * `</p>`, `<br/>`, `<!DOCTYPE html>` and `<?xml ...?>`.
 */
const TAG_REGEX = /<[a-z/!?][^<>]*>/gi;

/** A tag opener left behind once every complete tag is gone */
const TAG_OPENER_REGEX = /<[a-z/!?]/i;

/** Characters that turn a preceding `<` into a tag opener */
const TAG_START_REGEX = /^[a-z/!?]/i;

/** Decimal, hexadecimal or named reference; the semicolon is required */
const ENTITY_REGEX = /&(?:#(\d{1,7})|#[xX]([0-9a-fA-F]{1,6})|([a-zA-Z][a-zA-Z0-9]*));/g;

/** Text right after a `&` that would make it a reference again */
const ENTITY_TAIL_REGEX = /^(?:#\d{1,7}|#[xX][0-9a-fA-F]{1,6}|[a-zA-Z][a-zA-Z0-9]*);/;

const NAMED_ENTITIES: ReadonlyMap<string, string> = new Map([
  ['amp', '&'],
  ['lt', '<'],
  ['gt', '>'],
  ['quot', '"'],
  ['apos', "'"],
  ['nbsp', '\u00a0'],
  ['copy', '\u00a9'],
  ['reg', '\u00ae'],
  ['trade', '\u2122'],
  ['hellip', '\u2026'],
  ['ndash', '\u2013'],
  ['mdash', '\u2014'],
  ['lsquo', '\u2018'],
  ['rsquo', '\u2019'],
  ['ldquo', '\u201c'],
  ['rdquo', '\u201d'],
]);

/**
 * Raised for markup that cannot be stripped deterministically.
 */
export class MalformedMarkupError extends Error {
  constructor(
    message: string,
    /** Index of the offending `<` in the text being stripped */
    public readonly position: number
  ) {
    super(message);
    this.name = 'MalformedMarkupError';
  }
}

/**
 * Strip HTML comments and tags.
 *
 * Removal repeats until no tag remains, since removing one tag may expose
 * another (`<<b>i>` becomes `<i>`, then nothing).
 *
 * @throws MalformedMarkupError for an unterminated comment or tag
 *
 * @example
 * ```typescript
 * stripHtml('<p>Hello <b>world</b></p>'); // 'Hello world'
 * stripHtml('1 < 2');                      // '1 < 2'
 * stripHtml('<p>unclosed');                // ok: '<p>' is complete
 * stripHtml('text <a href="x"');           // throws
 * ```
 */
export function stripHtml(text: string): string {
  let current = text;

  for (;;) {
    const withoutComments = current.replace(COMMENT_REGEX, '');
    const openComment = withoutComments.indexOf('<!--');
    if (openComment !== -1) {
      throw new MalformedMarkupError('unterminated HTML comment', openComment);
    }

    const withoutTags = withoutComments.replace(TAG_REGEX, '');
    if (withoutTags === current) {
      break;
    }
    current = withoutTags;
  }

  const opener = current.search(TAG_OPENER_REGEX);
  if (opener !== -1) {
    throw new MalformedMarkupError(`unterminated HTML tag at position ${opener}`, opener);
  }

  return current;
}

function decodeReference(decimal?: string, hex?: string, name?: string): string | undefined {
  if (name !== undefined) {
    return NAMED_ENTITIES.get(name);
  }
  const codePoint = decimal !== undefined ? Number.parseInt(decimal, 10) : Number.parseInt(hex ?? '', 16);
  const isSurrogate = codePoint >= 0xd800 && codePoint <= 0xdfff;
  if (!Number.isInteger(codePoint) || codePoint === 0 || codePoint > 0x10ffff || isSurrogate) {
    return undefined;
  }
  return String.fromCodePoint(codePoint);
}

/**
 * Decode character references in one pass.
 *
 * Unknown names and invalid code points stay as written. A reference is
 * also kept when its decoded form would start a tag (`&lt;b&gt;`) or a new
 * reference (`&amp;lt;`), so decoding never exposes markup to strip.
 *
 * @example
 * ```typescript
 * decodeEntities('fish &amp; chips');   // 'fish & chips'
 * decodeEntities('1 &lt; 2');           // '1 < 2'
 * decodeEntities('&lt;b&gt;bold');      // '&lt;b>bold'
 * decodeEntities('&unknown; &#0;');     // '&unknown; &#0;'
 * ```
 */
export function decodeEntities(text: string): string {
  return text.replace(
    ENTITY_REGEX,
    (reference: string, decimal: string | undefined, hex: string | undefined, name: string | undefined, offset: number) => {
      const decoded = decodeReference(decimal, hex, name);
      if (decoded === undefined) {
        return reference;
      }
      const rest = text.slice(offset + reference.length);
      if ((decoded === '<' && TAG_START_REGEX.test(rest)) || (decoded === '&' && ENTITY_TAIL_REGEX.test(rest))) {
        return reference;
      }
      return decoded;
    }
  );
}

/**
 * Strip comments and tags, then decode references in the text left over.
 *
 * @throws MalformedMarkupError for an unterminated comment or tag
 */
export function stripMarkup(text: string): string {
  return decodeEntities(stripHtml(text));
}
