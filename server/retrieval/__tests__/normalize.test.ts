import { describe, expect, it } from 'vitest';
import { decodeEntities, normalizeText, stripMarkupByPattern } from '../normalize';

describe('normalizeText', () => {
  it('returns an empty string for absent input', () => {
    expect(normalizeText(null)).toBe('');
    expect(normalizeText(undefined)).toBe('');
    expect(normalizeText('')).toBe('');
  });

  it('decodes entities, strips markup and collapses whitespace', () => {
    expect(normalizeText('<p>Fish &amp; Chips</p><p>Tasty&nbsp;food</p>')).toBe('Fish & Chips Tasty food');
  });

  it('decodes double-encoded entities', () => {
    expect(normalizeText('Fish &amp;amp; Chips')).toBe('Fish & Chips');
  });

  it('drops script and style bodies', () => {
    expect(normalizeText('<div>Hello<script>var x = 1;</script><style>p{}</style> world</div>')).toBe('Hello world');
  });

  it('repairs mis-decoded punctuation', () => {
    expect(normalizeText('Itâ€™s here')).toBe('It’s here');
  });

  it('removes invisible characters', () => {
    expect(normalizeText('ze\u200bro\ufeff width')).toBe('zero width');
  });

  it('turns literal escape sequences into spaces', () => {
    expect(normalizeText('line\\nbreak\\ttab')).toBe('line break tab');
  });

  it('keeps cleaning until markup and entities stop surfacing', () => {
    expect(normalizeText('&<b></b>amp;lt;')).toBe('<');
    expect(normalizeText('&amp;amp;amp;amp;amp;')).toBe('&');
    expect(normalizeText('&amp;amp;amp;lt;b&amp;amp;amp;gt;x')).toBe('x');
    expect(normalizeText(`&${'amp;'.repeat(20)}`)).toBe('&');
  });

  it('is idempotent', () => {
    const samples = [
      '<h1>Title</h1>\n\n<p>Body &amp; more&hellip;</p>',
      'Itâ€™s   a\u200b test\\n',
      '  plain text  ',
      '<ul><li>One</li><li>Two</li></ul>',
      '&<b></b>amp;lt;',
      '&amp;amp;amp;amp;amp;',
      '&amp;amp;amp;lt;b&amp;amp;amp;gt;x',
      '&lt;p&gt;a&lt;/p&gt;&<i></i>lt;b&<i></i>gt;c',
      '<table><td>cell</td></table>&#x26;#x26;lt;',
    ];
    for (const sample of samples) {
      const once = normalizeText(sample);
      expect(normalizeText(once)).toBe(once);
    }
  });
});

describe('decodeEntities', () => {
  it('decodes numeric and hex references', () => {
    expect(decodeEntities('&#65;&#x42;')).toBe('AB');
  });

  it('leaves unknown entities alone', () => {
    expect(decodeEntities('&bogus;')).toBe('&bogus;');
  });
});

describe('stripMarkupByPattern', () => {
  it('removes tags and comments', () => {
    expect(stripMarkupByPattern('<b>bold</b><!-- note -->').trim()).toBe('bold');
  });
});
