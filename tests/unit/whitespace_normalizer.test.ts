import { collapseWhitespace, normalizeWhitespace } from '../../src/transform/whitespaceNormalizer';
import { ProtectedRegionStore } from '../../src/transform/protectedRegions';

describe('Unit: whitespace normalizer', () => {
  describe('collapseWhitespace', () => {
    it('removes indentation between tags', () => {
      const input = '<ul>\r\n  <li>One</li>\r\n  <li>Two</li>\r\n</ul>\n';
      expect(collapseWhitespace(input)).toBe('<ul><li>One</li><li>Two</li></ul>');
    });

    it('trims spaces just inside an element', () => {
      expect(collapseWhitespace('<p> Hello   world </p>')).toBe('<p>Hello world</p>');
    });

    it('keeps the space after a void element', () => {
      expect(collapseWhitespace('<p>line one<br> line two</p>')).toBe('<p>line one<br> line two</p>');
    });

    it('keeps spaces around inline elements inside text', () => {
      expect(collapseWhitespace('<p>Some <strong>bold</strong> text</p>')).toBe('<p>Some <strong>bold</strong> text</p>');
    });

    it('leaves non-breaking spaces alone', () => {
      expect(collapseWhitespace('<p>a\u00a0\u00a0b</p>')).toBe('<p>a\u00a0\u00a0b</p>');
    });
  });

  describe('normalizeWhitespace', () => {
    it('passes preformatted regions through byte for byte', () => {
      const input = '<div>\n  <p>Intro   text</p>\n  <pre class="code">echo "$1" \\1\n  indented  line\n</pre>\n</div>';

      expect(normalizeWhitespace(input)).toBe(
        '<div><p>Intro text</p><pre class="code">echo "$1" \\1\n  indented  line\n</pre></div>'
      );
    });

    it('does not expand replacement template sequences inside a region', () => {
      const input = "<pre>$& $$ $' $` $<name> \\0</pre>";
      expect(normalizeWhitespace(input)).toBe(input);
    });

    it('leaves placeholder-shaped text with an unknown token untouched', () => {
      const input = '<p><!--protected:0123456789abcdef0123456789abcdef--></p>';
      expect(normalizeWhitespace(input)).toBe(input);
    });

    it('does not rescan restored regions for placeholders', () => {
      const input = `<pre><!--protected:${'a'.repeat(32)}--></pre>`;
      expect(normalizeWhitespace(input)).toBe(input);
    });

    it('protects every region separately', () => {
      const store = new ProtectedRegionStore();
      const input = '<pre>a  b</pre>\n\n<pre>c\n d</pre>';

      expect(normalizeWhitespace(input, { store })).toBe('<pre>a  b</pre><pre>c\n d</pre>');
      expect(store.size).toBe(0);
    });

    it('is idempotent', () => {
      const input = '<div>\n  <p> Text </p>\n  <pre>x\n  y</pre>\n</div>';
      const once = normalizeWhitespace(input);
      expect(normalizeWhitespace(once)).toBe(once);
    });
  });
});
