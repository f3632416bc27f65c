import { createMacroRules, flattenParagraphs, formatConversionDate } from '../../src/transform/macroRules';
import { findUnconvertedMacros, rewriteMacros } from '../../src/transform/macroRewriter';
import { normalizeWhitespace } from '../../src/transform/whitespaceNormalizer';
import { EXPAND_BLOCK, INFO_CALLOUT } from '../fixtures/exportPages';

describe('Unit: macro rewriter', () => {
  const rules = createMacroRules({ conversionDate: new Date('2026-10-18T12:00:00Z') });
  const rewrite = (html: string) => rewriteMacros(html, rules).html;

  describe('rule table', () => {
    it('is frozen and ordered', () => {
      expect(Object.isFrozen(rules)).toBe(true);
      expect(rules.map(rule => rule.name)).toEqual([
        'callout',
        'expand',
        'embeddedImage',
        'checkboxUnchecked',
        'checkboxChecked',
        'breadcrumbs',
        'pageMetadata',
        'codeLanguage',
        'attachmentsSection',
        'exportFooter',
        'tocOutline',
      ]);
    });

    it('passes unrecognized markup through unchanged', () => {
      const result = rewriteMacros('<p>Plain <em>text</em></p>', rules);
      expect(result).toEqual({ html: '<p>Plain <em>text</em></p>', applied: {} });
    });
  });

  describe('callouts', () => {
    it('turns an information macro into an info callout', () => {
      const result = rewriteMacros(normalizeWhitespace(INFO_CALLOUT), rules);

      expect(result.html).toBe('<p class="callout callout-info">Hello<br>World<br></p>');
      expect(result.applied).toEqual({ callout: 1 });
    });

    it('wraps sequential callouts independently', () => {
      const first = INFO_CALLOUT.replace('<p>Hello</p><p>World</p>', '<p>First</p>');
      const second = INFO_CALLOUT.replace('<p>Hello</p><p>World</p>', '<p>Second</p>');
      const result = rewriteMacros(first + second, rules);

      expect(result.html).toBe(
        '<p class="callout callout-info">First<br></p><p class="callout callout-info">Second<br></p>'
      );
      expect(result.applied.callout).toBe(2);
    });

    it('maps note macros with extra classes to the warning style', () => {
      const html =
        '<div class="confluence-information-macro confluence-information-macro-note conf-macro output-block" data-macro-name="note">' +
        '<span class="aui-icon aui-icon-small aui-iconfont-warning confluence-information-macro-icon"></span>' +
        '<div class="confluence-information-macro-body"><p>Careful</p></div></div>';

      expect(rewrite(html)).toBe('<p class="callout callout-warning">Careful<br></p>');
    });

    it('keeps a callout title as a bold first line', () => {
      const html =
        '<div class="confluence-information-macro has-title confluence-information-macro-tip">' +
        '<p class="title">Pro tip</p>' +
        '<span class="aui-icon aui-icon-small aui-iconfont-approve confluence-information-macro-icon"></span>' +
        '<div class="confluence-information-macro-body"><p>Use shortcuts</p></div></div>';

      expect(rewrite(html)).toBe('<p class="callout callout-success"><strong>Pro tip</strong><br>Use shortcuts<br></p>');
    });

    it('converts nested callouts innermost first', () => {
      const inner = INFO_CALLOUT.replace('<p>Hello</p><p>World</p>', '<p>Inner</p>');
      const outer = INFO_CALLOUT.replace('<p>Hello</p><p>World</p>', `<p>Outer</p>${inner}`);
      const result = rewriteMacros(outer, rules);

      expect(result.html).toBe(
        '<p class="callout callout-info">Outer<br></p><p class="callout callout-info">Inner<br></p>'
      );
      expect(result.applied.callout).toBe(2);
    });

    it('keeps a note nested in an info callout as its own box', () => {
      const note =
        '<div class="confluence-information-macro confluence-information-macro-note">' +
        '<span class="aui-icon aui-icon-small aui-iconfont-warning confluence-information-macro-icon"></span>' +
        '<div class="confluence-information-macro-body"><p>Inner</p></div></div>';
      const html = INFO_CALLOUT.replace('<p>Hello</p><p>World</p>', `<p>Outer</p>${note}<p>After</p>`);

      const result = rewriteMacros(html, rules);

      expect(result.html).toBe(
        '<p class="callout callout-info">Outer<br></p>' +
        '<p class="callout callout-warning">Inner<br></p>' +
        '<p class="callout callout-info">After<br></p>'
      );
      expect(result.applied).toEqual({ callout: 2 });
      expect(findUnconvertedMacros(result.html)).toEqual([]);
    });

    it('keeps the title on the first box when a callout wraps another', () => {
      const inner = INFO_CALLOUT.replace('<p>Hello</p><p>World</p>', '<p>Inner</p>');
      const html =
        '<div class="confluence-information-macro has-title confluence-information-macro-warning">' +
        '<p class="title">Heads up</p>' +
        `<div class="confluence-information-macro-body">${inner}</div></div>`;

      expect(rewrite(html)).toBe(
        '<p class="callout callout-danger"><strong>Heads up</strong><br></p>' +
        '<p class="callout callout-info">Inner<br></p>'
      );
    });

    it('keeps nested divs inside the body', () => {
      const html = INFO_CALLOUT.replace('<p>Hello</p><p>World</p>', '<div class="table-wrap"><table></table></div>');
      expect(rewrite(html)).toBe('<p class="callout callout-info"><div class="table-wrap"><table></table></div></p>');
    });

    it('leaves an unclosed callout for the unconverted report', () => {
      const html =
        '<div class="confluence-information-macro confluence-information-macro-information">' +
        '<div class="confluence-information-macro-body"><p>Never closed</p>';

      expect(rewrite(html)).toBe(html);
      expect(findUnconvertedMacros(html)).toEqual([
        {
          construct: 'callout',
          excerpt: '<div class="confluence-information-macro confluence-information-macro-information">',
        },
      ]);
    });
  });

  describe('expand sections', () => {
    it('becomes a details element', () => {
      expect(rewrite(EXPAND_BLOCK)).toBe(
        '<details><summary>Click here to expand...</summary>' +
        '<p>Hidden</p><div class="table-wrap"><table><tbody><tr><td>1</td></tr></tbody></table></div>' +
        '</details>'
      );
    });

    it('requires matching expander ids', () => {
      const html = EXPAND_BLOCK.replace('expander-content-1446186562', 'expander-content-99');

      expect(rewrite(html)).toBe(html);
      expect(findUnconvertedMacros(html).map(m => m.construct)).toEqual(['expand']);
    });
  });

  describe('embedded images', () => {
    it('leaves a placeholder with the image size', () => {
      const html =
        '<p><span class="confluence-embedded-file-wrapper confluence-embedded-manual-size">' +
        '<img class="confluence-embedded-image" height="100" width="200" src="img/diagram.png" data-image-src="img/diagram.png">' +
        '</span></p>';

      expect(rewrite(html)).toBe('<p><!--inline-image src="img/diagram.png" height="100" width="200"--></p>');
    });

    it('leaves size attributes empty when the export has none', () => {
      const html =
        '<span class="confluence-embedded-file-wrapper"><img class="confluence-embedded-image" src="attachments/1/2.png"></span>';

      expect(rewrite(html)).toBe('<!--inline-image src="attachments/1/2.png" height="" width=""-->');
    });

    it('does not count a wrapper whose image has no source', () => {
      const html = '<span class="confluence-embedded-file-wrapper"><img class="confluence-embedded-image"></span>';
      const result = rewriteMacros(html, rules);

      expect(result).toEqual({ html, applied: {} });
      expect(findUnconvertedMacros(result.html)).toEqual([
        { construct: 'embeddedImage', excerpt: '<span class="confluence-embedded-file-wrapper">' },
      ]);
    });

    it('reports an image placeholder that was never inlined', () => {
      expect(findUnconvertedMacros('<p><!--inline-image src="a.png" height="" width=""--></p>')).toEqual([
        { construct: 'imagePlaceholder', excerpt: '<!--inline-image src="a.png" height="" width=""-->' },
      ]);
    });
  });

  describe('checkboxes', () => {
    it('replaces task emoticons and keeps other emoticons', () => {
      const smile =
        '<img class="emoticon emoticon-smile" data-emoji-id="1f642" src="images/icons/emoticons/smile.svg" alt="(smile)">';
      const html =
        '<p><img class="emoticon emoticon-blue-star" data-emoji-id="atlassian-checkbox_unchecked" src="images/icons/emoticons/check.png" alt="(unchecked)"> Todo ' +
        `<img class="emoticon" data-emoji-id="atlassian-checkbox_checked" src="x.png"> Done ${smile}</p>`;

      const result = rewriteMacros(html, rules);

      expect(result.html).toBe(`<p>☐ Todo ☑ Done ${smile}</p>`);
      expect(result.applied).toEqual({ checkboxUnchecked: 1, checkboxChecked: 1 });
    });

    it('uses configured emoji ids', () => {
      const custom = createMacroRules({ checkboxEmoji: { unchecked: 'box-empty', checked: 'box-ticked' } });
      const html = '<img data-emoji-id="box-empty" src="a.png"><img data-emoji-id="atlassian-checkbox_checked" src="b.png">';

      expect(rewriteMacros(html, custom).html).toBe('☐<img data-emoji-id="atlassian-checkbox_checked" src="b.png">');
    });
  });

  describe('export chrome', () => {
    it('removes breadcrumbs, the attachments section and the footer', () => {
      const html =
        '<div id="main-header"><div id="breadcrumb-section"><ol id="breadcrumbs">' +
        '<li class="first"><span><a href="index.html">Engineering</a></span></li>' +
        '<li><span><a href="Home_65537.html">Home</a></span></li></ol></div>' +
        '<h1 id="title-heading" class="pagetitle"><span id="title-text">Engineering : Release Notes</span></h1></div>' +
        '<div id="content" class="view"><div id="main-content" class="wiki-content group"><p>Body</p></div>' +
        '<div class="pageSection group"><div class="pageSectionHeader"><h2 id="attachments" class="pageSectionTitle">Attachments:</h2></div>' +
        '<div class="greybox" align="left"><img src="images/icons/bullet_blue.gif" height="8" width="8" alt="">' +
        '<a href="attachments/65540/65541.png">diagram.png</a> (image/png)<br></div></div></div>' +
        '<div id="footer" role="contentinfo"><section class="footer-body">' +
        '<p>Document generated by Confluence on Oct 01, 2026 09:30</p>' +
        '<div id="footer-logo"><a href="http://www.atlassian.com/">Atlassian</a></div></section></div>';

      const result = rewriteMacros(html, rules);

      expect(result.html).toBe(
        '<div id="main-header"><h1 id="title-heading" class="pagetitle"><span id="title-text">Engineering : Release Notes</span></h1></div>' +
        '<div id="content" class="view"><div id="main-content" class="wiki-content group"><p>Body</p></div></div>'
      );
      expect(result.applied).toEqual({ breadcrumbs: 1, attachmentsSection: 1, exportFooter: 1 });
    });

    it('reports an attachments section or footer in an unexpected shape', () => {
      const html =
        '<div class="pageSection group"><div class="pageSectionHeader"><h2 id="attachments" class="pageSectionTitle">Attachments:</h2></div></div>' +
        '<div id="footer" role="contentinfo"><p>Document generated by Confluence on Oct 01, 2026 09:30</p></div>';

      expect(rewrite(html)).toBe(html);
      expect(findUnconvertedMacros(html)).toEqual([
        { construct: 'attachmentsSection', excerpt: '<h2 id="attachments" class="pageSectionTitle">' },
        { construct: 'exportFooter', excerpt: '<div id="footer" role="contentinfo">' },
      ]);
    });
  });

  describe('page metadata', () => {
    it('becomes an info callout with the conversion date', () => {
      const html =
        "<div class=\"page-metadata\">Created by <span class='author'>Jane Roe</span>, " +
        "last modified by <span class='editor'>John Doe</span> on Mar 03, 2021</div>";

      expect(rewrite(html)).toBe(
        '<p class="callout callout-info">Converted from Confluence on 2026-10-18. ' +
        'Originally created by Jane Roe, last modified by John Doe on Mar 03, 2021.</p>'
      );
    });

    it('omits the editor when the author made the last change', () => {
      const html = "<div class=\"page-metadata\">Created by <span class='author'>Jane Roe</span>, last modified on Jan 05, 2021</div>";

      expect(rewrite(html)).toBe(
        '<p class="callout callout-info">Converted from Confluence on 2026-10-18. ' +
        'Originally created by Jane Roe, last modified on Jan 05, 2021.</p>'
      );
    });

    it('reports a metadata line it cannot parse', () => {
      const html = '<div class="page-metadata">Created by Jane Roe, last modified on Jan 05, 2021</div>';

      expect(rewrite(html)).toBe(html);
      expect(findUnconvertedMacros(html)).toEqual([{ construct: 'pageMetadata', excerpt: '<div class="page-metadata">' }]);
    });

    it('formats the conversion date as an ISO day', () => {
      expect(formatConversionDate(new Date('2026-10-18T23:00:00Z'))).toBe('2026-10-18');
    });
  });

  describe('code blocks', () => {
    const codeBlock = (brush: string) =>
      `<pre class="syntaxhighlighter-pre" data-syntaxhighlighter-params="brush: ${brush}; gutter: false; theme: Confluence" data-theme="Confluence">echo hi</pre>`;

    it('maps the highlighter brush to a language class', () => {
      expect(rewrite(codeBlock('bash'))).toBe('<pre class="language-bash">echo hi</pre>');
      expect(rewrite(codeBlock('py'))).toBe('<pre class="language-python">echo hi</pre>');
    });

    it('uses an unknown brush as the language name', () => {
      expect(rewrite(codeBlock('groovy'))).toBe('<pre class="language-groovy">echo hi</pre>');
    });

    it('accepts extra brush mappings', () => {
      const custom = createMacroRules({ codeLanguages: { groovy: 'java' } });
      expect(rewriteMacros(codeBlock('groovy'), custom).html).toBe('<pre class="language-java">echo hi</pre>');
    });

    it('leaves a block without highlighter parameters unchanged', () => {
      const result = rewriteMacros('<pre class="syntaxhighlighter-pre">x</pre>', rules);

      expect(result).toEqual({ html: '<pre class="syntaxhighlighter-pre">x</pre>', applied: {} });
    });

    it('leaves a block without a brush for the unconverted report', () => {
      const html = '<pre class="syntaxhighlighter-pre" data-syntaxhighlighter-params="gutter: false">x</pre>';

      expect(rewrite(html)).toBe(html);
      expect(findUnconvertedMacros(html)).toEqual([
        { construct: 'codeBlock', excerpt: '<pre class="syntaxhighlighter-pre" data-syntaxhighlighter-params="gutter: false">' },
      ]);
    });
  });

  describe('table of contents', () => {
    it('adds a space after outline numbers that lack one', () => {
      const html =
        '<div class="toc-macro"><ul><li><span class="TOCOutline">1</span><a href="#Page-Intro">Intro</a></li>' +
        '<li><span class="TOCOutline">1.1</span> <a href="#Page-Setup">Setup</a></li></ul></div>';

      const result = rewriteMacros(html, rules);

      expect(result.html).toBe(
        '<div class="toc-macro"><ul><li><span class="TOCOutline">1</span> <a href="#Page-Intro">Intro</a></li>' +
        '<li><span class="TOCOutline">1.1</span> <a href="#Page-Setup">Setup</a></li></ul></div>'
      );
      expect(result.applied).toEqual({ tocOutline: 1 });
    });
  });

  describe('flattenParagraphs', () => {
    it('ends every paragraph with a line break', () => {
      expect(flattenParagraphs('<p class="auto-cursor-target">a</p><p>b <em>c</em></p>')).toBe('a<br>b <em>c</em><br>');
    });
  });
});
