/**
 * Ordered rewrite rules from Confluence export markup to the target editor's
 * markup. Built once per run and shared, read-only, by every document.
 *
 * Patterns assume whitespace has already been normalized, but tolerate
 * whitespace between tags so they also work on hand-written input.
 */

import type { BlockRule, CheckboxEmojiIds, PatternRule, Replacer, RewriteRule } from '../models/entities.js';
import { escapeRegExp, readAttribute } from '../util/html.js';

export type CalloutStyle = 'info' | 'success' | 'warning' | 'danger';

// Confluence macro class suffix -> callout style
export const CALLOUT_STYLES: Readonly<Record<string, CalloutStyle>> = {
  information: 'info',
  note: 'warning',
  warning: 'danger',
  tip: 'success',
  success: 'success',
  error: 'danger',
};

// syntaxhighlighter brush -> language class
export const DEFAULT_CODE_LANGUAGES: Readonly<Record<string, string>> = {
  bash: 'bash',
  shell: 'bash',
  sh: 'bash',
  powershell: 'powershell',
  ps: 'powershell',
  py: 'python',
  python: 'python',
  js: 'javascript',
  javascript: 'javascript',
  sql: 'sql',
  java: 'java',
  xml: 'xml',
  html: 'xml',
  yml: 'yaml',
  yaml: 'yaml',
  json: 'json',
  text: 'plaintext',
  none: 'plaintext',
};

export const DEFAULT_CHECKBOX_EMOJI: CheckboxEmojiIds = {
  unchecked: 'atlassian-checkbox_unchecked',
  checked: 'atlassian-checkbox_checked',
};

// Output of the callout rule; its body holds no <p> of its own
const RENDERED_CALLOUT_REGEX = /<p class="callout callout-[a-z]+">[\s\S]*?<\/p>/g;

export const UNCHECKED_BOX = '☐';
export const CHECKED_BOX = '☑';

export interface MacroRuleOptions {
  conversionDate?: Date;
  checkboxEmoji?: CheckboxEmojiIds;
  codeLanguages?: Record<string, string>;
}

/**
 * Turns each paragraph into a line of text ending in `<br>`; a callout box
 * holds a single level of content.
 */
export function flattenParagraphs(body: string): string {
  return body.replace(/<p\b[^>]*>([\s\S]*?)<\/p>/gi, '$1<br>');
}

/**
 * Callout box around `body`. Callouts already rendered inside it stay boxes
 * of their own: the outer box closes before each one and reopens after it.
 */
export function renderCallout(style: CalloutStyle, body: string, title?: string): string {
  const parts: string[] = [];
  let pending = title ? `<strong>${title.trim()}</strong><br>` : '';
  let last = 0;

  for (const match of body.matchAll(RENDERED_CALLOUT_REGEX)) {
    const index = match.index ?? 0;
    pending += flattenParagraphs(body.slice(last, index));
    if (pending) parts.push(`<p class="callout callout-${style}">${pending}</p>`);
    parts.push(match[0]);
    pending = '';
    last = index + match[0].length;
  }

  pending += flattenParagraphs(body.slice(last));
  if (pending || parts.length === 0) parts.push(`<p class="callout callout-${style}">${pending}</p>`);
  return parts.join('');
}

export function formatConversionDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

function removeRule(name: string, pattern: RegExp): PatternRule {
  return { kind: 'pattern', name, mode: 'once', pattern, replacement: '' };
}

const calloutRule: BlockRule = {
  kind: 'block',
  name: 'callout',
  mode: 'fixedPoint',
  opening: new RegExp(
    '<div class="confluence-information-macro\\s(?:[^"]*\\s)?' +
    `confluence-information-macro-(${Object.keys(CALLOUT_STYLES).join('|')})(?:\\s[^"]*)?"[^>]*>\\s*` +
    '(?:<p class="title[^"]*"[^>]*>([\\s\\S]*?)<\\/p>\\s*)?' +
    '(?:<span class="aui-icon[^"]*"[^>]*>\\s*<\\/span>\\s*)?' +
    '<div class="confluence-information-macro-body[^"]*"[^>]*>',
    'i'
  ),
  container: 'div',
  trailingCloses: 1,
  render: ([kind, title], body) => renderCallout(CALLOUT_STYLES[(kind ?? '').toLowerCase()] ?? 'info', body, title),
};

const expandRule: BlockRule = {
  kind: 'block',
  name: 'expand',
  mode: 'fixedPoint',
  opening: new RegExp(
    '<div id="expander-(\\d+)" class="expand-container[^"]*"[^>]*>\\s*' +
    '<div id="expander-control-\\1" class="expand-control[^"]*"[^>]*>\\s*' +
    '(?:<span class="expand-control-icon[^"]*"[^>]*>[\\s\\S]*?<\\/span>\\s*)?' +
    '<span class="expand-control-text[^"]*"[^>]*>([\\s\\S]*?)<\\/span>\\s*<\\/div>\\s*' +
    '<div id="expander-content-\\1" class="expand-content[^"]*"[^>]*>',
    'i'
  ),
  container: 'div',
  trailingCloses: 1,
  render: ([, label], body) => `<details><summary>${(label ?? '').trim()}</summary>${body}</details>`,
};

const embeddedImage: Replacer = (match, img) => {
  const src = img && (readAttribute(img, 'src') ?? readAttribute(img, 'data-image-src'));
  if (!img || !src) return match;
  const height = readAttribute(img, 'height') ?? '';
  const width = readAttribute(img, 'width') ?? '';
  return `<!--inline-image src="${src}" height="${height}" width="${width}"-->`;
};

function pageMetadata(conversionDate: Date): Replacer {
  return (_match, _q1, author, verb, _q2, editor, modified) => {
    const by = editor ? ` by ${editor}` : '';
    return `<p class="callout callout-info">Converted from Confluence on ${formatConversionDate(conversionDate)}. ` +
      `Originally created by ${author ?? ''}, last ${verb ?? 'modified'}${by} on ${modified ?? ''}.</p>`;
  };
}

function codeLanguage(languages: Record<string, string>): Replacer {
  return (match) => {
    const params = readAttribute(match, 'data-syntaxhighlighter-params');
    const brush = params && /brush:\s*([^;\s]+)/i.exec(params)?.[1]?.toLowerCase();
    if (!brush) return match;
    return `<pre class="language-${languages[brush] ?? brush}">`;
  };
}

function checkboxRule(name: string, emojiId: string, character: string): PatternRule {
  return {
    kind: 'pattern',
    name,
    mode: 'once',
    pattern: new RegExp(`<img\\b[^>]*\\sdata-emoji-id="${escapeRegExp(emojiId)}"[^>]*>`, 'gi'),
    replacement: character,
  };
}

export function createMacroRules(options: MacroRuleOptions = {}): readonly RewriteRule[] {
  const conversionDate = options.conversionDate ?? new Date();
  const checkboxEmoji = options.checkboxEmoji ?? DEFAULT_CHECKBOX_EMOJI;
  const languages = { ...DEFAULT_CODE_LANGUAGES, ...options.codeLanguages };

  const rules: RewriteRule[] = [
    calloutRule,
    expandRule,
    {
      kind: 'pattern',
      name: 'embeddedImage',
      mode: 'once',
      pattern: /<span class="confluence-embedded-file-wrapper[^"]*"[^>]*>\s*(<img\b[^>]*>)\s*<\/span>/gi,
      replacement: embeddedImage,
    },
    checkboxRule('checkboxUnchecked', checkboxEmoji.unchecked, UNCHECKED_BOX),
    checkboxRule('checkboxChecked', checkboxEmoji.checked, CHECKED_BOX),
    removeRule('breadcrumbs', /<div id="breadcrumb-section"[^>]*>[\s\S]*?<\/div>/gi),
    {
      kind: 'pattern',
      name: 'pageMetadata',
      mode: 'once',
      pattern: new RegExp(
        '<div class="page-metadata"[^>]*>\\s*Created by\\s*<span class=(["\'])author\\1[^>]*>\\s*([\\s\\S]*?)\\s*<\\/span>\\s*,?\\s*' +
        'last (modified|updated)(?:\\s+by\\s*<span class=(["\'])editor\\4[^>]*>\\s*([\\s\\S]*?)\\s*<\\/span>)?\\s+on\\s+([^<]*?)\\s*<\\/div>',
        'gi'
      ),
      replacement: pageMetadata(conversionDate),
    },
    {
      kind: 'pattern',
      name: 'codeLanguage',
      mode: 'once',
      pattern: /<pre class="syntaxhighlighter-pre"[^>]*>/gi,
      replacement: codeLanguage(languages),
    },
    removeRule(
      'attachmentsSection',
      /<div class="pageSection group"[^>]*>\s*<div class="pageSectionHeader"[^>]*>\s*<h2 id="attachments"[^>]*>[\s\S]*?<\/h2>\s*<\/div>\s*<div class="greybox"[^>]*>[\s\S]*?<\/div>\s*<\/div>/gi
    ),
    removeRule('exportFooter', /<div id="footer"[^>]*>\s*<section class="footer-body"[^>]*>[\s\S]*?<\/section>\s*<\/div>/gi),
    {
      kind: 'pattern',
      name: 'tocOutline',
      mode: 'once',
      pattern: /<span class="TOCOutline"[^>]*>[^<]*<\/span>(?! )/g,
      replacement: (match) => `${match} `,
    },
  ];

  return Object.freeze(rules);
}
