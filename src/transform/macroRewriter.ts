/**
 * Applies the macro rule table to a normalized document.
 */

import type { BlockRule, PatternRule, RewriteRule } from '../models/entities.js';
import { findBalancedClose } from '../util/html.js';
import { logger } from '../util/logger.js';

const MAX_FIXED_POINT_ITERATIONS = 10_000;

export interface RewriteResult {
  html: string;
  applied: Record<string, number>;
}

export interface UnconvertedMacro {
  construct: string;
  excerpt: string;
}

interface BlockMatch {
  start: number;
  bodyStart: number;
  bodyEnd: number;
  end: number;
  groups: Array<string | undefined>;
}

// Markers that only appear in source markup the rules failed to convert
const UNCONVERTED_MARKERS: ReadonlyArray<{ construct: string; pattern: RegExp }> = [
  { construct: 'callout', pattern: /<div class="confluence-information-macro[\s"][^>]*>/gi },
  { construct: 'expand', pattern: /<div id="expander-\d+"[^>]*>/gi },
  { construct: 'embeddedImage', pattern: /<span class="confluence-embedded-file-wrapper[^>]*>/gi },
  { construct: 'breadcrumbs', pattern: /<div id="breadcrumb-section"[^>]*>/gi },
  { construct: 'pageMetadata', pattern: /<div class="page-metadata"[^>]*>/gi },
  { construct: 'codeBlock', pattern: /<pre class="syntaxhighlighter-pre"[^>]*>/gi },
  { construct: 'attachmentsSection', pattern: /<h2 id="attachments"[^>]*>/gi },
  { construct: 'exportFooter', pattern: /<div id="footer"[^>]*>/gi },
  { construct: 'imagePlaceholder', pattern: /<!--inline-image\b[^>]*-->/gi },
];

/**
 * Counts only the matches whose text actually changed, so a rule that
 * leaves a match as it was does not show up as applied.
 */
function applyPatternRule(html: string, rule: PatternRule): { html: string; count: number } {
  const { replacement } = rule;
  let count = 0;

  const rewritten = html.replace(rule.pattern, (match: string, ...args: unknown[]) => {
    const offsetAt = args.findIndex((arg) => typeof arg === 'number');
    const captures = (offsetAt === -1 ? args : args.slice(0, offsetAt))
      .map((group) => (typeof group === 'string' ? group : undefined));
    const result = typeof replacement === 'string' ? replacement : replacement(match, ...captures);
    if (result !== match) count++;
    return result;
  });

  return { html: count === 0 ? html : rewritten, count };
}

/**
 * Every opening match whose body closes and is followed by the expected
 * close tags. Openings that never balance are skipped.
 */
function findBlocks(html: string, rule: BlockRule): BlockMatch[] {
  const opening = new RegExp(rule.opening.source, rule.opening.flags.includes('g') ? rule.opening.flags : `${rule.opening.flags}g`);
  const trailing = new RegExp(`^\\s*</${rule.container}\\s*>`, 'i');
  const blocks: BlockMatch[] = [];
  let match: RegExpExecArray | null;

  while ((match = opening.exec(html)) !== null) {
    const bodyStart = match.index + match[0].length;
    const close = findBalancedClose(html, bodyStart, rule.container);
    if (close === -1) continue;

    let end = close.end;
    let closed = true;
    for (let i = 0; i < rule.trailingCloses; i++) {
      const next = trailing.exec(html.slice(end));
      if (!next) {
        closed = false;
        break;
      }
      end += next[0].length;
    }
    if (!closed) continue;

    blocks.push({ start: match.index, bodyStart, bodyEnd: close.bodyEnd, end, groups: match.slice(1) });
  }

  return blocks;
}

/**
 * Rewrites one block at a time and rescans from the top, innermost block
 * first, until no well-formed block is left.
 */
function applyBlockRule(html: string, rule: BlockRule): { html: string; count: number } {
  let current = html;
  let count = 0;

  while (count < MAX_FIXED_POINT_ITERATIONS) {
    const blocks = findBlocks(current, rule);
    const innermost = blocks.find((outer) =>
      !blocks.some((inner) => inner !== outer && inner.start >= outer.bodyStart && inner.end <= outer.bodyEnd)
    );
    if (!innermost) break;

    const body = current.slice(innermost.bodyStart, innermost.bodyEnd);
    current = current.slice(0, innermost.start) + rule.render(innermost.groups, body) + current.slice(innermost.end);
    count++;
  }

  if (count >= MAX_FIXED_POINT_ITERATIONS) {
    logger.warn('Rewrite rule stopped before reaching a fixed point', { rule: rule.name, iterations: count });
  }

  return { html: current, count };
}

export function applyRule(html: string, rule: RewriteRule): { html: string; count: number } {
  return rule.kind === 'block' ? applyBlockRule(html, rule) : applyPatternRule(html, rule);
}

export function rewriteMacros(html: string, rules: readonly RewriteRule[]): RewriteResult {
  const applied: Record<string, number> = {};
  let current = html;

  for (const rule of rules) {
    const result = applyRule(current, rule);
    current = result.html;
    if (result.count > 0) {
      applied[rule.name] = (applied[rule.name] ?? 0) + result.count;
    }
  }

  return { html: current, applied };
}

export function findUnconvertedMacros(html: string): UnconvertedMacro[] {
  const found: UnconvertedMacro[] = [];
  for (const { construct, pattern } of UNCONVERTED_MARKERS) {
    for (const match of html.matchAll(pattern)) {
      found.push({ construct, excerpt: match[0].slice(0, 120) });
    }
  }
  return found;
}
