/**
 * Page assembly: heading + ordered content blocks + optional extra sections → PageSpec
 */

import type { BlockSequence } from '../content/types.js';
import { escapeHtml, renderTemplate, substituteText, type TokenValues } from '../template/index.js';
import { clampTitle } from './title.js';
import type { ContentBlock, NavKey, PageSpec } from './types.js';

export interface PageInput {
  h1: string;
  subheading: string;
  canonicalPath: string;
  navKey: NavKey;
  blocks: readonly ContentBlock[];
  /** Markup placed before the main blocks */
  before?: string;
  /** Markup placed after the main blocks */
  after?: string;
  values?: TokenValues;
}

/**
 * Pair headings with paragraphs. Validated content always has equal lengths.
 */
export function toContentBlocks(sequence: BlockSequence): ContentBlock[] {
  return sequence.headings.map((heading, index) => ({
    heading,
    body: sequence.paragraphs[index] ?? '',
  }));
}

/**
 * One h2 + p per block, in the order given
 */
export function renderBlock(block: ContentBlock, values: TokenValues = {}): string {
  return `<h2>${escapeHtml(substituteText(block.heading, values))}</h2>\n<p>${renderTemplate(block.body, values)}</p>`;
}

export function renderSection(blocks: readonly ContentBlock[], values: TokenValues = {}): string {
  return blocks.map((block) => renderBlock(block, values)).join('\n');
}

export function assemblePage(input: PageInput): PageSpec {
  const section = renderSection(input.blocks, input.values);
  const parts = [input.before, section, input.after].filter(
    (part): part is string => part !== undefined && part.length > 0
  );

  return {
    h1: clampTitle(input.h1),
    subheading: input.subheading,
    canonicalPath: input.canonicalPath,
    navKey: input.navKey,
    bodyHtml: parts.join('\n'),
  };
}
