/**
 * Page model shared by the assembler and the generator
 */

export type NavKey = 'home' | 'cost' | 'howto';

export interface ContentBlock {
  heading: string;
  /** Prose; may contain placeholders */
  body: string;
}

export interface PageSpec {
  /** Clamped H1; also the document title */
  h1: string;
  subheading: string;
  canonicalPath: string;
  navKey: NavKey;
  bodyHtml: string;
}

export type PageKind = 'home' | 'cost' | 'howto' | 'city';

/**
 * A page ready to be written
 */
export interface RenderedPage {
  kind: PageKind;
  canonicalPath: string;
  html: string;
}
