/**
 * Site content configuration: all page prose, brand and pricing in one immutable record
 */

import type { CityListEntry } from '../cities/types.js';

/**
 * Parallel heading/paragraph lists; entry i of each forms one content block
 */
export interface BlockSequence {
  readonly headings: readonly string[];
  readonly paragraphs: readonly string[];
}

export interface PageContent {
  readonly title: string;
  readonly subtitle: string;
  readonly blocks: BlockSequence;
}

export interface HomePageContent extends PageContent {
  readonly cityListHeading: string;
  readonly cityListIntro: string;
}

export interface CityPageContent {
  /** H1 template, e.g. "Poison Ivy Removal in {City, State}" */
  readonly title: string;
  readonly subtitle: string;
  readonly costHeading: string;
  readonly costParagraph: string;
  /** Callout badge template, e.g. "Typical range in {City, State}" */
  readonly calloutLabel: string;
}

export interface Pricing {
  readonly low: number;
  readonly high: number;
  readonly currencySymbol: string;
}

export interface SiteImage {
  readonly filename: string;
  readonly alt: string;
}

export interface SiteContent {
  readonly brandName: string;
  readonly ctaText: string;
  readonly ctaHref: string;
  readonly image: SiteImage;
  readonly pricing: Pricing;
  readonly home: HomePageContent;
  readonly costPage: PageContent;
  readonly howTo: PageContent;
  readonly city: CityPageContent;
  /** Used when no city CSV is given */
  readonly cities?: readonly CityListEntry[];
}
