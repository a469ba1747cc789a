/**
 * Shared test data: a small, complete site content document
 */

import { validateSiteContent } from '../content/validate.js';
import type { SiteContent } from '../content/types.js';

const NONE: string[] = [];

export function createContentJson() {
  return {
    brandName: 'Test Ivy Co',
    ctaText: 'Get Quote',
    ctaHref: 'mailto:test@example.com',
    image: { filename: 'picture.png', alt: 'Crew at work' },
    pricing: { low: 300, high: 1200, currencySymbol: '$' },
    home: {
      title: 'Ivy Removal Services',
      subtitle: 'Safe removal.',
      cityListHeading: 'Choose your city',
      cityListIntro: 'We serve these cities:',
      blocks: {
        headings: ['What Is Ivy?', 'Why Remove It?'],
        paragraphs: ['Ivy climbs & spreads.', 'Call {ivy removal services} today.'],
      },
    },
    costPage: {
      title: 'Ivy Removal Cost',
      subtitle: 'Pricing guide.',
      blocks: { headings: ['How Much?'], paragraphs: ['It depends.'] },
    },
    howTo: {
      title: 'How to Remove Ivy',
      subtitle: 'DIY tips.',
      blocks: { headings: [...NONE], paragraphs: [...NONE] },
    },
    city: {
      title: 'Ivy Removal Services in {City, State}',
      subtitle: 'Local crews.',
      costHeading: 'Ivy Removal Cost in {City, State}',
      costParagraph: 'In {City, State}, jobs run {cost_lo} to {cost_hi}. See the {cost guide}.',
      calloutLabel: 'Typical range in {City, State}',
    },
    cities: [{ city: 'Austin', state: 'tx', costMultiplier: 1.05 }],
  };
}

export function createSiteContent(): SiteContent {
  return validateSiteContent(createContentJson());
}
