/**
 * Site content schema, validation and loading
 */

export type {
  BlockSequence,
  PageContent,
  HomePageContent,
  CityPageContent,
  Pricing,
  SiteImage,
  SiteContent,
} from './types.js';

export { validateSiteContent, isValidSiteContent } from './validate.js';

export { parseSiteContent, loadSiteContent } from './io.js';
