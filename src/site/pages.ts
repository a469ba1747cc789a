/**
 * Page builders for the fixed pages and the per-city landing pages
 */

import type { CityRecord } from '../cities/types.js';
import type { SiteContent } from '../content/types.js';
import {
  cityTokenValues,
  computeCostRange,
  escapeHtml,
  formatCurrency,
  renderTemplate,
  substituteText,
} from '../template/index.js';
import { OUTPUT_LAYOUT, cityCanonicalPath } from '../utils/paths.js';
import { assemblePage, toContentBlocks } from './assembler.js';
import type { PageSpec } from './types.js';

function renderCityList(cities: readonly CityRecord[]): string {
  return cities
    .map(({ city, state }) => {
      const href = cityCanonicalPath(city, state);
      return `<li><a href="${escapeHtml(href)}">${escapeHtml(city)}, ${escapeHtml(state)}</a></li>`;
    })
    .join('\n');
}

export function buildHomePage(content: SiteContent, cities: readonly CityRecord[]): PageSpec {
  const { home, costPage, howTo } = content;

  const cityDirectory = `<hr />
<h2>${escapeHtml(home.cityListHeading)}</h2>
<p class="muted">${renderTemplate(home.cityListIntro)}</p>
<ul class="city-grid">
${renderCityList(cities)}
</ul>
<hr />
<p class="muted">
  Also available: <a href="${OUTPUT_LAYOUT.COST_PATH}">${escapeHtml(costPage.title)}</a> and <a href="${OUTPUT_LAYOUT.HOWTO_PATH}">${escapeHtml(howTo.title)}</a>.
</p>`;

  return assemblePage({
    h1: home.title,
    subheading: home.subtitle,
    canonicalPath: OUTPUT_LAYOUT.HOME_PATH,
    navKey: 'home',
    blocks: toContentBlocks(home.blocks),
    after: cityDirectory,
  });
}

export function buildCostPage(content: SiteContent): PageSpec {
  return assemblePage({
    h1: content.costPage.title,
    subheading: content.costPage.subtitle,
    canonicalPath: OUTPUT_LAYOUT.COST_PATH,
    navKey: 'cost',
    blocks: toContentBlocks(content.costPage.blocks),
  });
}

export function buildHowToPage(content: SiteContent): PageSpec {
  return assemblePage({
    h1: content.howTo.title,
    subheading: content.howTo.subtitle,
    canonicalPath: OUTPUT_LAYOUT.HOWTO_PATH,
    navKey: 'howto',
    blocks: toContentBlocks(content.howTo.blocks),
  });
}

/**
 * Localized price badge shown above the city cost block
 */
export function renderCostCallout(content: SiteContent, city: CityRecord): string {
  const { pricing } = content;
  const range = computeCostRange(pricing.low, pricing.high, city.costMultiplier);
  const label = substituteText(content.city.calloutLabel, cityTokenValues(city, pricing));
  const amounts = `${formatCurrency(range.low, pricing.currencySymbol)}–${formatCurrency(range.high, pricing.currencySymbol)}`;

  return `<div class="callout" role="note" aria-label="Typical cost range">
  <div class="callout-title">
    <span class="badge">${escapeHtml(label)}</span>
    <span>${escapeHtml(amounts)}</span>
  </div>
</div>`;
}

/**
 * City landing page: the localized cost block comes first, then the homepage guide
 */
export function buildCityPage(content: SiteContent, city: CityRecord): PageSpec {
  const values = cityTokenValues(city, content.pricing);
  const costBlock = { heading: content.city.costHeading, body: content.city.costParagraph };

  return assemblePage({
    h1: substituteText(content.city.title, values),
    subheading: content.city.subtitle,
    canonicalPath: cityCanonicalPath(city.city, city.state),
    navKey: 'home',
    blocks: [costBlock, ...toContentBlocks(content.home.blocks)],
    before: renderCostCallout(content, city),
    values,
  });
}
