/**
 * Tests for page builders and the document layout
 */

import { join } from 'path';
import { parseCitiesCsv } from '../cities/loader.js';
import type { CityRecord } from '../cities/types.js';
import { loadSiteContent } from '../content/io.js';
import { createSiteContent } from '../testing/fixtures.js';
import { renderDocument, renderNav } from './layout.js';
import { buildCityPage, buildCostPage, buildHomePage, buildHowToPage, renderCostCallout } from './pages.js';

function headingsOf(html: string): string[] {
  return Array.from(html.matchAll(/<h2>([^<]*)<\/h2>/g), (match) => match[1]);
}

describe('pages', () => {
  const content = createSiteContent();
  const austin: CityRecord = { city: 'Austin', state: 'TX', costMultiplier: 1.05 };

  describe('buildCityPage', () => {
    const page = buildCityPage(content, austin);

    it('should derive H1, path and nav from the city', () => {
      expect(page.h1).toBe('Ivy Removal Services in Austin, TX');
      expect(page.canonicalPath).toBe('/austin-tx/');
      expect(page.navKey).toBe('home');
      expect(page.subheading).toBe('Local crews.');
    });

    it('should render the localized cost block', () => {
      expect(page.bodyHtml).toContain(
        '<h2>Ivy Removal Cost in Austin, TX</h2>\n<p>In Austin, TX, jobs run $315 to $1260. See the <a href="/">cost guide</a>.</p>'
      );
    });

    it('should only use headings from the cost block and the guide', () => {
      expect(headingsOf(page.bodyHtml)).toEqual(['Ivy Removal Cost in Austin, TX', 'What Is Ivy?', 'Why Remove It?']);
    });

    it('should put the callout before the first heading', () => {
      expect(page.bodyHtml.indexOf('class="callout"')).toBeLessThan(page.bodyHtml.indexOf('<h2>'));
    });

    it('should clamp long city titles', () => {
      const longCity = buildCityPage(content, {
        city: 'Llanfairpwllgwyngyllgogerychwyrndrobwllllantysiliogogogoch',
        state: 'WA',
        costMultiplier: 1,
      });

      expect(longCity.h1).toBe('Ivy Removal Services in Llanfairpwllgwyngyllgogerychwyrndrobwllllanty…');
    });
  });

  describe('renderCostCallout', () => {
    it('should show the localized range', () => {
      const callout = renderCostCallout(content, austin);

      expect(callout).toContain('<span class="badge">Typical range in Austin, TX</span>');
      expect(callout).toContain('<span>$315–$1260</span>');
    });
  });

  describe('buildHomePage', () => {
    const page = buildHomePage(content, [austin, { city: 'St. Louis', state: 'MO', costMultiplier: 0.92 }]);

    it('should link every city page', () => {
      expect(page.bodyHtml).toContain('<li><a href="/austin-tx/">Austin, TX</a></li>\n<li><a href="/st-louis-mo/">St. Louis, MO</a></li>');
    });

    it('should list the guide before the city directory', () => {
      expect(headingsOf(page.bodyHtml)).toEqual(['What Is Ivy?', 'Why Remove It?', 'Choose your city']);
    });

    it('should link the cost and how-to pages', () => {
      expect(page.bodyHtml).toContain('<a href="/cost/">Ivy Removal Cost</a> and <a href="/how-to/">How to Remove Ivy</a>');
      expect(page.canonicalPath).toBe('/');
    });
  });

  describe('fixed pages', () => {
    it('should build the cost page', () => {
      const page = buildCostPage(content);
      expect(page).toEqual({
        h1: 'Ivy Removal Cost',
        subheading: 'Pricing guide.',
        canonicalPath: '/cost/',
        navKey: 'cost',
        bodyHtml: '<h2>How Much?</h2>\n<p>It depends.</p>',
      });
    });

    it('should build an empty how-to page', () => {
      const page = buildHowToPage(content);
      expect(page.canonicalPath).toBe('/how-to/');
      expect(page.navKey).toBe('howto');
      expect(page.bodyHtml).toBe('');
    });
  });

  describe('renderDocument', () => {
    const layout = { content, stylesheet: 'body{margin:0}\n' };

    it('should use the H1 as the document title', () => {
      const pages = [buildHomePage(content, [austin]), buildCostPage(content), buildHowToPage(content), buildCityPage(content, austin)];

      for (const page of pages) {
        const html = renderDocument(page, layout);
        const title = html.match(/<title>([^<]*)<\/title>/)?.[1];
        const h1s = Array.from(html.matchAll(/<h1>([^<]*)<\/h1>/g), (match) => match[1]);

        expect(h1s).toHaveLength(1);
        expect(title).toBe(h1s[0]);
      }
    });

    it('should escape the title the same way as the H1', () => {
      const html = renderDocument({ ...buildCostPage(content), h1: 'Tom & Jerry' }, layout);

      expect(html).toContain('<title>Tom &amp; Jerry</title>');
      expect(html).toContain('<h1>Tom &amp; Jerry</h1>');
    });

    it('should include canonical link, stylesheet and image', () => {
      const html = renderDocument(buildCostPage(content), layout);

      expect(html).toContain('<link rel="canonical" href="/cost/" />');
      expect(html).toContain('<style>\nbody{margin:0}\n  </style>');
      expect(html).toContain('<img src="/picture.png" alt="Crew at work" loading="lazy" />');
      expect(html.startsWith('<!doctype html>\n')).toBe(true);
    });
  });

  describe('renderNav', () => {
    it('should mark the current page', () => {
      expect(renderNav('cost', content)).toBe(
        '<nav class="nav" aria-label="Primary navigation">' +
          '<a href="/">Home</a>' +
          '<a href="/cost/" aria-current="page">Cost</a>' +
          '<a href="/how-to/">How-To</a>' +
          '<a class="btn" href="mailto:test@example.com">Get Quote</a>' +
          '</nav>'
      );
    });
  });

  describe('bundled content', () => {
    it('should build the Austin page from a CSV row', async () => {
      const bundled = await loadSiteContent(join(__dirname, '..', '..', 'content', 'site.json'));
      const [city] = parseCitiesCsv('city,state,col\nAustin,tx,1.05');
      const page = buildCityPage(bundled, city);

      expect(page.canonicalPath).toBe('/austin-tx/');
      expect(page.h1).toBe('Poison Ivy Removal/Poison Ivy Control Services in Austin, TX');
      expect(page.bodyHtml).toContain('most poison ivy removal projects range from $315 to $1260');
      expect(page.bodyHtml).toContain('you can <a href="/">view our poison ivy removal cost guide</a>.');
    });
  });
});
