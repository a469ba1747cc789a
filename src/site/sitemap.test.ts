import { resolveLocation, robotsTxt, sitemapXml } from './sitemap.js';

describe('sitemap', () => {
  describe('robotsTxt', () => {
    it('should allow everything and reference the sitemap', () => {
      expect(robotsTxt()).toBe('User-agent: *\nAllow: /\nSitemap: /sitemap.xml\n');
    });

    it('should use an absolute sitemap URL when a site URL is set', () => {
      expect(robotsTxt('https://example.com/')).toBe('User-agent: *\nAllow: /\nSitemap: https://example.com/sitemap.xml\n');
    });
  });

  describe('resolveLocation', () => {
    it('should return paths unchanged without a site URL', () => {
      expect(resolveLocation('/cost/')).toBe('/cost/');
    });

    it('should prefix the site URL', () => {
      expect(resolveLocation('/cost/', 'https://example.com')).toBe('https://example.com/cost/');
    });
  });

  describe('sitemapXml', () => {
    it('should list one entry per path', () => {
      expect(sitemapXml(['/', '/cost/'])).toBe(
        '<?xml version="1.0" encoding="UTF-8"?>\n' +
          '<urlset xmlns="http://www.sitemaps.org/schemas/sitemap/0.9">\n' +
          '  <url><loc>/</loc></url>\n' +
          '  <url><loc>/cost/</loc></url>\n' +
          '</urlset>\n'
      );
    });

    it('should list repeated paths once', () => {
      expect(sitemapXml(['/', '/austin-tx/', '/']).match(/<url>/g)).toHaveLength(2);
    });

    it('should write absolute, escaped locations', () => {
      const xml = sitemapXml(['/a&b/'], 'https://example.com');
      expect(xml).toContain('  <url><loc>https://example.com/a&amp;b/</loc></url>\n');
    });

    it('should write an empty urlset for no pages', () => {
      expect(sitemapXml([])).toBe(
        '<?xml version="1.0" encoding="UTF-8"?>\n<urlset xmlns="http://www.sitemaps.org/schemas/sitemap/0.9">\n</urlset>\n'
      );
    });
  });
});
