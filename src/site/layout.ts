/**
 * Document chrome shared by every page: head, top bar, hero, image, footer
 */

import type { SiteContent } from '../content/types.js';
import { escapeHtml } from '../template/index.js';
import { OUTPUT_LAYOUT } from '../utils/paths.js';
import type { NavKey, PageSpec } from './types.js';

export interface LayoutContext {
  content: SiteContent;
  /** Stylesheet inlined into every page */
  stylesheet: string;
}

const NAV_ITEMS: ReadonlyArray<{ href: string; label: string; key: NavKey }> = [
  { href: OUTPUT_LAYOUT.HOME_PATH, label: 'Home', key: 'home' },
  { href: OUTPUT_LAYOUT.COST_PATH, label: 'Cost', key: 'cost' },
  { href: OUTPUT_LAYOUT.HOWTO_PATH, label: 'How-To', key: 'howto' },
];

function ctaButton(content: SiteContent): string {
  return `<a class="btn" href="${escapeHtml(content.ctaHref)}">${escapeHtml(content.ctaText)}</a>`;
}

export function renderNav(current: NavKey, content: SiteContent): string {
  const items = NAV_ITEMS.map(({ href, label, key }) => {
    const currentAttr = key === current ? ' aria-current="page"' : '';
    return `<a href="${escapeHtml(href)}"${currentAttr}>${escapeHtml(label)}</a>`;
  });

  return `<nav class="nav" aria-label="Primary navigation">${items.join('')}${ctaButton(content)}</nav>`;
}

function renderHeader(page: PageSpec): string {
  return `<header>
  <div class="hero">
    <h1>${escapeHtml(page.h1)}</h1>
    <p class="sub">${escapeHtml(page.subheading)}</p>
  </div>
</header>`;
}

function renderFooter(content: SiteContent): string {
  const links = NAV_ITEMS.map(({ href, label }) => `<a href="${escapeHtml(href)}">${escapeHtml(label)}</a>`);

  return `<footer>
  <div class="footer-inner">
    <p class="footer-title">Next steps</p>
    <p class="sub">Ready to move forward? Request a free quote.</p>
    <div>
      ${ctaButton(content)}
    </div>
    <div class="footer-links">
      ${links.join('\n      ')}
    </div>
    <div class="small">© ${escapeHtml(content.brandName)}. All rights reserved.</div>
  </div>
</footer>`;
}

function renderMain(page: PageSpec, content: SiteContent): string {
  // The image is copied to the output root, so one absolute path works on every route
  const imageSrc = `/${content.image.filename}`;

  return `<main>
  <section class="card">
    <div class="img">
      <img src="${escapeHtml(imageSrc)}" alt="${escapeHtml(content.image.alt)}" loading="lazy" />
    </div>
${page.bodyHtml}
  </section>
</main>`;
}

/**
 * Full HTML document. The <title> is the page's H1, escaped the same way.
 */
export function renderDocument(page: PageSpec, layout: LayoutContext): string {
  const { content, stylesheet } = layout;

  return `<!doctype html>
<html lang="en">
<head>
  <meta charset="utf-8" />
  <meta name="viewport" content="width=device-width, initial-scale=1" />
  <title>${escapeHtml(page.h1)}</title>
  <link rel="canonical" href="${escapeHtml(page.canonicalPath)}" />
  <style>
${stylesheet.trim()}
  </style>
</head>
<body>
  <div class="topbar">
    <div class="topbar-inner">
      <a class="brand" href="/">${escapeHtml(content.brandName)}</a>
      ${renderNav(page.navKey, content)}
    </div>
  </div>
${renderHeader(page)}
${renderMain(page, content)}
${renderFooter(content)}
</body>
</html>
`;
}
