/**
 * Placeholder substitution and escaping for page prose
 */

export { escapeHtml, escapeXml } from './escape.js';

export {
  NAMED_TOKENS,
  isNamedToken,
  tokenize,
  type NamedToken,
  type TemplateToken,
  type TokenValues,
} from './tokens.js';

export { renderTemplate, substituteText, type RenderOptions } from './render.js';

export {
  computeCostRange,
  formatCurrency,
  cityTokenValues,
  type CostRange,
  type BasePricing,
} from './cost.js';
