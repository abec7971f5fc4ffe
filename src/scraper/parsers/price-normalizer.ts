import { PriceParseError } from '../errors/scraper.errors';

const DECIMAL = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Parse Danish-formatted price text into a number.
 * Handles:
 * - "12.345,-kr." (dots = thousands, ",-" = no decimals)
 * - "9,99 kr." (comma = decimal)
 *
 * Zero and negative values are returned as-is; callers decide whether they count as a price.
 */
export function normalizePrice(raw: string): number {
  const cleaned = raw
    .replace(/kr\./g, '')
    .replace(/,-/g, '')
    .replace(/\./g, '')
    .replace(/,/g, '.')
    .replace(/\s/g, '');

  if (!DECIMAL.test(cleaned)) {
    throw new PriceParseError(raw);
  }
  return parseFloat(cleaned);
}
