/**
 * Lenient numeric parsing for spreadsheet cell text.
 *
 * Accepts US ("1,234.56") and European ("1.234,56") grouping, currency
 * symbols, a trailing percent sign and accounting-style negatives ("(45.00)").
 * Returns null for anything that is not a number once cleaned.
 */

const CURRENCY_SYMBOLS = /[€$£¥₽]|R\$/g;
const PLAIN_NUMBER = /^[-+]?\d+(\.\d+)?$/;
const COMMA_THOUSANDS = /^[-+]?\d{1,3}(,\d{3})+$/;

export function parseNumericValue(raw: string): number | null {
  let text = raw.trim().replace(/\s+/g, '').replace(CURRENCY_SYMBOLS, '');
  if (text === '') return null;

  let negative = false;
  if (text.startsWith('(') && text.endsWith(')')) {
    negative = true;
    text = text.slice(1, -1);
  }
  if (text.endsWith('%')) {
    text = text.slice(0, -1);
  }

  const lastComma = text.lastIndexOf(',');
  const lastDot = text.lastIndexOf('.');

  if (lastComma >= 0 && lastDot >= 0) {
    // Whichever separator comes last is the decimal point
    if (lastComma > lastDot) {
      text = text.replace(/\./g, '').replace(',', '.');
    } else {
      text = text.replace(/,/g, '');
    }
  } else if (lastComma >= 0) {
    text = COMMA_THOUSANDS.test(text) ? text.replace(/,/g, '') : text.replace(',', '.');
  } else if (text.indexOf('.') !== lastDot) {
    // "1.234.567": dots are grouping separators
    text = text.replace(/\./g, '');
  }

  if (!PLAIN_NUMBER.test(text)) return null;
  const value = Number(text);
  if (!Number.isFinite(value)) return null;
  return negative ? -value : value;
}

export function isNumericText(raw: string): boolean {
  return parseNumericValue(raw) !== null;
}
