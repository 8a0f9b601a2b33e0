/**
 * ReceiptLens – String primitives shared by the extraction pipeline
 *
 * Fragment text clean-up, numeric cleaning and date parsing.
 * None of these functions throw; unusable input yields null / "".
 */

// ─── Fragment text normalisation ──────────────────────────────────────────────

/**
 * Fix common OCR artefacts in a single fragment without altering its meaning.
 */
export function normaliseFragmentText(raw: string): string {
  let t = raw;

  // Invisible / zero-width characters
  t = t.replace(/[\u200B-\u200D\uFEFF]/g, "");
  // OCR may produce en-dash or em-dash for a hyphen
  t = t.replace(/[\u2013\u2014\u2212]/g, "-");
  // 'O' or 'o' mistaken for '0' inside numeric runs
  t = t.replace(/(\d)[Oo](?=\d)/g, "$10");
  // Collapse whitespace (including NBSP)
  t = t.replace(/[\s\u00A0]+/g, " ");

  return t.trim();
}

// ─── Numeric cleaning ─────────────────────────────────────────────────────────

/** Currency symbols and codes that may prefix or suffix an amount */
const CURRENCY_RX = /[₹$€£¥]|\b(?:rs|inr|usd|eur|gbp)\.?(?![a-z])/gi;

/** Source of a numeric literal with optional thousands separators */
export const NUMBER_SOURCE = String.raw`\d[\d,]*(?:\.\d+)?`;

/** Source of a currency prefix (symbol or code) */
export const CURRENCY_PREFIX_SOURCE = String.raw`(?:[₹$€£¥]|\b(?:rs|inr|usd|eur|gbp)\.?)`;

const DECIMAL_RX = /^-?(?:\d+(?:\.\d*)?|\.\d+)$/;

const BARE_NUMERIC_RX = new RegExp(
  String.raw`^${CURRENCY_PREFIX_SOURCE}?\s*${NUMBER_SOURCE}\s*(?:\/-)?$`,
  "i",
);

/**
 * Strip currency symbols, thousands separators, whitespace and the
 * "/-" suffix used on Indian bills. "₹ 20,000/-" → "20000"
 */
export function cleanNumeric(raw: string | null | undefined): string {
  if (raw == null) return "";
  return String(raw)
    .replace(CURRENCY_RX, "")
    .replace(/\/-\s*$/, "")
    .replace(/[,\s\u00A0']/g, "");
}

/** Parse a raw numeric string to a finite number, or null */
export function parseDecimal(raw: string | null | undefined): number | null {
  const cleaned = cleanNumeric(raw);
  if (!DECIMAL_RX.test(cleaned)) return null;
  const n = Number(cleaned);
  return Number.isFinite(n) ? n : null;
}

const NUMERIC_TOKEN_RX = new RegExp(
  String.raw`${CURRENCY_PREFIX_SOURCE}?\s*${NUMBER_SOURCE}`,
  "i",
);

/**
 * First number in a raw field value, with its currency prefix.
 * "Rs. 450 only" → "Rs. 450", "5 Bags" → "5"
 */
export function extractNumericToken(
  raw: string | null | undefined,
): string | undefined {
  if (!raw) return undefined;
  return NUMERIC_TOKEN_RX.exec(raw)?.[0].trim();
}

/** "₹ 12,450.00", "450/-", "Rs.90" – nothing but an amount */
export function isBareNumeric(text: string): boolean {
  return BARE_NUMERIC_RX.test(text.trim());
}

/** Seven or more digits with no separator or currency: phone, invoice no. */
const IDENTIFIER_RX = /^\d{7,}$/;

/**
 * An unlabelled number is taken for money when it carries a decimal point
 * or is larger than 10 (small integers are usually quantities or indexes).
 * Long plain digit runs are identifiers, not amounts.
 */
export function looksMonetary(text: string): boolean {
  if (IDENTIFIER_RX.test(text.trim())) return false;
  const value = parseDecimal(text);
  if (value === null) return false;
  return cleanNumeric(text).includes(".") || value > 10;
}

// ─── Date parsing ─────────────────────────────────────────────────────────────

const MONTHS: Record<string, number> = {
  jan: 1,
  feb: 2,
  mar: 3,
  apr: 4,
  may: 5,
  jun: 6,
  jul: 7,
  aug: 8,
  sep: 9,
  oct: 10,
  nov: 11,
  dec: 12,
};

const FULL_MONTH_SOURCE =
  "january|february|march|april|may|june|july|august|september|october|november|december";

type DateParts = [year: number, month: number, day: number];

interface DateFormat {
  name: string;
  pattern: RegExp;
  parts(m: RegExpMatchArray): DateParts;
}

function num(s: string | undefined): number {
  return s === undefined ? NaN : parseInt(s, 10);
}

function monthOf(name: string | undefined): number {
  if (!name) return NaN;
  return MONTHS[name.slice(0, 3).toLowerCase()] ?? NaN;
}

/** Tried in order; the first format yielding a real calendar date wins. */
const DATE_FORMATS: readonly DateFormat[] = [
  {
    name: "dd/MM/yyyy",
    pattern: /\b(\d{1,2})\/(\d{1,2})\/(\d{4})\b/g,
    parts: (m) => [num(m[3]), num(m[2]), num(m[1])],
  },
  {
    name: "dd-MM-yyyy",
    pattern: /\b(\d{1,2})-(\d{1,2})-(\d{4})\b/g,
    parts: (m) => [num(m[3]), num(m[2]), num(m[1])],
  },
  {
    name: "dd.MM.yyyy",
    pattern: /\b(\d{1,2})\.(\d{1,2})\.(\d{4})\b/g,
    parts: (m) => [num(m[3]), num(m[2]), num(m[1])],
  },
  {
    name: "yyyy-MM-dd",
    pattern: /\b(\d{4})[-/](\d{1,2})[-/](\d{1,2})\b/g,
    parts: (m) => [num(m[1]), num(m[2]), num(m[3])],
  },
  {
    name: "MM/dd/yyyy",
    pattern: /\b(\d{1,2})\/(\d{1,2})\/(\d{4})\b/g,
    parts: (m) => [num(m[3]), num(m[1]), num(m[2])],
  },
  {
    name: "dd MMM yyyy",
    pattern: /\b(\d{1,2})[\s-]+([a-z]{3})\.?[\s,-]+(\d{4})\b/gi,
    parts: (m) => [num(m[3]), monthOf(m[2]), num(m[1])],
  },
  {
    name: "dd MMMM yyyy",
    pattern: new RegExp(
      String.raw`\b(\d{1,2})(?:st|nd|rd|th)?[\s-]+(${FULL_MONTH_SOURCE})[\s,-]+(\d{4})\b`,
      "gi",
    ),
    parts: (m) => [num(m[3]), monthOf(m[2]), num(m[1])],
  },
  {
    name: "MMM dd, yyyy",
    pattern: new RegExp(
      String.raw`\b(${FULL_MONTH_SOURCE}|[a-z]{3})\.?\s+(\d{1,2}),?\s+(\d{4})\b`,
      "gi",
    ),
    parts: (m) => [num(m[3]), monthOf(m[1]), num(m[2])],
  },
  {
    name: "dd/MM/yy",
    pattern: /\b(\d{1,2})[/-](\d{1,2})[/-](\d{2})\b/g,
    parts: (m) => [2000 + num(m[3]), num(m[2]), num(m[1])],
  },
];

export const DATE_FORMAT_NAMES: readonly string[] = DATE_FORMATS.map(
  (f) => f.name,
);

function isCalendarDate([year, month, day]: DateParts): boolean {
  if (![year, month, day].every(Number.isInteger)) return false;
  if (year < 1900 || year > 2199) return false;
  if (month < 1 || month > 12) return false;
  const daysInMonth = new Date(Date.UTC(year, month, 0)).getUTCDate();
  return day >= 1 && day <= daysInMonth;
}

function toIso([year, month, day]: DateParts): string {
  return `${year}-${String(month).padStart(2, "0")}-${String(day).padStart(2, "0")}`;
}

/**
 * Parse the first recognisable calendar date in `raw`.
 * "31/02/2024" is rejected by every format and yields null.
 *
 * @returns ISO-8601 date (YYYY-MM-DD) or null
 */
export function parseDate(raw: string | null | undefined): string | null {
  if (!raw) return null;
  for (const format of DATE_FORMATS) {
    for (const match of raw.matchAll(format.pattern)) {
      const parts = format.parts(match);
      if (isCalendarDate(parts)) return toIso(parts);
    }
  }
  return null;
}
