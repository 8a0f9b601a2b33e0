/**
 * ReceiptLens – Raw field map → ReceiptAnalysisResult
 *
 * Never throws on missing or malformed fields; every gap becomes "" / null.
 */

import { PaymentMode } from "../types";
import type { ReceiptAnalysisResult } from "../types";
import knownCategories from "../config/expenseCategories.json";
import {
  cleanNumeric,
  extractNumericToken,
  parseDate,
  parseDecimal,
} from "./primitives";

// ─── Payment mode ─────────────────────────────────────────────────────────────

/** Checked in order; the first group with a keyword in the text wins. */
const PAYMENT_MODE_KEYWORDS: ReadonlyArray<{
  mode: PaymentMode;
  keywords: readonly string[];
}> = [
  {
    mode: PaymentMode.UPI,
    keywords: ["upi", "phonepe", "phone pe", "gpay", "google pay", "paytm", "bhim"],
  },
  { mode: PaymentMode.CHEQUE, keywords: ["cheque", "chq", "check"] },
  {
    mode: PaymentMode.CARD,
    keywords: ["card", "visa", "mastercard", "rupay", "debit card", "credit card"],
  },
  { mode: PaymentMode.CASH, keywords: ["cash"] },
];

/** Whole-word matchers, so "Checked by" and "Discard" name no mode */
const PAYMENT_MODE_MATCHERS = PAYMENT_MODE_KEYWORDS.map(({ mode, keywords }) => ({
  mode,
  rx: new RegExp(String.raw`\b(?:${keywords.join("|")})\b`, "i"),
}));

export function classifyPaymentMode(text: string): PaymentMode | undefined {
  return PAYMENT_MODE_MATCHERS.find(({ rx }) => rx.test(text))?.mode;
}

/**
 * The declared "mode of payment" value is trusted first; otherwise the
 * first fragment mentioning a payment keyword decides. Defaults to cash.
 */
export function resolvePaymentMode(
  declared: string | undefined,
  texts: readonly string[],
): PaymentMode {
  if (declared) {
    const mode = classifyPaymentMode(declared);
    if (mode) return mode;
  }
  for (const text of texts) {
    const mode = classifyPaymentMode(text);
    if (mode) return mode;
  }
  return PaymentMode.CASH;
}

// ─── Categories ───────────────────────────────────────────────────────────────

const CATEGORY_INDEX = knownCategories.map((label) => ({
  label,
  lower: label.toLowerCase(),
  base: label.toLowerCase().split(" (")[0].trim(),
}));

/** "raw materials" → "Raw Materials (cement/steel/sand/bricks)" */
export function canonicaliseCategory(name: string): string {
  const lower = name.toLowerCase();
  const hit = CATEGORY_INDEX.find(
    (c) =>
      c.lower === lower ||
      c.base === lower ||
      (lower.length >= 4 && c.base.startsWith(lower)),
  );
  return hit ? hit.label : name;
}

export function splitCategories(raw: string | undefined): string[] {
  if (!raw) return [];
  const seen = new Set<string>();
  const out: string[] = [];
  for (const part of raw.split(",")) {
    const trimmed = part.trim();
    if (!trimmed) continue;
    const category = canonicaliseCategory(trimmed);
    const key = category.toLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);
    out.push(category);
  }
  return out;
}

// ─── Numeric fields ───────────────────────────────────────────────────────────

/** Cleaned numeric string for form fields, "" when nothing numeric is present */
export function numericField(raw: string | undefined): string {
  const token = extractNumericToken(raw);
  if (token === undefined || parseDecimal(token) === null) return "";
  return cleanNumeric(token);
}

const TRAILING_UNIT_RX = /^\s*\d[\d,]*(?:\.\d+)?\s*([a-z][a-z. ]{0,15}?)\.?\s*$/i;

/** "5 Bags" → "Bags" */
function unitFromQuantity(raw: string | undefined): string {
  return raw ? (TRAILING_UNIT_RX.exec(raw)?.[1] ?? "") : "";
}

// ─── Assembly ─────────────────────────────────────────────────────────────────

export interface AssemblyInput {
  /** Raw resolved strings keyed by field key */
  fields: ReadonlyMap<string, string>;
  /** Usable fragment texts in reading order */
  texts: readonly string[];
}

export function assembleResult(input: AssemblyInput): ReceiptAnalysisResult {
  const text = (key: string): string => input.fields.get(key)?.trim() ?? "";
  const rawAmount = extractNumericToken(input.fields.get("amount"));

  const categories = Object.freeze(splitCategories(input.fields.get("categories")));

  return Object.freeze({
    date: parseDate(input.fields.get("date")),
    amount: rawAmount === undefined ? null : parseDecimal(rawAmount),
    description: text("description"),
    categories,
    paymentMode: resolvePaymentMode(input.fields.get("modeOfPayment"), input.texts),
    itemType: text("itemType"),
    item: text("item"),
    brand: text("brand"),
    spec: text("spec"),
    quantity: numericField(input.fields.get("quantity")),
    unitOfMeasure: text("uom") || unitFromQuantity(input.fields.get("quantity")),
    unitPrice: numericField(input.fields.get("unitPrice")),
  });
}
