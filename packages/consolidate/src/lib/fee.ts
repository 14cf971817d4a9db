import { cleanString } from "./normalize";
import type { FeeBracket, FeeInfo } from "./types";

const INQUIRE_WORDS = ["inquire", "contact", "request", "call", "varies", "upon"];

const BRACKETS: Array<{ below: number; bracket: FeeBracket }> = [
  { below: 5_000, bracket: "under_5k" },
  { below: 10_000, bracket: "5k_10k" },
  { below: 20_000, bracket: "10k_20k" },
  { below: 30_000, bracket: "20k_30k" },
  { below: 50_000, bracket: "30k_50k" },
  { below: 100_000, bracket: "50k_100k" },
];

const detectCurrency = (text: string) => {
  if (text.includes("£") || /\bgbp\b/i.test(text)) {
    return "GBP";
  }
  if (text.includes("€") || /\beur\b/i.test(text)) {
    return "EUR";
  }
  return "USD";
};

const parseAmounts = (text: string) => {
  const amounts: number[] = [];
  for (const match of text.matchAll(/(\d[\d,]*(?:\.\d+)?)\s*([km])?\b/gi)) {
    const base = Number(match[1].replace(/,/g, ""));
    if (!Number.isFinite(base)) {
      continue;
    }
    const unit = match[2]?.toLowerCase();
    const multiplier = unit === "k" ? 1_000 : unit === "m" ? 1_000_000 : 1;
    amounts.push(Math.round(base * multiplier));
  }
  return amounts;
};

export const categorizeFee = (min: number | null, max: number | null): FeeBracket => {
  const midpoint = min !== null && max !== null ? (min + max) / 2 : (min ?? max ?? 0);
  if (max === null && min !== null && min >= 100_000) {
    return "over_100k";
  }
  for (const { below, bracket } of BRACKETS) {
    if (midpoint < below) {
      return bracket;
    }
  }
  return "over_100k";
};

export const parseFee = (value: string | null | undefined): FeeInfo | null => {
  const display = cleanString(value);
  if (!display) {
    return null;
  }
  const lowered = display.toLowerCase();
  const currency = detectCurrency(display);
  const amounts = parseAmounts(display);

  if (!amounts.length) {
    if (INQUIRE_WORDS.some((word) => lowered.includes(word))) {
      return { min: null, max: null, currency, display, bracket: "inquire" };
    }
    return null;
  }

  if (lowered.includes("under") || lowered.includes("less than") || lowered.includes("up to")) {
    const max = amounts[0];
    return { min: null, max, currency, display, bracket: categorizeFee(0, max) };
  }

  if (lowered.includes("over") || lowered.includes("above") || display.includes("+")) {
    const min = amounts[0];
    return { min, max: null, currency, display, bracket: categorizeFee(min, null) };
  }

  const min = Math.min(amounts[0], amounts[1] ?? amounts[0]);
  const max = Math.max(amounts[0], amounts[1] ?? amounts[0]);
  return { min, max, currency, display, bracket: categorizeFee(min, max) };
};
