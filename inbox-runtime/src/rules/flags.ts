import type { RuleSet } from "./handbook";

/**
 * Custom Flags の 1 行（`条件 → フラグ`）を解釈したもの。
 */
export type FlagCondition =
  | { kind: "amount"; operator: "<" | ">" | "="; threshold: number }
  | { kind: "contains"; keyword: string }
  | { kind: "due_within"; days: number }
  | { kind: "due_beyond"; days: number };

export type FlagRule = {
  source: string;
  condition: FlagCondition;
  flag: string;
};

const RULE_SEPARATOR = /\s*(?:→|->)\s*/;
const DOLLAR_AMOUNT = /\$(\d+(?:,\d{3})*(?:\.\d+)?)/g;
const QUOTED_KEYWORD = /['"]([^'"]+)['"]/;
const DAY_COUNT = /(\d+)\s*days?/i;
const DAY_MS = 24 * 60 * 60 * 1000;

const MONTHS = [
  "january",
  "february",
  "march",
  "april",
  "may",
  "june",
  "july",
  "august",
  "september",
  "october",
  "november",
  "december",
];

const ISO_DATE = /\b(\d{4})-(\d{2})-(\d{2})\b/g;
const US_DATE = /\b(\d{1,2})\/(\d{1,2})\/(\d{4})\b/g;
const LONG_DATE = new RegExp(`\\b(${MONTHS.join("|")})\\s+(\\d{1,2}),?\\s+(\\d{4})\\b`, "gi");

const parseAmount = (value: string) => Number.parseFloat(value.replace(/,/g, ""));

const detectOperator = (condition: string): "<" | ">" | "=" | null => {
  if (condition.includes(">")) {
    return ">";
  }
  if (condition.includes("<")) {
    return "<";
  }
  if (condition.includes("=")) {
    return "=";
  }
  return null;
};

const parseCondition = (condition: string): FlagCondition | null => {
  const lowered = condition.toLowerCase();

  if (lowered.includes("due date")) {
    const days = condition.match(DAY_COUNT);
    if (!days?.[1]) {
      return null;
    }
    const count = Number.parseInt(days[1], 10);
    return condition.includes(">")
      ? { kind: "due_beyond", days: count }
      : { kind: "due_within", days: count };
  }

  if (lowered.includes("contains")) {
    const keyword = condition.match(QUOTED_KEYWORD)?.[1]?.trim();
    return keyword ? { kind: "contains", keyword } : null;
  }

  if (lowered.includes("amount") || condition.includes("$")) {
    const operator = detectOperator(condition);
    const threshold = [...condition.matchAll(DOLLAR_AMOUNT)][0]?.[1];
    if (!operator || threshold === undefined) {
      return null;
    }
    return { kind: "amount", operator, threshold: parseAmount(threshold) };
  }

  return null;
};

/**
 * 解釈できない行は読み飛ばす。
 */
export const parseFlagRules = (lines: readonly string[]): FlagRule[] => {
  const rules: FlagRule[] = [];

  for (const line of lines) {
    const [condition, flag, ...rest] = line.split(RULE_SEPARATOR);
    if (!condition || !flag || rest.length > 0) {
      continue;
    }

    const parsed = parseCondition(condition.trim());
    if (parsed && flag.trim().length > 0) {
      rules.push({ source: line, condition: parsed, flag: flag.trim() });
    }
  }

  return rules;
};

const extractAmounts = (content: string) =>
  [...content.matchAll(DOLLAR_AMOUNT)]
    .map((match) => (match[1] === undefined ? Number.NaN : parseAmount(match[1])))
    .filter((value) => Number.isFinite(value));

const toUtcDate = (year: number, monthIndex: number, day: number) => {
  const date = new Date(Date.UTC(year, monthIndex, day));
  return date.getUTCMonth() === monthIndex && date.getUTCDate() === day ? date : null;
};

export const extractDates = (content: string): Date[] => {
  const dates: Date[] = [];
  const push = (date: Date | null) => {
    if (date) {
      dates.push(date);
    }
  };

  for (const [, year, month, day] of content.matchAll(ISO_DATE)) {
    push(toUtcDate(Number(year), Number(month) - 1, Number(day)));
  }
  for (const [, month, day, year] of content.matchAll(US_DATE)) {
    push(toUtcDate(Number(year), Number(month) - 1, Number(day)));
  }
  for (const [, monthName, day, year] of content.matchAll(LONG_DATE)) {
    const monthIndex = MONTHS.indexOf((monthName ?? "").toLowerCase());
    if (monthIndex !== -1) {
      push(toUtcDate(Number(year), monthIndex, Number(day)));
    }
  }

  return dates;
};

const daysFromToday = (date: Date, now: Date) => {
  const today = Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate());
  return Math.round((date.getTime() - today) / DAY_MS);
};

export const matchesCondition = (condition: FlagCondition, content: string, now: Date) => {
  switch (condition.kind) {
    case "amount":
      return extractAmounts(content).some((amount) => {
        if (condition.operator === ">") {
          return amount > condition.threshold;
        }
        if (condition.operator === "<") {
          return amount < condition.threshold;
        }
        return amount === condition.threshold;
      });
    case "contains":
      return content.toLowerCase().includes(condition.keyword.toLowerCase());
    case "due_within":
      return extractDates(content).some((date) => daysFromToday(date, now) <= condition.days);
    case "due_beyond":
      return extractDates(content).some((date) => daysFromToday(date, now) > condition.days);
  }
};

/**
 * 副作用のない評価。途中で例外が起きた場合はフラグなしとして扱う。
 */
export const evaluateFlags = (
  rules: RuleSet,
  content: string,
  now: Date = new Date()
): string[] => {
  try {
    const flags: string[] = [];
    for (const rule of parseFlagRules(rules.customFlags)) {
      if (matchesCondition(rule.condition, content, now) && !flags.includes(rule.flag)) {
        flags.push(rule.flag);
      }
    }
    return flags;
  } catch {
    return [];
  }
};
