import { promises as fs } from "fs";

import { errorCode } from "../utils/results";

/**
 * Company_Handbook.md の書式が変わった場合はここを上げ、パーサー側で分岐する。
 */
export const HANDBOOK_PARSER_VERSION = 1;

export type RuleSet = {
  parserVersion: number;
  summarization: string[];
  toneStyle: string[];
  specialInstructions: string[];
  customFlags: string[];
  preferences: Record<string, string>;
};

export type RuleLoader = () => Promise<RuleSet>;

const SECTION_HEADINGS = {
  summarization: "### Summarization",
  toneStyle: "### Tone & Style",
  specialInstructions: "### Special Instructions",
  customFlags: "## Custom Flags",
  preferences: "## Preferences",
} as const;

const HEADING_PATTERN = /^#{1,6}\s+/;
const PREFERENCE_PATTERN = /^- \*\*(.+?)\*\*:\s*(.+)$/;

export const buildDefaultRules = (): RuleSet => ({
  parserVersion: HANDBOOK_PARSER_VERSION,
  summarization: [
    "Use 3 bullet points for summaries",
    "Keep summaries under 200 words",
    "Extract action items as checkboxes",
  ],
  toneStyle: ["Professional and courteous", "Concise and clear", "Action-oriented"],
  specialInstructions: [],
  customFlags: ["Amount > $1000 → 💰 High-value"],
  preferences: {
    summary_length: "150-200 words",
    action_item_format: "Checkboxes",
    date_format: "ISO 8601",
    time_zone: "UTC",
  },
});

const sectionLines = (lines: string[], heading: string): string[] => {
  const start = lines.findIndex((line) => line.trim() === heading);
  if (start === -1) {
    return [];
  }

  const collected: string[] = [];
  for (const line of lines.slice(start + 1)) {
    if (HEADING_PATTERN.test(line.trim())) {
      break;
    }
    collected.push(line.trim());
  }
  return collected;
};

const extractBullets = (lines: string[], heading: string) =>
  sectionLines(lines, heading)
    .filter((line) => line.startsWith("- "))
    .map((line) => line.slice(2).trim())
    .filter((line) => line.length > 0);

const normalizePreferenceKey = (key: string) => key.trim().toLowerCase().replace(/\s+/g, "_");

const extractPreferences = (lines: string[]) => {
  const preferences: Record<string, string> = {};
  for (const line of sectionLines(lines, SECTION_HEADINGS.preferences)) {
    const match = line.match(PREFERENCE_PATTERN);
    if (match?.[1] && match[2]) {
      preferences[normalizePreferenceKey(match[1])] = match[2].trim();
    }
  }
  return preferences;
};

export const parseHandbook = (content: string): RuleSet => {
  const lines = content.replace(/\r\n/g, "\n").split("\n");

  return {
    parserVersion: HANDBOOK_PARSER_VERSION,
    summarization: extractBullets(lines, SECTION_HEADINGS.summarization),
    toneStyle: extractBullets(lines, SECTION_HEADINGS.toneStyle),
    specialInstructions: extractBullets(lines, SECTION_HEADINGS.specialInstructions),
    customFlags: extractBullets(lines, SECTION_HEADINGS.customFlags),
    preferences: extractPreferences(lines),
  };
};

export const loadHandbookRules = async (handbookPath: string): Promise<RuleSet> => {
  try {
    const content = await fs.readFile(handbookPath, "utf-8");
    return parseHandbook(content);
  } catch (error) {
    if (errorCode(error) === "ENOENT") {
      return buildDefaultRules();
    }
    throw error;
  }
};

export const createHandbookRuleLoader =
  (handbookPath: string): RuleLoader =>
  () =>
    loadHandbookRules(handbookPath);

const titleCase = (value: string) =>
  value
    .split(/[_\s]+/)
    .filter((word) => word.length > 0)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(" ");

export const renderProcessingContext = (rules: RuleSet) => {
  const blocks: string[] = ["# Processing Rules", ""];

  const appendList = (title: string, items: string[]) => {
    if (items.length === 0) {
      return;
    }
    blocks.push(`## ${title}:`);
    for (const item of items) {
      blocks.push(`- ${item}`);
    }
    blocks.push("");
  };

  appendList("Summarization", rules.summarization);
  appendList("Tone & Style", rules.toneStyle);
  appendList("Special Instructions", rules.specialInstructions);
  appendList("Custom Flags", rules.customFlags);

  const preferences = Object.entries(rules.preferences);
  if (preferences.length > 0) {
    blocks.push("## Preferences:");
    for (const [key, value] of preferences) {
      blocks.push(`- ${titleCase(key)}: ${value}`);
    }
    blocks.push("");
  }

  return blocks.join("\n");
};

export const DEFAULT_HANDBOOK_TEMPLATE = `# Company Handbook

Processing rules for the AI assistant. Edit the bullet points below; changes apply on the next batch.

## Processing Rules

### Summarization

- Use 3 bullet points for summaries
- Keep summaries under 200 words
- Extract action items as checkboxes

### Tone & Style

- Professional and courteous
- Concise and clear
- Action-oriented

### Special Instructions

## Custom Flags

- Amount > $1000 → 💰 High-value
- Contains 'urgent' → 🔥 Urgent
- Due date < 7 days → ⏰ Due soon

## Preferences

- **Summary Length**: 150-200 words
- **Action Item Format**: Checkboxes
- **Date Format**: ISO 8601
- **Time Zone**: UTC
`;
