import type { RuleSet } from "../rules/handbook";
import type { Task } from "../tasks/task";

export type SummaryRequest = {
  task: Task;
  content: string;
  rules: RuleSet;
  /** renderProcessingContext で書き出したハンドブックのルール。 */
  context: string;
  flags: readonly string[];
};

export type SummaryResult = {
  text: string;
  flags?: string[];
  model: string;
  tokenCount: number;
  category?: string | null;
};

/**
 * 内容の要約を担う外部コラボレーター。失敗時は例外を投げてよい。
 */
export type Summarizer = (request: SummaryRequest) => Promise<SummaryResult>;

export const DEFAULT_SUMMARY_MODEL = "placeholder-summarizer";
export const DEFAULT_SUMMARY_CATEGORY = "document";

export const estimateTokens = (content: string) => Math.ceil(content.length / 4);

const renderFlagList = (flags: readonly string[]) =>
  flags.length === 0 ? "- None" : flags.map((flag) => `- ${flag}`).join("\n");

/**
 * 外部モデルを呼ばずに決まった書式の分析を返す既定の要約器。
 */
export const createPlaceholderSummarizer =
  (model = DEFAULT_SUMMARY_MODEL): Summarizer =>
  async ({ task, content, context, flags }) => {
    const text = [
      "### Summary",
      "",
      `- File: ${task.originalFile.name} (${task.originalFile.sizeBytes} bytes)`,
      `- Length: ${content.length} characters`,
      "- Automated analysis is not configured; review the original content manually.",
      "",
      "### Key Points",
      "",
      "- Content captured from the Inbox",
      "",
      "### Action Items",
      "",
      "- [ ] Review the original content",
      "",
      "### Flags",
      "",
      renderFlagList(flags),
      "",
      "### Processing Context",
      "",
      "```text",
      context.trimEnd(),
      "```",
    ].join("\n");

    return {
      text,
      model,
      tokenCount: estimateTokens(content),
      category: DEFAULT_SUMMARY_CATEGORY,
    };
  };
