export * from "./config";
export * from "./pipeline";
export * from "./ledger/ledgerStore";
export * from "./ledger/rebuild";
export * from "./maintenance/inboxCleanup";
export * from "./processing/orchestrator";
export * from "./processing/summarizer";
export * from "./rules/flags";
export * from "./rules/handbook";
export * from "./stats/dashboard";
export * from "./tasks/content";
export * from "./tasks/lifecycle";
export * from "./tasks/task";
export * from "./tasks/taskRecord";
export * from "./tasks/taskRepository";
export * from "./utils/logger";
export * from "./utils/results";
export * from "./vault/atomicWrite";
export * from "./vault/errorRecords";
export * from "./vault/frontmatter";
export * from "./vault/paths";
export * from "./vault/scaffold";
export * from "./watcher/debounce";
export * from "./watcher/inboxHandler";
export * from "./watcher/inboxWatcher";
export * from "./watcher/taskCreator";
