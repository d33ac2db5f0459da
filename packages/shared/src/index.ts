export { createLogger, logger } from "./logger";
export { formatIssues, describeIssues } from "./validation";
export type { ValidationIssue } from "./validation";
