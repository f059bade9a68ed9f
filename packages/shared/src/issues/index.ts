export type { ValidationIssue } from './types.ts';
export { formatIssuePath, formatIssues, zodErrorToIssues } from './types.ts';
