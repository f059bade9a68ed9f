import type { z } from 'zod';

// ============================================================
// Validation Result Types
// ============================================================

export interface ValidationIssue {
  file: string;
  path: string;  // JSON path like "nodes.2.type"
  message: string;
  severity: 'error' | 'warning';
  suggestion?: string;
}

/**
 * Render a zod issue path the way ValidationIssue expects it.
 */
export function formatIssuePath(path: ReadonlyArray<string | number>): string {
  return path.join('.') || 'root';
}

/**
 * Convert Zod error to ValidationIssues
 */
export function zodErrorToIssues(error: z.ZodError, file: string): ValidationIssue[] {
  return error.issues.map((issue) => ({
    file,
    path: formatIssuePath(issue.path),
    message: issue.message,
    severity: 'error' as const,
  }));
}

/**
 * One line per issue: "file: path: message".
 */
export function formatIssues(issues: ValidationIssue[]): string {
  return issues.map((issue) => `${issue.file}: ${issue.path}: ${issue.message}`).join('\n');
}
