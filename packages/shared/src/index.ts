/**
 * @boxwright/shared
 *
 * Cross-package plumbing for Boxwright: the scoped debug logger and the
 * validation issue shapes reported by config and input validators.
 *
 *   import { createLogger } from '@boxwright/shared';
 *   import { zodErrorToIssues, type ValidationIssue } from '@boxwright/shared';
 */

export { createLogger, enableDebug } from './utils/debug.ts';
export type { Logger, LogLevel } from './utils/debug.ts';
export * from './issues/index.ts';
