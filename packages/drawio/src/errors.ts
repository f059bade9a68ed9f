import type { ValidationIssue } from '@boxwright/shared'

// ============================================================================
// Error taxonomy
//
// Every failure is terminal for one invocation: validation, layout and style
// resolution abort before any document text exists.
// ============================================================================

export type DiagramErrorCode =
  | 'schema'
  | 'layout-cycle'
  | 'style-missing'
  | 'style-illegible'
  | 'config'

export class DiagramError extends Error {
  readonly code: DiagramErrorCode

  constructor(code: DiagramErrorCode, message: string) {
    super(message)
    this.name = 'DiagramError'
    this.code = code
  }
}

/** Input description failed validation. `path` names the offending field. */
export class SchemaError extends DiagramError {
  readonly path: string
  /** Offending identifier, when the failure is about one (missing node, duplicate id) */
  readonly id?: string

  constructor(path: string, message: string, id?: string) {
    super('schema', `${path}: ${message}`)
    this.name = 'SchemaError'
    this.path = path
    this.id = id
  }
}

/** Level assignment is undefined: the edges form a cycle. */
export class LayoutError extends DiagramError {
  readonly nodeIds: readonly string[]

  constructor(nodeIds: readonly string[], message: string) {
    super('layout-cycle', message)
    this.name = 'LayoutError'
    this.nodeIds = nodeIds
  }
}

/** A requested style combination is absent from (or illegible in) the palette. */
export class StyleError extends DiagramError {
  /** Dotted palette key that failed, e.g. "themes.dark.nodes.process.danger" */
  readonly key: string

  constructor(code: 'style-missing' | 'style-illegible', key: string, message: string) {
    super(code, message)
    this.name = 'StyleError'
    this.key = key
  }
}

/** The palette/dimension resource itself is defective. */
export class ConfigError extends DiagramError {
  readonly issues: readonly ValidationIssue[]

  constructor(message: string, issues: readonly ValidationIssue[]) {
    super('config', message)
    this.name = 'ConfigError'
    this.issues = issues
  }
}
