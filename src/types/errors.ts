/**
 * Error kinds for Phaseline.
 *
 * Every error the framework raises carries a kind from this closed set.
 * Kinds form a tree rooted at `ERROR`; status-page style handlers are
 * looked up by walking from an error's kind towards the root.
 */

// ---------------------------------------------------------------------------
// ErrorKind
// ---------------------------------------------------------------------------

export const ErrorKind = {
  ERROR: 'ERROR',
  INSTALL: 'INSTALL',
  PHASE_NOT_FOUND: 'PHASE_NOT_FOUND',
  PIPELINE_FROZEN: 'PIPELINE_FROZEN',
  MISSING_DEPENDENCY: 'MISSING_DEPENDENCY',
  DUPLICATE_PLUGIN: 'DUPLICATE_PLUGIN',
  ORDERING_CYCLE: 'ORDERING_CYCLE',
  EXECUTION_STATE: 'EXECUTION_STATE',
  CANCELLED: 'CANCELLED',
  HANDLER: 'HANDLER',
  BAD_REQUEST: 'BAD_REQUEST',
  CANNOT_TRANSFORM: 'CANNOT_TRANSFORM',
  REQUEST_ALREADY_CONSUMED: 'REQUEST_ALREADY_CONSUMED',
  NOT_FOUND: 'NOT_FOUND',
  RESPONSE_ALREADY_SENT: 'RESPONSE_ALREADY_SENT',
} as const;

export type ErrorKindValue = (typeof ErrorKind)[keyof typeof ErrorKind];

// ---------------------------------------------------------------------------
// Hierarchy
// ---------------------------------------------------------------------------

/**
 * Parent of each kind. `ERROR` is the only root.
 *
 *   ERROR
 *   ├── INSTALL (PHASE_NOT_FOUND, PIPELINE_FROZEN, MISSING_DEPENDENCY,
 *   │            DUPLICATE_PLUGIN, ORDERING_CYCLE)
 *   ├── EXECUTION_STATE
 *   ├── CANCELLED
 *   └── HANDLER
 *       ├── BAD_REQUEST (CANNOT_TRANSFORM, REQUEST_ALREADY_CONSUMED)
 *       ├── NOT_FOUND
 *       └── RESPONSE_ALREADY_SENT
 */
export const ERROR_KIND_PARENT: Readonly<Record<ErrorKindValue, ErrorKindValue | null>> = {
  [ErrorKind.ERROR]: null,
  [ErrorKind.INSTALL]: ErrorKind.ERROR,
  [ErrorKind.PHASE_NOT_FOUND]: ErrorKind.INSTALL,
  [ErrorKind.PIPELINE_FROZEN]: ErrorKind.INSTALL,
  [ErrorKind.MISSING_DEPENDENCY]: ErrorKind.INSTALL,
  [ErrorKind.DUPLICATE_PLUGIN]: ErrorKind.INSTALL,
  [ErrorKind.ORDERING_CYCLE]: ErrorKind.INSTALL,
  [ErrorKind.EXECUTION_STATE]: ErrorKind.ERROR,
  [ErrorKind.CANCELLED]: ErrorKind.ERROR,
  [ErrorKind.HANDLER]: ErrorKind.ERROR,
  [ErrorKind.BAD_REQUEST]: ErrorKind.HANDLER,
  [ErrorKind.CANNOT_TRANSFORM]: ErrorKind.BAD_REQUEST,
  [ErrorKind.REQUEST_ALREADY_CONSUMED]: ErrorKind.BAD_REQUEST,
  [ErrorKind.NOT_FOUND]: ErrorKind.HANDLER,
  [ErrorKind.RESPONSE_ALREADY_SENT]: ErrorKind.HANDLER,
};

/**
 * The kind followed by each of its ancestors, most specific first.
 *
 * @example
 * ```ts
 * kindLineage(ErrorKind.CANNOT_TRANSFORM);
 * // → ['CANNOT_TRANSFORM', 'BAD_REQUEST', 'HANDLER', 'ERROR']
 * ```
 */
export function kindLineage(kind: ErrorKindValue): ErrorKindValue[] {
  const lineage: ErrorKindValue[] = [];
  let current: ErrorKindValue | null = kind;
  while (current !== null) {
    lineage.push(current);
    current = ERROR_KIND_PARENT[current];
  }
  return lineage;
}

/** Whether `kind` equals `ancestor` or descends from it. */
export function isKindOf(kind: ErrorKindValue, ancestor: ErrorKindValue): boolean {
  return kindLineage(kind).includes(ancestor);
}

// ---------------------------------------------------------------------------
// Error payload
// ---------------------------------------------------------------------------

/** Serializable description of a framework error (no stack, no internals). */
export interface ErrorPayload {
  kind: ErrorKindValue;
  message: string;
  /** Status code suggested for a response rendering this error. */
  status?: number;
}
