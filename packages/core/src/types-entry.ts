/**
 * Types-only entrypoint.
 *
 * This avoids runtime circular dependencies between:
 * - `@accessaudit/core` (orchestrator, stores, PDF auditor)
 * - `@accessaudit/rules` (web rule evaluator)
 *
 * Packages that only need the shared data model should import from
 * `@accessaudit/core/types`.
 */
export * from './types/index.js';
