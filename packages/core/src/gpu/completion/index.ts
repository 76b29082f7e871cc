/**
 * Completion backend contract. Concrete backends are imported by the
 * platform entry points so that browser bundles never load `node:events`.
 */
export {
  type CompletionBackend,
  type CompletionOutcome,
  type CompletionPlatform,
} from './types'
