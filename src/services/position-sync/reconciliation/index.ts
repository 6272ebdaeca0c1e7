/**
 * Reconciliation Module
 *
 * Per-book decision core and the BookState helpers around it.
 */

export {
  clampPosition,
  createBookState,
  mergeDuration,
  otherSide,
  recordDryRunPush,
  recordPush,
} from './book-state.js'
export { decide } from './reconciler.js'
