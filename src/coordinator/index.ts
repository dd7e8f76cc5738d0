/**
 * @fileoverview Federated search coordination
 *
 * Building blocks shared between the background source workers and the UI:
 * per-source status cells, the generation-gated result sink, the selection
 * set and the redraw wake-up.
 */

export { StatusCell, canTransition, statusLabel, type SourceStatus } from './status_cell.js';
export { RedrawSignal } from './redraw_signal.js';
export { ResultSink } from './result_sink.js';
export { SelectionSet, type WriteDestination, type WriteReport } from './selection_set.js';
export { PendingSearch, type SearchRequest } from './pending_search.js';
export {
  SearchCoordinator,
  SourceSlot,
  type CommitFailure,
  type CommitReport,
  type CoordinatorOptions,
  type SourceRegistration,
} from './search_coordinator.js';
