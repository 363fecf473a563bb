#!/usr/bin/env node

export { encodeLiteral, decodeLiteral, quoteLiteral } from './literal/codec.js';
export { parseFailures, hasFailureSignal } from './parsing/failure-parser.js';
export { buildStrategyChain, locateEdit, type MatchStrategy, type StrategyName } from './matching/index.js';
export { applyEdits } from './patching/apply-edits.js';
export { FixturePatcher } from './patching/fixture-patcher.js';
export { CommandHarness } from './harness/command-harness.js';
export type { TestHarness, HarnessSelection } from './harness/harness.js';
export {
  runReconciliation,
  reconcileStep,
  planReconciliation,
  buildEditPlan,
  createSession,
  type ReconcilerDeps,
  type ReconciliationResult,
} from './core/reconciler.js';
export type { FailureRecord, EditPlanEntry, ReconciliationSession } from './core/types.js';
export { createProgram } from './cli/program.js';

import { createProgram } from './cli/program.js';
import { killAllTrackedProcesses } from './util/process.js';

process.on('SIGINT', () => {
  killAllTrackedProcesses();
  process.exit(130);
});

await createProgram().parseAsync(process.argv);
