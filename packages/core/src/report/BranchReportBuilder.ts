/**
 * BranchReportBuilder - one record per branching construct, in pre-order
 *
 * Location ids are shared across the whole pass: a record's condition takes
 * the next id, then each of its branches in order, before the walk moves on
 * to the next node.
 */

import type { BranchRecord, DecoratedNode } from '@forkcov/types';
import type { FlowCountModel } from '../flow/FlowCountModel.js';
import { createTraversalContext } from '../location/LocationResolver.js';
import { assertNever } from '../tree/DecoratedTree.js';
import { conditionalRecord } from './rules/conditional.js';
import { dispatchRecord } from './rules/dispatch.js';
import { loopRecord } from './rules/loop.js';
import type { RuleContext } from './rules/RuleContext.js';
import { safeNavigationRecord } from './rules/safeNavigation.js';
import { shortCircuitRecord } from './rules/shortCircuit.js';

/**
 * Record for a single node, or null for kinds that do not branch.
 */
export function deriveBranchRecord(ctx: RuleContext, node: DecoratedNode): BranchRecord | null {
  switch (node.kind) {
    case 'Conditional':
      return conditionalRecord(ctx, node);
    case 'Dispatch':
      return dispatchRecord(ctx, node);
    case 'ShortCircuit':
      return shortCircuitRecord(ctx, node);
    case 'SafeNavigationCall':
      return safeNavigationRecord(ctx, node);
    case 'Loop':
      return loopRecord(ctx, node);
    case 'Root':
    case 'Sequence':
    case 'Expression':
    case 'Interrupt':
    case 'EmptyBody':
    case 'DispatchArm':
    case 'TryHandler':
    case 'HandlerArm':
    case 'ElseClause':
    case 'FinallyBlock':
      return null;
    default:
      return assertNever(node);
  }
}

export function buildBranchReport(model: FlowCountModel): BranchRecord[] {
  const ctx: RuleContext = { tree: model.tree, model, traversal: createTraversalContext() };
  const records: BranchRecord[] = [];
  for (const node of model.tree.preorder()) {
    const record = deriveBranchRecord(ctx, node);
    if (record) records.push(record);
  }
  return records;
}
