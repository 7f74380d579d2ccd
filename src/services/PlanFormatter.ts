/**
 * Plain-text and JSON rendering of a reconcile result
 */
import { describeRecord } from '../records/RecordModel.js';
import { describeOperation, type ReconcileResult } from './Reconciler.js';
import type { OperationKind, PlannedOperation } from '../types/index.js';

const PREFIX: Record<OperationKind, string> = {
  delete: '-',
  create: '+',
  update: '~',
};

/**
 * `- A old -> 1.2.3.4 (ttl auto)`, `+ ...`, or `~ <new> (was <value>, ttl <ttl>)`
 */
export function formatOperation(operation: PlannedOperation): string {
  switch (operation.kind) {
    case 'delete':
      return `${PREFIX.delete} ${describeRecord(operation.current)}`;
    case 'create':
      return `${PREFIX.create} ${describeRecord(operation.desired)}`;
    case 'update':
      return `${PREFIX.update} ${describeRecord(operation.desired)} (was ${operation.current.value}, ttl ${operation.current.ttl})`;
  }
}

/**
 * Nonzero counts, e.g. `-1 delete, +5 create`
 */
export function formatCounts(operations: PlannedOperation[]): string {
  const kinds: OperationKind[] = ['delete', 'create', 'update'];
  return kinds
    .map((kind) => ({ kind, count: operations.filter((op) => op.kind === kind).length }))
    .filter(({ count }) => count > 0)
    .map(({ kind, count }) => `${PREFIX[kind]}${count} ${kind}`)
    .join(', ');
}

export function formatSummary(result: ReconcileResult): string {
  const ignored = result.ignored.length > 0 ? ` (${result.ignored.length} ignored)` : '';

  if (result.failure && !result.failure.operation) {
    return `Could not plan changes for ${result.zone}`;
  }
  if (result.operations.length === 0) {
    return `No changes: ${result.zone} is in sync${ignored}`;
  }
  if (result.dryRun) {
    return `Dry run for ${result.zone}: ${formatCounts(result.operations)}; nothing applied${ignored}`;
  }
  if (result.failure) {
    return `Applied ${result.applied.length} of ${result.operations.length} operations to ${result.zone}`;
  }
  return `Applied ${result.applied.length} operations to ${result.zone}: ${formatCounts(result.applied)}${ignored}`;
}

/**
 * Operation lines, then the summary, then the failure if any
 */
export function formatResult(result: ReconcileResult): string[] {
  const lines = result.operations.map(formatOperation);
  lines.push(formatSummary(result));

  if (result.failure) {
    const { operation, error } = result.failure;
    lines.push(
      operation
        ? `Failed at ${describeOperation(operation)}: ${error.message}`
        : `Failed to plan changes: ${error.message}`
    );
  }

  return lines;
}

/**
 * Machine-readable form for `--json`
 */
export function resultToJson(result: ReconcileResult): Record<string, unknown> {
  return {
    zone: result.zone,
    provider: result.provider,
    dryRun: result.dryRun,
    operations: result.operations,
    applied: result.applied.length,
    ignored: result.ignored,
    failure: result.failure
      ? {
          operation: result.failure.operation,
          code: result.failure.error.code,
          message: result.failure.error.message,
        }
      : null,
  };
}
