/**
 * Diff Engine
 * Computes the operations that turn the current record set into the desired one
 */
import { compareByValue, compareRecords, identityKey, sameContent } from '../records/RecordModel.js';
import type { DNSRecord, OperationKind, PlannedOperation, ProviderRecord } from '../types/index.js';

const KIND_ORDER: Record<OperationKind, number> = {
  delete: 0,
  create: 1,
  update: 2,
};

interface KeyGroup {
  desired: DNSRecord[];
  current: ProviderRecord[];
}

/**
 * The record an operation is about: the new state for creates and updates
 */
export function operationRecord(operation: PlannedOperation): DNSRecord {
  return operation.kind === 'delete' ? operation.current : operation.desired;
}

/**
 * Deterministic order: kind (delete, create, update), type, host, priority, value
 */
export function compareOperations(a: PlannedOperation, b: PlannedOperation): number {
  return KIND_ORDER[a.kind] - KIND_ORDER[b.kind] || compareRecords(operationRecord(a), operationRecord(b));
}

/**
 * Compute the minimal ordered operation list.
 *
 * Both sets must already be normalized. Records are matched by identity key;
 * within a key, exact content matches cancel out, the remaining records are
 * paired by value into updates, and the surplus becomes creates or deletes.
 */
export function computeDiff(desired: DNSRecord[], current: ProviderRecord[]): PlannedOperation[] {
  const groups = new Map<string, KeyGroup>();

  function getGroup(key: string): KeyGroup {
    let group = groups.get(key);
    if (!group) {
      group = { desired: [], current: [] };
      groups.set(key, group);
    }
    return group;
  }

  for (const record of desired) {
    getGroup(identityKey(record)).desired.push(record);
  }
  for (const record of current) {
    getGroup(identityKey(record)).current.push(record);
  }

  const operations: PlannedOperation[] = [];

  for (const group of groups.values()) {
    const unmatchedCurrent = [...group.current];
    const unmatchedDesired: DNSRecord[] = [];

    for (const record of group.desired) {
      const index = unmatchedCurrent.findIndex((existing) => sameContent(existing, record));
      if (index === -1) {
        unmatchedDesired.push(record);
      } else {
        unmatchedCurrent.splice(index, 1);
      }
    }

    unmatchedDesired.sort(compareByValue);
    unmatchedCurrent.sort(compareByValue);

    const pairs = Math.min(unmatchedDesired.length, unmatchedCurrent.length);
    for (let i = 0; i < pairs; i++) {
      const desiredRecord = unmatchedDesired[i];
      const currentRecord = unmatchedCurrent[i];
      if (desiredRecord && currentRecord) {
        operations.push({ kind: 'update', current: currentRecord, desired: desiredRecord });
      }
    }

    for (const record of unmatchedDesired.slice(pairs)) {
      operations.push({ kind: 'create', desired: record });
    }
    for (const record of unmatchedCurrent.slice(pairs)) {
      operations.push({ kind: 'delete', current: record });
    }
  }

  return operations.sort(compareOperations);
}
