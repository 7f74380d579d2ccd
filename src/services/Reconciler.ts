/**
 * Reconciler
 * Fetches the current record set, diffs it against the desired one and applies the plan
 */
import type { Logger } from 'pino';
import { createChildLogger } from '../core/Logger.js';
import { ValidationError, toRegistrarError, type RegistrarError } from '../core/errors.js';
import { DEFAULT_RETRY_OPTIONS, withRetry, type RetryOptions } from '../core/retry.js';
import { describeRecord, matchesSelector } from '../records/RecordModel.js';
import { findDesiredStateIssues } from '../records/DesiredStateLoader.js';
import type { RegistrarClient } from '../providers/base/RegistrarClient.js';
import { computeDiff, operationRecord } from './DiffEngine.js';
import type { DesiredState, PlannedOperation, ProviderRecord, RecordSelector } from '../types/index.js';

export interface ReconcileOptions {
  dryRun: boolean;
}

export interface ReconcilePlan {
  zone: string;
  operations: PlannedOperation[];
  /** Current records left alone by ignore selectors */
  ignored: ProviderRecord[];
}

export interface ReconcileFailure {
  /** Absent when planning failed */
  operation?: PlannedOperation;
  error: RegistrarError;
}

export interface ReconcileResult {
  zone: string;
  provider: string;
  dryRun: boolean;
  operations: PlannedOperation[];
  applied: PlannedOperation[];
  ignored: ProviderRecord[];
  failure?: ReconcileFailure;
}

/**
 * One-line rendering of an operation, e.g. `update A @ -> 1.2.3.4 (ttl auto)`
 */
export function describeOperation(operation: PlannedOperation): string {
  return `${operation.kind} ${describeRecord(operationRecord(operation))}`;
}

/**
 * Selectors still in force: one that matches a desired record is disabled
 */
export function activeSelectors(desired: DesiredState): RecordSelector[] {
  return desired.ignore.filter(
    (selector) => !desired.records.some((record) => matchesSelector(record, selector))
  );
}

export class Reconciler {
  private logger: Logger;

  constructor(
    private readonly client: RegistrarClient,
    private readonly retry: RetryOptions = DEFAULT_RETRY_OPTIONS
  ) {
    this.logger = createChildLogger({ service: 'Reconciler', zone: client.getZoneName() });
  }

  /**
   * Fetch current records and compute the operations that reach the desired state
   */
  async plan(desired: DesiredState): Promise<ReconcilePlan> {
    this.checkDesiredRecords(desired);

    const current = await this.withRetry('list records', () => this.client.list());

    const selectors = activeSelectors(desired);
    const ignored: ProviderRecord[] = [];
    const managed: ProviderRecord[] = [];
    for (const record of current) {
      if (selectors.some((selector) => matchesSelector(record, selector))) {
        ignored.push(record);
      } else {
        managed.push(record);
      }
    }

    const records = desired.records.map((record) => this.client.normalizeRecord(record, managed));
    const operations = computeDiff(records, managed);

    this.logger.debug(
      { current: current.length, ignored: ignored.length, desired: records.length, count: operations.length },
      'Plan computed'
    );

    return { zone: this.client.getZoneName(), operations, ignored };
  }

  /**
   * Plan, then apply sequentially unless this is a dry run.
   * Stops at the first failure; operations already applied stay applied.
   */
  async run(desired: DesiredState, options: ReconcileOptions): Promise<ReconcileResult> {
    const result: ReconcileResult = {
      zone: this.client.getZoneName(),
      provider: this.client.getProviderName(),
      dryRun: options.dryRun,
      operations: [],
      applied: [],
      ignored: [],
    };

    try {
      const plan = await this.plan(desired);
      result.operations = plan.operations;
      result.ignored = plan.ignored;
    } catch (error) {
      result.failure = { error: toRegistrarError(error) };
      this.logger.error({ reason: result.failure.error.message }, 'Failed to plan changes');
      return result;
    }

    if (result.operations.length === 0) {
      this.logger.info('Zone already in sync');
      return result;
    }

    if (options.dryRun) {
      this.logger.info({ count: result.operations.length }, 'Dry run, no changes applied');
      return result;
    }

    for (const operation of result.operations) {
      try {
        await this.withRetry(describeOperation(operation), () => this.client.apply(operation));
        result.applied.push(operation);
      } catch (error) {
        result.failure = { operation, error: toRegistrarError(error) };
        this.logger.error(
          { operation: describeOperation(operation), reason: result.failure.error.message, count: result.applied.length },
          'Operation failed, stopping'
        );
        return result;
      }
    }

    this.logger.info({ count: result.applied.length }, 'Reconciliation complete');
    return result;
  }

  /**
   * Desired-set invariants, on hosts relative to the zone this client manages
   */
  private checkDesiredRecords(desired: DesiredState): void {
    const records = desired.records.map((record) => this.client.normalizeRecord(record));
    const issues = findDesiredStateIssues(records);
    if (issues.length > 0) {
      const summary = issues.map((issue) => issue.message).join('; ');
      throw new ValidationError(`Invalid desired records for ${this.client.getZoneName()}: ${summary}`, issues);
    }
  }

  private withRetry<T>(action: string, fn: () => Promise<T>): Promise<T> {
    return withRetry(fn, {
      ...this.retry,
      onRetry: (error, attempt, delayMs) => {
        this.logger.warn(
          { operation: action, attempt, delayMs, reason: error.message },
          'Registrar call failed, retrying'
        );
        this.retry.onRetry?.(error, attempt, delayMs);
      },
    });
  }
}
