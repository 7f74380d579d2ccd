/**
 * Desired-state file loading and export
 *
 * A desired-state file is JSON or YAML holding either a bare list of records or
 * `{ zone?, ignore?, records }`. Records are objects or
 * `[type, host, value, priority?, ttl?]` tuples.
 */
import { readFile } from 'fs/promises';
import { extname } from 'path';
import * as yaml from 'yaml';
import { createChildLogger } from '../core/Logger.js';
import { ValidationError, type ValidationIssue } from '../core/errors.js';
import { desiredStateFileSchema, type DesiredRecordInput } from '../config/schema.js';
import {
  compareRecords,
  describeRecord,
  findRecordIssues,
  identityKey,
  matchesSelector,
  normalizeHost,
  normalizeRecord,
  normalizeZone,
} from './RecordModel.js';
import type { DNSRecord, DesiredState, RecordSelector } from '../types/index.js';

const logger = createChildLogger({ service: 'DesiredState' });

export type DesiredStateFormat = 'json' | 'yaml';

/** Apex NS records belong to whoever hosts the zone */
export const DEFAULT_IGNORE: readonly RecordSelector[] = [{ type: 'NS', host: '@' }];

export function formatFromPath(path: string): DesiredStateFormat {
  return extname(path).toLowerCase() === '.json' ? 'json' : 'yaml';
}

function parseText(text: string, format: DesiredStateFormat, source: string): unknown {
  try {
    return format === 'json' ? JSON.parse(text) : yaml.parse(text);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ValidationError(`Cannot parse desired-state file ${source}: ${message}`);
  }
}

function toRecord(input: DesiredRecordInput, zone?: string): DNSRecord {
  const record: DNSRecord = {
    type: input.type,
    host: input.host,
    value: input.value,
    ttl: input.ttl,
  };
  if (input.priority !== null && input.priority !== undefined) {
    record.priority = input.priority;
  }
  return normalizeRecord(record, zone);
}

/**
 * Check the desired-set invariants: every record valid, no duplicate identity
 * keys except MX records with different values, and CNAMEs alone on their host
 */
export function findDesiredStateIssues(records: DNSRecord[]): ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  const seen = new Map<string, DNSRecord[]>();
  const typesByHost = new Map<string, Set<string>>();

  records.forEach((record, index) => {
    for (const issue of findRecordIssues(record)) {
      issues.push({ field: `records.${index}.${issue.field}`, message: issue.message });
    }

    const key = identityKey(record);
    const sameKey = seen.get(key) ?? [];
    if (sameKey.some((other) => other.value === record.value)) {
      issues.push({ field: `records.${index}`, message: `Duplicate record: ${describeRecord(record)}` });
    } else if (sameKey.length > 0 && record.type !== 'MX') {
      issues.push({ field: `records.${index}`, message: `Conflicting ${record.type} records for host ${record.host}` });
    }
    sameKey.push(record);
    seen.set(key, sameKey);

    const types = typesByHost.get(record.host) ?? new Set<string>();
    types.add(record.type);
    typesByHost.set(record.host, types);
  });

  for (const [host, types] of typesByHost) {
    if (types.has('CNAME') && types.size > 1) {
      issues.push({ field: 'records', message: `CNAME at ${host} cannot coexist with other records` });
    }
  }

  return issues;
}

/**
 * Parse and validate desired-state text
 */
export function parseDesiredState(text: string, format: DesiredStateFormat, source: string = '<input>'): DesiredState {
  const parsed = desiredStateFileSchema.safeParse(parseText(text, format, source));
  if (!parsed.success) {
    throw ValidationError.fromZod(parsed.error, `Invalid desired-state file ${source}`);
  }

  const file = parsed.data;
  const zone = file.zone ? normalizeZone(file.zone) : undefined;
  const records = file.records.map((input) => toRecord(input, zone));

  const issues = findDesiredStateIssues(records);
  if (issues.length > 0) {
    const summary = issues.map((issue) => issue.message).join('; ');
    throw new ValidationError(`Invalid desired-state file ${source}: ${summary}`, issues);
  }

  const ignore = file.ignore
    ? file.ignore.map((selector) => ({ ...selector, host: normalizeHost(selector.host, zone) }))
    : [...DEFAULT_IGNORE];

  logger.debug({ source, zone, count: records.length, ignored: ignore.length }, 'Desired state loaded');

  return { zone, records, ignore, source };
}

/**
 * Read, parse and validate a desired-state file
 */
export async function loadDesiredState(path: string): Promise<DesiredState> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ValidationError(`Cannot read desired-state file ${path}: ${message}`);
  }

  return parseDesiredState(text, formatFromPath(path), path);
}

function isExportable(record: DNSRecord): boolean {
  if (record.type === 'MX' && record.priority === undefined) {
    logger.warn({ host: record.host, value: record.value }, 'Skipping MX record without priority');
    return false;
  }
  return !DEFAULT_IGNORE.some((selector) => matchesSelector(record, selector));
}

/**
 * Render records as a desired-state file. Records matched by the default
 * ignore selectors, and MX records without a priority, are left out.
 */
export function serializeDesiredState(records: DNSRecord[], zone: string, format: DesiredStateFormat): string {
  const exported = records
    .filter(isExportable)
    .sort(compareRecords)
    .map((record) => ({
      type: record.type,
      host: record.host,
      value: record.value,
      ...(record.type === 'MX' ? { priority: record.priority } : {}),
      ttl: record.ttl === 'auto' ? 'Automatic' : record.ttl,
    }));

  const file = { zone: normalizeZone(zone), records: exported };
  return format === 'json' ? `${JSON.stringify(file, null, 2)}\n` : yaml.stringify(file, { indent: 2 });
}
