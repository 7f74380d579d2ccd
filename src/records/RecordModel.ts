/**
 * DNS record value helpers: identity, equality, normalization and validation
 */
import { z } from 'zod';
import { ValidationError, type ValidationIssue } from '../core/errors.js';
import { SUPPORTED_RECORD_TYPES, type DNSRecord, type DNSRecordType, type RecordSelector } from '../types/index.js';

/** Types whose value is a hostname */
const HOSTNAME_TYPES: ReadonlySet<DNSRecordType> = new Set(['CNAME', 'MX', 'NS']);

const HOST_PATTERN = /^(\*\.)?[a-z0-9_]([a-z0-9_-]*[a-z0-9_])?(\.[a-z0-9_]([a-z0-9_-]*[a-z0-9_])?)*$|^\*$/;
const HOSTNAME_VALUE_PATTERN = /^[a-z0-9_]([a-z0-9_-]*[a-z0-9_])?(\.[a-z0-9_]([a-z0-9_-]*[a-z0-9_])?)*$/;

const ipv4Schema = z.string().ip({ version: 'v4' });
const ipv6Schema = z.string().ip({ version: 'v6' });

export const TTL_MIN = 1;
export const TTL_MAX = 86400;

export function isSupportedRecordType(type: string): type is DNSRecordType {
  return SUPPORTED_RECORD_TYPES.some((supported) => supported === type);
}

/**
 * Lowercase a zone name and drop any trailing dot
 */
export function normalizeZone(zone: string): string {
  const normalized = zone.trim().toLowerCase();
  return normalized.endsWith('.') ? normalized.slice(0, -1) : normalized;
}

/**
 * Host relative to the zone, `@` for the apex.
 * Names already ending in the zone are treated as fully qualified.
 */
export function normalizeHost(host: string, zone?: string): string {
  let normalized = host.trim().toLowerCase();
  if (normalized.endsWith('.')) {
    normalized = normalized.slice(0, -1);
  }
  if (normalized === '' || normalized === '@') {
    return '@';
  }

  if (zone) {
    const zoneName = normalizeZone(zone);
    if (normalized === zoneName) {
      return '@';
    }
    if (normalized.endsWith(`.${zoneName}`)) {
      return normalized.slice(0, -(zoneName.length + 1));
    }
  }

  return normalized;
}

/**
 * Fully qualified name for a zone-relative host
 */
export function toFqdn(host: string, zone: string): string {
  const zoneName = normalizeZone(zone);
  const relative = normalizeHost(host, zoneName);
  return relative === '@' ? zoneName : `${relative}.${zoneName}`;
}

export function normalizeValue(type: DNSRecordType, value: string): string {
  const trimmed = value.trim();

  if (HOSTNAME_TYPES.has(type)) {
    const lower = trimmed.toLowerCase();
    return lower.endsWith('.') ? lower.slice(0, -1) : lower;
  }

  if (type === 'AAAA') {
    return trimmed.toLowerCase();
  }

  if (type === 'TXT' && trimmed.length >= 2 && trimmed.startsWith('"') && trimmed.endsWith('"')) {
    return trimmed.slice(1, -1);
  }

  return trimmed;
}

/**
 * Canonical form used for matching. Extra fields (provider ID, proxied) are kept.
 */
export function normalizeRecord<T extends DNSRecord>(record: T, zone?: string): T {
  return {
    ...record,
    host: normalizeHost(record.host, zone),
    value: normalizeValue(record.type, record.value),
  };
}

/**
 * Identity key: (type, host, priority-if-MX)
 */
export function identityKey(record: DNSRecord): string {
  const priority = record.type === 'MX' ? String(record.priority ?? '') : '';
  return `${record.type}|${record.host}|${priority}`;
}

/**
 * Full content equality of two normalized records
 */
export function sameContent(a: DNSRecord, b: DNSRecord): boolean {
  return identityKey(a) === identityKey(b) && a.value === b.value && a.ttl === b.ttl;
}

function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Sort order: type, host, priority, value, ttl
 */
export function compareRecords(a: DNSRecord, b: DNSRecord): number {
  return (
    compareStrings(a.type, b.type) ||
    compareStrings(a.host, b.host) ||
    (a.priority ?? -1) - (b.priority ?? -1) ||
    compareStrings(a.value, b.value) ||
    compareStrings(String(a.ttl), String(b.ttl))
  );
}

/**
 * Order used to pair leftover records within an identity key
 */
export function compareByValue(a: DNSRecord, b: DNSRecord): number {
  return compareStrings(a.value, b.value) || compareStrings(String(a.ttl), String(b.ttl));
}

export function matchesSelector(record: DNSRecord, selector: RecordSelector): boolean {
  if (selector.type && selector.type !== record.type) {
    return false;
  }
  return normalizeHost(selector.host) === record.host;
}

/**
 * One-line rendering, e.g. `MX @ -> mx1.example.net (priority 10, ttl auto)`
 */
export function describeRecord(record: DNSRecord): string {
  const attrs: string[] = [];
  if (record.type === 'MX' && record.priority !== undefined) {
    attrs.push(`priority ${record.priority}`);
  }
  attrs.push(`ttl ${record.ttl}`);
  return `${record.type} ${record.host} -> ${record.value} (${attrs.join(', ')})`;
}

/**
 * Collect validation problems for a normalized record
 */
export function findRecordIssues(record: DNSRecord): ValidationIssue[] {
  const issues: ValidationIssue[] = [];

  if (record.host !== '@' && !HOST_PATTERN.test(record.host)) {
    issues.push({ field: 'host', message: `Invalid host name: ${record.host}` });
  }

  if (!record.value) {
    issues.push({ field: 'value', message: 'Record value is required' });
  } else {
    switch (record.type) {
      case 'A':
        if (!ipv4Schema.safeParse(record.value).success) {
          issues.push({ field: 'value', message: 'Invalid IPv4 address' });
        }
        break;

      case 'AAAA':
        if (!ipv6Schema.safeParse(record.value).success) {
          issues.push({ field: 'value', message: 'Invalid IPv6 address' });
        }
        break;

      case 'CNAME':
      case 'MX':
      case 'NS':
        if (!HOSTNAME_VALUE_PATTERN.test(record.value)) {
          issues.push({ field: 'value', message: `Invalid hostname: ${record.value}` });
        }
        break;
    }
  }

  if (record.type === 'MX') {
    if (record.priority === undefined || !Number.isInteger(record.priority) || record.priority < 0 || record.priority > 65535) {
      issues.push({ field: 'priority', message: 'MX record requires priority between 0 and 65535' });
    }
  } else if (record.priority !== undefined) {
    issues.push({ field: 'priority', message: 'Priority is only valid on MX records' });
  }

  if (record.ttl !== 'auto' && (!Number.isInteger(record.ttl) || record.ttl < TTL_MIN || record.ttl > TTL_MAX)) {
    issues.push({ field: 'ttl', message: `TTL must be between ${TTL_MIN} and ${TTL_MAX}` });
  }

  return issues;
}

/**
 * Throw a ValidationError naming the record if it is malformed
 */
export function validateRecord(record: DNSRecord): void {
  const issues = findRecordIssues(record);
  if (issues.length > 0) {
    throw new ValidationError(
      `Invalid record ${describeRecord(record)}: ${issues.map((i) => i.message).join('; ')}`,
      issues
    );
  }
}
