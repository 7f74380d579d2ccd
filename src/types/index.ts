/**
 * Core type definitions for dns-reconciler
 */

// DNS Record Types
export type DNSRecordType = 'A' | 'AAAA' | 'CNAME' | 'MX' | 'TXT' | 'NS';

export const SUPPORTED_RECORD_TYPES: readonly DNSRecordType[] = ['A', 'AAAA', 'CNAME', 'MX', 'TXT', 'NS'];

/** `'auto'` lets the provider pick its automatic TTL */
export type RecordTTL = 'auto' | number;

export interface DNSRecord {
  type: DNSRecordType;
  /** Name relative to the zone, `@` for the apex */
  host: string;
  value: string;
  /** MX only */
  priority?: number;
  ttl: RecordTTL;
}

/**
 * A record as published by a provider, carrying the provider's own ID
 */
export interface ProviderRecord extends DNSRecord {
  id: string;
  /** Cloudflare proxy flag, carried through updates but never compared */
  proxied?: boolean;
}

// Planned operations
export type OperationKind = 'delete' | 'create' | 'update';

export interface DeleteOperation {
  kind: 'delete';
  current: ProviderRecord;
}

export interface CreateOperation {
  kind: 'create';
  desired: DNSRecord;
}

export interface UpdateOperation {
  kind: 'update';
  current: ProviderRecord;
  desired: DNSRecord;
}

export type PlannedOperation = DeleteOperation | CreateOperation | UpdateOperation;

/**
 * Selects current records that are left alone during reconciliation
 */
export interface RecordSelector {
  type?: DNSRecordType;
  host: string;
}

export interface DesiredState {
  /** Zone from the desired-state file, if it names one */
  zone?: string;
  records: DNSRecord[];
  ignore: RecordSelector[];
  /** Path the state was loaded from */
  source: string;
}

// Provider Types
export type ProviderType = 'cloudflare' | 'digitalocean';

export interface ProviderInfo {
  name: string;
  type: ProviderType;
  features: {
    /** TTL in seconds the provider uses for "automatic" */
    autoTtl: number;
    ttlMin: number;
    ttlMax: number;
    supportedTypes: readonly DNSRecordType[];
  };
}
