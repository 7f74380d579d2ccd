/**
 * Abstract Registrar Client
 * Base class for all DNS provider adapters
 */
import type { Logger } from 'pino';
import { createChildLogger } from '../../core/Logger.js';
import { normalizeRecord, normalizeZone, toFqdn, validateRecord } from '../../records/RecordModel.js';
import type { DNSRecord, DNSRecordType, PlannedOperation, ProviderInfo, ProviderRecord, RecordTTL } from '../../types/index.js';

/**
 * Ownership marker written on providers that support record comments
 */
export const OWNERSHIP_MARKER = 'Managed by dns-reconciler';

export abstract class RegistrarClient {
  protected logger: Logger;
  protected initialized: boolean = false;
  protected readonly zoneName: string;

  constructor(
    protected readonly providerName: string,
    zoneName: string
  ) {
    this.zoneName = normalizeZone(zoneName);
    this.logger = createChildLogger({ provider: providerName, zone: this.zoneName });
  }

  /**
   * Get provider information
   */
  abstract getInfo(): ProviderInfo;

  /**
   * Resolve zone identifiers and check credentials
   */
  protected abstract initialize(): Promise<void>;

  /**
   * Fetch every record in the zone, in the record model
   */
  protected abstract fetchRecords(): Promise<ProviderRecord[]>;

  protected abstract createRecord(record: DNSRecord): Promise<void>;

  protected abstract updateRecord(current: ProviderRecord, desired: DNSRecord): Promise<void>;

  protected abstract deleteRecord(current: ProviderRecord): Promise<void>;

  getZoneName(): string {
    return this.zoneName;
  }

  getProviderName(): string {
    return this.providerName;
  }

  async init(): Promise<void> {
    if (this.initialized) return;
    await this.initialize();
    this.initialized = true;
  }

  /**
   * List the zone's records of supported types
   */
  async list(): Promise<ProviderRecord[]> {
    await this.init();

    const supported = new Set<DNSRecordType>(this.getInfo().features.supportedTypes);
    const records = await this.fetchRecords();
    const result = records
      .filter((record) => supported.has(record.type))
      .map((record) => normalizeRecord(record, this.zoneName));

    this.logger.debug({ count: result.length, skipped: records.length - result.length }, 'Fetched current records');
    return result;
  }

  /**
   * Apply a single planned operation
   */
  async apply(operation: PlannedOperation): Promise<void> {
    await this.init();

    switch (operation.kind) {
      case 'create':
        validateRecord(operation.desired);
        await this.createRecord(operation.desired);
        this.logger.info({ type: operation.desired.type, host: operation.desired.host }, 'DNS record created');
        break;

      case 'update':
        validateRecord(operation.desired);
        await this.updateRecord(operation.current, operation.desired);
        this.logger.info({ type: operation.desired.type, host: operation.desired.host }, 'DNS record updated');
        break;

      case 'delete':
        await this.deleteRecord(operation.current);
        this.logger.info({ type: operation.current.type, host: operation.current.host }, 'DNS record deleted');
        break;
    }
  }

  /**
   * Map a desired record onto the provider's canonical form so that
   * records read back from the provider compare equal. `current` holds the
   * zone's records, for providers whose stored form depends on them.
   */
  normalizeRecord(record: DNSRecord, _current: readonly ProviderRecord[] = []): DNSRecord {
    const normalized = normalizeRecord(record, this.zoneName);
    if (normalized.ttl === 'auto') {
      return normalized;
    }

    const { autoTtl, ttlMin, ttlMax } = this.getInfo().features;
    let ttl: RecordTTL = normalized.ttl;

    if (ttl === autoTtl) {
      ttl = 'auto';
    } else if (ttl < ttlMin) {
      this.logger.debug({ host: normalized.host, originalTtl: ttl, normalizedTtl: ttlMin }, 'Normalized TTL to provider minimum');
      ttl = ttlMin;
    } else if (ttl > ttlMax) {
      this.logger.debug({ host: normalized.host, originalTtl: ttl, normalizedTtl: ttlMax }, 'Normalized TTL to provider maximum');
      ttl = ttlMax;
    }

    return { ...normalized, ttl };
  }

  /**
   * TTL in seconds to send to the provider
   */
  protected toProviderTtl(ttl: RecordTTL): number {
    return ttl === 'auto' ? this.getInfo().features.autoTtl : ttl;
  }

  /**
   * TTL read back from the provider
   */
  protected fromProviderTtl(ttl: number): RecordTTL {
    return ttl === this.getInfo().features.autoTtl ? 'auto' : ttl;
  }

  /**
   * Ensure FQDN has the zone suffix
   */
  protected ensureFqdn(host: string): string {
    return toFqdn(host, this.zoneName);
  }
}
