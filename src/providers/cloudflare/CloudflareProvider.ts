/**
 * Cloudflare DNS Provider Implementation
 * Using the official cloudflare npm package
 */
import Cloudflare from 'cloudflare';
import { RegistrarClient, OWNERSHIP_MARKER } from '../base/RegistrarClient.js';
import { TransientError, ValidationError, errorFromStatus, parseRetryAfter, toRegistrarError } from '../../core/errors.js';
import { cloudflareRecordSchema, type CloudflareCredentials, type CloudflareRecord } from '../../config/schema.js';
import { identityKey, isSupportedRecordType, normalizeHost } from '../../records/RecordModel.js';
import { SUPPORTED_RECORD_TYPES, type DNSRecord, type DNSRecordType, type ProviderInfo, type ProviderRecord } from '../../types/index.js';

export type CloudflareProviderCredentials = CloudflareCredentials;

type RecordCreateParams = Parameters<Cloudflare['dns']['records']['create']>[0];

const PER_PAGE = 100;

/**
 * Cloudflare DNS Provider
 */
export class CloudflareProvider extends RegistrarClient {
  private client: Cloudflare;
  private zoneId: string | null;

  constructor(credentials: CloudflareProviderCredentials, providerName: string = 'Cloudflare') {
    super(providerName, credentials.zoneName);

    this.zoneId = credentials.zoneId ?? null;

    // Retries are handled by the reconciler
    this.client = new Cloudflare({
      apiToken: credentials.apiToken,
      maxRetries: 0,
    });
  }

  getInfo(): ProviderInfo {
    return {
      name: this.providerName,
      type: 'cloudflare',
      features: {
        autoTtl: 1,
        ttlMin: 60,
        ttlMax: 86400,
        supportedTypes: SUPPORTED_RECORD_TYPES,
      },
    };
  }

  protected async initialize(): Promise<void> {
    if (this.zoneId) return;

    this.logger.debug('Looking up Cloudflare zone ID');
    const zones = await this.request('look up zone', () => this.client.zones.list({ name: this.zoneName }));
    const zoneId = zones.result[0]?.id;

    if (!zoneId) {
      throw new ValidationError(`Cloudflare: no zone found for domain "${this.zoneName}"`);
    }

    this.zoneId = zoneId;
    this.logger.debug({ zoneId }, 'Zone ID retrieved');
  }

  protected async fetchRecords(): Promise<ProviderRecord[]> {
    const zoneId = this.requireZoneId();
    const records: ProviderRecord[] = [];
    let page = 1;

    // Paginate through all records
    while (true) {
      const response = await this.request('list records', () =>
        this.client.dns.records.list({ zone_id: zoneId, page, per_page: PER_PAGE })
      );

      for (const raw of response.result) {
        const parsed = cloudflareRecordSchema.safeParse(raw);
        if (!parsed.success) {
          this.logger.debug({ issues: parsed.error.errors.length }, 'Skipping unreadable Cloudflare record');
          continue;
        }
        const converted = this.convertFromCloudflare(parsed.data);
        if (converted) {
          records.push(converted);
        }
      }

      if (response.result.length < PER_PAGE) {
        break;
      }
      page++;
    }

    return records;
  }

  protected async createRecord(record: DNSRecord): Promise<void> {
    const params = this.buildParams(record);
    this.logger.debug({ type: record.type, host: record.host }, 'Creating DNS record');
    await this.request('create record', () => this.client.dns.records.create(params));
  }

  protected async updateRecord(current: ProviderRecord, desired: DNSRecord): Promise<void> {
    const params = this.buildParams(desired, current.proxied);
    this.logger.debug({ id: current.id, type: desired.type, host: desired.host }, 'Updating DNS record');
    await this.request('update record', () => this.client.dns.records.update(current.id, params));
  }

  protected async deleteRecord(current: ProviderRecord): Promise<void> {
    const zoneId = this.requireZoneId();
    this.logger.debug({ id: current.id }, 'Deleting DNS record');
    await this.request('delete record', () => this.client.dns.records.delete(current.id, { zone_id: zoneId }));
  }

  /**
   * Cloudflare serves proxied records with the automatic TTL whatever TTL is
   * sent, and updates keep the proxy flag
   */
  normalizeRecord(record: DNSRecord, current: readonly ProviderRecord[] = []): DNSRecord {
    const normalized = super.normalizeRecord(record, current);
    if (normalized.ttl === 'auto') {
      return normalized;
    }

    const key = identityKey(normalized);
    const proxied = current.some((existing) => existing.proxied === true && identityKey(existing) === key);
    if (!proxied) {
      return normalized;
    }

    this.logger.debug({ host: normalized.host, originalTtl: normalized.ttl }, 'Proxied record uses automatic TTL');
    return { ...normalized, ttl: 'auto' };
  }

  private requireZoneId(): string {
    if (!this.zoneId) {
      throw new Error('Zone ID not initialized');
    }
    return this.zoneId;
  }

  /**
   * Run an SDK call, mapping its errors onto the registrar taxonomy
   */
  private async request<T>(action: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      throw this.translateError(action, error);
    }
  }

  private translateError(action: string, error: unknown) {
    if (error instanceof Cloudflare.APIError) {
      const message = `Cloudflare: failed to ${action}: ${error.message}`;
      // Connection errors and timeouts carry no status
      if (error.status === undefined) {
        return new TransientError(message);
      }
      return errorFromStatus(error.status, message, parseRetryAfter(error.headers?.['retry-after']));
    }
    return toRegistrarError(error);
  }

  /**
   * Convert Cloudflare record to the record model
   */
  private convertFromCloudflare(record: CloudflareRecord): ProviderRecord | null {
    const type = record.type.toUpperCase();
    if (!isSupportedRecordType(type) || record.content === undefined) {
      return null;
    }

    return {
      id: record.id,
      type,
      host: normalizeHost(record.name, this.zoneName),
      value: record.content,
      priority: type === 'MX' ? record.priority : undefined,
      ttl: this.fromProviderTtl(record.ttl),
      proxied: record.proxied,
    };
  }

  /**
   * Build create/update params for Cloudflare API
   */
  private buildParams(record: DNSRecord, proxied: boolean = false): RecordCreateParams {
    const baseParams = {
      zone_id: this.requireZoneId(),
      name: this.ensureFqdn(record.host),
      ttl: this.toProviderTtl(record.ttl),
      comment: OWNERSHIP_MARKER,
    };

    switch (record.type) {
      case 'A':
        return { ...baseParams, type: 'A' as const, content: record.value, proxied };
      case 'AAAA':
        return { ...baseParams, type: 'AAAA' as const, content: record.value, proxied };
      case 'CNAME':
        return { ...baseParams, type: 'CNAME' as const, content: record.value, proxied };
      case 'MX':
        return { ...baseParams, type: 'MX' as const, content: record.value, priority: record.priority ?? 10 };
      case 'TXT':
        return { ...baseParams, type: 'TXT' as const, content: record.value };
      case 'NS':
        return { ...baseParams, type: 'NS' as const, content: record.value };
    }
  }
}
