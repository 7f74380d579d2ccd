/**
 * DigitalOcean DNS Provider Implementation
 */
import { RegistrarClient } from '../base/RegistrarClient.js';
import { TransientError, ValidationError, errorFromStatus, parseRetryAfter } from '../../core/errors.js';
import { digitalOceanRecordSchema, type DigitalOceanCredentials, type DigitalOceanRecord } from '../../config/schema.js';
import { isSupportedRecordType, normalizeHost } from '../../records/RecordModel.js';
import { SUPPORTED_RECORD_TYPES, type DNSRecord, type DNSRecordType, type ProviderInfo, type ProviderRecord } from '../../types/index.js';

export type DigitalOceanProviderCredentials = DigitalOceanCredentials;

interface DOErrorBody {
  id?: string;
  message?: string;
}

const PER_PAGE = 100;

/** Types whose data DigitalOcean stores as an FQDN with a trailing dot */
const HOSTNAME_RECORD_TYPES: ReadonlySet<DNSRecordType> = new Set(['CNAME', 'MX', 'NS']);

/**
 * DigitalOcean DNS Provider
 */
export class DigitalOceanProvider extends RegistrarClient {
  private readonly apiToken: string;
  private readonly baseUrl = 'https://api.digitalocean.com/v2';

  constructor(credentials: DigitalOceanProviderCredentials, providerName: string = 'DigitalOcean') {
    super(providerName, credentials.domain);
    this.apiToken = credentials.apiToken;
  }

  getInfo(): ProviderInfo {
    return {
      name: this.providerName,
      type: 'digitalocean',
      features: {
        autoTtl: 1800,
        ttlMin: 30,
        ttlMax: 86400,
        supportedTypes: SUPPORTED_RECORD_TYPES,
      },
    };
  }

  protected async initialize(): Promise<void> {
    // Verify domain exists
    const response = await this.makeRequest(`/domains/${this.zoneName}`);
    if (!response || typeof response !== 'object' || !('domain' in response)) {
      throw new ValidationError(`DigitalOcean: domain not found: ${this.zoneName}`);
    }
    this.logger.debug('DigitalOcean domain verified');
  }

  protected async fetchRecords(): Promise<ProviderRecord[]> {
    const records: ProviderRecord[] = [];
    let page = 1;

    while (true) {
      const response = await this.makeRequest(
        `/domains/${this.zoneName}/records?page=${page}&per_page=${PER_PAGE}`
      );
      const rawRecords = response && typeof response === 'object' && 'domain_records' in response
        ? response.domain_records
        : undefined;

      if (!Array.isArray(rawRecords) || rawRecords.length === 0) {
        break;
      }

      for (const raw of rawRecords) {
        const parsed = digitalOceanRecordSchema.safeParse(raw);
        if (!parsed.success) {
          this.logger.debug({ issues: parsed.error.errors.length }, 'Skipping unreadable DigitalOcean record');
          continue;
        }
        const converted = this.convertFromDigitalOcean(parsed.data);
        if (converted) {
          records.push(converted);
        }
      }

      if (rawRecords.length < PER_PAGE) {
        break;
      }
      page++;
    }

    return records;
  }

  protected async createRecord(record: DNSRecord): Promise<void> {
    const body = this.convertToDigitalOcean(record);
    this.logger.debug({ record: body }, 'Creating DNS record');
    await this.makeRequest(`/domains/${this.zoneName}/records`, {
      method: 'POST',
      body: JSON.stringify(body),
    });
  }

  protected async updateRecord(current: ProviderRecord, desired: DNSRecord): Promise<void> {
    const body = this.convertToDigitalOcean(desired);
    this.logger.debug({ id: current.id, sending: body }, 'Updating DNS record');
    await this.makeRequest(`/domains/${this.zoneName}/records/${current.id}`, {
      method: 'PUT',
      body: JSON.stringify(body),
    });
  }

  protected async deleteRecord(current: ProviderRecord): Promise<void> {
    this.logger.debug({ id: current.id }, 'Deleting DNS record');
    await this.makeRequest(`/domains/${this.zoneName}/records/${current.id}`, {
      method: 'DELETE',
    });
  }

  /**
   * Make authenticated API request
   */
  private async makeRequest(endpoint: string, options: RequestInit = {}): Promise<unknown> {
    const url = `${this.baseUrl}${endpoint}`;

    let response: Response;
    try {
      response = await fetch(url, {
        ...options,
        headers: {
          Authorization: `Bearer ${this.apiToken}`,
          'Content-Type': 'application/json',
        },
      });
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      throw new TransientError(`DigitalOcean: request failed: ${errorMessage}`);
    }

    if (!response.ok) {
      const errorBody: DOErrorBody = await response
        .json()
        .then((body: unknown) => (body && typeof body === 'object' ? body : {}))
        .catch(() => ({ message: response.statusText }));

      // Include error ID if present (e.g., "bad_request", "unauthorized")
      let errorMessage = errorBody.message ?? `API error: ${response.status}`;
      if (errorBody.id) {
        errorMessage = `[${errorBody.id}] ${errorMessage}`;
      }

      this.logger.debug({ status: response.status, endpoint }, 'DigitalOcean API error response');

      throw errorFromStatus(
        response.status,
        `DigitalOcean API error ${response.status}: ${errorMessage}`,
        parseRetryAfter(response.headers.get('retry-after'))
      );
    }

    // DELETE returns 204 No Content
    if (response.status === 204) {
      return {};
    }

    return response.json();
  }

  /**
   * Convert DigitalOcean record to the record model
   */
  private convertFromDigitalOcean(record: DigitalOceanRecord): ProviderRecord | null {
    const type = record.type.toUpperCase();
    if (!isSupportedRecordType(type)) {
      return null;
    }

    return {
      id: String(record.id),
      type,
      host: normalizeHost(record.name, this.zoneName),
      value: record.data,
      priority: type === 'MX' ? record.priority ?? undefined : undefined,
      ttl: this.fromProviderTtl(record.ttl),
    };
  }

  /**
   * Convert a record to DigitalOcean format
   */
  private convertToDigitalOcean(record: DNSRecord): Record<string, unknown> {
    // DigitalOcean requires FQDN data values (hostnames) to end with a trailing dot
    let data = record.value;
    if (HOSTNAME_RECORD_TYPES.has(record.type) && !data.endsWith('.')) {
      data = `${data}.`;
    }

    const result: Record<string, unknown> = {
      type: record.type,
      name: record.host,
      data,
      ttl: this.toProviderTtl(record.ttl),
    };

    if (record.type === 'MX') {
      result['priority'] = record.priority ?? 10;
    }

    return result;
  }
}
