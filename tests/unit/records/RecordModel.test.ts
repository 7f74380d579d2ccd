/**
 * Record model unit tests
 */
import { describe, it, expect } from 'vitest';
import {
  describeRecord,
  identityKey,
  isSupportedRecordType,
  matchesSelector,
  normalizeHost,
  normalizeRecord,
  normalizeValue,
  sameContent,
  toFqdn,
  validateRecord,
} from '../../../src/records/RecordModel.js';
import { ValidationError } from '../../../src/core/errors.js';
import type { DNSRecord } from '../../../src/types/index.js';

describe('RecordModel', () => {
  describe('normalizeHost', () => {
    it('should map empty names and the zone itself to the apex', () => {
      expect(normalizeHost('')).toBe('@');
      expect(normalizeHost('@')).toBe('@');
      expect(normalizeHost('Example.com.', 'example.com')).toBe('@');
    });

    it('should make names inside the zone relative', () => {
      expect(normalizeHost('WWW.Example.com.', 'example.com')).toBe('www');
      expect(normalizeHost('a.b.example.com', 'example.com.')).toBe('a.b');
    });

    it('should leave relative names alone', () => {
      expect(normalizeHost('mail', 'example.com')).toBe('mail');
      expect(normalizeHost('notexample.com', 'example.com')).toBe('notexample.com');
    });
  });

  describe('toFqdn', () => {
    it('should qualify relative names', () => {
      expect(toFqdn('@', 'example.com')).toBe('example.com');
      expect(toFqdn('www', 'Example.com.')).toBe('www.example.com');
    });
  });

  describe('normalizeValue', () => {
    it('should lowercase hostnames and drop the trailing dot', () => {
      expect(normalizeValue('CNAME', 'Target.Example.NET.')).toBe('target.example.net');
      expect(normalizeValue('MX', 'MX1.example.net.')).toBe('mx1.example.net');
    });

    it('should strip one pair of quotes from TXT values', () => {
      expect(normalizeValue('TXT', '"v=spf1 -all"')).toBe('v=spf1 -all');
      expect(normalizeValue('TXT', 'Case Kept')).toBe('Case Kept');
    });

    it('should lowercase IPv6 and trim addresses', () => {
      expect(normalizeValue('AAAA', '2001:DB8::1')).toBe('2001:db8::1');
      expect(normalizeValue('A', ' 192.0.2.1 ')).toBe('192.0.2.1');
    });
  });

  describe('normalizeRecord', () => {
    it('should keep provider fields', () => {
      const record = { id: 'r1', proxied: true, type: 'CNAME' as const, host: 'WWW', value: 'Example.com.', ttl: 'auto' as const };
      expect(normalizeRecord(record, 'example.com')).toEqual({
        id: 'r1',
        proxied: true,
        type: 'CNAME',
        host: 'www',
        value: 'example.com',
        ttl: 'auto',
      });
    });
  });

  describe('identityKey', () => {
    it('should include priority only for MX records', () => {
      expect(identityKey({ type: 'MX', host: '@', value: 'mx.example.net', priority: 10, ttl: 'auto' })).toBe('MX|@|10');
      expect(identityKey({ type: 'A', host: '@', value: '192.0.2.1', ttl: 'auto' })).toBe('A|@|');
    });
  });

  describe('sameContent', () => {
    const base: DNSRecord = { type: 'A', host: 'www', value: '192.0.2.1', ttl: 'auto' };

    it('should compare value and TTL', () => {
      expect(sameContent(base, { ...base })).toBe(true);
      expect(sameContent(base, { ...base, value: '192.0.2.2' })).toBe(false);
      expect(sameContent(base, { ...base, ttl: 300 })).toBe(false);
    });
  });

  describe('matchesSelector', () => {
    const ns: DNSRecord = { type: 'NS', host: '@', value: 'ns1.example.net', ttl: 'auto' };

    it('should match by host and optional type', () => {
      expect(matchesSelector(ns, { type: 'NS', host: '@' })).toBe(true);
      expect(matchesSelector(ns, { host: '@' })).toBe(true);
      expect(matchesSelector(ns, { type: 'A', host: '@' })).toBe(false);
      expect(matchesSelector(ns, { type: 'NS', host: 'www' })).toBe(false);
    });
  });

  describe('describeRecord', () => {
    it('should render MX priority and TTL', () => {
      expect(describeRecord({ type: 'MX', host: '@', value: 'mx1.example.net', priority: 10, ttl: 'auto' })).toBe(
        'MX @ -> mx1.example.net (priority 10, ttl auto)'
      );
      expect(describeRecord({ type: 'A', host: 'www', value: '192.0.2.1', ttl: 300 })).toBe(
        'A www -> 192.0.2.1 (ttl 300)'
      );
    });
  });

  describe('isSupportedRecordType', () => {
    it('should accept the managed types only', () => {
      expect(isSupportedRecordType('MX')).toBe(true);
      expect(isSupportedRecordType('SOA')).toBe(false);
    });
  });

  describe('validateRecord', () => {
    it('should accept valid records', () => {
      expect(() => validateRecord({ type: 'A', host: 'www', value: '192.0.2.1', ttl: 'auto' })).not.toThrow();
      expect(() => validateRecord({ type: 'AAAA', host: '@', value: '2001:db8::1', ttl: 3600 })).not.toThrow();
      expect(() => validateRecord({ type: 'CNAME', host: '*.dev', value: 'example.com', ttl: 'auto' })).not.toThrow();
      expect(() => validateRecord({ type: 'MX', host: '@', value: 'mx1.example.net', priority: 0, ttl: 'auto' })).not.toThrow();
      expect(() => validateRecord({ type: 'TXT', host: '_dmarc', value: 'v=DMARC1; p=none', ttl: 'auto' })).not.toThrow();
    });

    it('should reject invalid IPv4 address', () => {
      expect(() => validateRecord({ type: 'A', host: '@', value: 'not-an-ip', ttl: 'auto' })).toThrow(
        'Invalid record A @ -> not-an-ip (ttl auto): Invalid IPv4 address'
      );
    });

    it('should reject invalid IPv6 address', () => {
      expect(() => validateRecord({ type: 'AAAA', host: '@', value: '192.0.2.1', ttl: 'auto' })).toThrow(
        'Invalid IPv6 address'
      );
    });

    it('should require priority for MX records', () => {
      expect(() => validateRecord({ type: 'MX', host: '@', value: 'mx1.example.net', ttl: 'auto' })).toThrow(
        'MX record requires priority between 0 and 65535'
      );
    });

    it('should reject priority on other types', () => {
      expect(() => validateRecord({ type: 'A', host: '@', value: '192.0.2.1', priority: 5, ttl: 'auto' })).toThrow(
        'Priority is only valid on MX records'
      );
    });

    it('should reject out-of-range TTLs', () => {
      expect(() => validateRecord({ type: 'A', host: '@', value: '192.0.2.1', ttl: 0 })).toThrow(
        'TTL must be between 1 and 86400'
      );
      expect(() => validateRecord({ type: 'A', host: '@', value: '192.0.2.1', ttl: 86401 })).toThrow(
        'TTL must be between 1 and 86400'
      );
    });

    it('should report every problem with field details', () => {
      try {
        validateRecord({ type: 'CNAME', host: 'bad host', value: '', ttl: 'auto' });
        expect.fail('expected a ValidationError');
      } catch (error) {
        expect(error).toBeInstanceOf(ValidationError);
        if (error instanceof ValidationError) {
          expect(error.details).toEqual([
            { field: 'host', message: 'Invalid host name: bad host' },
            { field: 'value', message: 'Record value is required' },
          ]);
          expect(error.retryable).toBe(false);
        }
      }
    });
  });
});
