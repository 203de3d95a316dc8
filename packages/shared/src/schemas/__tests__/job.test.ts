import { describe, it, expect } from 'vitest';
import * as v from 'valibot';
import {
  WebhookDeliveryPayloadSchema,
  PathCleanupPayloadSchema,
  JobListQuerySchema,
  JobIdParamSchema,
} from '../job.js';

describe('WebhookDeliveryPayloadSchema', () => {
  it('should accept url with body', () => {
    const result = v.safeParse(WebhookDeliveryPayloadSchema, {
      url: 'https://example.test/hook',
      body: { event: 'ping' },
    });
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.output.url).toBe('https://example.test/hook');
      expect(result.output.body).toEqual({ event: 'ping' });
      expect(result.output.headers).toBeUndefined();
    }
  });

  it('should accept string headers', () => {
    const result = v.safeParse(WebhookDeliveryPayloadSchema, {
      url: 'https://example.test/hook',
      body: null,
      headers: { 'X-Signature': 'test-secret' },
    });
    expect(result.success).toBe(true);
  });

  it('should reject invalid url', () => {
    const result = v.safeParse(WebhookDeliveryPayloadSchema, {
      url: 'not a url',
      body: {},
    });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.issues[0].message).toBe('url must be a valid URL');
    }
  });

  it.each(['ftp://example.test/hook', 'mailto:ops@example.test'])(
    'should reject non-http url %s',
    (url) => {
      const result = v.safeParse(WebhookDeliveryPayloadSchema, { url, body: {} });
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.issues[0].message).toBe('url must use http or https');
      }
    }
  );

  it('should accept http url', () => {
    const result = v.safeParse(WebhookDeliveryPayloadSchema, {
      url: 'http://localhost:8080/hook',
      body: {},
    });
    expect(result.success).toBe(true);
  });

  it('should reject non-string header values', () => {
    const result = v.safeParse(WebhookDeliveryPayloadSchema, {
      url: 'https://example.test/hook',
      body: {},
      headers: { 'X-Retry': 3 },
    });
    expect(result.success).toBe(false);
  });
});

describe('PathCleanupPayloadSchema', () => {
  it('should trim path', () => {
    const result = v.safeParse(PathCleanupPayloadSchema, { path: '  /tmp/outputs  ' });
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.output.path).toBe('/tmp/outputs');
    }
  });

  it('should reject empty path', () => {
    const result = v.safeParse(PathCleanupPayloadSchema, { path: '   ' });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.issues[0].message).toBe('Path is required');
    }
  });

  it('should reject missing path', () => {
    const result = v.safeParse(PathCleanupPayloadSchema, {});
    expect(result.success).toBe(false);
  });
});

describe('JobListQuerySchema', () => {
  it('should apply default limit and offset', () => {
    const result = v.safeParse(JobListQuerySchema, {});
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.output).toEqual({ limit: 50, offset: 0 });
    }
  });

  it('should convert numeric strings', () => {
    const result = v.safeParse(JobListQuerySchema, { limit: '10', offset: '20' });
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.output.limit).toBe(10);
      expect(result.output.offset).toBe(20);
    }
  });

  it('should accept known status', () => {
    const result = v.safeParse(JobListQuerySchema, { status: 'permanentlyFailed' });
    expect(result.success).toBe(true);
  });

  it('should reject unknown status', () => {
    const result = v.safeParse(JobListQuerySchema, { status: 'done' });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.issues[0].message).toBe(
        'status must be one of: ready, running, permanentlyFailed, obsolete, unknown'
      );
    }
  });

  it('should reject limit above 1000', () => {
    const result = v.safeParse(JobListQuerySchema, { limit: '1001' });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.issues[0].message).toBe('limit must be a number between 1 and 1000');
    }
  });

  it('should reject non-numeric limit', () => {
    const result = v.safeParse(JobListQuerySchema, { limit: 'abc' });
    expect(result.success).toBe(false);
  });

  it('should reject negative offset', () => {
    const result = v.safeParse(JobListQuerySchema, { offset: '-1' });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.issues[0].message).toBe('offset must be a non-negative number');
    }
  });
});

describe('JobIdParamSchema', () => {
  it('should convert positive integer', () => {
    const result = v.safeParse(JobIdParamSchema, '42');
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.output).toBe(42);
    }
  });

  it.each(['0', '-1', '1.5', 'abc', ''])('should reject %j', (value) => {
    const result = v.safeParse(JobIdParamSchema, value);
    expect(result.success).toBe(false);
  });
});
