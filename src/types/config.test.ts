import { describe, it, expect } from 'vitest';
import { DEFAULT_CONFIG, parseConfig, parseMemoryLimit } from './config.js';

// ---------------------------------------------------------------------------
// parseMemoryLimit()
// ---------------------------------------------------------------------------

describe('parseMemoryLimit', () => {
  it.each([
    ['512KB', 524_288],
    ['5MB', 5_242_880],
    ['1GB', 1_073_741_824],
  ])('parses %s', (limit, bytes) => {
    expect(parseMemoryLimit(limit)).toBe(bytes);
  });

  it('accepts exactly one page', () => {
    expect(parseMemoryLimit('64KB')).toBe(65_536);
  });

  it.each(['1KB', '63KB', '0MB'])('rejects %s as smaller than one page', (limit) => {
    expect(() => parseMemoryLimit(limit)).toThrow(
      `Invalid memory limit: "${limit}". Must be at least 64KB (one memory page)`,
    );
  });

  it.each(['5', '5 MB', '5mb', '5TB', '-1MB', '1.5MB'])('rejects %s', (limit) => {
    expect(() => parseMemoryLimit(limit)).toThrow(
      `Invalid memory limit: "${limit}". Expected e.g. "512KB", "5MB" or "1GB"`,
    );
  });
});

// ---------------------------------------------------------------------------
// parseConfig()
// ---------------------------------------------------------------------------

describe('parseConfig', () => {
  it('returns defaults for an empty document', () => {
    expect(parseConfig({})).toEqual(DEFAULT_CONFIG);
  });

  it('fills in sections missing from the document', () => {
    const config = parseConfig({ execution: { timeout_ms: 250 } });
    expect(config.memory).toEqual({ limit: '5MB' });
    expect(config.logging).toEqual({ level: 'info' });
  });

  it('applies every known section', () => {
    const config = parseConfig({
      memory: { limit: '2MB' },
      execution: { timeout_ms: 500 },
      logging: { level: 'warn' },
    });

    expect(config).toEqual({
      memory: { limit: '2MB' },
      execution: { timeout_ms: 500 },
      logging: { level: 'warn' },
    });
  });

  it('keeps a [limits] section from older files as an unknown section', () => {
    const config = parseConfig({ limits: { max_request_bytes: 1024 } });
    expect(config['limits']).toEqual({ max_request_bytes: 1024 });
  });

  it('preserves unknown top-level sections', () => {
    const config = parseConfig({ experimental: { fast: true } });
    expect(config['experimental']).toEqual({ fast: true });
  });

  it('rejects a non-string memory limit', () => {
    expect(() => parseConfig({ memory: { limit: 5 } })).toThrow(
      'memory.limit must be a string such as "5MB"',
    );
  });

  it('rejects a memory limit without a unit', () => {
    expect(() => parseConfig({ memory: { limit: '5' } })).toThrow('Invalid memory limit: "5"');
  });

  it('rejects a zero timeout', () => {
    expect(() => parseConfig({ execution: { timeout_ms: 0 } })).toThrow(
      'execution.timeout_ms must be a positive integer',
    );
  });

  it('rejects a fractional timeout', () => {
    expect(() => parseConfig({ execution: { timeout_ms: 10.5 } })).toThrow(
      'execution.timeout_ms must be a positive integer',
    );
  });

  it('rejects a memory limit smaller than one page', () => {
    expect(() => parseConfig({ memory: { limit: '1KB' } })).toThrow(
      'Invalid memory limit: "1KB". Must be at least 64KB (one memory page)',
    );
  });

  it('rejects an unknown log level', () => {
    expect(() => parseConfig({ logging: { level: 'verbose' } })).toThrow(
      'Invalid logging.level: "verbose". Must be one of: debug, info, warn, error',
    );
  });

  it('rejects a section that is not a table', () => {
    expect(() => parseConfig({ logging: 'none' })).toThrow('[logging] must be a table');
  });
});
