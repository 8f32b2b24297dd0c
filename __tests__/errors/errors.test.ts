import { describe, it, expect } from 'vitest';
import { AppError, DecodeError, describeError, NetworkError, SchemaError } from '../../src/errors/index.js';

describe('errors', () => {
  it('should carry a code and context on each error type', () => {
    const network = new NetworkError('HTTP 500 from https://example.test', 'https://example.test', 500);
    const decode = new DecodeError('Invalid JSON from https://example.test: x', 'https://example.test');
    const schema = new SchemaError('Roster index missing athlete items.', 'roster');

    expect(network).toBeInstanceOf(AppError);
    expect(network).toMatchObject({ name: 'NetworkError', code: 'NETWORK_ERROR', statusCode: 500 });
    expect(decode).toMatchObject({ name: 'DecodeError', code: 'DECODE_ERROR', url: 'https://example.test' });
    expect(schema).toMatchObject({ name: 'SchemaError', code: 'SCHEMA_ERROR', resource: 'roster' });
  });

  it('should only give network errors a status code', () => {
    const decode = new DecodeError('Invalid JSON from https://example.test: x', 'https://example.test');
    const schema = new SchemaError('Standings payload missing expected fields.', 'standings');

    expect('statusCode' in decode).toBe(false);
    expect('statusCode' in schema).toBe(false);
    expect(new NetworkError('Request timed out after 10ms', 'https://example.test', 0).statusCode).toBe(0);
  });

  describe('describeError', () => {
    it('should use the message of an Error', () => {
      expect(describeError(new Error('offline'))).toBe('offline');
    });

    it('should stringify anything else', () => {
      expect(describeError('plain text')).toBe('plain text');
      expect(describeError(new Error(''))).toBe('Error');
      expect(describeError('')).toBe('Unknown error');
    });
  });
});
