import { describe, it, expect } from 'vitest';
import { ConfigError, FileInsightsError, PathError, StoreError, errorCode, errorMessage } from './errors';

describe('errors', () => {
  it('should carry the kind and subclass name', () => {
    const error = new PathError('/data/x', 'Cannot read /data/x');

    expect(error).toBeInstanceOf(FileInsightsError);
    expect(error.kind).toBe('path');
    expect(error.name).toBe('PathError');
    expect(error.path).toBe('/data/x');
    expect(new StoreError('down').kind).toBe('store');
    expect(new ConfigError('bad').kind).toBe('config');
  });

  it('should keep the cause', () => {
    const cause = new Error('EACCES');

    expect(new StoreError('Failed', { cause }).cause).toBe(cause);
  });

  describe('errorMessage()', () => {
    it('should read Error messages and stringify anything else', () => {
      expect(errorMessage(new Error('boom'))).toBe('boom');
      expect(errorMessage('plain')).toBe('plain');
      expect(errorMessage(42)).toBe('42');
    });
  });

  describe('errorCode()', () => {
    it('should return string errno codes only', () => {
      expect(errorCode(Object.assign(new Error('denied'), { code: 'EACCES' }))).toBe('EACCES');
      expect(errorCode(Object.assign(new Error('odd'), { code: 7 }))).toBeUndefined();
      expect(errorCode('EACCES')).toBeUndefined();
    });
  });
});
