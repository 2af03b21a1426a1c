import { describe, test, expect } from '@jest/globals';
import {
  DEFAULT_SD_REFRESH_INTERVAL,
  DurationSchema,
  FileSDConfigSchema,
} from '../../../config/schemas/fileSd.schema.js';

describe('FileSDConfigSchema', () => {
  test('applies the default refresh interval', () => {
    expect(FileSDConfigSchema.parse({ files: ['/etc/sd/stores.json'] })).toEqual({
      files: ['/etc/sd/stores.json'],
      refreshInterval: DEFAULT_SD_REFRESH_INTERVAL,
    });
    expect(FileSDConfigSchema.parse({ files: ['a.yml'], refresh_interval: null }).refreshInterval).toBe('5m');
  });

  test('keeps an explicit refresh interval', () => {
    expect(
      FileSDConfigSchema.parse({ files: ['/sd/*.yaml', '/sd/extra.JSON'], refresh_interval: '1h30m' }),
    ).toEqual({ files: ['/sd/*.yaml', '/sd/extra.JSON'], refreshInterval: '1h30m' });
  });

  test('requires at least one file', () => {
    const missing = FileSDConfigSchema.safeParse({});
    const empty = FileSDConfigSchema.safeParse({ files: [] });

    expect(missing.success).toBe(false);
    expect(empty.success).toBe(false);
    if (!missing.success && !empty.success) {
      expect(missing.error.issues[0].message).toBe(
        'file service discovery config must contain at least one path name',
      );
      expect(empty.error.issues[0].message).toBe(
        'file service discovery config must contain at least one path name',
      );
    }
  });

  test('only allows a wildcard in the last path segment', () => {
    expect(FileSDConfigSchema.safeParse({ files: ['/sd/*/stores.json'] }).success).toBe(false);
    expect(FileSDConfigSchema.safeParse({ files: ['/sd/stores-*.json'] }).success).toBe(true);
  });

  test('rejects unknown keys', () => {
    const result = FileSDConfigSchema.safeParse({ files: ['a.json'], refresh: '1m' });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0].message).toBe("Unrecognized key(s) in object: 'refresh'");
    }
  });
});

describe('DurationSchema', () => {
  test.each(['0', '30s', '5m', '1h30m', '250ms', '2w', '1y'])('accepts %s', (value) => {
    expect(DurationSchema.safeParse(value).success).toBe(true);
  });

  test.each(['', '90', '5 minutes', 'm5', '-1s'])('rejects "%s"', (value) => {
    expect(DurationSchema.safeParse(value).success).toBe(false);
  });
});
