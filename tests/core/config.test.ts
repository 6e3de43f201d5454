import { afterEach, describe, expect, test } from 'vitest';
import { configure, getConfig, getDefaultConfig, resetConfig } from '../../src/core/config';

describe('config', () => {
  afterEach(() => {
    resetConfig();
  });

  test('starts from defaults', () => {
    expect(getConfig()).toEqual(getDefaultConfig());
    expect(getConfig().delimiter).toBe(',');
    expect(getConfig().nullToken).toBeNull();
    expect(getConfig().headRows).toBe(10);
  });

  test('configure merges partial options', () => {
    configure({ nullToken: 'NA' });
    configure({ headRows: 3 });
    expect(getConfig().nullToken).toBe('NA');
    expect(getConfig().headRows).toBe(3);
    expect(getConfig().delimiter).toBe(',');
  });

  test('resetConfig restores defaults', () => {
    configure({ delimiter: ';', logLevel: 'debug' });
    resetConfig();
    expect(getConfig().delimiter).toBe(',');
    expect(getConfig().logLevel).toBe('warn');
  });

  test('defaults are not changed by configure', () => {
    configure({ readChunkBytes: 16 });
    expect(getDefaultConfig().readChunkBytes).toBe(64 * 1024);
  });
});
