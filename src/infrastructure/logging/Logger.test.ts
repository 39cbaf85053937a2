import { describe, expect, it } from 'vitest';
import { serializeErrors } from './Logger.js';

describe('serializeErrors', () => {
  it('turns errors in log metadata into name and message', () => {
    const info = serializeErrors().transform({
      level: 'error',
      message: 'Import failed',
      file: 'chase-feb.pdf',
      error: new TypeError('unexpected end of data'),
    });

    expect(info).toEqual({
      level: 'error',
      message: 'Import failed',
      file: 'chase-feb.pdf',
      error: { name: 'TypeError', message: 'unexpected end of data' },
    });
  });
});
