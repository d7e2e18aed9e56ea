import { describe, expect, it } from 'vitest';
import { defineParser } from '../src/factory.js';

const parse = async () => null;

describe('defineParser', () => {
  it('returns the parser unchanged', () => {
    const parser = { manifest: { platform: 'Lever', name: 'Lever', version: '0.1.0', host: 'lever.co' }, parse } as const;

    expect(defineParser(parser)).toBe(parser);
  });

  it('rejects hosts that cannot match a lower-cased host name', () => {
    expect(() =>
      defineParser({ manifest: { platform: 'Lever', name: 'Lever', version: '0.1.0', host: 'Lever.co' }, parse }),
    ).toThrow('Parser for Lever has an unroutable host: "Lever.co"');
    expect(() =>
      defineParser({ manifest: { platform: 'Ashby', name: 'Ashby', version: '0.1.0', host: '' }, parse }),
    ).toThrow('Parser for Ashby has an unroutable host: ""');
  });
});
