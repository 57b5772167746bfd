import { createHash } from 'crypto';
import { canonicalJson, fingerprintRequest } from '../../src/utils/fingerprint';

describe('canonicalJson', () => {
  it('sorts object keys at every depth', () => {
    expect(canonicalJson({ b: 1, a: { d: [2, 1], c: 'x' } })).toBe(
      '{"a":{"c":"x","d":[2,1]},"b":1}'
    );
  });

  it('drops undefined members', () => {
    expect(canonicalJson({ a: 1, b: undefined })).toBe('{"a":1}');
  });

  it('keeps null members', () => {
    expect(canonicalJson({ memo: null })).toBe('{"memo":null}');
  });

  it('serializes dates as ISO strings', () => {
    expect(canonicalJson({ at: new Date('2026-03-01T00:00:00.000Z') })).toBe(
      '{"at":"2026-03-01T00:00:00.000Z"}'
    );
  });

  it('serializes primitives like JSON.stringify', () => {
    expect(canonicalJson('x')).toBe('"x"');
    expect(canonicalJson(42)).toBe('42');
    expect(canonicalJson(undefined)).toBe('null');
  });
});

describe('fingerprintRequest', () => {
  it('is the SHA-256 hex digest of the canonical form', () => {
    const expected = createHash('sha256').update('{"a":1,"b":2}').digest('hex');

    expect(fingerprintRequest({ b: 2, a: 1 })).toBe(expected);
  });

  it('differs when a value changes', () => {
    expect(fingerprintRequest({ quantity: 1 })).not.toBe(fingerprintRequest({ quantity: 2 }));
  });

  it('is sensitive to array order', () => {
    expect(fingerprintRequest({ ids: ['a', 'b'] })).not.toBe(fingerprintRequest({ ids: ['b', 'a'] }));
  });
});
