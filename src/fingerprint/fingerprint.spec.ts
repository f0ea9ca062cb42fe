import {
  canonicalJson,
  canonicalQuestion,
  contentHash,
  fingerprint,
  isHexDigest,
} from './fingerprint';

describe('fingerprint', () => {
  it('returns the SHA-256 hex digest of the UTF-8 bytes', () => {
    expect(fingerprint('')).toBe(
      'e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855',
    );
    expect(fingerprint('abc')).toBe(
      'ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad',
    );
  });

  it('is idempotent for the same input', () => {
    const first = fingerprint('how many customers?');
    const second = fingerprint('how many customers?');

    expect(first).toBe(second);
    expect(isHexDigest(first)).toBe(true);
  });

  it('yields distinct digests for distinct inputs', () => {
    const inputs = ['select 1', 'select 2', 'SELECT 1', 'select 1 ', 'ans', 'gen'];
    const digests = new Set(inputs.map((input) => fingerprint(input)));

    expect(digests.size).toBe(inputs.length);
  });

  it('hashes strings and their UTF-8 bytes identically', () => {
    const text = 'khách hàng';

    expect(fingerprint(text)).toBe(fingerprint(new TextEncoder().encode(text)));
    expect(contentHash(Buffer.from(text, 'utf8'))).toBe(fingerprint(text));
  });
});

describe('canonicalJson', () => {
  it('sorts keys at every depth and keeps array order', () => {
    const json = canonicalJson({ b: 1, a: { d: [3, { z: 1, y: 2 }], c: null } });

    expect(json).toBe('{"a":{"c":null,"d":[3,{"y":2,"z":1}]},"b":1}');
  });

  it('gives equal output for objects differing only in key order', () => {
    expect(canonicalJson({ question: 'q', topK: 5 })).toBe(
      canonicalJson({ topK: 5, question: 'q' }),
    );
  });
});

describe('canonicalQuestion', () => {
  it('trims, collapses whitespace and lower-cases', () => {
    expect(canonicalQuestion('  How   many\tCustomers?\n')).toBe('how many customers?');
  });
});
