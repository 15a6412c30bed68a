import { computeSignature, verifySignature, verifyWithAnySecret } from '../../src';

describe('Signature verification', () => {
  const body = Buffer.from('{"order_id":"ORD_1"}');
  const expectedSha256 = 'd2b22a886c9c9f2923d960e80f4374047df76b32776f43deccd889932fb09f61';

  it('computes a lower-case hex HMAC-SHA256 of the raw body', () => {
    expect(computeSignature(body, 'test-secret')).toBe(expectedSha256);
  });

  it('supports HMAC-SHA512', () => {
    expect(computeSignature(body, 'test-secret', { algorithm: 'sha512' })).toBe(
      '5cfe7e6f48fd9b8517b3875a557378a6106377818b9c35763608e941b7ed9a881f076eb7d822282dec6916a8e64a676018644e520bf84bb7c0a63c9017330aaa',
    );
  });

  it('accepts a valid signature in any letter case', () => {
    expect(verifySignature(body, expectedSha256, 'test-secret')).toBe(true);
    expect(verifySignature(body, expectedSha256.toUpperCase(), 'test-secret')).toBe(true);
  });

  it('rejects a signature over different bytes', () => {
    const reformatted = Buffer.from('{ "order_id": "ORD_1" }');
    expect(verifySignature(reformatted, expectedSha256, 'test-secret')).toBe(false);
  });

  it('fails closed on a missing header, an empty secret or a malformed value', () => {
    expect(verifySignature(body, undefined, 'test-secret')).toBe(false);
    expect(verifySignature(body, expectedSha256, '')).toBe(false);
    expect(verifySignature(body, 'not-hex!', 'test-secret')).toBe(false);
    expect(verifySignature(body, expectedSha256.slice(0, 10), 'test-secret')).toBe(false);
  });

  it('tries every configured secret during rotation', () => {
    expect(verifyWithAnySecret(body, expectedSha256, ['new-secret', 'test-secret'])).toBe(true);
    expect(verifyWithAnySecret(body, expectedSha256, ['new-secret'])).toBe(false);
    expect(verifyWithAnySecret(body, expectedSha256, [])).toBe(false);
  });
});
