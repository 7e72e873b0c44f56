import { verifyLineSignature } from './line-signature.guard';
import { signBody } from '../../../test/helpers';

describe('verifyLineSignature', () => {
  const body = JSON.stringify({ destination: 'U0', events: [] });

  it('accepts the base64 HMAC-SHA256 of the body', () => {
    expect(verifyLineSignature('test-secret', body, signBody(body))).toBe(true);
    expect(verifyLineSignature('test-secret', Buffer.from(body), signBody(body))).toBe(true);
  });

  it('rejects a body that was altered after signing', () => {
    expect(verifyLineSignature('test-secret', `${body} `, signBody(body))).toBe(false);
  });

  it('rejects a signature made with another secret', () => {
    expect(verifyLineSignature('test-secret', body, signBody(body, 'other-secret'))).toBe(false);
  });

  it('rejects missing or malformed signatures', () => {
    expect(verifyLineSignature('test-secret', body, undefined)).toBe(false);
    expect(verifyLineSignature('test-secret', body, '')).toBe(false);
    expect(verifyLineSignature('test-secret', body, 'abc')).toBe(false);
  });
});
