import { redactSensitivePayload } from '../utils/logger.js';

describe('redactSensitivePayload', () => {
  it('redacts sensitive keys at any depth', () => {
    expect(
      redactSensitivePayload({
        headers: { 'x-api-key': 'test-secret', accept: 'application/json' },
        nested: [{ apiKey: 'test-secret' }],
      })
    ).toEqual({
      headers: { 'x-api-key': '[REDACTED]', accept: 'application/json' },
      nested: [{ apiKey: '[REDACTED]' }],
    });
  });

  it('redacts keys embedded in URLs and header strings', () => {
    expect(redactSensitivePayload('GET https://generativelanguage.example/v1?key=test-secret&alt=json')).toBe(
      'GET https://generativelanguage.example/v1?key=[REDACTED]&alt=json'
    );
    expect(redactSensitivePayload('x-api-key: test-secret')).toBe('x-api-key: [REDACTED]');
  });

  it('leaves ordinary values alone', () => {
    expect(redactSensitivePayload({ url: 'https://cdn.example.com/a.jpg', count: 3 })).toEqual({
      url: 'https://cdn.example.com/a.jpg',
      count: 3,
    });
  });
});
