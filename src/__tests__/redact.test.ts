import { describe, it, expect } from 'vitest';
import { redactHeaders } from '../redact';

describe('redactHeaders', () => {
  const headers = [
    { name: 'Host', value: 'example.test' },
    { name: 'Authorization', value: 'Bearer test-secret' },
    { name: 'X-Api-Key', value: 'test-key' },
  ];

  it('returns the headers unchanged when nothing is listed', () => {
    expect(redactHeaders(headers, [])).toEqual(headers);
  });

  it('masks listed headers regardless of case and keeps order', () => {
    expect(redactHeaders(headers, ['authorization', 'x-api-key'])).toEqual([
      { name: 'Host', value: 'example.test' },
      { name: 'Authorization', value: '[REDACTED]' },
      { name: 'X-Api-Key', value: '[REDACTED]' },
    ]);
  });

  it('does not modify the input', () => {
    redactHeaders(headers, ['authorization']);
    expect(headers[1].value).toBe('Bearer test-secret');
  });
});
