import { describe, it, expect } from 'vitest';
import { parseFormBody } from '../../../../src/shared/http/form-body';

describe('parseFormBody', () => {
  it('decodes OAuth2 password-flow fields', () => {
    expect(parseFormBody('username=alice%40example.com&password=p%26ss+word')).toEqual({
      username: 'alice@example.com',
      password: 'p&ss word',
    });
  });

  it('keeps the last value of a repeated key', () => {
    expect(parseFormBody('a=1&a=2')).toEqual({ a: '2' });
  });

  it('returns an empty object for an empty body', () => {
    expect(parseFormBody('')).toEqual({});
  });
});
