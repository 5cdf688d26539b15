import { describe, it, expect } from 'vitest';
import { AppError } from '../../../src/shared/http/errors';
import {
  isCadastralNumber,
  validateCadastralNumber,
} from '../../../src/modules/query-history/validators/cadastral-number';
import { CADASTRAL_NUMBER_FORMAT_MESSAGE } from '../../../src/modules/query-history/query-history.errors';

describe('cadastral number validator', () => {
  it.each([
    '12:34:567890:1011',
    '12:34:5678901:1',
    '00:00:000000:0',
    '77:01:0004012:123456',
  ])('accepts %s and returns it unchanged', (candidate) => {
    expect(isCadastralNumber(candidate)).toBe(true);
    expect(validateCadastralNumber(candidate)).toBe(candidate);
  });

  it.each([
    ['invalid_format'],
    ['1:34:567890:1011'], // district has one digit
    ['12:345:567890:1011'], // area has three digits
    ['12:34:56789:1011'], // quarter too short
    ['12:34:56789012:1011'], // quarter too long
    ['12:34:567890:'], // empty parcel
    ['12:34:567890:10a1'],
    ['12-34-567890-1011'],
    [' 12:34:567890:1011'],
    ['12:34:567890:1011 '],
    ['12:34:567890:1011:5'],
    [''],
  ])('rejects %j', (candidate) => {
    expect(isCadastralNumber(candidate)).toBe(false);
  });

  it('throws a 400 with the fixed format message', () => {
    try {
      validateCadastralNumber('12:34:567890');
      expect.unreachable('validator should have thrown');
    } catch (err) {
      expect(err).toBeInstanceOf(AppError);
      if (!(err instanceof AppError)) return;
      expect(err.status).toBe(400);
      expect(err.code).toBe('VALIDATION_ERROR');
      expect(err.message).toBe(CADASTRAL_NUMBER_FORMAT_MESSAGE);
    }
  });
});
