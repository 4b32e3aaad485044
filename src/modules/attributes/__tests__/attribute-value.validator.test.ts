import { describe, expect, it } from 'vitest';
import { makeAttribute } from '../../../__tests__/memory-database';
import { ValidationError } from '../../../utils/errors';
import { toAttributeValue, validateAttributeValue } from '../attribute-value.validator';

const COLOR_OPTIONS = [
  { value: 'red', label: 'Red' },
  { value: 'blue', label: 'Blue' },
];

describe('toAttributeValue', () => {
  it('tags plain JSON values by their shape', () => {
    expect(toAttributeValue('text', 'cotton')).toEqual({ kind: 'text', value: 'cotton' });
    expect(toAttributeValue('number', 12)).toEqual({ kind: 'number', value: 12 });
    expect(toAttributeValue('boolean', false)).toEqual({ kind: 'boolean', value: false });
    expect(toAttributeValue('multi_select', ['red'])).toEqual({ kind: 'structured', value: ['red'] });
  });

  it('parses ISO strings for date attributes', () => {
    const value = toAttributeValue('date', '2026-03-01');

    expect(value.kind).toBe('date');
    expect(value.kind === 'date' && value.value.toISOString()).toBe('2026-03-01T00:00:00.000Z');
    expect(toAttributeValue('datetime', '2026-03-01T10:30:00Z').kind).toBe('date');
  });

  it('rejects strings that are not dates', () => {
    expect(() => toAttributeValue('date', 'next week')).toThrow('"next week" is not a valid date');
    expect(() => toAttributeValue('datetime', '2026-03-01')).toThrow(ValidationError);
  });

  it('rejects days the month does not have', () => {
    expect(() => toAttributeValue('date', '2026-02-30')).toThrow('"2026-02-30" is not a valid date');
    expect(() => toAttributeValue('datetime', '2026-04-31T08:00:00Z')).toThrow(
      '"2026-04-31T08:00:00Z" is not a valid datetime'
    );
    expect(() => toAttributeValue('date', '2028-02-29')).not.toThrow();
  });
});

describe('validateAttributeValue', () => {
  describe('presence', () => {
    it('requires a value when the attribute is required', () => {
      const attribute = makeAttribute(1, { is_required: true });

      expect(() => validateAttributeValue(attribute, null)).toThrow('Attribute 1 is required');
      expect(() => validateAttributeValue(attribute, { kind: 'text', value: '   ' })).toThrow(
        'Attribute 1 is required'
      );
    });

    it('honours the required flag of the validation rule', () => {
      const attribute = makeAttribute(1, { type: 'multi_select', validation: { required: true } });

      expect(() => validateAttributeValue(attribute, { kind: 'structured', value: [] })).toThrow(
        'Attribute 1 is required'
      );
    });

    it('accepts a missing value for an optional attribute', () => {
      expect(() => validateAttributeValue(makeAttribute(1), null)).not.toThrow();
    });
  });

  it('rejects a value of the wrong kind', () => {
    const attribute = makeAttribute(1, { type: 'number' });

    expect(() => validateAttributeValue(attribute, { kind: 'text', value: '12' })).toThrow(
      'Attribute 1 expects a number value, got text'
    );
  });

  it('accepts numbers and formatted strings for currency', () => {
    const attribute = makeAttribute(1, { type: 'currency' });

    expect(() => validateAttributeValue(attribute, { kind: 'number', value: 9.99 })).not.toThrow();
    expect(() => validateAttributeValue(attribute, { kind: 'text', value: '9.99 EUR' })).not.toThrow();
    expect(() => validateAttributeValue(attribute, { kind: 'boolean', value: true })).toThrow(ValidationError);
  });

  describe('text rules', () => {
    const attribute = makeAttribute(1, { validation: { min_length: 3, max_length: 5, pattern: '^[a-z]+$' } });

    it('enforces length bounds', () => {
      expect(() => validateAttributeValue(attribute, { kind: 'text', value: 'ab' })).toThrow(
        'Attribute 1 must be at least 3 characters'
      );
      expect(() => validateAttributeValue(attribute, { kind: 'text', value: 'abcdef' })).toThrow(
        'Attribute 1 must be at most 5 characters'
      );
    });

    it('enforces the pattern', () => {
      expect(() => validateAttributeValue(attribute, { kind: 'text', value: 'ABC' })).toThrow(
        'Attribute 1 does not match the required format'
      );
      expect(() => validateAttributeValue(attribute, { kind: 'text', value: 'abc' })).not.toThrow();
    });

    it('reports a broken pattern as a validation error', () => {
      const broken = makeAttribute(2, { validation: { pattern: '([a-z' } });

      expect(() => validateAttributeValue(broken, { kind: 'text', value: 'abc' })).toThrow(
        'Attribute 2 has an invalid format rule'
      );
      expect(() => validateAttributeValue(broken, { kind: 'text', value: 'abc' })).toThrow(ValidationError);
    });
  });

  it('enforces numeric bounds', () => {
    const attribute = makeAttribute(1, { type: 'number', validation: { min: 0, max: 10 } });

    expect(() => validateAttributeValue(attribute, { kind: 'number', value: -1 })).toThrow(
      'Attribute 1 must be at least 0'
    );
    expect(() => validateAttributeValue(attribute, { kind: 'number', value: 11 })).toThrow(
      'Attribute 1 must be at most 10'
    );
    expect(() => validateAttributeValue(attribute, { kind: 'number', value: 10 })).not.toThrow();
  });

  describe('options', () => {
    it('limits select values to the configured options', () => {
      const attribute = makeAttribute(1, { type: 'select', options: COLOR_OPTIONS });

      expect(() => validateAttributeValue(attribute, { kind: 'text', value: 'red' })).not.toThrow();
      expect(() => validateAttributeValue(attribute, { kind: 'text', value: 'green' })).toThrow(
        '"green" is not an option of Attribute 1'
      );
    });

    it('accepts any select value when no options are configured', () => {
      const attribute = makeAttribute(1, { type: 'select' });

      expect(() => validateAttributeValue(attribute, { kind: 'text', value: 'anything' })).not.toThrow();
    });

    it('checks every multi-select choice', () => {
      const attribute = makeAttribute(1, { type: 'multi_select', options: COLOR_OPTIONS });

      expect(() => validateAttributeValue(attribute, toAttributeValue('multi_select', ['red', 'blue']))).not.toThrow();
      expect(() => validateAttributeValue(attribute, toAttributeValue('multi_select', ['red', 'green']))).toThrow(
        '"green" is not an option of Attribute 1'
      );
      expect(() => validateAttributeValue(attribute, toAttributeValue('multi_select', [1]))).toThrow(
        'Attribute 1 expects a list of options'
      );
    });
  });

  describe('formats', () => {
    it('checks email addresses', () => {
      const attribute = makeAttribute(1, { type: 'email' });

      expect(() => validateAttributeValue(attribute, { kind: 'text', value: 'a@b' })).toThrow(
        'Attribute 1 must be an email address'
      );
      expect(() => validateAttributeValue(attribute, { kind: 'text', value: 'user@example.com' })).not.toThrow();
    });

    it('checks url schemes', () => {
      const attribute = makeAttribute(1, { type: 'url' });

      expect(() => validateAttributeValue(attribute, { kind: 'text', value: 'ftp://example.com' })).toThrow(
        'Attribute 1 must start with http:// or https://'
      );
      expect(() => validateAttributeValue(attribute, { kind: 'text', value: 'https://example.com' })).not.toThrow();
    });

    it('checks hex colors', () => {
      const attribute = makeAttribute(1, { type: 'color' });

      expect(() => validateAttributeValue(attribute, { kind: 'text', value: '#12345' })).toThrow(ValidationError);
      expect(() => validateAttributeValue(attribute, { kind: 'text', value: '#abc' })).not.toThrow();
      expect(() => validateAttributeValue(attribute, { kind: 'text', value: '#1A2B3C' })).not.toThrow();
    });
  });
});
