import type { Attribute, AttributeType } from '../../connections/db/models/attribute.model';
import { ValidationError } from '../../utils/errors';

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type AttributeValue =
  | { kind: 'text'; value: string }
  | { kind: 'number'; value: number }
  | { kind: 'boolean'; value: boolean }
  | { kind: 'date'; value: Date }
  | { kind: 'structured'; value: JsonValue };

export type AttributeValueKind = AttributeValue['kind'];

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const DATETIME_PATTERN = /^(\d{4})-(\d{2})-(\d{2})T\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:\d{2})?$/;
const HEX_COLOR_PATTERN = /^#([0-9a-fA-F]{3}|[0-9a-fA-F]{6})$/;

/**
 * Kinds each attribute type accepts. Currency takes a number or a formatted string.
 */
const ACCEPTED_KINDS: Record<AttributeType, AttributeValueKind[]> = {
  text: ['text'],
  number: ['number'],
  select: ['text'],
  multi_select: ['structured'],
  boolean: ['boolean'],
  date: ['date'],
  datetime: ['date'],
  url: ['text'],
  email: ['text'],
  color: ['text'],
  currency: ['number', 'text'],
};

// Date rolls 2026-02-30 over into March; the fields must survive the round trip
const isCalendarDate = (year: string, month: string, day: string): boolean => {
  const date = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)));
  return (
    date.getUTCFullYear() === Number(year) &&
    date.getUTCMonth() === Number(month) - 1 &&
    date.getUTCDate() === Number(day)
  );
};

const compilePattern = (attribute: Attribute, pattern: string): RegExp => {
  try {
    return new RegExp(pattern);
  } catch (error) {
    throw new ValidationError(`${attribute.display_name} has an invalid format rule`, {
      attribute_id: attribute.id,
      pattern,
      reason: error instanceof Error ? error.message : String(error),
    });
  }
};

/**
 * Lifts raw JSON input into a tagged value for an attribute of the given type.
 * Date types accept ISO strings; everything else keeps its JSON shape.
 */
export const toAttributeValue = (type: AttributeType, raw: JsonValue): AttributeValue => {
  if ((type === 'date' || type === 'datetime') && typeof raw === 'string') {
    const match = (type === 'date' ? DATE_PATTERN : DATETIME_PATTERN).exec(raw);
    const parsed = new Date(raw);
    if (!match || Number.isNaN(parsed.getTime()) || !isCalendarDate(match[1], match[2], match[3])) {
      throw new ValidationError(`"${raw}" is not a valid ${type}`);
    }
    return { kind: 'date', value: parsed };
  }
  if (typeof raw === 'string') return { kind: 'text', value: raw };
  if (typeof raw === 'number') return { kind: 'number', value: raw };
  if (typeof raw === 'boolean') return { kind: 'boolean', value: raw };
  return { kind: 'structured', value: raw };
};

const isEmpty = (value: AttributeValue | null): boolean => {
  if (value === null) return true;
  if (value.kind === 'text') return value.value.trim() === '';
  if (value.kind === 'structured') {
    return value.value === null || (Array.isArray(value.value) && value.value.length === 0);
  }
  return false;
};

const validateText = (attribute: Attribute, text: string) => {
  const rule = attribute.validation;
  if (rule.min_length !== undefined && text.length < rule.min_length) {
    throw new ValidationError(`${attribute.display_name} must be at least ${rule.min_length} characters`);
  }
  if (rule.max_length !== undefined && text.length > rule.max_length) {
    throw new ValidationError(`${attribute.display_name} must be at most ${rule.max_length} characters`);
  }
  if (rule.pattern && !compilePattern(attribute, rule.pattern).test(text)) {
    throw new ValidationError(`${attribute.display_name} does not match the required format`);
  }
};

const validateNumber = (attribute: Attribute, num: number) => {
  const rule = attribute.validation;
  if (!Number.isFinite(num)) {
    throw new ValidationError(`${attribute.display_name} must be a finite number`);
  }
  if (rule.min !== undefined && num < rule.min) {
    throw new ValidationError(`${attribute.display_name} must be at least ${rule.min}`);
  }
  if (rule.max !== undefined && num > rule.max) {
    throw new ValidationError(`${attribute.display_name} must be at most ${rule.max}`);
  }
};

const validateOption = (attribute: Attribute, choice: string) => {
  // no configured options means any value goes
  if (attribute.options.length === 0) return;
  if (!attribute.options.some((option) => option.value === choice)) {
    throw new ValidationError(`"${choice}" is not an option of ${attribute.display_name}`);
  }
};

const validateTextFormat = (attribute: Attribute, text: string) => {
  switch (attribute.type) {
    case 'email':
      if (text.length < 5 || !text.includes('@') || !text.includes('.')) {
        throw new ValidationError(`${attribute.display_name} must be an email address`);
      }
      break;
    case 'url':
      if (!text.startsWith('http://') && !text.startsWith('https://')) {
        throw new ValidationError(`${attribute.display_name} must start with http:// or https://`);
      }
      break;
    case 'color':
      if (!HEX_COLOR_PATTERN.test(text)) {
        throw new ValidationError(`${attribute.display_name} must be a hex color such as #1a2b3c`);
      }
      break;
    case 'select':
      validateOption(attribute, text);
      break;
    default:
      break;
  }
};

/**
 * Checks a value against an attribute definition: presence, kind, rule bounds and options.
 * `null` stands for "no value".
 */
export const validateAttributeValue = (attribute: Attribute, value: AttributeValue | null): void => {
  const required = attribute.is_required || attribute.validation.required === true;

  if (value === null || isEmpty(value)) {
    if (required) {
      throw new ValidationError(`${attribute.display_name} is required`);
    }
    return;
  }

  if (!ACCEPTED_KINDS[attribute.type].includes(value.kind)) {
    throw new ValidationError(
      `${attribute.display_name} expects a ${attribute.type} value, got ${value.kind}`,
      { attribute_id: attribute.id, kind: value.kind }
    );
  }

  switch (value.kind) {
    case 'text':
      validateText(attribute, value.value);
      validateTextFormat(attribute, value.value);
      break;
    case 'number':
      validateNumber(attribute, value.value);
      break;
    case 'structured': {
      // only multi_select reaches here
      const choices = value.value;
      if (!Array.isArray(choices) || !choices.every((choice): choice is string => typeof choice === 'string')) {
        throw new ValidationError(`${attribute.display_name} expects a list of options`);
      }
      choices.forEach((choice) => validateOption(attribute, choice));
      break;
    }
    case 'boolean':
    case 'date':
      break;
  }
};
