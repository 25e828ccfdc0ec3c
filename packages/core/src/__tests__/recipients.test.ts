import { describe, it, expect } from 'vitest';
import { ValidationError } from '../errors.js';
import {
  flattenMultiValue,
  normalizeAddresses,
  parseLabelIds,
  splitAddressList,
  toMultiValue,
} from '../mail/recipients.js';

describe('toMultiValue', () => {
  it('tags each accepted shape', () => {
    expect(toMultiValue('a@example.com', 'to')).toEqual({ kind: 'single', value: 'a@example.com' });
    expect(toMultiValue(['a@example.com'], 'to')).toEqual({ kind: 'many', values: ['a@example.com'] });
    expect(toMultiValue({ Ann: 'a@example.com' }, 'to')).toEqual({ kind: 'keyed', entries: { Ann: 'a@example.com' } });
    expect(toMultiValue(undefined, 'to')).toEqual({ kind: 'many', values: [] });
  });

  it('rejects non-string content', () => {
    expect(() => toMultiValue([1], 'to')).toThrow(ValidationError);
    expect(() => toMultiValue(42, 'cc')).toThrow('cc must be a string, a list of strings, or a map of strings');
  });
});

describe('flattenMultiValue', () => {
  it('orders keyed values by key', () => {
    expect(flattenMultiValue({ kind: 'keyed', entries: { zed: 'z@example.com', amy: 'a@example.com' } }))
      .toEqual(['a@example.com', 'z@example.com']);
  });
});

describe('address normalization', () => {
  it('splits comma-joined strings and keeps case', () => {
    expect(splitAddressList(['A@example.com, b@example.com', ' ,c@example.com'])).toEqual([
      'A@example.com',
      'b@example.com',
      'c@example.com',
    ]);
  });

  it('lowercases and dedupes in first-seen order', () => {
    expect(normalizeAddresses(['B@example.com', 'a@example.com,b@EXAMPLE.com'])).toEqual(['b@example.com', 'a@example.com']);
  });
});

describe('parseLabelIds', () => {
  it('accepts lists, JSON arrays, comma strings and single ids', () => {
    expect(parseLabelIds(['Work', ' Urgent ', 'Work'])).toEqual(['Work', 'Urgent']);
    expect(parseLabelIds('["Work","Later"]')).toEqual(['Work', 'Later']);
    expect(parseLabelIds('Work, Later,Work')).toEqual(['Work', 'Later']);
    expect(parseLabelIds('Work')).toEqual(['Work']);
    expect(parseLabelIds(undefined)).toEqual([]);
  });

  it('rejects malformed JSON and non-string ids', () => {
    expect(() => parseLabelIds('[Work')).toThrow(ValidationError);
    expect(() => parseLabelIds([3])).toThrow('Label ids must be strings');
  });
});
