import { describe, expect, it } from 'vitest';
import { extractBalancedJson, extractJson, stripCodeFence } from '../jsonExtract';

describe('stripCodeFence', () => {
  it('returns the body of a fenced block', () => {
    expect(stripCodeFence('Here:\n```json\n{"a":1}\n```\nDone')).toBe('{"a":1}');
  });

  it('drops a dangling opening fence', () => {
    expect(stripCodeFence('```json\n{"a":1}')).toBe('{"a":1}');
  });
});

describe('extractBalancedJson', () => {
  it('pulls the first balanced object out of prose', () => {
    expect(extractBalancedJson('Sure! {"a": {"b": [1, 2]}} Hope that helps.')).toBe('{"a": {"b": [1, 2]}}');
  });

  it('ignores brackets inside strings', () => {
    expect(extractBalancedJson('{"a": "}]"}')).toBe('{"a": "}]"}');
  });

  it('closes a payload cut off mid-array', () => {
    expect(extractBalancedJson('{"a": [1, 2')).toBe('{"a": [1, 2]}');
  });

  it('closes a payload cut off mid-string', () => {
    expect(extractBalancedJson('{"a": "hel')).toBe('{"a": "hel"}');
  });

  it('returns null without an opener', () => {
    expect(extractBalancedJson('no json here')).toBeNull();
    expect(extractBalancedJson('   ')).toBeNull();
  });
});

describe('extractJson', () => {
  it('combines fence stripping and balancing', () => {
    expect(extractJson('```json\n[{"a": 1}]\n```')).toBe('[{"a": 1}]');
  });
});
