import { describe, it, expect } from 'vitest';
import { decodeStringLiteral, extractPackages, parseModelSource } from '../codeAnnotationScanner.js';

const model = [
  'import pandas as pd',
  '',
  'def model(dbt, session):',
  '    dbt.config(materialized="table", packages=[\'numpy\', "pandas"])',
  '    orders = dbt.ref("orders")',
  '    return orders',
  '',
].join('\n');

describe('extractPackages', () => {
  it('returns the packages of a top-level config call', () => {
    expect(extractPackages('dbt.config(packages=["a", "b"])\n')).toEqual(['a', 'b']);
  });

  it('finds the config call inside the model function', () => {
    expect(extractPackages(model)).toEqual(['numpy', 'pandas']);
  });

  it('returns an empty list when there is no config call', () => {
    expect(extractPackages('def model(dbt, session):\n    return session.sql("select 1")\n')).toEqual([]);
  });

  it('returns an empty list for a config call without packages', () => {
    expect(extractPackages('dbt.config(materialized="view")\n')).toEqual([]);
  });

  it('returns an empty list for malformed source', () => {
    expect(extractPackages('def model(dbt, session)\n    dbt.config(packages=["a"])\n')).toEqual([]);
  });

  it('returns an empty list for non-text input', () => {
    expect(extractPackages(42)).toEqual([]);
    expect(extractPackages(undefined)).toEqual([]);
  });

  it('ignores packages given as a variable', () => {
    expect(extractPackages('pkgs = ["a"]\ndbt.config(packages=pkgs)\n')).toEqual([]);
  });

  it('ignores a positional list', () => {
    expect(extractPackages('dbt.config(["a"])\n')).toEqual([]);
  });

  it('only matches the configured namespace and method', () => {
    expect(extractPackages('cfg.config(packages=["a"])\n')).toEqual([]);
    expect(extractPackages('dbt.settings(packages=["a"])\n')).toEqual([]);
    expect(extractPackages('self.dbt.config(packages=["a"])\n')).toEqual([]);
    expect(extractPackages('ctx.config(packages=["x"])\n', 'ctx')).toEqual(['x']);
  });

  it('skips list elements that are not string constants', () => {
    expect(extractPackages('dbt.config(packages=["a", 1, name, "b"])\n')).toEqual(['a', 'b']);
  });

  it('returns an empty list for an empty package list', () => {
    expect(extractPackages('dbt.config(packages=[])\n')).toEqual([]);
  });

  it('uses the first config call whose packages is a literal list', () => {
    const source = 'dbt.config(packages=pkgs)\ndbt.config(packages=["late"])\n';
    expect(extractPackages(source)).toEqual(['late']);
  });

  it('reads a list spread over several lines', () => {
    const source = 'dbt.config(\n    packages=[\n        "scikit-learn",\n        "xgboost",\n    ],\n)\n';
    expect(extractPackages(source)).toEqual(['scikit-learn', 'xgboost']);
  });
});

describe('parseModelSource', () => {
  it('reports syntax errors instead of throwing', () => {
    const result = parseModelSource('x = (\n');
    expect(result).toEqual({ ok: false, reason: 'syntax error' });
  });

  it('reports non-text input', () => {
    expect(parseModelSource(null)).toEqual({ ok: false, reason: 'source is not text' });
  });

  it('returns the tree for valid source', () => {
    const result = parseModelSource('x = 1\n');
    expect(result.ok).toBe(true);
  });
});

describe('decodeStringLiteral', () => {
  it('strips single, double and triple quotes', () => {
    expect(decodeStringLiteral('"pandas"')).toBe('pandas');
    expect(decodeStringLiteral("'numpy'")).toBe('numpy');
    expect(decodeStringLiteral('"""polars"""')).toBe('polars');
  });

  it('unescapes ordinary strings', () => {
    expect(decodeStringLiteral('"a\\"b"')).toBe('a"b');
  });

  it('decodes hex, unicode and octal escapes', () => {
    expect(decodeStringLiteral('"\\x41\\u00e9\\101"')).toBe('AéA');
    expect(decodeStringLiteral("'\\U0001F600'")).toBe('\u{1F600}');
    expect(decodeStringLiteral("'a\\tb\\vc\\a'")).toBe('a\tb\vc\x07');
  });

  it('keeps unknown and named escapes as written', () => {
    expect(decodeStringLiteral("'a\\qb'")).toBe('a\\qb');
    expect(decodeStringLiteral("'\\N{DASH}'")).toBe('\\N{DASH}');
  });

  it('keeps backslashes in raw strings', () => {
    expect(decodeStringLiteral("r'a\\b'")).toBe('a\\b');
  });

  it('rejects bytes literals', () => {
    expect(decodeStringLiteral("b'pandas'")).toBeNull();
  });

  it('accepts version specifiers verbatim', () => {
    expect(decodeStringLiteral('u"requests>=2.31"')).toBe('requests>=2.31');
  });
});
