import type { SyntaxNode, Tree } from '@lezer/common';
import { parser } from '@lezer/python';
import { errorMessage } from './errors.js';
import { createLogger } from './logger.js';

const logger = createLogger('scanner');

export const DEFAULT_CONFIG_NAMESPACE = 'dbt';

export type ParseResult =
  | { ok: true; tree: Tree; source: string }
  | { ok: false; reason: string };

function hasSyntaxError(tree: Tree): boolean {
  let found = false;
  tree.iterate({
    enter(node) {
      if (found) return false;
      if (node.type.isError) found = true;
      return undefined;
    },
  });
  return found;
}

/**
 * Parses Python source. Any tree the parser had to repair counts as a
 * failure, the same as a SyntaxError from the Python compiler would.
 */
export function parseModelSource(source: unknown): ParseResult {
  if (typeof source !== 'string') {
    return { ok: false, reason: 'source is not text' };
  }
  try {
    const tree = parser.parse(source);
    if (hasSyntaxError(tree)) {
      return { ok: false, reason: 'syntax error' };
    }
    return { ok: true, tree, source };
  } catch (e) {
    return { ok: false, reason: errorMessage(e) };
  }
}

const STRING_LITERAL = /^([rRuUbB]{0,2})('''|"""|'|")/;
const ESCAPES: Record<string, string> = {
  a: '\x07',
  b: '\b',
  f: '\f',
  n: '\n',
  r: '\r',
  t: '\t',
  v: '\v',
  '\\': '\\',
  "'": "'",
  '"': '"',
  '\n': '',
};

// unknown escapes, `\N{...}` included, stay as written
const ESCAPE = /\\(\n|[abfnrtv\\'"]|[0-7]{1,3}|x[0-9a-fA-F]{2}|u[0-9a-fA-F]{4}|U[0-9a-fA-F]{8})/g;

function decodeEscape(escape: string, body: string): string {
  const simple = ESCAPES[body];
  if (simple !== undefined) return simple;
  const codePoint = /^[xuU]/.test(body) ? parseInt(body.slice(1), 16) : parseInt(body, 8);
  return codePoint <= 0x10ffff ? String.fromCodePoint(codePoint) : escape;
}

export function decodeStringLiteral(text: string): string | null {
  const match = STRING_LITERAL.exec(text);
  if (!match) return null;
  const [, prefix = '', quote = ''] = match;
  const flags = prefix.toLowerCase();
  // bytes are not package names
  if (flags.includes('b')) return null;
  const start = prefix.length + quote.length;
  const end = text.length - quote.length;
  if (end < start || !text.endsWith(quote)) return null;
  const body = text.slice(start, end);
  if (flags.includes('r')) return body;
  return body.replace(ESCAPE, decodeEscape);
}

function textOf(node: SyntaxNode, source: string): string {
  return source.slice(node.from, node.to);
}

function isFiller(node: SyntaxNode, source: string): boolean {
  if (node.name === 'Comment') return true;
  const text = textOf(node, source);
  return text === '(' || text === ')' || text === '[' || text === ']' || text === ',' || text === '=';
}

function stringValue(node: SyntaxNode, source: string): string | null {
  if (node.name === 'String') return decodeStringLiteral(textOf(node, source));
  if (node.name === 'ContinuedString') {
    const parts: string[] = [];
    for (let part = node.firstChild; part; part = part.nextSibling) {
      if (part.name !== 'String') return null;
      const value = decodeStringLiteral(textOf(part, source));
      if (value === null) return null;
      parts.push(value);
    }
    return parts.length > 0 ? parts.join('') : null;
  }
  return null;
}

function isConfigCall(call: SyntaxNode, source: string, namespace: string): boolean {
  const callee = call.firstChild;
  if (!callee || callee.name !== 'MemberExpression') return false;
  const object = callee.firstChild;
  const property = callee.lastChild;
  return (
    object?.name === 'VariableName' &&
    textOf(object, source) === namespace &&
    property?.name === 'PropertyName' &&
    textOf(property, source) === 'config'
  );
}

function keywordArgument(argList: SyntaxNode, source: string, keyword: string): SyntaxNode | null {
  for (let child = argList.firstChild; child; child = child.nextSibling) {
    if (child.name !== 'VariableName' || textOf(child, source) !== keyword) continue;
    if (!/^\s*=(?!=)/.test(source.slice(child.to))) continue;
    let value = child.nextSibling;
    while (value && isFiller(value, source)) value = value.nextSibling;
    return value;
  }
  return null;
}

function listLiteralStrings(list: SyntaxNode, source: string): string[] {
  const values: string[] = [];
  for (let element = list.firstChild; element; element = element.nextSibling) {
    if (isFiller(element, source)) continue;
    const value = stringValue(element, source);
    if (value !== null) values.push(value);
  }
  return values;
}

/**
 * Returns the packages declared inline with `dbt.config(packages=[...])`.
 *
 * Used when the model's parsed config does not carry the package list. Never
 * throws: unparsable source yields an empty list.
 */
export function extractPackages(sourceText: unknown, namespace: string = DEFAULT_CONFIG_NAMESPACE): string[] {
  const parsed = parseModelSource(sourceText);
  if (!parsed.ok) {
    logger.debug(`Skipping inline package scan: ${parsed.reason}`);
    return [];
  }
  const { tree, source } = parsed;
  const cursor = tree.cursor();
  do {
    if (cursor.name !== 'CallExpression') continue;
    const call = cursor.node;
    if (!isConfigCall(call, source, namespace)) continue;
    const argList = call.getChild('ArgList');
    if (!argList) continue;
    const value = keywordArgument(argList, source, 'packages');
    if (value?.name === 'ArrayExpression') {
      return listLiteralStrings(value, source);
    }
  } while (cursor.next());
  return [];
}
