import { describe, it, expect } from 'vitest';
import { LexicalError } from '../src/analysisTypes';
import { lexSingle, needsSpaceBetween, splice, tokenize, Tokenizer } from '../src/core/tokenizer';
import { errorOf, kv } from './testUtils';

describe('lexer', () => {
	it('tokenizes identifiers, numbers, punctuators and blanks', () => {
		expect(kv('int x = 42;')).toEqual([
			['id', 'int'], ['ws', ' '], ['id', 'x'], ['ws', ' '], ['punct', '='], ['ws', ' '], ['number', '42'], ['punct', ';'],
		]);
	});

	it('takes the longest punctuator', () => {
		expect(kv('a<<=b...c->d##e')).toEqual([
			['id', 'a'], ['punct', '<<='], ['id', 'b'], ['punct', '...'], ['id', 'c'], ['punct', '->'], ['id', 'd'], ['punct', '##'], ['id', 'e'],
		]);
	});

	it('turns comments into a single space', () => {
		expect(kv('a/* c */b // tail\nc')).toEqual([
			['id', 'a'], ['ws', ' '], ['id', 'b'], ['ws', ' '], ['ws', ' '], ['newline', '\n'], ['id', 'c'],
		]);
	});

	it('keeps blank runs as one token', () => {
		expect(kv('a \t b')).toEqual([['id', 'a'], ['ws', ' \t '], ['id', 'b']]);
	});

	it('reads CRLF as one newline', () => {
		expect(kv('a\r\nb')).toEqual([['id', 'a'], ['newline', '\n'], ['id', 'b']]);
	});

	it('reads a lone CR as a newline', () => {
		expect(kv('a\rb')).toEqual([['id', 'a'], ['newline', '\n'], ['id', 'b']]);
		expect(tokenize('a\rb')[2]).toMatchObject({ kind: 'id', value: 'b', loc: { line: 2, col: 1 } });
		expect(kv('x\\\ry')).toEqual([['id', 'xy']]);
	});

	it('scans pp-numbers with signed exponents', () => {
		expect(kv('1e+5 0x1p-3 .5f 1.2.3')).toEqual([
			['number', '1e+5'], ['ws', ' '], ['number', '0x1p-3'], ['ws', ' '], ['number', '.5f'], ['ws', ' '], ['number', '1.2.3'],
		]);
	});

	it('recognises encoding prefixes on literals', () => {
		expect(kv('L"w" u8"s" U\'c\' Lx')).toEqual([
			['string', 'L"w"'], ['ws', ' '], ['string', 'u8"s"'], ['ws', ' '], ['char', 'U\'c\''], ['ws', ' '], ['id', 'Lx'],
		]);
	});

	it('keeps escaped quotes inside a string', () => {
		expect(kv('"a\\"b" x')).toEqual([['string', '"a\\"b"'], ['ws', ' '], ['id', 'x']]);
	});

	it('accepts $ and non-ASCII identifier characters', () => {
		expect(kv('$x é1')).toEqual([['id', '$x'], ['ws', ' '], ['id', 'é1']]);
	});

	it('flags unterminated literals instead of failing', () => {
		const toks = tokenize('"abc\nx');
		expect(toks[0].kind).toBe('string');
		expect(toks[0].value).toBe('"abc');
		expect(toks[0].unterminated).toBe(true);
		expect(toks[1].kind).toBe('newline');
		expect(toks[2].value).toBe('x');
	});

	it('throws on an unterminated block comment', () => {
		const e = errorOf(() => tokenize('a /* b', 'f.c'));
		expect(e).toBeInstanceOf(LexicalError);
		expect(e.message).toBe('f.c:1:3: unterminated comment');
	});

	it('removes line splices and reports original positions', () => {
		expect(splice('ab\\\ncd').text).toBe('abcd');
		const toks = tokenize('x\\\n+y');
		expect(toks[0]).toMatchObject({ kind: 'id', value: 'x', loc: { line: 1, col: 1 } });
		expect(toks[1]).toMatchObject({ kind: 'punct', value: '+', loc: { line: 2, col: 1 }, span: { start: 3, end: 4 } });
		expect(toks[2]).toMatchObject({ kind: 'id', value: 'y', loc: { line: 2, col: 2 } });
	});

	it('joins an identifier split by a splice', () => {
		expect(kv('ab\\\ncd')).toEqual([['id', 'abcd']]);
	});

	it('restarts from the beginning', () => {
		const tz = new Tokenizer('a b');
		expect(tz.next().value).toBe('a');
		expect(tz.peek().value).toBe(' ');
		tz.restart();
		expect(tz.next().value).toBe('a');
	});

	it('decides when printed tokens need a separating space', () => {
		expect(needsSpaceBetween('a', 'b')).toBe(true);
		expect(needsSpaceBetween('-', '-')).toBe(true);
		expect(needsSpaceBetween('-', '>')).toBe(true);
		expect(needsSpaceBetween('+', '-')).toBe(false);
		expect(needsSpaceBetween('1', '.5')).toBe(true);
		expect(needsSpaceBetween('/', '*')).toBe(true);
		expect(needsSpaceBetween('/', '/')).toBe(true);
		expect(needsSpaceBetween(')', 'x')).toBe(false);
		expect(needsSpaceBetween('x', '(')).toBe(false);
		expect(needsSpaceBetween('L', '"s"')).toBe(true);
	});

	it('lexes a pasted spelling as exactly one token', () => {
		expect(lexSingle('ab')).toEqual({ kind: 'id', value: 'ab' });
		expect(lexSingle('-=')).toEqual({ kind: 'punct', value: '-=' });
		expect(lexSingle('+-')).toBeNull();
		expect(lexSingle('//')).toBeNull();
		expect(lexSingle('')).toBeNull();
	});
});
