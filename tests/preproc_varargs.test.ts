import { describe, it, expect } from 'vitest';
import { DirectiveError } from '../src/analysisTypes';
import { configFor } from '../src/core/config';
import { errorOf, pp } from './testUtils';

describe('variadic macros', () => {
	const P = '#define P(fmt, ...) printf(fmt, __VA_ARGS__)\n';

	it('passes the trailing arguments through __VA_ARGS__', () => {
		expect(pp(`${P}P("%d %d", 1, 2)\n`)).toBe('printf("%d %d", 1, 2)\n');
	});

	it('allows the variadic argument to be left out', () => {
		expect(pp(`${P}P("x")\n`)).toBe('printf("x", )\n');
	});

	it('drops the comma before an empty ## __VA_ARGS__', () => {
		const E = '#define E(fmt, ...) f(fmt, ## __VA_ARGS__)\n';
		expect(pp(`${E}E(a)\nE(a, b)\n`)).toBe('f(a)\nf(a,b)\n');
	});

	it('drops the comma before an empty __VA_ARGS__ under msvc', () => {
		const M = '#define M(fmt, ...) f(fmt, __VA_ARGS__)\nM(a)\n';
		expect(pp(M, configFor('windows'))).toBe('f(a)\n');
		expect(pp(M)).toBe('f(a, )\n');
	});

	it('emits __VA_OPT__ content only with variadic arguments', () => {
		const V = '#define V(x, ...) g(x __VA_OPT__(,) __VA_ARGS__)\n';
		expect(pp(`${V}V(1)\nV(1, 2)\n`)).toBe('g(1 )\ng(1 , 2)\n');
	});

	it('supports a named variadic parameter', () => {
		expect(pp('#define N(args...) h(args)\nN(1, 2)\n')).toBe('h(1, 2)\n');
	});

	it('does not split parenthesized commas', () => {
		expect(pp('#define FIRST(a, b) a\nFIRST((1, 2), 3)\n')).toBe('(1, 2)\n');
	});
});

describe('function-like invocation', () => {
	const ADD = '#define ADD(a, b) ((a)+(b))\n';

	it.each([
		[`${ADD}ADD(1)\n`, '<stdin>:2:1: macro "ADD" requires 2 arguments, but only 1 given'],
		[`${ADD}ADD(1, 2, 3)\n`, '<stdin>:2:1: macro "ADD" passed 3 arguments, but takes just 2'],
		['#define V2(a, b, ...) x\nV2(1)\n', '<stdin>:2:1: macro "V2" requires at least 2 arguments, but only 1 given'],
		['#define Z() z\nZ(1)\n', '<stdin>:2:1: macro "Z" passed 1 arguments, but takes just 0'],
		['#define F(x) x\nF(1\n', '<stdin>:2:1: unterminated argument list invoking macro "F"'],
	])('rejects %j', (input, message) => {
		const e = errorOf(() => pp(input));
		expect(e).toBeInstanceOf(DirectiveError);
		expect(e.message).toBe(message);
	});

	it('invokes a macro without parameters', () => {
		expect(pp('#define Z() z\nZ()\n')).toBe('z\n');
	});

	it('leaves the name alone when no "(" follows', () => {
		expect(pp('#define F(x) x\nF + 1\n')).toBe('F + 1\n');
		expect(pp('#define F(x) x\nint F;\n')).toBe('int F;\n');
		expect(pp('#define F(x) x\nF')).toBe('F');
	});

	it('keeps the line count when the invocation spans lines', () => {
		expect(pp('#define F(a, b) a+b\nF(1,\n2)\nend\n')).toBe('1+2\n\nend\n');
	});

	it('passes an empty argument', () => {
		expect(pp(`${ADD}ADD(, 2)\n`)).toBe('(()+(2))\n');
	});
});
