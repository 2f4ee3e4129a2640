import { describe, it, expect } from 'vitest';
import { DirectiveError, EvaluationError } from '../src/analysisTypes';
import { preprocess } from '../src/core/driver';
import { errorOf, makeDriver, pp } from './testUtils';

const chain = (cond1: string, cond2: string) => `#if ${cond1}\na\n#elif ${cond2}\nb\n#else\nc\n#endif\n`;

describe('conditional directives', () => {
	it('takes the first true branch of #if/#elif/#else', () => {
		expect(pp(chain('1', '1'))).toBe('a\n');
		expect(pp(chain('0', '2 > 1'))).toBe('b\n');
		expect(pp(chain('0', '0'))).toBe('c\n');
	});

	it('does not evaluate conditions inside a skipped group', () => {
		expect(pp('#if 0\n#if 1/0\nx\n#endif\n#endif\ny\n')).toBe('y\n');
	});

	it('does not evaluate #elif once a branch was taken', () => {
		expect(pp('#if 1\na\n#elif 1/0\nb\n#endif\n')).toBe('a\n');
	});

	it('tests definitions with #ifdef and #ifndef', () => {
		expect(pp('#define A\n#ifdef A\n1\n#endif\n#ifndef A\n2\n#endif\n')).toBe('1\n');
	});

	it('treats unknown identifiers as 0', () => {
		expect(pp('#if FOO\nx\n#else\ny\n#endif\n')).toBe('y\n');
	});

	it('supports both forms of defined', () => {
		expect(pp('#define X 0\n#if defined X && defined(X)\nok\n#endif\n')).toBe('ok\n');
		expect(pp('#if defined(NOPE) || !defined NOPE\nok\n#endif\n')).toBe('ok\n');
	});

	it('evaluates defined produced by a macro', () => {
		expect(pp('#define X_IMPL 1\n#define HAVE_X defined(X_IMPL)\n#if HAVE_X\nyes\n#endif\n')).toBe('yes\n');
	});

	it('expands macros in #if operands', () => {
		expect(pp('#define V 3\n#define TWICE(x) ((x) * 2)\n#if TWICE(V) == 6\nsix\n#endif\n')).toBe('six\n');
	});

	it.each([
		['#endif\n', '<stdin>:1:2: #endif without #if'],
		['#else\n', '<stdin>:1:2: #else without #if'],
		['#elif 1\n', '<stdin>:1:2: #elif without #if'],
		['#if 1\n#else\n#else\n#endif\n', '<stdin>:3:2: #else after #else'],
		['#if 1\n#else\n#elif 1\n#endif\n', '<stdin>:3:2: #elif after #else'],
		['#ifdef\n#endif\n', '<stdin>:1:2: no macro name given in #ifdef directive'],
	])('rejects %j', (input, message) => {
		const e = errorOf(() => pp(input));
		expect(e).toBeInstanceOf(DirectiveError);
		expect(e.message).toBe(message);
	});

	it('reports an empty #if', () => {
		const e = errorOf(() => pp('#if\n#endif\n'));
		expect(e).toBeInstanceOf(EvaluationError);
		expect(e.message).toBe('<stdin>:1:2: #if with no expression');
	});

	it('reports a malformed defined', () => {
		expect(errorOf(() => pp('#if defined(A\n#endif\n')).detail).toBe('missing ")" after "defined"');
		expect(errorOf(() => pp('#if defined 1\n#endif\n')).detail).toBe('operator "defined" requires an identifier');
	});

	it('warns about extra tokens after #ifdef, #else and #endif', () => {
		const { driver, warnings } = makeDriver();
		driver.process('#ifdef A B\n#else junk\n#endif junk\n');
		expect(warnings.map(w => w.message)).toEqual([
			'extra tokens at end of #ifdef directive',
			'extra tokens at end of #else directive',
			'extra tokens at end of #endif directive',
		]);
	});

	it('keeps open conditionals across process calls', () => {
		const { driver } = makeDriver();
		expect(driver.process('#if 1\n')).toBe('');
		expect(driver.conditionalDepth).toBe(1);
		expect(driver.process('a\n#endif\n')).toBe('a\n');
		expect(driver.conditionalDepth).toBe(0);
	});

	it('skips text across calls while a false group is open', () => {
		const { driver } = makeDriver();
		driver.process('#ifdef NOPE\n');
		expect(driver.process('hidden\n#else\nshown\n#endif\n')).toBe('shown\n');
	});

	it('reports an unterminated conditional from preprocess() and checkComplete()', () => {
		const e = errorOf(() => preprocess('#if 1\nx\n'));
		expect(e).toBeInstanceOf(DirectiveError);
		expect(e.message).toBe('<stdin>:1:2: unterminated conditional directive');

		const { driver } = makeDriver();
		driver.process('#ifndef G\n#define G\n');
		expect(() => driver.checkComplete()).toThrow('unterminated conditional directive');
		expect(driver.lastError?.detail).toBe('unterminated conditional directive');
	});
});
