import { describe, it, expect } from 'vitest';
import { DirectiveError } from '../src/analysisTypes';
import { errorOf, makeDriver, pp } from './testUtils';

describe('#define / #undef', () => {
	it('expands object-like macros', () => {
		expect(pp('#define N 10\nint a[N];\n')).toBe('int a[10];\n');
	});

	it('removes a macro with #undef', () => {
		expect(pp('#define N 1\n#undef N\nN\n')).toBe('N\n');
	});

	it('accepts #undef of an unknown name', () => {
		expect(pp('#undef NOPE\nx\n')).toBe('x\n');
	});

	it('needs "(" right after the name for a function-like macro', () => {
		expect(pp('#define F (x) x\nF(1)\n')).toBe('(x) x(1)\n');
	});

	it('ignores an identical redefinition', () => {
		const { driver, warnings } = makeDriver();
		driver.process('#define A 1 + 2\n#define A 1  +  2\n');
		expect(warnings).toEqual([]);
	});

	it('warns on a differing redefinition and uses the new body', () => {
		const { driver, warnings, messages } = makeDriver();
		expect(driver.process('#define A 1\n#define A 2\nA\n')).toBe('2\n');
		expect(warnings).toEqual([{ code: 'CPP100', message: '"A" redefined', file: '<stdin>', line: 2, column: 2 }]);
		expect(messages).toEqual(['<stdin>:2:2: warning: "A" redefined']);
	});

	it('keeps a predefined macro unless it is undefined first', () => {
		const first = makeDriver();
		expect(first.driver.process('#define __linux__ 2\n__linux__\n')).toBe('1\n');
		expect(first.warnings.map(w => w.code)).toEqual(['CPP101']);

		const second = makeDriver();
		expect(second.driver.process('#undef __linux__\n#define __linux__ 2\n__linux__\n')).toBe('2\n');
		expect(second.warnings).toEqual([]);
	});

	it('warns about extra tokens after #undef', () => {
		const { driver, warnings } = makeDriver();
		driver.process('#undef A B\n');
		expect(warnings.map(w => [w.code, w.message, w.column])).toEqual([['CPP105', 'extra tokens at end of #undef directive', 10]]);
	});

	it.each([
		['#define\n', '<stdin>:1:2: macro name missing'],
		['#define 3 x\n', '<stdin>:1:9: macro names must be identifiers'],
		['#define defined 1\n', '<stdin>:1:9: "defined" cannot be used as a macro name'],
		['#define F(a, a) a\n', '<stdin>:1:14: duplicate macro parameter "a"'],
		['#define F(..., a) x\n', '<stdin>:1:14: "..." must be the last macro parameter'],
		['#define F(a b) x\n', '<stdin>:1:13: expected "," or ")" in macro parameter list'],
		['#define F(a\n', '<stdin>:1:10: missing ")" in macro parameter list'],
		['#define F(__VA_ARGS__) x\n', '<stdin>:1:11: __VA_ARGS__ can only appear in the expansion of a variadic macro'],
		['#define S(x) #y\n', '<stdin>:1:14: "#" is not followed by a macro parameter'],
		['#define P(x) ## x\n', '<stdin>:1:14: "##" cannot appear at either end of a macro expansion'],
		['#define Q x ##\n', '<stdin>:1:13: "##" cannot appear at either end of a macro expansion'],
		['#undef\n', '<stdin>:1:2: no macro name given in #undef directive'],
	])('rejects %j', (input, message) => {
		const e = errorOf(() => pp(input));
		expect(e).toBeInstanceOf(DirectiveError);
		expect(e.message).toBe(message);
	});

	it('allows # in object-like bodies', () => {
		expect(pp('#define H # x\nH\n')).toBe('# x\n');
	});
});
