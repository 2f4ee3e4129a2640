import { describe, it, expect } from 'vitest';
import { RecursionLimitError } from '../src/analysisTypes';
import { ExpansionContext } from '../src/core/expander';
import { tokenize } from '../src/core/tokenizer';
import { errorOf, makeDriver, memoryLoader } from './testUtils';

const CHAIN = '#define A1 A2\n#define A2 A3\n#define A3 A4\n#define A4 x\nA1\n';

describe('recursion limit', () => {
	it('allows a chain within the default limit', () => {
		const { driver } = makeDriver();
		expect(driver.recursionLimit).toBe(128);
		expect(driver.process(CHAIN)).toBe('x\n');
	});

	it('fails a chain deeper than the limit', () => {
		const { driver } = makeDriver();
		driver.setRecursionLimit(3);
		const e = errorOf(() => driver.process(CHAIN));
		expect(e).toBeInstanceOf(RecursionLimitError);
		expect(e.message).toBe('<stdin>:5:1: macro "A4" exceeds the recursion limit of 3');
	});

	it('bounds nested argument expansion', () => {
		const { driver } = makeDriver({ recursionLimit: 2 });
		expect(() => driver.process('#define F(x) x\nF(F(F(F(1))))\n')).toThrow(RecursionLimitError);
	});

	it('bounds include nesting', () => {
		const { driver } = makeDriver({ recursionLimit: 5, includeLoader: memoryLoader({ 'self.h': '#include "self.h"\n' }) });
		const e = errorOf(() => driver.process('#include "self.h"\n'));
		expect(e).toBeInstanceOf(RecursionLimitError);
		expect(e.message).toBe('self.h:1:2: #include nested depth 6 exceeds the recursion limit of 5');
	});

	it('keeps the driver usable after the error', () => {
		const { driver } = makeDriver({ recursionLimit: 3 });
		expect(driver.tryProcess(CHAIN)).toBeNull();
		expect(driver.lastError).toBeInstanceOf(RecursionLimitError);
		expect(driver.process('A3\n')).toBe('x\n');
	});

	it('rejects limits below 1', () => {
		const { driver } = makeDriver();
		expect(() => driver.setRecursionLimit(0)).toThrow('invalid recursion limit: 0');
		expect(() => driver.setRecursionLimit(2.5)).toThrow('invalid recursion limit: 2.5');
		expect(driver.recursionLimit).toBe(128);
	});

	it('tracks the argument expansion stack', () => {
		const ctx = new ExpansionContext(() => 1);
		const at = tokenize('F')[0];
		ctx.enter('F', at);
		expect(ctx.active).toEqual(['F']);
		expect(() => ctx.enter('G', at)).toThrow('macro "G" exceeds the recursion limit of 1');
		ctx.leave();
		expect(ctx.depth).toBe(0);
	});
});
