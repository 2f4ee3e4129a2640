import path from 'node:path';
import { PreprocessError, type PreprocessWarning } from '../src/analysisTypes';
import type { IncludeLoader, PreprocessorConfig } from '../src/core/config';
import { PreprocessorDriver } from '../src/core/driver';
import type { IncludeFs } from '../src/core/pipeline';
import type { Token } from '../src/core/tokens';
import { tokenize } from '../src/core/tokenizer';

// Fixed clock for __DATE__ / __TIME__
export const FIXED_NOW = new Date(Date.UTC(2024, 0, 5, 9, 7, 3));

export function makeDriver(config: PreprocessorConfig = {}) {
	const warnings: PreprocessWarning[] = [];
	const messages: string[] = [];
	const driver = new PreprocessorDriver({
		now: () => FIXED_NOW,
		onWarning: (message, w) => { messages.push(message); warnings.push(w); },
		...config,
	});
	return { driver, warnings, messages };
}

// Preprocess with a fresh driver and return the output text
export function pp(input: string, config: PreprocessorConfig = {}): string {
	return makeDriver(config).driver.process(input);
}

// Include loader over an in-memory file map; ids are the map keys
export function memoryLoader(files: Record<string, string>, seen?: string[]): IncludeLoader {
	return (name) => {
		seen?.push(name);
		if (!Object.prototype.hasOwnProperty.call(files, name)) return null;
		return { id: name, text: files[name] };
	};
}

export type FakeFs = IncludeFs & { files: Map<string, { text: string; mtimeMs: number }>; reads: string[] };

export function fakeFs(files: Record<string, string>): FakeFs {
	const map = new Map<string, { text: string; mtimeMs: number }>();
	for (const [p, text] of Object.entries(files)) map.set(path.normalize(p), { text, mtimeMs: 1000 });
	const reads: string[] = [];
	return {
		files: map,
		reads,
		existsSync: (p) => map.has(path.normalize(p)),
		statSync: (p) => {
			const e = map.get(path.normalize(p));
			if (!e) throw new Error(`ENOENT: ${p}`);
			return { mtimeMs: e.mtimeMs, isFile: () => true };
		},
		readFileSync: (p) => {
			const e = map.get(path.normalize(p));
			if (!e) throw new Error(`ENOENT: ${p}`);
			reads.push(path.normalize(p));
			return e.text;
		},
	};
}

// Compact view of lexed tokens: kind and value, eof dropped
export function kv(text: string): [Token['kind'], string][] {
	return tokenize(text).filter(t => t.kind !== 'eof').map(t => [t.kind, t.value]);
}

// The PreprocessError thrown by fn; fails the test when nothing (or something else) is thrown
export function errorOf(fn: () => unknown): PreprocessError {
	try {
		fn();
	} catch (e) {
		if (e instanceof PreprocessError) return e;
		throw e;
	}
	throw new Error('expected a PreprocessError');
}
