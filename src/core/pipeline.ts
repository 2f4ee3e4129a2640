import path from 'node:path';
import nodeFs from 'node:fs';
import type { IncludeContext, IncludeKind, IncludeLoader, PreprocessorConfig } from './config';
import { debug } from './debug';
import { preprocess } from './driver';

// The part of node:fs the loader uses; tests pass an in-memory stand-in
export interface IncludeFs {
	existsSync(p: string): boolean;
	statSync(p: string): { mtimeMs: number; isFile(): boolean };
	readFileSync(p: string, encoding: 'utf8'): string;
}

export type IncludeResolverOptions = {
	// searched after the directory of the including file ("...") and before the driver's includePaths
	includePaths?: string[];
	fs?: IncludeFs;
};

// File contents keyed by path, reused while the mtime is unchanged
type CachedEntry = { text: string; mtimeMs: number };
const includeCache = new Map<string, CachedEntry>();
export function clearIncludeResolverCache() { includeCache.clear(); }

export function includeCandidates(name: string, kind: IncludeKind, ctx: IncludeContext, includePaths: readonly string[]): string[] {
	if (path.isAbsolute(name)) return [name];
	const candidates: string[] = [];
	// resolve relative to including file first, then search includePaths
	if (kind === 'local') candidates.push(path.join(path.dirname(ctx.from), name));
	for (const dir of [...includePaths, ...ctx.includeDirs]) {
		const p = path.join(dir, name);
		if (!candidates.includes(p)) candidates.push(p);
	}
	return candidates;
}

export function buildIncludeResolver(opts: IncludeResolverOptions = {}): IncludeLoader {
	const fs = opts.fs ?? nodeFs;
	return (name, kind, ctx) => {
		for (const filePath of includeCandidates(name, kind, ctx, opts.includePaths ?? [])) {
			if (!fs.existsSync(filePath)) continue;
			const stat = fs.statSync(filePath);
			if (!stat.isFile()) continue;
			const prev = includeCache.get(filePath);
			if (prev && prev.mtimeMs === stat.mtimeMs) {
				debug('include', 'cache hit', filePath);
				return { id: filePath, text: prev.text };
			}
			const text = fs.readFileSync(filePath, 'utf8');
			includeCache.set(filePath, { text, mtimeMs: stat.mtimeMs });
			debug('include', 'loaded', filePath);
			return { id: filePath, text };
		}
		return null;
	};
}

/** Preprocess a file from disk, resolving #include through the file system. */
export function preprocessFile(filePath: string, config: PreprocessorConfig = {}, fs: IncludeFs = nodeFs): string {
	const text = fs.readFileSync(filePath, 'utf8');
	return preprocess(text, {
		...config,
		file: config.file ?? filePath,
		includeLoader: config.includeLoader ?? buildIncludeResolver({ fs }),
	});
}
