import type { PreprocessWarning } from '../analysisTypes';
import type { MacroDefines } from './macro';

export type Target = 'linux' | 'windows' | 'macos';
export type Compiler = 'gcc' | 'clang' | 'msvc';
export type LineMode = 'compact' | 'preserve';
export type IncludeKind = 'local' | 'system';

export interface IncludeContext {
	// ids of the files currently being processed, outermost first
	readonly includeStack: readonly string[];
	readonly includeDirs: readonly string[];
	// id of the file containing the #include
	readonly from: string;
	readonly line: number;
}

// `id` names the loaded file in diagnostics, __FILE__ and #pragma once
export type IncludeResult = string | { id: string; text: string } | null;
export type IncludeLoader = (name: string, kind: IncludeKind, ctx: IncludeContext) => IncludeResult;

export type WarningHandler = (message: string, warning: PreprocessWarning) => void;

export interface PreprocessorConfig {
	target?: Target;
	compiler?: Compiler;
	recursionLimit?: number;
	onWarning?: WarningHandler;
	includeLoader?: IncludeLoader;
	includePaths?: string[];
	// codes (CPP102) or names (unknown-pragma), as a list or a comma separated string
	disabledWarnings?: string[] | string;
	lineMode?: LineMode;
	file?: string;
	defines?: MacroDefines;
	now?: () => Date;
}

export interface ResolvedConfig {
	target: Target;
	compiler: Compiler;
	recursionLimit: number;
	onWarning?: WarningHandler;
	includeLoader?: IncludeLoader;
	includePaths: string[];
	disabledWarnings: string[] | string;
	lineMode: LineMode;
	file: string;
	defines: MacroDefines;
	now: () => Date;
}

export const DEFAULT_RECURSION_LIMIT = 128;

export const DEFAULT_CONFIG: Readonly<Omit<ResolvedConfig, 'onWarning' | 'includeLoader'>> = {
	target: 'linux',
	compiler: 'gcc',
	recursionLimit: DEFAULT_RECURSION_LIMIT,
	includePaths: [],
	disabledWarnings: [],
	lineMode: 'compact',
	file: '<stdin>',
	defines: {},
	now: () => new Date(),
};

const USUAL_COMPILER: Record<Target, Compiler> = {
	linux: 'gcc',
	windows: 'msvc',
	macos: 'clang',
};

// Preset pairing an OS with its usual compiler
export function configFor(target: Target, overrides: PreprocessorConfig = {}): PreprocessorConfig {
	return { target, compiler: USUAL_COMPILER[target], ...overrides };
}

export function resolveConfig(config: PreprocessorConfig = {}): ResolvedConfig {
	const d = DEFAULT_CONFIG;
	return {
		target: config.target ?? d.target,
		compiler: config.compiler ?? d.compiler,
		recursionLimit: config.recursionLimit ?? d.recursionLimit,
		onWarning: config.onWarning,
		includeLoader: config.includeLoader,
		includePaths: [...(config.includePaths ?? d.includePaths)],
		disabledWarnings: config.disabledWarnings ?? d.disabledWarnings,
		lineMode: config.lineMode ?? d.lineMode,
		file: config.file ?? d.file,
		defines: { ...(config.defines ?? d.defines) },
		now: config.now ?? d.now,
	};
}
