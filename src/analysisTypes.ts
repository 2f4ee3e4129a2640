import type { Token } from './core/tokens';

export const CPP_ERRORCODES = {
	LEXICAL: 'CPP001',
	DIRECTIVE: 'CPP002',
	RECURSION_LIMIT: 'CPP003',
	EVALUATION: 'CPP004',
	PASTE: 'CPP005',
	LOADER: 'CPP006',
	USER: 'CPP007',
} as const;
export type ErrorCode = typeof CPP_ERRORCODES[keyof typeof CPP_ERRORCODES];

export const CPP_WARNCODES = {
	MACRO_REDEFINED: 'CPP100',
	PREDEFINED_REDEFINED: 'CPP101',
	UNKNOWN_PRAGMA: 'CPP102',
	USER_WARNING: 'CPP103',
	PRAGMA_MESSAGE: 'CPP104',
	EXTRA_TOKENS: 'CPP105',
} as const;
export type WarningCode = typeof CPP_WARNCODES[keyof typeof CPP_WARNCODES];

const WARN_VALUE_SET = new Set<string>(Object.values(CPP_WARNCODES));

// Friendly names derived from the enum keys: MACRO_REDEFINED -> macro-redefined
const WARN_NAME_MAP: Record<string, WarningCode> = (() => {
	const map: Record<string, WarningCode> = {};
	for (const [enumName, code] of Object.entries(CPP_WARNCODES)) {
		map[enumName.toLowerCase().replace(/_/g, '-')] = code;
	}
	return map;
})();

function isWarningCode(value: string): value is WarningCode {
	return WARN_VALUE_SET.has(value);
}

export function normalizeWarningCode(raw: string | null | undefined): WarningCode | null {
	if (!raw) return null;
	const trimmed = raw.trim();
	if (!trimmed) return null;
	const upper = trimmed.toUpperCase();
	if (isWarningCode(upper)) return upper;
	const canon = trimmed.toLowerCase().replace(/[-_]/g, '-');
	return WARN_NAME_MAP[canon] ?? null;
}

export interface SourceLocation { file: string; line: number; column: number }

export interface PreprocessWarning extends SourceLocation {
	code: WarningCode;
	message: string;
}

export function formatLocation(loc: SourceLocation): string {
	return `${loc.file}:${loc.line}:${loc.column}`;
}

/**
 * Base class for every fatal preprocessing failure. The message carries the
 * `file:line:col:` prefix; `detail` keeps the bare text.
 */
export class PreprocessError extends Error {
	readonly code: ErrorCode;
	readonly detail: string;
	readonly file: string;
	readonly line: number;
	readonly column: number;

	constructor(code: ErrorCode, detail: string, loc: SourceLocation, options?: { cause?: unknown }) {
		super(`${formatLocation(loc)}: ${detail}`, options);
		this.name = new.target.name;
		this.code = code;
		this.detail = detail;
		this.file = loc.file;
		this.line = loc.line;
		this.column = loc.column;
	}
}

export class LexicalError extends PreprocessError {
	constructor(detail: string, loc: SourceLocation) { super(CPP_ERRORCODES.LEXICAL, detail, loc); }
}

export class DirectiveError extends PreprocessError {
	constructor(detail: string, loc: SourceLocation) { super(CPP_ERRORCODES.DIRECTIVE, detail, loc); }
}

export class RecursionLimitError extends PreprocessError {
	constructor(detail: string, loc: SourceLocation) { super(CPP_ERRORCODES.RECURSION_LIMIT, detail, loc); }
}

export class EvaluationError extends PreprocessError {
	constructor(detail: string, loc: SourceLocation) { super(CPP_ERRORCODES.EVALUATION, detail, loc); }
}

export class PasteError extends PreprocessError {
	constructor(detail: string, loc: SourceLocation) { super(CPP_ERRORCODES.PASTE, detail, loc); }
}

export class LoaderError extends PreprocessError {
	constructor(detail: string, loc: SourceLocation, cause?: unknown) {
		super(CPP_ERRORCODES.LOADER, detail, loc, cause === undefined ? undefined : { cause });
	}
}

export class UserError extends PreprocessError {
	constructor(detail: string, loc: SourceLocation) { super(CPP_ERRORCODES.USER, detail, loc); }
}

// Location of a token as reported to users; tokens already carry #line positions.
export function locOf(t: Token): SourceLocation {
	return { file: t.file, line: t.loc.line, column: t.loc.col };
}
