export {
	CPP_ERRORCODES,
	CPP_WARNCODES,
	DirectiveError,
	EvaluationError,
	LexicalError,
	LoaderError,
	PasteError,
	PreprocessError,
	RecursionLimitError,
	UserError,
	formatLocation,
	normalizeWarningCode,
} from './analysisTypes';
export type { ErrorCode, PreprocessWarning, SourceLocation, WarningCode } from './analysisTypes';
export { PreprocessorDriver, preprocess } from './core/driver';
export { configFor, DEFAULT_CONFIG, DEFAULT_RECURSION_LIMIT } from './core/config';
export type {
	Compiler,
	IncludeContext,
	IncludeKind,
	IncludeLoader,
	IncludeResult,
	LineMode,
	PreprocessorConfig,
	Target,
	WarningHandler,
} from './core/config';
export { buildIncludeResolver, clearIncludeResolverCache, preprocessFile } from './core/pipeline';
export type { IncludeFs, IncludeResolverOptions } from './core/pipeline';
export type { Macro, MacroDefines, MacroKind } from './core/macro';
export { tokenize } from './core/tokenizer';
export type { Token, TokenKind } from './core/tokens';
