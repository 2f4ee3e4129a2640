import {
	CPP_WARNCODES,
	DirectiveError,
	PreprocessError,
	type PreprocessWarning,
	type SourceLocation,
	type WarningCode,
} from '../analysisTypes';
import { loadPredefined, predefinedMacros, validateConfig } from '../defs';
import { formatWarning, isWarningDisabled, parseDisabledWarningList } from '../diagSettings';
import { DYNAMIC_BUILTINS, dynamicMacro } from './builtins';
import { type PreprocessorConfig, resolveConfig, type ResolvedConfig } from './config';
import { debug } from './debug';
import { defineValueText, describeMacro, type Macro, macroFromText, MacroTable } from './macro';
import { type CondFrame, DirectiveProcessor, type SessionState } from './preproc';

/**
 * A preprocessing session. Macros and open conditionals carry over from one
 * `process` call to the next.
 */
export class PreprocessorDriver {
	private readonly config: ResolvedConfig;
	private readonly table = new MacroTable();
	private readonly conditionals: CondFrame[] = [];
	private readonly onceFiles = new Set<string>();
	private readonly disabled: ReadonlySet<WarningCode>;
	private file: string;
	private limit: number;
	private error: PreprocessError | null = null;
	private disposed = false;

	constructor(config: PreprocessorConfig = {}) {
		validateConfig(config);
		this.config = resolveConfig(config);
		this.file = this.config.file;
		this.limit = this.config.recursionLimit;
		this.disabled = parseDisabledWarningList(this.config.disabledWarnings);
		this.seed();
	}

	private seed() {
		const { target, compiler, defines } = this.config;
		for (const [name, body] of predefinedMacros(target, compiler, loadPredefined())) {
			this.table.define(macroFromText(name, body, undefined, '<built-in>', true));
		}
		for (const name of DYNAMIC_BUILTINS) this.table.define(dynamicMacro(name));
		for (const [name, value] of Object.entries(defines)) {
			this.defineUser(macroFromText(name, defineValueText(value), undefined, '<command line>'));
		}
		debug('driver', 'seeded', this.table.size, 'macros for', target, compiler);
	}

	private ensureLive() {
		if (this.disposed) throw new Error('preprocessor driver has been disposed');
	}

	private warn(code: WarningCode, message: string, loc: SourceLocation) {
		const w: PreprocessWarning = { code, message, file: loc.file, line: loc.line, column: loc.column };
		if (isWarningDisabled(w, this.disabled)) return;
		debug('driver', 'warning', code, message);
		this.config.onWarning?.(formatWarning(w), w);
	}

	private get session(): SessionState {
		return { macros: this.table, conditionals: this.conditionals, onceFiles: this.onceFiles };
	}

	/** Preprocess `input`; throws the PreprocessError subclass that stopped it. */
	process(input: string, file: string = this.file): string {
		this.ensureLive();
		const proc = new DirectiveProcessor(this.session, {
			compiler: this.config.compiler,
			lineMode: this.config.lineMode,
			includePaths: this.config.includePaths,
			includeLoader: this.config.includeLoader,
			recursionLimit: () => this.limit,
			now: this.config.now,
			warn: (code, message, loc) => this.warn(code, message, loc),
		});
		try {
			return proc.run(input, file);
		} catch (e) {
			if (e instanceof PreprocessError) {
				this.error = e;
				debug('driver', 'failed:', e.message);
			}
			throw e;
		}
	}

	// Like process(), but returns null on a preprocessing error
	tryProcess(input: string, file?: string): string | null {
		try {
			return this.process(input, file);
		} catch (e) {
			if (e instanceof PreprocessError) return null;
			throw e;
		}
	}

	/** Throws when a conditional opened by earlier input is still open. */
	checkComplete(): void {
		this.ensureLive();
		const open = this.conditionals[this.conditionals.length - 1];
		if (!open) return;
		const e = new DirectiveError('unterminated conditional directive', open.at);
		this.error = e;
		throw e;
	}

	// Most recent failure; kept until the next failing call
	get lastError(): PreprocessError | null { return this.error; }

	lastErrorMessage(): string | null {
		return this.error ? this.error.message : null;
	}

	define(name: string, body = '', params?: readonly string[]): void {
		this.ensureLive();
		this.defineUser(macroFromText(name, body, params, '<command line>'));
	}

	// Configured and API definitions; predefined macros stay until #undef
	private defineUser(m: Macro) {
		const at = { file: '<command line>', line: 1, column: 1 };
		const result = this.table.define(m);
		if (result === 'replaced') this.warn(CPP_WARNCODES.MACRO_REDEFINED, `"${m.name}" redefined`, at);
		if (result === 'rejected') this.warn(CPP_WARNCODES.PREDEFINED_REDEFINED, `"${m.name}" is predefined; #undef it before redefining`, at);
	}

	undef(name: string): boolean {
		this.ensureLive();
		return this.table.undef(name);
	}

	isDefined(name: string): boolean {
		this.ensureLive();
		return this.table.has(name);
	}

	getMacro(name: string): Macro | undefined {
		this.ensureLive();
		return this.table.get(name);
	}

	// name -> replacement text; function-like macros as `(a, b) body`
	get macros(): Record<string, string> {
		this.ensureLive();
		const out: Record<string, string> = {};
		for (const m of this.table.values()) out[m.name] = describeMacro(m);
		return out;
	}

	get conditionalDepth(): number { return this.conditionals.length; }

	get currentFile(): string { return this.file; }

	setFile(file: string): void {
		this.ensureLive();
		this.file = file;
	}

	get recursionLimit(): number { return this.limit; }

	setRecursionLimit(limit: number): void {
		this.ensureLive();
		if (!Number.isInteger(limit) || limit < 1) throw new Error(`invalid recursion limit: ${limit}`);
		this.limit = limit;
	}

	dispose(): void {
		if (this.disposed) return;
		this.table.clear();
		this.conditionals.length = 0;
		this.onceFiles.clear();
		this.error = null;
		this.disposed = true;
		debug('driver', 'disposed');
	}
}

/** One-shot preprocessing with a fresh driver; unterminated conditionals are an error. */
export function preprocess(input: string, config: PreprocessorConfig = {}): string {
	const driver = new PreprocessorDriver(config);
	try {
		const out = driver.process(input);
		driver.checkComplete();
		return out;
	} finally {
		driver.dispose();
	}
}
