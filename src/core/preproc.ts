import {
	CPP_WARNCODES,
	DirectiveError,
	LexicalError,
	LoaderError,
	locOf,
	PreprocessError,
	RecursionLimitError,
	type SourceLocation,
	UserError,
	type WarningCode,
} from '../analysisTypes';
import type { Compiler, IncludeKind, IncludeLoader, IncludeResult, LineMode } from './config';
import { debug } from './debug';
import { destringize, Expander, type ExpandHost } from './expander';
import { evaluateCondition } from './expr';
import { type MacroTable, parseDefine } from './macro';
import { OutputAssembler } from './output';
import { isPunct, isSpace, trimSpace, type Token } from './tokens';
import { tokenize, Tokenizer } from './tokenizer';

export interface CondFrame {
	kind: 'if' | 'elif' | 'else';
	// this branch's text is emitted
	active: boolean;
	// some branch of the group has been taken
	anyTaken: boolean;
	sawElse: boolean;
	parentActive: boolean;
	at: SourceLocation;
}

// State that outlives a single process() call
export interface SessionState {
	readonly macros: MacroTable;
	readonly conditionals: CondFrame[];
	readonly onceFiles: Set<string>;
}

export interface ProcessorOptions {
	readonly compiler: Compiler;
	readonly lineMode: LineMode;
	readonly includePaths: readonly string[];
	readonly includeLoader?: IncludeLoader;
	recursionLimit(): number;
	now(): Date;
	warn(code: WarningCode, message: string, loc: SourceLocation): void;
}

interface FileFrame {
	id: string;
	// conditionals below this index belong to the includer
	condBase: number;
	// #line: presumed line = physical line + lineDelta
	lineDelta: number;
	presumedFile: string;
}

interface LogicalLine {
	toks: Token[];
	nl: Token | null;
}

const CONDITIONALS = new Set(['if', 'ifdef', 'ifndef', 'elif', 'else', 'endif']);

/**
 * Runs directives over one input text (and the files it includes), feeding
 * active text through the expander into the output.
 */
export class DirectiveProcessor implements ExpandHost {
	private readonly expander: Expander;
	private readonly out: OutputAssembler;
	private readonly files: FileFrame[] = [];
	private buffer: Token[] = [];

	constructor(private readonly session: SessionState, private readonly opts: ProcessorOptions) {
		this.expander = new Expander(this);
		this.out = new OutputAssembler(opts.lineMode);
	}

	// ExpandHost
	get macros(): MacroTable { return this.session.macros; }
	get compiler(): Compiler { return this.opts.compiler; }
	recursionLimit(): number { return this.opts.recursionLimit(); }
	now(): Date { return this.opts.now(); }
	pragma(text: string, at: Token) {
		const toks = tokenize(text, at.file).filter(t => t.kind !== 'eof' && t.kind !== 'newline');
		this.handlePragma(toks.map(t => ({ ...t, loc: at.loc, file: at.file })), at);
	}

	run(text: string, file: string): string {
		this.processFile(text, file, 0);
		return this.out.toString();
	}

	private get conds(): CondFrame[] { return this.session.conditionals; }

	private get frame(): FileFrame {
		return this.files[this.files.length - 1];
	}

	private isActive(): boolean {
		const top = this.conds[this.conds.length - 1];
		return top ? top.active : true;
	}

	private processFile(text: string, id: string, condBase: number) {
		this.files.push({ id, condBase, lineDelta: 0, presumedFile: id });
		debug('include', 'enter', id, 'depth', this.files.length - 1);
		try {
			const tz = new Tokenizer(text, id);
			for (; ;) {
				const line = this.readLine(tz);
				if (!line) break;
				this.handleLine(line);
			}
			this.flush();
			if (this.files.length > 1 && this.conds.length > condBase) {
				throw new DirectiveError('unterminated conditional directive', this.conds[this.conds.length - 1].at);
			}
		} finally {
			this.files.pop();
			debug('include', 'leave', id);
		}
	}

	private readLine(tz: Tokenizer): LogicalLine | null {
		const toks: Token[] = [];
		for (; ;) {
			const t = tz.next();
			if (t.kind === 'eof') return toks.length ? { toks: this.presume(toks), nl: null } : null;
			if (t.kind === 'newline') return { toks: this.presume(toks), nl: this.presume([t])[0] };
			toks.push(t);
		}
	}

	// Apply #line to freshly lexed tokens
	private presume(toks: Token[]): Token[] {
		const f = this.frame;
		if (f.lineDelta === 0 && f.presumedFile === f.id) return toks;
		return toks.map(t => ({ ...t, file: f.presumedFile, loc: { line: t.loc.line + f.lineDelta, col: t.loc.col } }));
	}

	private handleLine(line: LogicalLine) {
		const first = line.toks.find(t => !isSpace(t));
		if (first && isPunct(first, '#')) {
			this.flush();
			this.handleDirective(line.toks.slice(line.toks.indexOf(first) + 1), first);
			this.out.skippedLines(physicalLines(line));
			return;
		}
		if (!this.isActive()) {
			this.out.skippedLines(physicalLines(line));
			return;
		}
		checkTerminated(line.toks);
		this.buffer.push(...line.toks);
		if (line.nl) this.buffer.push(line.nl);
	}

	private flush() {
		if (!this.buffer.length) return;
		const toks = this.buffer;
		this.buffer = [];
		this.out.emit(this.expander.expand(toks, { pragma: true }));
	}

	private handleDirective(rest: Token[], hash: Token) {
		const i = rest.findIndex(t => !isSpace(t));
		if (i < 0) return; // null directive
		const nameTok = rest[i];
		const operands = rest.slice(i + 1);

		if (nameTok.kind === 'id' && CONDITIONALS.has(nameTok.value)) {
			this.handleConditional(nameTok, operands);
			return;
		}
		if (!this.isActive()) return;

		if (nameTok.kind === 'number') {
			// GNU linemarker: # 33 "file.c" 1
			checkTerminated(rest);
			this.handleLineDirective(rest.slice(i), hash, true);
			return;
		}
		if (nameTok.kind !== 'id') throw new DirectiveError(`invalid preprocessing directive #${nameTok.value}`, locOf(nameTok));

		const name = nameTok.value;
		if (name !== 'error' && name !== 'warning') checkTerminated(operands);
		switch (name) {
			case 'define': {
				const m = parseDefine(operands, locOf(nameTok));
				const result = this.macros.define(m);
				debug('driver', '#define', m.name, result);
				if (result === 'replaced') this.opts.warn(CPP_WARNCODES.MACRO_REDEFINED, `"${m.name}" redefined`, locOf(nameTok));
				if (result === 'rejected') {
					this.opts.warn(CPP_WARNCODES.PREDEFINED_REDEFINED, `"${m.name}" is predefined; #undef it before redefining`, locOf(nameTok));
				}
				return;
			}
			case 'undef': {
				const target = this.macroNameOperand(operands, nameTok);
				this.macros.undef(target.value);
				this.extraTokens(operands, target, 'undef');
				return;
			}
			case 'include':
				this.handleInclude(operands, nameTok);
				return;
			case 'error':
				throw new UserError(`#error ${lineText(operands)}`.trimEnd(), locOf(nameTok));
			case 'warning':
				if (this.opts.compiler !== 'msvc') {
					this.opts.warn(CPP_WARNCODES.USER_WARNING, `#warning ${lineText(operands)}`.trimEnd(), locOf(nameTok));
				}
				return;
			case 'pragma':
				this.handlePragma(operands, nameTok);
				return;
			case 'line':
				this.handleLineDirective(operands, hash, false);
				return;
			case 'ident':
			case 'sccs':
				return;
			default:
				throw new DirectiveError(`invalid preprocessing directive #${name}`, locOf(nameTok));
		}
	}

	private macroNameOperand(operands: Token[], dir: Token): Token {
		const t = operands.find(x => !isSpace(x));
		if (!t) throw new DirectiveError(`no macro name given in #${dir.value} directive`, locOf(dir));
		if (t.kind !== 'id') throw new DirectiveError('macro names must be identifiers', locOf(t));
		if (t.value === 'defined') throw new DirectiveError('"defined" cannot be used as a macro name', locOf(t));
		return t;
	}

	private extraTokens(operands: Token[], after: Token | null, directive: string) {
		const start = after ? operands.indexOf(after) + 1 : 0;
		const extra = operands.slice(start).find(t => !isSpace(t));
		if (extra) this.opts.warn(CPP_WARNCODES.EXTRA_TOKENS, `extra tokens at end of #${directive} directive`, locOf(extra));
	}

	private handleConditional(dir: Token, operands: Token[]) {
		const conds = this.conds;
		const base = this.frame.condBase;
		const top = conds.length > base ? conds[conds.length - 1] : undefined;
		switch (dir.value) {
			case 'if':
			case 'ifdef':
			case 'ifndef': {
				const parentActive = this.isActive();
				let taken = false;
				if (parentActive) {
					if (dir.value === 'if') {
						taken = this.evaluate(operands, dir) !== 0n;
					} else {
						const name = this.macroNameOperand(operands, dir);
						taken = this.macros.has(name.value) === (dir.value === 'ifdef');
						this.extraTokens(operands, name, dir.value);
					}
				}
				conds.push({ kind: 'if', active: parentActive && taken, anyTaken: taken, sawElse: false, parentActive, at: locOf(dir) });
				debug('cond', `#${dir.value}`, 'taken', taken, 'depth', conds.length);
				return;
			}
			case 'elif': {
				if (!top) throw new DirectiveError('#elif without #if', locOf(dir));
				if (top.sawElse) throw new DirectiveError('#elif after #else', locOf(dir));
				top.kind = 'elif';
				if (top.parentActive && !top.anyTaken) {
					const taken = this.evaluate(operands, dir) !== 0n;
					top.active = taken;
					top.anyTaken = taken;
				} else {
					top.active = false;
				}
				debug('cond', '#elif', 'active', top.active);
				return;
			}
			case 'else': {
				if (!top) throw new DirectiveError('#else without #if', locOf(dir));
				if (top.sawElse) throw new DirectiveError('#else after #else', locOf(dir));
				top.kind = 'else';
				top.sawElse = true;
				top.active = top.parentActive && !top.anyTaken;
				top.anyTaken = true;
				if (top.parentActive) this.extraTokens(operands, null, 'else');
				debug('cond', '#else', 'active', top.active);
				return;
			}
			case 'endif': {
				if (!top) throw new DirectiveError('#endif without #if', locOf(dir));
				conds.pop();
				if (top.parentActive) this.extraTokens(operands, null, 'endif');
				debug('cond', '#endif', 'depth', conds.length);
				return;
			}
		}
	}

	private evaluate(operands: Token[], dir: Token): bigint {
		checkTerminated(operands);
		const expanded = this.expander.expand(operands, { defined: true });
		return evaluateCondition(expanded, locOf(dir));
	}

	private handleInclude(operands: Token[], dir: Token) {
		let spec = parseHeaderName(operands);
		if (!spec) {
			// computed include: the operand is macro-expanded first
			spec = parseHeaderName(this.expander.expand(operands));
		}
		if (!spec) throw new DirectiveError('#include expects "FILENAME" or <FILENAME>', locOf(dir));
		if (!spec.name) throw new DirectiveError('empty filename in #include', locOf(dir));
		if (spec.rest.some(t => !isSpace(t))) {
			this.opts.warn(CPP_WARNCODES.EXTRA_TOKENS, 'extra tokens at end of #include directive', locOf(spec.rest.find(t => !isSpace(t)) ?? dir));
		}
		this.includeFile(spec.name, spec.kind, dir);
	}

	private includeFile(name: string, kind: IncludeKind, dir: Token) {
		const limit = this.recursionLimit();
		if (this.files.length > limit) {
			throw new RecursionLimitError(`#include nested depth ${this.files.length} exceeds the recursion limit of ${limit}`, locOf(dir));
		}
		const loader = this.opts.includeLoader;
		if (!loader) throw new LoaderError(`no include loader configured for "${name}"`, locOf(dir));
		const ctx = {
			includeStack: this.files.map(f => f.id),
			includeDirs: [...this.opts.includePaths],
			from: this.frame.id,
			line: dir.loc.line,
		};
		let loaded: IncludeResult;
		try {
			loaded = loader(name, kind, ctx);
		} catch (e) {
			if (e instanceof PreprocessError) throw e;
			const reason = e instanceof Error ? e.message : String(e);
			throw new LoaderError(`cannot load "${name}": ${reason}`, locOf(dir), e);
		}
		if (loaded === null) throw new LoaderError(`"${name}" file not found`, locOf(dir));
		const file = typeof loaded === 'string' ? { id: name, text: loaded } : loaded;
		if (this.session.onceFiles.has(file.id)) {
			debug('include', 'skip (#pragma once)', file.id);
			return;
		}
		this.processFile(file.text, file.id, this.conds.length);
		this.out.endLine();
	}

	private handlePragma(operands: Token[], at: Token) {
		const toks = operands.filter(t => !isSpace(t));
		const head = toks[0];
		if (!head) return;
		// ("text") or "text"; adjacent literals are joined
		const stringOperand = (): string | null => {
			const paren = isPunct(toks[1], '(');
			const args = toks.slice(paren ? 2 : 1);
			if (paren) {
				if (!isPunct(args[args.length - 1], ')')) return null;
				args.pop();
			}
			if (!args.length || args.some(t => t.kind !== 'string')) return null;
			return args.map(t => destringize(t.value)).join('');
		};
		switch (head.kind === 'id' ? head.value : '') {
			case 'once':
				debug('include', '#pragma once', this.frame.id);
				this.session.onceFiles.add(this.frame.id);
				return;
			case 'push_macro':
			case 'pop_macro': {
				const name = stringOperand();
				if (name === null) {
					this.opts.warn(CPP_WARNCODES.UNKNOWN_PRAGMA, `invalid #pragma ${head.value} directive`, locOf(head));
					return;
				}
				if (head.value === 'push_macro') this.macros.push(name);
				else this.macros.pop(name);
				return;
			}
			case 'message': {
				const text = stringOperand();
				if (text === null) {
					this.opts.warn(CPP_WARNCODES.UNKNOWN_PRAGMA, 'invalid #pragma message directive', locOf(head));
					return;
				}
				this.opts.warn(CPP_WARNCODES.PRAGMA_MESSAGE, text, locOf(at));
				return;
			}
			case 'STDC':
				return;
			default:
				this.opts.warn(CPP_WARNCODES.UNKNOWN_PRAGMA, `ignoring #pragma ${lineText(operands)}`, locOf(head));
		}
	}

	private handleLineDirective(operands: Token[], hash: Token, linemarker: boolean) {
		const expanded = linemarker ? operands : this.expander.expand(operands);
		const toks = expanded.filter(t => !isSpace(t));
		const num = toks[0];
		const directive = linemarker ? '#' : '#line';
		if (!num) throw new DirectiveError('#line directive requires a simple digit sequence', locOf(hash));
		if (num.kind !== 'number' || !/^[0-9]+$/.test(num.value)) {
			throw new DirectiveError(`"${num.value}" after ${directive} is not a positive integer`, locOf(num));
		}
		const fileTok = toks[1];
		if (fileTok && (fileTok.kind !== 'string' || !fileTok.value.startsWith('"'))) {
			throw new DirectiveError(`invalid filename "${fileTok.value}"`, locOf(fileTok));
		}
		// linemarkers carry flags after the file name
		if (!linemarker && toks.length > 2) {
			this.opts.warn(CPP_WARNCODES.EXTRA_TOKENS, 'extra tokens at end of #line directive', locOf(toks[2]));
		}
		const f = this.frame;
		// the line after the directive gets number N; hash.loc.line is already presumed
		const physicalNext = hash.loc.line - f.lineDelta + 1;
		f.lineDelta = Number(num.value) - physicalNext;
		if (fileTok) f.presumedFile = destringize(fileTok.value);
		debug('driver', '#line', num.value, f.presumedFile);
	}
}

function physicalLines(line: LogicalLine): number {
	if (!line.nl) return 0;
	const first = line.toks[0] ?? line.nl;
	return line.nl.loc.line - first.loc.line + 1;
}

function checkTerminated(toks: readonly Token[]) {
	for (const t of toks) {
		if (t.unterminated) {
			throw new LexicalError(`missing terminating ${t.kind === 'string' ? '"' : '\''} character`, locOf(t));
		}
	}
}

// Directive operands as written, whitespace runs as one space
function lineText(toks: readonly Token[]): string {
	return trimSpace(toks).map(t => (isSpace(t) ? ' ' : t.value)).join('');
}

interface HeaderName { name: string; kind: IncludeKind; rest: Token[] }

export function parseHeaderName(operands: readonly Token[]): HeaderName | null {
	const i = operands.findIndex(t => !isSpace(t));
	if (i < 0) return null;
	const first = operands[i];
	if (first.kind === 'string' && first.value.startsWith('"')) {
		return { name: first.value.slice(1, -1), kind: 'local', rest: operands.slice(i + 1) };
	}
	if (isPunct(first, '<')) {
		let name = '';
		for (let j = i + 1; j < operands.length; j++) {
			const t = operands[j];
			if (isPunct(t, '>')) return { name, kind: 'system', rest: operands.slice(j + 1) };
			name += t.value;
		}
		throw new DirectiveError('missing terminating > character', locOf(first));
	}
	return null;
}
