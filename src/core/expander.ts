import { DirectiveError, EvaluationError, locOf, PasteError, RecursionLimitError } from '../analysisTypes';
import { builtinExpansion } from './builtins';
import type { Compiler } from './config';
import { debug } from './debug';
import type { Macro, MacroTable } from './macro';
import { derive, HideSet, isPunct, isSpace, trimSpace, type Token, TokenStream } from './tokens';
import { lexSingle } from './tokenizer';

export interface ExpandHost {
	readonly macros: MacroTable;
	readonly compiler: Compiler;
	recursionLimit(): number;
	now(): Date;
	// _Pragma("...") found in text
	pragma(text: string, at: Token): void;
}

export interface ExpandOptions {
	// resolve `defined X` / `defined(X)` to 1 or 0 (#if / #elif operands)
	defined?: boolean;
	// handle the _Pragma operator (top-level text only)
	pragma?: boolean;
}

/**
 * Names of macros whose arguments are currently being expanded. Argument
 * expansion nests when an argument itself invokes a macro, so the stack is
 * bounded by the recursion limit.
 */
export class ExpansionContext {
	private readonly stack: string[] = [];

	constructor(private readonly limit: () => number) {}

	get depth(): number { return this.stack.length; }
	get active(): readonly string[] { return this.stack; }

	enter(name: string, at: Token) {
		const limit = this.limit();
		if (this.stack.length >= limit) {
			throw new RecursionLimitError(`macro "${name}" exceeds the recursion limit of ${limit}`, locOf(at));
		}
		this.stack.push(name);
	}

	leave() { this.stack.pop(); }
}

interface CollectedArgs {
	args: Token[][];
	close: Token;
	newlines: Token[];
}

export class Expander {
	readonly context: ExpansionContext;

	constructor(private readonly host: ExpandHost) {
		this.context = new ExpansionContext(() => host.recursionLimit());
	}

	expand(toks: readonly Token[], opts: ExpandOptions = {}): Token[] {
		const out: Token[] = [];
		this.run(new TokenStream(toks), opts, out);
		return out;
	}

	private run(ts: TokenStream, opts: ExpandOptions, out: Token[]) {
		for (; ;) {
			const t = ts.next();
			if (t.kind === 'eof') return;
			if (t.kind !== 'id') { out.push(t); continue; }
			if (opts.defined && t.value === 'defined') { out.push(this.readDefined(ts, t)); continue; }
			if (opts.pragma && t.value === '_Pragma') { this.readPragmaOperator(ts, t); continue; }

			const m = this.host.macros.get(t.value);
			if (!m || t.hide.has(m.name)) { out.push(t); continue; }

			if (m.dynamic) {
				// tokens already carry #line-adjusted positions
				const r = builtinExpansion(m.dynamic, { file: t.file, line: t.loc.line, now: () => this.host.now() });
				out.push(derive(t, r.kind, r.value, t.hide.add(m.name), this.depthFor(m, t)));
				continue;
			}

			if (m.kind === 'object') {
				const depth = this.depthFor(m, t);
				debug('expand', m.name, 'depth', depth);
				const repl = this.substitute(m, t, [], t.hide.add(m.name), depth, opts);
				ts.pushBackAll(repl);
				continue;
			}

			// function-like: only an invocation when '(' follows
			const skipped: Token[] = [];
			let p = ts.next();
			while (isSpace(p)) { skipped.push(p); p = ts.next(); }
			if (!isPunct(p, '(')) {
				ts.pushBack(p);
				ts.pushBackAll(skipped);
				out.push(t);
				continue;
			}
			const depth = this.depthFor(m, t);
			const { args, close, newlines } = this.collectArgs(ts, m, t);
			debug('expand', `${m.name}(${args.length} args)`, 'depth', depth);
			const hs = t.hide.intersect(close.hide).add(m.name);
			const repl = this.substitute(m, t, args, hs, depth, opts);
			ts.pushBackAll([...repl, ...newlines]);
		}
	}

	private depthFor(m: Macro, at: Token): number {
		const depth = at.depth + 1;
		const limit = this.host.recursionLimit();
		if (depth > limit) {
			throw new RecursionLimitError(`macro "${m.name}" exceeds the recursion limit of ${limit}`, locOf(at));
		}
		return depth;
	}

	private collectArgs(ts: TokenStream, m: Macro, nameTok: Token): CollectedArgs {
		const args: Token[][] = [[]];
		const newlines: Token[] = [];
		let level = 0;
		for (; ;) {
			const t = ts.next();
			if (t.kind === 'eof') {
				throw new DirectiveError(`unterminated argument list invoking macro "${m.name}"`, locOf(nameTok));
			}
			const cur = args[args.length - 1];
			if (t.kind === 'newline') {
				newlines.push(t);
				cur.push(derive(t, 'ws', ' '));
				continue;
			}
			if (isPunct(t, '(')) level++;
			else if (isPunct(t, ')')) {
				if (level === 0) return { args: this.checkArity(m, nameTok, args), close: t, newlines };
				level--;
			} else if (isPunct(t, ',') && level === 0 && !(m.variadic && args.length === m.params.length)) {
				args.push([]);
				continue;
			}
			cur.push(t);
		}
	}

	private checkArity(m: Macro, nameTok: Token, raw: Token[][]): Token[][] {
		const args = raw.map(trimSpace);
		const n = m.params.length;
		// F() passes no arguments to a macro without parameters
		if (n === 0 && args.length === 1 && args[0].length === 0) return [];
		if (m.variadic) {
			if (args.length === n - 1) return [...args, []];
			if (args.length >= n) return args;
			throw new DirectiveError(`macro "${m.name}" requires at least ${n - 1} arguments, but only ${args.length} given`, locOf(nameTok));
		}
		if (args.length === n) return args;
		if (args.length < n) {
			throw new DirectiveError(`macro "${m.name}" requires ${n} arguments, but only ${args.length} given`, locOf(nameTok));
		}
		throw new DirectiveError(`macro "${m.name}" passed ${args.length} arguments, but takes just ${n}`, locOf(nameTok));
	}

	/**
	 * Replacement list of `m` with parameters substituted, `#` and `##`
	 * applied and `hs` added to every token.
	 */
	private substitute(m: Macro, nameTok: Token, args: Token[][], hs: HideSet, depth: number, opts: ExpandOptions): Token[] {
		const pastes = new Set<Token>();
		const expanded = new Map<number, Token[]>();
		const expandedArg = (idx: number): Token[] => {
			let cached = expanded.get(idx);
			if (!cached) {
				this.context.enter(m.name, nameTok);
				try {
					cached = this.expand(args[idx], { defined: opts.defined });
				} finally {
					this.context.leave();
				}
				expanded.set(idx, cached);
			}
			return cached;
		};
		const vaIndex = m.variadic ? m.params.length - 1 : -1;
		const gnuComma = this.host.compiler !== 'msvc';

		const body = m.body;
		const out = this.substituteRange(m, nameTok, body, 0, body.length, args, expandedArg, pastes, vaIndex, gnuComma);
		const pasted = this.applyPastes(out, pastes, nameTok);

		const result: Token[] = [];
		for (const t of pasted) {
			if (t.kind === 'placemarker') continue;
			// produced tokens are reported at the invocation
			result.push(derive(nameTok, t.kind, t.value, t.hide.union(hs), Math.max(t.depth, depth)));
		}
		return result;
	}

	private substituteRange(
		m: Macro,
		nameTok: Token,
		body: readonly Token[],
		from: number,
		to: number,
		args: Token[][],
		expandedArg: (idx: number) => Token[],
		pastes: Set<Token>,
		vaIndex: number,
		gnuComma: boolean,
	): Token[] {
		const out: Token[] = [];
		const paramIndex = (t: Token | undefined) => (t && t.kind === 'id' ? m.params.indexOf(t.value) : -1);
		const solidAt = (i: number, dir: 1 | -1): number => {
			let j = i + dir;
			while (j >= from && j < to && isSpace(body[j])) j += dir;
			return j;
		};
		const vaEmpty = () => vaIndex >= 0 && args[vaIndex].length === 0;

		for (let i = from; i < to; i++) {
			const t = body[i];

			if (m.kind === 'function' && isPunct(t, '#')) {
				const j = solidAt(i, 1);
				const op = body[j];
				if (op && op.kind === 'id' && op.value === '__VA_OPT__' && vaIndex >= 0) {
					const range = this.vaOptRange(body, j, to, nameTok);
					const inner = vaEmpty() ? [] : this.substituteRange(m, nameTok, body, range.open + 1, range.close, args, expandedArg, pastes, vaIndex, gnuComma);
					out.push(derive(t, 'string', stringify(this.applyPastes(inner, pastes, nameTok))));
					i = range.close;
					continue;
				}
				const idx = paramIndex(op);
				if (idx < 0) throw new DirectiveError('"#" is not followed by a macro parameter', locOf(t));
				out.push(derive(t, 'string', stringify(args[idx])));
				i = j;
				continue;
			}

			if (isPunct(t, '##')) {
				const op = derive(t, 'punct', '##');
				pastes.add(op);
				out.push(op);
				continue;
			}

			// GNU: `, ## __VA_ARGS__` drops the comma when the variadic argument is empty
			if (gnuComma && isPunct(t, ',') && vaIndex >= 0) {
				const j = solidAt(i, 1);
				const k = solidAt(j, 1);
				if (isPunct(body[j], '##') && paramIndex(body[k]) === vaIndex) {
					if (!vaEmpty()) out.push(t, ...args[vaIndex]);
					i = k;
					continue;
				}
			}

			if (t.kind === 'id' && t.value === '__VA_OPT__' && vaIndex >= 0) {
				const range = this.vaOptRange(body, i, to, nameTok);
				if (vaEmpty()) out.push(derive(t, 'placemarker', ''));
				else out.push(...this.substituteRange(m, nameTok, body, range.open + 1, range.close, args, expandedArg, pastes, vaIndex, gnuComma));
				i = range.close;
				continue;
			}

			const idx = paramIndex(t);
			if (idx < 0) { out.push(t); continue; }

			const prev = solidAt(i, -1);
			const next = solidAt(i, 1);
			const pasteOperand = isPunct(body[prev], '##') || isPunct(body[next], '##');
			if (pasteOperand) {
				out.push(...(args[idx].length ? args[idx] : [derive(t, 'placemarker', '')]));
				continue;
			}
			if (idx === vaIndex && this.host.compiler === 'msvc' && vaEmpty()) {
				// MSVC drops a comma right before an empty __VA_ARGS__
				while (out.length && isSpace(out[out.length - 1])) out.pop();
				if (isPunct(out[out.length - 1], ',')) out.pop();
				continue;
			}
			out.push(...expandedArg(idx));
		}
		return out;
	}

	// `__VA_OPT__ ( ... )`: index of the '(' and of its matching ')'
	private vaOptRange(body: readonly Token[], at: number, to: number, nameTok: Token): { open: number; close: number } {
		let open = at + 1;
		while (open < to && isSpace(body[open])) open++;
		if (!isPunct(body[open], '(')) throw new DirectiveError('__VA_OPT__ must be followed by "("', locOf(nameTok));
		let level = 0;
		for (let k = open; k < to; k++) {
			if (isPunct(body[k], '(')) level++;
			else if (isPunct(body[k], ')') && --level === 0) return { open, close: k };
		}
		throw new DirectiveError('unterminated __VA_OPT__', locOf(nameTok));
	}

	private applyPastes(toks: Token[], pastes: Set<Token>, nameTok: Token): Token[] {
		if (!toks.some(t => pastes.has(t))) return toks;
		const out: Token[] = [];
		for (let i = 0; i < toks.length; i++) {
			const t = toks[i];
			if (!pastes.has(t)) { out.push(t); continue; }
			while (out.length && isSpace(out[out.length - 1])) out.pop();
			let j = i + 1;
			while (j < toks.length && isSpace(toks[j])) j++;
			const left = out.pop();
			const right = toks[j];
			if (!left || !right) continue;
			out.push(paste(left, right, nameTok));
			i = j;
		}
		return out;
	}

	private readDefined(ts: TokenStream, at: Token): Token {
		let t = ts.next();
		while (isSpace(t)) t = ts.next();
		let paren = false;
		if (isPunct(t, '(')) {
			paren = true;
			t = ts.next();
			while (isSpace(t)) t = ts.next();
		}
		if (t.kind !== 'id') throw new EvaluationError('operator "defined" requires an identifier', locOf(t.kind === 'eof' ? at : t));
		if (paren) {
			let c = ts.next();
			while (isSpace(c)) c = ts.next();
			if (!isPunct(c, ')')) throw new EvaluationError('missing ")" after "defined"', locOf(c.kind === 'eof' ? t : c));
		}
		return derive(at, 'number', this.host.macros.has(t.value) ? '1' : '0');
	}

	private readPragmaOperator(ts: TokenStream, at: Token) {
		const solid = () => { let t = ts.next(); while (isSpace(t)) t = ts.next(); return t; };
		const open = solid();
		const str = isPunct(open, '(') ? solid() : open;
		const close = str.kind === 'string' ? solid() : str;
		if (!isPunct(open, '(') || str.kind !== 'string' || !isPunct(close, ')')) {
			throw new DirectiveError('_Pragma takes a parenthesized string literal', locOf(at));
		}
		this.host.pragma(destringize(str.value), at);
	}
}

function paste(left: Token, right: Token, nameTok: Token): Token {
	if (left.kind === 'placemarker') return right;
	if (right.kind === 'placemarker') return left;
	const single = lexSingle(left.value + right.value);
	if (!single) {
		throw new PasteError(`pasting "${left.value}" and "${right.value}" does not give a valid preprocessing token`, locOf(nameTok));
	}
	return derive(left, single.kind, single.value, left.hide.union(right.hide), Math.max(left.depth, right.depth));
}

// #param: one string literal, whitespace runs collapsed, quotes and backslashes escaped inside literals
export function stringify(toks: readonly Token[]): string {
	let s = '';
	let pendingSpace = false;
	for (const t of toks) {
		if (isSpace(t)) { pendingSpace = s.length > 0; continue; }
		if (t.kind === 'placemarker') continue;
		if (pendingSpace) s += ' ';
		pendingSpace = false;
		s += t.kind === 'string' || t.kind === 'char' ? t.value.replace(/\\/g, '\\\\').replace(/"/g, '\\"') : t.value;
	}
	return `"${s}"`;
}

// Body of a string literal used by _Pragma: prefix and quotes removed, \" and \\ unescaped
export function destringize(lit: string): string {
	const inner = lit.slice(lit.indexOf('"') + 1, -1);
	return inner.replace(/\\(["\\])/g, '$1');
}
