import { DirectiveError, locOf, type SourceLocation } from '../analysisTypes';
import { derive, isPunct, isSpace, trimSpace, type Token } from './tokens';
import { tokenize } from './tokenizer';

// Extra object-like macros supplied by configuration
export type MacroDefines = Record<string, string | number | boolean>;

export type MacroKind = 'object' | 'function';
export type DynamicBuiltin = '__LINE__' | '__FILE__' | '__DATE__' | '__TIME__';

export interface Macro {
	readonly name: string;
	readonly kind: MacroKind;
	// variadic parameter is last: `__VA_ARGS__` for `...`, its own name for `rest...`
	readonly params: readonly string[];
	readonly variadic: boolean;
	readonly body: readonly Token[];
	readonly site: { file: string; line: number };
	readonly builtin: boolean;
	readonly dynamic?: DynamicBuiltin;
}

export type DefineResult = 'new' | 'same' | 'replaced' | 'rejected';

export class MacroTable {
	private readonly map = new Map<string, Macro>();
	// #pragma push_macro / pop_macro; undefined marks "was not defined"
	private readonly saved = new Map<string, (Macro | undefined)[]>();

	get size(): number { return this.map.size; }
	get(name: string): Macro | undefined { return this.map.get(name); }
	has(name: string): boolean { return this.map.has(name); }
	values(): IterableIterator<Macro> { return this.map.values(); }

	/**
	 * Store `m`. Identical redefinitions are ignored; a predefined macro is
	 * kept unless it was removed with #undef first.
	 */
	define(m: Macro): DefineResult {
		const prev = this.map.get(m.name);
		if (!prev) { this.map.set(m.name, m); return 'new'; }
		if (sameDefinition(prev, m)) return 'same';
		if (prev.builtin && !m.builtin) return 'rejected';
		this.map.set(m.name, m);
		return 'replaced';
	}

	undef(name: string): boolean { return this.map.delete(name); }

	push(name: string) {
		const stack = this.saved.get(name) ?? [];
		stack.push(this.map.get(name));
		this.saved.set(name, stack);
	}

	// false when nothing was pushed for `name`
	pop(name: string): boolean {
		const stack = this.saved.get(name);
		if (!stack || stack.length === 0) return false;
		const m = stack.pop();
		if (stack.length === 0) this.saved.delete(name);
		if (m) this.map.set(name, m);
		else this.map.delete(name);
		return true;
	}

	clear() {
		this.map.clear();
		this.saved.clear();
	}
}

// Spelling used for redefinition checks and for listing macros: ws runs are one space
export function bodyText(body: readonly Token[]): string {
	return body.map(t => (isSpace(t) ? ' ' : t.value)).join('');
}

export function sameDefinition(a: Macro, b: Macro): boolean {
	return a.kind === b.kind
		&& a.variadic === b.variadic
		&& a.params.length === b.params.length
		&& a.params.every((p, i) => p === b.params[i])
		&& bodyText(a.body) === bodyText(b.body);
}

// `(a, b) body` for function-like macros, the bare body otherwise
export function describeMacro(m: Macro): string {
	const body = bodyText(m.body);
	if (m.kind === 'object') return body;
	const params = m.params.map((p, i) => {
		if (!m.variadic || i !== m.params.length - 1) return p;
		return p === '__VA_ARGS__' ? '...' : `${p}...`;
	});
	const head = `(${params.join(', ')})`;
	return body ? `${head} ${body}` : head;
}

function normalizeBody(toks: readonly Token[]): Token[] {
	const out: Token[] = [];
	for (const t of trimSpace(toks)) {
		if (isSpace(t)) {
			const last = out[out.length - 1];
			if (last && last.kind !== 'ws') out.push(derive(t, 'ws', ' '));
			continue;
		}
		out.push(t);
	}
	return out;
}

function nextSolid(toks: readonly Token[], i: number): number {
	while (i < toks.length && isSpace(toks[i])) i++;
	return i;
}

/**
 * Parse the operands of `#define` (everything after the directive name, up
 * to but excluding the newline). `at` locates the directive for errors about
 * a missing name.
 */
export function parseDefine(toks: readonly Token[], at: SourceLocation, builtin = false): Macro {
	let i = nextSolid(toks, 0);
	const nameTok = toks[i];
	if (!nameTok) throw new DirectiveError('macro name missing', at);
	if (nameTok.kind !== 'id') throw new DirectiveError('macro names must be identifiers', locOf(nameTok));
	if (nameTok.value === 'defined') throw new DirectiveError('"defined" cannot be used as a macro name', locOf(nameTok));
	const name = nameTok.value;
	i++;

	const site = { file: nameTok.file, line: nameTok.loc.line };
	// function-like only when '(' touches the name
	if (!isPunct(toks[i], '(')) {
		return { name, kind: 'object', params: [], variadic: false, body: checkBody(normalizeBody(toks.slice(i)), [], false, false), site, builtin };
	}

	const open = toks[i];
	i++;
	const params: string[] = [];
	let variadic = false;
	let closed = false;
	for (; ;) {
		i = nextSolid(toks, i);
		const t = toks[i];
		if (!t) break;
		if (isPunct(t, ')') && params.length === 0 && !variadic) { i++; closed = true; break; }
		if (isPunct(t, '...')) {
			variadic = true;
			params.push('__VA_ARGS__');
			i = nextSolid(toks, i + 1);
			if (!isPunct(toks[i], ')')) throw new DirectiveError('"..." must be the last macro parameter', locOf(toks[i] ?? t));
			i++;
			closed = true;
			break;
		}
		if (t.kind !== 'id') throw new DirectiveError(`invalid token "${t.value}" in macro parameter list`, locOf(t));
		if (t.value === '__VA_ARGS__') throw new DirectiveError('__VA_ARGS__ can only appear in the expansion of a variadic macro', locOf(t));
		if (params.includes(t.value)) throw new DirectiveError(`duplicate macro parameter "${t.value}"`, locOf(t));
		params.push(t.value);
		i = nextSolid(toks, i + 1);
		if (isPunct(toks[i], '...')) {
			// GNU named variadic parameter
			variadic = true;
			i = nextSolid(toks, i + 1);
			if (!isPunct(toks[i], ')')) throw new DirectiveError('"..." must be the last macro parameter', locOf(toks[i] ?? t));
			i++;
			closed = true;
			break;
		}
		const sep = toks[i];
		if (isPunct(sep, ')')) { i++; closed = true; break; }
		if (isPunct(sep, ',')) { i++; continue; }
		if (!sep) break;
		throw new DirectiveError('expected "," or ")" in macro parameter list', locOf(sep));
	}
	if (!closed) throw new DirectiveError('missing ")" in macro parameter list', locOf(open));

	const body = checkBody(normalizeBody(toks.slice(i)), params, true, variadic);
	return { name, kind: 'function', params, variadic, body, site, builtin };
}

function checkBody(body: Token[], params: readonly string[], functionLike: boolean, variadic: boolean): Token[] {
	if (body.length === 0) return body;
	if (isPunct(body[0], '##')) throw new DirectiveError('"##" cannot appear at either end of a macro expansion', locOf(body[0]));
	const last = body[body.length - 1];
	if (isPunct(last, '##')) throw new DirectiveError('"##" cannot appear at either end of a macro expansion', locOf(last));
	if (!functionLike) return body;
	for (let k = 0; k < body.length; k++) {
		if (!isPunct(body[k], '#')) continue;
		const j = nextSolid(body, k + 1);
		const operand = body[j];
		const ok = operand && operand.kind === 'id' && (params.includes(operand.value) || (variadic && operand.value === '__VA_OPT__'));
		if (!ok) throw new DirectiveError('"#" is not followed by a macro parameter', locOf(body[k]));
	}
	return body;
}

/**
 * Build a macro from text, as for `define(name, body, params)` on the driver
 * and for configured or predefined macros.
 */
export function macroFromText(name: string, body: string, params: readonly string[] | undefined, file: string, builtin = false): Macro {
	if (!/^[A-Za-z_$][A-Za-z0-9_$]*$/.test(name)) {
		throw new DirectiveError(`invalid macro name "${name}"`, { file, line: 1, column: 1 });
	}
	const head = params ? `${name}(${params.join(',')})` : name;
	const toks = tokenize(`${head} ${body}`, file).filter(t => t.kind !== 'eof' && t.kind !== 'newline');
	return parseDefine(toks, { file, line: 1, column: 1 }, builtin);
}

// Convert configured defines to macro text: true -> 1, false -> 0
export function defineValueText(v: string | number | boolean): string {
	if (typeof v === 'boolean') return v ? '1' : '0';
	return String(v);
}
