// Core token model shared by the lexer, the directive processor and the expander

export type Span = { start: number; end: number };
export type Loc = { line: number; col: number };

export type TokenKind =
	| 'id'
	| 'number'
	| 'string'
	| 'char'
	| 'punct'
	| 'ws'
	| 'newline'
	| 'placemarker' // stands in for an empty macro argument while pasting
	| 'eof';

/**
 * Immutable set of macro names that must not be re-expanded on the token that
 * carries it. Every operation returns a new set.
 */
export class HideSet {
	static readonly EMPTY = new HideSet(new Set<string>());

	private constructor(private readonly names: ReadonlySet<string>) {}

	static of(...names: string[]): HideSet {
		return names.length ? new HideSet(new Set(names)) : HideSet.EMPTY;
	}

	get size(): number { return this.names.size; }

	has(name: string): boolean { return this.names.has(name); }

	add(name: string): HideSet {
		if (this.names.has(name)) return this;
		const next = new Set(this.names);
		next.add(name);
		return new HideSet(next);
	}

	union(other: HideSet): HideSet {
		if (other.size === 0) return this;
		if (this.size === 0) return other;
		const next = new Set(this.names);
		for (const n of other.names) next.add(n);
		return next.size === this.names.size ? this : new HideSet(next);
	}

	intersect(other: HideSet): HideSet {
		if (this.size === 0 || other.size === 0) return HideSet.EMPTY;
		const next = new Set<string>();
		for (const n of this.names) if (other.names.has(n)) next.add(n);
		return next.size ? new HideSet(next) : HideSet.EMPTY;
	}

	toArray(): string[] { return [...this.names].sort(); }
}

export interface Token {
	readonly kind: TokenKind;
	readonly value: string;
	readonly span: Span;
	readonly loc: Loc;
	readonly file: string;
	readonly hide: HideSet;
	// number of macro expansions this token went through
	readonly depth: number;
	// string/char literal missing its closing quote
	readonly unterminated?: boolean;
}

export function isSpace(t: Token): boolean {
	return t.kind === 'ws' || t.kind === 'newline';
}

export function isPunct(t: Token | undefined, value: string): boolean {
	return !!t && t.kind === 'punct' && t.value === value;
}

// Build a token that replaces `at` in the output (macro results, pasted tokens, builtins)
export function derive(at: Token, kind: TokenKind, value: string, hide: HideSet = at.hide, depth: number = at.depth): Token {
	return { kind, value, span: at.span, loc: at.loc, file: at.file, hide, depth };
}

export function trimSpace(toks: readonly Token[]): Token[] {
	let s = 0;
	let e = toks.length;
	while (s < e && isSpace(toks[s])) s++;
	while (e > s && isSpace(toks[e - 1])) e--;
	return toks.slice(s, e);
}

export class TokenStream {
	// Source can be a static array of tokens or a producer function

	private readonly arr?: readonly Token[];
	private readonly producer?: () => Token;
	private idx = 0;
	private pushback: Token[] = [];
	private stickyEof: Token | null = null;
	private last: Token | null = null;

	constructor(source: readonly Token[] | { producer: () => Token }) {
		if ('producer' in source) {
			this.producer = source.producer;
		} else {
			this.arr = source;
			if (source.length > 0) this.last = source[source.length - 1];
		}
	}

	next(): Token {
		const pb = this.pushback.pop();
		if (pb) return pb;
		if (this.stickyEof) return this.stickyEof;
		let t: Token;
		if (this.arr) {
			if (this.idx < this.arr.length) {
				t = this.arr[this.idx++];
			} else {
				t = this.makeEof();
			}
		} else if (this.producer) {
			t = this.producer();
		} else {
			t = this.makeEof();
		}
		if (t.kind === 'eof') { this.stickyEof = t; return t; }
		this.last = t;
		return t;
	}

	peek(): Token {
		const t = this.next();
		if (t.kind !== 'eof') this.pushBack(t);
		return t;
	}

	pushBack(t: Token) {
		if (t.kind === 'eof') return; // ignore pushing back EOF
		this.pushback.push(t);
	}

	// Push a run back so that it is read again in its original order
	pushBackAll(toks: readonly Token[]) {
		for (let i = toks.length - 1; i >= 0; i--) this.pushBack(toks[i]);
	}

	private makeEof(): Token {
		const at = this.last;
		const end = at ? at.span.end : 0;
		return {
			kind: 'eof',
			value: '',
			span: { start: end, end },
			loc: at ? at.loc : { line: 1, col: 1 },
			file: at ? at.file : '<unknown>',
			hide: HideSet.EMPTY,
			depth: 0,
		};
	}
}
