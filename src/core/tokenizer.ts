import { TextDocument } from 'vscode-languageserver-textdocument';
import { LexicalError } from '../analysisTypes';
import { HideSet, type Loc, type Token, type TokenKind, TokenStream } from './tokens';

// Longest match first within each length class
const PUNCT3 = new Set(['...', '<<=', '>>=']);
const PUNCT2 = new Set([
	'->', '++', '--', '<<', '>>', '<=', '>=', '==', '!=', '&&', '||',
	'*=', '/=', '%=', '+=', '-=', '&=', '^=', '|=', '##',
]);
const LITERAL_PREFIXES = new Set(['L', 'u', 'U', 'u8']);

const isIdStart = (ch: string | undefined) => !!ch && (/[A-Za-z_$]/.test(ch) || ch.charCodeAt(0) >= 0x80);
const isIdContinue = (ch: string | undefined) => !!ch && (/[A-Za-z0-9_$]/.test(ch) || ch.charCodeAt(0) >= 0x80);
const isDigit = (ch: string | undefined) => !!ch && ch >= '0' && ch <= '9';
const isBlank = (ch: string | undefined) => ch === ' ' || ch === '\t' || ch === '\f' || ch === '\v';

/**
 * Remove backslash-newline splices. `map[i]` is the offset in `text` of
 * character `i` of the spliced result (with one extra entry for the end).
 * Blanks between the backslash and the newline are tolerated.
 */
export function splice(text: string): { text: string; map: number[] } {
	if (!text.includes('\\')) {
		const map = new Array<number>(text.length + 1);
		for (let i = 0; i <= text.length; i++) map[i] = i;
		return { text, map };
	}
	let out = '';
	const map: number[] = [];
	let i = 0;
	while (i < text.length) {
		const ch = text[i];
		if (ch === '\\') {
			let k = i + 1;
			while (isBlank(text[k])) k++;
			if (text[k] === '\n') { i = k + 1; continue; }
			if (text[k] === '\r') { i = text[k + 1] === '\n' ? k + 2 : k + 1; continue; }
		}
		out += ch;
		map.push(i);
		i++;
	}
	map.push(text.length);
	return { text: out, map };
}

// Lexes raw source into preprocessing tokens. Comments collapse to a single
// space; newlines are kept so directive lines can be recognised.
export class Tokenizer {
	private i = 0;
	private readonly n: number;
	private readonly text: string;
	private readonly map: number[];
	private readonly doc: TextDocument;
	private ts: TokenStream;

	constructor(text: string, private readonly file = '<unknown>') {
		const spliced = splice(text);
		this.text = spliced.text;
		this.map = spliced.map;
		this.n = this.text.length;
		this.doc = TextDocument.create(file, 'c', 0, text);
		this.ts = new TokenStream({ producer: () => this.scanOne() });
	}

	next(): Token { return this.ts.next(); }
	peek(): Token { return this.ts.peek(); }

	// Start over from the beginning of the text.
	restart() {
		this.i = 0;
		this.ts = new TokenStream({ producer: () => this.scanOne() });
	}

	private scanOne(): Token {
		if (this.i >= this.n) return this.mk('eof', '', this.n, this.n);
		const s = this.i;
		const c = this.text[s];

		// \n, \r\n and a lone \r all end a line, as TextDocument counts them
		if (c === '\n') { this.i++; return this.mk('newline', '\n', s, this.i); }
		if (c === '\r') { this.i += this.text[s + 1] === '\n' ? 2 : 1; return this.mk('newline', '\n', s, this.i); }
		if (isBlank(c)) {
			let j = s + 1;
			while (j < this.n && isBlank(this.text[j])) j++;
			this.i = j;
			return this.mk('ws', this.text.slice(s, j), s, j);
		}

		// comments
		if (c === '/') {
			const d = this.text[s + 1];
			if (d === '/') {
				let j = s + 2;
				while (j < this.n && this.text[j] !== '\n' && this.text[j] !== '\r') j++;
				this.i = j;
				return this.mk('ws', ' ', s, j);
			}
			if (d === '*') {
				const close = this.text.indexOf('*/', s + 2);
				if (close < 0) {
					const at = this.locAt(s);
					throw new LexicalError('unterminated comment', { file: this.file, line: at.line, column: at.col });
				}
				this.i = close + 2;
				return this.mk('ws', ' ', s, this.i);
			}
		}

		if (isIdStart(c)) {
			let j = s + 1;
			while (j < this.n && isIdContinue(this.text[j])) j++;
			const word = this.text.slice(s, j);
			const q = this.text[j];
			if (LITERAL_PREFIXES.has(word) && (q === '"' || q === '\'')) return this.scanLiteral(s, j);
			this.i = j;
			return this.mk('id', word, s, j);
		}

		if (isDigit(c) || (c === '.' && isDigit(this.text[s + 1]))) {
			this.i = scanPpNumber(this.text, s);
			return this.mk('number', this.text.slice(s, this.i), s, this.i);
		}

		if (c === '"' || c === '\'') return this.scanLiteral(s, s);

		for (const [len, set] of [[3, PUNCT3], [2, PUNCT2]] as const) {
			const op = this.text.slice(s, s + len);
			if (set.has(op)) { this.i = s + len; return this.mk('punct', op, s, this.i); }
		}
		// anything else, stray characters included, is a one-character punctuator
		this.i = s + 1;
		return this.mk('punct', c, s, this.i);
	}

	// `start` is where the token begins (prefix included), `q` the opening quote
	private scanLiteral(start: number, q: number): Token {
		const quote = this.text[q];
		let j = q + 1;
		let closed = false;
		while (j < this.n) {
			const ch = this.text[j];
			if (ch === '\n' || ch === '\r') break;
			if (ch === '\\' && j + 1 < this.n && this.text[j + 1] !== '\n' && this.text[j + 1] !== '\r') { j += 2; continue; }
			j++;
			if (ch === quote) { closed = true; break; }
		}
		this.i = j;
		const kind: TokenKind = quote === '"' ? 'string' : 'char';
		const t = this.mk(kind, this.text.slice(start, j), start, j);
		return closed ? t : { ...t, unterminated: true };
	}

	private locAt(splicedOffset: number): Loc {
		const p = this.doc.positionAt(this.map[splicedOffset]);
		return { line: p.line + 1, col: p.character + 1 };
	}

	private mk(kind: TokenKind, value: string, start: number, end: number): Token {
		return {
			kind,
			value,
			span: { start: this.map[start], end: this.map[end] },
			loc: this.locAt(start),
			file: this.file,
			hide: HideSet.EMPTY,
			depth: 0,
		};
	}
}

// pp-number: digit or .digit, then identifier characters, dots, and signed exponents
export function scanPpNumber(text: string, start: number): number {
	let j = start + 1;
	while (j < text.length) {
		const ch = text[j];
		if ((ch === '+' || ch === '-') && /[eEpP]/.test(text[j - 1])) { j++; continue; }
		if (ch === '.' || isIdContinue(ch)) { j++; continue; }
		break;
	}
	return j;
}

export function tokenize(text: string, file?: string): Token[] {
	const tz = new Tokenizer(text, file);
	const out: Token[] = [];
	for (; ;) { const t = tz.next(); out.push(t); if (t.kind === 'eof') break; }
	return out;
}

const NEVER_MERGES = new Set([...'()[]{};,?~']);

/**
 * True when printing `a` directly followed by `b` would lex differently,
 * e.g. `x` `y`, `-` `-`, `1` `.`, `/` `*`.
 */
export function needsSpaceBetween(a: string, b: string): boolean {
	if (!a || !b) return false;
	if (NEVER_MERGES.has(a) || NEVER_MERGES.has(b[0])) return false;
	if (a.endsWith('/') && (b[0] === '/' || b[0] === '*')) return true;
	const first = tokenize(a + b)[0];
	return first.value !== a || first.span.end !== a.length;
}

/**
 * Lex `text` as exactly one token; null when it is empty, contains a comment,
 * or splits into several tokens.
 */
export function lexSingle(text: string): { kind: TokenKind; value: string } | null {
	if (!text || text.includes('//') || text.includes('/*')) return null;
	const toks = tokenize(text);
	if (toks.length !== 2) return null;
	const t = toks[0];
	if (t.kind === 'ws' || t.kind === 'newline' || t.unterminated) return null;
	return { kind: t.kind, value: t.value };
}
