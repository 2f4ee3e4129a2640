import { EvaluationError, locOf, type SourceLocation } from '../analysisTypes';
import { isSpace, type Token } from './tokens';

// Binary operator precedence, higher binds tighter
const PREC: Record<string, number> = {
	'||': 1,
	'&&': 2,
	'|': 3,
	'^': 4,
	'&': 5,
	'==': 6, '!=': 6,
	'<': 7, '<=': 7, '>': 7, '>=': 7,
	'<<': 8, '>>': 8,
	'+': 9, '-': 9,
	'*': 10, '/': 10, '%': 10,
};

const wrap = (v: bigint) => BigInt.asIntN(64, v);
const bool = (b: boolean) => (b ? 1n : 0n);
const U64_MAX = (1n << 64n) - 1n;
// unary operators, parentheses and ?: branches
const MAX_NESTING = 256;

/**
 * Evaluate a fully macro-expanded `#if` operand (with `defined` already
 * resolved). Identifiers that survived expansion count as 0.
 */
export function evaluateCondition(toks: readonly Token[], at: SourceLocation): bigint {
	const solid = toks.filter(t => !isSpace(t) && t.kind !== 'placemarker' && t.kind !== 'eof');
	if (solid.length === 0) throw new EvaluationError('#if with no expression', at);
	const p = new ExprParser(solid, at);
	const v = p.parseTernary(true);
	p.expectEnd();
	return v;
}

class ExprParser {
	private pos = 0;
	private depth = 0;

	constructor(private readonly toks: readonly Token[], private readonly at: SourceLocation) {}

	private peek(): Token | undefined { return this.toks[this.pos]; }

	private isOp(value: string): boolean {
		const t = this.peek();
		return !!t && t.kind === 'punct' && t.value === value;
	}

	private fail(message: string, t: Token | undefined): never {
		throw new EvaluationError(message, t ? locOf(t) : this.at);
	}

	private nested(t: Token | undefined, parse: () => bigint): bigint {
		if (++this.depth > MAX_NESTING) this.fail('#if expression nested too deeply', t);
		const v = parse();
		this.depth--;
		return v;
	}

	expectEnd() {
		const t = this.peek();
		if (t) this.fail(`missing binary operator before token "${t.value}"`, t);
	}

	// `live` is false on the side of && || ?: that is not evaluated
	parseTernary(live: boolean): bigint {
		const cond = this.parseBinary(1, live);
		if (!this.isOp('?')) return cond;
		const q = this.peek();
		this.pos++;
		const a = this.nested(q, () => this.parseTernary(live && cond !== 0n));
		if (!this.isOp(':')) this.fail('"?" without following ":"', this.peek() ?? q);
		this.pos++;
		const b = this.nested(q, () => this.parseTernary(live && cond === 0n));
		return cond !== 0n ? a : b;
	}

	private parseBinary(minPrec: number, live: boolean): bigint {
		let left = this.parseUnary(live);
		for (; ;) {
			const t = this.peek();
			if (!t || t.kind !== 'punct') return left;
			const prec = PREC[t.value];
			if (prec === undefined || prec < minPrec) return left;
			this.pos++;
			if (t.value === '&&') {
				const right = this.parseBinary(prec + 1, live && left !== 0n);
				left = bool(left !== 0n && right !== 0n);
			} else if (t.value === '||') {
				const right = this.parseBinary(prec + 1, live && left === 0n);
				left = bool(left !== 0n || right !== 0n);
			} else {
				const right = this.parseBinary(prec + 1, live);
				left = this.apply(t, left, right, live);
			}
		}
	}

	private apply(op: Token, l: bigint, r: bigint, live: boolean): bigint {
		switch (op.value) {
			case '*': return wrap(l * r);
			case '/':
			case '%':
				if (r === 0n) {
					if (live) this.fail(op.value === '/' ? 'division by zero in #if' : 'modulo by zero in #if', op);
					return 0n;
				}
				return wrap(op.value === '/' ? l / r : l % r);
			case '+': return wrap(l + r);
			case '-': return wrap(l - r);
			case '<<':
				if (r < 0n) return shiftRight(l, -r);
				return r >= 64n ? 0n : wrap(l << r);
			case '>>':
				if (r < 0n) return -r >= 64n ? 0n : wrap(l << -r);
				return shiftRight(l, r);
			case '<': return bool(l < r);
			case '<=': return bool(l <= r);
			case '>': return bool(l > r);
			case '>=': return bool(l >= r);
			case '==': return bool(l === r);
			case '!=': return bool(l !== r);
			case '&': return wrap(l & r);
			case '^': return wrap(l ^ r);
			case '|': return wrap(l | r);
			default: return this.fail(`token "${op.value}" is not valid in preprocessor expressions`, op);
		}
	}

	private parseUnary(live: boolean): bigint {
		const t = this.peek();
		if (!t) return this.fail('#if expression ends unexpectedly', this.toks[this.toks.length - 1]);
		this.pos++;
		switch (t.kind) {
			case 'number': return parseIntegerLiteral(t);
			case 'char': return parseCharLiteral(t);
			case 'id': return 0n;
			case 'punct':
				switch (t.value) {
					case '!': return bool(this.nested(t, () => this.parseUnary(live)) === 0n);
					case '-': return wrap(-this.nested(t, () => this.parseUnary(live)));
					case '+': return this.nested(t, () => this.parseUnary(live));
					case '~': return wrap(~this.nested(t, () => this.parseUnary(live)));
					case '(': {
						const v = this.nested(t, () => this.parseTernary(live));
						if (!this.isOp(')')) this.fail('missing ")" in expression', this.peek() ?? t);
						this.pos++;
						return v;
					}
				}
		}
		return this.fail(`token "${t.value}" is not valid in preprocessor expressions`, t);
	}
}

function shiftRight(l: bigint, r: bigint): bigint {
	if (r >= 64n) return l < 0n ? -1n : 0n;
	return l >> r;
}

const SUFFIX = /^(?:[uU](?:l|L|ll|LL)?|(?:l|L|ll|LL)[uU]?)$/;

export function parseIntegerLiteral(t: Token): bigint {
	const text = t.value;
	const m = /^(0[xX][0-9a-fA-F]+|0[bB][01]+|[0-9]+)(.*)$/.exec(text);
	if (!m || (m[2] && !SUFFIX.test(m[2]))) {
		if (/^0[xX]/.test(text) ? /[pP]/.test(text) : /[.eE]/.test(text)) {
			throw new EvaluationError(`floating constant "${text}" in preprocessor expression`, locOf(t));
		}
		throw new EvaluationError(`invalid integer constant "${text}"`, locOf(t));
	}
	const digits = m[1];
	let v: bigint;
	if (/^0[xXbB]/.test(digits)) {
		v = BigInt(digits);
	} else if (digits.length > 1 && digits.startsWith('0')) {
		if (!/^[0-7]+$/.test(digits)) throw new EvaluationError(`invalid digit in octal constant "${text}"`, locOf(t));
		v = BigInt('0o' + digits.slice(1));
	} else {
		v = BigInt(digits);
	}
	if (v > U64_MAX) throw new EvaluationError(`integer constant "${text}" is too large`, locOf(t));
	return wrap(v);
}

const SIMPLE_ESCAPES: Record<string, number> = {
	'n': 10, 't': 9, 'r': 13, 'a': 7, 'b': 8, 'f': 12, 'v': 11,
	'\\': 92, '\'': 39, '"': 34, '?': 63,
};

// Character constant value; multi-character constants combine bytes big-endian like GCC.
// Plain char is signed, so a lone unprefixed escape such as '\377' is negative.
export function parseCharLiteral(t: Token): bigint {
	if (t.unterminated) throw new EvaluationError('missing terminating \' character', locOf(t));
	const quote = t.value.indexOf('\'');
	const body = t.value.slice(quote + 1, -1);
	const units: number[] = [];
	for (let i = 0; i < body.length;) {
		if (body[i] !== '\\') {
			const cp = body.codePointAt(i) ?? 0;
			units.push(cp);
			i += cp > 0xffff ? 2 : 1;
			continue;
		}
		const e = body[i + 1];
		if (e === undefined) throw new EvaluationError(`invalid escape in character constant ${t.value}`, locOf(t));
		if (Object.prototype.hasOwnProperty.call(SIMPLE_ESCAPES, e)) { units.push(SIMPLE_ESCAPES[e]); i += 2; continue; }
		if (/[0-7]/.test(e)) {
			const oct = /^[0-7]{1,3}/.exec(body.slice(i + 1));
			const digits = oct ? oct[0] : e;
			units.push(parseInt(digits, 8));
			i += 1 + digits.length;
			continue;
		}
		if (e === 'x') {
			const hex = /^[0-9a-fA-F]+/.exec(body.slice(i + 2));
			if (!hex) throw new EvaluationError(`\\x used with no following hex digits in ${t.value}`, locOf(t));
			units.push(parseInt(hex[0], 16));
			i += 2 + hex[0].length;
			continue;
		}
		throw new EvaluationError(`unknown escape sequence "\\${e}" in character constant`, locOf(t));
	}
	if (units.length === 0) throw new EvaluationError('empty character constant', locOf(t));
	let v = 0n;
	for (const u of units) v = (v << 8n) | BigInt(u & 0xff);
	if (units.length === 1) {
		const u = units[0];
		v = BigInt(quote === 0 && body[0] === '\\' && u >= 0x80 && u <= 0xff ? u - 0x100 : u);
	}
	return wrap(v);
}
