import type { LineMode } from './config';
import type { Token } from './tokens';
import { needsSpaceBetween } from './tokenizer';

/**
 * Renders expanded tokens back to text. Whitespace inside a line collapses
 * to one space (leading and trailing whitespace is dropped) and a space is
 * added between tokens that would otherwise lex as one.
 */
export class OutputAssembler {
	private readonly parts: string[] = [];
	// last token written on the current line
	private last: string | null = null;
	// the token before `last`, when nothing separates them
	private prev: string | null = null;
	private pendingSpace = false;

	constructor(readonly lineMode: LineMode = 'compact') {}

	emit(toks: readonly Token[]) {
		for (const t of toks) {
			switch (t.kind) {
				case 'newline':
					this.newline();
					break;
				case 'ws':
					if (this.last !== null) this.pendingSpace = true;
					break;
				case 'placemarker':
				case 'eof':
					break;
				default: {
					const space = this.last !== null && (this.pendingSpace || needsSpaceBetween(this.last, t.value) || this.makesEllipsis(t.value));
					if (space) this.parts.push(' ');
					this.parts.push(t.value);
					this.prev = space ? null : this.last;
					this.last = t.value;
					this.pendingSpace = false;
				}
			}
		}
	}

	// `.` `.` `.` printed together would lex as `...`
	private makesEllipsis(next: string): boolean {
		return next === '.' && this.last === '.' && this.prev === '.';
	}

	newline() {
		this.parts.push('\n');
		this.last = null;
		this.prev = null;
		this.pendingSpace = false;
	}

	// Close the current line if anything was written on it
	endLine() {
		const tail = this.parts[this.parts.length - 1];
		if (tail !== undefined && tail !== '\n') this.newline();
	}

	// A directive or inactive line: kept as an empty line in 'preserve' mode only
	skippedLines(count: number) {
		if (this.lineMode !== 'preserve') return;
		for (let i = 0; i < count; i++) this.newline();
	}

	toString(): string {
		return this.parts.join('');
	}
}
