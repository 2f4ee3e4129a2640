/* Dynamic built-in macros: __LINE__, __FILE__, __DATE__, __TIME__ */
import type { DynamicBuiltin, Macro } from './macro';

export const DYNAMIC_BUILTINS: readonly DynamicBuiltin[] = ['__LINE__', '__FILE__', '__DATE__', '__TIME__'];

const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];

// "Mmm dd yyyy" with the day padded by a space, in UTC so output is stable across zones
export function formatDate(d: Date): string {
	const day = String(d.getUTCDate()).padStart(2, ' ');
	return `${MONTHS[d.getUTCMonth()]} ${day} ${d.getUTCFullYear()}`;
}

export function formatTime(d: Date): string {
	const p2 = (n: number) => String(n).padStart(2, '0');
	return `${p2(d.getUTCHours())}:${p2(d.getUTCMinutes())}:${p2(d.getUTCSeconds())}`;
}

// C string literal for a file name or date text
export function cString(s: string): string {
	return `"${s.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

export function dynamicMacro(name: DynamicBuiltin): Macro {
	return {
		name,
		kind: 'object',
		params: [],
		variadic: false,
		body: [],
		site: { file: '<built-in>', line: 0 },
		builtin: true,
		dynamic: name,
	};
}

// Expansion of a dynamic builtin at the given presumed position.
export function builtinExpansion(
	name: DynamicBuiltin,
	ctx: { file: string; line: number; now: () => Date }
): { kind: 'number' | 'string'; value: string } {
	switch (name) {
		case '__LINE__':
			return { kind: 'number', value: String(ctx.line) };
		case '__FILE__':
			return { kind: 'string', value: cString(ctx.file) };
		case '__DATE__':
			return { kind: 'string', value: cString(formatDate(ctx.now())) };
		case '__TIME__':
			return { kind: 'string', value: cString(formatTime(ctx.now())) };
	}
}
