import { formatLocation, normalizeWarningCode, type PreprocessWarning, type WarningCode } from './analysisTypes';

// Parse user-provided disabled warnings (codes or friendly names) into canonical codes.
export function parseDisabledWarningList(input: unknown): Set<WarningCode> {
	const out = new Set<WarningCode>();
	const push = (raw: unknown) => {
		if (typeof raw !== 'string') return;
		const norm = normalizeWarningCode(raw);
		if (norm) out.add(norm);
	};
	if (Array.isArray(input)) {
		for (const it of input) push(it);
		return out;
	}
	if (typeof input === 'string') {
		for (const token of input.split(/[,\s]+/)) {
			if (!token) continue;
			push(token);
		}
	}
	return out;
}

export function isWarningDisabled(w: PreprocessWarning, disabled: ReadonlySet<WarningCode>): boolean {
	return disabled.size > 0 && disabled.has(w.code);
}

// Text passed to the warning handler: `file:line:col: warning: message`
export function formatWarning(w: PreprocessWarning): string {
	return `${formatLocation(w)}: warning: ${w.message}`;
}
