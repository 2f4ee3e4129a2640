import process from 'node:process';

export type DebugChannel = 'cond' | 'include' | 'expand' | 'driver';

// CPREPROC_DEBUG=cond,include  or  CPREPROC_DEBUG=*
function enabledChannels(): Set<string> {
	const raw = process.env.CPREPROC_DEBUG;
	if (!raw) return new Set();
	return new Set(raw.split(/[,\s]+/).filter(Boolean));
}

export function debugEnabled(channel: DebugChannel): boolean {
	const on = enabledChannels();
	return on.has('*') || on.has(channel);
}

export function debug(channel: DebugChannel, ...args: unknown[]) {
	if (debugEnabled(channel)) console.log(`[cpreproc:${channel}]`, ...args);
}
