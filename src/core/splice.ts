import type { CharReader, SourceChar } from './source';

// Line splicing: a backslash immediately followed by a newline from the same
// file is deleted. Everything above this layer reads characters through here.

function spliceAhead(src: CharReader): boolean {
	const bs = src.peek();
	if (bs?.ch !== '\\') return false;
	const nl = src.peekN(1);
	return nl !== undefined && nl.ch === '\n' && !nl.switched;
}

// Returns whether a skipped backslash was the first character after a file switch.
function skipSplices(src: CharReader): boolean {
	let switched = false;
	while (spliceAhead(src)) {
		if (src.next()?.switched) switched = true;
		src.next();
	}
	return switched;
}

function carry(c: SourceChar | undefined, switched: boolean): SourceChar | undefined {
	return c && switched && !c.switched ? { ...c, switched } : c;
}

export function peekChar(src: CharReader): SourceChar | undefined {
	if (!spliceAhead(src)) return src.peek();
	const la = src.lookahead();
	const switched = skipSplices(la);
	return carry(la.peek(), switched);
}

export function nextChar(src: CharReader): SourceChar | undefined {
	const switched = skipSplices(src);
	return carry(src.next(), switched);
}

/** The k-th upcoming spliced character; `peekCharN(src, 0)` equals `peekChar(src)`. */
export function peekCharN(src: CharReader, k: number): SourceChar | undefined {
	if (k === 0) return peekChar(src);
	const la = src.lookahead();
	for (let i = 0; i < k; i++) {
		if (!nextChar(la)) return undefined;
	}
	const switched = skipSplices(la);
	return carry(la.peek(), switched);
}

/**
 * Consume characters while `pred` holds; the first failing character stays
 * unread. Stops at a file switch, so the result never spans two files.
 */
export function readWhile(src: CharReader, pred: (ch: string) => boolean): string {
	let out = '';
	for (let c = peekChar(src); c && !c.switched && pred(c.ch); c = peekChar(src)) {
		nextChar(src);
		out += c.ch;
	}
	return out;
}
