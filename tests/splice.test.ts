import { describe, it, expect } from 'vitest';
import { nextChar, peekChar, peekCharN, readWhile } from '../src/core/splice';
import { streamFrom } from './testUtils';

describe('line splicing', () => {
	it('hides a backslash-newline between two characters', () => {
		const s = streamFrom('a\\\nb');
		expect(nextChar(s)?.ch).toBe('a');
		expect(peekChar(s)).toEqual({ ch: 'b', pos: { file: 0, line: 2, column: 1 }, switched: false });
		expect(nextChar(s)?.ch).toBe('b');
		expect(nextChar(s)).toBeUndefined();
	});

	it('skips consecutive splices in one step and keeps the switch flag', () => {
		const s = streamFrom('\\\n\\\r\nx');
		const expected = { ch: 'x', pos: { file: 0, line: 3, column: 1 }, switched: true };
		expect(peekChar(s)).toEqual(expected);
		expect(s.peek()?.ch).toBe('\\');
		expect(nextChar(s)).toEqual(expected);
		expect(s.depth).toBe(0);
	});

	it('applies splicing at every step of multi-character lookahead', () => {
		const s = streamFrom('1\\\n2\\\n3');
		expect(peekCharN(s, 0)?.ch).toBe('1');
		expect(peekCharN(s, 1)?.ch).toBe('2');
		expect(peekCharN(s, 2)).toEqual({ ch: '3', pos: { file: 0, line: 3, column: 1 }, switched: false });
		expect(peekCharN(s, 3)).toBeUndefined();
		expect(s.peek()?.ch).toBe('1');
	});

	it('returns a backslash that is not followed by a newline', () => {
		const s = streamFrom('\\x\\');
		expect(nextChar(s)?.ch).toBe('\\');
		expect(nextChar(s)?.ch).toBe('x');
		expect(nextChar(s)?.ch).toBe('\\');
		expect(nextChar(s)).toBeUndefined();
	});

	it('does not splice a backslash ending a file with the parent newline', () => {
		const s = streamFrom('a\nz', 'a.c');
		nextChar(s);
		s.pushText('b.h', '\\');
		expect(peekChar(s)?.ch).toBe('\\');
		expect(nextChar(s)?.ch).toBe('\\');
		expect(nextChar(s)).toEqual({ ch: '\n', pos: { file: 0, line: 1, column: 2 }, switched: true });
		expect(nextChar(s)?.ch).toBe('z');
	});

	it('readWhile stops before the first failing character', () => {
		const s = streamFrom('-ab\\\nc1 x');
		nextChar(s);
		expect(readWhile(s, ch => ch >= 'a' && ch <= 'z')).toBe('abc');
		expect(peekChar(s)?.ch).toBe('1');
	});

	it('readWhile stops at a file switch', () => {
		const s = streamFrom('cd', 'a.c');
		s.pushText('b.h', 'ab');
		expect(readWhile(s, () => true)).toBe('');
		nextChar(s);
		expect(readWhile(s, () => true)).toBe('b');
		expect(readWhile(s, () => true)).toBe('');
		expect(peekChar(s)?.ch).toBe('c');
	});
});
