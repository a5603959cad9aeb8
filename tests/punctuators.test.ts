import { describe, it, expect } from 'vitest';
import { type MatchKind, PUNCTUATORS, buildTrie, matchPunctuator, punctuatorSpelling, punctuatorTable } from '../src/core/punctuators';
import { peekChar } from '../src/core/splice';
import { streamFrom } from './testUtils';

function matchAll(text: string) {
	const s = streamFrom(text);
	const out: MatchKind[] = [];
	for (let m = matchPunctuator(s); m; m = matchPunctuator(s)) out.push(m);
	return { matches: out, rest: peekChar(s)?.ch };
}

describe('punctuator automaton', () => {
	it('matches every punctuator by its full spelling', () => {
		for (const [spelling, kind] of PUNCTUATORS) {
			expect(matchAll(spelling)).toEqual({ matches: [kind], rest: undefined });
		}
	});

	it('takes the longest match', () => {
		expect(matchAll('<<=').matches).toEqual(['LeftShiftAssign']);
		expect(matchAll('<<<').matches).toEqual(['ShiftLeft', 'Less']);
		expect(matchAll('->>').matches).toEqual(['Arrow', 'Greater']);
		expect(matchAll('+++').matches).toEqual(['Increment', 'Add']);
		expect(matchAll('!==').matches).toEqual(['NotEqual', 'Assign']);
	});

	it('shares the slash branch with comment openers', () => {
		expect(matchAll('/*').matches).toEqual(['BlockComment']);
		expect(matchAll('//').matches).toEqual(['LineComment']);
		expect(matchAll('/=').matches).toEqual(['DivideAssign']);
		expect(matchAll('/').matches).toEqual(['Divide']);
	});

	it('reads through line splices', () => {
		expect(matchAll('<\\\n<\\\n=').matches).toEqual(['LeftShiftAssign']);
	});

	it('does not continue a match into the next file', () => {
		const s = streamFrom('=', 'a.c');
		s.pushText('b.h', '<');
		expect(matchPunctuator(s)).toBe('Less');
		expect(matchPunctuator(s)).toBe('Assign');
	});

	it('consumes nothing when no entry starts here', () => {
		expect(matchAll('@+')).toEqual({ matches: [], rest: '@' });
		expect(matchAll('\\x')).toEqual({ matches: [], rest: '\\' });
	});

	it('builds the table once', () => {
		expect(punctuatorTable()).toBe(punctuatorTable());
		expect(punctuatorTable().get('<')?.next?.get('<')?.next?.get('=')?.token).toBe('LeftShiftAssign');
	});

	it('rejects a table with a missing prefix', () => {
		expect(() => buildTrie([['<<', 'ShiftLeft']])).toThrow("punctuator table has no entry for prefix ending in '<'");
	});

	it('spells punctuators back', () => {
		expect(punctuatorSpelling('RightShiftAssign')).toBe('>>=');
		expect(punctuatorSpelling('Arrow')).toBe('->');
	});
});
