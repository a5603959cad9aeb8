import { CcError } from './errors';
import { matchPunctuator } from './punctuators';
import { CharStream, type CharReader, type Position, type SourceChar } from './source';
import { nextChar, peekChar, peekCharN, readWhile } from './splice';
import { EOF, type ScannedToken, TokenStream } from './tokens';

export type TriviaBuffer = string[];

const isWhitespace = (ch: string) => ch === ' ' || ch === '\t' || ch === '\n' || ch === '\v' || ch === '\f';
const isDigit = (ch: string | undefined) => !!ch && ch >= '0' && ch <= '9';
const isIdStart = (ch: string) => (ch >= 'a' && ch <= 'z') || (ch >= 'A' && ch <= 'Z') || ch === '_';
const isIdContinue = (ch: string) => isIdStart(ch) || isDigit(ch);
const startsFraction = (c: SourceChar | undefined) => !!c && !c.switched && isDigit(c.ch);

// Whitespace goes to the trivia buffer verbatim. Returns whether it held a
// newline or the start of a file.
function skipWhitespace(src: CharReader, trivia: TriviaBuffer): boolean {
	let newline = false;
	for (let c = peekChar(src); c && isWhitespace(c.ch); c = peekChar(src)) {
		nextChar(src);
		trivia.push(c.ch);
		if (c.ch === '\n' || c.switched) newline = true;
	}
	return newline;
}

// pp-number: digits, letters, '_', '.', and a sign directly after e/E.
function readNumber(src: CharReader): string {
	let text = '';
	for (let c = peekChar(src); c && !(c.switched && text); c = peekChar(src)) {
		if (c.ch === 'e' || c.ch === 'E') {
			nextChar(src);
			text += c.ch;
			const sign = peekChar(src);
			if (sign && !sign.switched && (sign.ch === '+' || sign.ch === '-')) {
				nextChar(src);
				text += sign.ch;
			}
			continue;
		}
		if (!isIdContinue(c.ch) && c.ch !== '.') break;
		nextChar(src);
		text += c.ch;
	}
	return text;
}

// Called with the opening quote already consumed. The closing newline, if any, is left unread.
function readLiteral(src: CharReader, quote: '\'' | '"', start: Position): string {
	const unterminated = () => new CcError(quote === '"' ? 'unterminated string constant' : 'unterminated character constant', start);
	let text = '';
	for (;;) {
		const c = peekChar(src);
		if (!c || c.switched || c.ch === '\n') throw unterminated();
		nextChar(src);
		if (c.ch === quote) return text;
		text += c.ch;
		if (c.ch === '\\') {
			const escaped = peekChar(src);
			if (!escaped || escaped.switched || escaped.ch === '\n') throw unterminated();
			nextChar(src);
			text += escaped.ch;
		}
	}
}

// Called after '/*'. Consumes through the closing '*/', or up to the end of the file.
function skipBlockComment(src: CharReader, start: Position): void {
	let star = false;
	for (let c = peekChar(src); c && !c.switched; c = peekChar(src)) {
		nextChar(src);
		if (star && c.ch === '/') return;
		star = c.ch === '*';
	}
	throw new CcError('unterminated block comment', start);
}

/**
 * Scan one pp-token. Whitespace is appended to `trivia` as read and each
 * comment contributes exactly one space. Failures are thrown as CcError
 * positioned at the start of the broken construct; the stream is left past
 * the consumed characters so the caller may keep scanning.
 */
export function nextToken(src: CharReader, trivia: TriviaBuffer): ScannedToken {
	let newline = false;
	for (;;) {
		if (skipWhitespace(src, trivia)) newline = true;
		const c = peekChar(src);
		if (!c) return { token: EOF, newline: false };
		const pos = c.pos;
		if (c.switched) newline = true;

		if (isIdStart(c.ch)) {
			nextChar(src);
			return { token: { kind: 'Identifier', text: c.ch + readWhile(src, isIdContinue) }, pos, newline };
		}

		// '.' followed by a digit is a number, not the Dot punctuator
		if (isDigit(c.ch) || (c.ch === '.' && startsFraction(peekCharN(src, 1)))) {
			return { token: { kind: 'Number', text: readNumber(src) }, pos, newline };
		}

		if (c.ch === '\'' || c.ch === '"') {
			nextChar(src);
			const text = readLiteral(src, c.ch, pos);
			return { token: { kind: c.ch === '"' ? 'StringLiteral' : 'CharLiteral', text }, pos, newline };
		}

		const match = matchPunctuator(src);
		if (match === 'BlockComment') {
			skipBlockComment(src, pos);
			trivia.push(' ');
			continue;
		}
		if (match === 'LineComment') {
			readWhile(src, ch => ch !== '\n');
			trivia.push(' ');
			continue;
		}
		if (match) return { token: { kind: match }, pos, newline };

		nextChar(src);
		return { token: { kind: 'Other', text: c.ch }, pos, newline };
	}
}

/** Scanner over a character stream with token pushback and accumulated trivia. */
export class Tokenizer {
	private readonly ts: TokenStream;
	private readonly leading = new WeakMap<ScannedToken, string>();

	constructor(readonly stream: CharStream) {
		this.ts = new TokenStream({ producer: () => this.scan() });
	}

	private scan(): ScannedToken {
		const trivia: TriviaBuffer = [];
		const t = nextToken(this.stream, trivia);
		this.leading.set(t, trivia.join(''));
		return t;
	}

	next(): ScannedToken { return this.ts.next(); }
	peek(): ScannedToken { return this.ts.peek(); }
	pushBack(t: ScannedToken) { this.ts.pushBack(t); }

	/** Whitespace and comment spaces read just before `t`; unaffected by peek and pushBack. */
	leadingTrivia(t: ScannedToken): string {
		return this.leading.get(t) ?? '';
	}
}

export interface TokenizeResult {
	tokens: ScannedToken[]; // excludes the final Eof
	trivia: string;
	errors: CcError[];
}

/** Lex a whole in-memory text, recording recoverable failures and continuing after them. */
export function tokenize(text: string, name = '<memory>'): TokenizeResult {
	const stream = new CharStream();
	stream.pushText(name, text);
	const trivia: TriviaBuffer = [];
	const tokens: ScannedToken[] = [];
	const errors: CcError[] = [];
	for (;;) {
		let t: ScannedToken;
		try {
			t = nextToken(stream, trivia);
		} catch (e) {
			if (!(e instanceof CcError)) throw e;
			errors.push(e);
			continue;
		}
		if (t.token.kind === 'Eof') break;
		tokens.push(t);
	}
	return { tokens, trivia: trivia.join(''), errors };
}
