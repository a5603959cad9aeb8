import type { Position } from './source';
import { type PunctuatorKind, punctuatorSpelling } from './punctuators';

// Preprocessing tokens. Literal text is kept raw: escapes are not interpreted
// and pp-numbers are not validated.
export type PpToken =
	| { kind: 'Identifier'; text: string }
	| { kind: 'Number'; text: string }
	| { kind: 'CharLiteral'; text: string } // between the quotes
	| { kind: 'StringLiteral'; text: string } // between the quotes
	| { kind: 'Other'; text: string } // one unrecognized character
	| { kind: PunctuatorKind }
	| { kind: 'Eof' };

export type TokenKind = PpToken['kind'];

export interface ScannedToken {
	token: PpToken;
	pos?: Position; // first character; absent for Eof
	newline: boolean; // a newline (or the start of input) preceded the token
}

export const EOF: PpToken = Object.freeze({ kind: 'Eof' });

export function tokenSpelling(t: PpToken): string {
	switch (t.kind) {
		case 'Identifier':
		case 'Number':
		case 'Other':
			return t.text;
		case 'CharLiteral':
			return `'${t.text}'`;
		case 'StringLiteral':
			return `"${t.text}"`;
		case 'Eof':
			return '';
		default:
			return punctuatorSpelling(t.kind);
	}
}

export class TokenStream {
	private readonly arr?: ScannedToken[];
	private readonly producer?: () => ScannedToken;
	private idx = 0;
	private pushback: ScannedToken[] = [];
	private stickyEof: ScannedToken | null = null;

	constructor(source: ScannedToken[] | { producer: () => ScannedToken }) {
		if (Array.isArray(source)) {
			this.arr = source;
		} else {
			this.producer = source.producer;
		}
	}

	next(): ScannedToken {
		if (this.stickyEof) return this.stickyEof;
		let t = this.pushback.pop();
		if (!t) {
			if (this.arr) {
				t = this.idx < this.arr.length ? this.arr[this.idx++] : { token: EOF, newline: false };
			} else if (this.producer) {
				t = this.producer();
			} else {
				t = { token: EOF, newline: false };
			}
		}
		if (t.token.kind === 'Eof') this.stickyEof = t;
		return t;
	}

	peek(): ScannedToken {
		const t = this.next();
		if (t.token.kind !== 'Eof') this.pushBack(t);
		return t;
	}

	pushBack(t: ScannedToken) {
		if (t.token.kind === 'Eof') return; // ignore pushing back EOF
		this.pushback.push(t);
	}
}
