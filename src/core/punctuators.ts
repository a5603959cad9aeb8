import type { CharReader } from './source';
import { nextChar, peekChar } from './splice';

export const PUNCTUATORS = [
	['#', 'Hash'],
	['+', 'Add'],
	['-', 'Subtract'],
	['*', 'Star'],
	['/', 'Divide'],
	['%', 'Mod'],
	['++', 'Increment'],
	['--', 'Decrement'],
	['==', 'Equal'],
	['!=', 'NotEqual'],
	['<', 'Less'],
	['<=', 'LessEqual'],
	['>', 'Greater'],
	['>=', 'GreaterEqual'],
	['!', 'LogicalNot'],
	['&&', 'LogicalAnd'],
	['||', 'LogicalOr'],
	['~', 'BitNot'],
	['&', 'Ampersand'],
	['|', 'BitOr'],
	['^', 'BitXor'],
	['<<', 'ShiftLeft'],
	['>>', 'ShiftRight'],
	['=', 'Assign'],
	['+=', 'AddAssign'],
	['-=', 'SubtractAssign'],
	['*=', 'MultiplyAssign'],
	['/=', 'DivideAssign'],
	['%=', 'ModAssign'],
	['&=', 'AndAssign'],
	['|=', 'OrAssign'],
	['^=', 'XorAssign'],
	['<<=', 'LeftShiftAssign'],
	['>>=', 'RightShiftAssign'],
	['[', 'LeftBracket'],
	[']', 'RightBracket'],
	['(', 'LeftParen'],
	[')', 'RightParen'],
	['{', 'LeftBrace'],
	['}', 'RightBrace'],
	['.', 'Dot'],
	['->', 'Arrow'],
	[';', 'Semicolon'],
	['?', 'Question'],
	[':', 'Colon'],
	[',', 'Comma'],
] as const;

export type PunctuatorKind = typeof PUNCTUATORS[number][1];

// Comment openers live in the same trie but never leave the scanner.
export type CommentKind = 'BlockComment' | 'LineComment';
export type MatchKind = PunctuatorKind | CommentKind;

const COMMENT_OPENERS: ReadonlyArray<readonly [string, CommentKind]> = [
	['/*', 'BlockComment'],
	['//', 'LineComment'],
];

export interface TrieNode {
	readonly token: MatchKind;
	readonly next?: ReadonlyMap<string, TrieNode>;
}

type MutableNode = { token?: MatchKind; next: Map<string, MutableNode> };

function freeze(nodes: Map<string, MutableNode>): ReadonlyMap<string, TrieNode> {
	const out = new Map<string, TrieNode>();
	for (const [ch, node] of nodes) {
		// every prefix of a multi-character entry is itself an entry
		if (!node.token) throw new Error(`punctuator table has no entry for prefix ending in '${ch}'`);
		out.set(ch, node.next.size ? { token: node.token, next: freeze(node.next) } : { token: node.token });
	}
	return out;
}

export function buildTrie(entries: ReadonlyArray<readonly [string, MatchKind]>): ReadonlyMap<string, TrieNode> {
	const root = new Map<string, MutableNode>();
	for (const [spelling, token] of entries) {
		let level = root;
		let node: MutableNode | undefined;
		for (const ch of spelling) {
			node = level.get(ch);
			if (!node) {
				node = { next: new Map() };
				level.set(ch, node);
			}
			level = node.next;
		}
		if (node) node.token = token;
	}
	return freeze(root);
}

let table: ReadonlyMap<string, TrieNode> | undefined;

export function punctuatorTable(): ReadonlyMap<string, TrieNode> {
	table ??= buildTrie([...PUNCTUATORS, ...COMMENT_OPENERS]);
	return table;
}

function extend(src: CharReader, node: TrieNode): MatchKind {
	if (!node.next) return node.token;
	const c = peekChar(src);
	const child = c && !c.switched ? node.next.get(c.ch) : undefined;
	if (!child) return node.token;
	nextChar(src);
	return extend(src, child);
}

/**
 * Longest match against the trie, reading through the splice layer. Returns
 * undefined (consuming nothing) when the next character starts no entry. A
 * match never continues into the next file.
 */
export function matchPunctuator(src: CharReader, nodes: ReadonlyMap<string, TrieNode> = punctuatorTable()): MatchKind | undefined {
	const c = peekChar(src);
	const node = c && nodes.get(c.ch);
	if (!node) return undefined;
	nextChar(src);
	return extend(src, node);
}

const SPELLINGS: ReadonlyMap<PunctuatorKind, string> = new Map(PUNCTUATORS.map(([spelling, kind]) => [kind, spelling] as const));

export function punctuatorSpelling(kind: PunctuatorKind): string {
	return SPELLINGS.get(kind) ?? '';
}
