import nodeFs from 'node:fs';
import path from 'node:path';
import { CcError } from './errors';
import { type Logger, defaultLogger } from '../log';

// Source text for every file ever read plus the stack of files currently being
// read. Characters come out with CR, LF, CR/LF and LF/CR collapsed to '\n'.

export interface Position {
	readonly file: number; // index into the stream's loaded files
	readonly line: number; // 1-based
	readonly column: number; // 1-based
}

export interface SourceChar {
	ch: string;
	pos: Position;
	// true for the first character delivered after the file stack changed
	switched: boolean;
}

export interface LoadedFile {
	readonly name: string; // canonical, used as the cache key
	readonly displayName: string;
	readonly text: readonly string[];
}

interface Cursor {
	readonly file: number;
	offset: number;
	line: number;
	column: number;
}

interface ReadState {
	stack: Cursor[];
	switched: boolean;
}

export type SourceFs = Pick<typeof import('node:fs'), 'readFileSync'>;

export type CharStreamOptions = {
	fs?: SourceFs;
	logger?: Logger;
};

// Invalid UTF-8 fails the push instead of decoding to U+FFFD.
const utf8 = new TextDecoder('utf-8', { fatal: true });

function positionOf(c: Cursor): Position {
	return { file: c.file, line: c.line, column: c.column };
}

export abstract class CharReader {
	protected constructor(
		protected readonly files: LoadedFile[],
		protected readonly state: ReadState,
	) { }

	/** Next character without consuming it; undefined once every file is exhausted. */
	peek(): SourceChar | undefined {
		const top = this.top();
		if (!top) return undefined;
		const ch = this.files[top.file].text[top.offset];
		return { ch: ch === '\r' ? '\n' : ch, pos: positionOf(top), switched: this.state.switched };
	}

	/** The character `k` calls to `next` from now would return; `peekN(0)` equals `peek()`. */
	peekN(k: number): SourceChar | undefined {
		const la = this.lookahead();
		for (let i = 0; i < k; i++) {
			if (!la.next()) return undefined;
		}
		return la.peek();
	}

	next(): SourceChar | undefined {
		const top = this.top();
		if (!top) return undefined;
		const text = this.files[top.file].text;
		const pos = positionOf(top);
		const switched = this.state.switched;
		this.state.switched = false;
		let ch = text[top.offset++];
		if (ch === '\r' || ch === '\n') {
			const follow = text[top.offset];
			if ((follow === '\r' || follow === '\n') && follow !== ch) top.offset++;
			ch = '\n';
			top.line++;
			top.column = 1;
		} else {
			top.column++;
		}
		this.dropExhausted();
		return { ch, pos, switched };
	}

	/** Disposable copy of the cursor stack; file text is shared, never copied. */
	lookahead(): Lookahead {
		return new Lookahead(this.files, {
			stack: this.state.stack.map(c => ({ ...c })),
			switched: this.state.switched,
		});
	}

	get depth(): number { return this.state.stack.length; }

	protected top(): Cursor | undefined {
		return this.state.stack[this.state.stack.length - 1];
	}

	// Pops every exhausted cursor so the stack only ever holds readable positions.
	protected dropExhausted(): void {
		let popped = false;
		for (let top = this.top(); top && top.offset >= this.files[top.file].text.length; top = this.top()) {
			this.state.stack.pop();
			this.onPop(top.file);
			popped = true;
		}
		if (popped) this.state.switched = true;
	}

	protected onPop(_file: number): void { }
}

export class Lookahead extends CharReader {
	constructor(files: LoadedFile[], state: ReadState) {
		super(files, state);
	}
}

export class CharStream extends CharReader {
	private readonly byName = new Map<string, number>();
	private readonly fs: SourceFs;
	private readonly logger: Logger;

	constructor(opts: CharStreamOptions = {}) {
		super([], { stack: [], switched: false });
		this.fs = opts.fs ?? nodeFs;
		this.logger = opts.logger ?? defaultLogger();
	}

	/** Read a file (or reuse its cached text) and nest it on top of the file stack. */
	push(name: string): void {
		const canonical = path.resolve(name);
		let index = this.byName.get(canonical);
		if (index === undefined) {
			let text: string;
			try {
				text = utf8.decode(this.fs.readFileSync(canonical));
			} catch (e) {
				throw CcError.fromIo(name, e);
			}
			index = this.register(canonical, name, text);
		} else {
			this.logger.debug(`reusing cached ${canonical} as file ${index}`);
		}
		this.enter(index);
	}

	/** Nest in-memory text under a synthetic name. */
	pushText(name: string, text: string): void {
		let index = this.byName.get(name);
		if (index === undefined) {
			index = this.register(name, name, text);
		} else {
			if (this.files[index].text.join('') !== text) throw new CcError(`${name}: already loaded with different contents`);
			this.logger.debug(`reusing cached ${name} as file ${index}`);
		}
		this.enter(index);
	}

	filename(index: number): string | undefined {
		return this.files[index]?.displayName;
	}

	file(index: number): LoadedFile | undefined {
		return this.files[index];
	}

	get fileCount(): number { return this.files.length; }

	private register(name: string, displayName: string, text: string): number {
		const index = this.files.length;
		this.files.push({ name, displayName, text: Array.from(text) });
		this.byName.set(name, index);
		this.logger.debug(`loaded ${displayName} as file ${index}`);
		return index;
	}

	private enter(file: number): void {
		this.state.stack.push({ file, offset: 0, line: 1, column: 1 });
		this.state.switched = true;
		this.dropExhausted();
	}

	protected override onPop(file: number): void {
		this.logger.debug(`finished ${this.files[file].displayName}, depth ${this.state.stack.length}`);
	}
}
