import type { Position } from './source';

// Failures raised by the character stream and the scanner. Every failure whose
// extent is known carries the position where the broken construct began.
export class CcError extends Error {
	readonly position?: Position;

	constructor(message: string, position?: Position, options?: { cause?: unknown }) {
		super(message, options);
		this.name = 'CcError';
		if (position) this.position = position;
	}

	static fromIo(name: string, cause: unknown): CcError {
		const detail = cause instanceof Error ? cause.message : String(cause);
		return new CcError(`${name}: ${detail}`, undefined, { cause });
	}

	/** Render as `file:line:column: message`; parts without data are dropped. */
	format(filename?: string): string {
		const p = this.position;
		if (!p) return filename ? `${filename}: ${this.message}` : this.message;
		const at = `${p.line}:${p.column}`;
		return filename ? `${filename}:${at}: ${this.message}` : `${at}: ${this.message}`;
	}
}

export function isCcError(value: unknown): value is CcError {
	return value instanceof CcError;
}
