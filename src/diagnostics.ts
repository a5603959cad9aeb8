import { type Diagnostic, DiagnosticSeverity, Range } from 'vscode-languageserver/node';
import type { CcError } from './core/errors';
import type { CharStream } from './core/source';

export const DIAGNOSTIC_SOURCE = 'pptokens';

// LSP ranges are 0-based; positions are 1-based. The range covers the one
// character where the failing construct starts.
export function toDiagnostic(error: CcError, stream?: CharStream): Diagnostic {
	const p = error.position;
	const line = p ? p.line - 1 : 0;
	const character = p ? p.column - 1 : 0;
	const file = p && stream ? stream.filename(p.file) : undefined;
	return {
		range: Range.create(line, character, line, p ? character + 1 : 0),
		message: error.message,
		severity: DiagnosticSeverity.Error,
		source: DIAGNOSTIC_SOURCE,
		...(file !== undefined ? { data: { file } } : {}),
	};
}

export function formatError(error: CcError, stream: CharStream): string {
	const p = error.position;
	return error.format(p ? stream.filename(p.file) : undefined);
}
