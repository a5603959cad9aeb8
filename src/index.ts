export { CcError, isCcError } from './core/errors';
export { CharStream, CharReader, Lookahead } from './core/source';
export type { CharStreamOptions, LoadedFile, Position, SourceChar, SourceFs } from './core/source';
export { nextChar, peekChar, peekCharN, readWhile } from './core/splice';
export { PUNCTUATORS, buildTrie, matchPunctuator, punctuatorSpelling, punctuatorTable } from './core/punctuators';
export type { CommentKind, MatchKind, PunctuatorKind, TrieNode } from './core/punctuators';
export { EOF, TokenStream, tokenSpelling } from './core/tokens';
export type { PpToken, ScannedToken, TokenKind } from './core/tokens';
export { Tokenizer, nextToken, tokenize } from './core/tokenizer';
export type { TokenizeResult, TriviaBuffer } from './core/tokenizer';
export { DIAGNOSTIC_SOURCE, formatError, toDiagnostic } from './diagnostics';
export { consoleLogger, defaultLogger, silentLogger } from './log';
export type { Logger } from './log';
