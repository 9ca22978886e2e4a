/**
 * Presentation markup compiler
 */

export * from "./types.js";
export { MarkupError, formatMarkupError, type MarkupErrorKind } from "./errors.js";
export { lex, scanInline, matchInlineTag, splitLines, DIRECTIVE_PREFIX, ESCAPE_MARKER, PAUSE_MARKER } from "./lexer.js";
export { resolveInline, styleFromStack } from "./inline.js";
export { compile, safeCompile, DocumentCompiler, type CompileMode, type CompileResult } from "./compile.js";
