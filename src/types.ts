/**
 * SpyLang AST Types
 * Barrel for token, node, location and error types shared by every stage
 */

export type { SourceLocation, SourceSpan } from './source-location.js';
export { TOKEN_TYPES, TOKEN_DESCRIPTIONS } from './token-types.js';
export type { Token, TokenType } from './token-types.js';
export type * from './ast-nodes.js';
export {
  SpyError,
  IllegalCharacterError,
  ExpectedCharacterError,
  RuntimeError,
  createError,
} from './error-classes.js';
export type { CallFrame, SpyErrorData } from './error-classes.js';
export { ERROR_REGISTRY, renderMessage } from './error-registry.js';
export type {
  ErrorCategory,
  ErrorDefinition,
  ErrorRegistry,
} from './error-registry.js';
