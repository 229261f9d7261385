/**
 * idlgen Core - shared base for IDL code generators
 *
 * This is the core library containing:
 * - Declaration tree interfaces (input model)
 * - Generator base class (traversal and backend contract)
 * - Naming, escaping and indentation helpers
 * - Output sinks
 */

export * from './program';
export { Generator, type GeneratorOptions } from './generator';
export { GenerationContext } from './context';
export { capitalize, decapitalize, lowercase, camelToSnake, snakeToCamel } from './naming';
export { ESCAPE_TABLE, escapeString, type EscapeTable } from './escape';
export { trueType, type ResolvedType } from './types';
export { BufferedOutput, WritableOutput, type OutputStream, type TextSink } from './output';
