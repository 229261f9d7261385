/**
 * Generator - base class for every target language backend
 *
 * generateProgram() walks the declaration tree in a fixed order and hands each
 * declaration to a hook. Backends implement the abstract hooks and may override
 * the optional ones.
 *
 * Visiting order: typedefs, enums, consts (one batch), structs, exceptions,
 * services. Aliases and enums come first so targets that need declarations before
 * use can emit them ahead of the types built on them.
 */

import type {
  ConstDecl,
  ConstValue,
  EnumDecl,
  Program,
  ServiceDecl,
  StructDecl,
  Typedef,
} from './program';
import { GenerationContext } from './context';
import { escapeString } from './escape';
import type { OutputStream } from './output';

export interface GeneratorOptions {
  /**
   * Trace every visited declaration to stderr.
   * Defaults to whether DEBUG_IDLGEN is set.
   */
  debug?: boolean;
}

export abstract class Generator {
  protected readonly program: Program;

  /**
   * Formatted name of the program being generated
   */
  protected programName: string;

  /**
   * Formatted name of the service currently being generated
   */
  protected serviceName: string = '';

  /**
   * Output type-specific directory name ("gen-*")
   */
  protected abstract readonly outDirBase: string;

  protected readonly context = new GenerationContext();

  private readonly debug: boolean;

  /**
   * getProgramName() is called from here, before subclass fields are set;
   * overrides must not depend on them.
   */
  constructor(program: Program, options: GeneratorOptions = {}) {
    this.program = program;
    this.programName = this.getProgramName(program);
    this.debug = options.debug ?? Boolean(process.env.DEBUG_IDLGEN);
  }

  /**
   * Run one full generation pass.
   *
   * Nothing is caught here: an error from any hook ends the pass and leaves
   * whatever was already written.
   */
  generateProgram(): void {
    this.initGenerator();

    for (const ttypedef of this.program.typedefs) {
      this.trace('typedef', ttypedef.name);
      this.generateTypedef(ttypedef);
    }

    for (const tenum of this.program.enums) {
      this.trace('enum', tenum.name);
      this.generateEnum(tenum);
    }

    this.trace('consts', `(${this.program.consts.length})`);
    this.generateConsts(this.program.consts);

    for (const tstruct of this.program.structs) {
      this.trace('struct', tstruct.name);
      this.generateStruct(tstruct);
    }

    for (const txception of this.program.exceptions) {
      this.trace('exception', txception.name);
      this.generateException(txception);
    }

    for (const tservice of this.program.services) {
      this.serviceName = this.getServiceName(tservice);
      this.trace('service', tservice.name);
      this.generateService(tservice);
    }

    this.closeGenerator();
  }

  getProgram(): Program {
    return this.program;
  }

  /**
   * Write a documentation comment. Each line of contents is indented and
   * prefixed; the delimiters carry their own line breaks.
   */
  generateDocstringComment(
    out: OutputStream,
    commentStart: string,
    linePrefix: string,
    contents: string,
    commentEnd: string
  ): void {
    if (commentStart !== '') {
      out.write(this.indent() + commentStart);
    }

    const lines = contents.split('\n');
    lines.forEach((line, index) => {
      // the segment after a trailing newline is not a line
      if (line.length > 0 || index < lines.length - 1) {
        out.write(this.indent() + linePrefix + line + '\n');
      }
    });

    if (commentEnd !== '') {
      out.write(this.indent() + commentEnd);
    }
  }

  /**
   * Escape a string for use inside a generated literal
   */
  escapeString(text: string): string {
    return escapeString(text);
  }

  getEscapedString(constValue: ConstValue): string {
    if (constValue.kind !== 'string') {
      throw new Error(`Expected a string constant, got ${constValue.kind}`);
    }
    return this.escapeString(constValue.value);
  }

  // ============ Lifecycle (optional) ============

  protected initGenerator(): void {}

  protected closeGenerator(): void {}

  // ============ Declaration hooks ============

  protected abstract generateTypedef(ttypedef: Typedef): void;
  protected abstract generateEnum(tenum: EnumDecl): void;
  protected abstract generateStruct(tstruct: StructDecl): void;
  protected abstract generateService(tservice: ServiceDecl): void;

  /**
   * All constants at once. Override this to control how the whole block is
   * emitted, or generateConst() to emit each one.
   */
  protected generateConsts(consts: readonly ConstDecl[]): void {
    for (const tconst of consts) {
      this.generateConst(tconst);
    }
  }

  protected generateConst(_tconst: ConstDecl): void {}

  /**
   * By default exceptions are the same as structs
   */
  protected generateException(txception: StructDecl): void {
    this.generateStruct(txception);
  }

  // ============ Naming and layout (overridable) ============

  protected getProgramName(program: Program): string {
    return program.name;
  }

  protected getServiceName(tservice: ServiceDecl): string {
    return tservice.name;
  }

  protected getOutDir(): string {
    const root = this.program.outPath.endsWith('/') ? this.program.outPath : `${this.program.outPath}/`;
    return `${root}${this.outDirBase}/`;
  }

  // ============ Shared mechanics ============

  protected tmp(prefix: string): string {
    return this.context.tmp(prefix);
  }

  protected indentUp(): void {
    this.context.indentUp();
  }

  protected indentDown(): void {
    this.context.indentDown();
  }

  protected indent(): string {
    return this.context.indent();
  }

  protected writeIndent(out: OutputStream): void {
    out.write(this.indent());
  }

  private trace(category: string, name: string): void {
    if (this.debug) {
      console.error(`[idlgen] ${category} ${name}`);
    }
  }
}
