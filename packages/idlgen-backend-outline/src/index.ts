/**
 * Outline Backend for idlgen - plain text dump of a declaration tree
 *
 * Writes each declaration on its own indented line in the order the generator
 * visits them. Used for debugging the parser output and for checking the
 * generator contract end to end; it does not target a programming language.
 */

import {
  Generator,
  camelToSnake,
  snakeToCamel,
  trueType,
  type ConstDecl,
  type ConstValue,
  type EnumDecl,
  type Field,
  type FunctionDecl,
  type GeneratorOptions,
  type IdlType,
  type OutputStream,
  type Program,
  type ServiceDecl,
  type StructDecl,
  type Typedef,
} from 'idlgen-core';

export type FieldNameStyle = 'preserve' | 'snake' | 'camel';

export interface OutlineOptions extends GeneratorOptions {
  /** How field, argument and function names are written (default: preserve) */
  fieldNames?: FieldNameStyle;
}

/**
 * Display name of a type reference
 */
export function typeName(type: IdlType): string {
  switch (type.kind) {
    case 'base':
      return type.name;
    case 'list':
      return `list<${typeName(type.elemType)}>`;
    case 'set':
      return `set<${typeName(type.elemType)}>`;
    case 'map':
      return `map<${typeName(type.keyType)}, ${typeName(type.valType)}>`;
    case 'typedef':
    case 'enum':
    case 'struct':
      return type.name;
  }
}

export class OutlineGenerator extends Generator {
  protected readonly outDirBase = 'gen-outline';
  private readonly fieldNames: FieldNameStyle;

  constructor(program: Program, private readonly out: OutputStream, options: OutlineOptions = {}) {
    super(program, options);
    this.fieldNames = options.fieldNames ?? 'preserve';
  }

  protected override initGenerator(): void {
    this.writeDoc(this.program.doc);
    this.line(`program ${this.programName} -> ${this.getOutDir()}`);
    this.indentUp();
  }

  protected override closeGenerator(): void {
    this.indentDown();
    this.line('end');
    this.out.flush();
  }

  protected generateTypedef(ttypedef: Typedef): void {
    this.writeDoc(ttypedef.doc);
    let text = `typedef ${ttypedef.name} = ${typeName(ttypedef.type)}`;
    if (ttypedef.type.kind === 'typedef') {
      text += ` -> ${typeName(trueType(ttypedef))}`;
    }
    this.line(text);
  }

  protected generateEnum(tenum: EnumDecl): void {
    this.writeDoc(tenum.doc);
    this.line(`enum ${tenum.name} {`);
    this.indentUp();
    for (const value of tenum.values) {
      this.writeDoc(value.doc);
      this.line(`${value.name} = ${value.value}`);
    }
    this.indentDown();
    this.line('}');
  }

  /**
   * All constants go into one block; nothing is written when there are none
   */
  protected override generateConsts(consts: readonly ConstDecl[]): void {
    if (consts.length === 0) return;

    this.line('consts {');
    this.indentUp();
    super.generateConsts(consts);
    this.indentDown();
    this.line('}');
  }

  protected override generateConst(tconst: ConstDecl): void {
    this.writeDoc(tconst.doc);
    this.line(`${typeName(tconst.type)} ${tconst.name} = ${this.renderValue(tconst.value)}`);
  }

  protected generateStruct(tstruct: StructDecl): void {
    this.writeMembers(tstruct.isUnion ? 'union' : 'struct', tstruct);
  }

  protected override generateException(txception: StructDecl): void {
    this.writeMembers('exception', txception);
  }

  protected generateService(tservice: ServiceDecl): void {
    this.writeDoc(tservice.doc);
    const parent = tservice.extends ? ` extends ${tservice.extends.name}` : '';
    this.line(`service ${this.serviceName}${parent} {`);
    this.indentUp();
    for (const fn of tservice.functions) {
      this.writeDoc(fn.doc);
      this.line(this.renderFunction(fn));
    }
    this.indentDown();
    this.line('}');
  }

  private writeMembers(keyword: string, tstruct: StructDecl): void {
    this.writeDoc(tstruct.doc);
    this.line(`${keyword} ${tstruct.name} {`);
    this.indentUp();
    for (const field of tstruct.members) {
      this.writeDoc(field.doc);
      this.line(this.renderField(field));
    }
    this.indentDown();
    this.line('}');
  }

  private renderFunction(fn: FunctionDecl): string {
    const oneway = fn.oneway ? 'oneway ' : '';
    const args = fn.args.map((arg) => this.renderField(arg)).join(', ');
    let text = `${oneway}${typeName(fn.returnType)} ${this.formatName(fn.name)}(${args})`;
    if (fn.throws.length > 0) {
      text += ` throws (${fn.throws.map((x) => this.renderField(x)).join(', ')})`;
    }
    return text;
  }

  private renderField(field: Field): string {
    const requiredness = field.requiredness === 'default' ? '' : `${field.requiredness} `;
    let text = `${field.id}: ${requiredness}${typeName(field.type)} ${this.formatName(field.name)}`;
    if (field.defaultValue !== undefined) {
      text += ` = ${this.renderValue(field.defaultValue)}`;
    }
    return text;
  }

  private renderValue(value: ConstValue): string {
    switch (value.kind) {
      case 'integer':
        return value.value.toString();
      case 'double':
        // keep a fractional part so 1.0 does not read as an integer
        return Number.isInteger(value.value) ? value.value.toFixed(1) : String(value.value);
      case 'string':
        return `"${this.getEscapedString(value)}"`;
      case 'identifier':
        return value.value;
      case 'list':
        return `[${value.elements.map((e) => this.renderValue(e)).join(', ')}]`;
      case 'map':
        return `{${value.entries.map(([k, v]) => `${this.renderValue(k)}: ${this.renderValue(v)}`).join(', ')}}`;
    }
  }

  private formatName(name: string): string {
    switch (this.fieldNames) {
      case 'snake':
        return camelToSnake(name);
      case 'camel':
        return snakeToCamel(name);
      case 'preserve':
        return name;
    }
  }

  private writeDoc(doc: string | undefined): void {
    if (doc === undefined) return;
    this.generateDocstringComment(this.out, '/**\n', ' * ', doc, ' */\n');
  }

  private line(text: string): void {
    this.out.write(`${this.indent()}${text}\n`);
  }
}

/**
 * Create an outline backend
 */
export function createOutlineBackend(program: Program, out: OutputStream, options?: OutlineOptions): OutlineGenerator {
  return new OutlineGenerator(program, out, options);
}
