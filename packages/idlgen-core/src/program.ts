/**
 * Declaration tree interfaces
 *
 * The parser builds one Program per IDL source file and validates it before any
 * generator sees it. Generators only read these structures.
 */

/**
 * Primitive type names
 */
export type BaseTypeName =
  | 'void'
  | 'string'
  | 'binary'
  | 'bool'
  | 'byte'
  | 'i16'
  | 'i32'
  | 'i64'
  | 'double';

export interface BaseType {
  readonly kind: 'base';
  readonly name: BaseTypeName;
}

export interface ListType {
  readonly kind: 'list';
  readonly elemType: IdlType;
}

export interface SetType {
  readonly kind: 'set';
  readonly elemType: IdlType;
}

export interface MapType {
  readonly kind: 'map';
  readonly keyType: IdlType;
  readonly valType: IdlType;
}

/**
 * Named alias of another type. The aliased type may itself be a typedef.
 */
export interface Typedef {
  readonly kind: 'typedef';
  readonly name: string;
  readonly type: IdlType;
  readonly doc?: string;
}

export interface EnumValue {
  readonly name: string;
  readonly value: number;
  readonly doc?: string;
}

export interface EnumDecl {
  readonly kind: 'enum';
  readonly name: string;
  readonly values: readonly EnumValue[];
  readonly doc?: string;
}

export type Requiredness = 'required' | 'optional' | 'default';

export interface Field {
  readonly id: number;
  readonly name: string;
  readonly type: IdlType;
  readonly requiredness: Requiredness;
  readonly defaultValue?: ConstValue;
  readonly doc?: string;
}

/**
 * Structures, unions and exceptions share one shape
 */
export interface StructDecl {
  readonly kind: 'struct';
  readonly name: string;
  readonly members: readonly Field[];
  readonly isException: boolean;
  readonly isUnion: boolean;
  readonly doc?: string;
}

export type IdlType =
  | BaseType
  | ListType
  | SetType
  | MapType
  | Typedef
  | EnumDecl
  | StructDecl;

export type ConstValue =
  | { readonly kind: 'integer'; readonly value: bigint }
  | { readonly kind: 'double'; readonly value: number }
  | { readonly kind: 'string'; readonly value: string }
  | { readonly kind: 'identifier'; readonly value: string }
  | { readonly kind: 'list'; readonly elements: readonly ConstValue[] }
  | { readonly kind: 'map'; readonly entries: readonly (readonly [ConstValue, ConstValue])[] };

export interface ConstDecl {
  readonly name: string;
  readonly type: IdlType;
  readonly value: ConstValue;
  readonly doc?: string;
}

export interface FunctionDecl {
  readonly name: string;
  readonly returnType: IdlType;
  readonly args: readonly Field[];
  readonly throws: readonly Field[];
  readonly oneway: boolean;
  readonly doc?: string;
}

export interface ServiceDecl {
  readonly kind: 'service';
  readonly name: string;
  readonly functions: readonly FunctionDecl[];
  readonly extends?: ServiceDecl;
  readonly doc?: string;
}

/**
 * Program - one parsed IDL file
 *
 * Every collection keeps source order.
 */
export interface Program {
  readonly name: string;
  /** Root under which backends place their output directories */
  readonly outPath: string;
  /** Target tag -> namespace declared for that target */
  readonly namespaces: Readonly<Record<string, string>>;
  readonly typedefs: readonly Typedef[];
  readonly enums: readonly EnumDecl[];
  readonly consts: readonly ConstDecl[];
  readonly structs: readonly StructDecl[];
  readonly exceptions: readonly StructDecl[];
  readonly services: readonly ServiceDecl[];
  readonly doc?: string;
}

export type ProgramParts = Partial<Omit<Program, 'name' | 'outPath'>>;

export function baseType(name: BaseTypeName): BaseType {
  return { kind: 'base', name };
}

export function isTypedef(type: IdlType): type is Typedef {
  return type.kind === 'typedef';
}

/**
 * Build a Program, filling any collection not given with an empty one
 */
export function createProgram(name: string, outPath: string, parts: ProgramParts = {}): Program {
  return {
    name,
    outPath,
    namespaces: parts.namespaces ?? {},
    typedefs: parts.typedefs ?? [],
    enums: parts.enums ?? [],
    consts: parts.consts ?? [],
    structs: parts.structs ?? [],
    exceptions: parts.exceptions ?? [],
    services: parts.services ?? [],
    ...(parts.doc !== undefined ? { doc: parts.doc } : {}),
  };
}
