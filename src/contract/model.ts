import { z } from 'zod';
import {
  SchemaDocumentSchema,
  type EnumValueElement,
  type FieldElement,
  type SchemaElement,
} from './elements';
import { decodeText } from '../lib/encoding';
import { SchemaError } from '../lib/errors';

const RawDocumentSchema = z.array(z.unknown());

export const PRIMITIVE_TYPES = ['string', 'int', 'float', 'bool'] as const;

export type PrimitiveType = (typeof PRIMITIVE_TYPES)[number];

export function isPrimitiveType(type: string): type is PrimitiveType {
  return (PRIMITIVE_TYPES as readonly string[]).includes(type);
}

export interface FieldDescriptor {
  readonly name: string;
  readonly type: string;
  readonly optional: boolean;
  readonly isArray: boolean;
  readonly comment: string;
}

export interface RpcFunction {
  readonly name: string;
  readonly comment: string;
  readonly params: readonly FieldDescriptor[];
  readonly returns: FieldDescriptor;
}

export interface RpcInterface {
  readonly name: string;
  readonly comment: string;
  readonly functions: readonly RpcFunction[];
}

export interface StructDefinition {
  readonly name: string;
  readonly extends?: string;
  readonly comment: string;
  readonly fields: readonly FieldDescriptor[];
  /** Own and inherited fields by name; the declaration nearest the struct wins. */
  readonly resolvedFields: ReadonlyMap<string, FieldDescriptor>;
}

export interface EnumDefinition {
  readonly name: string;
  readonly comment: string;
  readonly values: readonly EnumValueElement[];
}

export interface ContractMeta {
  readonly barristerVersion: string;
  /** Milliseconds since the epoch, as written by the IDL generator. */
  readonly dateGenerated: number;
  readonly generatedAt: Date;
  readonly checksum: string;
}

type MutableStruct = Omit<StructDefinition, 'resolvedFields'>;

function toFieldDescriptor(field: FieldElement): FieldDescriptor {
  return {
    name: field.name,
    type: field.type,
    optional: field.optional,
    isArray: field.is_array,
    comment: field.comment,
  };
}

/**
 * Parsed, indexed form of an IDL document. Built once and never mutated
 * afterwards, so a single instance can back any number of in-flight calls.
 */
export class ContractModel {
  public readonly meta?: ContractMeta;

  private readonly interfaces = new Map<string, RpcInterface>();
  private readonly methods = new Map<string, RpcFunction>();
  private readonly structs = new Map<string, StructDefinition>();
  private readonly enums = new Map<string, EnumDefinition>();

  private constructor(
    private readonly raw: readonly unknown[],
    elements: readonly SchemaElement[],
  ) {
    const declaredStructs = new Map<string, MutableStruct>();
    let meta: ContractMeta | undefined;

    for (const element of elements) {
      switch (element.type) {
        case 'meta':
          meta = {
            barristerVersion: element.barrister_version,
            dateGenerated: element.date_generated,
            generatedAt: new Date(element.date_generated),
            checksum: element.checksum,
          };
          break;
        case 'interface': {
          const functions = element.functions.map<RpcFunction>((fn) => ({
            name: fn.name,
            comment: fn.comment,
            params: fn.params.map(toFieldDescriptor),
            returns: toFieldDescriptor(fn.returns),
          }));
          for (const fn of functions) {
            this.methods.set(`${element.name}.${fn.name}`, fn);
          }
          this.interfaces.set(element.name, { name: element.name, comment: element.comment, functions });
          break;
        }
        case 'struct':
          declaredStructs.set(element.name, {
            name: element.name,
            extends: element.extends,
            comment: element.comment,
            fields: element.fields.map(toFieldDescriptor),
          });
          break;
        case 'enum':
          this.enums.set(element.name, { name: element.name, comment: element.comment, values: element.values });
          break;
        case 'comment':
          break;
      }
    }

    for (const struct of declaredStructs.values()) {
      this.structs.set(struct.name, { ...struct, resolvedFields: resolveFields(struct, declaredStructs) });
    }
    this.meta = meta;
  }

  /** Decodes IDL JSON text (or its UTF-8 bytes) into a model. */
  public static parse(input: string | Uint8Array): ContractModel {
    let decoded: unknown;
    try {
      decoded = JSON.parse(decodeText(input));
    } catch (error) {
      throw new SchemaError(`Unable to parse IDL JSON: ${(error as Error).message}`);
    }
    return ContractModel.build(decoded);
  }

  public static build(elements: unknown): ContractModel {
    const result = SchemaDocumentSchema.safeParse(elements);
    if (!result.success) {
      throw new SchemaError('IDL document does not match the element format', result.error.issues);
    }
    // Input is JSON data; keep a private copy so callers cannot alter what introspection reports.
    const raw = RawDocumentSchema.parse(structuredClone(elements));
    return new ContractModel(raw, result.data);
  }

  public rawElements(): unknown[] {
    return structuredClone([...this.raw]);
  }

  public lookupMethod(qualifiedName: string): RpcFunction | undefined {
    return this.methods.get(qualifiedName);
  }

  public lookupInterface(name: string): RpcInterface | undefined {
    return this.interfaces.get(name);
  }

  public lookupStruct(name: string): StructDefinition | undefined {
    return this.structs.get(name);
  }

  public lookupEnum(name: string): EnumDefinition | undefined {
    return this.enums.get(name);
  }

  public interfaceNames(): string[] {
    return [...this.interfaces.keys()];
  }

  public methodNames(): string[] {
    return [...this.methods.keys()];
  }

  public structNames(): string[] {
    return [...this.structs.keys()];
  }

  public enumNames(): string[] {
    return [...this.enums.keys()];
  }

  /**
   * Checks that every referenced type name resolves. Throws a single
   * SchemaError listing each offending location.
   */
  public validate(): void {
    const problems: string[] = [];
    const check = (location: string, field: FieldDescriptor) => {
      if (!isPrimitiveType(field.type) && !this.structs.has(field.type) && !this.enums.has(field.type)) {
        problems.push(`${location}: unknown type "${field.type}"`);
      }
    };

    for (const struct of this.structs.values()) {
      for (const field of struct.fields) {
        check(`${struct.name}.${field.name}`, field);
      }
    }
    for (const [qualifiedName, fn] of this.methods) {
      fn.params.forEach((param, index) => check(`${qualifiedName} param[${index}]`, param));
      check(`${qualifiedName} return value`, fn.returns);
    }

    if (problems.length > 0) {
      throw new SchemaError(`IDL references unknown types: ${problems.join('; ')}`, problems);
    }
  }
}

function resolveFields(
  struct: MutableStruct,
  declared: ReadonlyMap<string, MutableStruct>,
): ReadonlyMap<string, FieldDescriptor> {
  // Collect the chain nearest-first; unknown parents and cycles end it.
  const chain: MutableStruct[] = [];
  const seen = new Set<string>();
  let current: MutableStruct | undefined = struct;
  while (current && !seen.has(current.name)) {
    chain.push(current);
    seen.add(current.name);
    current = current.extends ? declared.get(current.extends) : undefined;
  }

  const resolved = new Map<string, FieldDescriptor>();
  for (const member of chain.reverse()) {
    for (const field of member.fields) {
      resolved.set(field.name, field);
    }
  }
  return resolved;
}
