import type { ContractModel, FieldDescriptor, PrimitiveType } from './model';
import { isPrimitiveType } from './model';
import { SchemaError } from '../lib/errors';

/**
 * The shape a handler declares for one of its parameters or its return value.
 * Values arriving off the wire are converted to match it.
 */
export type Representation =
  | { readonly kind: PrimitiveType }
  | { readonly kind: 'struct'; readonly name: string }
  | { readonly kind: 'enum'; readonly name: string }
  | { readonly kind: 'array'; readonly element: Representation }
  | { readonly kind: 'optional'; readonly inner: Representation };

/** A representation carrying the TypeScript type of the values it produces. */
export type Typed<T> = Representation & { readonly __output?: T };

export type Infer<R> = R extends { readonly __output?: infer T } ? T : never;

export type StructRecord = Record<string, unknown>;

export const t = {
  string: (): Typed<string> => ({ kind: 'string' }),
  int: (): Typed<number> => ({ kind: 'int' }),
  float: (): Typed<number> => ({ kind: 'float' }),
  bool: (): Typed<boolean> => ({ kind: 'bool' }),
  struct: <T extends StructRecord = StructRecord>(name: string): Typed<T> => ({ kind: 'struct', name }),
  enum: <T extends string = string>(name: string): Typed<T> => ({ kind: 'enum', name }),
  array: <T>(element: Typed<T>): Typed<T[]> => ({ kind: 'array', element }),
  optional: <T>(inner: Typed<T>): Typed<T | null> => ({ kind: 'optional', inner }),
};

/** The representation a generated binding would use for the descriptor. */
export function representationOf(model: ContractModel, field: FieldDescriptor): Representation {
  let element: Representation;
  if (isPrimitiveType(field.type)) {
    element = { kind: field.type };
  } else if (model.lookupStruct(field.type)) {
    element = { kind: 'struct', name: field.type };
  } else if (model.lookupEnum(field.type)) {
    element = { kind: 'enum', name: field.type };
  } else {
    throw new SchemaError(`Field "${field.name}" has unknown type "${field.type}"`);
  }

  const shaped: Representation = field.isArray ? { kind: 'array', element } : element;
  return field.optional ? { kind: 'optional', inner: shaped } : shaped;
}

export function describeRepresentation(representation: Representation): string {
  switch (representation.kind) {
    case 'array':
      return `${describeRepresentation(representation.element)}[]`;
    case 'optional':
      return `${describeRepresentation(representation.inner)} | null`;
    case 'struct':
    case 'enum':
      return `${representation.kind} ${representation.name}`;
    default:
      return representation.kind;
  }
}
