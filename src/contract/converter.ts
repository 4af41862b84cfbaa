import { ConversionError, SchemaError } from '../lib/errors';
import type { ContractModel, FieldDescriptor, StructDefinition, EnumDefinition } from './model';
import { isPrimitiveType } from './model';
import { describeRepresentation, representationOf, type Representation, type StructRecord } from './representation';

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function describeValue(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  if (typeof value === 'number') return Number.isInteger(value) ? 'integer' : `number ${value}`;
  return typeof value;
}

function joinPath(path: string, segment: string): string {
  return path ? `${path}.${segment}` : segment;
}

/**
 * Converts dynamic (decoded JSON) values into values shaped by a handler's
 * declared representation, checking them against the IDL on the way.
 *
 * Ordinary mismatches throw ConversionError with the offending path. A type name
 * the IDL cannot resolve throws SchemaError: that is a broken contract, not a bad request.
 */
export class ValueConverter {
  constructor(private readonly model: ContractModel) {}

  public convert(field: FieldDescriptor, representation: Representation, value: unknown, path = ''): unknown {
    if (field.optional && representation.kind !== 'optional') {
      const declared = field.isArray ? `${field.type}[]` : field.type;
      throw new ConversionError(path, `IDL declares optional ${declared} but target is ${describeRepresentation(representation)}`);
    }
    const target = representation.kind === 'optional' ? representation.inner : representation;

    if (value === null || value === undefined) {
      if (field.optional) {
        return null;
      }
      throw new ConversionError(path, `required value for "${field.name}" is missing`);
    }

    if (field.isArray) {
      if (target.kind !== 'array') {
        throw new ConversionError(path, `IDL declares ${field.type}[] but target is ${describeRepresentation(target)}`);
      }
      if (!Array.isArray(value)) {
        throw new ConversionError(path, `expected an array, got ${describeValue(value)}`);
      }
      const elementField: FieldDescriptor = { ...field, isArray: false, optional: false };
      return value.map((item: unknown, index) =>
        this.convert(elementField, target.element, item, `${path}[${index}]`),
      );
    }

    if (target.kind === 'array') {
      throw new ConversionError(path, `target is ${describeRepresentation(target)} but IDL declares a single ${field.type}`);
    }

    if (isPrimitiveType(field.type)) {
      if (target.kind !== field.type) {
        throw new ConversionError(path, `IDL declares ${field.type} but target is ${describeRepresentation(target)}`);
      }
      return this.convertPrimitive(field.type, value, path);
    }

    const struct = this.model.lookupStruct(field.type);
    if (struct) {
      if (target.kind !== 'struct' || target.name !== struct.name) {
        throw new ConversionError(path, `IDL declares struct ${struct.name} but target is ${describeRepresentation(target)}`);
      }
      return this.convertStruct(struct, value, path);
    }

    const enumDefinition = this.model.lookupEnum(field.type);
    if (enumDefinition) {
      if (target.kind !== 'enum' || target.name !== enumDefinition.name) {
        throw new ConversionError(path, `IDL declares enum ${enumDefinition.name} but target is ${describeRepresentation(target)}`);
      }
      return this.convertEnum(enumDefinition, value, path);
    }

    throw new SchemaError(`${path || field.name}: type "${field.type}" is not a primitive, struct or enum in the IDL`);
  }

  private convertPrimitive(type: string, value: unknown, path: string): string | number | boolean {
    switch (type) {
      case 'string':
        if (typeof value === 'string') return value;
        break;
      case 'int':
        if (typeof value === 'number' && Number.isInteger(value)) return value;
        break;
      case 'float':
        if (typeof value === 'number' && Number.isFinite(value)) return value;
        break;
      case 'bool':
        if (typeof value === 'boolean') return value;
        break;
    }
    throw new ConversionError(path, `expected ${type}, got ${describeValue(value)}`);
  }

  private convertStruct(struct: StructDefinition, value: unknown, path: string): StructRecord {
    if (!isRecord(value)) {
      throw new ConversionError(path, `expected struct ${struct.name}, got ${describeValue(value)}`);
    }

    // Keys the struct does not declare are dropped.
    const record: StructRecord = {};
    for (const field of struct.resolvedFields.values()) {
      const entry = Object.prototype.hasOwnProperty.call(value, field.name) ? value[field.name] : null;
      record[field.name] = this.convert(field, representationOf(this.model, field), entry, joinPath(path, field.name));
    }
    return record;
  }

  private convertEnum(definition: EnumDefinition, value: unknown, path: string): string {
    if (typeof value !== 'string') {
      throw new ConversionError(path, `expected enum ${definition.name}, got ${describeValue(value)}`);
    }
    if (!definition.values.some((entry) => entry.value === value)) {
      const allowed = definition.values.map((entry) => entry.value).join(', ');
      throw new ConversionError(path, `"${value}" is not a value of enum ${definition.name} (allowed: ${allowed})`);
    }
    return value;
  }
}
