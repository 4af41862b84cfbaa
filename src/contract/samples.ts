import { SchemaError } from '../lib/errors';
import type { ContractModel, FieldDescriptor } from './model';

/**
 * Builds a deterministic value that conforms to the field's IDL type. Used at
 * registration time to exercise a handler's declared representations.
 *
 * A struct that reaches itself again through an optional or array field stops
 * there with null or an empty array.
 */
export function sampleValue(model: ContractModel, field: FieldDescriptor, activeStructs: ReadonlySet<string> = new Set()): unknown {
  if (field.isArray) {
    if (activeStructs.has(field.type)) {
      return [];
    }
    return [sampleValue(model, { ...field, isArray: false }, activeStructs)];
  }

  switch (field.type) {
    case 'string':
      return 'testval';
    case 'int':
      return 99;
    case 'float':
      return 10.3;
    case 'bool':
      return true;
  }

  const struct = model.lookupStruct(field.type);
  if (struct) {
    if (activeStructs.has(struct.name)) {
      if (field.optional) {
        return null;
      }
      throw new SchemaError(`Struct ${struct.name} requires itself through field "${field.name}"`);
    }
    const nested = new Set(activeStructs).add(struct.name);
    const value: Record<string, unknown> = {};
    for (const member of struct.resolvedFields.values()) {
      value[member.name] = sampleValue(model, member, nested);
    }
    return value;
  }

  const enumDefinition = model.lookupEnum(field.type);
  if (enumDefinition) {
    const [first] = enumDefinition.values;
    if (!first) {
      throw new SchemaError(`Enum ${enumDefinition.name} declares no values`);
    }
    return first.value;
  }

  throw new SchemaError(`Unable to create a sample value for field "${field.name}" of type "${field.type}"`);
}
