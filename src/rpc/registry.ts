import { ValueConverter } from '../contract/converter';
import type { ContractModel, FieldDescriptor } from '../contract/model';
import type { Representation } from '../contract/representation';
import { sampleValue } from '../contract/samples';
import { isConversionError, RegistrationError } from '../lib/errors';
import { componentLogger } from '../logging/logger';
import type { HandlerBinding, MethodBinding } from './types';

const log = componentLogger('handler-registry');

export function capitalize(name: string): string {
  return name.length > 0 ? name[0].toUpperCase() + name.slice(1) : name;
}

/**
 * Interface name to handler binding. Every registration is checked against
 * the IDL up front; once sealed, the registry is read-only.
 */
export class HandlerRegistry {
  private readonly handlers = new Map<string, ReadonlyMap<string, MethodBinding>>();
  private readonly converter: ValueConverter;
  private sealed = false;

  constructor(private readonly model: ContractModel) {
    this.converter = new ValueConverter(model);
  }

  public register(interfaceName: string, binding: HandlerBinding): this {
    if (this.sealed) {
      throw new RegistrationError(`Cannot register ${interfaceName}: registry is sealed and serving requests`);
    }

    const rpcInterface = this.model.lookupInterface(interfaceName);
    if (!rpcInterface) {
      throw new RegistrationError(`IDL has no interface: ${interfaceName}`);
    }

    const callables = new Map(Object.entries(binding));
    for (const fn of rpcInterface.functions) {
      const callableName = capitalize(fn.name);
      const bound = callables.get(callableName);
      if (!bound) {
        throw new RegistrationError(`${interfaceName} handler has no method named: ${callableName}`);
      }

      const location = `${interfaceName}.${callableName}`;
      if (bound.params.length !== fn.params.length) {
        throw new RegistrationError(
          `${location} accepts ${bound.params.length} params but IDL specifies ${fn.params.length}`,
        );
      }
      if (bound.callable.length > bound.params.length) {
        throw new RegistrationError(
          `${location} callable requires ${bound.callable.length} arguments but declares ${bound.params.length} params`,
        );
      }

      fn.params.forEach((param, index) => {
        this.verify(param, bound.params[index], `${location} param[${index}]`);
      });
      this.verify(fn.returns, bound.returns, `${location} return value`);
    }

    if (this.handlers.has(interfaceName)) {
      log.warn({ interfaceName }, 'Replacing existing handler registration');
    }
    this.handlers.set(interfaceName, callables);
    log.debug({ interfaceName, functions: rpcInterface.functions.length }, 'Registered handler');
    return this;
  }

  public get(interfaceName: string): ReadonlyMap<string, MethodBinding> | undefined {
    return this.handlers.get(interfaceName);
  }

  public has(interfaceName: string): boolean {
    return this.handlers.has(interfaceName);
  }

  public interfaceNames(): string[] {
    return [...this.handlers.keys()];
  }

  /** Marks the start of serving; later registrations fail. */
  public seal(): void {
    this.sealed = true;
  }

  public isSealed(): boolean {
    return this.sealed;
  }

  private verify(field: FieldDescriptor, representation: Representation, location: string): void {
    const sample = sampleValue(this.model, field);
    try {
      this.converter.convert(field, representation, sample, location);
    } catch (error) {
      if (isConversionError(error)) {
        throw new RegistrationError(`Handler does not match IDL at ${error.message}`, { path: error.path });
      }
      throw error;
    }
  }
}
