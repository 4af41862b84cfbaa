import { t } from '../contract/representation';
import { JsonRpcError } from '../lib/errors';
import type { HandlerRegistry } from '../rpc/registry';
import { method } from '../rpc/types';

type Status = 'ok' | 'err';
type MathOp = 'add' | 'multiply';

type RepeatRequest = {
  to_repeat: string;
  count: number;
  force_uppercase: boolean;
};

type RepeatResponse = {
  status: Status;
  count: number;
  items: string[];
};

export const NEGATIVE_SQRT_CODE = 1001;

export const calculatorHandler = {
  Add: method([t.int(), t.int()], t.int(), (a, b) => a + b),
  Calc: method([t.array(t.float()), t.enum<MathOp>('MathOp')], t.float(), (nums, operation) =>
    operation === 'add' ? nums.reduce((sum, n) => sum + n, 0) : nums.reduce((product, n) => product * n, 1),
  ),
  Sqrt: method([t.float()], t.float(), (x) => {
    if (x < 0) {
      throw new JsonRpcError(`Cannot take the square root of ${x}`, { rpcCode: NEGATIVE_SQRT_CODE });
    }
    return Math.sqrt(x);
  }),
};

export const echoHandler = {
  Echo: method([t.string()], t.optional(t.string()), (s) => (s === 'return-null' ? null : s)),
  Repeat: method(
    [t.struct<RepeatRequest>('RepeatRequest')],
    t.struct<RepeatResponse>('RepeatResponse'),
    async (req): Promise<RepeatResponse> => {
      const text = req.force_uppercase ? req.to_repeat.toUpperCase() : req.to_repeat;
      const items = Array.from({ length: Math.max(0, req.count) }, () => text);
      return { status: 'ok', count: items.length, items };
    },
  ),
};

export function registerSampleHandlers(registry: HandlerRegistry): HandlerRegistry {
  return registry.register('Calculator', calculatorHandler).register('Echo', echoHandler);
}
