import { readFileSync } from 'node:fs';
import path from 'node:path';
import { ContractModel } from '../src/contract/model';
import { t } from '../src/contract/representation';
import { JsonRpcError } from '../src/lib/errors';
import { method } from '../src/rpc/types';

export const fixtureText = readFileSync(path.join(__dirname, 'fixtures', 'contract.json'), 'utf8');

export function loadFixtureModel(): ContractModel {
  return ContractModel.parse(fixtureText);
}

export type Person = {
  name: string;
  email: string | null;
  status: 'ok' | 'err';
};

export const bHandler = {
  Echo: method([t.string()], t.optional(t.string()), (s) => (s === 'return-null' ? null : s)),
};

export const aHandler = {
  Add: method([t.int(), t.int()], t.int(), (a, b) => {
    if (a === 13) {
      // Plain object in the RPC error shape.
      throw { code: -32050, message: 'unlucky operand' };
    }
    if (a === 666) {
      throw new Error('database exploded');
    }
    return a + b;
  }),
  Calc: method([t.array(t.float()), t.enum<'add' | 'multiply'>('MathOp')], t.float(), (nums, operation) => {
    if (nums.length === 0) {
      throw new JsonRpcError('nothing to calculate', { rpcCode: 1001, rpcData: { reason: 'empty' } });
    }
    return operation === 'add' ? nums.reduce((sum, n) => sum + n, 0) : nums.reduce((product, n) => product * n, 1);
  }),
  PutPerson: method([t.struct<Person>('Person')], t.struct<Person>('Person'), async (person) => {
    const echoed = { ...person, nickname: 'not in the IDL' };
    return echoed;
  }),
  // Hand-written binding: the callable is free to return something off-contract.
  FindPeople: {
    params: [t.optional(t.enum('Status'))],
    returns: t.array(t.struct('Person')),
    callable: (status: string | null) => {
      if (status === 'err') {
        return [{ name: 5, email: null, status: 'err' }];
      }
      return [
        { name: 'Ann', email: null, status: 'ok' },
        { name: 'Bob', email: 'bob@example.test', status: 'ok' },
      ];
    },
  },
};
