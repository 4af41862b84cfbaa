import { test } from 'node:test';
import assert from 'node:assert/strict';
import { ContractModel } from '../src/contract/model';
import { SchemaError } from '../src/lib/errors';
import { fixtureText, loadFixtureModel } from './helpers';

test('indexes interfaces, methods, structs and enums', () => {
  const model = loadFixtureModel();

  assert.deepEqual(model.interfaceNames(), ['A', 'B', 'C']);
  assert.deepEqual(model.methodNames(), ['A.add', 'A.calc', 'A.putPerson', 'A.findPeople', 'B.echo', 'C.leaf']);
  assert.deepEqual(model.enumNames(), ['Status', 'MathOp']);

  const echo = model.lookupMethod('B.echo');
  assert.ok(echo);
  assert.equal(echo.params.length, 1);
  assert.deepEqual(echo.params[0], { name: 's', type: 'string', optional: false, isArray: false, comment: '' });
  assert.equal(echo.returns.optional, true);

  assert.equal(model.lookupMethod('B.Echo'), undefined);
  assert.equal(model.lookupStruct('Nope'), undefined);
  assert.deepEqual(
    model.lookupEnum('MathOp')?.values.map((entry) => entry.value),
    ['add', 'multiply'],
  );
});

test('resolved field set merges ancestors and lets the nearest declaration win', () => {
  const model = loadFixtureModel();
  const leaf = model.lookupStruct('Leaf');
  assert.ok(leaf);

  assert.deepEqual([...leaf.resolvedFields.keys()], ['id', 'note', 'level', 'tags']);
  assert.equal(leaf.resolvedFields.get('id')?.type, 'int');
  assert.equal(leaf.resolvedFields.get('note')?.optional, true);

  const repeat = model.lookupStruct('RepeatResponse');
  assert.deepEqual([...(repeat?.resolvedFields.keys() ?? [])], ['status', 'count', 'items']);
});

test('extends naming an unknown struct truncates the chain', () => {
  const model = loadFixtureModel();
  const orphan = model.lookupStruct('Orphan');

  assert.equal(orphan?.extends, 'Missing');
  assert.deepEqual([...(orphan?.resolvedFields.keys() ?? [])], ['value']);
});

test('empty extends is treated as no parent', () => {
  const model = loadFixtureModel();
  assert.equal(model.lookupStruct('Response')?.extends, undefined);
});

test('cyclic extends chains stop at the first revisit', () => {
  const model = ContractModel.build([
    { type: 'struct', name: 'X', extends: 'Y', fields: [{ name: 'a', type: 'int' }] },
    { type: 'struct', name: 'Y', extends: 'X', fields: [{ name: 'b', type: 'int' }] },
  ]);

  assert.deepEqual([...(model.lookupStruct('X')?.resolvedFields.keys() ?? [])], ['b', 'a']);
  assert.deepEqual([...(model.lookupStruct('Y')?.resolvedFields.keys() ?? [])], ['a', 'b']);
});

test('exposes meta with a millisecond timestamp', () => {
  const model = loadFixtureModel();

  assert.equal(model.meta?.barristerVersion, '0.1.6');
  assert.equal(model.meta?.checksum, 'test-checksum');
  assert.equal(model.meta?.dateGenerated, 1700000000000);
  assert.equal(model.meta?.generatedAt.toISOString(), '2023-11-14T22:13:20.000Z');
});

test('rawElements returns the document as received and cannot be altered by callers', () => {
  const model = loadFixtureModel();
  const expected: unknown = JSON.parse(fixtureText);

  const first = model.rawElements();
  assert.deepEqual(first, expected);

  first.pop();
  assert.deepEqual(model.rawElements(), expected);
});

test('accepts UTF-8 bytes', () => {
  const model = ContractModel.parse(Buffer.from(fixtureText, 'utf8'));
  assert.deepEqual(model.interfaceNames(), ['A', 'B', 'C']);
});

test('parsing the same bytes twice yields identical models', () => {
  assert.deepEqual(ContractModel.parse(fixtureText), ContractModel.parse(fixtureText));
});

test('undecodable JSON is a SchemaError', () => {
  assert.throws(() => ContractModel.parse('[{"type": "enum"'), SchemaError);
});

test('unknown element types are rejected', () => {
  assert.throws(
    () => ContractModel.build([{ type: 'union', name: 'Either' }]),
    (error: unknown) => error instanceof SchemaError && error.message === 'IDL document does not match the element format',
  );
});

test('validate lists every unresolved type', () => {
  const model = ContractModel.build([
    { type: 'struct', name: 'Holder', fields: [{ name: 'ghost', type: 'Ghost' }] },
    {
      type: 'interface',
      name: 'Z',
      functions: [{ name: 'f', params: [], returns: { name: '', type: 'Phantom' } }],
    },
  ]);

  assert.throws(
    () => model.validate(),
    (error: unknown) =>
      error instanceof SchemaError &&
      error.message ===
        'IDL references unknown types: Holder.ghost: unknown type "Ghost"; Z.f return value: unknown type "Phantom"',
  );
  assert.doesNotThrow(() => loadFixtureModel().validate());
});
