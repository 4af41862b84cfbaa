import { test } from 'node:test';
import assert from 'node:assert/strict';
import path from 'node:path';
import { JsonRpcError } from '../src/lib/errors';
import { RpcClient } from '../src/rpc/client';
import type { Transport } from '../src/rpc/transport';
import { InProcessTransport } from '../src/rpc/transport';
import { registerSampleHandlers } from '../src/sample/handlers';
import { loadServer } from '../src/server';

const sampleIdl = path.join(__dirname, '..', 'idl', 'sample.json');

function sequentialIds(prefix = 'id'): () => string {
  let counter = 0;
  return () => `${prefix}-${++counter}`;
}

class RecordingTransport implements Transport {
  public readonly sent: string[] = [];

  constructor(private readonly reply: (payload: string) => string) {}

  public async send(payload: string): Promise<string> {
    this.sent.push(payload);
    return this.reply(payload);
  }
}

class FailingTransport implements Transport {
  public async send(): Promise<string> {
    throw new Error('socket closed');
  }
}

function rpcFailure(code: number, message?: string | RegExp) {
  return (error: unknown) => {
    if (!(error instanceof JsonRpcError) || error.rpcCode !== code) {
      return false;
    }
    if (message === undefined) {
      return true;
    }
    return typeof message === 'string' ? error.message === message : message.test(error.message);
  };
}

async function inProcessClient() {
  const server = await loadServer(sampleIdl, { register: registerSampleHandlers });
  const client = new RpcClient(new InProcessTransport(server.dispatcher), { idGenerator: sequentialIds() });
  return { server, client };
}

test('call round-trips through an in-process dispatcher', async () => {
  const { client } = await inProcessClient();

  assert.equal(await client.call('Calculator.add', 2, 3), 5);
  assert.equal(await client.call('Calculator.calc', [1.5, 2], 'multiply'), 3);
  assert.equal(await client.call('Echo.echo', 'return-null'), null);
});

test('error responses reject with the server code and message', async () => {
  const { client } = await inProcessClient();

  await assert.rejects(client.call('Calculator.sqrt', -4), rpcFailure(1001, 'Cannot take the square root of -4'));
  await assert.rejects(client.call('Calculator.nope'), rpcFailure(-32601, 'Unsupported method: Calculator.nope'));
});

test('requests carry the version, a generated id and positional params', async () => {
  const transport = new RecordingTransport(() => '{"jsonrpc":"2.0","id":"req-1","result":42}');
  const client = new RpcClient(transport, { idGenerator: () => 'req-1' });

  assert.equal(await client.call('Calculator.add', 1, 2), 42);
  assert.deepEqual(transport.sent, ['{"jsonrpc":"2.0","id":"req-1","method":"Calculator.add","params":[1,2]}']);
});

test('a response without result or error resolves to null', async () => {
  const client = new RpcClient(new RecordingTransport(() => '{"jsonrpc":"2.0","id":"x"}'));
  assert.equal(await client.call('Echo.echo', 'hi'), null);
});

test('transport failures are internal errors naming the method', async () => {
  const client = new RpcClient(new FailingTransport());

  await assert.rejects(
    client.call('Calculator.add', 1, 2),
    rpcFailure(-32603, 'Calculator.add: transport error during request: socket closed'),
  );
});

test('undecodable and malformed responses are internal errors', async () => {
  const garbled = new RpcClient(new RecordingTransport(() => 'not json'));
  await assert.rejects(
    garbled.call('Calculator.add', 1, 2),
    rpcFailure(-32603, /^Calculator\.add: unable to decode response: /),
  );

  const scalar = new RpcClient(new RecordingTransport(() => '42'));
  await assert.rejects(
    scalar.call('Calculator.add', 1, 2),
    rpcFailure(-32603, 'Calculator.add: response is not a JSON-RPC response'),
  );
});

test('params that cannot be encoded never reach the transport', async () => {
  const transport = new RecordingTransport(() => '{}');
  const client = new RpcClient(transport);

  await assert.rejects(
    client.call('Calculator.add', BigInt(1), 2),
    rpcFailure(-32600, /^Calculator\.add: unable to encode request: /),
  );
  assert.equal(transport.sent.length, 0);
});

test('callBatch returns responses in request order', async () => {
  const { client } = await inProcessClient();

  const responses = await client.callBatch([
    { method: 'Calculator.add', params: [1, 2] },
    { method: 'Echo.nope' },
    { id: 'mine', method: 'Echo.echo', params: ['hi'] },
  ]);

  assert.deepEqual(responses, [
    { jsonrpc: '2.0', id: 'id-1', result: 3 },
    { jsonrpc: '2.0', id: 'id-2', error: { code: -32601, message: 'Unsupported method: Echo.nope' } },
    { jsonrpc: '2.0', id: 'mine', result: 'hi' },
  ]);
});

test('callBatch wraps a single envelope answering the whole batch', async () => {
  const transport = new RecordingTransport(
    () => '{"jsonrpc":"2.0","id":null,"error":{"code":-32700,"message":"Unable to parse JSON"}}',
  );
  const client = new RpcClient(transport, { idGenerator: () => 'req-1' });

  assert.deepEqual(await client.callBatch([{ method: 'Echo.echo', params: ['hi'] }]), [
    { jsonrpc: '2.0', id: null, error: { code: -32700, message: 'Unable to parse JSON' } },
  ]);
});

test('callBatch reports a transport failure as a single error response', async () => {
  const client = new RpcClient(new FailingTransport());

  assert.deepEqual(await client.callBatch([{ method: 'Calculator.add', params: [1, 2] }]), [
    {
      jsonrpc: '2.0',
      id: null,
      error: { code: -32603, message: 'batch: transport error during request: socket closed' },
    },
  ]);
});

test('fetchContract rebuilds the server model from introspection', async () => {
  const { client, server } = await inProcessClient();
  const contract = await client.fetchContract();

  assert.deepEqual(contract.interfaceNames(), ['Calculator', 'Echo']);
  assert.equal(contract.meta?.checksum, 'sample-contract-checksum');
  assert.deepEqual(contract.rawElements(), server.model.rawElements());
});

test('interface proxies convert results through the IDL', async () => {
  const { client, server } = await inProcessClient();
  const echo = client.proxy(server.model, 'Echo');

  assert.deepEqual(await echo.call('repeat', { to_repeat: 'hi', count: 2, force_uppercase: true }), {
    status: 'ok',
    count: 2,
    items: ['HI', 'HI'],
  });
  assert.equal(await echo.call('echo', 'return-null'), null);
  await assert.rejects(echo.call('nope'), rpcFailure(-32601, 'Unsupported method: Echo.nope'));
});

test('interface proxies reject results the IDL does not allow', async () => {
  const { server } = await inProcessClient();
  const client = new RpcClient(new RecordingTransport(() => '{"jsonrpc":"2.0","id":"x","result":"five"}'));

  await assert.rejects(
    client.proxy(server.model, 'Calculator').call('add', 2, 3),
    rpcFailure(-32000, 'Calculator.add returned invalid type: result: expected int, got string'),
  );
});
