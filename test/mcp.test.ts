/**
 * MCP Server Tests
 */

import { describe, it, before, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { createMCPServer } from '../src/mcp/server.js';
import { SessionRegistry } from '../src/session/registry.js';
import { setLogLevel } from '../src/logger.js';

type ToolResult = Awaited<ReturnType<Client['callTool']>>;

function textOf(result: ToolResult): string {
  if (!('content' in result) || !Array.isArray(result.content)) {
    assert.fail('tool result has no content');
  }
  const first: unknown = result.content[0];
  if (typeof first !== 'object' || first === null || !('text' in first) || typeof first.text !== 'string') {
    assert.fail('tool result is not text');
  }
  return first.text;
}

function jsonOf(result: ToolResult): unknown {
  assert.notStrictEqual(result.isError, true, textOf(result));
  return JSON.parse(textOf(result));
}

function field(value: unknown, key: string): unknown {
  assert.ok(typeof value === 'object' && value !== null && key in value, `missing ${key}`);
  return Object.entries(value).find(([k]) => k === key)?.[1];
}

describe('MCP Server', () => {
  let registry: SessionRegistry;
  let server: Server;
  let client: Client;

  before(() => {
    setLogLevel('silent');
  });

  beforeEach(async () => {
    registry = new SessionRegistry();
    server = createMCPServer(registry);
    client = new Client({ name: 'test-client', version: '0.0.0' });

    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await server.connect(serverTransport);
    await client.connect(clientTransport);
  });

  afterEach(async () => {
    await client.close();
    registry.closeAll();
  });

  async function initialize(args: Record<string, unknown> = {}): Promise<string> {
    const result = await client.callTool({
      name: 'session_initialize',
      arguments: { samplingInterval: 1, noiseEnabled: false, noiseLevel: 0, driver: 'manual', ...args },
    });
    const id = field(jsonOf(result), 'session_id');
    assert.strictEqual(typeof id, 'string');
    return String(id);
  }

  it('should list the session tools', async () => {
    const { tools } = await client.listTools();
    assert.deepStrictEqual(
      tools.map((tool) => tool.name),
      [
        'session_initialize',
        'session_command',
        'session_tick',
        'session_snapshot',
        'session_status',
        'session_close',
      ]
    );
  });

  it('should initialize a session', async () => {
    const id = await initialize();
    assert.strictEqual(registry.size, 1);
    assert.strictEqual(registry.status(id).status, 'running');
  });

  it('should queue commands and tick manual sessions', async () => {
    const id = await initialize();

    const queued = jsonOf(
      await client.callTool({
        name: 'session_command',
        arguments: { session_id: id, command: { type: 'setpoint', tank: 'C', variable: 'level', value: 2 } },
      })
    );
    assert.deepStrictEqual(queued, { queued: 1, type: 'setpoint' });

    const ticked = jsonOf(await client.callTool({ name: 'session_tick', arguments: { session_id: id } }));
    const snapshot = field(ticked, 'snapshot');
    assert.strictEqual(field(snapshot, 'sequence'), 1);
    assert.strictEqual(field(snapshot, 'simulatedTime'), 1);
    assert.strictEqual(field(ticked, 'status'), 'running');

    const current = jsonOf(await client.callTool({ name: 'session_snapshot', arguments: { session_id: id } }));
    assert.deepStrictEqual(field(current, 'activeSetpoints'), [
      { tank: 'C', variable: 'level', value: 2, issuedAt: 0 },
    ]);
  });

  it('should return the last emitted snapshot with its noise', async () => {
    const id = await initialize({ noiseEnabled: true, noiseLevel: 0.01, noiseSeed: 3 });
    const snapshotArgs = { session_id: id, emitted: true };

    const none = jsonOf(await client.callTool({ name: 'session_snapshot', arguments: snapshotArgs }));
    assert.strictEqual(none, null);

    const ticked = jsonOf(await client.callTool({ name: 'session_tick', arguments: { session_id: id } }));
    const emitted = jsonOf(await client.callTool({ name: 'session_snapshot', arguments: snapshotArgs }));
    assert.deepStrictEqual(emitted, field(ticked, 'snapshot'));
    assert.strictEqual(field(emitted, 'noisy'), true);

    const current = jsonOf(await client.callTool({ name: 'session_snapshot', arguments: { session_id: id } }));
    assert.strictEqual(field(current, 'noisy'), false);
    assert.strictEqual(field(current, 'sequence'), 1);
  });

  it('should report status', async () => {
    const id = await initialize({ noiseEnabled: true, noiseLevel: 0.01, noiseSeed: 3 });
    const status = jsonOf(await client.callTool({ name: 'session_status', arguments: { session_id: id } }));
    assert.strictEqual(field(status, 'id'), id);
    assert.deepStrictEqual(field(status, 'noise'), { enabled: true, level: 0.01, seed: 3 });
  });

  it('should return tool errors for invalid input', async () => {
    const bad = await client.callTool({
      name: 'session_initialize',
      arguments: { samplingInterval: -1, noiseEnabled: false, noiseLevel: 0 },
    });
    assert.strictEqual(bad.isError, true);
    assert.strictEqual(textOf(bad), 'Error: Invalid session: samplingInterval must be > 0, got -1');

    const id = await initialize();
    const unknown = await client.callTool({
      name: 'session_command',
      arguments: { session_id: id, command: { type: 'explode' } },
    });
    assert.strictEqual(unknown.isError, true);
    assert.strictEqual(textOf(unknown), 'Error: Unknown command: explode');

    const missing = await client.callTool({ name: 'session_status', arguments: {} });
    assert.strictEqual(textOf(missing), 'Error: Invalid arguments: session_id parameter required');

    const tool = await client.callTool({ name: 'session_explode', arguments: {} });
    assert.strictEqual(textOf(tool), 'Error: Unknown tool: session_explode');
  });

  it('should refuse to tick timer-driven sessions', async () => {
    const id = await initialize({ driver: 'timer', samplingInterval: 60 });
    const result = await client.callTool({ name: 'session_tick', arguments: { session_id: id } });
    assert.strictEqual(result.isError, true);
    assert.strictEqual(textOf(result), `Error: session ${id} is driven by its timer`);
  });

  it('should close sessions idempotently', async () => {
    const id = await initialize();
    assert.deepStrictEqual(
      jsonOf(await client.callTool({ name: 'session_close', arguments: { session_id: id } })),
      { session_id: id, closed: true }
    );
    assert.deepStrictEqual(
      jsonOf(await client.callTool({ name: 'session_close', arguments: { session_id: id } })),
      { session_id: id, closed: false }
    );
    assert.strictEqual(registry.size, 0);
  });

  it('should expose open sessions as a resource', async () => {
    const id = await initialize();
    const { resources } = await client.listResources();
    assert.deepStrictEqual(resources.map((r) => r.uri), ['tanks://sessions']);

    const read = await client.readResource({ uri: 'tanks://sessions' });
    const content = read.contents[0];
    assert.ok('text' in content && typeof content.text === 'string');
    const sessions: unknown = JSON.parse(content.text);
    assert.ok(Array.isArray(sessions));
    assert.strictEqual(sessions.length, 1);
    assert.strictEqual(field(sessions[0], 'id'), id);
  });

  it('should close owned sessions when the connection closes', async () => {
    await initialize();
    await initialize();
    const foreign = registry.initialize({ samplingInterval: 1, noiseEnabled: false, noiseLevel: 0, driver: 'manual' });
    assert.strictEqual(registry.size, 3);

    await client.close();
    assert.strictEqual(registry.size, 1);
    assert.ok(registry.has(foreign));
  });
});
