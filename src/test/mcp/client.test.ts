/**
 * MCP Client Tests
 *
 * Several scripted servers behind one client: aggregate indices, routing,
 * purging on disconnect, and notification fan-out.
 */
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { MCPClient } from '../../main/mcp/MCPClient';
import { MCPConnectError } from '../../main/mcp/protocol/errors';
import { DEFAULT_MCP_SETTINGS, type MCPServerState } from '../../shared/types/mcp';
import { ServerFarm } from '../mocks/mockTransport';
import { loggedMessages, memoryServerConfig, settle, waitFor } from '../helpers/testUtils';

describe('MCPClient', () => {
  let farm: ServerFarm;
  let client: MCPClient;

  beforeEach(() => {
    farm = new ServerFarm({
      fs: {
        serverInfo: { name: 'files', version: '1.0.0' },
        tools: [{ name: 'read_file' }, { name: 'write_file' }],
        resources: [{ uri: 'file:///notes.txt', name: 'notes' }],
        prompts: [{ name: 'summarize', arguments: [{ name: 'topic', required: true }] }],
      },
      mirror: { tools: [{ name: 'read_file', description: 'mirror copy' }] },
      prompter: { prompts: [{ name: 'greet' }] },
    });
    client = new MCPClient({ transportFactory: farm.factory, connectTimeout: 50 });
  });

  afterEach(async () => {
    await client.shutdown();
    await farm.closeAll();
    expect(farm.handshakeErrors).toEqual([]);
  });

  describe('connectServer', () => {
    it('should index everything the server advertised', async () => {
      const connected = vi.fn();
      client.on('serverConnected', connected);

      await client.connectServer('fs', memoryServerConfig());

      expect(client.listConnectedServers()).toEqual(['fs']);
      expect(client.listTools()).toEqual(['fs:read_file', 'fs:write_file']);
      expect(client.listResources()).toEqual(['fs:file:///notes.txt']);
      expect(client.listPrompts()).toEqual(['fs:summarize']);
      expect(connected).toHaveBeenCalledTimes(1);
      const [serverName, state] = connected.mock.calls[0];
      expect(serverName).toBe('fs');
      expect(state).toMatchObject({ serverName: 'fs', state: 'ready', toolCount: 2, resourceCount: 1, promptCount: 1 });
    });

    it('should reject and register nothing when the handshake never completes', async () => {
      const connected = vi.fn();
      client.on('serverConnected', connected);

      await expect(client.connectServer('silent', memoryServerConfig())).rejects.toMatchObject({
        kind: 'ConnectFailed',
        message: 'Failed to connect to "silent": Request timeout for initialize after 50ms',
      });
      expect(client.getServerState('silent')).toBeUndefined();
      expect(client.listConnectedServers()).toEqual([]);
      expect(connected).not.toHaveBeenCalled();
    });

    it('should turn a transport factory failure into a connect error', async () => {
      const failing = new MCPClient({
        transportFactory: () => {
          throw new Error('unsupported transport');
        },
      });

      const outcome = await settle(failing.connectServer('x', memoryServerConfig()));
      expect(outcome.ok).toBe(false);
      if (!outcome.ok) {
        expect(outcome.error).toBeInstanceOf(MCPConnectError);
        expect(outcome.error).toMatchObject({ message: 'Failed to connect to "x": unsupported transport' });
      }
    });

    it('should replace an existing connection under the same name', async () => {
      const disconnected = vi.fn();
      client.on('serverDisconnected', disconnected);

      await client.connectServer('fs', memoryServerConfig());
      const first = farm.server('fs');
      await client.connectServer('fs', memoryServerConfig());

      expect(first.transport.isConnected).toBe(false);
      expect(farm.server('fs')).not.toBe(first);
      expect(disconnected).toHaveBeenCalledWith('fs', 'Disconnected by client');
      expect(client.listTools()).toEqual(['fs:read_file', 'fs:write_file']);
      expect(client.listConnectedServers()).toEqual(['fs']);
    });
  });

  describe('connectConfigured', () => {
    it('should connect enabled servers and report each outcome', async () => {
      const outcomes = await client.connectConfigured({
        servers: {
          fs: memoryServerConfig(),
          off: memoryServerConfig({ enabled: false }),
          silent: memoryServerConfig(),
        },
      });

      expect(outcomes.map((outcome) => [outcome.serverName, outcome.ok])).toEqual([
        ['fs', true],
        ['silent', false],
      ]);
      const failed = outcomes[1];
      if (!failed.ok) {
        expect(failed.error.kind).toBe('ConnectFailed');
      }
      expect(farm.has('off')).toBe(false);
      expect(client.listConnectedServers()).toEqual(['fs']);
    });
  });

  describe('routing', () => {
    beforeEach(async () => {
      await client.connectServer('fs', memoryServerConfig());
      await client.connectServer('mirror', memoryServerConfig());
    });

    it('should keep both entries of a shared tool name and warn', () => {
      expect(client.listTools()).toEqual(['fs:read_file', 'fs:write_file', 'mirror:read_file']);
      expect(loggedMessages('warn')).toContain('Tool name advertised by more than one server; first registered wins');
    });

    it('should send a shared tool name to the first server that registered it', async () => {
      const call = client.callTool('read_file', { path: '/a' });
      const request = await farm.server('fs').expectRequest('tools/call');
      await farm.server('fs').respond(request.id, { content: [{ type: 'text', text: 'from fs' }] });

      await expect(call).resolves.toEqual({ content: [{ type: 'text', text: 'from fs' }] });
      expect(farm.server('mirror').requestsFor('tools/call')).toEqual([]);
    });

    it('should fall back to the next server once the winner disconnects', async () => {
      await client.disconnectServer('fs');

      const call = client.callTool('read_file');
      const request = await farm.server('mirror').expectRequest('tools/call');
      expect(request.params).toEqual({ name: 'read_file', arguments: {} });
      await farm.server('mirror').respond(request.id, { content: [] });
      await expect(call).resolves.toEqual({ content: [] });
    });

    it('should fail an unknown tool without sending anything', async () => {
      await expect(client.callTool('missing')).rejects.toMatchObject({
        kind: 'ToolNotFound',
        message: 'Tool not found: missing',
        data: { toolName: 'missing' },
      });
      expect(farm.server('fs').requestsFor('tools/call')).toEqual([]);
      expect(farm.server('mirror').requestsFor('tools/call')).toEqual([]);
    });

    it('should call a tool on a named server', async () => {
      const call = client.callServerTool('mirror', 'read_file', { path: '/b' });
      const request = await farm.server('mirror').expectRequest('tools/call');
      await farm.server('mirror').respond(request.id, { content: [{ type: 'text', text: 'B' }], isError: false });

      await expect(call).resolves.toEqual({ content: [{ type: 'text', text: 'B' }], isError: false });
    });

    it('should check the named server before calling it', async () => {
      await client.connectServer('prompter', memoryServerConfig());

      await expect(client.callServerTool('prompter', 'read_file')).rejects.toMatchObject({
        kind: 'CapabilityNotSupported',
        message: 'Server "prompter" does not support tools',
      });
      await expect(client.callServerTool('mirror', 'write_file')).rejects.toMatchObject({
        kind: 'ToolNotFound',
        message: 'Tool not found on "mirror": write_file',
      });
      await expect(client.callServerTool('ghost', 'read_file')).rejects.toMatchObject({
        kind: 'ConnectionClosed',
        message: 'Connection to "ghost" closed: not connected',
      });
    });

    it('should read a resource from the server that owns it', async () => {
      const read = client.readResource('file:///notes.txt');
      const request = await farm.server('fs').expectRequest('resources/read');
      expect(request.params).toEqual({ uri: 'file:///notes.txt' });
      await farm.server('fs').respond(request.id, { contents: [{ uri: 'file:///notes.txt', text: 'remember' }] });

      await expect(read).resolves.toEqual({ contents: [{ uri: 'file:///notes.txt', text: 'remember' }] });
      await expect(client.readResource('file:///other.txt')).rejects.toMatchObject({
        kind: 'ResourceNotFound',
        message: 'Resource not found: file:///other.txt',
      });
    });

    it('should get a prompt with its arguments', async () => {
      const prompt = client.getPrompt('summarize', { topic: 'logs' });
      const request = await farm.server('fs').expectRequest('prompts/get');
      expect(request.params).toEqual({ name: 'summarize', arguments: { topic: 'logs' } });
      await farm.server('fs').respond(request.id, {
        messages: [{ role: 'user', content: { type: 'text', text: 'Summarize logs' } }],
      });

      await expect(prompt).resolves.toEqual({
        messages: [{ role: 'user', content: { type: 'text', text: 'Summarize logs' } }],
      });
      await expect(client.getPrompt('nope')).rejects.toMatchObject({ kind: 'PromptNotFound', message: 'Prompt not found: nope' });
    });

    it('should ping a named server', async () => {
      const ping = client.ping('mirror');
      await farm.server('mirror').respond((await farm.server('mirror').expectRequest('ping')).id, {});
      await expect(ping).resolves.toBeUndefined();
    });
  });

  describe('disconnect', () => {
    beforeEach(async () => {
      await client.connectServer('fs', memoryServerConfig());
      await client.connectServer('mirror', memoryServerConfig());
    });

    it('should purge only the disconnected server', async () => {
      const disconnected = vi.fn();
      client.on('serverDisconnected', disconnected);

      await client.disconnectServer('fs');

      expect(client.listTools()).toEqual(['mirror:read_file']);
      expect(client.listResources()).toEqual([]);
      expect(client.listPrompts()).toEqual([]);
      expect(client.getServerState('fs')).toBeUndefined();
      expect(disconnected).toHaveBeenCalledWith('fs', 'Disconnected by client');
    });

    it('should purge a server whose peer went away', async () => {
      const disconnected = vi.fn();
      client.on('serverDisconnected', disconnected);

      await farm.server('fs').close();
      await waitFor(() => disconnected.mock.calls.length === 1);

      expect(disconnected).toHaveBeenCalledWith('fs', 'Transport closed by peer');
      expect(client.listTools()).toEqual(['mirror:read_file']);
      expect(client.listConnectedServers()).toEqual(['mirror']);
    });

    it('should fail calls in flight on that server', async () => {
      const call = settle(client.callTool('write_file'));
      await farm.server('fs').expectRequest('tools/call');
      await client.disconnectServer('fs');

      const outcome = await call;
      expect(outcome.ok).toBe(false);
      if (!outcome.ok) {
        expect(outcome.error).toMatchObject({
          kind: 'ConnectionClosed',
          message: 'Connection to "fs" closed: Disconnected by client',
        });
      }
    });

    it('should fail every outstanding call and drop the server from the indices', async () => {
      const calls = ['write_file', 'read_file', 'write_file'].map((name) => settle(client.callTool(name)));
      for (let i = 0; i < calls.length; i++) {
        await farm.server('fs').expectRequest('tools/call');
      }

      await client.disconnectServer('fs');

      const outcomes = await Promise.all(calls);
      expect(outcomes.map((outcome) => (outcome.ok ? 'resolved' : outcome.error))).toEqual([
        expect.objectContaining({ kind: 'ConnectionClosed', message: 'Connection to "fs" closed: Disconnected by client' }),
        expect.objectContaining({ kind: 'ConnectionClosed', message: 'Connection to "fs" closed: Disconnected by client' }),
        expect.objectContaining({ kind: 'ConnectionClosed', message: 'Connection to "fs" closed: Disconnected by client' }),
      ]);
      expect(client.listTools()).toEqual(['mirror:read_file']);
      expect(farm.server('mirror').requestsFor('tools/call')).toEqual([]);
    });

    it('should ignore a name it does not know', async () => {
      await expect(client.disconnectServer('ghost')).resolves.toBeUndefined();
    });

    it('should clear everything on shutdown', async () => {
      await client.shutdown();

      expect(client.listConnectedServers()).toEqual([]);
      expect(client.listTools()).toEqual([]);
      expect(client.getServerStates()).toEqual([]);
      await expect(client.callTool('read_file')).rejects.toMatchObject({ kind: 'ToolNotFound' });
    });
  });

  describe('notifications', () => {
    beforeEach(async () => {
      await client.connectServer('fs', memoryServerConfig());
    });

    it('should deliver to every handler with the server name', async () => {
      const seen: Array<[string, Record<string, unknown>]> = [];
      client.onNotification('notifications/progress', (serverName, params) => seen.push([serverName, params]));

      await farm.server('fs').notify('notifications/progress', { progress: 1 });
      await waitFor(() => seen.length === 1);

      expect(seen).toEqual([['fs', { progress: 1 }]]);
    });

    it('should stop delivering after unsubscribe', async () => {
      const handler = vi.fn();
      const unsubscribe = client.onNotification('notifications/message', handler);

      await farm.server('fs').notify('notifications/message', { n: 1 });
      await waitFor(() => handler.mock.calls.length === 1);
      unsubscribe();
      await farm.server('fs').notify('notifications/message', { n: 2 });
      await farm.server('fs').notify('notifications/progress', {});
      await waitFor(() => loggedMessages('debug').includes('MCP progress'));

      expect(handler).toHaveBeenCalledTimes(1);
    });

    it('should keep delivering when one handler throws', async () => {
      const after = vi.fn();
      client.onNotification('notifications/message', () => {
        throw new Error('handler broke');
      });
      client.onNotification('notifications/message', after);

      await farm.server('fs').notify('notifications/message', {});
      await waitFor(() => after.mock.calls.length === 1);

      expect(after).toHaveBeenCalledWith('fs', {});
      expect(loggedMessages('error')).toContain('Notification handler failed');
    });
  });

  describe('snapshots', () => {
    it('should hand out copies of descriptors', async () => {
      await client.connectServer('fs', memoryServerConfig());

      const [first] = client.getToolDescriptors();
      expect(first).toEqual({ serverName: 'fs', item: { name: 'read_file', inputSchema: { type: 'object' } } });
      first.item.name = 'renamed';

      expect(client.getToolDescriptors()[0].item.name).toBe('read_file');
      expect(client.getResourceDescriptors()).toEqual([
        { serverName: 'fs', item: { uri: 'file:///notes.txt', name: 'notes' } },
      ]);
      expect(client.getPromptDescriptors()).toEqual([
        { serverName: 'fs', item: { name: 'summarize', arguments: [{ name: 'topic', required: true }] } },
      ]);
    });

    it('should report server states', async () => {
      await client.connectServer('fs', memoryServerConfig());
      await client.connectServer('prompter', memoryServerConfig());

      const states: MCPServerState[] = client.getServerStates();
      expect(states.map((state) => [state.serverName, state.state, state.toolCount, state.promptCount])).toEqual([
        ['fs', 'ready', 2, 1],
        ['prompter', 'ready', 0, 1],
      ]);
    });
  });

  describe('index keys', () => {
    it('should keep items apart when their joined names look alike', async () => {
      const lookalikes = new ServerFarm({
        a: { tools: [{ name: 'b:c' }] },
        'a:b': { tools: [{ name: 'c' }] },
      });
      const indexed = new MCPClient({ transportFactory: lookalikes.factory, connectTimeout: 50 });
      try {
        await indexed.connectServer('a', memoryServerConfig());
        await indexed.connectServer('a:b', memoryServerConfig());

        expect(indexed.listTools()).toEqual(['a:b:c', 'a:b:c']);
        expect(indexed.getToolDescriptors().map((entry) => [entry.serverName, entry.item.name])).toEqual([
          ['a', 'b:c'],
          ['a:b', 'c'],
        ]);

        const call = indexed.callTool('b:c');
        const request = await lookalikes.server('a').expectRequest('tools/call');
        await lookalikes.server('a').respond(request.id, { content: [] });
        await expect(call).resolves.toEqual({ content: [] });

        await indexed.disconnectServer('a:b');
        expect(indexed.getToolDescriptors().map((entry) => [entry.serverName, entry.item.name])).toEqual([['a', 'b:c']]);
        expect(indexed.listConnectedServers()).toEqual(['a']);
      } finally {
        await indexed.shutdown();
        await lookalikes.closeAll();
      }
      expect(lookalikes.handshakeErrors).toEqual([]);
    });
  });

  describe('healthCheck', () => {
    beforeEach(async () => {
      await client.connectServer('fs', memoryServerConfig());
      await client.connectServer('mirror', memoryServerConfig());
    });

    it('should report healthy when every server answers', async () => {
      const report = client.healthCheck(500);
      for (const name of ['fs', 'mirror']) {
        const server = farm.server(name);
        await server.respond((await server.expectRequest('ping')).id, {});
      }

      const result = await report;
      expect(result.status).toBe('healthy');
      expect(result.servers).toEqual([
        { serverName: 'fs', status: 'healthy', responseTime: expect.any(Number), state: 'ready', toolCount: 2 },
        { serverName: 'mirror', status: 'healthy', responseTime: expect.any(Number), state: 'ready', toolCount: 1 },
      ]);
    });

    it('should report degraded when some servers fail', async () => {
      const report = client.healthCheck(500);
      await farm.server('fs').respond((await farm.server('fs').expectRequest('ping')).id, {});
      await farm.server('mirror').respondError((await farm.server('mirror').expectRequest('ping')).id, 'InternalError', 'busy');

      const result = await report;
      expect(result.status).toBe('degraded');
      expect(result.servers[0]).toMatchObject({ serverName: 'fs', status: 'healthy' });
      expect(result.servers[1]).toEqual({ serverName: 'mirror', status: 'unhealthy', state: 'ready', toolCount: 1, error: 'busy' });
    });

    it('should report unhealthy when no server answers', async () => {
      const result = await client.healthCheck(20);

      expect(result.status).toBe('unhealthy');
      expect(result.servers.map((server) => [server.serverName, server.status, server.error])).toEqual([
        ['fs', 'unhealthy', 'Request timeout for ping after 20ms'],
        ['mirror', 'unhealthy', 'Request timeout for ping after 20ms'],
      ]);
      expect(client.listConnectedServers()).toEqual(['fs', 'mirror']);
    });

    it('should report healthy with nothing connected', async () => {
      await client.shutdown();
      const result = await client.healthCheck();
      expect(result.status).toBe('healthy');
      expect(result.servers).toEqual([]);
    });
  });

  describe('timeouts', () => {
    it('should refuse a deadline no timer can hold without sending anything', async () => {
      await client.connectServer('fs', memoryServerConfig());

      await expect(client.callTool('read_file', {}, 3_000_000_000)).rejects.toMatchObject({
        kind: 'InvalidParams',
        message: 'Invalid timeout for tools/call: 3000000000ms',
      });
      await expect(client.ping('fs', Infinity)).rejects.toMatchObject({
        kind: 'InvalidParams',
        message: 'Invalid timeout for ping: Infinityms',
      });
      expect(farm.server('fs').requestsFor('tools/call')).toEqual([]);
      expect(farm.server('fs').requestsFor('ping')).toEqual([]);
      expect(client.getServerState('fs')).toMatchObject({ state: 'ready', pendingCalls: 0 });
    });

    it('should use the server config timeout', async () => {
      await client.connectServer('fs', memoryServerConfig({ timeout: 20 }));

      await expect(client.callTool('read_file')).rejects.toMatchObject({
        kind: 'Timeout',
        message: 'Request timeout for tools/call after 20ms',
      });
      expect(client.listConnectedServers()).toEqual(['fs']);
    });

    it('should take its default timeout from settings', async () => {
      const configured = MCPClient.fromSettings({ ...DEFAULT_MCP_SETTINGS, defaultTimeout: 25 }, farm.factory);
      try {
        await configured.connectServer('mirror', memoryServerConfig());
        await expect(configured.callTool('read_file')).rejects.toMatchObject({
          message: 'Request timeout for tools/call after 25ms',
        });
      } finally {
        await configured.shutdown();
      }
    });

    it('should let the call override the deadline', async () => {
      await client.connectServer('fs', memoryServerConfig({ timeout: 5000 }));

      await expect(client.callTool('read_file', {}, 15)).rejects.toMatchObject({
        message: 'Request timeout for tools/call after 15ms',
      });
    });
  });
});
