/**
 * Client <-> Dispatcher Integration Tests
 *
 * A real client against a real dispatcher, over an in-memory pair and over
 * piped stdio streams.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { PassThrough } from 'node:stream';
import { MCPClient } from '../../main/mcp/MCPClient';
import { createBasicServer } from '../../main/mcp/server/basicServer';
import { serveStdio } from '../../main/mcp/server/hosting';
import type { MCPDispatcher } from '../../main/mcp/server/MCPDispatcher';
import { MCPStreamTransport } from '../../main/mcp/transports/MCPStreamTransport';
import { MemoryTransport } from '../mocks/mockTransport';
import { memoryServerConfig } from '../helpers/testUtils';

function createNotesServer(): MCPDispatcher {
  const notes = new Map<string, string>([['welcome', 'Hello there']]);

  return createBasicServer({
    name: 'notes',
    version: '0.3.0',
    instructions: 'Notes are plain text',
    tools: [
      {
        name: 'add_note',
        description: 'Store a note',
        inputSchema: {
          type: 'object',
          properties: { title: { type: 'string' }, body: { type: 'string' } },
          required: ['title', 'body'],
        },
        handler: (args) => {
          notes.set(String(args.title), String(args.body));
          return `Saved ${String(args.title)}`;
        },
      },
      {
        name: 'count_notes',
        handler: () => ({ count: notes.size }),
      },
      {
        name: 'explode',
        handler: () => {
          throw new Error('kaboom');
        },
      },
    ],
    resources: [
      {
        uri: 'notes://welcome',
        name: 'welcome',
        mimeType: 'text/plain',
        read: () => notes.get('welcome') ?? '',
      },
    ],
    resourceTemplates: [{ uriTemplate: 'notes://{title}', name: 'note' }],
    prompts: [
      {
        name: 'recap',
        description: 'Recap a note',
        arguments: [{ name: 'title', required: true }],
        render: (args) => `Recap the note titled ${args.title}`,
      },
    ],
  });
}

describe('Client and dispatcher over an in-memory pair', () => {
  let client: MCPClient;
  let sessions: Promise<void>[];

  beforeEach(() => {
    sessions = [];
    client = new MCPClient({
      transportFactory: () => {
        const [near, far] = MemoryTransport.pair();
        far.open();
        sessions.push(createNotesServer().serve(far));
        return near;
      },
    });
  });

  afterEach(async () => {
    await client.shutdown();
    await Promise.all(sessions);
  });

  it('should discover everything the server offers', async () => {
    await client.connectServer('notes', memoryServerConfig());

    expect(client.listTools()).toEqual(['notes:add_note', 'notes:count_notes', 'notes:explode']);
    expect(client.listResources()).toEqual(['notes:notes://welcome']);
    expect(client.listPrompts()).toEqual(['notes:recap']);
    expect(client.getServerState('notes')).toMatchObject({
      serverInfo: { name: 'notes', version: '0.3.0' },
      protocolVersion: '2024-11-05',
      resourceTemplateCount: 1,
      capabilities: {
        tools: { listChanged: false },
        resources: { subscribe: false, listChanged: false },
        prompts: { listChanged: false },
      },
    });
  });

  it('should run tools, read resources and render prompts', async () => {
    await client.connectServer('notes', memoryServerConfig());

    await expect(client.callTool('add_note', { title: 'groceries', body: 'milk' })).resolves.toEqual({
      content: [{ type: 'text', text: 'Saved groceries' }],
    });
    await expect(client.callTool('count_notes')).resolves.toEqual({ content: [{ type: 'text', text: '{"count":2}' }] });
    await expect(client.readResource('notes://welcome')).resolves.toEqual({
      contents: [{ uri: 'notes://welcome', text: 'Hello there', mimeType: 'text/plain' }],
    });
    await expect(client.getPrompt('recap', { title: 'groceries' })).resolves.toEqual({
      description: 'Recap a note',
      messages: [{ role: 'user', content: { type: 'text', text: 'Recap the note titled groceries' } }],
    });
  });

  it('should surface server-side failures with their kinds', async () => {
    await client.connectServer('notes', memoryServerConfig());

    await expect(client.callTool('explode')).rejects.toMatchObject({
      kind: 'InternalError',
      message: 'Tool execution failed: kaboom',
      data: { tool: 'explode', message: 'kaboom' },
    });
    await expect(client.callTool('add_note', { title: 'x' })).rejects.toMatchObject({
      kind: 'InvalidParams',
      message: 'Missing required arguments: body',
    });
    await expect(client.getPrompt('recap')).rejects.toMatchObject({
      kind: 'InvalidParams',
      message: 'Missing required arguments: title',
    });
    expect(client.listConnectedServers()).toEqual(['notes']);
  });

  it('should keep servers independent', async () => {
    await client.connectServer('a', memoryServerConfig());
    await client.connectServer('b', memoryServerConfig());

    await client.callTool('add_note', { title: 'only-a', body: '1' });

    await expect(client.callServerTool('a', 'count_notes')).resolves.toEqual({ content: [{ type: 'text', text: '{"count":2}' }] });
    await expect(client.callServerTool('b', 'count_notes')).resolves.toEqual({ content: [{ type: 'text', text: '{"count":1}' }] });
  });
});

describe('Client and dispatcher over stdio streams', () => {
  it('should complete a session and shut the server down with the client', async () => {
    const clientToServer = new PassThrough();
    const serverToClient = new PassThrough();
    const serving = serveStdio(createNotesServer(), { input: clientToServer, output: serverToClient });

    const client = new MCPClient({
      transportFactory: () => new MCPStreamTransport(serverToClient, clientToServer),
    });
    await client.connectServer('notes', memoryServerConfig());

    await expect(client.ping('notes')).resolves.toBeUndefined();
    await expect(client.callTool('add_note', { title: 't', body: 'b' })).resolves.toEqual({
      content: [{ type: 'text', text: 'Saved t' }],
    });

    await client.shutdown();
    await expect(serving).resolves.toBeUndefined();
    expect(serverToClient.writableEnded).toBe(true);
  });
});
