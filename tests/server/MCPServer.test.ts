import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import type { JSONRPCMessage, JSONRPCRequest, Tool } from '@modelcontextprotocol/sdk/types.js';
import { MCPServer, type MCPPlugin } from '../../src/server/MCPServer';
import { testServerConfig } from '../helpers/serverConfig';

// Mock winston to avoid console and file output in tests
jest.mock('winston', () => {
  const mockLogger = {
    info: jest.fn(),
    error: jest.fn(),
    warn: jest.fn(),
    debug: jest.fn(),
  };

  return {
    createLogger: jest.fn(() => mockLogger),
    format: {
      combine: jest.fn(),
      timestamp: jest.fn(),
      json: jest.fn(),
      colorize: jest.fn(),
      simple: jest.fn(),
    },
    transports: {
      Console: jest.fn(),
      File: jest.fn(),
    },
  };
});

const echoTool: Tool = {
  name: 'echo',
  description: 'Echo the arguments back',
  inputSchema: { type: 'object', properties: {} },
};

describe('MCPServer', () => {
  let server: MCPServer;

  beforeEach(() => {
    server = new MCPServer({
      config: testServerConfig(),
      skipTransportErrorHandling: true,
      skipGracefulShutdown: true,
    });
  });

  afterEach(async () => {
    server.cleanup();
    await server.stop();
  });

  describe('tool registry', () => {
    it('should wrap plain return values as text content', async () => {
      server.registerTool(echoTool, async (params) => params);

      await expect(server.executeTool('echo', { a: 1 })).resolves.toEqual({
        content: [{ type: 'text', text: JSON.stringify({ a: 1 }, null, 2) }],
      });
    });

    it('should pass tool results through unchanged', async () => {
      const result = { isError: true, content: [{ type: 'text', text: 'bad input' }] };
      server.registerTool(echoTool, async () => result);

      await expect(server.executeTool('echo', {})).resolves.toBe(result);
    });

    it('should hand the request extra to the handler', async () => {
      const handler = jest.fn(async () => 'ok');
      server.registerTool(echoTool, handler);
      const controller = new AbortController();

      await server.executeTool('echo', { a: 1 }, { signal: controller.signal });
      expect(handler).toHaveBeenCalledWith({ a: 1 }, { signal: controller.signal });
    });

    it('should reject unknown tools', async () => {
      await expect(server.executeTool('missing', {})).rejects.toThrow('Tool not found: missing');
    });

    it('should warn when a tool is registered twice', () => {
      server.registerTool(echoTool, async () => 'first');
      server.registerTool(echoTool, async () => 'second');

      expect(server.getLogger().warn).toHaveBeenCalledWith(
        'Tool already registered: echo, overwriting',
      );
      expect(server.getTools()).toEqual([echoTool]);
    });
  });

  describe('plugins', () => {
    function plugin(name: string): MCPPlugin & { shutdown: jest.Mock } {
      return {
        name,
        initialize: jest.fn(async () => undefined),
        shutdown: jest.fn(async () => undefined),
      };
    }

    it('should refuse to load a plugin twice', async () => {
      const first = plugin('p');
      await server.loadPlugin(first);
      await expect(server.loadPlugin(plugin('p'))).rejects.toThrow('Plugin already loaded: p');
      expect(first.initialize).toHaveBeenCalledWith(server);
    });

    it('should propagate initialization failures', async () => {
      const failing = plugin('broken');
      failing.initialize = jest.fn(async () => {
        throw new Error('cannot start');
      });
      await expect(server.loadPlugin(failing)).rejects.toThrow('cannot start');
    });

    it('should shut plugins down once on stop', async () => {
      const loaded = plugin('p');
      await server.loadPlugin(loaded);

      await server.stop();
      await server.stop();
      expect(loaded.shutdown).toHaveBeenCalledTimes(1);
    });
  });

  describe('protocol handlers', () => {
    let clientSide: InMemoryTransport;
    let nextId = 1;
    const pending = new Map<number, (message: JSONRPCMessage) => void>();

    async function rpc(
      method: string,
      params: JSONRPCRequest['params'],
    ): Promise<JSONRPCMessage> {
      const id = nextId++;
      const response = new Promise<JSONRPCMessage>((resolve) => pending.set(id, resolve));
      await clientSide.send({ jsonrpc: '2.0', id, method, params });
      return response;
    }

    beforeEach(async () => {
      const [client, serverSide] = InMemoryTransport.createLinkedPair();
      clientSide = client;
      clientSide.onmessage = (message) => {
        if ('id' in message && typeof message.id === 'number') {
          pending.get(message.id)?.(message);
          pending.delete(message.id);
        }
      };
      await clientSide.start();
      await server.getServer().connect(serverSide);
    });

    it('should list registered tools and notify plugins of a new conversation', async () => {
      const onNewConversation = jest.fn(async () => undefined);
      await server.loadPlugin({
        name: 'listener',
        initialize: async () => undefined,
        onNewConversation,
      });
      server.registerTool(echoTool, async () => 'ok');

      const response = await rpc('tools/list', {});
      expect(response).toMatchObject({ result: { tools: [{ name: 'echo' }] } });
      expect(onNewConversation).toHaveBeenCalledTimes(1);
    });

    it('should call a tool with its arguments and an abort signal', async () => {
      const handler = jest.fn(async () => 'done');
      server.registerTool(echoTool, handler);

      const response = await rpc('tools/call', { name: 'echo', arguments: { a: 1 } });
      expect(response).toMatchObject({
        result: { content: [{ type: 'text', text: 'done' }] },
      });
      expect(handler).toHaveBeenCalledWith(
        { a: 1 },
        { signal: expect.any(AbortSignal) },
      );
    });

    it('should answer an unknown tool with an error', async () => {
      const response = await rpc('tools/call', { name: 'missing', arguments: {} });
      expect(JSON.stringify(response)).toContain('Tool not found: missing');
    });
  });
});
