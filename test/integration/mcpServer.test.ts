import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import type { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { createMcpServer, type ServerOptions } from '../../src/server';
import { ToolRegistry } from '../../src/toolRegistry';
import { readFixture, testConfig } from '../fixtures/test-config';
import { TestHttpServer } from '../helpers/http-server';

interface Connection {
  client: Client;
  server: Server;
  close: () => Promise<void>;
}

async function connect(registry: ToolRegistry, options: ServerOptions): Promise<Connection> {
  const server = createMcpServer(registry, options);
  const client = new Client({ name: 'test-client', version: '1.0.0' }, { capabilities: {} });
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();

  await Promise.all([
    client.connect(clientTransport),
    server.connect(serverTransport),
  ]);

  return {
    client,
    server,
    close: async () => {
      await client.close();
      await server.close();
    },
  };
}

describe('MCP server over an in-memory transport', () => {
  let backend: TestHttpServer;
  let registry: ToolRegistry;
  let connection: Connection | undefined;

  beforeAll(async () => {
    backend = new TestHttpServer(() => ({
      status: 200,
      body: testConfig.mockResponses.listPets,
      headers: { 'Content-Type': 'application/json' },
    }));
    await backend.start();
    registry = await ToolRegistry.fromDescription(readFixture(testConfig.openApiFile), {
      baseUrl: `${backend.getBaseUrl()}/api`,
    });
  });

  afterEach(async () => {
    await connection?.close();
    connection = undefined;
  });

  afterAll(async () => {
    await backend.stop();
  });

  it('should identify itself with the API title and version', async () => {
    connection = await connect(registry, { enableTools: true, advertiseTools: true });

    expect(connection.client.getServerVersion()).toEqual({ name: 'Petstore', version: '1.2.0' });
    expect(connection.client.getServerCapabilities()).toEqual({ tools: {} });
  });

  it('should list every tool with its schema and annotations', async () => {
    connection = await connect(registry, { enableTools: true, advertiseTools: true });

    const { tools } = await connection.client.listTools();

    expect(tools.map(tool => tool.name)).toEqual(registry.listTools().map(tool => tool.name));
    const showPet = tools.find(tool => tool.name === 'getShowPetById');
    expect(showPet?.inputSchema).toEqual({
      type: 'object',
      properties: {
        petId: {
          type: 'string',
          description: 'Path parameter: The id of the pet',
          'x-parameter-location': 'path',
        },
        auth_bearer: {
          type: 'string',
          description: 'Authentication (bearer): Required for this operation.',
        },
      },
      required: ['petId'],
      'x-semantic-annotations': { 'x-linkedData': { '@type': 'WebAPI', name: 'Petstore' } },
    });
    expect(showPet?.annotations).toEqual({
      readOnlyHint: true,
      destructiveHint: false,
      idempotentHint: true,
      openWorldHint: true,
      'x-openapi-path': '/pets/{petId}',
      'x-openapi-method': 'GET',
    });
  });

  it('should dispatch tool calls to the target API', async () => {
    connection = await connect(registry, { enableTools: true, advertiseTools: true });

    const result = await connection.client.callTool({ name: 'listPets', arguments: { limit: 1 } });

    expect(result.isError).toBe(false);
    expect(result.content).toEqual([
      {
        type: 'text',
        text: 'SUCCESS (200): OK - Request succeeded\n\nRESPONSE TYPE: Array with 1 elements\n\n[{"id":1,"name":"Rex"}]',
      },
      { type: 'text', text: expect.stringMatching(/^\{"statusCode":200,"operation":"listPets","method":"GET","path":"\/pets",/) },
    ]);
    expect(backend.requests[backend.requests.length - 1].url).toBe('/api/pets?limit=1');
  });

  it('should answer unknown tools with an error result', async () => {
    connection = await connect(registry, { enableTools: true, advertiseTools: true });

    const result = await connection.client.callTool({ name: 'adoptPet', arguments: {} });

    expect(result.isError).toBe(true);
    expect(result.content).toEqual([{ type: 'text', text: 'Unknown tool: adoptPet' }]);
  });

  it('should hide tools from the listing but still call them when advertising is off', async () => {
    connection = await connect(registry, { enableTools: true, advertiseTools: false });

    await expect(connection.client.listTools()).resolves.toEqual({ tools: [] });
    const result = await connection.client.callTool({ name: 'listPets', arguments: {} });
    expect(result.isError).toBe(false);
  });

  it('should declare no tools capability when tools are disabled', async () => {
    connection = await connect(registry, { enableTools: false, advertiseTools: true });

    expect(connection.client.getServerCapabilities()).toEqual({});
    await expect(connection.client.listTools()).rejects.toThrow(/Method not found/);
  });
});
