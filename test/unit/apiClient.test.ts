import axios, { AxiosHeaders, type AxiosResponse } from 'axios';
import {
  DEFAULT_TIMEOUT_MS,
  USER_AGENT,
  classifyTransportError,
  executeRequest,
  mergeHeaders,
} from '../../src/apiClient';
import type { CompiledRequest } from '../../src/types';
import { testConfig } from '../fixtures/test-config';

jest.mock('axios');

const request = jest.mocked(axios.request);
const PETS_URL = `${testConfig.baseUrl}/pets`;

function reply(status: number, data: unknown, headers: Record<string, string> = {}): AxiosResponse<unknown> {
  return { status, statusText: '', data, headers, config: { headers: new AxiosHeaders() } };
}

function failure(message: string, code?: string): Error {
  return Object.assign(new Error(message), { code });
}

const listPets: CompiledRequest = { method: 'GET', url: PETS_URL, headers: [] };
const listOptions = { operationId: 'listPets', pathTemplate: '/pets' };

describe('API Client', () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  describe('executeRequest', () => {
    it('should send default headers and report a successful response', async () => {
      request.mockResolvedValueOnce(reply(200, testConfig.mockResponses.listPets, { 'content-type': 'application/json' }));

      const result = await executeRequest(listPets, listOptions);

      expect(result).toEqual({
        isError: false,
        content: [
          {
            type: 'text',
            text: 'SUCCESS (200): OK - Request succeeded\n\nRESPONSE TYPE: Array with 1 elements\n\n[{"id":1,"name":"Rex"}]',
          },
          {
            type: 'text',
            text: '{"statusCode":200,"operation":"listPets","method":"GET","path":"/pets","headers":{"content-type":"application/json"}}',
          },
        ],
      });
      expect(request).toHaveBeenCalledTimes(1);
      expect(request).toHaveBeenCalledWith(expect.objectContaining({
        method: 'GET',
        url: PETS_URL,
        headers: { Accept: 'application/json', 'User-Agent': USER_AGENT, 'X-MCP': '1' },
        timeout: DEFAULT_TIMEOUT_MS,
        responseType: 'text',
      }));
    });

    it('should resolve every status instead of throwing', async () => {
      request.mockResolvedValueOnce(reply(404, testConfig.mockResponses.notFound));

      const result = await executeRequest(listPets, listOptions);

      expect(result.isError).toBe(true);
      expect(result.content[0].text).toBe(
        'ERROR (404): Not Found - The requested resource was not found\n\nRESPONSE TYPE: Error details\n\n{"error":"not found"}'
      );

      const config = request.mock.calls[0][0];
      expect(config.validateStatus?.(500)).toBe(true);
    });

    it('should send the body with its content type and honour disableXMcp', async () => {
      request.mockResolvedValueOnce(reply(201, { id: 9 }));
      const createPet: CompiledRequest = {
        method: 'POST',
        url: PETS_URL,
        headers: [],
        body: '{"name":"Rex"}',
        contentType: 'application/json',
      };

      const result = await executeRequest(createPet, { operationId: 'createPet', pathTemplate: '/pets', disableXMcp: true });

      expect(request).toHaveBeenCalledWith(expect.objectContaining({
        method: 'POST',
        data: '{"name":"Rex"}',
        headers: { Accept: 'application/json', 'User-Agent': USER_AGENT, 'Content-Type': 'application/json' },
      }));
      expect(result.content[0].text).toBe(
        'SUCCESS (201): Created - Resource successfully created\n\nRESPONSE TYPE: Single resource\n\n{"id":9}'
      );
    });

    it('should abort the transport when the caller cancels', async () => {
      let rejectCall: (reason: unknown) => void = () => undefined;
      request.mockReturnValueOnce(new Promise<AxiosResponse<unknown>>((_resolve, reject) => {
        rejectCall = reject;
      }));
      const controller = new AbortController();

      const pending = executeRequest(listPets, { ...listOptions, timeoutMs: 5000, signal: controller.signal });
      const config = request.mock.calls[0][0];
      expect(config.timeout).toBe(5000);
      expect(config.signal?.aborted).toBe(false);

      controller.abort();
      expect(config.signal?.aborted).toBe(true);
      rejectCall(failure('canceled', 'ERR_CANCELED'));

      await expect(pending).resolves.toEqual({
        isError: true,
        content: [{ type: 'text', text: `Cancelled: The request to ${PETS_URL} was aborted before it completed.` }],
      });
    });

    it('should abort at the deadline and report it as a timeout', async () => {
      let rejectCall: (reason: unknown) => void = () => undefined;
      request.mockReturnValueOnce(new Promise<AxiosResponse<unknown>>((_resolve, reject) => {
        rejectCall = reject;
      }));

      const pending = executeRequest(listPets, { ...listOptions, timeoutMs: 20 });
      const config = request.mock.calls[0][0];
      expect(config.signal?.aborted).toBe(false);

      await new Promise(resolve => setTimeout(resolve, 60));
      expect(config.signal?.aborted).toBe(true);
      rejectCall(failure('canceled', 'ERR_CANCELED'));

      await expect(pending).resolves.toEqual({
        isError: true,
        content: [{ type: 'text', text: `Timeout: No response from ${PETS_URL} within 20 ms.` }],
      });
    });

    it('should layer configured and per-call headers over the defaults', async () => {
      request.mockResolvedValueOnce(reply(200, '{}'));
      const withHeaders: CompiledRequest = {
        ...listPets,
        headers: [['x-mcp', '2'], ['X-Tenant', 't2'], ['x-trace', 'a'], ['x-trace', 'b']],
      };

      await executeRequest(withHeaders, { ...listOptions, additionalHeaders: { 'X-Tenant': 't1', accept: 'text/plain' } });

      expect(request.mock.calls[0][0].headers).toEqual({
        accept: 'text/plain',
        'User-Agent': USER_AGENT,
        'x-mcp': '2',
        'X-Tenant': 't2',
        'x-trace': 'a, b',
      });
    });

    it.each([
      [
        failure('connect ECONNREFUSED 127.0.0.1:80', 'ECONNREFUSED'),
        `Connection error: Cannot connect to ${PETS_URL}. Please check if the URL is correct and the server is running. Error: connect ECONNREFUSED 127.0.0.1:80`,
      ],
      [
        failure('getaddrinfo ENOTFOUND petstore.test', 'ENOTFOUND'),
        `Unknown host: Cannot resolve hostname in ${PETS_URL}. Please check if the URL is correct. Error: getaddrinfo ENOTFOUND petstore.test`,
      ],
      [failure('timeout of 30000ms exceeded', 'ECONNABORTED'), `Timeout: No response from ${PETS_URL} within 30000 ms.`],
      [failure('canceled', 'ERR_CANCELED'), `Cancelled: The request to ${PETS_URL} was aborted before it completed.`],
      [failure('socket hang up'), 'Error: socket hang up'],
    ])('should turn a transport failure into an error result (%s)', async (error, message) => {
      request.mockRejectedValueOnce(error);

      await expect(executeRequest(listPets, listOptions)).resolves.toEqual({
        isError: true,
        content: [{ type: 'text', text: message }],
      });
    });
  });

  describe('classifyTransportError', () => {
    it('should record the category and code', () => {
      const error = classifyTransportError(failure('timeout', 'ETIMEDOUT'), PETS_URL, 50);

      expect(error.category).toBe('timeout');
      expect(error.message).toBe(`Timeout: No response from ${PETS_URL} within 50 ms.`);
      expect(error.details).toEqual({ category: 'timeout', code: 'ETIMEDOUT' });
    });

    it('should classify a thrown non-error value as generic', () => {
      const error = classifyTransportError('boom', PETS_URL, 50);

      expect(error.category).toBe('generic');
      expect(error.message).toBe('Error: boom');
    });
  });

  describe('mergeHeaders', () => {
    it('should let a later layer replace a name regardless of case', () => {
      expect(mergeHeaders([['Accept', 'application/json']], [['ACCEPT', 'text/csv']])).toEqual({ ACCEPT: 'text/csv' });
    });

    it('should only join repeats inside the last layer', () => {
      expect(mergeHeaders(
        [['X-Tag', 'a'], ['X-Tag', 'b']],
        []
      )).toEqual({ 'X-Tag': 'b' });
    });
  });
});
