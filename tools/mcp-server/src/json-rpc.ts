import { errorMessage } from 'tilegrid-core';
import type { TileGridMcpServer } from './index.js';

export const MCP_PROTOCOL_VERSION = '2024-11-05';

export type JsonRpcId = number | string | null;

export interface JsonRpcRequest {
  jsonrpc: '2.0';
  id?: number | string;
  method: string;
  params?: Record<string, unknown>;
}

export interface JsonRpcResponse {
  jsonrpc: '2.0';
  id: JsonRpcId;
  result?: unknown;
  error?: { code: number; message: string; data?: unknown };
}

export interface ServerInfo {
  name: string;
  version: string;
  description: string;
}

function asRecord(value: unknown): Record<string, unknown> | null {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return null;
  return Object.fromEntries(Object.entries(value));
}

function readId(value: unknown): JsonRpcId {
  return typeof value === 'number' || typeof value === 'string' ? value : null;
}

function errorResponse(id: JsonRpcId, code: number, message: string): JsonRpcResponse {
  return { jsonrpc: '2.0', id, error: { code, message } };
}

/**
 * Validate a decoded JSON-RPC message, returning null when it is not a request
 */
export function toRequest(value: unknown): JsonRpcRequest | null {
  const msg = asRecord(value);
  if (!msg || msg.jsonrpc !== '2.0' || typeof msg.method !== 'string') return null;
  const request: JsonRpcRequest = { jsonrpc: '2.0', method: msg.method };
  const id = readId(msg.id);
  if (id !== null) request.id = id;
  const params = asRecord(msg.params);
  if (params) request.params = params;
  return request;
}

/**
 * Handle one line of the stdio transport.
 *
 * @returns the response to write, or null for notifications
 */
export async function handleRequest(
  server: TileGridMcpServer,
  serverInfo: ServerInfo,
  line: string,
): Promise<JsonRpcResponse | null> {
  let decoded: unknown;
  try {
    decoded = JSON.parse(line);
  } catch {
    return errorResponse(null, -32700, 'Parse error');
  }

  const request = toRequest(decoded);
  if (!request) {
    return errorResponse(readId(asRecord(decoded)?.id), -32600, 'Invalid Request');
  }
  // Notifications carry no id and get no response
  if (request.id === undefined) return null;
  const id = request.id;

  try {
    switch (request.method) {
      case 'initialize':
        return {
          jsonrpc: '2.0',
          id,
          result: {
            protocolVersion: MCP_PROTOCOL_VERSION,
            capabilities: {
              tools: {},
            },
            serverInfo,
          },
        };

      case 'tools/list':
        return { jsonrpc: '2.0', id, result: { tools: server.getTools() } };

      case 'tools/call': {
        const name = request.params?.name;
        if (typeof name !== 'string') {
          return errorResponse(id, -32602, 'Invalid params: missing tool name');
        }
        const result = await server.executeTool({
          name,
          arguments: asRecord(request.params?.arguments) ?? {},
        });
        return { jsonrpc: '2.0', id, result };
      }

      case 'ping':
        return { jsonrpc: '2.0', id, result: {} };

      default:
        return errorResponse(id, -32601, `Method not found: ${request.method}`);
    }
  } catch (error) {
    return errorResponse(id, -32603, errorMessage(error));
  }
}
