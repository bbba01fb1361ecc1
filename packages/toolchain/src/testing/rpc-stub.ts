import { createServer, type Server } from 'node:http';
import type { AddressInfo } from 'node:net';
import { z } from 'zod';

const RpcRequestSchema = z.object({
  id: z.union([z.number(), z.string()]),
  method: z.string(),
});

export interface RpcStub {
  url: string;
  methods: string[];
  close(): Promise<void>;
}

/**
 * Minimal in-process JSON-RPC endpoint. `handlers` map method names to
 * results; anything else answers with a method-not-found error.
 */
export async function startRpcStub(handlers: Record<string, unknown>): Promise<RpcStub> {
  const methods: string[] = [];
  const server: Server = createServer((req, res) => {
    let body = '';
    req.on('data', (chunk: Buffer) => {
      body += chunk.toString('utf8');
    });
    req.on('end', () => {
      const request = RpcRequestSchema.parse(JSON.parse(body));
      methods.push(request.method);
      const payload =
        request.method in handlers
          ? { jsonrpc: '2.0', id: request.id, result: handlers[request.method] }
          : { jsonrpc: '2.0', id: request.id, error: { code: -32601, message: 'Method not found' } };
      res.writeHead(200, { 'content-type': 'application/json' });
      res.end(JSON.stringify(payload));
    });
  });

  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
  const { port }: AddressInfo = addressOf(server);

  return {
    url: `http://127.0.0.1:${port}`,
    methods,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()));
      }),
  };
}

function addressOf(server: Server): AddressInfo {
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('RPC stub is not listening on a TCP port');
  }
  return address;
}
