import express from 'express';
import cors from 'cors';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { version } from './config';
import { createPrintRouter } from './routes/print.routes';
import { createMcpServer } from './server';
import type { PrinterPort } from './tools/printer.tools';
import { errorMessage } from './utils/errors';
import { logger } from './utils/logger';

/** HTTP surface: MCP over Streamable HTTP at /mcp plus a small REST API */
export function createApp(client: PrinterPort) {
  const app = express();

  app.use(cors());
  app.use(express.json({ limit: '20mb' }));

  app.use('/api/print', createPrintRouter(client));

  // Stateless: a fresh server/transport pair per request, sharing one printer client
  app.post('/mcp', async (req, res) => {
    const server = createMcpServer(client);
    const transport = new StreamableHTTPServerTransport({ sessionIdGenerator: undefined });

    res.on('close', () => {
      transport.close().catch((error) => logger.warn({ error: errorMessage(error) }, 'MCP transport close failed'));
      server.close().catch((error) => logger.warn({ error: errorMessage(error) }, 'MCP server close failed'));
    });

    try {
      await server.connect(transport);
      await transport.handleRequest(req, res, req.body);
    } catch (error) {
      logger.error({ error: errorMessage(error) }, 'MCP request failed');
      if (!res.headersSent) {
        res.status(500).json({
          jsonrpc: '2.0',
          error: { code: -32603, message: 'Internal server error' },
          id: null,
        });
      }
    }
  });

  // No sessions in stateless mode: nothing to stream to (GET) or terminate (DELETE)
  const methodNotAllowed = (_req: express.Request, res: express.Response) => {
    res.status(405).json({
      jsonrpc: '2.0',
      error: { code: -32000, message: 'Method not allowed.' },
      id: null,
    });
  };
  app.get('/mcp', methodNotAllowed);
  app.delete('/mcp', methodNotAllowed);

  app.get('/api/health', (_req, res) => {
    res.json({
      success: true,
      service: 'memobird-print-bridge',
      version,
      uptime: process.uptime(),
      timestamp: new Date().toISOString(),
    });
  });

  return app;
}
