import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { version } from './config';
import { registerPrinterTools, type PrinterPort } from './tools/printer.tools';

export const SERVER_NAME = 'Memobird Printer Server';

/** Tool server exposing the printer operations */
export function createMcpServer(client: PrinterPort): McpServer {
  const server = new McpServer({ name: SERVER_NAME, version });
  registerPrinterTools(server, client);
  return server;
}
