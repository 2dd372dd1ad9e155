import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import type { Logger } from 'pino';
import { v4 as uuidv4 } from 'uuid';
import type { PrintPart } from '../models/print-content.model';
import type { PrinterClient } from '../services/printer-client.service';
import { base64ImageToBuffer } from '../utils/base64';
import { errorKind, errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';
import {
  printContentSchema,
  printImageBase64Schema,
  printImageFileSchema,
  printImageUrlSchema,
  printStatusSchema,
  printTextSchema,
  printUrlSchema,
  type PrintContentRequest,
  type PrintImageBase64Request,
  type PrintImageFileRequest,
  type PrintImageUrlRequest,
  type PrintPartRequest,
  type PrintStatusRequest,
  type PrintTextRequest,
  type PrintUrlRequest,
} from '../validators/print.validator';

/** The part of the printer client the tools depend on */
export type PrinterPort = Pick<PrinterClient, 'submit' | 'submitText' | 'submitParts' | 'queryStatus'>;

/** Map validated request parts onto printable content */
export function toPrintParts(parts: readonly PrintPartRequest[]): PrintPart[] {
  return parts.map((part): PrintPart => {
    switch (part.type) {
      case 'text':
        return { kind: 'text', body: part.text };
      case 'image_url':
        return { kind: 'imageUrl', address: part.url };
      case 'image_base64':
        return { kind: 'image', bytes: base64ImageToBuffer(part.data) };
      case 'image_file':
        return { kind: 'imageFile', path: part.path };
    }
  });
}

function success(result: object): CallToolResult {
  return { content: [{ type: 'text', text: JSON.stringify(result) }] };
}

function failure(error: unknown): CallToolResult {
  return {
    isError: true,
    content: [{ type: 'text', text: `${errorKind(error)}: ${errorMessage(error)}` }],
  };
}

/** Run one tool invocation; every failure becomes an error result, never a crash */
async function runTool(tool: string, action: (log: Logger) => Promise<object>): Promise<CallToolResult> {
  const log = logger.child({ tool, requestId: uuidv4() });
  try {
    const result = await action(log);
    log.info({ result }, 'Tool completed');
    return success(result);
  } catch (error) {
    log.error({ kind: errorKind(error), error: errorMessage(error) }, 'Tool failed');
    return failure(error);
  }
}

export function createToolHandlers(client: PrinterPort) {
  return {
    printText: ({ text }: PrintTextRequest) =>
      runTool('print_text', async (log) => {
        log.info({ length: text.length }, 'Printing text');
        const { contentId, contentIds } = await client.submitText(text);
        return contentIds.length > 1 ? { contentId, contentIds } : { contentId };
      }),

    printImageFromUrl: ({ url }: PrintImageUrlRequest) =>
      runTool('print_image_from_url', async (log) => {
        log.info({ url }, 'Printing image from URL');
        const { contentId } = await client.submit({ kind: 'imageUrl', address: url });
        return { contentId };
      }),

    printImageBase64: ({ data }: PrintImageBase64Request) =>
      runTool('print_image_base64', async (log) => {
        const bytes = base64ImageToBuffer(data);
        log.info({ bytes: bytes.length }, 'Printing base64 image');
        const { contentId } = await client.submit({ kind: 'image', bytes });
        return { contentId };
      }),

    printImageFile: ({ path }: PrintImageFileRequest) =>
      runTool('print_image_file', async (log) => {
        log.info({ path }, 'Printing image file');
        const { contentId } = await client.submit({ kind: 'imageFile', path });
        return { contentId };
      }),

    printContent: ({ parts }: PrintContentRequest) =>
      runTool('print_content', async (log) => {
        log.info({ parts: parts.map((part) => part.type) }, 'Printing combined content');
        const { contentId } = await client.submitParts(toPrintParts(parts));
        return { contentId };
      }),

    printUrl: ({ url }: PrintUrlRequest) =>
      runTool('print_url', async (log) => {
        log.info({ url }, 'Printing web page');
        const { contentId } = await client.submit({ kind: 'url', address: url });
        return { contentId };
      }),

    checkPrintStatus: ({ contentId }: PrintStatusRequest) =>
      runTool('check_print_status', async () => {
        const status = await client.queryStatus(contentId);
        return { contentId, status };
      }),
  };
}

export function registerPrinterTools(server: McpServer, client: PrinterPort): void {
  const handlers = createToolHandlers(client);

  server.tool(
    'print_text',
    'Print text on the Memobird printer. Long text is printed in several consecutive parts.',
    printTextSchema.shape,
    (args) => handlers.printText(args)
  );

  server.tool(
    'print_image_from_url',
    'Download an image and print it, scaled to the paper width in black and white.',
    printImageUrlSchema.shape,
    (args) => handlers.printImageFromUrl(args)
  );

  server.tool(
    'print_image_base64',
    'Print an image given as base64 data, scaled to the paper width in black and white.',
    printImageBase64Schema.shape,
    (args) => handlers.printImageBase64(args)
  );

  server.tool(
    'print_image_file',
    'Print a local image file, scaled to the paper width in black and white.',
    printImageFileSchema.shape,
    (args) => handlers.printImageFile(args)
  );

  server.tool(
    'print_content',
    'Print several text and image parts, in order, as one job.',
    printContentSchema.shape,
    (args) => handlers.printContent(args)
  );

  server.tool(
    'print_url',
    'Print a web page; the printer service fetches and renders it.',
    printUrlSchema.shape,
    (args) => handlers.printUrl(args)
  );

  server.tool(
    'check_print_status',
    'Check whether submitted content has been printed (PENDING, PRINTED, FAILED or UNKNOWN).',
    printStatusSchema.shape,
    (args) => handlers.checkPrintStatus(args)
  );
}
