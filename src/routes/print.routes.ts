import { Router, Request, Response } from 'express';
import { ZodError } from 'zod';
import { toPrintParts, type PrinterPort } from '../tools/printer.tools';
import { base64ImageToBuffer } from '../utils/base64';
import {
  AuthenticationError,
  InvalidContentError,
  TimeoutError,
  errorKind,
  errorMessage,
} from '../utils/errors';
import { logger } from '../utils/logger';
import {
  printContentSchema,
  printImageBase64Schema,
  printImageFileSchema,
  printImageUrlSchema,
  printStatusSchema,
  printTextSchema,
  printUrlSchema,
} from '../validators/print.validator';

/** HTTP status for a failed print request */
export function statusForError(error: unknown): number {
  if (error instanceof ZodError) return 400;
  if (error instanceof AuthenticationError) return 401;
  if (error instanceof InvalidContentError) return 422;
  if (error instanceof TimeoutError) return 504;
  return 502;
}

function sendError(res: Response, error: unknown): void {
  const status = statusForError(error);
  if (status >= 500) {
    logger.error({ kind: errorKind(error), error: errorMessage(error) }, 'Print request failed');
  }
  res.status(status).json({ success: false, error: errorMessage(error), kind: errorKind(error) });
}

export function createPrintRouter(client: PrinterPort): Router {
  const router = Router();

  /** POST /api/print/text - Print text */
  router.post('/text', async (req: Request, res: Response) => {
    try {
      const { text } = printTextSchema.parse(req.body);
      const receipt = await client.submitText(text);
      res.json({ success: true, data: receipt });
    } catch (error) {
      sendError(res, error);
    }
  });

  /** POST /api/print/image-url - Fetch and print a remote image */
  router.post('/image-url', async (req: Request, res: Response) => {
    try {
      const { url } = printImageUrlSchema.parse(req.body);
      const receipt = await client.submit({ kind: 'imageUrl', address: url });
      res.json({ success: true, data: receipt });
    } catch (error) {
      sendError(res, error);
    }
  });

  /** POST /api/print/image - Print base64 image data */
  router.post('/image', async (req: Request, res: Response) => {
    try {
      const { data } = printImageBase64Schema.parse(req.body);
      const bytes = base64ImageToBuffer(data);
      const receipt = await client.submit({ kind: 'image', bytes });
      res.json({ success: true, data: receipt });
    } catch (error) {
      sendError(res, error);
    }
  });

  /** POST /api/print/image-file - Print an image file from the local disk */
  router.post('/image-file', async (req: Request, res: Response) => {
    try {
      const { path } = printImageFileSchema.parse(req.body);
      const receipt = await client.submit({ kind: 'imageFile', path });
      res.json({ success: true, data: receipt });
    } catch (error) {
      sendError(res, error);
    }
  });

  /** POST /api/print/content - Print text and image parts as one job */
  router.post('/content', async (req: Request, res: Response) => {
    try {
      const { parts } = printContentSchema.parse(req.body);
      const receipt = await client.submitParts(toPrintParts(parts));
      res.json({ success: true, data: receipt });
    } catch (error) {
      sendError(res, error);
    }
  });

  /** POST /api/print/url - Print a web page rendered by the printer service */
  router.post('/url', async (req: Request, res: Response) => {
    try {
      const { url } = printUrlSchema.parse(req.body);
      const receipt = await client.submit({ kind: 'url', address: url });
      res.json({ success: true, data: receipt });
    } catch (error) {
      sendError(res, error);
    }
  });

  /** GET /api/print/:contentId/status - Delivery status of submitted content */
  router.get('/:contentId/status', async (req: Request, res: Response) => {
    try {
      const { contentId } = printStatusSchema.parse({ contentId: req.params.contentId });
      const status = await client.queryStatus(contentId);
      res.json({ success: true, data: { contentId, status } });
    } catch (error) {
      sendError(res, error);
    }
  });

  return router;
}
