import { z } from 'zod';

const webAddress = z
  .string()
  .url('Must be an absolute URL')
  .refine((value) => /^https?:\/\//i.test(value), 'Only http and https URLs are supported');

export const printTextSchema = z.object({
  text: z.string().min(1, 'Text is required').describe('The text content to print.'),
});

export const printImageUrlSchema = z.object({
  url: webAddress.describe('URL of a PNG, JPEG, GIF, WebP or similar image to print.'),
});

export const printImageBase64Schema = z.object({
  data: z
    .string()
    .min(1, 'Image data is required')
    .describe('Base64 image data, optionally prefixed with data:image/...;base64,'),
});

export const printImageFileSchema = z.object({
  path: z.string().min(1, 'Path is required').describe('Path of a local PNG, JPEG, GIF, WebP or TIFF image file.'),
});

const printPartSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('text'), text: z.string().min(1, 'Text is required') }),
  z.object({ type: z.literal('image_url'), url: webAddress }),
  z.object({ type: z.literal('image_base64'), data: z.string().min(1, 'Image data is required') }),
  z.object({ type: z.literal('image_file'), path: z.string().min(1, 'Path is required') }),
]);

export const printContentSchema = z.object({
  parts: z
    .array(printPartSchema)
    .min(1, 'At least one part is required')
    .describe('Text and image parts printed in order as a single job.'),
});

export const printUrlSchema = z.object({
  url: webAddress.describe('Web page URL; the printer service fetches and renders it.'),
});

export const printStatusSchema = z.object({
  contentId: z.coerce.number().int().positive().describe('Content ID returned by a print tool.'),
});

export type PrintTextRequest = z.infer<typeof printTextSchema>;
export type PrintImageUrlRequest = z.infer<typeof printImageUrlSchema>;
export type PrintImageBase64Request = z.infer<typeof printImageBase64Schema>;
export type PrintImageFileRequest = z.infer<typeof printImageFileSchema>;
export type PrintPartRequest = z.infer<typeof printPartSchema>;
export type PrintContentRequest = z.infer<typeof printContentSchema>;
export type PrintUrlRequest = z.infer<typeof printUrlSchema>;
export type PrintStatusRequest = z.infer<typeof printStatusSchema>;
