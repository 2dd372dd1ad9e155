export interface Credentials {
  readonly apiKey: string;
  readonly deviceId: string;
}

/** Opaque user id issued by the printer service when the device is bound to the API key */
export type UserToken = string;

export type PrintContent =
  | { readonly kind: 'text'; readonly body: string }
  | { readonly kind: 'image'; readonly bytes: Buffer }
  | { readonly kind: 'imageFile'; readonly path: string }
  | { readonly kind: 'imageUrl'; readonly address: string }
  | { readonly kind: 'url'; readonly address: string };

/** Content that can be combined into one `printcontent` submission */
export type PrintPart = Exclude<PrintContent, { readonly kind: 'url' }>;

export type ContentKind = 'TEXT' | 'IMG' | 'URL';

/**
 * Wire representation of one piece of content.
 * TEXT: base64 of GBK text. IMG: base64 of a 1-bit BMP. URL: the address verbatim.
 */
export interface EncodedPayload {
  readonly contentKind: ContentKind;
  readonly data: string;
}

export interface PrintReceipt {
  readonly contentId: number;
}

/** Receipt for text that may have been split into several sequential submissions */
export interface TextPrintReceipt extends PrintReceipt {
  readonly contentIds: readonly number[];
}
