import { z } from 'zod';
import type { AppConfig } from '../config';
import type {
  Credentials,
  PrintContent,
  PrintPart,
  PrintReceipt,
  TextPrintReceipt,
  UserToken,
} from '../models/print-content.model';
import { toPrintStatus, type PrintStatus } from '../models/print-status.model';
import {
  AuthenticationError,
  ConnectivityError,
  HttpStatusError,
  InvalidContentError,
  PrinterServiceError,
  TimeoutError,
  errorMessage,
} from '../utils/errors';
import { logger } from '../utils/logger';
import { ContentEncoder, assertPrintableText, splitText, toPrintContent } from './content-encoder.service';
import { SessionAuthenticator } from './session.service';
import { HttpTransport, type RequestOptions, type Transport } from './transport.service';

export interface PrinterClientOptions {
  readonly credentials: Credentials;
  /** Base URL without trailing slash, e.g. http://open.memobird.cn/home */
  readonly apiBaseUrl: string;
  readonly transport: Transport;
  readonly encoder: ContentEncoder;
  /** Longest text (in characters) sent in one submission */
  readonly maxTextLength: number;
  readonly requestTimeoutMs?: number;
  /** Timeout for page submissions, which the service renders before answering */
  readonly printUrlTimeoutMs?: number;
  /** Optional caller identity passed along with the device binding */
  readonly userIdentifying?: string;
  readonly now?: () => Date;
}

/** Lifecycle of one submission; ACCEPTED and REJECTED_FINAL are terminal */
export type SubmissionState =
  | 'UNSUBMITTED'
  | 'TOKEN_RESOLVED'
  | 'ENCODED'
  | 'POSTED'
  | 'ACCEPTED'
  | 'REJECTED_RETRY'
  | 'REJECTED_FINAL';

/** Body field carrying the content of a print request */
type WireContent = { readonly printcontent: string } | { readonly printUrl: string };

const SUCCESS_CODE = 1;
const TOKEN_REJECTED_CODES: ReadonlySet<number> = new Set([401, 403]);

const numeric = z.union([z.number(), z.string().regex(/^-?\d+$/).transform(Number)]);

/** Response envelope shared by every endpoint; unknown fields are tolerated */
const serviceEnvelopeSchema = z
  .object({
    showapi_res_code: numeric,
    showapi_res_error: z.string().nullish(),
    showapi_userid: z.union([z.string(), z.number()]).nullish(),
    printcontentid: numeric.nullish(),
    printflag: numeric.nullish(),
  })
  .passthrough();

export type ServiceEnvelope = z.infer<typeof serviceEnvelopeSchema>;

/** Local time as the service expects it: YYYY-MM-DD HH:mm:ss */
export function formatTimestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

/** Decode a service response and fail on any result code other than success */
export function parseEnvelope(body: Buffer): ServiceEnvelope {
  const text = body.toString('utf-8');
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    throw new PrinterServiceError(-2, `Failed to decode JSON response: ${text.slice(0, 100)}`, { cause: error });
  }

  const parsed = serviceEnvelopeSchema.safeParse(json);
  if (!parsed.success) {
    throw new PrinterServiceError(-2, `Unexpected response: ${text.slice(0, 100)}`, { cause: parsed.error });
  }
  if (parsed.data.showapi_res_code !== SUCCESS_CODE) {
    throw new PrinterServiceError(
      parsed.data.showapi_res_code,
      parsed.data.showapi_res_error || 'Unknown API error'
    );
  }
  return parsed.data;
}

/** True when a request failed because the user token (or API key) was refused */
export function isAuthorizationFailure(error: unknown): boolean {
  if (error instanceof HttpStatusError) return TOKEN_REJECTED_CODES.has(error.code);
  if (error instanceof PrinterServiceError) return TOKEN_REJECTED_CODES.has(error.code);
  return false;
}

function isTransientFailure(error: unknown): boolean {
  return (
    error instanceof ConnectivityError ||
    error instanceof TimeoutError ||
    (error instanceof HttpStatusError && (error.code >= 500 || error.code === 429))
  );
}

/**
 * One device binding, one session.
 *
 * Every public operation runs to completion before returning. The only built-in
 * retry is a single re-bind when a submission's token is refused.
 */
export class PrinterClient {
  private readonly session: SessionAuthenticator;
  private readonly now: () => Date;

  constructor(private readonly options: PrinterClientOptions) {
    this.session = new SessionAuthenticator(() => this.bindDevice());
    this.now = options.now ?? (() => new Date());
  }

  get deviceId(): string {
    return this.options.credentials.deviceId;
  }

  /** Submit one piece of content and return the service's content id */
  submit(content: PrintContent): Promise<PrintReceipt> {
    return this.deliver(content.kind, async () => {
      const payload = await this.options.encoder.encode(content);
      return payload.contentKind === 'URL' ? { printUrl: payload.data } : { printcontent: toPrintContent(payload) };
    });
  }

  /** Submit text and image parts together as a single print job */
  async submitParts(parts: readonly PrintPart[]): Promise<PrintReceipt> {
    if (parts.length === 0) {
      throw new InvalidContentError('Cannot print an empty list of parts');
    }
    for (const part of parts) {
      if (part.kind === 'text') assertPrintableText(part.body);
    }
    return this.deliver('parts', async () => ({
      printcontent: await this.options.encoder.encodeParts(parts),
    }));
  }

  /**
   * Resolve the token, encode once, post. A rejected token is replaced and the
   * same wire content posted exactly once more.
   */
  private async deliver(kind: string, encode: () => Promise<WireContent>): Promise<PrintReceipt> {
    let state: SubmissionState = 'UNSUBMITTED';
    const advance = (next: SubmissionState) => {
      logger.debug({ kind, from: state, to: next }, 'Submission state');
      state = next;
    };

    let token = await this.session.resolveToken();
    advance('TOKEN_RESOLVED');
    const content = await encode();
    advance('ENCODED');

    try {
      advance('POSTED');
      const contentId = await this.post(content, token);
      advance('ACCEPTED');
      return { contentId };
    } catch (error) {
      if (!isAuthorizationFailure(error)) throw error;
      advance('REJECTED_RETRY');
      logger.warn({ deviceId: this.deviceId, error: errorMessage(error) }, 'User token rejected, binding again');
      this.session.invalidate(token);
    }

    token = await this.session.resolveToken();
    advance('TOKEN_RESOLVED');

    try {
      advance('POSTED');
      const contentId = await this.post(content, token);
      advance('ACCEPTED');
      return { contentId };
    } catch (error) {
      if (!isAuthorizationFailure(error)) throw error;
      advance('REJECTED_FINAL');
      this.session.invalidate(token);
      throw new AuthenticationError('token-rejected', `Printer service refused a freshly bound token: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  /**
   * Print text, splitting it into sequential submissions of at most
   * `maxTextLength` characters. `contentId` is the id of the last chunk.
   */
  async submitText(text: string): Promise<TextPrintReceipt> {
    assertPrintableText(text);

    const chunks = splitText(text, this.options.maxTextLength);
    const contentIds: number[] = [];
    for (const body of chunks) {
      const receipt = await this.submit({ kind: 'text', body });
      contentIds.push(receipt.contentId);
    }

    if (chunks.length > 1) {
      logger.info({ chunks: chunks.length, contentIds }, 'Long text printed in chunks');
    }
    return { contentId: contentIds[contentIds.length - 1], contentIds };
  }

  async queryStatus(contentId: number): Promise<PrintStatus> {
    const envelope = await this.call('/getprintstatus', {
      method: 'GET',
      query: {
        ak: this.options.credentials.apiKey,
        timestamp: formatTimestamp(this.now()),
        printcontentid: contentId,
      },
    });

    const status = toPrintStatus(envelope.printflag ?? undefined);
    logger.info({ contentId, printflag: envelope.printflag, status }, 'Print status checked');
    return status;
  }

  /** Bind the device to the API key; invoked only through the session */
  private async bindDevice(): Promise<UserToken> {
    const { apiKey, deviceId } = this.options.credentials;
    logger.info({ deviceId }, 'Binding device');

    let envelope: ServiceEnvelope;
    try {
      envelope = await this.call('/setuserbind', {
        method: 'GET',
        query: {
          ak: apiKey,
          timestamp: formatTimestamp(this.now()),
          memobirdID: deviceId,
          useridentifying: this.options.userIdentifying ?? '',
        },
      });
    } catch (error) {
      if (isTransientFailure(error)) {
        throw new AuthenticationError('transient', `Device binding failed: ${errorMessage(error)}`, { cause: error });
      }
      throw new AuthenticationError('device-not-bound', `Device ${deviceId} could not be bound: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    const userId = envelope.showapi_userid;
    if (userId === undefined || userId === null || String(userId) === '') {
      throw new AuthenticationError('device-not-bound', `Binding response for device ${deviceId} carried no user id`);
    }

    logger.info({ deviceId }, 'Device bound');
    return String(userId);
  }

  private async post(content: WireContent, token: UserToken): Promise<number> {
    const { apiKey, deviceId } = this.options.credentials;
    const timestamp = formatTimestamp(this.now());

    const envelope =
      'printUrl' in content
        ? await this.call('/printpaperFromUrl', {
            method: 'POST',
            json: { ak: apiKey, timestamp, printUrl: content.printUrl, memobirdID: deviceId, userID: token },
            timeoutMs: this.options.printUrlTimeoutMs ?? this.options.requestTimeoutMs,
          })
        : await this.call('/printpaper', {
            method: 'POST',
            json: { ak: apiKey, timestamp, printcontent: content.printcontent, memobirdID: deviceId, userID: token },
          });

    const contentId = envelope.printcontentid;
    if (contentId === undefined || contentId === null) {
      throw new PrinterServiceError(-1, 'Content ID not found in successful print response');
    }

    const endpoint = 'printUrl' in content ? 'printpaperFromUrl' : 'printpaper';
    logger.info({ deviceId, contentId, endpoint }, 'Print request accepted');
    return contentId;
  }

  private async call(path: string, request: RequestOptions): Promise<ServiceEnvelope> {
    const response = await this.options.transport.fetch(`${this.options.apiBaseUrl}${path}`, {
      timeoutMs: this.options.requestTimeoutMs,
      ...request,
    });
    return parseEnvelope(response.body);
  }
}

/** Wire a client from the runtime configuration */
export function createPrinterClient(config: AppConfig, transport?: Transport): PrinterClient {
  const requestTimeoutMs = Math.round(config.requestTimeoutSeconds * 1000);
  const printUrlTimeoutMs = Math.round(config.printUrlTimeoutSeconds * 1000);
  const http = transport ?? new HttpTransport(requestTimeoutMs);

  return new PrinterClient({
    credentials: { apiKey: config.apiKey, deviceId: config.deviceId },
    apiBaseUrl: config.apiBaseUrl,
    transport: http,
    encoder: new ContentEncoder(http, {
      maxImageWidth: config.maxImageWidth,
      maxImageBytes: config.maxImageBytes,
      timeoutMs: requestTimeoutMs,
    }),
    maxTextLength: config.maxTextLength,
    requestTimeoutMs,
    printUrlTimeoutMs,
    userIdentifying: config.userIdentifying,
  });
}
