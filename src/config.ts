import dotenv from 'dotenv';
import fs from 'fs';
import path from 'path';
import { z } from 'zod';

dotenv.config();

export const DEFAULT_API_BASE_URL = 'http://open.memobird.cn/home';

function readVersion(): string {
  try {
    const p = path.join(__dirname, '..', 'package.json');
    if (fs.existsSync(p)) {
      const pkg: unknown = JSON.parse(fs.readFileSync(p, 'utf-8'));
      if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
        return pkg.version;
      }
    }
  } catch {
    // Version is informational only
  }
  return '0.0.0';
}

export const version = readVersion();

const configSchema = z.object({
  apiKey: z.string({ required_error: 'MEMOBIRD_AK (or --ak) is required' }).min(1),
  deviceId: z.string({ required_error: 'MEMOBIRD_DEVICE_ID (or --did) is required' }).min(1),
  userIdentifying: z.string().default(''),
  apiBaseUrl: z.string().url().default(DEFAULT_API_BASE_URL),
  requestTimeoutSeconds: z.coerce.number().positive().default(15),
  printUrlTimeoutSeconds: z.coerce.number().positive().default(30),
  maxImageWidth: z.coerce.number().int().positive().default(384),
  maxImageBytes: z.coerce.number().int().positive().default(10 * 1024 * 1024),
  maxTextLength: z.coerce.number().int().positive().default(1000),
  transport: z.enum(['stdio', 'http']).default('stdio'),
  port: z.coerce.number().int().min(1).max(65535).default(8000),
  host: z.string().min(1).default('127.0.0.1'),
});

export type AppConfig = z.infer<typeof configSchema>;

/** Values given on the command line; they win over the environment */
export interface ConfigOverrides {
  readonly apiKey?: string;
  readonly deviceId?: string;
  readonly transport?: string;
  readonly port?: string;
  readonly host?: string;
}

/** Treat empty env vars the same as unset ones so defaults apply */
function value(raw: string | undefined): string | undefined {
  return raw === undefined || raw.trim() === '' ? undefined : raw.trim();
}

/** Build and validate the runtime configuration */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: ConfigOverrides = {}
): AppConfig {
  const result = configSchema.safeParse({
    apiKey: value(overrides.apiKey) ?? value(env.MEMOBIRD_AK),
    deviceId: value(overrides.deviceId) ?? value(env.MEMOBIRD_DEVICE_ID),
    userIdentifying: value(env.MEMOBIRD_USER_IDENTIFYING),
    apiBaseUrl: value(env.MEMOBIRD_API_BASE_URL)?.replace(/\/+$/, ''),
    requestTimeoutSeconds: value(env.REQUEST_TIMEOUT_SECONDS),
    printUrlTimeoutSeconds: value(env.PRINT_URL_TIMEOUT_SECONDS),
    maxImageWidth: value(env.IMAGE_MAX_WIDTH),
    maxImageBytes: value(env.IMAGE_MAX_BYTES),
    maxTextLength: value(env.MAX_TEXT_LENGTH),
    transport: value(overrides.transport) ?? value(env.MCP_TRANSPORT),
    port: value(overrides.port) ?? value(env.PORT),
    host: value(overrides.host) ?? value(env.HOST),
  });

  if (!result.success) {
    const problems = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid configuration: ${problems.join('; ')}`);
  }
  return result.data;
}
