/**
 * Bridge configuration, read from the environment.
 */

import { z } from 'zod';
import { validateBearerToken, validateGatewayPin } from '@shadebridge/domain';

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

const BooleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform(v => v === 'true' || v === '1' || v === 'yes');

const LogLevel = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

const EnvSchema = z
  .object({
    GATEWAY_TOKEN: z.string({ required_error: 'GATEWAY_TOKEN is required' }),
    GATEWAY_PIN: z.string({ required_error: 'GATEWAY_PIN is required' }),
    GATEWAY_USE_LOCAL_API: BooleanFlag.default('true'),
    GATEWAY_CLOUD_URL: z.string().url().optional(),
    GATEWAY_VERIFY_SSL: BooleanFlag.default('true'),
    PORT: z.coerce.number().int().min(1).max(65535).default(3080),
    HOST: z.string().default('0.0.0.0'),
    LOG_LEVEL: LogLevel.default('info'),
    NODE_ENV: z.string().default('production'),
    SHORT_POLL_SECONDS: z.coerce.number().int().positive().default(60),
    CORS_ORIGIN: z.string().default('*'),
  })
  .superRefine((env, ctx) => {
    const token = validateBearerToken(env.GATEWAY_TOKEN);
    if (!token.valid) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['GATEWAY_TOKEN'], message: token.error });
    }
    const pin = validateGatewayPin(env.GATEWAY_PIN);
    if (!pin.valid) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['GATEWAY_PIN'], message: pin.error });
    }
    if (!env.GATEWAY_USE_LOCAL_API && !env.GATEWAY_CLOUD_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['GATEWAY_CLOUD_URL'],
        message: 'GATEWAY_CLOUD_URL is required when GATEWAY_USE_LOCAL_API is false',
      });
    }
  });

// ---------------------------------------------------------------------------
// Resolved configuration
// ---------------------------------------------------------------------------

export interface GatewayConfig {
  token: string;
  pin: string;
  baseUrl: string;
  verifySsl: boolean;
}

export interface BridgeConfig {
  gateway: GatewayConfig;
  server: { port: number; host: string; corsOrigin: string };
  logLevel: z.infer<typeof LogLevel>;
  prettyLogs: boolean;
  shortPollMs: number;
}

export type ConfigResult =
  | { ok: true; config: BridgeConfig }
  | { ok: false; problems: string[] };

export function localApiUrl(pin: string): string {
  return `https://gateway-${pin}.local:8443/enduser-mobile-web/1/enduserAPI/`;
}

function withTrailingSlash(url: string): string {
  return url.endsWith('/') ? url : `${url}/`;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ConfigResult {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    return {
      ok: false,
      problems: parsed.error.issues.map(i => `${i.path.join('.') || 'env'}: ${i.message}`),
    };
  }

  const e = parsed.data;
  const pin = e.GATEWAY_PIN.trim();
  const baseUrl = e.GATEWAY_USE_LOCAL_API || !e.GATEWAY_CLOUD_URL
    ? localApiUrl(pin)
    : withTrailingSlash(e.GATEWAY_CLOUD_URL);

  return {
    ok: true,
    config: {
      gateway: {
        token: e.GATEWAY_TOKEN.trim(),
        pin,
        baseUrl,
        verifySsl: e.GATEWAY_VERIFY_SSL,
      },
      server: { port: e.PORT, host: e.HOST, corsOrigin: e.CORS_ORIGIN },
      logLevel: e.LOG_LEVEL,
      prettyLogs: e.NODE_ENV === 'development',
      shortPollMs: e.SHORT_POLL_SECONDS * 1000,
    },
  };
}
