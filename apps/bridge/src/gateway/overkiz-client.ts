/**
 * Overkiz Gateway Client
 *
 * HTTP implementation of the gateway facade over the end-user API that
 * the shade gateway exposes on the LAN (or through the vendor cloud).
 *
 * - Bearer token auth on every request
 * - TLS verification toggled through an https.Agent
 * - Every failure leaves as a GatewayError with a stable kind
 */

import axios, { type AxiosInstance, type Method } from 'axios';
import { Agent } from 'node:https';
import { setTimeout as delay } from 'node:timers/promises';
import { z } from 'zod';
import type { Logger } from '../lib/logger.js';
import { GatewayError, errorMessage, isGatewayError } from './errors.js';
import {
  ExecResponseSchema,
  ListenerResponseSchema,
  RawDeviceSchema,
  RawEventSchema,
  RawScenarioSchema,
  type DeviceCommand,
  type GatewayClient,
  type RawDevice,
  type RawEvent,
  type RawScenario,
} from './types.js';

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface OverkizClientOptions {
  baseUrl: string;
  token: string;
  verifySsl: boolean;
  logger: Logger;
  /** Pre-built axios instance (tests pass one with a stub adapter). */
  http?: AxiosInstance;
  /** Label the gateway records against each execution. */
  executionLabel?: string;
  /** Pause after the gateway reports rate limiting. */
  rateLimitPauseMs?: number;
  requestTimeoutMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

const DEFAULT_RATE_LIMIT_PAUSE_MS = 5_000;
const DEFAULT_REQUEST_TIMEOUT_MS = 15_000;

// ---------------------------------------------------------------------------
// Error translation
// ---------------------------------------------------------------------------

const ErrorBodySchema = z.object({
  errorCode: z.string().optional(),
  error: z.string().optional(),
});

function describeBody(data: unknown): string {
  if (typeof data === 'string') return data;
  const parsed = ErrorBodySchema.safeParse(data);
  if (!parsed.success) return '';
  return [parsed.data.errorCode, parsed.data.error].filter(Boolean).join(': ');
}

/**
 * Map a transport exception onto the failure taxonomy. Body text is matched
 * before status because the gateway reports listener and queue problems as
 * plain 400s.
 */
export function translateGatewayError(err: unknown): GatewayError {
  if (isGatewayError(err)) return err;

  if (!axios.isAxiosError(err)) {
    return new GatewayError('transient-failure', errorMessage(err), { cause: err });
  }

  const status = err.response?.status;
  if (status === undefined) {
    return new GatewayError('transient-failure', `Gateway unreachable: ${err.message}`, { cause: err });
  }

  const detail = describeBody(err.response?.data);
  const text = detail.toLowerCase();
  const message = detail || err.message;

  if (text.includes('invalid event listener id') || text.includes('no registered event listener')) {
    return new GatewayError('listener-expired', message, { status, cause: err });
  }
  if (status === 429 || text.includes('too many requests')) {
    return new GatewayError('rate-limited', message, { status, cause: err });
  }
  if (text.includes('execution queue is full')) {
    return new GatewayError('queue-full', message, { status, cause: err });
  }
  if (status === 401 || status === 403) {
    return new GatewayError('authentication-failure', message, { status, cause: err });
  }
  return new GatewayError('transient-failure', message, { status, cause: err });
}

// ---------------------------------------------------------------------------
// Client
// ---------------------------------------------------------------------------

export class OverkizGatewayClient implements GatewayClient {
  private readonly http: AxiosInstance;
  private readonly agent?: Agent;
  private readonly log: Logger;
  private readonly executionLabel: string;
  private readonly rateLimitPauseMs: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private connected = false;
  private currentListenerId: string | null = null;

  constructor(private readonly options: OverkizClientOptions) {
    this.log = options.logger.child({ component: 'gateway-client' });
    this.executionLabel = options.executionLabel ?? 'Shadebridge';
    this.rateLimitPauseMs = options.rateLimitPauseMs ?? DEFAULT_RATE_LIMIT_PAUSE_MS;
    this.sleep = options.sleep ?? (ms => delay(ms));

    if (options.http) {
      this.http = options.http;
    } else {
      this.agent = new Agent({ rejectUnauthorized: options.verifySsl, keepAlive: true });
      this.http = axios.create({
        timeout: options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS,
        httpsAgent: this.agent,
      });
    }
  }

  get isConnected(): boolean {
    return this.connected;
  }

  get listenerId(): string | null {
    return this.currentListenerId;
  }

  // ── Transport ──

  private async request<T extends z.ZodTypeAny>(
    method: Method,
    url: string,
    schema: T,
    data?: unknown,
  ): Promise<z.infer<T>> {
    let body: unknown;
    try {
      const response = await this.http.request<unknown>({
        method,
        url,
        baseURL: this.options.baseUrl,
        data,
        headers: {
          Authorization: `Bearer ${this.options.token}`,
          'Content-Type': 'application/json',
        },
      });
      body = response.data;
    } catch (err) {
      throw translateGatewayError(err);
    }

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new GatewayError('transient-failure', `Unexpected response from ${method} ${url}`, {
        cause: parsed.error,
      });
    }
    return parsed.data;
  }

  private requireConnected(): void {
    if (!this.connected) {
      throw new GatewayError('transient-failure', 'Not connected to gateway');
    }
  }

  /** Parse a list item by item so one malformed entry does not hide the rest. */
  private parseEach<T>(items: unknown[], schema: z.ZodType<T, z.ZodTypeDef, unknown>, what: string): T[] {
    const result: T[] = [];
    for (const item of items) {
      const parsed = schema.safeParse(item);
      if (parsed.success) {
        result.push(parsed.data);
      } else {
        this.log.warn({ code: 'GATEWAY_ITEM_INVALID', what, issues: parsed.error.issues.length }, `Skipping malformed ${what}`);
      }
    }
    return result;
  }

  // ── Session ──

  async connect(): Promise<void> {
    try {
      await this.request('GET', 'apiVersion', z.unknown());
    } catch (err) {
      const error = translateGatewayError(err);
      if (error.kind === 'authentication-failure') {
        this.log.error({ code: 'GATEWAY_AUTH_FAILED' }, 'Gateway rejected the bearer token; regenerate it in the gateway app');
      } else {
        this.log.error({ code: 'GATEWAY_CONNECT_FAILED', err: error }, 'Failed to connect to gateway');
      }
      throw error;
    }
    this.connected = true;
    this.log.info({ baseUrl: this.options.baseUrl }, 'Connected to gateway');
  }

  async disconnect(): Promise<void> {
    if (this.currentListenerId) {
      await this.unregisterListener();
    }
    this.connected = false;
    this.agent?.destroy();
    this.log.info('Disconnected from gateway');
  }

  // ── Inventory ──

  async listDevices(): Promise<RawDevice[]> {
    this.requireConnected();
    const items = await this.request('GET', 'setup/devices', z.array(z.unknown()));
    const devices = this.parseEach(items, RawDeviceSchema, 'device');
    this.log.info({ count: devices.length }, 'Retrieved devices');
    return devices;
  }

  async listScenarios(): Promise<RawScenario[]> {
    this.requireConnected();
    const items = await this.request('GET', 'actionGroups', z.array(z.unknown()));
    const scenarios = this.parseEach(items, RawScenarioSchema, 'scenario');
    this.log.info({ count: scenarios.length }, 'Retrieved scenarios');
    return scenarios;
  }

  // ── Execution ──

  async executeCommand(deviceId: string, command: DeviceCommand): Promise<string | null> {
    this.requireConnected();
    const payload = {
      label: this.executionLabel,
      actions: [{ deviceURL: deviceId, commands: [{ name: command.name, parameters: command.parameters }] }],
    };
    try {
      const { execId } = await this.request('POST', 'exec/apply', ExecResponseSchema, payload);
      this.log.debug({ deviceId, command: command.name, parameters: command.parameters, execId }, 'Executed command');
      return execId;
    } catch (err) {
      return this.handleExecutionFailure(err, { deviceId, command: command.name });
    }
  }

  async executeScenario(scenarioId: string): Promise<string | null> {
    this.requireConnected();
    try {
      const { execId } = await this.request('POST', `exec/${encodeURIComponent(scenarioId)}`, ExecResponseSchema);
      this.log.info({ scenarioId, execId }, 'Executed scenario');
      return execId;
    } catch (err) {
      return this.handleExecutionFailure(err, { scenarioId });
    }
  }

  /** Rate limiting and a full queue mean "re-issue later": resolve null. */
  private async handleExecutionFailure(err: unknown, context: Record<string, string>): Promise<null> {
    const error = translateGatewayError(err);
    switch (error.kind) {
      case 'rate-limited':
        this.log.warn({ code: 'GATEWAY_RATE_LIMITED', ...context }, 'Rate limited; backing off');
        await this.sleep(this.rateLimitPauseMs);
        return null;
      case 'queue-full':
        this.log.warn({ code: 'GATEWAY_QUEUE_FULL', ...context }, 'Execution queue full; try again later');
        return null;
      case 'authentication-failure':
        this.log.error({ code: 'GATEWAY_AUTH_FAILED', ...context }, 'Invalid token; regenerate it in the gateway app');
        throw error;
      default:
        this.log.error({ code: 'GATEWAY_EXEC_FAILED', err: error, ...context }, 'Execution failed');
        throw error;
    }
  }

  // ── Events ──

  async registerListener(): Promise<string> {
    this.requireConnected();
    const { id } = await this.request('POST', 'events/register', ListenerResponseSchema);
    this.currentListenerId = id;
    this.log.info({ listenerId: id }, 'Registered event listener');
    return id;
  }

  async fetchEvents(): Promise<RawEvent[]> {
    this.requireConnected();
    const listenerId = this.currentListenerId;
    if (!listenerId) {
      throw new GatewayError('listener-expired', 'No event listener registered');
    }

    try {
      const items = await this.request('POST', `events/${encodeURIComponent(listenerId)}/fetch`, z.array(z.unknown()));
      const events = this.parseEach(items, RawEventSchema, 'event');
      if (events.length > 0) {
        this.log.debug({ count: events.length }, 'Fetched events');
      }
      return events;
    } catch (err) {
      const error = translateGatewayError(err);
      if (error.kind === 'listener-expired') {
        this.log.warn({ code: 'LISTENER_EXPIRED', listenerId }, 'Event listener expired; re-registration needed');
        this.currentListenerId = null;
      }
      throw error;
    }
  }

  async unregisterListener(): Promise<void> {
    const listenerId = this.currentListenerId;
    if (!this.connected || !listenerId) return;

    try {
      await this.request('POST', `events/${encodeURIComponent(listenerId)}/unregister`, z.unknown());
      this.log.info({ listenerId }, 'Unregistered event listener');
    } catch (err) {
      this.log.warn({ code: 'LISTENER_UNREGISTER_FAILED', err: translateGatewayError(err) }, 'Error unregistering event listener');
    } finally {
      this.currentListenerId = null;
    }
  }
}
