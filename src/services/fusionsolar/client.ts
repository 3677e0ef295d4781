import { z } from 'zod';
import type { FusionSolarConfig } from '../../types/config.js';
import { chunk } from '../../utils/chunk.js';
import {
  ApiError,
  AuthenticationError,
  RateLimitError,
  TransportError,
  type FusionSolarError,
} from '../../utils/errors.js';
import { logDebug, logInfo, logWarn } from '../../utils/logger/index.js';
import {
  deviceRealtimeSchema,
  deviceSchema,
  envelopeSchema,
  plantPageSchema,
  plantRealtimeSchema,
  type DeviceRealtimeRecord,
  type DeviceRecord,
  type Envelope,
  type PlantRealtimeRecord,
  type PlantRecord,
} from './schemas.js';

const COMPONENT = 'FusionSolarClient';

export const DEFAULT_BASE_URL = 'https://eu5.fusionsolar.huawei.com/thirdData';

/** Maximum number of plant codes or device ids per request */
export const BATCH_SIZE = 100;

const FAIL_CODE_NOT_LOGGED_IN = 305;
const FAIL_CODE_RATE_LIMIT = 407;
const AUTH_FAIL_CODES = new Set([20001, 20002, 20003]);

/**
 * The calls the inventory and realtime fetchers need.
 */
export interface FusionSolarApi {
  getPlantList(): Promise<PlantRecord[]>;
  getDeviceList(plantCodes: string[]): Promise<DeviceRecord[]>;
  getPlantRealtimeKpi(plantCodes: string[]): Promise<PlantRealtimeRecord[]>;
  getDeviceRealtimeKpi(
    devTypeId: number,
    devIds: number[]
  ): Promise<DeviceRealtimeRecord[]>;
}

function tokenFromCookies(header: string | null): string | undefined {
  const match = header?.match(/XSRF-TOKEN=([^;,\s]+)/i);
  return match?.[1];
}

function failureFor(path: string, envelope: Envelope): FusionSolarError {
  const failCode = envelope.failCode ?? undefined;
  const message = `FusionSolar ${path} failed with code ${failCode ?? 'unknown'}${
    envelope.message ? `: ${envelope.message}` : ''
  }`;

  if (failCode === FAIL_CODE_RATE_LIMIT) {
    return new RateLimitError(message, { failCode });
  }
  if (failCode === FAIL_CODE_NOT_LOGGED_IN || (failCode !== undefined && AUTH_FAIL_CODES.has(failCode))) {
    return new AuthenticationError(message, { failCode });
  }
  return new ApiError(message, { failCode });
}

export class FusionSolarClient implements FusionSolarApi {
  private readonly baseUrl: string;
  private xsrfToken?: string;

  constructor(private readonly config: FusionSolarConfig) {
    this.baseUrl = (config.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '');
  }

  /**
   * Logs in, runs `fn` and logs out again whatever `fn` does.
   */
  public static async withSession<T>(
    config: FusionSolarConfig,
    fn: (client: FusionSolarClient) => Promise<T>
  ): Promise<T> {
    const client = new FusionSolarClient(config);
    await client.login();
    try {
      return await fn(client);
    } finally {
      await client.logout();
    }
  }

  public get loggedIn(): boolean {
    return this.xsrfToken !== undefined;
  }

  public async login(): Promise<void> {
    const response = await this.send('/login', {
      userName: this.config.username,
      systemCode: this.config.password,
    });
    const envelope = await this.readEnvelope('/login', response);

    if (!envelope.success) {
      throw new AuthenticationError(
        `FusionSolar login failed for ${this.config.username}${
          envelope.message ? `: ${envelope.message}` : ''
        }`,
        { failCode: envelope.failCode ?? undefined }
      );
    }

    const token =
      response.headers.get('xsrf-token') ??
      tokenFromCookies(response.headers.get('set-cookie'));
    if (!token) {
      throw new AuthenticationError('FusionSolar login did not return an XSRF token');
    }

    this.xsrfToken = token;
    logInfo(COMPONENT, `Logged in to ${this.baseUrl}`);
  }

  public async logout(): Promise<void> {
    const xsrfToken = this.xsrfToken;
    if (!xsrfToken) return;

    try {
      await this.call('/logout', { xsrfToken }, z.unknown(), false);
      logDebug(COMPONENT, 'Logged out');
    } catch (error) {
      logWarn(COMPONENT, 'Logout failed', { err: error });
    } finally {
      this.xsrfToken = undefined;
    }
  }

  public async getPlantList(): Promise<PlantRecord[]> {
    const plants: PlantRecord[] = [];
    let pageNo = 1;
    let pageCount = 1;

    do {
      const page = await this.call('/stations', { pageNo }, plantPageSchema);
      plants.push(...page.list);
      pageCount = page.pageCount;
      pageNo++;
    } while (pageNo <= pageCount);

    logDebug(COMPONENT, `Received ${plants.length} plants`);
    return plants;
  }

  public async getDeviceList(plantCodes: string[]): Promise<DeviceRecord[]> {
    const devices: DeviceRecord[] = [];
    for (const batch of chunk(plantCodes, BATCH_SIZE)) {
      devices.push(
        ...(await this.call(
          '/getDevList',
          { stationCodes: batch.join(',') },
          z.array(deviceSchema)
        ))
      );
    }
    return devices;
  }

  public async getPlantRealtimeKpi(
    plantCodes: string[]
  ): Promise<PlantRealtimeRecord[]> {
    const records: PlantRealtimeRecord[] = [];
    for (const batch of chunk(plantCodes, BATCH_SIZE)) {
      records.push(
        ...(await this.call(
          '/getStationRealKpi',
          { stationCodes: batch.join(',') },
          z.array(plantRealtimeSchema)
        ))
      );
    }
    return records;
  }

  public async getDeviceRealtimeKpi(
    devTypeId: number,
    devIds: number[]
  ): Promise<DeviceRealtimeRecord[]> {
    const records: DeviceRealtimeRecord[] = [];
    for (const batch of chunk(devIds, BATCH_SIZE)) {
      records.push(
        ...(await this.call(
          '/getDevRealKpi',
          { devIds: batch.join(','), devTypeId },
          z.array(deviceRealtimeSchema)
        ))
      );
    }
    return records;
  }

  /**
   * Authenticated call. An expired session (fail code 305) triggers one
   * new login before the request is repeated.
   */
  private async call<T>(
    path: string,
    body: object,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    relogin = true
  ): Promise<T> {
    if (!this.xsrfToken) {
      throw new AuthenticationError(`Not logged in to FusionSolar (calling ${path})`);
    }

    logDebug(COMPONENT, `POST ${path}`);
    const response = await this.send(path, body, { 'XSRF-TOKEN': this.xsrfToken });
    const envelope = await this.readEnvelope(path, response);

    if (!envelope.success) {
      if (envelope.failCode === FAIL_CODE_NOT_LOGGED_IN && relogin) {
        logInfo(COMPONENT, 'Session expired, logging in again');
        await this.login();
        return this.call(path, body, schema, false);
      }
      throw failureFor(path, envelope);
    }

    const parsed = schema.safeParse(envelope.data);
    if (!parsed.success) {
      throw new TransportError(
        `Unexpected data from FusionSolar ${path}: ${parsed.error.message}`
      );
    }
    return parsed.data;
  }

  private async send(
    path: string,
    body: object,
    headers: Record<string, string> = {}
  ): Promise<Response> {
    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}${path}`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Accept: 'application/json',
          ...headers,
        },
        body: JSON.stringify(body),
      });
    } catch (error) {
      throw new TransportError(`Request to FusionSolar ${path} failed`, {
        cause: error,
      });
    }

    if (response.status === 401 || response.status === 403) {
      throw new AuthenticationError(
        `FusionSolar ${path} rejected the request (HTTP ${response.status})`,
        { httpStatus: response.status }
      );
    }
    if (!response.ok) {
      throw new TransportError(
        `FusionSolar ${path} answered HTTP ${response.status}`,
        { httpStatus: response.status }
      );
    }
    return response;
  }

  private async readEnvelope(path: string, response: Response): Promise<Envelope> {
    const text = await response.text();
    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch (error) {
      throw new TransportError(`FusionSolar ${path} did not return JSON`, {
        cause: error,
      });
    }

    const parsed = envelopeSchema.safeParse(json);
    if (!parsed.success) {
      throw new TransportError(
        `Unexpected response from FusionSolar ${path}: ${parsed.error.message}`
      );
    }
    return parsed.data;
  }
}
