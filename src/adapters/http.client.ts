import axios, { AxiosInstance } from 'axios';
import pino from 'pino';
import { JsonObject, isJsonObject } from '../types/news.types.js';
import { ExternalApiError } from '../utils/errors.js';

export function createHttpClient(baseURL: string, timeout: number): AxiosInstance {
  return axios.create({ baseURL, timeout });
}

export interface JsonRequest {
  method: 'GET' | 'POST';
  path: string;
  params?: Record<string, string | number>;
  body?: JsonObject;
  headers?: Record<string, string>;
}

/**
 * Send one request and return the JSON object body of a 2xx response.
 * No retries: any failure surfaces as ExternalApiError.
 *
 * @param service Name used in error messages and logs
 */
export async function requestJsonObject(
  client: AxiosInstance,
  service: string,
  request: JsonRequest,
  logger: pino.Logger,
): Promise<JsonObject> {
  let status: number;
  let data: unknown;

  try {
    const response = await client.request<unknown>({
      method: request.method,
      url: request.path,
      params: request.params,
      data: request.body,
      headers: request.headers,
      // Status codes are checked below so error bodies can be reported
      validateStatus: () => true,
    });
    status = response.status;
    data = response.data;
  } catch (error) {
    const message = error instanceof Error ? error.message : 'request failed';
    logger.error({ service, path: request.path, error: message }, 'Upstream request failed');
    throw new ExternalApiError(service, `request failed: ${message}`);
  }

  if (status < 200 || status >= 300) {
    const upstream = upstreamMessage(data);
    logger.error({ service, path: request.path, status, upstream }, 'Upstream returned an error status');
    throw new ExternalApiError(
      service,
      upstream ? `Failed to fetch: ${status} - ${upstream}` : `Failed to fetch: ${status}`,
      status,
      data,
    );
  }

  if (!isJsonObject(data)) {
    throw new ExternalApiError(service, 'response body is not a JSON object', status);
  }

  return data;
}

/**
 * Pull a human-readable message out of an error body ("message" or "errors")
 */
export function upstreamMessage(body: unknown): string | undefined {
  if (!isJsonObject(body)) {
    return typeof body === 'string' && body.length > 0 ? body : undefined;
  }

  const errors = body.errors;
  if (errors !== undefined && errors !== null) {
    return Array.isArray(errors) ? errors.map(String).join('; ') : stringify(errors);
  }

  const message = body.message;
  return typeof message === 'string' ? message : undefined;
}

function stringify(value: unknown): string {
  return typeof value === 'string' ? value : JSON.stringify(value);
}
