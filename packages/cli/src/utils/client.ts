import type { ZodType, ZodTypeDef } from 'zod';
import { DEFAULT_API_HOST, DEFAULT_API_PORT, FleetmonError } from '@fleetmon/shared';

export const DEFAULT_API_URL = `http://${DEFAULT_API_HOST}:${DEFAULT_API_PORT}`;

export class ApiRequestError extends FleetmonError {
  public readonly status: number;

  constructor(status: number, message: string) {
    super(message, 'API_REQUEST_FAILED');
    this.name = 'ApiRequestError';
    this.status = status;
  }
}

let apiUrlOverride: string | null = null;

/** Set from the global --api flag; wins over FLEETMON_API_URL. */
export function setApiUrl(url: string | undefined): void {
  apiUrlOverride = url ?? null;
}

export function getApiUrl(): string {
  const url = apiUrlOverride ?? (process.env.FLEETMON_API_URL || DEFAULT_API_URL);
  return url.replace(/\/+$/, '');
}

function errorMessage(text: string, status: number): string {
  try {
    const body: unknown = JSON.parse(text);
    if (typeof body === 'object' && body !== null && 'error' in body) {
      const { error } = body;
      if (typeof error === 'string') return error;
    }
  } catch (err) {
    if (!(err instanceof SyntaxError)) throw err;
  }
  return text || `Request failed with status ${status}`;
}

/**
 * GET a daemon endpoint and validate the JSON body against `schema`.
 */
export async function apiRequest<T>(
  path: string,
  schema: ZodType<T, ZodTypeDef, unknown>,
): Promise<T> {
  const base = getApiUrl();

  let response: Response;
  try {
    response = await fetch(`${base}${path}`, { headers: { accept: 'application/json' } });
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ApiRequestError(0, `Cannot reach fleetmon daemon at ${base}: ${reason}`);
  }

  const text = await response.text();
  if (!response.ok) {
    throw new ApiRequestError(response.status, errorMessage(text, response.status));
  }

  let body: unknown;
  try {
    body = JSON.parse(text);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ApiRequestError(response.status, `Malformed response from ${path}: ${reason}`);
  }

  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw new ApiRequestError(response.status, `Unexpected response from ${path}`);
  }
  return parsed.data;
}
