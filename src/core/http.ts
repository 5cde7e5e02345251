import { z } from 'zod';
import { MalformedUpstreamResponseError, UpstreamCallError, errorMessage } from '../types/api';

export interface PostJsonOptions {
  service: string;
  headers: Record<string, string>;
  timeoutMs: number;
}

/**
 * POST a JSON body and validate the JSON reply against `schema`.
 * Network errors, timeouts and non-2xx statuses raise UpstreamCallError;
 * a reply that does not match the schema raises MalformedUpstreamResponseError.
 */
export async function postJson<T>(
  url: string,
  body: unknown,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  options: PostJsonOptions
): Promise<T> {
  let resp: Response;
  try {
    resp = await fetch(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', ...options.headers },
      body: JSON.stringify(body),
      signal: AbortSignal.timeout(options.timeoutMs)
    });
  } catch (error) {
    if (isTimeout(error)) {
      throw new UpstreamCallError(options.service, `request timed out after ${options.timeoutMs}ms`);
    }
    throw new UpstreamCallError(options.service, `request failed: ${errorMessage(error)}`);
  }

  if (!resp.ok) {
    const msg = await safeText(resp);
    throw new UpstreamCallError(options.service, `HTTP ${resp.status} ${resp.statusText} - ${msg}`, resp.status);
  }

  let json: unknown;
  try {
    json = await resp.json();
  } catch (error) {
    throw new MalformedUpstreamResponseError(options.service, `invalid JSON (${errorMessage(error)})`);
  }

  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? issue.path.join('.') : 'body';
    throw new MalformedUpstreamResponseError(options.service, `${where}: ${issue ? issue.message : 'schema mismatch'}`);
  }
  return parsed.data;
}

// AbortSignal.timeout() rejects with a DOMException named TimeoutError
function isTimeout(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'name' in error && error.name === 'TimeoutError';
}

async function safeText(r: Response): Promise<string> {
  try {
    return await r.text();
  } catch {
    return '<no body>';
  }
}
