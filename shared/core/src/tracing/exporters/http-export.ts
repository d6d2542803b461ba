/**
 * POST a JSON payload with a request timeout and map the outcome to an
 * ExportResult. Shared by the OTLP and Zipkin exporters.
 */

import { getErrorMessage } from '../../errors/error-handling';
import { EXPORT_SUCCESS, ExportResult } from './types';

export type FetchFn = typeof fetch;

export async function postJson(
  fetchImpl: FetchFn,
  url: string,
  payload: unknown,
  requestTimeoutMs: number,
  headers: Record<string, string> = {}
): Promise<ExportResult> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), requestTimeoutMs);

  try {
    const response = await fetchImpl(url, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        ...headers,
      },
      body: JSON.stringify(payload),
      signal: controller.signal,
    });

    if (response.ok) {
      return EXPORT_SUCCESS;
    }
    return {
      code: 'retryable-error',
      error: new Error(`Export to ${url} failed with HTTP ${response.status}`),
    };
  } catch (error) {
    return {
      code: 'retryable-error',
      error: new Error(`Export to ${url} failed: ${getErrorMessage(error)}`),
    };
  } finally {
    clearTimeout(timeoutId);
  }
}
