/**
 * HTTP helpers shared by the article fetcher and the LLM providers
 */
import { RequestTimeoutError, ResponseTooLargeError } from '../errors/index';

/**
 * Consumes a response while the request timeout is still armed
 */
export type ResponseReader<T> = (response: Response) => Promise<T>;

/**
 * Performs fetch request with timeout using AbortController.
 * The timer covers the headers and everything `read` does with the body.
 * @throws RequestTimeoutError when the timeout elapses first
 */
export async function fetchWithTimeout<T>(
  url: string,
  options: RequestInit,
  timeout: number,
  read: ResponseReader<T>
): Promise<T> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeout);

  try {
    const response = await fetch(url, {
      ...options,
      signal: controller.signal,
    });
    return await read(response);
  } catch (error) {
    if (error instanceof Error && error.name === 'AbortError') {
      throw new RequestTimeoutError(timeout);
    }
    throw error;
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * Reads a text body, giving up once it grows past maxBytes
 * @throws ResponseTooLargeError when the declared or received size exceeds maxBytes
 */
export async function readTextWithLimit(response: Response, maxBytes: number): Promise<string> {
  const declared = Number(response.headers.get('content-length'));
  if (Number.isFinite(declared) && declared > maxBytes) {
    await response.body?.cancel();
    throw new ResponseTooLargeError(maxBytes);
  }
  if (!response.body) {
    return '';
  }

  const reader = response.body.getReader();
  const decoder = new TextDecoder();
  let received = 0;
  let text = '';

  for (;;) {
    const { done, value } = await reader.read();
    if (done) break;
    received += value.byteLength;
    if (received > maxBytes) {
      await reader.cancel();
      throw new ResponseTooLargeError(maxBytes);
    }
    text += decoder.decode(value, { stream: true });
  }

  return text + decoder.decode();
}
