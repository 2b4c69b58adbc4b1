// Response body helpers for outbound requests made by the tools

export const MAX_BODY_BYTES = 2 * 1024 * 1024;

/**
 * Decodes at most `maxBytes` of the body as UTF-8, then cancels the rest of
 * the stream.
 */
export async function readTextCapped(response: Response, maxBytes = MAX_BODY_BYTES): Promise<string> {
  const body = response.body;
  if (!body) return '';

  const reader = body.getReader();
  const decoder = new TextDecoder();
  let received = 0;
  let text = '';

  try {
    while (received < maxBytes) {
      const { done, value } = await reader.read();
      if (done) {
        return text + decoder.decode();
      }
      const remaining = maxBytes - received;
      const chunk = value.byteLength > remaining ? value.subarray(0, remaining) : value;
      received += chunk.byteLength;
      text += decoder.decode(chunk, { stream: true });
    }
    await reader.cancel();
    return text + decoder.decode();
  } finally {
    reader.releaseLock();
  }
}

/** Releases the connection without reading the body. */
export async function discardBody(response: Response): Promise<void> {
  await response.body?.cancel();
}
