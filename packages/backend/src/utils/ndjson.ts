/**
 * Yields the non-empty lines of a byte stream, decoding UTF-8 across chunk
 * boundaries. The trailing line is emitted even without a final newline.
 */
export async function* readLines(body: ReadableStream<Uint8Array>): AsyncGenerator<string> {
  const reader = body.getReader();
  const decoder = new TextDecoder();
  let buffer = "";

  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) {
        break;
      }

      buffer += decoder.decode(value, { stream: true });
      const lines = buffer.split("\n");
      buffer = lines.pop() ?? "";

      for (const line of lines) {
        const trimmed = line.trim();
        if (trimmed) {
          yield trimmed;
        }
      }
    }

    buffer += decoder.decode();
    const rest = buffer.trim();
    if (rest) {
      yield rest;
    }
  } finally {
    reader.releaseLock();
  }
}

export type NdjsonLine =
  | { ok: true; value: unknown; line: string }
  | { ok: false; line: string; error: Error };

export function parseNdjsonLine(line: string): NdjsonLine {
  try {
    return { ok: true, value: JSON.parse(line), line };
  } catch (error) {
    return { ok: false, line, error: error instanceof Error ? error : new Error(String(error)) };
  }
}
