import { describe, expect, it } from "vitest";
import { parseNdjsonLine, readLines } from "../../../src/utils/ndjson.js";

function byteStream(parts: Uint8Array[]): ReadableStream<Uint8Array> {
  return new ReadableStream<Uint8Array>({
    start(controller) {
      for (const part of parts) {
        controller.enqueue(part);
      }
      controller.close();
    }
  });
}

async function collect(stream: ReadableStream<Uint8Array>): Promise<string[]> {
  const lines: string[] = [];
  for await (const line of readLines(stream)) {
    lines.push(line);
  }
  return lines;
}

describe("readLines", () => {
  it("joins lines split across chunks and skips blank ones", async () => {
    const encoder = new TextEncoder();
    const stream = byteStream([encoder.encode('{"a":1}\n{"b"'), encoder.encode(':2}\n\n  \n{"c":3}')]);

    await expect(collect(stream)).resolves.toEqual(['{"a":1}', '{"b":2}', '{"c":3}']);
  });

  it("decodes multi-byte characters split between chunks", async () => {
    const bytes = new TextEncoder().encode("日本\n");
    const stream = byteStream([bytes.slice(0, 4), bytes.slice(4)]);

    await expect(collect(stream)).resolves.toEqual(["日本"]);
  });
});

describe("parseNdjsonLine", () => {
  it("parses valid JSON", () => {
    expect(parseNdjsonLine('{"response":"hi","done":false}')).toEqual({
      ok: true,
      value: { response: "hi", done: false },
      line: '{"response":"hi","done":false}'
    });
  });

  it("reports invalid JSON without throwing", () => {
    const parsed = parseNdjsonLine("{oops");

    expect(parsed.ok).toBe(false);
    expect(parsed.line).toBe("{oops");
  });
});
