import test from "node:test";
import assert from "node:assert/strict";
import { parseConfig } from "../src/config.js";
import { createEmbedder, HttpEmbedder, OpenAiEmbedder } from "../src/rulebook/embedder.js";
import { captureLogs } from "./helpers.js";

captureLogs();

interface SentRequest {
  url: string;
  authorization: string | null;
  body: unknown;
}

async function withFetch(
  reply: () => Response,
  fn: (sent: SentRequest[]) => Promise<void>,
): Promise<void> {
  const sent: SentRequest[] = [];
  const originalFetch = globalThis.fetch;
  globalThis.fetch = async (input: string | URL | Request, init?: RequestInit): Promise<Response> => {
    sent.push({
      url: String(input),
      authorization: new Headers(init?.headers).get("authorization"),
      body: typeof init?.body === "string" ? JSON.parse(init.body) : undefined,
    });
    return reply();
  };
  try {
    await fn(sent);
  } finally {
    globalThis.fetch = originalFetch;
  }
}

const json = (payload: unknown, status = 200): Response =>
  new Response(JSON.stringify(payload), { status, headers: { "Content-Type": "application/json" } });

test("HttpEmbedder posts to /embeddings and returns vectors in input order", async () => {
  const reply = () =>
    json({
      data: [
        { index: 1, embedding: [0, 1] },
        { index: 0, embedding: [1, 0] },
      ],
    });
  await withFetch(reply, async (sent) => {
    const embedder = new HttpEmbedder("http://127.0.0.1:1234/v1/", "test-embed-model", "test-secret");
    const vectors = await embedder.embed(["grapple", "initiative"]);

    assert.deepEqual(vectors, [
      [1, 0],
      [0, 1],
    ]);
    assert.deepEqual(sent, [
      {
        url: "http://127.0.0.1:1234/v1/embeddings",
        authorization: "Bearer test-secret",
        body: { model: "test-embed-model", input: ["grapple", "initiative"] },
      },
    ]);
  });
});

test("HttpEmbedder sends no Authorization header without a key", async () => {
  await withFetch(
    () => json({ data: [{ index: 0, embedding: [0.5] }] }),
    async (sent) => {
      await new HttpEmbedder("http://127.0.0.1:1234/v1", "test-embed-model").embed(["cover"]);
      assert.equal(sent[0]?.authorization, null);
    },
  );
});

test("HttpEmbedder rejects on an error status", async () => {
  await withFetch(
    () => json({ error: { message: "model not loaded" } }, 503),
    async () => {
      await assert.rejects(
        new HttpEmbedder("http://127.0.0.1:1234/v1", "test-embed-model").embed(["cover"]),
        /embedding request failed: 503/,
      );
    },
  );
});

test("HttpEmbedder rejects a malformed response", async () => {
  await withFetch(
    () => json({ data: [{ index: 0, embedding: "nope" }] }),
    async () => {
      await assert.rejects(
        new HttpEmbedder("http://127.0.0.1:1234/v1", "test-embed-model").embed(["cover"]),
        /malformed/,
      );
    },
  );
});

test("createEmbedder prefers the embeddings endpoint and needs no OpenAI key for it", () => {
  const base = { dataDir: "/campaign/data" };
  const local = createEmbedder(parseConfig({ ...base, embeddingBaseUrl: "http://127.0.0.1:1234/v1" }));
  assert.ok(local instanceof HttpEmbedder);
  assert.ok(createEmbedder(parseConfig({ ...base, openaiApiKey: "test-secret" })) instanceof OpenAiEmbedder);
});
