import { test } from "node:test";
import assert from "node:assert/strict";
import { createHttpFetcher, ENTITY_STATEMENT_CONTENT_TYPE } from "./fetcher.js";

const waitForAbort = (signal: AbortSignal | null | undefined) =>
  new Promise<Response>((_resolve, reject) => {
    // The mock holds a ref'd handle like a real socket would, so the event loop waits for the abort.
    const keepAlive = setInterval(() => {}, 1000);
    signal?.addEventListener(
      "abort",
      () => {
        clearInterval(keepAlive);
        reject(new Error("aborted"));
      },
      { once: true }
    );
  });

test("http fetcher: one outcome per URL, in input order, failures isolated", async () => {
  const seenAccept: string[] = [];
  const fetchImpl: typeof fetch = async (input, init) => {
    const url = String(input);
    seenAccept.push(new Headers(init?.headers).get("accept") ?? "");
    if (url.endsWith("/missing")) return new Response("not found", { status: 404 });
    if (url.endsWith("/broken")) throw new TypeError("socket hang up");
    return new Response(`token-for:${url}`, { status: 200 });
  };
  const fetcher = createHttpFetcher({ fetchImpl });
  const outcomes = await fetcher.fetch(
    ["https://a.example/ok", "https://b.example/missing", "https://c.example/broken"],
    { timeoutMs: 1000 }
  );

  assert.deepEqual(
    outcomes.map((outcome) => outcome.url),
    ["https://a.example/ok", "https://b.example/missing", "https://c.example/broken"]
  );
  const [ok, missing, broken] = outcomes;
  assert.deepEqual(ok, { url: "https://a.example/ok", ok: true, body: "token-for:https://a.example/ok" });
  assert.ok(missing && !missing.ok);
  assert.equal(missing.error.code, "fetch_failed");
  assert.equal(missing.error.status, 404);
  assert.ok(broken && !broken.ok);
  assert.equal(broken.error.code, "fetch_failed");
  assert.equal(broken.error.status, undefined);
  assert.deepEqual(seenAccept, [
    ENTITY_STATEMENT_CONTENT_TYPE,
    ENTITY_STATEMENT_CONTENT_TYPE,
    ENTITY_STATEMENT_CONTENT_TYPE
  ]);
});

test("http fetcher: members pending at the deadline time out alone", async () => {
  const fetchImpl: typeof fetch = async (input, init) => {
    if (String(input).includes("slow")) return waitForAbort(init?.signal);
    return new Response("fast-token", { status: 200 });
  };
  const outcomes = await createHttpFetcher({ fetchImpl }).fetch(
    ["https://slow.example/", "https://fast.example/"],
    { timeoutMs: 50 }
  );
  const [slow, fast] = outcomes;
  assert.ok(slow && !slow.ok);
  assert.equal(slow.error.code, "fetch_timeout");
  assert.equal(slow.error.url, "https://slow.example/");
  assert.deepEqual(fast, { url: "https://fast.example/", ok: true, body: "fast-token" });
});

test("http fetcher: caller cancellation fails the batch members, not as timeouts", async () => {
  const controller = new AbortController();
  const fetchImpl: typeof fetch = async (_input, init) => waitForAbort(init?.signal);
  const pending = createHttpFetcher({ fetchImpl }).fetch(["https://slow.example/"], {
    timeoutMs: 5000,
    signal: controller.signal
  });
  controller.abort("caller_cancelled");
  const [outcome] = await pending;
  assert.ok(outcome && !outcome.ok);
  assert.equal(outcome.error.code, "fetch_failed");
});

test("http fetcher: oversized bodies fail that URL", async () => {
  const fetchImpl: typeof fetch = async () => new Response("x".repeat(2048), { status: 200 });
  const [outcome] = await createHttpFetcher({ fetchImpl }).fetch(["https://big.example/"], {
    timeoutMs: 1000,
    maxResponseBytes: 1024
  });
  assert.ok(outcome && !outcome.ok);
  assert.equal(outcome.error.code, "fetch_failed");
  assert.equal(outcome.error.message, "https://big.example/ returned more than 1024 bytes");
});

test("http fetcher: a declared content-length over the cap is refused unread", async () => {
  let pulls = 0;
  const endless = new ReadableStream<Uint8Array>({
    pull: () => {
      pulls += 1;
    }
  });
  const fetchImpl: typeof fetch = async () =>
    new Response(endless, { status: 200, headers: { "content-length": "4096" } });
  const [outcome] = await createHttpFetcher({ fetchImpl }).fetch(["https://big.example/"], {
    timeoutMs: 1000,
    maxResponseBytes: 1024
  });
  assert.ok(outcome && !outcome.ok);
  assert.equal(outcome.error.code, "fetch_failed");
  assert.equal(outcome.error.message, "https://big.example/ returned more than 1024 bytes");
  assert.ok(pulls <= 1);
});

test("http fetcher: streamed bodies stop being read once past the cap", async () => {
  let chunksServed = 0;
  const endless = new ReadableStream<Uint8Array>({
    pull: (controller) => {
      chunksServed += 1;
      controller.enqueue(new Uint8Array(512));
    }
  });
  const fetchImpl: typeof fetch = async () => new Response(endless, { status: 200 });
  const [outcome] = await createHttpFetcher({ fetchImpl }).fetch(["https://stream.example/"], {
    timeoutMs: 1000,
    maxResponseBytes: 1024
  });
  assert.ok(outcome && !outcome.ok);
  assert.equal(outcome.error.message, "https://stream.example/ returned more than 1024 bytes");
  assert.ok(chunksServed < 8);
});
