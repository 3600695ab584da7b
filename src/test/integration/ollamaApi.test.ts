import { expect } from "chai";
import { describe, it } from "mocha";
import { APIConnectionError, AuthenticationError, NotFoundError, RateLimitError } from "openai";

import { ERROR_MESSAGES } from "../../translation/errors/errorTranslator.js";
import {
  chatCompletion,
  chunkSequence,
  completionChunk,
  embeddingResponse,
  FakeUpstream,
  makeVector,
  postJson,
  readNdjson,
  startTestServer,
  TEST_CONFIG_SUMMARY,
  upstreamModel,
} from "../utils/index.js";

import type { OllamaChatRequest, OllamaEmbeddingsRequest, OllamaGenerateRequest } from "../../types/index.js";
import type { FakeUpstreamOptions, TestServer } from "../utils/index.js";

const OLLAMA_VERSION = "0.6.4";
const CORRELATION_PATTERN = /^req_[0-9a-f]{12}$/;

async function withServer(
  options: FakeUpstreamOptions,
  run: (server: TestServer, upstream: FakeUpstream) => Promise<void>,
): Promise<void> {
  const upstream = new FakeUpstream(options);
  const server = await startTestServer({ upstream, ollamaVersion: OLLAMA_VERSION, config: TEST_CONFIG_SUMMARY });
  try {
    await run(server, upstream);
  } finally {
    await server.close();
  }
}

describe("Ollama API over HTTP", () => {
  describe("GET /api/tags", () => {
    it("lists translated models with count and cache headers", async () => {
      await withServer(
        { models: [upstreamModel("gpt-4o"), upstreamModel("whisper-1"), upstreamModel("gpt-3.5-turbo")] },
        async ({ baseUrl }) => {
          const response = await fetch(`${baseUrl}/api/tags`);
          const body: unknown = await response.json();

          expect(response.status).to.equal(200);
          expect(response.headers.get("x-model-count")).to.equal("2");
          expect(response.headers.get("cache-control")).to.equal("public, max-age=300");
          expect(body).to.have.property("models").with.lengthOf(2);
          expect(body).to.have.nested.property("models[0].name", "gpt-3.5-turbo");
          expect(body).to.have.nested.property("models[0].model", "gpt-3.5-turbo");
          expect(body).to.have.nested.property("models[1].name", "gpt-4o");
        },
      );
    });

    it("translates upstream failures", async () => {
      await withServer(
        { models: new AuthenticationError(401, undefined, "bad key", new Headers()) },
        async ({ baseUrl }) => {
          const response = await fetch(`${baseUrl}/api/tags`);

          expect(response.status).to.equal(401);
          expect(await response.json()).to.deep.equal({ error: ERROR_MESSAGES.AUTH });
        },
      );
    });
  });

  describe("GET /api/version", () => {
    it("returns the configured version", async () => {
      await withServer({}, async ({ baseUrl }) => {
        const response = await fetch(`${baseUrl}/api/version`);
        expect(await response.json()).to.deep.equal({ version: OLLAMA_VERSION });
      });
    });
  });

  describe("POST /api/generate", () => {
    it("answers a unary request", async () => {
      await withServer(
        { completion: chatCompletion("Rayleigh scattering.", { usage: { prompt: 7, completion: 3 } }) },
        async ({ baseUrl }, upstream) => {
          const request: OllamaGenerateRequest = { model: "llama2", prompt: "Why is the sky blue?", stream: false };
          const response = await postJson(baseUrl, "/api/generate", request);
          const body: unknown = await response.json();

          expect(response.status).to.equal(200);
          expect(body).to.include({
            model: "llama2",
            response: "Rayleigh scattering.",
            done: true,
            done_reason: "stop",
            prompt_eval_count: 7,
            eval_count: 3,
          });
          expect(body).to.have.property("context").that.deep.equals([128006, 882, 128007, 128006, 78191, 128007]);
          expect(upstream.completionCalls[0]?.model).to.equal("gpt-3.5-turbo");
        },
      );
    });

    it("streams NDJSON records ending with one done record", async () => {
      await withServer({ chunks: chunkSequence(["The", " sky", " is", " blue"]) }, async ({ baseUrl }) => {
        const response = await postJson(baseUrl, "/api/generate", { model: "gpt-4", prompt: "hi", stream: true });

        expect(response.status).to.equal(200);
        expect(response.headers.get("content-type")).to.equal("application/x-ndjson");
        const records = await readNdjson(response);

        expect(records.map((record) => record["response"])).to.deep.equal(["The", " sky", " is", " blue", ""]);
        expect(records.map((record) => record["done"])).to.deep.equal([false, false, false, false, true]);
        expect(records[4]?.["done_reason"]).to.equal("stop");
        for (const record of records) {
          expect(record["model"]).to.equal("gpt-4");
        }
      });
    });

    it("rejects a request without a prompt with 422", async () => {
      await withServer({}, async ({ baseUrl }, upstream) => {
        const response = await postJson(baseUrl, "/api/generate", { model: "gpt-4", stream: true });

        expect(response.status).to.equal(422);
        expect(await response.json()).to.deep.equal({ error: "prompt is required" });
        expect(upstream.streamCalls).to.deep.equal([]);
      });
    });

    it("rejects a request without a model with 422", async () => {
      await withServer({}, async ({ baseUrl }, upstream) => {
        const response = await postJson(baseUrl, "/api/generate", { prompt: "hi", stream: false });

        expect(response.status).to.equal(422);
        expect(await response.json()).to.deep.equal({ error: "model is required" });
        expect(upstream.completionCalls).to.deep.equal([]);
      });
    });

    it("rejects an empty prompt with 400", async () => {
      await withServer({}, async ({ baseUrl }, upstream) => {
        const response = await postJson(baseUrl, "/api/generate", { model: "gpt-4", prompt: "" });

        expect(response.status).to.equal(400);
        expect(await response.json()).to.deep.equal({ error: "prompt is required" });
        expect(upstream.completionCalls).to.deep.equal([]);
      });
    });

    it("names the missing model in a 404", async () => {
      await withServer(
        { completion: new NotFoundError(404, undefined, "The model does not exist", new Headers()) },
        async ({ baseUrl }) => {
          const response = await postJson(baseUrl, "/api/generate", { model: "gpt-9", prompt: "hi" });

          expect(response.status).to.equal(404);
          expect(await response.json()).to.deep.equal({
            error: "The model 'gpt-9' does not exist or you do not have access to it.",
          });
        },
      );
    });

    it("passes Retry-After through on rate limits", async () => {
      await withServer(
        { completion: new RateLimitError(429, undefined, "slow down", new Headers({ "retry-after": "5" })) },
        async ({ baseUrl }) => {
          const response = await postJson(baseUrl, "/api/generate", { model: "gpt-4", prompt: "hi" });

          expect(response.status).to.equal(429);
          expect(response.headers.get("retry-after")).to.equal("5");
          expect(await response.json()).to.deep.equal({ error: ERROR_MESSAGES.RATE_LIMIT });
        },
      );
    });

    it("rejects malformed JSON", async () => {
      await withServer({}, async ({ baseUrl }) => {
        const response = await fetch(`${baseUrl}/api/generate`, {
          method: "POST",
          headers: { "Content-Type": "application/json" },
          body: '{"model": "gpt-4", "prompt": ',
        });

        expect(response.status).to.equal(400);
        expect(await response.json()).to.deep.equal({ error: "Request body must be valid JSON" });
      });
    });
  });

  describe("POST /api/chat", () => {
    it("answers a unary request with an assistant message", async () => {
      await withServer({ completion: chatCompletion("Hi there!") }, async ({ baseUrl }) => {
        const request: OllamaChatRequest = { model: "gpt-4", messages: [{ role: "user", content: "Hello" }] };
        const response = await postJson(baseUrl, "/api/chat", request);
        const body: unknown = await response.json();

        expect(response.status).to.equal(200);
        expect(body).to.have.deep.property("message", { role: "assistant", content: "Hi there!" });
        expect(body).to.include({ model: "gpt-4", done: true, done_reason: "stop" });
      });
    });

    it("ends a failing stream with an error record carrying the correlation id", async () => {
      await withServer(
        { chunks: [completionChunk("Hel"), new APIConnectionError({ message: "socket hang up" })] },
        async ({ baseUrl }) => {
          const response = await postJson(
            baseUrl,
            "/api/chat",
            { model: "gpt-4", messages: [{ role: "user", content: "Hello" }], stream: true },
            { "X-Correlation-ID": "corr-stream-1" },
          );

          expect(response.status).to.equal(200);
          expect(response.headers.get("x-correlation-id")).to.equal("corr-stream-1");
          const records = await readNdjson(response);

          expect(records).to.have.lengthOf(2);
          expect(records[0]).to.deep.include({ message: { role: "assistant", content: "Hel" }, done: false });
          expect(records[1]).to.deep.include({
            model: "gpt-4",
            message: { role: "assistant", content: "" },
            done: true,
            error: ERROR_MESSAGES.CONNECTION,
            correlation_id: "corr-stream-1",
          });
        },
      );
    });

    it("rejects an empty message list with 400 and a missing one with 422", async () => {
      await withServer({}, async ({ baseUrl }) => {
        const empty = await postJson(baseUrl, "/api/chat", { model: "gpt-4", messages: [] });
        const missing = await postJson(baseUrl, "/api/chat", { model: "gpt-4" });

        expect(empty.status).to.equal(400);
        expect(await empty.json()).to.deep.equal({ error: "messages must be a non-empty array" });
        expect(missing.status).to.equal(422);
        expect(await missing.json()).to.deep.equal({ error: "messages must be a non-empty array" });
      });
    });

    it("rejects an unknown role", async () => {
      await withServer({}, async ({ baseUrl }) => {
        const response = await postJson(baseUrl, "/api/chat", {
          model: "gpt-4",
          messages: [{ role: "robot", content: "beep" }],
        });

        expect(response.status).to.equal(400);
        expect(await response.json()).to.deep.equal({
          error: "messages[0].role must be one of system, user, assistant, tool",
        });
      });
    });
  });

  describe("POST /api/embeddings and /api/embed", () => {
    it("returns the upstream vector unchanged on both routes", async () => {
      const vector = makeVector(1536, 11);
      await withServer({ embedding: embeddingResponse([vector]) }, async ({ baseUrl }, upstream) => {
        const legacyRequest: OllamaEmbeddingsRequest = { model: "text-embedding-3-small", prompt: "sky" };
        const legacy = await postJson(baseUrl, "/api/embeddings", legacyRequest);
        const current = await postJson(baseUrl, "/api/embed", { model: "text-embedding-3-small", input: ["sky"] });

        expect(await legacy.json()).to.deep.equal({ embedding: vector });
        expect(await current.json()).to.deep.equal({ embedding: vector });
        expect(upstream.embeddingCalls).to.deep.equal([
          { model: "text-embedding-3-small", input: "sky" },
          { model: "text-embedding-3-small", input: "sky" },
        ]);
      });
    });
  });

  describe("embedding validation", () => {
    it("rejects a missing prompt with 422 and an empty one with 400", async () => {
      await withServer({}, async ({ baseUrl }, upstream) => {
        const missing = await postJson(baseUrl, "/api/embeddings", { model: "text-embedding-3-small" });
        const empty = await postJson(baseUrl, "/api/embeddings", { model: "text-embedding-3-small", prompt: "" });
        const noModel = await postJson(baseUrl, "/api/embeddings", { prompt: "sky" });

        expect(missing.status).to.equal(422);
        expect(await missing.json()).to.deep.equal({ error: "prompt is required" });
        expect(empty.status).to.equal(400);
        expect(await empty.json()).to.deep.equal({ error: "prompt is required" });
        expect(noModel.status).to.equal(422);
        expect(await noModel.json()).to.deep.equal({ error: "model is required" });
        expect(upstream.embeddingCalls).to.deep.equal([]);
      });
    });
  });

  describe("correlation ids", () => {
    it("echoes X-Request-ID when no correlation id is sent", async () => {
      await withServer({}, async ({ baseUrl }) => {
        const response = await fetch(`${baseUrl}/api/version`, { headers: { "X-Request-ID": "request-42" } });
        expect(response.headers.get("x-correlation-id")).to.equal("request-42");
      });
    });

    it("generates one otherwise", async () => {
      await withServer({}, async ({ baseUrl }) => {
        const response = await fetch(`${baseUrl}/api/version`);
        expect(response.headers.get("x-correlation-id")).to.match(CORRELATION_PATTERN);
      });
    });
  });

  describe("unknown routes", () => {
    it("answers 404 with the method and path", async () => {
      await withServer({}, async ({ baseUrl }) => {
        const missing = await fetch(`${baseUrl}/api/pull`);
        const wrongMethod = await postJson(baseUrl, "/api/tags", {});

        expect(missing.status).to.equal(404);
        expect(await missing.json()).to.deep.equal({ error: "Endpoint not found: GET /api/pull" });
        expect(wrongMethod.status).to.equal(404);
        expect(await wrongMethod.json()).to.deep.equal({ error: "Endpoint not found: POST /api/tags" });
      });
    });
  });

  describe("probes", () => {
    it("serves the root banner and liveness", async () => {
      await withServer({}, async ({ baseUrl }) => {
        const root = await fetch(`${baseUrl}/`);
        const live = await fetch(`${baseUrl}/live`);

        expect(await root.json()).to.deep.equal({ status: "OK", message: "Ollama API shim is running." });
        expect(live.status).to.equal(200);
        expect(await live.json()).to.have.property("status", "alive");
      });
    });

    it("reports a degraded upstream as 200 health and 503 readiness", async () => {
      const health = {
        status: "unhealthy" as const,
        error: "connection refused",
        requestCount: 1,
        errorCount: 1,
        errorRate: 1,
      };
      await withServer({ health }, async ({ baseUrl }) => {
        const healthResponse = await fetch(`${baseUrl}/health`);
        const readyResponse = await fetch(`${baseUrl}/ready`);

        expect(healthResponse.status).to.equal(200);
        expect(await healthResponse.json()).to.have.property("status", "degraded");
        expect(readyResponse.status).to.equal(503);
        expect(await readyResponse.json()).to.include({ status: "not_ready", reason: "Upstream API not healthy" });
      });
    });

    it("serves the raw upstream check with 200 when healthy and 503 otherwise", async () => {
      const healthy = { status: "healthy" as const, modelsAvailable: 3, requestCount: 4, errorCount: 1, errorRate: 0.25 };
      const unhealthy = { status: "unhealthy" as const, error: "connection refused", requestCount: 2, errorCount: 2, errorRate: 1 };

      await withServer({ health: healthy }, async ({ baseUrl }) => {
        const response = await fetch(`${baseUrl}/openai/health`);
        expect(response.status).to.equal(200);
        expect(await response.json()).to.deep.equal(healthy);
      });
      await withServer({ health: unhealthy }, async ({ baseUrl }) => {
        const response = await fetch(`${baseUrl}/openai/health`);
        expect(response.status).to.equal(503);
        expect(await response.json()).to.deep.equal(unhealthy);
      });
    });

    it("summarises the configuration on /config/validate", async () => {
      await withServer({}, async ({ baseUrl }) => {
        const response = await fetch(`${baseUrl}/config/validate`);

        expect(response.status).to.equal(200);
        expect(await response.json()).to.deep.equal({
          status: "valid",
          config: {
            upstream_base_url: "http://127.0.0.1:9/v1",
            proxy_host: "127.0.0.1",
            proxy_port: 11434,
            debug_mode: false,
            request_timeout_seconds: 300,
            max_retries: 3,
            api_key_configured: true,
          },
        });
      });
    });

    it("counts completed requests in /metrics", async () => {
      await withServer({}, async ({ baseUrl }) => {
        await (await fetch(`${baseUrl}/api/version`)).json();
        await (await fetch(`${baseUrl}/api/missing`)).json();

        const response = await fetch(`${baseUrl}/metrics`);
        const body: unknown = await response.json();

        expect(body).to.have.nested.property("app_info.name", "ollama-openai-shim");
        expect(body).to.have.nested.property("requests.total", 2);
        expect(body).to.have.nested.property("requests.success", 1);
        expect(body).to.have.nested.property("requests.failed", 1);
      });
    });
  });
});
