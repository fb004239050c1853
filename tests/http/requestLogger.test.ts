import express from "express";
import request from "supertest";
import { describe, expect, it, vi } from "vitest";
import { requestIdMiddleware } from "../../src/http/requestId";
import { filterHeaders, requestLogger } from "../../src/http/requestLogger";
import { createLogger } from "../../src/logging";

function buildApp(debug = false) {
  const logger = createLogger({ silent: true });
  const info = vi.spyOn(logger, "info");
  const app = express();
  app.use(express.json());
  app.use(requestIdMiddleware);
  app.use(requestLogger({ debug, logger }));
  app.get("/health", (_req, res) => {
    res.json({});
  });
  app.post("/v1/echo", (_req, res) => {
    res.json({});
  });
  return { app, info };
}

describe("filterHeaders", () => {
  it("drops credentials and keeps the rest", () => {
    expect(
      filterHeaders({ authorization: "Bearer test-secret", cookie: "a=b", "x-api-key": "k", accept: "*/*" })
    ).toEqual({ accept: "*/*" });
  });
});

describe("requestLogger", () => {
  it("logs a request line and a response line", async () => {
    const { app, info } = buildApp();
    await request(app)
      .post("/v1/echo")
      .set("user-agent", "test-agent")
      .set("x-forwarded-for", "10.0.0.1, 10.0.0.2")
      .set("x-request-id", "req-1")
      .send({ url: "https://example.test/a.wav", language: "en" });

    await vi.waitFor(() => expect(info).toHaveBeenCalledTimes(2));
    expect(info).toHaveBeenNthCalledWith(1, "POST /v1/echo from 10.0.0.1 (test-agent) params: url, language", {
      requestId: "req-1",
    });
    expect(info.mock.calls[1]?.[0]).toMatch(/^200 in \d+(\.\d+)? sec, 2 bytes$/);
  });

  it("skips health checks", async () => {
    const { app, info } = buildApp();
    await request(app).get("/health");
    expect(info).not.toHaveBeenCalled();
  });

  it("logs structured fields without credentials in debug mode", async () => {
    const { app, info } = buildApp(true);
    await request(app)
      .post("/v1/echo")
      .set("authorization", "Bearer test-secret")
      .set("x-request-id", "req-2")
      .send({ file: "AAAA" });

    await vi.waitFor(() => expect(info).toHaveBeenCalledTimes(2));
    expect(info).toHaveBeenNthCalledWith(
      1,
      "request",
      expect.objectContaining({
        requestId: "req-2",
        method: "POST",
        path: "/v1/echo",
        params: ["file"],
        headers: expect.not.objectContaining({ authorization: expect.anything() }),
      })
    );
    expect(info).toHaveBeenNthCalledWith(2, "response", { requestId: "req-2", status: 200, bytes: 2, seconds: expect.any(Number) });
  });
});
