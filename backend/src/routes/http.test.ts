import express from "express";
import request from "supertest";
import { describe, expect, it } from "vitest";
import { createRequestAbortSignal } from "./http.js";

describe("createRequestAbortSignal", () => {
  it("aborts when the client goes away before the response ends", async () => {
    const app = express();
    const aborted = new Promise<boolean>((resolve) => {
      app.get("/slow", (_req, res) => {
        const signal = createRequestAbortSignal(res);
        signal.addEventListener("abort", () => resolve(signal.aborted));
      });
    });

    await expect(request(app).get("/slow").timeout(50)).rejects.toThrow();
    await expect(aborted).resolves.toBe(true);
  });

  it("stays untouched after a completed response", async () => {
    const app = express();
    let captured: AbortSignal | undefined;
    app.get("/done", (_req, res) => {
      captured = createRequestAbortSignal(res);
      res.type("text/plain").send("ok");
    });

    await request(app).get("/done").expect(200);
    await new Promise((resolve) => setImmediate(resolve));

    expect(captured?.aborted).toBe(false);
  });
});
