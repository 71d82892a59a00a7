import { MockAgent, getGlobalDispatcher, setGlobalDispatcher } from "undici";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { sendStatusUpdate, statusEndpoint } from "./statusReporter";

const BACKEND = "https://backend.test";

describe("statusReporter", () => {
  const originalDispatcher = getGlobalDispatcher();
  let agent: MockAgent;

  beforeEach(() => {
    agent = new MockAgent();
    agent.disableNetConnect();
    setGlobalDispatcher(agent);
  });

  afterEach(async () => {
    setGlobalDispatcher(originalDispatcher);
    await agent.close();
  });

  it("builds the upload endpoint", () => {
    expect(statusEndpoint("https://backend.test/", "42")).toBe("https://backend.test/resultupload/42/");
  });

  it("posts the status with token authorization", async () => {
    agent
      .get(BACKEND)
      .intercept({
        path: "/resultupload/42/",
        method: "POST",
        headers: { authorization: "Token test-secret", "content-type": "application/json" },
        body: JSON.stringify({ status: "running" }),
      })
      .reply(200, { detail: "ok" });

    const delivered = await sendStatusUpdate({
      projectId: "42",
      status: "running",
      token: "test-secret",
      backendUrl: BACKEND,
    });

    expect(delivered).toBe(true);
    agent.assertNoPendingInterceptors();
  });

  it("reports a rejected update without throwing", async () => {
    agent
      .get(BACKEND)
      .intercept({ path: "/resultupload/42/", method: "POST" })
      .reply(500, "server error");

    await expect(
      sendStatusUpdate({ projectId: "42", status: "completed", token: "test-secret", backendUrl: BACKEND }),
    ).resolves.toBe(false);
  });

  it("reports a transport error without throwing", async () => {
    agent
      .get(BACKEND)
      .intercept({ path: "/resultupload/42/", method: "POST" })
      .replyWithError(new Error("connection reset"));

    await expect(
      sendStatusUpdate({ projectId: "42", status: "failed", token: "test-secret", backendUrl: BACKEND }),
    ).resolves.toBe(false);
  });
});
