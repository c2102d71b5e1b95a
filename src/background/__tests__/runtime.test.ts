import { describe, expect, it, vi } from "vitest";

import { InvalidRequestError } from "../errors";
import { createRuntime, failureResponse } from "../runtime";

describe("createRuntime", () => {
  it("should answer with a failure when nobody handles the message", async () => {
    const runtime = createRuntime();

    await expect(runtime.sendMessage({ type: "unknown" })).resolves.toEqual({
      success: false,
      error: "No handler for message type 'unknown'.",
      errorType: "InvalidRequestError",
    });
  });

  it("should wait for a listener that claims the message", async () => {
    const runtime = createRuntime();
    runtime.onMessage.addListener((message, sendResponse) => {
      setTimeout(() => sendResponse({ success: true, data: message.payload }), 0);
      return true;
    });

    await expect(runtime.sendMessage({ type: "echo", payload: 7 })).resolves.toEqual({ success: true, data: 7 });
  });

  it("should skip listeners that decline the message", async () => {
    const runtime = createRuntime();
    const declining = vi.fn(() => false);
    runtime.onMessage.addListener(declining);
    runtime.onMessage.addListener((_message, sendResponse) => {
      sendResponse({ success: true, data: "second" });
    });

    await expect(runtime.sendMessage({ type: "any" })).resolves.toEqual({ success: true, data: "second" });
    expect(declining).toHaveBeenCalledTimes(1);
  });

  it("should turn a throwing listener into a failure response", async () => {
    const runtime = createRuntime();
    runtime.onMessage.addListener(() => {
      throw new InvalidRequestError("bad payload");
    });

    await expect(runtime.sendMessage({ type: "any" })).resolves.toEqual({
      success: false,
      error: "bad payload",
      errorType: "InvalidRequestError",
    });
  });

  it("should stop delivering to a removed listener", async () => {
    const runtime = createRuntime();
    const listener = vi.fn(() => true);
    runtime.onMessage.addListener(listener);
    runtime.onMessage.removeListener(listener);

    const response = await runtime.sendMessage({ type: "any" });

    expect(response.success).toBe(false);
    expect(listener).not.toHaveBeenCalled();
  });

  it("should deliver broadcasts to every subscriber", () => {
    const runtime = createRuntime();
    const first = vi.fn();
    const second = vi.fn();
    runtime.onBroadcast.addListener(first);
    runtime.onBroadcast.addListener(second);
    runtime.onBroadcast.removeListener(second);

    runtime.broadcast({ type: "backfill-start", data: { kind: "tags" } });

    expect(first).toHaveBeenCalledWith({ type: "backfill-start", data: { kind: "tags" } });
    expect(second).not.toHaveBeenCalled();
  });
});

describe("failureResponse", () => {
  it("should carry the error name as its type", () => {
    expect(failureResponse(new RangeError("out of range"))).toEqual({
      success: false,
      error: "out of range",
      errorType: "RangeError",
    });
    expect(failureResponse("plain")).toEqual({ success: false, error: "plain", errorType: "Error" });
  });
});
