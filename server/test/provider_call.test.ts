import { describe, expect, it } from "vitest";
import { ProviderError } from "../src/pipeline/errors.js";
import { callProvider } from "../src/pipeline/provider_call.js";
import { StubProvider, makeBoundary, sleep, untilAborted } from "./stub_provider.js";

describe("callProvider", () => {
  it("returns the result and prices the call", async () => {
    const provider = new StubProvider("a", {}, 1);
    const boundary = makeBoundary();

    const out = await callProvider({
      provider,
      operation: "generateNarration",
      boundary,
      inputText: "one two three",
      outputText: (s: string) => s,
      invoke: async () => "four five"
    });

    expect(out).toBe("four five");
    expect(boundary.ledger.snapshot().entries).toEqual([
      { provider: "a", operation: "generateNarration", calls: 1, tokens: 7, usd: 0.007 }
    ]);
  });

  it("wraps adapter failures as ProviderError and records nothing", async () => {
    const boundary = makeBoundary();
    const err = await callProvider({
      provider: new StubProvider("a"),
      operation: "scoreSlide",
      boundary,
      inputText: "x",
      outputText: () => "",
      invoke: async () => {
        throw Object.assign(new Error("slow down"), { status: 429 });
      }
    }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ProviderError);
    if (!(err instanceof ProviderError)) return;
    expect(err.kind).toBe("rate_limit");
    expect(err.message).toBe("a.scoreSlide failed (rate_limit): slow down");
    expect(boundary.ledger.snapshot().totalCalls).toBe(0);
  });

  it("times out a call that never settles", async () => {
    const boundary = makeBoundary({ timeoutMs: 20 });
    const err = await callProvider({
      provider: new StubProvider("a"),
      operation: "generateSlide",
      boundary,
      inputText: "",
      outputText: () => "",
      invoke: (ctx) => untilAborted(ctx)
    }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ProviderError);
    if (!(err instanceof ProviderError)) return;
    expect(err.kind).toBe("timeout");
    expect(err.message).toBe("a.generateSlide failed (timeout): timed out after 20ms");

    await sleep(0);
    expect(boundary.logs).toContain("Late a.generateSlide failure ignored: aborted");
  });

  it("reports cancellation when the run aborts mid-call", async () => {
    const controller = new AbortController();
    const boundary = makeBoundary({ signal: controller.signal });
    setTimeout(() => controller.abort(), 10);

    const err = await callProvider({
      provider: new StubProvider("a"),
      operation: "optimizeSlide",
      boundary,
      inputText: "",
      outputText: () => "",
      invoke: (ctx) => untilAborted(ctx)
    }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ProviderError);
    if (!(err instanceof ProviderError)) return;
    expect(err.kind).toBe("cancelled");
    expect(err.message).toBe("a.optimizeSlide failed (cancelled): Cancelled");
  });

  it("does not invoke the adapter once the run is cancelled", async () => {
    const controller = new AbortController();
    controller.abort();
    let invoked = false;

    await expect(
      callProvider({
        provider: new StubProvider("a"),
        operation: "generateSlide",
        boundary: makeBoundary({ signal: controller.signal }),
        inputText: "",
        outputText: () => "",
        invoke: async () => {
          invoked = true;
          return "x";
        }
      })
    ).rejects.toThrow("a.generateSlide failed (cancelled): Cancelled");
    expect(invoked).toBe(false);
  });
});
