import type { CostLedger } from "./cost.js";
import { ProviderError, type ProviderOperation } from "./errors.js";
import type { ProviderCallContext, SlideProvider } from "./providers/types.js";
import { toErrorMessage } from "./utils.js";

export type CallBoundary = {
  /** Run-wide cancellation. */
  signal: AbortSignal;
  timeoutMs: number;
  ledger: CostLedger;
  log: (message: string) => void;
};

/**
 * Single adapter call bounded by the per-call timeout and the run signal. Whatever the adapter
 * throws leaves here as a ProviderError; a successful call is priced into the ledger.
 */
export async function callProvider<T>(args: {
  provider: SlideProvider;
  operation: ProviderOperation;
  boundary: CallBoundary;
  inputText: string;
  outputText: (result: T) => string;
  invoke: (ctx: ProviderCallContext) => Promise<T>;
}): Promise<T> {
  const { provider, operation, boundary } = args;

  if (boundary.signal.aborted) {
    throw new ProviderError(provider.name, operation, "cancelled", "Cancelled");
  }

  const controller = new AbortController();
  let timedOut = false;
  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, boundary.timeoutMs);
  const onRunAbort = () => controller.abort();
  boundary.signal.addEventListener("abort", onRunAbort, { once: true });

  const abortedPromise = new Promise<never>((_resolve, reject) => {
    controller.signal.addEventListener("abort", () => reject(new Error("aborted")), { once: true });
  });

  const work = Promise.resolve().then(() => args.invoke({ signal: controller.signal, log: boundary.log }));
  // A call that loses the race may still settle later.
  void work.catch((err: unknown) => {
    if (controller.signal.aborted) boundary.log(`Late ${provider.name}.${operation} failure ignored: ${toErrorMessage(err)}`);
  });

  try {
    const result = await Promise.race([work, abortedPromise]);
    boundary.ledger.record({
      provider: provider.name,
      operation,
      usdPer1kTokens: provider.usdPer1kTokens,
      inputText: args.inputText,
      outputText: args.outputText(result)
    });
    return result;
  } catch (err) {
    if (boundary.signal.aborted) {
      throw new ProviderError(provider.name, operation, "cancelled", "Cancelled", { cause: err });
    }
    if (timedOut) {
      throw new ProviderError(provider.name, operation, "timeout", `timed out after ${boundary.timeoutMs}ms`, { cause: err });
    }
    throw ProviderError.from(provider.name, operation, err);
  } finally {
    clearTimeout(timer);
    boundary.signal.removeEventListener("abort", onRunAbort);
  }
}
