import dotenv from "dotenv";
import path from "node:path";
import { fileURLToPath } from "node:url";

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const repoRoot = path.resolve(__dirname, "../../");

dotenv.config({ path: path.resolve(repoRoot, ".env") });

// Dynamic imports so `.env` is loaded before any modules read process.env at import-time.
const { RunManager } = await import("./run_manager.js");
const { RunExecutor } = await import("./executor.js");
const { createApp } = await import("./app.js");
const { loadServiceConfig } = await import("./pipeline/config.js");
const { ConfigurationError } = await import("./pipeline/errors.js");
const { buildProviders } = await import("./pipeline/providers/index.js");
const { ProviderRouter } = await import("./pipeline/router.js");
const { createDeckPipeline } = await import("./pipeline/deck_pipeline.js");

function portFromEnv(): number {
  const port = process.env.PORT ? Number(process.env.PORT) : 5050;
  return Number.isFinite(port) && port > 0 ? port : 5050;
}

function loadConfigOrExit() {
  try {
    return loadServiceConfig();
  } catch (err) {
    if (err instanceof ConfigurationError) {
      console.error(`configuration error: ${err.message}`);
      process.exit(1);
    }
    throw err;
  }
}

const config = loadConfigOrExit();
if (config.pipelineMode === "fake") {
  console.log("server pipeline mode: fake (SLIDESMITH_PIPELINE_MODE=fake)");
}

const router = new ProviderRouter(buildProviders(config.generation.providerPreferenceOrder, config.credentials));
console.log(`providers: ${router.names().join(", ")}`);

const runs = new RunManager();
await runs.initFromDisk();

const maxConcurrentRuns = process.env.MAX_CONCURRENT_RUNS ? Number(process.env.MAX_CONCURRENT_RUNS) : 1;
const executor = new RunExecutor(runs, createDeckPipeline({ router, generation: config.generation }), {
  concurrency: Number.isFinite(maxConcurrentRuns) && maxConcurrentRuns > 0 ? maxConcurrentRuns : 1
});
const app = createApp(runs, executor, {
  router,
  generation: config.generation,
  pipelineMode: config.pipelineMode,
  hasOpenAIKey: Boolean(config.credentials.openaiApiKey),
  hasGeminiKey: Boolean(config.credentials.geminiApiKey)
});

const port = portFromEnv();
app.listen(port, () => {
  console.log(`server listening on http://localhost:${port}`);
});
