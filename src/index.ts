// ── Bootstrap ──────────────────────────────────────────────────────────────────
// Static imports run before the module body, so a failing import would kill
// the process before any handler below is registered. Everything is loaded
// with dynamic import() after the crash handlers are in place.

process.on("uncaughtException", (err) => {
  console.error("UNCAUGHT EXCEPTION — process will exit:");
  console.error(err);
  process.exit(1);
});

process.on("unhandledRejection", (reason) => {
  console.error("UNHANDLED REJECTION — process will exit:");
  console.error(reason);
  process.exit(1);
});

console.log("[startup] Process starting, registering crash handlers...");
console.log(`[startup] Node ${process.version}, platform: ${process.platform}, arch: ${process.arch}`);

async function main() {
  console.log("[startup] Loading modules...");

  const [
    { loadConfig, availableEnvKeys, ConfigError },
    { createApp },
    { createExpenseExtractor, createGeminiGenerator },
    { createAuthorizationGate },
    { createExpensePipeline },
    { createSupabase, SupabaseExpenseStore },
  ] = await Promise.all([
    import("./config/env.js"),
    import("./app.js"),
    import("./services/ai.js"),
    import("./services/auth.js"),
    import("./services/pipeline.js"),
    import("./services/supabase.js"),
  ]);

  console.log("[startup] All modules loaded successfully.");

  const readConfig = () => {
    try {
      return loadConfig();
    } catch (error) {
      if (error instanceof ConfigError) {
        console.error(`FATAL: ${error.message}`);
        console.error(`   Available env var keys: ${availableEnvKeys()}`);
        process.exit(1);
      }
      throw error;
    }
  };
  const config = readConfig();
  console.log(`[env] Loaded: PORT=${config.port}, NODE_ENV=${config.nodeEnv}, AI_MODEL=${config.aiModel}`);

  const store = new SupabaseExpenseStore(
    createSupabase(config.supabaseUrl, config.supabaseServiceRoleKey)
  );
  const pipeline = createExpensePipeline({
    gate: createAuthorizationGate(store),
    extractor: createExpenseExtractor({
      generate: createGeminiGenerator({ apiKey: config.googleApiKey, modelId: config.aiModel }),
      timeoutMs: config.aiTimeoutMs,
    }),
    store,
  });

  const app = createApp({ pipeline, store, isDev: config.isDev });

  // Bind to 0.0.0.0 so the service is reachable from other containers
  const host = "0.0.0.0";
  const server = app.listen(config.port, host, () => {
    console.log(`[startup] Server listening on http://${host}:${config.port}`);
    console.log(`[startup] Environment: ${config.nodeEnv}`);
  });

  server.on("error", (err) => {
    console.error("Server failed to start:", err);
    process.exit(1);
  });
}

main().catch((err) => {
  console.error("FATAL: Failed during app initialization:");
  console.error(err);
  process.exit(1);
});
