import "dotenv/config";
import { createApp } from "./app.js";
import { loadPlannerConfig } from "./config/rules.js";
import { loadServerSettings } from "./config/env.js";
import { Executor } from "./executor/executor.js";
import { logInfo } from "./logs.js";
import { Planner } from "./planner/planner.js";
import { createLlmProviderFromEnv, createTtsProviderFromEnv } from "./providers/factory.js";

async function main() {
  const settings = loadServerSettings();
  // Roots are fixed for the executor's lifetime; the planner rereads rules per request.
  const config = loadPlannerConfig(settings.rulesPath);

  const app = createApp({
    planner: new Planner({ homeDir: settings.homeDir }),
    executor: new Executor({ allowedRoots: config.allowedRoots, homeDir: settings.homeDir }),
    llm: createLlmProviderFromEnv(),
    tts: createTtsProviderFromEnv(),
    rulesPath: settings.rulesPath,
  });

  app.listen(settings.port, () => {
    logInfo("server_started", {
      port: settings.port,
      rules_path: settings.rulesPath,
      roots: config.allowedRoots.join(","),
    });
  });
}

main().catch((error) => {
  console.error("Backend startup failed:", error);
  process.exit(1);
});
