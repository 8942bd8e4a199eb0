// src/index.ts
// this is also known as the backend entry file

import "dotenv/config";
import { createOpenAITextGenerator } from "./ai/textGenerator";
import { createApp } from "./app";
import {
  getGenerationTimeoutMs,
  getMaxHistoryTurns,
  getOpenAIKey,
  getOpenAIModel,
  getPort,
  getUnitsFileOverride,
} from "./config/appConfig";
import { createRoleplayService } from "./services/roleplayService";
import { createUnitCatalog } from "./state/unitCatalog";
import { loadUnits } from "./state/unitLoader";
import { logEvent, logServerError } from "./utils/logger";

function main() {
  const catalog = createUnitCatalog(loadUnits(getUnitsFileOverride()));

  const generator = createOpenAITextGenerator({
    apiKey: getOpenAIKey(),
    model: getOpenAIModel(),
    timeoutMs: getGenerationTimeoutMs(),
  });
  if (!getOpenAIKey()) {
    logEvent("warn", "openai_key_missing", { hint: "generation endpoints will return 503" });
  }

  const roleplay = createRoleplayService({
    catalog,
    generator,
    maxHistoryTurns: getMaxHistoryTurns(),
  });

  const app = createApp({ catalog, roleplay });
  const port = getPort();

  app.listen(port, () => {
    logEvent("info", "listening", { port, units: catalog.listUnits().length });
  });
}

try {
  main();
} catch (err) {
  logServerError("startup", err);
  process.exit(1);
}
