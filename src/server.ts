#!/usr/bin/env node
import { loadConfig, locateConfig } from "./config/config.js";
import { createLookupEngine } from "./core/impl/lookupEngine.js";
import { MemoryDocumentStore } from "./core/impl/memoryDocumentStore.js";
import { Session, templateFormatter } from "./core/session.js";
import { logError, logPerformance, sessionLogger, startupLogger } from "./logger.js";
import { startLanguageServer } from "./lsp/server.js";
import { loadDictionaryBackend, loadFrequencyTable } from "./sources/index.js";

async function main(): Promise<void> {
  const started = Date.now();
  const location = locateConfig();
  const config = await loadConfig(location);
  startupLogger.info({ config: location.path, dictionary: config.dictionaryPath, frequencies: config.freqPath }, "configuration loaded");

  const frequencies = await loadFrequencyTable(config.freqPath);
  const backend = await loadDictionaryBackend(config.dictionaryPath, frequencies);
  const engine = createLookupEngine(backend, frequencies, {
    maxDistance: config.completion.maxDistance,
    maxItems: config.completion.maxItems,
    minFuzzyLength: config.completion.minFuzzyLength,
    fuzzyFallback: config.hover.fuzzyFallback,
  });
  logPerformance(startupLogger, "startup", started, { ...engine.stats(), frequencies: frequencies.size });

  const session = new Session({
    engine,
    documents: new MemoryDocumentStore(),
    formatter: templateFormatter(config.formatting),
    completionEnabled: config.completion.enabled,
    logger: sessionLogger,
  });

  startLanguageServer({
    session,
    onExit: (code) => {
      if (backend.kind === "delegated") backend.store.close();
      process.exit(code);
    },
  });
}

main().catch((e: unknown) => {
  logError(startupLogger, e, { phase: "startup" });
  process.exit(1);
});
