import "dotenv/config";
import { loadServerConfig, locateCatalog } from "./config/Config";
import { CommandEngine } from "./execution/CommandEngine";
import { ExecutionSupervisor } from "./execution/ExecutionSupervisor";
import { createApp } from "./http/createApp";
import { logger } from "./logging/logger";
import { CatalogError, loadCatalog } from "./tools/ToolCatalog";

const config = loadServerConfig();

const supervisor = new ExecutionSupervisor({
  channelCapacity: config.channelCapacity,
  killSignal: config.killSignal,
  cwd: config.workDir,
});

// Re-read on every request so edits to the catalog apply without a restart
export const engine = new CommandEngine({
  supervisor,
  loadCatalog: () => {
    const file = locateCatalog(config);
    if (!file) throw new CatalogError("no command catalog found; set COMMANDS_CATALOG or add commands.json");
    return loadCatalog(file);
  },
});

export const app = createApp(engine);

const shouldListen = (process.env.NODE_ENV !== "test") && !process.env.VITEST;
if (shouldListen) {
  const server = app.listen(config.port, () => {
    logger.info({ port: config.port, catalog: locateCatalog(config), platform: engine.platform }, "tool launcher is running");
  });
  const shutdown = (signal: NodeJS.Signals) => {
    const outcomes = supervisor.cancelAll();
    logger.info({ signal, cancelled: Object.keys(outcomes).length }, "shutting down");
    server.close(() => process.exit(0));
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}
