// src/run_realtime.ts
import { mkdirSync } from "fs";
import { dirname } from "path";
import { createApp } from "./app.js";
import { loadConfig } from "./config.js";
import { FatalConfigError } from "./errors.js";
import { log, setLogLevel } from "./logger.js";

const nowIso = () => new Date().toISOString();

/* ---------------- boot ---------------- */
function start() {
  const cfg = loadConfig();
  setLogLevel(cfg.logLevel);
  if (cfg.dbPath !== ":memory:") mkdirSync(dirname(cfg.dbPath), { recursive: true });

  const app = createApp(cfg);
  log.info("[BOOT] using DB:", cfg.dbPath);
  log.info("[BOOT] cadence:", {
    feedMs: cfg.loops.feedMs,
    socialMs: cfg.loops.socialMs,
    signalMs: cfg.loops.signalMs,
    pricesMs: cfg.loops.pricesMs,
    impactMs: cfg.loops.impactMs,
  });

  app.orchestrator.start();
  app.bus.emit("state", "service ready", { asset: cfg.asset, at: nowIso() });

  let stopping = false;
  const shutdown = async (sig: string) => {
    if (stopping) return;
    stopping = true;
    log.info(`[BOOT] ${sig} received, stopping loops`);
    const pending = await app.orchestrator.stop(cfg.loops.shutdownTimeoutMs);
    app.db.close();
    process.exit(pending.length ? 1 : 0);
  };
  for (const sig of ["SIGINT", "SIGTERM"] as const) {
    process.on(sig, () => {
      shutdown(sig).catch((err: unknown) => {
        log.error("[BOOT] shutdown failed", err);
        process.exit(1);
      });
    });
  }
}

try {
  start();
} catch (err) {
  if (err instanceof FatalConfigError) {
    log.error("[BOOT] invalid configuration", err.issues);
    process.exit(2);
  }
  throw err;
}
