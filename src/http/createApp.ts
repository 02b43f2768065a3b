import express from "express";
import type { NextFunction, Request, Response } from "express";
import { z } from "zod";
import type { CommandEngine } from "../execution/CommandEngine";
import { logger as rootLogger, type Logger } from "../logging/logger";

const paramsSchema = z.record(z.union([z.string(), z.number(), z.boolean(), z.null()]));

// shape of the errors body-parser hands to next()
const bodyErrorSchema = z.object({ type: z.string(), status: z.number().int().min(400).max(499) });

function waitForDrain(res: Response): Promise<void> {
  return new Promise(resolve => {
    const done = () => {
      res.off("drain", done);
      res.off("close", done);
      resolve();
    };
    res.once("drain", done);
    res.once("close", done);
  });
}

async function streamExecution(engine: CommandEngine, req: Request, res: Response, log: Logger): Promise<void> {
  const toolId = req.params.tool;
  const parsed = paramsSchema.safeParse(req.body ?? {});
  res.setHeader("Content-Type", "text/plain; charset=utf-8");
  if (!parsed.success) {
    res.status(400).end("Error: parameters must be an object of string, number, boolean or null values\n");
    return;
  }

  const started = engine.startExecution(toolId, parsed.data);
  res.setHeader("Cache-Control", "no-cache");
  if (started.executionId) {
    const executionId = started.executionId;
    res.setHeader("X-Execution-ID", executionId);
    // client went away before the stream ended
    res.on("close", () => {
      if (res.writableFinished) return;
      const outcome = engine.cancelExecution(executionId);
      log.info({ executionId, outcome: outcome.status }, "client disconnected");
    });
  }
  res.flushHeaders();

  for await (const line of started.lines) {
    if (res.destroyed) break;
    if (!res.write(`${line}\n`)) await waitForDrain(res);
  }
  res.end();
}

export function createApp(engine: CommandEngine, logger: Logger = rootLogger): express.Express {
  const log = logger.child({ component: "http" });
  const app = express();
  app.use(express.json({ limit: "1mb" }));

  app.get("/api/commands", (req, res) => {
    try { res.json(engine.listTools()); } catch (e) {
      log.error({ err: e }, "listing commands failed");
      res.status(500).json({ error: e instanceof Error ? e.message : "catalog unavailable" });
    }
  });

  app.get("/api/platform", (req, res) => {
    res.json(engine.describePlatform());
  });

  app.get("/api/executions", (req, res) => {
    res.json(engine.listExecutions());
  });

  app.post("/execute/:tool", (req, res) => {
    streamExecution(engine, req, res, log).catch(err => {
      log.error({ err, toolId: req.params.tool }, "execution stream failed");
      if (!res.headersSent) res.status(500);
      res.end();
    });
  });

  app.post("/stop/:executionId", (req, res) => {
    res.json(engine.cancelExecution(req.params.executionId));
  });

  app.use((err: unknown, req: Request, res: Response, next: NextFunction) => {
    const bodyError = bodyErrorSchema.safeParse(err);
    if (!bodyError.success || res.headersSent) {
      next(err);
      return;
    }
    const { type, status } = bodyError.data;
    log.info({ type, path: req.path }, "request body rejected");
    const reason = type === "entity.parse.failed" ? "request body is not valid JSON" : `request body rejected (${type})`;
    res.status(status).type("text/plain").end(`Error: ${reason}\n`);
  });

  return app;
}
