import * as Sentry from "@sentry/node";
import express from "express";
import type { Server } from "http";
import type { Logger } from "winston";

export function createKeepAliveApp() {
  const app = express();
  const ok = (_req: express.Request, res: express.Response) => {
    res.type("text/plain").send("ok");
  };
  app.get("/", ok);
  app.get("/health", ok);
  return app;
}

// A keep-alive failure is logged and reported, the bot keeps running
export function startKeepAlive(port: number, log: Logger): Server {
  const server = createKeepAliveApp().listen(port, "0.0.0.0", () => {
    log.info(`Keep-alive server running on 0.0.0.0:${port}`);
  });
  server.on("error", err => {
    log.error(`Keep-alive server on port ${port} failed`, err);
    Sentry.captureException(err);
  });
  return server;
}
