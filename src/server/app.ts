import { dirname, join } from "node:path";
import Fastify, { type FastifyError, type FastifyInstance } from "fastify";
import fastifyCors from "@fastify/cors";
import { z } from "zod";
import { isCollectorError } from "../errors.js";
import { logger } from "../logger.js";
import { isTerminalProgress, type ProgressEvent } from "../core/ProgressChannel.js";
import type { SessionManager } from "../core/SessionManager.js";
import {
  collectionWindow,
  sessionNameFrom,
  type CollectionWindow,
} from "../core/window.js";

const HEALTH_PATH = "/health";
const API_SESSIONS_PATH = "/api/sessions";

const startSessionBodySchema = z.object({
  name: z.string(),
  dateFrom: z.string(),
  dateTo: z.string(),
});

const exportBodySchema = z
  .object({
    /** File name for the table, placed beside the session log. */
    fileName: z.string().regex(/^[^\\/\0]+\.csv$/).optional(),
  })
  .optional();

const progressQuerySchema = z.object({
  after: z.coerce.number().int().nonnegative().default(0),
});

type IdParams = { Params: { id: string } };

function isMissingFile(err: Error): boolean {
  return "code" in err && err.code === "ENOENT";
}

function sseFrame(event: ProgressEvent): string {
  return `id: ${event.seq}\nevent: ${event.type}\ndata: ${JSON.stringify(event)}\n\n`;
}

/**
 * HTTP control surface over a SessionManager:
 * POST /api/sessions (start), GET /api/sessions/current, GET /api/sessions/:id,
 * GET /api/sessions/:id/progress?after=N (polling), GET /api/sessions/:id/stream (SSE),
 * POST /api/sessions/:id/export (CSV beside the log).
 */
export function buildApp(manager: SessionManager): FastifyInstance {
  const app = Fastify({ logger: false });

  void app.register(fastifyCors, {
    origin: true,
    methods: ["GET", "POST", "OPTIONS"],
    allowedHeaders: ["Content-Type", "Accept"],
  });

  app.get(HEALTH_PATH, async (_request, reply) => {
    return reply.status(200).send({ status: "ok", busy: manager.isBusy() });
  });

  app.post(API_SESSIONS_PATH, async (request, reply) => {
    const body = startSessionBodySchema.safeParse(request.body);
    if (!body.success) {
      return reply
        .status(400)
        .send({ error: "Body must include name, dateFrom and dateTo (strings)" });
    }
    const sessionName = sessionNameFrom(body.data.name);
    if (sessionName === null) {
      return reply.status(400).send({ error: "Invalid session name" });
    }
    let window: CollectionWindow;
    try {
      window = collectionWindow(body.data.dateFrom, body.data.dateTo);
    } catch (err) {
      if (isCollectorError(err) && err.code === "INVALID_DATE") {
        return reply.status(400).send({ error: err.message, code: err.code });
      }
      throw err;
    }
    if (window.windowStartMs > window.windowEndMs) {
      return reply.status(400).send({ error: "dateFrom must not be after dateTo" });
    }

    const result = manager.start({ sessionName, ...window });
    if (!result.ok) {
      return reply.status(409).send({
        error: "A collection session is already running",
        active: manager.summarize(result.active),
      });
    }
    return reply.status(202).send(manager.summarize(result.session));
  });

  app.get(`${API_SESSIONS_PATH}/current`, async (_request, reply) => {
    const session = manager.current();
    if (!session) {
      return reply.status(404).send({ error: "No session has been started" });
    }
    return reply.status(200).send(manager.summarize(session));
  });

  app.get<IdParams>(`${API_SESSIONS_PATH}/:id`, async (request, reply) => {
    const session = manager.get(request.params.id);
    if (!session) {
      return reply.status(404).send({ error: "Session not found" });
    }
    return reply.status(200).send(manager.summarize(session));
  });

  app.get<IdParams>(`${API_SESSIONS_PATH}/:id/progress`, async (request, reply) => {
    const session = manager.get(request.params.id);
    if (!session) {
      return reply.status(404).send({ error: "Session not found" });
    }
    const query = progressQuerySchema.safeParse(request.query);
    if (!query.success) {
      return reply.status(400).send({ error: "after must be a non-negative integer" });
    }
    const events = session.progress.since(query.data.after);
    return reply.status(200).send({
      events,
      next: session.progress.size,
      status: session.status,
    });
  });

  app.get<IdParams>(`${API_SESSIONS_PATH}/:id/stream`, async (request, reply) => {
    const session = manager.get(request.params.id);
    if (!session) {
      return reply.status(404).send({ error: "Session not found" });
    }
    reply.hijack();
    const res = reply.raw;
    res.writeHead(200, {
      "Content-Type": "text/event-stream",
      "Cache-Control": "no-cache",
      Connection: "keep-alive",
    });

    const history = session.progress.since(0);
    for (const event of history) res.write(sseFrame(event));
    if (history.some(isTerminalProgress)) {
      res.end();
      return;
    }

    const unsubscribe = session.progress.onProgress((event) => {
      if (res.writableEnded) return;
      res.write(sseFrame(event));
      if (isTerminalProgress(event)) {
        unsubscribe();
        res.end();
      }
    });
    res.on("close", () => {
      unsubscribe();
      logger.debug(
        { sessionId: session.id, subscribers: session.progress.subscriberCount },
        "Progress stream closed",
      );
    });
  });

  app.post<IdParams>(`${API_SESSIONS_PATH}/:id/export`, async (request, reply) => {
    const session = manager.get(request.params.id);
    if (!session) {
      return reply.status(404).send({ error: "Session not found" });
    }
    const body = exportBodySchema.safeParse(request.body ?? undefined);
    if (!body.success) {
      return reply.status(400).send({ error: "fileName must be a plain *.csv file name" });
    }
    const fileName = body.data?.fileName;
    const csvPath = fileName ? join(dirname(session.logPath), fileName) : undefined;

    const result = await manager.exportSession(session.id, csvPath);
    if (result.ok) {
      return reply.status(200).send({ csvPath: result.csvPath, count: result.count });
    }
    if (result.reason === "not-found") {
      return reply.status(404).send({ error: "Session not found" });
    }
    if (result.reason === "running") {
      return reply.status(409).send({ error: "Session is still running" });
    }
    const { error } = result;
    if (isCollectorError(error) && error.code === "CORRUPT_LOG") {
      return reply.status(422).send({ error: error.message, code: error.code });
    }
    if (isMissingFile(error)) {
      return reply.status(404).send({ error: "Session log not found" });
    }
    logger.error({ err: error, sessionId: session.id }, "POST /api/sessions/:id/export failed");
    return reply.status(500).send({ error: "Internal server error" });
  });

  app.setErrorHandler<FastifyError>((err, request, reply) => {
    const status = err.statusCode !== undefined && err.statusCode < 500 ? err.statusCode : 500;
    if (status < 500) {
      return reply.status(status).send({ error: err.message });
    }
    logger.error({ err, url: request.url }, "Request failed");
    return reply.status(500).send({ error: "Internal server error" });
  });

  return app;
}
