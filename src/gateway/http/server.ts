/**
 * Gateway HTTP server: the web front end for reviewing and applying plans.
 *
 * Route organization:
 * - GET /, GET /health (no auth)
 * - GET /files, /plans, /plans/:id (gateway token)
 * - POST /plans, /plans/:id/actions/:actionId/approve|reject,
 *   /plans/:id/approve-all, /plans/:id/apply, /suggest, /chat (gateway token)
 *
 * Routing works on a transport-neutral request/reply pair so the same
 * handler serves the socket listener and the in-process `request()` helper.
 */

import http from "node:http";
import { readFile } from "node:fs/promises";
import { z, ZodError } from "zod";

import { chat } from "../../agent/chat.js";
import { suggestStructure } from "../../agent/suggest.js";
import { DESTRUCTIVE_ACTIONS } from "../../agent/types.js";
import { applyPlan } from "../../executor/executor.js";
import { ProtectedPathError } from "../../executor/protected.js";
import { ActionNotFoundError, InvalidTransitionError, PlanNotFoundError } from "../../plan/errors.js";
import { createPlan } from "../../plan/planner.js";
import { indexSource } from "../../retrieval/indexer.js";
import { chatDeps, executorDeps, plannerDeps, type Services } from "../../runtime.js";
import { InvalidPathError, NotFoundError } from "../../sources/errors.js";
import { createLogger } from "../../utils/logger.js";
import { isIpAllowed, tokensMatch } from "./utils.js";

const log = createLogger("gateway");

const MAX_BODY_BYTES = 1_000_000;

export interface GatewayHttpConfig {
  host: string;
  port: number;
  token?: string;
  allowlist: string[];
}

export interface GatewayHttpOptions {
  config: GatewayHttpConfig;
  services: Services;
  version: string;
  /** HTML for `GET /` (defaults to static/index.html). */
  indexHtml?: string;
  /** Skip binding a socket; only `request()` serves. */
  listen?: boolean;
}

export interface GatewayRequestInit {
  method?: string;
  headers?: Record<string, string>;
  body?: string;
  remoteIp?: string;
}

export interface GatewayHttpResult {
  baseUrl: string;
  stop: () => Promise<void>;
  /**
   * In-process request helper for environments that can't bind to network ports.
   * Acts like a minimal `fetch()` against this server instance.
   */
  request: (path: string, init?: GatewayRequestInit) => Promise<Response>;
}

interface GatewayRequest {
  method: string;
  url: URL;
  headers: Record<string, string | undefined>;
  remoteIp: string;
  body: string;
}

interface GatewayReply {
  status: number;
  contentType: string;
  body: string;
}

export type GatewayErrorCode =
  | "ERR_UNAUTHORIZED"
  | "ERR_FORBIDDEN"
  | "ERR_INVALID_REQUEST"
  | "ERR_NOT_FOUND"
  | "ERR_CONFLICT"
  | "ERR_INTERNAL";

export class GatewayError extends Error {
  constructor(
    readonly status: number,
    readonly code: GatewayErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "GatewayError";
  }
}

const createPlanBody = z.object({ folderPath: z.string().optional() }).strict();
const applyBody = z.object({ dryRun: z.boolean().optional() }).strict();
const suggestBody = z.object({ folderPath: z.string().optional() }).strict();
const chatBody = z
  .object({
    sessionId: z
      .string()
      .regex(/^[A-Za-z0-9._-]{1,64}$/, "sessionId may only contain letters, digits, '.', '_' and '-'")
      .optional(),
    question: z.string().trim().min(1, "question must not be empty"),
  })
  .strict();

function json(status: number, body: Record<string, unknown>): GatewayReply {
  return { status, contentType: "application/json", body: JSON.stringify(body) };
}

function ok(data: unknown): GatewayReply {
  return json(200, { ok: true, data });
}

function fail(status: number, code: GatewayErrorCode, message: string): GatewayReply {
  return json(status, { ok: false, error: { code, message } });
}

function parseBody<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: string): T {
  let value: unknown = {};
  if (raw.trim()) {
    try {
      value = JSON.parse(raw);
    } catch {
      throw new GatewayError(400, "ERR_INVALID_REQUEST", "Invalid JSON body");
    }
  }
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue?.path.join(".") || "body";
    throw new GatewayError(400, "ERR_INVALID_REQUEST", `${where}: ${issue?.message ?? "invalid"}`);
  }
  return parsed.data;
}

/** Map domain errors onto HTTP status and error code. */
function pathParam(raw: string | undefined): string {
  try {
    return decodeURIComponent(raw ?? "");
  } catch (err) {
    if (err instanceof URIError) throw new GatewayError(400, "ERR_INVALID_REQUEST", "Malformed path segment");
    throw err;
  }
}

export function errorReply(err: unknown): GatewayReply {
  if (err instanceof GatewayError) return fail(err.status, err.code, err.message);
  if (err instanceof PlanNotFoundError || err instanceof ActionNotFoundError || err instanceof NotFoundError) {
    return fail(404, "ERR_NOT_FOUND", err.message);
  }
  if (err instanceof InvalidTransitionError) return fail(409, "ERR_CONFLICT", err.message);
  if (err instanceof InvalidPathError || err instanceof ProtectedPathError || err instanceof ZodError) {
    return fail(400, "ERR_INVALID_REQUEST", err.message);
  }
  log.error("Unhandled gateway error", err);
  return fail(500, "ERR_INTERNAL", err instanceof Error ? err.message : String(err));
}

async function loadIndexHtml(): Promise<string> {
  return readFile(new URL("../../../static/index.html", import.meta.url), "utf-8");
}

export function createGatewayHandler(opts: {
  config: GatewayHttpConfig;
  services: Services;
  version: string;
  indexHtml: () => Promise<string>;
}): (req: GatewayRequest) => Promise<GatewayReply> {
  const { config, services, version } = opts;
  const startedAt = Date.now();

  // Plan creation, apply and suggest touch the source and the model one file
  // at a time; only one may run.
  let busy: string | null = null;
  const exclusive = async <T>(name: string, fn: () => Promise<T>): Promise<T> => {
    if (busy) throw new GatewayError(409, "ERR_CONFLICT", `Another operation is running: ${busy}`);
    busy = name;
    try {
      return await fn();
    } finally {
      busy = null;
    }
  };

  const route = async (req: GatewayRequest): Promise<GatewayReply> => {
    const { method } = req;
    const path = req.url.pathname;

    // =========================================================================
    // PUBLIC ROUTES (no auth)
    // =========================================================================

    if (method === "GET" && path === "/") {
      return { status: 200, contentType: "text/html; charset=utf-8", body: await opts.indexHtml() };
    }

    if (method === "GET" && path === "/health") {
      return json(200, {
        ok: true,
        version,
        uptime: Math.round((Date.now() - startedAt) / 1000),
        source: services.source.kind,
        model: services.llm.model,
      });
    }

    // =========================================================================
    // GATEWAY TOKEN ROUTES
    // =========================================================================

    if (config.token && !tokensMatch(req.headers["x-gateway-token"], config.token)) {
      return fail(401, "ERR_UNAUTHORIZED", "Missing or invalid gateway token");
    }

    if (method === "GET" && path === "/files") {
      const folderPath = req.url.searchParams.get("path") ?? "";
      const recursive = req.url.searchParams.get("recursive") === "true";
      const files = await services.source.list({ folderPath, recursive });
      return ok({ root: services.source.root, folderPath, files });
    }

    if (path === "/plans") {
      if (method === "GET") {
        const limit = Number.parseInt(req.url.searchParams.get("limit") ?? "50", 10);
        return ok({ plans: services.plans.listPlans(Number.isNaN(limit) ? 50 : limit) });
      }
      if (method === "POST") {
        const body = parseBody(createPlanBody, req.body);
        const plan = await exclusive("plan", () =>
          createPlan(plannerDeps(services), { folderPath: body.folderPath }),
        );
        return ok({ plan });
      }
    }

    const planMatch = /^\/plans\/([^/]+)$/.exec(path);
    if (planMatch && method === "GET") {
      const planId = pathParam(planMatch[1]);
      const plan = services.plans.getPlan(planId);
      if (!plan) throw new PlanNotFoundError(planId);
      return ok({ plan });
    }

    const reviewMatch = /^\/plans\/([^/]+)\/actions\/([^/]+)\/(approve|reject)$/.exec(path);
    if (reviewMatch && method === "POST") {
      const planId = pathParam(reviewMatch[1]);
      const actionId = pathParam(reviewMatch[2]);
      const status = reviewMatch[3] === "approve" ? "approved" : "rejected";
      const action = services.plans.setActionStatus(planId, actionId, status);
      log.info(`Action ${actionId} in plan ${planId} ${status}`);
      return ok({ action });
    }

    const approveAllMatch = /^\/plans\/([^/]+)\/approve-all$/.exec(path);
    if (approveAllMatch && method === "POST") {
      const planId = pathParam(approveAllMatch[1]);
      const approved = services.plans.approveAll(planId, (a) => !DESTRUCTIVE_ACTIONS.has(a.decision.action));
      log.info(`Approved ${approved} non-destructive action(s) in plan ${planId}`);
      return ok({ approved });
    }

    const applyMatch = /^\/plans\/([^/]+)\/apply$/.exec(path);
    if (applyMatch && method === "POST") {
      const planId = pathParam(applyMatch[1]);
      const body = parseBody(applyBody, req.body);
      const result = await exclusive("apply", () =>
        applyPlan(executorDeps(services), planId, { dryRun: body.dryRun ?? false }),
      );
      return ok(result);
    }

    if (path === "/suggest" && method === "POST") {
      const body = parseBody(suggestBody, req.body);
      const result = await exclusive("suggest", async () => {
        const { config: cfg } = services;
        await indexSource({
          db: services.index,
          source: services.source,
          config: cfg.index,
          llm: services.llm,
          folderPath: body.folderPath,
        });
        const files = await services.source.list({ folderPath: body.folderPath, recursive: true });
        return suggestStructure({ db: services.index, llm: services.llm, files });
      });
      return ok(result);
    }

    if (path === "/chat" && method === "POST") {
      const body = parseBody(chatBody, req.body);
      const answer = await chat(chatDeps(services), body.sessionId ?? "web", body.question);
      return ok(answer);
    }

    return fail(404, "ERR_NOT_FOUND", "Not Found");
  };

  return async (req) => {
    if (config.allowlist.length > 0 && !isIpAllowed(req.remoteIp, config.allowlist)) {
      return fail(403, "ERR_FORBIDDEN", "IP not allowed");
    }
    try {
      return await route(req);
    } catch (err) {
      return errorReply(err);
    }
  };
}

/**
 * Start the gateway. When binding is refused (sandboxed CI) the server keeps
 * working through `request()`.
 */
export async function startGatewayHttp(opts: GatewayHttpOptions): Promise<GatewayHttpResult> {
  const { config } = opts;
  const indexHtml = opts.indexHtml;
  const handle = createGatewayHandler({
    config,
    services: opts.services,
    version: opts.version,
    indexHtml: indexHtml === undefined ? loadIndexHtml : async () => indexHtml,
  });

  const send = (res: http.ServerResponse, reply: GatewayReply) => {
    res.writeHead(reply.status, { "content-type": reply.contentType });
    res.end(reply.body);
  };

  const server = http.createServer((req, res) => {
    toGatewayRequest(req)
      .then(handle, (err: unknown) => errorReply(err))
      .then((reply) => send(res, reply))
      .catch((err: unknown) => {
        log.error("Failed to answer request", err);
        res.destroy();
      });
  });

  let listening = false;
  if (opts.listen ?? true) {
    try {
      await new Promise<void>((resolve, reject) => {
        const onError = (err: unknown) => {
          reject(err);
        };
        server.once("error", onError);
        server.listen(config.port, config.host, () => {
          server.off("error", onError);
          resolve();
        });
      });
      listening = true;
    } catch (err) {
      const code = (err as NodeJS.ErrnoException).code;
      if (code !== "EPERM" && code !== "EACCES") throw err;
      log.warn(`Cannot bind ${config.host}:${config.port} (${code}); serving in-process only`);
    }
  }

  const address = server.address();
  const port = typeof address === "object" && address ? address.port : config.port;
  if (listening) log.info(`Gateway listening on http://${config.host}:${port}`);

  const request: GatewayHttpResult["request"] = async (path, init) => {
    const headers: Record<string, string> = {};
    for (const [k, v] of Object.entries(init?.headers ?? {})) headers[k.toLowerCase()] = v;
    const reply = await handle({
      method: (init?.method ?? "GET").toUpperCase(),
      url: new URL(path, "http://localhost"),
      headers,
      remoteIp: init?.remoteIp ?? "127.0.0.1",
      body: init?.body ?? "",
    });
    return new Response(reply.body, { status: reply.status, headers: { "content-type": reply.contentType } });
  };

  return {
    baseUrl: listening ? `http://${config.host}:${port}` : "http://in-memory",
    stop: () =>
      new Promise<void>((resolve) => {
        if (!listening) {
          resolve();
          return;
        }
        server.close(() => resolve());
      }),
    request,
  };
}

// =============================================================================
// Helper Functions
// =============================================================================

function getRemoteIp(req: http.IncomingMessage): string {
  const ip = req.socket.remoteAddress ?? "";
  if (ip.startsWith("::ffff:")) {
    return ip.slice(7);
  }
  if (ip === "::1") return "127.0.0.1";
  return ip;
}

async function readBodyString(req: http.IncomingMessage): Promise<string> {
  const chunks: Buffer[] = [];
  let total = 0;
  for await (const chunk of req) {
    const buf = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    total += buf.length;
    if (total > MAX_BODY_BYTES) {
      throw new GatewayError(400, "ERR_INVALID_REQUEST", "Body too large");
    }
    chunks.push(buf);
  }
  if (chunks.length === 0) return "";
  return Buffer.concat(chunks).toString("utf8");
}

async function toGatewayRequest(req: http.IncomingMessage): Promise<GatewayRequest> {
  const headers: Record<string, string | undefined> = {};
  for (const [k, v] of Object.entries(req.headers)) {
    headers[k] = Array.isArray(v) ? v[0] : v;
  }
  return {
    method: req.method ?? "GET",
    url: new URL(req.url ?? "/", "http://localhost"),
    headers,
    remoteIp: getRemoteIp(req),
    body: await readBodyString(req),
  };
}
