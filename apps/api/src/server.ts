import fastify, { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import cors from "@fastify/cors";
import { randomUUID } from "crypto";
import { z } from "zod";
import { CommandResult, ErrorCode, Runtime, StrataError, ValidationError } from "../../../packages/runtime/src";
import { SampleDomain, TRANSFER_SAGA } from "../../../packages/sample-domain/src";

export type ServerDeps = {
  runtime: Runtime;
  domain: SampleDomain;
  allowedOrigins?: string;
  version?: string;
};

const idParams = z.object({ id: z.string().min(1).max(100) });
const nameParams = z.object({ name: z.string().min(1).max(200) });

const openAccountBody = z.object({
  accountId: z.string().min(1).max(100),
  owner: z.string().min(1).max(200),
  openingBalance: z.number().int().nonnegative().default(0),
});

const moneyBody = z.object({
  amount: z.number().int().positive(),
  reference: z.string().min(1).max(200).optional(),
});

const transferBody = z.object({
  transferId: z.string().min(1).max(100).optional(),
  from: z.string().min(1),
  to: z.string().min(1),
  amount: z.number().int().positive(),
});

const deadLetterQuery = z.object({
  projection: z.string().min(1).optional(),
  limit: z.coerce.number().int().positive().max(500).default(100),
});

const STATUS_BY_CODE: Partial<Record<ErrorCode, number>> = {
  validation_error: 400,
  unknown_saga_type: 400,
  version_conflict: 409,
  rebuild_cancelled: 409,
  projection_already_registered: 409,
  projection_not_found: 404,
  saga_not_found: 404,
  storage_failure: 503,
  step_timeout: 504,
};

type ErrorBody = {
  error: { code: string; message: string; details?: unknown; requestId: string };
};

const parse = <T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown, what: string): T => {
  const parsed = schema.safeParse(value);
  if (!parsed.success) throw ValidationError.fromZod(parsed.error, `invalid ${what}`);
  return parsed.data;
};

/**
 * Commands go through the aggregates and the saga coordinator; reads come from projections.
 * Every error response has the shape `{ error: { code, message, details?, requestId } }`.
 */
export const buildServer = (deps: ServerDeps): FastifyInstance => {
  const { runtime, domain } = deps;
  const version = deps.version ?? "0.1.0";
  const allowedOrigins = deps.allowedOrigins ?? "*";

  const app = fastify({
    logger: { level: runtime.config.logLevel },
    genReqId: () => randomUUID(),
  });

  void app.register(cors, {
    origin: allowedOrigins === "*" ? true : allowedOrigins.split(",").map((o) => o.trim()),
    methods: ["GET", "POST", "OPTIONS"],
    allowedHeaders: ["Content-Type", "X-Request-ID"],
    maxAge: 86400,
  });

  const sendError = (
    request: FastifyRequest,
    reply: FastifyReply,
    statusCode: number,
    code: string,
    message: string,
    details?: unknown
  ) => {
    const body: ErrorBody = { error: { code, message, requestId: String(request.id) } };
    if (details !== undefined) body.error.details = details;
    return reply.status(statusCode).send(body);
  };

  const sendCommand = (
    request: FastifyRequest,
    reply: FastifyReply,
    result: CommandResult,
    successStatus: number,
    body: Record<string, string>
  ) => {
    switch (result.status) {
      case "success":
        return reply.status(successStatus).send({ ...body, version: result.version });
      case "validation_error":
        return sendError(request, reply, 400, "validation_error", result.issues[0] ?? "invalid command", result.issues);
      case "version_conflict":
        return sendError(
          request,
          reply,
          409,
          "version_conflict",
          `expected version ${result.expectedVersion}, actual version ${result.actualVersion}`,
          { expectedVersion: result.expectedVersion, actualVersion: result.actualVersion }
        );
    }
  };

  app.addHook("onRequest", (request, reply, done) => {
    reply.header("X-Request-ID", String(request.id));
    reply.header("X-Content-Type-Options", "nosniff");
    reply.header("Referrer-Policy", "no-referrer");
    done();
  });

  app.setErrorHandler((error, request, reply) => {
    if (error instanceof StrataError) {
      const status = STATUS_BY_CODE[error.code] ?? 500;
      const details = error instanceof ValidationError ? error.issues : undefined;
      if (status >= 500) {
        request.log.error({ err: error, requestId: request.id }, "request failed");
      }
      return sendError(request, reply, status, error.code, error.message, details);
    }
    const status = error.statusCode && error.statusCode >= 400 ? error.statusCode : 500;
    request.log.error({ err: error, requestId: request.id }, "request failed");
    return sendError(
      request,
      reply,
      status,
      status === 500 ? "internal_error" : "bad_request",
      status === 500 ? "Internal server error" : error.message
    );
  });

  app.setNotFoundHandler((request, reply) => {
    return sendError(request, reply, 404, "not_found", "Route not found");
  });

  app.get("/health", async (request, reply) => {
    const headPosition = await runtime.store.headPosition();
    return reply.send({
      status: "ok",
      version,
      adapter: runtime.adapter,
      headPosition,
      uptime: process.uptime(),
      timestamp: new Date().toISOString(),
    });
  });

  app.post("/accounts", async (request, reply) => {
    const body = parse(openAccountBody, request.body, "account");
    const result = await domain.accounts.open(body.accountId, body.owner, body.openingBalance);
    return sendCommand(request, reply, result, 201, { accountId: body.accountId });
  });

  app.post("/accounts/:id/deposits", async (request, reply) => {
    const { id } = parse(idParams, request.params, "account id");
    const body = parse(moneyBody, request.body, "deposit");
    const result = await domain.accounts.deposit(id, body.amount, body.reference);
    return sendCommand(request, reply, result, 200, { accountId: id });
  });

  app.post("/accounts/:id/withdrawals", async (request, reply) => {
    const { id } = parse(idParams, request.params, "account id");
    const body = parse(moneyBody, request.body, "withdrawal");
    const result = await domain.accounts.withdraw(id, body.amount, body.reference);
    return sendCommand(request, reply, result, 200, { accountId: id });
  });

  // Served from the account-balances read model, so it can trail the latest commands.
  app.get("/accounts/:id", async (request, reply) => {
    const { id } = parse(idParams, request.params, "account id");
    const row = await domain.accountBalances.get(id);
    if (!row) return sendError(request, reply, 404, "not_found", `account '${id}' not found`);
    return reply.send(row);
  });

  app.post("/transfers", async (request, reply) => {
    const body = parse(transferBody, request.body, "transfer");
    const sagaId = body.transferId ?? randomUUID();
    const outcome = await runtime.sagas.start(TRANSFER_SAGA, sagaId, {
      from: body.from,
      to: body.to,
      amount: body.amount,
    });
    return reply.status(201).send(outcome);
  });

  app.get("/sagas/:id", async (request, reply) => {
    const { id } = parse(idParams, request.params, "saga id");
    return reply.send(await runtime.sagas.status(id));
  });

  app.get("/projections", async (request, reply) => {
    return reply.send({ projections: await runtime.projections.statuses() });
  });

  app.post("/projections/:name/rebuild", async (request, reply) => {
    const { name } = parse(nameParams, request.params, "projection name");
    request.log.info({ projectionName: name }, "rebuild requested");
    return reply.send(await runtime.projections.rebuild(name));
  });

  app.get("/dead-letters", async (request, reply) => {
    const query = parse(deadLetterQuery, request.query, "query");
    reply.header("Cache-Control", "no-store");
    return reply.send({ deadLetters: await runtime.deadLetters.list(query.projection, query.limit) });
  });

  return app;
};
