import type { FastifyInstance, FastifyReply } from "fastify";
import type { z } from "zod";

import { RowDecodeError } from "../store/row_decode_error";

export const extractUnrecognizedKeys = (error: z.ZodError) => {
  const unrecognized = new Set<string>();
  for (const issue of error.issues) {
    if (issue.code === "unrecognized_keys") {
      for (const key of issue.keys) {
        unrecognized.add(key);
      }
    }
  }
  return Array.from(unrecognized);
};

export const sendInvalidRequest = (reply: FastifyReply, error: z.ZodError) => {
  const unrecognizedKeys = extractUnrecognizedKeys(error);
  if (unrecognizedKeys.length > 0) {
    return reply.code(400).send({
      error: "invalid_request",
      message: "Unrecognized keys in request",
      unrecognizedKeys,
    });
  }
  return reply.code(400).send({
    error: "invalid_request",
    details: error.flatten(),
  });
};

// No-op when no key is configured.
export const requireBearerToken = (app: FastifyInstance, apiKey?: string) => {
  app.addHook("preHandler", async (req, reply) => {
    if (!apiKey) return;
    if (req.method === "OPTIONS") return;

    const authHeader = req.headers.authorization;
    const token = authHeader?.startsWith("Bearer ")
      ? authHeader.slice("Bearer ".length).trim()
      : undefined;
    if (!token || token !== apiKey) {
      reply.header("WWW-Authenticate", "Bearer");
      return reply.code(401).send({ error: "unauthorized" });
    }
  });
};

// Stored rows that fail to decode under the abort policy; anything else goes to the parent handler.
export const mapRowDecodeErrors = (app: FastifyInstance) => {
  app.setErrorHandler(async (error, req, reply) => {
    if (error instanceof RowDecodeError) {
      req.log.error({ evt: "http.row_decode_failed", ...error.details }, "http.row_decode_failed");
      return reply.code(500).send(error.toJSON());
    }
    throw error;
  });
};
