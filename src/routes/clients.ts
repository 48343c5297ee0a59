import type { FastifyInstance } from "fastify";
import { z } from "zod";

import type { RemoteClientsAndTabsStore } from "../store/remote_tabs_store";
import { mapRowDecodeErrors, requireBearerToken, sendInvalidRequest } from "./http_helpers";
import { ClientWireSchema, clientFromWire, clientToWire, tabToWire } from "./wire";

const UpsertClientsRequestSchema = z.object({
  clients: z.array(ClientWireSchema).min(1),
}).strict();

const ResetRequestSchema = z.object({
  confirm: z.literal(true),
}).strict();

export async function clientRoutes(
  app: FastifyInstance,
  opts: { store: RemoteClientsAndTabsStore; apiKey?: string }
) {
  const { store } = opts;
  requireBearerToken(app, opts.apiKey);
  mapRowDecodeErrors(app);

  app.get("/clients", async (_req, reply) => {
    const guids = await store.getClientGUIDs();
    return reply.code(200).send({ guids: Array.from(guids).sort() });
  });

  app.put("/clients", async (req, reply) => {
    const parsed = UpsertClientsRequestSchema.safeParse(req.body);
    if (!parsed.success) return sendInvalidRequest(reply, parsed.error);

    const upserted = await store.upsertClients(parsed.data.clients.map(clientFromWire));
    req.log.info({ evt: "clients.upsert", upserted }, "clients.upsert");
    return reply.code(200).send({ upserted });
  });

  app.get<{ Params: { guid: string } }>("/clients/:guid", async (req, reply) => {
    const client = await store.getClient({ guid: req.params.guid });
    if (!client) {
      return reply.code(404).send({ error: "not_found" });
    }
    return reply.code(200).send({ client: clientToWire(client) });
  });

  app.get<{ Params: { fxa_device_id: string } }>(
    "/devices/:fxa_device_id/client",
    async (req, reply) => {
      const client = await store.getClient({ fxaDeviceId: req.params.fxa_device_id });
      if (!client) {
        return reply.code(404).send({ error: "not_found" });
      }
      return reply.code(200).send({ client: clientToWire(client) });
    }
  );

  app.delete<{ Params: { guid: string } }>("/clients/:guid", async (req, reply) => {
    await store.deleteClient(req.params.guid);
    return reply.code(204).send();
  });

  app.get("/clients-and-tabs", async (_req, reply) => {
    const entries = await store.getClientsAndTabs();
    return reply.code(200).send({
      clients: entries.map((entry) => ({
        client: clientToWire(entry.client),
        tabs: entry.tabs.map(tabToWire),
      })),
    });
  });

  app.post("/reset", async (req, reply) => {
    const parsed = ResetRequestSchema.safeParse(req.body);
    if (!parsed.success) return sendInvalidRequest(reply, parsed.error);

    await store.resetClient();
    req.log.info({ evt: "store.reset" }, "store.reset");
    return reply.code(204).send();
  });
}
