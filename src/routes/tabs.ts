import type { FastifyInstance } from "fastify";
import { z } from "zod";

import type { RemoteClientsAndTabsStore } from "../store/remote_tabs_store";
import { mapRowDecodeErrors, requireBearerToken, sendInvalidRequest } from "./http_helpers";
import { TabWireSchema, tabFromWire, tabToWire } from "./wire";

const ReplaceTabsRequestSchema = z.object({
  tabs: z.array(TabWireSchema),
}).strict();

const WipeTabsQuerySchema = z.object({
  scope: z.enum(["remote", "all"]).default("remote"),
}).strict();

export async function tabRoutes(
  app: FastifyInstance,
  opts: { store: RemoteClientsAndTabsStore; apiKey?: string }
) {
  const { store } = opts;
  requireBearerToken(app, opts.apiKey);
  mapRowDecodeErrors(app);

  app.get<{ Params: { guid: string } }>("/clients/:guid/tabs", async (req, reply) => {
    const tabs = await store.getTabsForClient(req.params.guid);
    return reply.code(200).send({ tabs: tabs.map(tabToWire) });
  });

  app.put<{ Params: { guid: string } }>("/clients/:guid/tabs", async (req, reply) => {
    const parsed = ReplaceTabsRequestSchema.safeParse(req.body);
    if (!parsed.success) return sendInvalidRequest(reply, parsed.error);

    const { guid } = req.params;
    const inserted = await store.replaceTabs(
      guid,
      parsed.data.tabs.map((tab) => tabFromWire(guid, tab))
    );
    return reply.code(200).send({ inserted });
  });

  app.get("/tabs/local", async (_req, reply) => {
    const tabs = await store.getTabsForClient(null);
    return reply.code(200).send({ tabs: tabs.map(tabToWire) });
  });

  app.put("/tabs/local", async (req, reply) => {
    const parsed = ReplaceTabsRequestSchema.safeParse(req.body);
    if (!parsed.success) return sendInvalidRequest(reply, parsed.error);

    const inserted = await store.insertOrUpdateTabs(
      parsed.data.tabs.map((tab) => tabFromWire(undefined, tab))
    );
    return reply.code(200).send({ inserted });
  });

  app.delete("/tabs", async (req, reply) => {
    const parsed = WipeTabsQuerySchema.safeParse(req.query ?? {});
    if (!parsed.success) return sendInvalidRequest(reply, parsed.error);

    if (parsed.data.scope === "all") {
      await store.wipeTabs();
    } else {
      await store.wipeRemoteTabs();
    }
    req.log.info({ evt: "tabs.wipe", scope: parsed.data.scope }, "tabs.wipe");
    return reply.code(204).send();
  });
}
