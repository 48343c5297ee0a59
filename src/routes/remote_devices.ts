import type { FastifyInstance } from "fastify";
import { z } from "zod";

import type { RemoteDevicesRegistry } from "../store/remote_devices";
import { mapRowDecodeErrors, requireBearerToken, sendInvalidRequest } from "./http_helpers";
import { RemoteDeviceWireSchema, remoteDeviceFromWire, remoteDeviceToWire } from "./wire";

const ReplaceRemoteDevicesRequestSchema = z.object({
  devices: z.array(RemoteDeviceWireSchema),
}).strict();

export async function remoteDeviceRoutes(
  app: FastifyInstance,
  opts: { registry: RemoteDevicesRegistry; apiKey?: string }
) {
  const { registry } = opts;
  requireBearerToken(app, opts.apiKey);
  mapRowDecodeErrors(app);

  app.get("/remote-devices", async (_req, reply) => {
    const devices = await registry.getRemoteDevices();
    return reply.code(200).send({ devices: devices.map(remoteDeviceToWire) });
  });

  app.put("/remote-devices", async (req, reply) => {
    const parsed = ReplaceRemoteDevicesRequestSchema.safeParse(req.body);
    if (!parsed.success) return sendInvalidRequest(reply, parsed.error);

    const replaced = await registry.replaceRemoteDevices(
      parsed.data.devices.map(remoteDeviceFromWire)
    );
    return reply.code(200).send({ replaced });
  });
}
