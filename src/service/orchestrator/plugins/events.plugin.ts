import type { FastifyPluginAsync } from "fastify";

import type { AutomationPipeline } from "../pipeline.js";

interface EventsPluginOptions {
  basePath: string;
  pipeline: AutomationPipeline;
}

export const eventsPlugin: FastifyPluginAsync<EventsPluginOptions> = async (app, options) => {
  // POST /events - 入站事件走完整流水线
  app.post(`${options.basePath}/events`, async (request, reply) => {
    const outcome = await options.pipeline.handleEvent(request.body);
    reply.code(201);
    return outcome;
  });
};
