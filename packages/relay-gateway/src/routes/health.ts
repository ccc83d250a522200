import type { FastifyInstance } from "fastify";

export async function registerHealth(app: FastifyInstance, deps: { service: string }) {
  app.get("/health", async () => {
    return { status: "ok", service: deps.service };
  });
}
