import type { FastifyInstance } from "fastify";
import { z } from "zod";
import { createProject, deleteProject, listProjects, type Db } from "@taskrelay/relay-db";

export async function registerProjects(app: FastifyInstance, deps: { db: Db }) {
  const { db } = deps;

  app.post("/projects", async (req, reply) => {
    const Schema = z.object({
      name: z.string().trim().min(1),
      metadata: z.record(z.unknown()).nullish()
    });

    const parsed = Schema.safeParse(req.body);
    if (!parsed.success) {
      reply.code(400);
      return { error: "invalid_body", issues: parsed.error.issues };
    }

    const project = await createProject(db, parsed.data);
    reply.code(201);
    return project;
  });

  app.get("/projects", async () => {
    return listProjects(db);
  });

  app.delete<{ Params: { projectId: string } }>("/projects/:projectId", async (req, reply) => {
    await deleteProject(db, req.params.projectId);
    return reply.code(204).send();
  });
}
