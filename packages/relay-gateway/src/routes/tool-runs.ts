import type { FastifyInstance } from "fastify";
import { NotFoundError, getToolRun, type Db } from "@taskrelay/relay-db";

export async function registerToolRuns(app: FastifyInstance, deps: { db: Db }) {
  app.get<{ Params: { toolRunId: string } }>("/tool-runs/:toolRunId", async (req) => {
    const toolRun = await getToolRun(deps.db, req.params.toolRunId);
    if (!toolRun) {
      throw new NotFoundError("tool_run", req.params.toolRunId);
    }
    return toolRun;
  });
}
