import { Router, Request, Response } from "express";
import { PipelineDeps, runPipeline } from "../services/pipeline";
import { requireRunApiKey } from "../middleware/runAuth";

/**
 * POST /runs
 * Runs the pipeline once over the current sheet and returns the run summary
 *
 * Only one run at a time per process; overlapping triggers get 409
 */
export function createRunsRouter(deps: PipelineDeps, runApiKey: string): Router {
  const router = Router();
  let running = false;

  router.post("/", requireRunApiKey(runApiKey), async (_req: Request, res: Response) => {
    if (running) {
      return res.status(409).json({ error: "A pipeline run is already in progress" });
    }

    running = true;
    try {
      const summary = await runPipeline(deps);
      return res.json(summary);
    } catch (error) {
      const message = error instanceof Error ? error.message : "Pipeline run failed";
      console.error(`[runs] Error:`, message);
      return res.status(502).json({ error: message });
    } finally {
      running = false;
    }
  });

  return router;
}
