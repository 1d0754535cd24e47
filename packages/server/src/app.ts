import express from 'express';
import { generateJUnit, remoteCredentialsFromEnv, runnableSuiteIds, type Engine, type RunResult } from '@smokerun/core';
import { z } from 'zod';

const createRunBodySchema = z.object({
  suite: z
    .string()
    .regex(/^[a-z0-9_]+$/)
    .optional(),
  target: z.string().url().optional()
});

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Runs share one bridge file and one results file, so requests are queued and executed
 * one at a time.
 */
export class RunQueue {
  private tail: Promise<unknown> = Promise.resolve();

  enqueue<T>(task: () => Promise<T>): Promise<T> {
    const next = this.tail.then(task, task);
    this.tail = next.catch(() => undefined);
    return next;
  }
}

export function createApp(engine: Engine, queue = new RunQueue()): express.Express {
  const app = express();
  app.use(express.json({ limit: '100kb' }));

  app.get('/suites', async (_req, res) => {
    try {
      res.json(await engine.registry.detect());
    } catch (error) {
      res.status(500).json({ error: errorMessage(error) });
    }
  });

  app.get('/results', async (_req, res) => {
    try {
      const result = await engine.orchestrator.getLastResults();
      if (!result) {
        res.status(404).json({ error: 'No results yet' });
        return;
      }
      res.json({ ...result, lastRun: await engine.orchestrator.getLastRunTime() });
    } catch (error) {
      res.status(500).json({ error: errorMessage(error) });
    }
  });

  app.get('/results/junit', async (_req, res) => {
    try {
      const result = await engine.orchestrator.getLastResults();
      if (!result) {
        res.status(404).json({ error: 'No results yet' });
        return;
      }
      res.type('application/xml').send(generateJUnit(result));
    } catch (error) {
      res.status(500).json({ error: errorMessage(error) });
    }
  });

  app.post('/runs', async (req, res) => {
    const parsed = createRunBodySchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: parsed.error.flatten() });
      return;
    }

    const { suite, target } = parsed.data;
    try {
      if (suite && !(await engine.registry.labels())[suite]) {
        res.status(404).json({ error: `Unknown suite: ${suite}` });
        return;
      }

      const credentials = remoteCredentialsFromEnv();
      const result = await queue.enqueue(async (): Promise<RunResult> => {
        if (suite) {
          return engine.orchestrator.run(suite, target, credentials);
        }
        return engine.orchestrator.runEach(await runnableSuiteIds(engine), target, credentials);
      });
      res.status(result.error ? 502 : 201).json(result);
    } catch (error) {
      res.status(500).json({ error: errorMessage(error) });
    }
  });

  return app;
}
