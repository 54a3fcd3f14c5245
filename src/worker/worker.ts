import pino, { type Logger } from "pino";
import { LabRequest, Planner } from "../types/contracts.js";
import { RequestSession, Store, withSession } from "../store/store.js";
import { Tools } from "../tools/tools.js";
import { Synthesizer } from "../core/synthesize.js";
import { executePlan } from "../core/executor.js";
import { errorMessage } from "../core/errors.js";

export const INTERRUPTED_ERROR = "interrupted: worker restarted while processing";

export type WorkerDeps = {
  planner: Planner;
  tools: Tools;
  synthesize: Synthesizer;
  logger?: Logger;
};

/**
 * Plans and executes one claimed request, then records exactly one terminal
 * state for it.
 */
export async function processRequest(req: LabRequest, session: RequestSession, deps: WorkerDeps): Promise<LabRequest> {
  const log = deps.logger ?? pino({ level: process.env.LOG_LEVEL || "info" });
  try {
    const plan = await deps.planner.plan(req.text);
    log.info({ requestId: req.id, steps: plan.steps.length }, "request: planned");

    const { result, toolCalls } = await executePlan(req.text, plan, {
      tools: deps.tools,
      session,
      synthesize: deps.synthesize,
      logger: log
    });
    return await session.completeRequest(req.id, result, toolCalls);
  } catch (err) {
    log.error({ requestId: req.id, err }, "request: failed");
    return session.failRequest(req.id, errorMessage(err));
  }
}

export class Worker {
  private store: Store;
  private deps: WorkerDeps;
  private log: Logger;
  private pollIntervalMs: number;
  private staleRunningSeconds: number;

  private running = false;
  private loop?: Promise<void>;
  private wakeUp?: () => void;
  private woken = false;

  constructor(args: WorkerDeps & {
    store: Store;
    pollIntervalMs?: number;
    staleRunningSeconds?: number;
  }) {
    this.store = args.store;
    this.log = args.logger ?? pino({ level: process.env.LOG_LEVEL || "info" });
    this.deps = { planner: args.planner, tools: args.tools, synthesize: args.synthesize, logger: this.log };
    this.pollIntervalMs = args.pollIntervalMs ?? 1000;
    this.staleRunningSeconds = args.staleRunningSeconds ?? 900;
  }

  isRunning() {
    return this.running;
  }

  /** Claims and processes at most one request. Resolves false when the queue was empty. */
  async runOnce(): Promise<boolean> {
    return withSession(this.store, async (session) => {
      const req = await session.claimNext();
      if (!req) return false;

      this.log.info({ requestId: req.id, priority: req.priority }, "request: claimed");
      const finished = await processRequest(req, session, this.deps);
      this.log.info({ requestId: req.id, status: finished.status }, "request: finished");
      return true;
    });
  }

  /** Fails requests a previous process left running. */
  async recoverStale(): Promise<string[]> {
    const startedBefore = new Date(Date.now() - this.staleRunningSeconds * 1000).toISOString();
    const ids = await withSession(this.store, (session) => session.failStaleRunning(startedBefore, INTERRUPTED_ERROR));
    if (ids.length) this.log.warn({ requestIds: ids }, "worker: failed stale running requests");
    return ids;
  }

  start() {
    if (this.running) return;
    this.running = true;
    this.loop = this.run();
  }

  async stop() {
    this.running = false;
    this.wake();
    await this.loop;
    this.loop = undefined;
    this.woken = false;
  }

  /** Cuts the current idle wait short, e.g. right after intake. */
  wake() {
    if (this.wakeUp) this.wakeUp();
    else this.woken = true;
  }

  private async run() {
    try {
      await this.recoverStale();
    } catch (err) {
      this.log.error({ err }, "worker: stale recovery failed");
    }

    this.log.info({ pollIntervalMs: this.pollIntervalMs }, "worker: started");
    while (this.running) {
      let worked = false;
      try {
        worked = await this.runOnce();
      } catch (err) {
        this.log.error({ err }, "worker: iteration failed");
      }
      if (!worked && this.running) await this.idle();
    }
    this.log.info("worker: stopped");
  }

  private idle() {
    return new Promise<void>((resolve) => {
      if (this.woken) {
        this.woken = false;
        resolve();
        return;
      }
      const done = () => {
        clearTimeout(timer);
        this.wakeUp = undefined;
        resolve();
      };
      const timer = setTimeout(done, this.pollIntervalMs);
      this.wakeUp = done;
    });
  }
}
