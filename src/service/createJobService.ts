import { ResultStore } from "../artifacts/resultStore.js";
import type { GatewayConfig } from "../config/config.js";
import type { Logger } from "../core/log.js";
import { silentLogger } from "../core/log.js";
import type { ProcessRunner } from "../execution/backends/types.js";
import { ResourceGuard } from "../execution/resourceGuard.js";
import { WorkspaceManager } from "../execution/workspace.js";
import { JobExecutor } from "../executor/jobExecutor.js";
import { CompletionNotifier, WebhookTransport, type NotificationTransport } from "../notify/notifier.js";
import { JobQueue } from "../scheduler/jobQueue.js";
import { Scheduler } from "../scheduler/scheduler.js";
import { JobRecordStore, type JobCheckpoint } from "../store/jobRecordStore.js";
import { JobService } from "./jobService.js";

export type ServiceConfig = Pick<
  GatewayConfig,
  | "toolPath"
  | "disablePrecalc"
  | "maxFileSizeBytes"
  | "timeoutSeconds"
  | "killGraceSeconds"
  | "maxConcurrentJobs"
  | "maxQueuedJobs"
  | "agingIntervalSeconds"
  | "tempDir"
  | "resultsDir"
  | "resultRetentionDays"
  | "retentionSweepSeconds"
  | "notifyWebhookUrl"
  | "notifyTimeoutSeconds"
  | "listDefaultLimit"
>;

export interface JobServiceParts {
  service: JobService;
  store: JobRecordStore;
  queue: JobQueue;
  scheduler: Scheduler;
  executor: JobExecutor;
  results: ResultStore;
  workspaces: WorkspaceManager;
  notifier: CompletionNotifier;
}

export function createJobService(
  config: ServiceConfig,
  opts: {
    checkpoint?: JobCheckpoint | null;
    logger?: Logger;
    runner?: ProcessRunner;
    workspaces?: WorkspaceManager;
    transport?: NotificationTransport;
    now?: () => Date;
  } = {}
): JobServiceParts {
  const logger = opts.logger ?? silentLogger;
  const store = new JobRecordStore({ checkpoint: opts.checkpoint ?? null, logger, now: opts.now });
  const queue = new JobQueue({ maxQueuedJobs: config.maxQueuedJobs, agingIntervalSeconds: config.agingIntervalSeconds });
  const guard = new ResourceGuard({
    maxFileSizeBytes: config.maxFileSizeBytes,
    timeoutSeconds: config.timeoutSeconds,
    killGraceSeconds: config.killGraceSeconds,
    runner: opts.runner
  });
  const workspaces = opts.workspaces ?? new WorkspaceManager(config.tempDir);
  const results = new ResultStore(config.resultsDir);
  const transport =
    opts.transport ?? new WebhookTransport({ url: config.notifyWebhookUrl, timeoutSeconds: config.notifyTimeoutSeconds, logger });
  const notifier = new CompletionNotifier({ transport, store, logger });
  const executor = new JobExecutor({
    store,
    guard,
    workspaces,
    results,
    notifier,
    toolPath: config.toolPath,
    disablePrecalc: config.disablePrecalc,
    logger,
    now: opts.now
  });
  const scheduler = new Scheduler({
    queue,
    maxConcurrentJobs: config.maxConcurrentJobs,
    runJob: (jobId) => executor.run(jobId),
    logger
  });
  const service = new JobService({
    store,
    queue,
    scheduler,
    executor,
    guard,
    workspaces,
    results,
    notifier,
    listDefaultLimit: config.listDefaultLimit,
    resultRetentionDays: config.resultRetentionDays,
    retentionSweepSeconds: config.retentionSweepSeconds,
    logger,
    now: opts.now
  });

  return { service, store, queue, scheduler, executor, results, workspaces, notifier };
}
