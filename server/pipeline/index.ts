/**
 * Pipeline composition root: one gate, one set of queues and one scheduler
 * per process.
 */

import type { Sleep } from "../../lib/reliability";
import { BatchWindow, EventQueue } from "./batchWindow";
import { CooldownGate } from "./cooldownGate";
import { DailyCommentService } from "./dailyComments";
import { PipelineOrchestrator } from "./orchestrator";
import { AggregationScheduler } from "./scheduler";
import type {
  Clock,
  CommentStore,
  Commenter,
  EggbookStore,
  EventStore,
  Extractor,
  PipelineConfig,
  Transcriber,
} from "./types";

export interface PipelineDeps {
  events: EventStore;
  eggbook: EggbookStore;
  comments: CommentStore;
  transcriber: Transcriber;
  extractor: Extractor;
  commenter: Commenter | null;
  config: PipelineConfig;
  clock: Clock;
  sleep?: Sleep;
}

export interface Pipeline {
  scheduler: AggregationScheduler;
  orchestrator: PipelineOrchestrator;
  gate: CooldownGate;
  dailyComments: DailyCommentService;
}

export function createPipeline(deps: PipelineDeps): Pipeline {
  const { config, clock } = deps;

  const dailyComments = new DailyCommentService({
    comments: deps.comments,
    events: deps.events,
    commenter: deps.commenter,
    clock,
    config,
  });

  const orchestrator = new PipelineOrchestrator({
    events: deps.events,
    eggbook: deps.eggbook,
    transcriber: deps.transcriber,
    extractor: deps.extractor,
    config,
    sleep: deps.sleep,
    afterRun: async (report) => {
      await dailyComments.trigger(report.userId, dailyComments.today(), { manual: false });
    },
  });

  const gate = new CooldownGate(config.cooldownMs, clock);
  const scheduler = new AggregationScheduler({
    events: deps.events,
    orchestrator,
    gate,
    window: new BatchWindow(config.batchTriggerCount, config.batchMaxWaitMs),
    singles: new EventQueue(),
    clock,
    config,
  });

  return { scheduler, orchestrator, gate, dailyComments };
}

export { AggregationScheduler, type Decision, type DecisionAction, type SweepReport } from "./scheduler";
export { PipelineOrchestrator, type RunReport, type RunWork } from "./orchestrator";
export { CooldownGate } from "./cooldownGate";
export { BatchWindow, EventQueue } from "./batchWindow";
export { DailyCommentService, type CommentGenerationView } from "./dailyComments";
export { classifyEvent } from "./triggers";
export * from "./errors";
export { systemClock } from "./types";
export type * from "./types";
