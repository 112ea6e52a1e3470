import type { Express } from "express";
import {
  createEventRequestSchema,
  eventStatuses,
  updateEventRequestSchema,
  type EventFields,
  type EventRecord,
  type EventStatus,
} from "@shared/schema";
import { v4 as uuidv4 } from "uuid";
import { getUserId, requireUser } from "./deviceAuth";
import { logDebug } from "./logger";
import { HttpError, asyncHandler, parseBody } from "./middleware/apiValidation";
import {
  classifyEvent,
  hasAudio,
  hasTranscript,
  screenRecordingOf,
} from "./pipeline/triggers";
import { isPlaceholderIdea } from "./storage";
import type { AppDeps } from "./routes";

export function eventToDict(event: EventRecord) {
  const screenRecordingUrl = screenRecordingOf(event);
  return {
    eventId: event.id,
    deviceId: event.deviceId,
    // Backward-compatible field for existing clients
    recordingUrl: screenRecordingUrl,
    audioUrl: event.audioUrl,
    screenRecordingUrl,
    transcript: event.transcript,
    durationSec: Math.trunc(event.durationSec),
    eventAt: event.eventAt,
    status: event.status,
    createdAt: event.createdAt,
    updatedAt: event.updatedAt,
  };
}

function isEventStatus(value: string): value is EventStatus {
  return eventStatuses.some((status) => status === value);
}

function given<T>(value: T | null | undefined): value is T {
  return value !== null && value !== undefined;
}

export function registerEventRoutes(app: Express, deps: AppDeps): void {
  const { storage, tokens, pipeline, config, clock } = deps;
  const auth = requireUser(tokens);

  const loadEvent = async (userId: string, eventId: string): Promise<EventRecord> => {
    const event = await storage.getEventForUser(userId, eventId);
    if (!event) {
      throw new HttpError(404, "Event not found");
    }
    return event;
  };

  const evaluate = (event: EventRecord): void => {
    if (!config.aiEnabled) return;
    const decision = pipeline.scheduler.onEventChanged(event);
    logDebug(`Event ${event.id}: ${decision.path}/${decision.action}`, "events");
  };

  app.post("/v1/events", auth, asyncHandler(async (req, res) => {
    const userId = getUserId(res);
    const body = parseBody(createEventRequestSchema, req);

    const device = await storage.getDevice(body.device_id);
    if (!device || device.userId !== userId) {
      throw new HttpError(404, "Device not found");
    }

    const now = new Date(clock.now()).toISOString();
    const screenRecordingUrl = body.screen_recording_url || body.recording_url || null;
    const event = await storage.create({
      id: uuidv4(),
      userId,
      deviceId: body.device_id,
      audioUrl: body.audio_url ?? null,
      screenRecordingUrl,
      recordingUrl: screenRecordingUrl,
      transcript: body.transcript ?? null,
      durationSec: body.duration_sec ?? 0,
      eventAt: body.event_at ? new Date(body.event_at).toISOString() : now,
      status: "pending",
      aiAttempts: 0,
      createdAt: now,
      updatedAt: now,
    });

    evaluate(event);
    res.json(eventToDict(event));
  }));

  app.patch("/v1/events/:id", auth, asyncHandler(async (req, res) => {
    const userId = getUserId(res);
    const event = await loadEvent(userId, req.params.id);
    const body = parseBody(updateEventRequestSchema, req);

    if (given(body.status) && !isEventStatus(body.status)) {
      throw new HttpError(400, "Invalid status");
    }

    const fields: EventFields = {};
    if (given(body.audio_url)) fields.audioUrl = body.audio_url;
    if (given(body.screen_recording_url)) {
      fields.screenRecordingUrl = body.screen_recording_url;
      fields.recordingUrl = body.screen_recording_url;
    }
    if (given(body.recording_url)) {
      fields.recordingUrl = body.recording_url;
      fields.screenRecordingUrl = body.recording_url;
    }
    if (given(body.transcript)) fields.transcript = body.transcript;
    if (given(body.duration_sec)) fields.durationSec = body.duration_sec;
    if (given(body.event_at)) fields.eventAt = new Date(body.event_at).toISOString();

    const contentChanged = Object.keys(fields).length > 0;
    if (given(body.status) && isEventStatus(body.status)) {
      fields.status = body.status;
    } else if (contentChanged) {
      // New content re-enters the pipeline with a fresh attempt budget
      fields.status = "pending";
      fields.aiAttempts = 0;
    }

    const updated = Object.keys(fields).length > 0
      ? (await storage.update(event.id, fields)) ?? event
      : event;

    if (screenRecordingOf(updated) !== null) {
      await storage.upsertPlaceholderIdea(updated);
    }

    evaluate(updated);
    res.json(eventToDict(updated));
  }));

  app.get("/v1/events/:id", auth, asyncHandler(async (req, res) => {
    const event = await loadEvent(getUserId(res), req.params.id);
    res.json(eventToDict(event));
  }));

  app.get("/v1/events/:id/status", auth, asyncHandler(async (req, res) => {
    const event = await loadEvent(getUserId(res), req.params.id);
    res.json({ status: event.status });
  }));

  app.get("/v1/debug/events/:id/ai-state", auth, asyncHandler(async (req, res) => {
    if (!config.eventDebugEnabled) {
      throw new HttpError(404, "Not Found");
    }
    const userId = getUserId(res);
    const event = await loadEvent(userId, req.params.id);

    const plan = classifyEvent(event, config.maxEventAttempts);
    const state = pipeline.scheduler.getDebugState(userId, event.id);
    const signals = {
      hasAudioUrl: hasAudio(event),
      hasScreenRecordingUrl: screenRecordingOf(event) !== null,
      hasTranscript: hasTranscript(event),
      needsTranscription: plan.needsTranscription,
      rule1SingleEligible: plan.path === "single",
      rule2BatchEligible: plan.path === "batch",
      eligibleForAiExtraction: plan.path !== "none",
      aiAttempts: event.aiAttempts,
    };
    const waitExceeded = state.batchWindow.flushReason === "max_wait";

    let probableReason: string | null = null;
    if (!config.aiEnabled) {
      probableReason = "AI disabled (missing GEMINI_API_KEY)";
    } else if (state.gate.processing) {
      probableReason = "User AI queue is currently processing";
    } else if (state.gate.cooldownRemainingSec > 0) {
      probableReason = "User AI queue cooldown active";
    } else if (state.inBatchWindow && state.batchWindow.flushReason === null) {
      probableReason = "Waiting for input batch trigger threshold";
    } else if (plan.path === "none" && event.status !== "processed") {
      probableReason = event.aiAttempts >= config.maxEventAttempts
        ? "Retry limit reached"
        : "Event not eligible for extraction rules";
    } else if (event.status === "transcribing") {
      probableReason = "AI/STT likely pending or transient failure retry path";
    } else if (event.status === "failed") {
      probableReason = "Last AI/STT attempt failed";
    } else if (event.status === "processed") {
      probableReason = "Processed successfully";
    }

    res.json({
      eventId: event.id,
      userId,
      status: event.status,
      eventAt: event.eventAt,
      updatedAt: event.updatedAt,
      signals,
      audioBatch: {
        pendingInputCount: state.batchWindow.size,
        triggerCount: config.batchTriggerCount,
        maxWaitHours: config.batchMaxWaitHours,
        oldestPendingEventAt: state.batchWindow.oldestEventAt,
        waitExceeded,
      },
      runtime: {
        aiEnabled: config.aiEnabled,
        userProcessing: state.gate.processing,
        lastRunAt: state.gate.lastRunAt,
        cooldownRemainingSec: state.gate.cooldownRemainingSec,
        inBatchWindow: state.inBatchWindow,
        inSingleQueue: state.inSingleQueue,
        singleQueueSize: state.singleQueueSize,
      },
      probableReason,
    });
  }));

  app.get("/v1/debug/events/:id/linked-idea", auth, asyncHandler(async (req, res) => {
    if (!config.eventDebugEnabled) {
      throw new HttpError(404, "Not Found");
    }
    const userId = getUserId(res);
    const event = await loadEvent(userId, req.params.id);

    const idea = await storage.getIdeaForEvent(userId, event.id);
    if (!idea) {
      res.json({ eventId: event.id, idea: null });
      return;
    }

    res.json({
      eventId: event.id,
      idea: {
        id: idea.id,
        isPlaceholder: isPlaceholderIdea(idea),
        title: idea.title,
        content: idea.content,
        screenRecordingUrl: idea.screenRecordingUrl,
        recordingUrl: idea.recordingUrl,
        audioUrl: idea.audioUrl,
        createdAt: idea.createdAt,
        updatedAt: idea.updatedAt,
      },
    });
  }));
}
