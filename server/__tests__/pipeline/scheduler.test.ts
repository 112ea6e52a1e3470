import { describe, it, expect, beforeEach, vi } from "vitest";
import { BatchWindow, EventQueue } from "../../pipeline/batchWindow";
import { CooldownGate } from "../../pipeline/cooldownGate";
import { PipelineOrchestrator } from "../../pipeline/orchestrator";
import { AggregationScheduler } from "../../pipeline/scheduler";
import type { EventRecord } from "@shared/schema";
import {
  FakeClock,
  MemStorage,
  ScriptedExtractor,
  ScriptedTranscriber,
  T0,
  makeEvent,
  recordingSleep,
  testConfig,
} from "../fakes";

const HOUR = 60 * 60 * 1000;
const SCREEN = "https://files.test/r.mp4";

describe("AggregationScheduler", () => {
  let clock: FakeClock;
  let storage: MemStorage;
  let extractor: ScriptedExtractor;
  let gate: CooldownGate;
  let scheduler: AggregationScheduler;

  beforeEach(() => {
    clock = new FakeClock();
    storage = new MemStorage(clock);
    extractor = new ScriptedExtractor();
    gate = new CooldownGate(testConfig.cooldownMs, clock);
    const orchestrator = new PipelineOrchestrator({
      events: storage,
      eggbook: storage,
      transcriber: new ScriptedTranscriber(),
      extractor,
      config: testConfig,
      sleep: recordingSleep().sleep,
    });
    scheduler = new AggregationScheduler({
      events: storage,
      orchestrator,
      gate,
      window: new BatchWindow(testConfig.batchTriggerCount, testConfig.batchMaxWaitMs),
      singles: new EventQueue(),
      clock,
      config: testConfig,
    });
  });

  function ingest(overrides: Partial<EventRecord> & { id: string }): EventRecord {
    const event = makeEvent({ eventAt: new Date(clock.now()).toISOString(), ...overrides });
    storage.seed(event);
    return event;
  }

  it("starts single inference right away for a screen recording", async () => {
    const event = ingest({ id: "s1", screenRecordingUrl: SCREEN, transcript: "also spoken" });

    expect(scheduler.onEventChanged(event)).toEqual({ path: "single", action: "started" });
    await scheduler.whenIdle();

    expect(extractor.calls.map((call) => call.mode)).toEqual(["single"]);
    expect(storage.event("s1").status).toBe("processed");
  });

  it("holds batch events until the trigger count", async () => {
    for (let i = 0; i < 4; i++) {
      clock.advance(1000);
      const event = ingest({ id: `b${i}`, transcript: `note ${i}` });
      expect(scheduler.onEventChanged(event)).toEqual({ path: "batch", action: "queued" });
    }
    expect(gate.isProcessing("user-1")).toBe(false);

    clock.advance(1000);
    expect(scheduler.onEventChanged(ingest({ id: "b4", transcript: "note 4" }))).toEqual({
      path: "batch",
      action: "started",
    });
    await scheduler.whenIdle();

    expect(extractor.calls).toHaveLength(1);
    expect(extractor.calls[0].mode).toBe("batch");
    expect(extractor.calls[0].inputs.map((input) => input.eventId)).toEqual(["b0", "b1", "b2", "b3", "b4"]);
  });

  it("flushes a small batch once its oldest event has waited long enough", async () => {
    scheduler.onEventChanged(ingest({ id: "b0", transcript: "lonely note" }));

    clock.advance(12 * HOUR);
    const report = await scheduler.sweep();
    await scheduler.whenIdle();

    expect(report).toEqual({ users: 1, started: 1, deferred: 0 });
    expect(storage.event("b0").status).toBe("processed");
  });

  it("defers a trigger during cooldown and picks it up on a later sweep", async () => {
    scheduler.onEventChanged(ingest({ id: "s1", screenRecordingUrl: SCREEN }));
    await scheduler.whenIdle();

    clock.advance(1000);
    const second = ingest({ id: "s2", screenRecordingUrl: SCREEN });
    expect(scheduler.onEventChanged(second)).toEqual({ path: "single", action: "deferred" });
    expect(scheduler.getDebugState("user-1", "s2")).toMatchObject({
      inSingleQueue: true,
      gate: { processing: false, cooldownRemainingSec: 7 },
    });

    expect(await scheduler.sweep()).toEqual({ users: 1, started: 0, deferred: 1 });

    clock.advance(7000);
    expect(await scheduler.sweep()).toEqual({ users: 1, started: 1, deferred: 0 });
    await scheduler.whenIdle();

    expect(storage.event("s2").status).toBe("processed");
  });

  it("never runs two pipelines for the same user at once", async () => {
    const release = extractor.block();
    scheduler.onEventChanged(ingest({ id: "s1", screenRecordingUrl: SCREEN }));
    await vi.waitFor(() => expect(extractor.calls).toHaveLength(1));

    clock.advance(60_000);
    expect(scheduler.onEventChanged(ingest({ id: "s2", screenRecordingUrl: SCREEN }))).toEqual({
      path: "single",
      action: "deferred",
    });
    expect(await scheduler.sweep()).toEqual({ users: 0, started: 0, deferred: 0 });
    expect(scheduler.tryRun("user-1")).toBe(false);

    release();
    await scheduler.whenIdle();

    expect(extractor.calls).toHaveLength(1);
    expect(storage.event("s2").status).toBe("pending");
  });

  it("re-extracts an event that was edited while its run was in flight", async () => {
    const event = ingest({ id: "s1", screenRecordingUrl: SCREEN, transcript: "v1" });
    const release = extractor.block();

    expect(scheduler.onEventChanged(event)).toEqual({ path: "single", action: "started" });
    await vi.waitFor(() => expect(extractor.calls).toHaveLength(1));

    await storage.update("s1", { transcript: "v2", status: "pending", aiAttempts: 0 });
    expect(scheduler.onEventChanged(storage.event("s1"))).toEqual({ path: "single", action: "deferred" });

    release();
    await scheduler.whenIdle();
    expect(storage.event("s1").status).toBe("pending");

    clock.advance(testConfig.cooldownMs);
    await scheduler.sweep();
    await scheduler.whenIdle();

    expect(extractor.calls.map((call) => call.inputs[0].transcript)).toEqual(["v1", "v2"]);
    expect(storage.event("s1").status).toBe("processed");
  });

  it("ignores events with nothing to process and forgets queued ones", () => {
    const event = ingest({ id: "b0", transcript: "note" });
    scheduler.onEventChanged(event);
    expect(scheduler.getDebugState("user-1", "b0").inBatchWindow).toBe(true);

    const cleared = { ...event, transcript: null };
    expect(scheduler.onEventChanged(cleared)).toEqual({ path: "none", action: "ignored" });
    expect(scheduler.getDebugState("user-1", "b0").inBatchWindow).toBe(false);
  });

  it("moves an event from the batch window to single inference when a recording arrives", async () => {
    const event = ingest({ id: "e1", transcript: "note" });
    expect(scheduler.onEventChanged(event).action).toBe("queued");

    const withRecording = { ...event, screenRecordingUrl: SCREEN };
    storage.seed(withRecording);

    expect(scheduler.onEventChanged(withRecording)).toEqual({ path: "single", action: "started" });
    expect(scheduler.getDebugState("user-1", "e1")).toMatchObject({ inBatchWindow: false, inSingleQueue: false });
    await scheduler.whenIdle();

    expect(extractor.calls.map((call) => call.mode)).toEqual(["single"]);
  });

  it("rehydrates pending work after a restart", async () => {
    storage.seed(
      makeEvent({ id: "s1", screenRecordingUrl: SCREEN, eventAt: new Date(T0).toISOString() }),
      makeEvent({ id: "b1", transcript: "old note", eventAt: new Date(T0 - 13 * HOUR).toISOString() }),
      makeEvent({ id: "other", transcript: "x", userId: "user-2", status: "failed", aiAttempts: 3 }),
    );

    const report = await scheduler.sweep();
    await scheduler.whenIdle();

    expect(report).toEqual({ users: 1, started: 1, deferred: 0 });
    expect(extractor.calls.map((call) => call.mode)).toEqual(["single", "batch"]);
    expect(storage.event("s1").status).toBe("processed");
    expect(storage.event("b1").status).toBe("processed");
  });

  it("returns events stuck in transcribing to pending", async () => {
    storage.seed(
      makeEvent({ id: "stale", status: "transcribing", updatedAt: new Date(T0 - 20 * 60 * 1000).toISOString() }),
      makeEvent({ id: "fresh", status: "transcribing", updatedAt: new Date(T0 - 60 * 1000).toISOString() }),
    );

    expect(await scheduler.recoverStale(testConfig.transcribingGraceMs)).toBe(1);
    expect(storage.event("stale").status).toBe("pending");
    expect(storage.event("fresh").status).toBe("transcribing");
  });
});
