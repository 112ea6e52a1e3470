import { describe, it, expect, beforeEach } from "vitest";
import request from "supertest";
import { buildTestApp, signIn, type Session, type TestApp } from "./testApp";

const HOUR = 60 * 60 * 1000;
const SCREEN = "https://files.test/r.mp4";

describe("event routes", () => {
  let t: TestApp;
  let session: Session;

  beforeEach(async () => {
    t = buildTestApp();
    session = await signIn(t.app);
  });

  it("serves health checks without auth", async () => {
    await request(t.app).get("/healthz").expect(200, { ok: true, service: "egg-test" });
    await request(t.app).get("/readyz").expect(200, { ready: true });
  });

  it("rejects requests without a valid token", async () => {
    await request(t.app).get("/v1/eggbook/todos").expect(401, { error: "Invalid token" });
    await request(t.app)
      .get("/v1/eggbook/todos")
      .set({ Authorization: "Bearer user-1.1.deadbeef" })
      .expect(401, { error: "Invalid token" });
  });

  it("refuses a device that belongs to someone else", async () => {
    const other = await request(t.app).post("/v1/auth/anonymous").expect(200);

    await request(t.app)
      .post("/v1/devices")
      .set({ Authorization: `Bearer ${String(other.body.token)}` })
      .send({ device_id: "device-1", device_model: "iPhone", os: "ios", language: "en", timezone: "UTC" })
      .expect(409, { error: "Device is already linked to another user" });
  });

  it("stores memories", async () => {
    await request(t.app)
      .post("/v1/memory")
      .set(session.auth)
      .send({ type: "preference", content: "likes mornings" })
      .expect(200, { message: "Memory saved" });

    expect(t.storage.memories).toHaveLength(1);
    expect(t.storage.memories[0]).toMatchObject({ userId: session.userId, content: "likes mornings", importance: 0 });
  });

  it("validates event bodies", async () => {
    const res = await request(t.app).post("/v1/events").set(session.auth).send({}).expect(400);
    expect(res.body.error).toBe("Validation failed");
    expect(res.body.details[0].path).toBe("device_id");
  });

  it("rejects malformed JSON", async () => {
    await request(t.app)
      .post("/v1/events")
      .set(session.auth)
      .set("Content-Type", "application/json")
      .send("{not json")
      .expect(400, { error: "Invalid JSON body" });
  });

  it("rejects events for an unknown device", async () => {
    await request(t.app)
      .post("/v1/events")
      .set(session.auth)
      .send({ device_id: "device-9", transcript: "hello" })
      .expect(404, { error: "Device not found" });
  });

  it("turns 'call Alex tomorrow' into a todo once the batch window flushes", async () => {
    t.extractor.respond = (inputs) =>
      inputs.map((input) => ({ kind: "todo", payload: { title: "Call Alex" }, sourceEventIds: [input.eventId] }));

    const created = await request(t.app)
      .post("/v1/events")
      .set(session.auth)
      .send({ device_id: "device-1", transcript: "call Alex tomorrow" })
      .expect(200);
    const eventId = String(created.body.eventId);
    expect(created.body).toMatchObject({
      status: "pending",
      transcript: "call Alex tomorrow",
      recordingUrl: null,
      eventAt: "2026-03-02T09:00:00.000Z",
    });
    expect(t.extractor.calls).toHaveLength(0);

    t.clock.advance(12 * HOUR);
    await t.pipeline.scheduler.sweep();
    await t.pipeline.scheduler.whenIdle();

    await request(t.app).get(`/v1/events/${eventId}/status`).set(session.auth).expect(200, { status: "processed" });
    const todos = await request(t.app).get("/v1/eggbook/todos").set(session.auth).expect(200);
    expect(todos.body.items).toHaveLength(1);
    expect(todos.body.items[0]).toMatchObject({ title: "Call Alex", sourceEventId: eventId, isAccepted: false });
  });

  it("starts single inference when a recording is attached later", async () => {
    const created = await request(t.app)
      .post("/v1/events")
      .set(session.auth)
      .send({ device_id: "device-1", duration_sec: 42.7 })
      .expect(200);
    const eventId = String(created.body.eventId);
    expect(created.body.durationSec).toBe(42);

    const patched = await request(t.app)
      .patch(`/v1/events/${eventId}`)
      .set(session.auth)
      .send({ recording_url: SCREEN, transcript: "sketch the logo" })
      .expect(200);
    expect(patched.body).toMatchObject({ recordingUrl: SCREEN, screenRecordingUrl: SCREEN, status: "pending" });

    await t.pipeline.scheduler.whenIdle();

    const ideas = await request(t.app).get("/v1/eggbook/ideas").set(session.auth).expect(200);
    expect(ideas.body.items).toHaveLength(1);
    expect(ideas.body.items[0]).toMatchObject({
      sourceEventId: eventId,
      title: `Idea from ${eventId}`,
      content: "sketch the logo",
      screenRecordingUrl: SCREEN,
    });
    await request(t.app)
      .get("/v1/eggbook/sync-status")
      .set(session.auth)
      .expect(200, { status: "ok", lastSyncAt: null, processing: false, hasUpdates: true });
  });

  it("re-queues an event whose content changes after a failure", async () => {
    const created = await request(t.app)
      .post("/v1/events")
      .set(session.auth)
      .send({ device_id: "device-1" })
      .expect(200);
    const eventId = String(created.body.eventId);
    await t.storage.update(eventId, { status: "failed", aiAttempts: 3 });

    const patched = await request(t.app)
      .patch(`/v1/events/${eventId}`)
      .set(session.auth)
      .send({ transcript: "second thoughts" })
      .expect(200);

    expect(patched.body.status).toBe("pending");
    expect(t.storage.event(eventId).aiAttempts).toBe(0);
  });

  it("rejects an unknown status", async () => {
    const created = await request(t.app).post("/v1/events").set(session.auth).send({ device_id: "device-1" });

    await request(t.app)
      .patch(`/v1/events/${String(created.body.eventId)}`)
      .set(session.auth)
      .send({ status: "done" })
      .expect(400, { error: "Invalid status" });
  });

  it("hides events from other users", async () => {
    const created = await request(t.app).post("/v1/events").set(session.auth).send({ device_id: "device-1" });
    const stranger = await signIn(t.app, "device-2");

    await request(t.app)
      .get(`/v1/events/${String(created.body.eventId)}`)
      .set(stranger.auth)
      .expect(404, { error: "Event not found" });
  });

  it("hides the debug endpoints unless enabled", async () => {
    const created = await request(t.app).post("/v1/events").set(session.auth).send({ device_id: "device-1" });

    await request(t.app)
      .get(`/v1/debug/events/${String(created.body.eventId)}/ai-state`)
      .set(session.auth)
      .expect(404, { error: "Not Found" });
  });

  it("explains why a batch event is waiting", async () => {
    t = buildTestApp({ eventDebugEnabled: true });
    session = await signIn(t.app);
    const created = await request(t.app)
      .post("/v1/events")
      .set(session.auth)
      .send({ device_id: "device-1", transcript: "note to self" })
      .expect(200);

    const res = await request(t.app)
      .get(`/v1/debug/events/${String(created.body.eventId)}/ai-state`)
      .set(session.auth)
      .expect(200);

    expect(res.body.probableReason).toBe("Waiting for input batch trigger threshold");
    expect(res.body.signals).toMatchObject({ hasTranscript: true, rule1SingleEligible: false, rule2BatchEligible: true });
    expect(res.body.audioBatch).toMatchObject({
      pendingInputCount: 1,
      triggerCount: 5,
      maxWaitHours: 12,
      oldestPendingEventAt: "2026-03-02T09:00:00.000Z",
      waitExceeded: false,
    });
  });

  it("shows the placeholder idea linked to a screen recording", async () => {
    t = buildTestApp({ eventDebugEnabled: true, aiEnabled: false });
    session = await signIn(t.app);
    const created = await request(t.app).post("/v1/events").set(session.auth).send({ device_id: "device-1" });
    const eventId = String(created.body.eventId);

    await request(t.app)
      .patch(`/v1/events/${eventId}`)
      .set(session.auth)
      .send({ screen_recording_url: SCREEN })
      .expect(200);

    const res = await request(t.app).get(`/v1/debug/events/${eventId}/linked-idea`).set(session.auth).expect(200);
    expect(res.body.eventId).toBe(eventId);
    expect(res.body.idea).toMatchObject({ isPlaceholder: true, title: null, content: null, screenRecordingUrl: SCREEN });
    await request(t.app)
      .get("/v1/eggbook/sync-status")
      .set(session.auth)
      .expect(200, { status: "ok", lastSyncAt: null, processing: true, hasUpdates: false });
  });

  it("answers unknown routes with 404", async () => {
    await request(t.app).get("/v1/nope").expect(404, { error: "Not Found" });
  });
});
