import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, rm } from "fs/promises";
import os from "os";
import path from "path";
import request from "supertest";
import { buildTestApp, signIn, type Session, type TestApp } from "./testApp";

describe("upload routes", () => {
  let dir: string;
  let t: TestApp;
  let session: Session;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "egg-uploads-"));
    t = buildTestApp({ uploadDir: dir });
    session = await signIn(t.app);
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  async function startUpload(): Promise<{ id: string; target: string; fileUrl: URL }> {
    const res = await request(t.app)
      .post("/v1/uploads/recording")
      .set(session.auth)
      .send({ content_type: "audio/m4a", filename: "clip.M4A" })
      .expect(200);
    const uploadUrl = new URL(String(res.body.uploadUrl));
    const id = uploadUrl.pathname.split("/").pop() ?? "";
    expect(res.body.expiresAt).toBe("2026-03-02T09:15:00.000Z");
    return { id, target: `${uploadUrl.pathname}${uploadUrl.search}`, fileUrl: new URL(String(res.body.fileUrl)) };
  }

  it("stores the uploaded bytes and serves them back", async () => {
    const { id, target, fileUrl } = await startUpload();
    const bytes = Buffer.from([1, 2, 3, 4, 5]);

    await request(t.app)
      .put(target)
      .set("Content-Type", "application/octet-stream")
      .send(bytes)
      .expect(200, { message: "Upload completed", fileUrl: `/v1/uploads/files/${id}` });

    expect(await readFile(path.join(dir, `${id}.m4a`))).toEqual(bytes);

    const served = await request(t.app).get(fileUrl.pathname).expect(200);
    expect(served.headers["content-type"]).toBe("audio/m4a");
    expect(served.headers["content-length"]).toBe("5");
  });

  it("requires a signed-in user to start an upload", async () => {
    await request(t.app).post("/v1/uploads/recording").send({ content_type: "audio/m4a" }).expect(401);
  });

  it("rejects a wrong upload token", async () => {
    const { id } = await startUpload();

    await request(t.app)
      .put(`/v1/uploads/recording/${id}?token=nope`)
      .send(Buffer.from([1]))
      .expect(403, { error: "Invalid upload token" });
  });

  it("rejects an empty body", async () => {
    const { target } = await startUpload();

    await request(t.app).put(target).expect(400, { error: "Empty upload body" });
  });

  it("expires upload URLs", async () => {
    const { target } = await startUpload();
    t.clock.advance(16 * 60 * 1000);

    await request(t.app)
      .put(target)
      .set("Content-Type", "application/octet-stream")
      .send(Buffer.from([1]))
      .expect(410, { error: "Upload URL expired" });
  });

  it("answers 404 for unknown sessions and missing files", async () => {
    await request(t.app).put("/v1/uploads/recording/missing?token=x").send(Buffer.from([1])).expect(404);
    const { fileUrl } = await startUpload();

    await request(t.app).get(fileUrl.pathname).expect(404, { error: "File not found" });
  });
});
