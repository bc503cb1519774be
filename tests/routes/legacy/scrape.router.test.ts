/**
 * Legacy Scrape API Test
 *
 * 목적: /scrape 경로의 기존 응답 형식 (envelope 없음) 유지 검증
 */

import { describe, it, expect, beforeEach, afterEach } from "@jest/globals";
import request from "supertest";
import { createTestApp, successfulOutcome, type TestApp } from "../../helpers/createTestApp";
import { deferred } from "../../helpers/deferred";

describe("Legacy Scrape API (/scrape)", () => {
  let ctx: TestApp;

  beforeEach(async () => {
    ctx = await createTestApp();
  });

  afterEach(async () => {
    await ctx.close();
  });

  it("POST /search는 envelope 없이 202를 반환해야 함", async () => {
    const res = await request(ctx.app).post("/scrape/search").send({ query: "serum", brand: "Wardah" });

    expect(res.status).toBe(202);
    expect(res.body).toEqual({
      job_id: expect.any(String),
      status: "pending",
      message: "Scraping job started for query: serum",
      created_at: expect.any(String),
    });
  });

  it("GET /status/:jobId는 Job 자체를 반환해야 함", async () => {
    const created = await request(ctx.app).post("/scrape/search").send({ query: "serum" });
    await ctx.service.waitForIdle();

    const res = await request(ctx.app).get(`/scrape/status/${created.body.job_id}`);

    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({ job_id: created.body.job_id, status: "completed" });
  });

  it("GET /results/:jobId는 전체 결과를 반환해야 함", async () => {
    const created = await request(ctx.app).post("/scrape/search").send({ query: "serum" });
    await ctx.service.waitForIdle();

    const res = await request(ctx.app).get(`/scrape/results/${created.body.job_id}`);

    expect(res.status).toBe(200);
    expect(res.body).toEqual({
      job_id: created.body.job_id,
      status: "completed",
      result_count: 2,
      results: successfulOutcome().products,
    });
  });

  it("GET /results/:jobId는 완료 전이면 400이어야 함", async () => {
    const started = deferred();
    const gate = deferred();
    ctx.scrape.mockImplementation(async () => {
      started.resolve();
      await gate.promise;
      return successfulOutcome();
    });
    const created = await request(ctx.app).post("/scrape/search").send({ query: "serum" });
    const jobId: string = created.body.job_id;
    await started.promise;

    const res = await request(ctx.app).get(`/scrape/results/${jobId}`);
    gate.resolve();

    expect(res.status).toBe(400);
    expect(res.body.message).toBe(`Job ${jobId} is not completed yet (status: running)`);
  });

  it("GET /jobs는 전체 Job 수와 목록을 반환해야 함", async () => {
    await request(ctx.app).post("/scrape/search").send({ query: "serum" });

    const res = await request(ctx.app).get("/scrape/jobs");

    expect(res.status).toBe(200);
    expect(res.body.total_jobs).toBe(1);
    expect(res.body.jobs).toHaveLength(1);
  });

  it("DELETE /jobs/:jobId는 메시지만 반환해야 함", async () => {
    const created = await request(ctx.app).post("/scrape/search").send({ query: "serum" });
    const jobId: string = created.body.job_id;
    await ctx.service.waitForIdle();

    const res = await request(ctx.app).delete(`/scrape/jobs/${jobId}`);

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ message: `Job ${jobId} deleted successfully` });
    expect((await request(ctx.app).get(`/scrape/status/${jobId}`)).status).toBe(404);
  });

  it("없는 Job은 404여야 함", async () => {
    const res = await request(ctx.app).get("/scrape/status/missing");

    expect(res.status).toBe(404);
    expect(res.body.message).toBe("Job not found: missing");
  });
});
