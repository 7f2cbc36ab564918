import { describe, expect, it, vi } from "vitest";
import type { ChunkJobData, EmbedJobData } from "@corpora/types";
import {
  enqueueChunkRun,
  enqueueEmbedRun,
  jobIdFor,
  parseRedisConnection,
  type JobSink,
  type QueuedJob,
} from "./queues.js";

describe("parseRedisConnection", () => {
  it("reads host, port and password", () => {
    expect(parseRedisConnection("redis://:test-secret@cache.internal:6380")).toEqual({
      host: "cache.internal",
      port: 6380,
      password: "test-secret",
    });
  });

  it("defaults the port and leaves out an empty password", () => {
    expect(parseRedisConnection("redis://localhost")).toEqual({
      host: "localhost",
      port: 6379,
      password: undefined,
    });
  });
});

function queuedJob(state: string, remove: () => Promise<void>): QueuedJob {
  return { getState: async () => state, remove };
}

function fakeQueue<T>(state: string | null = null) {
  const remove = vi.fn(async (): Promise<void> => undefined);
  const job = state === null ? undefined : queuedJob(state, remove);
  const add = vi.fn(async (_name: string, _data: T) => ({}));
  const getJob = vi.fn(async (_jobId: string) => job);
  const queue: JobSink<T> = { add, getJob };
  return { queue, add, getJob, remove };
}

describe("enqueue", () => {
  it("keys jobs by stage and run", () => {
    expect(jobIdFor("embed", "2026-10-01")).toBe("embed-2026-10-01");
  });

  it("adds a chunk job under its run id", async () => {
    const { queue, add, getJob } = fakeQueue<ChunkJobData>();

    const jobId = await enqueueChunkRun(queue, "r1");

    expect(jobId).toBe("chunk-r1");
    expect(getJob).toHaveBeenCalledWith("chunk-r1");
    expect(add).toHaveBeenCalledWith("chunk", { type: "chunk", runId: "r1" }, { jobId: "chunk-r1" });
  });

  it("passes embed options through", async () => {
    const { queue, add } = fakeQueue<EmbedJobData>();

    await enqueueEmbedRun(queue, "r1", { dryRun: true, maxChunks: 10 });

    expect(add).toHaveBeenCalledWith(
      "embed",
      { dryRun: true, maxChunks: 10, type: "embed", runId: "r1" },
      { jobId: "embed-r1" },
    );
  });

  it.each(["completed", "failed"])("replaces a %s job so the run can be embedded again", async (state) => {
    const { queue, add, remove } = fakeQueue<EmbedJobData>(state);

    await enqueueEmbedRun(queue, "r1");

    expect(remove).toHaveBeenCalledOnce();
    expect(remove.mock.invocationCallOrder[0]).toBeLessThan(add.mock.invocationCallOrder[0] ?? 0);
    expect(add).toHaveBeenCalledWith("embed", { type: "embed", runId: "r1" }, { jobId: "embed-r1" });
  });

  it.each(["waiting", "active", "delayed"])("keeps a %s job for the same run", async (state) => {
    const { queue, remove } = fakeQueue<ChunkJobData>(state);

    await enqueueChunkRun(queue, "r1");

    expect(remove).not.toHaveBeenCalled();
  });
});
