import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { RunArtifacts } from "@corpora/artifacts";
import { createEvent, createSilentLogger } from "@corpora/logger";
import { openRunEvents } from "./run-events.js";

describe("openRunEvents", () => {
  let runsDir: string;

  beforeEach(async () => {
    runsDir = await mkdtemp(join(tmpdir(), "corpora-events-"));
  });

  afterEach(async () => {
    await rm(runsDir, { recursive: true, force: true });
  });

  it("writes events to the run's events.jsonl", async () => {
    const artifacts = new RunArtifacts(runsDir, "r1");
    const events = openRunEvents(artifacts, createSilentLogger());

    events.sink.emit(createEvent("chunk.start", {}, "r1"));
    events.close();

    const lines = (await readFile(artifacts.paths.events, "utf8")).trim().split("\n");
    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0] ?? "{}")).toMatchObject({ type: "chunk.start", runId: "r1" });
  });

  it("keeps the run going when the events file cannot be opened", async () => {
    // A plain file where the run directory should be.
    await writeFile(join(runsDir, "r2"), "not a directory");
    const logger = createSilentLogger();
    const warn = vi.spyOn(logger, "warn");

    const events = openRunEvents(new RunArtifacts(runsDir, "r2"), logger);

    expect(() => events.sink.emit(createEvent("chunk.start", {}, "r2"))).not.toThrow();
    expect(() => events.close()).not.toThrow();
    expect(warn).toHaveBeenCalledOnce();
    expect(warn.mock.calls[0]?.[1]).toBe("Could not open run events file");
  });
});
