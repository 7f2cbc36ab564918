import { readdir, readFile } from "node:fs/promises";
import { describe, expect, it } from "vitest";

const SOURCE_DIR = new URL("./", import.meta.url);

describe("ingestion boundary", () => {
  it("never imports the chunker", async () => {
    const files = (await readdir(SOURCE_DIR)).filter((name) => name.endsWith(".ts"));
    const offenders: string[] = [];
    for (const name of files) {
      const source = await readFile(new URL(name, SOURCE_DIR), "utf8");
      if (/from\s+["']@corpora\/chunker["']/.test(source)) offenders.push(name);
    }
    expect(offenders).toEqual([]);
  });

  it("does not depend on the chunker package", async () => {
    const manifest: unknown = JSON.parse(await readFile(new URL("../package.json", import.meta.url), "utf8"));
    const dependencies =
      typeof manifest === "object" && manifest !== null && "dependencies" in manifest
        ? manifest.dependencies
        : {};
    expect(dependencies).not.toHaveProperty("@corpora/chunker");
  });
});
