import { createReadStream } from "node:fs";
import { access, mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { createInterface } from "node:readline";
import type { z } from "zod";
import { ValidationError } from "@corpora/errors";

export type RecordSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

export async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

function issuesToFields(error: z.ZodError): Record<string, string> {
  const fields: Record<string, string> = {};
  for (const issue of error.issues) {
    fields[issue.path.join(".") || "(record)"] = issue.message;
  }
  return fields;
}

/** Write through a temp file so readers never see a half-written artifact. */
async function writeAtomic(path: string, contents: string): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  const tmp = `${path}.tmp`;
  await writeFile(tmp, contents, "utf8");
  await rename(tmp, path);
}

/**
 * Stream records from an NDJSON file, validating each line. Blank lines are
 * skipped; an invalid line fails with its 1-based line number.
 */
export async function* readNdjson<T>(path: string, schema: RecordSchema<T>): AsyncGenerator<T> {
  const rl = createInterface({
    input: createReadStream(path, { encoding: "utf8" }),
    crlfDelay: Infinity,
  });

  let lineNumber = 0;
  for await (const line of rl) {
    lineNumber += 1;
    const trimmed = line.trim();
    if (!trimmed) continue;

    let raw: unknown;
    try {
      raw = JSON.parse(trimmed);
    } catch (error: unknown) {
      throw new ValidationError(
        `Invalid JSON at ${path}:${String(lineNumber)}`,
        { line: String(lineNumber) },
        { cause: error },
      );
    }

    const result = schema.safeParse(raw);
    if (!result.success) {
      throw new ValidationError(
        `Invalid record at ${path}:${String(lineNumber)}`,
        issuesToFields(result.error),
        { cause: result.error },
      );
    }
    yield result.data;
  }
}

export async function readNdjsonAll<T>(path: string, schema: RecordSchema<T>): Promise<T[]> {
  const records: T[] = [];
  for await (const record of readNdjson(path, schema)) records.push(record);
  return records;
}

export async function writeNdjson(path: string, records: Iterable<unknown>): Promise<number> {
  const lines: string[] = [];
  for (const record of records) lines.push(JSON.stringify(record));
  await writeAtomic(path, lines.length > 0 ? `${lines.join("\n")}\n` : "");
  return lines.length;
}

export async function readJson<T>(path: string, schema: RecordSchema<T>): Promise<T> {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(path, "utf8"));
  } catch (error: unknown) {
    throw new ValidationError(`Cannot read ${path}`, { path: "unreadable or not JSON" }, { cause: error });
  }
  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new ValidationError(`Invalid contents in ${path}`, issuesToFields(result.error), {
      cause: result.error,
    });
  }
  return result.data;
}

export async function writeJson(path: string, value: unknown): Promise<void> {
  await writeAtomic(path, `${JSON.stringify(value, null, 2)}\n`);
}
