import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { ConfigError } from "../core/errors";

const departmentMapSchema = z.record(z.string(), z.string());

/** Reads a `{ "ACC": "Accounting", ... }` file into a map keyed by upper-cased prefix. */
export async function loadDepartmentMap(filePath: string): Promise<Map<string, string>> {
  const absolutePath = path.resolve(filePath);
  let raw: string;
  try {
    raw = await fs.promises.readFile(absolutePath, "utf-8");
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Cannot read department map ${absolutePath}: ${reason}`);
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    throw new ConfigError(`Department map ${absolutePath} is not valid JSON`);
  }

  const parsed = departmentMapSchema.safeParse(json);
  if (!parsed.success) {
    throw new ConfigError(`Department map ${absolutePath} must be an object of prefix to department name`);
  }

  return new Map(Object.entries(parsed.data).map(([prefix, name]) => [prefix.trim().toUpperCase(), name.trim()]));
}
